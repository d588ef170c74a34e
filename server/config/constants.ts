/**
 * Application Constants
 *
 * Centralized tuning values for classification, the agent pipelines and
 * request handling. Anything an operator may want to adjust lives here.
 */

/**
 * Intent classification tuning
 */
export const CLASSIFICATION_CONSTANTS = {
  /**
   * Default weight added per matching pattern. Individual patterns may
   * override it in the pattern table.
   */
  PATTERN_MATCH_INCREMENT: 0.3,

  /**
   * Added to the previous turn's intent when the user keeps talking about
   * the same thing. Result is capped at 1.
   */
  CONTEXT_BOOST: 0.2,

  /**
   * Below this, the message is treated as smalltalk.
   */
  LOW_CONFIDENCE_THRESHOLD: 0.3,

  SMALLTALK_FALLBACK_CONFIDENCE: 0.5,

  /**
   * Confidence assigned to the pattern winner when the model call fails or
   * returns something we cannot parse.
   */
  DEGRADED_CONFIDENCE: 0.6,

  ATTACHMENT_CONFIDENCE: 0.95,

  /**
   * Floor for the inherited intent on bare acknowledgements ("yes", "go ahead").
   * Boosted by CONTEXT_BOOST afterwards.
   */
  FOLLOW_UP_BASE_CONFIDENCE: 0.4,

  CLASSIFICATION_MAX_TOKENS: 300,
} as const;

/**
 * Fixed confidences per entity rule
 */
export const ENTITY_CONFIDENCE = {
  email: 0.95,
  phone: 0.9,
  money: 0.8,
  datetime: 0.75,
  name: 0.6,
  company: 0.6,
} as const;

/**
 * Knowledge pipeline
 */
export const KNOWLEDGE_CONSTANTS = {
  CHUNK_SIZE: 1000,
  CHUNK_OVERLAP: 200,
  TOP_K: 4,

  /**
   * Each retrieved snippet adds this much confidence, capped at 1.
   */
  CONFIDENCE_PER_RESULT: 0.2,

  SNIPPET_PREVIEW_CHARS: 200,
  ANSWER_MAX_TOKENS: 500,
  UNTITLED_DOCUMENT: "Untitled document",
  UNKNOWN_SOURCE: "unknown",
} as const;

/**
 * Dealflow pipeline
 */
export const DEALFLOW_CONSTANTS = {
  /**
   * Lead quality weights. Core fields sum to 1.0; timeline is a bonus and the
   * total is capped.
   */
  QUALITY_WEIGHTS: {
    name: 0.2,
    company: 0.25,
    contact: 0.2,
    intent: 0.2,
    budget: 0.15,
    timeline: 0.1,
  },

  PROPOSAL_SUMMARY_MAX_CHARS: 600,
  PROPOSAL_MIN_BULLETS: 3,
  PROPOSAL_MAX_TOKENS: 600,
  LEAD_PARSE_MAX_TOKENS: 300,
  STATUS_MAX_TOKENS: 200,

  DEFAULT_MEETING_HOUR: 10,
  DEFAULT_MEETING_DURATION_MINUTES: 60,
} as const;

/**
 * Request handling and collaborator budgets
 */
export const TIMEOUT_CONSTANTS = {
  /**
   * Budget for any single collaborator call (model, retrieval, storage).
   * Exceeding it counts as a failure and the caller degrades.
   */
  COLLABORATOR_TIMEOUT_MS: 15000,
} as const;

export const HANDLER_CONSTANTS = {
  WORKER_POOL_SIZE: 8,
  CONTEXT_WINDOW_SIZE: 10,
  CONTEXT_TTL_MINUTES: 30,

  /**
   * Expired contexts are swept after this many context writes.
   */
  CONTEXT_PRUNE_EVERY_WRITES: 100,

  /**
   * Request ids remembered for duplicate suppression.
   */
  REQUEST_REGISTRY_MAX_SIZE: 1000,
  REQUEST_REGISTRY_TTL_MINUTES: 60,
} as const;
