/**
 * Centralized LLM Model Registry
 *
 * Single source of truth for model selection. The provider (OpenAI, Gemini,
 * Claude) is detected from the model name by llm/client.ts, so switching a
 * task to another vendor is a one-line change here.
 *
 * MODEL TIERS:
 *
 * FAST_CLASSIFICATION - gpt-4o-mini
 *   Intent classification, lead field extraction, status reasons.
 *
 * STANDARD_REASONING - gpt-4o
 *   Knowledge answers and proposal drafting.
 */

export const LLM_MODELS = {
  /**
   * Fast, cheap model for structured JSON outputs.
   */
  FAST_CLASSIFICATION: "gpt-4o-mini",

  /**
   * Balanced model for grounded prose.
   */
  STANDARD_REASONING: "gpt-4o",
} as const;

export const GEMINI_MODELS = {
  FLASH: "gemini-2.5-flash",
} as const;

export const CLAUDE_MODELS = {
  SONNET: "claude-sonnet-4-20250514",
} as const;

/**
 * Model assignments by task type.
 */
export const MODEL_ASSIGNMENTS = {
  // Decision layer
  INTENT_CLASSIFICATION: LLM_MODELS.FAST_CLASSIFICATION,

  // Knowledge agent
  KNOWLEDGE_ANSWER: LLM_MODELS.STANDARD_REASONING,

  // Dealflow agent (lead gap-filling, proposals, status reasons)
  DEALFLOW: LLM_MODELS.STANDARD_REASONING,
} as const;

export function getModelDescription(model: string): string {
  switch (model) {
    case LLM_MODELS.FAST_CLASSIFICATION:
      return "fast-classification (gpt-4o-mini)";
    case LLM_MODELS.STANDARD_REASONING:
      return "standard-reasoning (gpt-4o)";
    default:
      return model;
  }
}
