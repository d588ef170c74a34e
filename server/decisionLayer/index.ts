/**
 * Decision Layer (Intent Router)
 *
 * Purpose:
 * Central export for intent classification and per-user conversation state.
 *
 * Flow:
 * 1. Pattern Scorer: keyword baseline for every label
 * 2. Entity Extractor: rule-based entities
 * 3. Intent Classifier: model + context + fallbacks → IntentResult
 *
 * Layer: Decision Layer
 */

export {
  INTENT_LABELS,
  ENTITY_TYPES,
  argmax,
  clampConfidence,
  emptyScores,
  isIntentLabel,
  mergeEntities,
  type Entity,
  type EntityType,
  type IntentLabel,
  type IntentScores,
  type IntentResult,
  type IntentDetectionMethod,
  type IntentDecisionMetadata,
} from "./intent";

export { PatternScorer, type PatternScoreDetail } from "./patternScorer";

export {
  EntityExtractor,
  extractDateTimeParts,
  parseClockTime,
  formatClock,
  type DateTimeParts,
  type RelativeDay,
  type ClockTime,
} from "./entityExtractor";

export {
  IntentClassifier,
  type ClassifyOptions,
  type IntentClassifierDeps,
} from "./intentClassifier";

export {
  ConversationContextStore,
  type ConversationTurn,
  type ConversationSnapshot,
  type ConversationContextOptions,
} from "./conversationContext";
