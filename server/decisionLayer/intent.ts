/**
 * Intent Classification Types
 *
 * Purpose:
 * The fixed intent vocabulary and the result shape every classification
 * produces. An IntentResult is created once per message and never mutated.
 *
 * Layer: Decision Layer (Intent Router)
 */

import { INTENT_LABELS, type IntentLabel, type EntityType } from "@shared/schema";

export { INTENT_LABELS, ENTITY_TYPES, type IntentLabel, type EntityType } from "@shared/schema";

export type Entity = {
  type: EntityType;
  value: string;
  confidence: number;
};

export type IntentScores = Record<IntentLabel, number>;

export type IntentDetectionMethod =
  | "empty_input"
  | "attachment"
  | "llm"
  | "pattern"
  | "pattern_degraded"
  | "low_confidence_fallback";

/**
 * Structured decision metadata for observability.
 * Logs should explain why a label won, not just which one.
 */
export type IntentDecisionMetadata = {
  patternScores: IntentScores;
  matchedPatterns: string[];
  llmIntent?: IntentLabel;
  llmError?: string;
  contextBoostApplied?: IntentLabel;
  isFollowUp?: boolean;
  rawWinner?: { intent: IntentLabel; confidence: number };
};

export type IntentResult = Readonly<{
  intent: IntentLabel;
  confidence: number;
  entities: readonly Entity[];
  detectionMethod: IntentDetectionMethod;
  decisionMetadata: IntentDecisionMetadata;
}>;

export function emptyScores(): IntentScores {
  return {
    knowledge_qa: 0,
    lead_capture: 0,
    proposal_request: 0,
    next_step: 0,
    status_update: 0,
    smalltalk: 0,
    unknown: 0,
  };
}

export function isIntentLabel(value: string): value is IntentLabel {
  return INTENT_LABELS.some(label => label === value);
}

export function clampConfidence(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

/**
 * Highest score wins; label order breaks ties.
 */
export function argmax(scores: IntentScores): { intent: IntentLabel; confidence: number } {
  let best: IntentLabel = INTENT_LABELS[0];
  for (const label of INTENT_LABELS) {
    if (scores[label] > scores[best]) best = label;
  }
  return { intent: best, confidence: scores[best] };
}

function entityKey(entity: Entity): string {
  return `${entity.type}:${entity.value.trim().toLowerCase()}`;
}

/**
 * Union of entity lists keyed by (type, value), case-insensitive. On a
 * duplicate the higher confidence survives; first-seen order is kept.
 */
export function mergeEntities(...lists: ReadonlyArray<readonly Entity[]>): Entity[] {
  const merged = new Map<string, Entity>();
  for (const list of lists) {
    for (const entity of list) {
      const value = entity.value.trim();
      if (!value) continue;
      const normalized: Entity = { type: entity.type, value, confidence: clampConfidence(entity.confidence) };
      const key = entityKey(normalized);
      const existing = merged.get(key);
      if (!existing || normalized.confidence > existing.confidence) {
        merged.set(key, normalized);
      }
    }
  }
  return Array.from(merged.values());
}
