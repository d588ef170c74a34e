/**
 * Intent Classifier
 *
 * Purpose:
 * Turns a raw message into exactly one IntentResult. Always returns; the
 * text-completion collaborator failing, timing out, or answering with
 * garbage degrades to the pattern scorer instead of raising.
 *
 * Classification Strategy:
 * 1. Pattern scores (baseline, no model cost)
 * 2. Model classification when a collaborator is configured
 * 3. Follow-up inheritance and context boost from the previous turn
 * 4. Attachments force knowledge_qa, overriding 1-3
 * 5. Low-confidence winners become smalltalk
 * 6. Model entities merged with rule-based entities
 *
 * Layer: Decision Layer (Intent Router)
 */

import { z } from "zod";
import { CLASSIFICATION_CONSTANTS, TIMEOUT_CONSTANTS } from "../config/constants";
import { buildIntentClassificationPrompt } from "../config/prompts";
import type { TextCompletion } from "../services/collaborators";
import { FollowUpDetector } from "../services/followUpDetector";
import { getErrorMessage } from "../utils/errorHandler";
import { parseModelJson } from "../utils/jsonResponse";
import { withTimeout } from "../utils/timeout";
import { EntityExtractor } from "./entityExtractor";
import {
  ENTITY_TYPES,
  INTENT_LABELS,
  argmax,
  clampConfidence,
  emptyScores,
  mergeEntities,
  type Entity,
  type EntityType,
  type IntentDecisionMetadata,
  type IntentDetectionMethod,
  type IntentLabel,
  type IntentResult,
  type IntentScores,
} from "./intent";
import { PatternScorer } from "./patternScorer";

const ENTITY_TYPE_ALIASES = new Map<string, EntityType>(Object.entries({
  person: "name",
  contact: "name",
  contact_name: "name",
  organization: "company",
  organisation: "company",
  org: "company",
  amount: "money",
  budget: "money",
  price: "money",
  date: "datetime",
  time: "datetime",
  phone_number: "phone",
  email_address: "email",
} satisfies Record<string, EntityType>));

function resolveEntityType(raw: string): EntityType | null {
  const key = raw.trim().toLowerCase();
  const direct = ENTITY_TYPES.find(type => type === key);
  if (direct) return direct;
  return ENTITY_TYPE_ALIASES.get(key) ?? null;
}

const modelEntitySchema = z.object({
  type: z.string(),
  value: z.union([z.string(), z.number()]).transform(v => String(v)),
  confidence: z.number().optional(),
});

const modelClassificationSchema = z.object({
  intent: z.string().transform(s => s.trim().toLowerCase()).pipe(z.enum(INTENT_LABELS)),
  confidence: z.number(),
  entities: z.array(z.unknown()).optional().default([]),
});

function normalizeModelEntities(raw: unknown[]): Entity[] {
  const entities: Entity[] = [];
  for (const item of raw) {
    const parsed = modelEntitySchema.safeParse(item);
    if (!parsed.success) continue;
    const type = resolveEntityType(parsed.data.type);
    if (!type || !parsed.data.value.trim()) continue;
    entities.push({
      type,
      value: parsed.data.value.trim(),
      confidence: clampConfidence(parsed.data.confidence ?? CLASSIFICATION_CONSTANTS.DEGRADED_CONFIDENCE),
    });
  }
  return entities;
}

export interface ClassifyOptions {
  hasAttachment?: boolean;
  previousIntent?: IntentLabel;
  requestId?: string;
}

export interface IntentClassifierDeps {
  scorer?: PatternScorer;
  extractor?: EntityExtractor;
  followUpDetector?: FollowUpDetector;
  textCompletion?: TextCompletion;
  timeoutMs?: number;
}

type ModelOutcome =
  | { ok: true; intent: IntentLabel; confidence: number; entities: Entity[] }
  | { ok: false; error: string };

export class IntentClassifier {
  private readonly scorer: PatternScorer;
  private readonly extractor: EntityExtractor;
  private readonly followUpDetector: FollowUpDetector;
  private readonly textCompletion?: TextCompletion;
  private readonly timeoutMs: number;

  constructor(deps: IntentClassifierDeps = {}) {
    this.scorer = deps.scorer ?? new PatternScorer();
    this.extractor = deps.extractor ?? new EntityExtractor();
    this.followUpDetector = deps.followUpDetector ?? new FollowUpDetector();
    this.textCompletion = deps.textCompletion;
    this.timeoutMs = deps.timeoutMs ?? TIMEOUT_CONSTANTS.COLLABORATOR_TIMEOUT_MS;
  }

  /**
   * Pattern-only classification. No collaborator calls, no context.
   */
  quickClassify(text: string, hasAttachment = false): IntentResult {
    const detail = this.scorer.scoreWithDetail(text);
    const entities = this.extractor.extract(text);
    const decisionMetadata: IntentDecisionMetadata = {
      patternScores: detail.scores,
      matchedPatterns: detail.matched.map(m => `${m.intent}:${m.description}`),
    };

    if (hasAttachment) {
      return freeze({
        intent: "knowledge_qa",
        confidence: CLASSIFICATION_CONSTANTS.ATTACHMENT_CONFIDENCE,
        entities,
        detectionMethod: "attachment",
        decisionMetadata,
      });
    }
    if (!text.trim()) {
      return freeze({ intent: "unknown", confidence: 0, entities: [], detectionMethod: "empty_input", decisionMetadata });
    }
    return this.finalize(capScores(detail.scores), "pattern", entities, decisionMetadata);
  }

  async classify(text: string, options: ClassifyOptions = {}): Promise<IntentResult> {
    const hasAttachment = options.hasAttachment ?? false;
    const detail = this.scorer.scoreWithDetail(text);
    const extracted = this.extractor.extract(text);
    const decisionMetadata: IntentDecisionMetadata = {
      patternScores: detail.scores,
      matchedPatterns: detail.matched.map(m => `${m.intent}:${m.description}`),
    };

    // Attachments are always document ingestion, whatever the text says
    if (hasAttachment) {
      return freeze({
        intent: "knowledge_qa",
        confidence: CLASSIFICATION_CONSTANTS.ATTACHMENT_CONFIDENCE,
        entities: extracted,
        detectionMethod: "attachment",
        decisionMetadata,
      });
    }

    if (!text.trim()) {
      return freeze({ intent: "unknown", confidence: 0, entities: [], detectionMethod: "empty_input", decisionMetadata });
    }

    let candidates: IntentScores;
    let method: IntentDetectionMethod;
    let modelEntities: Entity[] = [];

    if (this.textCompletion) {
      const outcome = await this.classifyWithModel(text, detail.scores, options);
      if (outcome.ok) {
        candidates = emptyScores();
        candidates[outcome.intent] = outcome.confidence;
        modelEntities = outcome.entities;
        method = "llm";
        decisionMetadata.llmIntent = outcome.intent;
      } else {
        candidates = emptyScores();
        const best = argmax(detail.scores);
        if (best.confidence > 0) {
          candidates[best.intent] = CLASSIFICATION_CONSTANTS.DEGRADED_CONFIDENCE;
        }
        method = "pattern_degraded";
        decisionMetadata.llmError = outcome.error;
      }
    } else {
      candidates = capScores(detail.scores);
      method = "pattern";
    }

    const previousIntent = options.previousIntent;
    if (previousIntent) {
      const followUp = this.followUpDetector.detect(text, previousIntent);
      if (followUp) {
        decisionMetadata.isFollowUp = true;
        candidates[previousIntent] = Math.max(
          candidates[previousIntent],
          CLASSIFICATION_CONSTANTS.FOLLOW_UP_BASE_CONFIDENCE,
        );
      }
      if (candidates[previousIntent] > 0) {
        candidates[previousIntent] = Math.min(1, candidates[previousIntent] + CLASSIFICATION_CONSTANTS.CONTEXT_BOOST);
        decisionMetadata.contextBoostApplied = previousIntent;
      }
    }

    return this.finalize(candidates, method, mergeEntities(modelEntities, extracted), decisionMetadata);
  }

  private finalize(
    candidates: IntentScores,
    method: IntentDetectionMethod,
    entities: Entity[],
    decisionMetadata: IntentDecisionMetadata,
  ): IntentResult {
    const winner = argmax(candidates);
    decisionMetadata.rawWinner = winner;

    if (winner.confidence < CLASSIFICATION_CONSTANTS.LOW_CONFIDENCE_THRESHOLD) {
      return freeze({
        intent: "smalltalk",
        confidence: CLASSIFICATION_CONSTANTS.SMALLTALK_FALLBACK_CONFIDENCE,
        entities,
        detectionMethod: "low_confidence_fallback",
        decisionMetadata,
      });
    }

    return freeze({
      intent: winner.intent,
      confidence: clampConfidence(winner.confidence),
      entities,
      detectionMethod: method,
      decisionMetadata,
    });
  }

  private async classifyWithModel(
    text: string,
    patternScores: IntentScores,
    options: ClassifyOptions,
  ): Promise<ModelOutcome> {
    const completion = this.textCompletion;
    if (!completion) {
      return { ok: false, error: "no text completion configured" };
    }

    const suggestion = argmax(patternScores);
    const prompt = buildIntentClassificationPrompt({
      text,
      hasAttachment: options.hasAttachment ?? false,
      patternSuggestion: suggestion.confidence > 0 ? suggestion.intent : "unknown",
      previousIntent: options.previousIntent,
    });

    let content: string;
    try {
      content = await withTimeout(
        () => completion.complete(prompt, CLASSIFICATION_CONSTANTS.CLASSIFICATION_MAX_TOKENS),
        this.timeoutMs,
        "intent classification",
      );
    } catch (error) {
      // HARDENING: collaborator outages degrade to the pattern scorer
      const message = getErrorMessage(error);
      console.warn(`[IntentClassifier] Model call failed, using pattern fallback: ${message}`);
      return { ok: false, error: message };
    }

    const parsed = parseModelJson(content, modelClassificationSchema);
    if (!parsed.success) {
      console.warn(`[IntentClassifier] Unusable model output, using pattern fallback: ${parsed.error}`);
      return { ok: false, error: parsed.error };
    }

    return {
      ok: true,
      intent: parsed.data.intent,
      confidence: clampConfidence(parsed.data.confidence),
      entities: normalizeModelEntities(parsed.data.entities),
    };
  }
}

function capScores(scores: IntentScores): IntentScores {
  const capped = emptyScores();
  for (const label of INTENT_LABELS) {
    capped[label] = clampConfidence(scores[label]);
  }
  return capped;
}

function freeze(result: IntentResult): IntentResult {
  return Object.freeze({ ...result, entities: Object.freeze([...result.entities]) });
}
