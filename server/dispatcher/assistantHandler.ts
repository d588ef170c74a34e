/**
 * Assistant Handler - Thin Orchestration Layer
 *
 * Purpose:
 * The single inbound entry point. Wires the request registry, the worker
 * pool, per-user serialisation, the intent classifier, the conversation
 * context and the dispatcher together. Always returns a Response.
 *
 * Flow (per message):
 * 1. Duplicate request id → skipped, nothing re-run
 * 2. Wait for the user's lock, then for a worker slot
 * 3. Cancelled while queued → skipped
 * 4. classify (previous intent from context) → append turn → dispatch
 * 5. Remember captured lead; persist interaction + lead in the background
 *
 * Layer: Dispatcher
 */

import type { Lead } from "../agents/dealflow/types";
import type { ConversationContextStore } from "../decisionLayer/conversationContext";
import type { IntentLabel } from "../decisionLayer/intent";
import type { IntentClassifier } from "../decisionLayer/intentClassifier";
import type { ConcurrencyLimiter, KeyedMutex } from "../services/concurrency";
import type { PersistedEntity, PersistenceSink } from "../services/collaborators";
import type { RequestRegistry } from "../services/requestRegistry";
import { TIMEOUT_CONSTANTS } from "../config/constants";
import { RequestLogger } from "../utils/requestLogger";
import { withTimeout } from "../utils/timeout";
import type { Dispatcher } from "./dispatcher";
import type { AssistantResponse, Message, ResponseErrorCode } from "./types";

export const DUPLICATE_REQUEST_MESSAGE = "This request was already received and is being handled.";
export const CANCELLED_REQUEST_MESSAGE = "This request was cancelled before processing started.";

export interface AssistantHandlerDeps {
  classifier: IntentClassifier;
  dispatcher: Dispatcher;
  contextStore: ConversationContextStore;
  registry: RequestRegistry;
  limiter: ConcurrencyLimiter;
  userLocks: KeyedMutex;
  persistence?: PersistenceSink;
  timeoutMs?: number;
}

export interface HandlerMetrics {
  totalRequests: number;
  byIntent: Record<string, number>;
  errorsByCode: Record<string, number>;
  duplicates: number;
  cancelled: number;
  averageLatencyMs: number;
  activeUsers: number;
}

export class AssistantHandler {
  private readonly classifier: IntentClassifier;
  private readonly dispatcher: Dispatcher;
  private readonly contextStore: ConversationContextStore;
  private readonly registry: RequestRegistry;
  private readonly limiter: ConcurrencyLimiter;
  private readonly userLocks: KeyedMutex;
  private readonly persistence?: PersistenceSink;
  private readonly timeoutMs: number;

  private readonly pendingWrites = new Set<Promise<void>>();
  private totalRequests = 0;
  private totalLatencyMs = 0;
  private duplicates = 0;
  private cancelledCount = 0;
  private readonly byIntent: Record<string, number> = {};
  private readonly errorsByCode: Record<string, number> = {};

  constructor(deps: AssistantHandlerDeps) {
    this.classifier = deps.classifier;
    this.dispatcher = deps.dispatcher;
    this.contextStore = deps.contextStore;
    this.registry = deps.registry;
    this.limiter = deps.limiter;
    this.userLocks = deps.userLocks;
    this.persistence = deps.persistence;
    this.timeoutMs = deps.timeoutMs ?? TIMEOUT_CONSTANTS.COLLABORATOR_TIMEOUT_MS;
  }

  async handle(message: Message): Promise<AssistantResponse> {
    if (this.registry.admit(message.requestId) === "duplicate") {
      this.duplicates++;
      return this.skipped(message, "duplicate", "duplicate_request", DUPLICATE_REQUEST_MESSAGE);
    }

    return this.userLocks.runExclusive(message.userId, () =>
      this.limiter.run(() => this.process(message)),
    );
  }

  /**
   * Returns false when the request already started (or finished).
   */
  cancel(requestId: string): boolean {
    return this.registry.cancel(requestId);
  }

  getMetrics(): HandlerMetrics {
    return {
      totalRequests: this.totalRequests,
      byIntent: { ...this.byIntent },
      errorsByCode: { ...this.errorsByCode },
      duplicates: this.duplicates,
      cancelled: this.cancelledCount,
      averageLatencyMs: this.totalRequests === 0 ? 0 : Math.round(this.totalLatencyMs / this.totalRequests),
      activeUsers: this.contextStore.activeUserCount(),
    };
  }

  /**
   * Resolves once every background persistence write has settled.
   */
  async flushPersistence(): Promise<void> {
    await Promise.all(Array.from(this.pendingWrites));
  }

  private async process(message: Message): Promise<AssistantResponse> {
    if (this.registry.isCancelled(message.requestId)) {
      this.cancelledCount++;
      this.registry.markCompleted(message.requestId);
      return this.skipped(message, "cancelled", "cancelled", CANCELLED_REQUEST_MESSAGE);
    }
    this.registry.markStarted(message.requestId);

    const logger = new RequestLogger(message.requestId, message.userId);
    logger.info("Processing message", { hasAttachment: message.hasAttachment, textLength: message.text.length });

    try {
      logger.startStage("classify");
      const previousIntent = this.contextStore.previousIntent(message.userId);
      const result = await this.classifier.classify(message.text, {
        hasAttachment: message.hasAttachment,
        previousIntent,
        requestId: message.requestId,
      });
      logger.endStage("classify");
      logger.info("Intent classified", {
        intent: result.intent,
        confidence: result.confidence,
        detectionMethod: result.detectionMethod,
      });
      logger.debug("Classifier decision", {
        matchedPatterns: result.decisionMetadata.matchedPatterns,
        isFollowUp: result.decisionMetadata.isFollowUp ?? false,
        contextBoost: result.decisionMetadata.contextBoostApplied,
      });

      this.contextStore.appendTurn(message.userId, {
        text: message.text,
        intent: result.intent,
        confidence: result.confidence,
        entities: result.entities,
      });

      logger.startStage("dispatch");
      const { response, capturedLead } = await this.dispatcher.dispatch(result, message, {
        recentLead: this.contextStore.recentLead(message.userId),
      });
      logger.endStage("dispatch");

      // A lead with no known field never replaces the one in context.
      if (capturedLead && capturedLead.qualityScore > 0) {
        this.contextStore.setLastLead(message.userId, capturedLead);
      }

      const durationMs = logger.getDuration();
      this.recordMetrics(result.intent, response.error?.code, durationMs);
      this.persistInBackground(message, response, capturedLead, durationMs);

      if (response.error) {
        logger.warn("Completed with error", { code: response.error.code, fatal: response.error.fatal });
      }
      logger.info("Request complete", { kind: response.payload.kind, stages: logger.getStageDurations() });
      return response;
    } finally {
      this.registry.markCompleted(message.requestId);
    }
  }

  private skipped(
    message: Message,
    reason: "duplicate" | "cancelled",
    code: ResponseErrorCode,
    text: string,
  ): AssistantResponse {
    this.errorsByCode[code] = (this.errorsByCode[code] ?? 0) + 1;
    return {
      intent: "unknown",
      confidence: 0,
      entities: [],
      payload: { kind: "skipped", reason },
      requestId: message.requestId,
      error: { code, message: text, fatal: true },
    };
  }

  private recordMetrics(intent: IntentLabel, errorCode: ResponseErrorCode | undefined, durationMs: number): void {
    this.totalRequests++;
    this.totalLatencyMs += durationMs;
    this.byIntent[intent] = (this.byIntent[intent] ?? 0) + 1;
    if (errorCode) {
      this.errorsByCode[errorCode] = (this.errorsByCode[errorCode] ?? 0) + 1;
    }
  }

  private persistInBackground(
    message: Message,
    response: AssistantResponse,
    capturedLead: Lead | undefined,
    durationMs: number,
  ): void {
    const sink = this.persistence;
    if (!sink) return;

    const entities: PersistedEntity[] = [
      {
        kind: "interaction",
        requestId: message.requestId,
        userId: message.userId,
        text: message.text,
        intent: response.intent,
        confidence: response.confidence,
        entities: response.entities.map(e => ({ type: e.type, value: e.value, confidence: e.confidence })),
        responseKind: response.payload.kind,
        errorCode: response.error?.code ?? null,
        durationMs,
      },
    ];
    if (capturedLead) {
      entities.push({ kind: "lead", requestId: message.requestId, userId: message.userId, lead: capturedLead });
    }

    const write = this.persist(sink, entities, message.requestId);
    this.pendingWrites.add(write);
    void write.finally(() => this.pendingWrites.delete(write));
  }

  private async persist(sink: PersistenceSink, entities: PersistedEntity[], requestId: string): Promise<void> {
    for (const entity of entities) {
      try {
        await withTimeout(() => sink.record(entity), this.timeoutMs, `persist ${entity.kind}`);
      } catch (err) {
        // HARDENING: persistence never affects the response
        console.error(`[AssistantHandler] Failed to persist ${entity.kind} for ${requestId}:`, err);
      }
    }
  }
}
