/**
 * Composition Root
 *
 * Builds the assistant from configuration: picks the text-completion
 * adapters, the knowledge store and the persistence sink, then wires the
 * pipelines, dispatcher and handler together. Tests pass overrides instead
 * of touching the environment.
 */

import { DealflowPipeline } from "./agents/dealflow/dealflowPipeline";
import { KnowledgePipeline } from "./agents/knowledge/knowledgePipeline";
import type { AppConfig } from "./config/env";
import { MODEL_ASSIGNMENTS, getModelDescription } from "./config/models";
import { ConversationContextStore } from "./decisionLayer/conversationContext";
import { IntentClassifier } from "./decisionLayer/intentClassifier";
import { createDb } from "./db";
import { AssistantHandler } from "./dispatcher/assistantHandler";
import { Dispatcher } from "./dispatcher/dispatcher";
import { createTextCompletion, detectProvider, type Provider } from "./llm/client";
import type { ChunkStore, PersistenceSink, Retriever, TextCompletion } from "./services/collaborators";
import { ConcurrencyLimiter, KeyedMutex } from "./services/concurrency";
import { MemoryKnowledgeStore } from "./services/memoryKnowledgeStore";
import { RequestRegistry } from "./services/requestRegistry";
import { DatabaseStorage } from "./storage";

export interface AssistantOverrides {
  classificationCompletion?: TextCompletion;
  knowledgeCompletion?: TextCompletion;
  dealflowCompletion?: TextCompletion;
  chunkStore?: ChunkStore;
  retriever?: Retriever;
  persistence?: PersistenceSink;
  now?: () => Date;
}

export interface Assistant {
  handler: AssistantHandler;
  classifier: IntentClassifier;
  knowledge: KnowledgePipeline;
  dealflow: DealflowPipeline;
  contextStore: ConversationContextStore;
}

function hasProviderKey(config: AppConfig, provider: Provider): boolean {
  const keys = config.llm.apiKeys;
  switch (provider) {
    case "openai":
      return Boolean(keys.openai);
    case "gemini":
      return Boolean(keys.gemini);
    case "claude":
      return Boolean(keys.anthropic);
  }
}

/**
 * Returns undefined (pattern-only / template fallbacks) when the model is
 * disabled or its provider has no key.
 */
function configureCompletion(
  config: AppConfig,
  model: string,
  jsonMode: boolean,
  purpose: string,
): TextCompletion | undefined {
  if (!config.llm.enabled) return undefined;
  const provider = detectProvider(model);
  if (!hasProviderKey(config, provider)) {
    console.log(`[Composition] No ${provider} API key; ${purpose} runs without a model`);
    return undefined;
  }
  console.log(`[Composition] ${purpose}: ${getModelDescription(model)}`);
  return createTextCompletion(model, { jsonMode });
}

export function buildAssistant(config: AppConfig, overrides: AssistantOverrides = {}): Assistant {
  const timeoutMs = config.handler.collaboratorTimeoutMs;

  let chunkStore = overrides.chunkStore;
  let retriever = overrides.retriever;
  let persistence = overrides.persistence;
  if (!chunkStore || !retriever || !persistence) {
    const backing = config.databaseUrl
      ? new DatabaseStorage(createDb(config.databaseUrl))
      : new MemoryKnowledgeStore();
    console.log(`[Composition] Knowledge store: ${config.databaseUrl ? "postgres" : "in-memory"}`);
    chunkStore = chunkStore ?? backing;
    retriever = retriever ?? backing;
    persistence = persistence ?? backing;
  }

  const classifier = new IntentClassifier({
    textCompletion:
      overrides.classificationCompletion ?? configureCompletion(config, config.llm.model, true, "Intent classification"),
    timeoutMs,
  });

  const knowledge = new KnowledgePipeline({
    chunkStore,
    retriever,
    textCompletion:
      overrides.knowledgeCompletion ??
      configureCompletion(config, MODEL_ASSIGNMENTS.KNOWLEDGE_ANSWER, false, "Knowledge answers"),
    timeoutMs,
    now: overrides.now,
  });

  const dealflow = new DealflowPipeline({
    textCompletion:
      overrides.dealflowCompletion ?? configureCompletion(config, MODEL_ASSIGNMENTS.DEALFLOW, true, "Dealflow"),
    timeoutMs,
    now: overrides.now,
  });

  const clock = overrides.now;
  const contextStore = new ConversationContextStore({
    windowSize: config.handler.contextWindowSize,
    ttlMs: config.handler.contextTtlMs,
    now: clock ? () => clock().getTime() : undefined,
  });

  const handler = new AssistantHandler({
    classifier,
    dispatcher: new Dispatcher({ knowledge, dealflow, now: overrides.now }),
    contextStore,
    registry: new RequestRegistry(),
    limiter: new ConcurrencyLimiter(config.handler.workerPoolSize),
    userLocks: new KeyedMutex(),
    persistence,
    timeoutMs,
  });

  return { handler, classifier, knowledge, dealflow, contextStore };
}
