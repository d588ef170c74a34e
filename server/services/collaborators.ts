/**
 * Collaborator Interfaces
 *
 * The narrow contracts the decision layer and agent pipelines depend on.
 * Concrete adapters live elsewhere (llm/client.ts, storage.ts,
 * services/memoryKnowledgeStore.ts); the core never imports them directly.
 */

/**
 * Free-form text generation. Output is untrusted and must be validated.
 */
export interface TextCompletion {
  complete(prompt: string, maxTokens: number): Promise<string>;
}

export interface RetrievedChunkMetadata {
  title?: string;
  sourceId?: string;
  pageRanges?: string;
  [key: string]: unknown;
}

export interface RetrievedChunk {
  text: string;
  metadata: RetrievedChunkMetadata;
}

export interface Retriever {
  search(query: string, k: number): Promise<RetrievedChunk[]>;
}

export interface ChunkRecord {
  text: string;
  metadata: {
    sourceId: string;
    title?: string;
    chunkIndex: number;
    tokenCount: number;
    requestId: string;
    ingestedAt: string;
  };
}

export interface ChunkStore {
  addChunks(chunks: ChunkRecord[]): Promise<void>;
}

export type PersistedEntity =
  | {
      kind: "interaction";
      requestId: string;
      userId: string;
      text: string;
      intent: string;
      confidence: number;
      entities: Array<{ type: string; value: string; confidence: number }>;
      responseKind: string;
      errorCode: string | null;
      durationMs: number;
    }
  | {
      kind: "lead";
      requestId: string;
      userId: string;
      lead: {
        name: string;
        company: string;
        email: string;
        phone: string;
        intent: string;
        budget: string;
        timeline: string;
        normalizedDomain: string | null;
        emailValidity: boolean;
        phoneValidity: boolean;
        qualityScore: number;
        notes: string;
      };
    };

/**
 * CRM / logging sink. Failures are logged by the caller and never surface.
 */
export interface PersistenceSink {
  record(entity: PersistedEntity): Promise<void>;
}
