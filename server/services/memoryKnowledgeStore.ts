/**
 * In-Memory Knowledge Store
 * Chunk storage, keyword retrieval and a persistence sink for development
 * and tests. Used when no DATABASE_URL is configured.
 */

import type {
  ChunkRecord,
  ChunkStore,
  PersistedEntity,
  PersistenceSink,
  RetrievedChunk,
  Retriever,
} from "./collaborators";

const STOPWORDS = new Set([
  "a", "an", "the", "is", "are", "was", "were", "of", "to", "in", "on", "for",
  "and", "or", "what", "how", "does", "do", "our", "my", "we", "i", "it", "with",
]);

function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter(token => token.length > 1 && !STOPWORDS.has(token));
}

export interface MemoryKnowledgeStoreConfig {
  initialChunks?: ChunkRecord[];
  maxRecords?: number;
}

export class MemoryKnowledgeStore implements ChunkStore, Retriever, PersistenceSink {
  private chunks: ChunkRecord[] = [];
  private records: PersistedEntity[] = [];
  private readonly maxRecords: number;

  constructor(config?: MemoryKnowledgeStoreConfig) {
    if (config?.initialChunks) {
      this.chunks = config.initialChunks.map(chunk => ({ ...chunk, metadata: { ...chunk.metadata } }));
    }
    this.maxRecords = config?.maxRecords ?? 1000;
  }

  async addChunks(chunks: ChunkRecord[]): Promise<void> {
    for (const chunk of chunks) {
      this.chunks.push({ ...chunk, metadata: { ...chunk.metadata } });
    }
  }

  /**
   * Ranks chunks by how many distinct query terms they contain. Chunks with
   * no overlap are never returned; ties keep insertion order.
   */
  async search(query: string, k: number): Promise<RetrievedChunk[]> {
    const terms = Array.from(new Set(tokenize(query)));
    if (terms.length === 0 || k <= 0) return [];

    const scored = this.chunks
      .map((chunk, index) => {
        const chunkTerms = new Set(tokenize(chunk.text));
        const score = terms.filter(term => chunkTerms.has(term)).length;
        return { chunk, index, score };
      })
      .filter(entry => entry.score > 0)
      .sort((a, b) => b.score - a.score || a.index - b.index);

    return scored.slice(0, k).map(({ chunk }) => ({
      text: chunk.text,
      metadata: {
        title: chunk.metadata.title,
        sourceId: chunk.metadata.sourceId,
        chunkIndex: chunk.metadata.chunkIndex,
      },
    }));
  }

  async record(entity: PersistedEntity): Promise<void> {
    this.records.push(entity);
    if (this.records.length > this.maxRecords) {
      this.records.splice(0, this.records.length - this.maxRecords);
    }
  }

  chunkCount(): number {
    return this.chunks.length;
  }

  getRecords(): PersistedEntity[] {
    return [...this.records];
  }

  clear(): void {
    this.chunks = [];
    this.records = [];
  }
}
