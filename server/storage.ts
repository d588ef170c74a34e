import {
  type InsertDocumentChunk,
  type InsertInteractionLog,
  type InsertLead,
  documentChunks as documentChunksTable,
  insertDocumentChunkSchema,
  insertInteractionLogSchema,
  insertLeadSchema,
  interactionLogs as interactionLogsTable,
  leads as leadsTable,
} from "@shared/schema";
import { desc, sql as drizzleSql } from "drizzle-orm";
import type { Database } from "./db";
import type {
  ChunkRecord,
  ChunkStore,
  PersistedEntity,
  PersistenceSink,
  RetrievedChunk,
  Retriever,
} from "./services/collaborators";

export interface IStorage extends ChunkStore, Retriever, PersistenceSink {}

export class DatabaseStorage implements IStorage {
  private db: Database;

  constructor(db: Database) {
    this.db = db;
  }

  // Document chunks
  async addChunks(chunks: ChunkRecord[]): Promise<void> {
    if (chunks.length === 0) return;
    const rows: InsertDocumentChunk[] = chunks.map(chunk => ({
      sourceId: chunk.metadata.sourceId,
      title: chunk.metadata.title ?? null,
      chunkIndex: chunk.metadata.chunkIndex,
      content: chunk.text,
      tokenCount: chunk.metadata.tokenCount,
      requestId: chunk.metadata.requestId,
      metadata: { ingestedAt: chunk.metadata.ingestedAt },
    }));
    rows.forEach(row => insertDocumentChunkSchema.parse(row));
    await this.db.insert(documentChunksTable).values(rows);
  }

  // Full-text retrieval ranked by ts_rank
  async search(query: string, k: number): Promise<RetrievedChunk[]> {
    if (!query.trim() || k <= 0) return [];

    const tsQuery = drizzleSql`plainto_tsquery('english', ${query})`;
    const tsVector = drizzleSql`to_tsvector('english', ${documentChunksTable.content})`;
    const rank = drizzleSql<number>`ts_rank(${tsVector}, ${tsQuery})`;

    const results = await this.db
      .select({
        content: documentChunksTable.content,
        title: documentChunksTable.title,
        sourceId: documentChunksTable.sourceId,
        chunkIndex: documentChunksTable.chunkIndex,
        rank,
      })
      .from(documentChunksTable)
      .where(drizzleSql`${tsVector} @@ ${tsQuery}`)
      .orderBy(desc(rank))
      .limit(k);

    return results.map(r => ({
      text: r.content,
      metadata: {
        title: r.title ?? undefined,
        sourceId: r.sourceId,
        chunkIndex: r.chunkIndex,
        rank: r.rank,
      },
    }));
  }

  // Interaction logs and leads
  async record(entity: PersistedEntity): Promise<void> {
    if (entity.kind === "interaction") {
      const row: InsertInteractionLog = {
        requestId: entity.requestId,
        userId: entity.userId,
        messageText: entity.text,
        intent: entity.intent,
        confidence: entity.confidence,
        entities: entity.entities,
        responseKind: entity.responseKind,
        errorCode: entity.errorCode,
        durationMs: entity.durationMs,
      };
      insertInteractionLogSchema.parse(row);
      await this.db.insert(interactionLogsTable).values(row);
      return;
    }

    const { lead } = entity;
    const row: InsertLead = {
      userId: entity.userId,
      requestId: entity.requestId,
      name: lead.name,
      company: lead.company,
      email: lead.email,
      phone: lead.phone,
      intent: lead.intent,
      budget: lead.budget,
      timeline: lead.timeline,
      normalizedDomain: lead.normalizedDomain,
      emailValid: lead.emailValidity,
      phoneValid: lead.phoneValidity,
      qualityScore: lead.qualityScore,
      notes: lead.notes,
    };
    insertLeadSchema.parse(row);
    await this.db.insert(leadsTable).values(row);
  }
}
