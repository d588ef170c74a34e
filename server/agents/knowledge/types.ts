/**
 * Knowledge Agent Types
 *
 * Layer: Agents (knowledge)
 */

export type KnowledgeDocument = {
  text: string;
  title?: string;
  sourceId?: string;
};

export type IngestStatus = "stored" | "empty" | "unavailable";

export type IngestResult = {
  chunkCount: number;
  tokenCount: number;
  status: IngestStatus;
};

export type Citation = {
  title: string;
  sourceId: string;
  snippet?: string;
  pageRanges?: string;
};

export type KnowledgeResponse = {
  answer: string;
  citations: Citation[];
  confidence: number;
};
