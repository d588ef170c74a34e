export { KnowledgePipeline, NO_INFORMATION_ANSWER, type KnowledgePipelineDeps } from "./knowledgePipeline";
export { chunkText, countTokens } from "./chunker";
export type {
  Citation,
  IngestResult,
  IngestStatus,
  KnowledgeDocument,
  KnowledgeResponse,
} from "./types";
