/**
 * Knowledge Pipeline
 *
 * Purpose:
 * Document ingestion (chunk → store) and grounded question answering
 * (retrieve → compose → cite).
 *
 * Failure semantics:
 * - Store unavailable: ingest reports zero counts with status "unavailable"
 * - Retrieval unavailable: treated as zero results
 * - Composition unavailable: extractive answer from the top snippet
 * Confidence is never reported above zero without retrieved evidence.
 *
 * Layer: Agents (knowledge)
 */

import { KNOWLEDGE_CONSTANTS, TIMEOUT_CONSTANTS } from "../../config/constants";
import { buildKnowledgeAnswerPrompt } from "../../config/prompts";
import type {
  ChunkRecord,
  ChunkStore,
  RetrievedChunk,
  Retriever,
  TextCompletion,
} from "../../services/collaborators";
import { getErrorMessage } from "../../utils/errorHandler";
import { withTimeout } from "../../utils/timeout";
import { chunkText, countTokens } from "./chunker";
import type { Citation, IngestResult, KnowledgeDocument, KnowledgeResponse } from "./types";

export const NO_INFORMATION_ANSWER =
  "I couldn't find relevant information in the knowledge base to answer your question.";

const EXTRACTIVE_PREFIX = "Based on the knowledge base: ";
const EXTRACTIVE_PREVIEW_CHARS = 300;

export interface KnowledgePipelineDeps {
  chunkStore?: ChunkStore;
  retriever?: Retriever;
  textCompletion?: TextCompletion;
  timeoutMs?: number;
  topK?: number;
  now?: () => Date;
}

function preview(text: string, maxChars: number): string {
  const trimmed = text.trim();
  return trimmed.length > maxChars ? `${trimmed.slice(0, maxChars)}...` : trimmed;
}

export class KnowledgePipeline {
  private readonly chunkStore?: ChunkStore;
  private readonly retriever?: Retriever;
  private readonly textCompletion?: TextCompletion;
  private readonly timeoutMs: number;
  private readonly topK: number;
  private readonly now: () => Date;

  constructor(deps: KnowledgePipelineDeps = {}) {
    this.chunkStore = deps.chunkStore;
    this.retriever = deps.retriever;
    this.textCompletion = deps.textCompletion;
    this.timeoutMs = deps.timeoutMs ?? TIMEOUT_CONSTANTS.COLLABORATOR_TIMEOUT_MS;
    this.topK = deps.topK ?? KNOWLEDGE_CONSTANTS.TOP_K;
    this.now = deps.now ?? (() => new Date());
  }

  async ingest(document: KnowledgeDocument, requestId: string): Promise<IngestResult> {
    const chunks = chunkText(document.text);
    if (chunks.length === 0) {
      return { chunkCount: 0, tokenCount: 0, status: "empty" };
    }

    const store = this.chunkStore;
    if (!store) {
      console.warn(`[KnowledgePipeline] No chunk store configured, dropping ${chunks.length} chunks`);
      return { chunkCount: 0, tokenCount: 0, status: "unavailable" };
    }

    const sourceId = document.sourceId ?? `doc-${requestId}`;
    const ingestedAt = this.now().toISOString();
    const records: ChunkRecord[] = chunks.map((text, chunkIndex) => ({
      text,
      metadata: {
        sourceId,
        title: document.title,
        chunkIndex,
        tokenCount: countTokens(text),
        requestId,
        ingestedAt,
      },
    }));

    try {
      await withTimeout(() => store.addChunks(records), this.timeoutMs, "chunk storage");
    } catch (error) {
      console.error(`[KnowledgePipeline] Chunk store failed for ${sourceId}: ${getErrorMessage(error)}`);
      return { chunkCount: 0, tokenCount: 0, status: "unavailable" };
    }

    const tokenCount = records.reduce((sum, record) => sum + record.metadata.tokenCount, 0);
    console.log(`[KnowledgePipeline] Ingested ${sourceId}: ${records.length} chunks, ${tokenCount} tokens`);
    return { chunkCount: records.length, tokenCount, status: "stored" };
  }

  async ask(question: string, requestId: string): Promise<KnowledgeResponse> {
    const results = await this.retrieve(question, requestId);
    if (results.length === 0) {
      return { answer: NO_INFORMATION_ANSWER, citations: [], confidence: 0 };
    }

    const citations: Citation[] = results.map(result => {
      const citation: Citation = {
        title: result.metadata.title || KNOWLEDGE_CONSTANTS.UNTITLED_DOCUMENT,
        sourceId: result.metadata.sourceId || KNOWLEDGE_CONSTANTS.UNKNOWN_SOURCE,
        snippet: preview(result.text, KNOWLEDGE_CONSTANTS.SNIPPET_PREVIEW_CHARS),
      };
      if (result.metadata.pageRanges) {
        citation.pageRanges = result.metadata.pageRanges;
      }
      return citation;
    });

    const answer = await this.compose(question, results, citations, requestId);
    const confidence = Math.round(Math.min(1, results.length * KNOWLEDGE_CONSTANTS.CONFIDENCE_PER_RESULT) * 100) / 100;

    return { answer, citations, confidence };
  }

  private async retrieve(question: string, requestId: string): Promise<RetrievedChunk[]> {
    const retriever = this.retriever;
    if (!retriever || !question.trim()) return [];

    try {
      const results = await withTimeout(
        () => retriever.search(question, this.topK),
        this.timeoutMs,
        "retrieval",
      );
      return results.filter(r => r.text.trim().length > 0).slice(0, this.topK);
    } catch (error) {
      console.error(`[KnowledgePipeline] Retrieval failed (${requestId}), treating as no results: ${getErrorMessage(error)}`);
      return [];
    }
  }

  private async compose(
    question: string,
    results: RetrievedChunk[],
    citations: Citation[],
    requestId: string,
  ): Promise<string> {
    const completion = this.textCompletion;
    if (completion) {
      const prompt = buildKnowledgeAnswerPrompt({
        question,
        snippets: results.map((r, i) => ({ title: citations[i].title, text: r.text })),
      });
      try {
        const answer = await withTimeout(
          () => completion.complete(prompt, KNOWLEDGE_CONSTANTS.ANSWER_MAX_TOKENS),
          this.timeoutMs,
          "answer composition",
        );
        if (answer.trim()) return answer.trim();
        console.warn(`[KnowledgePipeline] Empty composed answer (${requestId}), using extractive answer`);
      } catch (error) {
        console.warn(`[KnowledgePipeline] Composition failed (${requestId}), using extractive answer: ${getErrorMessage(error)}`);
      }
    }

    return EXTRACTIVE_PREFIX + preview(results[0].text.replace(/\s+/g, " "), EXTRACTIVE_PREVIEW_CHARS);
  }
}
