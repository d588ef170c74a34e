import { KNOWLEDGE_CONSTANTS } from "../../config/constants";

/**
 * Fixed-size character windows. Consecutive chunks share `overlap`
 * characters; the last chunk ends at the end of the text.
 */
export function chunkText(
  text: string,
  size: number = KNOWLEDGE_CONSTANTS.CHUNK_SIZE,
  overlap: number = KNOWLEDGE_CONSTANTS.CHUNK_OVERLAP,
): string[] {
  if (size <= 0 || overlap < 0 || overlap >= size) {
    throw new RangeError(`[Chunker] invalid window: size=${size} overlap=${overlap}`);
  }
  if (!text.trim()) return [];

  const step = size - overlap;
  const chunks: string[] = [];
  for (let start = 0; start < text.length; start += step) {
    chunks.push(text.slice(start, start + size));
    if (start + size >= text.length) break;
  }
  return chunks;
}

export function countTokens(text: string): number {
  const trimmed = text.trim();
  if (!trimmed) return 0;
  return trimmed.split(/\s+/).length;
}
