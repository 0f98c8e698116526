import { ConfigError } from "../errors/errors";
import { Chunk, Document } from "../rag/types";

export interface TextSpan {
  text: string;
  charStart: number;
  charEnd: number;
}

export function validateChunkingParams(chunkSize: number, overlap: number): void {
  const issues: string[] = [];
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    issues.push(`chunkSize must be a positive integer, got ${chunkSize}`);
  }
  if (!Number.isInteger(overlap) || overlap < 0) {
    issues.push(`overlap must be a non-negative integer, got ${overlap}`);
  }
  if (issues.length === 0 && overlap >= chunkSize) {
    issues.push(`overlap (${overlap}) must be smaller than chunkSize (${chunkSize})`);
  }
  if (issues.length > 0) {
    throw new ConfigError("Invalid chunking parameters", issues);
  }
}

/**
 * Sliding window over `text`: each window starts `chunkSize - overlap`
 * characters after the previous one, the last window holds the remainder.
 * Text that fits in one window comes back as a single trimmed span.
 */
export function split(text: string, chunkSize: number, overlap: number): TextSpan[] {
  validateChunkingParams(chunkSize, overlap);

  const trimmed = text.trim();
  if (trimmed.length === 0) return [];

  if (text.length <= chunkSize) {
    const charStart = text.indexOf(trimmed);
    return [{ text: trimmed, charStart, charEnd: charStart + trimmed.length }];
  }

  const step = chunkSize - overlap;
  const spans: TextSpan[] = [];
  let start = 0;

  while (start < text.length) {
    const end = Math.min(start + chunkSize, text.length);
    spans.push({ text: text.slice(start, end), charStart: start, charEnd: end });
    if (end === text.length) break;
    start += step;
  }

  return spans;
}

export function chunkDocument(document: Document, chunkSize: number, overlap: number): Chunk[] {
  return split(document.rawText, chunkSize, overlap).map((span, index) => ({
    documentId: document.id,
    sourceName: document.sourceName,
    sequenceIndex: index,
    text: span.text,
    charStart: span.charStart,
    charEnd: span.charEnd,
  }));
}

export function chunkDocuments(documents: Document[], chunkSize: number, overlap: number): Chunk[] {
  validateChunkingParams(chunkSize, overlap);
  return documents.flatMap((document) => chunkDocument(document, chunkSize, overlap));
}
