import { InputError } from "../domain/errors.js";
import { DocumentFileType, LoadedDocument } from "../domain/types.js";

export const DEFAULT_CHUNK_SIZE = 1000;
export const DEFAULT_CHUNK_OVERLAP = 200;

export interface ChunkingOptions {
  chunkSize: number;
  overlap: number;
}

export interface TextChunk {
  text: string;
  start: number;
}

export interface DocumentChunk extends TextChunk {
  /** Sequential across every section of the document. */
  index: number;
  page: number | null;
  source: string;
  fileType: DocumentFileType;
}

export function assertValidChunking(options: ChunkingOptions): void {
  const { chunkSize, overlap } = options;
  if (!Number.isInteger(chunkSize) || chunkSize < 1) {
    throw new InputError(
      "INVALID_CHUNKING",
      `Chunk size must be a positive integer, got ${chunkSize}.`,
    );
  }
  if (!Number.isInteger(overlap) || overlap < 0) {
    throw new InputError(
      "INVALID_CHUNKING",
      `Chunk overlap must be a non-negative integer, got ${overlap}.`,
    );
  }
  if (overlap >= chunkSize) {
    throw new InputError(
      "INVALID_CHUNKING",
      `Chunk overlap (${overlap}) must be smaller than chunk size (${chunkSize}).`,
    );
  }
}

/**
 * Fixed-stride character windows. Chunks cover [0, text.length) without gaps
 * and neighbours share exactly `overlap` characters; only the last chunk can
 * be shorter than `chunkSize`.
 */
export function splitIntoChunks(
  text: string,
  options: ChunkingOptions = { chunkSize: DEFAULT_CHUNK_SIZE, overlap: DEFAULT_CHUNK_OVERLAP },
): TextChunk[] {
  assertValidChunking(options);
  if (text.length === 0) {
    return [];
  }

  const stride = options.chunkSize - options.overlap;
  const chunks: TextChunk[] = [];

  for (let start = 0; ; start += stride) {
    const end = Math.min(start + options.chunkSize, text.length);
    chunks.push({ text: text.slice(start, end), start });
    if (end >= text.length) {
      break;
    }
  }

  return chunks;
}

export function chunkDocument(
  document: LoadedDocument,
  options: ChunkingOptions,
): DocumentChunk[] {
  assertValidChunking(options);
  const chunks: DocumentChunk[] = [];

  for (const section of document.sections) {
    if (!section.text.trim()) {
      continue;
    }
    for (const piece of splitIntoChunks(section.text, options)) {
      chunks.push({
        ...piece,
        index: chunks.length,
        page: section.page,
        source: document.path,
        fileType: document.fileType,
      });
    }
  }

  return chunks;
}

export function estimateChunkCount(textLength: number, options: ChunkingOptions): number {
  assertValidChunking(options);
  if (textLength === 0) {
    return 0;
  }
  if (textLength <= options.chunkSize) {
    return 1;
  }
  const stride = options.chunkSize - options.overlap;
  return Math.ceil((textLength - options.chunkSize) / stride) + 1;
}
