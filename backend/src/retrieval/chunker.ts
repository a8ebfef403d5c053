import { invalidArgument } from '../common/retrieval.errors.js';

export const DEFAULT_CHUNK_SIZE = 1000;
export const DEFAULT_CHUNK_OVERLAP = 200;

export interface ChunkOptions {
  size?: number;
  overlap?: number;
}

export function assertChunkOptions(size: number, overlap: number): void {
  if (!Number.isInteger(size) || size <= 0) {
    throw invalidArgument(`chunk size must be a positive integer (got ${size})`);
  }
  if (!Number.isInteger(overlap) || overlap < 0) {
    throw invalidArgument(
      `chunk overlap must be a non-negative integer (got ${overlap})`,
    );
  }
  // overlap >= size 时窗口不会前进
  if (overlap >= size) {
    throw invalidArgument(
      `chunk overlap (${overlap}) must be smaller than chunk size (${size})`,
    );
  }
}

/**
 * Split text into overlapping fixed-size windows.
 *
 * Window `i` covers `[start, start + size)` and the next window starts
 * `size - overlap` characters later. Windows are trimmed and blank ones are
 * skipped, so the returned indices stay dense. The final chunk may be
 * shorter than `size`.
 */
export function chunkText(text: string, options: ChunkOptions = {}): string[] {
  const size = options.size ?? DEFAULT_CHUNK_SIZE;
  const overlap = options.overlap ?? DEFAULT_CHUNK_OVERLAP;
  assertChunkOptions(size, overlap);

  const normalized = text.replace(/\r/g, '');
  const chunks: string[] = [];
  const step = size - overlap;

  for (let start = 0; start < normalized.length; start += step) {
    const end = start + size;
    const chunk = normalized.slice(start, end).trim();
    if (chunk) {
      chunks.push(chunk);
    }
    if (end >= normalized.length) {
      break;
    }
  }

  return chunks;
}
