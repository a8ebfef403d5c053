import { invalidArgument } from '../common/retrieval.errors.js';
import type { ChunkMatch, SearchableIndex } from './retrieval.types.js';
import { countTerms, ENGLISH_STOP_WORDS, tokenize } from './tokenizer.js';

export const DEFAULT_MAX_DOCUMENT_FREQUENCY = 0.9;

export interface SimilarityIndexOptions {
  /** Terms found in more than this share of chunks are dropped. */
  maxDocumentFrequency?: number;
  stopWords?: ReadonlySet<string>;
}

/** Sparse vector: term id -> weight, already L2-normalised. */
type SparseVector = Map<number, number>;

/**
 * TF-IDF index over a single document's chunks.
 *
 * The vocabulary is fitted on the chunk list itself and never shared with
 * other documents. The index is immutable once constructed.
 */
export class SimilarityIndex implements SearchableIndex {
  private readonly chunks: readonly string[];
  private readonly stopWords: ReadonlySet<string>;
  private readonly vocabulary = new Map<string, number>();
  private readonly idf: number[] = [];
  private readonly vectors: SparseVector[];

  constructor(chunks: readonly string[], options: SimilarityIndexOptions = {}) {
    const maxDocumentFrequency =
      options.maxDocumentFrequency ?? DEFAULT_MAX_DOCUMENT_FREQUENCY;
    if (!(maxDocumentFrequency > 0 && maxDocumentFrequency <= 1)) {
      throw invalidArgument(
        `maxDocumentFrequency must be in (0, 1] (got ${maxDocumentFrequency})`,
      );
    }

    this.chunks = Object.freeze([...chunks]);
    this.stopWords = options.stopWords ?? ENGLISH_STOP_WORDS;

    const termCounts = this.chunks.map((chunk) =>
      countTerms(tokenize(chunk, this.stopWords)),
    );
    this.fitVocabulary(termCounts, maxDocumentFrequency);
    this.vectors = termCounts.map((counts) => this.toVector(counts));
  }

  get size(): number {
    return this.chunks.length;
  }

  get vocabularySize(): number {
    return this.vocabulary.size;
  }

  /**
   * Score every chunk against `query` and return the `k` best.
   * Ties keep ascending chunk order.
   */
  topK(query: string, k: number): ChunkMatch[] {
    if (!Number.isInteger(k) || k <= 0) {
      throw invalidArgument(`k must be a positive integer (got ${k})`);
    }
    if (this.chunks.length === 0) {
      return [];
    }

    const queryVector = this.toVector(countTerms(tokenize(query, this.stopWords)));

    const scored = this.vectors.map((vector, chunkIndex) => ({
      chunkIndex,
      score: cosine(queryVector, vector),
      text: this.chunks[chunkIndex] ?? '',
    }));

    // Array.prototype.sort 是稳定排序
    scored.sort((a, b) => b.score - a.score);
    return scored.slice(0, k);
  }

  private fitVocabulary(
    termCounts: Map<string, number>[],
    maxDocumentFrequency: number,
  ): void {
    const documentFrequency = new Map<string, number>();
    for (const counts of termCounts) {
      for (const term of counts.keys()) {
        documentFrequency.set(term, (documentFrequency.get(term) ?? 0) + 1);
      }
    }

    const total = termCounts.length;
    // 单个 chunk 时每个词的 df 都是 100%，不做裁剪
    const maxDocumentCount =
      total >= 2 ? maxDocumentFrequency * total : Number.POSITIVE_INFINITY;

    const terms = [...documentFrequency.keys()].sort();
    for (const term of terms) {
      const df = documentFrequency.get(term) ?? 0;
      if (df > maxDocumentCount) {
        continue;
      }
      this.vocabulary.set(term, this.idf.length);
      this.idf.push(Math.log((1 + total) / (1 + df)) + 1);
    }
  }

  private toVector(counts: Map<string, number>): SparseVector {
    const vector: SparseVector = new Map();
    let norm = 0;
    for (const [term, count] of counts) {
      const termId = this.vocabulary.get(term);
      if (termId === undefined) {
        continue;
      }
      const weight = count * (this.idf[termId] ?? 0);
      vector.set(termId, weight);
      norm += weight * weight;
    }

    if (norm === 0) {
      return vector;
    }
    const length = Math.sqrt(norm);
    for (const [termId, weight] of vector) {
      vector.set(termId, weight / length);
    }
    return vector;
  }
}

function cosine(a: SparseVector, b: SparseVector): number {
  if (a.size === 0 || b.size === 0) {
    return 0;
  }
  const [small, large] = a.size <= b.size ? [a, b] : [b, a];
  let dot = 0;
  for (const [termId, weight] of small) {
    dot += weight * (large.get(termId) ?? 0);
  }
  // 两个向量都已归一化，点积即余弦值
  return Math.min(1, Math.max(0, dot));
}
