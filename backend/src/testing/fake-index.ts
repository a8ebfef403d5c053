import type {
  ChunkMatch,
  SearchableIndex,
} from '../retrieval/retrieval.types.js';
import type { Document } from '../documents/document.types.js';

/** Index that returns fixed scores regardless of the query. */
export class FixedScoreIndex implements SearchableIndex {
  constructor(
    private readonly chunks: readonly string[],
    private readonly scores: readonly number[],
  ) {}

  get size(): number {
    return this.chunks.length;
  }

  topK(_query: string, k: number): ChunkMatch[] {
    return this.chunks
      .map((text, chunkIndex) => ({
        chunkIndex,
        score: this.scores[chunkIndex] ?? 0,
        text,
      }))
      .sort((a, b) => b.score - a.score)
      .slice(0, k);
  }
}

export function fixedScoreDocument(
  id: string,
  chunks: readonly string[],
  scores: readonly number[],
): Document {
  return {
    id,
    title: `${id}.txt`,
    chunks,
    index: new FixedScoreIndex(chunks, scores),
    kind: 'TEXT',
    createdAt: new Date('2024-01-01T00:00:00Z'),
  };
}
