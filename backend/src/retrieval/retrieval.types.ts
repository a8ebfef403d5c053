export interface ChunkMatch {
  chunkIndex: number;
  score: number;
  text: string;
}

/** Anything the aggregator can ask for a local top-k. */
export interface SearchableIndex {
  readonly size: number;
  topK(query: string, k: number): ChunkMatch[];
}
