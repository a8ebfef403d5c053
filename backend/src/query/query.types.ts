export interface ScoredPassage {
  documentId: string;
  chunkIndex: number;
  /** Cosine similarity in [0, 1]. */
  score: number;
  text: string;
  /** Title of the owning document. */
  source: string;
}

export interface HighlightSpan {
  start: number;
  end: number;
}

export type ConfidenceLabel = 'high' | 'medium' | 'low';

export interface ExtractedPassage extends ScoredPassage {
  highlights: HighlightSpan[];
}

export interface AnswerSource extends ScoredPassage {
  confidence: ConfidenceLabel;
  highlights: HighlightSpan[] | null;
}

export interface AnswerResult {
  answer: string;
  sources: AnswerSource[];
  /** Overall confidence in [0, 1]. */
  confidence: number;
}

export interface SearchWarning {
  documentId: string;
  reason: string;
}

export interface AggregatedSearch {
  passages: ScoredPassage[];
  warnings: SearchWarning[];
}

export interface ExtractResult {
  passages: ExtractedPassage[];
  /** Documents skipped because their index failed. */
  warnings: SearchWarning[];
}

export interface QueryAnswer extends AnswerResult {
  warnings: SearchWarning[];
}
