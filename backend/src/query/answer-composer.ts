import type {
  AnswerResult,
  AnswerSource,
  ConfidenceLabel,
  ScoredPassage,
} from './query.types.js';
import { findHighlights } from './highlights.js';

export const NO_RELEVANT_PASSAGES =
  'No relevant passages found in the uploaded documents.';

export interface ConfidenceThresholds {
  high: number;
  medium: number;
}

export interface AnswerComposerOptions {
  thresholds?: ConfidenceThresholds;
  maxChars?: number;
}

export const DEFAULT_CONFIDENCE_THRESHOLDS: ConfidenceThresholds = {
  high: 0.5,
  medium: 0.2,
};

export const DEFAULT_ANSWER_MAX_CHARS = 4000;

const ELLIPSIS = '...';

export function confidenceLabel(
  score: number,
  thresholds: ConfidenceThresholds = DEFAULT_CONFIDENCE_THRESHOLDS,
): ConfidenceLabel {
  if (score >= thresholds.high) {
    return 'high';
  }
  if (score >= thresholds.medium) {
    return 'medium';
  }
  return 'low';
}

/** Best score plus mean score, capped at one. */
export function overallConfidence(scores: readonly number[]): number {
  if (scores.length === 0) {
    return 0;
  }
  const max = Math.max(...scores);
  const mean = scores.reduce((sum, score) => sum + score, 0) / scores.length;
  return Math.min(1, ((max + mean) / 2) * 2);
}

/**
 * Cut at the last whitespace at or before `maxChars` and append an
 * ellipsis. A text without whitespace in that range is hard-cut.
 */
export function truncateAtWord(text: string, maxChars: number): string {
  if (text.length <= maxChars) {
    return text;
  }
  let cut = maxChars;
  if (!/\s/.test(text.charAt(maxChars))) {
    const head = text.slice(0, maxChars);
    const boundary = Math.max(
      head.lastIndexOf(' '),
      head.lastIndexOf('\n'),
      head.lastIndexOf('\t'),
    );
    if (boundary > 0) {
      cut = boundary;
    }
  }
  return `${text.slice(0, cut).trimEnd()}${ELLIPSIS}`;
}

export class AnswerComposer {
  private readonly thresholds: ConfidenceThresholds;
  private readonly maxChars: number;

  constructor(options: AnswerComposerOptions = {}) {
    this.thresholds = options.thresholds ?? DEFAULT_CONFIDENCE_THRESHOLDS;
    this.maxChars = options.maxChars ?? DEFAULT_ANSWER_MAX_CHARS;
  }

  compose(passages: readonly ScoredPassage[], query: string): AnswerResult {
    if (passages.length === 0) {
      return { answer: NO_RELEVANT_PASSAGES, sources: [], confidence: 0 };
    }

    // 分数为 0 的段落仍作为来源返回，但不进入回答正文
    const texts = passages
      .filter((passage) => passage.score > 0)
      .map((passage) => passage.text.trim());
    const answer =
      texts.length === 0
        ? NO_RELEVANT_PASSAGES
        : truncateAtWord(texts.join('\n\n'), this.maxChars);

    const sources: AnswerSource[] = passages.map((passage) => {
      const highlights = findHighlights(passage.text, query);
      return {
        ...passage,
        confidence: confidenceLabel(passage.score, this.thresholds),
        highlights: highlights.length > 0 ? highlights : null,
      };
    });

    return {
      answer,
      sources,
      confidence: overallConfidence(passages.map((passage) => passage.score)),
    };
  }
}
