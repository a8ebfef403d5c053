import { describe, expect, it } from '@jest/globals';
import {
  AnswerComposer,
  NO_RELEVANT_PASSAGES,
  confidenceLabel,
  overallConfidence,
  truncateAtWord,
} from './answer-composer.js';
import type { ScoredPassage } from './query.types.js';

const passage = (
  score: number,
  text: string,
  chunkIndex = 0,
): ScoredPassage => ({
  documentId: 'doc-a',
  chunkIndex,
  score,
  text,
  source: 'notes.txt',
});

describe('confidenceLabel', () => {
  it('maps scores onto inclusive lower thresholds', () => {
    expect(confidenceLabel(0.6)).toBe('high');
    expect(confidenceLabel(0.5)).toBe('high');
    expect(confidenceLabel(0.3)).toBe('medium');
    expect(confidenceLabel(0.2)).toBe('medium');
    expect(confidenceLabel(0.1)).toBe('low');
    expect(confidenceLabel(0)).toBe('low');
  });

  it('uses configured thresholds', () => {
    expect(confidenceLabel(0.3, { high: 0.25, medium: 0.1 })).toBe('high');
  });
});

describe('overallConfidence', () => {
  it('adds the best and the mean score and caps at one', () => {
    expect(overallConfidence([0.8, 0.3])).toBe(1);
    expect(overallConfidence([0.2, 0.1])).toBeCloseTo(0.35, 10);
    expect(overallConfidence([])).toBe(0);
  });
});

describe('truncateAtWord', () => {
  it('leaves short text alone', () => {
    expect(truncateAtWord('short text', 20)).toBe('short text');
  });

  it('cuts at the last whitespace before the limit', () => {
    expect(truncateAtWord('alpha beta gamma', 12)).toBe('alpha beta...');
  });

  it('keeps the whole word when the limit falls on a boundary', () => {
    expect(truncateAtWord('alpha beta gamma', 10)).toBe('alpha beta...');
  });

  it('hard-cuts a single word longer than the limit', () => {
    expect(truncateAtWord('abcdefghij', 4)).toBe('abcd...');
  });
});

describe('AnswerComposer', () => {
  const composer = new AnswerComposer();

  it('returns the fixed answer when there are no passages', () => {
    expect(composer.compose([], 'anything')).toEqual({
      answer: NO_RELEVANT_PASSAGES,
      sources: [],
      confidence: 0,
    });
  });

  it('joins positive-score passages in ranked order', () => {
    const result = composer.compose(
      [
        passage(0.6, '  The invoice is due in March. ', 0),
        passage(0.3, 'Invoices are sent monthly.', 1),
        passage(0, 'Unrelated text.', 2),
      ],
      'invoice due',
    );

    expect(result.answer).toBe(
      'The invoice is due in March.\n\nInvoices are sent monthly.',
    );
    expect(result.sources.map((source) => source.confidence)).toEqual([
      'high',
      'medium',
      'low',
    ]);
    expect(result.sources[0]?.highlights).toEqual([
      { start: 6, end: 13 },
      { start: 17, end: 20 },
    ]);
    expect(result.sources[1]?.highlights).toEqual([{ start: 0, end: 7 }]);
    expect(result.sources[2]?.highlights).toBeNull();
    expect(result.confidence).toBeCloseTo(0.9, 10);
  });

  it('falls back to the fixed answer when every score is zero', () => {
    const result = composer.compose(
      [passage(0, 'alpha', 0), passage(0, 'beta', 1)],
      'zzz',
    );

    expect(result.answer).toBe(NO_RELEVANT_PASSAGES);
    expect(result.sources).toHaveLength(2);
    expect(result.confidence).toBe(0);
  });

  it('truncates long answers at the configured length', () => {
    const small = new AnswerComposer({ maxChars: 12 });
    const result = small.compose([passage(0.4, 'alpha beta gamma')], 'beta');
    expect(result.answer).toBe('alpha beta...');
  });
});
