import { describe, expect, it } from '@jest/globals';
import { RetrievalError } from '../common/retrieval.errors.js';
import { DocumentRegistry } from '../documents/document-registry.js';
import { fixedScoreDocument } from '../testing/fake-index.js';
import { PassageAggregator } from './passage-aggregator.js';

const errorCode = (fn: () => unknown): string | undefined => {
  try {
    fn();
  } catch (error) {
    return error instanceof RetrievalError ? error.code : undefined;
  }
  return undefined;
};

describe('PassageAggregator', () => {
  it('fails with NOT_FOUND on an empty registry', () => {
    const aggregator = new PassageAggregator(new DocumentRegistry());
    expect(errorCode(() => aggregator.search('x', 3))).toBe('NOT_FOUND');
  });

  it('fails with INVALID_ARGUMENT on a blank query', () => {
    const registry = new DocumentRegistry();
    registry.add(fixedScoreDocument('doc-a', ['one'], [0.1]));
    const aggregator = new PassageAggregator(registry);

    expect(errorCode(() => aggregator.search('   ', 3))).toBe(
      'INVALID_ARGUMENT',
    );
    expect(errorCode(() => aggregator.search('x', 0))).toBe('INVALID_ARGUMENT');
  });

  it('fails with NOT_FOUND when the filter matches nothing', () => {
    const registry = new DocumentRegistry();
    registry.add(fixedScoreDocument('doc-a', ['one'], [0.1]));
    const aggregator = new PassageAggregator(registry);

    expect(
      errorCode(() => aggregator.search('x', 3, { documentIds: ['doc-z'] })),
    ).toBe('NOT_FOUND');
  });

  it('merges per-document results into one ranking truncated to k', () => {
    const registry = new DocumentRegistry();
    registry.add(fixedScoreDocument('doc-a', ['a0', 'a1', 'a2'], [0.2, 0.9, 0.4]));
    registry.add(fixedScoreDocument('doc-b', ['b0', 'b1'], [0.5, 0.4]));
    const aggregator = new PassageAggregator(registry);

    const { passages, warnings } = aggregator.search('query', 3);

    expect(warnings).toEqual([]);
    expect(
      passages.map((passage) => [passage.documentId, passage.chunkIndex, passage.score]),
    ).toEqual([
      ['doc-a', 1, 0.9],
      ['doc-b', 0, 0.5],
      ['doc-a', 2, 0.4],
    ]);
    expect(passages[0]?.source).toBe('doc-a.txt');
  });

  it('over-fetches per document when asked', () => {
    const registry = new DocumentRegistry();
    registry.add(fixedScoreDocument('doc-a', ['a0', 'a1', 'a2'], [0.9, 0.8, 0.7]));
    registry.add(fixedScoreDocument('doc-b', ['b0'], [0.1]));
    const aggregator = new PassageAggregator(registry);

    const exact = aggregator.search('query', 2, { perDocumentK: 1 });
    expect(exact.passages.map((passage) => passage.text)).toEqual(['a0', 'b0']);

    const overfetched = aggregator.search('query', 2, { perDocumentK: 2 });
    expect(overfetched.passages.map((passage) => passage.text)).toEqual([
      'a0',
      'a1',
    ]);
  });

  it('keeps registry order for equal scores', () => {
    const registry = new DocumentRegistry();
    registry.add(fixedScoreDocument('doc-a', ['a0'], [0.5]));
    registry.add(fixedScoreDocument('doc-b', ['b0'], [0.5]));
    const aggregator = new PassageAggregator(registry);

    expect(
      aggregator.search('query', 2).passages.map((passage) => passage.documentId),
    ).toEqual(['doc-a', 'doc-b']);
  });

  it('turns a failing index into a warning instead of failing the query', () => {
    const registry = new DocumentRegistry();
    const broken = fixedScoreDocument('doc-broken', ['x'], [0.9]);
    registry.add({
      ...broken,
      index: {
        size: 1,
        topK: () => {
          throw new Error('index corrupted');
        },
      },
    });
    registry.add(fixedScoreDocument('doc-ok', ['ok'], [0.3]));
    const aggregator = new PassageAggregator(registry);

    const { passages, warnings } = aggregator.search('query', 2);

    expect(passages.map((passage) => passage.documentId)).toEqual(['doc-ok']);
    expect(warnings).toEqual([
      { documentId: 'doc-broken', reason: 'index corrupted' },
    ]);
  });
});
