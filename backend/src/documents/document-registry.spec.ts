import { describe, expect, it } from '@jest/globals';
import { RetrievalError } from '../common/retrieval.errors.js';
import { fixedScoreDocument } from '../testing/fake-index.js';
import { DocumentRegistry } from './document-registry.js';

describe('DocumentRegistry', () => {
  it('adds, gets and lists documents in insertion order', () => {
    const registry = new DocumentRegistry();
    registry.add(fixedScoreDocument('doc-a', ['one', 'two'], [0, 0]));
    registry.add(fixedScoreDocument('doc-b', ['three'], [0]));

    expect(registry.size).toBe(2);
    expect(registry.get('doc-a')?.title).toBe('doc-a.txt');
    expect(registry.list()).toEqual([
      { id: 'doc-a', title: 'doc-a.txt', chunkCount: 2, kind: 'TEXT' },
      { id: 'doc-b', title: 'doc-b.txt', chunkCount: 1, kind: 'TEXT' },
    ]);
  });

  it('rejects a duplicate id', () => {
    const registry = new DocumentRegistry();
    registry.add(fixedScoreDocument('doc-a', ['one'], [0]));
    expect(() =>
      registry.add(fixedScoreDocument('doc-a', ['other'], [0])),
    ).toThrow(RetrievalError);
  });

  it('rejects a document whose index does not match its chunks', () => {
    const registry = new DocumentRegistry();
    const document = fixedScoreDocument('doc-a', ['one'], [0]);
    expect(() =>
      registry.add({ ...document, chunks: ['one', 'two'] }),
    ).toThrow('has 2 chunks but its index holds 1');
  });

  it('removes a single document and reports unknown ids', () => {
    const registry = new DocumentRegistry();
    registry.add(fixedScoreDocument('doc-a', ['one'], [0]));

    expect(registry.remove('missing')).toBeUndefined();
    expect(registry.remove('doc-a')?.id).toBe('doc-a');
    expect(registry.get('doc-a')).toBeUndefined();
    expect(registry.size).toBe(0);
  });

  it('clears everything and returns the removed documents', () => {
    const registry = new DocumentRegistry();
    registry.add(fixedScoreDocument('doc-a', ['one'], [0]));
    registry.add(fixedScoreDocument('doc-b', ['two'], [0]));

    expect(registry.clear().map((document) => document.id)).toEqual([
      'doc-a',
      'doc-b',
    ]);
    expect(registry.list()).toEqual([]);
  });

  it('filters to the requested ids in registry order', () => {
    const registry = new DocumentRegistry();
    registry.add(fixedScoreDocument('doc-a', ['one'], [0]));
    registry.add(fixedScoreDocument('doc-b', ['two'], [0]));
    registry.add(fixedScoreDocument('doc-c', ['three'], [0]));

    const view = registry.filter(['doc-c', 'doc-a', 'unknown']);
    expect([...view].map((document) => document.id)).toEqual([
      'doc-a',
      'doc-c',
    ]);
    expect(registry.filter([]).size).toBe(3);
    expect(registry.filter(undefined).size).toBe(3);
  });

  it('raises NOT_FOUND when no requested id matches', () => {
    const registry = new DocumentRegistry();
    registry.add(fixedScoreDocument('doc-a', ['one'], [0]));

    try {
      registry.filter(['nope']);
      throw new Error('expected filter to throw');
    } catch (error) {
      expect(error).toBeInstanceOf(RetrievalError);
      expect((error as RetrievalError).code).toBe('NOT_FOUND');
    }
  });

  it('keeps a snapshot stable while the registry changes', () => {
    const registry = new DocumentRegistry();
    registry.add(fixedScoreDocument('doc-a', ['one'], [0]));
    const snapshot = registry.snapshot();

    registry.add(fixedScoreDocument('doc-b', ['two'], [0]));
    registry.remove('doc-a');

    expect([...snapshot].map((document) => document.id)).toEqual(['doc-a']);
    expect(registry.list().map((summary) => summary.id)).toEqual(['doc-b']);
  });

  it('returns a stable snapshot when no ids are requested', () => {
    const registry = new DocumentRegistry();
    registry.add(fixedScoreDocument('doc-a', ['one'], [0]));
    const view = registry.filter([]);

    registry.remove('doc-a');

    expect([...view].map((document) => document.id)).toEqual(['doc-a']);
    expect(registry.size).toBe(0);
  });
});
