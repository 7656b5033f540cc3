import { describe, it, expect } from 'vitest';
import { VectorIndex } from '../src/services/vector-index.js';
import { IndexCorruptionError } from '../src/utils/errors.js';

describe('VectorIndex', () => {
  it('returns nothing from an empty index', () => {
    const index = new VectorIndex(2);
    expect(index.search([1, 0], 5)).toEqual([]);
  });

  it('ranks by cosine similarity', async () => {
    const index = new VectorIndex();
    await index.upsert(1, [1, 0], 'doc-a');
    await index.upsert(2, [0, 1], 'doc-a');
    await index.upsert(3, [2, 2], 'doc-b');

    const hits = index.search([3, 0], 3);

    expect(hits.map(hit => hit.chunkId)).toEqual([1, 3, 2]);
    expect(hits[0]?.score).toBeCloseTo(1, 6);
    expect(hits[1]?.score).toBeCloseTo(Math.SQRT1_2, 6);
    expect(hits[2]?.score).toBeCloseTo(0, 6);
    expect(index.dimension).toBe(2);
  });

  it('breaks score ties by ascending chunk id and honours k', async () => {
    const index = new VectorIndex(2);
    await index.upsert(5, [1, 1], 'doc-a');
    await index.upsert(2, [1, 1], 'doc-a');
    await index.upsert(9, [1, 1], 'doc-a');

    expect(index.search([1, 1], 2).map(hit => hit.chunkId)).toEqual([2, 5]);
    expect(index.search([1, 1], 0)).toEqual([]);
  });

  it('restricts the search to the given documents', async () => {
    const index = new VectorIndex(2);
    await index.upsertDocument('doc-a', [{ chunkId: 1, vector: [1, 0] }]);
    await index.upsertDocument('doc-b', [{ chunkId: 2, vector: [0.9, 0.1] }]);

    expect(index.search([1, 0], 5, ['doc-b']).map(hit => hit.documentId)).toEqual(['doc-b']);
    expect(index.search([1, 0], 5, [])).toEqual([]);
    expect(index.search([1, 0], 5, ['missing'])).toEqual([]);
  });

  it('replaces every vector of a document on upsertDocument', async () => {
    const index = new VectorIndex(2);
    await index.upsertDocument('doc-a', [
      { chunkId: 1, vector: [1, 0] },
      { chunkId: 2, vector: [0, 1] },
    ]);
    await index.upsertDocument('doc-a', [{ chunkId: 3, vector: [1, 1] }]);

    expect(index.size).toBe(1);
    expect(index.countByDocument('doc-a')).toBe(1);
    expect(index.has(1)).toBe(false);
    expect(index.has(3)).toBe(true);
  });

  it('leaves the index unchanged when a batch contains a bad vector', async () => {
    const index = new VectorIndex(2);
    await index.upsertDocument('doc-a', [{ chunkId: 1, vector: [1, 0] }]);

    await expect(
      index.upsertDocument('doc-a', [
        { chunkId: 2, vector: [0, 1] },
        { chunkId: 3, vector: [1, 2, 3] },
      ])
    ).rejects.toBeInstanceOf(IndexCorruptionError);

    expect(index.has(1)).toBe(true);
    expect(index.has(2)).toBe(false);
  });

  it('refuses to move a chunk between documents', async () => {
    const index = new VectorIndex(2);
    await index.upsertDocument('doc-a', [{ chunkId: 1, vector: [1, 0] }]);

    await expect(index.upsertDocument('doc-b', [{ chunkId: 1, vector: [0, 1] }])).rejects.toBeInstanceOf(
      IndexCorruptionError
    );
  });

  it('rejects vectors of the wrong dimension or with non-finite values', async () => {
    const index = new VectorIndex(3);

    await expect(index.upsert(1, [1, 0], 'doc-a')).rejects.toBeInstanceOf(IndexCorruptionError);
    await expect(index.upsert(1, [1, Number.NaN, 0], 'doc-a')).rejects.toBeInstanceOf(IndexCorruptionError);
    await expect(index.upsert(1, [], 'doc-a')).rejects.toBeInstanceOf(IndexCorruptionError);

    await index.upsert(1, [1, 0, 0], 'doc-a');
    expect(() => index.search([1, 0], 1)).toThrow(IndexCorruptionError);
  });

  it('removes a document and reports how many vectors went', async () => {
    const index = new VectorIndex(2);
    await index.load([
      { chunkId: 1, documentId: 'doc-a', vector: [1, 0] },
      { chunkId: 2, documentId: 'doc-a', vector: [0, 1] },
      { chunkId: 3, documentId: 'doc-b', vector: [1, 1] },
    ]);

    expect(await index.deleteByDocument('doc-a')).toBe(2);
    expect(await index.deleteByDocument('doc-a')).toBe(0);
    expect(index.size).toBe(1);
    expect(index.documentIds()).toEqual(['doc-b']);
  });

  it('keeps the dimension after clear', async () => {
    const index = new VectorIndex();
    await index.upsert(1, [1, 0, 0], 'doc-a');
    await index.clear();

    expect(index.size).toBe(0);
    expect(index.dimension).toBe(3);
  });

  it('never shows a concurrent search part of a document being replaced', async () => {
    const index = new VectorIndex(2);
    await index.upsertDocument('doc-a', [
      { chunkId: 1, vector: [1, 0] },
      { chunkId: 2, vector: [1, 0.1] },
    ]);
    const replacement = Array.from({ length: 50 }, (_, i) => ({ chunkId: 100 + i, vector: [1, i / 50] }));
    const before = [1, 2];
    const after = replacement.map(entry => entry.chunkId);

    const seen = () => index.search([1, 0], 100, ['doc-a']).map(hit => hit.chunkId).sort((a, b) => a - b);
    const observed: number[][] = [];
    let finished = false;
    const write = index.upsertDocument('doc-a', replacement).then(() => {
      finished = true;
    });
    while (!finished) {
      observed.push(seen());
      await Promise.resolve();
    }
    await write;
    observed.push(seen());

    expect(observed[0]).toEqual(before);
    expect(observed[observed.length - 1]).toEqual(after);
    for (const ids of observed) {
      expect([before, after]).toContainEqual(ids);
    }
  });
});

