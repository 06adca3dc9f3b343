/**
 * In-Memory Vector Store Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { InMemoryVectorStore, cosineSimilarity } from '../memory-store.js';
import type { VectorPoint } from '../types.js';

function point(id: string, vector: number[], position = 0): VectorPoint {
  return { id, vector, payload: { text: `text ${id}`, position } };
}

describe('cosineSimilarity', () => {
  it('is 1 for identical directions', () => {
    expect(cosineSimilarity([1, 2], [2, 4])).toBeCloseTo(1);
  });

  it('is 0 for orthogonal vectors', () => {
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
  });

  it('is 0 when a vector is all zeros', () => {
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
  });
});

describe('InMemoryVectorStore', () => {
  let store: InMemoryVectorStore;

  beforeEach(async () => {
    store = new InMemoryVectorStore();
    await store.createCollection('c1', 2);
  });

  it('refuses to create an existing collection', async () => {
    await expect(store.createCollection('c1', 2)).rejects.toThrow('Collection already exists: c1');
  });

  it('rejects vectors of the wrong dimension', async () => {
    await expect(store.upsert('c1', [point('a', [1, 0, 0])])).rejects.toThrow(
      'Vector dimension error: expected dim: 2, got 3'
    );
  });

  it('returns matches best first, limited', async () => {
    await store.upsert('c1', [
      point('far', [0, 1], 0),
      point('near', [1, 0.1], 1),
      point('mid', [1, 1], 2),
    ]);

    const matches = await store.search('c1', [1, 0], 2);

    expect(matches.map((m) => m.id)).toEqual(['near', 'mid']);
    expect(matches[0]?.payload).toEqual({ text: 'text near', position: 1 });
  });

  it('overwrites points with the same id', async () => {
    await store.upsert('c1', [point('a', [1, 0])]);
    await store.upsert('c1', [point('a', [0, 1])]);

    expect(await store.count('c1')).toBe(1);
  });

  it('deletes collections', async () => {
    await store.deleteCollection('c1');

    expect(store.listCollections()).toEqual([]);
    await expect(store.count('c1')).rejects.toThrow('Collection not found: c1');
  });
});
