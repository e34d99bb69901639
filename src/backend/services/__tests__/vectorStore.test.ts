/**
 * Unit tests for the in-memory vector index
 */

import { IndexedVector } from '../../../shared/types';
import { cosineSimilarity, createVectorStore } from '../vectorStore';

function indexed(chunkId: string, documentId: string, vector: number[]): IndexedVector {
  return {
    chunkId,
    vector,
    metadata: {
      documentId,
      documentTitle: documentId,
      pageNumber: 1,
      headingPath: [],
      sequence: 0,
      rawText: chunkId,
      sourceLanguage: 'en',
      enhancementPending: false,
    },
  };
}

describe('cosineSimilarity', () => {
  it('should score identical, orthogonal and opposite vectors', () => {
    expect(cosineSimilarity([1, 2], [2, 4])).toBeCloseTo(1);
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
    expect(cosineSimilarity([1, 0], [-1, 0])).toBeCloseTo(-1);
  });

  it('should score zero vectors as 0', () => {
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
  });

  it('should reject vectors of different dimensions', () => {
    expect(() => cosineSimilarity([1], [1, 2])).toThrow('Vector dimension mismatch: 1 vs 2');
  });
});

describe('InMemoryVectorStore', () => {
  it('should order matches by score, breaking ties by chunk id', async () => {
    const store = createVectorStore();
    await store.upsert(indexed('b', 'doc', [1, 0]));
    await store.upsert(indexed('a', 'doc', [2, 0]));
    await store.upsert(indexed('c', 'doc', [0, 1]));

    const matches = await store.query([1, 0], 3);

    expect(matches.map((match) => [match.chunkId, match.score])).toEqual([
      ['a', 1],
      ['b', 1],
      ['c', 0],
    ]);
  });

  it('should keep one vector per chunk id', async () => {
    const store = createVectorStore();
    await store.upsert(indexed('a', 'doc-1', [1, 0]));
    await store.upsert(indexed('a', 'doc-2', [0, 1]));

    expect(await store.count()).toBe(1);
    expect(await store.count('doc-1')).toBe(0);
    expect(await store.count('doc-2')).toBe(1);
  });

  it('should filter by document and delete by document', async () => {
    const store = createVectorStore();
    await store.upsert(indexed('a', 'doc-1', [1, 0]));
    await store.upsert(indexed('b', 'doc-2', [1, 0]));

    expect((await store.query([1, 0], 5, { documentIds: ['doc-2'] })).map((m) => m.chunkId)).toEqual(['b']);

    await store.deleteByDocument('doc-2');
    expect(await store.count('doc-2')).toBe(0);
    expect(await store.count()).toBe(1);
    expect(await store.getByIds(['b', 'a'])).toEqual([{ chunkId: 'a', metadata: indexed('a', 'doc-1', []).metadata }]);
  });
});
