/**
 * Vector Store Service
 *
 * In-memory VectorIndex for development and tests. Exact, brute-force
 * cosine search over every stored vector; the Qdrant adapter takes over
 * for real corpora.
 *
 * Results are ordered by descending score, ties broken by chunkId, so the
 * same query against the same contents always yields the same list.
 */

import {
  IndexedVector,
  RetrievalFilters,
  VectorMatch,
  VectorRecord,
} from '../../shared/types';
import { VectorIndex } from '../clients/types';

/**
 * Calculate cosine similarity between two vectors.
 *
 * Formula: cos(θ) = (A · B) / (||A|| × ||B||)
 *
 * Zero vectors score 0 against everything.
 */
export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new Error(`Vector dimension mismatch: ${a.length} vs ${b.length}`);
  }

  if (a.length === 0) {
    return 0;
  }

  let dotProduct = 0;
  let magnitudeA = 0;
  let magnitudeB = 0;

  for (let i = 0; i < a.length; i++) {
    const aVal = a[i] ?? 0;
    const bVal = b[i] ?? 0;
    dotProduct += aVal * bVal;
    magnitudeA += aVal * aVal;
    magnitudeB += bVal * bVal;
  }

  const magnitude = Math.sqrt(magnitudeA) * Math.sqrt(magnitudeB);

  // Handle zero vectors (avoid division by zero)
  if (magnitude === 0) {
    return 0;
  }

  return dotProduct / magnitude;
}

/**
 * Descending score, then ascending chunkId.
 */
export function compareMatches(a: VectorMatch, b: VectorMatch): number {
  if (b.score !== a.score) {
    return b.score - a.score;
  }
  return a.chunkId < b.chunkId ? -1 : a.chunkId > b.chunkId ? 1 : 0;
}

/**
 * In-memory Vector Store implementation.
 */
export class InMemoryVectorStore implements VectorIndex {
  private entries: Map<string, IndexedVector> = new Map();
  private documentIndex: Map<string, Set<string>> = new Map(); // documentId -> chunk IDs

  async upsert(entry: IndexedVector): Promise<void> {
    const previous = this.entries.get(entry.chunkId);
    if (previous && previous.metadata.documentId !== entry.metadata.documentId) {
      this.documentIndex.get(previous.metadata.documentId)?.delete(entry.chunkId);
    }

    this.entries.set(entry.chunkId, entry);

    let ids = this.documentIndex.get(entry.metadata.documentId);
    if (!ids) {
      ids = new Set();
      this.documentIndex.set(entry.metadata.documentId, ids);
    }
    ids.add(entry.chunkId);
  }

  async deleteByDocument(documentId: string): Promise<void> {
    const ids = this.documentIndex.get(documentId);
    if (!ids) {
      return;
    }

    for (const id of ids) {
      this.entries.delete(id);
    }
    this.documentIndex.delete(documentId);
  }

  /**
   * Brute-force O(n) search over the entries allowed by the filters.
   */
  async query(vector: number[], k: number, filters: RetrievalFilters = {}): Promise<VectorMatch[]> {
    const matches: VectorMatch[] = [];

    for (const entry of this.candidates(filters)) {
      matches.push({
        chunkId: entry.chunkId,
        score: cosineSimilarity(vector, entry.vector),
        metadata: entry.metadata,
      });
    }

    matches.sort(compareMatches);
    return matches.slice(0, Math.max(0, k));
  }

  async getByIds(ids: string[]): Promise<VectorRecord[]> {
    return ids.flatMap((id) => {
      const entry = this.entries.get(id);
      return entry ? [{ chunkId: entry.chunkId, metadata: entry.metadata }] : [];
    });
  }

  async count(documentId?: string): Promise<number> {
    if (documentId === undefined) {
      return this.entries.size;
    }
    return this.documentIndex.get(documentId)?.size ?? 0;
  }

  private *candidates(filters: RetrievalFilters): Iterable<IndexedVector> {
    if (!filters.documentIds) {
      yield* this.entries.values();
      return;
    }

    for (const documentId of new Set(filters.documentIds)) {
      for (const id of this.documentIndex.get(documentId) ?? []) {
        const entry = this.entries.get(id);
        if (entry) {
          yield entry;
        }
      }
    }
  }
}

/**
 * Factory function to create a new vector store.
 */
export function createVectorStore(): InMemoryVectorStore {
  return new InMemoryVectorStore();
}
