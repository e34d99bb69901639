/**
 * Retriever
 *
 * Turns a query vector into ranked, deduplicated context:
 * 1. over-fetch k × overfetchFactor candidates from the index
 * 2. drop matches under minScore
 * 3. keep the best chunk per (document, page)
 * 4. order by descending score, then chunkId, and keep k
 * 5. for follow-ups, append chunks carried over from the previous turn
 *
 * Over-fetching leaves room for the page-level deduplication to still
 * return k entries.
 */

import {
  RetrievalFilters,
  RetrievalResult,
  RetrievedChunk,
  VectorMatch,
} from '../../shared/types';
import { VectorIndex } from '../clients/types';
import { RequestCancelledError, RetrievalError } from '../errors';
import { describeError, Logger, NullLogger } from '../utils/logger';
import { RetryPolicy } from '../utils/retryPolicy';
import { compareMatches } from './vectorStore';

export interface RetrieverConfig {
  /** Entries returned from search */
  k: number;
  /** Candidates fetched per returned entry */
  overfetchFactor: number;
  /** Matches scoring below this are dropped */
  minScore: number;
  /** Previous-turn chunks appended to a follow-up's context */
  followUpCarryOver: number;
}

export const DEFAULT_RETRIEVER_CONFIG: RetrieverConfig = {
  k: 5,
  overfetchFactor: 3,
  minScore: 0.3,
  followUpCarryOver: 2,
};

export interface RetrieveOptions {
  k?: number;
  filters?: RetrievalFilters;
  /** Chunk ids retrieved by the previous turn, in rank order */
  carryOverChunkIds?: string[];
  signal?: AbortSignal;
}

/**
 * Score filter, page-level dedup and deterministic ordering.
 */
export function rankMatches(matches: VectorMatch[], k: number, minScore: number): VectorMatch[] {
  const sorted = matches.filter((match) => match.score >= minScore).sort(compareMatches);

  const seenPages = new Set<string>();
  const ranked: VectorMatch[] = [];
  for (const match of sorted) {
    const pageKey = `${match.metadata.documentId}\u0000${match.metadata.pageNumber}`;
    if (seenPages.has(pageKey)) {
      continue;
    }
    seenPages.add(pageKey);
    ranked.push(match);
    if (ranked.length >= k) {
      break;
    }
  }
  return ranked;
}

export class Retriever {
  private readonly config: RetrieverConfig;

  constructor(
    private readonly index: VectorIndex,
    private readonly retryPolicy: RetryPolicy,
    config: Partial<RetrieverConfig> = {},
    private readonly logger: Logger = new NullLogger()
  ) {
    this.config = { ...DEFAULT_RETRIEVER_CONFIG, ...config };
  }

  /**
   * @throws RetrievalError when the index cannot be queried after retries
   */
  async retrieve(queryVector: number[], options: RetrieveOptions = {}): Promise<RetrievalResult> {
    const { filters = {}, carryOverChunkIds = [], signal } = options;
    const k = options.k ?? this.config.k;

    let candidates: VectorMatch[];
    try {
      candidates = await this.retryPolicy.execute(
        'vectorIndex.query',
        (attemptSignal) =>
          this.index.query(queryVector, k * this.config.overfetchFactor, filters, {
            signal: attemptSignal,
          }),
        { signal }
      );
    } catch (error) {
      if (error instanceof RequestCancelledError) {
        throw error;
      }
      throw new RetrievalError('Vector index query failed', { cause: error });
    }

    const entries: RetrievedChunk[] = rankMatches(candidates, k, this.config.minScore).map(
      (match) => ({ ...match, origin: 'search' as const })
    );

    const carried = await this.carryOver(entries, carryOverChunkIds, filters, signal);
    this.logger.debug('Retrieved context', {
      candidates: candidates.length,
      returned: entries.length,
      carriedOver: carried.length,
    });

    return { entries: [...entries, ...carried] };
  }

  /**
   * Previous-turn chunks not already in the result. Missing chunks (e.g.
   * the document was re-ingested) are skipped. A failed lookup only costs
   * the carry-over, not the request.
   */
  private async carryOver(
    present: RetrievedChunk[],
    chunkIds: string[],
    filters: RetrievalFilters,
    signal?: AbortSignal
  ): Promise<RetrievedChunk[]> {
    const presentIds = new Set(present.map((entry) => entry.chunkId));
    const wanted = [...new Set(chunkIds)]
      .filter((id) => !presentIds.has(id))
      .slice(0, this.config.followUpCarryOver);
    if (wanted.length === 0) {
      return [];
    }

    try {
      const records = await this.retryPolicy.execute(
        'vectorIndex.getByIds',
        (attemptSignal) => this.index.getByIds(wanted, { signal: attemptSignal }),
        { signal }
      );
      const allowed = filters.documentIds ? new Set(filters.documentIds) : undefined;

      return records
        .filter((record) => !allowed || allowed.has(record.metadata.documentId))
        .map((record) => ({ ...record, score: 0, origin: 'history' as const }));
    } catch (error) {
      if (error instanceof RequestCancelledError) {
        throw error;
      }
      this.logger.warn('Could not carry over previous context', { error: describeError(error) });
      return [];
    }
  }
}
