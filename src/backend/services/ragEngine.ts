/**
 * RAG Engine Service
 *
 * Answers one question of a session:
 * 1. VALIDATE: reject empty questions before calling anything
 * 2. ROUTE IN: detect the user language, translate the search text into
 *    the index language when they differ
 * 3. RETRIEVE: embed the search text and query the index; follow-ups are
 *    searched together with the previous question alone (not with what
 *    that question was itself combined with) and keep its chunks
 * 4. GENERATE: answer from the retrieved raw text, in the user language
 * 5. COMMIT: append the completed turn to the session
 *
 * Outcomes the user can tell apart:
 * - answered
 * - no_relevant_information: nothing relevant was found, no LLM call
 * - retrieval_unavailable: embedding or index failed, nothing committed
 */

import {
  AskResult,
  LanguageCode,
  RetrievalFilters,
  RetrievalResult,
} from '../../shared/types';
import { EmbeddingProvider } from '../clients/types';
import {
  EmbeddingError,
  InvalidQueryError,
  RequestCancelledError,
  RetrievalError,
} from '../errors';
import { describeError, Logger, NullLogger } from '../utils/logger';
import { RetryPolicy } from '../utils/retryPolicy';
import { AnswerSynthesizer } from './answerSynthesizer';
import { LanguageRouter } from './languageRouter';
import { NO_INFORMATION_MESSAGES, UNAVAILABLE_MESSAGES } from './promptTemplates';
import { buildFollowUpQuery, isFollowUp, validateQuery } from './queryProcessor';
import { Retriever } from './retriever';
import { SessionManager } from './sessionManager';

/**
 * Configuration for the RAG engine.
 */
export interface RAGEngineConfig {
  /** Search short or referential questions together with the previous one */
  followUpDetection: boolean;
}

export const DEFAULT_RAG_CONFIG: RAGEngineConfig = {
  followUpDetection: true,
};

export interface RAGEngineDependencies {
  router: LanguageRouter;
  embedder: EmbeddingProvider;
  embeddingPolicy: RetryPolicy;
  retriever: Retriever;
  synthesizer: AnswerSynthesizer;
  sessions: SessionManager;
}

export interface AskInput {
  question: string;
  /** Omitted for a new conversation */
  sessionId?: string;
}

export interface AskOptions {
  signal?: AbortSignal;
  filters?: RetrievalFilters;
}

/**
 * Interface for the RAG engine.
 */
export interface IRAGEngine {
  ask(input: AskInput, options?: AskOptions): Promise<AskResult>;
}

function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new RequestCancelledError();
  }
}

export class RAGEngine implements IRAGEngine {
  private readonly config: RAGEngineConfig;

  constructor(
    private readonly deps: RAGEngineDependencies,
    config: Partial<RAGEngineConfig> = {},
    private readonly logger: Logger = new NullLogger()
  ) {
    this.config = { ...DEFAULT_RAG_CONFIG, ...config };
  }

  /**
   * @throws InvalidQueryError for empty or oversized questions
   * @throws SynthesisError when the answer cannot be generated
   * @throws RequestCancelledError when the signal aborts; nothing is committed
   */
  async ask(input: AskInput, options: AskOptions = {}): Promise<AskResult> {
    const { signal, filters } = options;
    const startedAt = Date.now();

    const validation = validateQuery(input.question);
    if (!validation.valid) {
      throw new InvalidQueryError(validation.error ?? 'Invalid query');
    }
    const question = input.question.trim();
    throwIfAborted(signal);

    const { sessions, retriever, synthesizer } = this.deps;
    const session = await sessions.getOrCreate(input.sessionId);
    const previousTurn = session.turns.at(-1);

    const route = this.deps.router.begin();
    const detection = route.detect(question);
    const routed = await route.routeIn(signal);
    const language = detection.userLanguage;

    const followUp = this.config.followUpDetection && isFollowUp(question, language, previousTurn);
    const searchQuery = followUp && previousTurn
      ? buildFollowUpQuery(previousTurn.routedQuery, routed.searchQuery)
      : routed.searchQuery;
    const carryOverChunkIds = followUp && previousTurn ? previousTurn.retrievedChunkIds : [];

    let retrieval: RetrievalResult;
    try {
      const queryVector = await this.embedQuery(searchQuery, signal);
      retrieval = await retriever.retrieve(queryVector, { filters, carryOverChunkIds, signal });
    } catch (error) {
      if (!(error instanceof EmbeddingError || error instanceof RetrievalError)) {
        throw error;
      }
      this.logger.warn('Retrieval unavailable', {
        sessionId: session.id,
        error: error.toJSON(),
      });
      return this.result(session.id, language, searchQuery, UNAVAILABLE_MESSAGES[language], 'retrieval_unavailable');
    }

    if (retrieval.entries.length === 0) {
      const answer = NO_INFORMATION_MESSAGES[language];
      throwIfAborted(signal);
      await sessions.appendTurn(session.id, {
        question,
        answer,
        searchQuery,
        routedQuery: routed.searchQuery,
        detectedLanguage: language,
        retrievedChunkIds: [],
        timestamp: new Date(),
      });
      this.logger.info('No relevant information found', { sessionId: session.id, language, searchQuery });
      return this.result(session.id, language, searchQuery, answer, 'no_relevant_information');
    }

    const routing = route.routeOut();
    const synthesized = await synthesizer.synthesize({
      question,
      searchQuery,
      retrieval,
      routing,
      history: session.turns,
      signal,
    });
    route.complete();

    throwIfAborted(signal);
    await sessions.appendTurn(session.id, {
      question,
      answer: synthesized.answer,
      searchQuery,
      routedQuery: routed.searchQuery,
      detectedLanguage: language,
      // Only chunks found by this turn's search; carried chunks are not carried again.
      retrievedChunkIds: retrieval.entries
        .filter((entry) => entry.origin === 'search')
        .map((entry) => entry.chunkId),
      timestamp: new Date(),
    });

    this.logger.info('Question answered', {
      sessionId: session.id,
      language,
      translated: routed.translated,
      followUp,
      sources: synthesized.sources.length,
      durationMs: Date.now() - startedAt,
    });

    return {
      ...this.result(session.id, language, searchQuery, synthesized.answer, 'answered'),
      sources: synthesized.sources,
    };
  }

  private async embedQuery(text: string, signal?: AbortSignal): Promise<number[]> {
    const { embedder, embeddingPolicy } = this.deps;

    let vector: number[];
    try {
      vector = await embeddingPolicy.execute(
        'embed',
        (attemptSignal) => embedder.embed(text, { signal: attemptSignal }),
        { signal }
      );
    } catch (error) {
      if (error instanceof RequestCancelledError) {
        throw error;
      }
      throw new EmbeddingError(`Query embedding failed: ${describeError(error)}`, { cause: error });
    }

    if (vector.length !== embedder.dimension) {
      throw new EmbeddingError(`Query embedding has dimension ${vector.length}, expected ${embedder.dimension}`);
    }
    return vector;
  }

  private result(
    sessionId: string,
    detectedLanguage: LanguageCode,
    searchQuery: string,
    answer: string,
    outcome: AskResult['outcome']
  ): AskResult {
    return { sessionId, answer, sources: [], detectedLanguage, searchQuery, outcome };
  }
}

/**
 * Factory function to create a RAG engine.
 */
export function createRAGEngine(
  deps: RAGEngineDependencies,
  config?: Partial<RAGEngineConfig>,
  logger?: Logger
): RAGEngine {
  return new RAGEngine(deps, config, logger);
}
