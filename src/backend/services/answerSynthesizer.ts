/**
 * Answer Synthesizer
 *
 * Assembles the grounded prompt, makes the single LLM call and turns its
 * output into an answer with sources.
 *
 * Sources are derived from retrieval metadata only. Whatever the model
 * writes about its sources is never parsed back, so a citation can only
 * point at a chunk that was actually retrieved.
 */

import {
  LanguageCode,
  RetrievalResult,
  SessionTurn,
  SourceCitation,
} from '../../shared/types';
import { LanguageModel, Translator } from '../clients/types';
import { RequestCancelledError, SynthesisError } from '../errors';
import { describeError, Logger, NullLogger } from '../utils/logger';
import { RetryPolicy } from '../utils/retryPolicy';
import { LanguageDetector } from './languageDetector';
import { AnswerRouting } from './languageRouter';
import {
  renderSynthesisPrompt,
  SynthesisContext,
  SynthesisRequest,
  systemPromptFor,
} from './promptTemplates';

export interface AnswerSynthesizerConfig {
  /** Previous turns included in the prompt */
  historyWindow: number;
  /** Translate retrieved context into the answer language before prompting */
  translateContext: boolean;
  indexLanguage: LanguageCode;
}

export const DEFAULT_SYNTHESIZER_CONFIG: AnswerSynthesizerConfig = {
  historyWindow: 3,
  translateContext: false,
  indexLanguage: 'en',
};

/**
 * Translator used only when translateContext is on.
 */
export interface ContextTranslation {
  translator: Translator;
  retryPolicy: RetryPolicy;
}

export interface SynthesisInput {
  question: string;
  searchQuery: string;
  retrieval: RetrievalResult;
  routing: AnswerRouting;
  /** Session turns, oldest first; only the last historyWindow are used */
  history: SessionTurn[];
  signal?: AbortSignal;
}

export interface SynthesizedAnswer {
  answer: string;
  sources: SourceCitation[];
}

const ANSWER_LABEL = /^\s*(?:\*\*)?(?:answer|respuesta|resposta)(?:\*\*)?\s*:\s*/i;

/**
 * Trims and drops a leading "Answer:" style label.
 */
export function cleanAnswer(raw: string): string {
  return raw.trim().replace(ANSWER_LABEL, '').trim();
}

/**
 * One citation per (document, page), in rank order.
 */
export function deriveSources(retrieval: RetrievalResult): SourceCitation[] {
  const seen = new Set<string>();
  const sources: SourceCitation[] = [];

  for (const entry of retrieval.entries) {
    const document = entry.metadata.documentTitle;
    const key = `${document}\u0000${entry.metadata.pageNumber}`;
    if (!seen.has(key)) {
      seen.add(key);
      sources.push({ document, page: entry.metadata.pageNumber });
    }
  }
  return sources;
}

export class AnswerSynthesizer {
  private readonly config: AnswerSynthesizerConfig;

  constructor(
    private readonly llm: LanguageModel,
    private readonly retryPolicy: RetryPolicy,
    private readonly detector: LanguageDetector,
    config: Partial<AnswerSynthesizerConfig> = {},
    private readonly logger: Logger = new NullLogger(),
    private readonly contextTranslation?: ContextTranslation
  ) {
    this.config = { ...DEFAULT_SYNTHESIZER_CONFIG, ...config };
    if (this.config.translateContext && !contextTranslation) {
      throw new RangeError('translateContext needs a translator');
    }
  }

  /**
   * Everything the prompt is rendered from. Context text is the chunk's
   * raw text, never the enhanced text that was embedded.
   */
  async buildRequest(input: SynthesisInput): Promise<SynthesisRequest> {
    const { answerLanguage, instruction } = input.routing;

    let contexts: SynthesisContext[] = input.retrieval.entries.map((entry) => ({
      document: entry.metadata.documentTitle,
      page: entry.metadata.pageNumber,
      headingPath: entry.metadata.headingPath,
      text: entry.metadata.rawText,
    }));
    if (this.config.translateContext && answerLanguage !== this.config.indexLanguage) {
      contexts = await this.translateContexts(contexts, answerLanguage, input.signal);
    }

    const history = this.config.historyWindow > 0
      ? input.history.slice(-this.config.historyWindow)
      : [];

    return {
      systemPrompt: systemPromptFor(answerLanguage),
      contexts,
      question: input.question,
      searchQuery: input.searchQuery !== input.question ? input.searchQuery : undefined,
      history: history.map((turn) => ({ question: turn.question, answer: turn.answer })),
      answerLanguage,
      instruction,
    };
  }

  /**
   * @throws SynthesisError when the LLM fails or keeps answering empty
   */
  async synthesize(input: SynthesisInput): Promise<SynthesizedAnswer> {
    const prompt = renderSynthesisPrompt(await this.buildRequest(input));

    let answer: string;
    try {
      answer = await this.retryPolicy.execute(
        'synthesizeAnswer',
        async (signal) => {
          const cleaned = cleanAnswer(await this.llm.synthesizeAnswer(prompt, { signal }));
          if (!cleaned) {
            throw new SynthesisError('LLM returned an empty answer');
          }
          return cleaned;
        },
        {
          signal: input.signal,
          onRetry: (error, attempt) =>
            this.logger.warn('Retrying answer synthesis', { attempt, error: describeError(error) }),
        }
      );
    } catch (error) {
      if (error instanceof RequestCancelledError || error instanceof SynthesisError) {
        throw error;
      }
      throw new SynthesisError('Answer generation failed', { cause: error });
    }

    this.checkLanguage(answer, input.routing.answerLanguage);
    return { answer, sources: deriveSources(input.retrieval) };
  }

  private checkLanguage(answer: string, expected: LanguageCode): void {
    const detected = this.detector.detect(answer);
    if (!detected.ambiguous && detected.language !== expected) {
      this.logger.warn('Answer language differs from the user language', {
        expected,
        detected: detected.language,
        confidence: detected.confidence,
      });
    }
  }

  private async translateContexts(
    contexts: SynthesisContext[],
    target: LanguageCode,
    signal?: AbortSignal
  ): Promise<SynthesisContext[]> {
    const translation = this.contextTranslation;
    if (!translation) {
      return contexts;
    }

    const translated: SynthesisContext[] = [];
    for (const context of contexts) {
      try {
        const text = await translation.retryPolicy.execute(
          'translateContext',
          (attemptSignal) =>
            translation.translator.translate(context.text, this.config.indexLanguage, target, {
              signal: attemptSignal,
            }),
          { signal }
        );
        translated.push({ ...context, text: text.trim() || context.text });
      } catch (error) {
        if (error instanceof RequestCancelledError) {
          throw error;
        }
        this.logger.warn('Context translation failed, keeping original text', {
          document: context.document,
          page: context.page,
          error: describeError(error),
        });
        translated.push(context);
      }
    }
    return translated;
  }
}
