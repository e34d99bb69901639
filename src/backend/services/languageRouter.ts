/**
 * Language Router
 *
 * The index holds one language; users ask in several. Each request walks
 * an explicit state machine:
 *
 *   DETECT -> ROUTE_IN -> RETRIEVE -> ROUTE_OUT -> DONE
 *
 * - DETECT: classify the question
 * - ROUTE_IN: translate it into the index language, only when they differ
 * - RETRIEVE: the caller searches with the routed query
 * - ROUTE_OUT: the answer language (always the user's) and the instruction
 *   that makes synthesis answer in it
 *
 * Only the question is translated. Answers are generated directly in the
 * user language from index-language context; there is no second pass.
 */

import { LanguageCode, SUPPORTED_LANGUAGES } from '../../shared/types';
import { Translator } from '../clients/types';
import { LanguageDetectionAmbiguous, PipelineError, RequestCancelledError } from '../errors';
import { describeError, Logger, NullLogger } from '../utils/logger';
import { RetryPolicy } from '../utils/retryPolicy';
import { LanguageDetector } from './languageDetector';

export type RouterState = 'DETECT' | 'ROUTE_IN' | 'RETRIEVE' | 'ROUTE_OUT' | 'DONE';

export class RouterStateError extends Error {
    constructor(expected: RouterState, actual: RouterState) {
        super(`Language route expected state ${expected} but is in ${actual}`);
        this.name = 'RouterStateError';
    }
}

export interface LanguageRouterConfig {
    indexLanguage: LanguageCode;
}

export const DEFAULT_ROUTER_CONFIG: LanguageRouterConfig = {
    indexLanguage: 'en',
};

/**
 * Written in the target language itself; models follow that better.
 */
export const ANSWER_INSTRUCTIONS: Record<LanguageCode, string> = {
    en: 'Always answer in English, even when the context is written in another language.',
    es: 'Responde siempre en español, aunque el contexto esté escrito en otro idioma.',
    pt: 'Responda sempre em português, mesmo que o contexto esteja escrito em outro idioma.',
};

export interface Detection {
    userLanguage: LanguageCode;
    /** True when detection was not confident and the index language was assumed */
    ambiguous: boolean;
}

export interface RoutedQuery {
    userLanguage: LanguageCode;
    /** Text to embed and search with, in the index language when translation worked */
    searchQuery: string;
    translated: boolean;
}

export interface AnswerRouting {
    answerLanguage: LanguageCode;
    instruction: string;
}

/**
 * One request's walk through the routing states.
 */
export class LanguageRoute {
    private currentState: RouterState = 'DETECT';
    private question = '';
    private detection: Detection | undefined;

    constructor(
        private readonly detector: LanguageDetector,
        private readonly translator: Translator,
        private readonly translationPolicy: RetryPolicy,
        private readonly indexLanguage: LanguageCode,
        private readonly logger: Logger
    ) {}

    get state(): RouterState {
        return this.currentState;
    }

    /**
     * DETECT -> ROUTE_IN
     */
    detect(question: string): Detection {
        this.expect('DETECT');
        this.question = question;

        try {
            this.detection = { userLanguage: this.detector.classify(question), ambiguous: false };
        } catch (error) {
            if (!(error instanceof LanguageDetectionAmbiguous)) {
                throw error;
            }
            this.logger.debug('Language detection ambiguous, assuming index language', {
                indexLanguage: this.indexLanguage,
                reason: error.message,
            });
            this.detection = { userLanguage: this.indexLanguage, ambiguous: true };
        }

        this.currentState = 'ROUTE_IN';
        return this.detection;
    }

    /**
     * ROUTE_IN -> RETRIEVE
     *
     * Calls the translator only when the user language differs from the
     * index language. A translation that fails after retries is logged and
     * the untranslated question is searched instead.
     */
    async routeIn(signal?: AbortSignal): Promise<RoutedQuery> {
        this.expect('ROUTE_IN');
        const userLanguage = this.userLanguage();

        let routed: RoutedQuery = { userLanguage, searchQuery: this.question, translated: false };
        if (userLanguage !== this.indexLanguage) {
            try {
                const translation = await this.translationPolicy.execute(
                    'translate',
                    async (attemptSignal) => {
                        const text = await this.translator.translate(
                            this.question,
                            userLanguage,
                            this.indexLanguage,
                            { signal: attemptSignal }
                        );
                        if (!text.trim()) {
                            throw new PipelineError('Translator returned empty text', 'translation');
                        }
                        return text.trim();
                    },
                    { signal }
                );
                routed = { userLanguage, searchQuery: translation, translated: true };
            } catch (error) {
                if (error instanceof RequestCancelledError) {
                    throw error;
                }
                this.logger.warn('Query translation failed, searching untranslated text', {
                    from: userLanguage,
                    to: this.indexLanguage,
                    error: describeError(error),
                });
            }
        }

        this.currentState = 'RETRIEVE';
        return routed;
    }

    /**
     * RETRIEVE -> ROUTE_OUT
     */
    routeOut(): AnswerRouting {
        this.expect('RETRIEVE');
        const answerLanguage = this.userLanguage();
        this.currentState = 'ROUTE_OUT';
        return { answerLanguage, instruction: ANSWER_INSTRUCTIONS[answerLanguage] };
    }

    /**
     * ROUTE_OUT -> DONE
     */
    complete(): void {
        this.expect('ROUTE_OUT');
        this.currentState = 'DONE';
    }

    private userLanguage(): LanguageCode {
        return this.detection?.userLanguage ?? this.indexLanguage;
    }

    private expect(state: RouterState): void {
        if (this.currentState !== state) {
            throw new RouterStateError(state, this.currentState);
        }
    }
}

/**
 * Creates one LanguageRoute per request.
 */
export class LanguageRouter {
    private readonly config: LanguageRouterConfig;

    constructor(
        private readonly detector: LanguageDetector,
        private readonly translator: Translator,
        private readonly translationPolicy: RetryPolicy,
        config: Partial<LanguageRouterConfig> = {},
        private readonly logger: Logger = new NullLogger()
    ) {
        this.config = { ...DEFAULT_ROUTER_CONFIG, ...config };
        if (!SUPPORTED_LANGUAGES.includes(this.config.indexLanguage)) {
            throw new RangeError(`Unsupported index language: ${this.config.indexLanguage}`);
        }
    }

    get indexLanguage(): LanguageCode {
        return this.config.indexLanguage;
    }

    begin(): LanguageRoute {
        return new LanguageRoute(
            this.detector,
            this.translator,
            this.translationPolicy,
            this.config.indexLanguage,
            this.logger
        );
    }
}
