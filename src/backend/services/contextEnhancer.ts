/**
 * Context Enhancer
 *
 * Contextual retrieval: before a chunk is embedded, an LLM-written preamble
 * situating it in its document is prepended to it. A chunk saying "the
 * operator shall notify the authority within 72 hours" embeds far better
 * once it is known to come from a data-breach regulation.
 *
 * The document summary (title + main idea) is computed once per document
 * and reused for every chunk.
 */

import { Chunk, DocumentSummary, LanguageCode, SegmentedChunk, SourceDocument } from '../../shared/types';
import { LanguageModel } from '../clients/types';
import { EnhancementError, PipelineError, RequestCancelledError } from '../errors';
import { describeError, Logger, NullLogger } from '../utils/logger';
import { RetryPolicy } from '../utils/retryPolicy';

export interface ContextEnhancerConfig {
    /** Preambles longer than this are cut at a word boundary */
    maxPreambleLength: number;
    /** Leading characters of the document the summary is computed from */
    summaryInputChars: number;
    /** Language of the index; stamped on every chunk */
    indexLanguage: LanguageCode;
}

export const DEFAULT_ENHANCER_CONFIG: ContextEnhancerConfig = {
    maxPreambleLength: 300,
    summaryInputChars: 12000,
    indexLanguage: 'en',
};

export const PREAMBLE_SEPARATOR = '\n\n';

/**
 * Collapses whitespace and cuts to maxLength on a word boundary.
 */
export function truncatePreamble(text: string, maxLength: number): string {
    const normalized = text.replace(/\s+/g, ' ').trim();
    if (normalized.length <= maxLength) {
        return normalized;
    }

    const cut = normalized.slice(0, maxLength);
    const lastSpace = cut.lastIndexOf(' ');
    return (lastSpace > 0 ? cut.slice(0, lastSpace) : cut).trim();
}

export function buildEnhancedText(preamble: string, rawText: string): string {
    return preamble ? `${preamble}${PREAMBLE_SEPARATOR}${rawText}` : rawText;
}

export class ContextEnhancer {
    private readonly config: ContextEnhancerConfig;

    constructor(
        private readonly llm: LanguageModel,
        private readonly retryPolicy: RetryPolicy,
        config: Partial<ContextEnhancerConfig> = {},
        private readonly logger: Logger = new NullLogger()
    ) {
        this.config = { ...DEFAULT_ENHANCER_CONFIG, ...config };
    }

    /**
     * Title and main idea of a document.
     *
     * A missing title is asked of the LLM from the first page, falling back
     * to the source file name. A failed main idea leaves it empty; preambles
     * are still generated from the title alone.
     */
    async summarize(document: SourceDocument, text: string, signal?: AbortSignal): Promise<DocumentSummary> {
        const title = document.title?.trim() || (await this.identifyTitle(document, signal));

        let mainIdea = '';
        try {
            mainIdea = await this.retryPolicy.execute(
                'summarizeDocument',
                (attemptSignal) =>
                    this.llm.summarizeDocument(title, text.slice(0, this.config.summaryInputChars), {
                        signal: attemptSignal,
                    }),
                { signal }
            );
        } catch (error) {
            if (error instanceof RequestCancelledError) {
                throw error;
            }
            const failure = new PipelineError('Document summary failed', 'summary', {
                documentId: document.id,
                cause: error,
            });
            this.logger.warn(failure.message, failure.toJSON());
        }

        return { title, mainIdea: mainIdea.trim() };
    }

    /**
     * Adds a preamble to one chunk.
     *
     * Never throws for LLM failures: after the retry budget is spent the
     * chunk comes back with an empty preamble and enhancementPending set.
     */
    async enhance(summary: DocumentSummary, chunk: SegmentedChunk, signal?: AbortSignal): Promise<Chunk> {
        try {
            const preamble = await this.retryPolicy.execute(
                'generateContext',
                async (attemptSignal) => {
                    const generated = await this.llm.generateContext(summary, chunk.rawText, {
                        signal: attemptSignal,
                    });
                    const preamble = truncatePreamble(generated, this.config.maxPreambleLength);
                    if (!preamble) {
                        throw new EnhancementError('LLM returned an empty preamble', {
                            documentId: chunk.documentId,
                            chunkId: chunk.chunkId,
                        });
                    }
                    return preamble;
                },
                {
                    signal,
                    onRetry: (error, attempt) =>
                        this.logger.debug('Retrying chunk context', {
                            chunkId: chunk.chunkId,
                            attempt,
                            error: describeError(error),
                        }),
                }
            );

            return this.toChunk(chunk, preamble);
        } catch (error) {
            if (error instanceof RequestCancelledError) {
                throw error;
            }

            const failure = error instanceof EnhancementError
                ? error
                : new EnhancementError('Chunk context generation failed', {
                    documentId: chunk.documentId,
                    chunkId: chunk.chunkId,
                    cause: error,
                });
            this.logger.error(failure.message, failure.toJSON());
            return this.toChunk(chunk, '');
        }
    }

    private toChunk(chunk: SegmentedChunk, preamble: string): Chunk {
        return {
            ...chunk,
            preamble,
            enhancedText: buildEnhancedText(preamble, chunk.rawText),
            sourceLanguage: this.config.indexLanguage,
            enhancementPending: preamble === '',
        };
    }

    private async identifyTitle(document: SourceDocument, signal?: AbortSignal): Promise<string> {
        const fallback = document.sourceFile ?? document.id;
        const firstPage = document.pages.find((page) => page.text.trim().length > 0);
        if (!firstPage) {
            return fallback;
        }

        try {
            const title = await this.retryPolicy.execute(
                'identifyTitle',
                (attemptSignal) => this.llm.identifyTitle(firstPage.text, { signal: attemptSignal }),
                { signal }
            );
            return title.trim() || fallback;
        } catch (error) {
            if (error instanceof RequestCancelledError) {
                throw error;
            }
            this.logger.warn('Title identification failed, using source name', {
                documentId: document.id,
                error: describeError(error),
            });
            return fallback;
        }
    }
}
