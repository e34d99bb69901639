/**
 * In-process stand-ins for the external collaborators (LLM, translator,
 * embeddings, vector index) shared by the service tests.
 */

import { DocumentSummary, LanguageCode, SourceDocument, VectorMatch } from '../../../shared/types';
import {
    CallOptions,
    EmbeddingProvider,
    LanguageModel,
    RenderedPrompt,
    Translator,
} from '../../clients/types';
import { tokenize } from '../../services/languageDetector';
import { InMemoryVectorStore } from '../../services/vectorStore';

export const FIXED_PREAMBLE = 'This passage belongs to a longer text.';

export class FakeLanguageModel implements LanguageModel {
    available = true;
    readonly prompts: RenderedPrompt[] = [];
    contextCalls = 0;
    /** Throws from generateContext while it returns true */
    failContext: (chunkText: string) => boolean = () => false;
    answer: (prompt: RenderedPrompt) => string = () => 'Answer grounded in the context.';

    async isAvailable(): Promise<boolean> {
        return this.available;
    }

    async identifyTitle(firstPage: string): Promise<string> {
        return firstPage.split('\n')[0] ?? '';
    }

    async summarizeDocument(title: string): Promise<string> {
        return `Rules set out by ${title}`;
    }

    async generateContext(_summary: DocumentSummary, chunkText: string): Promise<string> {
        this.contextCalls++;
        if (this.failContext(chunkText)) {
            throw new Error('context generation unavailable');
        }
        return FIXED_PREAMBLE;
    }

    async synthesizeAnswer(prompt: RenderedPrompt): Promise<string> {
        this.prompts.push(prompt);
        return this.answer(prompt);
    }
}

export interface TranslationCall {
    text: string;
    source: LanguageCode;
    target: LanguageCode;
}

/**
 * Looks translations up in a table; unknown text comes back unchanged.
 */
export class FakeTranslator implements Translator {
    readonly calls: TranslationCall[] = [];
    fail = false;

    constructor(private readonly table: Record<string, string> = {}) {}

    async translate(text: string, source: LanguageCode, target: LanguageCode): Promise<string> {
        this.calls.push({ text, source, target });
        if (this.fail) {
            throw new Error('translation service unavailable');
        }
        return this.table[text] ?? text;
    }
}

/**
 * Bag-of-words embeddings over a fixed vocabulary: component i counts
 * occurrences of vocabulary word i. Similar wording, similar vectors.
 */
export class KeywordEmbedder implements EmbeddingProvider {
    readonly texts: string[] = [];
    fail = false;

    constructor(private readonly vocabulary: readonly string[]) {}

    get dimension(): number {
        return this.vocabulary.length;
    }

    async embed(text: string, _options?: CallOptions): Promise<number[]> {
        this.texts.push(text);
        if (this.fail) {
            throw new Error('embedding service unavailable');
        }
        const tokens = tokenize(text);
        return this.vocabulary.map((word) => tokens.filter((token) => token === word).length);
    }
}

/**
 * Memory index whose search never answers, as a hung remote index would.
 */
export class HangingQueryIndex extends InMemoryVectorStore {
    queries = 0;

    query(): Promise<VectorMatch[]> {
        this.queries++;
        return new Promise<VectorMatch[]>(() => undefined);
    }
}

export const REGULATION_VOCABULARY = [
    'safety',
    'requirements',
    'inspection',
    'inspections',
    'pressure',
    'vessel',
    'penalties',
    'fines',
    'license',
    'scope',
    'definitions',
    'operators',
    'valves',
    'months',
] as const;

/**
 * Three pages, five articles; each article becomes one chunk.
 * Article 3 (page 2) holds the safety requirements.
 */
export function pressureRegulation(id = 'pressure-regulation'): SourceDocument {
    return {
        id,
        title: 'Pressure Equipment Regulation',
        sourceFile: 'pressure-regulation.pdf',
        pages: [
            {
                pageNumber: 1,
                text:
                    'ARTICLE 1 Scope\n' +
                    'This regulation applies to every industrial facility operating a pressure vessel.\n\n' +
                    'ARTICLE 2 Definitions\n' +
                    'A pressure vessel is any closed container designed to hold gases above ambient pressure.',
            },
            {
                pageNumber: 2,
                text:
                    'ARTICLE 3 Safety requirements\n' +
                    'Operators must meet the following safety requirements: annual inspection, certified relief valves and trained staff.\n\n' +
                    'ARTICLE 4 Inspections\n' +
                    'Inspections are carried out by an accredited body every twelve months.',
            },
            {
                pageNumber: 3,
                text:
                    'ARTICLE 5 Penalties\n' +
                    'Failure to comply with this regulation leads to fines and suspension of the operating license.',
            },
        ],
    };
}

/**
 * Environment for loadConfig with small chunks and fast retries.
 */
export const TEST_ENV: Record<string, string> = {
    MIN_CHUNK_SIZE: '20',
    RETRY_BASE_DELAY_MS: '1',
    RETRY_MAX_ATTEMPTS: '2',
    LLM_TIMEOUT_MS: '2000',
    TRANSLATION_TIMEOUT_MS: '2000',
    EMBEDDING_TIMEOUT_MS: '2000',
    VECTOR_INDEX_TIMEOUT_MS: '2000',
    REQUEST_TIMEOUT_MS: '20000',
};
