/**
 * Ollama-backed collaborators
 *
 * Thin adapters from the collaborator contracts to IOllamaClient:
 * - OllamaLanguageModel: titles, summaries, chunk context, answers
 * - OllamaTranslator: LLM-based translation
 * - OllamaEmbeddingProvider: embeddings with a declared dimension
 */

import { DocumentSummary, LanguageCode } from '../../shared/types';
import { IOllamaClient } from './ollamaClient';
import { chunkContextPrompt, mainIdeaPrompt, titlePrompt, translationPrompt } from './prompts';
import {
    CallOptions,
    EmbeddingProvider,
    LanguageModel,
    RenderedPrompt,
    Translator,
} from './types';

export interface OllamaLanguageModelConfig {
    /** Language the chunk context is written in (the index language) */
    contextLanguage: LanguageCode;
    /** Temperature for answers; ingestion prompts always run at 0 */
    answerTemperature: number;
}

export const DEFAULT_LANGUAGE_MODEL_CONFIG: OllamaLanguageModelConfig = {
    contextLanguage: 'en',
    answerTemperature: 0.2,
};

export class OllamaLanguageModel implements LanguageModel {
    private readonly config: OllamaLanguageModelConfig;

    constructor(
        private readonly client: IOllamaClient,
        config: Partial<OllamaLanguageModelConfig> = {}
    ) {
        this.config = { ...DEFAULT_LANGUAGE_MODEL_CONFIG, ...config };
    }

    isAvailable(): Promise<boolean> {
        return this.client.isAvailable();
    }

    async identifyTitle(firstPage: string, options: CallOptions = {}): Promise<string> {
        const title = await this.client.generateCompletion(titlePrompt(firstPage), {
            temperature: 0,
            maxTokens: 64,
            signal: options.signal,
        });
        return stripQuotes(title.trim().split('\n')[0] ?? '');
    }

    async summarizeDocument(title: string, text: string, options: CallOptions = {}): Promise<string> {
        const mainIdea = await this.client.generateCompletion(mainIdeaPrompt(title, text), {
            temperature: 0,
            maxTokens: 256,
            signal: options.signal,
        });
        return mainIdea.trim();
    }

    async generateContext(
        summary: DocumentSummary,
        chunkText: string,
        options: CallOptions = {}
    ): Promise<string> {
        const context = await this.client.generateCompletion(
            chunkContextPrompt(summary, chunkText, this.config.contextLanguage),
            { temperature: 0, maxTokens: 128, signal: options.signal }
        );
        return context.trim();
    }

    synthesizeAnswer(prompt: RenderedPrompt, options: CallOptions = {}): Promise<string> {
        return this.client.generateCompletion(prompt.prompt, {
            system: prompt.system,
            temperature: this.config.answerTemperature,
            signal: options.signal,
        });
    }
}

export class OllamaTranslator implements Translator {
    constructor(private readonly client: IOllamaClient) {}

    async translate(
        text: string,
        source: LanguageCode,
        target: LanguageCode,
        options: CallOptions = {}
    ): Promise<string> {
        if (source === target) {
            return text;
        }
        const translated = await this.client.generateCompletion(translationPrompt(text, source, target), {
            temperature: 0,
            signal: options.signal,
        });
        return stripQuotes(translated.trim());
    }
}

export class OllamaEmbeddingProvider implements EmbeddingProvider {
    constructor(
        private readonly client: IOllamaClient,
        readonly dimension: number
    ) {}

    embed(text: string, options: CallOptions = {}): Promise<number[]> {
        return this.client.generateEmbedding(text, options.signal);
    }
}

function stripQuotes(text: string): string {
    return text.replace(/^["'«“]+|["'»”]+$/g, '').trim();
}
