/**
 * Collaborator contracts
 *
 * The pipelines only ever talk to these interfaces. Adapters (Ollama,
 * Qdrant, in-memory) live next to them; tests use in-process fakes.
 */

import {
    DocumentSummary,
    IndexedVector,
    LanguageCode,
    RetrievalFilters,
    VectorMatch,
    VectorRecord,
} from '../../shared/types';

/**
 * Every collaborator call can be cancelled. Adapters pass the signal down
 * to their transport.
 */
export interface CallOptions {
    signal?: AbortSignal;
}

/**
 * A prompt ready to be sent to a completion endpoint.
 */
export interface RenderedPrompt {
    system: string;
    prompt: string;
}

export interface LanguageModel {
    isAvailable(): Promise<boolean>;
    /** Title of a document, from its first page */
    identifyTitle(firstPage: string, options?: CallOptions): Promise<string>;
    /** Main idea of a document, from its leading text */
    summarizeDocument(title: string, text: string, options?: CallOptions): Promise<string>;
    /** Short preamble situating a chunk within its document */
    generateContext(summary: DocumentSummary, chunkText: string, options?: CallOptions): Promise<string>;
    synthesizeAnswer(prompt: RenderedPrompt, options?: CallOptions): Promise<string>;
}

export interface Translator {
    translate(text: string, source: LanguageCode, target: LanguageCode, options?: CallOptions): Promise<string>;
}

export interface EmbeddingProvider {
    /** Length of every vector this provider returns */
    readonly dimension: number;
    embed(text: string, options?: CallOptions): Promise<number[]>;
}

/**
 * Vector index contract. Upsert is idempotent per chunkId.
 */
export interface VectorIndex {
    upsert(entry: IndexedVector, options?: CallOptions): Promise<void>;
    deleteByDocument(documentId: string, options?: CallOptions): Promise<void>;
    /** Matches ordered by descending score */
    query(vector: number[], k: number, filters?: RetrievalFilters, options?: CallOptions): Promise<VectorMatch[]>;
    /** Records for the ids that exist, in the order requested */
    getByIds(ids: string[], options?: CallOptions): Promise<VectorRecord[]>;
    count(documentId?: string): Promise<number>;
}
