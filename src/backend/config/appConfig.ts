/**
 * Application Configuration
 *
 * Read once from the environment at startup, validated, then frozen and
 * handed to each component at construction. Components never read
 * process.env themselves.
 */

import * as path from 'path';
import { isLanguageCode, LanguageCode } from '../../shared/types';
import { ConfigError } from '../errors';
import { isLogLevel, LogLevel } from '../utils/logger';
import { DEFAULT_RETRY_CONFIG, RetryPolicy, RetryPolicyConfig } from '../utils/retryPolicy';
import { ContextEnhancerConfig } from '../services/contextEnhancer';
import { SegmenterConfig } from '../services/documentSegmenter';
import { IngestionConfig } from '../services/ingestionPipeline';
import { LanguageDetectorConfig } from '../services/languageDetector';
import { RetrieverConfig } from '../services/retriever';

export type VectorBackend = 'memory' | 'qdrant';

export type Environment = Record<string, string | undefined>;

export type DeepReadonly<T> = T extends (infer U)[]
    ? readonly DeepReadonly<U>[]
    : T extends object
      ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
      : T;

export interface AppConfigShape {
    server: {
        port: number;
        /** Deadline for one /api/ask request */
        requestTimeoutMs: number;
        uploadLimitBytes: number;
    };
    logLevel: LogLevel;
    ollama: {
        baseUrl: string;
        generationModel: string;
        embeddingModel: string;
        embeddingDimension: number;
    };
    vectorIndex: {
        backend: VectorBackend;
        url: string;
        collection: string;
        apiKey?: string;
    };
    /** Language vectors are computed and searched in */
    indexLanguage: LanguageCode;
    segmentation: SegmenterConfig;
    enhancement: ContextEnhancerConfig;
    detection: LanguageDetectorConfig;
    retrieval: RetrieverConfig;
    synthesis: {
        historyWindow: number;
        translateContext: boolean;
    };
    session: {
        maxTurns: number;
        ttlMs: number;
        storagePath?: string;
    };
    documents: {
        storagePath?: string;
    };
    ingestion: IngestionConfig;
    retry: {
        llm: RetryPolicyConfig;
        translation: RetryPolicyConfig;
        embedding: RetryPolicyConfig;
        vectorIndex: RetryPolicyConfig;
    };
}

export type AppConfig = DeepReadonly<AppConfigShape>;

function readString(env: Environment, name: string, fallback: string): string {
    const value = env[name]?.trim();
    return value ? value : fallback;
}

function readOptional(env: Environment, name: string): string | undefined {
    const value = env[name]?.trim();
    return value ? value : undefined;
}

function readNumber(
    env: Environment,
    name: string,
    fallback: number,
    bounds: { min?: number; max?: number; integer?: boolean } = {}
): number {
    const raw = readOptional(env, name);
    if (raw === undefined) {
        return fallback;
    }

    const value = Number(raw);
    if (!Number.isFinite(value) || (bounds.integer && !Number.isInteger(value))) {
        throw new ConfigError(`${name} must be ${bounds.integer ? 'an integer' : 'a number'}, got "${raw}"`);
    }
    if (bounds.min !== undefined && value < bounds.min) {
        throw new ConfigError(`${name} must be at least ${bounds.min}, got ${value}`);
    }
    if (bounds.max !== undefined && value > bounds.max) {
        throw new ConfigError(`${name} must be at most ${bounds.max}, got ${value}`);
    }
    return value;
}

function readInteger(env: Environment, name: string, fallback: number, min = 0, max?: number): number {
    return readNumber(env, name, fallback, { min, max, integer: true });
}

function readBoolean(env: Environment, name: string, fallback: boolean): boolean {
    const raw = readOptional(env, name)?.toLowerCase();
    if (raw === undefined) {
        return fallback;
    }
    if (['true', '1', 'yes', 'on'].includes(raw)) {
        return true;
    }
    if (['false', '0', 'no', 'off'].includes(raw)) {
        return false;
    }
    throw new ConfigError(`${name} must be a boolean, got "${raw}"`);
}

function readChoice<T extends string>(
    env: Environment,
    name: string,
    isChoice: (value: string) => value is T,
    fallback: T
): T {
    const raw = readOptional(env, name)?.toLowerCase();
    if (raw === undefined) {
        return fallback;
    }
    if (!isChoice(raw)) {
        throw new ConfigError(`${name} has unsupported value "${raw}"`);
    }
    return raw;
}

function isVectorBackend(value: string): value is VectorBackend {
    return value === 'memory' || value === 'qdrant';
}

function retryConfig(env: Environment, timeoutVariable: string, timeoutFallback: number): RetryPolicyConfig {
    return {
        ...DEFAULT_RETRY_CONFIG,
        maxAttempts: readInteger(env, 'RETRY_MAX_ATTEMPTS', DEFAULT_RETRY_CONFIG.maxAttempts, 1, 10),
        baseDelayMs: readInteger(env, 'RETRY_BASE_DELAY_MS', DEFAULT_RETRY_CONFIG.baseDelayMs),
        timeoutMs: readInteger(env, timeoutVariable, timeoutFallback, 1),
    };
}

/**
 * Freezes an object graph in place.
 */
export function deepFreeze<T extends object>(value: T): T {
    for (const key of Object.keys(value)) {
        const child: unknown = Reflect.get(value, key);
        if (typeof child === 'object' && child !== null && !Object.isFrozen(child)) {
            deepFreeze(child);
        }
    }
    Object.freeze(value);
    return value;
}

function validate(config: AppConfigShape): void {
    const { segmentation, server, retry } = config;

    if (segmentation.chunkOverlap >= segmentation.chunkSize) {
        throw new ConfigError(
            `CHUNK_OVERLAP (${segmentation.chunkOverlap}) must be smaller than CHUNK_SIZE (${segmentation.chunkSize})`
        );
    }
    if (segmentation.minChunkSize > segmentation.chunkSize) {
        throw new ConfigError(
            `MIN_CHUNK_SIZE (${segmentation.minChunkSize}) cannot exceed CHUNK_SIZE (${segmentation.chunkSize})`
        );
    }

    for (const [collaborator, policy] of Object.entries(retry)) {
        if (policy.timeoutMs >= server.requestTimeoutMs) {
            throw new ConfigError(
                `${collaborator} timeout (${policy.timeoutMs}ms) must be shorter than ` +
                    `REQUEST_TIMEOUT_MS (${server.requestTimeoutMs}ms)`
            );
        }
    }

    // A failing retrieval path must still leave time for the "unavailable" answer.
    const retrievalBudgetMs =
        new RetryPolicy(retry.translation).worstCaseMs() +
        new RetryPolicy(retry.embedding).worstCaseMs() +
        // index search, then the follow-up carry-over lookup
        2 * new RetryPolicy(retry.vectorIndex).worstCaseMs();
    if (retrievalBudgetMs >= server.requestTimeoutMs) {
        throw new ConfigError(
            `Retries on the retrieval path can take ${retrievalBudgetMs}ms, which must be shorter than ` +
                `REQUEST_TIMEOUT_MS (${server.requestTimeoutMs}ms)`
        );
    }
}

/**
 * Builds the application configuration from environment variables.
 *
 * @throws ConfigError on malformed or inconsistent values
 */
export function loadConfig(env: Environment = process.env): AppConfig {
    const indexLanguage = readChoice(env, 'INDEX_LANGUAGE', isLanguageCode, 'en');
    const dataDir = readOptional(env, 'DATA_DIR');
    const llmTimeoutMs = readInteger(env, 'LLM_TIMEOUT_MS', 60000, 1);

    const config: AppConfigShape = {
        server: {
            port: readInteger(env, 'PORT', 3001, 0, 65535),
            requestTimeoutMs: readInteger(env, 'REQUEST_TIMEOUT_MS', 120000, 1),
            uploadLimitBytes: readInteger(env, 'UPLOAD_LIMIT_MB', 20, 1) * 1024 * 1024,
        },
        logLevel: readChoice(env, 'LOG_LEVEL', isLogLevel, 'info'),
        ollama: {
            baseUrl: readString(env, 'OLLAMA_BASE_URL', 'http://localhost:11434'),
            generationModel: readString(env, 'OLLAMA_MODEL', 'llama3.1'),
            embeddingModel: readString(env, 'OLLAMA_EMBEDDING_MODEL', 'nomic-embed-text'),
            embeddingDimension: readInteger(env, 'EMBEDDING_DIMENSION', 768, 1),
        },
        vectorIndex: {
            backend: readChoice(env, 'VECTOR_BACKEND', isVectorBackend, 'memory'),
            url: readString(env, 'QDRANT_URL', 'http://localhost:6333'),
            collection: readString(env, 'QDRANT_COLLECTION', 'regulatory_chunks'),
            apiKey: readOptional(env, 'QDRANT_API_KEY'),
        },
        indexLanguage,
        segmentation: {
            chunkSize: readInteger(env, 'CHUNK_SIZE', 1000, 1),
            chunkOverlap: readInteger(env, 'CHUNK_OVERLAP', 200),
            minChunkSize: readInteger(env, 'MIN_CHUNK_SIZE', 100),
            minDocumentLength: readInteger(env, 'MIN_DOCUMENT_LENGTH', 20),
        },
        enhancement: {
            maxPreambleLength: readInteger(env, 'MAX_PREAMBLE_LENGTH', 300, 1),
            summaryInputChars: readInteger(env, 'SUMMARY_INPUT_CHARS', 12000, 1),
            indexLanguage,
        },
        detection: {
            confidenceThreshold: readNumber(env, 'DETECTION_CONFIDENCE', 0.6, { min: 0, max: 1 }),
        },
        retrieval: {
            k: readInteger(env, 'TOP_K', 5, 1),
            overfetchFactor: readInteger(env, 'OVERFETCH_FACTOR', 3, 1),
            minScore: readNumber(env, 'MIN_SCORE', 0.3, { min: -1, max: 1 }),
            followUpCarryOver: readInteger(env, 'FOLLOW_UP_CARRY_OVER', 2),
        },
        synthesis: {
            historyWindow: readInteger(env, 'HISTORY_WINDOW', 3),
            translateContext: readBoolean(env, 'TRANSLATE_CONTEXT', false),
        },
        session: {
            maxTurns: readInteger(env, 'MAX_TURNS', 20, 1),
            ttlMs: readNumber(env, 'SESSION_TTL_MINUTES', 30, { min: 1 }) * 60 * 1000,
            storagePath: readOptional(env, 'SESSION_DIR') ?? (dataDir ? path.join(dataDir, 'sessions') : undefined),
        },
        documents: {
            storagePath: dataDir ? path.join(dataDir, 'documents') : undefined,
        },
        ingestion: {
            maxConcurrentDocuments: readInteger(env, 'MAX_CONCURRENT_DOCUMENTS', 2, 1),
            maxConcurrentChunks: readInteger(env, 'MAX_CONCURRENT_CHUNKS', 4, 1),
        },
        retry: {
            llm: retryConfig(env, 'LLM_TIMEOUT_MS', llmTimeoutMs),
            translation: retryConfig(env, 'TRANSLATION_TIMEOUT_MS', Math.min(llmTimeoutMs, 15000)),
            embedding: retryConfig(env, 'EMBEDDING_TIMEOUT_MS', 10000),
            vectorIndex: retryConfig(env, 'VECTOR_INDEX_TIMEOUT_MS', 5000),
        },
    };

    validate(config);
    return deepFreeze(config);
}
