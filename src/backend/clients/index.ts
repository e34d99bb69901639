/**
 * External service clients
 *
 * - OllamaClient: HTTP client for a local Ollama instance
 * - OllamaLanguageModel / OllamaTranslator / OllamaEmbeddingProvider:
 *   the pipeline's collaborator interfaces on top of it
 * - QdrantVectorIndex: vector index backed by Qdrant
 */

export {
    OllamaClient,
    createOllamaClient,
    isRetryableOllamaError,
    OllamaError,
    OllamaErrorCode,
    DEFAULT_OLLAMA_CONFIG,
    type IOllamaClient,
    type OllamaClientConfig,
    type GenerationOptions,
} from './ollamaClient';

export {
    OllamaLanguageModel,
    OllamaTranslator,
    OllamaEmbeddingProvider,
    DEFAULT_LANGUAGE_MODEL_CONFIG,
    type OllamaLanguageModelConfig,
} from './ollamaLanguageModel';

export {
    QdrantVectorIndex,
    DEFAULT_QDRANT_CONFIG,
    parsePayload,
    type QdrantIndexConfig,
} from './qdrantVectorIndex';

export type {
    CallOptions,
    EmbeddingProvider,
    LanguageModel,
    RenderedPrompt,
    Translator,
    VectorIndex,
} from './types';
