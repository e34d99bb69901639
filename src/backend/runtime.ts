/**
 * Composition root
 *
 * Builds every component from one AppConfig. Collaborators that talk to
 * external services (LLM, translator, embeddings, vector index) can be
 * replaced, which is how tests run the whole pipeline in process.
 */

import { AppConfig } from './config/appConfig';
import { createOllamaClient, isRetryableOllamaError } from './clients/ollamaClient';
import {
    OllamaEmbeddingProvider,
    OllamaLanguageModel,
    OllamaTranslator,
} from './clients/ollamaLanguageModel';
import { QdrantVectorIndex } from './clients/qdrantVectorIndex';
import { EmbeddingProvider, LanguageModel, Translator, VectorIndex } from './clients/types';
import { AnswerSynthesizer } from './services/answerSynthesizer';
import { ContextEnhancer } from './services/contextEnhancer';
import { FileExtractor, TextExtractor } from './services/documentParser';
import { createDocumentSegmenter } from './services/documentSegmenter';
import { createDocumentStorage, IDocumentStorage } from './services/documentStorage';
import { createIngestionPipeline, IngestionPipeline } from './services/ingestionPipeline';
import { LanguageDetector } from './services/languageDetector';
import { LanguageRouter } from './services/languageRouter';
import { createRAGEngine, RAGEngine } from './services/ragEngine';
import { Retriever } from './services/retriever';
import { createSessionManager, SessionManager } from './services/sessionManager';
import { createVectorStore } from './services/vectorStore';
import { ConsoleLogger, Logger } from './utils/logger';
import { RetryPolicy } from './utils/retryPolicy';

export interface RuntimeOverrides {
    logger?: Logger;
    languageModel?: LanguageModel;
    translator?: Translator;
    embedder?: EmbeddingProvider;
    index?: VectorIndex;
    extractor?: TextExtractor;
}

export interface Runtime {
    config: AppConfig;
    logger: Logger;
    languageModel: LanguageModel;
    index: VectorIndex;
    documents: IDocumentStorage;
    sessions: SessionManager;
    ingestion: IngestionPipeline;
    engine: RAGEngine;
}

export function createRuntime(config: AppConfig, overrides: RuntimeOverrides = {}): Runtime {
    const logger = overrides.logger ?? new ConsoleLogger({ level: config.logLevel });
    const { indexLanguage } = config;

    const ollama = createOllamaClient({
        baseUrl: config.ollama.baseUrl,
        defaultModel: config.ollama.generationModel,
        embeddingModel: config.ollama.embeddingModel,
        timeoutMs: config.retry.llm.timeoutMs,
    });

    const languageModel = overrides.languageModel ?? new OllamaLanguageModel(ollama, { contextLanguage: indexLanguage });
    const translator = overrides.translator ?? new OllamaTranslator(ollama);
    const embedder = overrides.embedder ?? new OllamaEmbeddingProvider(ollama, config.ollama.embeddingDimension);
    const index =
        overrides.index ??
        (config.vectorIndex.backend === 'qdrant'
            ? new QdrantVectorIndex(
                  {
                      url: config.vectorIndex.url,
                      apiKey: config.vectorIndex.apiKey,
                      collection: config.vectorIndex.collection,
                      dimension: config.ollama.embeddingDimension,
                  },
                  logger
              )
            : createVectorStore());

    // Ollama errors say whether they are worth retrying; index errors are always retried.
    const llmPolicy = new RetryPolicy(config.retry.llm, isRetryableOllamaError);
    const translationPolicy = new RetryPolicy(config.retry.translation, isRetryableOllamaError);
    const embeddingPolicy = new RetryPolicy(config.retry.embedding, isRetryableOllamaError);
    const indexPolicy = new RetryPolicy(config.retry.vectorIndex);

    const detector = new LanguageDetector(config.detection);
    const router = new LanguageRouter(detector, translator, translationPolicy, { indexLanguage }, logger);

    const documents = createDocumentStorage({ storagePath: config.documents.storagePath }, logger);
    const sessions = createSessionManager(
        {
            maxTurns: config.session.maxTurns,
            ttlMs: config.session.ttlMs,
            storagePath: config.session.storagePath,
        },
        logger
    );

    const ingestion = createIngestionPipeline(
        {
            segmenter: createDocumentSegmenter(config.segmentation),
            enhancer: new ContextEnhancer(languageModel, llmPolicy, config.enhancement, logger),
            embedder,
            index,
            storage: documents,
            extractor: overrides.extractor ?? new FileExtractor(),
            embeddingPolicy,
            indexPolicy,
        },
        config.ingestion,
        logger
    );

    const synthesizer = new AnswerSynthesizer(
        languageModel,
        llmPolicy,
        detector,
        {
            historyWindow: config.synthesis.historyWindow,
            translateContext: config.synthesis.translateContext,
            indexLanguage,
        },
        logger,
        config.synthesis.translateContext ? { translator, retryPolicy: translationPolicy } : undefined
    );

    const engine = createRAGEngine(
        {
            router,
            embedder,
            embeddingPolicy,
            retriever: new Retriever(index, indexPolicy, config.retrieval, logger),
            synthesizer,
            sessions,
        },
        {},
        logger
    );

    return { config, logger, languageModel, index, documents, sessions, ingestion, engine };
}
