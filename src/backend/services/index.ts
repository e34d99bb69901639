/**
 * Backend services
 *
 * Ingestion:
 * - DocumentParser: page-by-page extraction (PDF, Markdown, text)
 * - TextCleaner / DocumentSegmenter: cleaning and structure-aware chunking
 * - ContextEnhancer: document summary and per-chunk preambles
 * - IngestionPipeline: segment, enhance, embed and index documents
 *
 * Querying:
 * - LanguageDetector / LanguageRouter: user language and query translation
 * - Retriever: ranked, deduplicated chunks from the vector index
 * - AnswerSynthesizer: grounded answers with citations
 * - SessionManager: bounded conversation history
 * - RAGEngine: one question, end to end
 */

export {
    validateQuery,
    isFollowUp,
    buildFollowUpQuery,
    MAX_QUESTION_LENGTH,
    FOLLOW_UP_MAX_WORDS,
} from './queryProcessor';

export type { ValidationResult } from './queryProcessor';

export {
    SessionManager,
    createSessionManager,
    isValidSessionId,
    DEFAULT_SESSION_CONFIG,
} from './sessionManager';

export type { SessionManagerConfig } from './sessionManager';

export {
    MarkdownParser,
    PlainTextParser,
    PdfParser,
    FileExtractor,
    getParser,
    detectDocumentType,
} from './documentParser';

export type { DocumentParser, DocumentType, ExtractionResult, TextExtractor } from './documentParser';

export { cleanPages, parseHeading, findRunningHeaders, DEFAULT_CLEANING_OPTIONS } from './textCleaner';

export type { CleaningOptions, Heading } from './textCleaner';

export {
    DocumentSegmenter,
    createDocumentSegmenter,
    chunkIdFor,
    DEFAULT_SEGMENTER_CONFIG,
} from './documentSegmenter';

export type { SegmenterConfig, SegmentedDocument } from './documentSegmenter';

export { ContextEnhancer, DEFAULT_ENHANCER_CONFIG } from './contextEnhancer';

export type { ContextEnhancerConfig } from './contextEnhancer';

export { InMemoryVectorStore, createVectorStore, cosineSimilarity } from './vectorStore';

export { LanguageDetector, DEFAULT_DETECTOR_CONFIG } from './languageDetector';

export type { DetectionResult, LanguageDetectorConfig } from './languageDetector';

export { LanguageRouter, LanguageRoute, RouterStateError, ANSWER_INSTRUCTIONS } from './languageRouter';

export type { AnswerRouting, Detection, RoutedQuery, RouterState } from './languageRouter';

export { Retriever, rankMatches, DEFAULT_RETRIEVER_CONFIG } from './retriever';

export type { RetrieverConfig, RetrieveOptions } from './retriever';

export { AnswerSynthesizer, deriveSources, DEFAULT_SYNTHESIZER_CONFIG } from './answerSynthesizer';

export type { AnswerSynthesizerConfig, SynthesisInput, SynthesizedAnswer } from './answerSynthesizer';

export { NO_INFORMATION_MESSAGES, UNAVAILABLE_MESSAGES } from './promptTemplates';

export {
    IngestionPipeline,
    createIngestionPipeline,
    documentIdFromFileName,
    DEFAULT_INGESTION_CONFIG,
} from './ingestionPipeline';

export type {
    BatchItemResult,
    IngestionConfig,
    IngestionDependencies,
    IngestionReport,
    ReenhancementReport,
} from './ingestionPipeline';

export {
    RAGEngine,
    createRAGEngine,
    DEFAULT_RAG_CONFIG,
} from './ragEngine';

export type { AskInput, AskOptions, IRAGEngine, RAGEngineConfig, RAGEngineDependencies } from './ragEngine';

export {
    DocumentStorage,
    createDocumentStorage,
} from './documentStorage';

export type {
    DocumentRecord,
    DocumentStorageConfig,
    IDocumentStorage,
} from './documentStorage';
