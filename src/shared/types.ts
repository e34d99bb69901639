/**
 * Shared type definitions for the Regulatory Assistant
 *
 * These types define the contract between the ingestion pipeline, the query
 * pipeline and the HTTP surface. They're organized by domain:
 * - Languages: the closed set the router understands
 * - Documents: source documents and their chunks
 * - Vector Index: what gets stored and searched
 * - Sessions: conversation history
 * - API: request/response shapes
 */

// ============================================================================
// Language Types
// ============================================================================

/**
 * Languages the router can detect and answer in.
 * The index itself is fixed to exactly one of them.
 */
export type LanguageCode = 'en' | 'es' | 'pt';

export const SUPPORTED_LANGUAGES: readonly LanguageCode[] = ['en', 'es', 'pt'];

export function isLanguageCode(value: string): value is LanguageCode {
    return SUPPORTED_LANGUAGES.some((code) => code === value);
}

/**
 * English names, used inside prompts ("answer in Spanish").
 */
export const LANGUAGE_NAMES: Record<LanguageCode, string> = {
    en: 'English',
    es: 'Spanish',
    pt: 'Portuguese',
};

// ============================================================================
// Document Types
// ============================================================================

/**
 * One page of extracted text. Page numbers are 1-based.
 */
export interface DocumentPage {
    pageNumber: number;
    text: string;
}

/**
 * A document as handed to the ingestion pipeline.
 * Immutable once ingested; re-ingesting the same id replaces it wholesale.
 */
export interface SourceDocument {
    id: string;
    title?: string;
    sourceFile?: string;
    pages: DocumentPage[];
}

/**
 * Processing status for ingested documents.
 * - pending: Stored but not yet indexed
 * - indexed: Successfully processed and searchable
 * - error: Processing failed
 */
export type DocumentStatus = 'pending' | 'indexed' | 'error';

/**
 * Document-level summary used to situate every chunk.
 */
export interface DocumentSummary {
    title: string;
    mainIdea: string;
}

/**
 * A bounded span of a document before contextual enhancement.
 */
export interface SegmentedChunk {
    chunkId: string;
    documentId: string;
    sequence: number;
    rawText: string;
    startOffset: number;
    endOffset: number;
    pageNumber: number;
    headingPath: string[];
}

/**
 * A chunk ready for embedding.
 * enhancedText is what gets embedded; rawText is what gets quoted.
 */
export interface Chunk extends SegmentedChunk {
    preamble: string;
    enhancedText: string;
    sourceLanguage: LanguageCode;
    enhancementPending: boolean;
}

// ============================================================================
// Vector Index Types
// ============================================================================

/**
 * Payload stored alongside each vector, used for filtering and display.
 */
export interface VectorMetadata {
    documentId: string;
    documentTitle: string;
    sourceFile?: string;
    pageNumber: number;
    headingPath: string[];
    sequence: number;
    rawText: string;
    sourceLanguage: LanguageCode;
    enhancementPending: boolean;
}

/**
 * Exactly one per chunk.
 */
export interface IndexedVector {
    chunkId: string;
    vector: number[];
    metadata: VectorMetadata;
}

/**
 * A stored vector's identity and payload, without the vector itself.
 */
export interface VectorRecord {
    chunkId: string;
    metadata: VectorMetadata;
}

export interface VectorMatch extends VectorRecord {
    score: number;
}

export interface RetrievalFilters {
    /** Restrict the search to these documents */
    documentIds?: string[];
}

/**
 * search: found by similarity for this question.
 * history: carried over from the previous turn of a follow-up.
 */
export type RetrievalOrigin = 'search' | 'history';

export interface RetrievedChunk extends VectorMatch {
    origin: RetrievalOrigin;
}

/**
 * Ranked, deduplicated context for one query. Never persisted.
 */
export interface RetrievalResult {
    entries: RetrievedChunk[];
}

// ============================================================================
// Session Types
// ============================================================================

/**
 * One completed question/answer exchange.
 */
export interface SessionTurn {
    question: string;
    answer: string;
    /** Text the index was searched with, follow-up context included */
    searchQuery: string;
    /** This question alone, in the index language */
    routedQuery: string;
    detectedLanguage: LanguageCode;
    retrievedChunkIds: string[];
    timestamp: Date;
}

export interface QuerySession {
    id: string;
    createdAt: Date;
    lastActiveAt: Date;
    turns: SessionTurn[];
}

/**
 * Session format for JSON persistence.
 * Dates are stored as ISO strings.
 */
export interface StoredSession {
    id: string;
    createdAt: string; // ISO date
    lastActiveAt: string; // ISO date
    turns: StoredTurn[];
}

export interface StoredTurn {
    question: string;
    answer: string;
    searchQuery: string;
    routedQuery: string;
    detectedLanguage: LanguageCode;
    retrievedChunkIds: string[];
    timestamp: string; // ISO date
}

// ============================================================================
// Answer Types
// ============================================================================

/**
 * Citation derived from retrieval metadata, never from model text.
 */
export interface SourceCitation {
    document: string;
    page: number;
}

/**
 * answered: grounded answer from retrieved context
 * no_relevant_information: retrieval worked but found nothing usable
 * retrieval_unavailable: the index or embedding service could not be reached
 */
export type AnswerOutcome = 'answered' | 'no_relevant_information' | 'retrieval_unavailable';

export interface AskResult {
    sessionId: string;
    answer: string;
    sources: SourceCitation[];
    detectedLanguage: LanguageCode;
    searchQuery: string;
    outcome: AnswerOutcome;
}

// ============================================================================
// API Types
// ============================================================================

/**
 * Request body for POST /api/ask
 */
export interface AskRequest {
    question: string;
    session_id?: string;
    document_ids?: string[];
}

/**
 * Response body for POST /api/ask
 */
export interface AskResponse {
    answer: string;
    sources: SourceCitation[];
    detected_language: LanguageCode;
    outcome: AnswerOutcome;
    session_id: string;
}

/**
 * Response body for GET /api/health
 */
export interface HealthResponse {
    status: 'ok' | 'error';
    llm: boolean;
}

/**
 * Response body for POST /api/documents
 */
export interface DocumentUploadResponse {
    documentId: string;
    status: DocumentStatus;
    chunkCount: number;
    pendingEnhancement: number;
}
