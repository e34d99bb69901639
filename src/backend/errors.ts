/**
 * Pipeline Errors
 *
 * Every failure the pipeline surfaces carries the stage it happened in and,
 * where it applies, the document and chunk involved, so operators can find
 * the failing item without reading stack traces.
 *
 * Only transient collaborator failures are retried (see RetryPolicy);
 * everything here is what remains after retries are exhausted or when the
 * input itself is invalid.
 */

export type PipelineStage =
    | 'extraction'
    | 'segmentation'
    | 'summary'
    | 'enhancement'
    | 'embedding'
    | 'indexing'
    | 'detection'
    | 'translation'
    | 'retrieval'
    | 'synthesis'
    | 'session';

export interface PipelineErrorDetails {
    documentId?: string;
    chunkId?: string;
    cause?: unknown;
}

export class PipelineError extends Error {
    readonly stage: PipelineStage;
    readonly documentId?: string;
    readonly chunkId?: string;

    constructor(message: string, stage: PipelineStage, details: PipelineErrorDetails = {}) {
        super(message, { cause: details.cause });
        this.name = 'PipelineError';
        this.stage = stage;
        this.documentId = details.documentId;
        this.chunkId = details.chunkId;
    }

    /**
     * Flat representation for log context and batch reports.
     */
    toJSON(): Record<string, string | undefined> {
        return {
            name: this.name,
            message: this.message,
            stage: this.stage,
            documentId: this.documentId,
            chunkId: this.chunkId,
            cause: this.cause instanceof Error ? this.cause.message : undefined,
        };
    }
}

/** Empty or too-short input, or an unusable segmentation config. Fatal for that document. */
export class SegmentationError extends PipelineError {
    constructor(message: string, details: PipelineErrorDetails = {}) {
        super(message, 'segmentation', details);
        this.name = 'SegmentationError';
    }
}

/** Preamble generation failed; the chunk is kept with an empty preamble. */
export class EnhancementError extends PipelineError {
    constructor(message: string, details: PipelineErrorDetails = {}) {
        super(message, 'enhancement', details);
        this.name = 'EnhancementError';
    }
}

/** Embedding failed after retries, or returned a vector of the wrong dimension. */
export class EmbeddingError extends PipelineError {
    constructor(message: string, details: PipelineErrorDetails = {}) {
        super(message, 'embedding', details);
        this.name = 'EmbeddingError';
    }
}

/** Vector index write/delete failed after retries. Fails the ingestion item. */
export class IndexError extends PipelineError {
    constructor(message: string, details: PipelineErrorDetails = {}) {
        super(message, 'indexing', details);
        this.name = 'IndexError';
    }
}

/** Vector index query failed after retries. The query proceeds without context. */
export class RetrievalError extends PipelineError {
    constructor(message: string, details: PipelineErrorDetails = {}) {
        super(message, 'retrieval', details);
        this.name = 'RetrievalError';
    }
}

/** Answer generation failed. Surfaced to the caller; never an empty answer. */
export class SynthesisError extends PipelineError {
    constructor(message: string, details: PipelineErrorDetails = {}) {
        super(message, 'synthesis', details);
        this.name = 'SynthesisError';
    }
}

/** Detection confidence too low. Non-fatal: the query is treated as index language. */
export class LanguageDetectionAmbiguous extends PipelineError {
    constructor(message: string) {
        super(message, 'detection');
        this.name = 'LanguageDetectionAmbiguous';
    }
}

/**
 * A collaborator call did not answer within its timeout.
 * The remote call may still be running; we only stopped waiting.
 */
export class CollaboratorTimeoutError extends Error {
    constructor(readonly operation: string, readonly timeoutMs: number) {
        super(`${operation} timed out after ${timeoutMs}ms`);
        this.name = 'CollaboratorTimeoutError';
    }
}

/**
 * The caller went away (client disconnect). Nothing is committed.
 */
export class RequestCancelledError extends Error {
    constructor(message = 'Request was cancelled') {
        super(message);
        this.name = 'RequestCancelledError';
    }
}

/**
 * Invalid configuration detected at startup.
 */
export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

/**
 * The question was rejected before any collaborator was called.
 */
export class InvalidQueryError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'InvalidQueryError';
    }
}
