/**
 * Ingestion Pipeline
 *
 * extract -> clean/segment -> summarize -> enhance -> embed -> index
 *
 * Re-ingesting a document replaces it: all of its previous vectors are
 * deleted before the new ones are written. Every chunk is embedded before
 * that deletion, so a re-ingestion that fails while embedding leaves the
 * previous version searchable, and its stored record (chunk count,
 * summary, pending chunks) untouched apart from lastError.
 *
 * Chunks whose preamble could not be generated are indexed anyway (raw
 * text only) and remembered; reenhancePending() retries them later.
 */

import {
    Chunk,
    DocumentSummary,
    IndexedVector,
    SourceDocument,
} from '../../shared/types';
import { EmbeddingProvider, VectorIndex } from '../clients/types';
import {
    EmbeddingError,
    IndexError,
    PipelineError,
    PipelineStage,
    RequestCancelledError,
} from '../errors';
import { describeError, Logger, NullLogger } from '../utils/logger';
import { RetryPolicy } from '../utils/retryPolicy';
import { mapWithConcurrency } from '../utils/semaphore';
import { ContextEnhancer } from './contextEnhancer';
import { TextExtractor } from './documentParser';
import { DocumentSegmenter } from './documentSegmenter';
import { IDocumentStorage } from './documentStorage';

export interface IngestionConfig {
    /** Documents processed at once by ingestBatch */
    maxConcurrentDocuments: number;
    /** Chunks enhanced/embedded at once within one document */
    maxConcurrentChunks: number;
}

export const DEFAULT_INGESTION_CONFIG: IngestionConfig = {
    maxConcurrentDocuments: 2,
    maxConcurrentChunks: 4,
};

export interface IngestionDependencies {
    segmenter: DocumentSegmenter;
    enhancer: ContextEnhancer;
    embedder: EmbeddingProvider;
    index: VectorIndex;
    storage: IDocumentStorage;
    extractor: TextExtractor;
    embeddingPolicy: RetryPolicy;
    indexPolicy: RetryPolicy;
}

export interface IngestionReport {
    documentId: string;
    chunkCount: number;
    /** Chunks indexed without a preamble */
    pendingEnhancement: number;
}

export type BatchItemResult =
    | { documentId: string; ok: true; report: IngestionReport }
    | { documentId: string; ok: false; stage: PipelineStage; error: string };

export interface ReenhancementReport {
    documentId: string;
    reenhanced: number;
    stillPending: number;
}

/**
 * Stable document id from a file name, so uploading the same file again
 * replaces the earlier upload.
 */
export function documentIdFromFileName(fileName: string): string {
    const base = fileName.split(/[\\/]/).pop() ?? fileName;
    const slug = base
        .normalize('NFKD')
        .replace(/[\u0300-\u036f]/g, '')
        .toLowerCase()
        .replace(/[^a-z0-9]+/g, '-')
        .replace(/^-+|-+$/g, '');
    return slug || 'document';
}

export class IngestionPipeline {
    private readonly config: IngestionConfig;

    constructor(
        private readonly deps: IngestionDependencies,
        config: Partial<IngestionConfig> = {},
        private readonly logger: Logger = new NullLogger()
    ) {
        this.config = { ...DEFAULT_INGESTION_CONFIG, ...config };
    }

    /**
     * Ingests (or re-ingests) one document.
     *
     * @throws PipelineError subclasses tagged with the failing stage
     */
    async ingestDocument(document: SourceDocument, signal?: AbortSignal): Promise<IngestionReport> {
        const { storage } = this.deps;
        const startedAt = new Date();
        let stage: PipelineStage = 'segmentation';

        // An existing record keeps describing the vectors in the index until the new version commits.
        const previous = await storage.get(document.id);
        if (!previous) {
            await storage.save({
                document,
                status: 'pending',
                chunkCount: 0,
                pendingChunkIds: [],
                ingestedAt: startedAt,
            });
        }
        let previousVectorsDeleted = false;

        try {
            const segmented = this.deps.segmenter.segment(document);

            stage = 'summary';
            const summary = await this.deps.enhancer.summarize(document, segmented.text, signal);

            stage = 'enhancement';
            const chunks = await mapWithConcurrency(segmented.chunks, this.config.maxConcurrentChunks, (chunk) =>
                this.deps.enhancer.enhance(summary, chunk, signal)
            );

            stage = 'embedding';
            const vectors = await this.embedChunks(document, summary, chunks, signal);

            stage = 'indexing';
            await this.deleteVectors(document.id, 'Failed to delete previous vectors', signal);
            previousVectorsDeleted = true;
            await mapWithConcurrency(vectors, this.config.maxConcurrentChunks, (vector) => this.upsert(vector, signal));

            const pendingChunkIds = chunks.filter((chunk) => chunk.enhancementPending).map((chunk) => chunk.chunkId);
            await storage.save({
                document,
                status: 'indexed',
                chunkCount: chunks.length,
                summary,
                pendingChunkIds,
                ingestedAt: startedAt,
                indexedAt: new Date(),
            });

            this.logger.info('Document indexed', {
                documentId: document.id,
                chunks: chunks.length,
                pendingEnhancement: pendingChunkIds.length,
                durationMs: Date.now() - startedAt.getTime(),
            });
            return { documentId: document.id, chunkCount: chunks.length, pendingEnhancement: pendingChunkIds.length };
        } catch (error) {
            const failedStage = error instanceof PipelineError ? error.stage : stage;
            const lastError = { stage: failedStage, message: describeError(error) };

            if (previous && !previousVectorsDeleted) {
                // The previous version is still the one being served.
                await storage.update(document.id, { lastError });
            } else {
                await storage.save({
                    document,
                    status: 'error',
                    chunkCount: 0,
                    pendingChunkIds: [],
                    ingestedAt: startedAt,
                    lastError,
                });
            }
            this.logger.error('Document ingestion failed', {
                documentId: document.id,
                stage: failedStage,
                keptPreviousVersion: previous !== null && !previousVectorsDeleted,
                error: error instanceof PipelineError ? error.toJSON() : describeError(error),
            });
            throw error;
        }
    }

    /**
     * Ingests several documents, at most maxConcurrentDocuments at a time.
     * Failures are reported per item; the batch itself never rejects.
     */
    async ingestBatch(documents: SourceDocument[], signal?: AbortSignal): Promise<BatchItemResult[]> {
        return mapWithConcurrency(
            documents,
            this.config.maxConcurrentDocuments,
            async (document): Promise<BatchItemResult> => {
                try {
                    const report = await this.ingestDocument(document, signal);
                    return { documentId: document.id, ok: true, report };
                } catch (error) {
                    return {
                        documentId: document.id,
                        ok: false,
                        stage: error instanceof PipelineError ? error.stage : 'indexing',
                        error: describeError(error),
                    };
                }
            }
        );
    }

    /**
     * Extracts an uploaded file and ingests it under an id derived from
     * its name.
     */
    async ingestFile(input: Buffer, fileName: string, signal?: AbortSignal): Promise<IngestionReport> {
        const extraction = await this.deps.extractor.extract(input, fileName);
        const documentId = documentIdFromFileName(fileName);

        for (const problem of extraction.errors) {
            this.logger.warn('Extraction problem', { documentId, fileName, problem });
        }

        return this.ingestDocument(
            {
                id: documentId,
                title: extraction.title,
                sourceFile: fileName,
                pages: extraction.pages,
            },
            signal
        );
    }

    /**
     * Retries the preamble of every chunk indexed without one, then
     * re-embeds and upserts only those chunks.
     */
    async reenhancePending(documentId?: string, signal?: AbortSignal): Promise<ReenhancementReport[]> {
        const { storage } = this.deps;
        const records = documentId
            ? [await storage.get(documentId)].flatMap((record) => (record ? [record] : []))
            : await storage.list();

        const reports: ReenhancementReport[] = [];
        for (const record of records) {
            if (record.status !== 'indexed' || record.pendingChunkIds.length === 0) {
                continue;
            }

            const { document } = record;
            const pending = new Set(record.pendingChunkIds);
            const segmented = this.deps.segmenter.segment(document);
            const targets = segmented.chunks.filter((chunk) => pending.has(chunk.chunkId));
            const summary = record.summary ?? (await this.deps.enhancer.summarize(document, segmented.text, signal));

            const chunks = await mapWithConcurrency(targets, this.config.maxConcurrentChunks, (chunk) =>
                this.deps.enhancer.enhance(summary, chunk, signal)
            );
            const enhanced = chunks.filter((chunk) => !chunk.enhancementPending);

            const vectors = await this.embedChunks(document, summary, enhanced, signal);
            for (const vector of vectors) {
                await this.upsert(vector, signal);
            }

            const stillPending = chunks.filter((chunk) => chunk.enhancementPending).map((chunk) => chunk.chunkId);
            await storage.update(document.id, { pendingChunkIds: stillPending });

            this.logger.info('Re-enhanced pending chunks', {
                documentId: document.id,
                reenhanced: enhanced.length,
                stillPending: stillPending.length,
            });
            reports.push({ documentId: document.id, reenhanced: enhanced.length, stillPending: stillPending.length });
        }
        return reports;
    }

    /**
     * Removes a document's vectors and its storage record.
     *
     * @returns true if a record existed
     */
    async removeDocument(documentId: string, signal?: AbortSignal): Promise<boolean> {
        await this.deleteVectors(documentId, 'Failed to delete document vectors', signal);
        return this.deps.storage.delete(documentId);
    }

    private async embedChunks(
        document: SourceDocument,
        summary: DocumentSummary,
        chunks: Chunk[],
        signal?: AbortSignal
    ): Promise<IndexedVector[]> {
        const { embedder, embeddingPolicy } = this.deps;

        return mapWithConcurrency(chunks, this.config.maxConcurrentChunks, async (chunk) => {
            let vector: number[];
            try {
                vector = await embeddingPolicy.execute(
                    'embed',
                    (attemptSignal) => embedder.embed(chunk.enhancedText, { signal: attemptSignal }),
                    { signal }
                );
            } catch (error) {
                if (error instanceof RequestCancelledError) {
                    throw error;
                }
                throw new EmbeddingError('Embedding failed', {
                    documentId: document.id,
                    chunkId: chunk.chunkId,
                    cause: error,
                });
            }

            if (vector.length !== embedder.dimension) {
                throw new EmbeddingError(
                    `Embedding has dimension ${vector.length}, expected ${embedder.dimension}`,
                    { documentId: document.id, chunkId: chunk.chunkId }
                );
            }

            return {
                chunkId: chunk.chunkId,
                vector,
                metadata: {
                    documentId: document.id,
                    documentTitle: summary.title,
                    sourceFile: document.sourceFile,
                    pageNumber: chunk.pageNumber,
                    headingPath: chunk.headingPath,
                    sequence: chunk.sequence,
                    rawText: chunk.rawText,
                    sourceLanguage: chunk.sourceLanguage,
                    enhancementPending: chunk.enhancementPending,
                },
            };
        });
    }

    private async deleteVectors(documentId: string, failureMessage: string, signal?: AbortSignal): Promise<void> {
        try {
            await this.deps.indexPolicy.execute(
                'vectorIndex.deleteByDocument',
                (attemptSignal) => this.deps.index.deleteByDocument(documentId, { signal: attemptSignal }),
                { signal }
            );
        } catch (error) {
            if (error instanceof RequestCancelledError) {
                throw error;
            }
            throw new IndexError(failureMessage, { documentId, cause: error });
        }
    }

    private async upsert(vector: IndexedVector, signal?: AbortSignal): Promise<void> {
        try {
            await this.deps.indexPolicy.execute(
                'vectorIndex.upsert',
                (attemptSignal) => this.deps.index.upsert(vector, { signal: attemptSignal }),
                { signal }
            );
        } catch (error) {
            if (error instanceof RequestCancelledError) {
                throw error;
            }
            throw new IndexError('Failed to upsert vector', {
                documentId: vector.metadata.documentId,
                chunkId: vector.chunkId,
                cause: error,
            });
        }
    }
}

/**
 * Factory function to create an ingestion pipeline.
 */
export function createIngestionPipeline(
    deps: IngestionDependencies,
    config?: Partial<IngestionConfig>,
    logger?: Logger
): IngestionPipeline {
    return new IngestionPipeline(deps, config, logger);
}
