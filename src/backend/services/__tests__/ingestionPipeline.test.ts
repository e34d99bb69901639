/**
 * Ingestion Pipeline Tests
 *
 * Runs the real segmenter, enhancer and memory index against in-process
 * language model and embedding fakes.
 */

import { IndexedVector } from '../../../shared/types';
import { EmbeddingError, IndexError, PipelineError } from '../../errors';
import { RetryPolicy } from '../../utils/retryPolicy';
import {
    FakeLanguageModel,
    FIXED_PREAMBLE,
    KeywordEmbedder,
    pressureRegulation,
    REGULATION_VOCABULARY,
} from '../../__tests__/helpers/fakes';
import { ContextEnhancer } from '../contextEnhancer';
import { FileExtractor } from '../documentParser';
import { chunkIdFor, createDocumentSegmenter } from '../documentSegmenter';
import { createDocumentStorage, DocumentStorage } from '../documentStorage';
import { createIngestionPipeline, documentIdFromFileName, IngestionPipeline } from '../ingestionPipeline';
import { InMemoryVectorStore } from '../vectorStore';

class RejectingUpsertIndex extends InMemoryVectorStore {
    rejectUpserts = false;

    async upsert(entry: IndexedVector): Promise<void> {
        if (this.rejectUpserts) {
            throw new Error('index is read-only');
        }
        return super.upsert(entry);
    }
}

class ShortEmbedder extends KeywordEmbedder {
    get dimension(): number {
        return 3;
    }
}

describe('IngestionPipeline', () => {
    let llm: FakeLanguageModel;
    let embedder: KeywordEmbedder;
    let index: InMemoryVectorStore;
    let storage: DocumentStorage;
    let pipeline: IngestionPipeline;

    const build = (): IngestionPipeline => {
        const policy = new RetryPolicy({ maxAttempts: 2, baseDelayMs: 1, timeoutMs: 0 });
        return createIngestionPipeline({
            segmenter: createDocumentSegmenter({ minChunkSize: 20 }),
            enhancer: new ContextEnhancer(llm, policy),
            embedder,
            index,
            storage,
            extractor: new FileExtractor(),
            embeddingPolicy: policy,
            indexPolicy: policy,
        });
    };

    beforeEach(() => {
        llm = new FakeLanguageModel();
        embedder = new KeywordEmbedder(REGULATION_VOCABULARY);
        index = new InMemoryVectorStore();
        storage = createDocumentStorage();
        pipeline = build();
    });

    describe('ingestDocument', () => {
        it('should index one vector per chunk and mark the document indexed', async () => {
            const report = await pipeline.ingestDocument(pressureRegulation());

            expect(report).toEqual({ documentId: 'pressure-regulation', chunkCount: 5, pendingEnhancement: 0 });
            expect(await index.count('pressure-regulation')).toBe(5);

            const record = await storage.get('pressure-regulation');
            expect(record?.status).toBe('indexed');
            expect(record?.summary).toEqual({
                title: 'Pressure Equipment Regulation',
                mainIdea: 'Rules set out by Pressure Equipment Regulation',
            });
        });

        it('should embed the preamble together with the raw text', async () => {
            await pipeline.ingestDocument(pressureRegulation());

            expect(embedder.texts).toHaveLength(5);
            expect(embedder.texts.every((text) => text.startsWith(`${FIXED_PREAMBLE}\n\n`))).toBe(true);
        });

        it('should store page, heading and raw text in the vector metadata', async () => {
            await pipeline.ingestDocument(pressureRegulation());

            const [record] = await index.getByIds([chunkIdFor('pressure-regulation', 2)]);
            expect(record?.metadata).toMatchObject({
                documentId: 'pressure-regulation',
                documentTitle: 'Pressure Equipment Regulation',
                sourceFile: 'pressure-regulation.pdf',
                pageNumber: 2,
                headingPath: ['ARTICLE 3 Safety requirements'],
                sequence: 2,
                sourceLanguage: 'en',
                enhancementPending: false,
            });
            expect(record?.metadata.rawText.startsWith('ARTICLE 3 Safety requirements')).toBe(true);
            expect(record?.metadata.rawText).not.toContain(FIXED_PREAMBLE);
        });

        it('should replace previous vectors on re-ingestion', async () => {
            await pipeline.ingestDocument(pressureRegulation());
            await pipeline.ingestDocument(pressureRegulation());
            expect(await index.count()).toBe(5);

            const shortened = pressureRegulation();
            shortened.pages = shortened.pages.slice(0, 1);
            await pipeline.ingestDocument(shortened);

            expect(await index.count('pressure-regulation')).toBe(2);
            expect(await index.getByIds([chunkIdFor('pressure-regulation', 4)])).toEqual([]);
        });

        it('should index chunks whose preamble failed and remember them', async () => {
            llm.failContext = (chunkText) => chunkText.includes('ARTICLE 5');

            const report = await pipeline.ingestDocument(pressureRegulation());

            expect(report.pendingEnhancement).toBe(1);
            expect(await index.count()).toBe(5);
            expect((await storage.get('pressure-regulation'))?.pendingChunkIds).toEqual([
                chunkIdFor('pressure-regulation', 4),
            ]);

            const [record] = await index.getByIds([chunkIdFor('pressure-regulation', 4)]);
            expect(record?.metadata.enhancementPending).toBe(true);
        });

        it('should fail with EmbeddingError and keep the previous version searchable', async () => {
            await pipeline.ingestDocument(pressureRegulation());
            embedder.fail = true;

            await expect(pipeline.ingestDocument(pressureRegulation())).rejects.toBeInstanceOf(EmbeddingError);

            expect(await index.count('pressure-regulation')).toBe(5);
            const record = await storage.get('pressure-regulation');
            expect(record?.status).toBe('indexed');
            expect(record?.chunkCount).toBe(5);
            expect(record?.lastError?.stage).toBe('embedding');
        });

        it('should keep pending chunks of the previous version after a failed re-ingestion', async () => {
            llm.failContext = (chunkText) => chunkText.includes('ARTICLE 5');
            await pipeline.ingestDocument(pressureRegulation());
            embedder.fail = true;

            await expect(pipeline.ingestDocument(pressureRegulation())).rejects.toBeInstanceOf(EmbeddingError);

            const record = await storage.get('pressure-regulation');
            expect(record).toMatchObject({
                status: 'indexed',
                chunkCount: 5,
                summary: {
                    title: 'Pressure Equipment Regulation',
                    mainIdea: 'Rules set out by Pressure Equipment Regulation',
                },
                pendingChunkIds: [chunkIdFor('pressure-regulation', 4)],
            });

            embedder.fail = false;
            llm.failContext = () => false;
            expect(await pipeline.reenhancePending()).toEqual([
                { documentId: 'pressure-regulation', reenhanced: 1, stillPending: 0 },
            ]);
        });

        it('should mark the document failed once its previous vectors are gone', async () => {
            const rejecting = new RejectingUpsertIndex();
            index = rejecting;
            pipeline = build();
            await pipeline.ingestDocument(pressureRegulation());
            rejecting.rejectUpserts = true;

            await expect(pipeline.ingestDocument(pressureRegulation())).rejects.toBeInstanceOf(IndexError);

            expect(await index.count('pressure-regulation')).toBe(0);
            expect(await storage.get('pressure-regulation')).toMatchObject({
                status: 'error',
                chunkCount: 0,
                pendingChunkIds: [],
                lastError: { stage: 'indexing' },
            });
        });

        it('should record a failed first ingestion as an error', async () => {
            await expect(
                pipeline.ingestDocument({ id: 'blank', pages: [{ pageNumber: 1, text: '   ' }] })
            ).rejects.toBeInstanceOf(PipelineError);

            expect(await storage.get('blank')).toMatchObject({
                status: 'error',
                chunkCount: 0,
                lastError: { stage: 'segmentation', message: 'SegmentationError: Document has no text' },
            });
        });

        it('should reject vectors of the wrong dimension', async () => {
            embedder = new ShortEmbedder(REGULATION_VOCABULARY);
            pipeline = build();

            await expect(pipeline.ingestDocument(pressureRegulation())).rejects.toThrow(
                'Embedding has dimension 14, expected 3'
            );
        });
    });

    describe('reenhancePending', () => {
        it('should fill in missing preambles once the model recovers', async () => {
            llm.failContext = (chunkText) => chunkText.includes('ARTICLE 5');
            await pipeline.ingestDocument(pressureRegulation());

            llm.failContext = () => false;
            const reports = await pipeline.reenhancePending();

            expect(reports).toEqual([{ documentId: 'pressure-regulation', reenhanced: 1, stillPending: 0 }]);
            expect((await storage.get('pressure-regulation'))?.pendingChunkIds).toEqual([]);
            const [record] = await index.getByIds([chunkIdFor('pressure-regulation', 4)]);
            expect(record?.metadata.enhancementPending).toBe(false);
            expect(await index.count()).toBe(5);
        });

        it('should skip documents with nothing pending', async () => {
            await pipeline.ingestDocument(pressureRegulation());

            expect(await pipeline.reenhancePending('pressure-regulation')).toEqual([]);
        });
    });

    describe('ingestBatch', () => {
        it('should report failures per document without stopping the batch', async () => {
            const results = await pipeline.ingestBatch([
                pressureRegulation('first'),
                { id: 'blank', pages: [{ pageNumber: 1, text: '   ' }] },
                pressureRegulation('second'),
            ]);

            expect(results.map((result) => [result.documentId, result.ok])).toEqual([
                ['first', true],
                ['blank', false],
                ['second', true],
            ]);
            expect(results[1]).toMatchObject({ stage: 'segmentation', error: 'SegmentationError: Document has no text' });
            expect(await index.count()).toBe(10);
        });
    });

    describe('ingestFile', () => {
        it('should extract the file and ingest it under an id derived from its name', async () => {
            const content = Buffer.from('ARTICLE 1 Scope\nThis regulation applies to every boiler in service.');

            const report = await pipeline.ingestFile(content, 'Reglamento de Presión.txt');

            expect(report).toEqual({ documentId: 'reglamento-de-presion-txt', chunkCount: 1, pendingEnhancement: 0 });
            const record = await storage.get('reglamento-de-presion-txt');
            expect(record?.document.sourceFile).toBe('Reglamento de Presión.txt');
            expect(record?.summary?.title).toBe('ARTICLE 1 Scope');
        });

        it('should reject unsupported formats at the extraction stage', async () => {
            const error = await pipeline.ingestFile(Buffer.from('data'), 'notes.docx').catch((e: unknown) => e);

            expect(error).toBeInstanceOf(PipelineError);
            expect(error).toMatchObject({ stage: 'extraction' });
        });
    });

    describe('removeDocument', () => {
        it('should delete the vectors and the record', async () => {
            await pipeline.ingestDocument(pressureRegulation());

            expect(await pipeline.removeDocument('pressure-regulation')).toBe(true);
            expect(await index.count()).toBe(0);
            expect(await storage.get('pressure-regulation')).toBeNull();
            expect(await pipeline.removeDocument('pressure-regulation')).toBe(false);
        });
    });
});

describe('documentIdFromFileName', () => {
    it('should build a stable slug from the base name', () => {
        expect(documentIdFromFileName('uploads/Reglamento de Presión (v2).PDF')).toBe('reglamento-de-presion-v2-pdf');
        expect(documentIdFromFileName('C:\\docs\\Ley_General.md')).toBe('ley-general-md');
    });

    it('should fall back when nothing usable is left', () => {
        expect(documentIdFromFileName('')).toBe('document');
        expect(documentIdFromFileName('***')).toBe('document');
    });
});
