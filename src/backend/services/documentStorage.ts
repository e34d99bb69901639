/**
 * Document Storage Service
 *
 * Keeps one record per ingested document: the source pages (needed to
 * re-segment for re-enhancement), the summary, indexing status and the
 * chunks still waiting for a contextual preamble.
 *
 * Records live in memory and, when a storage path is configured, as one
 * JSON file per document.
 */

import * as fs from 'fs';
import * as path from 'path';
import {
    DocumentPage,
    DocumentStatus,
    DocumentSummary,
    SourceDocument,
} from '../../shared/types';
import { PipelineStage } from '../errors';
import { describeError, Logger, NullLogger } from '../utils/logger';

/**
 * Configuration for document storage.
 */
export interface DocumentStorageConfig {
    /** Directory for document files; memory only when unset */
    storagePath?: string;
}

export interface DocumentFailure {
    stage: PipelineStage;
    message: string;
}

export interface DocumentRecord {
    document: SourceDocument;
    status: DocumentStatus;
    chunkCount: number;
    summary?: DocumentSummary;
    /** Chunks indexed with an empty preamble */
    pendingChunkIds: string[];
    ingestedAt: Date;
    indexedAt?: Date;
    lastError?: DocumentFailure;
}

export type DocumentRecordUpdate = Partial<Omit<DocumentRecord, 'document' | 'ingestedAt'>>;

/**
 * Stored document format (JSON serialization).
 */
interface StoredDocument {
    document: SourceDocument;
    status: DocumentStatus;
    chunkCount: number;
    summary?: DocumentSummary;
    pendingChunkIds: string[];
    ingestedAt: string; // ISO date
    indexedAt?: string; // ISO date
    lastError?: DocumentFailure;
}

/**
 * Interface for document storage operations.
 */
export interface IDocumentStorage {
    save(record: DocumentRecord): Promise<void>;
    get(id: string): Promise<DocumentRecord | null>;
    list(): Promise<DocumentRecord[]>;
    update(id: string, update: DocumentRecordUpdate): Promise<DocumentRecord>;
    delete(id: string): Promise<boolean>;
}

const DOCUMENT_STATUSES: readonly DocumentStatus[] = ['pending', 'indexed', 'error'];
const PIPELINE_STAGES: readonly PipelineStage[] = [
    'extraction',
    'segmentation',
    'summary',
    'enhancement',
    'embedding',
    'indexing',
    'detection',
    'translation',
    'retrieval',
    'synthesis',
    'session',
];

/**
 * Document Storage implementation.
 */
export class DocumentStorage implements IDocumentStorage {
    private readonly storagePath?: string;
    private readonly records = new Map<string, DocumentRecord>();
    private loaded = false;

    constructor(config: Partial<DocumentStorageConfig> = {}, private readonly logger: Logger = new NullLogger()) {
        this.storagePath = config.storagePath;
        if (this.storagePath) {
            fs.mkdirSync(this.storagePath, { recursive: true });
        }
    }

    async save(record: DocumentRecord): Promise<void> {
        this.loadAll();
        this.records.set(record.document.id, record);
        this.persist(record);
    }

    async get(id: string): Promise<DocumentRecord | null> {
        this.loadAll();
        return this.records.get(id) ?? null;
    }

    /**
     * All records, newest first.
     */
    async list(): Promise<DocumentRecord[]> {
        this.loadAll();
        return [...this.records.values()].sort((a, b) => b.ingestedAt.getTime() - a.ingestedAt.getTime());
    }

    async update(id: string, update: DocumentRecordUpdate): Promise<DocumentRecord> {
        this.loadAll();
        const existing = this.records.get(id);
        if (!existing) {
            throw new Error(`Document not found: ${id}`);
        }

        const record: DocumentRecord = { ...existing, ...update };
        this.records.set(id, record);
        this.persist(record);
        return record;
    }

    async delete(id: string): Promise<boolean> {
        this.loadAll();
        const existed = this.records.delete(id);

        const filePath = this.getDocumentFilePath(id);
        if (filePath && fs.existsSync(filePath)) {
            fs.unlinkSync(filePath);
            return true;
        }
        return existed;
    }

    /**
     * File name for a document id. Ids come from file names, so anything
     * outside [A-Za-z0-9_-] is encoded.
     */
    private getDocumentFilePath(documentId: string): string | undefined {
        if (!this.storagePath) {
            return undefined;
        }
        return path.join(this.storagePath, `${encodeURIComponent(documentId)}.json`);
    }

    /**
     * Writes atomically: temp file, then rename.
     */
    private persist(record: DocumentRecord): void {
        const filePath = this.getDocumentFilePath(record.document.id);
        if (!filePath) {
            return;
        }

        const tempPath = `${filePath}.tmp`;
        fs.writeFileSync(tempPath, JSON.stringify(serializeRecord(record), null, 2));
        fs.renameSync(tempPath, filePath);
    }

    /**
     * Reads every document file once, on first access.
     */
    private loadAll(): void {
        if (this.loaded) {
            return;
        }
        this.loaded = true;
        if (!this.storagePath) {
            return;
        }

        for (const file of fs.readdirSync(this.storagePath)) {
            if (!file.endsWith('.json')) {
                continue;
            }
            try {
                const stored = parseStoredDocument(
                    JSON.parse(fs.readFileSync(path.join(this.storagePath, file), 'utf-8'))
                );
                if (stored) {
                    this.records.set(stored.document.id, deserializeRecord(stored));
                } else {
                    this.logger.warn('Ignoring malformed document file', { file });
                }
            } catch (error) {
                this.logger.error('Error reading document file', { file, error: describeError(error) });
            }
        }
    }
}

function serializeRecord(record: DocumentRecord): StoredDocument {
    return {
        ...record,
        ingestedAt: record.ingestedAt.toISOString(),
        indexedAt: record.indexedAt?.toISOString(),
    };
}

function deserializeRecord(stored: StoredDocument): DocumentRecord {
    return {
        ...stored,
        ingestedAt: new Date(stored.ingestedAt),
        indexedAt: stored.indexedAt ? new Date(stored.indexedAt) : undefined,
    };
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null;
}

function parsePages(value: unknown): DocumentPage[] | undefined {
    if (!Array.isArray(value)) {
        return undefined;
    }
    const pages: DocumentPage[] = [];
    for (const page of value) {
        if (!isRecord(page) || typeof page.pageNumber !== 'number' || typeof page.text !== 'string') {
            return undefined;
        }
        pages.push({ pageNumber: page.pageNumber, text: page.text });
    }
    return pages;
}

function parseSourceDocument(value: unknown): SourceDocument | undefined {
    if (!isRecord(value) || typeof value.id !== 'string') {
        return undefined;
    }
    const pages = parsePages(value.pages);
    if (!pages) {
        return undefined;
    }
    return {
        id: value.id,
        title: typeof value.title === 'string' ? value.title : undefined,
        sourceFile: typeof value.sourceFile === 'string' ? value.sourceFile : undefined,
        pages,
    };
}

function parseFailure(value: unknown): DocumentFailure | undefined {
    if (!isRecord(value) || typeof value.message !== 'string') {
        return undefined;
    }
    const stage = PIPELINE_STAGES.find((candidate) => candidate === value.stage);
    return stage ? { stage, message: value.message } : undefined;
}

export function parseStoredDocument(value: unknown): StoredDocument | undefined {
    if (!isRecord(value)) {
        return undefined;
    }
    const document = parseSourceDocument(value.document);
    const status = DOCUMENT_STATUSES.find((candidate) => candidate === value.status);
    const { chunkCount, summary, pendingChunkIds, ingestedAt, indexedAt } = value;

    if (
        !document ||
        !status ||
        typeof chunkCount !== 'number' ||
        typeof ingestedAt !== 'string' ||
        !Array.isArray(pendingChunkIds)
    ) {
        return undefined;
    }

    return {
        document,
        status,
        chunkCount,
        summary:
            isRecord(summary) && typeof summary.title === 'string' && typeof summary.mainIdea === 'string'
                ? { title: summary.title, mainIdea: summary.mainIdea }
                : undefined,
        pendingChunkIds: pendingChunkIds.filter((id): id is string => typeof id === 'string'),
        ingestedAt,
        indexedAt: typeof indexedAt === 'string' ? indexedAt : undefined,
        lastError: parseFailure(value.lastError),
    };
}

/**
 * Factory function to create a DocumentStorage instance.
 */
export function createDocumentStorage(
    config?: Partial<DocumentStorageConfig>,
    logger?: Logger
): DocumentStorage {
    return new DocumentStorage(config, logger);
}
