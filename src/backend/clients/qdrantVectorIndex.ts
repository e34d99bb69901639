/**
 * Qdrant Vector Index
 *
 * VectorIndex adapter over @qdrant/js-client-rest. One point per chunk,
 * point id = chunkId (a UUID), payload = VectorMetadata.
 *
 * The REST client takes no AbortSignal per call; cancellation and timeouts
 * are enforced by the RetryPolicy wrapping these calls.
 */

import { QdrantClient } from '@qdrant/js-client-rest';
import {
    IndexedVector,
    isLanguageCode,
    RetrievalFilters,
    VectorMatch,
    VectorMetadata,
    VectorRecord,
} from '../../shared/types';
import { Logger, NullLogger } from '../utils/logger';
import { VectorIndex } from './types';

export interface QdrantIndexConfig {
    url: string;
    apiKey?: string;
    collection: string;
    dimension: number;
}

export const DEFAULT_QDRANT_CONFIG: QdrantIndexConfig = {
    url: 'http://localhost:6333',
    collection: 'regulatory_chunks',
    dimension: 768,
};

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null;
}

/**
 * Reads a stored payload back into VectorMetadata.
 * Returns undefined for points written by something else.
 */
export function parsePayload(payload: unknown): VectorMetadata | undefined {
    if (!isRecord(payload)) {
        return undefined;
    }
    const {
        documentId,
        documentTitle,
        sourceFile,
        pageNumber,
        headingPath,
        sequence,
        rawText,
        sourceLanguage,
        enhancementPending,
    } = payload;

    if (
        typeof documentId !== 'string' ||
        typeof documentTitle !== 'string' ||
        typeof pageNumber !== 'number' ||
        typeof sequence !== 'number' ||
        typeof rawText !== 'string' ||
        typeof sourceLanguage !== 'string' ||
        !isLanguageCode(sourceLanguage) ||
        !Array.isArray(headingPath)
    ) {
        return undefined;
    }

    return {
        documentId,
        documentTitle,
        sourceFile: typeof sourceFile === 'string' ? sourceFile : undefined,
        pageNumber,
        headingPath: headingPath.filter((entry): entry is string => typeof entry === 'string'),
        sequence,
        rawText,
        sourceLanguage,
        enhancementPending: enhancementPending === true,
    };
}

function documentFilter(documentIds: string[]) {
    return {
        must: [{ key: 'documentId', match: { any: documentIds } }],
    };
}

export class QdrantVectorIndex implements VectorIndex {
    private readonly config: QdrantIndexConfig;
    private readonly client: QdrantClient;
    private readonly logger: Logger;
    private ready: Promise<void> | undefined;

    constructor(config: Partial<QdrantIndexConfig> = {}, logger: Logger = new NullLogger(), client?: QdrantClient) {
        this.config = { ...DEFAULT_QDRANT_CONFIG, ...config };
        this.logger = logger;
        this.client = client ?? new QdrantClient({ url: this.config.url, apiKey: this.config.apiKey });
    }

    /**
     * Creates the collection (cosine distance) and the documentId payload
     * index if they do not exist yet. Runs once per instance.
     */
    ensureCollection(): Promise<void> {
        if (!this.ready) {
            this.ready = this.createCollectionIfMissing().catch((error: unknown) => {
                this.ready = undefined;
                throw error;
            });
        }
        return this.ready;
    }

    async upsert(entry: IndexedVector): Promise<void> {
        await this.ensureCollection();
        await this.client.upsert(this.config.collection, {
            wait: true,
            points: [
                {
                    id: entry.chunkId,
                    vector: entry.vector,
                    payload: { ...entry.metadata },
                },
            ],
        });
    }

    async deleteByDocument(documentId: string): Promise<void> {
        await this.ensureCollection();
        await this.client.delete(this.config.collection, {
            wait: true,
            filter: documentFilter([documentId]),
        });
    }

    async query(vector: number[], k: number, filters: RetrievalFilters = {}): Promise<VectorMatch[]> {
        await this.ensureCollection();
        const results = await this.client.search(this.config.collection, {
            vector,
            limit: k,
            with_payload: true,
            filter: filters.documentIds ? documentFilter(filters.documentIds) : undefined,
        });

        const matches: VectorMatch[] = [];
        for (const point of results) {
            const metadata = parsePayload(point.payload);
            if (metadata) {
                matches.push({ chunkId: String(point.id), score: point.score, metadata });
            } else {
                this.logger.warn('Skipping point with unreadable payload', { pointId: point.id });
            }
        }
        return matches;
    }

    async getByIds(ids: string[]): Promise<VectorRecord[]> {
        if (ids.length === 0) {
            return [];
        }
        await this.ensureCollection();
        const points = await this.client.retrieve(this.config.collection, {
            ids,
            with_payload: true,
        });

        const byId = new Map<string, VectorRecord>();
        for (const point of points) {
            const metadata = parsePayload(point.payload);
            if (metadata) {
                byId.set(String(point.id), { chunkId: String(point.id), metadata });
            }
        }
        return ids.flatMap((id) => {
            const record = byId.get(id);
            return record ? [record] : [];
        });
    }

    async count(documentId?: string): Promise<number> {
        await this.ensureCollection();
        const result = await this.client.count(this.config.collection, {
            exact: true,
            filter: documentId ? documentFilter([documentId]) : undefined,
        });
        return result.count;
    }

    private async createCollectionIfMissing(): Promise<void> {
        const { collections } = await this.client.getCollections();
        if (collections.some((collection) => collection.name === this.config.collection)) {
            return;
        }

        this.logger.info('Creating Qdrant collection', {
            collection: this.config.collection,
            dimension: this.config.dimension,
        });
        await this.client.createCollection(this.config.collection, {
            vectors: { size: this.config.dimension, distance: 'Cosine' },
        });
        await this.client.createPayloadIndex(this.config.collection, {
            field_name: 'documentId',
            field_schema: 'keyword',
            wait: true,
        });
    }
}
