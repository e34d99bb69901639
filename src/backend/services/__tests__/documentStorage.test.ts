/**
 * Unit tests for DocumentStorage
 */

import * as fs from 'fs';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { createDocumentStorage, DocumentRecord, parseStoredDocument } from '../documentStorage';

function record(id: string, ingestedAt: string): DocumentRecord {
    return {
        document: { id, sourceFile: `${id}.pdf`, pages: [{ pageNumber: 1, text: 'ARTICLE 1 Scope' }] },
        status: 'pending',
        chunkCount: 0,
        pendingChunkIds: [],
        ingestedAt: new Date(ingestedAt),
    };
}

describe('DocumentStorage', () => {
    describe('in memory', () => {
        it('should save, update and list records newest first', async () => {
            const storage = createDocumentStorage();
            await storage.save(record('older', '2024-01-01T00:00:00Z'));
            await storage.save(record('newer', '2024-02-01T00:00:00Z'));

            const updated = await storage.update('older', { status: 'indexed', chunkCount: 4 });

            expect(updated.status).toBe('indexed');
            expect((await storage.get('older'))?.chunkCount).toBe(4);
            expect((await storage.list()).map((r) => r.document.id)).toEqual(['newer', 'older']);
        });

        it('should reject updates to unknown documents', async () => {
            await expect(createDocumentStorage().update('missing', { status: 'error' })).rejects.toThrow(
                'Document not found: missing'
            );
        });

        it('should report whether a deleted document existed', async () => {
            const storage = createDocumentStorage();
            await storage.save(record('doc', '2024-01-01T00:00:00Z'));

            expect(await storage.delete('doc')).toBe(true);
            expect(await storage.delete('doc')).toBe(false);
            expect(await storage.get('doc')).toBeNull();
        });
    });

    describe('on disk', () => {
        let testStoragePath: string;

        beforeEach(() => {
            testStoragePath = path.join(process.cwd(), 'data', 'test-documents', uuidv4());
        });

        afterEach(() => {
            fs.rmSync(testStoragePath, { recursive: true, force: true });
        });

        it('should reload records written by another instance', async () => {
            const writer = createDocumentStorage({ storagePath: testStoragePath });
            await writer.save(record('ley 21/719', '2024-03-01T12:00:00Z'));
            await writer.update('ley 21/719', {
                status: 'error',
                lastError: { stage: 'embedding', message: 'embedding service unavailable' },
            });

            const reader = createDocumentStorage({ storagePath: testStoragePath });
            const loaded = await reader.get('ley 21/719');

            expect(fs.readdirSync(testStoragePath)).toEqual(['ley%2021%2F719.json']);
            expect(loaded?.ingestedAt.toISOString()).toBe('2024-03-01T12:00:00.000Z');
            expect(loaded?.lastError).toEqual({ stage: 'embedding', message: 'embedding service unavailable' });
        });

        it('should skip malformed files', async () => {
            fs.mkdirSync(testStoragePath, { recursive: true });
            fs.writeFileSync(path.join(testStoragePath, 'broken.json'), JSON.stringify({ status: 'indexed' }));

            expect(await createDocumentStorage({ storagePath: testStoragePath }).list()).toEqual([]);
        });

        it('should remove the file on delete', async () => {
            const storage = createDocumentStorage({ storagePath: testStoragePath });
            await storage.save(record('doc', '2024-01-01T00:00:00Z'));

            expect(await storage.delete('doc')).toBe(true);
            expect(fs.readdirSync(testStoragePath)).toEqual([]);
        });
    });
});

describe('parseStoredDocument', () => {
    it('should drop an unknown failure stage', () => {
        const parsed = parseStoredDocument({
            document: { id: 'doc', pages: [] },
            status: 'error',
            chunkCount: 0,
            pendingChunkIds: ['a', 7],
            ingestedAt: '2024-01-01T00:00:00.000Z',
            lastError: { stage: 'unknown', message: 'boom' },
        });

        expect(parsed?.lastError).toBeUndefined();
        expect(parsed?.pendingChunkIds).toEqual(['a']);
    });

    it('should reject records without a document', () => {
        expect(parseStoredDocument({ status: 'indexed' })).toBeUndefined();
    });
});
