/**
 * Express Server Configuration and Routes
 *
 * HTTP layer of the regulatory assistant. Routes only translate between
 * HTTP and the services; all behavior lives in the RAG engine and the
 * ingestion pipeline.
 *
 * - POST   /api/ask                    ask a question within a session
 * - GET    /api/health                 LLM connectivity
 * - POST   /api/documents              upload and ingest a file
 * - GET    /api/documents              list ingested documents
 * - DELETE /api/documents/:id          remove a document and its vectors
 * - POST   /api/documents/reenhance    retry missing chunk preambles
 * - GET    /api/sessions/:id           session history
 * - DELETE /api/sessions/:id           reset a session
 */

import { Server } from 'http';
import express, { Express, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import multer from 'multer';
import {
    AskResponse,
    DocumentUploadResponse,
    HealthResponse,
    RetrievalFilters,
} from '../../shared/types';
import { LanguageModel } from '../clients/types';
import {
    InvalidQueryError,
    PipelineError,
    RequestCancelledError,
    SynthesisError,
} from '../errors';
import { detectDocumentType } from '../services/documentParser';
import { IDocumentStorage } from '../services/documentStorage';
import { IngestionPipeline } from '../services/ingestionPipeline';
import { IRAGEngine } from '../services/ragEngine';
import { isValidSessionId, SessionManager } from '../services/sessionManager';
import { describeError, Logger, NullLogger } from '../utils/logger';

/**
 * Server configuration options.
 */
export interface ServerConfig {
    /** Port to listen on */
    port: number;
    /** CORS origin (default: allow all) */
    corsOrigin: string;
    /** Deadline for one /api/ask request */
    requestTimeoutMs: number;
    uploadLimitBytes: number;
}

/**
 * Default server configuration.
 */
export const DEFAULT_SERVER_CONFIG: ServerConfig = {
    port: 3001,
    corsOrigin: '*',
    requestTimeoutMs: 120000,
    uploadLimitBytes: 20 * 1024 * 1024,
};

/**
 * Services the routes delegate to.
 */
export interface ServerDependencies {
    engine: IRAGEngine;
    ingestion: IngestionPipeline;
    documents: IDocumentStorage;
    sessions: SessionManager;
    languageModel: LanguageModel;
    logger?: Logger;
}

/**
 * Custom error class for API errors.
 * Includes HTTP status code for proper response handling.
 */
export class ApiError extends Error {
    constructor(
        message: string,
        public readonly statusCode: number = 500,
        public readonly code?: string
    ) {
        super(message);
        this.name = 'ApiError';
    }
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseDocumentIds(value: unknown): string[] | undefined {
    if (value === undefined) {
        return undefined;
    }
    if (!Array.isArray(value) || !value.every((id): id is string => typeof id === 'string')) {
        throw new ApiError('document_ids must be an array of strings', 400, 'INVALID_FILTER');
    }
    return value;
}

function parseSessionId(value: unknown): string | undefined {
    if (value === undefined || value === null || value === '') {
        return undefined;
    }
    if (typeof value !== 'string' || !isValidSessionId(value)) {
        throw new ApiError('session_id must match [A-Za-z0-9_-]{1,128}', 400, 'INVALID_SESSION_ID');
    }
    return value;
}

/**
 * Maps service errors onto HTTP statuses.
 */
export function toApiError(error: unknown): ApiError {
    if (error instanceof ApiError) {
        return error;
    }
    if (error instanceof InvalidQueryError) {
        return new ApiError(error.message, 400, 'INVALID_QUERY');
    }
    if (error instanceof SynthesisError) {
        return new ApiError('The answer could not be generated. Please try again later.', 503, 'SYNTHESIS_UNAVAILABLE');
    }
    if (error instanceof RequestCancelledError) {
        return new ApiError('The request took too long and was cancelled', 504, 'REQUEST_TIMEOUT');
    }
    if (error instanceof multer.MulterError) {
        return error.code === 'LIMIT_FILE_SIZE'
            ? new ApiError('File is too large', 413, 'FILE_TOO_LARGE')
            : new ApiError(error.message, 400, 'INVALID_UPLOAD');
    }
    if (error instanceof PipelineError) {
        switch (error.stage) {
            case 'session':
                return new ApiError(error.message, 400, 'INVALID_SESSION_ID');
            case 'extraction':
            case 'segmentation':
                return new ApiError(error.message, 422, 'INGESTION_FAILED');
            default:
                return new ApiError(`Document processing failed during ${error.stage}`, 502, 'INGESTION_FAILED');
        }
    }
    return new ApiError('Internal server error');
}

/**
 * Creates and configures the Express application.
 *
 * Creating the app is separate from listening so tests can run it on an
 * ephemeral port.
 */
export function createApp(deps: ServerDependencies, config: Partial<ServerConfig> = {}): Express {
    const mergedConfig = { ...DEFAULT_SERVER_CONFIG, ...config };
    const logger = deps.logger ?? new NullLogger();
    const { engine, ingestion, documents, sessions, languageModel } = deps;
    const app = express();

    // =========================================================================
    // Middleware Setup
    // =========================================================================

    app.use(
        cors({
            origin: mergedConfig.corsOrigin,
            methods: ['GET', 'POST', 'DELETE'],
            allowedHeaders: ['Content-Type', 'Authorization'],
        })
    );

    app.use(express.json({ limit: '1mb' }));

    // Uploads are kept in memory; the pipeline only needs the bytes.
    const upload = multer({
        storage: multer.memoryStorage(),
        limits: {
            fileSize: mergedConfig.uploadLimitBytes,
        },
    });

    app.use((req: Request, res: Response, next: NextFunction) => {
        const startedAt = Date.now();
        res.on('finish', () => {
            logger.info(`${req.method} ${req.path}`, {
                status: res.statusCode,
                durationMs: Date.now() - startedAt,
            });
        });
        next();
    });

    // =========================================================================
    // Health Endpoint
    // =========================================================================

    /**
     * GET /api/health
     *
     * 503 when the LLM is unreachable, so load balancers stop routing here.
     */
    app.get('/api/health', async (_req: Request, res: Response) => {
        let llm = false;
        try {
            llm = await languageModel.isAvailable();
        } catch (error) {
            logger.error('Health check error', { error: describeError(error) });
        }

        const response: HealthResponse = {
            status: llm ? 'ok' : 'error',
            llm,
        };
        res.status(llm ? 200 : 503).json(response);
    });

    // =========================================================================
    // Question Endpoint
    // =========================================================================

    /**
     * POST /api/ask
     *
     * Body: { question, session_id?, document_ids? }
     *
     * The request is aborted when the client disconnects or the request
     * deadline passes; an aborted request commits nothing to the session.
     */
    app.post('/api/ask', async (req: Request, res: Response, next: NextFunction) => {
        const controller = new AbortController();
        const onClose = (): void => {
            if (!res.writableEnded) {
                controller.abort();
            }
        };
        res.on('close', onClose);
        const deadline = setTimeout(() => controller.abort(), mergedConfig.requestTimeoutMs);

        try {
            const body: unknown = req.body;
            if (!isRecord(body)) {
                throw new ApiError('Request body must be a JSON object', 400, 'INVALID_QUERY');
            }
            if (typeof body.question !== 'string') {
                throw new InvalidQueryError(body.question === undefined ? 'Query is required' : 'Query must be a string');
            }

            const documentIds = parseDocumentIds(body.document_ids);
            const filters: RetrievalFilters = documentIds ? { documentIds } : {};
            const result = await engine.ask(
                { question: body.question, sessionId: parseSessionId(body.session_id) },
                { signal: controller.signal, filters }
            );

            const response: AskResponse = {
                answer: result.answer,
                sources: result.sources,
                detected_language: result.detectedLanguage,
                outcome: result.outcome,
                session_id: result.sessionId,
            };
            res.json(response);
        } catch (error) {
            if (error instanceof RequestCancelledError && res.destroyed) {
                logger.info('Client disconnected before the answer was ready', { path: req.path });
                return;
            }
            next(error);
        } finally {
            clearTimeout(deadline);
            res.off('close', onClose);
        }
    });

    // =========================================================================
    // Session Endpoints
    // =========================================================================

    /**
     * GET /api/sessions/:id
     */
    app.get('/api/sessions/:id', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const session = await sessions.get(req.params.id);
            if (!session) {
                throw new ApiError('Session not found', 404, 'SESSION_NOT_FOUND');
            }
            res.json({ session });
        } catch (error) {
            next(error);
        }
    });

    /**
     * DELETE /api/sessions/:id
     *
     * Forgets the conversation; the next question with this id starts fresh.
     */
    app.delete('/api/sessions/:id', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const existed = await sessions.reset(req.params.id);
            if (!existed) {
                throw new ApiError('Session not found', 404, 'SESSION_NOT_FOUND');
            }
            res.json({ success: true });
        } catch (error) {
            next(error);
        }
    });

    // =========================================================================
    // Document Management Endpoints
    // =========================================================================

    /**
     * POST /api/documents
     *
     * multipart/form-data with a "file" field. The file is ingested before
     * the response is sent; uploading a file with the same name replaces
     * the earlier one.
     */
    app.post('/api/documents', upload.single('file'), async (req: Request, res: Response, next: NextFunction) => {
        try {
            const file = req.file;
            if (!file) {
                throw new ApiError('No file uploaded. Please select a file to upload.', 400, 'MISSING_FILE');
            }
            if (!detectDocumentType(file.originalname)) {
                throw new ApiError('Unsupported document format. Supported formats: .pdf, .md, .txt', 400, 'UNSUPPORTED_FORMAT');
            }

            const report = await ingestion.ingestFile(file.buffer, file.originalname);

            const response: DocumentUploadResponse = {
                documentId: report.documentId,
                status: 'indexed',
                chunkCount: report.chunkCount,
                pendingEnhancement: report.pendingEnhancement,
            };
            res.status(201).json(response);
        } catch (error) {
            next(error);
        }
    });

    /**
     * GET /api/documents
     *
     * Newest first, without page text.
     */
    app.get('/api/documents', async (_req: Request, res: Response, next: NextFunction) => {
        try {
            const records = await documents.list();
            res.json({
                documents: records.map((record) => ({
                    id: record.document.id,
                    title: record.summary?.title ?? record.document.title,
                    sourceFile: record.document.sourceFile,
                    pages: record.document.pages.length,
                    status: record.status,
                    chunkCount: record.chunkCount,
                    pendingEnhancement: record.pendingChunkIds.length,
                    ingestedAt: record.ingestedAt,
                    indexedAt: record.indexedAt,
                    lastError: record.lastError,
                })),
            });
        } catch (error) {
            next(error);
        }
    });

    /**
     * POST /api/documents/reenhance
     *
     * Body: { document_id? }. Without an id every document is checked.
     */
    app.post('/api/documents/reenhance', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const body: unknown = req.body;
            const documentId = isRecord(body) && typeof body.document_id === 'string' ? body.document_id : undefined;
            const reports = await ingestion.reenhancePending(documentId);
            res.json({ documents: reports });
        } catch (error) {
            next(error);
        }
    });

    /**
     * DELETE /api/documents/:id
     */
    app.delete('/api/documents/:id', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const deleted = await ingestion.removeDocument(req.params.id);
            if (!deleted) {
                throw new ApiError('Document not found', 404, 'DOCUMENT_NOT_FOUND');
            }
            res.json({ success: true });
        } catch (error) {
            next(error);
        }
    });

    // =========================================================================
    // Error Handling Middleware
    // =========================================================================

    app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
        const apiError = toApiError(err);
        if (apiError.statusCode >= 500) {
            logger.error('Request failed', {
                path: req.path,
                error: err instanceof PipelineError ? err.toJSON() : describeError(err),
            });
        }

        // Internal details never reach the client.
        res.status(apiError.statusCode).json({
            error: apiError.message,
            code: apiError.code,
        });
    });

    return app;
}

/**
 * Starts listening. Port 0 picks a free port; read it from the returned
 * server's address().
 */
export function startServer(
    app: Express,
    port: number = DEFAULT_SERVER_CONFIG.port,
    logger: Logger = new NullLogger()
): Promise<Server> {
    return new Promise((resolve, reject) => {
        const server = app.listen(port, () => {
            server.off('error', reject);
            logger.info('Regulatory assistant listening', { port });
            resolve(server);
        });
        server.once('error', reject);
    });
}
