/**
 * Backend module entry point
 *
 * - config/: environment configuration
 * - clients/: Ollama and Qdrant adapters
 * - services/: ingestion, retrieval, language routing, answering, sessions
 * - server/: Express routes
 *
 * When run directly, this file starts the server.
 * When imported, it exports the building blocks.
 */

import 'dotenv/config';
import { loadConfig } from './config/appConfig';
import { createRuntime } from './runtime';
import { createApp, startServer } from './server';
import { describeError } from './utils/logger';

export { createApp, startServer, toApiError, ApiError, DEFAULT_SERVER_CONFIG } from './server';
export type { ServerConfig, ServerDependencies } from './server';
export { loadConfig } from './config/appConfig';
export type { AppConfig } from './config/appConfig';
export { createRuntime } from './runtime';
export type { Runtime, RuntimeOverrides } from './runtime';
export * from './services';
export * from './clients';
export * from './errors';

const SESSION_PURGE_INTERVAL_MS = 60 * 1000;

async function main(): Promise<void> {
    const config = loadConfig();
    const runtime = createRuntime(config);
    const { logger, sessions } = runtime;

    const app = createApp(runtime, {
        port: config.server.port,
        requestTimeoutMs: config.server.requestTimeoutMs,
        uploadLimitBytes: config.server.uploadLimitBytes,
    });
    const server = await startServer(app, config.server.port, logger);

    const purgeTimer = setInterval(() => {
        sessions.purgeExpired().catch((error: unknown) => {
            logger.warn('Session purge failed', { error: describeError(error) });
        });
    }, SESSION_PURGE_INTERVAL_MS);
    purgeTimer.unref();

    const shutdown = (signal: string): void => {
        logger.info('Shutting down', { signal });
        clearInterval(purgeTimer);
        server.close((error) => {
            if (error) {
                logger.error('Error while closing server', { error: describeError(error) });
                process.exit(1);
            }
            process.exit(0);
        });
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
}

// Main entry point - start server when run directly
if (require.main === module) {
    main().catch((error: unknown) => {
        console.error('Failed to start server:', describeError(error));
        process.exit(1);
    });
}
