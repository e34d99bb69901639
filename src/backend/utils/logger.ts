/**
 * Logging
 *
 * Services receive a Logger instead of calling console directly, so tests can
 * silence them and deployments can swap in another sink.
 */

export interface Logger {
    debug: (message: string, context?: object) => void;
    info: (message: string, context?: object) => void;
    warn: (message: string, context?: object) => void;
    error: (message: string, context?: object) => void;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const levelPriorities: Record<LogLevel, number> = {
    debug: 1,
    info: 2,
    warn: 3,
    error: 4,
};

export function isLogLevel(value: string): value is LogLevel {
    return LOG_LEVELS.some((level) => level === value);
}

/**
 * A logger that performs no action. Default for library use and tests.
 */
export class NullLogger implements Logger {
    debug(): void { /* no-op */ }
    info(): void { /* no-op */ }
    warn(): void { /* no-op */ }
    error(): void { /* no-op */ }
}

/**
 * Writes to the console, dropping messages below the minimum level.
 */
export class ConsoleLogger implements Logger {
    private readonly minLevel: LogLevel;

    constructor(options: { level?: LogLevel } = {}) {
        this.minLevel = options.level ?? 'info';
    }

    debug(message: string, context?: object): void {
        this.log('debug', message, context);
    }

    info(message: string, context?: object): void {
        this.log('info', message, context);
    }

    warn(message: string, context?: object): void {
        this.log('warn', message, context);
    }

    error(message: string, context?: object): void {
        this.log('error', message, context);
    }

    private log(level: LogLevel, message: string, context?: object): void {
        if (levelPriorities[level] < levelPriorities[this.minLevel]) {
            return;
        }

        const line = `${new Date().toISOString()} [${level.toUpperCase()}] ${message}`;
        if (context && Object.keys(context).length > 0) {
            console[level](line, context);
        } else {
            console[level](line);
        }
    }
}

/**
 * Renders an unknown thrown value for log context.
 */
export function describeError(error: unknown): string {
    return error instanceof Error ? `${error.name}: ${error.message}` : String(error);
}
