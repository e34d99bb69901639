/**
 * Retry Policy
 *
 * Every call to a collaborator (LLM, translator, embedder, vector index) runs
 * through a RetryPolicy. Each attempt gets its own timeout and its own
 * AbortSignal; when the timeout fires we abort that signal and stop waiting,
 * but the remote side may still finish the work.
 *
 * Backoff is exponential: baseDelayMs * factor^(attempt - 1), capped at
 * maxDelayMs. Cancellation of the caller's signal is never retried.
 */

import { CollaboratorTimeoutError, RequestCancelledError } from '../errors';

export interface RetryPolicyConfig {
    /** Total attempts, including the first one */
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
    factor: number;
    /** Per-attempt timeout. 0 disables it. */
    timeoutMs: number;
}

export const DEFAULT_RETRY_CONFIG: RetryPolicyConfig = {
    maxAttempts: 3,
    baseDelayMs: 500,
    maxDelayMs: 8000,
    factor: 2,
    timeoutMs: 30000,
};

export type RetryPredicate = (error: unknown) => boolean;

export interface RetryContext {
    /** Caller's cancellation signal */
    signal?: AbortSignal;
    /** Called before each backoff sleep */
    onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

const retryEverything: RetryPredicate = () => true;

export class RetryPolicy {
    readonly config: RetryPolicyConfig;
    private readonly isRetryable: RetryPredicate;

    constructor(config: Partial<RetryPolicyConfig> = {}, isRetryable: RetryPredicate = retryEverything) {
        this.config = { ...DEFAULT_RETRY_CONFIG, ...config };
        this.isRetryable = isRetryable;

        if (!Number.isInteger(this.config.maxAttempts) || this.config.maxAttempts < 1) {
            throw new RangeError(`maxAttempts must be a positive integer, got ${this.config.maxAttempts}`);
        }
        if (this.config.timeoutMs < 0) {
            throw new RangeError(`timeoutMs must not be negative, got ${this.config.timeoutMs}`);
        }
    }

    /**
     * Same limits, different notion of which errors are worth retrying.
     */
    withPredicate(isRetryable: RetryPredicate): RetryPolicy {
        return new RetryPolicy(this.config, isRetryable);
    }

    /**
     * Delay after the given failed attempt (1-based).
     */
    delayFor(attempt: number): number {
        const { baseDelayMs, factor, maxDelayMs } = this.config;
        return Math.min(maxDelayMs, baseDelayMs * factor ** (attempt - 1));
    }

    /**
     * Longest `execute` can wait: every attempt timing out, plus the backoff
     * between attempts. Unbounded when attempts have no timeout.
     */
    worstCaseMs(): number {
        const { maxAttempts, timeoutMs } = this.config;
        if (timeoutMs === 0) {
            return Infinity;
        }

        let total = maxAttempts * timeoutMs;
        for (let attempt = 1; attempt < maxAttempts; attempt++) {
            total += this.delayFor(attempt);
        }
        return total;
    }

    /**
     * Runs `task` until it succeeds, fails with a non-retryable error, or
     * attempts run out. The last error is rethrown unchanged.
     */
    async execute<T>(
        operation: string,
        task: (signal: AbortSignal) => Promise<T>,
        context: RetryContext = {}
    ): Promise<T> {
        const { signal, onRetry } = context;
        let lastError: unknown;

        for (let attempt = 1; attempt <= this.config.maxAttempts; attempt++) {
            if (signal?.aborted) {
                throw new RequestCancelledError(`${operation} cancelled`);
            }

            try {
                return await this.runAttempt(operation, task, signal);
            } catch (error) {
                if (error instanceof RequestCancelledError) {
                    throw error;
                }
                lastError = error;
                if (attempt === this.config.maxAttempts || !this.isRetryable(error)) {
                    break;
                }

                const delayMs = this.delayFor(attempt);
                onRetry?.(error, attempt, delayMs);
                await sleep(delayMs, signal);
            }
        }

        throw lastError;
    }

    private runAttempt<T>(
        operation: string,
        task: (signal: AbortSignal) => Promise<T>,
        signal: AbortSignal | undefined
    ): Promise<T> {
        const controller = new AbortController();
        const { timeoutMs } = this.config;

        return new Promise<T>((resolve, reject) => {
            let settled = false;
            let timer: NodeJS.Timeout | undefined;

            const settle = (): boolean => {
                if (settled) {
                    return false;
                }
                settled = true;
                if (timer) {
                    clearTimeout(timer);
                }
                signal?.removeEventListener('abort', onAbort);
                return true;
            };

            function onAbort(): void {
                if (settle()) {
                    controller.abort();
                    reject(new RequestCancelledError(`${operation} cancelled`));
                }
            }

            if (timeoutMs > 0) {
                timer = setTimeout(() => {
                    if (settle()) {
                        controller.abort();
                        reject(new CollaboratorTimeoutError(operation, timeoutMs));
                    }
                }, timeoutMs);
            }
            signal?.addEventListener('abort', onAbort, { once: true });

            void Promise.resolve()
                .then(() => task(controller.signal))
                .then(
                    (value) => {
                        if (settle()) {
                            resolve(value);
                        }
                    },
                    (error: unknown) => {
                        if (settle()) {
                            reject(error);
                        }
                    }
                );
        });
    }
}

/**
 * Resolves after `ms`, or rejects with RequestCancelledError when the signal aborts first.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
        return Promise.reject(new RequestCancelledError());
    }

    return new Promise((resolve, reject) => {
        const onAbort = (): void => {
            clearTimeout(timer);
            reject(new RequestCancelledError());
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal?.addEventListener('abort', onAbort, { once: true });
    });
}
