/**
 * Ollama Client
 *
 * Wrapper for communicating with a local Ollama instance.
 * Ollama provides local LLM inference without external API calls, which
 * matters for regulatory documents that should not leave the premises.
 *
 * Ollama API endpoints used:
 * - GET /api/tags - List available models (used for health check)
 * - POST /api/generate - Generate text completions
 * - POST /api/embeddings - Generate vector embeddings
 *
 * Retries are not done here; callers wrap these calls in a RetryPolicy.
 */

/**
 * Configuration for the Ollama client.
 */
export interface OllamaClientConfig {
    /** Base URL for Ollama API (default: http://localhost:11434) */
    baseUrl: string;
    /** Default model for text generation */
    defaultModel: string;
    /** Model for embeddings (some models are optimized for this) */
    embeddingModel: string;
    /** Transport-level timeout in milliseconds */
    timeoutMs: number;
}

/**
 * Default configuration values.
 * These match Ollama's default setup for easy local development.
 */
export const DEFAULT_OLLAMA_CONFIG: OllamaClientConfig = {
    baseUrl: 'http://localhost:11434',
    defaultModel: 'llama3.1',
    embeddingModel: 'nomic-embed-text',
    timeoutMs: 60000,
};

/**
 * Options for a single completion request.
 */
export interface GenerationOptions {
    model?: string;
    /** System prompt sent alongside the user prompt */
    system?: string;
    temperature?: number;
    maxTokens?: number;
    signal?: AbortSignal;
}

/**
 * Error codes for different failure scenarios.
 */
export enum OllamaErrorCode {
    /** Ollama service is not running or unreachable */
    CONNECTION_REFUSED = 'CONNECTION_REFUSED',
    /** Request took too long */
    TIMEOUT = 'TIMEOUT',
    /** The caller aborted the request */
    CANCELLED = 'CANCELLED',
    /** Requested model is not available */
    MODEL_NOT_FOUND = 'MODEL_NOT_FOUND',
    /** Ollama returned an error response */
    API_ERROR = 'API_ERROR',
    /** Ollama answered with a body we could not read */
    INVALID_RESPONSE = 'INVALID_RESPONSE',
    /** Unexpected error during communication */
    UNKNOWN = 'UNKNOWN',
}

/**
 * Custom error class for Ollama-specific errors.
 */
export class OllamaError extends Error {
    readonly code: OllamaErrorCode;

    constructor(message: string, code: OllamaErrorCode, cause?: unknown) {
        super(message, { cause });
        this.name = 'OllamaError';
        this.code = code;
    }
}

/**
 * Retrying a missing model or a cancelled request cannot help.
 */
export function isRetryableOllamaError(error: unknown): boolean {
    if (error instanceof OllamaError) {
        return error.code !== OllamaErrorCode.MODEL_NOT_FOUND && error.code !== OllamaErrorCode.CANCELLED;
    }
    return true;
}

/**
 * Interface defining the Ollama client contract.
 */
export interface IOllamaClient {
    isAvailable(): Promise<boolean>;
    generateCompletion(prompt: string, options?: GenerationOptions): Promise<string>;
    generateEmbedding(text: string, signal?: AbortSignal): Promise<number[]>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null;
}

/**
 * Ollama Client Implementation
 */
export class OllamaClient implements IOllamaClient {
    private readonly config: OllamaClientConfig;

    constructor(config: Partial<OllamaClientConfig> = {}) {
        this.config = { ...DEFAULT_OLLAMA_CONFIG, ...config };
    }

    /**
     * Check if Ollama is available and responding.
     *
     * We use the /api/tags endpoint because it's lightweight and
     * confirms Ollama is running and can respond to requests.
     */
    async isAvailable(): Promise<boolean> {
        try {
            const response = await this.fetchWithTimeout(
                `${this.config.baseUrl}/api/tags`,
                { method: 'GET' },
                5000 // Short timeout for health checks
            );
            return response.ok;
        } catch {
            // Any error means Ollama is not available
            return false;
        }
    }

    /**
     * Generate a text completion using Ollama.
     *
     * @throws OllamaError if generation fails
     */
    async generateCompletion(prompt: string, options: GenerationOptions = {}): Promise<string> {
        const model = options.model ?? this.config.defaultModel;

        try {
            const response = await this.fetchWithTimeout(
                `${this.config.baseUrl}/api/generate`,
                {
                    method: 'POST',
                    headers: {
                        'Content-Type': 'application/json',
                    },
                    body: JSON.stringify({
                        model,
                        prompt,
                        system: options.system,
                        stream: false, // Get complete response at once
                        options: {
                            temperature: options.temperature ?? 0.2,
                            num_predict: options.maxTokens ?? 1024,
                        },
                    }),
                },
                this.config.timeoutMs,
                options.signal
            );

            if (!response.ok) {
                await this.handleErrorResponse(response, model);
            }

            const data: unknown = await response.json();
            if (!isRecord(data) || typeof data.response !== 'string') {
                throw new OllamaError('Ollama returned no completion text', OllamaErrorCode.INVALID_RESPONSE);
            }
            return data.response;
        } catch (error) {
            throw this.wrapError(error, 'Failed to generate completion');
        }
    }

    /**
     * Generate an embedding vector for the given text.
     *
     * @throws OllamaError if embedding generation fails
     */
    async generateEmbedding(text: string, signal?: AbortSignal): Promise<number[]> {
        try {
            const response = await this.fetchWithTimeout(
                `${this.config.baseUrl}/api/embeddings`,
                {
                    method: 'POST',
                    headers: {
                        'Content-Type': 'application/json',
                    },
                    body: JSON.stringify({
                        model: this.config.embeddingModel,
                        prompt: text,
                    }),
                },
                this.config.timeoutMs,
                signal
            );

            if (!response.ok) {
                await this.handleErrorResponse(response, this.config.embeddingModel);
            }

            const data: unknown = await response.json();
            const embedding = isRecord(data) ? data.embedding : undefined;
            if (!Array.isArray(embedding) || !embedding.every((value): value is number => typeof value === 'number')) {
                throw new OllamaError('Ollama returned no embedding', OllamaErrorCode.INVALID_RESPONSE);
            }
            return embedding;
        } catch (error) {
            throw this.wrapError(error, 'Failed to generate embedding');
        }
    }

    /**
     * Fetch with timeout support.
     *
     * Node.js fetch doesn't have built-in timeout, so we implement it
     * using AbortController. The caller's signal aborts the same controller.
     */
    private async fetchWithTimeout(
        url: string,
        options: RequestInit,
        timeoutMs: number,
        signal?: AbortSignal
    ): Promise<Response> {
        const controller = new AbortController();
        let timedOut = false;
        const timeoutId = setTimeout(() => {
            timedOut = true;
            controller.abort();
        }, timeoutMs);
        const onAbort = (): void => controller.abort();

        if (signal?.aborted) {
            controller.abort();
        } else {
            signal?.addEventListener('abort', onAbort, { once: true });
        }

        try {
            const response = await fetch(url, {
                ...options,
                signal: controller.signal,
            });
            return response;
        } catch (error) {
            if (error instanceof Error && error.name === 'AbortError') {
                throw timedOut
                    ? new OllamaError(`Request timed out after ${timeoutMs}ms`, OllamaErrorCode.TIMEOUT)
                    : new OllamaError('Request was cancelled', OllamaErrorCode.CANCELLED);
            }
            throw error;
        } finally {
            clearTimeout(timeoutId);
            signal?.removeEventListener('abort', onAbort);
        }
    }

    /**
     * Handle non-OK HTTP responses from Ollama.
     *
     * - 404: Model not found (user needs to pull it)
     * - Others: Various API errors
     */
    private async handleErrorResponse(response: Response, model: string): Promise<never> {
        let errorMessage: string;

        try {
            const errorBody: unknown = await response.json();
            errorMessage = isRecord(errorBody) && typeof errorBody.error === 'string'
                ? errorBody.error
                : `HTTP ${response.status}`;
        } catch {
            errorMessage = `HTTP ${response.status}: ${response.statusText}`;
        }

        if (response.status === 404 || errorMessage.includes('not found')) {
            throw new OllamaError(
                `Model "${model}" not found. Please run: ollama pull ${model}`,
                OllamaErrorCode.MODEL_NOT_FOUND
            );
        }

        throw new OllamaError(
            `Ollama API error: ${errorMessage}`,
            OllamaErrorCode.API_ERROR
        );
    }

    /**
     * Wrap errors in OllamaError so callers see one error type.
     */
    private wrapError(error: unknown, context: string): OllamaError {
        if (error instanceof OllamaError) {
            return error;
        }

        // Connection errors (Ollama not running)
        if (error instanceof TypeError && error.message.includes('fetch')) {
            return new OllamaError(
                'Cannot connect to Ollama. Please ensure Ollama is running (ollama serve)',
                OllamaErrorCode.CONNECTION_REFUSED,
                error
            );
        }

        const message = error instanceof Error ? error.message : String(error);
        return new OllamaError(`${context}: ${message}`, OllamaErrorCode.UNKNOWN, error);
    }
}

/**
 * Factory function to create an Ollama client.
 */
export function createOllamaClient(config?: Partial<OllamaClientConfig>): OllamaClient {
    return new OllamaClient(config);
}
