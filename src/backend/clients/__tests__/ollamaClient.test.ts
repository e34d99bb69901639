/**
 * Ollama client tests against a mocked fetch
 */

import { createOllamaClient, isRetryableOllamaError, OllamaError, OllamaErrorCode } from '../ollamaClient';

function jsonResponse(body: unknown, status = 200): Response {
    return new Response(JSON.stringify(body), {
        status,
        headers: { 'Content-Type': 'application/json' },
    });
}

function abortError(): Error {
    const error = new Error('This operation was aborted');
    error.name = 'AbortError';
    return error;
}

/** A fetch that only settles when its signal aborts */
function hangingFetch(_input: string | URL | Request, init?: RequestInit): Promise<Response> {
    return new Promise((_resolve, reject) => {
        const signal = init?.signal;
        if (signal?.aborted) {
            reject(abortError());
            return;
        }
        signal?.addEventListener('abort', () => reject(abortError()), { once: true });
    });
}

async function captureError(promise: Promise<unknown>): Promise<OllamaError> {
    const error = await promise.catch((e: unknown) => e);
    if (!(error instanceof OllamaError)) {
        throw new Error(`Expected an OllamaError, got ${String(error)}`);
    }
    return error;
}

describe('OllamaClient', () => {
    const client = createOllamaClient({ baseUrl: 'http://ollama.test', timeoutMs: 1000 });
    let fetchMock: jest.SpiedFunction<typeof fetch>;

    beforeEach(() => {
        fetchMock = jest.spyOn(globalThis, 'fetch');
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    describe('generateCompletion', () => {
        it('should post a non-streaming request and return the completion text', async () => {
            fetchMock.mockResolvedValue(jsonResponse({ response: 'Article 3 applies.' }));

            const text = await client.generateCompletion('Which article applies?', {
                system: 'Answer from the context.',
                temperature: 0,
            });

            expect(text).toBe('Article 3 applies.');
            const [url, init] = fetchMock.mock.calls[0] ?? [];
            expect(url).toBe('http://ollama.test/api/generate');
            expect(JSON.parse(String(init?.body))).toEqual({
                model: 'llama3.1',
                prompt: 'Which article applies?',
                system: 'Answer from the context.',
                stream: false,
                options: { temperature: 0, num_predict: 1024 },
            });
        });

        it('should report a missing model as not retryable', async () => {
            fetchMock.mockResolvedValue(jsonResponse({ error: 'model "llama3.1" not found' }, 404));

            const error = await captureError(client.generateCompletion('Hello'));

            expect(error.code).toBe(OllamaErrorCode.MODEL_NOT_FOUND);
            expect(isRetryableOllamaError(error)).toBe(false);
        });

        it('should surface API errors with their message', async () => {
            fetchMock.mockResolvedValue(jsonResponse({ error: 'out of memory' }, 500));

            const error = await captureError(client.generateCompletion('Hello'));

            expect(error.code).toBe(OllamaErrorCode.API_ERROR);
            expect(error.message).toBe('Ollama API error: out of memory');
            expect(isRetryableOllamaError(error)).toBe(true);
        });

        it('should reject bodies without completion text', async () => {
            fetchMock.mockResolvedValue(jsonResponse({ done: true }));

            const error = await captureError(client.generateCompletion('Hello'));

            expect(error.code).toBe(OllamaErrorCode.INVALID_RESPONSE);
        });

        it('should recognise connection failures', async () => {
            fetchMock.mockRejectedValue(new TypeError('fetch failed'));

            const error = await captureError(client.generateCompletion('Hello'));

            expect(error.code).toBe(OllamaErrorCode.CONNECTION_REFUSED);
        });

        it('should tell a timeout from a cancellation', async () => {
            fetchMock.mockImplementation(hangingFetch);
            const impatient = createOllamaClient({ baseUrl: 'http://ollama.test', timeoutMs: 10 });

            const timeout = await captureError(impatient.generateCompletion('Hello'));
            expect(timeout.code).toBe(OllamaErrorCode.TIMEOUT);

            const controller = new AbortController();
            controller.abort();
            const cancelled = await captureError(client.generateCompletion('Hello', { signal: controller.signal }));
            expect(cancelled.code).toBe(OllamaErrorCode.CANCELLED);
            expect(isRetryableOllamaError(cancelled)).toBe(false);
        });
    });

    describe('generateEmbedding', () => {
        it('should return the embedding vector', async () => {
            fetchMock.mockResolvedValue(jsonResponse({ embedding: [0.1, 0.2, 0.3] }));

            await expect(client.generateEmbedding('pressure vessel')).resolves.toEqual([0.1, 0.2, 0.3]);
            const [url, init] = fetchMock.mock.calls[0] ?? [];
            expect(url).toBe('http://ollama.test/api/embeddings');
            expect(JSON.parse(String(init?.body))).toEqual({ model: 'nomic-embed-text', prompt: 'pressure vessel' });
        });

        it('should reject malformed embeddings', async () => {
            fetchMock.mockResolvedValue(jsonResponse({ embedding: [0.1, 'x'] }));

            const error = await captureError(client.generateEmbedding('pressure vessel'));

            expect(error.code).toBe(OllamaErrorCode.INVALID_RESPONSE);
        });
    });

    describe('isAvailable', () => {
        it('should be true when the tags endpoint answers', async () => {
            fetchMock.mockResolvedValue(jsonResponse({ models: [] }));

            await expect(client.isAvailable()).resolves.toBe(true);
            expect(fetchMock.mock.calls[0]?.[0]).toBe('http://ollama.test/api/tags');
        });

        it('should be false when Ollama cannot be reached', async () => {
            fetchMock.mockRejectedValue(new TypeError('fetch failed'));

            await expect(client.isAvailable()).resolves.toBe(false);
        });
    });
});

describe('isRetryableOllamaError', () => {
    it('should retry errors that did not come from Ollama', () => {
        expect(isRetryableOllamaError(new Error('socket hang up'))).toBe(true);
    });
});
