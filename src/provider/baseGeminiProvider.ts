// provider/baseGeminiProvider.ts
import { z, type ZodType } from 'zod';
import { describeError } from '../types/errors';

export interface GeminiProviderConfig {
    apiKey: string;
    baseUrl: string;
    model: string;
    maxRetries: number;
    retryDelayMs: number;
    timeoutMs: number;
}

export class GeminiApiError extends Error {
    constructor(
        message: string,
        public readonly code: string,
        public readonly retryable: boolean,
        public readonly status: number | null = null,
        public readonly retryAfterMs?: number
    ) {
        super(message);
        this.name = 'GeminiApiError';
    }
}

const errorBodySchema = z.object({
    error: z.object({
        message: z.string().optional(),
        status: z.string().optional(),
    }),
});

const MAX_BACKOFF_MS = 30000;

/**
 * Calls `models/{model}:{action}` on the Generative Language API.
 * Each attempt has its own timeout; rate limits, 5xx answers and network
 * failures are retried with exponential backoff.
 */
export abstract class BaseGeminiProvider {
    constructor(protected readonly config: GeminiProviderConfig) {}

    get model(): string {
        return this.config.model;
    }

    protected async post<T>(
        action: string,
        body: unknown,
        schema: ZodType<T>
    ): Promise<T> {
        const url = `${this.config.baseUrl}/models/${this.config.model}:${action}`;

        return this.withRetry(action, async () => {
            const response = await this.send(url, body);

            if (!response.ok) {
                throw await toApiError(response);
            }

            const parsed = schema.safeParse(await response.json());
            if (!parsed.success) {
                throw new GeminiApiError(
                    `Unexpected ${action} response shape`,
                    'INVALID_RESPONSE',
                    false,
                    response.status
                );
            }
            return parsed.data;
        });
    }

    private async send(url: string, body: unknown): Promise<Response> {
        const controller = new AbortController();
        const timer = setTimeout(() => controller.abort(), this.config.timeoutMs);

        try {
            return await fetch(url, {
                method: 'POST',
                headers: {
                    'Content-Type': 'application/json',
                    'x-goog-api-key': this.config.apiKey,
                },
                body: JSON.stringify(body),
                signal: controller.signal,
            });
        } catch (error) {
            if (controller.signal.aborted) {
                throw new GeminiApiError(
                    `Request timed out after ${this.config.timeoutMs}ms`,
                    'TIMEOUT',
                    true
                );
            }
            throw new GeminiApiError(
                `Network error: ${describeError(error)}`,
                'NETWORK_ERROR',
                true
            );
        } finally {
            clearTimeout(timer);
        }
    }

    private async withRetry<T>(
        action: string,
        attempt: () => Promise<T>
    ): Promise<T> {
        const { maxRetries } = this.config;

        for (let failures = 0; ; failures++) {
            try {
                return await attempt();
            } catch (error) {
                if (
                    !(error instanceof GeminiApiError) ||
                    !error.retryable ||
                    failures >= maxRetries
                ) {
                    throw error;
                }

                const delay = error.retryAfterMs ?? this.backoff(failures);
                console.warn(
                    `[gemini] ${action} attempt ${failures + 1}/${maxRetries + 1} failed, retrying in ${delay}ms: ${error.message}`
                );
                await sleep(delay);
            }
        }
    }

    private backoff(failures: number): number {
        const base = this.config.retryDelayMs;
        const jitter = Math.random() * base;
        return Math.min(base * 2 ** failures + jitter, MAX_BACKOFF_MS);
    }
}

function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

function parseJson(text: string): unknown {
    try {
        return JSON.parse(text);
    } catch {
        return undefined;
    }
}

async function toApiError(response: Response): Promise<GeminiApiError> {
    const text = await response.text();
    const body = errorBodySchema.safeParse(parseJson(text));

    const detail = (body.success && body.data.error.message) || text || response.statusText;
    const code = (body.success && body.data.error.status) || `HTTP_${response.status}`;

    if (response.status === 429) {
        const retryAfterSeconds = Number(response.headers.get('retry-after'));
        return new GeminiApiError(
            `Rate limited: ${detail}`,
            'RATE_LIMIT',
            true,
            429,
            retryAfterSeconds > 0 ? retryAfterSeconds * 1000 : undefined
        );
    }

    return new GeminiApiError(
        `Gemini API error ${response.status}: ${detail}`,
        code,
        response.status >= 500,
        response.status
    );
}
