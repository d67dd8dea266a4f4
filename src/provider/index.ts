// provider/index.ts
import env from '../config/env';
import type { GeminiProviderConfig } from './baseGeminiProvider';
import { GeminiChatProvider } from './geminiChatProvider';
import { GeminiEmbeddingProvider } from './geminiEmbeddingProvider';

const RETRY_DELAY_MS = 1000;

const sharedConfig = (): Omit<GeminiProviderConfig, 'model' | 'timeoutMs'> => ({
    apiKey: env.GOOGLE_GEMINI_API_KEY,
    baseUrl: env.GOOGLE_API_BASE_URL,
    maxRetries: env.PROVIDER_MAX_RETRIES,
    retryDelayMs: RETRY_DELAY_MS,
});

export function createChatProvider(): GeminiChatProvider {
    return new GeminiChatProvider({
        ...sharedConfig(),
        model: env.GOOGLE_GEMINI_LLM_MODEL,
        timeoutMs: env.LLM_TIMEOUT_MS,
    });
}

export function createEmbeddingProvider(): GeminiEmbeddingProvider {
    return new GeminiEmbeddingProvider({
        ...sharedConfig(),
        model: env.GOOGLE_EMBEDDING_MODEL,
        timeoutMs: env.EMBEDDING_TIMEOUT_MS,
    });
}

export { GeminiApiError } from './baseGeminiProvider';
export { GeminiChatProvider } from './geminiChatProvider';
export { GeminiEmbeddingProvider } from './geminiEmbeddingProvider';
