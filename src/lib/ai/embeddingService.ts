/**
 * Embedding Service
 * Normalizes input, keeps vectors in input order and caches chunk vectors
 */

import env from '../../config/env';
import type { Embedding } from '../../types/document';
import type {
    BatchEmbedder,
    EmbeddingTaskType,
    TextEmbedder,
} from '../../types/embedding';
import { EmbeddingServiceError, describeError } from '../../types/errors';
import { createEmbeddingProvider } from '../../provider';
import { ddl } from '../dd';

// text-embedding-004 reads at most 2048 tokens
const MAX_INPUT_CHARS = 8000;

export interface EmbeddingServiceOptions {
    /**
     * Most chunk vectors kept for reuse across rebuilds; 0 disables caching
     */
    cacheSize: number;
}

export class EmbeddingService implements TextEmbedder {
    private readonly cache = new Map<string, Embedding>();

    constructor(
        private readonly provider: BatchEmbedder,
        private readonly options: EmbeddingServiceOptions
    ) {}

    get cachedCount(): number {
        return this.cache.size;
    }

    /**
     * Queries are not cached: they rarely repeat and would crowd out chunks
     */
    async embed(text: string): Promise<Embedding> {
        const query = normalize(text);
        if (!query) {
            throw new EmbeddingServiceError('Cannot embed an empty query');
        }

        const [vector] = await this.request([query], 'RETRIEVAL_QUERY');
        return vector;
    }

    async embedBatch(texts: string[]): Promise<Embedding[]> {
        const normalized = texts.map((text, index) => {
            const value = normalize(text);
            if (!value) {
                throw new EmbeddingServiceError(
                    `Cannot embed empty text at index ${index}`
                );
            }
            return value;
        });

        const vectors = normalized.map((text) => this.lookup(text));
        const missing = vectors.flatMap((vector, index) => (vector ? [] : [index]));

        if (missing.length > 0) {
            const fresh = await this.request(
                missing.map((index) => normalized[index]),
                'RETRIEVAL_DOCUMENT'
            );
            missing.forEach((index, position) => {
                vectors[index] = fresh[position];
                this.remember(normalized[index], fresh[position]);
            });
        }

        ddl(
            `[EmbeddingService] ${texts.length} chunks, ${
                texts.length - missing.length
            } from cache, ${this.cache.size} cached`
        );

        return vectors.map((vector, index) => {
            if (!vector) {
                throw new EmbeddingServiceError(`Missing embedding at index ${index}`);
            }
            return vector;
        });
    }

    private async request(
        texts: string[],
        taskType: EmbeddingTaskType
    ): Promise<Embedding[]> {
        let vectors: Embedding[];
        try {
            vectors = await this.provider.embedBatch(texts, taskType);
        } catch (error) {
            throw new EmbeddingServiceError(
                `Embedding request to ${this.provider.model} failed: ${describeError(error)}`,
                error
            );
        }

        if (vectors.length !== texts.length) {
            throw new EmbeddingServiceError(
                `Provider returned ${vectors.length} embeddings for ${texts.length} texts`
            );
        }
        return vectors;
    }

    private lookup(text: string): Embedding | undefined {
        const key = this.cacheKey(text);
        const vector = this.cache.get(key);
        if (vector) {
            // Re-insert so Map order tracks recency
            this.cache.delete(key);
            this.cache.set(key, vector);
        }
        return vector;
    }

    private remember(text: string, vector: Embedding): void {
        if (this.options.cacheSize <= 0) {
            return;
        }

        const key = this.cacheKey(text);
        this.cache.delete(key);
        this.cache.set(key, vector);

        for (const oldest of this.cache.keys()) {
            if (this.cache.size <= this.options.cacheSize) {
                break;
            }
            this.cache.delete(oldest);
        }
    }

    private cacheKey(text: string): string {
        return `${this.provider.model}:${text}`;
    }
}

function normalize(text: string): string {
    return text.trim().replace(/\s+/g, ' ').slice(0, MAX_INPUT_CHARS);
}

let defaultService: EmbeddingService | null = null;

export function getEmbeddingService(): EmbeddingService {
    if (!defaultService) {
        defaultService = new EmbeddingService(createEmbeddingProvider(), {
            cacheSize: env.EMBEDDING_CACHE ? env.EMBEDDING_CACHE_SIZE : 0,
        });
    }
    return defaultService;
}
