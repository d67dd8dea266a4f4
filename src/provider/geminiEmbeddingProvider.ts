// provider/geminiEmbeddingProvider.ts
import { z } from 'zod';
import type { Embedding } from '../types/document';
import type { BatchEmbedder, EmbeddingTaskType } from '../types/embedding';
import { BaseGeminiProvider, GeminiApiError } from './baseGeminiProvider';

const batchEmbedSchema = z.object({
    embeddings: z.array(z.object({ values: z.array(z.number()) })),
});

// batchEmbedContents takes at most 100 requests per call
const MAX_BATCH_SIZE = 100;

export class GeminiEmbeddingProvider extends BaseGeminiProvider implements BatchEmbedder {
    async embedBatch(
        texts: string[],
        taskType: EmbeddingTaskType
    ): Promise<Embedding[]> {
        const vectors: Embedding[] = [];

        for (let start = 0; start < texts.length; start += MAX_BATCH_SIZE) {
            const batch = texts.slice(start, start + MAX_BATCH_SIZE);
            const data = await this.post(
                'batchEmbedContents',
                {
                    requests: batch.map((text) => ({
                        model: `models/${this.model}`,
                        content: { parts: [{ text }] },
                        taskType,
                    })),
                },
                batchEmbedSchema
            );

            if (data.embeddings.length !== batch.length) {
                throw new GeminiApiError(
                    `Expected ${batch.length} embeddings, received ${data.embeddings.length}`,
                    'COUNT_MISMATCH',
                    false
                );
            }
            vectors.push(...data.embeddings.map((embedding) => embedding.values));
        }

        return vectors;
    }
}
