// types/embedding.ts
import type { Embedding } from './document';

/**
 * Chunks are stored as documents, questions are searched as queries;
 * the embedding model tunes each vector for its side of the lookup.
 */
export type EmbeddingTaskType = 'RETRIEVAL_DOCUMENT' | 'RETRIEVAL_QUERY';

export interface BatchEmbedder {
    readonly model: string;
    embedBatch(texts: string[], taskType: EmbeddingTaskType): Promise<Embedding[]>;
}

/**
 * Gateway contract the retriever and the indexing step depend on
 */
export interface TextEmbedder {
    /**
     * Embed a search query
     */
    embed(text: string): Promise<Embedding>;

    /**
     * Embed document chunks, one vector per text in input order
     */
    embedBatch(texts: string[]): Promise<Embedding[]>;
}
