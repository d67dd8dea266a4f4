// types/vectorIndex.ts
import type { Chunk, Embedding, ScoredChunk } from './document';

export interface VectorSearch {
    /**
     * Nearest chunks to the vector, most similar first
     */
    query(vector: Embedding, k: number): Promise<ScoredChunk[]>;
}

export interface VectorIndex extends VectorSearch {
    /**
     * Number of chunks stored
     */
    readonly size: number;

    /**
     * Store chunks with their vectors, paired by position
     */
    insert(chunks: Chunk[], vectors: Embedding[]): Promise<void>;

    /**
     * Release whatever backs the index
     */
    dispose(): Promise<void>;
}

export type VectorIndexFactory = (sessionId: string) => VectorIndex;
