// lib/vectorIndex/memoryVectorIndex.ts
import type { Chunk, Embedding, ScoredChunk } from '../../types/document';
import type { VectorIndex } from '../../types/vectorIndex';
import {
    DimensionMismatchError,
    EmptyIndexError,
    InputValidationError,
} from '../../types/errors';

interface StoredEntry {
    chunk: Chunk;
    vector: Embedding;
    norm: number;
}

export function assertValidK(k: number): void {
    if (!Number.isInteger(k) || k <= 0) {
        throw new InputValidationError(
            `k must be a positive integer, got ${k}`,
            'INVALID_QUERY',
            { k }
        );
    }
}

/**
 * Check that chunks and vectors pair up and share one dimension.
 * Returns that dimension, or `expected` when both lists are empty.
 */
export function assertAlignedVectors(
    chunks: Chunk[],
    vectors: Embedding[],
    expected: number | null
): number | null {
    if (chunks.length !== vectors.length) {
        throw new DimensionMismatchError(
            `Received ${chunks.length} chunks but ${vectors.length} vectors`
        );
    }

    let dimension = expected;
    for (const vector of vectors) {
        if (dimension === null) {
            dimension = vector.length;
        }
        if (vector.length === 0 || vector.length !== dimension) {
            throw new DimensionMismatchError(
                `Vector of dimension ${vector.length} does not match index dimension ${dimension}`
            );
        }
    }

    return dimension;
}

function magnitude(vector: Embedding): number {
    let sum = 0;
    for (const value of vector) {
        sum += value * value;
    }
    return Math.sqrt(sum);
}

/**
 * Exact cosine search over vectors held in process
 */
export class MemoryVectorIndex implements VectorIndex {
    private entries: StoredEntry[] = [];
    private dimension: number | null = null;

    get size(): number {
        return this.entries.length;
    }

    async insert(chunks: Chunk[], vectors: Embedding[]): Promise<void> {
        this.dimension = assertAlignedVectors(chunks, vectors, this.dimension);

        chunks.forEach((chunk, i) => {
            this.entries.push({
                chunk,
                vector: vectors[i],
                norm: magnitude(vectors[i]),
            });
        });
    }

    async query(vector: Embedding, k: number): Promise<ScoredChunk[]> {
        assertValidK(k);

        if (this.entries.length === 0) {
            throw new EmptyIndexError();
        }

        if (vector.length !== this.dimension) {
            throw new DimensionMismatchError(
                `Query vector of dimension ${vector.length} does not match index dimension ${this.dimension}`
            );
        }

        const queryNorm = magnitude(vector);

        return this.entries
            .map((entry, position) => ({
                chunk: entry.chunk,
                score: cosine(vector, queryNorm, entry),
                position,
            }))
            .sort((a, b) => b.score - a.score || a.position - b.position)
            .slice(0, k)
            .map(({ chunk, score }) => ({ chunk, score }));
    }

    async dispose(): Promise<void> {
        this.entries = [];
        this.dimension = null;
    }
}

function cosine(query: Embedding, queryNorm: number, entry: StoredEntry): number {
    if (queryNorm === 0 || entry.norm === 0) {
        return 0;
    }

    let dot = 0;
    for (let i = 0; i < query.length; i++) {
        dot += query[i] * entry.vector[i];
    }
    return dot / (queryNorm * entry.norm);
}
