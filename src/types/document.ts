// types/document.ts

/**
 * One uploaded file. Only lives until its text has been extracted.
 */
export interface Document {
    filename: string;
    contentType: string;
    bytes: Buffer;
}

export interface TextSegment {
    content: string;
    sourceFilename: string;
    pageNumber: number | null;
}

export interface Chunk {
    chunkIndex: number;
    content: string;
    overlapWithPrevious: number;
    sourceFilename: string;
    pageNumber: number | null;
    startChar: number;
    endChar: number;
}

export interface ChunkingOptions {
    maxChunkSize: number;
    overlapSize: number;
}

export type Embedding = number[];

export interface ScoredChunk {
    chunk: Chunk;
    score: number;
}
