// lib/chunking/chunkingService.ts
import type { Chunk, ChunkingOptions, TextSegment } from '../../types/document';
import { InputValidationError } from '../../types/errors';
import { estimateTokens } from '../textUtils';
import { recursiveChunk } from './strategies/recursiveChunker';

export interface IChunkingResult {
    chunks: Chunk[];
    totalChunks: number;
    totalCharacters: number;
    totalTokens: number;
}

export class ChunkingService {
    // Default options
    private readonly defaultOptions: ChunkingOptions;

    constructor(defaults: ChunkingOptions = { maxChunkSize: 1500, overlapSize: 150 }) {
        ChunkingService.assertValidOptions(defaults);
        this.defaultOptions = defaults;
    }

    /**
     * Split segments into overlapping chunks.
     * Segments are windowed one at a time, so no chunk spans two pages
     * or two files.
     */
    chunk(
        segments: TextSegment[],
        customOptions?: Partial<ChunkingOptions>
    ): IChunkingResult {
        const options: ChunkingOptions = {
            ...this.defaultOptions,
            ...customOptions,
        };
        ChunkingService.assertValidOptions(options);

        const chunks: Chunk[] = [];

        for (const segment of segments) {
            for (const span of recursiveChunk(segment.content, options)) {
                chunks.push({
                    chunkIndex: chunks.length,
                    content: span.content,
                    overlapWithPrevious: span.overlapWithPrevious,
                    sourceFilename: segment.sourceFilename,
                    pageNumber: segment.pageNumber,
                    startChar: span.startChar,
                    endChar: span.endChar,
                });
            }
        }

        // Calculate totals
        const totalCharacters = chunks.reduce(
            (sum, c) => sum + c.content.length,
            0
        );
        const totalTokens = chunks.reduce(
            (sum, c) => sum + estimateTokens(c.content),
            0
        );

        return {
            chunks,
            totalChunks: chunks.length,
            totalCharacters,
            totalTokens,
        };
    }

    get options(): ChunkingOptions {
        return { ...this.defaultOptions };
    }

    static assertValidOptions(options: ChunkingOptions): void {
        const { maxChunkSize, overlapSize } = options;

        if (!Number.isInteger(maxChunkSize) || maxChunkSize <= 0) {
            throw new InputValidationError(
                'maxChunkSize must be a positive integer',
                'INVALID_CHUNKING_OPTIONS',
                { maxChunkSize }
            );
        }

        if (!Number.isInteger(overlapSize) || overlapSize < 0) {
            throw new InputValidationError(
                'overlapSize must be a non-negative integer',
                'INVALID_CHUNKING_OPTIONS',
                { overlapSize }
            );
        }

        if (overlapSize >= maxChunkSize) {
            throw new InputValidationError(
                'overlapSize must be smaller than maxChunkSize',
                'INVALID_CHUNKING_OPTIONS',
                { maxChunkSize, overlapSize }
            );
        }
    }
}
