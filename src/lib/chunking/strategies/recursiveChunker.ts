// lib/chunking/strategies/recursiveChunker.ts
import type { ChunkingOptions } from '../../../types/document';
import { findBreakPoint } from '../../textUtils';

export interface ChunkSpan {
    content: string;
    startChar: number;
    endChar: number;
    overlapWithPrevious: number;
}

/**
 * Sliding window over one piece of text.
 *
 * Each window is at most `maxChunkSize` long and the next one starts exactly
 * `overlapSize` characters before the previous end. When text remains after
 * a window, its end is pulled back to a paragraph, sentence or word boundary
 * found in the last half of the stride; without one it is a hard cut.
 * Every step advances by at least ceil((maxChunkSize - overlapSize) / 2).
 */
export function recursiveChunk(
    text: string,
    options: ChunkingOptions
): ChunkSpan[] {
    const { maxChunkSize, overlapSize } = options;

    if (text.trim().length === 0) {
        return [];
    }

    if (text.length <= maxChunkSize) {
        return [
            {
                content: text,
                startChar: 0,
                endChar: text.length,
                overlapWithPrevious: 0,
            },
        ];
    }

    const searchRange = Math.floor((maxChunkSize - overlapSize) / 2);
    const spans: ChunkSpan[] = [];
    let lastKeptEnd = 0;
    let startPos = 0;

    while (true) {
        let endPos = Math.min(startPos + maxChunkSize, text.length);

        if (endPos < text.length && searchRange > 0) {
            endPos = findBreakPoint(text, endPos - searchRange, endPos);
        }

        const content = text.substring(startPos, endPos);

        if (content.trim().length > 0) {
            spans.push({
                content,
                startChar: startPos,
                endChar: endPos,
                overlapWithPrevious:
                    spans.length > 0 ? Math.max(0, lastKeptEnd - startPos) : 0,
            });
            lastKeptEnd = endPos;
        }

        if (endPos >= text.length) {
            break;
        }

        // Move start position (with overlap)
        startPos = endPos - overlapSize;
    }

    return spans;
}
