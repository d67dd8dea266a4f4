import { describe, it, expect } from 'vitest';
import { recursiveChunk } from '../../src/lib/chunking/strategies/recursiveChunker';
import { ChunkingService } from '../../src/lib/chunking/chunkingService';
import { InputValidationError } from '../../src/types/errors';
import type { TextSegment } from '../../src/types/document';

const ALPHABET = 'abcdefghijklmnopqrstuvwxyz0123456789';

// No whitespace and no sentence punctuation, so every cut is a hard cut
const boundaryFree = (length: number): string =>
    Array.from({ length }, (_, i) => ALPHABET[i % ALPHABET.length]).join('');

const segment = (content: string, pageNumber: number | null = 1): TextSegment => ({
    content,
    sourceFilename: 'doc.pdf',
    pageNumber,
});

describe('recursiveChunk', () => {
    it('keeps short text as a single chunk', () => {
        const spans = recursiveChunk('The sky is blue.', {
            maxChunkSize: 100,
            overlapSize: 10,
        });

        expect(spans).toEqual([
            {
                content: 'The sky is blue.',
                startChar: 0,
                endChar: 16,
                overlapWithPrevious: 0,
            },
        ]);
    });

    it('returns nothing for blank text', () => {
        expect(recursiveChunk('   \n  ', { maxChunkSize: 10, overlapSize: 2 })).toEqual([]);
    });

    it.each([
        [250, 100, 20],
        [1000, 100, 20],
        [3001, 1500, 150],
        [101, 100, 0],
        [500, 64, 63],
    ])(
        'produces ceil((L - O) / (M - O)) chunks for boundary-free text (L=%i, M=%i, O=%i)',
        (length, maxChunkSize, overlapSize) => {
            const text = boundaryFree(length);
            const spans = recursiveChunk(text, { maxChunkSize, overlapSize });

            expect(spans).toHaveLength(
                Math.ceil((length - overlapSize) / (maxChunkSize - overlapSize))
            );
        }
    );

    it('overlaps consecutive chunks by exactly the overlap size', () => {
        const text = boundaryFree(250);
        const spans = recursiveChunk(text, { maxChunkSize: 100, overlapSize: 20 });

        expect(spans.map((s) => [s.startChar, s.endChar])).toEqual([
            [0, 100],
            [80, 180],
            [160, 250],
        ]);

        for (let i = 0; i < spans.length - 1; i++) {
            expect(spans[i].content.slice(-20)).toBe(spans[i + 1].content.slice(0, 20));
            expect(spans[i + 1].overlapWithPrevious).toBe(20);
        }
    });

    it('never exceeds the maximum size and covers the whole text', () => {
        const text = Array.from(
            { length: 60 },
            (_, i) => `Sentence number ${i} talks about topic ${i % 7}.`
        ).join(' ');
        const spans = recursiveChunk(text, { maxChunkSize: 200, overlapSize: 30 });

        expect(spans[0].startChar).toBe(0);
        expect(spans[spans.length - 1].endChar).toBe(text.length);
        for (const span of spans) {
            expect(span.content.length).toBeLessThanOrEqual(200);
            expect(span.content).toBe(text.slice(span.startChar, span.endChar));
        }
        for (let i = 1; i < spans.length; i++) {
            expect(spans[i].startChar).toBe(spans[i - 1].endChar - 30);
        }
    });

    it('cuts after a sentence end when one falls near the window end', () => {
        // 'First sentence here. ' is 21 chars
        const text = 'First sentence here. ' + 'x'.repeat(40);
        const spans = recursiveChunk(text, { maxChunkSize: 30, overlapSize: 4 });

        expect(spans[0].content).toBe('First sentence here. ');
        expect(spans[1].startChar).toBe(17);
    });

    it('is deterministic', () => {
        const text = boundaryFree(777);
        const options = { maxChunkSize: 120, overlapSize: 15 };
        expect(recursiveChunk(text, options)).toEqual(recursiveChunk(text, options));
    });
});

describe('ChunkingService', () => {
    it('windows each segment on its own and numbers chunks globally', () => {
        const service = new ChunkingService({ maxChunkSize: 100, overlapSize: 20 });
        const result = service.chunk([
            segment(boundaryFree(250), 1),
            segment('Short second page.', 2),
        ]);

        expect(result.totalChunks).toBe(4);
        expect(result.chunks.map((c) => c.chunkIndex)).toEqual([0, 1, 2, 3]);
        expect(result.chunks.map((c) => c.pageNumber)).toEqual([1, 1, 1, 2]);
        expect(result.chunks[3]).toEqual({
            chunkIndex: 3,
            content: 'Short second page.',
            overlapWithPrevious: 0,
            sourceFilename: 'doc.pdf',
            pageNumber: 2,
            startChar: 0,
            endChar: 18,
        });
        expect(result.totalCharacters).toBe(100 + 100 + 90 + 18);
    });

    it('accepts per-call overrides', () => {
        const service = new ChunkingService();
        const result = service.chunk([segment(boundaryFree(250))], {
            maxChunkSize: 50,
            overlapSize: 0,
        });

        expect(result.totalChunks).toBe(5);
    });

    it.each([
        [{ maxChunkSize: 0, overlapSize: 0 }],
        [{ maxChunkSize: 10, overlapSize: -1 }],
        [{ maxChunkSize: 10, overlapSize: 10 }],
        [{ maxChunkSize: 10.5, overlapSize: 1 }],
    ])('rejects invalid options %j', (options) => {
        expect(() => new ChunkingService(options)).toThrow(InputValidationError);
    });
});
