// lib/textUtils.ts

/**
 * Estimate token count (rough approximation)
 */
export function estimateTokens(text: string): number {
    // ~4 chars per token for English
    return Math.ceil(text.length / 4);
}

/**
 * Clean and normalize text for chunking
 */
export function cleanTextForChunking(text: string): string {
    return (
        text
            // Normalize line breaks
            .replace(/\r\n?/g, '\n')
            // Remove control characters (keeps \t and \n)
            .replace(/[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g, '')
            // Remove excessive whitespace but preserve paragraph breaks
            .replace(/[ \t]+/g, ' ')
            .replace(/ *\n */g, '\n')
            .replace(/\n{3,}/g, '\n\n')
            .trim()
    );
}

const SENTENCE_END = /[.!?]\s/g;
const WHITESPACE = /\s/;

/**
 * Find the best break point in (from, to].
 * Priority: paragraph break > sentence end > word boundary > `to`.
 * The returned position is where the next piece of text starts.
 */
export function findBreakPoint(text: string, from: number, to: number): number {
    const end = Math.min(to, text.length);
    if (from >= end) return end;

    const window = text.substring(from, end);

    // Look for paragraph break
    const paragraphBreak = window.lastIndexOf('\n\n');
    if (paragraphBreak !== -1) {
        return from + paragraphBreak + 2;
    }

    // Look for sentence end
    let bestSentenceEnd = -1;
    SENTENCE_END.lastIndex = 0;
    let match: RegExpExecArray | null;
    while ((match = SENTENCE_END.exec(window)) !== null) {
        bestSentenceEnd = match.index + match[0].length;
    }
    if (bestSentenceEnd !== -1) {
        return from + bestSentenceEnd;
    }

    // Fall back to word boundary
    for (let i = window.length - 1; i >= 0; i--) {
        if (WHITESPACE.test(window[i])) {
            return from + i + 1;
        }
    }

    return end;
}
