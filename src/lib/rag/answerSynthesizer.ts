// lib/rag/answerSynthesizer.ts
import type { ChatCompleter, ChatMessage } from '../../types/llm';
import type { ScoredChunk } from '../../types/document';
import type { ConversationHistory } from '../../types/conversation';
import { SynthesisFailedError } from '../../types/errors';
import { estimateTokens } from '../textUtils';

export const NOT_FOUND_ANSWER =
    "I couldn't find information about that in the provided documents.";

const CONTEXT_SEPARATOR = '\n\n---\n\n';

export interface AnswerSynthesizerOptions {
    maxContextTokens: number;
    maxHistoryTokens: number;
}

export class AnswerSynthesizer {
    constructor(
        private readonly model: ChatCompleter,
        private readonly options: AnswerSynthesizerOptions
    ) {}

    async synthesize(
        question: string,
        history: ConversationHistory,
        context: ScoredChunk[]
    ): Promise<string> {
        const contextText = this.buildContext(context);

        if (!contextText) {
            return NOT_FOUND_ANSWER;
        }

        const messages: ChatMessage[] = [
            { role: 'system', content: buildSystemPrompt(contextText) },
            ...recentTurns(history, this.options.maxHistoryTokens),
            { role: 'user', content: question },
        ];

        let answer: string;
        try {
            const response = await this.model.complete(messages);
            answer = response.content.trim();
        } catch (error) {
            throw new SynthesisFailedError(error);
        }

        return answer || NOT_FOUND_ANSWER;
    }

    /**
     * Join chunks most relevant first until the token budget is spent
     */
    buildContext(context: ScoredChunk[]): string {
        // ~4 chars per token
        const maxChars = this.options.maxContextTokens * 4;

        let totalChars = 0;
        const parts: string[] = [];

        for (const { chunk } of context) {
            const content = chunk.content.trim();
            if (!content) continue;

            const part = `${sourceLabel(chunk.sourceFilename, chunk.pageNumber)}\n${content}`;
            const partLength =
                part.length + (parts.length > 0 ? CONTEXT_SEPARATOR.length : 0);
            if (totalChars + partLength > maxChars) {
                break;
            }
            parts.push(part);
            totalChars += partLength;
        }

        return parts.join(CONTEXT_SEPARATOR);
    }
}

/**
 * Newest turns whose estimated size fits the budget, oldest first
 */
function recentTurns(history: ConversationHistory, maxTokens: number): ChatMessage[] {
    const kept: ChatMessage[] = [];
    let used = 0;

    for (let i = history.length - 1; i >= 0; i--) {
        const { role, content } = history[i];
        used += estimateTokens(content);
        if (used > maxTokens) {
            break;
        }
        kept.unshift({ role, content });
    }

    return kept;
}

function sourceLabel(filename: string, pageNumber: number | null): string {
    return pageNumber === null
        ? `[Source: ${filename}]`
        : `[Source: ${filename}, page ${pageNumber}]`;
}

function buildSystemPrompt(context: string): string {
    return `You are 'DocQuery AI', a professional AI assistant. Answer the user's questions based on the provided document context. If the context doesn't contain the answer, say so. Be concise and polite.

Context:
${context}`;
}
