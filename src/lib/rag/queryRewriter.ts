// lib/rag/queryRewriter.ts
import type { ChatCompleter, ChatMessage } from '../../types/llm';
import type {
    ConversationHistory,
    SearchQuery,
} from '../../types/conversation';
import { RewriteFailedError } from '../../types/errors';
import { ddl } from '../dd';

export const REWRITE_INSTRUCTION =
    'Given the above conversation, generate a search query to look up in order to get information relevant to the conversation';

/**
 * Turns a follow-up question into a standalone search query
 */
export class QueryRewriter {
    constructor(private readonly model: ChatCompleter) {}

    async rewrite(
        question: string,
        history: ConversationHistory
    ): Promise<SearchQuery> {
        if (history.length === 0) {
            return question;
        }

        const messages: ChatMessage[] = [
            ...history.map((turn) => ({ role: turn.role, content: turn.content })),
            { role: 'user', content: question },
            { role: 'user', content: REWRITE_INSTRUCTION },
        ];

        let completion: string;
        try {
            const response = await this.model.complete(messages);
            completion = response.content.trim();
        } catch (error) {
            throw new RewriteFailedError(error);
        }

        ddl(`[QueryRewriter] "${question}" -> "${completion}"`);

        return completion || question;
    }
}
