// types/conversation.ts

export const CONVERSATION_ROLES = ['user', 'assistant'] as const;

export type ConversationRole = (typeof CONVERSATION_ROLES)[number];

export interface ConversationTurn {
    role: ConversationRole;
    content: string;
}

export type ConversationHistory = ConversationTurn[];

/**
 * Standalone query produced by the rewriter and fed to the embedder
 */
export type SearchQuery = string;

export interface AnswerSource {
    filename: string;
    pageNumber: number | null;
    chunkIndex: number;
    score: number;
}

export interface AskResult {
    answer: string;
    searchQuery: SearchQuery;
    sources: AnswerSource[];
}

export interface ProcessResult {
    sessionId: string;
    filenames: string[];
    segmentCount: number;
    chunkCount: number;
}
