// types/llm.ts

export type MessageRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
    role: MessageRole;
    content: string;
}

export interface CompletionOptions {
    temperature?: number;
    maxOutputTokens?: number;
}

export interface Completion {
    content: string;
    /**
     * Provider stop reason, e.g. STOP or MAX_TOKENS
     */
    finishReason: string | null;
}

/**
 * What the rewriter and the synthesizer need from a generative model
 */
export interface ChatCompleter {
    complete(
        messages: ChatMessage[],
        options?: CompletionOptions
    ): Promise<Completion>;
}
