/**
 * LLM Service
 * Chat completions with the configured model and default temperature
 */

import env from '../../config/env';
import type {
    ChatCompleter,
    ChatMessage,
    Completion,
    CompletionOptions,
} from '../../types/llm';
import { createChatProvider } from '../../provider';
import { ddl } from '../dd';

export class LLMService implements ChatCompleter {
    constructor(
        private readonly provider: ChatCompleter,
        private readonly defaultTemperature: number
    ) {}

    async complete(
        messages: ChatMessage[],
        options: CompletionOptions = {}
    ): Promise<Completion> {
        const startedAt = Date.now();
        const completion = await this.provider.complete(messages, {
            ...options,
            temperature: options.temperature ?? this.defaultTemperature,
        });

        ddl(
            `[LLMService] ${messages.length} messages -> ${completion.content.length} chars in ${
                Date.now() - startedAt
            }ms, finish=${completion.finishReason}`
        );

        return completion;
    }
}

let defaultLLMService: LLMService | null = null;

export function getLLMService(): LLMService {
    if (!defaultLLMService) {
        defaultLLMService = new LLMService(createChatProvider(), env.LLM_TEMPERATURE);
    }
    return defaultLLMService;
}
