// provider/geminiChatProvider.ts
import { z } from 'zod';
import type {
    ChatCompleter,
    ChatMessage,
    Completion,
    CompletionOptions,
} from '../types/llm';
import { BaseGeminiProvider, GeminiApiError } from './baseGeminiProvider';

interface GeminiContent {
    role: 'user' | 'model';
    parts: Array<{ text: string }>;
}

const generateContentSchema = z.object({
    candidates: z
        .array(
            z.object({
                content: z
                    .object({
                        parts: z.array(z.object({ text: z.string().optional() })).optional(),
                    })
                    .optional(),
                finishReason: z.string().optional(),
            })
        )
        .optional(),
    promptFeedback: z.object({ blockReason: z.string().optional() }).optional(),
});

/**
 * generateContent: system messages become the system instruction,
 * assistant turns are sent as the model role.
 */
export class GeminiChatProvider extends BaseGeminiProvider implements ChatCompleter {
    async complete(
        messages: ChatMessage[],
        options: CompletionOptions = {}
    ): Promise<Completion> {
        const data = await this.post(
            'generateContent',
            buildRequest(messages, options),
            generateContentSchema
        );

        const candidate = data.candidates?.[0];
        if (!candidate) {
            const blockReason = data.promptFeedback?.blockReason;
            throw new GeminiApiError(
                blockReason ? `Prompt blocked: ${blockReason}` : 'No candidates returned',
                blockReason ? 'PROMPT_BLOCKED' : 'NO_CANDIDATES',
                false
            );
        }

        return {
            content: (candidate.content?.parts ?? [])
                .map((part) => part.text ?? '')
                .join(''),
            finishReason: candidate.finishReason ?? null,
        };
    }
}

function buildRequest(messages: ChatMessage[], options: CompletionOptions) {
    const instructions = messages
        .filter((message) => message.role === 'system')
        .map((message) => message.content);

    const contents = messages
        .filter((message) => message.role !== 'system')
        .map(
            (message): GeminiContent => ({
                role: message.role === 'assistant' ? 'model' : 'user',
                parts: [{ text: message.content }],
            })
        );

    // generateContent rejects a conversation that opens with a model turn
    if (contents[0]?.role === 'model') {
        contents.unshift({ role: 'user', parts: [{ text: '(conversation start)' }] });
    }

    return {
        contents,
        ...(instructions.length > 0 && {
            systemInstruction: { parts: [{ text: instructions.join('\n\n') }] },
        }),
        generationConfig: {
            temperature: options.temperature,
            maxOutputTokens: options.maxOutputTokens,
        },
    };
}
