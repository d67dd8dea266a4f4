import { z } from 'zod';
import { CONVERSATION_ROLES } from '../../types/conversation';

export const chatTurnSchema = z.object({
    role: z.enum(CONVERSATION_ROLES),
    content: z.string(),
});

export const askQuestionSchema = z.object({
    body: z.object({
        question: z
            .string({ error: 'Question is required' })
            .trim()
            .min(1, 'Question must not be empty'),
        chat_history: z.array(chatTurnSchema).default([]),
    }),
});

export type AskQuestionBody = z.infer<typeof askQuestionSchema>['body'];
