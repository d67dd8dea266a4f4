import { describe, it, expect } from 'vitest';
import {
    AnswerSynthesizer,
    NOT_FOUND_ANSWER,
} from '../../src/lib/rag/answerSynthesizer';
import { SynthesisFailedError } from '../../src/types/errors';
import type { Chunk, ScoredChunk } from '../../src/types/document';
import type { ChatCompleter } from '../../src/types/llm';
import { FakeChatModel } from '../helpers/fakes';

const scored = (content: string, pageNumber: number | null = 1, score = 0.9): ScoredChunk => {
    const chunk: Chunk = {
        chunkIndex: 0,
        content,
        overlapWithPrevious: 0,
        sourceFilename: 'notes.pdf',
        pageNumber,
        startChar: 0,
        endChar: content.length,
    };
    return { chunk, score };
};

const options = { maxContextTokens: 4000, maxHistoryTokens: 2000 };

describe('AnswerSynthesizer', () => {
    it('answers from the supplied context', async () => {
        const model = new FakeChatModel();
        const synthesizer = new AnswerSynthesizer(model, options);

        const answer = await synthesizer.synthesize('What color is the sky?', [], [
            scored('The sky is blue.'),
        ]);

        expect(answer).toBe('The sky is blue.');
    });

    it('returns the not-found answer without a model call when the context is empty', async () => {
        const model = new FakeChatModel();
        const synthesizer = new AnswerSynthesizer(model, options);

        expect(await synthesizer.synthesize('Anything?', [], [])).toBe(NOT_FOUND_ANSWER);
        expect(await synthesizer.synthesize('Anything?', [], [scored('   ')])).toBe(
            NOT_FOUND_ANSWER
        );
        expect(model.calls).toHaveLength(0);
    });

    it('frames the model with the labelled context, then history, then the question', async () => {
        const model = new FakeChatModel();
        const synthesizer = new AnswerSynthesizer(model, options);

        await synthesizer.synthesize(
            'And the grass?',
            [
                { role: 'user', content: 'What color is the sky?' },
                { role: 'assistant', content: 'Blue.' },
            ],
            [scored('The sky is blue.', 2), scored('Grass is green.', null)]
        );

        const [system, ...rest] = model.calls[0];
        expect(system.role).toBe('system');
        expect(system.content).toContain(
            'Context:\n[Source: notes.pdf, page 2]\nThe sky is blue.\n\n---\n\n[Source: notes.pdf]\nGrass is green.'
        );
        expect(rest).toEqual([
            { role: 'user', content: 'What color is the sky?' },
            { role: 'assistant', content: 'Blue.' },
            { role: 'user', content: 'And the grass?' },
        ]);
    });

    it('keeps only the newest history that fits the history budget', async () => {
        const model = new FakeChatModel();
        const synthesizer = new AnswerSynthesizer(model, {
            maxContextTokens: 4000,
            maxHistoryTokens: 3,
        });

        await synthesizer.synthesize(
            'Next?',
            [
                { role: 'user', content: 'an old question' },
                { role: 'assistant', content: 'recent' },
            ],
            [scored('Some fact.')]
        );

        // 'recent' is 2 tokens, 'an old question' would add 4 more
        expect(model.calls[0].slice(1)).toEqual([
            { role: 'assistant', content: 'recent' },
            { role: 'user', content: 'Next?' },
        ]);
    });

    it('stops adding chunks once the context budget is spent', () => {
        const synthesizer = new AnswerSynthesizer(new FakeChatModel(), {
            maxContextTokens: 10,
            maxHistoryTokens: 100,
        });

        // each part is '[Source: notes.pdf, page 1]\n' (28 chars) plus the content
        const context = synthesizer.buildContext([scored('a'.repeat(10)), scored('b'.repeat(10))]);

        expect(context).toBe(`[Source: notes.pdf, page 1]\n${'a'.repeat(10)}`);
    });

    it('falls back to the not-found answer on an empty completion', async () => {
        const blank: ChatCompleter = {
            complete: async () => ({
                content: ' ',
                finishReason: 'STOP',
            }),
        };
        const synthesizer = new AnswerSynthesizer(blank, options);

        expect(await synthesizer.synthesize('Q?', [], [scored('Fact.')])).toBe(NOT_FOUND_ANSWER);
    });

    it('wraps model failures', async () => {
        const model = new FakeChatModel({ failSynthesis: new Error('503 from provider') });
        const synthesizer = new AnswerSynthesizer(model, options);

        await expect(
            synthesizer.synthesize('Q?', [], [scored('Fact.')])
        ).rejects.toBeInstanceOf(SynthesisFailedError);
    });
});
