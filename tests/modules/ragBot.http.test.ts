import { describe, it, expect, afterEach } from 'vitest';
import fs from 'fs/promises';
import request from 'supertest';
import { createApp } from '../../src/app';
import { FakeChatModel, createTestService, type TestServiceParts } from '../helpers/fakes';

const PDF = 'application/pdf';

describe('HTTP API', () => {
    const created: TestServiceParts[] = [];

    const setup = (...args: Parameters<typeof createTestService>) => {
        const parts = createTestService(...args);
        created.push(parts);
        return { ...parts, app: createApp(parts.service) };
    };

    afterEach(async () => {
        for (const parts of created.splice(0)) {
            await fs.rm(parts.tempDir, { recursive: true, force: true });
        }
    });

    const uploadCapitals = (app: ReturnType<typeof setup>['app']) =>
        request(app)
            .post('/rag-bot/process-pdf')
            .attach('files', Buffer.from('Paris is the capital of France.'), {
                filename: 'france.pdf',
                contentType: PDF,
            })
            .attach('files', Buffer.from('Berlin is the capital of Germany.'), {
                filename: 'germany.pdf',
                contentType: PDF,
            });

    it('reports readiness on the root route', async () => {
        const { app } = setup();

        const res = await request(app).get('/');

        expect(res.status).toBe(200);
        expect(res.body).toEqual({ status: 'DocQuery API is running and ready.' });
        expect(res.headers['x-request-id']).toEqual(expect.any(String));
    });

    it('answers the health check', async () => {
        const { app } = setup();

        const res = await request(app).get('/health');

        expect(res.status).toBe(200);
        expect(res.body.status).toBe('ok');
    });

    it('echoes a caller supplied request id', async () => {
        const { app } = setup();

        const res = await request(app).get('/health').set('X-Request-ID', 'req-123');

        expect(res.headers['x-request-id']).toBe('req-123');
    });

    it('processes uploaded PDFs', async () => {
        const { app } = setup();

        const res = await uploadCapitals(app);

        expect(res.status).toBe(200);
        expect(res.body.success).toBe(true);
        expect(res.body.data).toEqual({
            message: 'Successfully processed 2 PDF(s).',
            filenames: ['france.pdf', 'germany.pdf'],
            segmentCount: 2,
            chunkCount: 2,
        });
    });

    it('rejects the whole upload when one file is not a PDF', async () => {
        const { app, service } = setup();

        const res = await request(app)
            .post('/rag-bot/process-pdf')
            .attach('files', Buffer.from('Paris is the capital of France.'), {
                filename: 'france.pdf',
                contentType: PDF,
            })
            .attach('files', Buffer.from('not a pdf'), {
                filename: 'photo.png',
                contentType: 'image/png',
            });

        expect(res.status).toBe(400);
        expect(res.body.error).toEqual({
            code: 'UNSUPPORTED_FORMAT',
            message: 'Invalid file type: photo.png. Please upload only PDF files.',
            details: { filename: 'photo.png', contentType: 'image/png' },
        });
        expect(service.getStatus().state).toBe('uninitialized');
    });

    it('rejects an upload without files', async () => {
        const { app } = setup();

        const res = await request(app).post('/rag-bot/process-pdf');

        expect(res.status).toBe(400);
        expect(res.body.error.code).toBe('EMPTY_DOCUMENT_SET');
    });

    it('refuses questions before processing', async () => {
        const { app } = setup();

        const res = await request(app).post('/rag-bot/ask').send({ question: 'Hello?' });

        expect(res.status).toBe(400);
        expect(res.body.error).toEqual({
            code: 'NO_ACTIVE_SESSION',
            message: 'No documents have been processed. Please upload one or more PDFs first.',
        });
    });

    it('validates the ask body', async () => {
        const { app } = setup();

        const blank = await request(app).post('/rag-bot/ask').send({ question: '  ' });
        const badRole = await request(app)
            .post('/rag-bot/ask')
            .send({ question: 'Hi?', chat_history: [{ role: 'system', content: 'x' }] });

        expect(blank.status).toBe(400);
        expect(blank.body.error.code).toBe('VALIDATION_ERROR');
        expect(badRole.status).toBe(400);
        expect(badRole.body.error.code).toBe('VALIDATION_ERROR');
    });

    it('answers questions against the processed documents', async () => {
        const { app } = setup();
        await uploadCapitals(app);

        const res = await request(app)
            .post('/rag-bot/ask')
            .send({ question: 'What is the capital of France?', chat_history: [] });

        expect(res.status).toBe(200);
        expect(res.body.data.answer).toBe('Paris is the capital of France.');
        expect(res.body.data.searchQuery).toBe('What is the capital of France?');
        expect(res.body.data.sources[0]).toMatchObject({
            filename: 'france.pdf',
            pageNumber: 1,
        });
    });

    it('answers from the normalized body when history is omitted', async () => {
        const { app, sessions } = setup();
        await uploadCapitals(app);

        const res = await request(app)
            .post('/rag-bot/ask')
            .send({ question: '  What is the capital of France?  ' });

        expect(res.status).toBe(200);
        expect(res.body.data.searchQuery).toBe('What is the capital of France?');
        expect(sessions.getHistory().map((turn) => turn.content)).toEqual([
            'What is the capital of France?',
            'Paris is the capital of France.',
        ]);
    });

    it('reports status and clears history', async () => {
        const { app } = setup();
        await uploadCapitals(app);
        await request(app).post('/rag-bot/ask').send({ question: 'What is the capital of France?' });

        const before = await request(app).get('/rag-bot/status');
        const cleared = await request(app).delete('/rag-bot/history');
        const after = await request(app).get('/rag-bot/status');

        expect(before.body.data).toMatchObject({
            state: 'active',
            isRebuilding: false,
            filenames: ['france.pdf', 'germany.pdf'],
            chunkCount: 2,
            turnCount: 2,
        });
        expect(cleared.status).toBe(200);
        expect(after.body.data.turnCount).toBe(0);
    });

    it('hides upstream failure details from the client', async () => {
        const { app } = setup({
            model: new FakeChatModel({ failSynthesis: new Error('provider key revoked') }),
        });
        await uploadCapitals(app);

        const res = await request(app)
            .post('/rag-bot/ask')
            .send({ question: 'What is the capital of France?' });

        expect(res.status).toBe(502);
        expect(res.body.error).toEqual({
            code: 'SYNTHESIS_FAILED',
            message: 'An error occurred while generating the answer.',
        });
    });

    it('returns a 404 envelope for unknown routes', async () => {
        const { app } = setup();

        const res = await request(app).get('/nope');

        expect(res.status).toBe(404);
        expect(res.body.error).toEqual({
            code: 'NOT_FOUND',
            message: 'Route GET /nope not found',
        });
    });
});
