import type { Request, Response } from 'express';
import { sendSuccess } from '../../lib/apiResponse';
import { ddl } from '../../lib/dd';
import type { Document } from '../../types/document';
import type { AskQuestionBody } from './schema';
import type { DocQueryService } from './service';

export class RagBotController {
    constructor(private readonly service: DocQueryService) {}

    /**
     * POST /rag-bot/process-pdf
     */
    processPdf = async (req: Request, res: Response) => {
        const files = Array.isArray(req.files) ? req.files : [];
        ddl('route: POST /rag-bot/process-pdf', files.length, 'files');

        const documents: Document[] = files.map((file) => ({
            filename: file.originalname,
            contentType: file.mimetype,
            bytes: file.buffer,
        }));

        const result = await this.service.processDocuments(documents);

        return sendSuccess(req, res, {
            message: `Successfully processed ${result.filenames.length} PDF(s).`,
            filenames: result.filenames,
            segmentCount: result.segmentCount,
            chunkCount: result.chunkCount,
        });
    };

    /**
     * POST /rag-bot/ask
     * Body has already been through validate(askQuestionSchema)
     */
    ask = async (req: Request, res: Response) => {
        const { question, chat_history }: AskQuestionBody = req.body;
        ddl('route: POST /rag-bot/ask ->', question);

        const result = await this.service.askQuestion(question, chat_history);

        return sendSuccess(req, res, result);
    };

    /**
     * GET /rag-bot/status
     */
    getStatus = async (req: Request, res: Response) => {
        return sendSuccess(req, res, this.service.getStatus());
    };

    /**
     * DELETE /rag-bot/history
     */
    resetHistory = async (req: Request, res: Response) => {
        await this.service.resetConversation();
        return sendSuccess(req, res, { message: 'Conversation history cleared.' });
    };
}
