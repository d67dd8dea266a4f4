import { Router } from 'express';
import { asyncHandler } from '../../lib/asyncHandler';
import { validate } from '../../middleware/validate';
import { uploadDocuments } from '../../middleware/upload';
import { askQuestionSchema } from './schema';
import { RagBotController } from './controller';
import type { DocQueryService } from './service';

export const createRagBotRouter = (service: DocQueryService): Router => {
    const router = Router();
    const controller = new RagBotController(service);

    // Upload and index PDFs, replacing the current session
    router.post(
        '/process-pdf',
        uploadDocuments,
        asyncHandler(controller.processPdf)
    );

    router.post(
        '/ask',
        validate(askQuestionSchema),
        asyncHandler(controller.ask)
    );

    router.get('/status', asyncHandler(controller.getStatus));

    router.delete('/history', asyncHandler(controller.resetHistory));

    return router;
};
