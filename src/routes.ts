import { Router } from 'express';
import { createRagBotRouter } from './modules/ragBot/route';
import type { DocQueryService } from './modules/ragBot/service';

export const createRoutes = (service: DocQueryService): Router => {
    const router = Router();

    router.use('/rag-bot', createRagBotRouter(service));

    return router;
};
