import express, { type Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import morgan from 'morgan';
import env from './config/env';
import { errorHandler, notFoundHandler } from './middleware/error';
import { requestIdMiddleware } from './middleware/requestId';
import { createRoutes } from './routes';
import type { DocQueryService } from './modules/ragBot/service';

export const createApp = (service: DocQueryService): Express => {
    const app = express();

    // Request ID middleware (should be early in the chain)
    app.use(requestIdMiddleware);

    // Security and performance middleware
    app.use(helmet());
    app.use(
        cors({
            origin: env.CORS_ORIGIN,
            credentials: true,
        })
    );
    app.use(compression());

    // Body parsing middleware
    app.use(express.json());
    app.use(express.urlencoded({ extended: true }));

    // Logging middleware
    if (env.NODE_ENV === 'development') {
        app.use(morgan('dev'));
    } else if (env.NODE_ENV === 'production') {
        app.use(morgan('combined'));
    }

    app.get('/', (req, res) => {
        res.json({ status: 'DocQuery API is running and ready.' });
    });

    // Health check endpoint
    app.get('/health', (req, res) => {
        res.json({ status: 'ok', timestamp: new Date().toISOString() });
    });

    app.use(createRoutes(service));

    // Error handling
    app.use(notFoundHandler);
    app.use(errorHandler);

    return app;
};
