import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { MulterError } from 'multer';
import { sendError } from '../lib/apiResponse';
import { DocQueryError } from '../types/errors';
import { getRequestId } from './requestId';
import { formatZodIssues } from './validate';

const multerMessages: Partial<Record<MulterError['code'], string>> = {
    LIMIT_FILE_SIZE: 'One of the files exceeds the maximum upload size.',
    LIMIT_FILE_COUNT: 'Too many files in one request.',
    LIMIT_UNEXPECTED_FILE: 'Files must be sent in the "files" field.',
};

const clientStatusOf = (error: Error): number | undefined => {
    if ('status' in error && typeof error.status === 'number') {
        return error.status >= 400 && error.status < 500
            ? error.status
            : undefined;
    }
    return undefined;
};

export const errorHandler = (
    error: Error,
    req: Request,
    res: Response,
    // Express recognises error middleware by its four parameters
    next: NextFunction
) => {
    const requestId = getRequestId(req);

    if (error instanceof DocQueryError) {
        if (error.category === 'external') {
            console.error(`[${requestId}] ${error.name}:`, error.message, error.originalError ?? '');
        }
        return sendError(
            req,
            res,
            error.statusCode,
            error.code,
            error.publicMessage,
            error.category === 'validation' ? error.details : undefined
        );
    }

    if (error instanceof ZodError) {
        return sendError(req, res, 400, 'VALIDATION_ERROR', 'Validation failed', {
            errors: formatZodIssues(error),
        });
    }

    if (error instanceof MulterError) {
        return sendError(
            req,
            res,
            400,
            error.code,
            multerMessages[error.code] ?? error.message
        );
    }

    // body-parser and friends tag client errors with a 4xx status
    const clientStatus = clientStatusOf(error);
    if (clientStatus !== undefined) {
        return sendError(req, res, clientStatus, 'BAD_REQUEST', error.message);
    }

    console.error(`[${requestId}] Unhandled error:`, error);

    return sendError(
        req,
        res,
        500,
        'INTERNAL_ERROR',
        'An unexpected error occurred'
    );
};

export const notFoundHandler = (req: Request, res: Response) => {
    sendError(
        req,
        res,
        404,
        'NOT_FOUND',
        `Route ${req.method} ${req.path} not found`
    );
};
