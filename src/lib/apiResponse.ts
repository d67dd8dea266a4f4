import type { Request, Response } from 'express';
import { getRequestId } from '../middleware/requestId';

export interface ApiResponseMeta {
    requestId?: string;
    timestamp?: string;
    [key: string]: unknown;
}

export interface ApiResponse<T = unknown> {
    success: boolean;
    data?: T;
    error?: {
        code: string;
        message: string;
        details?: Record<string, unknown>;
    };
    meta?: ApiResponseMeta;
}

export const sendSuccess = <T>(
    req: Request,
    res: Response,
    data: T,
    statusCode = 200,
    meta?: Omit<ApiResponseMeta, 'requestId' | 'timestamp'>
): Response => {
    const requestId = getRequestId(req);
    const response: ApiResponse<T> = {
        success: true,
        data,
        meta: {
            requestId,
            timestamp: new Date().toISOString(),
            ...meta,
        },
    };
    return res.status(statusCode).json(response);
};

export const sendError = (
    req: Request,
    res: Response,
    statusCode: number,
    code: string,
    message: string,
    details?: Record<string, unknown>
): Response => {
    const requestId = getRequestId(req);
    const response: ApiResponse = {
        success: false,
        error: {
            code,
            message,
            ...(details && { details }),
        },
        meta: {
            requestId,
            timestamp: new Date().toISOString(),
        },
    };
    return res.status(statusCode).json(response);
};
