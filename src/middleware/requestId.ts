import type { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'crypto';

declare global {
    namespace Express {
        interface Request {
            id?: string;
        }
    }
}

const headerValue = (req: Request): string | undefined => {
    const header = req.headers['x-request-id'];
    return Array.isArray(header) ? header[0] : header;
};

/**
 * Middleware to generate and attach a unique request ID to each request
 * The requestId can be accessed via req.id or req.headers['x-request-id']
 */
export const requestIdMiddleware = (
    req: Request,
    res: Response,
    next: NextFunction
) => {
    // Check if request ID is already present in headers (e.g., from a load balancer)
    const requestId = headerValue(req) || randomUUID();

    req.id = requestId;

    res.setHeader('X-Request-ID', requestId);

    next();
};

/**
 * Helper function to get requestId from request object
 */
export const getRequestId = (req: Request): string => {
    return req.id || headerValue(req) || randomUUID();
};
