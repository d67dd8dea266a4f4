import type { Request, Response, NextFunction } from 'express';
import { ZodError, type ZodType } from 'zod';
import { sendError } from '../lib/apiResponse';
import { ddl } from '../lib/dd';

export const formatZodIssues = (error: ZodError): string[] =>
    error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);

/**
 * Validate body, query and params against a schema shaped
 * `{ body?, query?, params? }`. The parsed body replaces req.body so
 * controllers read normalized values.
 */
export const validate =
    (schema: ZodType<{ body?: unknown }>) =>
    async (req: Request, res: Response, next: NextFunction) => {
        try {
            const parsed = await schema.parseAsync({
                body: req.body,
                query: req.query,
                params: req.params,
            });
            if (parsed.body !== undefined) {
                req.body = parsed.body;
            }
            next();
        } catch (error) {
            if (error instanceof ZodError) {
                const messages = formatZodIssues(error);
                ddl('validation failed ->', messages);
                return sendError(
                    req,
                    res,
                    400,
                    'VALIDATION_ERROR',
                    'Validation failed',
                    {
                        errors: messages,
                    }
                );
            }
            next(error);
        }
    };
