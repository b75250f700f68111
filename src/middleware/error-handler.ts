import type { ErrorRequestHandler, NextFunction, Request, RequestHandler, Response } from 'express';
import multer from 'multer';
import { ZodError } from 'zod';
import type { ILogger } from '../config/logger';
import { AppError, describeErrorChain, getHttpStatus } from '../utils/errors';

type AsyncRequestHandler = (req: Request, res: Response, next: NextFunction) => Promise<void>;

/**
 * Forward rejections from an async handler to the error middleware.
 */
export function asyncHandler(handler: AsyncRequestHandler): RequestHandler {
    return (req, res, next) => {
        handler(req, res, next).catch(next);
    };
}

export function notFoundHandler(req: Request, res: Response): void {
    res.status(404).json({ error: 'Not found', path: req.path });
}

/**
 * Maps errors to responses:
 * - ZodError → 400 with the issues under `details`
 * - MulterError (upload limits) → 400
 * - AppError → its HTTP status and `toJSON()` body
 * - anything else → 500 without internals
 */
export function errorHandler(logger: ILogger): ErrorRequestHandler {
    return (error: unknown, req: Request, res: Response, _next: NextFunction) => {
        if (error instanceof ZodError) {
            res.status(400).json({ error: 'Validation failed', details: error.errors });
            return;
        }

        if (error instanceof multer.MulterError) {
            res.status(400).json({ error: 'Upload rejected', message: error.message, code: error.code });
            return;
        }

        if (error instanceof AppError) {
            const status = getHttpStatus(error);
            const log = { method: req.method, path: req.path, status, errors: describeErrorChain(error) };
            if (status >= 500) {
                logger.error(log, 'Request failed');
            } else {
                logger.warn(log, 'Request rejected');
            }
            res.status(status).json(error.toJSON());
            return;
        }

        logger.error({ method: req.method, path: req.path, errors: describeErrorChain(error) }, 'Unhandled error');
        res.status(500).json({ error: 'InternalServerError', message: 'Internal server error' });
    };
}
