import type { Request, Response, NextFunction } from 'express';
import { AppError, ConsistencyError, ProviderError } from '../../../domain/errors/AppError';
import { ZodError } from 'zod';
import logger from '../../logger';

export const errorHandler = (
    err: Error,
    req: Request,
    res: Response,
    next: NextFunction
) => {
    if (err instanceof ZodError) {
        logger.warn('Request validation failed', { path: req.path, issues: err.issues.length });
        res.status(400).json({
            status: 'fail',
            message: 'Validation Error',
            errors: err.issues,
        });
        return;
    }

    if (err instanceof AppError) {
        const meta: Record<string, unknown> = { name: err.name, path: req.path, statusCode: err.statusCode };
        if (err instanceof ProviderError) meta.timedOut = err.timedOut;
        if (err instanceof ConsistencyError) meta.documentIds = err.documentIds;

        if (err.statusCode >= 500) {
            logger.error(err.message, meta);
        } else {
            logger.warn(err.message, meta);
        }

        res.status(err.statusCode).json({
            status: 'error',
            code: err.name,
            message: err.message,
        });
        return;
    }

    logger.error('Unhandled error', { path: req.path, error: err.message, stack: err.stack });

    // Fallback for unhandled errors
    res.status(500).json({
        status: 'error',
        message: 'Internal Server Error',
    });
};
