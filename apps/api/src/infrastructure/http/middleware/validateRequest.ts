import type { Request, Response, NextFunction } from 'express';
import type { ZodType } from 'zod';

/**
 * Parses the body against `schema` and replaces it with the parsed value,
 * so handlers see defaults and stripped unknown keys.
 */
export const validateRequest = (schema: ZodType) => {
    return async (req: Request, res: Response, next: NextFunction) => {
        try {
            req.body = await schema.parseAsync(req.body);
            next();
        } catch (error) {
            next(error);
        }
    };
};
