import rateLimit from 'express-rate-limit';

/**
 * Global limiter: 100 requests per 15 minutes per IP address
 */
export const apiRateLimiter = rateLimit({
    windowMs: 15 * 60 * 1000,
    limit: 100,
    standardHeaders: true,
    legacyHeaders: false,
});

/**
 * Generation endpoints call the LLM; 10 requests per minute per IP address
 */
export const askRateLimiter = rateLimit({
    windowMs: 60 * 1000,
    limit: 10,
    message: 'Demasiadas preguntas, intenta de nuevo más tarde',
    standardHeaders: true,
    legacyHeaders: false,
});
