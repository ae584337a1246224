import { type Request, type Response, Router } from 'express';
import { askQuestionSchema, type AskQuestionRequest } from '@doc-qa/types';
import { Ask } from '../../../application/useCases/ask/Ask';
import type { Controller } from '../interfaces/Controller';
import { validateRequest } from '../middleware/validateRequest';
import { askRateLimiter } from '../middleware/rateLimiter';
import { AppError } from '../../../domain/errors/AppError';
import logger from '../../logger';

type StreamError =
    | { code: 'ABORTED' }
    | { code: 'RETRIEVAL_ERROR'; message?: string }
    | { code: 'LLM_ERROR'; message?: string };

export class AskController implements Controller {
    public path = '/ask';
    public router = Router();

    constructor(private askUseCase: Ask) {
        this.initializeRoutes();
    }

    private initializeRoutes() {
        this.router.post(`${this.path}`, askRateLimiter, validateRequest(askQuestionSchema), this.handle.bind(this));
        this.router.post(`${this.path}/stream`, askRateLimiter, validateRequest(askQuestionSchema), this.stream.bind(this));
    }

    async handle(req: Request, res: Response) {
        const { question, ...options }: AskQuestionRequest = req.body;
        const response = await this.askUseCase.execute(question, options);
        res.json(response);
    }

    async stream(req: Request, res: Response) {
        const { question, ...options }: AskQuestionRequest = req.body;

        // ─────────────────────────────────────────────
        // SSE headers
        // ─────────────────────────────────────────────
        res.setHeader('Content-Type', 'text/event-stream; charset=utf-8');
        res.setHeader('Cache-Control', 'no-cache, no-transform');
        res.setHeader('Connection', 'keep-alive');
        res.setHeader('X-Accel-Buffering', 'no');
        res.flushHeaders?.();

        const sendEvent = (event: string, data?: unknown) => {
            if (res.writableEnded) return;
            res.write(`event: ${event}\n`);
            if (data !== undefined) {
                res.write(`data: ${JSON.stringify(data)}\n`);
            }
            res.write('\n');
        };

        // ─────────────────────────────────────────────
        // Abort handling
        // ─────────────────────────────────────────────
        const abortController = new AbortController();

        // The request stream closes once its body is read; the response closes on disconnect
        const onClose = () => {
            if (!res.writableEnded && !abortController.signal.aborted) {
                abortController.abort();
            }
        };

        res.on('close', onClose);

        // ─────────────────────────────────────────────
        // Heartbeat (anti proxy timeouts)
        // ─────────────────────────────────────────────
        const heartbeat = setInterval(() => {
            if (!res.writableEnded) {
                res.write(': ping\n\n');
            }
        }, 15_000);

        try {
            const stream = this.askUseCase.executeStream(
                question,
                { ...options, signal: abortController.signal }
            );

            for await (const event of stream) {
                if (abortController.signal.aborted) {
                    break;
                }

                if (event.type === 'token') {
                    sendEvent('token', event.content);
                } else if (event.type === 'meta') {
                    sendEvent('meta', { citations: event.citations, questions: event.questions });
                } else if (event.type === 'done') {
                    sendEvent('done');
                }
            }
        } catch (err) {
            if (!abortController.signal.aborted) {
                logger.error('Ask stream failed', {
                    error: err instanceof Error ? err.message : String(err),
                    question: question.substring(0, 50),
                });
                sendEvent('error', (err instanceof AppError
                    ? { code: 'RETRIEVAL_ERROR', message: err.message }
                    : { code: 'LLM_ERROR', message: 'Failed generating response' }) satisfies StreamError);
            }
        } finally {
            clearInterval(heartbeat);
            res.off('close', onClose);
            res.end();
        }
    }
}
