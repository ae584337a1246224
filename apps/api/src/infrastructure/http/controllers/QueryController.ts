import { type Request, type Response, Router } from 'express';
import { queryDocumentsSchema, type QueryDocumentsRequest } from '@doc-qa/types';
import { QueryDocuments } from '../../../application/useCases/QueryDocuments';
import type { Controller } from '../interfaces/Controller';
import { validateRequest } from '../middleware/validateRequest';

export class QueryController implements Controller {
    public path = '/query';
    public router = Router();

    constructor(private queryDocuments: QueryDocuments) {
        this.initializeRoutes();
    }

    private initializeRoutes() {
        this.router.post(`${this.path}`, validateRequest(queryDocumentsSchema), this.handle.bind(this));
    }

    async handle(req: Request, res: Response) {
        const request: QueryDocumentsRequest = req.body;
        const abortController = new AbortController();
        const onClose = () => {
            if (!res.writableEnded) abortController.abort();
        };
        res.on('close', onClose);

        try {
            const window = await this.queryDocuments.execute(request, { signal: abortController.signal });
            res.json(window);
        } finally {
            res.off('close', onClose);
        }
    }
}
