import { type Request, type Response, Router } from 'express';
import { ingestDocumentSchema, type IngestDocumentRequest } from '@doc-qa/types';
import { IngestDocument } from '../../../application/useCases/IngestDocument';
import { GetDocuments } from '../../../application/useCases/GetDocuments';
import { RemoveDocument } from '../../../application/useCases/RemoveDocument';
import type { Controller } from '../interfaces/Controller';
import { validateRequest } from '../middleware/validateRequest';

export class DocumentController implements Controller {
    public path = '/documents';
    public router = Router();

    constructor(
        private ingestDocument: IngestDocument,
        private getDocuments: GetDocuments,
        private removeDocument: RemoveDocument
    ) {
        this.initializeRoutes();
    }

    private initializeRoutes() {
        this.router.post(`${this.path}`, validateRequest(ingestDocumentSchema), this.create.bind(this));
        this.router.get(`${this.path}`, this.getAll.bind(this));
        this.router.get(`${this.path}/:id`, this.getById.bind(this));
        this.router.delete(`${this.path}/:id`, this.remove.bind(this));
        this.router.delete(`${this.path}`, this.clear.bind(this));
    }

    async create(req: Request, res: Response) {
        const request: IngestDocumentRequest = req.body;
        const result = await this.ingestDocument.execute(request);
        res.status(result.replaced ? 200 : 201).json(result);
    }

    async getAll(req: Request, res: Response) {
        res.json(this.getDocuments.executeGetAll());
    }

    async getById(req: Request, res: Response) {
        res.json(this.getDocuments.executeGetById(req.params.id));
    }

    async remove(req: Request, res: Response) {
        const result = await this.removeDocument.execute(req.params.id);
        res.json(result);
    }

    async clear(req: Request, res: Response) {
        const removedDocuments = await this.removeDocument.executeClear();
        res.json({ removedDocuments });
    }
}
