import type { ContextWindowResponse, QueryDocumentsRequest } from '@doc-qa/types';
import { type QueryOptions, RetrievalEngine } from '../services/RetrievalEngine';

export class QueryDocuments {
    constructor(private engine: RetrievalEngine) {}

    async execute(request: QueryDocumentsRequest, options?: QueryOptions): Promise<ContextWindowResponse> {
        const window = await this.engine.query(request.question, request.k, request.budget, options);
        return window.toResponse();
    }
}
