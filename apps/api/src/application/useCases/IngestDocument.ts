import type { IngestDocumentRequest } from '@doc-qa/types';
import { type CallOptions, type IngestResult, RetrievalEngine } from '../services/RetrievalEngine';
import { ValidationError } from '../../domain/errors/AppError';

export class IngestDocument {
    constructor(private engine: RetrievalEngine) {}

    async execute(request: IngestDocumentRequest, options?: CallOptions): Promise<IngestResult> {
        this.validateContent(request.content);
        return this.engine.ingest(request, options);
    }

    private validateContent(content: string | string[]): void {
        const sections = Array.isArray(content) ? content : [content];
        if (sections.every(section => section.trim().length === 0)) {
            throw new ValidationError('Document has no text to index');
        }
    }
}
