import type { DocumentSummary } from '@doc-qa/types';
import { RetrievalEngine } from '../services/RetrievalEngine';
import { NotFoundError } from '../../domain/errors/AppError';

export interface DocumentDetail extends DocumentSummary {
    chunks: Array<{ id: string; position: number; startChar: number; endChar: number; section: number; length: number }>;
}

export class GetDocuments {
    constructor(private engine: RetrievalEngine) {}

    executeGetAll(): DocumentSummary[] {
        return this.engine.listDocuments();
    }

    executeGetById(id: string): DocumentDetail {
        const entry = this.engine.getDocument(id);
        const summary = this.engine.listDocuments().find(document => document.id === id);
        if (!entry || !summary) {
            throw new NotFoundError(`Document ${id} not found`);
        }

        return {
            ...summary,
            chunks: entry.chunks.map(chunk => ({
                id: chunk.id,
                position: chunk.position,
                startChar: chunk.startChar,
                endChar: chunk.endChar,
                section: chunk.section,
                length: chunk.length,
            })),
        };
    }
}
