import { RetrievalEngine } from '../services/RetrievalEngine';

export class RemoveDocument {
    constructor(private engine: RetrievalEngine) {}

    async execute(documentId: string): Promise<{ documentId: string; removedChunks: number }> {
        return this.engine.removeDocument(documentId);
    }

    async executeClear(): Promise<number> {
        return this.engine.clear();
    }
}
