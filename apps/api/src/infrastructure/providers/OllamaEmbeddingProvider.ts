import { OllamaEmbeddings } from '@langchain/ollama';
import type { EmbeddingProvider } from '../../application/providers/EmbeddingProvider';
import { CancelledError } from '../../domain/errors/AppError';

export interface OllamaEmbeddingConfig {
    model: string;
    baseUrl: string;
}

export class OllamaEmbeddingProvider implements EmbeddingProvider {
    private embeddings: OllamaEmbeddings;

    constructor(config: OllamaEmbeddingConfig = {
        model: process.env.OLLAMA_EMBEDDING_MODEL || 'nomic-embed-text',
        baseUrl: process.env.OLLAMA_BASE_URL || 'http://localhost:11434',
    }) {
        this.embeddings = new OllamaEmbeddings(config);
    }

    async generateEmbedding(text: string, signal?: AbortSignal): Promise<number[]> {
        this.throwIfAborted(signal);
        const vector = await this.embeddings.embedQuery(text);
        this.throwIfAborted(signal);
        return vector;
    }

    async generateEmbeddings(texts: string[], signal?: AbortSignal): Promise<number[][]> {
        if (texts.length === 0) return [];
        this.throwIfAborted(signal);
        const vectors = await this.embeddings.embedDocuments(texts);
        this.throwIfAborted(signal);
        return vectors;
    }

    // OllamaEmbeddings takes no per-call signal; the result of an aborted call is dropped
    private throwIfAborted(signal?: AbortSignal): void {
        if (signal?.aborted) {
            throw new CancelledError('Embedding request aborted');
        }
    }
}
