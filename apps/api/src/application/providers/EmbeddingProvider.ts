/**
 * Maps text to a dense vector of fixed dimension. Implementations may fail
 * with transient or permanent errors; callers treat both as a failure of
 * the operation at hand.
 */
export interface EmbeddingProvider {
    generateEmbedding(text: string, signal?: AbortSignal): Promise<number[]>;
    generateEmbeddings(texts: string[], signal?: AbortSignal): Promise<number[][]>;
}
