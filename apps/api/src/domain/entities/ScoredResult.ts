export type RetrievalSource = 'lexical' | 'vector';

export interface ScoredResult {
    chunkId: string;
    rawScore: number;
    normalizedScore: number;
    source: RetrievalSource;
}

export interface FusedResult {
    chunkId: string;
    score: number;
    lexicalScore: number;
    vectorScore: number;
    sources: RetrievalSource[];
}
