import { Chunk } from '../../domain/entities/Chunk';
import type { ScoredResult } from '../../domain/entities/ScoredResult';
import { ConfigurationError, ConsistencyError } from '../../domain/errors/AppError';
import { compareChunkIds } from '../utils/chunkId';
import { Tokenizer } from '../utils/tokenizer';

export interface LexicalIndexConfig {
    k1: number;
    b: number;
    stopwords: string[];
}

/**
 * Rescales raw scores to [0, 1] by the list maximum. An empty list or a
 * non-positive maximum gives all zeros.
 */
export function normalizeByMax<T extends { rawScore: number }>(results: T[]): Array<T & { normalizedScore: number }> {
    const max = results.reduce((best, result) => Math.max(best, result.rawScore), 0);
    return results.map(result => ({
        ...result,
        normalizedScore: max > 0 ? Math.max(0, result.rawScore) / max : 0,
    }));
}

/**
 * Inverted index with Okapi BM25 scoring over chunk text.
 */
export class LexicalIndex {
    private readonly tokenizer: Tokenizer;
    private postings = new Map<string, Map<string, number>>();
    private chunkLengths = new Map<string, number>();
    private chunkTerms = new Map<string, string[]>();
    private documentChunks = new Map<string, Set<string>>();
    private totalLength = 0;

    constructor(private config: LexicalIndexConfig) {
        if (config.k1 < 0 || config.b < 0 || config.b > 1) {
            throw new ConfigurationError(`Invalid BM25 parameters k1=${config.k1} b=${config.b}`);
        }
        this.tokenizer = new Tokenizer(config.stopwords);
    }

    get size(): number {
        return this.chunkLengths.size;
    }

    get vocabularySize(): number {
        return this.postings.size;
    }

    has(chunkId: string): boolean {
        return this.chunkLengths.has(chunkId);
    }

    chunkIds(): string[] {
        return [...this.chunkLengths.keys()];
    }

    add(chunk: Chunk): void {
        if (this.has(chunk.id)) {
            throw new ConsistencyError(`Chunk ${chunk.id} is already in the lexical index`, [chunk.documentId]);
        }

        const tokens = this.tokenizer.tokenize(chunk.content);
        const frequencies = new Map<string, number>();
        for (const token of tokens) {
            frequencies.set(token, (frequencies.get(token) ?? 0) + 1);
        }

        for (const [term, frequency] of frequencies) {
            let posting = this.postings.get(term);
            if (!posting) {
                posting = new Map();
                this.postings.set(term, posting);
            }
            posting.set(chunk.id, frequency);
        }

        this.chunkLengths.set(chunk.id, tokens.length);
        this.chunkTerms.set(chunk.id, [...frequencies.keys()]);
        this.totalLength += tokens.length;

        let chunks = this.documentChunks.get(chunk.documentId);
        if (!chunks) {
            chunks = new Set();
            this.documentChunks.set(chunk.documentId, chunks);
        }
        chunks.add(chunk.id);
    }

    /**
     * Drops every posting of the document's chunks. Returns how many chunks
     * were removed.
     */
    remove(documentId: string): number {
        const chunks = this.documentChunks.get(documentId);
        if (!chunks) {
            return 0;
        }

        for (const chunkId of chunks) {
            this.dropChunk(chunkId);
        }
        this.documentChunks.delete(documentId);
        return chunks.size;
    }

    private dropChunk(chunkId: string): void {
        for (const term of this.chunkTerms.get(chunkId) ?? []) {
            const posting = this.postings.get(term);
            if (!posting) continue;
            posting.delete(chunkId);
            if (posting.size === 0) {
                this.postings.delete(term);
            }
        }

        this.totalLength -= this.chunkLengths.get(chunkId) ?? 0;
        this.chunkLengths.delete(chunkId);
        this.chunkTerms.delete(chunkId);
    }

    search(query: string, k: number): ScoredResult[] {
        if (k <= 0 || this.size === 0) {
            return [];
        }

        const terms = [...new Set(this.tokenizer.tokenize(query))];
        if (terms.length === 0) {
            return [];
        }

        const { k1, b } = this.config;
        const n = this.size;
        const averageLength = this.totalLength / n;
        const scores = new Map<string, number>();

        for (const term of terms) {
            const posting = this.postings.get(term);
            if (!posting) continue;

            const idf = Math.log((n - posting.size + 0.5) / (posting.size + 0.5) + 1);

            for (const [chunkId, frequency] of posting) {
                const length = this.chunkLengths.get(chunkId) ?? 0;
                const lengthRatio = averageLength > 0 ? length / averageLength : 1;
                const weight = (frequency * (k1 + 1)) / (frequency + k1 * (1 - b + b * lengthRatio));
                scores.set(chunkId, (scores.get(chunkId) ?? 0) + idf * weight);
            }
        }

        const ranked = [...scores.entries()]
            .filter(([, score]) => score > 0)
            .map(([chunkId, rawScore]) => ({ chunkId, rawScore, source: 'lexical' as const }))
            .sort((left, right) => right.rawScore - left.rawScore || compareChunkIds(left.chunkId, right.chunkId))
            .slice(0, k);

        return normalizeByMax(ranked);
    }

    clear(): void {
        this.postings.clear();
        this.chunkLengths.clear();
        this.chunkTerms.clear();
        this.documentChunks.clear();
        this.totalLength = 0;
    }
}
