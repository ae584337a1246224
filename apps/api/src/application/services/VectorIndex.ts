import type { ScoredResult } from '../../domain/entities/ScoredResult';
import { ConfigurationError, ConsistencyError } from '../../domain/errors/AppError';
import { compareChunkIds, parseChunkId } from '../utils/chunkId';
import { normalizeByMax } from './LexicalIndex';

export interface VectorIndexConfig {
    dimension: number;
    minSimilarity?: number;
}

export function l2Normalize(vector: readonly number[]): number[] {
    const norm = Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0));
    if (norm === 0) {
        return vector.map(() => 0);
    }
    return vector.map(value => value / norm);
}

function dot(a: readonly number[], b: readonly number[]): number {
    let sum = 0;
    for (let i = 0; i < a.length; i++) {
        sum += a[i] * b[i];
    }
    return sum;
}

/**
 * Exact nearest-neighbour index. Vectors are L2-normalised on insertion so
 * the dot product is the cosine similarity.
 */
export class VectorIndex {
    private vectors = new Map<string, number[]>();
    private documentChunks = new Map<string, Set<string>>();

    constructor(private config: VectorIndexConfig) {
        if (!Number.isInteger(config.dimension) || config.dimension <= 0) {
            throw new ConfigurationError(`Embedding dimension must be a positive integer, got ${config.dimension}`);
        }
    }

    get dimension(): number {
        return this.config.dimension;
    }

    get size(): number {
        return this.vectors.size;
    }

    has(chunkId: string): boolean {
        return this.vectors.has(chunkId);
    }

    chunkIds(): string[] {
        return [...this.vectors.keys()];
    }

    /**
     * Stored (normalised) vectors of a document, keyed by chunk id.
     */
    vectorsOf(documentId: string): Map<string, number[]> {
        const result = new Map<string, number[]>();
        for (const chunkId of this.documentChunks.get(documentId) ?? []) {
            const vector = this.vectors.get(chunkId);
            if (vector) {
                result.set(chunkId, [...vector]);
            }
        }
        return result;
    }

    assertDimension(vector: readonly number[]): void {
        if (vector.length !== this.config.dimension) {
            throw new ConfigurationError(
                `Embedding dimension mismatch: index expects ${this.config.dimension}, got ${vector.length}`
            );
        }
    }

    add(chunkId: string, vector: readonly number[]): void {
        this.assertDimension(vector);
        if (this.vectors.has(chunkId)) {
            throw new ConsistencyError(`Chunk ${chunkId} is already in the vector index`);
        }

        const { documentId } = parseChunkId(chunkId);
        this.vectors.set(chunkId, l2Normalize(vector));

        let chunks = this.documentChunks.get(documentId);
        if (!chunks) {
            chunks = new Set();
            this.documentChunks.set(documentId, chunks);
        }
        chunks.add(chunkId);
    }

    remove(documentId: string): number {
        const chunks = this.documentChunks.get(documentId);
        if (!chunks) {
            return 0;
        }
        for (const chunkId of chunks) {
            this.vectors.delete(chunkId);
        }
        this.documentChunks.delete(documentId);
        return chunks.size;
    }

    /**
     * Linear scan. Normalised scores use list-max normalisation with
     * negative similarities clamped to zero.
     */
    search(queryVector: readonly number[], k: number): ScoredResult[] {
        this.assertDimension(queryVector);
        if (k <= 0 || this.vectors.size === 0) {
            return [];
        }

        const query = l2Normalize(queryVector);
        const minSimilarity = this.config.minSimilarity ?? -1;
        const scored: Array<{ chunkId: string; rawScore: number; source: 'vector' }> = [];

        for (const [chunkId, vector] of this.vectors) {
            const similarity = dot(query, vector);
            if (similarity >= minSimilarity) {
                scored.push({ chunkId, rawScore: similarity, source: 'vector' });
            }
        }

        scored.sort((left, right) => right.rawScore - left.rawScore || compareChunkIds(left.chunkId, right.chunkId));
        return normalizeByMax(scored.slice(0, k));
    }

    clear(): void {
        this.vectors.clear();
        this.documentChunks.clear();
    }
}
