import type { FusedResult, RetrievalSource, ScoredResult } from '../../domain/entities/ScoredResult';
import { ConfigurationError } from '../../domain/errors/AppError';
import { compareChunkIds } from '../utils/chunkId';

export interface FusionWeights {
    lexical: number;
    vector: number;
}

export type FusionStrategy = 'weighted' | 'rrf';

export interface FusionConfig {
    strategy: FusionStrategy;
    rrfK: number;
}

export function validateWeights(weights: FusionWeights): void {
    const { lexical, vector } = weights;
    if (!Number.isFinite(lexical) || !Number.isFinite(vector) || lexical < 0 || vector < 0) {
        throw new ConfigurationError(`Fusion weights must be non-negative numbers, got lexical=${lexical} vector=${vector}`);
    }
    if (lexical + vector <= 0) {
        throw new ConfigurationError('Fusion weights must sum to a positive number');
    }
}

interface Accumulator {
    score: number;
    lexicalScore: number;
    vectorScore: number;
    sources: RetrievalSource[];
}

export class FusionRanker {
    constructor(private config: FusionConfig = { strategy: 'weighted', rrfK: 60 }) {
        if (!Number.isFinite(config.rrfK) || config.rrfK <= 0) {
            throw new ConfigurationError(`rrfK must be positive, got ${config.rrfK}`);
        }
    }

    fuse(lexicalResults: ScoredResult[], vectorResults: ScoredResult[], weights: FusionWeights): FusedResult[] {
        validateWeights(weights);

        const scoreMap = new Map<string, Accumulator>();
        const contribute = (results: ScoredResult[], source: RetrievalSource, weight: number) => {
            results.forEach((result, index) => {
                const contribution = this.config.strategy === 'rrf'
                    ? weight / (this.config.rrfK + index + 1)
                    : weight * result.normalizedScore;

                let entry = scoreMap.get(result.chunkId);
                if (!entry) {
                    entry = { score: 0, lexicalScore: 0, vectorScore: 0, sources: [] };
                    scoreMap.set(result.chunkId, entry);
                }
                entry.score += contribution;
                if (!entry.sources.includes(source)) {
                    entry.sources.push(source);
                }
                if (source === 'lexical') {
                    entry.lexicalScore = result.normalizedScore;
                } else {
                    entry.vectorScore = result.normalizedScore;
                }
            });
        };

        contribute(lexicalResults, 'lexical', weights.lexical);
        contribute(vectorResults, 'vector', weights.vector);

        return [...scoreMap.entries()]
            .map(([chunkId, entry]) => ({ chunkId, ...entry }))
            .sort((left, right) => right.score - left.score || compareChunkIds(left.chunkId, right.chunkId));
    }
}
