import { Chunk } from '../../domain/entities/Chunk';
import { type ContextPassage, ContextWindow } from '../../domain/entities/ContextWindow';
import type { FusedResult } from '../../domain/entities/ScoredResult';
import { ConfigurationError } from '../../domain/errors/AppError';

export interface ResolvedChunk {
    chunk: Chunk;
    sourceName: string;
}

export type ChunkResolver = (chunkId: string) => ResolvedChunk | undefined;

export interface ContextAssemblerConfig {
    /** Largest fraction of a candidate's span that may overlap an included chunk */
    overlapTolerance: number;
}

function overlapLength(a: Chunk, b: Chunk): number {
    return Math.max(0, Math.min(a.endChar, b.endChar) - Math.max(a.startChar, b.startChar));
}

export class ContextAssembler {
    constructor(
        private resolveChunk: ChunkResolver,
        private config: ContextAssemblerConfig
    ) {
        if (config.overlapTolerance < 0 || config.overlapTolerance > 1) {
            throw new ConfigurationError(`overlapTolerance must be within [0, 1], got ${config.overlapTolerance}`);
        }
    }

    /**
     * Walks the fused ranking greedily. Rank decides inclusion; the window is
     * presented by document id, then start offset.
     */
    assemble(fusedResults: FusedResult[], budget: number, questions: readonly string[] = []): ContextWindow {
        const selected: Array<{ resolved: ResolvedChunk; result: FusedResult; rank: number }> = [];
        let used = 0;

        fusedResults.forEach((result, index) => {
            const resolved = this.resolveChunk(result.chunkId);
            if (!resolved) return;

            const { chunk } = resolved;
            if (used + chunk.length > budget) return;
            if (this.isDuplicate(chunk, selected.map(s => s.resolved.chunk))) return;

            selected.push({ resolved, result, rank: index + 1 });
            used += chunk.length;
        });

        const passages: ContextPassage[] = selected
            .sort((left, right) => {
                const a = left.resolved.chunk;
                const b = right.resolved.chunk;
                if (a.documentId !== b.documentId) {
                    return a.documentId < b.documentId ? -1 : 1;
                }
                return a.startChar - b.startChar || a.position - b.position;
            })
            .map(({ resolved, result, rank }) => ({
                chunkId: resolved.chunk.id,
                text: resolved.chunk.content,
                score: result.score,
                rank,
                citation: {
                    documentId: resolved.chunk.documentId,
                    sourceName: resolved.sourceName,
                    startChar: resolved.chunk.startChar,
                    endChar: resolved.chunk.endChar,
                    section: resolved.chunk.section,
                },
            }));

        return new ContextWindow(passages, budget, questions);
    }

    private isDuplicate(candidate: Chunk, included: Chunk[]): boolean {
        if (candidate.length === 0) return true;
        return included.some(chunk =>
            chunk.documentId === candidate.documentId &&
            overlapLength(chunk, candidate) / candidate.length > this.config.overlapTolerance
        );
    }
}
