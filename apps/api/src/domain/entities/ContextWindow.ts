import type { ContextWindowResponse } from '@doc-qa/types';

export interface Citation {
    documentId: string;
    sourceName: string;
    startChar: number;
    endChar: number;
    section: number;
}

export interface ContextPassage {
    chunkId: string;
    text: string;
    score: number;
    /** 1-based position in the fused ranking */
    rank: number;
    citation: Citation;
}

export class ContextWindow {
    constructor(
        public readonly passages: readonly ContextPassage[],
        public readonly budget: number,
        public readonly questions: readonly string[] = []
    ) {}

    static empty(budget: number, questions: readonly string[] = []): ContextWindow {
        return new ContextWindow([], budget, questions);
    }

    get totalSize(): number {
        return this.passages.reduce((total, passage) => total + passage.text.length, 0);
    }

    get isEmpty(): boolean {
        return this.passages.length === 0;
    }

    documentIds(): string[] {
        return [...new Set(this.passages.map(p => p.citation.documentId))];
    }

    toResponse(): ContextWindowResponse {
        return {
            questions: [...this.questions],
            budget: this.budget,
            totalSize: this.totalSize,
            passages: this.passages.map(passage => ({ ...passage, citation: { ...passage.citation } })),
        };
    }
}
