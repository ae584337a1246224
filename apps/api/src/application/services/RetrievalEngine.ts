import type { DocumentSummary, IndexStatsResponse } from '@doc-qa/types';
import { Chunk } from '../../domain/entities/Chunk';
import { ContextWindow } from '../../domain/entities/ContextWindow';
import { Document, SECTION_SEPARATOR } from '../../domain/entities/Document';
import type { FusedResult } from '../../domain/entities/ScoredResult';
import {
    ConsistencyError,
    NotFoundError,
    ProviderError,
    ValidationError,
} from '../../domain/errors/AppError';
import logger from '../../infrastructure/logger';
import type { EngineConfig } from '../config/engineConfig';
import type { EmbeddingProvider } from '../providers/EmbeddingProvider';
import { compareChunkIds, parseChunkId } from '../utils/chunkId';
import { cleanText, deriveDocumentId } from '../utils/text';
import { withTimeout } from '../utils/withTimeout';
import { WriteLock } from '../utils/WriteLock';
import { ChunkingService } from './ChunkingService';
import { ContextAssembler, type ResolvedChunk } from './ContextAssembler';
import { FusionRanker, type FusionWeights, validateWeights } from './FusionRanker';
import { LexicalIndex } from './LexicalIndex';
import { VectorIndex } from './VectorIndex';

export interface DocumentInput {
    id?: string;
    sourcePath?: string;
    sourceName?: string;
    content: string | string[];
    metadata?: Record<string, string>;
}

export interface CallOptions {
    signal?: AbortSignal;
    /** Per-call bound for each embedding request */
    timeoutMs?: number;
}

export interface QueryOptions extends CallOptions {
    weights?: FusionWeights;
}

export interface IngestResult {
    documentId: string;
    chunkCount: number;
    replaced: boolean;
    durationMs: number;
}

export interface ConsistencyReport {
    consistent: boolean;
    removedDocuments: string[];
}

interface IndexedDocument {
    document: Document;
    chunks: Chunk[];
}

/**
 * Owns both indices and keeps them in lockstep. Mutations run under a
 * single writer lock and touch the indices only inside a synchronous
 * commit, so a query never sees a chunk in one index but not the other.
 */
export class RetrievalEngine {
    private readonly chunker: ChunkingService;
    private readonly lexicalIndex: LexicalIndex;
    private readonly vectorIndex: VectorIndex;
    private readonly fusionRanker: FusionRanker;
    private readonly contextAssembler: ContextAssembler;
    private readonly writeLock = new WriteLock();
    private readonly weights: FusionWeights;

    private documents = new Map<string, IndexedDocument>();
    private chunks = new Map<string, Chunk>();

    constructor(
        private config: EngineConfig,
        private embeddingProvider: EmbeddingProvider
    ) {
        this.weights = { lexical: config.lexicalWeight, vector: config.vectorWeight };
        validateWeights(this.weights);

        this.chunker = new ChunkingService({
            chunkSize: config.chunkSize,
            chunkOverlap: config.chunkOverlap,
            separators: config.separators,
            separatorLookback: config.separatorLookback,
        });
        this.lexicalIndex = new LexicalIndex({
            k1: config.bm25K1,
            b: config.bm25B,
            stopwords: config.stopwords,
        });
        this.vectorIndex = new VectorIndex({
            dimension: config.embeddingDimension,
            minSimilarity: config.minVectorSimilarity,
        });
        this.fusionRanker = new FusionRanker({ strategy: config.fusionStrategy, rrfK: config.rrfK });
        this.contextAssembler = new ContextAssembler(
            chunkId => this.resolveChunk(chunkId),
            { overlapTolerance: config.overlapTolerance }
        );
    }

    // ─────────────────────────────────────────────
    // Ingestion
    // ─────────────────────────────────────────────

    /**
     * Chunks, embeds and indexes a document. Re-ingesting an id replaces the
     * previous version; nothing becomes visible until every embedding has
     * succeeded.
     */
    async ingest(input: DocumentInput, options: CallOptions = {}): Promise<IngestResult> {
        const document = this.createDocument(input);
        const startTime = Date.now();

        return this.writeLock.runExclusive(async () => {
            const chunks = this.chunker.chunkDocument(document);
            const vectors = await this.embedChunks(chunks, options);
            const replaced = this.commit(document, chunks, vectors);

            const result = {
                documentId: document.id,
                chunkCount: chunks.length,
                replaced,
                durationMs: Date.now() - startTime,
            };
            logger.info('Document indexed', { ...result, sourceName: document.metadata.sourceName });
            return result;
        });
    }

    async removeDocument(documentId: string): Promise<{ documentId: string; removedChunks: number }> {
        return this.writeLock.runExclusive(() => {
            if (!this.documents.has(documentId)) {
                throw new NotFoundError(`Document ${documentId} not found`);
            }
            const removedChunks = this.detach(documentId);
            logger.info('Document removed', { documentId, removedChunks });
            return { documentId, removedChunks };
        });
    }

    async clear(): Promise<number> {
        return this.writeLock.runExclusive(() => {
            const count = this.documents.size;
            this.lexicalIndex.clear();
            this.vectorIndex.clear();
            this.documents.clear();
            this.chunks.clear();
            logger.info('Index cleared', { documents: count });
            return count;
        });
    }

    private createDocument(input: DocumentInput): Document {
        const rawSections = Array.isArray(input.content) ? input.content : [input.content];
        const sections = this.config.normalizeWhitespace ? rawSections.map(cleanText) : rawSections;
        const id = deriveDocumentId({
            id: input.id,
            sourcePath: input.sourcePath,
            text: sections.join(SECTION_SEPARATOR),
        });
        const sourceName = input.sourceName
            ?? input.sourcePath?.split(/[\\/]/).filter(Boolean).pop()
            ?? id;

        return new Document(id, sections, {
            ...input.metadata,
            sourceName,
            ingestedAt: new Date().toISOString(),
        });
    }

    private async embedChunks(chunks: Chunk[], options: CallOptions): Promise<number[][]> {
        const vectors: number[][] = [];
        const batchSize = this.config.embeddingBatchSize;

        for (let i = 0; i < chunks.length; i += batchSize) {
            const texts = chunks.slice(i, i + batchSize).map(chunk => chunk.content);
            const batch = await withTimeout(
                signal => this.embeddingProvider.generateEmbeddings(texts, signal),
                {
                    timeoutMs: options.timeoutMs ?? this.config.embeddingTimeoutMs,
                    signal: options.signal,
                    label: 'Embedding request',
                }
            );

            if (batch.length !== texts.length) {
                throw new ProviderError(`Embedding provider returned ${batch.length} vectors for ${texts.length} texts`);
            }
            batch.forEach(vector => this.validateVector(vector));
            vectors.push(...batch);
        }

        return vectors;
    }

    private validateVector(vector: number[]): void {
        this.vectorIndex.assertDimension(vector);
        if (!vector.every(Number.isFinite)) {
            throw new ProviderError('Embedding provider returned a vector with non-finite values');
        }
    }

    /**
     * Swaps the document's chunks in both indices. Synchronous on purpose:
     * no query can interleave. On failure the previous version is restored.
     */
    private commit(document: Document, chunks: Chunk[], vectors: number[][]): boolean {
        const previous = this.documents.get(document.id);
        const previousVectors = previous ? this.vectorIndex.vectorsOf(document.id) : new Map<string, number[]>();
        this.detach(document.id);

        try {
            this.attach({ document, chunks }, chunkId => vectors[parseChunkId(chunkId).position]);
        } catch (error) {
            this.detach(document.id);
            if (previous) {
                try {
                    this.attach(previous, chunkId => previousVectors.get(chunkId));
                } catch (restoreError) {
                    this.detach(document.id);
                    logger.error('Could not restore previous document version', {
                        documentId: document.id,
                        error: restoreError instanceof Error ? restoreError.message : String(restoreError),
                    });
                }
            }
            throw error;
        }

        return previous !== undefined;
    }

    private attach(entry: IndexedDocument, vectorOf: (chunkId: string) => number[] | undefined): void {
        const attached: Chunk[] = [];
        for (const chunk of entry.chunks) {
            const vector = vectorOf(chunk.id);
            if (!vector) continue;
            this.lexicalIndex.add(chunk);
            this.vectorIndex.add(chunk.id, vector);
            this.chunks.set(chunk.id, chunk);
            attached.push(chunk);
        }
        this.documents.set(entry.document.id, { document: entry.document, chunks: attached });
    }

    private detach(documentId: string): number {
        const removedLexical = this.lexicalIndex.remove(documentId);
        const removedVectors = this.vectorIndex.remove(documentId);
        for (const chunk of this.documents.get(documentId)?.chunks ?? []) {
            this.chunks.delete(chunk.id);
        }
        this.documents.delete(documentId);
        return Math.max(removedLexical, removedVectors);
    }

    // ─────────────────────────────────────────────
    // Querying
    // ─────────────────────────────────────────────

    async query(
        question: string,
        k: number = this.config.defaultTopK,
        budget: number = this.config.contextBudget,
        options: QueryOptions = {}
    ): Promise<ContextWindow> {
        return this.queryMany([question], k, budget, options);
    }

    /**
     * Retrieves for several phrasings of the same need and assembles one
     * window. A chunk found by more than one question keeps its best score.
     */
    async queryMany(
        questions: string[],
        k: number = this.config.defaultTopK,
        budget: number = this.config.contextBudget,
        options: QueryOptions = {}
    ): Promise<ContextWindow> {
        this.validateQueryArguments(k, budget);
        const weights = options.weights ?? this.weights;
        validateWeights(weights);

        const uniqueQuestions = [...new Set(questions.map(q => q.trim()).filter(q => q.length > 0))];
        if (uniqueQuestions.length === 0 || this.lexicalIndex.size === 0) {
            return ContextWindow.empty(budget, uniqueQuestions);
        }

        const startTime = Date.now();
        const queryVectors: Array<number[] | undefined> = [];
        for (const question of uniqueQuestions) {
            queryVectors.push(await this.embedQuestion(question, options));
        }

        // From here on everything is synchronous: one consistent view of both indices.
        const best = new Map<string, FusedResult>();
        uniqueQuestions.forEach((question, index) => {
            for (const result of this.searchFused(question, queryVectors[index], k, weights)) {
                const current = best.get(result.chunkId);
                if (!current || result.score > current.score) {
                    best.set(result.chunkId, result);
                }
            }
        });

        // A zero fused score carries no evidence from either index
        const fused = [...best.values()]
            .filter(result => result.score > 0)
            .sort((left, right) => right.score - left.score || compareChunkIds(left.chunkId, right.chunkId))
            .slice(0, k);
        const window = this.contextAssembler.assemble(fused, budget, uniqueQuestions);

        logger.info('Query completed', {
            latency: Date.now() - startTime,
            question: uniqueQuestions[0].substring(0, 50),
            questions: uniqueQuestions.length,
            candidates: fused.length,
            passages: window.passages.length,
            totalSize: window.totalSize,
        });

        return window;
    }

    /**
     * Fused ranking for one question, top `k`, restricted to chunks present
     * in both indices.
     */
    private searchFused(
        question: string,
        queryVector: number[] | undefined,
        k: number,
        weights: FusionWeights
    ): FusedResult[] {
        const fetchK = Math.ceil(k * this.config.overFetchFactor);
        const lexicalResults = this.lexicalIndex.search(question, fetchK)
            .filter(result => this.isIndexedInBoth(result.chunkId));
        const vectorResults = queryVector
            ? this.vectorIndex.search(queryVector, fetchK).filter(result => this.isIndexedInBoth(result.chunkId))
            : [];

        return this.fusionRanker.fuse(lexicalResults, vectorResults, weights).slice(0, k);
    }

    private async embedQuestion(question: string, options: CallOptions): Promise<number[] | undefined> {
        try {
            const vector = await withTimeout(
                signal => this.embeddingProvider.generateEmbedding(question, signal),
                {
                    timeoutMs: options.timeoutMs ?? this.config.embeddingTimeoutMs,
                    signal: options.signal,
                    label: 'Query embedding',
                }
            );
            this.validateVector(vector);
            return vector;
        } catch (error) {
            if (error instanceof ProviderError && this.config.lexicalFallbackOnProviderError) {
                logger.warn('Embedding failed, falling back to lexical search', {
                    error: error.message,
                    question: question.substring(0, 50),
                });
                return undefined;
            }
            throw error;
        }
    }

    private validateQueryArguments(k: number, budget: number): void {
        if (!Number.isInteger(k) || k <= 0) {
            throw new ValidationError(`k must be a positive integer, got ${k}`);
        }
        if (!Number.isFinite(budget) || budget < 0) {
            throw new ValidationError(`budget must be a non-negative number, got ${budget}`);
        }
    }

    /**
     * A chunk is servable only while every chunk of its document sits in
     * both indices; a document with one broken chunk is hidden whole.
     */
    private isIndexedInBoth(chunkId: string): boolean {
        const chunk = this.chunks.get(chunkId);
        const entry = chunk ? this.documents.get(chunk.documentId) : undefined;
        if (!entry) return false;
        return entry.chunks.every(({ id }) =>
            this.chunks.has(id) && this.lexicalIndex.has(id) && this.vectorIndex.has(id)
        );
    }

    private resolveChunk(chunkId: string): ResolvedChunk | undefined {
        const chunk = this.chunks.get(chunkId);
        if (!chunk) return undefined;
        const entry = this.documents.get(chunk.documentId);
        if (!entry) return undefined;
        return { chunk, sourceName: entry.document.metadata.sourceName };
    }

    // ─────────────────────────────────────────────
    // Inspection and repair
    // ─────────────────────────────────────────────

    getDocument(documentId: string): { document: Document; chunks: readonly Chunk[] } | undefined {
        const entry = this.documents.get(documentId);
        return entry ? { document: entry.document, chunks: [...entry.chunks] } : undefined;
    }

    listDocuments(): DocumentSummary[] {
        return [...this.documents.values()]
            .map(({ document, chunks }) => {
                const { sourceName, ingestedAt, ...metadata } = document.metadata;
                return {
                    id: document.id,
                    sourceName,
                    ingestedAt,
                    sections: document.sections.length,
                    length: document.text.length,
                    chunkCount: chunks.length,
                    metadata,
                };
            })
            .sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
    }

    stats(): IndexStatsResponse {
        const totalLength = [...this.chunks.values()].reduce((sum, chunk) => sum + chunk.length, 0);
        return {
            documents: this.documents.size,
            chunks: this.chunks.size,
            lexicalChunks: this.lexicalIndex.size,
            vectorChunks: this.vectorIndex.size,
            vocabularySize: this.lexicalIndex.vocabularySize,
            embeddingDimension: this.vectorIndex.dimension,
            averageChunkLength: this.chunks.size > 0 ? Math.round(totalLength / this.chunks.size) : 0,
            fusionStrategy: this.config.fusionStrategy,
        };
    }

    /**
     * Compares the registry with both indices. Any document with a chunk
     * missing from one of them is dropped everywhere and reported.
     */
    async verifyConsistency(): Promise<ConsistencyReport> {
        return this.writeLock.runExclusive(() => {
            const lexicalIds = new Set(this.lexicalIndex.chunkIds());
            const vectorIds = new Set(this.vectorIndex.chunkIds());
            const allIds = new Set([...lexicalIds, ...vectorIds, ...this.chunks.keys()]);

            const broken = new Set<string>();
            for (const chunkId of allIds) {
                if (!lexicalIds.has(chunkId) || !vectorIds.has(chunkId) || !this.chunks.has(chunkId)) {
                    broken.add(this.chunks.get(chunkId)?.documentId ?? parseChunkId(chunkId).documentId);
                }
            }

            const removedDocuments = [...broken].sort();
            if (removedDocuments.length > 0) {
                const error = new ConsistencyError('Indices out of lockstep', removedDocuments);
                logger.error(error.message, { documentIds: removedDocuments });
                removedDocuments.forEach(documentId => this.detach(documentId));
            }

            return { consistent: removedDocuments.length === 0, removedDocuments };
        });
    }
}
