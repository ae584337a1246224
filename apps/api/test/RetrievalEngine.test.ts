import { describe, it, expect, beforeEach, vi } from 'vitest';
import { RetrievalEngine } from '../src/application/services/RetrievalEngine';
import { type EngineConfigInput, parseEngineConfig } from '../src/application/config/engineConfig';
import {
    CancelledError,
    ConfigurationError,
    NotFoundError,
    ProviderError,
    ValidationError,
} from '../src/domain/errors/AppError';
import { ANIMAL_TEXT, ANIMAL_VOCABULARY, KeywordEmbeddingProvider } from './helpers/KeywordEmbeddingProvider';

function createEngine(provider: KeywordEmbeddingProvider, overrides: EngineConfigInput = {}): RetrievalEngine {
    return new RetrievalEngine(
        parseEngineConfig({
            chunkSize: 17,
            chunkOverlap: 0,
            separators: ['\n'],
            embeddingDimension: ANIMAL_VOCABULARY.length,
            ...overrides,
        }),
        provider
    );
}

const notes = { id: 'notes', sourceName: 'notes.txt', content: ANIMAL_TEXT };

describe('RetrievalEngine', () => {
    let provider: KeywordEmbeddingProvider;
    let engine: RetrievalEngine;

    beforeEach(() => {
        provider = new KeywordEmbeddingProvider(ANIMAL_VOCABULARY);
        engine = createEngine(provider);
    });

    describe('ingest', () => {
        it('should chunk and index a document in both indices', async () => {
            const result = await engine.ingest(notes);

            expect(result).toMatchObject({ documentId: 'notes', chunkCount: 3, replaced: false });
            expect(engine.stats()).toEqual({
                documents: 1,
                chunks: 3,
                lexicalChunks: 3,
                vectorChunks: 3,
                vocabularySize: 7,
                embeddingDimension: 7,
                averageChunkLength: 15,
                fusionStrategy: 'weighted',
            });
        });

        it('should derive the id and source name from the source path', async () => {
            const result = await engine.ingest({ sourcePath: '/docs/notes.txt', content: ANIMAL_TEXT });

            expect(result.documentId).toMatch(/^src-[0-9a-f]{16}$/);
            expect(engine.listDocuments()[0].sourceName).toBe('notes.txt');
        });

        it('should list documents without their engine metadata keys', async () => {
            await engine.ingest({ ...notes, content: ['first page', 'second page'], metadata: { author: 'ana' } });

            const [summary] = engine.listDocuments();

            expect(summary).toMatchObject({ id: 'notes', sourceName: 'notes.txt', sections: 2, length: 23 });
            expect(summary.metadata).toEqual({ author: 'ana' });
        });

        it('should be idempotent for identical content', async () => {
            await engine.ingest(notes);
            const firstStats = engine.stats();
            const firstWindows = await Promise.all(
                ['what keeps animals warm', 'mammals', 'fur'].map(q => engine.query(q))
            );

            const second = await engine.ingest(notes);

            expect(second.replaced).toBe(true);
            expect(engine.stats()).toEqual(firstStats);
            const secondWindows = await Promise.all(
                ['what keeps animals warm', 'mammals', 'fur'].map(q => engine.query(q))
            );
            expect(secondWindows.map(w => w.toResponse())).toEqual(firstWindows.map(w => w.toResponse()));
        });

        it('should drop chunks beyond the new length when re-ingested with shorter text', async () => {
            await engine.ingest(notes);

            const result = await engine.ingest({ ...notes, content: 'cats are mammals' });

            expect(result.chunkCount).toBe(1);
            expect(engine['lexicalIndex'].has('notes#1')).toBe(false);
            expect(engine['vectorIndex'].has('notes#2')).toBe(false);
            const window = await engine.query('fur keeps warm');
            expect(window.isEmpty).toBe(true);
        });

        it('should leave no trace when the provider fails', async () => {
            vi.spyOn(provider, 'generateEmbeddings').mockRejectedValueOnce(new Error('connection refused'));

            await expect(engine.ingest(notes)).rejects.toThrow(ProviderError);

            expect(engine.listDocuments()).toEqual([]);
            expect(engine.stats().chunks).toBe(0);
            expect(engine['lexicalIndex'].size).toBe(0);
        });

        it('should keep the previous version when re-ingestion fails', async () => {
            await engine.ingest(notes);
            vi.spyOn(provider, 'generateEmbeddings').mockRejectedValueOnce(new Error('connection refused'));

            await expect(engine.ingest({ ...notes, content: 'dogs' })).rejects.toThrow(ProviderError);

            expect(engine.getDocument('notes')?.chunks).toHaveLength(3);
            const window = await engine.query('fur keeps warm');
            expect(window.passages.map(p => p.chunkId)).toContain('notes#2');
        });

        it('should report a timeout as a provider error', async () => {
            vi.spyOn(provider, 'generateEmbeddings').mockImplementationOnce(() => new Promise<number[][]>(() => {}));

            await expect(engine.ingest(notes, { timeoutMs: 20 })).rejects.toMatchObject({
                name: 'ProviderError',
                timedOut: true,
            });
            expect(engine.stats().documents).toBe(0);
        });

        it('should reject vectors of the wrong dimension', async () => {
            const narrow = new KeywordEmbeddingProvider(['cats', 'dogs']);
            const mismatched = createEngine(narrow);

            await expect(mismatched.ingest(notes)).rejects.toThrow(ConfigurationError);
            expect(mismatched.stats().chunks).toBe(0);
        });

        it('should discard a cancelled ingestion between batches', async () => {
            const batched = createEngine(provider, { embeddingBatchSize: 1 });
            const controller = new AbortController();
            const spy = vi.spyOn(provider, 'generateEmbeddings');
            spy.mockImplementationOnce(async texts => texts.map(text => provider.embed(text)));
            spy.mockImplementationOnce(async () => {
                controller.abort();
                return new Promise<number[][]>(() => {});
            });

            await expect(batched.ingest(notes, { signal: controller.signal })).rejects.toThrow(CancelledError);

            expect(spy).toHaveBeenCalledTimes(2);
            expect(batched.stats()).toMatchObject({ documents: 0, lexicalChunks: 0, vectorChunks: 0 });
        });

        it('should not call the provider when already cancelled', async () => {
            const controller = new AbortController();
            controller.abort();
            const spy = vi.spyOn(provider, 'generateEmbeddings');

            await expect(engine.ingest(notes, { signal: controller.signal })).rejects.toThrow(CancelledError);
            expect(spy).not.toHaveBeenCalled();
        });
    });

    describe('query', () => {
        beforeEach(async () => {
            await engine.ingest(notes);
        });

        it('should find the chunk about keeping warm with exact citation offsets', async () => {
            const window = await engine.query('what keeps animals warm', 2);

            expect(window.passages.map(p => p.chunkId)).toEqual(['notes#2']);
            expect(window.passages[0].text).toBe('fur keeps warm');
            expect(window.passages[0].citation).toEqual({
                documentId: 'notes',
                sourceName: 'notes.txt',
                startChar: 34,
                endChar: 48,
                section: 0,
            });
            expect(ANIMAL_TEXT.substring(34, 48)).toBe('fur keeps warm');
        });

        it('should order the window by offset and respect the budget', async () => {
            const full = await engine.query('mammals');
            const tight = await engine.query('mammals', 8, 16);

            expect(full.passages.map(p => p.chunkId)).toEqual(['notes#0', 'notes#1']);
            expect(tight.passages.map(p => p.chunkId)).toEqual(['notes#0']);
            expect(tight.totalSize).toBe(16);
        });

        it('should merge several phrasings into one window', async () => {
            const window = await engine.queryMany(['cats', ' cats ', 'fur keeps warm']);

            expect(window.questions).toEqual(['cats', 'fur keeps warm']);
            expect(window.passages.map(p => p.chunkId)).toEqual(['notes#0', 'notes#1', 'notes#2']);
        });

        it('should return an empty window for a blank question without embedding it', async () => {
            const spy = vi.spyOn(provider, 'generateEmbedding');

            const window = await engine.query('   ');

            expect(window.isEmpty).toBe(true);
            expect(spy).not.toHaveBeenCalled();
        });

        it('should fail the query when the provider fails', async () => {
            vi.spyOn(provider, 'generateEmbedding').mockRejectedValueOnce(new Error('connection refused'));

            await expect(engine.query('cats')).rejects.toThrow('Query embedding failed: connection refused');
            expect(engine.stats().chunks).toBe(3);
        });

        it('should fall back to lexical results only when configured to', async () => {
            const tolerant = createEngine(provider, { lexicalFallbackOnProviderError: true });
            await tolerant.ingest(notes);
            vi.spyOn(provider, 'generateEmbedding').mockRejectedValueOnce(new Error('connection refused'));

            const window = await tolerant.query('cats');

            expect(window.passages.map(p => p.chunkId)).toEqual(['notes#0']);
            expect(window.passages[0].score).toBeCloseTo(0.4, 10);
        });

        it('should reject invalid k or budget', async () => {
            await expect(engine.query('cats', 0)).rejects.toThrow(ValidationError);
            await expect(engine.query('cats', 5, -1)).rejects.toThrow(ValidationError);
        });

        it('should apply per-query fusion weights', async () => {
            const window = await engine.query('cats', 8, 4000, { weights: { lexical: 1, vector: 0 } });

            expect(window.passages.map(p => [p.chunkId, p.score])).toEqual([['notes#0', 1]]);
        });
    });

    describe('empty index', () => {
        it('should return an empty window without calling the provider', async () => {
            const spy = vi.spyOn(provider, 'generateEmbedding');

            const window = await engine.query('what keeps animals warm');

            expect(window.isEmpty).toBe(true);
            expect(window.totalSize).toBe(0);
            expect(spy).not.toHaveBeenCalled();
        });
    });

    describe('removeDocument', () => {
        it('should remove the document from both indices', async () => {
            await engine.ingest(notes);
            await engine.ingest({ id: 'pets', content: 'dogs are animals' });

            const result = await engine.removeDocument('notes');

            expect(result).toEqual({ documentId: 'notes', removedChunks: 3 });
            expect(engine['lexicalIndex'].size).toBe(1);
            expect(engine['vectorIndex'].size).toBe(1);
            expect(engine['vectorIndex'].vectorsOf('notes').size).toBe(0);
            expect((await engine.query('cats mammals fur')).passages).toEqual([]);
        });

        it('should report an unknown document', async () => {
            await expect(engine.removeDocument('missing')).rejects.toThrow(NotFoundError);
        });

        it('should clear every document', async () => {
            await engine.ingest(notes);

            expect(await engine.clear()).toBe(1);
            expect(engine.stats()).toMatchObject({ documents: 0, chunks: 0, vocabularySize: 0 });
        });
    });

    describe('concurrency', () => {
        it('should keep serving the previous version while a re-ingestion is embedding', async () => {
            await engine.ingest(notes);
            let release: () => void = () => {};
            const gate = new Promise<void>(resolve => {
                release = resolve;
            });
            vi.spyOn(provider, 'generateEmbeddings').mockImplementationOnce(async texts => {
                await gate;
                return texts.map(text => provider.embed(text));
            });

            const reingest = engine.ingest({ ...notes, content: 'dogs are animals' });
            const during = await engine.query('fur');
            release();
            await reingest;
            const after = await engine.query('fur');

            expect(during.passages.map(p => p.chunkId)).toEqual(['notes#1', 'notes#2']);
            expect(after.isEmpty).toBe(true);
        });

        it('should apply concurrent ingestions of one id in call order', async () => {
            await Promise.all([
                engine.ingest({ ...notes, content: 'cats' }),
                engine.ingest({ ...notes, content: 'dogs' }),
                engine.ingest(notes),
            ]);

            expect(engine.getDocument('notes')?.chunks.map(c => c.content))
                .toEqual(['cats are mammals', 'mammals have fur', 'fur keeps warm']);
            expect(engine.stats()).toMatchObject({ chunks: 3, lexicalChunks: 3, vectorChunks: 3 });
        });
    });

    describe('verifyConsistency', () => {
        it('should report a healthy engine as consistent', async () => {
            await engine.ingest(notes);

            expect(await engine.verifyConsistency()).toEqual({ consistent: true, removedDocuments: [] });
        });

        it('should drop a document whose chunks fell out of lockstep', async () => {
            await engine.ingest(notes);
            await engine.ingest({ id: 'pets', content: 'dogs are animals' });
            engine['vectorIndex'].remove('notes');

            const hidden = await engine.query('cats');
            const report = await engine.verifyConsistency();

            expect(hidden.isEmpty).toBe(true);
            expect(report).toEqual({ consistent: false, removedDocuments: ['notes'] });
            expect(engine.listDocuments().map(d => d.id)).toEqual(['pets']);
            expect(engine['lexicalIndex'].size).toBe(1);
        });

        it('should hide every chunk of a document with a single broken chunk', async () => {
            await engine.ingest(notes);
            await engine.ingest({ id: 'pets', content: 'dogs are animals' });
            engine['vectorIndex']['vectors'].delete('notes#2');

            const cats = await engine.query('cats');
            const dogs = await engine.query('dogs');

            expect(cats.isEmpty).toBe(true);
            expect(dogs.passages.map(p => p.chunkId)).toEqual(['pets#0']);
        });
    });
});
