import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { ChunkingService } from '../src/application/services/ChunkingService';

/**
 * Chunking is a pure function of (id, text, config): boundaries are stable,
 * every chunk fits the target size and is an exact slice of the source, and
 * no non-whitespace character is lost.
 */
describe('Chunk Determinism Property Tests', () => {
    const textArb = fc.stringOf(fc.constantFrom('a', 'b', 'c', ' ', '\n', '.', 'x'), { maxLength: 400 });
    const configArb = fc
        .record({
            chunkSize: fc.integer({ min: 2, max: 60 }),
            overlapRatio: fc.double({ min: 0, max: 0.9, noNaN: true }),
            separators: fc.subarray(['\n\n', '\n', '. ', ' ']),
        })
        .map(({ chunkSize, overlapRatio, separators }) => ({
            chunkSize,
            chunkOverlap: Math.min(chunkSize - 1, Math.floor(chunkSize * overlapRatio)),
            separators,
        }));

    it('should produce identical chunks for identical input', () => {
        fc.assert(
            fc.property(textArb, configArb, (text, config) => {
                const first = new ChunkingService(config).chunk('doc', text);
                const second = new ChunkingService(config).chunk('doc', text);

                expect(second).toEqual(first);
            }),
            { numRuns: 100 }
        );
    });

    it('should keep every chunk within the target size and equal to its source span', () => {
        fc.assert(
            fc.property(textArb, configArb, (text, config) => {
                const chunks = new ChunkingService(config).chunk('doc', text);

                chunks.forEach((chunk, index) => {
                    expect(chunk.position).toBe(index);
                    expect(chunk.length).toBeGreaterThan(0);
                    expect(chunk.length).toBeLessThanOrEqual(config.chunkSize);
                    expect(text.substring(chunk.startChar, chunk.endChar)).toBe(chunk.content);
                });
            }),
            { numRuns: 100 }
        );
    });

    it('should cover every non-whitespace character', () => {
        fc.assert(
            fc.property(textArb, configArb, (text, config) => {
                const chunks = new ChunkingService(config).chunk('doc', text);

                for (let i = 0; i < text.length; i++) {
                    if (/\s/.test(text[i])) continue;
                    const covered = chunks.some(chunk => chunk.startChar <= i && i < chunk.endChar);
                    expect(covered).toBe(true);
                }
            }),
            { numRuns: 100 }
        );
    });
});
