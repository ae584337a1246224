import { Chunk } from '../../domain/entities/Chunk';
import { Document } from '../../domain/entities/Document';
import { ConfigurationError } from '../../domain/errors/AppError';
import { chunkIdOf } from '../utils/chunkId';

export interface ChunkingConfig {
    chunkSize: number;          // characters
    chunkOverlap: number;       // characters repeated from the previous chunk
    separators: string[];       // preferred split points, highest priority first
    separatorLookback?: number; // defaults to the whole window
}

export interface ChunkBoundary {
    start: number;
    end: number;
}

function splitsSurrogatePair(text: string, index: number): boolean {
    if (index <= 0 || index >= text.length) return false;
    const before = text.charCodeAt(index - 1);
    const after = text.charCodeAt(index);
    return before >= 0xd800 && before <= 0xdbff && after >= 0xdc00 && after <= 0xdfff;
}

export class ChunkingService {
    constructor(private config: ChunkingConfig) {
        if (!Number.isInteger(config.chunkSize) || config.chunkSize <= 0) {
            throw new ConfigurationError(`chunkSize must be a positive integer, got ${config.chunkSize}`);
        }
        if (config.chunkOverlap < 0 || config.chunkOverlap >= config.chunkSize) {
            throw new ConfigurationError(
                `chunkOverlap (${config.chunkOverlap}) must be between 0 and chunkSize (${config.chunkSize}) exclusive`
            );
        }
    }

    /**
     * Splits text into overlapping chunks. Pure: the same id, text and config
     * always yield the same chunks.
     */
    chunk(documentId: string, text: string, document?: Document): Chunk[] {
        if (text.trim().length === 0) {
            return [];
        }

        let lastEnd = 0;
        return this.createChunkBoundaries(text)
            .map(boundary => this.trimBoundary(text, boundary))
            .filter(boundary => {
                // Trimming can shrink a window into its predecessor
                if (boundary.end <= boundary.start || boundary.end <= lastEnd) return false;
                lastEnd = boundary.end;
                return true;
            })
            .map((boundary, position) => new Chunk(
                chunkIdOf(documentId, position),
                documentId,
                text.substring(boundary.start, boundary.end),
                position,
                boundary.start,
                boundary.end,
                document ? document.sectionAt(boundary.start) : 0
            ));
    }

    chunkDocument(document: Document): Chunk[] {
        return this.chunk(document.id, document.text, document);
    }

    /**
     * Raw windows over the text. Each window after the first starts
     * `chunkOverlap` characters before the end of the previous one.
     */
    private createChunkBoundaries(text: string): ChunkBoundary[] {
        const { chunkSize, chunkOverlap } = this.config;
        const boundaries: ChunkBoundary[] = [];
        let start = 0;

        while (start < text.length) {
            const hardEnd = Math.min(start + chunkSize, text.length);
            let end = hardEnd === text.length ? hardEnd : this.findSplitPoint(text, start, hardEnd);
            if (splitsSurrogatePair(text, end)) {
                end = end - 1 > start + chunkOverlap ? end - 1 : end + 1;
            }

            boundaries.push({ start, end });
            if (end >= text.length) {
                break;
            }

            // end > start + chunkOverlap, so the next window always advances
            start = end - chunkOverlap;
            if (splitsSurrogatePair(text, start)) {
                start++;
            }
        }

        return boundaries;
    }

    /**
     * Latest split point at the highest-priority separator inside the
     * lookback window, or a hard cut at `hardEnd` when none is found.
     */
    private findSplitPoint(text: string, start: number, hardEnd: number): number {
        const lookback = this.config.separatorLookback ?? this.config.chunkSize;
        const lowest = Math.max(start + this.config.chunkOverlap + 1, hardEnd - lookback);

        for (const separator of this.config.separators) {
            const index = text.lastIndexOf(separator, hardEnd - separator.length);
            if (index < 0) continue;

            const splitPoint = index + separator.length;
            if (splitPoint >= lowest && splitPoint <= hardEnd) {
                return splitPoint;
            }
        }

        return hardEnd;
    }

    private trimBoundary(text: string, boundary: ChunkBoundary): ChunkBoundary {
        let { start, end } = boundary;
        while (start < end && /\s/.test(text[start])) start++;
        while (end > start && /\s/.test(text[end - 1])) end--;
        return { start, end };
    }
}
