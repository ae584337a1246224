import { describe, it, expect } from 'vitest';
import { cleanText, deriveDocumentId } from '../src/application/utils/text';
import { compareChunkIds, parseChunkId } from '../src/application/utils/chunkId';

describe('cleanText', () => {
    it('should collapse whitespace runs and trim', () => {
        expect(cleanText('  first line\n\n\tsecond   line  ')).toBe('first line second line');
    });
});

describe('deriveDocumentId', () => {
    it('should prefer an explicit id', () => {
        expect(deriveDocumentId({ id: ' manual ', sourcePath: '/a.txt', text: 'x' })).toBe('manual');
    });

    it('should derive a stable id from the source path regardless of separators', () => {
        const unix = deriveDocumentId({ sourcePath: 'docs/guide.md', text: 'one' });
        const windows = deriveDocumentId({ sourcePath: 'docs\\guide.md', text: 'two' });

        expect(unix).toMatch(/^src-[0-9a-f]{16}$/);
        expect(windows).toBe(unix);
    });

    it('should fall back to the content hash', () => {
        const first = deriveDocumentId({ text: 'same text' });

        expect(first).toMatch(/^doc-[0-9a-f]{16}$/);
        expect(deriveDocumentId({ text: 'same text' })).toBe(first);
        expect(deriveDocumentId({ text: 'other text' })).not.toBe(first);
    });
});

describe('chunk ids', () => {
    it('should parse ids whose document id contains the separator', () => {
        expect(parseChunkId('report#v2#7')).toEqual({ documentId: 'report#v2', position: 7 });
    });

    it('should order by document id then numeric position', () => {
        const ids = ['doc#10', 'b#0', 'doc#2', 'doc#1'];

        expect([...ids].sort(compareChunkIds)).toEqual(['b#0', 'doc#1', 'doc#2', 'doc#10']);
    });
});
