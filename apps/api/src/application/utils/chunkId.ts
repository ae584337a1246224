const SEPARATOR = '#';

export function chunkIdOf(documentId: string, position: number): string {
    return `${documentId}${SEPARATOR}${position}`;
}

export function parseChunkId(chunkId: string): { documentId: string; position: number } {
    const at = chunkId.lastIndexOf(SEPARATOR);
    if (at < 0) {
        return { documentId: chunkId, position: 0 };
    }
    const position = Number(chunkId.slice(at + 1));
    return {
        documentId: chunkId.slice(0, at),
        position: Number.isInteger(position) ? position : 0,
    };
}

/**
 * Ascending chunk identifier order: document id first, then numeric
 * position, so `doc#2` sorts before `doc#10`.
 */
export function compareChunkIds(a: string, b: string): number {
    if (a === b) return 0;
    const left = parseChunkId(a);
    const right = parseChunkId(b);
    if (left.documentId !== right.documentId) {
        return left.documentId < right.documentId ? -1 : 1;
    }
    if (left.position !== right.position) {
        return left.position - right.position;
    }
    return a < b ? -1 : 1;
}
