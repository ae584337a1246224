export class Chunk {
    constructor(
        public readonly id: string,
        public readonly documentId: string,
        public readonly content: string,
        public readonly position: number,
        public readonly startChar: number,
        public readonly endChar: number,
        public readonly section: number = 0
    ) {}

    get length(): number {
        return this.content.length;
    }

    /** Rough token estimate, 1 token ≈ 4 characters */
    get tokenCount(): number {
        return Math.ceil(this.content.length / 4);
    }
}
