const NON_ALPHANUMERIC = /[^\p{L}\p{M}\p{N}]+/u;

export class Tokenizer {
    private readonly stopwords: ReadonlySet<string>;

    constructor(stopwords: Iterable<string> = []) {
        this.stopwords = new Set([...stopwords].map(word => word.normalize('NFC').toLowerCase()));
    }

    tokenize(text: string): string[] {
        return text
            .normalize('NFC')
            .toLowerCase()
            .split(NON_ALPHANUMERIC)
            .filter(token => token.length > 0 && !this.stopwords.has(token));
    }
}
