export interface DocumentMetadata {
    sourceName: string;
    ingestedAt: string;
    [key: string]: string;
}

export const SECTION_SEPARATOR = '\n\n';

export class Document {
    public readonly text: string;
    private readonly sectionStarts: number[];

    constructor(
        public readonly id: string,
        public readonly sections: readonly string[],
        public readonly metadata: Readonly<DocumentMetadata>
    ) {
        this.text = sections.join(SECTION_SEPARATOR);

        const starts: number[] = [];
        let offset = 0;
        for (const section of sections) {
            starts.push(offset);
            offset += section.length + SECTION_SEPARATOR.length;
        }
        this.sectionStarts = starts;
    }

    /**
     * Index of the section (page) containing the given character offset.
     */
    sectionAt(offset: number): number {
        let section = 0;
        for (let i = 0; i < this.sectionStarts.length; i++) {
            if (this.sectionStarts[i] <= offset) {
                section = i;
            } else {
                break;
            }
        }
        return section;
    }
}
