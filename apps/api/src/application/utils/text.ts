import { createHash } from 'crypto';

/**
 * Collapses runs of whitespace (line breaks and tabs included) into single
 * spaces and trims both ends.
 */
export function cleanText(text: string): string {
    return text.split(/\s+/).filter(Boolean).join(' ');
}

function shortHash(value: string): string {
    return createHash('sha256').update(value).digest('hex').substring(0, 16);
}

/**
 * Stable document identifier: the explicit id when given, otherwise one
 * derived from the source path, otherwise from the content.
 */
export function deriveDocumentId(input: { id?: string; sourcePath?: string; text: string }): string {
    if (input.id && input.id.trim().length > 0) {
        return input.id.trim();
    }
    if (input.sourcePath && input.sourcePath.trim().length > 0) {
        const normalizedPath = input.sourcePath.trim().replace(/\\/g, '/');
        return `src-${shortHash(normalizedPath)}`;
    }
    return `doc-${shortHash(input.text)}`;
}
