/**
 * Plain-text helpers shared by extraction, scoring and summarization.
 */

/**
 * Collapses every run of whitespace (newlines and non-breaking spaces included)
 * into one space and trims both ends. Idempotent.
 */
export function normalizeWhitespace(text: string): string {
    return text.replace(/\s+/g, ' ').trim();
}

export function tokenize(text: string): string[] {
    return text.split(/\s+/).filter(token => token.length > 0);
}

export function countWords(text: string): number {
    return tokenize(text).length;
}

/**
 * Splits on runs of `.`, `!` and `?`. Abbreviations and decimals are not special-cased.
 */
export function splitSentences(text: string): string[] {
    return text
        .split(/[.!?]+/)
        .map(sentence => sentence.trim())
        .filter(sentence => sentence.length > 0);
}

/**
 * First `maxWords` words of the text, with "..." appended when it was truncated.
 */
export function summarizeWords(text: string, maxWords: number): string {
    const words = tokenize(text);
    if (words.length <= maxWords) {
        return words.join(' ');
    }
    return `${words.slice(0, maxWords).join(' ')}...`;
}
