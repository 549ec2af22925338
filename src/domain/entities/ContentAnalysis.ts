/**
 * Content analysis entities.
 * Everything the scoring pipeline produces for a single URL.
 */

/**
 * Categories of fetch failure.
 * Only Timeout and Transport are retried.
 */
export type FetchErrorKind = 'InvalidURL' | 'Timeout' | 'Transport' | 'HttpStatus';

/**
 * A successfully retrieved page (2xx response).
 */
export interface RawPage {
    url: string;
    statusCode: number;
    /** Body decoded with `encoding` */
    body: string;
    encoding: string;
}

/**
 * A failed retrieval. Returned as data, never thrown.
 */
export interface FetchFailure {
    url: string;
    errorKind: FetchErrorKind;
    message: string;
}

export type FetchOutcome = RawPage | FetchFailure;

export function isFetchFailure(outcome: FetchOutcome): outcome is FetchFailure {
    return 'errorKind' in outcome;
}

/**
 * Markup-free, whitespace-normalized body text of a page.
 * An empty `text` is a valid result.
 */
export interface ExtractedText {
    url: string;
    text: string;
    charLength: number;
    wordCount: number;
}

export interface SentimentScores {
    /** Normalized polarity in [-1, 1] */
    compound: number;
    positive: number;
    neutral: number;
    negative: number;
}

export interface LexicalSignals {
    positiveKeywordCount: number;
    negativeKeywordCount: number;
    /** (positive - negative) / wordCount, 0 for empty text */
    keywordRatio: number;
}

export interface TextQuality {
    avgSentenceLength: number;
    qualityScore: number;
}

export type SentimentLabel = 'Positive' | 'Neutral' | 'Negative';

/**
 * Final per-URL output. JSON-serializable; owned by the caller.
 */
export interface AnalysisRecord {
    url: string;
    domain: string;
    summary: string;
    sentiment: SentimentScores;
    lexical: LexicalSignals;
    quality: TextQuality;
    combinedScore: number;
    contentLength: number;
    wordCount: number;
    success: boolean;
}

export const NEUTRAL_SENTIMENT: Readonly<SentimentScores> = Object.freeze({
    compound: 0,
    positive: 0,
    neutral: 1,
    negative: 0,
});

export const EMPTY_LEXICAL_SIGNALS: Readonly<LexicalSignals> = Object.freeze({
    positiveKeywordCount: 0,
    negativeKeywordCount: 0,
    keywordRatio: 0,
});

/**
 * Host component of a URL (including port), or an empty string when the URL does not parse.
 */
export function extractDomain(url: string): string {
    try {
        return new URL(url).host;
    } catch {
        return '';
    }
}

/**
 * Builds the record for a URL whose analysis failed.
 * Scores are zeroed, the sentiment is the neutral default and quality is the
 * lowest bucket an analysis can report.
 */
export function createFailedRecord(url: string, message: string): AnalysisRecord {
    return {
        url,
        domain: extractDomain(url),
        summary: `Error: ${message}`,
        sentiment: { ...NEUTRAL_SENTIMENT },
        lexical: { ...EMPTY_LEXICAL_SIGNALS },
        quality: { avgSentenceLength: 0, qualityScore: 0.5 },
        combinedScore: 0,
        contentLength: 0,
        wordCount: 0,
        success: false,
    };
}
