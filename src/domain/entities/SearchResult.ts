import { AnalysisRecord, SentimentLabel } from './ContentAnalysis';

/**
 * One organic search result, as delivered by the search provider.
 */
export interface SearchResultRef {
    /** 1-based rank across all fetched pages */
    position: number;
    title: string;
    url: string;
    snippet: string;
}

export interface SearchOptions {
    numResults: number;
    /** Country code passed to the engine, e.g. "us", "dk" */
    country: string;
    /** Interface language, e.g. "en", "da" */
    language: string;
}

export type AnalysisMode = 'serp-and-content' | 'serp-only';

export const ANALYSIS_MODES: readonly AnalysisMode[] = ['serp-and-content', 'serp-only'];

export interface SerpAnalysisInput {
    phrases: string[];
    numResults: number;
    country: string;
    language: string;
    mode: AnalysisMode;
    /** serp-only mode: positions to analyze anyway */
    selectedPositions?: number[];
}

/**
 * A search result paired with its content analysis.
 */
export interface AnalyzedResult {
    result: SearchResultRef;
    label: SentimentLabel;
    analysis: AnalysisRecord;
}

export interface PhraseReport {
    phrase: string;
    results: SearchResultRef[];
    /** In serp-only mode, only the selected positions */
    analyses: AnalyzedResult[];
    /** Set when the search for this phrase failed */
    error?: string;
}
