/**
 * SERP Analysis Service
 *
 * Runs search phrases through the search provider and, depending on the mode,
 * through content analysis. Also analyzes a hand-picked subset of results.
 */

import { ISearchResultsClient, SearchProviderError } from '../domain/ports/ISearchResultsClient';
import {
    AnalyzedResult,
    PhraseReport,
    SearchResultRef,
    SerpAnalysisInput,
} from '../domain/entities/SearchResult';
import { categorizeScore } from '../domain/services/CompositeScoreCombiner';
import { BatchAnalysisService } from './BatchAnalysisService';

export class SerpAnalysisService {
    constructor(
        private readonly searchClient: ISearchResultsClient,
        private readonly batchAnalysis: BatchAnalysisService
    ) { }

    /**
     * Searches every non-blank phrase in turn. A phrase whose search fails gets an
     * empty report with `error` set; the remaining phrases still run.
     * @throws Error when no usable phrase is given
     * @throws SearchProviderError when the search failed for every phrase
     */
    async run(input: SerpAnalysisInput): Promise<PhraseReport[]> {
        const phrases = input.phrases.map(p => p.trim()).filter(p => p.length > 0);
        if (phrases.length === 0) {
            throw new Error('At least one search phrase is required');
        }

        const reports: PhraseReport[] = [];
        let lastFailure: SearchProviderError | null = null;
        for (const phrase of phrases) {
            let results: SearchResultRef[];
            try {
                results = await this.searchClient.search(phrase, {
                    numResults: input.numResults,
                    country: input.country,
                    language: input.language,
                });
            } catch (error) {
                if (!(error instanceof SearchProviderError)) {
                    throw error;
                }
                console.warn(`[SerpAnalysis] No results for "${phrase}": ${error.message}`);
                lastFailure = error;
                reports.push({ phrase, results: [], analyses: [], error: error.message });
                continue;
            }

            let analyses: AnalyzedResult[] = [];
            if (input.mode === 'serp-and-content') {
                analyses = await this.analyzeResults(results, input.language);
            } else if (input.selectedPositions && input.selectedPositions.length > 0) {
                analyses = await this.analyzeSelected(results, input.selectedPositions, input.language);
            }

            console.log(`[SerpAnalysis] Found ${results.length} results for "${phrase}"`);
            reports.push({ phrase, results, analyses });
        }

        if (lastFailure && reports.every(report => report.error !== undefined)) {
            throw lastFailure;
        }
        return reports;
    }

    /**
     * Analyzes only the results at the given positions, in the order the positions were given.
     * Unknown positions are ignored.
     */
    async analyzeSelected(results: SearchResultRef[], positions: number[], language: string): Promise<AnalyzedResult[]> {
        const byPosition = new Map(results.map(result => [result.position, result]));
        const selected = positions
            .map(position => byPosition.get(position))
            .filter((result): result is SearchResultRef => result !== undefined);

        return this.analyzeResults(selected, language);
    }

    private async analyzeResults(results: SearchResultRef[], language: string): Promise<AnalyzedResult[]> {
        const records = await this.batchAnalysis.analyzeAll(results.map(r => r.url), language);
        return results.map((result, index) => ({
            result,
            label: categorizeScore(records[index].combinedScore),
            analysis: records[index],
        }));
    }
}
