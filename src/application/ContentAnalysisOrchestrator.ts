/**
 * Content Analysis Orchestrator
 *
 * Runs one URL through fetch, extraction, scoring and combination.
 * Always resolves to exactly one AnalysisRecord; failures become records with success=false.
 */

import { IPageFetcher } from '../domain/ports/IPageFetcher';
import { ITextExtractor } from '../domain/ports/ITextExtractor';
import {
    AnalysisRecord,
    createFailedRecord,
    extractDomain,
    isFetchFailure,
} from '../domain/entities/ContentAnalysis';
import { LexicalScorer } from '../domain/services/LexicalScorer';
import { combineScores } from '../domain/services/CompositeScoreCombiner';
import { summarizeWords } from '../domain/services/TextStatistics';

export type AnalysisStage = 'FETCHING' | 'EXTRACTING' | 'SCORING' | 'COMBINING' | 'DONE' | 'FAILED';

export interface ContentAnalysisDeps {
    fetcher: IPageFetcher;
    extractor: ITextExtractor;
    scorer: LexicalScorer;
    /** Words kept in the summary (default: 100) */
    summaryWordCount?: number;
    /** Observes stage transitions, e.g. for progress display */
    onStageChange?: (url: string, stage: AnalysisStage) => void;
}

export const DEFAULT_SUMMARY_WORD_COUNT = 100;

export class ContentAnalysisOrchestrator {
    private readonly summaryWordCount: number;

    constructor(private readonly deps: ContentAnalysisDeps) {
        this.summaryWordCount = deps.summaryWordCount ?? DEFAULT_SUMMARY_WORD_COUNT;
    }

    async analyze(url: string, language: string): Promise<AnalysisRecord> {
        let stage: AnalysisStage = 'FETCHING';
        const enter = (next: AnalysisStage) => {
            stage = next;
            this.notifyStage(url, next);
        };

        try {
            enter('FETCHING');
            const outcome = await this.deps.fetcher.fetch(url);
            if (isFetchFailure(outcome)) {
                console.warn(`[ContentAnalysis] Fetch failed for ${url}: ${outcome.errorKind} - ${outcome.message}`);
                enter('FAILED');
                return createFailedRecord(url, `${outcome.errorKind}: ${outcome.message}`);
            }

            enter('EXTRACTING');
            const extracted = this.deps.extractor.extract(outcome);

            enter('SCORING');
            const { sentiment, lexical, quality } = this.deps.scorer.score(extracted.text, language);

            enter('COMBINING');
            const combinedScore = combineScores(sentiment.compound, lexical.keywordRatio, quality.qualityScore);

            const record: AnalysisRecord = {
                url,
                domain: extractDomain(url),
                summary: summarizeWords(extracted.text, this.summaryWordCount),
                sentiment,
                lexical,
                quality,
                combinedScore,
                contentLength: extracted.charLength,
                wordCount: extracted.wordCount,
                success: true,
            };

            enter('DONE');
            return record;
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            console.error(`[ContentAnalysis] Unexpected error during ${stage} for ${url}: ${message}`);
            enter('FAILED');
            return createFailedRecord(url, message);
        }
    }

    private notifyStage(url: string, stage: AnalysisStage): void {
        if (!this.deps.onStageChange) return;
        try {
            this.deps.onStageChange(url, stage);
        } catch (error) {
            console.warn(`[ContentAnalysis] Stage observer failed at ${stage}: ${error instanceof Error ? error.message : String(error)}`);
        }
    }
}
