import { SentimentScores } from '../entities/ContentAnalysis';

/**
 * Port for a lexicon-based polarity analyzer.
 */
export interface ISentimentAnalyzer {
    /**
     * Scores text. Deterministic for identical input.
     */
    polarity(text: string): SentimentScores;
}
