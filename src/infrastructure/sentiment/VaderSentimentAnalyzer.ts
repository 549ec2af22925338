/// <reference path="../../types/vader-sentiment.d.ts" />
import { SentimentIntensityAnalyzer } from 'vader-sentiment';
import { ISentimentAnalyzer } from '../../domain/ports/ISentimentAnalyzer';
import { SentimentScores } from '../../domain/entities/ContentAnalysis';

/**
 * VADER lexicon and rule-based polarity scoring.
 * The lexicon is English; other languages still get a score, but a weaker one.
 */
export class VaderSentimentAnalyzer implements ISentimentAnalyzer {
    polarity(text: string): SentimentScores {
        const scores = SentimentIntensityAnalyzer.polarity_scores(text);
        return {
            compound: scores.compound,
            positive: scores.pos,
            neutral: scores.neu,
            negative: scores.neg,
        };
    }
}
