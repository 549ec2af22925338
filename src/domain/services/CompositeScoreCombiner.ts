import { SentimentLabel } from '../entities/ContentAnalysis';

export const SCORE_WEIGHTS = {
    COMPOUND: 0.4,
    KEYWORD_RATIO: 0.4,
    QUALITY: 0.2,
} as const;

/** Scores strictly beyond ±0.05 are polar */
export const LABEL_THRESHOLD = 0.05;

/**
 * Linear blend of compound sentiment, keyword ratio and text quality.
 *
 * Not clamped: keywordRatio has no fixed bound, so the result ranks pages
 * against each other rather than being a normalized probability.
 */
export function combineScores(compound: number, keywordRatio: number, qualityScore: number): number {
    return SCORE_WEIGHTS.COMPOUND * compound
        + SCORE_WEIGHTS.KEYWORD_RATIO * keywordRatio
        + SCORE_WEIGHTS.QUALITY * qualityScore;
}

/**
 * Labels a compound or combined score.
 */
export function categorizeScore(score: number): SentimentLabel {
    if (score > LABEL_THRESHOLD) return 'Positive';
    if (score < -LABEL_THRESHOLD) return 'Negative';
    return 'Neutral';
}
