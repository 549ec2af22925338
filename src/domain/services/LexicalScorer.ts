import keywordData from '../../data/sentimentKeywords.json';
import { ISentimentAnalyzer } from '../ports/ISentimentAnalyzer';
import {
    LexicalSignals,
    NEUTRAL_SENTIMENT,
    SentimentScores,
    TextQuality,
} from '../entities/ContentAnalysis';
import { countWords, splitSentences, tokenize } from './TextStatistics';

export interface KeywordList {
    positive: string[];
    negative: string[];
}

/** Keyword lists keyed by language code */
export type KeywordLexicon = Record<string, KeywordList>;

export interface LexicalScores {
    sentiment: SentimentScores;
    lexical: LexicalSignals;
    quality: TextQuality;
}

export const DEFAULT_KEYWORD_LEXICON: KeywordLexicon = keywordData;

export const FALLBACK_LANGUAGE = 'en';

/** Average sentence length bounds, in tokens */
export const SENTENCE_LENGTH_BOUNDS = {
    FRAGMENTED_BELOW: 5,
    RUN_ON_ABOVE: 40,
} as const;

export const QUALITY_SCORES = {
    FRAGMENTED: 0.5,
    RUN_ON: 0.7,
    NORMAL: 1.0,
} as const;

/**
 * Three-bucket prose quality heuristic. Both bounds are strict.
 */
export function qualityScoreFor(avgSentenceLength: number): number {
    if (avgSentenceLength < SENTENCE_LENGTH_BOUNDS.FRAGMENTED_BELOW) {
        return QUALITY_SCORES.FRAGMENTED;
    }
    if (avgSentenceLength > SENTENCE_LENGTH_BOUNDS.RUN_ON_ABOVE) {
        return QUALITY_SCORES.RUN_ON;
    }
    return QUALITY_SCORES.NORMAL;
}

/**
 * Non-overlapping occurrences of `needle` in `haystack`.
 */
export function countOccurrences(haystack: string, needle: string): number {
    if (!needle) return 0;
    let count = 0;
    let index = haystack.indexOf(needle);
    while (index !== -1) {
        count++;
        index = haystack.indexOf(needle, index + needle.length);
    }
    return count;
}

/**
 * Scores clean text for sentiment, keyword polarity and sentence-length quality.
 */
export class LexicalScorer {
    private readonly lexicon: KeywordLexicon;

    constructor(
        private readonly sentimentAnalyzer: ISentimentAnalyzer,
        lexicon: KeywordLexicon = DEFAULT_KEYWORD_LEXICON
    ) {
        this.lexicon = lexicon;
    }

    score(text: string, language: string): LexicalScores {
        return {
            sentiment: this.scoreSentiment(text),
            lexical: this.scoreKeywords(text, language),
            quality: this.assessQuality(text),
        };
    }

    supportedLanguages(): string[] {
        return Object.keys(this.lexicon);
    }

    supportsLanguage(language: string): boolean {
        return Object.prototype.hasOwnProperty.call(this.lexicon, language);
    }

    scoreSentiment(text: string): SentimentScores {
        if (countWords(text) === 0) {
            return { ...NEUTRAL_SENTIMENT };
        }
        return this.sentimentAnalyzer.polarity(text);
    }

    /**
     * Case-insensitive substring counts against the language's keyword lists.
     */
    scoreKeywords(text: string, language: string): LexicalSignals {
        const keywords = this.keywordsFor(language);
        const lowerText = text.toLowerCase();

        const positiveKeywordCount = keywords.positive
            .reduce((sum, term) => sum + countOccurrences(lowerText, term.toLowerCase()), 0);
        const negativeKeywordCount = keywords.negative
            .reduce((sum, term) => sum + countOccurrences(lowerText, term.toLowerCase()), 0);

        const wordCount = countWords(text);
        const keywordRatio = wordCount > 0
            ? (positiveKeywordCount - negativeKeywordCount) / wordCount
            : 0;

        return { positiveKeywordCount, negativeKeywordCount, keywordRatio };
    }

    assessQuality(text: string): TextQuality {
        const sentences = splitSentences(text);
        if (sentences.length === 0) {
            return { avgSentenceLength: 0, qualityScore: QUALITY_SCORES.FRAGMENTED };
        }

        const totalTokens = sentences.reduce((sum, sentence) => sum + tokenize(sentence).length, 0);
        const avgSentenceLength = totalTokens / sentences.length;

        return { avgSentenceLength, qualityScore: qualityScoreFor(avgSentenceLength) };
    }

    private keywordsFor(language: string): KeywordList {
        if (this.supportsLanguage(language)) {
            return this.lexicon[language];
        }
        console.warn(`[LexicalScorer] No keyword list for language "${language}", using "${FALLBACK_LANGUAGE}"`);
        return this.lexicon[FALLBACK_LANGUAGE] ?? { positive: [], negative: [] };
    }
}
