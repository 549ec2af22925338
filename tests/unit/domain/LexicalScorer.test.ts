import {
    countOccurrences,
    LexicalScorer,
    qualityScoreFor,
} from '../../../src/domain/services/LexicalScorer';
import { ISentimentAnalyzer } from '../../../src/domain/ports/ISentimentAnalyzer';

describe('LexicalScorer', () => {
    let analyzer: jest.Mocked<ISentimentAnalyzer>;
    let scorer: LexicalScorer;

    beforeEach(() => {
        analyzer = {
            polarity: jest.fn().mockReturnValue({ compound: 0.5, positive: 0.4, neutral: 0.6, negative: 0 }),
        };
        scorer = new LexicalScorer(analyzer);
    });

    describe('qualityScoreFor()', () => {
        it.each([
            [0, 0.5],
            [4.9, 0.5],
            [5, 1.0],
            [20, 1.0],
            [40, 1.0],
            [40.1, 0.7],
        ])('should map average sentence length %p to %p', (avg, expected) => {
            expect(qualityScoreFor(avg)).toBe(expected);
        });
    });

    describe('countOccurrences()', () => {
        it('should count non-overlapping matches', () => {
            expect(countOccurrences('aaaa', 'aa')).toBe(2);
        });

        it('should return 0 for an empty needle', () => {
            expect(countOccurrences('text', '')).toBe(0);
        });
    });

    describe('scoreKeywords()', () => {
        it('should count English positive keywords', () => {
            const signals = scorer.scoreKeywords('This is an excellent and great success story.', 'en');

            expect(signals.positiveKeywordCount).toBe(3);
            expect(signals.negativeKeywordCount).toBe(0);
            expect(signals.keywordRatio).toBeCloseTo(3 / 8);
        });

        it('should give a negative ratio when negative keywords dominate', () => {
            const signals = scorer.scoreKeywords('The service was terrible and the support was awful.', 'en');

            expect(signals.positiveKeywordCount).toBe(0);
            expect(signals.negativeKeywordCount).toBe(2);
            expect(signals.keywordRatio).toBeCloseTo(-2 / 9);
        });

        it('should match case-insensitively', () => {
            expect(scorer.scoreKeywords('GREAT Great great', 'en').positiveKeywordCount).toBe(3);
        });

        it('should use the Danish lists for "da"', () => {
            const signals = scorer.scoreKeywords('Fantastisk service, men levering var forsinket.', 'da');

            expect(signals.positiveKeywordCount).toBe(1);
            expect(signals.negativeKeywordCount).toBe(1);
            expect(signals.keywordRatio).toBe(0);
        });

        it('should fall back to English for an unknown language', () => {
            const warn = jest.spyOn(console, 'warn').mockImplementation(() => { });

            const signals = scorer.scoreKeywords('great', 'xx');

            expect(signals.positiveKeywordCount).toBe(1);
            expect(warn).toHaveBeenCalledWith(expect.stringContaining('"xx"'));
            warn.mockRestore();
        });

        it('should return a zero ratio for empty text', () => {
            expect(scorer.scoreKeywords('', 'en')).toEqual({
                positiveKeywordCount: 0,
                negativeKeywordCount: 0,
                keywordRatio: 0,
            });
        });
    });

    describe('assessQuality()', () => {
        it('should average tokens per sentence', () => {
            const quality = scorer.assessQuality('One two three four five six. One two.');

            expect(quality.avgSentenceLength).toBe(4);
            expect(quality.qualityScore).toBe(0.5);
        });

        it('should treat text without sentences as fragmented', () => {
            expect(scorer.assessQuality('')).toEqual({ avgSentenceLength: 0, qualityScore: 0.5 });
        });
    });

    describe('score()', () => {
        it('should skip the analyzer and return neutral sentiment for empty text', () => {
            const scores = scorer.score('', 'en');

            expect(analyzer.polarity).not.toHaveBeenCalled();
            expect(scores.sentiment).toEqual({ compound: 0, positive: 0, neutral: 1, negative: 0 });
            expect(scores.lexical.keywordRatio).toBe(0);
            expect(scores.quality.qualityScore).toBe(0.5);
        });

        it('should combine analyzer, keyword and quality results', () => {
            const scores = scorer.score('This is an excellent and great success story.', 'en');

            expect(analyzer.polarity).toHaveBeenCalledWith('This is an excellent and great success story.');
            expect(scores.sentiment.compound).toBe(0.5);
            expect(scores.lexical.positiveKeywordCount).toBe(3);
            expect(scores.quality).toEqual({ avgSentenceLength: 8, qualityScore: 1.0 });
        });
    });

    describe('supportedLanguages()', () => {
        it('should list the bundled languages', () => {
            expect(scorer.supportedLanguages()).toEqual(['en', 'da']);
            expect(scorer.supportsLanguage('da')).toBe(true);
            expect(scorer.supportsLanguage('de')).toBe(false);
        });

        it('should accept a custom lexicon', () => {
            const custom = new LexicalScorer(analyzer, { sv: { positive: ['bra'], negative: ['dålig'] } });

            expect(custom.supportedLanguages()).toEqual(['sv']);
            expect(custom.scoreKeywords('bra bra dålig', 'sv').keywordRatio).toBeCloseTo(1 / 3);
        });
    });
});
