import { ExtractedText, RawPage } from '../entities/ContentAnalysis';

/**
 * Port for turning page markup into clean body text.
 */
export interface ITextExtractor {
    /**
     * Extracts readable text. Must tolerate malformed markup and never throw.
     */
    extract(page: RawPage): ExtractedText;
}
