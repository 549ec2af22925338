import * as cheerio from 'cheerio';
import { ITextExtractor } from '../../domain/ports/ITextExtractor';
import { ExtractedText, RawPage } from '../../domain/entities/ContentAnalysis';
import { countWords, normalizeWhitespace } from '../../domain/services/TextStatistics';

/** Elements that never carry article prose */
const NOISE_SELECTOR = 'script, style, noscript, template, iframe, svg, nav, header, footer, aside';

/** Candidate primary-content containers, in order of preference */
const MAIN_CONTENT_SELECTORS = ['main', 'article', '[role="main"]'];

/**
 * Extracts readable body text from HTML using Cheerio.
 * Parsing is tolerant: broken markup yields whatever text can be recovered.
 */
export class HtmlTextExtractor implements ITextExtractor {
    extract(page: RawPage): ExtractedText {
        const text = this.extractText(page.body);
        return {
            url: page.url,
            text,
            charLength: text.length,
            wordCount: countWords(text),
        };
    }

    /**
     * Paragraphs of the main content region if there is one, otherwise of the whole document.
     * A main region without paragraphs contributes its full text.
     */
    extractText(html: string): string {
        const $ = cheerio.load(html);
        $(NOISE_SELECTOR).remove();

        const mainSelector = MAIN_CONTENT_SELECTORS.find(
            selector => normalizeWhitespace($(selector).first().text()).length > 0
        );

        const paragraphs = (mainSelector ? $(mainSelector).first().find('p') : $('p'))
            .map((_, el) => normalizeWhitespace($(el).text()))
            .get()
            .filter(text => text.length > 0);

        if (paragraphs.length > 0) {
            return paragraphs.join(' ');
        }

        return mainSelector ? normalizeWhitespace($(mainSelector).first().text()) : '';
    }
}
