import { HtmlTextExtractor } from '../../../src/infrastructure/extraction/HtmlTextExtractor';
import { RawPage } from '../../../src/domain/entities/ContentAnalysis';

function page(body: string): RawPage {
    return { url: 'https://example-news.test/story', statusCode: 200, body, encoding: 'utf-8' };
}

describe('HtmlTextExtractor', () => {
    let extractor: HtmlTextExtractor;

    beforeEach(() => {
        extractor = new HtmlTextExtractor();
    });

    describe('extract()', () => {
        it('should return an empty result for an empty body', () => {
            expect(extractor.extract(page(''))).toEqual({
                url: 'https://example-news.test/story',
                text: '',
                charLength: 0,
                wordCount: 0,
            });
        });

        it('should join paragraphs with normalized whitespace', () => {
            const result = extractor.extract(page(`
                <html><body>
                    <p>First   paragraph.</p>
                    <p>Second
                       paragraph.</p>
                </body></html>
            `));

            expect(result.text).toBe('First paragraph. Second paragraph.');
            expect(result.charLength).toBe(34);
            expect(result.wordCount).toBe(4);
        });

        it('should drop scripts, styles and navigation chrome', () => {
            const result = extractor.extract(page(`
                <html>
                    <head><style>p { color: red; }</style><script>var tracking = 1;</script></head>
                    <body>
                        <header><p>Site header</p></header>
                        <nav><p>Home | About</p></nav>
                        <p>Actual content.</p>
                        <aside><p>Related links</p></aside>
                        <footer><p>Copyright notice</p></footer>
                    </body>
                </html>
            `));

            expect(result.text).toBe('Actual content.');
        });

        it('should prefer the main content region', () => {
            const result = extractor.extract(page(`
                <body>
                    <div class="teaser"><p>Teaser outside main.</p></div>
                    <main><p>Main story here.</p><p>More of it.</p></main>
                </body>
            `));

            expect(result.text).toBe('Main story here. More of it.');
        });

        it('should use an article when there is no main element', () => {
            const result = extractor.extract(page(`
                <body>
                    <p>Cookie banner text.</p>
                    <article><p>Article body.</p></article>
                </body>
            `));

            expect(result.text).toBe('Article body.');
        });

        it('should use the full region text when the region has no paragraphs', () => {
            const result = extractor.extract(page('<body><article>Just   text in an article</article></body>'));

            expect(result.text).toBe('Just text in an article');
        });

        it('should return empty text when there are no paragraphs and no content region', () => {
            expect(extractor.extract(page('<body><div>Only a div</div></body>')).text).toBe('');
        });

        it('should tolerate malformed markup', () => {
            const result = extractor.extract(page('<html><body><p>Unclosed <b>bold<p>Next paragraph</div></span>'));

            expect(result.text).toBe('Unclosed bold Next paragraph');
        });

        it('should decode HTML entities', () => {
            expect(extractor.extract(page('<p>Fish &amp; chips &lt;3</p>')).text).toBe('Fish & chips <3');
        });
    });
});
