/**
 * Integration Tests: HTTP API over the real pipeline.
 * Page fetches are served by nock; the search provider is a stub.
 */

import nock from 'nock';
import request from 'supertest';
import { createApp } from '../../src/presentation/app';
import { Config } from '../../src/config';
import { ISearchResultsClient } from '../../src/domain/ports/ISearchResultsClient';

function testConfig(overrides?: Partial<Config>): Config {
    return {
        port: 0,
        environment: 'test',
        serpApiKey: undefined,
        serpApiBaseUrl: 'https://serpapi.test/search.json',
        defaultLanguage: 'en',
        defaultCountry: 'us',
        defaultNumResults: 10,
        maxNumResults: 20,
        fetch: { timeoutMs: 2000, maxAttempts: 2, retryBackoffMs: 0 },
        analysis: { concurrency: 2, summaryWordCount: 100, cacheTtlSeconds: 60 },
        ...overrides,
    };
}

beforeAll(() => {
    nock.disableNetConnect();
    // supertest binds the app to an ephemeral local port
    nock.enableNetConnect('127.0.0.1');
});

afterAll(() => {
    nock.enableNetConnect();
});

beforeEach(() => {
    nock.cleanAll();
    jest.spyOn(console, 'log').mockImplementation(() => { });
    jest.spyOn(console, 'warn').mockImplementation(() => { });
    jest.spyOn(console, 'error').mockImplementation(() => { });
});

afterEach(() => {
    nock.cleanAll();
    jest.restoreAllMocks();
});

describe('Integration: API pipeline', () => {
    it('should report health', async () => {
        const res = await request(createApp(testConfig())).get('/health');

        expect(res.status).toBe(200);
        expect(res.body.status).toBe('ok');
        expect(res.body.version).toBe('1.0.0');
    });

    it('should answer unknown routes with 404', async () => {
        const res = await request(createApp(testConfig())).get('/api/nope');

        expect(res.status).toBe(404);
        expect(res.body.error).toEqual({ message: 'Route not found: GET /api/nope', code: 'NotFoundError' });
    });

    it('should fetch, extract and score pages end to end', async () => {
        nock('https://happy-blog.test')
            .get('/post')
            .reply(200, `
                <html>
                    <head><script>window.tracking = true;</script></head>
                    <body>
                        <nav><p>Home About Contact</p></nav>
                        <article><p>This is an excellent and great success story.</p></article>
                    </body>
                </html>
            `, { 'Content-Type': 'text/html; charset=utf-8' });

        let missingCalls = 0;
        nock('https://gone.test')
            .get('/')
            .times(2)
            .reply(() => {
                missingCalls++;
                return [404, 'Not Found'];
            });

        const app = createApp(testConfig());
        const res = await request(app)
            .post('/api/analyze')
            .send({ urls: ['https://happy-blog.test/post', 'https://gone.test/'] });

        expect(res.status).toBe(200);
        expect(res.body.succeeded).toBe(1);

        const [happy, gone] = res.body.analyses;
        expect(happy.label).toBe('Positive');
        expect(happy.analysis).toMatchObject({
            url: 'https://happy-blog.test/post',
            domain: 'happy-blog.test',
            summary: 'This is an excellent and great success story.',
            wordCount: 8,
            contentLength: 45,
            success: true,
            lexical: { positiveKeywordCount: 3, negativeKeywordCount: 0, keywordRatio: 0.375 },
            quality: { avgSentenceLength: 8, qualityScore: 1 },
        });
        expect(happy.analysis.sentiment.compound).toBeGreaterThan(0);

        expect(missingCalls).toBe(1);
        expect(gone.analysis).toMatchObject({
            success: false,
            summary: 'Error: HttpStatus: HTTP 404',
            combinedScore: 0,
        });
    });

    it('should serve a repeated URL from the session cache', async () => {
        const scope = nock('https://cached.test')
            .get('/')
            .once()
            .reply(200, '<p>Good quality content that people recommend to friends.</p>');

        const app = createApp(testConfig());
        await request(app).post('/api/analyze').send({ urls: ['https://cached.test/'] });
        const second = await request(app).post('/api/analyze').send({ urls: ['https://cached.test/'] });

        expect(scope.isDone()).toBe(true);
        expect(second.body.succeeded).toBe(1);
    });

    it('should disable search without an API key', async () => {
        const res = await request(createApp(testConfig())).post('/api/serp').send({ phrases: ['anything'] });

        expect(res.status).toBe(503);
    });

    it('should run search phrases through an injected search client', async () => {
        nock('https://result-one.test')
            .get('/')
            .reply(200, '<main><p>The product is terrible and the support was awful.</p></main>');

        const searchClient: ISearchResultsClient = {
            search: jest.fn().mockResolvedValue([
                { position: 1, title: 'Result one', url: 'https://result-one.test/', snippet: 'Snippet' },
            ]),
        };

        const app = createApp(testConfig(), { searchClient });
        const res = await request(app).post('/api/serp').send({ phrases: 'complaints' });

        expect(res.status).toBe(200);
        const [report] = res.body.phrases;
        expect(report.phrase).toBe('complaints');
        expect(report.analyses[0].analysis.lexical.negativeKeywordCount).toBe(2);
        expect(report.analyses[0].label).toBe('Negative');
    });
});
