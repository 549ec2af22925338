import express, { Application, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import { Config } from '../config';
import { ContentAnalysisOrchestrator } from '../application/ContentAnalysisOrchestrator';
import { BatchAnalysisService } from '../application/BatchAnalysisService';
import { SerpAnalysisService } from '../application/SerpAnalysisService';
import { LexicalScorer } from '../domain/services/LexicalScorer';
import { IPageFetcher } from '../domain/ports/IPageFetcher';
import { ITextExtractor } from '../domain/ports/ITextExtractor';
import { ISentimentAnalyzer } from '../domain/ports/ISentimentAnalyzer';
import { ISearchResultsClient } from '../domain/ports/ISearchResultsClient';
import { ICachePort } from '../domain/ports/ICachePort';

// Infrastructure imports
import { PageFetcher } from '../infrastructure/fetch/PageFetcher';
import { HtmlTextExtractor } from '../infrastructure/extraction/HtmlTextExtractor';
import { VaderSentimentAnalyzer } from '../infrastructure/sentiment/VaderSentimentAnalyzer';
import { SerpApiClient } from '../infrastructure/search/SerpApiClient';
import { InMemoryCacheAdapter } from '../infrastructure/cache/InMemoryCacheAdapter';

// Route imports
import { createAnalysisRoutes } from './routes/analysisRoutes';
import { errorHandler, NotFoundError } from './middleware/errorHandler';

/**
 * Adapters the application is wired from. Any of them can be replaced, e.g. in tests.
 */
export interface InfrastructureDeps {
    fetcher: IPageFetcher;
    extractor: ITextExtractor;
    sentimentAnalyzer: ISentimentAnalyzer;
    /** Null disables the search endpoint */
    searchClient: ISearchResultsClient | null;
    cache: ICachePort;
}

export interface AppServices {
    scorer: LexicalScorer;
    orchestrator: ContentAnalysisOrchestrator;
    batchAnalysis: BatchAnalysisService;
    serpAnalysis: SerpAnalysisService | null;
    cache: ICachePort;
}

export const APP_VERSION = '1.0.0';

/**
 * Creates and configures the Express application.
 */
export function createApp(config: Config, overrides?: Partial<InfrastructureDeps>): Application {
    const app = express();

    // Middleware
    app.use(cors());
    app.use(express.json());

    // Health check
    app.get('/health', (req: Request, res: Response) => {
        res.json({
            status: 'ok',
            timestamp: new Date().toISOString(),
            version: APP_VERSION,
        });
    });

    const services = createServices(config, overrides);

    // Routes
    app.use('/api', createAnalysisRoutes({
        batchAnalysis: services.batchAnalysis,
        serpAnalysis: services.serpAnalysis,
        cache: services.cache,
        supportedLanguages: services.scorer.supportedLanguages(),
        defaults: {
            language: config.defaultLanguage,
            country: config.defaultCountry,
            numResults: config.defaultNumResults,
            maxNumResults: config.maxNumResults,
        },
    }));

    app.use((req: Request, res: Response, next: NextFunction) => {
        next(new NotFoundError(`Route not found: ${req.method} ${req.path}`));
    });

    // Error handler (must be last)
    app.use(errorHandler);

    return app;
}

/**
 * Creates all services with proper wiring.
 */
export function createServices(config: Config, overrides?: Partial<InfrastructureDeps>): AppServices {
    const infra: InfrastructureDeps = {
        fetcher: overrides?.fetcher ?? new PageFetcher({
            timeoutMs: config.fetch.timeoutMs,
            maxAttempts: config.fetch.maxAttempts,
            retryBackoffMs: config.fetch.retryBackoffMs,
            userAgent: config.fetch.userAgent,
        }),
        extractor: overrides?.extractor ?? new HtmlTextExtractor(),
        sentimentAnalyzer: overrides?.sentimentAnalyzer ?? new VaderSentimentAnalyzer(),
        searchClient: overrides?.searchClient !== undefined
            ? overrides.searchClient
            : createSearchClient(config),
        cache: overrides?.cache ?? new InMemoryCacheAdapter(),
    };

    const scorer = new LexicalScorer(infra.sentimentAnalyzer);
    const orchestrator = new ContentAnalysisOrchestrator({
        fetcher: infra.fetcher,
        extractor: infra.extractor,
        scorer,
        summaryWordCount: config.analysis.summaryWordCount,
    });
    const batchAnalysis = new BatchAnalysisService({
        analyzer: orchestrator,
        cache: infra.cache,
        cacheTtlSeconds: config.analysis.cacheTtlSeconds,
        concurrency: config.analysis.concurrency,
    });
    const serpAnalysis = infra.searchClient
        ? new SerpAnalysisService(infra.searchClient, batchAnalysis)
        : null;

    return { scorer, orchestrator, batchAnalysis, serpAnalysis, cache: infra.cache };
}

// --- Helper Functions ---

function createSearchClient(config: Config): ISearchResultsClient | null {
    if (config.serpApiKey) {
        console.log('✅ SerpAPI search configured');
        return new SerpApiClient(config.serpApiKey, { baseUrl: config.serpApiBaseUrl });
    }
    console.log('⚠️  SERPAPI_KEY not set: search disabled, direct URL analysis only');
    return null;
}
