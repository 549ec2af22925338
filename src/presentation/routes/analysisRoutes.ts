import { Router, Request, Response } from 'express';
import { BatchAnalysisService } from '../../application/BatchAnalysisService';
import { SerpAnalysisService } from '../../application/SerpAnalysisService';
import { ANALYSIS_MODES, AnalysisMode } from '../../domain/entities/SearchResult';
import { ICachePort } from '../../domain/ports/ICachePort';
import { SearchProviderError } from '../../domain/ports/ISearchResultsClient';
import { categorizeScore } from '../../domain/services/CompositeScoreCombiner';
import {
    asyncHandler,
    BadGatewayError,
    BadRequestError,
    ServiceUnavailableError,
} from '../middleware/errorHandler';

export interface AnalysisRouteDeps {
    batchAnalysis: BatchAnalysisService;
    /** Null when no search API key is configured */
    serpAnalysis: SerpAnalysisService | null;
    cache: ICachePort;
    supportedLanguages: string[];
    defaults: {
        language: string;
        country: string;
        numResults: number;
        maxNumResults: number;
    };
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isPositiveInteger(value: unknown): value is number {
    return typeof value === 'number' && Number.isInteger(value) && value >= 1;
}

function isStringArray(value: unknown): value is string[] {
    return Array.isArray(value) && value.every(item => typeof item === 'string');
}

function isAnalysisMode(value: unknown): value is AnalysisMode {
    return typeof value === 'string' && ANALYSIS_MODES.some(mode => mode === value);
}

/**
 * Accepts an array of phrases or newline-separated text; blank lines are dropped.
 */
function parsePhrases(value: unknown): string[] {
    let phrases: string[];
    if (typeof value === 'string') {
        phrases = value.split('\n');
    } else if (isStringArray(value)) {
        phrases = value;
    } else {
        throw new BadRequestError('phrases must be a string or an array of strings');
    }

    phrases = phrases.map(p => p.trim()).filter(p => p.length > 0);
    if (phrases.length === 0) {
        throw new BadRequestError('Please enter at least one search phrase');
    }
    return phrases;
}

function parseNumResults(value: unknown, fallback: number, max: number): number {
    if (value === undefined) return fallback;
    if (!isPositiveInteger(value) || value > max) {
        throw new BadRequestError(`numResults must be an integer between 1 and ${max}`);
    }
    return value;
}

function parseCountry(value: unknown, fallback: string): string {
    if (value === undefined) return fallback;
    if (typeof value !== 'string' || !/^[a-z]{2}$/i.test(value)) {
        throw new BadRequestError('country must be a two-letter country code');
    }
    return value.toLowerCase();
}

function parseMode(value: unknown): AnalysisMode {
    if (value === undefined) return 'serp-and-content';
    if (!isAnalysisMode(value)) {
        throw new BadRequestError(`mode must be one of: ${ANALYSIS_MODES.join(', ')}`);
    }
    return value;
}

function parseSelectedPositions(value: unknown): number[] | undefined {
    if (value === undefined) return undefined;
    if (!Array.isArray(value) || !value.every(isPositiveInteger)) {
        throw new BadRequestError('selectedPositions must be an array of positive integers');
    }
    return value.filter(isPositiveInteger);
}

/**
 * Creates search and content analysis routes with dependency injection.
 */
export function createAnalysisRoutes(deps: AnalysisRouteDeps): Router {
    const router = Router();

    const parseLanguage = (value: unknown): string => {
        if (value === undefined) return deps.defaults.language;
        if (typeof value !== 'string' || !deps.supportedLanguages.includes(value.toLowerCase())) {
            throw new BadRequestError(`language must be one of: ${deps.supportedLanguages.join(', ')}`);
        }
        return value.toLowerCase();
    };

    /**
     * GET /languages
     *
     * Languages with keyword lists.
     */
    router.get('/languages', (req: Request, res: Response) => {
        res.json({
            languages: deps.supportedLanguages,
            default: deps.defaults.language,
        });
    });

    /**
     * POST /serp
     *
     * Searches one or more phrases and analyzes the results.
     * `phrases` may be an array or newline-separated text.
     */
    router.post(
        '/serp',
        asyncHandler(async (req: Request, res: Response) => {
            const body: unknown = req.body;
            if (!isRecord(body)) {
                throw new BadRequestError('Request body must be a JSON object');
            }

            const phrases = parsePhrases(body.phrases);
            const numResults = parseNumResults(body.numResults, deps.defaults.numResults, deps.defaults.maxNumResults);
            const country = parseCountry(body.country, deps.defaults.country);
            const mode = parseMode(body.mode);
            const selectedPositions = parseSelectedPositions(body.selectedPositions);
            const language = parseLanguage(body.language);

            if (!deps.serpAnalysis) {
                throw new ServiceUnavailableError('Search is not configured: set SERPAPI_KEY');
            }

            try {
                const reports = await deps.serpAnalysis.run({
                    phrases,
                    numResults,
                    country,
                    language,
                    mode,
                    selectedPositions,
                });
                res.json({ phrases: reports });
            } catch (error) {
                if (error instanceof SearchProviderError) {
                    throw new BadGatewayError(error.message);
                }
                throw error;
            }
        })
    );

    /**
     * POST /analyze
     *
     * Analyzes the given URLs directly, without a search.
     */
    router.post(
        '/analyze',
        asyncHandler(async (req: Request, res: Response) => {
            const body: unknown = req.body;
            if (!isRecord(body)) {
                throw new BadRequestError('Request body must be a JSON object');
            }

            const { urls } = body;
            if (!isStringArray(urls) || urls.length === 0) {
                throw new BadRequestError('urls must be a non-empty array of strings');
            }
            if (urls.length > deps.defaults.maxNumResults) {
                throw new BadRequestError(`At most ${deps.defaults.maxNumResults} urls per request`);
            }
            const language = parseLanguage(body.language);

            const records = await deps.batchAnalysis.analyzeAll(urls, language);
            const succeeded = records.filter(r => r.success).length;

            res.json({
                total: records.length,
                succeeded,
                failed: records.length - succeeded,
                analyses: records.map(record => ({
                    url: record.url,
                    label: categorizeScore(record.combinedScore),
                    analysis: record,
                })),
            });
        })
    );

    /**
     * DELETE /cache
     *
     * Forgets every analysis of the current session.
     */
    router.delete(
        '/cache',
        asyncHandler(async (req: Request, res: Response) => {
            await deps.cache.clear();
            res.status(204).send();
        })
    );

    return router;
}
