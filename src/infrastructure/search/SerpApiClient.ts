import axios, { AxiosInstance } from 'axios';
import { ISearchResultsClient, SearchProviderError } from '../../domain/ports/ISearchResultsClient';
import { SearchOptions, SearchResultRef } from '../../domain/entities/SearchResult';

/** SerpAPI returns at most this many organic results per request */
export const SERPAPI_PAGE_SIZE = 10;

interface SerpApiOrganicResult {
    title?: string;
    link?: string;
    snippet?: string;
}

interface SerpApiResponse {
    organic_results?: SerpApiOrganicResult[];
    error?: string;
}

/**
 * SerpAPI Client
 * Fetches Google organic results page by page until enough have been collected.
 */
export class SerpApiClient implements ISearchResultsClient {
    private readonly apiKey: string;
    private readonly baseUrl: string;
    private readonly timeoutMs: number;
    private readonly http: AxiosInstance;

    constructor(apiKey: string, options?: { baseUrl?: string; timeoutMs?: number; httpClient?: AxiosInstance }) {
        if (!apiKey) {
            throw new Error('SerpAPI key is required');
        }
        this.apiKey = apiKey;
        this.baseUrl = options?.baseUrl ?? 'https://serpapi.com/search.json';
        this.timeoutMs = options?.timeoutMs ?? 15000;
        this.http = options?.httpClient ?? axios;
    }

    async search(query: string, options: SearchOptions): Promise<SearchResultRef[]> {
        const collected: SerpApiOrganicResult[] = [];
        let start = 0;

        console.log(`[SerpApi] Searching "${query}" (${options.numResults} results, gl=${options.country}, hl=${options.language})`);

        while (collected.length < options.numResults) {
            let page: SerpApiOrganicResult[];
            try {
                page = await this.fetchPage(query, start, options);
            } catch (error) {
                if (start === 0) {
                    throw error;
                }
                // Keep what earlier pages returned
                console.warn(`[SerpApi] Stopping pagination at offset ${start}: ${error instanceof Error ? error.message : String(error)}`);
                break;
            }

            if (page.length === 0) break;
            collected.push(...page);
            if (page.length < SERPAPI_PAGE_SIZE) break;

            start += SERPAPI_PAGE_SIZE;
        }

        return collected
            .filter((item): item is SerpApiOrganicResult & { link: string } => typeof item.link === 'string' && item.link.length > 0)
            .slice(0, options.numResults)
            .map((item, index) => ({
                position: index + 1,
                title: item.title ?? '',
                url: item.link,
                snippet: item.snippet ?? '',
            }));
    }

    private async fetchPage(query: string, start: number, options: SearchOptions): Promise<SerpApiOrganicResult[]> {
        try {
            const response = await this.http.get<SerpApiResponse>(this.baseUrl, {
                params: {
                    q: query,
                    num: SERPAPI_PAGE_SIZE,
                    start,
                    engine: 'google',
                    api_key: this.apiKey,
                    gl: options.country,
                    hl: options.language,
                },
                timeout: this.timeoutMs,
            });

            if (response.data.error) {
                // SerpAPI reports "no results" through the error field as well
                console.warn(`[SerpApi] Provider message at offset ${start}: ${response.data.error}`);
                return [];
            }

            return Array.isArray(response.data.organic_results) ? response.data.organic_results : [];
        } catch (error) {
            if (axios.isAxiosError(error)) {
                const status = error.response?.status;
                console.error('[SerpApi] API Error:', status ?? error.code ?? error.message);
                throw new SearchProviderError(`SerpAPI request failed: ${error.message}`, status);
            }
            throw error;
        }
    }
}
