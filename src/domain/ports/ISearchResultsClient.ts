import { SearchOptions, SearchResultRef } from '../entities/SearchResult';

/**
 * Port for search-engine result retrieval.
 */
export interface ISearchResultsClient {
    /**
     * Returns up to `options.numResults` organic results, ranked from position 1.
     * @throws SearchProviderError when the provider cannot be reached at all
     */
    search(query: string, options: SearchOptions): Promise<SearchResultRef[]>;
}

/**
 * Raised when the search provider rejects or fails the first request of a query.
 */
export class SearchProviderError extends Error {
    constructor(message: string, public readonly statusCode?: number) {
        super(message);
        this.name = 'SearchProviderError';
    }
}
