import { FetchOutcome } from '../entities/ContentAnalysis';

/**
 * Port for retrieving page markup.
 */
export interface IPageFetcher {
    /**
     * Fetches a URL.
     * @returns The decoded page, or a FetchFailure describing why it could not be retrieved.
     * Implementations must resolve, never reject.
     */
    fetch(url: string): Promise<FetchOutcome>;
}
