/**
 * Cache Port Interface
 *
 * Session-scoped key-value store owned by the caller of the analysis pipeline.
 * Last writer wins; stored values are idempotent so concurrent writes are harmless.
 */

export interface ICachePort {
    /**
     * Get a value from the cache.
     * @returns The cached value or null if not found/expired
     */
    get<T>(key: string): Promise<T | null>;

    /**
     * Set a value in the cache.
     * @param ttlSeconds - Optional TTL in seconds (default: no expiry)
     */
    set<T>(key: string, value: T, ttlSeconds?: number): Promise<void>;

    /**
     * Drop every cached value.
     */
    clear(): Promise<void>;
}

export const CACHE_PREFIXES = {
    ANALYSIS: 'analysis:',
} as const;

/**
 * Cache key for an analysis record. Language is part of the key
 * because keyword scores depend on it.
 */
export function analysisCacheKey(url: string, language: string): string {
    return `${CACHE_PREFIXES.ANALYSIS}${language}:${url}`;
}
