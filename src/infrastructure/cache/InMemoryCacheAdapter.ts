/**
 * In-Memory Cache Adapter
 *
 * Per-session store for analysis records.
 * Supports TTL: expired entries are dropped on read and swept on every write.
 */

import { ICachePort } from '../../domain/ports/ICachePort';

interface CacheEntry {
    value: unknown;
    expiresAt: number | null; // null = no expiry
}

export class InMemoryCacheAdapter implements ICachePort {
    private cache: Map<string, CacheEntry> = new Map();

    async get<T>(key: string): Promise<T | null> {
        const entry = this.cache.get(key);

        if (!entry) {
            return null;
        }

        if (isExpired(entry, Date.now())) {
            this.cache.delete(key);
            return null;
        }

        return entry.value as T;
    }

    async set<T>(key: string, value: T, ttlSeconds?: number): Promise<void> {
        this.cleanup();
        const expiresAt = ttlSeconds !== undefined ? Date.now() + (ttlSeconds * 1000) : null;
        this.cache.set(key, { value, expiresAt });
    }

    async clear(): Promise<void> {
        this.cache.clear();
    }

    /**
     * Number of stored entries, expired ones included until the next read or write.
     */
    size(): number {
        return this.cache.size;
    }

    /**
     * Removes expired entries and returns how many were dropped.
     */
    cleanup(): number {
        const now = Date.now();
        let cleaned = 0;

        for (const [key, entry] of this.cache.entries()) {
            if (isExpired(entry, now)) {
                this.cache.delete(key);
                cleaned++;
            }
        }

        return cleaned;
    }
}

function isExpired(entry: CacheEntry, now: number): boolean {
    return entry.expiresAt !== null && now >= entry.expiresAt;
}
