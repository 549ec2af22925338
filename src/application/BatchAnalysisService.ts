/**
 * Batch Analysis Service
 *
 * Analyzes many URLs with bounded concurrency and an optional session cache.
 * Returns one record per input URL, in input order.
 */

import { AnalysisRecord, createFailedRecord } from '../domain/entities/ContentAnalysis';
import { ICachePort, analysisCacheKey } from '../domain/ports/ICachePort';
import { ContentAnalysisOrchestrator } from './ContentAnalysisOrchestrator';

export type ContentAnalyzer = Pick<ContentAnalysisOrchestrator, 'analyze'>;

export interface BatchAnalysisDeps {
    analyzer: ContentAnalyzer;
    /** Caller-owned session cache; omitted means every call fetches */
    cache?: ICachePort;
    cacheTtlSeconds?: number;
    /** Maximum concurrent analyses (default: 5) */
    concurrency?: number;
}

export interface BatchAnalysisOptions {
    onProgress?: (completed: number, total: number, record: AnalysisRecord) => void;
}

export const DEFAULT_CONCURRENCY = 5;

/**
 * Simple semaphore for limiting concurrent operations.
 */
class Semaphore {
    private permits: number;
    private waiting: Array<() => void> = [];

    constructor(permits: number) {
        this.permits = permits;
    }

    async acquire(): Promise<void> {
        if (this.permits > 0) {
            this.permits--;
            return;
        }
        return new Promise(resolve => {
            this.waiting.push(resolve);
        });
    }

    release(): void {
        const next = this.waiting.shift();
        if (next) {
            next();
        } else {
            this.permits++;
        }
    }
}

export class BatchAnalysisService {
    private readonly concurrency: number;

    constructor(private readonly deps: BatchAnalysisDeps) {
        this.concurrency = Math.max(1, Math.floor(deps.concurrency ?? DEFAULT_CONCURRENCY));
    }

    async analyzeAll(urls: string[], language: string, options?: BatchAnalysisOptions): Promise<AnalysisRecord[]> {
        const semaphore = new Semaphore(this.concurrency);
        let completed = 0;

        console.log(`[BatchAnalysis] Analyzing ${urls.length} URLs (concurrency: ${this.concurrency}, language: ${language})`);

        const processOne = async (url: string): Promise<AnalysisRecord> => {
            await semaphore.acquire();
            try {
                const record = await this.analyzeOne(url, language);
                completed++;
                this.reportProgress(options, completed, urls.length, record);
                return record;
            } finally {
                semaphore.release();
            }
        };

        // Promise.all keeps input order regardless of completion order
        const records = await Promise.all(urls.map(url => processOne(url)));

        const failed = records.filter(r => !r.success).length;
        console.log(`[BatchAnalysis] Done: ${records.length - failed} succeeded, ${failed} failed`);

        return records;
    }

    /**
     * Analyzes one URL, consulting the cache first when one is configured.
     */
    async analyzeOne(url: string, language: string): Promise<AnalysisRecord> {
        const key = analysisCacheKey(url, language);
        const cached = await this.readCache(key);
        if (cached) {
            return cached;
        }

        let record: AnalysisRecord;
        try {
            record = await this.deps.analyzer.analyze(url, language);
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            console.error(`[BatchAnalysis] Analyzer rejected for ${url}: ${message}`);
            record = createFailedRecord(url, message);
        }

        if (record.success) {
            await this.writeCache(key, record);
        }
        return record;
    }

    private reportProgress(options: BatchAnalysisOptions | undefined, completed: number, total: number, record: AnalysisRecord): void {
        if (!options?.onProgress) return;
        try {
            options.onProgress(completed, total, record);
        } catch (error) {
            console.warn(`[BatchAnalysis] Progress callback failed: ${error instanceof Error ? error.message : String(error)}`);
        }
    }

    private async readCache(key: string): Promise<AnalysisRecord | null> {
        if (!this.deps.cache) return null;
        try {
            return await this.deps.cache.get<AnalysisRecord>(key);
        } catch (error) {
            console.warn(`[BatchAnalysis] Cache read failed for ${key}: ${error instanceof Error ? error.message : String(error)}`);
            return null;
        }
    }

    private async writeCache(key: string, record: AnalysisRecord): Promise<void> {
        if (!this.deps.cache) return;
        try {
            await this.deps.cache.set(key, record, this.deps.cacheTtlSeconds);
        } catch (error) {
            console.warn(`[BatchAnalysis] Cache write failed for ${key}: ${error instanceof Error ? error.message : String(error)}`);
        }
    }
}
