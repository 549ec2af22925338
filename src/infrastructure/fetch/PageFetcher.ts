import axios, { AxiosInstance, AxiosResponse } from 'axios';
import { TextDecoder } from 'util';
import { IPageFetcher } from '../../domain/ports/IPageFetcher';
import { FetchErrorKind, FetchOutcome, RawPage } from '../../domain/entities/ContentAnalysis';
import { withRetry } from '../utils/RetryUtils';

export interface PageFetcherOptions {
    /** Per-attempt time budget in milliseconds (default: 10000). Zero or less fails immediately. */
    timeoutMs?: number;
    /** Attempts for Timeout/Transport failures, first one included (default: 3) */
    maxAttempts?: number;
    /** Fixed delay between attempts (default: 1000) */
    retryBackoffMs?: number;
    userAgent?: string;
    httpClient?: AxiosInstance;
}

export const DEFAULT_USER_AGENT =
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36';

const RETRYABLE_KINDS: ReadonlySet<FetchErrorKind> = new Set<FetchErrorKind>(['Timeout', 'Transport']);

/**
 * Error carrying a fetch failure category between attempts.
 */
export class PageFetchError extends Error {
    constructor(public readonly kind: FetchErrorKind, message: string) {
        super(message);
        this.name = 'PageFetchError';
    }
}

/**
 * Retrieves pages over HTTP with a browser-like identity, a per-attempt timeout
 * and bounded retry for transient failures. HTTP error statuses are final.
 */
export class PageFetcher implements IPageFetcher {
    private readonly timeoutMs: number;
    private readonly maxAttempts: number;
    private readonly retryBackoffMs: number;
    private readonly userAgent: string;
    private readonly http: AxiosInstance;

    constructor(options?: PageFetcherOptions) {
        this.timeoutMs = options?.timeoutMs ?? 10000;
        this.maxAttempts = options?.maxAttempts ?? 3;
        this.retryBackoffMs = options?.retryBackoffMs ?? 1000;
        this.userAgent = options?.userAgent ?? DEFAULT_USER_AGENT;
        this.http = options?.httpClient ?? axios;
    }

    async fetch(url: string): Promise<FetchOutcome> {
        if (!this.isValidUrl(url)) {
            return { url, errorKind: 'InvalidURL', message: `Invalid URL: ${url}` };
        }

        if (this.timeoutMs <= 0) {
            return { url, errorKind: 'Timeout', message: `Request timed out after ${this.timeoutMs}ms` };
        }

        try {
            return await withRetry(() => this.request(url), {
                maxAttempts: this.maxAttempts,
                initialBackoffMs: this.retryBackoffMs,
                backoffMultiplier: 1,
                isRetryable: (error) => error instanceof PageFetchError && RETRYABLE_KINDS.has(error.kind),
                onRetry: (attempt, error, delayMs) => {
                    const reason = error instanceof Error ? error.message : String(error);
                    console.warn(`[PageFetcher] Attempt ${attempt}/${this.maxAttempts} for ${url} failed (${reason}), retrying in ${delayMs}ms`);
                },
            });
        } catch (error) {
            if (error instanceof PageFetchError) {
                return { url, errorKind: error.kind, message: error.message };
            }
            return { url, errorKind: 'Transport', message: error instanceof Error ? error.message : String(error) };
        }
    }

    private async request(url: string): Promise<RawPage> {
        let response: AxiosResponse<ArrayBuffer>;
        try {
            response = await this.http.get<ArrayBuffer>(url, {
                headers: {
                    'User-Agent': this.userAgent,
                    'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
                    'Accept-Language': 'en-US,en;q=0.9,da;q=0.8',
                },
                timeout: this.timeoutMs,
                maxRedirects: 5,
                responseType: 'arraybuffer',
                validateStatus: () => true,
            });
        } catch (error) {
            throw this.toFetchError(error);
        }

        if (response.status < 200 || response.status >= 300) {
            throw new PageFetchError('HttpStatus', `HTTP ${response.status}`);
        }

        const contentType = response.headers['content-type'];
        const charset = detectCharset(typeof contentType === 'string' ? contentType : '')
            ?? sniffMetaCharset(response.data)
            ?? 'utf-8';
        const { body, encoding } = decodeBody(response.data, charset);

        return {
            url,
            statusCode: response.status,
            body,
            encoding,
        };
    }

    private toFetchError(error: unknown): PageFetchError {
        if (axios.isAxiosError(error)) {
            if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
                return new PageFetchError('Timeout', `Request timed out after ${this.timeoutMs}ms`);
            }
            if (error.code === 'ERR_INVALID_URL') {
                return new PageFetchError('InvalidURL', error.message);
            }
            const code = error.code ? ` (${error.code})` : '';
            return new PageFetchError('Transport', `${error.message}${code}`);
        }
        return new PageFetchError('Transport', error instanceof Error ? error.message : String(error));
    }

    private isValidUrl(url: string): boolean {
        try {
            const parsed = new URL(url);
            return parsed.protocol === 'http:' || parsed.protocol === 'https:';
        } catch {
            return false;
        }
    }
}

/** Bytes of the document searched for a `<meta>` charset declaration */
export const META_SNIFF_BYTES = 1024;

/**
 * Reads the charset parameter of a Content-Type header value.
 */
export function detectCharset(contentType: string): string | undefined {
    const match = contentType.match(/charset\s*=\s*["']?([^;"'\s]+)/i);
    return match ? match[1].toLowerCase() : undefined;
}

/**
 * Finds `<meta charset>` or an http-equiv Content-Type charset near the start of the document.
 */
export function sniffMetaCharset(data: ArrayBuffer | Uint8Array): string | undefined {
    // Single-byte decoding keeps ASCII markup readable in any ASCII-compatible encoding
    const head = new TextDecoder('windows-1252').decode(data.slice(0, META_SNIFF_BYTES));
    const match = head.match(/<meta[^>]*?charset\s*=\s*["']?([\w.:-]+)/i);
    return match ? match[1].toLowerCase() : undefined;
}

/**
 * Decodes the body with the given charset; unknown labels fall back to utf-8.
 * The returned encoding is the canonical name of the decoder actually used.
 */
function decodeBody(data: ArrayBuffer, charset: string): { body: string; encoding: string } {
    let decoder: TextDecoder;
    try {
        decoder = new TextDecoder(charset);
    } catch {
        decoder = new TextDecoder('utf-8');
    }
    return { body: decoder.decode(data), encoding: decoder.encoding };
}
