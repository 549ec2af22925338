import dotenv from 'dotenv';

// Load environment variables
dotenv.config();

/**
 * Application configuration loaded from environment variables.
 */
export interface Config {
    // Server
    port: number;
    environment: string;

    // Search provider (optional: without it only direct URL analysis is available)
    serpApiKey?: string;
    serpApiBaseUrl: string;

    // Query defaults
    defaultLanguage: string;
    defaultCountry: string;
    defaultNumResults: number;
    maxNumResults: number;

    // Fetching
    fetch: {
        timeoutMs: number;
        maxAttempts: number;
        retryBackoffMs: number;
        userAgent?: string;
    };

    // Analysis
    analysis: {
        concurrency: number;
        summaryWordCount: number;
        cacheTtlSeconds: number;
    };
}

function getEnvVar(key: string, defaultValue?: string): string {
    let value = process.env[key];
    if (value === undefined) {
        if (defaultValue !== undefined) {
            return defaultValue;
        }
        throw new Error(`Missing required environment variable: ${key}`);
    }

    // Trim whitespace and remove wrapping quotes
    value = value.trim();
    if (value.startsWith('"') && value.endsWith('"')) {
        value = value.substring(1, value.length - 1);
    } else if (value.startsWith("'") && value.endsWith("'")) {
        value = value.substring(1, value.length - 1);
    }

    return value;
}

function getOptionalEnvVar(key: string): string | undefined {
    const value = getEnvVar(key, '');
    return value.length > 0 ? value : undefined;
}

function getEnvVarNumber(key: string, defaultValue?: number): number {
    const value = getEnvVar(key, defaultValue?.toString());
    const parsed = parseFloat(value);
    if (isNaN(parsed)) {
        throw new Error(`Environment variable ${key} must be a number, got: ${value}`);
    }
    return parsed;
}

/**
 * Loads configuration from environment variables.
 */
export function loadConfig(): Config {
    return {
        // Server
        port: getEnvVarNumber('PORT', 3000),
        environment: getEnvVar('NODE_ENV', 'development'),

        // Search provider
        serpApiKey: getOptionalEnvVar('SERPAPI_KEY'),
        serpApiBaseUrl: getEnvVar('SERPAPI_BASE_URL', 'https://serpapi.com/search.json'),

        // Query defaults
        defaultLanguage: getEnvVar('DEFAULT_LANGUAGE', 'en').toLowerCase(),
        defaultCountry: getEnvVar('DEFAULT_COUNTRY', 'us').toLowerCase(),
        defaultNumResults: getEnvVarNumber('DEFAULT_NUM_RESULTS', 20),
        maxNumResults: getEnvVarNumber('MAX_NUM_RESULTS', 100),

        // Fetching
        fetch: {
            timeoutMs: getEnvVarNumber('FETCH_TIMEOUT_MS', 10000),
            maxAttempts: getEnvVarNumber('FETCH_MAX_ATTEMPTS', 3),
            retryBackoffMs: getEnvVarNumber('FETCH_RETRY_BACKOFF_MS', 1000),
            userAgent: getOptionalEnvVar('FETCH_USER_AGENT'),
        },

        // Analysis
        analysis: {
            concurrency: getEnvVarNumber('ANALYSIS_CONCURRENCY', 5),
            summaryWordCount: getEnvVarNumber('SUMMARY_WORD_COUNT', 100),
            cacheTtlSeconds: getEnvVarNumber('ANALYSIS_CACHE_TTL_SECONDS', 3600),
        },
    };
}

/**
 * Checks value ranges. Returns one message per problem.
 */
export function validateConfig(config: Config, supportedLanguages: string[]): string[] {
    const errors: string[] = [];

    if (!supportedLanguages.includes(config.defaultLanguage)) {
        errors.push(`DEFAULT_LANGUAGE must be one of ${supportedLanguages.join(', ')}, got: ${config.defaultLanguage}`);
    }
    if (config.defaultNumResults < 1 || config.defaultNumResults > config.maxNumResults) {
        errors.push(`DEFAULT_NUM_RESULTS must be between 1 and ${config.maxNumResults}`);
    }
    if (config.fetch.timeoutMs <= 0) {
        errors.push('FETCH_TIMEOUT_MS must be positive');
    }
    if (config.fetch.maxAttempts < 1) {
        errors.push('FETCH_MAX_ATTEMPTS must be at least 1');
    }
    if (config.fetch.retryBackoffMs < 0) {
        errors.push('FETCH_RETRY_BACKOFF_MS cannot be negative');
    }
    if (config.analysis.concurrency < 1) {
        errors.push('ANALYSIS_CONCURRENCY must be at least 1');
    }
    if (config.analysis.summaryWordCount < 1) {
        errors.push('SUMMARY_WORD_COUNT must be at least 1');
    }

    return errors;
}

// Singleton config instance (lazy loaded)
let cachedConfig: Config | null = null;

export function getConfig(): Config {
    if (!cachedConfig) {
        cachedConfig = loadConfig();
    }
    return cachedConfig;
}

export function resetConfig(): void {
    cachedConfig = null;
}
