/**
 * Log level options. `silent` disables output entirely (used by tests).
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'silent';

/**
 * Upstream metadata source.
 */
export interface MetadataConfig {
    endpoint: string;
    timeoutMs: number;
    requestsPerSecond: number;
}

/**
 * Elasticsearch connection. Credentials never live here: they are read
 * from the environment when the client is created.
 */
export interface EngineConfig {
    node: string;
    index: string;
    requestTimeoutMs: number;
}

/**
 * Backoff policy shared by the fetch and index stages.
 */
export interface RetryConfig {
    maxAttempts: number;
    initialDelayMs: number;
    maxDelayMs: number;
}

export interface IndexingConfig {
    batchSize: number;
    concurrency: number;
    retry: RetryConfig;
    /** Allow dropping and recreating the index when the schema version changed */
    allowRebuild: boolean;
    /** Skip identifiers the ledger already recorded as indexed */
    resume: boolean;
}

export interface QueryConfig {
    defaultPageSize: number;
    maxPageSize: number;
    /** Deepest offset + size served through offset windowing */
    maxResultWindow: number;
    /** Base URI used for next/previous links */
    baseUrl: string;
}

export interface CacheConfig {
    enabled: boolean;
    dir: string;
    ttlHours: number;
}

/**
 * Full configuration merged from CLI flags, env vars, and config file.
 */
export interface PaperIndexConfig {
    metadata: MetadataConfig;
    engine: EngineConfig;
    indexing: IndexingConfig;
    query: QueryConfig;
    cache: CacheConfig;

    /** SQLite run ledger path */
    ledger: string;

    logLevel: LogLevel;
    jsonLogs: boolean;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: PaperIndexConfig = {
    metadata: {
        endpoint: 'http://localhost:8000',
        timeoutMs: 30000,
        requestsPerSecond: 20,
    },
    engine: {
        node: 'http://localhost:9200',
        index: 'papers',
        requestTimeoutMs: 30000,
    },
    indexing: {
        batchSize: 100,
        concurrency: 8,
        retry: {
            maxAttempts: 5,
            initialDelayMs: 500,
            maxDelayMs: 30000,
        },
        allowRebuild: false,
        resume: false,
    },
    query: {
        defaultPageSize: 50,
        maxPageSize: 200,
        maxResultWindow: 10000,
        baseUrl: '/papers',
    },
    cache: {
        enabled: false,
        dir: '.paperindex-cache',
        ttlHours: 24,
    },
    ledger: './paperindex.db',
    logLevel: 'info',
    jsonLogs: false,
};

/**
 * Partial overrides accepted from a config file, env vars or CLI flags.
 */
export interface PaperIndexConfigOverrides {
    metadata?: Partial<MetadataConfig>;
    engine?: Partial<EngineConfig>;
    indexing?: Partial<Omit<IndexingConfig, 'retry'>> & { retry?: Partial<RetryConfig> };
    query?: Partial<QueryConfig>;
    cache?: Partial<CacheConfig>;
    ledger?: string;
    logLevel?: LogLevel;
    jsonLogs?: boolean;
}
