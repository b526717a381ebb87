import { cosmiconfig } from 'cosmiconfig';
import {
    DEFAULT_CONFIG,
    type LogLevel,
    type PaperIndexConfig,
    type PaperIndexConfigOverrides,
} from '../types/index.js';
import { getLogger } from './logger.js';

type Env = Record<string, string | undefined>;

/**
 * Load configuration from paperindex.config.json using cosmiconfig.
 * Returns null when there is no config file; defaults then apply.
 */
async function loadConfigFile(searchFrom?: string): Promise<PaperIndexConfigOverrides | null> {
    const explorer = cosmiconfig('paperindex', {
        searchPlaces: ['paperindex.config.json'],
    });

    try {
        const result = await explorer.search(searchFrom);
        if (result && !result.isEmpty) {
            getLogger('config').debug({ path: result.filepath }, 'Loaded config file');
            return result.config as PaperIndexConfigOverrides;
        }
    } catch (error) {
        getLogger('config').warn({ error }, 'Failed to load config file, using defaults');
    }

    return null;
}

export function parseLogLevel(raw: string | undefined): LogLevel | undefined {
    switch (raw) {
        case 'error':
        case 'warn':
        case 'info':
        case 'debug':
        case 'silent':
            return raw;
        default:
            return undefined;
    }
}

/**
 * Read relevant environment variables. Credentials are not part of the
 * config; see getEngineAuth().
 */
function loadEnvVars(env: Env): PaperIndexConfigOverrides {
    const overrides: PaperIndexConfigOverrides = {};

    const endpoint = env['PAPERINDEX_METADATA_ENDPOINT'];
    if (endpoint) overrides.metadata = { endpoint };

    const node = env['ELASTICSEARCH_URL'];
    const index = env['ELASTICSEARCH_INDEX'];
    if (node || index) {
        overrides.engine = {
            ...(node ? { node } : {}),
            ...(index ? { index } : {}),
        };
    }

    const logLevel = parseLogLevel(env['PAPERINDEX_LOG_LEVEL']);
    if (logLevel) overrides.logLevel = logLevel;

    return overrides;
}

/**
 * Layer overrides over a base configuration, section by section.
 */
export function mergeConfig(base: PaperIndexConfig, ...layers: Array<PaperIndexConfigOverrides | null>): PaperIndexConfig {
    return layers.reduce<PaperIndexConfig>((merged, layer) => {
        if (!layer) return merged;
        return {
            metadata: { ...merged.metadata, ...layer.metadata },
            engine: { ...merged.engine, ...layer.engine },
            indexing: {
                ...merged.indexing,
                ...layer.indexing,
                retry: { ...merged.indexing.retry, ...layer.indexing?.retry },
            },
            query: { ...merged.query, ...layer.query },
            cache: { ...merged.cache, ...layer.cache },
            ledger: layer.ledger ?? merged.ledger,
            logLevel: layer.logLevel ?? merged.logLevel,
            jsonLogs: layer.jsonLogs ?? merged.jsonLogs,
        };
    }, base);
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > environment variables > config file > defaults
 */
export async function resolveConfig(
    cliFlags: PaperIndexConfigOverrides,
    options: { searchFrom?: string; env?: Env } = {}
): Promise<PaperIndexConfig> {
    const fileConfig = await loadConfigFile(options.searchFrom);
    const envConfig = loadEnvVars(options.env ?? process.env);

    return mergeConfig(DEFAULT_CONFIG, fileConfig, envConfig, cliFlags);
}

/**
 * Elasticsearch credentials from the environment: an API key, or a
 * username and password.
 */
export function getEngineAuth(env: Env = process.env): { apiKey: string } | { username: string; password: string } | undefined {
    const apiKey = env['ELASTICSEARCH_API_KEY'];
    if (apiKey) return { apiKey };

    const username = env['ELASTICSEARCH_USERNAME'];
    const password = env['ELASTICSEARCH_PASSWORD'];
    if (username && password) return { username, password };

    return undefined;
}
