import type { RawMetadataRecord } from '../types/index.js';
import { HttpError, type HttpClient } from '../utils/http-client.js';
import { FetchError, NotFoundError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import type { ResponseCache } from '../cache/response-cache.js';
import { parseVersion, versionedId } from './identifiers.js';

/**
 * Boundary to the upstream metadata source.
 */
export interface MetadataFetcher {
    /**
     * Fetch every known version record of a paper, oldest first.
     * Rejects with NotFoundError when the paper is unknown upstream and
     * with FetchError on any other failure.
     */
    fetchVersions(paperId: string, signal?: AbortSignal): Promise<RawMetadataRecord[]>;
}

export interface HttpMetadataFetcherOptions {
    endpoint: string;
    httpClient: HttpClient;
    cache?: ResponseCache;
    timeoutMs?: number;
}

/**
 * Metadata source served over HTTP:
 * `GET {endpoint}/docmeta/{paper_id}` returns the latest version,
 * `GET {endpoint}/docmeta/{paper_id}v{n}` a specific one.
 */
export class HttpMetadataFetcher implements MetadataFetcher {
    private readonly endpoint: string;
    private readonly httpClient: HttpClient;
    private readonly cache?: ResponseCache;
    private readonly timeoutMs?: number;
    private readonly logger = getLogger('metadata');

    constructor(options: HttpMetadataFetcherOptions) {
        this.endpoint = options.endpoint.replace(/\/+$/, '');
        this.httpClient = options.httpClient;
        this.cache = options.cache;
        this.timeoutMs = options.timeoutMs;
    }

    async fetchVersions(paperId: string, signal?: AbortSignal): Promise<RawMetadataRecord[]> {
        const latest = await this.fetchRecord(paperId, signal);
        const latestVersion = parseVersion(latest.version);

        // The normalizer reports a missing or invalid version; nothing else to fetch
        if (latestVersion === null || latestVersion <= 1) {
            return [latest];
        }

        const earlier = await Promise.all(
            Array.from({ length: latestVersion - 1 }, (_, i) => i + 1).map(async (version) => {
                try {
                    return await this.fetchRecord(versionedId(paperId, version), signal);
                } catch (error) {
                    if (error instanceof NotFoundError) {
                        this.logger.warn({ paperId, version }, 'Earlier version missing upstream');
                        return null;
                    }
                    throw error;
                }
            })
        );

        return [...earlier.filter((record): record is RawMetadataRecord => record !== null), latest];
    }

    /**
     * Fetch one record; `id` may carry a version suffix.
     */
    async fetchRecord(id: string, signal?: AbortSignal): Promise<RawMetadataRecord> {
        const url = `${this.endpoint}/docmeta/${encodeURIComponent(id)}`;

        const cached = this.cache?.get<RawMetadataRecord>(url);
        if (cached) return cached;

        this.logger.debug({ url }, 'Fetching metadata');

        let data: unknown;
        try {
            const response = await this.httpClient.get<unknown>(url, {
                source: 'metadata',
                timeout: this.timeoutMs,
                signal,
            });
            data = response.data;
        } catch (error) {
            if (error instanceof HttpError) {
                if (error.status === 404) throw new NotFoundError(id);
                throw new FetchError(`Metadata fetch failed for ${id}: ${error.message}`, error.status, error.retryable, { cause: error });
            }
            throw new FetchError(`Metadata fetch failed for ${id}: ${String(error)}`, 0, true, { cause: error });
        }

        if (!isRecord(data)) {
            throw new FetchError(`Metadata response for ${id} is not a JSON object`, 200, false);
        }

        this.cache?.set(url, data);
        return data;
    }
}

/**
 * The payload is only shape-checked here; field validation is the
 * normalizer's job.
 */
function isRecord(value: unknown): value is RawMetadataRecord {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

