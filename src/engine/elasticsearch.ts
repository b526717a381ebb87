import { Client, errors, type estypes } from '@elastic/elasticsearch';
import type { PaperDocument } from '../types/index.js';
import type { IndexDefinition, IndexSchemaMeta } from '../schema/registry.js';
import { IndexError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

/**
 * Per-document result of a bulk request, in request order.
 */
export interface BulkItemResult {
    id: string;
    status: number;
    error?: { type: string; reason: string };
}

export interface BulkResponse {
    took: number;
    items: BulkItemResult[];
}

export interface EngineSearchRequest {
    query: estypes.QueryDslQueryContainer;
    sort: estypes.SortCombinations[];
    size: number;
    from?: number;
    searchAfter?: estypes.SortResults;
}

export interface EngineHit {
    id: string;
    document: PaperDocument;
    score: number | null;
    sort?: estypes.SortResults;
    /** `_source` of every inner hit, by inner-hits name */
    innerHits: Record<string, unknown[]>;
}

export interface EngineSearchResponse {
    total: number;
    hits: EngineHit[];
}

/**
 * The indexing and search contract the pipeline needs from the engine.
 * Request-level failures reject with IndexError.
 */
export interface SearchEngine {
    ping(): Promise<boolean>;
    /** Schema metadata of the live index, or null when it does not exist */
    getIndexMeta(): Promise<IndexSchemaMeta | null>;
    createIndex(definition: IndexDefinition): Promise<void>;
    deleteIndex(): Promise<void>;
    /** One `index` operation per document, keyed by paper_id_v */
    bulkIndex(documents: readonly PaperDocument[]): Promise<BulkResponse>;
    search(request: EngineSearchRequest): Promise<EngineSearchResponse>;
    /** Document by engine id, or null */
    get(id: string): Promise<PaperDocument | null>;
    close(): Promise<void>;
}

export interface ElasticsearchEngineOptions {
    node: string;
    index: string;
    requestTimeoutMs?: number;
    auth?: { apiKey: string } | { username: string; password: string };
    /** Pre-built client; `node`, `auth` and the timeout are ignored when given */
    client?: Client;
}

/**
 * Map a client failure to a transient or permanent IndexError.
 * Timeouts, connection failures, 429, 409 and 5xx are transient.
 */
export function classifyEngineError(error: unknown): IndexError {
    if (error instanceof IndexError) return error;

    if (
        error instanceof errors.TimeoutError
        || error instanceof errors.ConnectionError
        || error instanceof errors.NoLivingConnectionsError
    ) {
        return new IndexError(`Engine unavailable: ${error.message}`, 'transient', { cause: error });
    }
    if (error instanceof errors.ResponseError) {
        const status = error.statusCode ?? 0;
        return new IndexError(
            `Engine responded ${status}: ${error.message}`,
            isTransientStatus(status) ? 'transient' : 'permanent',
            { cause: error }
        );
    }
    return new IndexError(error instanceof Error ? error.message : String(error), 'permanent', { cause: error });
}

export function isTransientStatus(status: number): boolean {
    return status === 409 || status === 429 || status >= 500;
}

/**
 * SearchEngine over the official Elasticsearch client. The client keeps
 * its own connection pool; one instance is shared by all workers.
 */
export class ElasticsearchEngine implements SearchEngine {
    readonly index: string;
    private readonly client: Client;
    private readonly logger = getLogger('engine');

    constructor(options: ElasticsearchEngineOptions) {
        this.index = options.index;
        this.client = options.client ?? new Client({
            node: options.node,
            auth: options.auth,
            requestTimeout: options.requestTimeoutMs,
        });
    }

    async ping(): Promise<boolean> {
        try {
            return await this.client.ping();
        } catch (error) {
            this.logger.debug({ error }, 'Ping failed');
            return false;
        }
    }

    async getIndexMeta(): Promise<IndexSchemaMeta | null> {
        try {
            const exists = await this.client.indices.exists({ index: this.index });
            if (!exists) return null;

            const response = await this.client.indices.getMapping({ index: this.index });
            // An alias resolves to the concrete index name
            const meta: Record<string, unknown> = Object.values(response)[0]?.mappings._meta ?? {};
            const version = meta['schema_version'];
            const fingerprint = meta['schema_fingerprint'];
            return {
                schemaVersion: typeof version === 'number' ? version : null,
                fingerprint: typeof fingerprint === 'string' ? fingerprint : null,
            };
        } catch (error) {
            throw classifyEngineError(error);
        }
    }

    async createIndex(definition: IndexDefinition): Promise<void> {
        try {
            await this.client.indices.create({
                index: this.index,
                settings: definition.settings,
                mappings: definition.mappings,
            });
            this.logger.info({ index: this.index }, 'Index created');
        } catch (error) {
            throw classifyEngineError(error);
        }
    }

    async deleteIndex(): Promise<void> {
        try {
            await this.client.indices.delete({ index: this.index, ignore_unavailable: true });
            this.logger.info({ index: this.index }, 'Index deleted');
        } catch (error) {
            throw classifyEngineError(error);
        }
    }

    async bulkIndex(documents: readonly PaperDocument[]): Promise<BulkResponse> {
        if (documents.length === 0) return { took: 0, items: [] };

        const operations = documents.flatMap((document) => [
            { index: { _index: this.index, _id: document.paper_id_v } },
            document,
        ]);

        let response: estypes.BulkResponse;
        try {
            response = await this.client.bulk({ operations });
        } catch (error) {
            throw classifyEngineError(error);
        }

        const items = response.items.map((item, i): BulkItemResult => {
            const result = item.index;
            const id = result?._id ?? documents[i]?.paper_id_v ?? '';
            if (!result) {
                return { id, status: 500, error: { type: 'missing_item', reason: 'No result for operation' } };
            }
            return result.error
                ? { id, status: result.status, error: { type: result.error.type, reason: result.error.reason ?? result.error.type } }
                : { id, status: result.status };
        });

        return { took: response.took, items };
    }

    async search(request: EngineSearchRequest): Promise<EngineSearchResponse> {
        const response = await this.client.search<PaperDocument>({
            index: this.index,
            query: request.query,
            sort: request.sort,
            size: request.size,
            from: request.from,
            search_after: request.searchAfter,
            track_total_hits: true,
        });

        const total = typeof response.hits.total === 'number'
            ? response.hits.total
            : response.hits.total?.value ?? 0;

        const hits = response.hits.hits.flatMap((hit): EngineHit[] => {
            const document = hit._source;
            if (!document) return [];
            return [{
                id: hit._id ?? document.paper_id_v,
                document,
                score: hit._score ?? null,
                sort: hit.sort,
                innerHits: innerHitSources(hit.inner_hits),
            }];
        });

        return { total, hits };
    }

    async get(id: string): Promise<PaperDocument | null> {
        try {
            const response = await this.client.get<PaperDocument>({ index: this.index, id });
            return response._source ?? null;
        } catch (error) {
            if (error instanceof errors.ResponseError && error.statusCode === 404) return null;
            throw error;
        }
    }

    async close(): Promise<void> {
        await this.client.close();
    }
}

function innerHitSources(innerHits: Record<string, estypes.SearchInnerHitsResult> | undefined): Record<string, unknown[]> {
    const result: Record<string, unknown[]> = {};
    for (const [name, inner] of Object.entries(innerHits ?? {})) {
        result[name] = inner.hits.hits.map((hit): unknown => hit._source);
    }
    return result;
}
