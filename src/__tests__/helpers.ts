import type { PaperDocument, RawMetadataRecord } from '../types/index.js';
import type {
    BulkItemResult,
    BulkResponse,
    EngineSearchRequest,
    EngineSearchResponse,
    SearchEngine,
} from '../engine/elasticsearch.js';
import type { IndexDefinition, IndexSchemaMeta } from '../schema/registry.js';
import type { MetadataFetcher } from '../sources/metadata-fetcher.js';
import { NotFoundError } from '../utils/errors.js';

/**
 * One made-up version record. Submission dates move one month per version.
 */
export function paperRecord(paperId: string, version = 1, overrides: Partial<RawMetadataRecord> = {}): RawMetadataRecord {
    return {
        paper_id: paperId,
        version,
        title: `Paper ${paperId}`,
        abstract: 'A made-up abstract about indexing.',
        submitted_date: `2024-0${version}-15T10:00:00Z`,
        announced_date_first: '2024-01',
        is_current: true,
        primary_classification: { category: { id: 'cs.LG' } },
        authors_parsed: [{ first_name: 'Jane', last_name: 'Doe' }],
        ...overrides,
    };
}

/**
 * Every version record of a paper, the last one current.
 */
export function paperVersions(paperId: string, count: number, overrides: Partial<RawMetadataRecord> = {}): RawMetadataRecord[] {
    return Array.from({ length: count }, (_, i) =>
        paperRecord(paperId, i + 1, { is_current: i + 1 === count, ...overrides }));
}

export function failedItem(id: string, status: number, type?: string, reason = 'made-up failure'): BulkItemResult {
    return type ? { id, status, error: { type, reason } } : { id, status };
}

/**
 * In-process stand-in for the search engine.
 */
export class InMemoryEngine implements SearchEngine {
    readonly documents = new Map<string, PaperDocument>();
    /** Document ids of every bulk request that reached the engine */
    readonly bulkRequests: string[][] = [];
    readonly searchRequests: EngineSearchRequest[] = [];
    readonly created: IndexDefinition[] = [];
    /** Scripted per-document failures, one consumed per bulk request */
    readonly itemFailures = new Map<string, BulkItemResult[]>();
    /** Scripted request-level failures, one consumed per bulk request */
    readonly requestFailures: Error[] = [];

    meta: IndexSchemaMeta | null = null;
    reachable = true;
    deleted = 0;
    searchResponse: EngineSearchResponse = { total: 0, hits: [] };

    async ping(): Promise<boolean> {
        return this.reachable;
    }

    async getIndexMeta(): Promise<IndexSchemaMeta | null> {
        return this.meta;
    }

    async createIndex(definition: IndexDefinition): Promise<void> {
        this.created.push(definition);
        const version: unknown = definition.mappings._meta?.['schema_version'];
        const fingerprint: unknown = definition.mappings._meta?.['schema_fingerprint'];
        this.meta = {
            schemaVersion: typeof version === 'number' ? version : null,
            fingerprint: typeof fingerprint === 'string' ? fingerprint : null,
        };
    }

    async deleteIndex(): Promise<void> {
        this.deleted += 1;
        this.meta = null;
        this.documents.clear();
    }

    async bulkIndex(documents: readonly PaperDocument[]): Promise<BulkResponse> {
        const failure = this.requestFailures.shift();
        if (failure) throw failure;

        this.bulkRequests.push(documents.map((document) => document.paper_id_v));
        const items = documents.map((document): BulkItemResult => {
            const scripted = this.itemFailures.get(document.paper_id_v)?.shift();
            if (scripted) return scripted;
            this.documents.set(document.paper_id_v, document);
            return { id: document.paper_id_v, status: 201 };
        });
        return { took: 1, items };
    }

    async search(request: EngineSearchRequest): Promise<EngineSearchResponse> {
        this.searchRequests.push(request);
        return this.searchResponse;
    }

    async get(id: string): Promise<PaperDocument | null> {
        return this.documents.get(id) ?? null;
    }

    async close(): Promise<void> {}
}

/**
 * Metadata source serving fixed records. Scripted failures for an id are
 * thrown (one per call) before its records are served.
 */
export class FakeFetcher implements MetadataFetcher {
    readonly calls: string[] = [];
    onFetch?: (paperId: string) => void;

    constructor(
        private readonly records: Record<string, RawMetadataRecord[]>,
        private readonly failures: Record<string, Error[]> = {}
    ) {}

    async fetchVersions(paperId: string): Promise<RawMetadataRecord[]> {
        this.calls.push(paperId);
        this.onFetch?.(paperId);
        const failure = this.failures[paperId]?.shift();
        if (failure) throw failure;
        const records = this.records[paperId];
        if (!records) throw new NotFoundError(paperId);
        return records;
    }
}
