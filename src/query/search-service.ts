import type {
    Author,
    DocumentSet,
    ErrorEnvelope,
    PaperDocument,
    QueryConfig,
    ResultDocument,
    SearchHit,
    SearchPage,
    SearchRequest,
} from '../types/index.js';
import type { SearchEngine } from '../engine/elasticsearch.js';
import type { SchemaRegistry } from '../schema/registry.js';
import { parseIdentifier, versionedId } from '../sources/identifiers.js';
import { NotFoundError, QueryError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { AUTHOR_INNER_HITS, isSearchScope, isSortOrder, QueryBuilder } from './builder.js';
import { PaginationPlanner } from './pagination.js';

/**
 * Query API contract behind `GET /papers` and `GET /papers/{id}`.
 */
export class SearchService {
    private readonly builder: QueryBuilder;
    private readonly planner: PaginationPlanner;
    private readonly logger = getLogger('search');

    constructor(
        private readonly engine: SearchEngine,
        registry: SchemaRegistry,
        config: QueryConfig
    ) {
        this.builder = new QueryBuilder(registry);
        this.planner = new PaginationPlanner(config, registry);
    }

    /**
     * Run a search. Rejects with QueryError for a malformed request.
     */
    async search(request: SearchRequest): Promise<DocumentSet> {
        const { query, sort } = this.builder.build(request);
        const plan = this.planner.plan(request, sort);

        this.logger.debug({ query, sort, plan }, 'Executing search');
        const response = await this.engine.search({
            query,
            sort,
            size: plan.size,
            ...(plan.strategy === 'offset' ? { from: plan.from } : { searchAfter: plan.searchAfter }),
        });

        const page: SearchPage = {
            total: response.total,
            hits: response.hits.map((hit): SearchHit => ({
                document: hit.document,
                score: hit.score,
                sort: hit.sort,
                matchedAuthors: matchedAuthors(hit.innerHits),
            })),
        };

        return {
            metadata: {
                query: request,
                total: page.total,
                pagination: this.planner.links(request, plan, page),
            },
            results: page.hits.map(toResult),
        };
    }

    /**
     * The current version for a versionless id, or exactly `id` for a
     * versioned one.
     */
    async getPaper(id: string): Promise<PaperDocument> {
        const parsed = parseIdentifier(id);
        if (!parsed) throw new NotFoundError(id);

        if (parsed.version !== null) {
            const document = await this.engine.get(versionedId(parsed.paperId, parsed.version));
            if (!document) throw new NotFoundError(id);
            return document;
        }

        const response = await this.engine.search({
            query: {
                bool: {
                    filter: [
                        { term: { paper_id: parsed.paperId } },
                        { term: { is_current: true } },
                    ],
                },
            },
            sort: [{ version: { order: 'desc' } }],
            size: 1,
        });
        const hit = response.hits[0];
        if (!hit) throw new NotFoundError(id);
        return hit.document;
    }
}

function toResult(hit: SearchHit): ResultDocument {
    return hit.matchedAuthors.length > 0
        ? { ...hit.document, matched_authors: hit.matchedAuthors }
        : hit.document;
}

function isAuthor(value: unknown): value is Author {
    return typeof value === 'object' && value !== null
        && 'last_name' in value && typeof value.last_name === 'string'
        && 'full_name' in value && typeof value.full_name === 'string';
}

/**
 * Authors reported by the nested author clauses, de-duplicated by name.
 */
function matchedAuthors(innerHits: Record<string, unknown[]>): Author[] {
    const seen = new Set<string>();
    const authors: Author[] = [];
    for (const name of [AUTHOR_INNER_HITS.author, AUTHOR_INNER_HITS.text]) {
        for (const source of innerHits[name] ?? []) {
            if (!isAuthor(source) || seen.has(source.full_name)) continue;
            seen.add(source.full_name);
            authors.push(source);
        }
    }
    return authors;
}

/**
 * Error body and status for any failure: 400 for a bad request, 404 for
 * an unknown paper, 500 (with a generic message) for anything else.
 */
export function errorEnvelope(error: unknown): ErrorEnvelope {
    if (error instanceof QueryError) {
        return { code: 400, message: error.message };
    }
    if (error instanceof NotFoundError) {
        return { code: 404, message: error.message };
    }
    getLogger('search').error({ error }, 'Unexpected search failure');
    return { code: 500, message: 'An unexpected error occurred' };
}

function integerParam(params: URLSearchParams, name: string): number | undefined {
    const raw = params.get(name);
    if (raw === null || raw.trim() === '') return undefined;
    if (!/^\d+$/.test(raw.trim())) {
        throw new QueryError(`${name} must be a non-negative integer`, name);
    }
    return parseInt(raw, 10);
}

function booleanParam(params: URLSearchParams, name: string): boolean | undefined {
    const raw = params.get(name)?.trim().toLowerCase();
    if (raw === undefined || raw === '') return undefined;
    if (raw === 'true' || raw === '1') return true;
    if (raw === 'false' || raw === '0') return false;
    throw new QueryError(`${name} must be true or false`, name);
}

/**
 * Read a SearchRequest from `GET /papers` query parameters.
 */
export function parseSearchParams(params: URLSearchParams): SearchRequest {
    const request: SearchRequest = {};

    const query = params.get('query')?.trim();
    if (query) request.query = query;
    const searchType = params.get('searchtype')?.trim();
    if (searchType) {
        if (!isSearchScope(searchType)) {
            throw new QueryError(`Unknown search type: ${searchType}`, 'searchtype');
        }
        request.searchType = searchType;
    }
    const author = params.get('author')?.trim();
    if (author) request.author = author;

    const categories = params.getAll('primary_category').map((value) => value.trim()).filter(Boolean);
    if (categories.length > 0) request.primaryCategories = categories;

    const order = params.get('order')?.trim();
    if (order) {
        if (!isSortOrder(order)) {
            throw new QueryError(`Unknown sort order: ${order}`, 'order');
        }
        request.order = order;
    }

    const includeOlder = booleanParam(params, 'include_older_versions');
    if (includeOlder !== undefined) request.includeOlderVersions = includeOlder;

    const offset = integerParam(params, 'offset');
    if (offset !== undefined) request.offset = offset;
    const size = integerParam(params, 'size');
    if (size !== undefined) request.size = size;

    const cursor = params.get('cursor')?.trim();
    if (cursor) request.cursor = cursor;

    return request;
}
