import type { estypes } from '@elastic/elasticsearch';
import type { PagePlan, PaginationLinks, QueryConfig, SearchPage, SearchRequest } from '../types/index.js';
import type { SchemaRegistry } from '../schema/registry.js';
import { QueryError } from '../utils/errors.js';

/**
 * JSON type the engine hands back for a sort key: numbers for scores,
 * dates and integers, strings for keywords.
 */
export type SortKeyKind = 'number' | 'string';

/**
 * Opaque cursor: base64url JSON of the last hit's sort values.
 */
export function encodeCursor(sort: estypes.SortResults): string {
    return Buffer.from(JSON.stringify(sort), 'utf-8').toString('base64url');
}

/**
 * Decode a cursor for a sort with the given key kinds. A cursor that does
 * not line up with the sort key by key is malformed.
 */
export function decodeCursor(cursor: string, kinds: readonly SortKeyKind[]): estypes.SortResults {
    let parsed: unknown;
    try {
        parsed = JSON.parse(Buffer.from(cursor, 'base64url').toString('utf-8'));
    } catch {
        throw new QueryError('Malformed cursor', 'cursor');
    }
    if (!Array.isArray(parsed) || parsed.length !== kinds.length || kinds.length === 0) {
        throw new QueryError('Malformed cursor', 'cursor');
    }

    const values: estypes.FieldValue[] = [];
    for (const [i, value] of parsed.entries()) {
        if (typeof value === 'number' && kinds[i] === 'number' && Number.isFinite(value)) {
            values.push(value);
        } else if (typeof value === 'string' && kinds[i] === 'string') {
            values.push(value);
        } else {
            throw new QueryError('Malformed cursor', 'cursor');
        }
    }
    return values;
}

function sortKeyOf(sort: estypes.SortCombinations): string | undefined {
    return typeof sort === 'string' ? sort : Object.keys(sort)[0];
}

/**
 * Query parameters of a search request, as they appear in API URIs.
 * Paging parameters are left to the caller.
 */
export function toSearchParams(request: SearchRequest): URLSearchParams {
    const params = new URLSearchParams();
    if (request.query) params.set('query', request.query);
    if (request.searchType && request.searchType !== 'all') params.set('searchtype', request.searchType);
    if (request.author) params.set('author', request.author);
    for (const category of request.primaryCategories ?? []) {
        params.append('primary_category', category);
    }
    if (request.order) params.set('order', request.order);
    if (request.includeOlderVersions) params.set('include_older_versions', 'true');
    if (request.size !== undefined) params.set('size', String(request.size));
    return params;
}

/**
 * Plans engine-level windowing for a search request. Offset paging is
 * served up to `maxResultWindow`; deeper pages need the sort-key cursor
 * handed out in `next` links.
 */
export class PaginationPlanner {
    constructor(
        private readonly config: QueryConfig,
        private readonly registry: SchemaRegistry
    ) {}

    /**
     * `sort` is the sort the query was built with; cursors are checked
     * against it.
     */
    plan(request: SearchRequest, sort: readonly estypes.SortCombinations[]): PagePlan {
        const size = this.pageSize(request.size);
        const offset = request.offset ?? 0;
        if (!Number.isInteger(offset) || offset < 0) {
            throw new QueryError('offset must be a non-negative integer', 'offset');
        }

        if (request.cursor !== undefined) {
            if (offset > 0) {
                throw new QueryError('cursor cannot be combined with offset', 'cursor');
            }
            return { strategy: 'cursor', searchAfter: decodeCursor(request.cursor, this.sortKeyKinds(sort)), size };
        }

        if (offset + size > this.config.maxResultWindow) {
            throw new QueryError(
                `offset ${offset} with size ${size} is beyond the maximum result window of ${this.config.maxResultWindow}; `
                + 'page deeper with the cursor parameter from the next link',
                'offset'
            );
        }
        return { strategy: 'offset', from: offset, size };
    }

    /**
     * Literal next/previous URIs for a served page.
     */
    links(request: SearchRequest, plan: PagePlan, page: SearchPage): PaginationLinks {
        const lastSort = page.hits[page.hits.length - 1]?.sort;
        const cursorLink = lastSort ? this.uri(request, { cursor: encodeCursor(lastSort) }) : null;

        if (plan.strategy === 'cursor') {
            return { next: page.hits.length === plan.size ? cursorLink : null, previous: null };
        }

        let next: string | null = null;
        if (plan.from + page.hits.length < page.total) {
            const nextOffset = plan.from + plan.size;
            next = nextOffset + plan.size > this.config.maxResultWindow
                ? cursorLink
                : this.uri(request, { offset: nextOffset });
        }

        const previous = plan.from > 0
            ? this.uri(request, { offset: Math.max(0, plan.from - plan.size) })
            : null;

        return { next, previous };
    }

    sortKeyKinds(sort: readonly estypes.SortCombinations[]): SortKeyKind[] {
        return sort.map((combination) => {
            const key = sortKeyOf(combination);
            if (key === '_score') return 'number';
            const type = key === undefined ? undefined : this.registry.getField(key)?.type;
            if (type === 'date' || type === 'integer' || type === 'long') return 'number';
            if (type === 'keyword') return 'string';
            throw new Error(`No cursor kind for sort key ${String(key)}`);
        });
    }

    private pageSize(requested: number | undefined): number {
        if (requested === undefined) return this.config.defaultPageSize;
        if (!Number.isInteger(requested) || requested < 1) {
            throw new QueryError('size must be a positive integer', 'size');
        }
        return Math.min(requested, this.config.maxPageSize);
    }

    private uri(request: SearchRequest, paging: { offset: number } | { cursor: string }): string {
        const params = toSearchParams(request);
        if ('cursor' in paging) {
            params.set('cursor', paging.cursor);
        } else if (paging.offset > 0) {
            params.set('offset', String(paging.offset));
        }
        const query = params.toString();
        return query ? `${this.config.baseUrl}?${query}` : this.config.baseUrl;
    }
}
