import type { estypes } from '@elastic/elasticsearch';
import type { Author, PaperDocument } from './document.js';

export type SortOrder =
    | 'relevance'
    | 'submitted_date_first'
    | '-submitted_date_first'
    | 'announced_date_first'
    | '-announced_date_first';

/** Which fields free text is matched against */
export type SearchScope = 'all' | 'title' | 'author' | 'abstract';

/**
 * API-level search request (already parsed from query parameters).
 */
export interface SearchRequest {
    /** Free text */
    query?: string;
    /** Fields the free text is matched against; defaults to all */
    searchType?: SearchScope;
    /** Author name; quoted input means exact match */
    author?: string;
    /** Primary category slugs, e.g. "cs.LG" */
    primaryCategories?: string[];
    order?: SortOrder;
    includeOlderVersions?: boolean;
    offset?: number;
    size?: number;
    /** Opaque cursor from a previous `next` link */
    cursor?: string;
}

/**
 * Engine query produced by the query builder.
 */
export interface StructuredQuery {
    query: estypes.QueryDslQueryContainer;
    sort: estypes.SortCombinations[];
}

export type PagePlan =
    | { strategy: 'offset'; from: number; size: number }
    | { strategy: 'cursor'; searchAfter: estypes.SortResults; size: number };

export interface SearchHit {
    document: PaperDocument;
    score: number | null;
    sort?: estypes.SortResults;
    /** Authors matched by a nested author clause */
    matchedAuthors: Author[];
}

export interface SearchPage {
    total: number;
    hits: SearchHit[];
}

export interface PaginationLinks {
    next: string | null;
    previous: string | null;
}

export type ResultDocument = PaperDocument & { matched_authors?: Author[] };

/**
 * Result envelope returned by `GET /papers`.
 */
export interface DocumentSet {
    metadata: {
        query: SearchRequest;
        total: number;
        pagination: PaginationLinks;
    };
    results: ResultDocument[];
}

/**
 * Error body for every non-2xx response.
 */
export interface ErrorEnvelope {
    code: number;
    message: string;
}
