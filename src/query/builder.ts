import type { estypes } from '@elastic/elasticsearch';
import type { SearchRequest, SearchScope, SortOrder, StructuredQuery } from '../types/index.js';
import type { SchemaRegistry } from '../schema/registry.js';
import { parseIdentifier } from '../sources/identifiers.js';
import { QueryError } from '../utils/errors.js';
import {
    fold,
    isLiteral,
    isTexQuery,
    matchDatePartial,
    rewriteClassicAuthor,
    stripQuotes,
    stripTex,
    wildcardEscape,
    type DatePartial,
} from './text.js';

type Query = estypes.QueryDslQueryContainer;

export const SORT_ORDERS: readonly SortOrder[] = [
    'relevance',
    'submitted_date_first',
    '-submitted_date_first',
    'announced_date_first',
    '-announced_date_first',
];

export function isSortOrder(value: string): value is SortOrder {
    return SORT_ORDERS.some((order) => order === value);
}

export const SEARCH_SCOPES: readonly SearchScope[] = ['all', 'title', 'author', 'abstract'];

export function isSearchScope(value: string): value is SearchScope {
    return SEARCH_SCOPES.some((scope) => scope === value);
}

/**
 * Inner-hits names under which matched authors come back.
 */
export const AUTHOR_INNER_HITS = {
    text: 'authors',
    author: 'author',
} as const;

const BOOST = {
    identifier: 20,
    titleExact: 10,
    titleFolded: 6,
    titleStemmed: 4,
    authors: 3,
    abstract: 2,
    combined: 2,
    fulltext: 1,
    announced: 1,
} as const;

const TIE_BREAKER: estypes.SortCombinations = { paper_id_v: { order: 'desc' } };

/**
 * Translates API search requests into engine queries. Field names come
 * from the schema registry; category filters are resolved through its
 * taxonomy.
 */
export class QueryBuilder {
    constructor(private readonly registry: SchemaRegistry) {}

    build(request: SearchRequest): StructuredQuery {
        const text = request.query?.trim() || undefined;
        const author = request.author?.trim() || undefined;
        const scope = request.searchType ?? 'all';
        if (!isSearchScope(scope)) {
            throw new QueryError(`Unknown search type: ${String(scope)}`, 'searchtype');
        }

        const must: Query[] = [];
        if (text) must.push(this.textQuery(text, scope));
        if (author) must.push(this.authorQuery(author, 'author', AUTHOR_INNER_HITS.author));

        const filter: Query[] = [];
        if (request.primaryCategories && request.primaryCategories.length > 0) {
            filter.push(this.categoryFilter(request.primaryCategories));
        }
        if (!request.includeOlderVersions) {
            filter.push({ term: { is_current: true } });
        }

        const query: Query = must.length === 0 && filter.length === 0
            ? { match_all: {} }
            : { bool: { ...(must.length > 0 ? { must } : {}), ...(filter.length > 0 ? { filter } : {}) } };

        return { query, sort: this.sort(request.order, must.length > 0) };
    }

    /**
     * Free text against the field set of `scope`. Inline TeX only takes
     * part in the exact title match.
     */
    private textQuery(raw: string, scope: SearchScope): Query {
        if (scope === 'author') {
            return this.authorQuery(raw, 'query', AUTHOR_INNER_HITS.text);
        }

        const { text, wildcard } = wildcardEscape(raw, 'query');
        if (wildcard) {
            return this.wildcardQuery(text, this.wildcardFields(scope), scope === 'all' ? AUTHOR_INNER_HITS.text : undefined);
        }

        const literal = isLiteral(text);
        const value = literal ? stripQuotes(text) : text;
        const words = isTexQuery(value) ? stripTex(value) || value : value;

        if (scope === 'title') {
            return { bool: { should: this.titleClauses(value, words, literal), minimum_should_match: 1 } };
        }
        if (scope === 'abstract') {
            return this.textMatch(this.registry.fieldFor('abstract', 'stemmed'), words, literal, BOOST.abstract);
        }

        const should: Query[] = [];
        const identifier = parseIdentifier(value);
        if (identifier) {
            should.push(
                identifier.version === null
                    ? { term: { paper_id: { value: identifier.paperId, boost: BOOST.identifier } } }
                    : { term: { paper_id_v: { value: value, boost: BOOST.identifier } } }
            );
        }

        const authorMatch: Query = literal
            ? { term: { [this.registry.fieldFor('authors.full_name', 'exact')]: value } }
            : { match: { [this.registry.fieldFor('authors.full_name', 'folded')]: { query: rewriteClassicAuthor(words), operator: 'and' } } };

        should.push(
            ...this.titleClauses(value, words, literal),
            {
                nested: {
                    path: 'authors',
                    score_mode: 'max',
                    query: authorMatch,
                    inner_hits: { name: AUTHOR_INNER_HITS.text },
                    boost: BOOST.authors,
                },
            },
            this.textMatch(this.registry.fieldFor('combined', 'combined'), words, literal, BOOST.combined),
            this.textMatch(this.registry.fieldFor('fulltext', 'stemmed'), words, literal, BOOST.fulltext)
        );

        const partial = literal ? null : matchDatePartial(words);
        if (partial) {
            should.push(this.announcedQuery(partial));
        }

        return { bool: { should, minimum_should_match: 1 } };
    }

    private titleClauses(value: string, words: string, literal: boolean): Query[] {
        return [
            { term: { [this.registry.fieldFor('title', 'exact')]: { value, boost: BOOST.titleExact } } },
            { match: { [this.registry.fieldFor('title', 'folded')]: { query: words, boost: BOOST.titleFolded } } },
            this.textMatch(this.registry.fieldFor('title', 'stemmed'), words, literal, BOOST.titleStemmed),
        ];
    }

    /**
     * The announcement month, narrowed by whatever text surrounded the
     * `yymm` partial.
     */
    private announcedQuery(partial: DatePartial): Query {
        const month: Query = { term: { announced_date_first: { value: partial.month, boost: BOOST.announced } } };
        if (!partial.remainder) return month;
        return {
            bool: {
                must: [
                    { term: { announced_date_first: partial.month } },
                    { match: { [this.registry.fieldFor('combined', 'combined')]: { query: partial.remainder, operator: 'and' } } },
                ],
                boost: BOOST.announced,
            },
        };
    }

    private textMatch(field: string, value: string, literal: boolean, boost: number): Query {
        return literal
            ? { match_phrase: { [field]: { query: value, boost } } }
            : { match: { [field]: { query: value, boost } } };
    }

    /**
     * Author names against the nested author sub-documents: quoted input
     * must match a full name exactly, anything else matches folded names.
     * Classic `surname_initials` tokens are rewritten first.
     */
    private authorQuery(raw: string, parameter: string, innerHitsName: string): Query {
        const { text, wildcard } = wildcardEscape(raw, parameter);
        if (wildcard) {
            return this.wildcardQuery(text, [], innerHitsName);
        }

        let query: Query;
        if (isLiteral(text)) {
            query = { term: { [this.registry.fieldFor('authors.full_name', 'exact')]: stripQuotes(text) } };
        } else {
            const names = rewriteClassicAuthor(text);
            const should: Query[] = ['authors.full_name', 'authors.last_name', 'authors.full_name_initialized']
                .map((path): Query => ({ match: { [this.registry.fieldFor(path, 'folded')]: { query: names, operator: 'and' } } }));
            query = { bool: { should, minimum_should_match: 1 } };
        }

        return {
            nested: {
                path: 'authors',
                score_mode: 'max',
                query,
                inner_hits: { name: innerHitsName },
            },
        };
    }

    private wildcardFields(scope: Exclude<SearchScope, 'author'>): Array<[string, number]> {
        switch (scope) {
            case 'title':
                return [[this.registry.fieldFor('title', 'folded'), BOOST.titleFolded]];
            case 'abstract':
                return [[this.registry.fieldFor('abstract', 'stemmed'), BOOST.abstract]];
            case 'all':
                return [
                    [this.registry.fieldFor('title', 'folded'), BOOST.titleFolded],
                    [this.registry.fieldFor('combined', 'folded'), BOOST.combined],
                ];
        }
    }

    /**
     * Lower-cased wildcard queries on `fields`, and on the nested folded
     * author name when `authorInnerHits` names its inner hits.
     */
    private wildcardQuery(text: string, fields: Array<[string, number]>, authorInnerHits?: string): Query {
        const value = fold(stripQuotes(text));
        const should: Query[] = fields.map(([field, boost]) => ({ wildcard: { [field]: { value, boost } } }));
        if (authorInnerHits) {
            should.push({
                nested: {
                    path: 'authors',
                    score_mode: 'max',
                    query: { wildcard: { [this.registry.fieldFor('authors.full_name', 'folded')]: { value } } },
                    inner_hits: { name: authorInnerHits },
                    boost: BOOST.authors,
                },
            });
        }
        return should.length === 1 && should[0] ? should[0] : { bool: { should, minimum_should_match: 1 } };
    }

    /**
     * Primary category in the set, or any secondary category in the set.
     */
    private categoryFilter(categories: readonly string[]): Query {
        const ids = new Set<string>();
        for (const category of categories) {
            const canonical = this.registry.taxonomy.canonicalCategory(category.trim());
            if (!canonical) {
                throw new QueryError(`Unknown category: ${category}`, 'primary_category');
            }
            ids.add(canonical);
        }
        const values = [...ids];

        return {
            bool: {
                should: [
                    { terms: { 'primary_classification.category.id': values } },
                    {
                        nested: {
                            path: 'secondary_classification',
                            query: { terms: { 'secondary_classification.category.id': values } },
                        },
                    },
                ],
                minimum_should_match: 1,
            },
        };
    }

    private sort(order: SortOrder | undefined, hasText: boolean): estypes.SortCombinations[] {
        const resolved = order ?? (hasText ? 'relevance' : '-submitted_date_first');
        if (!isSortOrder(resolved)) {
            throw new QueryError(`Unknown sort order: ${String(resolved)}`, 'order');
        }

        if (resolved === 'relevance') {
            return [{ _score: { order: 'desc' } }, TIE_BREAKER];
        }
        const descending = resolved.startsWith('-');
        const field = descending ? resolved.slice(1) : resolved;
        return [{ [field]: { order: descending ? 'desc' : 'asc' } }, TIE_BREAKER];
    }
}
