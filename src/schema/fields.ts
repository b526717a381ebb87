import type { AggregateField } from '../types/index.js';

/**
 * Bump on any breaking change to the definitions below (analyzer change,
 * new copy target, type change). Analyzers cannot be changed on a live
 * field, so a new version means a full reindex.
 */
export const SCHEMA_VERSION = 1;

/**
 * How a text representation behaves at query time.
 * - exact: untouched keyword
 * - folded: case- and diacritic-insensitive
 * - stemmed: language-aware text
 * - combined: cross-field aggregate
 */
export type FieldRole = 'exact' | 'folded' | 'stemmed' | 'combined';

export type FieldType = 'text' | 'keyword' | 'date' | 'integer' | 'long' | 'boolean' | 'object' | 'nested';

/**
 * An additional representation of a field, indexed from the same value
 * (an engine multi-field such as `title.exact`).
 */
export interface FieldVariant {
    name: string;
    type: 'text' | 'keyword';
    role: FieldRole;
    analyzer?: string;
    normalizer?: string;
}

export interface FieldDefinition {
    /** Dotted document path, e.g. `authors.last_name` */
    path: string;
    type: FieldType;
    role?: FieldRole;
    analyzer?: string;
    normalizer?: string;
    format?: string;
    /** Aggregate fields this field's value is copied into, in definition order */
    copyTo?: AggregateField[];
    variants?: FieldVariant[];
}

const EXACT: FieldVariant = { name: 'exact', type: 'keyword', role: 'exact' };
const FOLDED: FieldVariant = { name: 'folded', type: 'keyword', role: 'folded', normalizer: 'folded' };

const DATE_FORMAT = 'strict_date_optional_time||epoch_millis';

function authorFields(prefix: 'authors' | 'owners'): FieldDefinition[] {
    const names: AggregateField[] = prefix === 'authors' ? ['combined', 'authors_combined'] : [];
    const initialized: AggregateField[] = prefix === 'authors' ? ['authors_combined'] : [];

    return [
        { path: prefix, type: 'nested' },
        { path: `${prefix}.first_name`, type: 'text', role: 'folded', analyzer: 'folded_text', variants: [EXACT] },
        { path: `${prefix}.last_name`, type: 'text', role: 'folded', analyzer: 'folded_text', variants: [EXACT] },
        { path: `${prefix}.initials`, type: 'keyword', role: 'folded', normalizer: 'folded' },
        { path: `${prefix}.full_name`, type: 'text', role: 'folded', analyzer: 'folded_text', copyTo: names, variants: [EXACT] },
        { path: `${prefix}.full_name_initialized`, type: 'text', role: 'folded', analyzer: 'folded_text', copyTo: initialized, variants: [EXACT] },
        { path: `${prefix}.suffix`, type: 'keyword', role: 'exact' },
        { path: `${prefix}.author_id`, type: 'keyword', role: 'exact' },
        { path: `${prefix}.orcid`, type: 'keyword', role: 'exact' },
        { path: `${prefix}.affiliation`, type: 'text', role: 'folded', analyzer: 'folded_text' },
    ];
}

function classificationFields(prefix: 'primary_classification' | 'secondary_classification'): FieldDefinition[] {
    const fields: FieldDefinition[] = [
        { path: prefix, type: prefix === 'secondary_classification' ? 'nested' : 'object' },
    ];
    for (const level of ['group', 'archive', 'category'] as const) {
        fields.push(
            { path: `${prefix}.${level}`, type: 'object' },
            {
                path: `${prefix}.${level}.id`,
                type: 'keyword',
                role: 'exact',
                copyTo: level === 'category' ? ['combined'] : undefined,
            },
            { path: `${prefix}.${level}.name`, type: 'text', role: 'folded', analyzer: 'folded_text', variants: [EXACT] }
        );
    }
    return fields;
}

/**
 * Every indexed field. Order matters: aggregates concatenate their sources
 * in this order.
 */
export const FIELD_DEFINITIONS: readonly FieldDefinition[] = [
    { path: 'paper_id', type: 'keyword', role: 'exact', copyTo: ['combined'] },
    { path: 'paper_id_v', type: 'keyword', role: 'exact' },
    { path: 'version', type: 'integer' },
    { path: 'is_current', type: 'boolean' },
    { path: 'is_withdrawn', type: 'boolean' },
    { path: 'latest', type: 'keyword', role: 'exact' },
    { path: 'latest_version', type: 'integer' },

    { path: 'submitted_date', type: 'date', format: DATE_FORMAT },
    { path: 'submitted_date_first', type: 'date', format: DATE_FORMAT },
    { path: 'submitted_date_latest', type: 'date', format: DATE_FORMAT },
    { path: 'submitted_date_all', type: 'date', format: DATE_FORMAT },
    { path: 'updated_date', type: 'date', format: DATE_FORMAT },
    { path: 'modified_date', type: 'date', format: DATE_FORMAT },
    { path: 'announced_date_first', type: 'date', format: 'yyyy-MM' },

    { path: 'title', type: 'text', role: 'stemmed', analyzer: 'stemmed_text', copyTo: ['combined'], variants: [EXACT, FOLDED] },
    { path: 'abstract', type: 'text', role: 'stemmed', analyzer: 'stemmed_text', copyTo: ['combined'] },
    ...authorFields('authors'),
    { path: 'comments', type: 'text', role: 'stemmed', analyzer: 'stemmed_text', copyTo: ['combined'] },
    { path: 'journal_ref', type: 'text', role: 'folded', analyzer: 'folded_text', copyTo: ['combined'] },
    { path: 'report_num', type: 'keyword', role: 'exact', copyTo: ['combined'], variants: [FOLDED] },
    { path: 'doi', type: 'keyword', role: 'exact', copyTo: ['combined'] },
    { path: 'msc_class', type: 'keyword', role: 'exact', copyTo: ['combined'] },
    { path: 'acm_class', type: 'keyword', role: 'exact', copyTo: ['combined'] },
    ...classificationFields('primary_classification'),
    ...classificationFields('secondary_classification'),

    { path: 'formats', type: 'keyword', role: 'exact' },
    { path: 'license', type: 'object' },
    { path: 'license.uri', type: 'keyword', role: 'exact' },
    { path: 'license.label', type: 'keyword', role: 'exact' },
    { path: 'source', type: 'object' },
    { path: 'source.flags', type: 'keyword', role: 'exact' },
    { path: 'source.format', type: 'keyword', role: 'exact' },
    { path: 'source.size_bytes', type: 'long' },
    ...authorFields('owners'),
    { path: 'submitter', type: 'object' },
    { path: 'submitter.email', type: 'keyword', role: 'folded', normalizer: 'folded' },
    { path: 'submitter.name', type: 'text', role: 'folded', analyzer: 'folded_text' },
    { path: 'submitter.submitter_id', type: 'keyword', role: 'exact' },
    { path: 'submitter.is_author', type: 'boolean' },
    { path: 'submitter.author_id', type: 'keyword', role: 'exact' },
    { path: 'submitter.orcid', type: 'keyword', role: 'exact' },
    { path: 'fulltext', type: 'text', role: 'stemmed', analyzer: 'stemmed_text' },

    { path: 'combined', type: 'text', role: 'combined', analyzer: 'stemmed_text', variants: [{ name: 'folded', type: 'text', role: 'folded', analyzer: 'folded_text' }] },
    { path: 'authors_combined', type: 'text', role: 'combined', analyzer: 'folded_text' },
];
