/**
 * PaperDocument: the canonical, denormalized search document.
 * One document per paper version; produced only by the normalizer and
 * returned unchanged by the query API.
 */
export interface PaperDocument {
    /** Versionless identifier, stable across versions (e.g. "1234.5678") */
    paper_id: string;

    /** Positive version number */
    version: number;

    /** Composite key `${paper_id}v${version}`; also the engine document id */
    paper_id_v: string;

    is_current: boolean;
    is_withdrawn: boolean;

    /** paper_id_v of the version this record considers newest */
    latest: string;
    latest_version: number;

    /** Submission timestamp of this version (ISO 8601) */
    submitted_date: string;
    submitted_date_first: string;
    submitted_date_latest: string;
    /** Ascending, de-duplicated union of submission timestamps across versions */
    submitted_date_all: string[];
    updated_date?: string;
    modified_date?: string;
    /** Month granularity, `yyyy-MM` */
    announced_date_first?: string;

    title: string;
    abstract?: string;
    comments?: string;
    journal_ref?: string;
    report_num?: string;
    doi?: string[];
    msc_class?: string[];
    acm_class?: string[];
    formats: string[];
    license?: License;
    source?: SourceInfo;
    fulltext?: string;

    primary_classification: Classification;
    secondary_classification: Classification[];

    authors: Author[];
    owners: Author[];
    submitter?: Submitter;

    /** Aggregate of every field the schema registry copies to `combined` */
    combined: string;
    /** Aggregate of author name fields */
    authors_combined: string;
}

/**
 * Aggregate fields are derived by the schema registry and never set directly.
 */
export type AggregateField = 'combined' | 'authors_combined';

/**
 * Everything the normalizer assembles before the registry fans out aggregates.
 */
export type DocumentBody = Omit<PaperDocument, AggregateField>;

export interface Author {
    first_name?: string;
    last_name: string;
    initials?: string;
    full_name: string;
    full_name_initialized?: string;
    suffix?: string;
    author_id?: string;
    orcid?: string;
    affiliation?: string[];
}

export interface TaxonomyNode {
    id: string;
    name: string;
}

export interface Classification {
    group: TaxonomyNode;
    archive: TaxonomyNode;
    category: TaxonomyNode;
}

export interface License {
    uri: string;
    label?: string;
}

export interface SourceInfo {
    flags?: string;
    format?: string;
    size_bytes?: number;
}

export interface Submitter {
    email?: string;
    name?: string;
    submitter_id?: string;
    is_author?: boolean;
    author_id?: string;
    orcid?: string;
}
