/**
 * Raw metadata as served by the upstream metadata source, one record per
 * paper version. Nothing here is trusted: the normalizer validates every
 * field it reads before it reaches a PaperDocument.
 */
export interface RawMetadataRecord {
    paper_id?: string;
    version?: number | string;

    title?: string;
    abstract?: string | null;
    comments?: string | null;
    journal_ref?: string | null;
    report_num?: string | null;
    doi?: string | null;
    msc_class?: string | null;
    acm_class?: string | null;
    formats?: string[];
    fulltext?: string | null;

    submitted_date?: string | null;
    submitted_date_all?: string[];
    updated_date?: string | null;
    modified_date?: string | null;
    announced_date_first?: string | null;

    is_current?: boolean;
    is_withdrawn?: boolean;

    primary_classification?: RawClassification | null;
    secondary_classification?: RawClassification[];

    authors_parsed?: RawAuthor[];
    author_owners?: RawAuthor[];
    submitter?: RawSubmitter | null;

    license?: { uri?: string; label?: string } | null;
    source?: { flags?: string; format?: string; size_bytes?: number } | null;
}

/**
 * Classification as referenced upstream: ids only. Archive and group are
 * optional; when present they must agree with the taxonomy.
 */
export interface RawClassification {
    category?: { id?: string } | null;
    archive?: { id?: string } | null;
    group?: { id?: string } | null;
}

export interface RawAuthor {
    first_name?: string | null;
    last_name?: string | null;
    suffix?: string | null;
    author_id?: string | null;
    orcid?: string | null;
    affiliation?: string[] | string | null;
}

export interface RawSubmitter {
    email?: string | null;
    name?: string | null;
    name_id?: string | null;
    is_author?: boolean;
    author_id?: string | null;
    orcid?: string | null;
}
