/**
 * Barrel export for all shared types.
 */
export type {
    PaperDocument,
    AggregateField,
    DocumentBody,
    Author,
    TaxonomyNode,
    Classification,
    License,
    SourceInfo,
    Submitter,
} from './document.js';
export type {
    RawMetadataRecord,
    RawClassification,
    RawAuthor,
    RawSubmitter,
} from './metadata.js';
export { DEFAULT_CONFIG } from './config.js';
export type {
    PaperIndexConfig,
    PaperIndexConfigOverrides,
    LogLevel,
    MetadataConfig,
    EngineConfig,
    RetryConfig,
    IndexingConfig,
    QueryConfig,
    CacheConfig,
} from './config.js';
export type {
    IdentifierState,
    TerminalState,
    WriteOutcome,
    BatchResult,
    DeadLetter,
    RunSummary,
    SchemaPlan,
} from './indexing.js';
export type {
    SortOrder,
    SearchScope,
    SearchRequest,
    StructuredQuery,
    PagePlan,
    SearchHit,
    SearchPage,
    PaginationLinks,
    ResultDocument,
    DocumentSet,
    ErrorEnvelope,
} from './query.js';
