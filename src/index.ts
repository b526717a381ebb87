export * from './types/index.js';

export { SchemaRegistry, createSchemaRegistry, type IndexDefinition, type IndexSchemaMeta } from './schema/registry.js';
export { Taxonomy, loadTaxonomy, parseTaxonomyData, type TaxonomyData } from './schema/taxonomy.js';
export { FIELD_DEFINITIONS, SCHEMA_VERSION, type FieldDefinition, type FieldRole } from './schema/fields.js';

export { DocumentNormalizer, type NormalizedDocument } from './normalize/normalizer.js';
export { parseIdentifier, parseIdentifierList, readIdentifierList, versionedId } from './sources/identifiers.js';
export { HttpMetadataFetcher, type MetadataFetcher } from './sources/metadata-fetcher.js';

export { ElasticsearchEngine, type SearchEngine } from './engine/elasticsearch.js';
export { IndexWriter } from './indexing/writer.js';
export { RetryPolicy } from './indexing/retry.js';
export { IndexingOrchestrator, type OrchestratorOptions } from './indexing/orchestrator.js';
export { runIndexing, prepareIndex, type RunIndexingOptions } from './indexing/run.js';
export { RunLedger } from './storage/ledger.js';

export { QueryBuilder, SORT_ORDERS, SEARCH_SCOPES } from './query/builder.js';
export { PaginationPlanner, encodeCursor, decodeCursor, type SortKeyKind } from './query/pagination.js';
export { SearchService, errorEnvelope, parseSearchParams } from './query/search-service.js';

export {
    PaperIndexError,
    FetchError,
    NotFoundError,
    TransformError,
    IndexError,
    QueryError,
    RunStartError,
} from './utils/errors.js';
export { resolveConfig } from './utils/config.js';
export { initLogger, getLogger } from './utils/logger.js';
