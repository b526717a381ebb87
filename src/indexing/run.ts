import type { IndexingConfig, RunSummary, SchemaPlan } from '../types/index.js';
import type { SearchEngine } from '../engine/elasticsearch.js';
import type { MetadataFetcher } from '../sources/metadata-fetcher.js';
import type { SchemaRegistry } from '../schema/registry.js';
import type { RunLedger } from '../storage/ledger.js';
import { readIdentifierList, type IdentifierList } from '../sources/identifiers.js';
import { DocumentNormalizer } from '../normalize/normalizer.js';
import { IndexWriter } from './writer.js';
import { RetryPolicy } from './retry.js';
import { IndexingOrchestrator, type OrchestratorHooks } from './orchestrator.js';
import { describeError, RunStartError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

export interface RunIndexingOptions {
    /** Newline-delimited identifier list */
    listPath: string;
    indexName: string;
    indexing: IndexingConfig;
    engine: SearchEngine;
    fetcher: MetadataFetcher;
    registry: SchemaRegistry;
    ledger?: RunLedger;
    signal?: AbortSignal;
    /** Overrides the policy built from `indexing.retry` */
    retry?: RetryPolicy;
}

/**
 * Make the live index match the registry. Rebuilding drops every indexed
 * document, so it only happens when allowed.
 */
export async function prepareIndex(
    engine: SearchEngine,
    registry: SchemaRegistry,
    allowRebuild: boolean
): Promise<SchemaPlan> {
    const logger = getLogger('run');
    const plan = registry.planSchemaChange(await engine.getIndexMeta());

    switch (plan.action) {
        case 'create':
            await engine.createIndex(registry.indexDefinition());
            break;
        case 'rebuild':
            if (!allowRebuild) {
                throw new RunStartError(`Index rebuild required: ${plan.reason}. Re-run with --allow-rebuild to drop and recreate it.`);
            }
            logger.warn({ reason: plan.reason }, 'Rebuilding index');
            await engine.deleteIndex();
            await engine.createIndex(registry.indexDefinition());
            break;
        case 'incremental':
            break;
    }
    return plan;
}

/**
 * Indexing entrypoint: read the identifier list, check the engine and the
 * index schema, run the orchestrator and record the run in the ledger.
 * Rejects with RunStartError when the run cannot start.
 */
export async function runIndexing(options: RunIndexingOptions): Promise<RunSummary> {
    const logger = getLogger('run');
    const { engine, registry, ledger, indexing } = options;

    let list: IdentifierList;
    try {
        list = await readIdentifierList(options.listPath);
    } catch (error) {
        throw new RunStartError(`Cannot read identifier list ${options.listPath}: ${describeError(error)}`, { cause: error });
    }
    logger.info({ identifiers: list.ids.length, invalid: list.invalid.length }, 'Identifier list loaded');

    if (!(await engine.ping())) {
        throw new RunStartError('Search engine is unreachable');
    }

    let plan: SchemaPlan;
    try {
        plan = await prepareIndex(engine, registry, indexing.allowRebuild);
    } catch (error) {
        if (error instanceof RunStartError) throw error;
        throw new RunStartError(`Cannot prepare index: ${describeError(error)}`, { cause: error });
    }
    logger.info({ plan: plan.action, schemaVersion: registry.version }, 'Index ready');

    const startedAt = new Date().toISOString();
    const runId = ledger?.startRun({
        startedAt,
        indexName: options.indexName,
        schemaVersion: registry.version,
        config: indexing,
    });

    const skip = ledger && indexing.resume && plan.action === 'incremental'
        ? ledger.indexedIdentifiers(options.indexName, registry.version)
        : undefined;

    const hooks: OrchestratorHooks | undefined = ledger && runId !== undefined
        ? {
            onStateChange: (paperId, state, attempts) => ledger.recordState(runId, paperId, state, attempts),
            onDeadLetter: (deadLetter) => ledger.recordDeadLetter(runId, deadLetter),
        }
        : undefined;

    const orchestrator = new IndexingOrchestrator({
        fetcher: options.fetcher,
        normalizer: new DocumentNormalizer(registry),
        writer: new IndexWriter(engine),
        retry: options.retry ?? new RetryPolicy(indexing.retry),
        batchSize: indexing.batchSize,
        concurrency: indexing.concurrency,
        signal: options.signal,
        skip,
        hooks,
    });

    const summary = await orchestrator.run(list.ids, list.invalid);
    if (ledger && runId !== undefined) {
        ledger.finishRun(runId, summary);
    }
    return summary;
}
