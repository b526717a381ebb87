#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import { resolveConfig, getEngineAuth, parseLogLevel } from '../utils/config.js';
import { initLogger, getLogger } from '../utils/logger.js';
import { createHttpClient } from '../utils/http-client.js';
import { describeError, RunStartError } from '../utils/errors.js';
import { ResponseCache } from '../cache/response-cache.js';
import { HttpMetadataFetcher } from '../sources/metadata-fetcher.js';
import { createSchemaRegistry } from '../schema/registry.js';
import { ElasticsearchEngine } from '../engine/elasticsearch.js';
import { runIndexing } from '../indexing/run.js';
import { RunLedger } from '../storage/ledger.js';
import { SearchService, errorEnvelope } from '../query/search-service.js';
import { isSearchScope, isSortOrder } from '../query/builder.js';
import type { PaperIndexConfig, PaperIndexConfigOverrides, SearchRequest } from '../types/index.js';

const VERSION = '0.1.0';

const program = new Command();

program
    .name('paperindex')
    .description('Index bibliographic paper metadata into Elasticsearch and query it.')
    .version(VERSION);

function parseInteger(value: string): number {
    if (!/^\d+$/.test(value)) {
        throw new InvalidArgumentError('Not a non-negative integer.');
    }
    return parseInt(value, 10);
}

function parseLevel(value: string): NonNullable<PaperIndexConfigOverrides['logLevel']> {
    const level = parseLogLevel(value);
    if (!level) {
        throw new InvalidArgumentError('Expected one of: debug, info, warn, error, silent.');
    }
    return level;
}

interface CommonOptions {
    esUrl?: string;
    index?: string;
    logLevel?: PaperIndexConfigOverrides['logLevel'];
    jsonLogs?: boolean;
}

function withCommonOptions(command: Command): Command {
    return command
        .option('--es-url <url>', 'Elasticsearch node URL')
        .option('--index <name>', 'Index name')
        .option('--log-level <level>', 'Log level: debug | info | warn | error | silent', parseLevel)
        .option('--json-logs', 'Output JSON logs');
}

async function setup(options: CommonOptions, overrides: PaperIndexConfigOverrides = {}): Promise<PaperIndexConfig> {
    const config = await resolveConfig({
        ...overrides,
        engine: {
            ...overrides.engine,
            ...(options.esUrl ? { node: options.esUrl } : {}),
            ...(options.index ? { index: options.index } : {}),
        },
        ...(options.logLevel ? { logLevel: options.logLevel } : {}),
        ...(options.jsonLogs ? { jsonLogs: true } : {}),
    });
    initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
    return config;
}

function createEngine(config: PaperIndexConfig): ElasticsearchEngine {
    return new ElasticsearchEngine({
        node: config.engine.node,
        index: config.engine.index,
        requestTimeoutMs: config.engine.requestTimeoutMs,
        auth: getEngineAuth(),
    });
}

function print(value: unknown): void {
    console.log(JSON.stringify(value, null, 2));
}

// ─── INDEX command ────────────────────────────────────────

interface IndexOptions extends CommonOptions {
    metadataEndpoint?: string;
    batchSize?: number;
    concurrency?: number;
    maxAttempts?: number;
    allowRebuild?: boolean;
    resume?: boolean;
    ledger?: string;
    cache?: boolean;
}

withCommonOptions(
    program
        .command('index')
        .description('Index every identifier in a newline-delimited list')
        .argument('<list-file>', 'File with one versionless identifier per line')
        .option('--metadata-endpoint <url>', 'Metadata source base URL')
        .option('--batch-size <n>', 'Identifiers per batch and documents per bulk request', parseInteger)
        .option('--concurrency <n>', 'Parallel metadata fetches', parseInteger)
        .option('--max-attempts <n>', 'Attempts per fetch or write before dead-lettering', parseInteger)
        .option('--allow-rebuild', 'Drop and recreate the index when the schema changed')
        .option('--resume', 'Skip identifiers indexed by earlier runs under the same schema')
        .option('--ledger <path>', 'Run ledger database path')
        .option('--cache', 'Cache metadata responses on disk')
).action(async (listFile: string, opts: IndexOptions) => {
    const config = await setup(opts, {
        ...(opts.metadataEndpoint ? { metadata: { endpoint: opts.metadataEndpoint } } : {}),
        indexing: {
            ...(opts.batchSize !== undefined ? { batchSize: opts.batchSize } : {}),
            ...(opts.concurrency !== undefined ? { concurrency: opts.concurrency } : {}),
            ...(opts.maxAttempts !== undefined ? { retry: { maxAttempts: opts.maxAttempts } } : {}),
            ...(opts.allowRebuild ? { allowRebuild: true } : {}),
            ...(opts.resume ? { resume: true } : {}),
        },
        ...(opts.ledger ? { ledger: opts.ledger } : {}),
        ...(opts.cache ? { cache: { enabled: true } } : {}),
    });
    const logger = getLogger('cli');

    const rps = config.metadata.requestsPerSecond;
    const httpClient = createHttpClient({
        timeout: config.metadata.timeoutMs,
        version: VERSION,
        rateLimits: { metadata: { tokensPerSecond: rps, maxBurst: rps } },
    });
    const fetcher = new HttpMetadataFetcher({
        endpoint: config.metadata.endpoint,
        httpClient,
        cache: new ResponseCache(config.cache),
        timeoutMs: config.metadata.timeoutMs,
    });
    const engine = createEngine(config);
    const ledger = new RunLedger(config.ledger);

    const controller = new AbortController();
    const onSignal = (): void => {
        logger.warn('Interrupted: finishing in-flight work, no new identifiers will start');
        controller.abort();
    };
    process.once('SIGINT', onSignal);
    process.once('SIGTERM', onSignal);

    logger.info({ listFile, index: config.engine.index, endpoint: config.metadata.endpoint }, 'Starting indexing run');

    try {
        const summary = await runIndexing({
            listPath: listFile,
            indexName: config.engine.index,
            indexing: config.indexing,
            engine,
            fetcher,
            registry: createSchemaRegistry(),
            ledger,
            signal: controller.signal,
        });
        print(summary);
        logger.info({ requests: httpClient.getAllRequestCounts() }, 'Indexing complete');
    } catch (error) {
        if (error instanceof RunStartError) {
            logger.error({ reason: error.message }, 'Indexing run could not start');
        } else {
            logger.error({ error }, 'Indexing run failed');
        }
        process.exitCode = 1;
    } finally {
        process.off('SIGINT', onSignal);
        process.off('SIGTERM', onSignal);
        ledger.close();
        await engine.close();
    }
});

// ─── SEARCH command ───────────────────────────────────────

interface SearchOptions extends CommonOptions {
    query?: string;
    searchType?: string;
    author?: string;
    category?: string[];
    order?: string;
    offset?: number;
    size?: number;
    cursor?: string;
    includeOlder?: boolean;
}

withCommonOptions(
    program
        .command('search')
        .description('Search the index and print the result envelope')
        .option('-q, --query <text>', 'Free-text query')
        .option('-t, --search-type <scope>', 'Fields the query searches: all | title | author | abstract')
        .option('-a, --author <name>', 'Author name; quote for exact match')
        .option('-c, --category <ids...>', 'Primary category filter (repeatable)')
        .option('--order <order>', 'relevance | submitted_date_first | -submitted_date_first | announced_date_first | -announced_date_first')
        .option('--offset <n>', 'Result offset', parseInteger)
        .option('--size <n>', 'Page size', parseInteger)
        .option('--cursor <cursor>', 'Cursor from a previous next link')
        .option('--include-older', 'Include non-current versions')
).action(async (opts: SearchOptions) => {
    const config = await setup(opts);
    const engine = createEngine(config);
    const service = new SearchService(engine, createSchemaRegistry(), config.query);

    const request: SearchRequest = {
        query: opts.query,
        author: opts.author,
        primaryCategories: opts.category,
        includeOlderVersions: opts.includeOlder,
        offset: opts.offset,
        size: opts.size,
        cursor: opts.cursor,
    };

    try {
        if (opts.order !== undefined) {
            if (!isSortOrder(opts.order)) {
                throw new InvalidArgumentError(`Unknown order: ${opts.order}`);
            }
            request.order = opts.order;
        }
        if (opts.searchType !== undefined) {
            if (!isSearchScope(opts.searchType)) {
                throw new InvalidArgumentError(`Unknown search type: ${opts.searchType}`);
            }
            request.searchType = opts.searchType;
        }
        print(await service.search(request));
    } catch (error) {
        if (error instanceof InvalidArgumentError) {
            print({ code: 400, message: error.message });
        } else {
            print(errorEnvelope(error));
        }
        process.exitCode = 1;
    } finally {
        await engine.close();
    }
});

// ─── GET command ──────────────────────────────────────────

withCommonOptions(
    program
        .command('get')
        .description('Print one paper: the current version, or an exact version (e.g. 1234.5678v2)')
        .argument('<id>', 'Paper identifier')
).action(async (id: string, opts: CommonOptions) => {
    const config = await setup(opts);
    const engine = createEngine(config);
    const service = new SearchService(engine, createSchemaRegistry(), config.query);

    try {
        print(await service.getPaper(id));
    } catch (error) {
        print(errorEnvelope(error));
        process.exitCode = 1;
    } finally {
        await engine.close();
    }
});

// ─── SCHEMA command ───────────────────────────────────────

withCommonOptions(
    program
        .command('schema')
        .description('Print the index definition, or with --plan what the live index needs')
        .option('--plan', 'Compare against the live index')
).action(async (opts: CommonOptions & { plan?: boolean }) => {
    const config = await setup(opts);
    const registry = createSchemaRegistry();

    if (!opts.plan) {
        print({ version: registry.version, fingerprint: registry.fingerprint, ...registry.indexDefinition() });
        return;
    }

    const engine = createEngine(config);
    try {
        const live = await engine.getIndexMeta();
        print({ index: config.engine.index, live, plan: registry.planSchemaChange(live) });
    } catch (error) {
        getLogger('cli').error({ reason: describeError(error) }, 'Could not read the live index');
        process.exitCode = 1;
    } finally {
        await engine.close();
    }
});

// ─── INSPECT command ──────────────────────────────────────

program
    .command('inspect')
    .description('Show recorded indexing runs, or one run in detail')
    .option('--ledger <path>', 'Run ledger database path')
    .option('--run <id>', 'Run id', parseInteger)
    .action(async (opts: { ledger?: string; run?: number }) => {
        const config = await setup({}, opts.ledger ? { ledger: opts.ledger } : {});
        const ledger = new RunLedger(config.ledger);

        try {
            if (opts.run === undefined) {
                const runs = ledger.listRuns();
                if (runs.length === 0) {
                    console.log('No runs recorded.');
                    return;
                }
                for (const run of runs) {
                    console.log(`  #${run.run_id}  ${run.started_at}  ${run.index_name}  schema v${run.schema_version}  ${run.finished_at ? 'finished' : 'unfinished'}`);
                }
                return;
            }

            const run = ledger.getRun(opts.run);
            if (!run) {
                console.error(`No run #${opts.run}`);
                process.exitCode = 1;
                return;
            }
            print({
                run: run.run_id,
                index: run.index_name,
                schemaVersion: run.schema_version,
                startedAt: run.started_at,
                finishedAt: run.finished_at,
                states: ledger.stateCounts(run.run_id),
                deadLetters: ledger.getDeadLetters(run.run_id),
            });
        } finally {
            ledger.close();
        }
    });

// ─── CACHE command ────────────────────────────────────────

program
    .command('cache')
    .description('Manage the metadata response cache')
    .argument('<action>', 'Action: clear | stats')
    .action(async (action: string) => {
        const config = await setup({});
        const cache = new ResponseCache(config.cache);

        switch (action) {
            case 'clear':
                cache.clear();
                console.log('Cache cleared.');
                break;
            case 'stats': {
                const stats = cache.getStats();
                console.log(`Cache (${stats.enabled ? 'enabled' : 'disabled'}) at ${stats.directory}: ${stats.entries} entries, ${(stats.bytes / 1024).toFixed(1)} KB`);
                break;
            }
            default:
                console.error(`Unknown action: ${action}. Valid: clear, stats`);
                process.exitCode = 1;
        }
    });

program.parseAsync().catch((error: unknown) => {
    console.error(describeError(error));
    process.exitCode = 1;
});
