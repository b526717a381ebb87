import pLimit from 'p-limit';
import type {
    DeadLetter,
    IdentifierState,
    PaperDocument,
    RawMetadataRecord,
    RunSummary,
    WriteOutcome,
} from '../types/index.js';
import type { MetadataFetcher } from '../sources/metadata-fetcher.js';
import type { DocumentNormalizer } from '../normalize/normalizer.js';
import type { IndexWriter } from './writer.js';
import type { RetryPolicy } from './retry.js';
import { IdentifierTracker } from './state.js';
import { describeError, TransformError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

export interface OrchestratorHooks {
    onStateChange?: (paperId: string, state: IdentifierState, attempts: number) => void;
    onDeadLetter?: (deadLetter: DeadLetter) => void;
}

export interface OrchestratorOptions {
    fetcher: MetadataFetcher;
    normalizer: DocumentNormalizer;
    writer: IndexWriter;
    retry: RetryPolicy;
    batchSize: number;
    concurrency: number;
    signal?: AbortSignal;
    /** Identifiers already indexed; reported as indexed without any work */
    skip?: ReadonlySet<string>;
    hooks?: OrchestratorHooks;
}

interface Work {
    paperId: string;
    tracker: IdentifierTracker;
    attempts: number;
    documents: PaperDocument[];
}

type Prepared =
    | { kind: 'ready'; work: Work }
    | { kind: 'failed' }
    | { kind: 'cancelled'; paperId: string };

/**
 * Drives an indexing run: identifiers are chunked into batches, fetched
 * and normalized under a bounded pool, then written in bulk requests of at
 * most `batchSize` documents. Identifier-scoped failures are dead-lettered,
 * never thrown.
 */
export class IndexingOrchestrator {
    private readonly logger = getLogger('orchestrator');
    private readonly batchSize: number;
    private readonly limit: ReturnType<typeof pLimit>;

    private deadLetters: DeadLetter[] = [];
    private cancelledIds: string[] = [];
    private retriedIds = new Set<string>();
    private indexed = 0;
    private documents = 0;

    constructor(private readonly options: OrchestratorOptions) {
        this.batchSize = Math.max(1, Math.floor(options.batchSize));
        this.limit = pLimit(Math.max(1, Math.min(Math.floor(options.concurrency), this.batchSize)));
    }

    /**
     * Index `ids`. `invalid` lines from the identifier list are
     * dead-lettered as TransformError without being fetched.
     */
    async run(ids: readonly string[], invalid: readonly string[] = []): Promise<RunSummary> {
        const startedAt = new Date().toISOString();
        this.deadLetters = [];
        this.cancelledIds = [];
        this.retriedIds = new Set();
        this.indexed = 0;
        this.documents = 0;

        for (const line of invalid) {
            this.deadLetter({
                paper_id: line,
                state: 'transform_failed',
                error: 'TransformError',
                reason: `"${line}" is not a valid identifier`,
                attempts: 0,
            });
        }

        const todo: string[] = [];
        for (const paperId of ids) {
            if (this.options.skip?.has(paperId)) {
                this.indexed += 1;
            } else {
                todo.push(paperId);
            }
        }
        if (todo.length < ids.length) {
            this.logger.info({ skipped: ids.length - todo.length }, 'Skipping identifiers indexed by earlier runs');
        }

        const batchCount = Math.ceil(todo.length / this.batchSize);
        for (let i = 0; i < todo.length; i += this.batchSize) {
            const batch = todo.slice(i, i + this.batchSize);
            if (this.options.signal?.aborted) {
                this.cancelledIds.push(...batch);
                continue;
            }
            this.logger.info({ batch: i / this.batchSize + 1, of: batchCount, size: batch.length }, 'Processing batch');
            await this.processBatch(batch);
        }

        const summary: RunSummary = {
            total: ids.length + invalid.length,
            indexed: this.indexed,
            deadLettered: this.deadLetters.length,
            retried: this.retriedIds.size,
            cancelled: this.cancelledIds.length,
            documents: this.documents,
            deadLetters: this.deadLetters,
            cancelledIds: this.cancelledIds,
            startedAt,
            finishedAt: new Date().toISOString(),
        };

        this.logger.info({
            total: summary.total,
            indexed: summary.indexed,
            deadLettered: summary.deadLettered,
            retried: summary.retried,
            cancelled: summary.cancelled,
        }, 'Indexing run finished');

        return summary;
    }

    private async processBatch(batch: string[]): Promise<void> {
        const prepared = await Promise.all(batch.map((paperId) => this.limit(() => this.prepare(paperId))));

        const ready: Work[] = [];
        for (const result of prepared) {
            if (result.kind === 'ready') ready.push(result.work);
            else if (result.kind === 'cancelled') this.cancelledIds.push(result.paperId);
        }

        if (ready.length > 0) {
            await this.write(ready);
        }
    }

    /**
     * Fetch and normalize one identifier.
     */
    private async prepare(paperId: string): Promise<Prepared> {
        if (this.options.signal?.aborted) {
            return { kind: 'cancelled', paperId };
        }

        const work: Work = { paperId, tracker: new IdentifierTracker(paperId), attempts: 0, documents: [] };
        const { fetcher, normalizer, retry, signal } = this.options;

        this.move(work, 'fetching');
        let records: RawMetadataRecord[];
        try {
            records = await retry.run(
                (attempt) => {
                    work.attempts = attempt;
                    return fetcher.fetchVersions(paperId, signal);
                },
                {
                    signal,
                    onRetry: (error, attempt, delayMs) => {
                        this.retriedIds.add(paperId);
                        this.logger.warn({ paperId, attempt, delayMs, reason: describeError(error) }, 'Fetch failed, backing off');
                    },
                }
            );
        } catch (error) {
            this.fail(work, 'fetch_failed', error);
            return { kind: 'failed' };
        }

        this.move(work, 'transforming');
        try {
            if (records.length === 0) {
                throw new TransformError('no metadata records returned', paperId);
            }
            for (const { document, warnings } of normalizer.normalizeVersions(records)) {
                if (document.paper_id !== paperId) {
                    throw new TransformError(`record for ${document.paper_id} returned for ${paperId}`, paperId, 'paper_id');
                }
                for (const warning of warnings) {
                    this.logger.warn({ paperId, version: document.version, warning }, 'Accepted questionable metadata');
                }
                work.documents.push(document);
            }
        } catch (error) {
            work.attempts = 1;
            this.fail(work, 'transform_failed', error);
            return { kind: 'failed' };
        }

        this.move(work, 'batched');
        return { kind: 'ready', work };
    }

    /**
     * Write every document of the ready identifiers. Only documents with
     * retryable errors are resent; an identifier is indexed once all of its
     * version documents are written.
     */
    private async write(ready: Work[]): Promise<void> {
        const { retry, signal } = this.options;

        const owner = new Map<string, Work>();
        for (const work of ready) {
            work.attempts = 0;
            for (const document of work.documents) owner.set(document.paper_id_v, work);
        }

        const written = new Set<string>();
        const failures = new Map<Work, string>();
        let pending = ready.flatMap((work) => work.documents);

        for (let attempt = 1; pending.length > 0; attempt++) {
            const outcomes = await this.upsertChunked(pending);
            const retryable: PaperDocument[] = [];
            const reasons = new Map<Work, string>();

            for (const document of pending) {
                const work = owner.get(document.paper_id_v);
                if (!work) continue;
                work.attempts = attempt;

                const outcome: WriteOutcome = outcomes.get(document.paper_id_v)
                    ?? { status: 'retryable_error', reason: 'missing from batch result' };
                if (outcome.status === 'written') {
                    written.add(document.paper_id_v);
                } else if (outcome.status === 'rejected') {
                    failures.set(work, outcome.reason);
                } else {
                    reasons.set(work, outcome.reason);
                    retryable.push(document);
                }
            }

            pending = retryable.filter((document) => {
                const work = owner.get(document.paper_id_v);
                return work !== undefined && !failures.has(work);
            });
            if (pending.length === 0) break;

            if (!retry.canRetry(attempt) || signal?.aborted) {
                for (const document of pending) {
                    const work = owner.get(document.paper_id_v);
                    if (work) failures.set(work, reasons.get(work) ?? 'retry attempts exhausted');
                }
                break;
            }

            for (const document of pending) {
                const work = owner.get(document.paper_id_v);
                if (work) this.retriedIds.add(work.paperId);
            }
            const delayMs = await retry.wait(attempt, signal);
            this.logger.warn({ documents: pending.length, attempt, delayMs }, 'Retrying documents with transient errors');
        }

        for (const work of ready) {
            const reason = failures.get(work);
            if (reason !== undefined) {
                this.deadLetter({
                    paper_id: work.paperId,
                    state: 'index_failed',
                    error: 'IndexError',
                    reason,
                    attempts: work.attempts,
                }, work);
                continue;
            }
            if (work.documents.every((document) => written.has(document.paper_id_v))) {
                this.move(work, 'indexed');
                this.indexed += 1;
                this.documents += work.documents.length;
            }
        }
    }

    /**
     * One bulk request per `batchSize` documents; a paper with many versions
     * can span requests.
     */
    private async upsertChunked(documents: PaperDocument[]): Promise<Map<string, WriteOutcome>> {
        const outcomes = new Map<string, WriteOutcome>();
        for (let i = 0; i < documents.length; i += this.batchSize) {
            const result = await this.options.writer.upsert(documents.slice(i, i + this.batchSize));
            for (const [id, outcome] of result.items) outcomes.set(id, outcome);
        }
        return outcomes;
    }

    private move(work: Work, state: IdentifierState): void {
        work.tracker.transition(state);
        this.options.hooks?.onStateChange?.(work.paperId, state, work.attempts);
    }

    private fail(work: Work, state: 'fetch_failed' | 'transform_failed', error: unknown): void {
        this.deadLetter({
            paper_id: work.paperId,
            state,
            error: error instanceof Error ? error.name : 'Error',
            reason: describeError(error),
            attempts: work.attempts,
        }, work);
    }

    private deadLetter(deadLetter: DeadLetter, work?: Work): void {
        if (work) this.move(work, deadLetter.state);
        this.deadLetters.push(deadLetter);
        this.options.hooks?.onDeadLetter?.(deadLetter);
        this.logger.warn({
            paperId: deadLetter.paper_id,
            state: deadLetter.state,
            error: deadLetter.error,
            reason: deadLetter.reason,
        }, 'Identifier dead-lettered');
    }
}
