import { describe, it, expect, beforeEach } from 'vitest';
import { IndexingOrchestrator, type OrchestratorOptions } from '../indexing/orchestrator.js';
import { IndexWriter } from '../indexing/writer.js';
import { RetryPolicy } from '../indexing/retry.js';
import { DocumentNormalizer } from '../normalize/normalizer.js';
import { createSchemaRegistry } from '../schema/registry.js';
import { FetchError } from '../utils/errors.js';
import type { MetadataFetcher } from '../sources/metadata-fetcher.js';
import type { IdentifierState } from '../types/index.js';
import { FakeFetcher, failedItem, InMemoryEngine, paperRecord, paperVersions } from './helpers.js';

const normalizer = new DocumentNormalizer(createSchemaRegistry());

describe('IndexingOrchestrator', () => {
    let engine: InMemoryEngine;

    beforeEach(() => {
        engine = new InMemoryEngine();
    });

    function orchestrator(fetcher: MetadataFetcher, options: Partial<OrchestratorOptions> = {}): IndexingOrchestrator {
        return new IndexingOrchestrator({
            fetcher,
            normalizer,
            writer: new IndexWriter(engine),
            retry: new RetryPolicy({ maxAttempts: 3, initialDelayMs: 1, maxDelayMs: 1, sleep: async () => {} }),
            batchSize: 10,
            concurrency: 4,
            ...options,
        });
    }

    it('should index every version of a paper', async () => {
        const fetcher = new FakeFetcher({
            '1234.5678': [
                paperRecord('1234.5678', 1, { is_current: false, primary_classification: { category: { id: 'cs.AI' } } }),
                paperRecord('1234.5678', 2, { primary_classification: { category: { id: 'cs.LG' } } }),
            ],
        });

        const summary = await orchestrator(fetcher).run(['1234.5678']);

        expect(summary).toMatchObject({ total: 1, indexed: 1, deadLettered: 0, retried: 0, cancelled: 0, documents: 2 });
        const v1 = engine.documents.get('1234.5678v1');
        const v2 = engine.documents.get('1234.5678v2');
        expect(v1?.is_current).toBe(false);
        expect(v1?.latest).toBe('1234.5678v2');
        expect(v2?.is_current).toBe(true);
        expect(v2?.primary_classification.category.id).toBe('cs.LG');
    });

    it('should dead-letter identifier-scoped failures and keep going', async () => {
        const fetcher = new FakeFetcher({
            '1111.1111': paperVersions('1111.1111', 1),
            '3333.3333': [paperRecord('3333.3333', 1, { title: '' })],
        });

        const summary = await orchestrator(fetcher).run(['1111.1111', '2222.2222', '3333.3333'], ['bogus']);

        expect(summary.total).toBe(4);
        expect(summary.indexed).toBe(1);
        expect(summary.deadLettered).toBe(3);

        const byId = new Map(summary.deadLetters.map((deadLetter) => [deadLetter.paper_id, deadLetter]));
        expect(byId.get('bogus')).toEqual({
            paper_id: 'bogus',
            state: 'transform_failed',
            error: 'TransformError',
            reason: '"bogus" is not a valid identifier',
            attempts: 0,
        });
        expect(byId.get('2222.2222')).toEqual({
            paper_id: '2222.2222',
            state: 'fetch_failed',
            error: 'NotFoundError',
            reason: 'No such paper: 2222.2222',
            attempts: 1,
        });
        expect(byId.get('3333.3333')).toEqual({
            paper_id: '3333.3333',
            state: 'transform_failed',
            error: 'TransformError',
            reason: 'title is required',
            attempts: 1,
        });
        expect([...engine.documents.keys()]).toEqual(['1111.1111v1']);
    });

    it('should retry transient fetch failures', async () => {
        const fetcher = new FakeFetcher(
            { '1111.1111': paperVersions('1111.1111', 1) },
            { '1111.1111': [new FetchError('HTTP 503: Service Unavailable', 503)] }
        );

        const summary = await orchestrator(fetcher).run(['1111.1111']);

        expect(summary.indexed).toBe(1);
        expect(summary.retried).toBe(1);
        expect(fetcher.calls).toEqual(['1111.1111', '1111.1111']);
    });

    it('should dead-letter a fetch that keeps failing', async () => {
        const fetcher = new FakeFetcher(
            { '1111.1111': paperVersions('1111.1111', 1) },
            { '1111.1111': [1, 2, 3].map((n) => new FetchError(`HTTP 503 (${n})`, 503)) }
        );

        const summary = await orchestrator(fetcher).run(['1111.1111']);

        expect(summary.deadLetters).toEqual([{
            paper_id: '1111.1111',
            state: 'fetch_failed',
            error: 'FetchError',
            reason: 'HTTP 503 (3)',
            attempts: 3,
        }]);
        expect(summary.retried).toBe(1);
    });

    it('should resend only documents with transient write errors', async () => {
        engine.itemFailures.set('1111.1111v1', [failedItem('1111.1111v1', 429, 'es_rejected_execution_exception', 'busy')]);
        const fetcher = new FakeFetcher({ '1111.1111': paperVersions('1111.1111', 2) });

        const summary = await orchestrator(fetcher).run(['1111.1111']);

        expect(summary.indexed).toBe(1);
        expect(summary.retried).toBe(1);
        expect(engine.bulkRequests).toEqual([['1111.1111v1', '1111.1111v2'], ['1111.1111v1']]);
        expect(engine.documents.size).toBe(2);
    });

    it('should cap every bulk request at batchSize documents', async () => {
        const fetcher = new FakeFetcher({
            '1111.1111': paperVersions('1111.1111', 4),
            '2222.2222': paperVersions('2222.2222', 4),
        });

        const summary = await orchestrator(fetcher, { batchSize: 2 }).run(['1111.1111', '2222.2222']);

        expect(summary).toMatchObject({ indexed: 2, documents: 8 });
        expect(engine.bulkRequests).toEqual([
            ['1111.1111v1', '1111.1111v2'],
            ['1111.1111v3', '1111.1111v4'],
            ['2222.2222v1', '2222.2222v2'],
            ['2222.2222v3', '2222.2222v4'],
        ]);
    });

    it('should dead-letter an identifier whose document is rejected', async () => {
        engine.itemFailures.set('1111.1111v1', [failedItem('1111.1111v1', 400, 'mapper_parsing_exception', 'bad field')]);
        const fetcher = new FakeFetcher({
            '1111.1111': paperVersions('1111.1111', 2),
            '2222.2222': paperVersions('2222.2222', 1),
        });

        const summary = await orchestrator(fetcher).run(['1111.1111', '2222.2222']);

        expect(summary.indexed).toBe(1);
        expect(summary.deadLetters).toEqual([{
            paper_id: '1111.1111',
            state: 'index_failed',
            error: 'IndexError',
            reason: 'mapper_parsing_exception: bad field',
            attempts: 1,
        }]);
        expect(engine.bulkRequests).toHaveLength(1);
    });

    it('should give up on writes after maxAttempts', async () => {
        engine.itemFailures.set('1111.1111v1', [1, 2, 3].map(() => failedItem('1111.1111v1', 503)));
        const fetcher = new FakeFetcher({ '1111.1111': paperVersions('1111.1111', 1) });

        const summary = await orchestrator(fetcher).run(['1111.1111']);

        expect(summary.deadLetters).toEqual([{
            paper_id: '1111.1111',
            state: 'index_failed',
            error: 'IndexError',
            reason: 'status 503',
            attempts: 3,
        }]);
        expect(engine.bulkRequests).toHaveLength(3);
    });

    it('should be idempotent across runs', async () => {
        const fetcher = new FakeFetcher({ '1111.1111': paperVersions('1111.1111', 2) });
        const run = orchestrator(fetcher);

        const first = await run.run(['1111.1111']);
        const second = await run.run(['1111.1111']);

        expect(first.indexed).toBe(1);
        expect(second.indexed).toBe(1);
        expect(second.documents).toBe(2);
        expect(engine.documents.size).toBe(2);
    });

    it('should skip identifiers indexed earlier', async () => {
        const fetcher = new FakeFetcher({
            '1111.1111': paperVersions('1111.1111', 1),
            '2222.2222': paperVersions('2222.2222', 1),
        });

        const summary = await orchestrator(fetcher, { skip: new Set(['1111.1111']) }).run(['1111.1111', '2222.2222']);

        expect(summary.indexed).toBe(2);
        expect(summary.documents).toBe(1);
        expect(fetcher.calls).toEqual(['2222.2222']);
    });

    it('should start nothing new once cancelled', async () => {
        const controller = new AbortController();
        const fetcher = new FakeFetcher({
            '1111.1111': paperVersions('1111.1111', 1),
            '2222.2222': paperVersions('2222.2222', 1),
            '3333.3333': paperVersions('3333.3333', 1),
        });
        fetcher.onFetch = (paperId) => {
            if (paperId === '1111.1111') controller.abort();
        };

        const summary = await orchestrator(fetcher, { batchSize: 1, signal: controller.signal })
            .run(['1111.1111', '2222.2222', '3333.3333']);

        expect(summary.indexed).toBe(1);
        expect(summary.cancelled).toBe(2);
        expect(summary.cancelledIds).toEqual(['2222.2222', '3333.3333']);
        expect(summary.deadLettered).toBe(0);
        expect(fetcher.calls).toEqual(['1111.1111']);
    });

    it('should bound concurrent fetches', async () => {
        let active = 0;
        let peak = 0;
        const fetcher: MetadataFetcher = {
            async fetchVersions(paperId) {
                active += 1;
                peak = Math.max(peak, active);
                await new Promise((resolve) => setTimeout(resolve, 5));
                active -= 1;
                return paperVersions(paperId, 1);
            },
        };
        const ids = ['1000.0001', '1000.0002', '1000.0003', '1000.0004', '1000.0005', '1000.0006'];

        const summary = await orchestrator(fetcher, { concurrency: 2 }).run(ids);

        expect(summary.indexed).toBe(6);
        expect(peak).toBe(2);
    });

    it('should report every state change through hooks', async () => {
        const states: IdentifierState[] = [];
        const fetcher = new FakeFetcher({ '1111.1111': paperVersions('1111.1111', 1) });

        await orchestrator(fetcher, {
            hooks: { onStateChange: (paperId, state) => states.push(state) },
        }).run(['1111.1111']);

        expect(states).toEqual(['fetching', 'transforming', 'batched', 'indexed']);
    });
});
