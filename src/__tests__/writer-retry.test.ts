import { describe, it, expect, vi } from 'vitest';
import { classifyItem, IndexWriter } from '../indexing/writer.js';
import { abortableSleep, RetryPolicy, type Sleep } from '../indexing/retry.js';
import { IdentifierTracker, isTerminal } from '../indexing/state.js';
import { DocumentNormalizer } from '../normalize/normalizer.js';
import { createSchemaRegistry } from '../schema/registry.js';
import { FetchError, IndexError } from '../utils/errors.js';
import { failedItem, InMemoryEngine, paperVersions } from './helpers.js';

describe('classifyItem', () => {
    it('should treat 2xx without an error as written', () => {
        expect(classifyItem({ id: 'a', status: 201 })).toEqual({ status: 'written' });
        expect(classifyItem({ id: 'a', status: 200 })).toEqual({ status: 'written' });
    });

    it('should reject mapping failures regardless of status', () => {
        expect(classifyItem(failedItem('a', 400, 'mapper_parsing_exception', 'failed to parse'))).toEqual({
            status: 'rejected',
            reason: 'mapper_parsing_exception: failed to parse',
        });
        expect(classifyItem(failedItem('a', 503, 'strict_dynamic_mapping_exception', 'unknown field'))).toEqual({
            status: 'rejected',
            reason: 'strict_dynamic_mapping_exception: unknown field',
        });
    });

    it('should mark throttling and server errors retryable', () => {
        expect(classifyItem(failedItem('a', 429, 'es_rejected_execution_exception', 'queue full'))).toEqual({
            status: 'retryable_error',
            reason: 'es_rejected_execution_exception: queue full',
        });
        expect(classifyItem(failedItem('a', 503))).toEqual({ status: 'retryable_error', reason: 'status 503' });
    });

    it('should reject other client errors', () => {
        expect(classifyItem(failedItem('a', 404))).toEqual({ status: 'rejected', reason: 'status 404' });
    });
});

describe('IndexWriter', () => {
    const normalizer = new DocumentNormalizer(createSchemaRegistry());
    const documents = normalizer.normalizeVersions(paperVersions('1234.5678', 2)).map((n) => n.document);

    it('should report one outcome per document', async () => {
        const engine = new InMemoryEngine();
        engine.itemFailures.set('1234.5678v2', [failedItem('1234.5678v2', 429, 'es_rejected_execution_exception', 'busy')]);

        const result = await new IndexWriter(engine).upsert(documents);

        expect(result.took).toBe(1);
        expect(result.items.get('1234.5678v1')).toEqual({ status: 'written' });
        expect(result.items.get('1234.5678v2')).toEqual({
            status: 'retryable_error',
            reason: 'es_rejected_execution_exception: busy',
        });
        expect([...engine.documents.keys()]).toEqual(['1234.5678v1']);
    });

    it('should treat documents missing from the response as retryable', async () => {
        const engine = new InMemoryEngine();
        engine.bulkIndex = async () => ({ took: 3, items: [{ id: '1234.5678v1', status: 200 }] });

        const result = await new IndexWriter(engine).upsert(documents);
        expect(result.items.get('1234.5678v2')).toEqual({ status: 'retryable_error', reason: 'missing from bulk response' });
    });

    it('should map a failed request onto every document', async () => {
        const engine = new InMemoryEngine();
        engine.requestFailures.push(new IndexError('Engine unavailable: socket hang up', 'transient'));

        const transient = await new IndexWriter(engine).upsert(documents);
        expect([...transient.items.values()]).toEqual([
            { status: 'retryable_error', reason: 'Engine unavailable: socket hang up' },
            { status: 'retryable_error', reason: 'Engine unavailable: socket hang up' },
        ]);
        expect(transient.took).toBe(0);

        engine.requestFailures.push(new IndexError('Engine responded 400: bad request', 'permanent'));
        const permanent = await new IndexWriter(engine).upsert(documents);
        expect(permanent.items.get('1234.5678v1')).toEqual({ status: 'rejected', reason: 'Engine responded 400: bad request' });
    });

    it('should not call the engine for an empty batch', async () => {
        const engine = new InMemoryEngine();
        const result = await new IndexWriter(engine).upsert([]);
        expect(result.items.size).toBe(0);
        expect(engine.bulkRequests).toEqual([]);
    });
});

describe('RetryPolicy', () => {
    const noSleep = vi.fn<Sleep>(async () => {});

    it('should back off exponentially with capped jitter', () => {
        const policy = new RetryPolicy({ maxAttempts: 5, initialDelayMs: 100, maxDelayMs: 300, random: () => 0 });
        expect(policy.delayFor(1)).toBe(100);
        expect(policy.delayFor(2)).toBe(200);
        expect(policy.delayFor(3)).toBe(300);

        const jittered = new RetryPolicy({ maxAttempts: 5, initialDelayMs: 100, maxDelayMs: 1000, random: () => 1 });
        expect(jittered.delayFor(1)).toBe(150);
    });

    it('should retry retryable failures until success', async () => {
        const sleep = vi.fn<Sleep>(async () => {});
        const onRetry = vi.fn();
        const policy = new RetryPolicy({ maxAttempts: 5, initialDelayMs: 100, maxDelayMs: 1000, random: () => 0, sleep });

        const operation = vi.fn(async (attempt: number) => {
            if (attempt < 3) throw new FetchError('HTTP 503', 503);
            return 'ok';
        });

        await expect(policy.run(operation, { onRetry })).resolves.toBe('ok');
        expect(operation).toHaveBeenCalledTimes(3);
        expect(sleep.mock.calls.map((call) => call[0])).toEqual([100, 200]);
        expect(onRetry.mock.calls.map((call) => [call[1], call[2]])).toEqual([[1, 100], [2, 200]]);
    });

    it('should not retry permanent failures', async () => {
        const policy = new RetryPolicy({ maxAttempts: 5, initialDelayMs: 1, maxDelayMs: 1, sleep: noSleep });
        const operation = vi.fn(async () => {
            throw new FetchError('HTTP 400', 400, false);
        });

        await expect(policy.run(operation)).rejects.toThrow('HTTP 400');
        expect(operation).toHaveBeenCalledTimes(1);
    });

    it('should give up after maxAttempts with the last error', async () => {
        const policy = new RetryPolicy({ maxAttempts: 3, initialDelayMs: 1, maxDelayMs: 1, sleep: noSleep });
        const operation = vi.fn(async (attempt: number) => {
            throw new FetchError(`failure ${attempt}`, 503);
        });

        await expect(policy.run(operation)).rejects.toThrow('failure 3');
        expect(operation).toHaveBeenCalledTimes(3);
    });

    it('should stop retrying once the signal aborts', async () => {
        const controller = new AbortController();
        const policy = new RetryPolicy({
            maxAttempts: 5,
            initialDelayMs: 1,
            maxDelayMs: 1,
            sleep: async () => controller.abort(),
        });
        const operation = vi.fn(async () => {
            throw new FetchError('HTTP 503', 503);
        });

        await expect(policy.run(operation, { signal: controller.signal })).rejects.toThrow('HTTP 503');
        expect(operation).toHaveBeenCalledTimes(1);
    });

    it('should wake an abortable sleep on abort', async () => {
        const controller = new AbortController();
        const sleeping = abortableSleep(60_000, controller.signal);
        controller.abort();
        await expect(sleeping).resolves.toBeUndefined();
        await expect(abortableSleep(60_000, AbortSignal.abort())).resolves.toBeUndefined();
    });
});

describe('IdentifierTracker', () => {
    it('should follow the lifecycle', () => {
        const tracker = new IdentifierTracker('1234.5678');
        tracker.transition('fetching');
        tracker.transition('transforming');
        tracker.transition('batched');
        tracker.transition('indexed');
        expect(tracker.state).toBe('indexed');
        expect(isTerminal(tracker.state)).toBe(true);
    });

    it('should reject skipped or backward transitions', () => {
        const tracker = new IdentifierTracker('1234.5678');
        expect(() => tracker.transition('indexed')).toThrow('Illegal state transition for 1234.5678: pending → indexed');
        tracker.transition('fetch_failed');
        expect(() => tracker.transition('fetching')).toThrow('Illegal state transition');
        expect(isTerminal('batched')).toBe(false);
    });
});
