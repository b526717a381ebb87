import type { RetryConfig } from '../types/index.js';
import { PaperIndexError } from '../utils/errors.js';

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Sleep for `ms`, waking up early (without rejecting) when `signal` aborts.
 */
export const abortableSleep: Sleep = (ms, signal) =>
    new Promise((resolve) => {
        if (signal?.aborted) {
            resolve();
            return;
        }
        const onAbort = (): void => {
            clearTimeout(timer);
            resolve();
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal?.addEventListener('abort', onAbort, { once: true });
    });

export interface RetryPolicyOptions extends RetryConfig {
    /** Source of jitter in [0, 1) */
    random?: () => number;
    sleep?: Sleep;
}

export interface RetryRunOptions {
    signal?: AbortSignal;
    /** Defaults to the error's own `retryable` flag */
    isRetryable?: (error: unknown) => boolean;
    onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

/**
 * The one backoff policy of an indexing run, shared by the fetch and index
 * stages. Attempts are 1-based; `maxAttempts` counts the first try.
 */
export class RetryPolicy {
    readonly maxAttempts: number;
    private readonly initialDelayMs: number;
    private readonly maxDelayMs: number;
    private readonly random: () => number;
    private readonly sleep: Sleep;

    constructor(options: RetryPolicyOptions) {
        this.maxAttempts = Math.max(1, options.maxAttempts);
        this.initialDelayMs = options.initialDelayMs;
        this.maxDelayMs = options.maxDelayMs;
        this.random = options.random ?? Math.random;
        this.sleep = options.sleep ?? abortableSleep;
    }

    /**
     * Exponential backoff with up to 50% jitter after failed attempt `attempt`.
     */
    delayFor(attempt: number): number {
        const exponential = this.initialDelayMs * Math.pow(2, attempt - 1);
        const jitter = this.random() * exponential * 0.5;
        return Math.min(this.maxDelayMs, Math.round(exponential + jitter));
    }

    canRetry(attempt: number): boolean {
        return attempt < this.maxAttempts;
    }

    /**
     * Back off after failed attempt `attempt`. Resolves early on abort.
     */
    async wait(attempt: number, signal?: AbortSignal): Promise<number> {
        const delay = this.delayFor(attempt);
        await this.sleep(delay, signal);
        return delay;
    }

    /**
     * Run `operation` until it succeeds, fails with a non-retryable error,
     * runs out of attempts, or the signal aborts. Rejects with the last error.
     */
    async run<T>(operation: (attempt: number) => Promise<T>, options: RetryRunOptions = {}): Promise<T> {
        const isRetryable = options.isRetryable ?? defaultIsRetryable;

        for (let attempt = 1; ; attempt++) {
            try {
                return await operation(attempt);
            } catch (error) {
                if (!isRetryable(error) || !this.canRetry(attempt) || options.signal?.aborted) {
                    throw error;
                }
                const delay = this.delayFor(attempt);
                options.onRetry?.(error, attempt, delay);
                await this.sleep(delay, options.signal);
                if (options.signal?.aborted) throw error;
            }
        }
    }
}

function defaultIsRetryable(error: unknown): boolean {
    return error instanceof PaperIndexError && error.retryable;
}
