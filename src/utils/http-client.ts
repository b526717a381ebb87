import { getLogger } from './logger.js';

const RETRYABLE_STATUS_CODES = new Set([408, 429, 500, 502, 503, 504]);
const RETRYABLE_ERROR_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'UND_ERR_SOCKET', 'UND_ERR_CONNECT_TIMEOUT']);

export interface RateLimit {
    tokensPerSecond: number;
    maxBurst: number;
}

const DEFAULT_RATE_LIMIT: RateLimit = { tokensPerSecond: 10, maxBurst: 10 };

/**
 * Token bucket. A caller that finds the bucket empty still takes a token
 * (driving the balance negative) and waits until it would have refilled,
 * so concurrent callers are spaced out in arrival order.
 */
class RateLimiter {
    private balance: number;
    private refilledAt = Date.now();

    constructor(private readonly limit: RateLimit) {
        this.balance = limit.maxBurst;
    }

    async take(): Promise<void> {
        const now = Date.now();
        const earned = ((now - this.refilledAt) / 1000) * this.limit.tokensPerSecond;
        this.balance = Math.min(this.limit.maxBurst, this.balance + earned);
        this.refilledAt = now;

        const deficit = 1 - this.balance;
        this.balance -= 1;
        if (deficit > 0) {
            await new Promise((resolve) => setTimeout(resolve, (deficit / this.limit.tokensPerSecond) * 1000));
        }
    }
}

export interface HttpRequestOptions {
    method?: 'GET' | 'HEAD';
    headers?: Record<string, string>;
    timeout?: number;
    /** Rate-limit bucket; also the key for request counts */
    source?: string;
    signal?: AbortSignal;
}

export interface HttpResponse<T = unknown> {
    status: number;
    headers: Record<string, string>;
    data: T;
    ok: boolean;
}

/**
 * A failed request. `status` is 0 when no response arrived.
 */
export class HttpError extends Error {
    constructor(
        message: string,
        public readonly status: number,
        public readonly retryable: boolean,
        public readonly response?: unknown
    ) {
        super(message);
        this.name = 'HttpError';
    }
}

export interface HttpClientOptions {
    timeout?: number;
    version?: string;
    rateLimits?: Record<string, RateLimit>;
}

/**
 * fetch() behind per-source rate limits. Each call is a single attempt;
 * failures come back as HttpError with a retryable verdict.
 */
export class HttpClient {
    private readonly limiters = new Map<string, RateLimiter>();
    private readonly counts = new Map<string, number>();
    private readonly defaultTimeout: number;
    private readonly userAgent: string;
    private readonly rateLimits: Record<string, RateLimit>;
    private readonly logger = getLogger('http');

    constructor(options: HttpClientOptions = {}) {
        this.defaultTimeout = options.timeout ?? 30000;
        this.userAgent = `paperindex/${options.version ?? '0.1.0'}`;
        this.rateLimits = options.rateLimits ?? {};
    }

    async request<T = unknown>(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse<T>> {
        const source = options.source ?? 'default';
        const timeout = options.timeout ?? this.defaultTimeout;
        if (options.signal?.aborted) {
            throw new HttpError(`Request aborted: ${url}`, 0, false);
        }

        await this.limiterFor(source).take();
        this.counts.set(source, (this.counts.get(source) ?? 0) + 1);

        const controller = new AbortController();
        const timer = setTimeout(() => controller.abort(), timeout);
        const forwardAbort = (): void => controller.abort();
        options.signal?.addEventListener('abort', forwardAbort, { once: true });

        try {
            const response = await fetch(url, {
                method: options.method ?? 'GET',
                headers: { 'User-Agent': this.userAgent, Accept: 'application/json', ...options.headers },
                signal: controller.signal,
            });
            const data = await readPayload(response);

            if (!response.ok) {
                const retryable = RETRYABLE_STATUS_CODES.has(response.status);
                this.logger.debug({ url, status: response.status, retryable }, 'HTTP error response');
                throw new HttpError(`HTTP ${response.status}: ${response.statusText}`, response.status, retryable, data);
            }

            const headers: Record<string, string> = {};
            response.headers.forEach((value, key) => {
                headers[key] = value;
            });
            // The caller names the payload shape, as with response.json()
            return { status: response.status, headers, data: data as T, ok: true };
        } catch (error) {
            throw toHttpError(error, url, timeout, options.signal);
        } finally {
            clearTimeout(timer);
            options.signal?.removeEventListener('abort', forwardAbort);
        }
    }

    async get<T = unknown>(url: string, options?: Omit<HttpRequestOptions, 'method'>): Promise<HttpResponse<T>> {
        return this.request<T>(url, { ...options, method: 'GET' });
    }

    getRequestCount(source: string): number {
        return this.counts.get(source) ?? 0;
    }

    /** Requests sent so far, by source */
    getAllRequestCounts(): Record<string, number> {
        return Object.fromEntries(this.counts);
    }

    private limiterFor(source: string): RateLimiter {
        let limiter = this.limiters.get(source);
        if (!limiter) {
            limiter = new RateLimiter(this.rateLimits[source] ?? DEFAULT_RATE_LIMIT);
            this.limiters.set(source, limiter);
        }
        return limiter;
    }
}

async function readPayload(response: Response): Promise<unknown> {
    const contentType = response.headers.get('content-type') ?? '';
    return contentType.includes('application/json') ? response.json() : response.text();
}

function toHttpError(error: unknown, url: string, timeout: number, signal: AbortSignal | undefined): HttpError {
    if (error instanceof HttpError) return error;

    if (error instanceof Error && error.name === 'AbortError') {
        return signal?.aborted
            ? new HttpError(`Request aborted: ${url}`, 0, false)
            : new HttpError(`Request timeout after ${timeout}ms: ${url}`, 0, true);
    }

    const code = systemErrorCode(error);
    return new HttpError(
        `Network error: ${error instanceof Error ? error.message : String(error)}`,
        0,
        code ? RETRYABLE_ERROR_CODES.has(code) : true
    );
}

/**
 * undici reports socket failures as `TypeError('fetch failed')` with the
 * system error in `cause`.
 */
function systemErrorCode(error: unknown): string | undefined {
    for (const candidate of [error, error instanceof Error ? error.cause : undefined]) {
        if (typeof candidate === 'object' && candidate !== null && 'code' in candidate && typeof candidate.code === 'string') {
            return candidate.code;
        }
    }
    return undefined;
}

export function createHttpClient(options?: HttpClientOptions): HttpClient {
    return new HttpClient(options);
}
