/**
 * Error taxonomy shared by the indexing pipeline and the query layer.
 * `retryable` tells the orchestrator whether the backoff policy applies.
 */
export class PaperIndexError extends Error {
    readonly retryable: boolean = false;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'PaperIndexError';
    }
}

/**
 * Metadata could not be fetched. Transient unless the upstream answered
 * with a status that will not change on retry.
 */
export class FetchError extends PaperIndexError {
    override readonly retryable: boolean;

    constructor(
        message: string,
        public readonly status: number,
        retryable = true,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'FetchError';
        this.retryable = retryable;
    }
}

/**
 * The identifier (or document) is unknown. Terminal.
 */
export class NotFoundError extends PaperIndexError {
    constructor(public readonly id: string, message = `No such paper: ${id}`) {
        super(message);
        this.name = 'NotFoundError';
    }
}

/**
 * A source record is malformed, incomplete or references an id outside the
 * closed taxonomy. Terminal: the record is quarantined, never retried.
 */
export class TransformError extends PaperIndexError {
    constructor(
        message: string,
        public readonly paperId: string | null,
        public readonly field?: string
    ) {
        super(message);
        this.name = 'TransformError';
    }
}

export type IndexErrorKind = 'transient' | 'permanent';

/**
 * The engine rejected a write.
 */
export class IndexError extends PaperIndexError {
    override readonly retryable: boolean;

    constructor(
        message: string,
        public readonly kind: IndexErrorKind,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'IndexError';
        this.retryable = kind === 'transient';
    }
}

/**
 * A search request is malformed or references unknown taxonomy values.
 * Surfaced to the caller as a client error.
 */
export class QueryError extends PaperIndexError {
    constructor(message: string, public readonly parameter?: string) {
        super(message);
        this.name = 'QueryError';
    }
}

/**
 * An indexing run could not start: unreadable identifier list, unreachable
 * engine, or a schema rebuild that was not allowed.
 */
export class RunStartError extends PaperIndexError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'RunStartError';
    }
}

/**
 * Render any thrown value as a one-line reason.
 */
export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
