/**
 * Per-identifier lifecycle during an indexing run.
 */
export type IdentifierState =
    | 'pending'
    | 'fetching'
    | 'transforming'
    | 'batched'
    | 'indexed'
    | 'fetch_failed'
    | 'transform_failed'
    | 'index_failed';

export type TerminalState = Extract<IdentifierState, 'indexed' | 'fetch_failed' | 'transform_failed' | 'index_failed'>;

/**
 * Outcome of one document within a bulk write.
 */
export type WriteOutcome =
    | { status: 'written' }
    | { status: 'rejected'; reason: string }
    | { status: 'retryable_error'; reason: string };

/**
 * Per-document results of one bulk upsert, keyed by paper_id_v.
 */
export interface BatchResult {
    items: Map<string, WriteOutcome>;
    took: number;
}

/**
 * An identifier excluded from the run, kept for operator follow-up.
 */
export interface DeadLetter {
    paper_id: string;
    state: Exclude<TerminalState, 'indexed'>;
    /** Error class name, e.g. TransformError */
    error: string;
    reason: string;
    attempts: number;
}

export interface RunSummary {
    total: number;
    indexed: number;
    deadLettered: number;
    /** Identifiers that needed at least one retry */
    retried: number;
    /** Identifiers never started because the run was cancelled */
    cancelled: number;
    /** Version documents written */
    documents: number;
    deadLetters: DeadLetter[];
    cancelledIds: string[];
    startedAt: string;
    finishedAt: string;
}

/**
 * What the live index needs before documents can be written.
 */
export type SchemaPlan =
    | { action: 'create' }
    | { action: 'incremental' }
    | { action: 'rebuild'; reason: string };
