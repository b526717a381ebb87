import type { BatchResult, PaperDocument, WriteOutcome } from '../types/index.js';
import { isTransientStatus, type BulkItemResult, type SearchEngine } from '../engine/elasticsearch.js';
import { describeError, IndexError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

/**
 * Engine error types that mean the document itself does not fit the
 * mapping. Permanent regardless of status.
 */
const PERMANENT_ERROR_TYPES = new Set([
    'mapper_parsing_exception',
    'document_parsing_exception',
    'strict_dynamic_mapping_exception',
    'illegal_argument_exception',
]);

/**
 * Classify one bulk item.
 */
export function classifyItem(item: BulkItemResult): WriteOutcome {
    if (item.status >= 200 && item.status < 300 && !item.error) {
        return { status: 'written' };
    }

    const reason = item.error ? `${item.error.type}: ${item.error.reason}` : `status ${item.status}`;
    if (item.error && PERMANENT_ERROR_TYPES.has(item.error.type)) {
        return { status: 'rejected', reason };
    }
    return isTransientStatus(item.status)
        ? { status: 'retryable_error', reason }
        : { status: 'rejected', reason };
}

/**
 * Stateless translation of a document batch into one bulk upsert and of
 * the engine's answer into per-document outcomes. Never retries.
 */
export class IndexWriter {
    private readonly logger = getLogger('writer');

    constructor(private readonly engine: SearchEngine) {}

    async upsert(batch: readonly PaperDocument[]): Promise<BatchResult> {
        const items = new Map<string, WriteOutcome>();
        if (batch.length === 0) return { items, took: 0 };

        try {
            const response = await this.engine.bulkIndex(batch);
            for (const item of response.items) {
                items.set(item.id, classifyItem(item));
            }
            // A document the engine did not report on has not been written
            for (const document of batch) {
                if (!items.has(document.paper_id_v)) {
                    items.set(document.paper_id_v, { status: 'retryable_error', reason: 'missing from bulk response' });
                }
            }
            this.logger.debug({ documents: batch.length, took: response.took }, 'Bulk upsert completed');
            return { items, took: response.took };
        } catch (error) {
            const transient = error instanceof IndexError ? error.kind === 'transient' : false;
            const reason = describeError(error);
            this.logger.warn({ documents: batch.length, transient, reason }, 'Bulk request failed');

            const outcome: WriteOutcome = transient
                ? { status: 'retryable_error', reason }
                : { status: 'rejected', reason };
            for (const document of batch) {
                items.set(document.paper_id_v, outcome);
            }
            return { items, took: 0 };
        }
    }
}
