import type { IdentifierState, TerminalState } from '../types/index.js';

const TRANSITIONS: Record<IdentifierState, readonly IdentifierState[]> = {
    pending: ['fetching', 'fetch_failed'],
    fetching: ['transforming', 'fetch_failed'],
    transforming: ['batched', 'transform_failed'],
    batched: ['indexed', 'index_failed'],
    indexed: [],
    fetch_failed: [],
    transform_failed: [],
    index_failed: [],
};

export function isTerminal(state: IdentifierState): state is TerminalState {
    return TRANSITIONS[state].length === 0;
}

/**
 * Strictly sequential lifecycle of one identifier within a run.
 * An illegal transition is a bug in the orchestrator and throws.
 */
export class IdentifierTracker {
    private current: IdentifierState = 'pending';

    constructor(readonly paperId: string) {}

    get state(): IdentifierState {
        return this.current;
    }

    transition(to: IdentifierState): void {
        const from = this.current;
        if (!TRANSITIONS[from].includes(to)) {
            throw new Error(`Illegal state transition for ${this.paperId}: ${from} → ${to}`);
        }
        this.current = to;
    }
}
