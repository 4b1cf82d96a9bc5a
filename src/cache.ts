import cloneDeep from 'clone-deep';

import logger from './logger.js';
import { type EventName, type EventValue, type LedgerEvent, type LedgerState, emptyState } from './state.js';

export type CommitListener = (events: LedgerEvent[], state: LedgerState) => void;

/**
 * In-memory state shared by the token and the staking pool.
 *
 * Mutations happen inside `atomic` scopes. The outermost scope keeps a deep copy of the
 * state taken on entry; if anything throws the copy is put back and the events emitted
 * inside the scope are dropped. Nested scopes join the outer one.
 *
 * Callers must always go through `state` rather than holding on to sub-objects, since a
 * rollback swaps the whole tree.
 */
export class StateCache {
    state: LedgerState;
    readonly events: LedgerEvent[] = [];

    private copy: LedgerState | null = null;
    private depth = 0;
    private pending: LedgerEvent[] = [];
    private listeners: CommitListener[] = [];

    constructor(
        initial: LedgerState = emptyState(),
        private readonly eventLogMax = 10000
    ) {
        this.state = initial;
    }

    get inScope(): boolean {
        return this.depth > 0;
    }

    atomic<T>(fn: () => T): T {
        if (this.depth === 0) {
            this.copy = cloneDeep(this.state);
            this.pending = [];
        }
        this.depth++;
        let result: T;
        try {
            result = fn();
        } catch (err) {
            this.depth--;
            if (this.depth === 0) this.rollback();
            throw err;
        }
        this.depth--;
        if (this.depth === 0) this.commit();
        return result;
    }

    /**
     * Queue an event for the current scope; it is published only if the scope commits
     */
    emit(name: EventName, args: Record<string, EventValue>, timestamp: number): void {
        if (this.depth === 0) {
            throw new Error(`event ${name} emitted outside of an atomic scope`);
        }
        this.state.eventSeq++;
        this.pending.push({ seq: this.state.eventSeq, name, args, timestamp });
    }

    onCommit(listener: CommitListener): void {
        this.listeners.push(listener);
    }

    /**
     * Replace the whole state, e.g. after loading it from the database
     */
    load(state: LedgerState): void {
        if (this.depth > 0) throw new Error('cannot load state inside an atomic scope');
        this.state = state;
    }

    private commit(): void {
        const committed = this.pending;
        this.copy = null;
        this.pending = [];
        if (committed.length === 0) return;
        this.events.push(...committed);
        if (this.events.length > this.eventLogMax) {
            this.events.splice(0, this.events.length - this.eventLogMax);
        }
        for (const listener of this.listeners) {
            try {
                listener(committed, this.state);
            } catch (err) {
                logger.error(`[cache:commit] Commit listener failed: ${err instanceof Error ? err.message : String(err)}`);
            }
        }
    }

    private rollback(): void {
        if (this.copy) this.state = this.copy;
        logger.debug(`[cache:rollback] Discarded ${this.pending.length} pending event(s)`);
        this.copy = null;
        this.pending = [];
    }
}

export default StateCache;
