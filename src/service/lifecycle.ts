/**
 * Per-query lifecycle.
 *
 * FETCHING → PROMPTING → DISPATCHED → {STREAMING | BLOCKED} → {COMPLETED | FAILED}
 * Any non-terminal state may fail.
 */

import type { QueryState, QueryTransition } from '../types/index.js';
import { createGenericError } from '../types/index.js';

const TRANSITIONS: Record<QueryState, readonly QueryState[]> = {
    FETCHING: ['PROMPTING', 'FAILED'],
    PROMPTING: ['DISPATCHED', 'FAILED'],
    DISPATCHED: ['STREAMING', 'BLOCKED', 'FAILED'],
    STREAMING: ['COMPLETED', 'FAILED'],
    BLOCKED: ['COMPLETED', 'FAILED'],
    COMPLETED: [],
    FAILED: [],
};

export type TransitionListener = (transition: QueryTransition) => void;

export class QueryRun {
    private current: QueryState | null = null;
    readonly history: QueryTransition[] = [];

    constructor(
        readonly id: string,
        private readonly listener?: TransitionListener
    ) { }

    get state(): QueryState | null {
        return this.current;
    }

    get terminal(): boolean {
        return this.current === 'COMPLETED' || this.current === 'FAILED';
    }

    transition(to: QueryState): void {
        const from = this.current;
        const allowed = from === null ? to === 'FETCHING' : TRANSITIONS[from].includes(to);
        if (!allowed) {
            throw createGenericError('INVALID_STATE',
                `Query ${this.id} cannot move from ${from ?? 'start'} to ${to}`);
        }
        this.current = to;
        const transition: QueryTransition = { queryId: this.id, from, to, at: Date.now() };
        this.history.push(transition);
        this.listener?.(transition);
    }

    /**
     * Move to FAILED unless the run already ended.
     */
    fail(): void {
        if (this.current !== null && !this.terminal) {
            this.transition('FAILED');
        }
    }
}
