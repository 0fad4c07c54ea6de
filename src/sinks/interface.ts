/**
 * Event sinks: where a session's thoughts and answer go.
 */

import type { QueryEvent } from '../types/index.js';

export type SinkKind = 'pull' | 'push' | 'null';

export interface EventSink {
    readonly kind: SinkKind;
    /** True once an answer or a failure has been accepted */
    readonly closed: boolean;
    /** Deliver one event; awaited by the producer so order is preserved */
    emit(event: QueryEvent): Promise<void>;
    /** Terminate the sink without an answer */
    fail(error: unknown): void;
}

/**
 * Enforces the terminal rule shared by every sink: one answer or one failure,
 * and nothing accepted after it.
 */
export abstract class TerminatingSink implements EventSink {
    abstract readonly kind: SinkKind;
    private terminated = false;

    get closed(): boolean {
        return this.terminated;
    }

    async emit(event: QueryEvent): Promise<void> {
        if (this.terminated) {
            return;
        }
        if (event.kind === 'answer') {
            this.terminated = true;
        }
        await this.deliver(event);
    }

    fail(error: unknown): void {
        if (this.terminated) {
            return;
        }
        this.terminated = true;
        this.abort(error);
    }

    protected abstract deliver(event: QueryEvent): Promise<void>;

    protected abstract abort(error: unknown): void;
}
