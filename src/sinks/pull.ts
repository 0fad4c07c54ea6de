/**
 * Pull sink: a queue drained by exactly one consumer as an async sequence.
 */

import type { QueryEvent } from '../types/index.js';
import { createGenericError } from '../types/index.js';
import { TerminatingSink } from './interface.js';

const END = Symbol('end');

type Entry = QueryEvent | typeof END;

export class PullSink extends TerminatingSink implements AsyncIterable<QueryEvent> {
    readonly kind = 'pull' as const;

    private buffer: Entry[] = [];
    private waiter: ((entry: Entry) => void) | null = null;
    private consumed = false;
    private detached = false;
    private failure: unknown = undefined;
    private failed = false;

    /** Events waiting for the consumer */
    get pending(): number {
        return this.buffer.filter(entry => entry !== END).length;
    }

    /** True once the consumer has stopped, early or not */
    get isDetached(): boolean {
        return this.detached;
    }

    get error(): unknown {
        return this.failure;
    }

    get hasFailed(): boolean {
        return this.failed;
    }

    protected async deliver(event: QueryEvent): Promise<void> {
        this.push(event);
    }

    protected abort(error: unknown): void {
        this.failed = true;
        this.failure = error;
        this.push(END);
    }

    private push(entry: Entry): void {
        if (this.detached) {
            return;
        }
        if (this.waiter) {
            const resolve = this.waiter;
            this.waiter = null;
            resolve(entry);
            return;
        }
        this.buffer.push(entry);
    }

    /**
     * Stop accepting events and drop the buffer. A pending or later read ends
     * the sequence.
     */
    detach(): void {
        this.detached = true;
        this.buffer = [];
        const waiter = this.waiter;
        this.waiter = null;
        waiter?.(END);
    }

    private next(): Promise<Entry> {
        const entry = this.buffer.shift();
        if (entry !== undefined) {
            return Promise.resolve(entry);
        }
        if (this.detached) {
            return Promise.resolve(END);
        }
        return new Promise<Entry>(resolve => {
            this.waiter = resolve;
        });
    }

    /**
     * Yields thoughts in order, then the answer, then stops. A failure ends the
     * sequence without an answer; the failure itself is reported by whoever owns
     * the producing task.
     */
    async *[Symbol.asyncIterator](): AsyncGenerator<QueryEvent, void, undefined> {
        if (this.consumed) {
            throw createGenericError('INVALID_STATE', 'Pull sequence can only be consumed once');
        }
        this.consumed = true;

        try {
            while (true) {
                const entry = await this.next();
                if (entry === END) {
                    return;
                }
                yield entry;
                if (entry.kind === 'answer') {
                    return;
                }
            }
        } finally {
            this.detached = true;
            this.buffer = [];
            this.waiter = null;
        }
    }
}
