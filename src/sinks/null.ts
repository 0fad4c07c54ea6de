import type { QueryEvent } from '../types/index.js';
import { TerminatingSink } from './interface.js';

/**
 * Discards everything. Used for blocking queries, where only the returned
 * answer matters.
 */
export class NullSink extends TerminatingSink {
    readonly kind = 'null' as const;

    protected async deliver(_event: QueryEvent): Promise<void> {
        // discarded
    }

    protected abort(_error: unknown): void {
        // nothing to release
    }
}
