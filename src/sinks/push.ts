/**
 * Push sink: sends each event as a JSON frame to a registered channel.
 */

import type { QueryEvent } from '../types/index.js';
import { ChatException, createChannelClosedError, isChatException } from '../types/index.js';
import type { ChannelRegistry } from '../transport/registry.js';
import { withTimeout } from '../utils/timeout.js';
import { TerminatingSink } from './interface.js';

export interface PushSinkOptions {
    /** Upper bound on a single frame send */
    sendTimeoutMs?: number;
}

export const DEFAULT_SEND_TIMEOUT_MS = 5000;

/**
 * The producer awaits every send, so frames keep their order, but no send can
 * hold it longer than sendTimeoutMs. The first failed send abandons delivery
 * for the rest of the session; the producer is never told.
 */
export class PushSink extends TerminatingSink {
    readonly kind = 'push' as const;

    private sent = 0;
    private abandonedWith: ChatException | null = null;
    private readonly sendTimeoutMs: number;

    constructor(
        private readonly registry: ChannelRegistry,
        readonly channelId: string,
        options: PushSinkOptions = {}
    ) {
        super();
        this.sendTimeoutMs = options.sendTimeoutMs ?? DEFAULT_SEND_TIMEOUT_MS;
    }

    get framesSent(): number {
        return this.sent;
    }

    get abandoned(): boolean {
        return this.abandonedWith !== null;
    }

    get abandonReason(): ChatException | null {
        return this.abandonedWith;
    }

    protected async deliver(event: QueryEvent): Promise<void> {
        if (this.abandonedWith) {
            return;
        }
        const frame = JSON.stringify({ kind: event.kind, text: event.text });
        try {
            await withTimeout(
                this.registry.send(this.channelId, frame),
                this.sendTimeoutMs,
                () => createChannelClosedError(this.channelId, `send timed out after ${this.sendTimeoutMs}ms`)
            );
            this.sent++;
        } catch (error) {
            this.abandon(isChatException(error)
                ? error
                : createChannelClosedError(this.channelId, error instanceof Error ? error.message : String(error)));
        }
    }

    protected abort(_error: unknown): void {
        // Frames only carry thoughts and answers; the failure reaches the caller through the query itself
    }

    private abandon(error: ChatException): void {
        this.abandonedWith = error;
        console.error(`Push delivery abandoned after ${this.sent} frame(s): ${error.message}`);
    }
}
