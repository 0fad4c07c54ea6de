/**
 * Push channels.
 *
 * A channel is a persistent, identified destination for text frames: an MCP
 * client receiving notifications, or a terminal in the CLI.
 */

import { createChannelClosedError } from '../types/index.js';

export interface Channel {
    readonly id: string;
    readonly open: boolean;
    send(payload: string): Promise<void>;
    close(): void;
}

export type FrameWriter = (payload: string) => Promise<void> | void;

/**
 * Channel that hands each frame to a writer function until closed.
 */
export class CallbackChannel implements Channel {
    private isOpen = true;
    private delivered = 0;

    constructor(
        readonly id: string,
        private readonly writer: FrameWriter
    ) { }

    get open(): boolean {
        return this.isOpen;
    }

    get frameCount(): number {
        return this.delivered;
    }

    async send(payload: string): Promise<void> {
        if (!this.isOpen) {
            throw createChannelClosedError(this.id, 'channel was closed');
        }
        await this.writer(payload);
        this.delivered++;
    }

    close(): void {
        this.isOpen = false;
    }
}
