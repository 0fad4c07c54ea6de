/**
 * Channel Registry
 *
 * Looks channels up by ID and sends frames to them. Closed channels are
 * dropped on the next send or sweep.
 */

import { randomUUID } from 'crypto';
import {
    createChannelClosedError,
    createChannelNotFoundError,
    createGenericError,
    isChatException,
} from '../types/index.js';
import { CallbackChannel, Channel, FrameWriter } from './channel.js';

export class ChannelRegistry {
    private channels = new Map<string, Channel>();

    /** Maximum number of concurrently registered channels */
    static readonly MAX_CHANNELS = 1000;

    /**
     * Register an existing channel under its own ID
     */
    register(channel: Channel): Channel {
        if (this.channels.has(channel.id)) {
            throw createGenericError('INVALID_ARGUMENT', `Channel '${channel.id}' is already registered`);
        }
        if (this.channels.size >= ChannelRegistry.MAX_CHANNELS) {
            throw createGenericError('INVALID_STATE',
                `Maximum channel limit of ${ChannelRegistry.MAX_CHANNELS} reached`);
        }
        this.channels.set(channel.id, channel);
        return channel;
    }

    /**
     * Create and register a callback channel with a fresh ID
     */
    open(writer: FrameWriter, id: string = randomUUID()): CallbackChannel {
        const channel = new CallbackChannel(id, writer);
        this.register(channel);
        return channel;
    }

    lookup(id: string): Channel {
        const channel = this.channels.get(id);
        if (!channel) {
            throw createChannelNotFoundError(id);
        }
        return channel;
    }

    has(id: string): boolean {
        return this.channels.has(id);
    }

    /**
     * Send one frame. A missing, closed or failing channel is reported as CHANNEL_CLOSED.
     */
    async send(id: string, payload: string): Promise<void> {
        const channel = this.channels.get(id);
        if (!channel) {
            throw createChannelClosedError(id, 'no such channel');
        }
        if (!channel.open) {
            this.channels.delete(id);
            throw createChannelClosedError(id, 'channel was closed');
        }
        try {
            await channel.send(payload);
        } catch (error) {
            if (isChatException(error, 'CHANNEL_CLOSED')) {
                throw error;
            }
            const reason = error instanceof Error ? error.message : String(error);
            throw createChannelClosedError(id, reason);
        }
    }

    /**
     * Close and forget a channel
     */
    unregister(id: string): boolean {
        const channel = this.channels.get(id);
        if (!channel) {
            return false;
        }
        channel.close();
        return this.channels.delete(id);
    }

    /**
     * Forget channels that were closed from the outside
     */
    sweep(): number {
        let removed = 0;
        for (const [id, channel] of this.channels) {
            if (!channel.open) {
                this.channels.delete(id);
                removed++;
            }
        }
        return removed;
    }

    list(): string[] {
        return [...this.channels.keys()];
    }

    get count(): number {
        return this.channels.size;
    }

    closeAll(): void {
        for (const channel of this.channels.values()) {
            channel.close();
        }
        this.channels.clear();
    }
}

export function createChannelRegistry(): ChannelRegistry {
    return new ChannelRegistry();
}
