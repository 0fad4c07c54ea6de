import { randomUUID } from 'crypto';
import { z } from 'zod';
import type { FrameWriter } from '../transport/channel.js';
import type { ChannelRegistry } from '../transport/registry.js';
import { createChannelNotFoundError } from '../types/index.js';
import { parseArgs } from './validate.js';

const OpenArgsSchema = z.object({
    channel_id: z.string().trim().min(1).optional(),
});

const CloseArgsSchema = z.object({
    channel_id: z.string().trim().min(1, 'channel_id is required'),
});

export interface OpenChannelResponse {
    channel_id: string;
    active_channels: number;
}

export interface CloseChannelResponse {
    success: true;
    message: string;
    active_channels: number;
}

export interface ListChannelsResponse {
    channels: string[];
    active_channels: number;
}

/**
 * Open a channel whose frames go to the writer built for its ID.
 */
export function openChannelHandler(
    rawArgs: unknown,
    registry: ChannelRegistry,
    writerFor: (channelId: string) => FrameWriter
): OpenChannelResponse {
    const args = parseArgs(OpenArgsSchema, rawArgs);
    const id = args.channel_id ?? randomUUID();
    const channel = registry.open(writerFor(id), id);
    return { channel_id: channel.id, active_channels: registry.count };
}

export function closeChannelHandler(
    rawArgs: unknown,
    registry: ChannelRegistry
): CloseChannelResponse {
    const args = parseArgs(CloseArgsSchema, rawArgs);
    if (!registry.unregister(args.channel_id)) {
        throw createChannelNotFoundError(args.channel_id);
    }
    return {
        success: true,
        message: `Channel ${args.channel_id} closed`,
        active_channels: registry.count,
    };
}

export function listChannelsHandler(registry: ChannelRegistry): ListChannelsResponse {
    registry.sweep();
    return { channels: registry.list(), active_channels: registry.count };
}
