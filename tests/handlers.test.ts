/**
 * Tests for MCP tool handlers
 */

import {
    closeChannelHandler,
    describeComparisonHandler,
    listChannelsHandler,
    openChannelHandler,
    pushComparisonHandler,
    queryComparisonHandler,
    streamComparisonHandler,
} from '../src/handlers/index.js';
import type { FrameWriter } from '../src/transport/channel.js';
import { isChatException } from '../src/types/index.js';
import { captureError, createHarness } from './fixtures.js';

describe('query handlers', () => {
    test('query-comparison returns the answer', async () => {
        const h = createHarness({ thoughts: ['t1'], answer: 'Paper A' });

        const result = await queryComparisonHandler({ comparison_id: 'R100', question: 'Which?' }, h.coordinator);

        expect(result).toEqual({ comparison_id: 'R100', strategy: 'TABULAR', answer: 'Paper A' });
    });

    test('query-comparison validates arguments', async () => {
        const h = createHarness({ answer: 'Paper A' });

        const error = await captureError(queryComparisonHandler({ comparison_id: 'R100' }, h.coordinator));

        expect(isChatException(error, 'INVALID_ARGUMENT')).toBe(true);
        expect(error instanceof Error && error.message).toContain('question');
        expect(h.source.fetchCount).toBe(0);
    });

    test('query-comparison rejects blank strings', async () => {
        const h = createHarness({ answer: 'Paper A' });

        const error = await captureError(queryComparisonHandler({ comparison_id: ' ', question: 'Which?' }, h.coordinator));

        expect(error instanceof Error && error.message).toBe('Invalid arguments: comparison_id: comparison_id is required');
    });

    test('stream-comparison collects thoughts and reports each one', async () => {
        const h = createHarness({ thoughts: ['t1', 't2'], answer: 'Paper A' });
        const progress: Array<[string, number]> = [];

        const result = await streamComparisonHandler(
            { comparison_id: 'R100', question: 'Which?', strategy: 'structured' },
            h.coordinator,
            (thought, index) => progress.push([thought, index])
        );

        expect(result).toEqual({
            comparison_id: 'R100',
            strategy: 'structured',
            answer: 'Paper A',
            thoughts: ['t1', 't2'],
        });
        expect(progress).toEqual([['t1', 1], ['t2', 2]]);
    });

    test('push-comparison needs a channel ID', async () => {
        const h = createHarness({ answer: 'Paper A' });

        const error = await captureError(pushComparisonHandler({ comparison_id: 'R100', question: 'Which?' }, h.coordinator));

        expect(isChatException(error, 'INVALID_ARGUMENT')).toBe(true);
    });

    test('push-comparison delivers to the channel', async () => {
        const h = createHarness({ thoughts: ['t1'], answer: 'Paper A' });
        const frames: string[] = [];
        h.registry.open(frame => { frames.push(frame); }, 'ch-1');

        const result = await pushComparisonHandler(
            { comparison_id: 'R100', question: 'Which?', channel_id: 'ch-1' },
            h.coordinator
        );

        expect(result).toEqual({ comparison_id: 'R100', strategy: 'TABULAR', channel_id: 'ch-1', answer: 'Paper A' });
        expect(frames).toEqual(['{"kind":"thought","text":"t1"}', '{"kind":"answer","text":"Paper A"}']);
    });

    test('describe-comparison reports shape and labels', async () => {
        const h = createHarness({});

        const result = await describeComparisonHandler({ comparison_id: 'R100' }, h.source);

        expect(result).toEqual({
            comparison_id: 'R100',
            shape: { rows: 3, columns: 2, filledCells: 5, multiValuedCells: 1 },
            properties: ['Publication date', 'Dataset', 'Accuracy'],
            contributions: ['Paper A/Contribution 1', 'Paper B/Contribution 2'],
        });
    });
});

describe('channel handlers', () => {
    test('open-channel registers a channel with the requested ID', async () => {
        const h = createHarness({});
        const frames: string[] = [];
        const writerFor = jest.fn((id: string): FrameWriter => frame => { frames.push(`${id}:${frame}`); });

        const result = openChannelHandler({ channel_id: 'c1' }, h.registry, writerFor);
        await h.registry.send('c1', 'hello');

        expect(result).toEqual({ channel_id: 'c1', active_channels: 1 });
        expect(writerFor).toHaveBeenCalledWith('c1');
        expect(frames).toEqual(['c1:hello']);
    });

    test('open-channel generates an ID when none is given', () => {
        const h = createHarness({});

        const result = openChannelHandler({}, h.registry, () => () => undefined);

        expect(result.channel_id).toMatch(/^[0-9a-f-]{36}$/);
        expect(h.registry.has(result.channel_id)).toBe(true);
    });

    test('close-channel closes and reports unknown channels', () => {
        const h = createHarness({});
        openChannelHandler({ channel_id: 'c1' }, h.registry, () => () => undefined);

        expect(closeChannelHandler({ channel_id: 'c1' }, h.registry)).toEqual({
            success: true,
            message: 'Channel c1 closed',
            active_channels: 0,
        });
        expect(() => closeChannelHandler({ channel_id: 'c1' }, h.registry)).toThrow("Channel 'c1' not found");
    });

    test('list-channels sweeps closed channels', () => {
        const h = createHarness({});
        h.registry.open(() => undefined, 'open');
        h.registry.open(() => undefined, 'closed').close();

        expect(listChannelsHandler(h.registry)).toEqual({ channels: ['open'], active_channels: 1 });
    });
});
