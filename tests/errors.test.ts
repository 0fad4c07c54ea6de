/**
 * Tests for structured error system
 */

import {
    ChatError,
    ChatException,
    createChannelClosedError,
    createChannelNotFoundError,
    createDatasetUnavailableError,
    createExecutionTimeoutError,
    createGenericError,
    createReasoningFailure,
    createUnsupportedVariantError,
    isChatException,
    serializeChatError,
    toChatException,
} from '../src/types/errors.js';

describe('ChatException', () => {
    test('creates exception with error object', () => {
        const error: ChatError = {
            code: 'REASONING_FAILURE',
            message: 'Reasoning failed: timeout',
            suggestion: 'Retry later',
        };

        const exception = new ChatException(error);

        expect(exception.name).toBe('ChatException');
        expect(exception.message).toBe('Reasoning failed: timeout');
        expect(exception.code).toBe('REASONING_FAILURE');
        expect(exception.toJSON()).toEqual(error);
    });

    test('keeps the cause', () => {
        const cause = new Error('socket closed');
        const exception = createDatasetUnavailableError('R1', 'request failed', cause);
        expect(exception.cause).toBe(cause);
    });

    test('isChatException narrows by code', () => {
        const exception = createChannelNotFoundError('c');
        expect(isChatException(exception)).toBe(true);
        expect(isChatException(exception, 'CHANNEL_NOT_FOUND')).toBe(true);
        expect(isChatException(exception, 'CHANNEL_CLOSED')).toBe(false);
        expect(isChatException(new Error('plain'))).toBe(false);
    });
});

describe('error factories', () => {
    test('dataset unavailable', () => {
        const e = createDatasetUnavailableError('R1', 'not found');
        expect(e.code).toBe('DATASET_UNAVAILABLE');
        expect(e.message).toBe("Comparison 'R1' is unavailable: not found");
        expect(e.error.details).toEqual({ comparisonId: 'R1' });
    });

    test('unsupported variant lists the supported tags', () => {
        const e = createUnsupportedVariantError('graph', ['TABULAR', 'STRUCTURED']);
        expect(e.message).toBe('Unknown agent strategy: graph');
        expect(e.error.suggestion).toBe('Use one of: TABULAR, STRUCTURED');
    });

    test('reasoning failure carries the model', () => {
        const e = createReasoningFailure(new Error('rate limited'), 'gpt-4');
        expect(e.message).toBe('Reasoning failed: rate limited');
        expect(e.error.details).toEqual({ model: 'gpt-4' });
        expect(createReasoningFailure('odd').error.details).toBeUndefined();
    });

    test('execution timeout', () => {
        const e = createExecutionTimeoutError(20000, 'STRUCTURED');
        expect(e.message).toBe('STRUCTURED session timed out after 20000ms');
        expect(e.error.details).toEqual({ limitMs: 20000, variant: 'STRUCTURED' });
    });

    test('channel errors', () => {
        expect(createChannelClosedError('c', 'gone').message).toBe("Channel 'c' is closed: gone");
        expect(createChannelNotFoundError('c').message).toBe("Channel 'c' not found");
    });
});

describe('toChatException', () => {
    test('passes chat exceptions through', () => {
        const e = createGenericError('INVALID_STATE', 'twice');
        expect(toChatException(e)).toBe(e);
    });

    test('wraps anything else as a reasoning failure', () => {
        const wrapped = toChatException(new Error('boom'), 'm');
        expect(wrapped.code).toBe('REASONING_FAILURE');
        expect(wrapped.message).toBe('Reasoning failed: boom');
    });
});

describe('serializeChatError', () => {
    test('omits empty fields', () => {
        expect(serializeChatError({ code: 'INVALID_STATE', message: 'twice' }))
            .toEqual({ code: 'INVALID_STATE', message: 'twice' });
    });

    test('includes suggestion and details', () => {
        expect(serializeChatError(createChannelNotFoundError('c').error)).toEqual({
            code: 'CHANNEL_NOT_FOUND',
            message: "Channel 'c' not found",
            suggestion: 'Open a channel with the open-channel tool first',
            details: { channelId: 'c' },
        });
    });
});
