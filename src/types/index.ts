/**
 * Shared type definitions for compbot
 */

// Re-export error types
export {
    ChatException,
    isChatException,
    createDatasetUnavailableError,
    createUnsupportedVariantError,
    createReasoningFailure,
    createExecutionTimeoutError,
    createChannelClosedError,
    createChannelNotFoundError,
    serializeChatError,
    createGenericError,
    toChatException,
} from './errors.js';

export type {
    ChatErrorCode,
    ChatError,
} from './errors.js';

export { STRATEGY_TAGS, isStrategyTag, parseStrategyTag } from './strategy.js';
export type { StrategyTag } from './strategy.js';

export type {
    CellValue,
    Cell,
    ComparisonTable,
    TableShape,
    FieldValue,
    ComparisonDocument,
} from './table.js';

export type {
    ThoughtEvent,
    AnswerEvent,
    QueryEvent,
    DeliveryMode,
    Delivery,
    QueryState,
    QueryTransition,
} from './events.js';

export type {
    ReasoningRequest,
    ReasoningBackend,
    BackendOptions,
    BackendFactory,
    ModelProfile,
} from './llm.js';
