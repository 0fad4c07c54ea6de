/**
 * Structured Error System for compbot
 *
 * Provides machine-readable errors with codes, suggestions and details.
 */

/**
 * Error codes for query operations
 */
export type ChatErrorCode =
  | 'DATASET_UNAVAILABLE'   // Comparison fetch failed or came back empty
  | 'UNSUPPORTED_VARIANT'   // Unknown strategy tag
  | 'REASONING_FAILURE'     // Backend error, bad output or no final answer
  | 'EXECUTION_TIMEOUT'     // Bounded session passed its deadline
  | 'CHANNEL_CLOSED'        // Push frame could not be delivered
  | 'CHANNEL_NOT_FOUND'     // Channel ID not registered
  | 'INVALID_ARGUMENT'      // Tool or CLI argument failed validation
  | 'INVALID_STATE'         // Single-use object used twice
  | 'CONFIG_ERROR';         // Environment failed validation

/**
 * Structured error with code, message and suggestion
 */
export interface ChatError {
  code: ChatErrorCode;
  message: string;
  suggestion?: string;
  details?: Record<string, unknown>;
}

/**
 * Exception class wrapping ChatError for throw/catch patterns
 */
export class ChatException extends Error {
  public readonly error: ChatError;

  constructor(error: ChatError, options?: { cause?: unknown }) {
    super(error.message, options);
    this.name = 'ChatException';
    this.error = error;

    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ChatException);
    }
  }

  get code(): ChatErrorCode {
    return this.error.code;
  }

  /**
   * Serialize error for MCP response
   */
  toJSON(): ChatError {
    return this.error;
  }
}

export function isChatException(error: unknown, code?: ChatErrorCode): error is ChatException {
  return error instanceof ChatException && (code === undefined || error.code === code);
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/**
 * Create a dataset unavailable error
 */
export function createDatasetUnavailableError(
  comparisonId: string,
  reason: string,
  cause?: unknown
): ChatException {
  return new ChatException({
    code: 'DATASET_UNAVAILABLE',
    message: `Comparison '${comparisonId}' is unavailable: ${reason}`,
    suggestion: 'Check the comparison ID and that ORKG_HOST points to a reachable ORKG instance',
    details: { comparisonId },
  }, { cause });
}

/**
 * Create an unsupported variant error
 */
export function createUnsupportedVariantError(
  tag: string,
  supported: readonly string[]
): ChatException {
  return new ChatException({
    code: 'UNSUPPORTED_VARIANT',
    message: `Unknown agent strategy: ${tag}`,
    suggestion: `Use one of: ${supported.join(', ')}`,
    details: { tag, supported: [...supported] },
  });
}

/**
 * Create a reasoning failure wrapping the backend's error
 */
export function createReasoningFailure(cause: unknown, model?: string): ChatException {
  return new ChatException({
    code: 'REASONING_FAILURE',
    message: `Reasoning failed: ${describeCause(cause)}`,
    details: model ? { model } : undefined,
  }, { cause });
}

/**
 * Create an execution timeout error
 */
export function createExecutionTimeoutError(
  limitMs: number,
  variant: string
): ChatException {
  return new ChatException({
    code: 'EXECUTION_TIMEOUT',
    message: `${variant} session timed out after ${limitMs}ms`,
    suggestion: 'Ask a narrower question or use the TABULAR strategy',
    details: { limitMs, variant },
  });
}

/**
 * Create a channel closed error
 */
export function createChannelClosedError(channelId: string, reason: string): ChatException {
  return new ChatException({
    code: 'CHANNEL_CLOSED',
    message: `Channel '${channelId}' is closed: ${reason}`,
    details: { channelId },
  });
}

/**
 * Create a channel not found error
 */
export function createChannelNotFoundError(channelId: string): ChatException {
  return new ChatException({
    code: 'CHANNEL_NOT_FOUND',
    message: `Channel '${channelId}' not found`,
    suggestion: 'Open a channel with the open-channel tool first',
    details: { channelId },
  });
}

/**
 * Serialize a ChatError for JSON output
 */
export function serializeChatError(error: ChatError): object {
  return {
    code: error.code,
    message: error.message,
    ...(error.suggestion ? { suggestion: error.suggestion } : {}),
    ...(error.details ? { details: error.details } : {}),
  };
}

/**
 * Create a generic chat error exception.
 * Use this when no specific factory is available.
 */
export function createGenericError(
  code: ChatErrorCode,
  message: string,
  details?: Record<string, unknown>
): ChatException {
  return new ChatException({
    code,
    message,
    details,
  });
}

/**
 * Pass ChatExceptions through; wrap anything else as a reasoning failure.
 */
export function toChatException(error: unknown, model?: string): ChatException {
  return error instanceof ChatException ? error : createReasoningFailure(error, model);
}
