/**
 * Event sinks: pull (async sequence), push (channel frames) and null.
 */

export { TerminatingSink } from './interface.js';
export type { EventSink, SinkKind } from './interface.js';
export { NullSink } from './null.js';
export { PullSink } from './pull.js';
export { PushSink, DEFAULT_SEND_TIMEOUT_MS } from './push.js';
export type { PushSinkOptions } from './push.js';
