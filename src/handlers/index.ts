/**
 * Tool handlers
 */

export {
    queryComparisonHandler,
    streamComparisonHandler,
    pushComparisonHandler,
    describeComparisonHandler,
} from './query.js';
export type { QueryResponse, StreamResponse, PushResponse, DescribeResponse } from './query.js';
export { openChannelHandler, closeChannelHandler, listChannelsHandler } from './channel.js';
export type { OpenChannelResponse, CloseChannelResponse, ListChannelsResponse } from './channel.js';
export { parseArgs } from './validate.js';
