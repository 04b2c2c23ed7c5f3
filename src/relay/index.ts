/**
 * Response relay exports.
 *
 * @packageDocumentation
 */

export { BoundedChannel, pump } from './channel.js';
export { ClientDisconnectedError, HttpEventSink } from './sink.js';
export type { EventSink } from './sink.js';
export { DONE_FRAME, SSE_HEADERS, formatDataFrame, formatErrorFrame } from './sse.js';
export { StreamRelay } from './stream-relay.js';
export type { RelayResult, RelayState, StreamOpener, StreamRelayOptions } from './stream-relay.js';
