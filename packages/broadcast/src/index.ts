/**
 * @cortex-lens/broadcast
 */

export type {
  BroadcastHubOptions,
  BroadcastStats,
  SessionInfo,
  SnapshotSource,
} from './broadcast-hub.js';
export { BroadcastHub } from './broadcast-hub.js';
export type { SessionOptions, SessionSink } from './session.js';
export { Session } from './session.js';
export type { BufferedSocket, SocketSinkOptions } from './socket-sink.js';
export { bufferedAmountOf, SocketSink } from './socket-sink.js';
