/**
 * WebSocket streaming module barrel export.
 *
 * Provides the stream bridge, client sessions, dispatchers, the stats
 * broadcaster and message handling for the streaming endpoint.
 */

export { StreamBridge } from './bridge.js';
export type { StreamBridgeOptions } from './bridge.js';
export { ClientConnection, DEFAULT_HEARTBEAT } from './connection.js';
export type { Cancellable, HeartbeatOptions } from './connection.js';
export { ConnectionRegistry } from './registry.js';
export { StreamDispatcher } from './dispatcher.js';
export type { StreamDispatcherOptions } from './dispatcher.js';
export { StatsBroadcaster } from './stats-broadcaster.js';
export type { StatsBroadcasterOptions } from './stats-broadcaster.js';
export { handleClientMessage, decodeFrame } from './handlers.js';
export type { IncomingFrame } from './handlers.js';
export {
  clientMessageSchema,
  envelopeSchema,
  subscribeSchema,
  unsubscribeSchema,
  pingSchema,
  isClientMessageType,
  CLIENT_MESSAGE_TYPES,
} from './schemas.js';
export type { ClientMessagePayload, ClientMessageType } from './schemas.js';
export { SERVER_VERSION, DEFAULT_SOURCE, DEFAULT_FREQUENCY_MS, MAX_FREQUENCY_MS, isoNow } from './types.js';
export type {
  StreamSocket,
  SessionState,
  Subscription,
  WelcomeMessage,
  SubscribedMessage,
  UnsubscribedMessage,
  PongMessage,
  ErrorMessage,
  DataMessage,
  ServerStatsMessage,
  ServerMessage,
  ServerMessageType,
} from './types.js';
