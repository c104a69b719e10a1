/**
 * WebSocket protocol types for the streaming interface.
 *
 * Every server-to-client message carries a `type` discriminator and an
 * ISO-8601 `timestamp`. Clients send `subscribe`, `unsubscribe` or `ping`.
 */

import type { AvailableSource, DataPoint, ServerStats } from '@tickcast/schemas';

/** Server version reported in the welcome message */
export const SERVER_VERSION = '1.0.0';

/** Source used when a subscribe message omits `source` */
export const DEFAULT_SOURCE = 'stock';

/** Cadence used when a subscribe message omits `frequency` */
export const DEFAULT_FREQUENCY_MS = 500;

/** Longest delay a Node.js timer honours; larger values fire after 1 ms */
export const MAX_FREQUENCY_MS = 2_147_483_647;

/**
 * Minimal socket surface a ClientConnection needs.
 * `ws` WebSocket instances satisfy it; tests use an in-process fake.
 */
export interface StreamSocket {
  readonly readyState: number;
  send(data: string): void;
  ping(): void;
  terminate(): void;
  close(code?: number, reason?: string): void;
  on(event: 'pong', listener: () => void): unknown;
}

/** Protocol state of one session */
export type SessionState = 'idle' | 'subscribed';

/** Active subscription of one session */
export interface Subscription {
  source: string;
  /** Delivery interval in milliseconds */
  frequency: number;
}

// ============================================
// Server-to-client messages
// ============================================

export interface WelcomeMessage {
  type: 'welcome';
  client_id: string;
  timestamp: string;
  available_sources: AvailableSource[];
  server_info: {
    version: string;
    /** Seconds since the stream bridge started */
    uptime: number;
    clients_connected: number;
  };
}

export interface SubscribedMessage {
  type: 'subscribed';
  source: string;
  frequency: number;
  timestamp: string;
}

export interface UnsubscribedMessage {
  type: 'unsubscribed';
  timestamp: string;
}

export interface PongMessage {
  type: 'pong';
  timestamp: string;
}

export interface ErrorMessage {
  type: 'error';
  message: string;
  timestamp: string;
}

export interface DataMessage {
  type: 'data';
  source: string;
  data: DataPoint;
  timestamp: string;
}

export interface ServerStatsMessage {
  type: 'server_stats';
  timestamp: string;
  stats: ServerStats;
}

export type ServerMessage =
  | WelcomeMessage
  | SubscribedMessage
  | UnsubscribedMessage
  | PongMessage
  | ErrorMessage
  | DataMessage
  | ServerStatsMessage;

export type ServerMessageType = ServerMessage['type'];

/** Current time as an ISO-8601 string */
export function isoNow(): string {
  return new Date().toISOString();
}
