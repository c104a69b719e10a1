import type WebSocket from 'ws';
import type { ZodIssue } from 'zod';
import { createLogger } from '@tickcast/utils';
import type { StreamBridge } from './bridge.js';
import type { ClientConnection } from './connection.js';
import { clientMessageSchema, envelopeSchema, isClientMessageType } from './schemas.js';
import { isoNow } from './types.js';

const logger = createLogger({ name: 'stream:protocol', service: 'stream' });

/** Frame payloads as delivered by `ws` or passed directly in tests */
export type IncomingFrame = WebSocket.RawData | string;

/**
 * Send an error message to a client connection.
 */
function sendError(connection: ClientConnection, message: string): void {
  connection.sendMessage({ type: 'error', message, timestamp: isoNow() });
}

function describeIssue(issue: ZodIssue | undefined): string {
  if (!issue) return 'invalid payload';
  return issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message;
}

/** Decode a text or binary frame as UTF-8 */
export function decodeFrame(raw: IncomingFrame): string {
  if (typeof raw === 'string') return raw;
  if (Buffer.isBuffer(raw)) return raw.toString('utf-8');
  if (Array.isArray(raw)) return Buffer.concat(raw).toString('utf-8');
  return Buffer.from(raw).toString('utf-8');
}

/**
 * Handle an incoming client-to-server WebSocket message.
 *
 * Parses JSON, checks the envelope, validates the known message types
 * against their Zod schemas, and dispatches subscribe/unsubscribe/ping.
 * A malformed frame gets an `error` reply and leaves the session state
 * unchanged. Unknown types are ignored unless the bridge rejects them.
 */
export function handleClientMessage(
  bridge: StreamBridge,
  connection: ClientConnection,
  raw: IncomingFrame
): void {
  let parsed: unknown;
  try {
    parsed = JSON.parse(decodeFrame(raw));
  } catch {
    sendError(connection, 'Invalid JSON message');
    return;
  }

  const envelope = envelopeSchema.safeParse(parsed);
  if (!envelope.success) {
    sendError(connection, 'Invalid message format: expected an object with a string "type" field');
    return;
  }

  const { type } = envelope.data;
  if (!isClientMessageType(type)) {
    if (bridge.rejectUnknownTypes) {
      sendError(connection, `Unknown message type: ${type}`);
    } else {
      logger.debug({ clientId: connection.connectionId, type }, 'Ignoring unknown message type');
    }
    return;
  }

  const result = clientMessageSchema.safeParse(parsed);
  if (!result.success) {
    sendError(connection, `Invalid ${type} message: ${describeIssue(result.error.issues[0])}`);
    return;
  }

  const message = result.data;
  switch (message.type) {
    case 'subscribe':
      handleSubscribe(bridge, connection, message.source, message.frequency);
      break;
    case 'unsubscribe':
      handleUnsubscribe(connection);
      break;
    case 'ping':
      connection.sendMessage({ type: 'pong', timestamp: isoNow() });
      break;
  }
}

/**
 * Replace the session's subscription, acknowledge it, then start the
 * dispatcher. The acknowledgement always precedes the first data message.
 */
function handleSubscribe(
  bridge: StreamBridge,
  connection: ClientConnection,
  source: string,
  frequency: number
): void {
  if (!bridge.sources.canServe(source)) {
    sendError(connection, `Source limit reached: cannot create source "${source}"`);
    return;
  }

  bridge.sources.getOrCreate(source);
  const generation = connection.beginSubscription({ source, frequency });

  connection.sendMessage({ type: 'subscribed', source, frequency, timestamp: isoNow() });
  logger.info({ clientId: connection.connectionId, source, frequency }, 'Subscribed');

  bridge.startDispatcher(connection, generation);
}

function handleUnsubscribe(connection: ClientConnection): void {
  const wasSubscribed = connection.cancelSubscription();
  connection.sendMessage({ type: 'unsubscribed', timestamp: isoNow() });
  if (wasSubscribed) {
    logger.info({ clientId: connection.connectionId }, 'Unsubscribed');
  }
}
