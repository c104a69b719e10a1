import { z } from 'zod';
import { DEFAULT_FREQUENCY_MS, DEFAULT_SOURCE, MAX_FREQUENCY_MS } from './types.js';

/**
 * Zod schemas for client-to-server WebSocket messages.
 *
 * Clients send one JSON object per frame with a `type` field. Extra
 * fields are ignored (stripped on parse).
 */

/** Any object with a string `type`; used before dispatching on it */
export const envelopeSchema = z.object({
  type: z.string().describe('Message type discriminator'),
});

/** Schema for subscribe */
export const subscribeSchema = z.object({
  type: z.literal('subscribe'),
  source: z
    .string()
    .min(1, 'source must not be empty')
    .default(DEFAULT_SOURCE)
    .describe('Source name: stock, sensor, network, crypto, weather, or any other name for a generic feed'),
  frequency: z
    .number()
    .finite()
    .positive('frequency must be a positive number of milliseconds')
    .max(MAX_FREQUENCY_MS, `frequency must not exceed ${MAX_FREQUENCY_MS} milliseconds`)
    .default(DEFAULT_FREQUENCY_MS)
    .describe('Delivery interval in milliseconds'),
});

/** Schema for unsubscribe */
export const unsubscribeSchema = z.object({
  type: z.literal('unsubscribe'),
});

/** Schema for ping */
export const pingSchema = z.object({
  type: z.literal('ping'),
});

/**
 * Discriminated union of all client-to-server messages.
 * Discriminates on the `type` field.
 */
export const clientMessageSchema = z.discriminatedUnion('type', [
  subscribeSchema,
  unsubscribeSchema,
  pingSchema,
]);

export type ClientMessagePayload = z.infer<typeof clientMessageSchema>;

export type ClientMessageType = ClientMessagePayload['type'];

export const CLIENT_MESSAGE_TYPES: readonly ClientMessageType[] = ['subscribe', 'unsubscribe', 'ping'];

export function isClientMessageType(type: string): type is ClientMessageType {
  return CLIENT_MESSAGE_TYPES.some((known) => known === type);
}
