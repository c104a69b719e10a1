/**
 * @tickcast/stream-api
 *
 * WebSocket streaming service: client sessions, per-subscription
 * dispatchers, stats broadcasting and the Fastify plugin that exposes them.
 */

export * from './ws/index.js';

export { streamPlugin } from './plugin.js';
export type { StreamPluginOptions } from './plugin.js';
