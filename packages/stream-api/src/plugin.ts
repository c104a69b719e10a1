/// <reference types="@fastify/websocket" />
import type { FastifyPluginAsync } from 'fastify';
import type WebSocket from 'ws';
import { StreamBridge, type StreamBridgeOptions } from './ws/index.js';

export interface StreamPluginOptions extends StreamBridgeOptions {
  /** Route path of the WebSocket endpoint (default `/`) */
  path?: string;
  /** Use an existing bridge instead of building one from the options */
  bridge?: StreamBridge;
}

/**
 * Streaming Fastify Plugin
 *
 * Registers:
 * - The WebSocket endpoint that hands sockets to the StreamBridge
 * - An onClose hook that stops the bridge
 *
 * Requires @fastify/websocket to be registered on the parent instance.
 */
export const streamPlugin: FastifyPluginAsync<StreamPluginOptions> = async (instance, opts) => {
  const { path = '/', bridge: existing, ...bridgeOptions } = opts;
  const bridge = existing ?? new StreamBridge(bridgeOptions);
  bridge.start();

  // Register cleanup on server close
  instance.addHook('onClose', async () => {
    bridge.stop();
  });

  instance.get(path, { websocket: true }, (socket, request) => {
    const connection = bridge.addClient(socket, { remoteAddress: request.ip });

    // Attach handlers synchronously per @fastify/websocket requirement
    socket.on('message', (data: WebSocket.RawData) => {
      bridge.handleMessage(connection, data);
    });

    socket.on('close', () => {
      bridge.removeClient(connection.connectionId);
    });

    socket.on('error', (error: Error) => {
      connection.log.warn({ err: error.message }, 'Socket error');
      bridge.removeClient(connection.connectionId);
    });
  });
};
