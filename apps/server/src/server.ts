// dotenv must be imported FIRST so STREAM_* variables are visible to validation
import 'dotenv/config';

import Fastify from 'fastify';
import websocket from '@fastify/websocket';
import { StreamBridge, streamPlugin } from '@tickcast/stream-api';
import { createLogger, validateEnv } from '@tickcast/utils';
import { parseCliOptions, resolveListenOptions } from './cli';

const logger = createLogger({ name: 'server', service: 'server' });

/**
 * Streaming server entry point.
 * Validates configuration, mounts the WebSocket endpoint and serves until
 * SIGINT/SIGTERM.
 */
async function start(): Promise<void> {
  const config = validateEnv();
  const { host, port } = resolveListenOptions(config, parseCliOptions(process.argv));

  logger.info('Starting streaming server...');

  const fastify = Fastify({
    logger: false, // Using pino logger directly
  });

  await fastify.register(websocket);

  const bridge = new StreamBridge({
    statsIntervalMs: config.STREAM_STATS_INTERVAL_MS,
    heartbeat: {
      intervalMs: config.STREAM_PING_INTERVAL_MS,
      timeoutMs: config.STREAM_PING_TIMEOUT_MS,
    },
    rejectUnknownTypes: config.STREAM_REJECT_UNKNOWN_TYPES,
    maxGenericSources: config.STREAM_MAX_CUSTOM_SOURCES,
  });
  await fastify.register(streamPlugin, { path: config.STREAM_PATH, bridge });

  try {
    await fastify.listen({ port, host });
    logger.info(`Streaming server listening on ws://${host}:${port}${config.STREAM_PATH}`);
  } catch (error) {
    logger.error({ err: error instanceof Error ? error.message : String(error), host, port }, 'Failed to start server');
    process.exit(1);
  }

  let shuttingDown = false;

  // Graceful shutdown: closing Fastify stops the bridge and its sessions
  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;

    logger.info({ signal }, 'Shutting down server...');
    await fastify.close();
    logger.info({ dataPointsSent: bridge.getStats().data_points_sent }, 'Server shut down successfully');
    await logger.flush();
    process.exit(0);
  };

  const onSignal = (signal: NodeJS.Signals): void => {
    shutdown(signal).catch((error: unknown) => {
      logger.error({ err: error instanceof Error ? error.message : String(error) }, 'Shutdown failed');
      process.exit(1);
    });
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}

start().catch((error: unknown) => {
  logger.error(
    {
      err: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
    },
    'Fatal error during server startup'
  );
  process.exit(1);
});
