import { AVAILABLE_SOURCES, STATS_INTERVAL_MS, type ServerStats } from '@tickcast/schemas';
import { SourceRegistry } from '@tickcast/signals';
import { bytesToMegabytes, createLogger, roundTo } from '@tickcast/utils';
import { ClientConnection, DEFAULT_HEARTBEAT, type HeartbeatOptions } from './connection.js';
import { StreamDispatcher } from './dispatcher.js';
import { handleClientMessage, type IncomingFrame } from './handlers.js';
import { ConnectionRegistry } from './registry.js';
import { StatsBroadcaster } from './stats-broadcaster.js';
import { SERVER_VERSION, isoNow, type StreamSocket } from './types.js';

const logger = createLogger({ name: 'stream:bridge', service: 'stream' });

export interface StreamBridgeOptions {
  sources?: SourceRegistry;
  /** Cap on custom (generic) sources when the bridge builds its own registry */
  maxGenericSources?: number;
  statsIntervalMs?: number;
  heartbeat?: Partial<HeartbeatOptions>;
  /** Reply with an error to unknown message types instead of ignoring them */
  rejectUnknownTypes?: boolean;
}

/**
 * StreamBridge ties the streaming service together:
 * - One SourceRegistry shared by every session
 * - One ConnectionRegistry of live sessions
 * - One StreamDispatcher per subscribed session
 * - One StatsBroadcaster for the whole server
 *
 * Transport code hands it sockets, frames and disconnects; everything
 * else happens here.
 */
export class StreamBridge {
  public readonly sources: SourceRegistry;
  public readonly connections: ConnectionRegistry = new ConnectionRegistry();
  public readonly rejectUnknownTypes: boolean;

  private readonly heartbeat: HeartbeatOptions;
  private readonly broadcaster: StatsBroadcaster;
  private startedAt: number = Date.now();
  private clientSequence = 0;
  private dataPointsSent = 0;
  private running = false;

  constructor(opts: StreamBridgeOptions = {}) {
    this.sources = opts.sources ?? new SourceRegistry({ maxGenericSources: opts.maxGenericSources });
    this.rejectUnknownTypes = opts.rejectUnknownTypes ?? false;
    this.heartbeat = { ...DEFAULT_HEARTBEAT, ...opts.heartbeat };
    this.broadcaster = new StatsBroadcaster({
      connections: this.connections,
      collectStats: () => this.getStats(),
      intervalMs: opts.statsIntervalMs ?? STATS_INTERVAL_MS,
      onDeliveryFailed: (connection) => this.removeClient(connection.connectionId),
    });
  }

  get isRunning(): boolean {
    return this.running;
  }

  /** Start the stats broadcaster and reset the uptime origin */
  start(): void {
    if (this.running) return;
    this.startedAt = Date.now();
    this.broadcaster.start();
    this.running = true;
    logger.info({ heartbeat: this.heartbeat }, 'Stream bridge started');
  }

  /** Stop broadcasting and destroy every session */
  stop(): void {
    this.broadcaster.stop();

    for (const connection of this.connections.snapshot()) {
      connection.destroy(1001, 'Server shutting down');
    }
    this.connections.clear();

    if (this.running) {
      this.running = false;
      logger.info({ dataPointsSent: this.dataPointsSent }, 'Stream bridge stopped');
    }
  }

  /**
   * Register a new session, start its heartbeat and greet it.
   * The welcome message is sent before this returns.
   */
  addClient(socket: StreamSocket, meta: { remoteAddress?: string } = {}): ClientConnection {
    this.clientSequence++;
    const connection = new ClientConnection({
      socket,
      connectionId: `client_${this.clientSequence}`,
      heartbeat: this.heartbeat,
    });

    this.connections.add(connection);
    connection.startHeartbeat();

    connection.sendMessage({
      type: 'welcome',
      client_id: connection.connectionId,
      timestamp: isoNow(),
      available_sources: [...AVAILABLE_SOURCES],
      server_info: {
        version: SERVER_VERSION,
        uptime: this.uptimeSeconds(),
        clients_connected: this.connections.count(),
      },
    });

    connection.log.info(
      { remoteAddress: meta.remoteAddress, clients: this.connections.count() },
      'Client connected'
    );
    return connection;
  }

  /**
   * Remove a session and clean up. Removing an unknown id is a no-op.
   */
  removeClient(connectionId: string): boolean {
    const connection = this.connections.get(connectionId);
    if (!connection) return false;

    connection.destroy();
    this.connections.remove(connection);

    connection.log.info({ clients: this.connections.count() }, 'Client disconnected');
    return true;
  }

  /**
   * Handle one inbound frame. Never throws: a failure while handling a
   * message is logged and the session stays open.
   */
  handleMessage(connection: ClientConnection, raw: IncomingFrame): void {
    try {
      handleClientMessage(this, connection, raw);
    } catch (error) {
      connection.log.error(
        { err: error instanceof Error ? error.message : String(error) },
        'Error handling client message'
      );
    }
  }

  /**
   * Start a dispatcher for the session's current subscription.
   *
   * @returns The dispatcher, or null if the generation is already superseded
   */
  startDispatcher(connection: ClientConnection, generation: number): StreamDispatcher | null {
    const subscription = connection.subscription;
    if (!subscription || connection.generation !== generation) {
      return null;
    }

    const dispatcher = new StreamDispatcher({
      connection,
      generator: this.sources.getOrCreate(subscription.source),
      subscription,
      generation,
      isRegistered: (session) => this.connections.has(session),
      onDelivered: () => {
        this.dataPointsSent++;
      },
      onDeliveryFailed: (session) => this.removeClient(session.connectionId),
    });

    if (!connection.attachDispatcher(generation, dispatcher)) {
      return null;
    }
    dispatcher.start();
    return dispatcher;
  }

  /** Seconds since the bridge started, to 2 decimal places */
  uptimeSeconds(): number {
    return roundTo((Date.now() - this.startedAt) / 1000, 2);
  }

  getStats(): ServerStats {
    return {
      clients_connected: this.connections.count(),
      active_sources: this.sources.activeSources(),
      uptime: this.uptimeSeconds(),
      memory_usage: bytesToMegabytes(process.memoryUsage().heapUsed),
      data_points_sent: this.dataPointsSent,
    };
  }
}
