import { STATS_INTERVAL_MS, type ServerStats } from '@tickcast/schemas';
import { createLogger } from '@tickcast/utils';
import type { ClientConnection } from './connection.js';
import type { ConnectionRegistry } from './registry.js';
import { isoNow, type ServerStatsMessage } from './types.js';

const logger = createLogger({ name: 'stream:stats', service: 'stream' });

export interface StatsBroadcasterOptions {
  connections: ConnectionRegistry;
  collectStats: () => ServerStats;
  intervalMs?: number;
  onDeliveryFailed?: (connection: ClientConnection) => void;
}

/**
 * Periodically sends a `server_stats` message to every connected session.
 *
 * The message is serialized once per round and sent to a snapshot of the
 * registry. Sessions whose send fails are reported through
 * `onDeliveryFailed`; the rest of the round continues.
 */
export class StatsBroadcaster {
  private readonly connections: ConnectionRegistry;
  private readonly collectStats: () => ServerStats;
  private readonly intervalMs: number;
  private readonly onDeliveryFailed?: (connection: ClientConnection) => void;
  private timer: ReturnType<typeof setInterval> | null = null;

  constructor(opts: StatsBroadcasterOptions) {
    this.connections = opts.connections;
    this.collectStats = opts.collectStats;
    this.intervalMs = opts.intervalMs ?? STATS_INTERVAL_MS;
    this.onDeliveryFailed = opts.onDeliveryFailed;
  }

  get running(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) return;

    this.timer = setInterval(() => {
      this.broadcast();
    }, this.intervalMs);
    // Timer is unref'd so it does not prevent Node.js from exiting
    this.timer.unref();

    logger.debug({ intervalMs: this.intervalMs }, 'Stats broadcaster started');
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      logger.debug('Stats broadcaster stopped');
    }
  }

  /**
   * Run one broadcast round.
   *
   * @returns Number of sessions the message was delivered to
   */
  broadcast(): number {
    const sessions = this.connections.snapshot();
    if (sessions.length === 0) {
      return 0;
    }

    const message: ServerStatsMessage = {
      type: 'server_stats',
      timestamp: isoNow(),
      stats: this.collectStats(),
    };
    const payload = JSON.stringify(message);

    let delivered = 0;
    const failed: ClientConnection[] = [];
    for (const session of sessions) {
      if (session.send(payload)) {
        delivered++;
      } else {
        failed.push(session);
      }
    }

    for (const session of failed) {
      this.onDeliveryFailed?.(session);
    }

    if (failed.length > 0) {
      logger.warn({ delivered, failed: failed.length }, 'Stats broadcast reached a closed session');
    }
    return delivered;
  }
}
