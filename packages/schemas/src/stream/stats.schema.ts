import { z } from 'zod';

/** Stats broadcast interval in milliseconds (5 seconds) */
export const STATS_INTERVAL_MS = 5_000;

/** Transport ping interval in milliseconds (20 seconds) */
export const PING_INTERVAL_MS = 20_000;

/** Time allowed for a pong before the socket is terminated (10 seconds) */
export const PING_TIMEOUT_MS = 10_000;

/**
 * Aggregate server statistics pushed to every connected client.
 */
export const ServerStatsSchema = z.object({
  clients_connected: z.number().int().nonnegative(),
  active_sources: z.array(z.string()),
  /** Seconds since the stream bridge started */
  uptime: z.number().nonnegative(),
  /** V8 heap in use, in megabytes */
  memory_usage: z.number().nonnegative(),
  /** Data messages delivered since start */
  data_points_sent: z.number().int().nonnegative(),
});

export type ServerStats = z.infer<typeof ServerStatsSchema>;
