import { z } from 'zod';

// ============================================
// Source Kinds
// ============================================

export const SourceKindSchema = z.enum([
  'stock',
  'sensor',
  'network',
  'crypto',
  'weather',
  'generic',
]);

export type SourceKind = z.infer<typeof SourceKindSchema>;

/**
 * Source kinds advertised to clients in the welcome message.
 * `generic` is not advertised: it backs any source name outside this list.
 */
export const AVAILABLE_SOURCES = [
  'stock',
  'sensor',
  'network',
  'crypto',
  'weather',
] as const satisfies readonly SourceKind[];

export type AvailableSource = (typeof AVAILABLE_SOURCES)[number];

// ============================================
// Data Point
// ============================================

export const DataPointMetadataSchema = z.object({
  /** Wall-clock milliseconds modulo 1,000,000 */
  sequence: z.number().int().nonnegative(),
  quality: z.number().min(0).max(1),
  anomaly_score: z.number().min(0).max(1),
  is_anomaly: z.boolean(),
});

export type DataPointMetadata = z.infer<typeof DataPointMetadataSchema>;

/**
 * One generated sample for a source. Transient: built per tick, never stored.
 */
export const DataPointSchema = z.object({
  timestamp: z.string().datetime({ offset: true }),
  source: z.string().min(1),
  data: z.record(z.string(), z.number()),
  metadata: DataPointMetadataSchema,
});

export type DataPoint = z.infer<typeof DataPointSchema>;
