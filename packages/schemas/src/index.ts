/**
 * @tickcast/schemas
 *
 * Zod schemas and inferred types shared by the signal generators,
 * the stream API and the server app
 */

// Signal source schemas
export * from './signals/source.schema';

// Stream schemas
export * from './stream/stats.schema';

// Environment and configuration schemas
export * from './env/config.schema';
