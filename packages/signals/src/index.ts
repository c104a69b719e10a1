/**
 * @tickcast/signals
 *
 * Synthetic time-series generators and the per-source registry.
 */

// Entropy and time
export {
  createRandomSource,
  defaultRandomSource,
  systemClock,
  boxMuller,
  type RandomSource,
  type Clock,
} from './core/random.js';

// Generators
export { SignalGenerator, SIGNAL_DEFAULTS, type SignalGeneratorOptions } from './generator/signal-generator.js';
export {
  applyClampPolicy,
  applyFieldBounds,
  PERCENT_FIELDS,
  PERCENT_BOUNDS,
  TEMPERATURE_BOUNDS,
  PRICE_FLOOR_RATIO,
} from './generator/clamp.js';
export { createInitialFields, resolveSourceKind, type FieldValues } from './generator/fields.js';

// Registry
export {
  SourceRegistry,
  SourceLimitError,
  DEFAULT_MAX_GENERIC_SOURCES,
  type SourceRegistryOptions,
} from './registry/source-registry.js';
