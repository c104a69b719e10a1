import type { AvailableSource, SourceKind } from '@tickcast/schemas';
import { AVAILABLE_SOURCES } from '@tickcast/schemas';
import type { RandomSource } from '../core/random.js';

/**
 * Field name -> current value. Insertion order is the emission order.
 */
export type FieldValues = Record<string, number>;

type FieldFactory = (random: RandomSource) => FieldValues;

/**
 * Initial values per source kind, drawn once when a generator is created.
 * The field set chosen here is fixed for the generator's lifetime.
 */
const INITIAL_FIELDS: Record<SourceKind, FieldFactory> = {
  stock: (r) => ({
    price: 100 + r.uniform(-20, 20),
    volume: 1_000_000,
    market_cap: 1_000_000_000,
  }),
  sensor: (r) => ({
    temperature: 20 + r.uniform(-5, 15),
    humidity: 50 + r.uniform(-20, 20),
    pressure: 1013.25 + r.uniform(-50, 50),
    light: r.uniform(0, 1000),
  }),
  network: (r) => ({
    bandwidth: r.uniform(100, 1000),
    latency: 10 + r.uniform(0, 50),
    packets: r.uniform(1000, 10_000),
    errors: r.uniform(0, 10),
  }),
  crypto: (r) => ({
    price: 50_000 + r.uniform(-10_000, 20_000),
    volume: r.uniform(100_000_000, 1_000_000_000),
    market_cap: 1_000_000_000_000,
    dominance: r.uniform(40, 60),
  }),
  weather: (r) => ({
    temperature: 15 + r.uniform(-10, 25),
    humidity: 40 + r.uniform(-20, 40),
    wind_speed: r.uniform(0, 30),
    pressure: 1013.25 + r.uniform(-40, 40),
    precipitation: r.uniform(0, 10),
  }),
  generic: () => ({
    value: 50,
  }),
};

function isAvailableSource(source: string): source is AvailableSource {
  return AVAILABLE_SOURCES.some((available) => available === source);
}

/**
 * Map a requested source name onto its generator kind.
 * Names outside the advertised list get a `generic` generator.
 */
export function resolveSourceKind(source: string): SourceKind {
  return isAvailableSource(source) ? source : 'generic';
}

export function createInitialFields(kind: SourceKind, random: RandomSource): FieldValues {
  return INITIAL_FIELDS[kind](random);
}
