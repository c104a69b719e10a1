/**
 * Entropy and time sources for the signal generators.
 *
 * Generators never touch Math.random or Date.now directly so tests can
 * drive them with scripted values.
 */

export interface RandomSource {
  /** Uniform draw in [min, max) */
  uniform(min: number, max: number): number;
  /** Normal draw with the given mean and standard deviation */
  gaussian(mean: number, stdDev: number): number;
}

/** Milliseconds since the epoch */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

/**
 * Box-Muller transform over two uniform draws.
 * `u1` is shifted away from 0 so the log stays finite.
 */
export function boxMuller(u1: number, u2: number): number {
  const safeU1 = u1 <= Number.EPSILON ? Number.EPSILON : u1;
  return Math.sqrt(-2 * Math.log(safeU1)) * Math.cos(2 * Math.PI * u2);
}

/**
 * RandomSource backed by a [0, 1) generator, Math.random by default.
 */
export function createRandomSource(next: () => number = Math.random): RandomSource {
  return {
    uniform: (min, max) => min + (max - min) * next(),
    gaussian: (mean, stdDev) => mean + stdDev * boxMuller(next(), next()),
  };
}

export const defaultRandomSource: RandomSource = createRandomSource();
