import { clamp } from '@tickcast/utils';

/** Percentage-like fields */
export const PERCENT_FIELDS: ReadonlySet<string> = new Set(['humidity', 'dominance']);

export const PERCENT_BOUNDS = { min: 0, max: 100 } as const;

export const TEMPERATURE_BOUNDS = { min: -50, max: 60 } as const;

/** Fraction of the prior price used when an update would go negative */
export const PRICE_FLOOR_RATIO = 0.1;

/**
 * Apply the per-field clamp policy to a candidate value.
 *
 * - `price`: a negative candidate becomes 10% of the prior value
 * - `humidity`, `dominance`: [0, 100]
 * - `temperature`: [-50, 60]
 * - anything else passes through
 */
export function applyClampPolicy(field: string, candidate: number, prior: number): number {
  if (field === 'price') {
    return candidate < 0 ? prior * PRICE_FLOOR_RATIO : candidate;
  }
  if (PERCENT_FIELDS.has(field)) {
    return clamp(candidate, PERCENT_BOUNDS.min, PERCENT_BOUNDS.max);
  }
  if (field === 'temperature') {
    return clamp(candidate, TEMPERATURE_BOUNDS.min, TEMPERATURE_BOUNDS.max);
  }
  return candidate;
}

/**
 * Hard range checks only, for values that have no meaningful prior
 * (e.g. an injected spike). Prices are floored at zero.
 */
export function applyFieldBounds(field: string, value: number): number {
  if (field === 'price') {
    return Math.max(value, 0);
  }
  return applyClampPolicy(field, value, value);
}
