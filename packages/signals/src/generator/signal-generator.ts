import type { DataPoint, SourceKind } from '@tickcast/schemas';
import { clamp, roundTo } from '@tickcast/utils';
import {
  type Clock,
  type RandomSource,
  defaultRandomSource,
  systemClock,
} from '../core/random.js';
import { applyClampPolicy, applyFieldBounds } from './clamp.js';
import { createInitialFields, resolveSourceKind, type FieldValues } from './fields.js';

/**
 * Model constants for the synthetic feed. Tuned for plausible-looking
 * charts, not for any statistical property.
 */
export const SIGNAL_DEFAULTS = {
  /** Standard deviation of the per-update noise term */
  volatility: 0.02,
  /** Trend is clamped to [-trendLimit, trendLimit] */
  trendLimit: 0.005,
  /** Per-update random walk step: U(-trendStep, trendStep) */
  trendStep: 0.0001,
  /** Initial trend: U(-initialTrend, initialTrend) */
  initialTrend: 0.001,
  /** Seasonal amplitude, one-hour period */
  seasonalAmplitude: 0.1,
  seasonalPeriodSeconds: 3600,
  /** Probability that a data point is flagged and spiked */
  anomalyProbability: 0.05,
  /** Relative size of an injected spike */
  anomalySpike: 0.1,
  /** Output precision */
  decimals: 2,
} as const;

export interface SignalGeneratorOptions {
  /** Source name requested by the client */
  source: string;
  random?: RandomSource;
  clock?: Clock;
}

/**
 * Synthetic time-series generator for one source.
 *
 * Holds the current value of every field plus a shared trend. Each
 * update walks the trend, adds an hourly seasonal term and gaussian
 * noise, then applies the field's clamp policy.
 */
export class SignalGenerator {
  public readonly source: string;
  public readonly kind: SourceKind;

  private readonly fields: FieldValues;
  private readonly random: RandomSource;
  private readonly clock: Clock;
  private currentTrend: number;

  constructor(opts: SignalGeneratorOptions) {
    this.source = opts.source;
    this.kind = resolveSourceKind(opts.source);
    this.random = opts.random ?? defaultRandomSource;
    this.clock = opts.clock ?? systemClock;
    this.fields = createInitialFields(this.kind, this.random);
    this.currentTrend = this.random.uniform(-SIGNAL_DEFAULTS.initialTrend, SIGNAL_DEFAULTS.initialTrend);
  }

  get trend(): number {
    return this.currentTrend;
  }

  get volatility(): number {
    return SIGNAL_DEFAULTS.volatility;
  }

  /** Field names in emission order */
  get fieldNames(): string[] {
    return Object.keys(this.fields);
  }

  /** Copy of the stored field values */
  snapshot(): FieldValues {
    return { ...this.fields };
  }

  /**
   * Compute the next value for one field from its base and store it.
   * A name outside this generator's field set is computed but never stored,
   * so the field set keeps the size it had at creation.
   *
   * @returns The new value rounded to 2 decimals (also the new stored base)
   */
  nextValue(field: string, base: number): number {
    this.walkTrend();

    const nowSeconds = this.clock() / 1000;
    const seasonal =
      SIGNAL_DEFAULTS.seasonalAmplitude *
      Math.sin(nowSeconds / SIGNAL_DEFAULTS.seasonalPeriodSeconds);
    const noise = this.random.gaussian(0, SIGNAL_DEFAULTS.volatility);

    const candidate = base * (1 + this.currentTrend + seasonal + noise);
    const value = roundTo(applyClampPolicy(field, candidate, base), SIGNAL_DEFAULTS.decimals);

    if (Object.hasOwn(this.fields, field)) {
      this.fields[field] = value;
    }
    return value;
  }

  /**
   * Advance every field once and package the result as a data point.
   * A 5% draw flags the point as an anomaly and spikes the emitted
   * values; stored values are not affected by the spike.
   */
  generateDataPoint(): DataPoint {
    const now = this.clock();
    const data: FieldValues = {};

    for (const field of this.fieldNames) {
      data[field] = this.nextValue(field, this.fields[field]);
    }

    const isAnomaly = this.random.uniform(0, 1) < SIGNAL_DEFAULTS.anomalyProbability;
    if (isAnomaly) {
      const direction = this.random.uniform(0, 1) < 0.5 ? -1 : 1;
      const factor = 1 + direction * SIGNAL_DEFAULTS.anomalySpike;
      for (const field of Object.keys(data)) {
        data[field] = roundTo(applyFieldBounds(field, data[field] * factor), SIGNAL_DEFAULTS.decimals);
      }
    }

    return {
      timestamp: new Date(now).toISOString(),
      source: this.source,
      data,
      metadata: {
        sequence: Math.floor(now) % 1_000_000,
        quality: this.random.uniform(0.95, 1.0),
        anomaly_score: isAnomaly ? this.random.uniform(0.9, 1.0) : this.random.uniform(0, 0.1),
        is_anomaly: isAnomaly,
      },
    };
  }

  private walkTrend(): void {
    const step = this.random.uniform(-SIGNAL_DEFAULTS.trendStep, SIGNAL_DEFAULTS.trendStep);
    this.currentTrend = clamp(
      this.currentTrend + step,
      -SIGNAL_DEFAULTS.trendLimit,
      SIGNAL_DEFAULTS.trendLimit
    );
  }
}
