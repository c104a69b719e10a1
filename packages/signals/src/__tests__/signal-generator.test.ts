import { describe, it, expect } from 'vitest';
import { DataPointSchema } from '@tickcast/schemas';
import type { RandomSource } from '../core/random.js';
import { SignalGenerator, SIGNAL_DEFAULTS } from '../generator/signal-generator.js';

/**
 * Uniform draws land on the midpoint of their range; gaussian draws
 * come from the queue (then 0 once it is empty).
 */
function scriptedRandom(noise: number[] = [], overrides: Partial<RandomSource> = {}): RandomSource {
  const queue = [...noise];
  return {
    uniform: (min, max) => (min + max) / 2,
    gaussian: (mean) => mean + (queue.shift() ?? 0),
    ...overrides,
  };
}

/** Forces the 5% anomaly draw (and a downward spike) */
function anomalyRandom(): RandomSource {
  return scriptedRandom([], {
    uniform: (min, max) => (min === 0 && max === 1 ? 0.01 : (min + max) / 2),
  });
}

const EPOCH: () => number = () => 0;

describe('SignalGenerator', () => {
  describe('construction', () => {
    it('creates the stock field set from the initial ranges', () => {
      const generator = new SignalGenerator({ source: 'stock', random: scriptedRandom(), clock: EPOCH });

      expect(generator.kind).toBe('stock');
      expect(generator.snapshot()).toEqual({
        price: 100,
        volume: 1_000_000,
        market_cap: 1_000_000_000,
      });
      expect(generator.trend).toBe(0);
      expect(generator.volatility).toBe(0.02);
    });

    it('creates the sensor field set in emission order', () => {
      const generator = new SignalGenerator({ source: 'sensor', random: scriptedRandom(), clock: EPOCH });

      expect(generator.fieldNames).toEqual(['temperature', 'humidity', 'pressure', 'light']);
      expect(generator.snapshot()).toEqual({
        temperature: 25,
        humidity: 50,
        pressure: 1013.25,
        light: 500,
      });
    });

    it('falls back to a generic generator for unknown source names', () => {
      const generator = new SignalGenerator({ source: 'solar', random: scriptedRandom(), clock: EPOCH });

      expect(generator.kind).toBe('generic');
      expect(generator.source).toBe('solar');
      expect(generator.snapshot()).toEqual({ value: 50 });
    });
  });

  describe('nextValue()', () => {
    it('applies noise multiplicatively and stores the rounded result', () => {
      const generator = new SignalGenerator({ source: 'stock', random: scriptedRandom([0.05]), clock: EPOCH });

      expect(generator.nextValue('price', 100)).toBe(105);
      expect(generator.snapshot().price).toBe(105);
    });

    it('rounds to two decimals', () => {
      const generator = new SignalGenerator({ source: 'stock', random: scriptedRandom([0.001234]), clock: EPOCH });

      // 1000 * 1.001234 = 1001.234
      expect(generator.nextValue('volume', 1000)).toBe(1001.23);
    });

    it('adds the hourly seasonal term', () => {
      const quarterPeriodMs = (Math.PI / 2) * 3600 * 1000;
      const generator = new SignalGenerator({
        source: 'stock',
        random: scriptedRandom(),
        clock: () => quarterPeriodMs,
      });

      // sin(π/2) = 1, so the multiplier is 1 + 0.1
      expect(generator.nextValue('volume', 1000)).toBe(1100);
    });

    it('floors a price that would go negative at 10% of its base', () => {
      const generator = new SignalGenerator({ source: 'stock', random: scriptedRandom([-1.5]), clock: EPOCH });

      expect(generator.nextValue('price', 100)).toBe(10);
    });

    it('clamps humidity and temperature', () => {
      const generator = new SignalGenerator({
        source: 'sensor',
        random: scriptedRandom([0.5, -2]),
        clock: EPOCH,
      });

      expect(generator.nextValue('humidity', 90)).toBe(100);
      expect(generator.nextValue('temperature', 40)).toBe(-40);
    });

    it('clamps temperature at the lower bound', () => {
      const generator = new SignalGenerator({ source: 'weather', random: scriptedRandom([-3]), clock: EPOCH });

      // 40 * (1 - 3) = -80 -> -50
      expect(generator.nextValue('temperature', 40)).toBe(-50);
    });

    it('keeps the trend within the clamp band under a one-sided walk', () => {
      const up = new SignalGenerator({
        source: 'generic',
        random: scriptedRandom([], { uniform: (_min, max) => max }),
        clock: EPOCH,
      });
      const down = new SignalGenerator({
        source: 'generic',
        random: scriptedRandom([], { uniform: (min) => min }),
        clock: EPOCH,
      });

      for (let i = 0; i < 200; i++) {
        up.nextValue('value', 50);
        down.nextValue('value', 50);
      }

      expect(up.trend).toBe(SIGNAL_DEFAULTS.trendLimit);
      expect(down.trend).toBe(-SIGNAL_DEFAULTS.trendLimit);
    });

    it('never adds a field the generator was not created with', () => {
      const generator = new SignalGenerator({ source: 'stock', random: scriptedRandom(), clock: EPOCH });

      expect(generator.nextValue('bogus', 10)).toBe(10);

      expect(generator.fieldNames).toEqual(['price', 'volume', 'market_cap']);
      expect(Object.keys(generator.generateDataPoint().data)).toEqual(['price', 'volume', 'market_cap']);
    });
  });

  describe('generateDataPoint()', () => {
    it('assembles timestamp, source, values and metadata', () => {
      const now = 1_700_000_123_456;
      const generator = new SignalGenerator({ source: 'network', random: scriptedRandom(), clock: () => now });

      const point = generator.generateDataPoint();

      expect(point.timestamp).toBe(new Date(now).toISOString());
      expect(point.source).toBe('network');
      expect(Object.keys(point.data)).toEqual(['bandwidth', 'latency', 'packets', 'errors']);
      expect(point.metadata).toEqual({
        sequence: 123456,
        quality: 0.975,
        anomaly_score: 0.05,
        is_anomaly: false,
      });
      expect(DataPointSchema.safeParse(point).success).toBe(true);
    });

    it('emits the stored values when nothing moves', () => {
      const generator = new SignalGenerator({ source: 'sensor', random: scriptedRandom(), clock: EPOCH });

      const point = generator.generateDataPoint();

      expect(point.data).toEqual({ temperature: 25, humidity: 50, pressure: 1013.25, light: 500 });
      expect(generator.snapshot()).toEqual(point.data);
    });

    it('spikes emitted values on an anomaly without touching stored values', () => {
      const generator = new SignalGenerator({ source: 'sensor', random: anomalyRandom(), clock: EPOCH });

      const point = generator.generateDataPoint();

      expect(point.metadata.is_anomaly).toBe(true);
      expect(point.metadata.anomaly_score).toBeCloseTo(0.95, 10);
      expect(point.data.temperature).toBe(22.5);
      expect(point.data.humidity).toBe(45);
      expect(point.data.light).toBe(450);
      expect(generator.snapshot()).toEqual({ temperature: 25, humidity: 50, pressure: 1013.25, light: 500 });
    });

    it('never changes the field set', () => {
      const generator = new SignalGenerator({ source: 'weather' });
      const names = generator.fieldNames;

      for (let i = 0; i < 50; i++) {
        expect(Object.keys(generator.generateDataPoint().data)).toEqual(names);
      }
      expect(generator.fieldNames).toEqual(names);
    });
  });

  describe('bounds under real entropy', () => {
    it.each(['stock', 'sensor', 'crypto', 'weather', 'network'])(
      'keeps %s values and trend within bounds over many updates',
      (source) => {
        const generator = new SignalGenerator({ source });

        for (let i = 0; i < 1000; i++) {
          const { data } = generator.generateDataPoint();

          if ('temperature' in data) {
            expect(data.temperature).toBeGreaterThanOrEqual(-50);
            expect(data.temperature).toBeLessThanOrEqual(60);
          }
          for (const field of ['humidity', 'dominance']) {
            if (field in data) {
              expect(data[field]).toBeGreaterThanOrEqual(0);
              expect(data[field]).toBeLessThanOrEqual(100);
            }
          }
          if ('price' in data) {
            expect(data.price).toBeGreaterThanOrEqual(0);
          }
          expect(Math.abs(generator.trend)).toBeLessThanOrEqual(SIGNAL_DEFAULTS.trendLimit);
        }
      }
    );
  });
});
