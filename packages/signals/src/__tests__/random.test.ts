import { describe, it, expect } from 'vitest';
import { boxMuller, createRandomSource } from '../core/random.js';

describe('boxMuller', () => {
  it('maps (e^-0.5, 0) to exactly one standard deviation', () => {
    expect(boxMuller(Math.exp(-0.5), 0)).toBeCloseTo(1, 12);
  });

  it('stays finite when the first draw is zero', () => {
    expect(Number.isFinite(boxMuller(0, 0))).toBe(true);
  });
});

describe('createRandomSource', () => {
  it('scales uniform draws into the requested range', () => {
    const random = createRandomSource(() => 0.25);
    expect(random.uniform(0, 8)).toBe(2);
    expect(random.uniform(-10, 10)).toBe(-5);
  });

  it('shifts and scales gaussian draws', () => {
    // cos(2π · 0.25) is zero, so the draw collapses onto the mean
    const random = createRandomSource(() => 0.25);
    expect(random.gaussian(10, 2)).toBeCloseTo(10, 10);
  });

  it('produces roughly standard normal draws from Math.random', () => {
    const random = createRandomSource();
    const samples = Array.from({ length: 5000 }, () => random.gaussian(0, 1));
    const mean = samples.reduce((acc, v) => acc + v, 0) / samples.length;
    const variance = samples.reduce((acc, v) => acc + (v - mean) ** 2, 0) / samples.length;

    expect(Math.abs(mean)).toBeLessThan(0.1);
    expect(variance).toBeGreaterThan(0.8);
    expect(variance).toBeLessThan(1.2);
  });
});
