import { describe, it, expect } from 'vitest';
import { applyClampPolicy, applyFieldBounds } from '../generator/clamp.js';

describe('applyClampPolicy', () => {
  it('floors a negative price at 10% of the prior value', () => {
    expect(applyClampPolicy('price', -5, 40)).toBe(4);
  });

  it('leaves a non-negative price untouched', () => {
    expect(applyClampPolicy('price', 12.5, 10)).toBe(12.5);
    expect(applyClampPolicy('price', 0, 10)).toBe(0);
  });

  it('clamps percentage fields to [0, 100]', () => {
    expect(applyClampPolicy('humidity', 130, 90)).toBe(100);
    expect(applyClampPolicy('humidity', -1, 2)).toBe(0);
    expect(applyClampPolicy('dominance', -3, 2)).toBe(0);
    expect(applyClampPolicy('dominance', 55.5, 50)).toBe(55.5);
  });

  it('clamps temperature to [-50, 60]', () => {
    expect(applyClampPolicy('temperature', 75, 50)).toBe(60);
    expect(applyClampPolicy('temperature', -80, -40)).toBe(-50);
    expect(applyClampPolicy('temperature', 21.3, 20)).toBe(21.3);
  });

  it('passes other fields through unclamped', () => {
    expect(applyClampPolicy('volume', -100, 5)).toBe(-100);
    expect(applyClampPolicy('pressure', 5000, 1013.25)).toBe(5000);
  });
});

describe('applyFieldBounds', () => {
  it('floors prices at zero', () => {
    expect(applyFieldBounds('price', -1)).toBe(0);
    expect(applyFieldBounds('price', 90)).toBe(90);
  });

  it('applies the range clamps', () => {
    expect(applyFieldBounds('humidity', 110)).toBe(100);
    expect(applyFieldBounds('temperature', 66)).toBe(60);
    expect(applyFieldBounds('light', 2000)).toBe(2000);
  });
});
