import { describe, it, expect } from 'vitest';
import { clamp, computePercentile, computePercentileBounds } from '../src/lib/utils/helpers';

describe('clamp', () => {
  it('should return value when within range', () => {
    expect(clamp(5, 0, 10)).toBe(5);
    expect(clamp(0, 0, 10)).toBe(0);
    expect(clamp(10, 0, 10)).toBe(10);
  });

  it('should return min when value is below range', () => {
    expect(clamp(-5, 0, 10)).toBe(0);
  });

  it('should return max when value is above range', () => {
    expect(clamp(15, 0, 10)).toBe(10);
  });
});

describe('computePercentile', () => {
  it('should return 0 for no samples', () => {
    expect(computePercentile([], 50)).toBe(0);
  });

  it('should return the only sample', () => {
    expect(computePercentile(new Uint8Array([7]), 98)).toBe(7);
  });

  it('should interpolate between sorted samples', () => {
    const samples = new Float64Array([40, 10, 30, 20, 0]);
    expect(computePercentile(samples, 0)).toBe(0);
    expect(computePercentile(samples, 50)).toBe(20);
    expect(computePercentile(samples, 100)).toBe(40);
    expect(computePercentile(samples, 10)).toBeCloseTo(4);
  });
});

describe('computePercentileBounds', () => {
  it('should default to 0..1 for no samples', () => {
    expect(computePercentileBounds([])).toEqual({ min: 0, max: 1 });
  });

  it('should widen coinciding bounds', () => {
    expect(computePercentileBounds([5, 5, 5])).toEqual({ min: 4.5, max: 5.5 });
  });

  it('should use the requested percentiles', () => {
    expect(computePercentileBounds([0, 25, 50, 75, 100], 0, 100)).toEqual({ min: 0, max: 100 });
  });
});
