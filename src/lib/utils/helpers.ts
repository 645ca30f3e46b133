/**
 * Clamps a value between a minimum and maximum.
 *
 * @param value - The value to clamp
 * @param min - The minimum allowed value
 * @param max - The maximum allowed value
 * @returns The clamped value
 */
export function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

/**
 * Computes a percentile of the samples by linear interpolation.
 * Large inputs are sampled at a fixed stride.
 *
 * @param samples - Sample values in any order
 * @param percentile - The percentile to compute (0-100)
 * @param maxSamples - Maximum number of samples used (default: 100000)
 * @returns The value at the given percentile, 0 for no samples
 */
export function computePercentile(
  samples: ArrayLike<number>,
  percentile: number,
  maxSamples: number = 100000
): number {
  if (samples.length === 0) return 0;
  if (samples.length === 1) return samples[0];

  let values: number[];
  if (samples.length > maxSamples) {
    const step = samples.length / maxSamples;
    values = [];
    for (let i = 0; i < maxSamples; i++) {
      values.push(samples[Math.floor(i * step)]);
    }
  } else {
    values = Array.from(samples);
  }
  values.sort((a, b) => a - b);

  const index = (percentile / 100) * (values.length - 1);
  const lower = Math.floor(index);
  const upper = Math.ceil(index);
  if (lower === upper) {
    return values[lower];
  }

  const fraction = index - lower;
  return values[lower] * (1 - fraction) + values[upper] * fraction;
}

/**
 * Computes the stretch bounds of a band (e.g. its 2nd and 98th percentile).
 *
 * @param samples - Sample values of the band
 * @param lowerPercentile - Lower percentile (default: 2)
 * @param upperPercentile - Upper percentile (default: 98)
 * @returns Bounds widened by 0.5 on both sides when they coincide
 */
export function computePercentileBounds(
  samples: ArrayLike<number>,
  lowerPercentile: number = 2,
  upperPercentile: number = 98
): { min: number; max: number } {
  if (samples.length === 0) return { min: 0, max: 1 };

  const min = computePercentile(samples, lowerPercentile);
  const max = computePercentile(samples, upperPercentile);
  if (min === max) {
    return { min: min - 0.5, max: max + 0.5 };
  }
  return { min, max };
}
