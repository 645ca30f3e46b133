import { InvalidDimensionError } from '../core/errors';

/**
 * Closed wavelength interval in metres.
 */
export class SpectralRange {
  readonly start: number;
  readonly end: number;

  /**
   * @param start - Shortest wavelength (m)
   * @param end - Longest wavelength (m), not less than `start`
   */
  constructor(start: number, end: number) {
    if (!Number.isFinite(start) || start < 0) {
      throw new InvalidDimensionError('wavelength minimum', start, 'is not a non-negative finite number');
    }
    if (!Number.isFinite(end) || end < start) {
      throw new InvalidDimensionError('wavelength maximum', end, 'is less than the wavelength minimum');
    }
    this.start = start;
    this.end = end;
    Object.freeze(this);
  }

  get width(): number {
    return this.end - this.start;
  }

  get center(): number {
    return (this.start + this.end) / 2;
  }

  contains(wavelength: number): boolean {
    return wavelength >= this.start && wavelength <= this.end;
  }

  /**
   * Interval containment on both ends.
   */
  containsRange(other: SpectralRange): boolean {
    return other.start >= this.start && other.end <= this.end;
  }

  overlaps(other: SpectralRange): boolean {
    return other.start <= this.end && other.end >= this.start;
  }

  equals(other: SpectralRange): boolean {
    return this.start === other.start && this.end === other.end;
  }

  toString(): string {
    return `SpectralRange [${formatWavelength(this.start)} - ${formatWavelength(this.end)}]`;
  }
}

/**
 * Formats a wavelength with the most readable unit (nm, µm or mm).
 */
export function formatWavelength(meters: number): string {
  if (meters < 1e-6) return `${parseFloat((meters * 1e9).toFixed(3))} nm`;
  if (meters < 1e-3) return `${parseFloat((meters * 1e6).toFixed(3))} µm`;
  return `${parseFloat((meters * 1e3).toFixed(3))} mm`;
}
