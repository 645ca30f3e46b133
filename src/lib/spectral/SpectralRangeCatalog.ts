import { SpectralRange } from './SpectralRange';

/**
 * Names of the well-known spectral ranges
 */
export type SpectralRangeName =
  | 'ultraviolet'
  | 'violet'
  | 'blue'
  | 'green'
  | 'yellow'
  | 'orange'
  | 'red'
  | 'visible'
  | 'nearInfrared'
  | 'shortWavelengthInfrared'
  | 'middleWavelengthInfrared'
  | 'longWavelengthInfrared'
  | 'farInfrared'
  | 'infrared';

/**
 * Interval bounds in metres. Intervals overlap: visible spans
 * violet..red and infrared spans nearInfrared..farInfrared.
 */
const RANGE_BOUNDS: Record<SpectralRangeName, [number, number]> = {
  ultraviolet: [10e-9, 400e-9],
  violet: [380e-9, 450e-9],
  blue: [450e-9, 495e-9],
  green: [495e-9, 570e-9],
  yellow: [570e-9, 590e-9],
  orange: [590e-9, 620e-9],
  red: [620e-9, 750e-9],
  visible: [380e-9, 750e-9],
  nearInfrared: [750e-9, 1.4e-6],
  shortWavelengthInfrared: [1.4e-6, 3e-6],
  middleWavelengthInfrared: [3e-6, 8e-6],
  longWavelengthInfrared: [8e-6, 15e-6],
  farInfrared: [15e-6, 1e-3],
  infrared: [750e-9, 1e-3],
};

/**
 * Human-readable display names for spectral ranges
 */
export const SPECTRAL_RANGE_LABELS: Record<SpectralRangeName, string> = {
  ultraviolet: 'Ultraviolet',
  violet: 'Violet',
  blue: 'Blue',
  green: 'Green',
  yellow: 'Yellow',
  orange: 'Orange',
  red: 'Red',
  visible: 'Visible',
  nearInfrared: 'Near infrared (NIR)',
  shortWavelengthInfrared: 'Short-wavelength infrared (SWIR)',
  middleWavelengthInfrared: 'Mid-wavelength infrared (MWIR)',
  longWavelengthInfrared: 'Long-wavelength infrared (LWIR)',
  farInfrared: 'Far infrared (FIR)',
  infrared: 'Infrared',
};

/**
 * List of all spectral range names, shortest wavelengths first
 */
export const SPECTRAL_RANGE_NAMES: SpectralRangeName[] = [
  'ultraviolet',
  'violet',
  'blue',
  'green',
  'yellow',
  'orange',
  'red',
  'visible',
  'nearInfrared',
  'shortWavelengthInfrared',
  'middleWavelengthInfrared',
  'longWavelengthInfrared',
  'farInfrared',
  'infrared',
];

const cache = new Map<SpectralRangeName, SpectralRange>();

/**
 * Gets the spectral range with the given name. Ranges are created on first
 * access and the same instance is returned afterwards.
 *
 * @param name - The range name
 * @returns The immutable spectral range
 */
export function rangeOf(name: SpectralRangeName): SpectralRange {
  let range = cache.get(name);
  if (!range) {
    const [start, end] = RANGE_BOUNDS[name];
    range = new SpectralRange(start, end);
    cache.set(name, range);
  }
  return range;
}

/**
 * Finds every named range containing the wavelength. Several names usually
 * match (red light is also visible light).
 *
 * @param wavelength - Wavelength in metres
 * @returns Set of matching range names, empty outside the catalog
 */
export function classify(wavelength: number): Set<SpectralRangeName> {
  const names = new Set<SpectralRangeName>();
  if (!Number.isFinite(wavelength)) return names;

  for (const name of SPECTRAL_RANGE_NAMES) {
    if (rangeOf(name).contains(wavelength)) {
      names.add(name);
    }
  }
  return names;
}

/**
 * Finds the named ranges that fully contain the given range.
 */
export function classifyRange(range: SpectralRange): Set<SpectralRangeName> {
  return new Set(SPECTRAL_RANGE_NAMES.filter((name) => rangeOf(name).containsRange(range)));
}

/**
 * Type guard for range names coming from untyped input (metadata, files).
 */
export function isSpectralRangeName(value: string): value is SpectralRangeName {
  return Object.prototype.hasOwnProperty.call(RANGE_BOUNDS, value);
}
