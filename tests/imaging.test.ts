import { describe, it, expect } from 'vitest';
import {
  InvalidDimensionError,
  InvalidImagingError,
  InvalidRadiometricResolutionError,
  NullArgumentError,
} from '../src/lib/core/errors';
import {
  concatImaging,
  createRasterImaging,
  filterImaging,
  getImagingSpectralRanges,
} from '../src/lib/imaging/RasterImaging';
import type { ImagingBand } from '../src/lib/imaging/RasterImaging';
import { rangeOf } from '../src/lib/spectral/SpectralRangeCatalog';

const bands: ImagingBand[] = [
  { description: 'Blue', radiometricResolution: 8, spectralRange: rangeOf('blue') },
  { description: 'Green', radiometricResolution: 8, spectralRange: rangeOf('green') },
  { description: 'Red', radiometricResolution: 12, spectralRange: rangeOf('red') },
];

const corners: [number, number][] = [
  [19.0, 47.5],
  [19.1, 47.5],
  [19.1, 47.4],
  [19.0, 47.4],
];

describe('createRasterImaging', () => {
  it('should keep acquisition data', () => {
    const imaging = createRasterImaging({
      device: { identifier: 'sensor-1', mission: 'Test Mission', instrument: 'Imager' },
      time: new Date('2024-06-01T10:30:00Z'),
      imageLocation: corners,
      sunAzimuth: 142.5,
      bands,
      parameters: { cloudCover: 0.1 },
    });

    expect(imaging.device?.mission).toBe('Test Mission');
    expect(imaging.time?.toISOString()).toBe('2024-06-01T10:30:00.000Z');
    expect(imaging.imageLocation).toEqual(corners);
    expect(imaging.sunAzimuth).toBe(142.5);
    expect(imaging.sunElevation).toBeNull();
    expect(imaging.bands).toHaveLength(3);
    expect(imaging.parameters).toEqual({ cloudCover: 0.1 });
    expect(Object.isFrozen(imaging)).toBe(true);
  });

  it('should default to empty metadata', () => {
    const imaging = createRasterImaging({});
    expect(imaging.device).toBeNull();
    expect(imaging.imageLocation).toBeNull();
    expect(imaging.bands).toEqual([]);
  });

  it('should require four image corners', () => {
    expect(() => createRasterImaging({ imageLocation: corners.slice(0, 3) })).toThrow(InvalidImagingError);
  });

  it('should require a named mission and instrument', () => {
    expect(() =>
      createRasterImaging({ device: { identifier: 'x', mission: ' ', instrument: 'Imager' } })
    ).toThrow(InvalidImagingError);
  });

  it('should validate band resolutions', () => {
    expect(() =>
      createRasterImaging({ bands: [{ radiometricResolution: 0, spectralRange: null }] })
    ).toThrow(InvalidRadiometricResolutionError);
    expect(() =>
      createRasterImaging({ bands: [{ radiometricResolution: 65, spectralRange: null }] })
    ).toThrow(InvalidRadiometricResolutionError);
  });
});

describe('filterImaging', () => {
  const imaging = createRasterImaging({ sunElevation: 40, bands });

  it('should keep the listed bands in order', () => {
    const filtered = filterImaging(imaging, [2, 0]);
    expect(filtered.bands.map((band) => band.description)).toEqual(['Red', 'Blue']);
    expect(filtered.sunElevation).toBe(40);
  });

  it('should reject an empty list', () => {
    expect(() => filterImaging(imaging, [])).toThrow(NullArgumentError);
  });

  it('should reject out-of-range indices', () => {
    expect(() => filterImaging(imaging, [3])).toThrow(InvalidDimensionError);
  });
});

describe('concatImaging', () => {
  it('should join bands and keep the first acquisition', () => {
    const first = createRasterImaging({ sunElevation: 40, bands: bands.slice(0, 1) });
    const second = createRasterImaging({ sunElevation: 10, bands: bands.slice(1) });
    const joined = concatImaging([first, second]);
    expect(joined.sunElevation).toBe(40);
    expect(getImagingSpectralRanges(joined)).toEqual([rangeOf('blue'), rangeOf('green'), rangeOf('red')]);
  });

  it('should reject an empty list', () => {
    expect(() => concatImaging([])).toThrow(NullArgumentError);
  });
});
