import type { Raster } from '../raster/types';
import { maxSampleValue } from '../raster/MemoryRaster';
import { clamp, computePercentileBounds } from '../utils/helpers';
import { toRgb } from './colorSpaces';
import { CANONICAL_BANDS } from './RasterPresentation';
import type { BandListPresentation, ColorMapPresentation, PaletteColor, RasterPresentation } from './types';

type Normalizer = (rowIndex: number, columnIndex: number, bandIndex: number) => number;

/**
 * Options for color generation
 */
export interface RenderOptions {
  /**
   * Whether to stretch each band between its 2nd and 98th percentile
   * instead of its full radiometric range
   * @default false
   */
  usePercentile?: boolean;

  /**
   * Sample range of floating rasters mapped to 0..1
   * @default [0, 1]
   */
  floatingRange?: [number, number];
}

/**
 * Renders rasters into RGBA pixel arrays according to their presentation.
 */
export class PresentationRenderer {
  private _floatingRange: [number, number];
  private _usePercentile: boolean;

  constructor(options: RenderOptions = {}) {
    this._floatingRange = options.floatingRange ?? [0, 1];
    this._usePercentile = options.usePercentile ?? false;
  }

  /**
   * Generates a color array for the raster based on the presentation.
   *
   * @returns Uint8Array of RGBA colors in row-major order (length = rows * columns * 4)
   */
  getColors(raster: Raster, presentation: RasterPresentation): Uint8Array {
    const colors = new Uint8Array(raster.rows * raster.columns * 4);
    if (presentation.kind === 'colorMap') {
      return this._colorByColorMap(raster, presentation, colors);
    }

    const normalize = this._createNormalizer(raster);
    switch (presentation.model) {
      case 'grayscale':
        return this._colorByGray(raster, normalize, colors, false);
      case 'invertedGrayscale':
        return this._colorByGray(raster, normalize, colors, true);
      case 'transparency':
        return this._colorByTransparency(raster, normalize, colors);
      case 'trueColor':
      case 'falseColor':
        return this._colorByColorSpace(raster, normalize, presentation, colors);
    }
  }

  /**
   * Maps the samples of each band to 0..1: integer bands by their radiometric
   * range, floating bands by the configured range, or every band by its
   * percentile bounds.
   */
  private _createNormalizer(raster: Raster): Normalizer {
    const bounds = Array.from({ length: raster.bandCount }, (_, band): { min: number; max: number } => {
      if (this._usePercentile) {
        return computePercentileBounds(readBand(raster, band));
      }
      if (raster.format === 'floating') {
        return { min: this._floatingRange[0], max: this._floatingRange[1] };
      }
      return { min: 0, max: maxSampleValue(raster.radiometricResolutions[band]) };
    });

    return (row, column, band) => {
      const { min, max } = bounds[band];
      return clamp((raster.getValue(row, column, band) - min) / (max - min || 1), 0, 1);
    };
  }

  private _colorByGray(raster: Raster, normalize: Normalizer, colors: Uint8Array, inverted: boolean): Uint8Array {
    this._forEachCell(raster, (row, column, offset) => {
      const level = Math.round(normalize(row, column, 0) * 255);
      const gray = inverted ? 255 - level : level;
      colors[offset] = gray;
      colors[offset + 1] = gray;
      colors[offset + 2] = gray;
      colors[offset + 3] = 255;
    });
    return colors;
  }

  /**
   * Writes the first band to alpha over white.
   */
  private _colorByTransparency(raster: Raster, normalize: Normalizer, colors: Uint8Array): Uint8Array {
    this._forEachCell(raster, (row, column, offset) => {
      colors[offset] = 255;
      colors[offset + 1] = 255;
      colors[offset + 2] = 255;
      colors[offset + 3] = Math.round(normalize(row, column, 0) * 255);
    });
    return colors;
  }

  private _colorByColorSpace(
    raster: Raster,
    normalize: Normalizer,
    presentation: BandListPresentation,
    colors: Uint8Array
  ): Uint8Array {
    const { colorSpace } = presentation;
    if (colorSpace === 'none') {
      console.warn(`Color space none cannot be rendered as ${presentation.model}, falling back to grayscale`);
      return this._colorByGray(raster, normalize, colors, false);
    }

    const roles = CANONICAL_BANDS[colorSpace];
    const bandIndices = roles.map((role) => presentation.bands.indexOf(role));
    const missing = roles.filter((_, i) => bandIndices[i] < 0 || bandIndices[i] >= raster.bandCount);
    if (missing.length > 0) {
      console.warn(`Raster has no band for ${missing.join(', ')} of color space ${colorSpace}, falling back to grayscale`);
      return this._colorByGray(raster, normalize, colors, false);
    }

    this._forEachCell(raster, (row, column, offset) => {
      const channels = bandIndices.map((band) => normalize(row, column, band));
      const [r, g, b] = toRgb(colorSpace, channels);
      colors[offset] = r;
      colors[offset + 1] = g;
      colors[offset + 2] = b;
      colors[offset + 3] = 255;
    });
    return colors;
  }

  /**
   * Looks up the raw first-band value in the palette. Density slicing takes the
   * greatest key not above the value, pseudo color an exact key. Misses stay transparent.
   */
  private _colorByColorMap(raster: Raster, presentation: ColorMapPresentation, colors: Uint8Array): Uint8Array {
    const keys = [...presentation.colorMap.keys()].sort((a, b) => a - b);

    this._forEachCell(raster, (row, column, offset) => {
      const value = raster.getValue(row, column, 0);
      const key = presentation.model === 'densitySlicing' ? floorKey(keys, value) : value;
      const color = key === undefined ? undefined : presentation.colorMap.get(key);
      if (!color) return;
      writePaletteColor(colors, offset, color);
    });
    return colors;
  }

  private _forEachCell(raster: Raster, fn: (row: number, column: number, offset: number) => void): void {
    for (let row = 0; row < raster.rows; row++) {
      for (let column = 0; column < raster.columns; column++) {
        fn(row, column, (row * raster.columns + column) * 4);
      }
    }
  }
}

function readBand(raster: Raster, bandIndex: number): Float64Array {
  const samples = new Float64Array(raster.rows * raster.columns);
  for (let row = 0; row < raster.rows; row++) {
    for (let column = 0; column < raster.columns; column++) {
      samples[row * raster.columns + column] = raster.getValue(row, column, bandIndex);
    }
  }
  return samples;
}

/**
 * Greatest key not above the value, in an ascending key list.
 */
function floorKey(keys: readonly number[], value: number): number | undefined {
  let low = 0;
  let high = keys.length - 1;
  let result: number | undefined;
  while (low <= high) {
    const mid = (low + high) >> 1;
    if (keys[mid] <= value) {
      result = keys[mid];
      low = mid + 1;
    } else {
      high = mid - 1;
    }
  }
  return result;
}

function writePaletteColor(colors: Uint8Array, offset: number, color: Readonly<PaletteColor>): void {
  colors[offset] = color[0];
  colors[offset + 1] = color[1];
  colors[offset + 2] = color[2];
  colors[offset + 3] = color.length === 4 ? color[3] : 255;
}
