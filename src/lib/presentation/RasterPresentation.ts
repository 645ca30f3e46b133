import {
  DuplicateBandIndexError,
  IncompatiblePresentationConfigError,
  InvalidDimensionError,
  NullArgumentError,
  NullColorMapError,
} from '../core/errors';
import { getColormap, interpolateRamp } from './Colormaps';
import type { ColormapName } from './Colormaps';
import type {
  BandListModel,
  BandListPresentation,
  ColorMapModel,
  ColorMapPresentation,
  ColorSpace,
  ColorSpaceBand,
  PaletteColor,
  PresentationModel,
} from './types';

/**
 * Band roles of each color space in canonical order
 */
export const CANONICAL_BANDS: Readonly<Record<Exclude<ColorSpace, 'none'>, readonly ColorSpaceBand[]>> = {
  rgb: ['red', 'green', 'blue'],
  hsv: ['hue', 'saturation', 'value'],
  hsl: ['hue', 'saturation', 'lightness'],
  cmyk: ['cyan', 'magenta', 'yellow', 'black'],
  ycbcr: ['luma', 'blueDifferenceChroma', 'redDifferenceChroma'],
  cielab: ['lightness', 'a', 'b'],
};

const COLOR_MAP_MODELS: readonly ColorMapModel[] = ['pseudoColor', 'densitySlicing'];

export function isColorMapModel(model: PresentationModel): model is ColorMapModel {
  return COLOR_MAP_MODELS.some((candidate) => candidate === model);
}

function bandListPresentation(
  model: BandListModel,
  colorSpace: ColorSpace,
  bands: readonly ColorSpaceBand[]
): BandListPresentation {
  const presentation: BandListPresentation = {
    kind: 'bandList',
    model,
    colorSpace,
    bands: Object.freeze([...bands]),
  };
  return Object.freeze(presentation);
}

/**
 * Creates a band-list presentation.
 *
 * @param model - Any model except pseudoColor and densitySlicing
 * @param bands - Role of each raster band, in band order; may be empty
 */
export function createPresentation(
  model: PresentationModel,
  colorSpace: ColorSpace,
  bands: readonly ColorSpaceBand[]
): BandListPresentation {
  if (isColorMapModel(model)) {
    throw new IncompatiblePresentationConfigError(model, 'The presentation model requires a color map.');
  }
  return bandListPresentation(model, colorSpace, bands);
}

/**
 * Creates a color-map presentation over the first raster band.
 *
 * @param model - pseudoColor or densitySlicing
 * @param colorMap - Palette color per integer sample value, channels 0..255
 */
export function createColorMapPresentation(
  model: PresentationModel,
  colorMap: ReadonlyMap<number, Readonly<PaletteColor>> | null | undefined
): ColorMapPresentation {
  if (!isColorMapModel(model)) {
    throw new IncompatiblePresentationConfigError(model, 'The presentation model does not support a color map.');
  }
  if (!colorMap || colorMap.size === 0) {
    throw new NullColorMapError();
  }

  const entries = [...colorMap.entries()]
    .sort(([a], [b]) => a - b)
    .map(([key, color]): [number, Readonly<PaletteColor>] => [key, copyPaletteColor(key, color)]);
  const presentation: ColorMapPresentation = {
    kind: 'colorMap',
    model,
    colorSpace: 'none',
    bands: Object.freeze<ColorSpaceBand[]>(['value']),
    colorMap: new Map(entries),
  };
  return Object.freeze(presentation);
}

function copyPaletteColor(key: number, color: Readonly<PaletteColor>): Readonly<PaletteColor> {
  const channels: readonly number[] = color;
  const invalid = channels.find((channel) => !Number.isInteger(channel) || channel < 0 || channel > 255);
  if (invalid !== undefined) {
    throw new InvalidDimensionError(`palette channel of value ${key}`, invalid, 'is not an integer within 0..255');
  }
  const copy: PaletteColor = color.length === 4 ? [color[0], color[1], color[2], color[3]] : [color[0], color[1], color[2]];
  return Object.freeze(copy);
}

/**
 * Creates a true color presentation.
 *
 * Either with the canonical band order of a color space
 * (`createTrueColorPresentation('hsv')`), or with explicit raster band
 * indices for red, green and blue (`createTrueColorPresentation(2, 0, 1)`).
 */
export function createTrueColorPresentation(colorSpace?: ColorSpace): BandListPresentation;
export function createTrueColorPresentation(red: number, green: number, blue: number): BandListPresentation;
export function createTrueColorPresentation(
  colorSpaceOrRed: ColorSpace | number = 'rgb',
  green?: number,
  blue?: number
): BandListPresentation {
  if (typeof colorSpaceOrRed === 'number') {
    return orderedPresentation('trueColor', colorSpaceOrRed, green, blue);
  }
  if (colorSpaceOrRed === 'none') {
    throw new IncompatiblePresentationConfigError('trueColor', 'The color space none has no canonical band order.');
  }
  return bandListPresentation('trueColor', colorSpaceOrRed, CANONICAL_BANDS[colorSpaceOrRed]);
}

/**
 * Creates a false color presentation mapping the given raster bands to red, green and blue.
 */
export function createFalseColorPresentation(red: number, green: number, blue: number): BandListPresentation {
  return orderedPresentation('falseColor', red, green, blue);
}

function orderedPresentation(
  model: BandListModel,
  red: number,
  green: number | undefined,
  blue: number | undefined
): BandListPresentation {
  if (green === undefined) throw new NullArgumentError('green band index');
  if (blue === undefined) throw new NullArgumentError('blue band index');

  const indices = [red, green, blue];
  const fields = ['red band index', 'green band index', 'blue band index'];
  indices.forEach((index, i) => {
    if (!Number.isInteger(index) || index < 0) {
      throw new InvalidDimensionError(fields[i], index, 'is not a non-negative integer');
    }
  });
  if (new Set(indices).size !== indices.length) {
    throw new DuplicateBandIndexError(indices);
  }

  const bands = new Array<ColorSpaceBand>(Math.max(...indices) + 1).fill('unused');
  bands[red] = 'red';
  bands[green] = 'green';
  bands[blue] = 'blue';
  return bandListPresentation(model, 'rgb', bands);
}

export function createGrayscalePresentation(): BandListPresentation {
  return bandListPresentation('grayscale', 'none', ['value']);
}

export function createInvertedGrayscalePresentation(): BandListPresentation {
  return bandListPresentation('invertedGrayscale', 'none', ['value']);
}

export function createTransparencyPresentation(): BandListPresentation {
  return bandListPresentation('transparency', 'none', ['value']);
}

export function createPseudoColorPresentation(
  colorMap: ReadonlyMap<number, Readonly<PaletteColor>> | null | undefined
): ColorMapPresentation {
  return createColorMapPresentation('pseudoColor', colorMap);
}

export function createDensitySlicingPresentation(
  colorMap: ReadonlyMap<number, Readonly<PaletteColor>> | null | undefined
): ColorMapPresentation {
  return createColorMapPresentation('densitySlicing', colorMap);
}

/**
 * Options for slicing a colormap into value classes
 */
export interface DensitySlicingOptions {
  /** Lower bound of the first class */
  min: number;
  /** Upper bound of the last class */
  max: number;
  /** Number of equal-width classes */
  classes: number;
}

/**
 * Creates a density slicing presentation from a named colormap.
 * Class `i` starts at `floor(min + i * (max - min) / classes)` and takes the
 * ramp color at `i / (classes - 1)`. Classes are at least one value wide.
 */
export function createDensitySlicingFromColormap(
  name: ColormapName,
  options: DensitySlicingOptions
): ColorMapPresentation {
  const { min, max, classes } = options;
  if (!Number.isInteger(classes) || classes < 1) {
    throw new InvalidDimensionError('number of classes', classes, 'is less than 1');
  }
  if (!Number.isFinite(min) || !Number.isFinite(max) || max <= min) {
    throw new InvalidDimensionError('maximum', max, `is not greater than the minimum (${min})`);
  }
  if (max - min < classes) {
    throw new InvalidDimensionError('number of classes', classes, `exceeds the value range (${max - min})`);
  }

  const ramp = getColormap(name);
  const width = (max - min) / classes;
  const colorMap = new Map<number, PaletteColor>();
  for (let i = 0; i < classes; i++) {
    const t = classes === 1 ? 0 : i / (classes - 1);
    colorMap.set(Math.floor(min + i * width), interpolateRamp(ramp, t));
  }
  return createDensitySlicingPresentation(colorMap);
}

/**
 * Presentation attached when none is requested
 */
export const DEFAULT_PRESENTATION: BandListPresentation = createGrayscalePresentation();
