import { describe, it, expect } from 'vitest';
import {
  DuplicateBandIndexError,
  IncompatiblePresentationConfigError,
  InvalidDimensionError,
  NullColorMapError,
} from '../src/lib/core/errors';
import { COLORMAPS, COLORMAP_NAMES, getColormap, interpolateRamp, isColormapName } from '../src/lib/presentation/Colormaps';
import {
  DEFAULT_PRESENTATION,
  createColorMapPresentation,
  createDensitySlicingFromColormap,
  createDensitySlicingPresentation,
  createFalseColorPresentation,
  createGrayscalePresentation,
  createInvertedGrayscalePresentation,
  createPresentation,
  createPseudoColorPresentation,
  createTransparencyPresentation,
  createTrueColorPresentation,
} from '../src/lib/presentation/RasterPresentation';
import type { PaletteColor } from '../src/lib/presentation/types';

const palette = new Map<number, PaletteColor>([
  [2, [0, 0, 255]],
  [1, [255, 0, 0]],
]);

describe('createPresentation', () => {
  it('should keep model, color space and bands', () => {
    const presentation = createPresentation('trueColor', 'hsv', ['hue', 'saturation', 'value']);
    expect(presentation).toEqual({
      kind: 'bandList',
      model: 'trueColor',
      colorSpace: 'hsv',
      bands: ['hue', 'saturation', 'value'],
    });
    expect(Object.isFrozen(presentation)).toBe(true);
    expect(Object.isFrozen(presentation.bands)).toBe(true);
  });

  it('should reject color map models', () => {
    expect(() => createPresentation('pseudoColor', 'rgb', ['red', 'green', 'blue'])).toThrow(
      IncompatiblePresentationConfigError
    );
    expect(() => createPresentation('densitySlicing', 'none', ['value'])).toThrow(
      IncompatiblePresentationConfigError
    );
  });

  it('should accept an empty band list', () => {
    expect(createPresentation('grayscale', 'none', []).bands).toEqual([]);
  });
});

describe('createColorMapPresentation', () => {
  it('should force a single value band', () => {
    const presentation = createColorMapPresentation('pseudoColor', palette);
    expect(presentation.kind).toBe('colorMap');
    expect(presentation.colorSpace).toBe('none');
    expect(presentation.bands).toEqual(['value']);
    expect([...presentation.colorMap.keys()]).toEqual([1, 2]);
  });

  it('should copy the color map', () => {
    const source = new Map<number, PaletteColor>([[0, [1, 2, 3]]]);
    const presentation = createPseudoColorPresentation(source);
    source.set(1, [4, 5, 6]);
    expect(presentation.colorMap.size).toBe(1);
  });

  it('should copy and freeze palette colors', () => {
    const color: PaletteColor = [10, 20, 30];
    const presentation = createPseudoColorPresentation(new Map([[1, color]]));
    color[0] = 99;
    expect(presentation.colorMap.get(1)).toEqual([10, 20, 30]);
    expect(Object.isFrozen(presentation.colorMap.get(1))).toBe(true);
  });

  it('should reject palette channels outside 0..255', () => {
    expect(() => createPseudoColorPresentation(new Map<number, PaletteColor>([[1, [300, 0, 0]]]))).toThrow(
      InvalidDimensionError
    );
    expect(() => createDensitySlicingPresentation(new Map<number, PaletteColor>([[1, [0, 0, 0, -1]]]))).toThrow(
      InvalidDimensionError
    );
    expect(() => createPseudoColorPresentation(new Map<number, PaletteColor>([[1, [0, 0.5, 0]]]))).toThrow(
      InvalidDimensionError
    );
  });

  it('should reject band list models', () => {
    expect(() => createColorMapPresentation('grayscale', palette)).toThrow(IncompatiblePresentationConfigError);
  });

  it('should reject missing or empty color maps', () => {
    expect(() => createColorMapPresentation('pseudoColor', null)).toThrow(NullColorMapError);
    expect(() => createColorMapPresentation('densitySlicing', new Map())).toThrow(NullColorMapError);
  });
});

describe('createTrueColorPresentation', () => {
  it('should default to rgb', () => {
    expect(createTrueColorPresentation().bands).toEqual(['red', 'green', 'blue']);
    expect(createTrueColorPresentation().colorSpace).toBe('rgb');
  });

  it('should use the canonical order of each color space', () => {
    expect(createTrueColorPresentation('cielab').bands).toEqual(['lightness', 'a', 'b']);
    expect(createTrueColorPresentation('cmyk').bands).toEqual(['cyan', 'magenta', 'yellow', 'black']);
    expect(createTrueColorPresentation('hsl').bands).toEqual(['hue', 'saturation', 'lightness']);
    expect(createTrueColorPresentation('hsv').bands).toEqual(['hue', 'saturation', 'value']);
    expect(createTrueColorPresentation('ycbcr').bands).toEqual([
      'luma',
      'blueDifferenceChroma',
      'redDifferenceChroma',
    ]);
  });

  it('should reject the none color space', () => {
    expect(() => createTrueColorPresentation('none')).toThrow(IncompatiblePresentationConfigError);
  });

  it('should place explicit band indices', () => {
    const presentation = createTrueColorPresentation(2, 0, 1);
    expect(presentation.bands).toEqual(['green', 'blue', 'red']);
    expect(presentation.model).toBe('trueColor');
  });

  it('should mark unfilled slots unused', () => {
    expect(createTrueColorPresentation(4, 2, 0).bands).toEqual(['blue', 'unused', 'green', 'unused', 'red']);
  });

  it('should reject duplicate indices', () => {
    expect(() => createTrueColorPresentation(1, 1, 2)).toThrow(DuplicateBandIndexError);
  });

  it('should reject negative indices', () => {
    expect(() => createTrueColorPresentation(-1, 0, 1)).toThrow(InvalidDimensionError);
  });
});

describe('createFalseColorPresentation', () => {
  it('should map bands to rgb', () => {
    const presentation = createFalseColorPresentation(3, 2, 1);
    expect(presentation).toEqual({
      kind: 'bandList',
      model: 'falseColor',
      colorSpace: 'rgb',
      bands: ['unused', 'blue', 'green', 'red'],
    });
  });
});

describe('single band presentations', () => {
  it('should use the value band without color space', () => {
    for (const presentation of [
      createGrayscalePresentation(),
      createInvertedGrayscalePresentation(),
      createTransparencyPresentation(),
    ]) {
      expect(presentation.colorSpace).toBe('none');
      expect(presentation.bands).toEqual(['value']);
    }
    expect(createTransparencyPresentation().model).toBe('transparency');
  });

  it('should default to grayscale', () => {
    expect(DEFAULT_PRESENTATION.model).toBe('grayscale');
    expect(DEFAULT_PRESENTATION.colorSpace).toBe('none');
  });
});

describe('colormaps', () => {
  it('should load every colormap', () => {
    for (const name of COLORMAP_NAMES) {
      expect(COLORMAPS[name]).toHaveLength(10);
    }
    expect(getColormap('viridis')[0]).toEqual([68, 1, 84]);
    expect(isColormapName('magma')).toBe(true);
    expect(isColormapName('plasma')).toBe(false);
  });

  it('should interpolate along a ramp', () => {
    const ramp = getColormap('gray');
    expect(interpolateRamp(ramp, 0)).toEqual([0, 0, 0]);
    expect(interpolateRamp(ramp, 1)).toEqual([255, 255, 255]);
    expect(interpolateRamp(ramp, 2)).toEqual([255, 255, 255]);
    expect(interpolateRamp(ramp, Number.NaN)).toEqual([0, 0, 0]);
    expect(interpolateRamp([[0, 0, 0], [100, 200, 50]], 0.5)).toEqual([50, 100, 25]);
  });
});

describe('createDensitySlicingFromColormap', () => {
  it('should slice the range into equal classes', () => {
    const presentation = createDensitySlicingFromColormap('viridis', { min: 0, max: 100, classes: 4 });
    expect(presentation.model).toBe('densitySlicing');
    expect([...presentation.colorMap.keys()]).toEqual([0, 25, 50, 75]);
    expect(presentation.colorMap.get(0)).toEqual([68, 1, 84]);
    expect(presentation.colorMap.get(75)).toEqual([253, 231, 37]);
  });

  it('should reject invalid options', () => {
    expect(() => createDensitySlicingFromColormap('gray', { min: 0, max: 10, classes: 0 })).toThrow(
      InvalidDimensionError
    );
    expect(() => createDensitySlicingFromColormap('gray', { min: 10, max: 10, classes: 2 })).toThrow(
      InvalidDimensionError
    );
  });

  it('should reject more classes than values in the range', () => {
    expect(() => createDensitySlicingFromColormap('viridis', { min: 0, max: 2, classes: 5 })).toThrow(
      InvalidDimensionError
    );
  });

  it('should keep every class of a narrow range', () => {
    const presentation = createDensitySlicingFromColormap('gray', { min: 0, max: 3, classes: 3 });
    expect([...presentation.colorMap.keys()]).toEqual([0, 1, 2]);
  });
});
