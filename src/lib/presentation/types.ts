/**
 * RGB color tuple
 */
export type RGBColor = [number, number, number];

/**
 * RGBA color tuple
 */
export type RGBAColor = [number, number, number, number];

/**
 * Color ramp definition (array of RGB colors)
 */
export type ColorRamp = RGBColor[];

/**
 * Palette entry of a color map; alpha defaults to 255 when omitted
 */
export type PaletteColor = RGBColor | RGBAColor;

/**
 * Presentation models interpreting an ordered list of bands
 */
export type BandListModel = 'trueColor' | 'falseColor' | 'grayscale' | 'invertedGrayscale' | 'transparency';

/**
 * Presentation models looking up a single band in a color map
 */
export type ColorMapModel = 'pseudoColor' | 'densitySlicing';

export type PresentationModel = BandListModel | ColorMapModel;

export type ColorSpace = 'rgb' | 'hsv' | 'hsl' | 'cmyk' | 'ycbcr' | 'cielab' | 'none';

/**
 * Role of a raster band within its color space
 */
export type ColorSpaceBand =
  | 'red'
  | 'green'
  | 'blue'
  | 'hue'
  | 'saturation'
  | 'value'
  | 'lightness'
  | 'a'
  | 'b'
  | 'cyan'
  | 'magenta'
  | 'yellow'
  | 'black'
  | 'luma'
  | 'blueDifferenceChroma'
  | 'redDifferenceChroma'
  | 'unused';

/**
 * Presentation assigning a color space role to each raster band.
 * `bands[i]` is the role of raster band `i`.
 */
export interface BandListPresentation {
  readonly kind: 'bandList';
  readonly model: BandListModel;
  readonly colorSpace: ColorSpace;
  readonly bands: readonly ColorSpaceBand[];
}

/**
 * Presentation mapping the integer values of the first band to palette colors
 */
export interface ColorMapPresentation {
  readonly kind: 'colorMap';
  readonly model: ColorMapModel;
  readonly colorSpace: 'none';
  readonly bands: readonly ColorSpaceBand[];
  readonly colorMap: ReadonlyMap<number, Readonly<PaletteColor>>;
}

export type RasterPresentation = BandListPresentation | ColorMapPresentation;
