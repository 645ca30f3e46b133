// Main entry point - Core exports
export { SpectralGeometryBuilder, DEFAULT_BUILDER_OPTIONS } from './lib/geometry/SpectralGeometryBuilder';
export { SpectralPolygon } from './lib/geometry/SpectralPolygon';
export { SimpleGeometryFactory } from './lib/geometry/GeometryFactory';

// Errors
export {
  SpectralGeometryError,
  NullArgumentError,
  InvalidDimensionError,
  InvalidBandCountError,
  InvalidRadiometricResolutionError,
  BandResolutionMismatchError,
  EmptyShellError,
  DuplicateBandIndexError,
  IncompatiblePresentationConfigError,
  NullColorMapError,
  EmptyOthersCollectionError,
  IncompatibleRastersError,
  InvalidTransformationError,
  InvalidImagingError,
  isSpectralGeometryError,
} from './lib/core/errors';

// Spectral ranges
export { SpectralRange, formatWavelength } from './lib/spectral/SpectralRange';
export {
  SPECTRAL_RANGE_NAMES,
  SPECTRAL_RANGE_LABELS,
  rangeOf,
  classify,
  classifyRange,
  isSpectralRangeName,
} from './lib/spectral/SpectralRangeCatalog';

// Rasters
export {
  MIN_RADIOMETRIC_RESOLUTION,
  MAX_RADIOMETRIC_RESOLUTION,
  DEFAULT_RADIOMETRIC_RESOLUTIONS,
  validateRasterSpecification,
  createRasterSpecification,
} from './lib/raster/RasterSpecification';
export { MemoryRaster, allocateBand, isBandArrayFor, maxSampleValue } from './lib/raster/MemoryRaster';
export { MemoryRasterFactory } from './lib/raster/MemoryRasterFactory';

// Mapping
export {
  AffineRasterMapper,
  createRasterCoordinate,
  computeGridEnvelope,
  getRasterEnvelope,
} from './lib/mapping/AffineRasterMapper';
export { GeographicRasterMapper } from './lib/mapping/GeographicRasterMapper';
export { extractHorizontalCrs, getVerticalUnitFactor } from './lib/mapping/crs';

// Presentation
export {
  CANONICAL_BANDS,
  DEFAULT_PRESENTATION,
  isColorMapModel,
  createPresentation,
  createColorMapPresentation,
  createTrueColorPresentation,
  createFalseColorPresentation,
  createGrayscalePresentation,
  createInvertedGrayscalePresentation,
  createTransparencyPresentation,
  createPseudoColorPresentation,
  createDensitySlicingPresentation,
  createDensitySlicingFromColormap,
} from './lib/presentation/RasterPresentation';
export { PresentationRenderer } from './lib/presentation/PresentationRenderer';
export {
  COLORMAPS,
  COLORMAP_NAMES,
  COLORMAP_LABELS,
  getColormap,
  interpolateRamp,
  isColormapName,
} from './lib/presentation/Colormaps';
export { hsvToRgb, hslToRgb, cmykToRgb, ycbcrToRgb, cielabToRgb, toRgb } from './lib/presentation/colorSpaces';

// Imaging
export {
  createRasterImaging,
  filterImaging,
  concatImaging,
  getImagingSpectralRanges,
} from './lib/imaging/RasterImaging';
export {
  IMAGING_DEVICE_KEYS,
  getImagingDevice,
  getImagingDevices,
  isImagingDeviceKey,
  findImagingDevicesByIdentifier,
  findImagingDevicesByName,
  createImagingFromDevice,
} from './lib/imaging/ImagingDeviceCatalog';

// Geometry factory adapter
export {
  SpectralGeometryAdapter,
  SPECTRAL_EXTENSION_KEY,
  ensureSpectralBuilder,
  setDefaultSpectralBuilder,
  createSpectralPolygon,
  cloneSpectralPolygon,
  mergeSpectralPolygons,
} from './lib/adapters/SpectralGeometryAdapter';

// Type exports
export type {
  Coordinate,
  RasterCoordinate,
  Metadata,
  RasterFormat,
  RasterMapMode,
  ValidationResult,
  SpectralGeometryBuilderOptions,
} from './lib/core/types';
export type { SpectralGeometryErrorCode } from './lib/core/errors';
export type { SpectralRangeName } from './lib/spectral/SpectralRangeCatalog';
export type { RasterSpecification, RasterSpecificationInput } from './lib/raster/RasterSpecification';
export type { Raster, RasterService, RasterFactory } from './lib/raster/types';
export type { BandArray } from './lib/raster/MemoryRaster';
export type { RasterMapper } from './lib/mapping/types';
export type { AffineTransform } from './lib/mapping/AffineRasterMapper';
export type {
  RGBColor,
  RGBAColor,
  ColorRamp,
  PaletteColor,
  BandListModel,
  ColorMapModel,
  PresentationModel,
  ColorSpace,
  ColorSpaceBand,
  BandListPresentation,
  ColorMapPresentation,
  RasterPresentation,
} from './lib/presentation/types';
export type { DensitySlicingOptions } from './lib/presentation/RasterPresentation';
export type { RenderOptions } from './lib/presentation/PresentationRenderer';
export type { ColormapName } from './lib/presentation/Colormaps';
export type { ImagingDevice, ImagingBand, RasterImaging, RasterImagingInput } from './lib/imaging/RasterImaging';
export type { ImagingDeviceKey, KnownImagingDevice, SensorBand } from './lib/imaging/ImagingDeviceCatalog';
export type { GeometryFactory } from './lib/geometry/GeometryFactory';
export type { Envelope, SpectralPolygonInit } from './lib/geometry/SpectralPolygon';
export type { PolygonLike, Ring, SpectralGeometryRequest, SpectralGeometryOverrides } from './lib/geometry/types';

// Utility exports
export { clamp, computePercentile, computePercentileBounds } from './lib/utils/helpers';
