import type { RasterFactory } from '../raster/types';
import type { RasterPresentation } from '../presentation/types';

/**
 * Model-space coordinate, [x, y] or [x, y, z]
 */
export type Coordinate = [number, number] | [number, number, number];

/**
 * Raster cell address paired with the model-space coordinate it maps to
 */
export interface RasterCoordinate {
  rowIndex: number;
  columnIndex: number;
  coordinate: Coordinate;
}

/**
 * Opaque key/value metadata attached to geometries
 */
export type Metadata = Record<string, unknown>;

/**
 * Storage format of raster samples
 */
export type RasterFormat = 'integer' | 'floating';

/**
 * Whether a sample describes the area of a cell or the coordinate of its corner
 */
export type RasterMapMode = 'valueIsArea' | 'valueIsCoordinate';

/**
 * Outcome of a validation step, mirroring the shape of schema `safeParse` results
 */
export type ValidationResult<T, E extends Error = Error> =
  | { success: true; data: T }
  | { success: false; error: E };

/**
 * Options for configuring the SpectralGeometryBuilder
 */
export interface SpectralGeometryBuilderOptions {
  /**
   * Factory realising rasters from specifications and services
   * @default new MemoryRasterFactory()
   */
  rasterFactory?: RasterFactory;

  /**
   * Presentation attached when a request specifies none
   * @default grayscale presentation
   */
  defaultPresentation?: RasterPresentation;

  /**
   * Bits per sample used when a specification names no resolution.
   * When null, 16 for integer and 32 for floating rasters.
   * @default null
   */
  defaultRadiometricResolution?: number | null;

  /**
   * Storage format used when a specification names none
   * @default 'integer'
   */
  defaultFormat?: RasterFormat;

  /**
   * Whether to warn when the imaging metadata describes a different number
   * of bands than the raster holds
   * @default true
   */
  warnOnImagingMismatch?: boolean;
}
