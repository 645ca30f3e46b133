import type { Coordinate, RasterFormat } from '../core/types';
import type { RasterMapper } from '../mapping/types';
import type { SpectralRange } from '../spectral/SpectralRange';
import type { RasterSpecification } from './RasterSpecification';

/**
 * Multi-band raster grid: rows × columns × bands of numeric samples.
 */
export interface Raster {
  readonly bandCount: number;
  readonly rows: number;
  readonly columns: number;
  readonly format: RasterFormat;
  /** Bits per sample for each band */
  readonly radiometricResolutions: readonly number[];
  /** Spectral range of each band, null where unknown */
  readonly spectralRanges: readonly (SpectralRange | null)[];
  readonly mapper: RasterMapper | null;
  readonly isMapped: boolean;
  /**
   * Model-space corners of the grid in ring order:
   * (0, 0), (0, columns), (rows, columns), (rows, 0). Empty when unmapped.
   */
  readonly coordinates: readonly Coordinate[];

  getValue(rowIndex: number, columnIndex: number, bandIndex: number): number;
  setValue(rowIndex: number, columnIndex: number, bandIndex: number, value: number): void;
  /** All band samples of one cell */
  getValues(rowIndex: number, columnIndex: number): number[];
  setValues(rowIndex: number, columnIndex: number, values: readonly number[]): void;
  /** Sample at the cell containing a model-space coordinate */
  getValueAt(coordinate: Coordinate, bandIndex: number): number;
  setValueAt(coordinate: Coordinate, bandIndex: number, value: number): void;
  /** Sample counts per value; only for integer bands of at most 16 bits */
  getHistogram(bandIndex: number): number[];
  /** Deep copy, sharing no sample storage with this raster */
  clone(): Raster;
}

/**
 * Random-access source of raster samples (a file, a tile service, ...).
 */
export interface RasterService {
  readonly bandCount: number;
  readonly rows: number;
  readonly columns: number;
  readonly format?: RasterFormat;
  readonly radiometricResolutions: readonly number[];
  readonly spectralRanges?: readonly (SpectralRange | null)[];
  readValue(rowIndex: number, columnIndex: number, bandIndex: number): number;
}

/**
 * Creates rasters. The builder depends on this interface only.
 */
export interface RasterFactory {
  createRaster(
    specification: RasterSpecification,
    mapper?: RasterMapper | null,
    format?: RasterFormat,
    spectralRanges?: readonly (SpectralRange | null)[]
  ): Raster;
  createRasterFromService(service: RasterService, mapper?: RasterMapper | null): Raster;
  /** Fresh raster holding the bands of every source, in order */
  mergeRasters(rasters: readonly Raster[]): Raster;
}
