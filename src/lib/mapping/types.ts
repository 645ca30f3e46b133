import type { Coordinate, RasterMapMode } from '../core/types';

/**
 * Transformation between raster grid indices and model-space coordinates.
 */
export interface RasterMapper {
  readonly mode: RasterMapMode;

  /**
   * Maps a (possibly fractional) cell address to model space.
   */
  mapCoordinate(rowIndex: number, columnIndex: number): Coordinate;

  /**
   * Maps a model-space coordinate back to a fractional cell address.
   *
   * @returns [rowIndex, columnIndex]
   */
  mapRaster(coordinate: Coordinate): [number, number];
}
