import proj4 from 'proj4';
import { InvalidTransformationError } from '../core/errors';
import type { Coordinate, RasterMapMode } from '../core/types';
import { extractHorizontalCrs, getVerticalUnitFactor } from './crs';
import type { RasterMapper } from './types';

/**
 * Maps raster cells to WGS84 longitude/latitude by chaining a grid mapper
 * in the raster's own CRS with a proj4 projection.
 *
 * @example
 * ```typescript
 * const grid = AffineRasterMapper.fromTransformation([500000, 5200000], [30, -30]);
 * const mapper = new GeographicRasterMapper(grid, '+proj=utm +zone=34 +datum=WGS84 +units=m +no_defs');
 * const [lng, lat] = mapper.mapCoordinate(0, 0);
 * ```
 */
export class GeographicRasterMapper implements RasterMapper {
  readonly mode: RasterMapMode;
  readonly source: RasterMapper;
  readonly crs: string;
  private readonly _forward: (xy: [number, number]) => number[];
  private readonly _inverse: (xy: [number, number]) => number[];
  private readonly _verticalUnitFactor: number;

  /**
   * @param source - Mapper into the projected (source) CRS
   * @param crs - Source CRS as WKT, PROJ string or a code proj4 knows (e.g. 'EPSG:3857')
   */
  constructor(source: RasterMapper, crs: string) {
    this.mode = source.mode;
    this.source = source;
    this.crs = crs;

    try {
      const converter = proj4(extractHorizontalCrs(crs), 'EPSG:4326');
      this._forward = (xy) => converter.forward(xy);
      this._inverse = (xy) => converter.inverse(xy);
    } catch (error) {
      throw new InvalidTransformationError(
        `Failed to set up coordinate transformation from ${crs}: ${error instanceof Error ? error.message : String(error)}`
      );
    }
    this._verticalUnitFactor = getVerticalUnitFactor(crs);
  }

  mapCoordinate(rowIndex: number, columnIndex: number): Coordinate {
    const projected = this.source.mapCoordinate(rowIndex, columnIndex);
    const [lng, lat] = this._forward([projected[0], projected[1]]);
    return projected.length === 3 ? [lng, lat, projected[2] * this._verticalUnitFactor] : [lng, lat];
  }

  mapRaster(coordinate: Coordinate): [number, number] {
    const [x, y] = this._inverse([coordinate[0], coordinate[1]]);
    return this.source.mapRaster(
      coordinate.length === 3 ? [x, y, coordinate[2] / this._verticalUnitFactor] : [x, y]
    );
  }
}
