import type { Coordinate, Metadata, RasterFormat } from '../core/types';
import type { RasterImaging } from '../imaging/RasterImaging';
import type { RasterMapper } from '../mapping/types';
import type { RasterPresentation } from '../presentation/types';
import type { RasterSpecificationInput } from '../raster/RasterSpecification';
import type { Raster, RasterService } from '../raster/types';

/**
 * Closed coordinate ring
 */
export type Ring = readonly Coordinate[];

/**
 * Any polygon the builder can copy a boundary from
 */
export interface PolygonLike {
  readonly shell: Ring;
  readonly holes?: readonly Ring[];
  readonly metadata?: Metadata | null;
}

/**
 * Input of {@link SpectralGeometryBuilder.build}.
 *
 * The raster comes from `raster`, `specification` or `service`; when more
 * than one is given they are considered in that order.
 */
export interface SpectralGeometryRequest {
  /** Existing raster, owned by the polygon from now on */
  raster?: Raster;
  /** Shape of a new raster realised by the raster factory */
  specification?: RasterSpecificationInput;
  /** Source read into a new raster by the raster factory */
  service?: RasterService;
  /** Mapper of a raster created from `specification` or `service` */
  mapper?: RasterMapper | null;
  /** Format of a raster created from `specification` */
  format?: RasterFormat;

  /** Polygon the boundary and metadata are copied from */
  geometry?: PolygonLike | null;
  shell?: Ring;
  holes?: readonly Ring[];

  presentation?: RasterPresentation;
  imaging?: RasterImaging | null;
  metadata?: Metadata | null;
}

/**
 * Values replacing those copied from the source polygon(s) of a clone or merge
 */
export interface SpectralGeometryOverrides {
  shell?: Ring;
  holes?: readonly Ring[];
  presentation?: RasterPresentation;
  imaging?: RasterImaging | null;
  metadata?: Metadata | null;
}
