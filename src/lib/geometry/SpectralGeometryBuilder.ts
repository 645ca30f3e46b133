import { EmptyOthersCollectionError, EmptyShellError, NullArgumentError } from '../core/errors';
import type { SpectralGeometryBuilderOptions } from '../core/types';
import { getRasterEnvelope } from '../mapping/AffineRasterMapper';
import { DEFAULT_PRESENTATION } from '../presentation/RasterPresentation';
import { MemoryRasterFactory } from '../raster/MemoryRasterFactory';
import { DEFAULT_RADIOMETRIC_RESOLUTIONS, validateRasterSpecification } from '../raster/RasterSpecification';
import type { Raster } from '../raster/types';
import { SpectralPolygon } from './SpectralPolygon';
import type { Ring, SpectralGeometryOverrides, SpectralGeometryRequest } from './types';

/**
 * Default builder options
 */
export const DEFAULT_BUILDER_OPTIONS: Required<SpectralGeometryBuilderOptions> = {
  rasterFactory: new MemoryRasterFactory(),
  defaultPresentation: DEFAULT_PRESENTATION,
  defaultRadiometricResolution: null,
  defaultFormat: 'integer',
  warnOnImagingMismatch: true,
};

/**
 * Builds spectral polygons from rasters, raster specifications or raster services.
 *
 * @example
 * ```typescript
 * const builder = new SpectralGeometryBuilder();
 * const polygon = builder.build({
 *   specification: { bandCount: 3, rows: 100, columns: 100 },
 *   mapper: AffineRasterMapper.fromTransformation([0, 100], [1, -1]),
 *   presentation: createTrueColorPresentation(),
 * });
 * ```
 */
export class SpectralGeometryBuilder {
  private _options: Required<SpectralGeometryBuilderOptions>;

  constructor(options: SpectralGeometryBuilderOptions = {}) {
    this._options = { ...DEFAULT_BUILDER_OPTIONS, ...options };
  }

  get options(): Readonly<Required<SpectralGeometryBuilderOptions>> {
    return this._options;
  }

  /**
   * Creates a spectral polygon. Nothing is created when any check fails.
   *
   * The boundary is taken from `shell`/`holes`, then from `geometry`, then
   * from the envelope of the mapped raster. Metadata is taken from
   * `metadata`, then from `geometry`.
   */
  build(request: SpectralGeometryRequest): SpectralPolygon {
    const raster = this._resolveRaster(request);
    const { shell, holes } = this._resolveBoundary(request, raster);

    const imaging = request.imaging ?? null;
    if (this._options.warnOnImagingMismatch && imaging && imaging.bands.length !== raster.bandCount) {
      console.warn(
        `Imaging describes ${imaging.bands.length} bands but the raster has ${raster.bandCount}`
      );
    }

    const metadata =
      request.metadata !== undefined ? request.metadata ?? {} : request.geometry?.metadata ?? {};

    return new SpectralPolygon({
      shell,
      holes,
      raster,
      presentation: request.presentation ?? this._options.defaultPresentation,
      imaging,
      metadata,
    });
  }

  /**
   * Copies a polygon with a deep copy of its raster.
   */
  clone(other: SpectralPolygon, overrides: SpectralGeometryOverrides = {}): SpectralPolygon {
    return this.build({
      raster: other.raster.clone(),
      geometry: other,
      shell: overrides.shell,
      holes: overrides.holes,
      presentation: overrides.presentation ?? other.presentation,
      imaging: overrides.imaging !== undefined ? overrides.imaging : other.imaging,
      metadata: overrides.metadata !== undefined ? overrides.metadata : other.metadata,
    });
  }

  /**
   * Creates a polygon whose raster holds the bands of every source raster in
   * order. Everything else is taken from the first polygon unless overridden.
   */
  merge(others: readonly SpectralPolygon[], overrides: SpectralGeometryOverrides = {}): SpectralPolygon {
    if (others.length === 0) {
      throw new EmptyOthersCollectionError();
    }

    const [first] = others;
    return this.build({
      raster: this._options.rasterFactory.mergeRasters(others.map((polygon) => polygon.raster)),
      geometry: first,
      shell: overrides.shell,
      holes: overrides.holes,
      presentation: overrides.presentation ?? first.presentation,
      imaging: overrides.imaging !== undefined ? overrides.imaging : first.imaging,
      metadata: overrides.metadata !== undefined ? overrides.metadata : first.metadata,
    });
  }

  private _resolveRaster(request: SpectralGeometryRequest): Raster {
    if (request.raster) {
      return request.raster;
    }
    if (request.specification) {
      const format = request.format ?? this._options.defaultFormat;
      const result = validateRasterSpecification(
        request.specification,
        this._options.defaultRadiometricResolution ?? DEFAULT_RADIOMETRIC_RESOLUTIONS[format]
      );
      if (!result.success) {
        throw result.error;
      }
      return this._options.rasterFactory.createRaster(result.data, request.mapper ?? null, format);
    }
    if (request.service) {
      return this._options.rasterFactory.createRasterFromService(request.service, request.mapper ?? null);
    }
    throw new NullArgumentError('raster');
  }

  private _resolveBoundary(
    request: SpectralGeometryRequest,
    raster: Raster
  ): { shell: Ring; holes: readonly Ring[] } {
    if (request.shell) {
      return { shell: request.shell, holes: request.holes ?? [] };
    }
    if (request.geometry) {
      return { shell: request.geometry.shell, holes: request.holes ?? request.geometry.holes ?? [] };
    }

    const envelope = getRasterEnvelope(raster);
    if (envelope.length === 0) {
      throw new EmptyShellError('The raster is not mapped and no shell is specified.');
    }
    return { shell: envelope, holes: request.holes ?? [] };
  }
}
