import { EmptyOthersCollectionError, IncompatibleRastersError } from '../core/errors';
import type { RasterFormat } from '../core/types';
import type { RasterMapper } from '../mapping/types';
import type { SpectralRange } from '../spectral/SpectralRange';
import { allocateBand, MemoryRaster } from './MemoryRaster';
import type { BandArray } from './MemoryRaster';
import { createRasterSpecification } from './RasterSpecification';
import type { RasterSpecification } from './RasterSpecification';
import type { Raster, RasterFactory, RasterService } from './types';

/**
 * Raster factory producing {@link MemoryRaster} instances.
 */
export class MemoryRasterFactory implements RasterFactory {
  createRaster(
    specification: RasterSpecification,
    mapper: RasterMapper | null = null,
    format: RasterFormat = 'integer',
    spectralRanges?: readonly (SpectralRange | null)[]
  ): MemoryRaster {
    const length = specification.rows * specification.columns;
    const bands = specification.radiometricResolutions.map((resolution) =>
      allocateBand(length, resolution, format)
    );
    return new MemoryRaster(specification.rows, specification.columns, specification.radiometricResolutions, bands, {
      format,
      mapper,
      spectralRanges: this._normalizeRanges(spectralRanges, specification.bandCount),
    });
  }

  /**
   * Reads every sample of a service into memory.
   */
  createRasterFromService(service: RasterService, mapper: RasterMapper | null = null): MemoryRaster {
    const specification = createRasterSpecification({
      bandCount: service.bandCount,
      rows: service.rows,
      columns: service.columns,
      radiometricResolutions: service.radiometricResolutions,
    });
    const raster = this.createRaster(specification, mapper, service.format ?? 'integer', service.spectralRanges);

    for (let row = 0; row < raster.rows; row++) {
      for (let column = 0; column < raster.columns; column++) {
        for (let band = 0; band < raster.bandCount; band++) {
          raster.setValue(row, column, band, service.readValue(row, column, band));
        }
      }
    }
    return raster;
  }

  /**
   * Concatenates the bands of the rasters, in order, into a fresh raster.
   * The mapper of the first raster is kept.
   */
  mergeRasters(rasters: readonly Raster[]): MemoryRaster {
    if (rasters.length === 0) {
      throw new EmptyOthersCollectionError();
    }

    const [first] = rasters;
    const mismatch = rasters.find((raster) => raster.rows !== first.rows || raster.columns !== first.columns);
    if (mismatch) {
      throw new IncompatibleRastersError(
        `The dimensions of the rasters do not match (${first.rows}x${first.columns} and ${mismatch.rows}x${mismatch.columns}).`
      );
    }

    const format: RasterFormat = rasters.some((raster) => raster.format === 'floating') ? 'floating' : 'integer';
    const resolutions: number[] = [];
    const ranges: (SpectralRange | null)[] = [];
    const bands: BandArray[] = [];
    const length = first.rows * first.columns;

    for (const raster of rasters) {
      for (let bandIndex = 0; bandIndex < raster.bandCount; bandIndex++) {
        const resolution = raster.radiometricResolutions[bandIndex];
        const band = allocateBand(length, resolution, format);
        for (let row = 0; row < raster.rows; row++) {
          for (let column = 0; column < raster.columns; column++) {
            band[row * raster.columns + column] = raster.getValue(row, column, bandIndex);
          }
        }
        resolutions.push(resolution);
        ranges.push(raster.spectralRanges[bandIndex] ?? null);
        bands.push(band);
      }
    }

    return new MemoryRaster(first.rows, first.columns, resolutions, bands, {
      format,
      mapper: first.mapper,
      spectralRanges: ranges,
    });
  }

  private _normalizeRanges(
    spectralRanges: readonly (SpectralRange | null)[] | undefined,
    bandCount: number
  ): (SpectralRange | null)[] {
    return Array.from({ length: bandCount }, (_, index) => spectralRanges?.[index] ?? null);
  }
}
