import { InvalidDimensionError, SpectralGeometryError } from '../core/errors';
import type { Coordinate, RasterFormat } from '../core/types';
import { computeGridEnvelope } from '../mapping/AffineRasterMapper';
import type { RasterMapper } from '../mapping/types';
import type { SpectralRange } from '../spectral/SpectralRange';
import { clamp } from '../utils/helpers';
import type { Raster } from './types';

/**
 * Typed array holding the samples of one band
 */
export type BandArray = Uint8Array | Uint16Array | Uint32Array | Float64Array;

/**
 * Allocates sample storage wide enough for the given resolution.
 */
export function allocateBand(length: number, radiometricResolution: number, format: RasterFormat): BandArray {
  if (format === 'floating' || radiometricResolution > 32) return new Float64Array(length);
  if (radiometricResolution > 16) return new Uint32Array(length);
  if (radiometricResolution > 8) return new Uint16Array(length);
  return new Uint8Array(length);
}

/**
 * Whether the array has the type {@link allocateBand} picks for the resolution.
 */
export function isBandArrayFor(band: BandArray, radiometricResolution: number, format: RasterFormat): boolean {
  if (format === 'floating' || radiometricResolution > 32) return band instanceof Float64Array;
  if (radiometricResolution > 16) return band instanceof Uint32Array;
  if (radiometricResolution > 8) return band instanceof Uint16Array;
  return band instanceof Uint8Array;
}

/**
 * Largest sample value of an integer band.
 */
export function maxSampleValue(radiometricResolution: number): number {
  return radiometricResolution >= 53 ? Number.MAX_SAFE_INTEGER : 2 ** radiometricResolution - 1;
}

/**
 * Raster keeping every band in memory, one typed array per band in row-major order.
 */
export class MemoryRaster implements Raster {
  readonly bandCount: number;
  readonly rows: number;
  readonly columns: number;
  readonly format: RasterFormat;
  readonly radiometricResolutions: readonly number[];
  readonly spectralRanges: readonly (SpectralRange | null)[];
  readonly mapper: RasterMapper | null;

  private readonly _bands: BandArray[];
  private _coordinates: Coordinate[] | null = null;

  /**
   * Creates a raster over existing band storage. The arrays are adopted, not copied.
   *
   * @param bands - One array of rows * columns samples per band, typed as {@link allocateBand} would
   */
  constructor(
    rows: number,
    columns: number,
    radiometricResolutions: readonly number[],
    bands: BandArray[],
    options: {
      format?: RasterFormat;
      mapper?: RasterMapper | null;
      spectralRanges?: readonly (SpectralRange | null)[];
    } = {}
  ) {
    if (bands.length !== radiometricResolutions.length) {
      throw new SpectralGeometryError(
        'The number of band arrays does not match the number of radiometric resolutions.',
        'BAND_RESOLUTION_MISMATCH'
      );
    }
    if (bands.some((band) => band.length !== rows * columns)) {
      throw new InvalidDimensionError('band length', rows * columns, 'does not match every band array');
    }
    const format = options.format ?? 'integer';
    const mistyped = bands.findIndex((band, i) => !isBandArrayFor(band, radiometricResolutions[i], format));
    if (mistyped >= 0) {
      throw new InvalidDimensionError(
        `storage of band ${mistyped}`,
        radiometricResolutions[mistyped],
        `does not fit a ${bands[mistyped].constructor.name} of ${format} samples`
      );
    }

    this.rows = rows;
    this.columns = columns;
    this.bandCount = bands.length;
    this.format = format;
    this.radiometricResolutions = Object.freeze([...radiometricResolutions]);
    this.spectralRanges = Object.freeze(
      options.spectralRanges ? [...options.spectralRanges] : new Array<SpectralRange | null>(bands.length).fill(null)
    );
    this.mapper = options.mapper ?? null;
    this._bands = bands;
  }

  get isMapped(): boolean {
    return this.mapper !== null;
  }

  get coordinates(): readonly Coordinate[] {
    if (!this._coordinates) {
      this._coordinates = this.mapper ? computeGridEnvelope(this.mapper, this.rows, this.columns) : [];
    }
    return this._coordinates;
  }

  getValue(rowIndex: number, columnIndex: number, bandIndex: number): number {
    return this._band(bandIndex)[this._offset(rowIndex, columnIndex)];
  }

  setValue(rowIndex: number, columnIndex: number, bandIndex: number, value: number): void {
    const band = this._band(bandIndex);
    band[this._offset(rowIndex, columnIndex)] = this._normalize(value, bandIndex);
  }

  getValues(rowIndex: number, columnIndex: number): number[] {
    const offset = this._offset(rowIndex, columnIndex);
    return this._bands.map((band) => band[offset]);
  }

  setValues(rowIndex: number, columnIndex: number, values: readonly number[]): void {
    if (values.length !== this.bandCount) {
      throw new InvalidDimensionError('number of values', values.length, `does not match the number of bands (${this.bandCount})`);
    }
    const offset = this._offset(rowIndex, columnIndex);
    values.forEach((value, bandIndex) => {
      this._bands[bandIndex][offset] = this._normalize(value, bandIndex);
    });
  }

  getValueAt(coordinate: Coordinate, bandIndex: number): number {
    const [rowIndex, columnIndex] = this._locate(coordinate);
    return this.getValue(rowIndex, columnIndex, bandIndex);
  }

  setValueAt(coordinate: Coordinate, bandIndex: number, value: number): void {
    const [rowIndex, columnIndex] = this._locate(coordinate);
    this.setValue(rowIndex, columnIndex, bandIndex, value);
  }

  getHistogram(bandIndex: number): number[] {
    const band = this._band(bandIndex);
    const resolution = this.radiometricResolutions[bandIndex];
    if (this.format === 'floating' || resolution > 16) {
      throw new SpectralGeometryError(
        `A histogram is only available for integer bands of at most 16 bits (band ${bandIndex} has ${resolution}).`,
        'INVALID_RADIOMETRIC_RESOLUTION'
      );
    }

    const histogram = new Array<number>(2 ** resolution).fill(0);
    for (let i = 0; i < band.length; i++) {
      histogram[band[i]]++;
    }
    return histogram;
  }

  /**
   * Returns a copy of the samples of one band.
   */
  getBandData(bandIndex: number): BandArray {
    return this._band(bandIndex).slice();
  }

  clone(): MemoryRaster {
    return new MemoryRaster(
      this.rows,
      this.columns,
      this.radiometricResolutions,
      this._bands.map((band) => band.slice()),
      { format: this.format, mapper: this.mapper, spectralRanges: this.spectralRanges }
    );
  }

  toString(): string {
    return `Raster [${this.rows}x${this.columns}x${this.bandCount}]`;
  }

  private _band(bandIndex: number): BandArray {
    if (!Number.isInteger(bandIndex) || bandIndex < 0 || bandIndex >= this.bandCount) {
      throw new InvalidDimensionError('band index', bandIndex, `is not within 0..${this.bandCount - 1}`);
    }
    return this._bands[bandIndex];
  }

  private _offset(rowIndex: number, columnIndex: number): number {
    if (!Number.isInteger(rowIndex) || rowIndex < 0 || rowIndex >= this.rows) {
      throw new InvalidDimensionError('row index', rowIndex, `is not within 0..${this.rows - 1}`);
    }
    if (!Number.isInteger(columnIndex) || columnIndex < 0 || columnIndex >= this.columns) {
      throw new InvalidDimensionError('column index', columnIndex, `is not within 0..${this.columns - 1}`);
    }
    return rowIndex * this.columns + columnIndex;
  }

  private _locate(coordinate: Coordinate): [number, number] {
    if (!this.mapper) {
      throw new SpectralGeometryError('The mapping of the raster is not defined.', 'NULL_ARGUMENT');
    }
    const [row, column] = this.mapper.mapRaster(coordinate);
    return [Math.floor(row), Math.floor(column)];
  }

  /**
   * Integer samples are rounded and clamped to the band's range.
   */
  private _normalize(value: number, bandIndex: number): number {
    if (this.format === 'floating') return value;
    if (!Number.isFinite(value)) return 0;
    return clamp(Math.round(value), 0, maxSampleValue(this.radiometricResolutions[bandIndex]));
  }
}
