import {
  BandResolutionMismatchError,
  InvalidBandCountError,
  InvalidDimensionError,
  InvalidRadiometricResolutionError,
  SpectralGeometryError,
} from '../core/errors';
import type { RasterFormat, ValidationResult } from '../core/types';

/** Smallest supported number of bits per sample */
export const MIN_RADIOMETRIC_RESOLUTION = 1;

/** Largest supported number of bits per sample */
export const MAX_RADIOMETRIC_RESOLUTION = 64;

/**
 * Bits per sample of a raster whose specification names none
 */
export const DEFAULT_RADIOMETRIC_RESOLUTIONS: Readonly<Record<RasterFormat, number>> = {
  integer: 16,
  floating: 32,
};

/**
 * Requested raster shape. At most one of `radiometricResolution` and
 * `radiometricResolutions` should be given.
 */
export interface RasterSpecificationInput {
  bandCount: number;
  rows: number;
  columns: number;
  /** Resolution shared by every band */
  radiometricResolution?: number;
  /** One resolution per band, in band order */
  radiometricResolutions?: readonly number[];
}

/**
 * Validated raster shape with one resolution per band
 */
export interface RasterSpecification {
  readonly bandCount: number;
  readonly rows: number;
  readonly columns: number;
  readonly radiometricResolutions: readonly number[];
}

function isValidResolution(value: number): boolean {
  return (
    Number.isInteger(value) &&
    value >= MIN_RADIOMETRIC_RESOLUTION &&
    value <= MAX_RADIOMETRIC_RESOLUTION
  );
}

/**
 * Validates a raster shape before any raster is realised.
 *
 * @param input - Requested band count, dimensions and resolution(s)
 * @param defaultResolution - Resolution applied when the input names none
 * @returns The normalised specification, or the first violated constraint
 */
export function validateRasterSpecification(
  input: RasterSpecificationInput,
  defaultResolution: number = DEFAULT_RADIOMETRIC_RESOLUTIONS.integer
): ValidationResult<RasterSpecification, SpectralGeometryError> {
  const { bandCount, rows, columns } = input;

  if (!Number.isInteger(bandCount) || bandCount < 1) {
    return { success: false, error: new InvalidBandCountError(bandCount) };
  }
  if (!Number.isInteger(rows) || rows < 0) {
    return { success: false, error: new InvalidDimensionError('number of rows', rows, 'is not a non-negative integer') };
  }
  if (!Number.isInteger(columns) || columns < 0) {
    return {
      success: false,
      error: new InvalidDimensionError('number of columns', columns, 'is not a non-negative integer'),
    };
  }

  let resolutions: number[];
  if (input.radiometricResolutions !== undefined) {
    if (input.radiometricResolutions.length !== bandCount) {
      return {
        success: false,
        error: new BandResolutionMismatchError(bandCount, input.radiometricResolutions.length),
      };
    }
    const invalid = input.radiometricResolutions.find((value) => !isValidResolution(value));
    if (invalid !== undefined) {
      return { success: false, error: new InvalidRadiometricResolutionError(invalid) };
    }
    resolutions = [...input.radiometricResolutions];
  } else {
    const resolution = input.radiometricResolution ?? defaultResolution;
    if (!isValidResolution(resolution)) {
      return { success: false, error: new InvalidRadiometricResolutionError(resolution) };
    }
    resolutions = new Array<number>(bandCount).fill(resolution);
  }

  return {
    success: true,
    data: Object.freeze({
      bandCount,
      rows,
      columns,
      radiometricResolutions: Object.freeze(resolutions),
    }),
  };
}

/**
 * Throwing variant of {@link validateRasterSpecification}.
 */
export function createRasterSpecification(
  input: RasterSpecificationInput,
  defaultResolution?: number
): RasterSpecification {
  const result = validateRasterSpecification(input, defaultResolution);
  if (!result.success) {
    throw result.error;
  }
  return result.data;
}
