/**
 * Error codes raised by the spectral geometry core.
 */
export type SpectralGeometryErrorCode =
  | 'NULL_ARGUMENT'
  | 'INVALID_DIMENSION'
  | 'INVALID_BAND_COUNT'
  | 'INVALID_RADIOMETRIC_RESOLUTION'
  | 'BAND_RESOLUTION_MISMATCH'
  | 'EMPTY_SHELL'
  | 'DUPLICATE_BAND_INDEX'
  | 'INCOMPATIBLE_PRESENTATION_CONFIG'
  | 'NULL_COLOR_MAP'
  | 'EMPTY_OTHERS_COLLECTION'
  | 'INCOMPATIBLE_RASTERS'
  | 'INVALID_TRANSFORMATION'
  | 'INVALID_IMAGING';

/**
 * Base error class for all argument and configuration errors of the library.
 * The `code` allows programmatic handling without `instanceof` chains.
 */
export class SpectralGeometryError extends Error {
  constructor(
    message: string,
    public readonly code: SpectralGeometryErrorCode
  ) {
    super(message);
    this.name = 'SpectralGeometryError';
  }
}

/**
 * A required argument is missing (null or undefined).
 */
export class NullArgumentError extends SpectralGeometryError {
  readonly field: string;

  constructor(field: string) {
    super(`The ${field} is null.`, 'NULL_ARGUMENT');
    this.name = 'NullArgumentError';
    this.field = field;
  }
}

/**
 * A dimension or index argument is negative, fractional or out of range.
 */
export class InvalidDimensionError extends SpectralGeometryError {
  readonly field: string;
  readonly value: number;

  constructor(field: string, value: number, detail = 'is out of range') {
    super(`The ${field} (${value}) ${detail}.`, 'INVALID_DIMENSION');
    this.name = 'InvalidDimensionError';
    this.field = field;
    this.value = value;
  }
}

export class InvalidBandCountError extends SpectralGeometryError {
  readonly value: number;

  constructor(value: number) {
    super(`The number of bands (${value}) is less than 1.`, 'INVALID_BAND_COUNT');
    this.name = 'InvalidBandCountError';
    this.value = value;
  }
}

export class InvalidRadiometricResolutionError extends SpectralGeometryError {
  readonly value: number;

  constructor(value: number) {
    super(
      `The radiometric resolution (${value}) does not fall within the range 1..64.`,
      'INVALID_RADIOMETRIC_RESOLUTION'
    );
    this.name = 'InvalidRadiometricResolutionError';
    this.value = value;
  }
}

export class BandResolutionMismatchError extends SpectralGeometryError {
  readonly expected: number;
  readonly actual: number;

  constructor(expected: number, actual: number) {
    super(
      `The number of radiometric resolutions (${actual}) does not match the number of bands (${expected}).`,
      'BAND_RESOLUTION_MISMATCH'
    );
    this.name = 'BandResolutionMismatchError';
    this.expected = expected;
    this.actual = actual;
  }
}

/**
 * The shell, or one of the holes, contains no coordinates.
 */
export class EmptyShellError extends SpectralGeometryError {
  constructor(detail = 'The shell contains no coordinates.') {
    super(detail, 'EMPTY_SHELL');
    this.name = 'EmptyShellError';
  }
}

export class DuplicateBandIndexError extends SpectralGeometryError {
  readonly indices: number[];

  constructor(indices: number[]) {
    super(`Multiple bands are specified for the same index: [${indices.join(', ')}].`, 'DUPLICATE_BAND_INDEX');
    this.name = 'DuplicateBandIndexError';
    this.indices = indices;
  }
}

export class IncompatiblePresentationConfigError extends SpectralGeometryError {
  readonly model: string;

  constructor(model: string, detail: string) {
    super(`${detail} (model: ${model})`, 'INCOMPATIBLE_PRESENTATION_CONFIG');
    this.name = 'IncompatiblePresentationConfigError';
    this.model = model;
  }
}

export class NullColorMapError extends SpectralGeometryError {
  constructor() {
    super('The color map is null or empty.', 'NULL_COLOR_MAP');
    this.name = 'NullColorMapError';
  }
}

export class EmptyOthersCollectionError extends SpectralGeometryError {
  constructor() {
    super('No source geometries are specified.', 'EMPTY_OTHERS_COLLECTION');
    this.name = 'EmptyOthersCollectionError';
  }
}

/**
 * Rasters to be merged do not share the same grid.
 */
export class IncompatibleRastersError extends SpectralGeometryError {
  constructor(detail: string) {
    super(detail, 'INCOMPATIBLE_RASTERS');
    this.name = 'IncompatibleRastersError';
  }
}

export class InvalidTransformationError extends SpectralGeometryError {
  constructor(detail: string) {
    super(detail, 'INVALID_TRANSFORMATION');
    this.name = 'InvalidTransformationError';
  }
}

export class InvalidImagingError extends SpectralGeometryError {
  constructor(detail: string) {
    super(detail, 'INVALID_IMAGING');
    this.name = 'InvalidImagingError';
  }
}

/**
 * Narrows an unknown value to a library error, optionally of a given code.
 */
export function isSpectralGeometryError(
  value: unknown,
  code?: SpectralGeometryErrorCode
): value is SpectralGeometryError {
  return value instanceof SpectralGeometryError && (code === undefined || value.code === code);
}
