import {
  InvalidDimensionError,
  InvalidImagingError,
  InvalidRadiometricResolutionError,
  NullArgumentError,
} from '../core/errors';
import type { Coordinate, Metadata } from '../core/types';
import { MAX_RADIOMETRIC_RESOLUTION, MIN_RADIOMETRIC_RESOLUTION } from '../raster/RasterSpecification';
import type { SpectralRange } from '../spectral/SpectralRange';

/**
 * Sensor that acquired an image
 */
export interface ImagingDevice {
  identifier: string;
  mission: string;
  instrument: string;
  orbit?: string;
  /** Altitude in metres */
  altitude?: number;
}

/**
 * Acquisition descriptor of one band
 */
export interface ImagingBand {
  description?: string;
  radiometricResolution: number;
  spectralRange: SpectralRange | null;
  /** Gain converting digital numbers to radiance */
  physicalGain?: number;
  /** Offset converting digital numbers to radiance */
  physicalBias?: number;
  /** Mean solar exo-atmospheric irradiance, W/(m²·µm) */
  solarIrradiance?: number;
}

export interface RasterImagingInput {
  device?: ImagingDevice | null;
  time?: Date | null;
  /** Geographic location of the device */
  deviceLocation?: Coordinate | null;
  /** Geographic corners of the image, exactly four when given */
  imageLocation?: readonly Coordinate[] | null;
  /** Angles in degrees */
  incidenceAngle?: number;
  viewingAngle?: number;
  sunAzimuth?: number;
  sunElevation?: number;
  bands?: readonly ImagingBand[];
  /** Additional acquisition parameters */
  parameters?: Metadata;
}

/**
 * Acquisition metadata of a raster
 */
export interface RasterImaging {
  readonly device: Readonly<ImagingDevice> | null;
  readonly time: Date | null;
  readonly deviceLocation: Coordinate | null;
  readonly imageLocation: readonly Coordinate[] | null;
  readonly incidenceAngle: number | null;
  readonly viewingAngle: number | null;
  readonly sunAzimuth: number | null;
  readonly sunElevation: number | null;
  readonly bands: readonly Readonly<ImagingBand>[];
  readonly parameters: Readonly<Metadata>;
}

/**
 * Validates and freezes raster imaging metadata.
 *
 * @throws InvalidImagingError when the image location does not have four corners
 * @throws InvalidRadiometricResolutionError when a band resolution is outside 1..64
 */
export function createRasterImaging(input: RasterImagingInput): RasterImaging {
  if (input.imageLocation && input.imageLocation.length !== 4) {
    throw new InvalidImagingError(
      `The number of coordinates in the image location (${input.imageLocation.length}) is not equal to 4.`
    );
  }
  if (input.device && (input.device.mission.trim() === '' || input.device.instrument.trim() === '')) {
    throw new InvalidImagingError('The mission and the instrument of the imaging device must not be empty.');
  }

  const bands = input.bands ?? [];
  for (const band of bands) {
    const resolution = band.radiometricResolution;
    if (
      !Number.isInteger(resolution) ||
      resolution < MIN_RADIOMETRIC_RESOLUTION ||
      resolution > MAX_RADIOMETRIC_RESOLUTION
    ) {
      throw new InvalidRadiometricResolutionError(resolution);
    }
  }

  const imaging: RasterImaging = {
    device: input.device ? Object.freeze({ ...input.device }) : null,
    time: input.time ? new Date(input.time.getTime()) : null,
    deviceLocation: input.deviceLocation ? copyCoordinate(input.deviceLocation) : null,
    imageLocation: input.imageLocation ? Object.freeze(input.imageLocation.map(copyCoordinate)) : null,
    incidenceAngle: input.incidenceAngle ?? null,
    viewingAngle: input.viewingAngle ?? null,
    sunAzimuth: input.sunAzimuth ?? null,
    sunElevation: input.sunElevation ?? null,
    bands: Object.freeze(bands.map((band) => Object.freeze({ ...band }))),
    parameters: Object.freeze({ ...(input.parameters ?? {}) }),
  };
  return Object.freeze(imaging);
}

/**
 * Keeps the listed bands, in the listed order.
 */
export function filterImaging(imaging: RasterImaging, bandIndices: readonly number[]): RasterImaging {
  if (bandIndices.length === 0) {
    throw new NullArgumentError('band index list');
  }
  const invalid = bandIndices.find(
    (index) => !Number.isInteger(index) || index < 0 || index >= imaging.bands.length
  );
  if (invalid !== undefined) {
    throw new InvalidDimensionError('band index', invalid, `is not within 0..${imaging.bands.length - 1}`);
  }
  return createRasterImaging({ ...toInput(imaging), bands: bandIndices.map((index) => imaging.bands[index]) });
}

/**
 * Joins the bands of every imaging in order, keeping the acquisition data of the first.
 */
export function concatImaging(list: readonly RasterImaging[]): RasterImaging {
  if (list.length === 0) {
    throw new NullArgumentError('imaging list');
  }
  return createRasterImaging({ ...toInput(list[0]), bands: list.flatMap((imaging) => imaging.bands) });
}

/**
 * Spectral range of each imaging band
 */
export function getImagingSpectralRanges(imaging: RasterImaging): (SpectralRange | null)[] {
  return imaging.bands.map((band) => band.spectralRange);
}

function toInput(imaging: RasterImaging): RasterImagingInput {
  return {
    device: imaging.device,
    time: imaging.time,
    deviceLocation: imaging.deviceLocation,
    imageLocation: imaging.imageLocation,
    incidenceAngle: imaging.incidenceAngle ?? undefined,
    viewingAngle: imaging.viewingAngle ?? undefined,
    sunAzimuth: imaging.sunAzimuth ?? undefined,
    sunElevation: imaging.sunElevation ?? undefined,
    parameters: imaging.parameters,
  };
}

function copyCoordinate(coordinate: Coordinate): Coordinate {
  return coordinate.length === 3 ? [coordinate[0], coordinate[1], coordinate[2]] : [coordinate[0], coordinate[1]];
}
