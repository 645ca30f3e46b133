import { InvalidDimensionError, InvalidImagingError, InvalidRadiometricResolutionError } from '../core/errors';
import { MAX_RADIOMETRIC_RESOLUTION, MIN_RADIOMETRIC_RESOLUTION } from '../raster/RasterSpecification';
import { SpectralRange } from '../spectral/SpectralRange';
import { isSpectralRangeName } from '../spectral/SpectralRangeCatalog';
import type { SpectralRangeName } from '../spectral/SpectralRangeCatalog';
import deviceData from './imagingDevices.json';
import { createRasterImaging } from './RasterImaging';
import type { ImagingDevice, RasterImaging, RasterImagingInput } from './RasterImaging';

/**
 * Keys of the known imaging devices
 */
export type ImagingDeviceKey = 'spot4Hrvir' | 'spot5Hrg' | 'landsat7Etm' | 'landsat8OliTirs';

export const IMAGING_DEVICE_KEYS: ImagingDeviceKey[] = ['spot4Hrvir', 'spot5Hrg', 'landsat7Etm', 'landsat8OliTirs'];

/**
 * Band of a known sensor
 */
export interface SensorBand {
  /** Zero-based band number */
  readonly number: number;
  readonly description: string;
  /** Ground sample distance in metres */
  readonly spatialResolution: number;
  readonly radiometricResolution: number;
  readonly spectralDomain: SpectralRangeName;
  readonly spectralRange: SpectralRange;
}

/**
 * Imaging device with its band layout
 */
export interface KnownImagingDevice extends ImagingDevice {
  /** Mission, mission number and instrument, e.g. `SPOT4 HRVIR` */
  readonly name: string;
  readonly missionNumber: number;
  readonly remarks: string;
  readonly aliases: readonly string[];
  /** Revisit time in days */
  readonly temporalResolution: number;
  /** Swath width in metres */
  readonly swath: number;
  readonly bands: readonly SensorBand[];
}

interface DeviceRecord {
  identifier: string;
  mission: string;
  missionNumber: number;
  instrument: string;
  remarks: string;
  aliases: string[];
  altitude: number;
  temporalResolution: number;
  swath: number;
  bands: {
    description: string;
    spatialResolution: number;
    radiometricResolution: number;
    spectralDomain: string;
    spectralRange: number[];
  }[];
}

const DEVICE_RECORDS: Record<ImagingDeviceKey, DeviceRecord> = deviceData;

function toSensorBand(key: string, band: DeviceRecord['bands'][number], number: number, swath: number): SensorBand {
  const { spatialResolution, radiometricResolution, spectralDomain, spectralRange } = band;
  if (!(spatialResolution > 0)) {
    throw new InvalidDimensionError('spatial resolution', spatialResolution, 'is equal to or less than 0');
  }
  if (swath < spatialResolution) {
    throw new InvalidDimensionError('swath', swath, 'is less than the spatial resolution');
  }
  if (
    !Number.isInteger(radiometricResolution) ||
    radiometricResolution < MIN_RADIOMETRIC_RESOLUTION ||
    radiometricResolution > MAX_RADIOMETRIC_RESOLUTION
  ) {
    throw new InvalidRadiometricResolutionError(radiometricResolution);
  }
  if (!isSpectralRangeName(spectralDomain)) {
    throw new Error(`Unknown spectral domain in device ${key}: ${spectralDomain}`);
  }
  if (spectralRange.length !== 2) {
    throw new Error(`Invalid spectral range in device ${key}: [${spectralRange.join(', ')}]`);
  }

  const sensorBand: SensorBand = {
    number,
    description: band.description,
    spatialResolution,
    radiometricResolution,
    spectralDomain,
    spectralRange: new SpectralRange(spectralRange[0], spectralRange[1]),
  };
  return Object.freeze(sensorBand);
}

function toDevice(key: ImagingDeviceKey, record: DeviceRecord): KnownImagingDevice {
  if (record.mission.trim() === '' || record.instrument.trim() === '') {
    throw new InvalidImagingError('The mission and the instrument of the imaging device must not be empty.');
  }

  const device: KnownImagingDevice = {
    identifier: record.identifier,
    name: `${record.mission}${record.missionNumber} ${record.instrument}`,
    mission: record.mission,
    missionNumber: record.missionNumber,
    instrument: record.instrument,
    remarks: record.remarks,
    aliases: Object.freeze([...record.aliases]),
    altitude: record.altitude,
    temporalResolution: record.temporalResolution,
    swath: record.swath,
    bands: Object.freeze(record.bands.map((band, i) => toSensorBand(key, band, i, record.swath))),
  };
  return Object.freeze(device);
}

const cache = new Map<ImagingDeviceKey, KnownImagingDevice>();

/**
 * Gets a known imaging device. Devices are created on first access and the
 * same instance is returned afterwards.
 */
export function getImagingDevice(key: ImagingDeviceKey): KnownImagingDevice {
  let device = cache.get(key);
  if (!device) {
    device = toDevice(key, DEVICE_RECORDS[key]);
    cache.set(key, device);
  }
  return device;
}

/**
 * All known imaging devices in catalog order
 */
export function getImagingDevices(): KnownImagingDevice[] {
  return IMAGING_DEVICE_KEYS.map(getImagingDevice);
}

export function isImagingDeviceKey(value: string): value is ImagingDeviceKey {
  return IMAGING_DEVICE_KEYS.some((key) => key === value);
}

/**
 * Finds the devices whose identifier contains the text, ignoring case.
 */
export function findImagingDevicesByIdentifier(identifier: string): KnownImagingDevice[] {
  const text = identifier.toLowerCase();
  return getImagingDevices().filter((device) => device.identifier.toLowerCase().includes(text));
}

/**
 * Finds the devices whose name or one of its aliases contains the text, ignoring case.
 */
export function findImagingDevicesByName(name: string): KnownImagingDevice[] {
  const text = name.toLowerCase();
  return getImagingDevices().filter(
    (device) =>
      device.name.toLowerCase().includes(text) || device.aliases.some((alias) => alias.toLowerCase().includes(text))
  );
}

/**
 * Creates imaging metadata with one band per sensor band of the device.
 *
 * @param device - The acquiring device
 * @param input - Acquisition data of the scene
 */
export function createImagingFromDevice(
  device: KnownImagingDevice,
  input: Omit<RasterImagingInput, 'device' | 'bands'> = {}
): RasterImaging {
  return createRasterImaging({
    ...input,
    device: {
      identifier: device.identifier,
      mission: device.mission,
      instrument: device.instrument,
      orbit: device.orbit,
      altitude: device.altitude,
    },
    bands: device.bands.map((band) => ({
      description: band.description,
      radiometricResolution: band.radiometricResolution,
      spectralRange: band.spectralRange,
    })),
  });
}
