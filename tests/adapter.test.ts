import { afterEach, describe, it, expect, vi } from 'vitest';
import {
  SPECTRAL_EXTENSION_KEY,
  SpectralGeometryAdapter,
  cloneSpectralPolygon,
  createSpectralPolygon,
  ensureSpectralBuilder,
  mergeSpectralPolygons,
  setDefaultSpectralBuilder,
} from '../src/lib/adapters/SpectralGeometryAdapter';
import { EmptyShellError } from '../src/lib/core/errors';
import type { Coordinate } from '../src/lib/core/types';
import { SimpleGeometryFactory } from '../src/lib/geometry/GeometryFactory';
import { SpectralGeometryBuilder } from '../src/lib/geometry/SpectralGeometryBuilder';

const shell: Coordinate[] = [
  [0, 0],
  [5, 0],
  [5, 5],
  [0, 0],
];

describe('ensureSpectralBuilder', () => {
  afterEach(() => {
    setDefaultSpectralBuilder(null);
    vi.restoreAllMocks();
  });

  it('should register a builder once', () => {
    const factory = new SimpleGeometryFactory();
    expect(factory.hasExtension(SPECTRAL_EXTENSION_KEY)).toBe(false);

    const builder = ensureSpectralBuilder(factory);
    expect(builder).toBeInstanceOf(SpectralGeometryBuilder);
    expect(factory.getExtension('spectral')).toBe(builder);
    expect(ensureSpectralBuilder(factory)).toBe(builder);
  });

  it('should replace an extension of another kind', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const factory = new SimpleGeometryFactory();
    factory.setExtension(SPECTRAL_EXTENSION_KEY, { name: 'other' });

    const builder = ensureSpectralBuilder(factory);
    expect(factory.getExtension(SPECTRAL_EXTENSION_KEY)).toBe(builder);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('should register the configured default builder', () => {
    const custom = new SpectralGeometryBuilder({ defaultRadiometricResolution: 12 });
    setDefaultSpectralBuilder(custom);

    const factory = new SimpleGeometryFactory();
    expect(ensureSpectralBuilder(factory)).toBe(custom);
    const polygon = createSpectralPolygon(factory, { specification: { bandCount: 1, rows: 1, columns: 1 }, shell });
    expect(polygon.raster.radiometricResolutions).toEqual([12]);
  });
});

describe('factory operations', () => {
  it('should create, clone and merge through the factory', () => {
    const factory = new SimpleGeometryFactory();
    const polygon = createSpectralPolygon(factory, {
      specification: { bandCount: 2, rows: 2, columns: 2 },
      shell,
      metadata: { id: 'a' },
    });
    polygon.raster.setValue(0, 0, 1, 9);

    const copy = cloneSpectralPolygon(factory, polygon);
    expect(copy.raster).not.toBe(polygon.raster);
    expect(copy.raster.getValue(0, 0, 1)).toBe(9);

    const merged = mergeSpectralPolygons(factory, [polygon, copy], { metadata: { id: 'merged' } });
    expect(merged.raster.bandCount).toBe(4);
    expect(merged.raster.getValues(0, 0)).toEqual([0, 9, 0, 9]);
    expect(merged.metadata).toEqual({ id: 'merged' });
  });
});

describe('SpectralGeometryAdapter', () => {
  it('should expose the factory and its builder', () => {
    const factory = new SimpleGeometryFactory();
    const adapter = new SpectralGeometryAdapter(factory);
    expect(adapter.type).toBe('spectral');
    expect(adapter.factory).toBe(factory);
    expect(adapter.builder).toBe(factory.getExtension(SPECTRAL_EXTENSION_KEY));
  });

  it('should build polygons', () => {
    const adapter = new SpectralGeometryAdapter(new SimpleGeometryFactory());
    const a = adapter.createSpectralPolygon({ specification: { bandCount: 1, rows: 1, columns: 3 }, shell });
    const b = adapter.cloneSpectralPolygon(a, { metadata: { copy: true } });
    const merged = adapter.mergeSpectralPolygons([a, b]);
    expect(b.metadata).toEqual({ copy: true });
    expect(merged.raster.bandCount).toBe(2);
    expect(merged.raster.columns).toBe(3);
  });
});

describe('SimpleGeometryFactory', () => {
  it('should create frozen polygons', () => {
    const factory = new SimpleGeometryFactory();
    const polygon = factory.createPolygon(shell, [], { name: 'plot' });
    expect(polygon.shell).toEqual(shell);
    expect(polygon.holes).toEqual([]);
    expect(polygon.metadata).toEqual({ name: 'plot' });
    expect(Object.isFrozen(polygon)).toBe(true);
  });

  it('should reject an empty shell', () => {
    expect(() => new SimpleGeometryFactory().createPolygon([])).toThrow(EmptyShellError);
  });
});
