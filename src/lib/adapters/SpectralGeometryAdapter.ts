import type { GeometryFactory } from '../geometry/GeometryFactory';
import { SpectralGeometryBuilder } from '../geometry/SpectralGeometryBuilder';
import type { SpectralPolygon } from '../geometry/SpectralPolygon';
import type { SpectralGeometryOverrides, SpectralGeometryRequest } from '../geometry/types';

/**
 * Extension key of the spectral builder on a geometry factory
 */
export const SPECTRAL_EXTENSION_KEY = 'spectral';

let defaultBuilder: SpectralGeometryBuilder | null = null;

/**
 * Sets the builder registered on factories that have none. `null` restores
 * a new builder with default options per factory.
 */
export function setDefaultSpectralBuilder(builder: SpectralGeometryBuilder | null): void {
  defaultBuilder = builder;
}

/**
 * Returns the spectral builder of a factory, registering one when missing.
 *
 * @param factory - The geometry factory to extend
 * @returns The registered builder
 */
export function ensureSpectralBuilder(factory: GeometryFactory): SpectralGeometryBuilder {
  if (factory.hasExtension(SPECTRAL_EXTENSION_KEY)) {
    const existing = factory.getExtension(SPECTRAL_EXTENSION_KEY);
    if (existing instanceof SpectralGeometryBuilder) {
      return existing;
    }
    console.warn(`Replacing extension '${SPECTRAL_EXTENSION_KEY}' that is not a spectral geometry builder`);
  }

  const builder = defaultBuilder ?? new SpectralGeometryBuilder();
  factory.setExtension(SPECTRAL_EXTENSION_KEY, builder);
  return builder;
}

export function createSpectralPolygon(factory: GeometryFactory, request: SpectralGeometryRequest): SpectralPolygon {
  return ensureSpectralBuilder(factory).build(request);
}

export function cloneSpectralPolygon(
  factory: GeometryFactory,
  other: SpectralPolygon,
  overrides?: SpectralGeometryOverrides
): SpectralPolygon {
  return ensureSpectralBuilder(factory).clone(other, overrides);
}

export function mergeSpectralPolygons(
  factory: GeometryFactory,
  others: readonly SpectralPolygon[],
  overrides?: SpectralGeometryOverrides
): SpectralPolygon {
  return ensureSpectralBuilder(factory).merge(others, overrides);
}

/**
 * Exposes spectral polygon creation on a geometry factory.
 *
 * @example
 * ```typescript
 * const factory = new SimpleGeometryFactory();
 * const adapter = new SpectralGeometryAdapter(factory);
 * const polygon = adapter.createSpectralPolygon({
 *   specification: { bandCount: 4, rows: 64, columns: 64 },
 *   shell: [[0, 0], [64, 0], [64, 64], [0, 64], [0, 0]],
 * });
 * ```
 */
export class SpectralGeometryAdapter {
  readonly type = SPECTRAL_EXTENSION_KEY;

  private _factory: GeometryFactory;

  /**
   * @param factory - The geometry factory to extend
   */
  constructor(factory: GeometryFactory) {
    this._factory = factory;
    ensureSpectralBuilder(factory);
  }

  get factory(): GeometryFactory {
    return this._factory;
  }

  get builder(): SpectralGeometryBuilder {
    return ensureSpectralBuilder(this._factory);
  }

  createSpectralPolygon(request: SpectralGeometryRequest): SpectralPolygon {
    return createSpectralPolygon(this._factory, request);
  }

  cloneSpectralPolygon(other: SpectralPolygon, overrides?: SpectralGeometryOverrides): SpectralPolygon {
    return cloneSpectralPolygon(this._factory, other, overrides);
  }

  mergeSpectralPolygons(others: readonly SpectralPolygon[], overrides?: SpectralGeometryOverrides): SpectralPolygon {
    return mergeSpectralPolygons(this._factory, others, overrides);
  }
}
