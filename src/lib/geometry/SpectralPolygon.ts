import { EmptyShellError, InvalidBandCountError, NullArgumentError } from '../core/errors';
import type { Coordinate, Metadata } from '../core/types';
import type { RasterImaging } from '../imaging/RasterImaging';
import type { RasterPresentation } from '../presentation/types';
import type { Raster } from '../raster/types';
import type { PolygonLike, Ring } from './types';

/**
 * Axis-aligned bounds of a polygon
 */
export interface Envelope {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
}

export interface SpectralPolygonInit {
  shell: Ring;
  holes?: readonly Ring[];
  raster: Raster;
  presentation: RasterPresentation;
  imaging?: RasterImaging | null;
  metadata?: Metadata | null;
}

function freezeRing(ring: Ring): Ring {
  return Object.freeze(ring.map((c): Coordinate => (c.length === 3 ? [c[0], c[1], c[2]] : [c[0], c[1]])));
}

/**
 * Polygon bound to a multi-band raster covering it.
 *
 * Instances are frozen; the samples of the owned raster stay writable
 * through the raster itself.
 */
export class SpectralPolygon implements PolygonLike {
  readonly shell: Ring;
  readonly holes: readonly Ring[];
  readonly raster: Raster;
  readonly presentation: RasterPresentation;
  readonly imaging: RasterImaging | null;
  readonly metadata: Readonly<Metadata>;

  /**
   * @throws NullArgumentError when the raster is missing
   * @throws EmptyShellError when the shell or a hole has no coordinates
   * @throws InvalidBandCountError when the raster has no bands
   */
  constructor(init: SpectralPolygonInit) {
    if (!init.raster) throw new NullArgumentError('raster');
    if (!init.shell) throw new NullArgumentError('shell');
    if (init.shell.length === 0) throw new EmptyShellError();

    const holes = init.holes ?? [];
    const emptyHole = holes.findIndex((hole) => hole.length === 0);
    if (emptyHole >= 0) {
      throw new EmptyShellError(`The hole at index ${emptyHole} contains no coordinates.`);
    }
    if (init.raster.bandCount < 1) {
      throw new InvalidBandCountError(init.raster.bandCount);
    }

    this.shell = freezeRing(init.shell);
    this.holes = Object.freeze(holes.map(freezeRing));
    this.raster = init.raster;
    this.presentation = init.presentation;
    this.imaging = init.imaging ?? null;
    this.metadata = Object.freeze({ ...(init.metadata ?? {}) });
    Object.freeze(this);
  }

  get bandCount(): number {
    return this.raster.bandCount;
  }

  /**
   * Bounds of the shell
   */
  get envelope(): Envelope {
    let minX = Infinity;
    let minY = Infinity;
    let maxX = -Infinity;
    let maxY = -Infinity;
    for (const [x, y] of this.shell) {
      if (x < minX) minX = x;
      if (y < minY) minY = y;
      if (x > maxX) maxX = x;
      if (y > maxY) maxY = y;
    }
    return { minX, minY, maxX, maxY };
  }

  toString(): string {
    const ring = (r: Ring) => `(${r.map((c) => c.join(' ')).join(', ')})`;
    return `SPECTRAL POLYGON (${[this.shell, ...this.holes].map(ring).join(', ')}) ${this.raster.toString()}`;
  }
}
