import type { Metadata } from '../core/types';
import { EmptyShellError } from '../core/errors';
import type { PolygonLike, Ring } from './types';

/**
 * Creates plain polygons and holds named extensions contributed by other modules.
 */
export interface GeometryFactory {
  createPolygon(shell: Ring, holes?: readonly Ring[], metadata?: Metadata | null): PolygonLike;
  hasExtension(key: string): boolean;
  getExtension(key: string): unknown;
  setExtension(key: string, extension: unknown): void;
}

/**
 * In-memory geometry factory producing frozen polygons.
 */
export class SimpleGeometryFactory implements GeometryFactory {
  private _extensions = new Map<string, unknown>();

  createPolygon(shell: Ring, holes: readonly Ring[] = [], metadata: Metadata | null = null): PolygonLike {
    if (shell.length === 0) {
      throw new EmptyShellError();
    }
    return Object.freeze({
      shell: Object.freeze([...shell]),
      holes: Object.freeze(holes.map((hole) => Object.freeze([...hole]))),
      metadata: metadata ? Object.freeze({ ...metadata }) : null,
    });
  }

  hasExtension(key: string): boolean {
    return this._extensions.has(key);
  }

  getExtension(key: string): unknown {
    return this._extensions.get(key);
  }

  setExtension(key: string, extension: unknown): void {
    this._extensions.set(key, extension);
  }
}
