import { InvalidDimensionError, InvalidTransformationError } from '../core/errors';
import type { Coordinate, RasterCoordinate, RasterMapMode } from '../core/types';
import type { RasterMapper } from './types';

/**
 * Coefficients of a 2D affine grid transform:
 *   x = a * column + b * row + c
 *   y = d * column + e * row + f
 */
export interface AffineTransform {
  a: number;
  b: number;
  c: number;
  d: number;
  e: number;
  f: number;
  /** Constant elevation of the grid plane; 2D coordinates are produced when omitted */
  z?: number;
}

/**
 * Affine mapping between raster cells and model space.
 */
export class AffineRasterMapper implements RasterMapper {
  readonly mode: RasterMapMode;
  readonly transform: Readonly<AffineTransform>;
  private readonly _determinant: number;

  constructor(transform: AffineTransform, mode: RasterMapMode = 'valueIsArea') {
    const values = [transform.a, transform.b, transform.c, transform.d, transform.e, transform.f];
    if (transform.z !== undefined) values.push(transform.z);
    if (values.some((value) => !Number.isFinite(value))) {
      throw new InvalidTransformationError('The transformation contains invalid values.');
    }

    const determinant = transform.a * transform.e - transform.b * transform.d;
    if (determinant === 0) {
      throw new InvalidTransformationError('The transformation is not invertible.');
    }

    this.mode = mode;
    this.transform = Object.freeze({ ...transform });
    this._determinant = determinant;
  }

  /**
   * Creates an axis-aligned mapper.
   *
   * @param translation - Model coordinate of cell (0, 0)
   * @param scale - Cell size along x (per column) and y (per row)
   * @param mode - Map mode
   */
  static fromTransformation(
    translation: Coordinate,
    scale: [number, number],
    mode: RasterMapMode = 'valueIsArea'
  ): AffineRasterMapper {
    if (scale[0] === 0 || scale[1] === 0) {
      throw new InvalidTransformationError('The scale of the X or Y dimension is equal to 0.');
    }
    return new AffineRasterMapper(
      {
        a: scale[0],
        b: 0,
        c: translation[0],
        d: 0,
        e: scale[1],
        f: translation[1],
        z: translation.length === 3 ? translation[2] : undefined,
      },
      mode
    );
  }

  /**
   * Fits a mapper to ground control points by least squares.
   *
   * @param coordinates - At least two distinct rows and two distinct columns
   * @param mode - Map mode
   */
  static fromCoordinates(
    coordinates: readonly RasterCoordinate[],
    mode: RasterMapMode = 'valueIsArea'
  ): AffineRasterMapper {
    if (new Set(coordinates.map((c) => c.columnIndex)).size < 2) {
      throw new InvalidTransformationError('The number of coordinates with distinct column index is less than 2.');
    }
    if (new Set(coordinates.map((c) => c.rowIndex)).size < 2) {
      throw new InvalidTransformationError('The number of coordinates with distinct row index is less than 2.');
    }

    // normal equations (AᵀA) p = Aᵀv with rows [column, row, 1]
    const normal = [
      [0, 0, 0],
      [0, 0, 0],
      [0, 0, 0],
    ];
    const rhsX = [0, 0, 0];
    const rhsY = [0, 0, 0];
    for (const { rowIndex, columnIndex, coordinate } of coordinates) {
      const row = [columnIndex, rowIndex, 1];
      for (let i = 0; i < 3; i++) {
        for (let j = 0; j < 3; j++) {
          normal[i][j] += row[i] * row[j];
        }
        rhsX[i] += row[i] * coordinate[0];
        rhsY[i] += row[i] * coordinate[1];
      }
    }

    const [a, b, c] = solve3(normal, rhsX);
    const [d, e, f] = solve3(normal, rhsY);
    return new AffineRasterMapper({ a, b, c, d, e, f }, mode);
  }

  get isAxisAligned(): boolean {
    return this.transform.b === 0 && this.transform.d === 0;
  }

  /** Length of one column step in model units */
  get columnSize(): number {
    return Math.hypot(this.transform.a, this.transform.d);
  }

  /** Length of one row step in model units */
  get rowSize(): number {
    return Math.hypot(this.transform.b, this.transform.e);
  }

  mapCoordinate(rowIndex: number, columnIndex: number, mode: RasterMapMode = this.mode): Coordinate {
    if (mode !== this.mode) {
      const shift = mode === 'valueIsArea' ? -0.5 : 0.5;
      rowIndex += shift;
      columnIndex += shift;
    }

    const { a, b, c, d, e, f, z } = this.transform;
    const x = a * columnIndex + b * rowIndex + c;
    const y = d * columnIndex + e * rowIndex + f;
    return z === undefined ? [x, y] : [x, y, z];
  }

  mapRaster(coordinate: Coordinate, mode: RasterMapMode = this.mode): [number, number] {
    const { a, b, c, d, e, f } = this.transform;
    const dx = coordinate[0] - c;
    const dy = coordinate[1] - f;
    let columnIndex = (e * dx - b * dy) / this._determinant;
    let rowIndex = (a * dy - d * dx) / this._determinant;

    if (mode !== this.mode) {
      const shift = mode === 'valueIsArea' ? 0.5 : -0.5;
      rowIndex += shift;
      columnIndex += shift;
    }
    return [rowIndex, columnIndex];
  }

  equals(other: AffineRasterMapper): boolean {
    const t = this.transform;
    const o = other.transform;
    return (
      this.mode === other.mode &&
      t.a === o.a &&
      t.b === o.b &&
      t.c === o.c &&
      t.d === o.d &&
      t.e === o.e &&
      t.f === o.f &&
      t.z === o.z
    );
  }
}

/**
 * Pairs a cell address with its model-space coordinate.
 *
 * @param mapper - Mapper of the raster
 * @param rowIndex - Non-negative row index
 * @param columnIndex - Non-negative column index
 */
export function createRasterCoordinate(
  mapper: RasterMapper,
  rowIndex: number,
  columnIndex: number
): RasterCoordinate {
  if (!Number.isInteger(rowIndex) || rowIndex < 0) {
    throw new InvalidDimensionError('row index', rowIndex, 'is not a non-negative integer');
  }
  if (!Number.isInteger(columnIndex) || columnIndex < 0) {
    throw new InvalidDimensionError('column index', columnIndex, 'is not a non-negative integer');
  }
  return { rowIndex, columnIndex, coordinate: mapper.mapCoordinate(rowIndex, columnIndex) };
}

/**
 * Computes the four model-space corners of a rows × columns grid in ring order.
 */
export function computeGridEnvelope(mapper: RasterMapper, rows: number, columns: number): Coordinate[] {
  return [
    mapper.mapCoordinate(0, 0),
    mapper.mapCoordinate(0, columns),
    mapper.mapCoordinate(rows, columns),
    mapper.mapCoordinate(rows, 0),
  ];
}

/**
 * Solves a 3x3 linear system with partial pivoting.
 */
function solve3(matrix: number[][], rhs: number[]): [number, number, number] {
  const m = matrix.map((row, i) => [...row, rhs[i]]);

  for (let col = 0; col < 3; col++) {
    let pivot = col;
    for (let row = col + 1; row < 3; row++) {
      if (Math.abs(m[row][col]) > Math.abs(m[pivot][col])) pivot = row;
    }
    if (Math.abs(m[pivot][col]) < 1e-12) {
      throw new InvalidTransformationError('The control points do not determine a transformation.');
    }
    [m[col], m[pivot]] = [m[pivot], m[col]];

    for (let row = col + 1; row < 3; row++) {
      const factor = m[row][col] / m[col][col];
      for (let k = col; k < 4; k++) {
        m[row][k] -= factor * m[col][k];
      }
    }
  }

  const result: [number, number, number] = [0, 0, 0];
  for (let row = 2; row >= 0; row--) {
    let sum = m[row][3];
    for (let k = row + 1; k < 3; k++) {
      sum -= m[row][k] * result[k];
    }
    result[row] = sum / m[row][row];
  }
  return result;
}

/**
 * Model-space envelope of a raster; empty when the raster is unmapped.
 */
export function getRasterEnvelope(raster: {
  readonly mapper: RasterMapper | null;
  readonly rows: number;
  readonly columns: number;
}): Coordinate[] {
  return raster.mapper ? computeGridEnvelope(raster.mapper, raster.rows, raster.columns) : [];
}
