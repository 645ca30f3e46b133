import { describe, it, expect } from 'vitest';
import { InvalidDimensionError, InvalidTransformationError } from '../src/lib/core/errors';
import {
  AffineRasterMapper,
  computeGridEnvelope,
  createRasterCoordinate,
  getRasterEnvelope,
} from '../src/lib/mapping/AffineRasterMapper';
import { GeographicRasterMapper } from '../src/lib/mapping/GeographicRasterMapper';
import { extractHorizontalCrs, getVerticalUnitFactor } from '../src/lib/mapping/crs';

describe('AffineRasterMapper', () => {
  it('should map cells through translation and scale', () => {
    const mapper = AffineRasterMapper.fromTransformation([100, 200], [10, -10]);
    expect(mapper.mapCoordinate(0, 0)).toEqual([100, 200]);
    expect(mapper.mapCoordinate(2, 3)).toEqual([130, 180]);
    expect(mapper.isAxisAligned).toBe(true);
    expect(mapper.columnSize).toBe(10);
    expect(mapper.rowSize).toBe(10);
  });

  it('should carry a constant elevation', () => {
    const mapper = AffineRasterMapper.fromTransformation([0, 0, 50], [1, 1]);
    expect(mapper.mapCoordinate(1, 1)).toEqual([1, 1, 50]);
  });

  it('should invert the mapping', () => {
    const mapper = new AffineRasterMapper({ a: 2, b: 1, c: 5, d: -1, e: 3, f: 7 });
    const [x, y] = mapper.mapCoordinate(4, 6);
    const [row, column] = mapper.mapRaster([x, y]);
    expect(row).toBeCloseTo(4);
    expect(column).toBeCloseTo(6);
    expect(mapper.isAxisAligned).toBe(false);
  });

  it('should shift half a cell between map modes', () => {
    const mapper = AffineRasterMapper.fromTransformation([0, 0], [10, 10], 'valueIsArea');
    expect(mapper.mapCoordinate(0, 0, 'valueIsCoordinate')).toEqual([5, 5]);
    expect(mapper.mapRaster([5, 5], 'valueIsCoordinate')).toEqual([0, 0]);

    const corner = AffineRasterMapper.fromTransformation([0, 0], [10, 10], 'valueIsCoordinate');
    expect(corner.mapCoordinate(1, 1, 'valueIsArea')).toEqual([5, 5]);
  });

  it('should reject invalid transformations', () => {
    expect(() => AffineRasterMapper.fromTransformation([0, 0], [0, 1])).toThrow(InvalidTransformationError);
    expect(() => new AffineRasterMapper({ a: 1, b: 2, c: 0, d: 2, e: 4, f: 0 })).toThrow(
      InvalidTransformationError
    );
    expect(() => new AffineRasterMapper({ a: Number.NaN, b: 0, c: 0, d: 0, e: 1, f: 0 })).toThrow(
      InvalidTransformationError
    );
  });

  it('should fit control points', () => {
    const mapper = AffineRasterMapper.fromCoordinates([
      { rowIndex: 0, columnIndex: 0, coordinate: [100, 200] },
      { rowIndex: 0, columnIndex: 10, coordinate: [200, 200] },
      { rowIndex: 10, columnIndex: 0, coordinate: [100, 100] },
      { rowIndex: 10, columnIndex: 10, coordinate: [200, 100] },
    ]);
    const [x, y] = mapper.mapCoordinate(5, 5);
    expect(x).toBeCloseTo(150);
    expect(y).toBeCloseTo(150);
    expect(mapper.transform.a).toBeCloseTo(10);
    expect(mapper.transform.e).toBeCloseTo(-10);
  });

  it('should need two distinct rows and columns', () => {
    expect(() =>
      AffineRasterMapper.fromCoordinates([
        { rowIndex: 0, columnIndex: 0, coordinate: [0, 0] },
        { rowIndex: 5, columnIndex: 0, coordinate: [0, 5] },
      ])
    ).toThrow(InvalidTransformationError);
    expect(() =>
      AffineRasterMapper.fromCoordinates([
        { rowIndex: 0, columnIndex: 0, coordinate: [0, 0] },
        { rowIndex: 0, columnIndex: 5, coordinate: [5, 0] },
      ])
    ).toThrow(InvalidTransformationError);
  });

  it('should compare transformations', () => {
    const a = AffineRasterMapper.fromTransformation([1, 2], [3, 4]);
    expect(a.equals(AffineRasterMapper.fromTransformation([1, 2], [3, 4]))).toBe(true);
    expect(a.equals(AffineRasterMapper.fromTransformation([1, 2], [3, 4], 'valueIsCoordinate'))).toBe(false);
  });
});

describe('createRasterCoordinate', () => {
  const mapper = AffineRasterMapper.fromTransformation([0, 0], [2, 2]);

  it('should pair a cell with its coordinate', () => {
    expect(createRasterCoordinate(mapper, 1, 3)).toEqual({ rowIndex: 1, columnIndex: 3, coordinate: [6, 2] });
  });

  it('should reject negative indices', () => {
    expect(() => createRasterCoordinate(mapper, -1, 0)).toThrow(InvalidDimensionError);
    expect(() => createRasterCoordinate(mapper, 0, 1.5)).toThrow(InvalidDimensionError);
  });
});

describe('envelopes', () => {
  it('should map the four grid corners in ring order', () => {
    const mapper = AffineRasterMapper.fromTransformation([0, 0], [1, 1]);
    expect(computeGridEnvelope(mapper, 2, 3)).toEqual([
      [0, 0],
      [3, 0],
      [3, 2],
      [0, 2],
    ]);
  });

  it('should be empty for an unmapped raster', () => {
    expect(getRasterEnvelope({ mapper: null, rows: 2, columns: 2 })).toEqual([]);
  });
});

describe('crs helpers', () => {
  it('should extract the horizontal part of a compound definition', () => {
    const wkt = 'COMPD_CS["x",PROJCS["utm",GEOGCS["wgs",DATUM["d"]]],VERT_CS["h"]]';
    expect(extractHorizontalCrs(wkt)).toBe('PROJCS["utm",GEOGCS["wgs",DATUM["d"]]]');
    expect(extractHorizontalCrs('EPSG:3857')).toBe('EPSG:3857');
  });

  it('should detect vertical units', () => {
    expect(getVerticalUnitFactor('VERT_CS["h",UNIT["US survey foot",0.3048006096012192]]')).toBe(0.3048006096012192);
    expect(getVerticalUnitFactor('VERT_CS["h",UNIT["foot",0.3048]]')).toBe(0.3048);
    expect(getVerticalUnitFactor('VERT_CS["h",UNIT["metre",1]]')).toBe(1);
  });
});

describe('GeographicRasterMapper', () => {
  const source = AffineRasterMapper.fromTransformation([0, 0], [20037508.342789244, 1]);
  const mapper = new GeographicRasterMapper(source, 'EPSG:3857');

  it('should project to longitude and latitude', () => {
    const [lng, lat] = mapper.mapCoordinate(0, 0);
    expect(lng).toBeCloseTo(0);
    expect(lat).toBeCloseTo(0);

    const [east] = mapper.mapCoordinate(0, 1);
    expect(east).toBeCloseTo(180);
  });

  it('should map back to the grid', () => {
    const [row, column] = mapper.mapRaster([90, 0]);
    expect(row).toBeCloseTo(0);
    expect(column).toBeCloseTo(0.5);
  });

  it('should keep the map mode of the source', () => {
    expect(mapper.mode).toBe('valueIsArea');
  });

  it('should reject unknown coordinate systems', () => {
    expect(() => new GeographicRasterMapper(source, 'EPSG:999999')).toThrow(InvalidTransformationError);
  });
});
