import { describe, it, expect } from 'vitest';
import {
  gridSize,
  iterateTiles,
  tileCount,
  tileRange,
  tileRanges,
  tmsToXyz,
  xyzToTms,
} from '../src/tiles.js';

describe('gridSize', () => {
  it('should double with every zoom level', () => {
    expect(gridSize(0)).toBe(1);
    expect(gridSize(1)).toBe(2);
    expect(gridSize(12)).toBe(4096);
  });

  it('should stay exact at zoom 30', () => {
    expect(gridSize(30)).toBe(1_073_741_824);
  });
});

describe('xyzToTms / tmsToXyz', () => {
  it('should flip rows top-to-bottom', () => {
    expect(xyzToTms(1, 0)).toBe(1);
    expect(xyzToTms(1, 1)).toBe(0);
    expect(xyzToTms(3, 7)).toBe(0);
  });

  it('should be its own inverse', () => {
    for (const [z, y] of [[0, 0], [1, 1], [5, 17], [12, 1362]]) {
      expect(tmsToXyz(z, xyzToTms(z, y))).toBe(y);
    }
  });

  it('should not range-check rows outside the grid', () => {
    expect(xyzToTms(3, 8)).toBe(-1);
  });
});

describe('tileRange', () => {
  it('should cover the north-east quadrant box with a single tile at z1', () => {
    const range = tileRange({ minLat: 0, minLon: 0, maxLat: 1, maxLon: 1 }, 1);
    expect(range).toEqual({ z: 1, minX: 1, maxX: 1, minY: 0, maxY: 0 });
  });

  it('should not depend on corner order', () => {
    const ordered = tileRange({ minLat: 40, minLon: -10, maxLat: 55, maxLon: 20 }, 6);
    const swapped = tileRange({ minLat: 55, minLon: 20, maxLat: 40, maxLon: -10 }, 6);
    const mixed = tileRange({ minLat: 40, minLon: 20, maxLat: 55, maxLon: -10 }, 6);

    expect(swapped).toEqual(ordered);
    expect(mixed).toEqual(ordered);
  });

  it('should cover the whole world with one tile at z0', () => {
    const range = tileRange({ minLat: -85, minLon: -180, maxLat: 85, maxLon: 180 }, 0);
    expect(range).toEqual({ z: 0, minX: 0, maxX: 0, minY: 0, maxY: 0 });
  });

  it('should cover the whole grid for world bounds at z2', () => {
    const range = tileRange({ minLat: -85, minLon: -180, maxLat: 85, maxLon: 180 }, 2);
    expect(range).toEqual({ z: 2, minX: 0, maxX: 3, minY: 0, maxY: 3 });
    expect(tileCount(range)).toBe(16);
  });

  it('should clamp latitudes beyond the Mercator limit', () => {
    const range = tileRange({ minLat: -89.9, minLon: -180, maxLat: 89.9, maxLon: 180 }, 1);
    expect(range).toEqual({ z: 1, minX: 0, maxX: 1, minY: 0, maxY: 1 });
  });

  it('should cover the containing tile for a zero-area box', () => {
    const range = tileRange({ minLat: 10, minLon: 10, maxLat: 10, maxLon: 10 }, 3);
    expect(range).toEqual({ z: 3, minX: 4, maxX: 4, minY: 3, maxY: 3 });
  });

  it('should reject invalid zoom levels', () => {
    const bounds = { minLat: 0, minLon: 0, maxLat: 1, maxLon: 1 };
    expect(() => tileRange(bounds, -1)).toThrow(RangeError);
    expect(() => tileRange(bounds, 1.5)).toThrow(RangeError);
    expect(() => tileRange(bounds, 31)).toThrow('Invalid zoom level 31');
  });

  it('should reject non-finite coordinates', () => {
    expect(() => tileRange({ minLat: Number.NaN, minLon: 0, maxLat: 1, maxLon: 1 }, 2)).toThrow(RangeError);
  });
});

describe('tileRanges', () => {
  it('should keep the configured zoom order', () => {
    const ranges = tileRanges({ minLat: 0, minLon: 0, maxLat: 1, maxLon: 1 }, [3, 1]);
    expect(ranges.map(r => r.z)).toEqual([3, 1]);
  });
});

describe('iterateTiles', () => {
  it('should walk columns ascending, rows ascending within a column', () => {
    const tiles = [...iterateTiles({ z: 2, minX: 1, maxX: 2, minY: 0, maxY: 1 })];
    expect(tiles).toEqual([
      { z: 2, x: 1, y: 0 },
      { z: 2, x: 1, y: 1 },
      { z: 2, x: 2, y: 0 },
      { z: 2, x: 2, y: 1 },
    ]);
  });

  it('should yield exactly tileCount tiles', () => {
    const range = { z: 5, minX: 3, maxX: 7, minY: 10, maxY: 12 };
    expect([...iterateTiles(range)].length).toBe(tileCount(range));
    expect(tileCount(range)).toBe(15);
  });
});
