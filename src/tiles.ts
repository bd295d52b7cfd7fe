/**
 * @module tiles
 *
 * Tile coordinate utilities.
 *
 * Converts WGS84 bounding boxes into inclusive tile rectangles on the Web
 * Mercator grid, enumerates those rectangles in a fixed order, and flips
 * rows between the XYZ and TMS conventions.
 *
 * Everything here is pure math: no I/O, no shared state, safe to call
 * from concurrent workers.
 */

import { projectX, projectY } from './geometry/project.js';
import type { GeoBounds, TileIndex, TileRange } from './types.js';

/** Highest zoom level whose grid side (`2^z`) is still an exact integer in a double. */
export const MAX_ZOOM = 30;

// ─── Grid ───────────────────────────────────────────────────────────────────

/**
 * Side length of the tile grid at zoom `z`.
 *
 * Uses `2 ** z` rather than `1 << z` so that zooms up to {@link MAX_ZOOM}
 * stay positive.
 */
export function gridSize(z: number): number {
  return 2 ** z;
}

/**
 * Flip an XYZ row into the TMS row stored in MBTiles archives.
 *
 * `row = (2^z − 1) − y`. The mapping is its own inverse; see
 * {@link tmsToXyz}.
 */
export function xyzToTms(z: number, y: number): number {
  return (gridSize(z) - 1) - y;
}

/**
 * Flip a stored TMS row back to its XYZ row.
 */
export function tmsToXyz(z: number, row: number): number {
  return (gridSize(z) - 1) - row;
}

// ─── Bounds → Tile Range ────────────────────────────────────────────────────

/**
 * Compute the inclusive tile rectangle covering `bounds` at zoom `z`.
 *
 * Both corners are projected to fractional grid positions and each axis
 * is normalized independently, so passing the corners in either diagonal
 * order yields the same rectangle.
 *
 * A far edge that lies exactly on a tile boundary does not pull in the
 * neighbouring tile: `{ minLat: 0, minLon: 0, maxLat: 1, maxLon: 1 }` at
 * zoom 1 is covered by tile `(1, 1, 0)` alone, even though latitude 0 is
 * the top edge of row 1. Indices are clamped to `[0, 2^z − 1]`.
 *
 * @throws {RangeError} If `z` is not an integer in `[0, MAX_ZOOM]` or a
 *   coordinate is not finite.
 *
 * @example
 * ```typescript
 * tileRange({ minLat: 0, minLon: 0, maxLat: 1, maxLon: 1 }, 1);
 * // => { z: 1, minX: 1, maxX: 1, minY: 0, maxY: 0 }
 * ```
 */
export function tileRange(bounds: GeoBounds, z: number): TileRange {
  if (!Number.isInteger(z) || z < 0 || z > MAX_ZOOM) {
    throw new RangeError(`Invalid zoom level ${z}; expected an integer in [0, ${MAX_ZOOM}]`);
  }
  const { minLat, minLon, maxLat, maxLon } = bounds;
  for (const value of [minLat, minLon, maxLat, maxLon]) {
    if (!Number.isFinite(value)) {
      throw new RangeError(`Invalid bounds ${JSON.stringify(bounds)}`);
    }
  }

  const n = gridSize(z);
  const [minX, maxX] = axisSpan(projectX(minLon) * n, projectX(maxLon) * n, n);
  const [minY, maxY] = axisSpan(projectY(minLat) * n, projectY(maxLat) * n, n);

  return { z, minX, maxX, minY, maxY };
}

/**
 * Compute one tile range per zoom level, preserving the given zoom order.
 */
export function tileRanges(bounds: GeoBounds, zooms: readonly number[]): TileRange[] {
  return zooms.map(z => tileRange(bounds, z));
}

/**
 * Number of tiles inside a range.
 */
export function tileCount(range: TileRange): number {
  return (range.maxX - range.minX + 1) * (range.maxY - range.minY + 1);
}

/**
 * Enumerate a range column by column (ascending), rows ascending within
 * each column.
 *
 * The generator is lazy: large ranges are never materialized.
 */
export function* iterateTiles(range: TileRange): Generator<TileIndex> {
  for (let x = range.minX; x <= range.maxX; x++) {
    for (let y = range.minY; y <= range.maxY; y++) {
      yield { z: range.z, x, y };
    }
  }
}

// ─── Internal ───────────────────────────────────────────────────────────────

/**
 * Turn two fractional grid positions into an inclusive index span.
 *
 * The low edge uses `floor`; the high edge uses `ceil − 1` so that a value
 * sitting exactly on a tile boundary belongs only to the tile before it.
 * A zero-width span still covers the tile containing it.
 */
function axisSpan(a: number, b: number, n: number): [number, number] {
  const lo = Math.min(a, b);
  const hi = Math.max(a, b);
  const first = clampIndex(Math.floor(lo), n);
  const last = clampIndex(Math.ceil(hi) - 1, n);
  return [first, Math.max(first, last)];
}

function clampIndex(i: number, n: number): number {
  return i < 0 ? 0 : i > n - 1 ? n - 1 : i;
}
