/**
 * @module geometry/project
 *
 * Web Mercator projection from WGS84 degrees to the normalized unit square.
 *
 * Both axes range from 0 to 1, independent of zoom. Multiplying by `2^z`
 * gives a fractional tile position whose integer part is the tile index.
 *
 * - **X**: 0 = 180° W, 0.5 = prime meridian, 1 = 180° E.
 * - **Y**: 0 = north edge (~85.0511° N), 1 = south edge. This is the XYZ
 *   row direction; TMS rows run the other way.
 */

const PI = Math.PI;

/**
 * Latitude limit of the square Web Mercator world, in degrees.
 */
export const MAX_MERCATOR_LAT = 85.0511287798066;

/**
 * Project a longitude to mercator X in [0, 1].
 *
 * @example
 * ```ts
 * projectX(0);    // => 0.5
 * projectX(-180); // => 0
 * projectX(180);  // => 1
 * ```
 */
export function projectX(lng: number): number {
  const x = lng / 360 + 0.5;
  return x < 0 ? 0 : x > 1 ? 1 : x;
}

/**
 * Project a latitude to mercator Y in [0, 1].
 *
 * `½·ln((1 + sin φ) / (1 − sin φ))` is the same quantity as
 * `asinh(tan φ)`. Results beyond the Mercator limits are clamped, so the
 * poles map to the grid edges instead of infinity.
 *
 * @example
 * ```ts
 * projectY(0);      // => 0.5
 * projectY(85.06);  // => 0
 * projectY(-85.06); // => 1
 * ```
 */
export function projectY(lat: number): number {
  const sin = Math.sin(lat * PI / 180);
  const y = 0.5 - 0.25 * Math.log((1 + sin) / (1 - sin)) / PI;
  return y < 0 ? 0 : y > 1 ? 1 : y;
}
