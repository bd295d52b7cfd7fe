/**
 * @module types
 *
 * Shared type definitions for the tilecrawl pipeline.
 *
 * - **TileIndex**: one tile in the XYZ scheme (row 0 at the north edge)
 * - **GeoBounds**: WGS84 input box, corners in any diagonal order
 * - **TileRange**: inclusive tile rectangle at one zoom level
 * - **TileState / TileEvent**: per-tile download state machine
 * - **RangeResult**: outcome of one range download
 */

// ─── Tile Addressing ────────────────────────────────────────────────────────

/**
 * A single tile in the XYZ (slippy map) convention.
 *
 * `y` grows southward. Archives store the flipped TMS row; see
 * {@link xyzToTms}.
 */
export interface TileIndex {
  readonly z: number;
  readonly x: number;
  readonly y: number;
}

/**
 * Geographic bounding box in WGS84 degrees.
 *
 * The corners are not required to be ordered: the coordinate mapper
 * normalizes each axis after projection.
 */
export interface GeoBounds {
  minLat: number;
  minLon: number;
  maxLat: number;
  maxLon: number;
}

/**
 * Inclusive tile rectangle `[minX, maxX] × [minY, maxY]` at zoom `z`.
 */
export interface TileRange {
  readonly z: number;
  readonly minX: number;
  readonly maxX: number;
  readonly minY: number;
  readonly maxY: number;
}

// ─── Download State Machine ─────────────────────────────────────────────────

/**
 * States a tile moves through inside the download orchestrator.
 *
 * ```
 * pending → attempting → succeeded
 *               ↓  ↑
 *            retrying
 *               ↓
 *           exhausted
 * ```
 */
export type TileState =
  | 'pending'
  | 'attempting'
  | 'retrying'
  | 'succeeded'
  | 'exhausted';

/**
 * A single state transition reported through `onTileEvent`.
 */
export interface TileEvent {
  tile: TileIndex;
  state: TileState;
  /** Zero-based attempt number the transition belongs to. */
  attempt: number;
  /** Failure that caused a `retrying` or `exhausted` transition. */
  error?: Error;
}

/**
 * A tile that exhausted its attempts during a range download.
 */
export interface TileFailure {
  tile: TileIndex;
  attempts: number;
  message: string;
}

/**
 * Counters reported after every finished tile of a range download.
 */
export interface RangeProgress {
  total: number;
  succeeded: number;
  failed: number;
}

/**
 * Outcome of {@link TileDownloader.downloadRange}.
 */
export interface RangeResult {
  /** Staged file paths of every tile that succeeded, in completion order. */
  downloaded: string[];
  /** Tiles that exhausted their retries. */
  failed: TileFailure[];
  /** Number of tiles the requested ranges cover. */
  total: number;
  /** `true` when the run stopped early because its signal aborted. */
  cancelled: boolean;
}
