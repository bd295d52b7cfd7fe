/**
 * @module sinks/sink
 *
 * Destination for finished output.
 *
 * A {@link Sink} stores byte blobs under slash-separated relative keys
 * (`osm.mbtiles`, `osm/12/2047/1362.png`) in a specific backend. The
 * runner copies every artifact to every configured sink without knowing
 * which backend it talks to.
 *
 * Implementations manage their own resources (SDK clients, connections)
 * and release them in {@link Sink.close}.
 *
 * Built-in implementations:
 *
 * - {@link LocalSink} -- a directory on the local filesystem
 * - {@link S3Sink} -- an S3 bucket (AWS, MinIO or any compatible store)
 */
export interface Sink {
  /** Backend tag used in log lines (`local`, `s3`). */
  readonly kind: string;

  /**
   * Store `data` under `path`, replacing any existing object.
   *
   * @throws {SinkError} If the backend rejects the write.
   */
  save(data: Uint8Array, path: string): Promise<void>;

  /** Whether an object exists under `path`. */
  exists(path: string): Promise<boolean>;

  /**
   * Keys of every stored object below `prefix`, sorted.
   */
  list(prefix?: string): Promise<string[]>;

  /**
   * Release backend resources. Safe to call more than once.
   */
  close(): Promise<void>;
}

/**
 * Strip leading slashes and normalize separators of a sink key.
 */
export function normalizeKey(path: string): string {
  return path.replace(/\\/g, '/').replace(/^\/+/, '');
}
