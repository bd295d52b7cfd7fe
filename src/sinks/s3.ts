/**
 * @module sinks/s3
 *
 * Amazon S3 {@link Sink} implementation using AWS SDK v3.
 *
 * Objects are written with `PutObject`; the bucket is checked with
 * `HeadBucket` and created on first use when missing. Compatible with any
 * S3-compatible object store (MinIO, Cloudflare R2, Backblaze B2, etc.)
 * via the `endpoint` and `forcePathStyle` options.
 *
 * The SDK sits behind the narrow {@link S3Transport} interface so that
 * tests can substitute an in-memory store.
 */

import {
  CreateBucketCommand,
  HeadBucketCommand,
  HeadObjectCommand,
  ListObjectsV2Command,
  PutObjectCommand,
  S3Client,
  S3ServiceException,
  type S3ClientConfig,
} from '@aws-sdk/client-s3';
import { SinkError } from '../errors.js';
import { errorMessage, silentLogger, type Logger } from '../logger.js';
import { normalizeKey, type Sink } from './sink.js';

/**
 * Bucket and object calls the sink needs from an S3 client.
 */
export interface S3Transport {
  bucketExists(bucket: string): Promise<boolean>;
  createBucket(bucket: string): Promise<void>;
  putObject(bucket: string, key: string, body: Uint8Array): Promise<void>;
  objectExists(bucket: string, key: string): Promise<boolean>;
  listKeys(bucket: string, prefix: string): Promise<string[]>;
  destroy(): void;
}

/**
 * S3 client settings.
 */
export interface S3ClientOptions {
  /** AWS region for the S3 client (e.g. `"us-east-1"`). */
  region: string;
  /**
   * Explicit credentials.
   *
   * When omitted, the SDK falls back to the default credential provider
   * chain (environment variables, shared credentials file, instance
   * metadata, etc.).
   */
  credentials?: {
    accessKeyId: string;
    secretAccessKey: string;
    sessionToken?: string;
  };
  /** Custom endpoint URL for S3-compatible object stores. */
  endpoint?: string;
  /**
   * Force path-style addressing (`endpoint/bucket/key`) instead of the
   * default virtual-hosted style (`bucket.endpoint/key`). MinIO needs it.
   */
  forcePathStyle?: boolean;
}

/**
 * Configuration options for {@link S3Sink}.
 */
export interface S3SinkOptions extends S3ClientOptions {
  bucket: string;
  /** Key prefix prepended to every object, without a trailing slash. */
  prefix?: string;
  /** Defaults to an {@link SdkS3Transport} built from the client options. */
  transport?: S3Transport;
  logger?: Logger;
}

/**
 * {@link S3Transport} backed by `S3Client`.
 */
export class SdkS3Transport implements S3Transport {
  private readonly client: S3Client;

  constructor(options: S3ClientOptions) {
    const config: S3ClientConfig = { region: options.region };
    if (options.credentials) config.credentials = options.credentials;
    if (options.endpoint) config.endpoint = options.endpoint;
    if (options.forcePathStyle) config.forcePathStyle = true;
    this.client = new S3Client(config);
  }

  async bucketExists(bucket: string): Promise<boolean> {
    try {
      await this.client.send(new HeadBucketCommand({ Bucket: bucket }));
      return true;
    } catch (err) {
      if (isNotFound(err)) return false;
      throw err;
    }
  }

  async createBucket(bucket: string): Promise<void> {
    await this.client.send(new CreateBucketCommand({ Bucket: bucket }));
  }

  async putObject(bucket: string, key: string, body: Uint8Array): Promise<void> {
    await this.client.send(new PutObjectCommand({
      Bucket: bucket,
      Key: key,
      Body: body,
      ContentLength: body.byteLength,
    }));
  }

  async objectExists(bucket: string, key: string): Promise<boolean> {
    try {
      await this.client.send(new HeadObjectCommand({ Bucket: bucket, Key: key }));
      return true;
    } catch (err) {
      if (isNotFound(err)) return false;
      throw err;
    }
  }

  async listKeys(bucket: string, prefix: string): Promise<string[]> {
    const keys: string[] = [];
    let token: string | undefined;
    do {
      const page = await this.client.send(new ListObjectsV2Command({
        Bucket: bucket,
        Prefix: prefix || undefined,
        ContinuationToken: token,
      }));
      for (const object of page.Contents ?? []) {
        if (object.Key) keys.push(object.Key);
      }
      token = page.IsTruncated ? page.NextContinuationToken : undefined;
    } while (token);
    return keys;
  }

  destroy(): void {
    this.client.destroy();
  }
}

/**
 * Sink writing objects into one S3 bucket.
 *
 * The bucket check runs once, on the first call that touches the bucket;
 * concurrent first calls share it. A failed check is retried on the next
 * call.
 *
 * @example
 * ```typescript
 * const sink = new S3Sink({
 *   bucket: 'tiles',
 *   region: 'us-east-1',
 *   endpoint: 'http://localhost:9000',
 *   forcePathStyle: true,
 *   credentials: { accessKeyId: 'test-access', secretAccessKey: 'test-secret' },
 * });
 * await sink.save(archiveBytes, 'osm.mbtiles');
 * await sink.close();
 * ```
 */
export class S3Sink implements Sink {
  readonly kind = 's3';
  readonly bucket: string;
  private readonly prefix: string;
  private readonly transport: S3Transport;
  private readonly logger: Logger;
  private ready: Promise<void> | null = null;
  private closed = false;

  constructor(options: S3SinkOptions) {
    this.bucket = options.bucket;
    this.prefix = options.prefix ? normalizeKey(options.prefix).replace(/\/+$/, '') : '';
    this.transport = options.transport ?? new SdkS3Transport(options);
    this.logger = options.logger ?? silentLogger;
  }

  async save(data: Uint8Array, path: string): Promise<void> {
    await this.ensureBucket();
    const key = this.objectKey(path);
    try {
      await this.transport.putObject(this.bucket, key, data);
    } catch (err) {
      throw new SinkError(this.kind, `Cannot upload ${this.bucket}/${key}: ${errorMessage(err)}`, err);
    }
    this.logger.debug('Uploaded object', { bucket: this.bucket, key, bytes: data.byteLength });
  }

  async exists(path: string): Promise<boolean> {
    await this.ensureBucket();
    const key = this.objectKey(path);
    try {
      return await this.transport.objectExists(this.bucket, key);
    } catch (err) {
      throw new SinkError(this.kind, `Cannot stat ${this.bucket}/${key}: ${errorMessage(err)}`, err);
    }
  }

  async list(prefix = ''): Promise<string[]> {
    await this.ensureBucket();
    const full = this.objectKey(prefix);
    let keys: string[];
    try {
      keys = await this.transport.listKeys(this.bucket, full);
    } catch (err) {
      throw new SinkError(this.kind, `Cannot list ${this.bucket}/${full}: ${errorMessage(err)}`, err);
    }
    const strip = this.prefix ? this.prefix.length + 1 : 0;
    return keys.map(key => key.slice(strip)).sort();
  }

  /**
   * Destroy the underlying client and release its connection pool.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.ready = null;
    this.transport.destroy();
  }

  // ─── Internal ──────────────────────────────────────────────────────────

  private objectKey(path: string): string {
    const key = normalizeKey(path);
    return this.prefix ? `${this.prefix}/${key}` : key;
  }

  private ensureBucket(): Promise<void> {
    if (this.closed) {
      return Promise.reject(new SinkError(this.kind, 'Sink is closed'));
    }
    if (!this.ready) {
      this.ready = this.initBucket().catch((err: unknown) => {
        this.ready = null;
        throw new SinkError(this.kind, `Cannot prepare bucket ${this.bucket}: ${errorMessage(err)}`, err);
      });
    }
    return this.ready;
  }

  private async initBucket(): Promise<void> {
    if (await this.transport.bucketExists(this.bucket)) return;
    await this.transport.createBucket(this.bucket);
    this.logger.info('Created bucket', { bucket: this.bucket });
  }
}

function isNotFound(err: unknown): boolean {
  if (err instanceof S3ServiceException) {
    return err.$metadata.httpStatusCode === 404 || err.name === 'NotFound' || err.name === 'NoSuchKey';
  }
  return false;
}
