/**
 * @module sinks/factory
 *
 * Build sinks from `output.destinations` entries.
 *
 * `minio` is an alias of `s3`. An unrecognized type is logged and
 * replaced by a local sink at the entry's `path`.
 */

import type { DestinationConfig } from '../config.js';
import { silentLogger, type Logger } from '../logger.js';
import { LocalSink } from './local.js';
import { S3Sink, type S3Transport } from './s3.js';
import type { Sink } from './sink.js';

export type SinkType = 'local' | 's3';

/**
 * Normalize a destination `type`, or `null` when it is not recognized.
 */
export function resolveSinkType(tag: string): SinkType | null {
  switch (tag.trim().toLowerCase()) {
    case 'local': return 'local';
    case 's3':
    case 'minio': return 's3';
    default: return null;
  }
}

export interface CreateSinkOptions {
  logger?: Logger;
  /** Transport for S3 sinks; defaults to the AWS SDK client. */
  s3Transport?: S3Transport;
}

/**
 * Create the sink described by one destination entry.
 *
 * An `endpoint` without a scheme gets `https://`, or `http://` when
 * `secure` is `false`, and switches the client to path-style addressing.
 */
export function createSink(dest: DestinationConfig, options: CreateSinkOptions = {}): Sink {
  const logger = options.logger ?? silentLogger;

  switch (resolveSinkType(dest.type)) {
    case 'local':
      return new LocalSink({ basePath: dest.path, logger });
    case 's3':
      return new S3Sink({
        bucket: dest.bucket_name ?? '',
        region: dest.region,
        endpoint: dest.endpoint ? endpointUrl(dest.endpoint, dest.secure) : undefined,
        forcePathStyle: dest.endpoint !== undefined,
        credentials: dest.access_key && dest.secret_key
          ? { accessKeyId: dest.access_key, secretAccessKey: dest.secret_key }
          : undefined,
        transport: options.s3Transport,
        logger,
      });
    case null:
      logger.warn('Unknown destination type, using local storage', { type: dest.type, path: dest.path });
      return new LocalSink({ basePath: dest.path, logger });
  }
}

function endpointUrl(endpoint: string, secure: boolean): string {
  if (/^https?:\/\//i.test(endpoint)) return endpoint;
  return `${secure ? 'https' : 'http'}://${endpoint}`;
}
