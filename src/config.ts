/**
 * @module config
 *
 * Run configuration: a JSON document validated with zod.
 *
 * Keys keep the snake_case names of the file format. Durations in the
 * file are in seconds (`retry_delay`, `timeout`, `rotation_interval`);
 * {@link downloaderSettings} converts them to the milliseconds the
 * pipeline works in.
 *
 * ```json
 * {
 *   "global": { "temp_download_dir": "/tmp/tilecrawl", "max_retries": 3 },
 *   "download_strategies": [{ "type": "rate_limit", "requests_per_second": 2 }],
 *   "sources": [{
 *     "name": "osm",
 *     "url_template": "https://tile.example.com/{z}/{x}/{y}.png",
 *     "zoom_levels": [10, 11],
 *     "bounds": { "min_lat": 51.4, "min_lon": -0.3, "max_lat": 51.6, "max_lon": 0.1 }
 *   }],
 *   "output": { "format": "mbtiles", "destinations": [{ "type": "local", "path": "./output" }] }
 * }
 * ```
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { errorMessage } from './logger.js';
import { resolveSinkType } from './sinks/factory.js';
import { MAX_ZOOM } from './tiles.js';
import type { GeoBounds } from './types.js';

const globalSchema = z.object({
  log_level: z.string().default('INFO'),
  temp_download_dir: z.string().min(1).default('/tmp/tilecrawl'),
  cleanup_temp_files: z.boolean().default(true),
  cleanup_after_days: z.number().nonnegative().default(7),
  max_retries: z.number().int().positive().default(3),
  retry_delay: z.number().nonnegative().default(5),
  timeout: z.number().positive().default(30),
  concurrency: z.number().int().positive().default(1),
});

const strategySchema = z.object({
  name: z.string().optional(),
  type: z.string().min(1),
}).passthrough();

const proxyEndpointSchema = z.object({
  address: z.string().min(1),
  port: z.number().int().min(1).max(65_535),
  username: z.string().optional(),
  password: z.string().optional(),
});

const ipPoolSchema = z.object({
  enabled: z.boolean().default(false),
  provider: z.string().default(''),
  credentials: z.object({
    username: z.string().optional(),
    password: z.string().optional(),
  }).default({}),
  rotation_interval: z.number().positive().default(60),
  max_failures: z.number().int().positive().default(3),
  endpoints: z.array(proxyEndpointSchema).default([]),
});

const boundsSchema = z.object({
  min_lat: z.number().min(-90).max(90),
  min_lon: z.number().min(-180).max(180),
  max_lat: z.number().min(-90).max(90),
  max_lon: z.number().min(-180).max(180),
});

const sourceSchema = z.object({
  name: z.string().regex(/^[\w.-]+$/, 'must contain only letters, digits, ".", "_" or "-"'),
  type: z.string().optional(),
  url_template: z.string().min(1),
  headers: z.record(z.string()).default({}),
  zoom_levels: z.array(z.number().int().min(0).max(MAX_ZOOM)).min(1),
  bounds: boundsSchema,
  format: z.string().min(1).default('png'),
});

const destinationSchema = z.object({
  type: z.string().min(1),
  path: z.string().default('./output'),
  endpoint: z.string().optional(),
  access_key: z.string().optional(),
  secret_key: z.string().optional(),
  bucket_name: z.string().optional(),
  secure: z.boolean().default(true),
  region: z.string().default('us-east-1'),
}).superRefine((dest, ctx) => {
  if (resolveSinkType(dest.type) === 's3' && !dest.bucket_name) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['bucket_name'],
      message: `required for "${dest.type}" destinations`,
    });
  }
});

const outputSchema = z.object({
  format: z.enum(['files', 'mbtiles']).default('files'),
  destinations: z.array(destinationSchema).default([]),
});

const mbtilesSchema = z.object({
  name: z.string().optional(),
  description: z.string().optional(),
  attribution: z.string().optional(),
  version: z.string().optional(),
  type: z.enum(['baselayer', 'overlay']).optional(),
  min_zoom: z.number().int().min(0).max(MAX_ZOOM).optional(),
  max_zoom: z.number().int().min(0).max(MAX_ZOOM).optional(),
  bounds: z.string().optional(),
});

/**
 * Schema of the whole configuration file.
 */
export const configSchema = z.object({
  global: globalSchema.default({}),
  download_strategies: z.array(strategySchema).default([]),
  ip_pool: ipPoolSchema.default({}),
  sources: z.array(sourceSchema).default([]),
  output: outputSchema.default({}),
  mbtiles: mbtilesSchema.optional(),
}).superRefine((config, ctx) => {
  const seen = new Set<string>();
  config.sources.forEach((source, i) => {
    if (seen.has(source.name)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['sources', i, 'name'],
        message: `duplicate source name "${source.name}"`,
      });
    }
    seen.add(source.name);
  });
});

/** Validated configuration, defaults applied. */
export type AppConfig = z.output<typeof configSchema>;
export type SourceConfig = AppConfig['sources'][number];
export type DestinationConfig = AppConfig['output']['destinations'][number];
export type IpPoolConfig = AppConfig['ip_pool'];
export type MBTilesConfig = NonNullable<AppConfig['mbtiles']>;

/**
 * Validate an already-parsed configuration object.
 *
 * @throws {ConfigError} Listing every schema violation.
 */
export function parseConfig(raw: unknown): AppConfig {
  const result = configSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(
      'Invalid configuration',
      result.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`),
    );
  }
  return result.data;
}

/**
 * Read and validate a JSON configuration file.
 *
 * @throws {ConfigError} If the file is missing, is not JSON, or fails
 *   validation.
 */
export async function loadConfig(path: string): Promise<AppConfig> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (err) {
    throw new ConfigError(`Cannot read configuration file ${path}`, [errorMessage(err)]);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`Configuration file ${path} is not valid JSON`, [errorMessage(err)]);
  }
  return parseConfig(raw);
}

/**
 * Convert a source's snake_case bounds to {@link GeoBounds}.
 */
export function sourceBounds(source: SourceConfig): GeoBounds {
  return {
    minLat: source.bounds.min_lat,
    minLon: source.bounds.min_lon,
    maxLat: source.bounds.max_lat,
    maxLon: source.bounds.max_lon,
  };
}

/**
 * Downloader settings from the `global` section, in milliseconds.
 */
export function downloaderSettings(config: AppConfig): {
  retries: number;
  retryDelay: number;
  timeout: number;
  concurrency: number;
} {
  return {
    retries: config.global.max_retries,
    retryDelay: config.global.retry_delay * 1000,
    timeout: config.global.timeout * 1000,
    concurrency: config.global.concurrency,
  };
}
