/**
 * @module strategies/factory
 *
 * Build pacing strategies from `download_strategies` configuration entries.
 *
 * Tags are matched case-insensitively with `-` and `_` treated alike, so
 * `rate-limit`, `RATE_LIMIT` and `rate_limit` are the same strategy;
 * `time_boxed` is accepted for `time_based`. An unrecognized tag never
 * aborts the run: it is logged and replaced by a 5 req/s rate limiter.
 */

import { z } from 'zod';
import { systemClock } from '../clock.js';
import { ConfigError } from '../errors.js';
import { silentLogger } from '../logger.js';
import { ExponentialBackoffStrategy } from './backoff.js';
import { RateLimitStrategy } from './rate-limit.js';
import type { PacingStrategy, StrategyConfig, StrategyContext, StrategyType } from './strategy.js';
import { TimeBasedStrategy } from './time-based.js';

/** Requests per second of the limiter substituted for unknown tags. */
export const FALLBACK_REQUESTS_PER_SECOND = 5;

const positive = z.number().positive();

const rateLimitParams = z.object({
  requests_per_second: positive.default(5),
});

const timeBasedParams = z.object({
  run_minutes: positive.default(5),
  pause_minutes: z.number().nonnegative().default(1),
  batch_size: z.number().int().positive().default(100),
});

const backoffParams = z.object({
  base_delay: positive.default(1),
  max_delay: positive.default(60),
  factor: z.number().min(1).default(2),
}).refine(p => p.max_delay >= p.base_delay, {
  message: 'max_delay must not be smaller than base_delay',
});

/**
 * Normalize a configured tag to a built-in {@link StrategyType}, or
 * `null` when it is not recognized.
 */
export function resolveStrategyType(tag: string): StrategyType | null {
  switch (tag.trim().toLowerCase().replace(/-/g, '_')) {
    case 'rate_limit': return 'rate_limit';
    case 'time_based':
    case 'time_boxed': return 'time_based';
    case 'exponential_backoff': return 'exponential_backoff';
    default: return null;
  }
}

/**
 * Create one strategy from its configuration entry.
 *
 * Configuration units are seconds (`base_delay`, `max_delay`) and minutes
 * (`run_minutes`, `pause_minutes`); the instances work in milliseconds.
 *
 * @throws {ConfigError} If a recognized strategy has invalid parameters.
 *
 * @example
 * ```typescript
 * const limiter = createStrategy({ type: 'rate_limit', requests_per_second: 2 });
 * await limiter.before();
 * ```
 */
export function createStrategy(
  config: StrategyConfig,
  ctx: Partial<StrategyContext> = {},
): PacingStrategy {
  const context: StrategyContext = {
    clock: ctx.clock ?? systemClock,
    logger: ctx.logger ?? silentLogger,
  };
  const type = resolveStrategyType(config.type);

  switch (type) {
    case 'rate_limit': {
      const p = parseParams(rateLimitParams, config);
      return new RateLimitStrategy({ requestsPerSecond: p.requests_per_second }, context);
    }
    case 'time_based': {
      const p = parseParams(timeBasedParams, config);
      return new TimeBasedStrategy({
        runMs: p.run_minutes * 60_000,
        pauseMs: p.pause_minutes * 60_000,
        batchSize: p.batch_size,
      }, context);
    }
    case 'exponential_backoff': {
      const p = parseParams(backoffParams, config);
      return new ExponentialBackoffStrategy({
        baseDelay: p.base_delay * 1000,
        maxDelay: p.max_delay * 1000,
        factor: p.factor,
      }, context);
    }
    case null:
      context.logger.warn('Unknown download strategy, using default rate limit', {
        type: config.type,
        requestsPerSecond: FALLBACK_REQUESTS_PER_SECOND,
      });
      return new RateLimitStrategy({ requestsPerSecond: FALLBACK_REQUESTS_PER_SECOND }, context);
  }
}

/**
 * Create every configured strategy, preserving list order.
 */
export function createStrategies(
  configs: readonly StrategyConfig[],
  ctx: Partial<StrategyContext> = {},
): PacingStrategy[] {
  return configs.map(config => createStrategy(config, ctx));
}

function parseParams<T extends z.ZodTypeAny>(schema: T, config: StrategyConfig): z.output<T> {
  const result = schema.safeParse(config);
  if (!result.success) {
    throw new ConfigError(
      `Invalid parameters for strategy "${config.name ?? config.type}"`,
      result.error.issues.map(i => `${i.path.join('.') || 'params'}: ${i.message}`),
    );
  }
  return result.data;
}
