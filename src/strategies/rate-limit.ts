/**
 * @module strategies/rate-limit
 *
 * Minimum-interval pacing: at most `requestsPerSecond` request starts per
 * second, measured from the previous start.
 */

import type { PacingStrategy, StrategyContext } from './strategy.js';

export interface RateLimitOptions {
  /** @defaultValue 5 */
  requestsPerSecond?: number;
}

export class RateLimitStrategy implements PacingStrategy {
  readonly type = 'rate_limit';
  readonly requestsPerSecond: number;
  /** Minimum gap between two request starts, in ms. */
  readonly minInterval: number;
  private lastRequest = Number.NEGATIVE_INFINITY;
  private readonly ctx: StrategyContext;

  constructor(options: RateLimitOptions, ctx: StrategyContext) {
    this.requestsPerSecond = options.requestsPerSecond ?? 5;
    if (!(this.requestsPerSecond > 0)) {
      throw new RangeError(`requests_per_second must be positive, got ${this.requestsPerSecond}`);
    }
    this.minInterval = 1000 / this.requestsPerSecond;
    this.ctx = ctx;
  }

  /**
   * Sleep for whatever is left of the minimum interval since the last call.
   */
  async before(): Promise<void> {
    const elapsed = this.ctx.clock.now() - this.lastRequest;
    if (elapsed < this.minInterval) {
      const wait = this.minInterval - elapsed;
      this.ctx.logger.debug('Rate limiting', { waitMs: Math.round(wait) });
      await this.ctx.clock.sleep(wait);
    }
    this.lastRequest = this.ctx.clock.now();
  }

  async after(): Promise<void> {}
}
