/**
 * @module strategies/backoff
 *
 * Failure-driven backoff. Each failure multiplies the current delay by
 * `factor` (capped at `maxDelay`) and sleeps it before the next attempt;
 * a success restores `baseDelay`.
 *
 * After `k` consecutive failures the delay is
 * `min(baseDelay * factor^k, maxDelay)`.
 */

import type { PacingStrategy, StrategyContext } from './strategy.js';

export interface BackoffOptions {
  /** @defaultValue 1000 */
  baseDelay?: number;
  /** @defaultValue 60000 */
  maxDelay?: number;
  /** @defaultValue 2 */
  factor?: number;
}

export class ExponentialBackoffStrategy implements PacingStrategy {
  readonly type = 'exponential_backoff';
  readonly baseDelay: number;
  readonly maxDelay: number;
  readonly factor: number;
  private delay: number;
  private readonly ctx: StrategyContext;

  constructor(options: BackoffOptions, ctx: StrategyContext) {
    this.baseDelay = options.baseDelay ?? 1000;
    this.maxDelay = options.maxDelay ?? 60_000;
    this.factor = options.factor ?? 2;
    this.delay = this.baseDelay;
    this.ctx = ctx;
  }

  /** Delay slept after the most recent failure, in ms. */
  get currentDelay(): number {
    return this.delay;
  }

  async before(): Promise<void> {}

  async after(success: boolean): Promise<void> {
    if (success) {
      this.delay = this.baseDelay;
      return;
    }
    this.delay = Math.min(this.delay * this.factor, this.maxDelay);
    this.ctx.logger.warn('Download failed, backing off', { delayMs: this.delay });
    await this.ctx.clock.sleep(this.delay);
  }
}
