/**
 * @module strategies/time-based
 *
 * Time-boxed batching: download for a while, then pause.
 *
 * A batch ends when it has been running longer than `runMs` or once
 * `batchSize` tiles have been recorded, whichever comes first. The next
 * {@link TimeBasedStrategy.before} call then sleeps `pauseMs` and opens a
 * fresh batch with its clock and counter reset.
 */

import type { PacingStrategy, StrategyContext } from './strategy.js';

export interface TimeBasedOptions {
  /** Batch duration in ms. @defaultValue 300000 */
  runMs?: number;
  /** Pause between batches in ms. @defaultValue 60000 */
  pauseMs?: number;
  /** Tiles per batch. @defaultValue 100 */
  batchSize?: number;
}

export class TimeBasedStrategy implements PacingStrategy {
  readonly type = 'time_based';
  readonly runMs: number;
  readonly pauseMs: number;
  readonly batchSize: number;
  private count = 0;
  private batchStart: number;
  private readonly ctx: StrategyContext;

  constructor(options: TimeBasedOptions, ctx: StrategyContext) {
    this.runMs = options.runMs ?? 5 * 60_000;
    this.pauseMs = options.pauseMs ?? 60_000;
    this.batchSize = options.batchSize ?? 100;
    this.ctx = ctx;
    this.batchStart = ctx.clock.now();
  }

  /** Tiles recorded in the current batch. */
  get batchCount(): number {
    return this.count;
  }

  async before(): Promise<void> {
    const elapsed = this.ctx.clock.now() - this.batchStart;
    const timeUp = elapsed > this.runMs;
    const full = this.count >= this.batchSize;
    if (!timeUp && !full) return;

    this.ctx.logger.info('Batch finished, pausing', {
      reason: timeUp ? 'duration' : 'batch_size',
      tiles: this.count,
      pauseMs: this.pauseMs,
    });
    await this.ctx.clock.sleep(this.pauseMs);
    this.count = 0;
    this.batchStart = this.ctx.clock.now();
  }

  async after(_success: boolean): Promise<void> {
    this.count++;
  }
}
