/**
 * @module strategies/strategy
 *
 * Pacing strategy contract.
 *
 * A strategy decides *when* the next request may go out. The downloader
 * calls every configured strategy's {@link PacingStrategy.before} hook, in
 * list order, before each attempt and every {@link PacingStrategy.after}
 * hook, in the same order, once the attempt has an outcome. Either hook may
 * suspend the caller.
 *
 * Strategy instances own their counters. The downloader calls them from a
 * single serialization point, so implementations need no locking.
 */

import type { Clock } from '../clock.js';
import type { Logger } from '../logger.js';

/** Tags of the built-in strategies. */
export type StrategyType = 'rate_limit' | 'time_based' | 'exponential_backoff';

export interface PacingStrategy {
  readonly type: StrategyType;
  /** Wait, if needed, before the next request is issued. */
  before(): Promise<void>;
  /** Record the outcome of the request; may wait before returning. */
  after(success: boolean): Promise<void>;
}

/**
 * One entry of the `download_strategies` configuration list.
 *
 * Parameters sit beside `type` using their configuration names
 * (`requests_per_second`, `run_minutes`, ...).
 */
export interface StrategyConfig {
  type: string;
  name?: string;
  [param: string]: unknown;
}

/**
 * Collaborators shared by every strategy instance.
 */
export interface StrategyContext {
  clock: Clock;
  logger: Logger;
}
