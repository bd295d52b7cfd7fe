import type { PacingStrategy, StrategyType } from '../../src/strategies/strategy.js';

/**
 * Strategy that only records its hook calls into a shared log.
 */
export class RecordingStrategy implements PacingStrategy {
  readonly type: StrategyType = 'rate_limit';

  constructor(private readonly label: string, private readonly log: string[]) {}

  async before(): Promise<void> {
    this.log.push(`${this.label}.before`);
  }

  async after(success: boolean): Promise<void> {
    this.log.push(`${this.label}.after(${success})`);
  }
}
