import { describe, it, expect } from 'vitest';
import { silentLogger } from '../../src/logger.js';
import { ExponentialBackoffStrategy } from '../../src/strategies/backoff.js';
import { FakeClock } from '../helpers/fake-clock.js';

describe('ExponentialBackoffStrategy', () => {
  it('should sleep base * factor^k after k consecutive failures', async () => {
    const clock = new FakeClock();
    const strategy = new ExponentialBackoffStrategy(
      { baseDelay: 1_000, maxDelay: 60_000, factor: 2 },
      { clock, logger: silentLogger },
    );

    await strategy.after(false);
    await strategy.after(false);
    await strategy.after(false);

    expect(clock.sleeps).toEqual([2_000, 4_000, 8_000]);
    expect(strategy.currentDelay).toBe(8_000);
  });

  it('should cap the delay at maxDelay', async () => {
    const clock = new FakeClock();
    const strategy = new ExponentialBackoffStrategy(
      { baseDelay: 1_000, maxDelay: 5_000, factor: 3 },
      { clock, logger: silentLogger },
    );

    for (let i = 0; i < 4; i++) await strategy.after(false);

    expect(clock.sleeps).toEqual([3_000, 5_000, 5_000, 5_000]);
  });

  it('should reset to the base delay on success without sleeping', async () => {
    const clock = new FakeClock();
    const strategy = new ExponentialBackoffStrategy({ baseDelay: 500 }, { clock, logger: silentLogger });

    await strategy.after(false);
    await strategy.after(true);
    await strategy.after(false);

    expect(clock.sleeps).toEqual([1_000, 1_000]);
    expect(strategy.currentDelay).toBe(1_000);
  });

  it('should never wait before a request', async () => {
    const clock = new FakeClock();
    const strategy = new ExponentialBackoffStrategy({}, { clock, logger: silentLogger });

    await strategy.after(false);
    await strategy.before();

    expect(clock.sleeps).toEqual([2_000]);
  });
});
