import { describe, it, expect, vi, afterEach } from 'vitest';
import { RateLimiter } from './rate-limiter.js';
import { FakeClock } from './testing.js';

describe('RateLimiter', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should let the first request through and space the rest', async () => {
    const clock = new FakeClock(1000);
    const limiter = new RateLimiter(100, clock);

    await limiter.acquire();
    await limiter.acquire();
    await limiter.acquire();

    expect(clock.sleeps).toEqual([100, 100]);
    expect(clock.now()).toBe(1200);
  });

  it('should not wait when requests are already spaced out', async () => {
    const clock = new FakeClock(0);
    const limiter = new RateLimiter(100, clock);

    await limiter.acquire();
    await clock.sleep(150);
    await limiter.acquire();

    expect(clock.sleeps).toEqual([150]);
  });

  it('should release concurrent callers in arrival order, one interval apart', async () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date(10_000));
    const limiter = new RateLimiter(100);
    const released: Array<{ caller: number; at: number }> = [];

    const pending = [0, 1, 2].map((caller) =>
      limiter.acquire().then(() => {
        released.push({ caller, at: Date.now() });
      })
    );

    await vi.advanceTimersByTimeAsync(250);
    await Promise.all(pending);

    expect(released).toEqual([
      { caller: 0, at: 10_000 },
      { caller: 1, at: 10_100 },
      { caller: 2, at: 10_200 },
    ]);
  });

  it('should never wait with a zero interval', async () => {
    const clock = new FakeClock(0);
    const limiter = new RateLimiter(0, clock);

    await Promise.all([limiter.acquire(), limiter.acquire(), limiter.acquire()]);

    expect(clock.sleeps).toEqual([]);
  });
});
