import { describe, it, expect } from 'vitest';
import { ReconnectPolicy } from './reconnect-policy.js';

describe('ReconnectPolicy', () => {
  it('should start at the initial delay and double up to the cap', () => {
    const policy = new ReconnectPolicy({ initialDelayMs: 5000, maxDelayMs: 30000 });

    const delays = Array.from({ length: 5 }, () => policy.nextDelay());

    expect(delays).toEqual([5000, 10000, 20000, 30000, 30000]);
    expect(policy.getAttempts()).toBe(5);
  });

  it('should go back to the initial delay after reset', () => {
    const policy = new ReconnectPolicy({ initialDelayMs: 1000 });
    policy.nextDelay();
    policy.nextDelay();

    policy.reset();

    expect(policy.getAttempts()).toBe(0);
    expect(policy.nextDelay()).toBe(1000);
  });

  it('should keep a fixed delay with factor 1', () => {
    const policy = new ReconnectPolicy({ initialDelayMs: 5000, factor: 1 });

    expect([policy.nextDelay(), policy.nextDelay(), policy.nextDelay()]).toEqual([
      5000, 5000, 5000,
    ]);
  });
});
