import { describe, it, expect } from 'vitest';
import { RateLimiter } from '../rateLimiter.js';

describe('RateLimiter', () => {
  it('refuses requests past the limit until the window slides', () => {
    let now = 1_000;
    const limiter = new RateLimiter(2, 60_000, () => now);

    expect(limiter.checkLimit('model')).toBe(true);
    now = 2_000;
    expect(limiter.checkLimit('model')).toBe(true);
    expect(limiter.checkLimit('model')).toBe(false);
    expect(limiter.msUntilAvailable('model')).toBe(59_000);

    now = 61_000;
    expect(limiter.msUntilAvailable('model')).toBe(0);
    expect(limiter.checkLimit('model')).toBe(true);
  });

  it('counts keys separately', () => {
    const limiter = new RateLimiter(1, 60_000, () => 0);

    expect(limiter.checkLimit('a')).toBe(true);
    expect(limiter.checkLimit('b')).toBe(true);
    expect(limiter.checkLimit('a')).toBe(false);
  });

  it('frees a key on reset', () => {
    const limiter = new RateLimiter(1, 60_000, () => 0);
    limiter.checkLimit('a');
    limiter.reset('a');

    expect(limiter.checkLimit('a')).toBe(true);
  });

  it('acquire resolves immediately while under the limit', async () => {
    const limiter = new RateLimiter(1, 60_000, () => 0);
    await limiter.acquire('a');

    expect(limiter.checkLimit('a')).toBe(false);
  });
});
