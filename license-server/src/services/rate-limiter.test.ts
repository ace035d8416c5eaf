import { describe, expect, it } from 'vitest';
import { ManualClock } from '../__tests__/helpers';
import { MemoryRateLimitStore, type RateLimitStore, RateLimiter, sanitizeIdentifier } from './rate-limiter';

function setup(blockSeconds = 900) {
  const clock = new ManualClock();
  const store = new MemoryRateLimitStore(clock.now);
  const limiter = new RateLimiter(store, { blockSeconds }, clock.now);
  return { clock, store, limiter };
}

async function hit(limiter: RateLimiter, times: number, id = '203.0.113.5', limit = 5, window = 60) {
  const results: boolean[] = [];
  for (let i = 0; i < times; i++) {
    results.push(await limiter.allow(id, limit, window));
  }
  return results;
}

class BrokenStore implements RateLimitStore {
  async get(): Promise<string | null> {
    throw new Error('cache down');
  }
  async set(): Promise<void> {
    throw new Error('cache down');
  }
  async increment(): Promise<number> {
    throw new Error('cache down');
  }
  async expire(): Promise<void> {
    throw new Error('cache down');
  }
  async delete(): Promise<void> {
    throw new Error('cache down');
  }
}

describe('RateLimiter', () => {
  it('denies the sixth request inside the window and blocks the identifier', async () => {
    const { limiter } = setup();

    expect(await hit(limiter, 6)).toEqual([true, true, true, true, true, false]);
    expect(await limiter.isBlocked('203.0.113.5')).toBe(true);
  });

  it('keeps the block after the window clears', async () => {
    const { clock, limiter } = setup();
    await hit(limiter, 6);

    clock.advanceSeconds(61);
    expect(await limiter.isBlocked('203.0.113.5')).toBe(true);
    expect(await limiter.allow('203.0.113.5', 5, 60)).toBe(false);

    clock.advanceSeconds(900 - 61);
    expect(await limiter.isBlocked('203.0.113.5')).toBe(false);
    expect(await limiter.allow('203.0.113.5', 5, 60)).toBe(true);
  });

  it('slides the window instead of resetting it in buckets', async () => {
    const { clock, limiter } = setup();

    expect(await limiter.allow('client', 2, 60)).toBe(true);
    clock.advanceSeconds(30);
    expect(await limiter.allow('client', 2, 60)).toBe(true);
    clock.advanceSeconds(31);
    // The first request has left the trailing window, the second has not.
    expect(await limiter.allow('client', 2, 60)).toBe(true);
    expect(await limiter.allow('client', 2, 60)).toBe(false);
  });

  it('counts identifiers independently', async () => {
    const { limiter } = setup();
    await hit(limiter, 6, 'a');

    expect(await limiter.allow('b', 5, 60)).toBe(true);
  });

  it('keeps identifiers apart that differ only in unsafe characters or past 64 characters', async () => {
    const { limiter, clock } = setup();
    const long = 'x'.repeat(64);
    await hit(limiter, 6, 'a b');
    await hit(limiter, 6, `${long}1`);

    expect(await limiter.allow('a_b', 5, 60)).toBe(true);
    expect(await limiter.allow(`${long}2`, 5, 60)).toBe(true);

    clock.advanceSeconds(61);
    expect(await limiter.isBlocked('a b')).toBe(true);
    expect(await limiter.allow('a b', 5, 60)).toBe(false);
  });

  it('supports explicit block and unblock', async () => {
    const { clock, limiter } = setup();

    await limiter.block('bad-actor', 30);
    expect(await limiter.allow('bad-actor', 100, 60)).toBe(false);

    await limiter.unblock('bad-actor');
    expect(await limiter.allow('bad-actor', 100, 60)).toBe(true);

    await limiter.block('bad-actor', 30);
    clock.advanceSeconds(30);
    expect(await limiter.isBlocked('bad-actor')).toBe(false);
  });

  it('reports stats and clears them on reset', async () => {
    const { limiter } = setup();
    await hit(limiter, 7, 'client', 5, 60);

    expect(await limiter.stats('client', 60)).toEqual({
      identifier: 'client',
      currentRequests: 5,
      windowSeconds: 60,
      isBlocked: true,
      deniedRequests: 2,
    });

    await limiter.reset('client');
    expect(await limiter.stats('client', 60)).toEqual({
      identifier: 'client',
      currentRequests: 0,
      windowSeconds: 60,
      isBlocked: false,
      deniedRequests: 0,
    });
  });

  it('discards a malformed window instead of failing', async () => {
    const { store, limiter } = setup();
    await store.set('rl:client', '{"not":"a list"}', 60);

    expect(await limiter.allow('client', 1, 60)).toBe(true);
    expect(await store.get('rl:client')).toMatch(/^\[\d+\]$/);
  });

  it('fails open when the store is unavailable', async () => {
    const clock = new ManualClock();
    const limiter = new RateLimiter(new BrokenStore(), { blockSeconds: 900 }, clock.now);

    expect(await hit(limiter, 10)).toEqual(Array(10).fill(true));
    expect(await limiter.isBlocked('203.0.113.5')).toBe(false);
  });
});

describe('MemoryRateLimitStore', () => {
  it('expires values after their TTL', async () => {
    const clock = new ManualClock();
    const store = new MemoryRateLimitStore(clock.now);

    await store.set('k', 'v', 10);
    clock.advanceSeconds(9);
    expect(await store.get('k')).toBe('v');
    clock.advanceSeconds(1);
    expect(await store.get('k')).toBeNull();
  });

  it('increments from zero and keeps the TTL set by expire', async () => {
    const clock = new ManualClock();
    const store = new MemoryRateLimitStore(clock.now);

    expect(await store.increment('n')).toBe(1);
    expect(await store.increment('n')).toBe(2);
    await store.expire('n', 5);
    clock.advanceSeconds(5);
    expect(await store.get('n')).toBeNull();
  });

  it('sweeps expired entries', async () => {
    const clock = new ManualClock();
    const store = new MemoryRateLimitStore(clock.now);

    await store.set('a', '1', 1);
    await store.set('b', '1', 100);
    clock.advanceSeconds(2);

    expect(store.sweep()).toBe(1);
    expect(store.size).toBe(1);
  });
});

describe('sanitizeIdentifier', () => {
  it('keeps addresses and action prefixes intact', () => {
    expect(sanitizeIdentifier('activate:203.0.113.5')).toBe('activate:203.0.113.5');
    expect(sanitizeIdentifier('validate:::ffff:127.0.0.1')).toBe('validate:::ffff:127.0.0.1');
  });

  it('hashes identifiers that are too long or carry other characters', () => {
    expect(sanitizeIdentifier('a b')).toMatch(/^#[0-9a-f]{64}$/);
    expect(sanitizeIdentifier('a b')).not.toBe(sanitizeIdentifier('a_b'));
    expect(sanitizeIdentifier('update_check:203.0.113.5')).toBe('update_check:203.0.113.5');
    expect(sanitizeIdentifier('x'.repeat(64))).toBe('x'.repeat(64));
    expect(sanitizeIdentifier(`${'x'.repeat(64)}1`)).not.toBe(sanitizeIdentifier(`${'x'.repeat(64)}2`));
    expect(sanitizeIdentifier('')).toMatch(/^#[0-9a-f]{64}$/);
  });
});
