import { z } from 'zod';
import { type Clock, systemClock } from '../utils/clock';
import { sha256Hex } from '../utils/crypto';
import { createChildLogger } from '../utils/logger';

const log = createChildLogger('rate-limiter');

/**
 * Ephemeral key/value store behind the limiter. Values are strings so an
 * external cache can back it; TTLs are in seconds.
 */
export interface RateLimitStore {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
  /** Adds one and returns the new value; a missing key counts from zero. */
  increment(key: string): Promise<number>;
  expire(key: string, ttlSeconds: number): Promise<void>;
  delete(key: string): Promise<void>;
}

interface Entry {
  value: string;
  expiresAt: number | null;
}

/** Process-local store. Loses everything on restart, which fails open. */
export class MemoryRateLimitStore implements RateLimitStore {
  private readonly entries = new Map<string, Entry>();

  constructor(private readonly clock: Clock = systemClock) {}

  async get(key: string): Promise<string | null> {
    return this.live(key)?.value ?? null;
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    this.entries.set(key, { value, expiresAt: this.now() + ttlSeconds * 1000 });
  }

  async increment(key: string): Promise<number> {
    const entry = this.live(key);
    const next = (entry ? Number(entry.value) || 0 : 0) + 1;
    this.entries.set(key, { value: String(next), expiresAt: entry?.expiresAt ?? null });
    return next;
  }

  async expire(key: string, ttlSeconds: number): Promise<void> {
    const entry = this.live(key);
    if (entry) {
      entry.expiresAt = this.now() + ttlSeconds * 1000;
    }
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }

  /** Drops expired entries; returns how many were removed. */
  sweep(): number {
    let removed = 0;
    for (const key of [...this.entries.keys()]) {
      if (!this.live(key)) removed++;
    }
    return removed;
  }

  get size(): number {
    return this.entries.size;
  }

  private live(key: string): Entry | null {
    const entry = this.entries.get(key);
    if (!entry) return null;
    if (entry.expiresAt !== null && this.now() >= entry.expiresAt) {
      this.entries.delete(key);
      return null;
    }
    return entry;
  }

  private now(): number {
    return this.clock().getTime();
  }
}

export interface RateLimiterOptions {
  /** How long an identifier stays blocked after breaching a limit. */
  blockSeconds: number;
}

export interface RateLimitStats {
  identifier: string;
  currentRequests: number;
  windowSeconds: number;
  isBlocked: boolean;
  deniedRequests: number;
}

const WINDOW_PREFIX = 'rl:';
const BLOCK_PREFIX = 'block:';
const DENIED_PREFIX = 'denied:';

const timestampsSchema = z.array(z.number());

const SAFE_IDENTIFIER = /^[a-zA-Z0-9._:-]{1,64}$/;

/**
 * Identifiers end up in store keys. Short inert ones pass through; anything
 * else becomes `#` plus a SHA-256, which no pass-through key can equal.
 */
export function sanitizeIdentifier(identifier: string): string {
  return SAFE_IDENTIFIER.test(identifier) ? identifier : `#${sha256Hex(identifier)}`;
}

/**
 * Sliding-window limiter with temporary blocking. Endpoint-agnostic: callers
 * choose the (limit, window) pair. Store failures fail open.
 */
export class RateLimiter {
  constructor(
    private readonly store: RateLimitStore,
    private readonly options: RateLimiterOptions,
    private readonly clock: Clock = systemClock
  ) {}

  async allow(identifier: string, limit: number, windowSeconds: number): Promise<boolean> {
    const id = sanitizeIdentifier(identifier);

    try {
      if (await this.isBlockedUnsafe(id)) {
        await this.countDenied(id);
        log.debug({ identifier: id }, 'Request from blocked identifier');
        return false;
      }

      const now = this.clock().getTime();
      const requests = await this.window(id, windowSeconds, now);

      if (requests.length >= limit) {
        await this.countDenied(id);
        await this.setBlock(id, this.options.blockSeconds);
        log.warn({ identifier: id, limit, windowSeconds, count: requests.length }, 'Rate limit exceeded, identifier blocked');
        return false;
      }

      requests.push(now);
      await this.store.set(WINDOW_PREFIX + id, JSON.stringify(requests), windowSeconds);

      if (requests.length >= limit * 0.8) {
        log.debug({ identifier: id, limit, count: requests.length }, 'Approaching rate limit');
      }
      return true;
    } catch (err) {
      log.error({ err, identifier: id }, 'Rate limit store unavailable, allowing request');
      return true;
    }
  }

  async isBlocked(identifier: string): Promise<boolean> {
    const id = sanitizeIdentifier(identifier);
    try {
      return await this.isBlockedUnsafe(id);
    } catch (err) {
      log.error({ err, identifier: id }, 'Rate limit store unavailable, treating identifier as unblocked');
      return false;
    }
  }

  async block(identifier: string, durationSeconds = this.options.blockSeconds): Promise<void> {
    await this.setBlock(sanitizeIdentifier(identifier), durationSeconds);
  }

  async unblock(identifier: string): Promise<void> {
    const id = sanitizeIdentifier(identifier);
    await this.store.delete(BLOCK_PREFIX + id);
    log.info({ identifier: id }, 'Identifier unblocked');
  }

  /** Clears the window, the block and the denial counter. */
  async reset(identifier: string): Promise<void> {
    const id = sanitizeIdentifier(identifier);
    await Promise.all([
      this.store.delete(WINDOW_PREFIX + id),
      this.store.delete(BLOCK_PREFIX + id),
      this.store.delete(DENIED_PREFIX + id),
    ]);
  }

  async stats(identifier: string, windowSeconds: number): Promise<RateLimitStats> {
    const id = sanitizeIdentifier(identifier);
    const now = this.clock().getTime();
    const [requests, isBlocked, denied] = await Promise.all([
      this.window(id, windowSeconds, now),
      this.isBlockedUnsafe(id),
      this.store.get(DENIED_PREFIX + id),
    ]);

    return {
      identifier: id,
      currentRequests: requests.length,
      windowSeconds,
      isBlocked,
      deniedRequests: Number(denied ?? 0),
    };
  }

  private async setBlock(id: string, durationSeconds: number): Promise<void> {
    await this.store.set(BLOCK_PREFIX + id, String(this.clock().getTime()), durationSeconds);
    log.info({ identifier: id, durationSeconds }, 'Identifier blocked');
  }

  private async isBlockedUnsafe(id: string): Promise<boolean> {
    return (await this.store.get(BLOCK_PREFIX + id)) !== null;
  }

  /** Timestamps (ms) inside the trailing window; older entries are pruned. */
  private async window(id: string, windowSeconds: number, now: number): Promise<number[]> {
    const raw = await this.store.get(WINDOW_PREFIX + id);
    if (raw === null) return [];

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      parsed = null;
    }
    const result = timestampsSchema.safeParse(parsed);
    if (!result.success) {
      log.warn({ identifier: id }, 'Discarding malformed rate limit window');
      return [];
    }

    const cutoff = now - windowSeconds * 1000;
    return result.data.filter((ts) => ts > cutoff);
  }

  private async countDenied(id: string): Promise<void> {
    await this.store.increment(DENIED_PREFIX + id);
    await this.store.expire(DENIED_PREFIX + id, this.options.blockSeconds);
  }
}
