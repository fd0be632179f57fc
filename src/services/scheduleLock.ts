import { randomUUID } from 'crypto';
import { config } from '../config';
import { ConflictError } from '../utils/errors';

/**
 * Serialises work per key (schedule id). Different keys run in parallel.
 */
export interface ScheduleLock {
  withLock<T>(key: string, fn: () => Promise<T>): Promise<T>;
}

/**
 * Single-process lock: calls for the same key queue behind each other.
 */
export class InProcessScheduleLock implements ScheduleLock {
  private readonly tails = new Map<string, Promise<void>>();

  async withLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await fn();
    } finally {
      release();
      if (this.tails.get(key) === tail) this.tails.delete(key);
    }
  }
}

// Delete the key only if we still own it
const RELEASE_SCRIPT = `
if redis.call("get", KEYS[1]) == ARGV[1] then
  return redis.call("del", KEYS[1])
end
return 0
`;

// Extend the TTL only while we still own the key
const RENEW_SCRIPT = `
if redis.call("get", KEYS[1]) == ARGV[1] then
  return redis.call("pexpire", KEYS[1], ARGV[2])
end
return 0
`;

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/** The two Redis commands the lock needs; an ioredis client satisfies it. */
export interface LockClient {
  set(key: string, value: string, px: 'PX', ttlMs: number, nx: 'NX'): Promise<'OK' | null>;
  eval(script: string, numKeys: number, ...args: string[]): Promise<unknown>;
}

/**
 * Cross-process lock on Redis (SET NX PX with an owner token). The TTL bounds
 * how long a crashed worker can hold a schedule; a live holder renews it every
 * third of the TTL until it releases.
 */
export class RedisScheduleLock implements ScheduleLock {
  constructor(
    private readonly redis: LockClient,
    private readonly ttlMs: number = config.dispatch.lockTtlMs,
    private readonly waitMs: number = config.dispatch.lockTtlMs,
    private readonly pollMs: number = 100
  ) {}

  private async acquire(lockKey: string, token: string): Promise<void> {
    const deadline = Date.now() + this.waitMs;
    for (;;) {
      const ok = await this.redis.set(lockKey, token, 'PX', this.ttlMs, 'NX');
      if (ok === 'OK') return;
      if (Date.now() >= deadline) {
        throw new ConflictError(`Timed out waiting for ${lockKey}`);
      }
      await sleep(this.pollMs);
    }
  }

  async withLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const lockKey = `schedule-lock:${key}`;
    const token = randomUUID();
    await this.acquire(lockKey, token);
    const renewal = setInterval(() => {
      this.redis.eval(RENEW_SCRIPT, 1, lockKey, token, String(this.ttlMs)).then(
        (renewed) => {
          if (renewed !== 1) console.warn(`[Lock] Lost ${lockKey} before release`);
        },
        (err: unknown) => {
          console.error(`[Lock] Failed to renew ${lockKey}:`, err);
        }
      );
    }, Math.max(1, Math.floor(this.ttlMs / 3)));
    try {
      return await fn();
    } finally {
      clearInterval(renewal);
      await this.redis.eval(RELEASE_SCRIPT, 1, lockKey, token);
    }
  }
}
