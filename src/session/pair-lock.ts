/**
 * Per-(account, shop) serialization.
 *
 * Every read-then-write on a pair's live session (create, admission gate,
 * continuity decision) runs inside `run()` for that pair, so two callers
 * can never both observe "no live session" and each insert one.
 */

import Redis from 'ioredis';
import { v4 as uuidv4 } from 'uuid';
import { env } from '../config/env';
import { logger } from '../observability/logger';

export interface PairLock {
  run<T>(accountId: string, shopName: string, fn: () => Promise<T>): Promise<T>;
}

export class PairLockTimeoutError extends Error {
  constructor(readonly key: string) {
    super(`Timed out waiting for pair lock ${key}`);
    this.name = 'PairLockTimeoutError';
  }
}

function pairKey(accountId: string, shopName: string): string {
  return `${encodeURIComponent(accountId)}:${encodeURIComponent(shopName)}`;
}

// ───── In-Memory Implementation ─────────────────────────────────

/** Promise chain per key; valid within one process only. */
export class InMemoryPairLock implements PairLock {
  private readonly tails = new Map<string, Promise<void>>();

  async run<T>(accountId: string, shopName: string, fn: () => Promise<T>): Promise<T> {
    const key = pairKey(accountId, shopName);
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

  /** Number of pairs with a holder or waiters */
  size(): number {
    return this.tails.size;
  }
}

// ───── Redis Implementation ─────────────────────────────────────

const RELEASE_SCRIPT = `
if redis.call('GET', KEYS[1]) == ARGV[1] then
  return redis.call('DEL', KEYS[1])
end
return 0
`;

/**
 * SET NX PX lease shared by every process on the same Redis. The lease
 * expires after `ttlMs` so a crashed holder cannot block the pair forever.
 */
export class RedisPairLock implements PairLock {
  private readonly log = logger.child({ component: 'pair-lock' });

  constructor(
    private readonly redis: Redis,
    private readonly keyPrefix: string,
    private readonly ttlMs: number,
    private readonly pollMs = 25,
  ) {}

  async run<T>(accountId: string, shopName: string, fn: () => Promise<T>): Promise<T> {
    const key = `${this.keyPrefix}lock:${pairKey(accountId, shopName)}`;
    const token = uuidv4();
    await this.acquire(key, token);
    try {
      return await fn();
    } finally {
      const released = await this.redis.eval(RELEASE_SCRIPT, 1, key, token);
      if (released !== 1) {
        this.log.warn({ key }, 'Pair lock lease expired before release');
      }
    }
  }

  private async acquire(key: string, token: string): Promise<void> {
    const deadline = Date.now() + this.ttlMs;
    while (Date.now() < deadline) {
      const ok = await this.redis.set(key, token, 'PX', this.ttlMs, 'NX');
      if (ok === 'OK') return;
      await new Promise((resolve) => setTimeout(resolve, this.pollMs));
    }
    throw new PairLockTimeoutError(key);
  }
}

// ───── Factory ──────────────────────────────────────────────────

export function createPairLock(redis?: Redis): PairLock {
  if (redis) {
    logger.info({ ttlMs: env.session.pairLockTtlMs }, 'Pair lock: Redis lease');
    return new RedisPairLock(redis, env.redis.keyPrefix, env.session.pairLockTtlMs);
  }
  logger.info('Pair lock: In-process');
  return new InMemoryPairLock();
}
