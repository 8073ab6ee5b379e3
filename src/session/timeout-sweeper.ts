import { logger } from '../observability/logger';
import { timeoutSweeps } from '../observability/metrics';
import { SessionRecord } from '../store/types';
import { PairLock } from './pair-lock';
import { SessionLifecycle } from './session-lifecycle';

/**
 * TimeoutSweeper: moves idle non-terminal sessions to TIMEOUT on an interval.
 *
 * Timeouts are otherwise evaluated lazily when a pair is next consulted;
 * the sweeper only makes them land sooner. Uses simple setInterval.
 */
export class TimeoutSweeper {
  private intervalHandle?: NodeJS.Timeout;
  private running = false;
  private log = logger.child({ component: 'timeout-sweeper' });

  constructor(
    private readonly listNonTerminal: () => Promise<SessionRecord[]>,
    private readonly lifecycle: SessionLifecycle,
    private readonly pairLock: PairLock,
    /** Used for sessions that carry no window of their own */
    private readonly defaultInactiveMinutes: number,
    private readonly intervalMs: number = 5 * 60 * 1000,
    private readonly clock: () => number = Date.now,
  ) {}

  start(): void {
    this.log.info({ intervalMinutes: this.intervalMs / 60_000, defaultInactiveMinutes: this.defaultInactiveMinutes }, 'Timeout sweeper started');
    this.intervalHandle = setInterval(() => {
      this.sweep().catch((err) => this.log.error({ err }, 'Scheduled timeout sweep failed'));
    }, this.intervalMs);
    this.intervalHandle.unref();
  }

  stop(): void {
    if (this.intervalHandle) {
      clearInterval(this.intervalHandle);
      this.intervalHandle = undefined;
      this.log.info('Timeout sweeper stopped');
    }
  }

  /** Run one pass; returns the ids that were timed out */
  async sweep(): Promise<string[]> {
    if (this.running) {
      this.log.warn('Sweep already running, skipping');
      return [];
    }

    this.running = true;
    const timedOut: string[] = [];
    try {
      const now = this.clock();
      const cutoffFor = (s: SessionRecord) => now - (s.inactiveWindowMinutes ?? this.defaultInactiveMinutes) * 60 * 1000;
      const candidates = (await this.listNonTerminal()).filter((s) => s.lastActivity < cutoffFor(s));

      for (const candidate of candidates) {
        const done = await this.pairLock.run(candidate.accountId, candidate.shopName, async () => {
          // Re-read under the lock; a batch may have landed since the listing
          const current = await this.lifecycle.get(candidate.sessionId);
          if (!current || current.lastActivity >= cutoffFor(current)) return false;
          return this.lifecycle.markTimedOut(candidate.sessionId, 'sweeper');
        });
        if (done) timedOut.push(candidate.sessionId);
      }

      timeoutSweeps.inc(timedOut.length);
      if (timedOut.length > 0) {
        this.log.info({ count: timedOut.length }, 'Timed out idle sessions');
      }
      return timedOut;
    } finally {
      this.running = false;
    }
  }
}
