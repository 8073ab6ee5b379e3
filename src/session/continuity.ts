import { logger } from '../observability/logger';
import { SessionLifecycle } from './session-lifecycle';
import { ContinuityDecision } from './types';

const MINUTE_MS = 60 * 1000;

/**
 * Decides whether an inbound batch joins the pair's live session or needs
 * a new one. Callers hold the pair lock; a stale live session is moved to
 * TIMEOUT as part of the decision.
 */
export class ContinuityDecider {
  private readonly log = logger.child({ component: 'continuity' });

  constructor(
    private readonly lifecycle: SessionLifecycle,
    private readonly clock: () => number = Date.now,
  ) {}

  async decide(accountId: string, shopName: string, maxInactiveMinutes: number): Promise<ContinuityDecision> {
    if (!shopName) return { action: 'create' };

    const live = await this.lifecycle.findLiveSession(accountId, shopName);
    if (!live) return { action: 'create' };

    const idleMs = this.clock() - live.lastActivity;
    if (idleMs > maxInactiveMinutes * MINUTE_MS) {
      await this.lifecycle.markTimedOut(live.sessionId, 'inactive_before_new_batch');
      this.log.info(
        { sessionId: live.sessionId, idleMinutes: Math.floor(idleMs / MINUTE_MS), maxInactiveMinutes },
        'Live session timed out',
      );
      return { action: 'create', timedOutSessionId: live.sessionId };
    }

    return { action: 'join', session: live };
  }
}
