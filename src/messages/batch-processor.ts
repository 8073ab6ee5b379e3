import { AutomationPolicy } from '../config/types';
import { errorMessage } from '../errors';
import { logger } from '../observability/logger';
import { interventionsDetected, messagesIngested } from '../observability/metrics';
import { HumanNotification, Notifier } from '../notify/notifier';
import { ContinuityDecider } from '../session/continuity';
import { HumanAuthorshipPredicate, detectIntervention } from '../session/intervention-detector';
import { PairLock } from '../session/pair-lock';
import { SessionLifecycle } from '../session/session-lifecycle';
import { ConversationMessage } from '../session/types';
import { ConversationStore, SessionRecord } from '../store/types';
import { BatchInput, BatchResult } from './types';

export interface BatchProcessorDeps {
  store: ConversationStore;
  lifecycle: SessionLifecycle;
  continuity: ContinuityDecider;
  pairLock: PairLock;
  predicate: HumanAuthorshipPredicate;
  notifier: Notifier;
  policy: AutomationPolicy;
}

/**
 * Ingests one scraped batch of chat lines for an (account, shop) pair.
 *
 * The batch is the unit of failure: any error is recorded in `errors` and
 * the counters reached so far are returned.
 */
export class BatchProcessor {
  private readonly log = logger.child({ component: 'batch-processor' });

  constructor(private readonly deps: BatchProcessorDeps) {}

  async process(input: BatchInput & { platform: string }): Promise<BatchResult> {
    const result: BatchResult = {
      processedMessages: 0,
      skippedMessages: 0,
      activeSessionId: null,
      sessionOperations: [],
      errors: [],
    };
    const log = this.log.child({ accountId: input.accountId, shopName: input.shopName });
    const { store, lifecycle, continuity, pairLock, notifier } = this.deps;

    try {
      await store.accounts.ensure(input.accountId, input.accountId, input.platform);
      await store.shops.ensure(input.shopName);

      const pending = await pairLock.run(input.accountId, input.shopName, async () => {
        // Dedup under the lock so a concurrent redelivery sees the first copy's writes
        const fresh = await this.dropDuplicates(input.messages, result);
        if (fresh.length === 0) {
          const live = await lifecycle.findLiveSession(input.accountId, input.shopName);
          result.activeSessionId = live?.sessionId ?? null;
          log.info({ skipped: result.skippedMessages }, 'Batch contained only known messages');
          return null;
        }

        const decision = await continuity.decide(input.accountId, input.shopName, input.maxInactiveMinutes);
        if (decision.action === 'create' && decision.timedOutSessionId) {
          result.sessionOperations.push('timeout_previous_session');
        }

        if (decision.action === 'create') {
          const session = await lifecycle.create({
            accountId: input.accountId,
            shopName: input.shopName,
            taskType: 'MANUAL_URGENT',
            initialState: 'TRANSFERRED',
            createdBy: 'human',
            priority: this.deps.policy.taskPriority.MANUAL_URGENT,
            inactiveWindowMinutes: input.maxInactiveMinutes,
          });
          result.activeSessionId = session.sessionId;
          result.sessionOperations.push('created_session');
          const attached = await this.attachAll(session.sessionId, fresh, result);
          return attached.length > 0 ? this.notification(session, 'new_conversation', attached) : null;
        }

        const session = decision.session;
        result.activeSessionId = session.sessionId;
        const attached = await this.attachAll(session.sessionId, fresh, result);
        if (attached.length === 0) return null;
        result.sessionOperations.push('joined_session');

        if (session.state === 'TRANSFERRED') {
          return this.notification(session, 'human_session_message', attached);
        }

        const signal = detectIntervention(attached, input.accountId, this.deps.predicate);
        if (!signal) return null;

        const switched = await lifecycle.switchControl(session.sessionId, 'human', 'human_intervention', {
          operatorId: signal.sender,
          urgency: 'HIGH',
          payload: { messageId: signal.messageId },
        });
        if (!switched) return null;

        interventionsDetected.inc();
        result.sessionOperations.push('human_intervention');
        log.info({ sessionId: session.sessionId, messageId: signal.messageId }, 'Human intervention detected');
        return this.notification(session, 'intervention', attached);
      });

      // Notify outside the pair lock; delivery retries must not hold up the pair
      if (pending) {
        await notifier.notifyHuman(pending);
        result.sessionOperations.push('notified_human');
      }
    } catch (err) {
      result.errors.push(errorMessage(err));
      log.error({ err }, 'Message batch failed');
    }

    messagesIngested.inc({ result: 'processed' }, result.processedMessages);
    messagesIngested.inc({ result: 'skipped' }, result.skippedMessages);
    return result;
  }

  private async dropDuplicates(
    messages: readonly ConversationMessage[],
    result: BatchResult,
  ): Promise<ConversationMessage[]> {
    const seen = new Set<string>();
    const fresh: ConversationMessage[] = [];
    for (const message of messages) {
      if (seen.has(message.messageId) || (await this.deps.store.messages.exists(message.messageId))) {
        result.skippedMessages += 1;
        continue;
      }
      seen.add(message.messageId);
      fresh.push(message);
    }
    return fresh;
  }

  private async attachAll(
    sessionId: string,
    messages: readonly ConversationMessage[],
    result: BatchResult,
  ): Promise<ConversationMessage[]> {
    const attached: ConversationMessage[] = [];
    for (const message of messages) {
      if (await this.deps.lifecycle.attachMessage(sessionId, message)) {
        result.processedMessages += 1;
        attached.push(message);
      } else {
        result.skippedMessages += 1;
      }
    }
    return attached;
  }

  private notification(
    session: SessionRecord,
    reason: HumanNotification['reason'],
    messages: ConversationMessage[],
  ): HumanNotification {
    return {
      accountId: session.accountId,
      shopName: session.shopName,
      sessionId: session.sessionId,
      reason,
      messages,
    };
  }
}
