import { env } from '../config/env';
import { errorMessage } from '../errors';
import { logger } from '../observability/logger';
import { notifications } from '../observability/metrics';
import { ConversationMessage } from '../session/types';

export interface HumanNotification {
  accountId: string;
  shopName: string;
  sessionId: string;
  reason: 'new_conversation' | 'human_session_message' | 'intervention';
  messages: readonly ConversationMessage[];
}

/**
 * Tells a human operator that a conversation needs them. Fire-and-retry:
 * the caller never depends on the outcome.
 */
export interface Notifier {
  notifyHuman(notification: HumanNotification): Promise<void>;
}

export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs: number;
  factor?: number;
  /** Upper bound of the random delay added to each wait */
  jitterMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

const delay = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/** Run `fn` until it resolves, waiting base * factor^n (+ jitter) between attempts */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const { maxAttempts, baseDelayMs, factor = 2, jitterMs = baseDelayMs / 2, sleep = delay } = options;
  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (err) {
      lastError = err;
      if (attempt === maxAttempts) break;
      const wait = baseDelayMs * Math.pow(factor, attempt - 1) + Math.random() * jitterMs;
      logger.debug({ attempt, wait, err: errorMessage(err) }, 'Retrying after failure');
      await sleep(wait);
    }
  }
  throw lastError;
}

// ───── Webhook ──────────────────────────────────────────────────

export class WebhookNotifier implements Notifier {
  private readonly log = logger.child({ component: 'notifier', transport: 'webhook' });

  constructor(
    private readonly url: string,
    private readonly retry: RetryOptions,
  ) {}

  async notifyHuman(notification: HumanNotification): Promise<void> {
    try {
      await withRetry(() => this.post(notification), this.retry);
      notifications.inc({ status: 'sent' });
      this.log.info({ sessionId: notification.sessionId, reason: notification.reason }, 'Human operator notified');
    } catch (err) {
      notifications.inc({ status: 'failed' });
      this.log.error({ err, sessionId: notification.sessionId }, 'Human notification failed after retries');
    }
  }

  private async post(notification: HumanNotification): Promise<void> {
    const res = await fetch(this.url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        account_id: notification.accountId,
        shop_name: notification.shopName,
        session_id: notification.sessionId,
        reason: notification.reason,
        messages: notification.messages.map((m) => ({
          id: m.messageId,
          nick: m.sender,
          content: m.content,
          sent_at: new Date(m.sentAt).toISOString(),
        })),
      }),
    });
    if (!res.ok) {
      throw new Error(`Notification webhook ${res.status}: ${await res.text()}`);
    }
  }
}

// ───── Log-only ─────────────────────────────────────────────────

/** Development fallback; records the notification in the log only */
export class LogNotifier implements Notifier {
  async notifyHuman(notification: HumanNotification): Promise<void> {
    notifications.inc({ status: 'logged' });
    logger.info(
      {
        sessionId: notification.sessionId,
        accountId: notification.accountId,
        shopName: notification.shopName,
        reason: notification.reason,
        messageCount: notification.messages.length,
      },
      '[LOG] Human operator notification',
    );
  }
}

// ───── Factory ──────────────────────────────────────────────────

export function createNotifier(): Notifier {
  if (env.notify.webhookUrl) {
    logger.info('Using webhook notifier');
    return new WebhookNotifier(env.notify.webhookUrl, {
      maxAttempts: env.notify.maxRetries,
      baseDelayMs: env.notify.baseDelayMs,
    });
  }
  logger.info('Using log-only notifier (no NOTIFY_WEBHOOK_URL)');
  return new LogNotifier();
}
