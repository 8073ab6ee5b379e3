import { DateTime } from 'luxon';
import { AutomationPolicy } from '../config/types';
import { Failure, failure } from '../errors';
import { ConversationMessage } from '../session/types';
import { NormalizedBatch, RawChatMessage } from './types';

/**
 * The operator's own account is the first nick carrying the platform's
 * account prefix (`t-` on taotian). Null when the platform is unknown or no
 * nick matches.
 */
export function extractAccountId(
  platform: string,
  messages: readonly RawChatMessage[],
  policy: AutomationPolicy,
): string | null {
  const prefix = policy.accountNickPrefix[platform];
  if (!prefix) return null;
  const owner = messages.find((m) => m.nick?.startsWith(prefix));
  return owner?.nick ?? null;
}

/** Parse a marketplace timestamp; unreadable values fall back to `now` */
export function parseSentAt(value: string | number | undefined, timezone: string, now: number): number {
  if (typeof value === 'number') return Number.isFinite(value) ? value : now;
  if (!value) return now;

  const sql = DateTime.fromSQL(value, { zone: timezone });
  if (sql.isValid) return sql.toMillis();

  const iso = DateTime.fromISO(value, { zone: timezone });
  if (iso.isValid) return iso.toMillis();

  return now;
}

export function normalizeBatch(
  platform: string,
  raw: readonly RawChatMessage[],
  policy: AutomationPolicy,
  timezone: string,
  now: number,
  /** Used when no nick carries the platform's account prefix, e.g. a customer-only batch */
  fallbackAccountId?: string,
): ({ success: true } & NormalizedBatch) | Failure {
  if (raw.length === 0) return failure('VALIDATION_ERROR', 'messages must not be empty');

  const accountId = extractAccountId(platform, raw, policy) ?? fallbackAccountId;
  if (!accountId) {
    return failure('VALIDATION_ERROR', `No operator account found in messages for platform "${platform}"`);
  }

  const messages = raw.map((m): ConversationMessage => ({
    messageId: m.id,
    content: m.content ?? '',
    source: m.nick === accountId ? 'account' : 'shop',
    sender: m.nick,
    sentAt: parseSentAt(m.time, timezone, now),
  }));

  return { success: true, accountId, messages };
}
