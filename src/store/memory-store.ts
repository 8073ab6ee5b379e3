import { SessionState, TaskStatus, isTerminal } from '../config/types';
import { StoreError } from '../errors';
import {
  AccountRecord,
  AccountRepository,
  ConversationStore,
  MessageRecord,
  MessageRepository,
  NewTask,
  OperationLogEntry,
  OperationLogRepository,
  SessionPatch,
  SessionRecord,
  SessionRepository,
  SessionWriteOutcome,
  ShopRecord,
  ShopRepository,
  TaskRecord,
  TaskRepository,
  TransferRecord,
  TransferRepository,
} from './types';

// Every read hands out a copy so callers never mutate stored state in place.
// Each write runs to completion without awaiting, which makes it atomic
// with respect to other callers on the event loop.

class InMemoryAccounts implements AccountRepository {
  private readonly rows = new Map<string, AccountRecord>();

  constructor(private readonly clock: () => number) {}

  async get(accountId: string): Promise<AccountRecord | null> {
    const row = this.rows.get(accountId);
    return row ? { ...row } : null;
  }

  async ensure(accountId: string, displayName: string, platform: string): Promise<AccountRecord> {
    let row = this.rows.get(accountId);
    if (!row) {
      row = { accountId, displayName, platform, isActive: true, createdAt: this.clock() };
      this.rows.set(accountId, row);
    }
    return { ...row };
  }
}

class InMemoryShops implements ShopRepository {
  private readonly rows = new Map<string, ShopRecord>();
  private readonly byShopId = new Map<string, string>();

  constructor(private readonly clock: () => number) {}

  async get(shopName: string): Promise<ShopRecord | null> {
    const row = this.rows.get(shopName);
    return row ? { ...row } : null;
  }

  async ensure(shopName: string, shopId?: string): Promise<ShopRecord> {
    if (shopId) {
      const owner = this.byShopId.get(shopId);
      if (owner !== undefined && owner !== shopName) {
        throw new StoreError('DUPLICATE_KEY', `Shop id ${shopId} already belongs to shop "${owner}"`);
      }
    }

    let row = this.rows.get(shopName);
    if (!row) {
      row = { shopName, shopId, createdAt: this.clock() };
      this.rows.set(shopName, row);
    } else if (shopId && !row.shopId) {
      row.shopId = shopId;
    }
    if (row.shopId) this.byShopId.set(row.shopId, shopName);
    return { ...row };
  }
}

class InMemorySessions implements SessionRepository {
  private readonly rows = new Map<string, SessionRecord>();

  constructor(private readonly messages: Map<string, MessageRecord>) {}

  async get(sessionId: string): Promise<SessionRecord | null> {
    const row = this.rows.get(sessionId);
    return row ? { ...row } : null;
  }

  async findByPair(accountId: string, shopName: string, states: readonly SessionState[]): Promise<SessionRecord[]> {
    return Array.from(this.rows.values())
      .filter((s) => s.accountId === accountId && s.shopName === shopName && states.includes(s.state))
      .sort((a, b) => b.lastActivity - a.lastActivity)
      .map((s) => ({ ...s }));
  }

  async insertSuperseding(session: SessionRecord, now: number): Promise<string[]> {
    if (this.rows.has(session.sessionId)) {
      throw new StoreError('DUPLICATE_KEY', `Session ${session.sessionId} already exists`);
    }

    const superseded: string[] = [];
    for (const row of this.rows.values()) {
      if (row.accountId === session.accountId && row.shopName === session.shopName && !isTerminal(row.state)) {
        row.state = 'COMPLETED';
        row.lastActivity = now;
        superseded.push(row.sessionId);
      }
    }
    this.rows.set(session.sessionId, { ...session });
    return superseded;
  }

  async update(
    sessionId: string,
    patch: SessionPatch,
    allowedFrom?: readonly SessionState[],
  ): Promise<SessionWriteOutcome> {
    const row = this.rows.get(sessionId);
    if (!row) return { ok: false, reason: 'not_found' };
    if (allowedFrom && !allowedFrom.includes(row.state)) {
      return { ok: false, reason: 'state_conflict', current: { ...row } };
    }

    const before = { ...row };
    applySessionPatch(row, patch);
    return { ok: true, before, after: { ...row } };
  }

  async attachMessage(message: MessageRecord): Promise<SessionWriteOutcome> {
    if (this.messages.has(message.messageId)) return { ok: false, reason: 'duplicate' };

    const row = this.rows.get(message.sessionId);
    if (!row) return { ok: false, reason: 'not_found' };
    if (isTerminal(row.state)) return { ok: false, reason: 'state_conflict', current: { ...row } };

    const before = { ...row };
    this.messages.set(message.messageId, { ...message });
    row.messageCount += 1;
    row.lastActivity = Math.max(row.lastActivity, message.sentAt);
    if (row.state === 'PENDING') row.state = 'ACTIVE';
    return { ok: true, before, after: { ...row } };
  }

  async listNonTerminal(): Promise<SessionRecord[]> {
    return Array.from(this.rows.values())
      .filter((s) => !isTerminal(s.state))
      .map((s) => ({ ...s }));
  }
}

class InMemoryMessages implements MessageRepository {
  constructor(private readonly rows: Map<string, MessageRecord>) {}

  async exists(messageId: string): Promise<boolean> {
    return this.rows.has(messageId);
  }

  async listBySession(sessionId: string): Promise<MessageRecord[]> {
    return Array.from(this.rows.values())
      .filter((m) => m.sessionId === sessionId)
      .map((m) => ({ ...m }));
  }
}

class InMemoryTasks implements TaskRepository {
  private readonly rows = new Map<string, TaskRecord>();
  private readonly byExternalId = new Map<string, string>();
  private seq = 0;

  async create(task: NewTask): Promise<TaskRecord> {
    if (this.byExternalId.has(task.externalTaskId)) {
      throw new StoreError('DUPLICATE_KEY', `Task for external id ${task.externalTaskId} already exists`);
    }
    this.seq += 1;
    const row: TaskRecord = { ...task, taskId: String(this.seq) };
    this.rows.set(row.taskId, row);
    this.byExternalId.set(row.externalTaskId, row.taskId);
    return { ...row };
  }

  async get(taskId: string): Promise<TaskRecord | null> {
    const row = this.rows.get(taskId);
    return row ? { ...row } : null;
  }

  async findByExternalId(externalTaskId: string): Promise<TaskRecord | null> {
    const taskId = this.byExternalId.get(externalTaskId);
    return taskId === undefined ? null : this.get(taskId);
  }

  async findBySession(sessionId: string, externalTaskId?: string): Promise<TaskRecord | null> {
    for (const row of this.rows.values()) {
      if (row.sessionId !== sessionId) continue;
      if (externalTaskId && row.externalTaskId !== externalTaskId) continue;
      return { ...row };
    }
    return null;
  }

  async update(
    taskId: string,
    patch: Partial<Pick<TaskRecord, 'status' | 'finishedAt'>>,
    allowedFrom?: readonly TaskStatus[],
  ): Promise<TaskRecord | null> {
    const row = this.rows.get(taskId);
    if (!row) return null;
    if (allowedFrom && !allowedFrom.includes(row.status)) return null;
    if (patch.status !== undefined) row.status = patch.status;
    if (patch.finishedAt !== undefined) row.finishedAt = patch.finishedAt;
    return { ...row };
  }

  async listPending(limit: number): Promise<TaskRecord[]> {
    return Array.from(this.rows.values())
      .filter((t) => t.status === 'NOT_STARTED')
      .sort((a, b) => b.createdAt - a.createdAt || Number(b.taskId) - Number(a.taskId))
      .slice(0, limit)
      .map((t) => ({ ...t }));
  }
}

class InMemoryTransfers implements TransferRepository {
  private readonly rows = new Map<string, TransferRecord>();

  async append(record: TransferRecord): Promise<void> {
    this.rows.set(record.transferId, { ...record });
  }

  async get(transferId: string): Promise<TransferRecord | null> {
    const row = this.rows.get(transferId);
    return row ? { ...row } : null;
  }

  async listBySession(sessionId: string): Promise<TransferRecord[]> {
    return Array.from(this.rows.values())
      .filter((t) => t.sessionId === sessionId)
      .map((t) => ({ ...t }));
  }

  async accept(transferId: string, acceptedBy: string, at: number): Promise<TransferRecord | null> {
    const row = this.rows.get(transferId);
    if (!row || row.status !== 'PENDING') return null;
    row.status = 'ACCEPTED';
    row.acceptedBy = acceptedBy;
    row.acceptedAt = at;
    return { ...row };
  }
}

class InMemoryOperationLog implements OperationLogRepository {
  private readonly rows: OperationLogEntry[] = [];

  async append(entry: OperationLogEntry): Promise<void> {
    this.rows.push({ ...entry });
  }

  async listBySession(sessionId: string): Promise<OperationLogEntry[]> {
    return this.rows.filter((e) => e.sessionId === sessionId).map((e) => ({ ...e }));
  }
}

function applySessionPatch(row: SessionRecord, patch: SessionPatch): void {
  if (patch.state !== undefined) row.state = patch.state;
  if (patch.createdBy !== undefined) row.createdBy = patch.createdBy;
  if (patch.lastActivity !== undefined) row.lastActivity = patch.lastActivity;
  if (patch.timeoutAt !== undefined) row.timeoutAt = patch.timeoutAt;
  if (patch.transferredAt !== undefined) row.transferredAt = patch.transferredAt;
  if (patch.transferReason !== undefined) row.transferReason = patch.transferReason;
}

/**
 * In-memory conversation store (dev/test fallback).
 */
export class InMemoryConversationStore implements ConversationStore {
  readonly accounts: InMemoryAccounts;
  readonly shops: InMemoryShops;
  readonly sessions: InMemorySessions;
  readonly messages: InMemoryMessages;
  readonly tasks = new InMemoryTasks();
  readonly transfers = new InMemoryTransfers();
  readonly operations = new InMemoryOperationLog();

  constructor(clock: () => number = Date.now) {
    const messageRows = new Map<string, MessageRecord>();
    this.accounts = new InMemoryAccounts(clock);
    this.shops = new InMemoryShops(clock);
    this.sessions = new InMemorySessions(messageRows);
    this.messages = new InMemoryMessages(messageRows);
  }
}
