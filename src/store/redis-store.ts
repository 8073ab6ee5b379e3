/**
 * Redis-backed conversation store.
 *
 * Records are JSON strings in the wire encoding of ./codec. Steps that
 * touch several keys and must not interleave with another writer
 * (supersede + insert, message attach, conditional state change, task
 * creation) run as Lua scripts so Redis executes each one atomically.
 */

import Redis from 'ioredis';
import { SessionState, TaskStatus } from '../config/types';
import { StoreError } from '../errors';
import { logger } from '../observability/logger';
import {
  SESSION_STATE_CODES,
  TASK_STATUS_CODES,
  decodeMessage,
  decodeSession,
  decodeTask,
  decodeTransfer,
  encodeMessage,
  encodeSession,
  encodeSessionPatch,
  encodeTask,
  encodeTaskPatch,
  encodeTransfer,
} from './codec';
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

const TERMINAL_LUA = "local terminal = { completed = true, cancelled = true, timeout = true }";

/**
 * KEYS: pair set, new session key, new session pair-ref key, open set
 * ARGV: session json, session id, now, session key prefix
 */
const INSERT_SUPERSEDING = `
${TERMINAL_LUA}
if redis.call('EXISTS', KEYS[2]) == 1 then return { 'duplicate' } end
local result = { 'ok' }
for _, id in ipairs(redis.call('SMEMBERS', KEYS[1])) do
  local key = ARGV[4] .. id
  local raw = redis.call('GET', key)
  if raw then
    local s = cjson.decode(raw)
    if not terminal[s.state] then
      s.state = 'completed'
      s.lastActivity = tonumber(ARGV[3])
      redis.call('SET', key, cjson.encode(s))
      table.insert(result, id)
    end
  end
  redis.call('SREM', KEYS[4], id)
end
redis.call('DEL', KEYS[1])
redis.call('SET', KEYS[2], ARGV[1])
redis.call('SET', KEYS[3], KEYS[1])
local created = cjson.decode(ARGV[1])
if not terminal[created.state] then
  redis.call('SADD', KEYS[1], ARGV[2])
  redis.call('SADD', KEYS[4], ARGV[2])
end
return result
`;

/**
 * KEYS: session key, session pair-ref key, open set
 * ARGV: patch json, allowed-from json array ('' = any)
 */
const UPDATE_SESSION = `
${TERMINAL_LUA}
local raw = redis.call('GET', KEYS[1])
if not raw then return { 'not_found' } end
local s = cjson.decode(raw)
if ARGV[2] ~= '' then
  local allowed = false
  for _, state in ipairs(cjson.decode(ARGV[2])) do
    if state == s.state then allowed = true end
  end
  if not allowed then return { 'state_conflict', raw } end
end
for k, v in pairs(cjson.decode(ARGV[1])) do s[k] = v end
local out = cjson.encode(s)
redis.call('SET', KEYS[1], out)
if terminal[s.state] then
  local pairKey = redis.call('GET', KEYS[2])
  if pairKey then redis.call('SREM', pairKey, s.sessionId) end
  redis.call('SREM', KEYS[3], s.sessionId)
end
return { 'ok', raw, out }
`;

/**
 * KEYS: session key, message key, session message list
 * ARGV: message json, sentAt, message id
 */
const ATTACH_MESSAGE = `
${TERMINAL_LUA}
if redis.call('EXISTS', KEYS[2]) == 1 then return { 'duplicate' } end
local raw = redis.call('GET', KEYS[1])
if not raw then return { 'not_found' } end
local s = cjson.decode(raw)
if terminal[s.state] then return { 'state_conflict', raw } end
s.messageCount = s.messageCount + 1
local sentAt = tonumber(ARGV[2])
if sentAt > s.lastActivity then s.lastActivity = sentAt end
if s.state == 'pending' then s.state = 'active' end
local out = cjson.encode(s)
redis.call('SET', KEYS[1], out)
redis.call('SET', KEYS[2], ARGV[1])
redis.call('RPUSH', KEYS[3], ARGV[3])
return { 'ok', raw, out }
`;

/**
 * KEYS: external-id key, sequence key, pending zset
 * ARGV: task json (no id), task key prefix, session task list prefix, createdAt
 */
const CREATE_TASK = `
if redis.call('EXISTS', KEYS[1]) == 1 then return { 'duplicate' } end
local id = tostring(redis.call('INCR', KEYS[2]))
local t = cjson.decode(ARGV[1])
t.taskId = id
redis.call('SET', ARGV[2] .. id, cjson.encode(t))
redis.call('SET', KEYS[1], id)
redis.call('RPUSH', ARGV[3] .. t.sessionId .. ':tasks', id)
redis.call('ZADD', KEYS[3], tonumber(ARGV[4]), id)
return { 'ok', id }
`;

/**
 * KEYS: task key, pending zset
 * ARGV: patch json, allowed-from json array ('' = any), task id
 */
const UPDATE_TASK = `
local raw = redis.call('GET', KEYS[1])
if not raw then return { 'not_found' } end
local t = cjson.decode(raw)
if ARGV[2] ~= '' then
  local allowed = false
  for _, status in ipairs(cjson.decode(ARGV[2])) do
    if status == t.status then allowed = true end
  end
  if not allowed then return { 'state_conflict' } end
end
for k, v in pairs(cjson.decode(ARGV[1])) do t[k] = v end
local out = cjson.encode(t)
redis.call('SET', KEYS[1], out)
if t.status ~= 0 then redis.call('ZREM', KEYS[2], ARGV[3]) end
return { 'ok', out }
`;

function replyStrings(reply: unknown): string[] {
  if (!Array.isArray(reply) || !reply.every((item): item is string => typeof item === 'string')) {
    throw new StoreError('BACKEND_ERROR', 'Unexpected script reply from Redis');
  }
  return reply;
}

function sessionOutcome(reply: unknown): SessionWriteOutcome {
  const [status, before, after] = replyStrings(reply);
  switch (status) {
    case 'ok':
      if (before === undefined || after === undefined) break;
      return { ok: true, before: decodeSession(before), after: decodeSession(after) };
    case 'not_found':
      return { ok: false, reason: 'not_found' };
    case 'duplicate':
      return { ok: false, reason: 'duplicate' };
    case 'state_conflict':
      if (before === undefined) break;
      return { ok: false, reason: 'state_conflict', current: decodeSession(before) };
  }
  throw new StoreError('BACKEND_ERROR', `Unexpected script status "${status}"`);
}

class Keys {
  constructor(private readonly prefix: string) {}

  account(accountId: string): string {
    return `${this.prefix}account:${accountId}`;
  }
  shop(shopName: string): string {
    return `${this.prefix}shop:${shopName}`;
  }
  shopId(shopId: string): string {
    return `${this.prefix}shopid:${shopId}`;
  }
  get sessionPrefix(): string {
    return `${this.prefix}session:`;
  }
  session(sessionId: string): string {
    return `${this.sessionPrefix}${sessionId}`;
  }
  sessionPairRef(sessionId: string): string {
    return `${this.sessionPrefix}${sessionId}:pair`;
  }
  sessionMessages(sessionId: string): string {
    return `${this.sessionPrefix}${sessionId}:messages`;
  }
  sessionTasks(sessionId: string): string {
    return `${this.sessionPrefix}${sessionId}:tasks`;
  }
  sessionTransfers(sessionId: string): string {
    return `${this.sessionPrefix}${sessionId}:transfers`;
  }
  sessionOperations(sessionId: string): string {
    return `${this.sessionPrefix}${sessionId}:ops`;
  }
  /** Non-terminal sessions of one (account, shop) pair */
  pair(accountId: string, shopName: string): string {
    return `${this.prefix}pair:${encodeURIComponent(accountId)}:${encodeURIComponent(shopName)}`;
  }
  get openSessions(): string {
    return `${this.prefix}sessions:open`;
  }
  message(messageId: string): string {
    return `${this.prefix}message:${messageId}`;
  }
  get taskPrefix(): string {
    return `${this.prefix}task:`;
  }
  task(taskId: string): string {
    return `${this.taskPrefix}${taskId}`;
  }
  get taskSequence(): string {
    return `${this.prefix}task-seq`;
  }
  taskExternal(externalTaskId: string): string {
    return `${this.prefix}task-ext:${externalTaskId}`;
  }
  get pendingTasks(): string {
    return `${this.prefix}tasks:pending`;
  }
  transfer(transferId: string): string {
    return `${this.prefix}transfer:${transferId}`;
  }
}

// ───── Accounts / Shops ─────────────────────────────────────────

class RedisAccounts implements AccountRepository {
  constructor(
    private readonly redis: Redis,
    private readonly keys: Keys,
    private readonly clock: () => number,
  ) {}

  async get(accountId: string): Promise<AccountRecord | null> {
    const raw = await this.redis.get(this.keys.account(accountId));
    return raw ? parseAccount(raw) : null;
  }

  async ensure(accountId: string, displayName: string, platform: string): Promise<AccountRecord> {
    const record: AccountRecord = { accountId, displayName, platform, isActive: true, createdAt: this.clock() };
    const created = await this.redis.set(this.keys.account(accountId), JSON.stringify(record), 'NX');
    if (created === 'OK') return record;
    const existing = await this.get(accountId);
    if (!existing) throw new StoreError('BACKEND_ERROR', `Account ${accountId} vanished during ensure`);
    return existing;
  }
}

function parseAccount(raw: string): AccountRecord {
  const data: unknown = JSON.parse(raw);
  if (
    typeof data === 'object' && data !== null
    && 'accountId' in data && typeof data.accountId === 'string'
    && 'displayName' in data && typeof data.displayName === 'string'
    && 'platform' in data && typeof data.platform === 'string'
    && 'isActive' in data && typeof data.isActive === 'boolean'
    && 'createdAt' in data && typeof data.createdAt === 'number'
  ) {
    return {
      accountId: data.accountId,
      displayName: data.displayName,
      platform: data.platform,
      isActive: data.isActive,
      createdAt: data.createdAt,
    };
  }
  throw new StoreError('CORRUPT_RECORD', 'Invalid account record');
}

function parseShop(raw: string): ShopRecord {
  const data: unknown = JSON.parse(raw);
  if (
    typeof data === 'object' && data !== null
    && 'shopName' in data && typeof data.shopName === 'string'
    && 'createdAt' in data && typeof data.createdAt === 'number'
  ) {
    const shopId = 'shopId' in data && typeof data.shopId === 'string' ? data.shopId : undefined;
    return { shopName: data.shopName, shopId, createdAt: data.createdAt };
  }
  throw new StoreError('CORRUPT_RECORD', 'Invalid shop record');
}

class RedisShops implements ShopRepository {
  constructor(
    private readonly redis: Redis,
    private readonly keys: Keys,
    private readonly clock: () => number,
  ) {}

  async get(shopName: string): Promise<ShopRecord | null> {
    const raw = await this.redis.get(this.keys.shop(shopName));
    return raw ? parseShop(raw) : null;
  }

  async ensure(shopName: string, shopId?: string): Promise<ShopRecord> {
    if (shopId) {
      const claimed = await this.redis.set(this.keys.shopId(shopId), shopName, 'NX');
      if (claimed !== 'OK') {
        const owner = await this.redis.get(this.keys.shopId(shopId));
        if (owner !== null && owner !== shopName) {
          throw new StoreError('DUPLICATE_KEY', `Shop id ${shopId} already belongs to shop "${owner}"`);
        }
      }
    }

    const record: ShopRecord = { shopName, shopId, createdAt: this.clock() };
    const created = await this.redis.set(this.keys.shop(shopName), JSON.stringify(record), 'NX');
    if (created === 'OK') return record;

    const existing = await this.get(shopName);
    if (!existing) throw new StoreError('BACKEND_ERROR', `Shop "${shopName}" vanished during ensure`);
    if (shopId && !existing.shopId) {
      const updated: ShopRecord = { ...existing, shopId };
      await this.redis.set(this.keys.shop(shopName), JSON.stringify(updated));
      return updated;
    }
    return existing;
  }
}

// ───── Sessions / Messages ──────────────────────────────────────

class RedisSessions implements SessionRepository {
  constructor(
    private readonly redis: Redis,
    private readonly keys: Keys,
  ) {}

  async get(sessionId: string): Promise<SessionRecord | null> {
    const raw = await this.redis.get(this.keys.session(sessionId));
    return raw ? decodeSession(raw) : null;
  }

  async findByPair(accountId: string, shopName: string, states: readonly SessionState[]): Promise<SessionRecord[]> {
    const ids = await this.redis.smembers(this.keys.pair(accountId, shopName));
    const sessions = await this.getMany(ids);
    return sessions
      .filter((s) => states.includes(s.state))
      .sort((a, b) => b.lastActivity - a.lastActivity);
  }

  async insertSuperseding(session: SessionRecord, now: number): Promise<string[]> {
    const reply = await this.redis.eval(
      INSERT_SUPERSEDING,
      4,
      this.keys.pair(session.accountId, session.shopName),
      this.keys.session(session.sessionId),
      this.keys.sessionPairRef(session.sessionId),
      this.keys.openSessions,
      encodeSession(session),
      session.sessionId,
      now,
      this.keys.sessionPrefix,
    );
    const [status, ...superseded] = replyStrings(reply);
    if (status === 'duplicate') {
      throw new StoreError('DUPLICATE_KEY', `Session ${session.sessionId} already exists`);
    }
    return superseded;
  }

  async update(
    sessionId: string,
    patch: SessionPatch,
    allowedFrom?: readonly SessionState[],
  ): Promise<SessionWriteOutcome> {
    const allowed = allowedFrom ? JSON.stringify(allowedFrom.map((s) => SESSION_STATE_CODES[s])) : '';
    const reply = await this.redis.eval(
      UPDATE_SESSION,
      3,
      this.keys.session(sessionId),
      this.keys.sessionPairRef(sessionId),
      this.keys.openSessions,
      encodeSessionPatch(patch),
      allowed,
    );
    return sessionOutcome(reply);
  }

  async attachMessage(message: MessageRecord): Promise<SessionWriteOutcome> {
    const reply = await this.redis.eval(
      ATTACH_MESSAGE,
      3,
      this.keys.session(message.sessionId),
      this.keys.message(message.messageId),
      this.keys.sessionMessages(message.sessionId),
      encodeMessage(message),
      message.sentAt,
      message.messageId,
    );
    return sessionOutcome(reply);
  }

  async listNonTerminal(): Promise<SessionRecord[]> {
    const ids = await this.redis.smembers(this.keys.openSessions);
    return this.getMany(ids);
  }

  private async getMany(ids: string[]): Promise<SessionRecord[]> {
    if (ids.length === 0) return [];
    const raws = await this.redis.mget(ids.map((id) => this.keys.session(id)));
    const sessions: SessionRecord[] = [];
    for (const raw of raws) {
      if (raw) sessions.push(decodeSession(raw));
    }
    return sessions;
  }
}

class RedisMessages implements MessageRepository {
  constructor(
    private readonly redis: Redis,
    private readonly keys: Keys,
  ) {}

  async exists(messageId: string): Promise<boolean> {
    return (await this.redis.exists(this.keys.message(messageId))) === 1;
  }

  async listBySession(sessionId: string): Promise<MessageRecord[]> {
    const ids = await this.redis.lrange(this.keys.sessionMessages(sessionId), 0, -1);
    if (ids.length === 0) return [];
    const raws = await this.redis.mget(ids.map((id) => this.keys.message(id)));
    const messages: MessageRecord[] = [];
    for (const raw of raws) {
      if (raw) messages.push(decodeMessage(raw));
    }
    return messages;
  }
}

// ───── Tasks ────────────────────────────────────────────────────

class RedisTasks implements TaskRepository {
  constructor(
    private readonly redis: Redis,
    private readonly keys: Keys,
  ) {}

  async create(task: NewTask): Promise<TaskRecord> {
    const reply = await this.redis.eval(
      CREATE_TASK,
      3,
      this.keys.taskExternal(task.externalTaskId),
      this.keys.taskSequence,
      this.keys.pendingTasks,
      encodeTask(task),
      this.keys.taskPrefix,
      this.keys.sessionPrefix,
      task.createdAt,
    );
    const [status, taskId] = replyStrings(reply);
    if (status === 'duplicate') {
      throw new StoreError('DUPLICATE_KEY', `Task for external id ${task.externalTaskId} already exists`);
    }
    if (status !== 'ok' || taskId === undefined) {
      throw new StoreError('BACKEND_ERROR', `Unexpected task creation reply "${status}"`);
    }
    return { ...task, taskId };
  }

  async get(taskId: string): Promise<TaskRecord | null> {
    const raw = await this.redis.get(this.keys.task(taskId));
    return raw ? decodeTask(raw) : null;
  }

  async findByExternalId(externalTaskId: string): Promise<TaskRecord | null> {
    const taskId = await this.redis.get(this.keys.taskExternal(externalTaskId));
    return taskId ? this.get(taskId) : null;
  }

  async findBySession(sessionId: string, externalTaskId?: string): Promise<TaskRecord | null> {
    const ids = await this.redis.lrange(this.keys.sessionTasks(sessionId), 0, -1);
    for (const id of ids) {
      const task = await this.get(id);
      if (task && (!externalTaskId || task.externalTaskId === externalTaskId)) return task;
    }
    return null;
  }

  async update(
    taskId: string,
    patch: Partial<Pick<TaskRecord, 'status' | 'finishedAt'>>,
    allowedFrom?: readonly TaskStatus[],
  ): Promise<TaskRecord | null> {
    const reply = await this.redis.eval(
      UPDATE_TASK,
      2,
      this.keys.task(taskId),
      this.keys.pendingTasks,
      encodeTaskPatch(patch),
      allowedFrom ? JSON.stringify(allowedFrom.map((s) => TASK_STATUS_CODES[s])) : '',
      taskId,
    );
    const [status, out] = replyStrings(reply);
    if (status === 'ok' && out !== undefined) return decodeTask(out);
    if (status === 'not_found' || status === 'state_conflict') return null;
    throw new StoreError('BACKEND_ERROR', `Unexpected task update reply "${status}"`);
  }

  async listPending(limit: number): Promise<TaskRecord[]> {
    if (limit <= 0) return [];
    const ids = await this.redis.zrevrange(this.keys.pendingTasks, 0, limit - 1);
    const tasks: TaskRecord[] = [];
    for (const id of ids) {
      const task = await this.get(id);
      if (task && task.status === 'NOT_STARTED') tasks.push(task);
    }
    return tasks;
  }
}

// ───── Audit: transfers + operation log ─────────────────────────

class RedisTransfers implements TransferRepository {
  constructor(
    private readonly redis: Redis,
    private readonly keys: Keys,
  ) {}

  async append(record: TransferRecord): Promise<void> {
    await this.redis
      .multi()
      .set(this.keys.transfer(record.transferId), encodeTransfer(record))
      .rpush(this.keys.sessionTransfers(record.sessionId), record.transferId)
      .exec();
  }

  async get(transferId: string): Promise<TransferRecord | null> {
    const raw = await this.redis.get(this.keys.transfer(transferId));
    return raw ? decodeTransfer(raw) : null;
  }

  async listBySession(sessionId: string): Promise<TransferRecord[]> {
    const ids = await this.redis.lrange(this.keys.sessionTransfers(sessionId), 0, -1);
    const records: TransferRecord[] = [];
    for (const id of ids) {
      const record = await this.get(id);
      if (record) records.push(record);
    }
    return records;
  }

  async accept(transferId: string, acceptedBy: string, at: number): Promise<TransferRecord | null> {
    const current = await this.get(transferId);
    if (!current || current.status !== 'PENDING') return null;
    const accepted: TransferRecord = { ...current, status: 'ACCEPTED', acceptedBy, acceptedAt: at };
    await this.redis.set(this.keys.transfer(transferId), encodeTransfer(accepted));
    return accepted;
  }
}

class RedisOperationLog implements OperationLogRepository {
  private readonly log = logger.child({ component: 'operation-log-redis' });

  constructor(
    private readonly redis: Redis,
    private readonly keys: Keys,
  ) {}

  async append(entry: OperationLogEntry): Promise<void> {
    await this.redis.rpush(this.keys.sessionOperations(entry.sessionId), JSON.stringify(entry));
  }

  async listBySession(sessionId: string): Promise<OperationLogEntry[]> {
    const raws = await this.redis.lrange(this.keys.sessionOperations(sessionId), 0, -1);
    const entries: OperationLogEntry[] = [];
    for (const raw of raws) {
      const entry = parseOperation(raw);
      if (entry) entries.push(entry);
      else this.log.warn({ sessionId }, 'Skipping malformed operation log entry');
    }
    return entries;
  }
}

function parseOperation(raw: string): OperationLogEntry | null {
  const data: unknown = JSON.parse(raw);
  if (
    typeof data !== 'object' || data === null
    || !('sessionId' in data) || typeof data.sessionId !== 'string'
    || !('operationType' in data) || typeof data.operationType !== 'string'
    || !('operatorId' in data) || typeof data.operatorId !== 'string'
    || !('operatorType' in data) || typeof data.operatorType !== 'string'
    || !('operationAt' in data) || typeof data.operationAt !== 'number'
  ) {
    return null;
  }
  const operationType = OPERATION_TYPES.find((t) => t === data.operationType);
  const operatorType = OPERATOR_TYPES.find((t) => t === data.operatorType);
  if (!operationType || !operatorType) return null;
  const payload: Record<string, unknown> = {};
  if ('payload' in data && typeof data.payload === 'object' && data.payload !== null) {
    Object.assign(payload, data.payload);
  }
  return {
    sessionId: data.sessionId,
    operationType,
    operatorId: data.operatorId,
    operatorType,
    operationAt: data.operationAt,
    payload,
  };
}

const OPERATION_TYPES = ['create', 'supersede', 'attach', 'transfer', 'timeout', 'complete', 'cancel'] as const;
const OPERATOR_TYPES = ['robot', 'human', 'system'] as const;

export class RedisConversationStore implements ConversationStore {
  readonly accounts: AccountRepository;
  readonly shops: ShopRepository;
  readonly sessions: SessionRepository;
  readonly messages: MessageRepository;
  readonly tasks: TaskRepository;
  readonly transfers: TransferRepository;
  readonly operations: OperationLogRepository;

  constructor(redis: Redis, keyPrefix: string, clock: () => number = Date.now) {
    const keys = new Keys(keyPrefix);
    this.accounts = new RedisAccounts(redis, keys, clock);
    this.shops = new RedisShops(redis, keys, clock);
    this.sessions = new RedisSessions(redis, keys);
    this.messages = new RedisMessages(redis, keys);
    this.tasks = new RedisTasks(redis, keys);
    this.transfers = new RedisTransfers(redis, keys);
    this.operations = new RedisOperationLog(redis, keys);
  }
}
