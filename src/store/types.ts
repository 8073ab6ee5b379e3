import {
  MessageSource,
  OperationType,
  OperatorType,
  Owner,
  QueueLevel,
  SessionState,
  TaskStatus,
  TaskType,
  TransferStatus,
  UrgencyLevel,
} from '../config/types';

export interface AccountRecord {
  accountId: string;
  displayName: string;
  platform: string;
  isActive: boolean;
  createdAt: number;
}

export interface ShopRecord {
  /** Natural key, globally unique */
  shopName: string;
  /** Marketplace-side id; denormalized and optional */
  shopId?: string;
  createdAt: number;
}

export interface SessionRecord {
  sessionId: string;
  accountId: string;
  shopName: string;
  taskType: TaskType;
  state: SessionState;
  createdBy: Owner;
  /** 1 = highest */
  priority: number;
  externalTaskId?: string;
  messageCount: number;
  createdAt: number;
  lastActivity: number;
  timeoutAt?: number;
  transferredAt?: number;
  transferReason?: string;
  /** Idle window the creating batch asked for; the sweeper falls back to the default */
  inactiveWindowMinutes?: number;
}

export type SessionPatch = Partial<
  Pick<SessionRecord, 'state' | 'createdBy' | 'lastActivity' | 'timeoutAt' | 'transferredAt' | 'transferReason'>
>;

export interface MessageRecord {
  /** Externally supplied; unique across the whole store */
  messageId: string;
  sessionId: string;
  content: string;
  source: MessageSource;
  sender?: string;
  sentAt: number;
  storedAt: number;
}

export interface TaskRecord {
  taskId: string;
  sessionId: string;
  externalTaskType: TaskType;
  externalTaskId: string;
  status: TaskStatus;
  sendContent: string;
  queueLevel: QueueLevel;
  createdAt: number;
  finishedAt?: number;
}

export type NewTask = Omit<TaskRecord, 'taskId'>;

export interface TransferRecord {
  transferId: string;
  sessionId: string;
  fromType: Owner;
  toType: Owner;
  reason: string;
  payload: Record<string, unknown>;
  transferredBy: string;
  transferredAt: number;
  status: TransferStatus;
  urgency: UrgencyLevel;
  acceptedBy?: string;
  acceptedAt?: number;
}

export interface OperationLogEntry {
  sessionId: string;
  operationType: OperationType;
  operatorId: string;
  operatorType: OperatorType;
  operationAt: number;
  payload: Record<string, unknown>;
}

/** Result of a conditional session write */
export type SessionWriteOutcome =
  | { ok: true; before: SessionRecord; after: SessionRecord }
  | { ok: false; reason: 'not_found' }
  | { ok: false; reason: 'state_conflict'; current: SessionRecord }
  | { ok: false; reason: 'duplicate' };

export interface AccountRepository {
  get(accountId: string): Promise<AccountRecord | null>;
  /** Create the account if missing; returns the stored record */
  ensure(accountId: string, displayName: string, platform: string): Promise<AccountRecord>;
}

export interface ShopRepository {
  get(shopName: string): Promise<ShopRecord | null>;
  /** Create the shop if missing; fills in a previously unknown shop id */
  ensure(shopName: string, shopId?: string): Promise<ShopRecord>;
}

export interface SessionRepository {
  get(sessionId: string): Promise<SessionRecord | null>;
  /** Sessions of the pair in the given states, most recently active first */
  findByPair(accountId: string, shopName: string, states: readonly SessionState[]): Promise<SessionRecord[]>;
  /**
   * Atomically move every non-terminal session of the pair to COMPLETED
   * (last activity = now) and insert the new session.
   * Returns the ids that were superseded.
   */
  insertSuperseding(session: SessionRecord, now: number): Promise<string[]>;
  /** Apply the patch if the session exists and its state is in allowedFrom (when given) */
  update(sessionId: string, patch: SessionPatch, allowedFrom?: readonly SessionState[]): Promise<SessionWriteOutcome>;
  /**
   * Store the message and account for it on the session in one step:
   * message count + 1, last activity = max(last activity, sentAt), PENDING → ACTIVE.
   * Refuses unknown or terminal sessions and already-stored message ids.
   */
  attachMessage(message: MessageRecord): Promise<SessionWriteOutcome>;
  listNonTerminal(): Promise<SessionRecord[]>;
}

export interface MessageRepository {
  exists(messageId: string): Promise<boolean>;
  listBySession(sessionId: string): Promise<MessageRecord[]>;
}

export interface TaskRepository {
  /** Assigns the task id; fails with DUPLICATE_KEY on a known external task id */
  create(task: NewTask): Promise<TaskRecord>;
  get(taskId: string): Promise<TaskRecord | null>;
  findByExternalId(externalTaskId: string): Promise<TaskRecord | null>;
  findBySession(sessionId: string, externalTaskId?: string): Promise<TaskRecord | null>;
  /** Null when the task is missing or its status is outside allowedFrom (when given) */
  update(
    taskId: string,
    patch: Partial<Pick<TaskRecord, 'status' | 'finishedAt'>>,
    allowedFrom?: readonly TaskStatus[],
  ): Promise<TaskRecord | null>;
  /** NOT_STARTED tasks, newest first */
  listPending(limit: number): Promise<TaskRecord[]>;
}

export interface TransferRepository {
  append(record: TransferRecord): Promise<void>;
  get(transferId: string): Promise<TransferRecord | null>;
  listBySession(sessionId: string): Promise<TransferRecord[]>;
  /** Marks a PENDING transfer accepted; null when unknown or already decided */
  accept(transferId: string, acceptedBy: string, at: number): Promise<TransferRecord | null>;
}

export interface OperationLogRepository {
  append(entry: OperationLogEntry): Promise<void>;
  listBySession(sessionId: string): Promise<OperationLogEntry[]>;
}

export interface ConversationStore {
  readonly accounts: AccountRepository;
  readonly shops: ShopRepository;
  readonly sessions: SessionRepository;
  readonly messages: MessageRepository;
  readonly tasks: TaskRepository;
  readonly transfers: TransferRepository;
  readonly operations: OperationLogRepository;
}
