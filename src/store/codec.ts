/**
 * Wire encoding for persisted records.
 *
 * Enumerations are stored as the lower-case strings below and decoded
 * through the reverse tables; an unknown string is a corrupt record.
 */

import Ajv from 'ajv';
import {
  SessionState,
  TaskStatus,
  TaskType,
  TransferStatus,
  UrgencyLevel,
  ALL_SESSION_STATES,
  ALL_TASK_STATUSES,
  ALL_TASK_TYPES,
  ALL_TRANSFER_STATUSES,
  ALL_URGENCY_LEVELS,
  isQueueLevel,
} from '../config/types';
import { StoreError } from '../errors';
import { MessageRecord, SessionPatch, SessionRecord, TaskRecord, TransferRecord } from './types';

export const SESSION_STATE_CODES: Readonly<Record<SessionState, string>> = {
  PENDING: 'pending',
  ACTIVE: 'active',
  TRANSFERRED: 'transferred',
  COMPLETED: 'completed',
  CANCELLED: 'cancelled',
  TIMEOUT: 'timeout',
};

export const TASK_TYPE_CODES: Readonly<Record<TaskType, string>> = {
  MANUAL_CUSTOMER_SERVICE: 'manual_customer_service',
  MANUAL_COMPLAINT: 'manual_complaint',
  MANUAL_URGENT: 'manual_urgent',
  AUTO_BARGAIN: 'auto_bargain',
  AUTO_FOLLOW_UP: 'auto_follow_up',
};

/** Task status travels as the integers the send workers already know */
export const TASK_STATUS_CODES: Readonly<Record<TaskStatus, number>> = {
  NOT_STARTED: 0,
  DONE: 1,
  SKIPPED: 2,
};

export const TRANSFER_STATUS_CODES: Readonly<Record<TransferStatus, string>> = {
  PENDING: 'pending',
  ACCEPTED: 'accepted',
  REJECTED: 'rejected',
};

export const URGENCY_CODES: Readonly<Record<UrgencyLevel, string>> = {
  LOW: 'low',
  MEDIUM: 'medium',
  HIGH: 'high',
  URGENT: 'urgent',
};

function reverse<K extends string, V extends string | number>(
  keys: readonly K[],
  table: Readonly<Record<K, V>>,
): Map<V, K> {
  return new Map(keys.map((key): [V, K] => [table[key], key]));
}

const SESSION_STATES = reverse(ALL_SESSION_STATES, SESSION_STATE_CODES);
const TASK_TYPES = reverse(ALL_TASK_TYPES, TASK_TYPE_CODES);
const TASK_STATUSES = reverse(ALL_TASK_STATUSES, TASK_STATUS_CODES);
const TRANSFER_STATUSES = reverse(ALL_TRANSFER_STATUSES, TRANSFER_STATUS_CODES);
const URGENCIES = reverse(ALL_URGENCY_LEVELS, URGENCY_CODES);

function lookup<V extends string | number, K>(table: Map<V, K>, value: V, kind: string): K {
  const decoded = table.get(value);
  if (decoded === undefined) {
    throw new StoreError('CORRUPT_RECORD', `Unknown ${kind} "${String(value)}"`);
  }
  return decoded;
}

export function decodeSessionState(code: string): SessionState {
  return lookup(SESSION_STATES, code, 'session state');
}

export function decodeTaskType(code: string): TaskType {
  return lookup(TASK_TYPES, code, 'task type');
}

/** Parse an external task type string (`auto_bargain`) or return null */
export function parseTaskType(code: string): TaskType | null {
  return TASK_TYPES.get(code) ?? null;
}

// ───── Wire shapes ──────────────────────────────────────────────

export interface SessionWire extends Omit<SessionRecord, 'state' | 'taskType'> {
  state: string;
  taskType: string;
}

export interface TaskWire extends Omit<TaskRecord, 'status' | 'externalTaskType' | 'queueLevel'> {
  status: number;
  externalTaskType: string;
  queueLevel: string;
}

export interface TransferWire extends Omit<TransferRecord, 'status' | 'urgency'> {
  status: string;
  urgency: string;
}

const ajv = new Ajv({ allErrors: false });

const validateSessionWire = ajv.compile<SessionWire>({
  type: 'object',
  required: [
    'sessionId', 'accountId', 'shopName', 'taskType', 'state', 'createdBy',
    'priority', 'messageCount', 'createdAt', 'lastActivity',
  ],
  properties: {
    sessionId: { type: 'string' },
    accountId: { type: 'string' },
    shopName: { type: 'string' },
    taskType: { type: 'string' },
    state: { type: 'string' },
    createdBy: { enum: ['robot', 'human'] },
    priority: { type: 'integer' },
    externalTaskId: { type: 'string' },
    messageCount: { type: 'integer' },
    createdAt: { type: 'number' },
    lastActivity: { type: 'number' },
    timeoutAt: { type: 'number' },
    transferredAt: { type: 'number' },
    transferReason: { type: 'string' },
    inactiveWindowMinutes: { type: 'integer', minimum: 1 },
  },
});

const validateMessage = ajv.compile<MessageRecord>({
  type: 'object',
  required: ['messageId', 'sessionId', 'content', 'source', 'sentAt', 'storedAt'],
  properties: {
    messageId: { type: 'string' },
    sessionId: { type: 'string' },
    content: { type: 'string' },
    source: { enum: ['shop', 'account'] },
    sender: { type: 'string' },
    sentAt: { type: 'number' },
    storedAt: { type: 'number' },
  },
});

const validateTaskWire = ajv.compile<TaskWire>({
  type: 'object',
  required: [
    'taskId', 'sessionId', 'externalTaskType', 'externalTaskId',
    'status', 'sendContent', 'queueLevel', 'createdAt',
  ],
  properties: {
    taskId: { type: 'string' },
    sessionId: { type: 'string' },
    externalTaskType: { type: 'string' },
    externalTaskId: { type: 'string' },
    status: { type: 'integer' },
    sendContent: { type: 'string' },
    queueLevel: { type: 'string' },
    createdAt: { type: 'number' },
    finishedAt: { type: 'number' },
  },
});

const validateTransferWire = ajv.compile<TransferWire>({
  type: 'object',
  required: [
    'transferId', 'sessionId', 'fromType', 'toType', 'reason', 'payload',
    'transferredBy', 'transferredAt', 'status', 'urgency',
  ],
  properties: {
    transferId: { type: 'string' },
    sessionId: { type: 'string' },
    fromType: { enum: ['robot', 'human'] },
    toType: { enum: ['robot', 'human'] },
    reason: { type: 'string' },
    payload: { type: 'object' },
    transferredBy: { type: 'string' },
    transferredAt: { type: 'number' },
    status: { type: 'string' },
    urgency: { type: 'string' },
    acceptedBy: { type: 'string' },
    acceptedAt: { type: 'number' },
  },
});

function parse(raw: string, kind: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new StoreError('CORRUPT_RECORD', `Unparseable ${kind} record`, { cause: err });
  }
}

function invalid(kind: string, errors: { instancePath: string; message?: string }[] | null | undefined): StoreError {
  const detail = errors?.map((e) => `${e.instancePath} ${e.message}`).join('; ') ?? 'unknown';
  return new StoreError('CORRUPT_RECORD', `Invalid ${kind} record: ${detail}`);
}

// ───── Sessions ─────────────────────────────────────────────────

export function encodeSession(session: SessionRecord): string {
  const wire: SessionWire = {
    ...session,
    state: SESSION_STATE_CODES[session.state],
    taskType: TASK_TYPE_CODES[session.taskType],
  };
  return JSON.stringify(wire);
}

export function decodeSession(raw: string): SessionRecord {
  const data = parse(raw, 'session');
  if (!validateSessionWire(data)) throw invalid('session', validateSessionWire.errors);
  return {
    ...data,
    state: decodeSessionState(data.state),
    taskType: decodeTaskType(data.taskType),
  };
}

/** Encode only the fields of a partial session update */
export function encodeSessionPatch(patch: SessionPatch): string {
  const { state, ...rest } = patch;
  return JSON.stringify(state === undefined ? rest : { ...rest, state: SESSION_STATE_CODES[state] });
}

// ───── Messages ─────────────────────────────────────────────────

export function encodeMessage(message: MessageRecord): string {
  return JSON.stringify(message);
}

export function decodeMessage(raw: string): MessageRecord {
  const data = parse(raw, 'message');
  if (!validateMessage(data)) throw invalid('message', validateMessage.errors);
  return data;
}

// ───── Tasks ────────────────────────────────────────────────────

export function encodeTask(task: TaskRecord | Omit<TaskRecord, 'taskId'>): string {
  return JSON.stringify({
    ...task,
    status: TASK_STATUS_CODES[task.status],
    externalTaskType: TASK_TYPE_CODES[task.externalTaskType],
  });
}

/** Only the fields present in the patch, in wire form */
export function encodeTaskPatch(patch: Partial<Pick<TaskRecord, 'status' | 'finishedAt'>>): string {
  return JSON.stringify({
    ...(patch.status !== undefined ? { status: TASK_STATUS_CODES[patch.status] } : {}),
    ...(patch.finishedAt !== undefined ? { finishedAt: patch.finishedAt } : {}),
  });
}

export function decodeTask(raw: string): TaskRecord {
  const data = parse(raw, 'task');
  if (!validateTaskWire(data)) throw invalid('task', validateTaskWire.errors);
  const queueLevel = data.queueLevel;
  if (!isQueueLevel(queueLevel)) throw new StoreError('CORRUPT_RECORD', `Unknown queue level "${queueLevel}"`);
  return {
    ...data,
    status: lookup(TASK_STATUSES, data.status, 'task status'),
    externalTaskType: decodeTaskType(data.externalTaskType),
    queueLevel,
  };
}

// ───── Transfers ────────────────────────────────────────────────

export function encodeTransfer(record: TransferRecord): string {
  const wire: TransferWire = {
    ...record,
    status: TRANSFER_STATUS_CODES[record.status],
    urgency: URGENCY_CODES[record.urgency],
  };
  return JSON.stringify(wire);
}

export function decodeTransfer(raw: string): TransferRecord {
  const data = parse(raw, 'transfer');
  if (!validateTransferWire(data)) throw invalid('transfer', validateTransferWire.errors);
  return {
    ...data,
    status: lookup(TRANSFER_STATUSES, data.status, 'transfer status'),
    urgency: lookup(URGENCIES, data.urgency, 'urgency level'),
  };
}
