/** Session lifecycle states */
export type SessionState =
  | 'PENDING'
  | 'ACTIVE'
  | 'TRANSFERRED'
  | 'COMPLETED'
  | 'CANCELLED'
  | 'TIMEOUT';

/** Conversation task types. MANUAL_* are human-driven, AUTO_* are robot-driven. */
export type TaskType =
  | 'MANUAL_CUSTOMER_SERVICE'
  | 'MANUAL_COMPLAINT'
  | 'MANUAL_URGENT'
  | 'AUTO_BARGAIN'
  | 'AUTO_FOLLOW_UP';

/** Who currently drives a session */
export type Owner = 'robot' | 'human';

/** Which side of the chat authored a message */
export type MessageSource = 'shop' | 'account';

export type TaskStatus = 'NOT_STARTED' | 'DONE' | 'SKIPPED';

export type TransferStatus = 'PENDING' | 'ACCEPTED' | 'REJECTED';

export type UrgencyLevel = 'LOW' | 'MEDIUM' | 'HIGH' | 'URGENT';

export type OperatorType = Owner | 'system';

export type OperationType =
  | 'create'
  | 'supersede'
  | 'attach'
  | 'transfer'
  | 'timeout'
  | 'complete'
  | 'cancel';

/** Queue names shared with the external send workers. level1 is served first. */
export type QueueLevel = 'level1' | 'level2' | 'level3' | 'level4' | 'level5';

export const ALL_SESSION_STATES: readonly SessionState[] = [
  'PENDING', 'ACTIVE', 'TRANSFERRED', 'COMPLETED', 'CANCELLED', 'TIMEOUT',
];

export const ALL_TASK_TYPES: readonly TaskType[] = [
  'MANUAL_CUSTOMER_SERVICE', 'MANUAL_COMPLAINT', 'MANUAL_URGENT', 'AUTO_BARGAIN', 'AUTO_FOLLOW_UP',
];

export const ALL_TASK_STATUSES: readonly TaskStatus[] = ['NOT_STARTED', 'DONE', 'SKIPPED'];

export const ALL_TRANSFER_STATUSES: readonly TransferStatus[] = ['PENDING', 'ACCEPTED', 'REJECTED'];

export const ALL_URGENCY_LEVELS: readonly UrgencyLevel[] = ['LOW', 'MEDIUM', 'HIGH', 'URGENT'];

export const QUEUE_LEVELS: readonly QueueLevel[] = ['level1', 'level2', 'level3', 'level4', 'level5'];

export const LIVE_STATES: readonly SessionState[] = ['ACTIVE', 'TRANSFERRED'];

/** States that still hold the (account, shop) slot against a new robot session */
export const OCCUPYING_STATES: readonly SessionState[] = ['PENDING', 'ACTIVE', 'TRANSFERRED'];

export const TERMINAL_STATES: readonly SessionState[] = ['COMPLETED', 'CANCELLED', 'TIMEOUT'];

export const ROBOT_TASK_TYPES: readonly TaskType[] = ['AUTO_BARGAIN', 'AUTO_FOLLOW_UP'];

export function isTerminal(state: SessionState): boolean {
  return TERMINAL_STATES.includes(state);
}

export function isRobotTask(taskType: TaskType): boolean {
  return ROBOT_TASK_TYPES.includes(taskType);
}

export function isQueueLevel(value: string): value is QueueLevel {
  return (QUEUE_LEVELS as readonly string[]).includes(value);
}

/**
 * Process-wide automation policy. Read once at startup and handed to every
 * orchestration component; never mutated afterwards.
 */
export interface AutomationPolicy {
  /** Nicknames of operator accounts that humans log into */
  operatorNicknames: readonly string[];
  /** Prefix that every robot-authored reply starts with */
  automationMarker: string;
  /** Session priority per task type (1 = highest) */
  taskPriority: Readonly<Record<TaskType, number>>;
  /** Nick prefix that identifies the operator's own account, per platform */
  accountNickPrefix: Readonly<Record<string, string>>;
  defaultInactiveMinutes: number;
  defaultQueueLevel: QueueLevel;
}
