import { Owner, SessionState, TaskType, UrgencyLevel } from '../config/types';
import { SessionRecord } from '../store/types';

/** Allowed state transitions. Terminal states have no exits. */
export const STATE_TRANSITIONS: Readonly<Record<SessionState, readonly SessionState[]>> = {
  PENDING: ['ACTIVE', 'TRANSFERRED', 'COMPLETED', 'CANCELLED', 'TIMEOUT'],
  ACTIVE: ['TRANSFERRED', 'COMPLETED', 'CANCELLED', 'TIMEOUT'],
  TRANSFERRED: ['ACTIVE', 'COMPLETED', 'CANCELLED', 'TIMEOUT'],
  COMPLETED: [],
  CANCELLED: [],
  TIMEOUT: [],
};

export interface StateTransitionEvent {
  sessionId: string;
  from: SessionState;
  to: SessionState;
  reason: string;
  timestamp: number;
}

/** Everything needed to open a session; the lifecycle assigns id and timestamps */
export interface NewSessionSpec {
  accountId: string;
  shopName: string;
  taskType: TaskType;
  initialState: SessionState;
  createdBy: Owner;
  priority: number;
  externalTaskId?: string;
  inactiveWindowMinutes?: number;
}

/** A chat message after normalization, before it is stored */
export interface ConversationMessage {
  messageId: string;
  content: string;
  source: 'shop' | 'account';
  sender?: string;
  sentAt: number;
}

export interface SwitchControlOptions {
  operatorId?: string;
  urgency?: UrgencyLevel;
  payload?: Record<string, unknown>;
}

export type ContinuityDecision =
  | { action: 'create'; timedOutSessionId?: string }
  | { action: 'join'; session: SessionRecord };

export type AdmissionDecision =
  | { available: true; timedOutSessionId?: string }
  | { available: false; reason: string; conflictingSessionId?: string };

export interface PairStatus {
  accountId: string;
  shopName: string;
  hasLiveSession: boolean;
  liveSession: SessionRecord | null;
}
