import { v4 as uuidv4 } from 'uuid';
import {
  LIVE_STATES,
  OCCUPYING_STATES,
  OperationType,
  OperatorType,
  Owner,
  SessionState,
} from '../config/types';
import { logger } from '../observability/logger';
import { sessionsCreated } from '../observability/metrics';
import { ConversationStore, SessionRecord, TransferRecord } from '../store/types';
import { StateMachine } from './state-machine';
import { ConversationMessage, NewSessionSpec, PairStatus, SwitchControlOptions } from './types';

export function newSessionId(): string {
  return `sess_${uuidv4().replace(/-/g, '').slice(0, 12)}`;
}

/**
 * Owns every write to a session: creation, message attachment, hand-off
 * and termination. Each write is a single conditional store step, and
 * each one appends to the operation log.
 *
 * Creation is only safe under the pair lock for (accountId, shopName);
 * the gate and the continuity decider take it before calling in.
 */
export class SessionLifecycle {
  private readonly log = logger.child({ component: 'session-lifecycle' });

  constructor(
    private readonly store: ConversationStore,
    private readonly stateMachine: StateMachine,
    private readonly clock: () => number = Date.now,
  ) {}

  async get(sessionId: string): Promise<SessionRecord | null> {
    return this.store.sessions.get(sessionId);
  }

  /**
   * Complete every non-terminal session of the pair and insert the new one.
   * Returns the new session.
   */
  async create(spec: NewSessionSpec): Promise<SessionRecord> {
    const now = this.clock();
    const session: SessionRecord = {
      sessionId: newSessionId(),
      accountId: spec.accountId,
      shopName: spec.shopName,
      taskType: spec.taskType,
      state: spec.initialState,
      createdBy: spec.createdBy,
      priority: spec.priority,
      externalTaskId: spec.externalTaskId,
      inactiveWindowMinutes: spec.inactiveWindowMinutes,
      messageCount: 0,
      createdAt: now,
      lastActivity: now,
    };

    const superseded = await this.store.sessions.insertSuperseding(session, now);
    for (const id of superseded) {
      await this.appendOperation(id, 'supersede', 'system', 'system', { supersededBy: session.sessionId });
    }
    await this.appendOperation(session.sessionId, 'create', spec.createdBy, spec.createdBy, {
      taskType: spec.taskType,
      state: spec.initialState,
      priority: spec.priority,
      externalTaskId: spec.externalTaskId,
    });

    sessionsCreated.inc({ created_by: spec.createdBy });
    this.log.info(
      {
        sessionId: session.sessionId,
        accountId: spec.accountId,
        shopName: spec.shopName,
        state: spec.initialState,
        createdBy: spec.createdBy,
        superseded,
      },
      'Session created',
    );
    return session;
  }

  /**
   * Store the message on the session. False when the session is unknown or
   * terminal, or when the message id is already stored.
   */
  async attachMessage(sessionId: string, message: ConversationMessage): Promise<boolean> {
    const outcome = await this.store.sessions.attachMessage({
      ...message,
      sessionId,
      storedAt: this.clock(),
    });

    if (!outcome.ok) {
      if (outcome.reason === 'state_conflict') {
        this.log.warn({ sessionId, state: outcome.current.state }, 'Refusing message for a closed session');
      }
      return false;
    }

    if (outcome.before.state !== outcome.after.state) {
      this.stateMachine.record(sessionId, outcome.before.state, outcome.after.state, 'first_message');
    }
    await this.appendOperation(sessionId, 'attach', message.sender ?? message.source, 'system', {
      messageId: message.messageId,
      source: message.source,
    });
    return true;
  }

  /**
   * Hand the session to a new owner. Human → TRANSFERRED, robot → ACTIVE.
   * Appends a transfer record on every successful call, including when the
   * owner does not change. False for unknown or terminal sessions.
   */
  async switchControl(
    sessionId: string,
    newOwner: Owner,
    reason: string,
    options: SwitchControlOptions = {},
  ): Promise<boolean> {
    const current = await this.store.sessions.get(sessionId);
    if (!current) return false;

    const target: SessionState = newOwner === 'human' ? 'TRANSFERRED' : 'ACTIVE';
    if (current.state !== target && !this.stateMachine.canTransition(current.state, target)) {
      this.log.warn({ sessionId, from: current.state, to: target }, 'Hand-off refused');
      return false;
    }

    const now = this.clock();
    const outcome = await this.store.sessions.update(
      sessionId,
      {
        state: target,
        createdBy: newOwner,
        lastActivity: now,
        transferReason: reason,
        ...(newOwner === 'human' ? { transferredAt: now } : {}),
      },
      OCCUPYING_STATES,
    );
    if (!outcome.ok) return false;

    if (outcome.before.state !== target) {
      this.stateMachine.record(sessionId, outcome.before.state, target, reason);
    }

    const operatorId = options.operatorId ?? 'system';
    const transfer: TransferRecord = {
      transferId: uuidv4(),
      sessionId,
      fromType: outcome.before.createdBy,
      toType: newOwner,
      reason,
      payload: options.payload ?? {},
      transferredBy: operatorId,
      transferredAt: now,
      status: 'PENDING',
      urgency: options.urgency ?? 'MEDIUM',
    };
    await this.store.transfers.append(transfer);
    await this.appendOperation(sessionId, 'transfer', operatorId, options.operatorId ? newOwner : 'system', {
      transferId: transfer.transferId,
      from: transfer.fromType,
      to: newOwner,
      reason,
    });

    this.log.info({ sessionId, from: transfer.fromType, to: newOwner, reason }, 'Session control switched');
    return true;
  }

  /** Most recently active session of the pair in ACTIVE or TRANSFERRED */
  async findLiveSession(accountId: string, shopName: string): Promise<SessionRecord | null> {
    const [latest] = await this.store.sessions.findByPair(accountId, shopName, LIVE_STATES);
    return latest ?? null;
  }

  /** Like findLiveSession but also counts a PENDING session as holding the pair */
  async findOccupyingSession(accountId: string, shopName: string): Promise<SessionRecord | null> {
    const [latest] = await this.store.sessions.findByPair(accountId, shopName, OCCUPYING_STATES);
    return latest ?? null;
  }

  async markTimedOut(sessionId: string, reason = 'inactive'): Promise<boolean> {
    const now = this.clock();
    return this.terminate(sessionId, 'TIMEOUT', 'timeout', reason, { timeoutAt: now, lastActivity: now });
  }

  /** Close the session as COMPLETED or CANCELLED */
  async finish(sessionId: string, outcome: 'COMPLETED' | 'CANCELLED', reason: string): Promise<boolean> {
    return this.terminate(sessionId, outcome, outcome === 'COMPLETED' ? 'complete' : 'cancel', reason, {
      lastActivity: this.clock(),
    });
  }

  /**
   * Promote a PENDING robot session to ACTIVE after its task was sent.
   * A session that is already ACTIVE counts as success; one a human took
   * over in the meantime stays TRANSFERRED.
   */
  async markActive(sessionId: string, reason: string): Promise<boolean> {
    const outcome = await this.store.sessions.update(
      sessionId,
      { state: 'ACTIVE', lastActivity: this.clock() },
      ['PENDING', 'ACTIVE'],
    );
    if (!outcome.ok) return false;
    if (outcome.before.state !== 'ACTIVE') {
      this.stateMachine.record(sessionId, outcome.before.state, 'ACTIVE', reason);
    }
    return true;
  }

  async acceptTransfer(transferId: string, acceptedBy: string): Promise<TransferRecord | null> {
    const accepted = await this.store.transfers.accept(transferId, acceptedBy, this.clock());
    if (!accepted) return null;
    await this.appendOperation(accepted.sessionId, 'transfer', acceptedBy, accepted.toType, {
      transferId,
      accepted: true,
    });
    return accepted;
  }

  async getPairStatus(accountId: string, shopName: string): Promise<PairStatus> {
    const liveSession = await this.findLiveSession(accountId, shopName);
    return { accountId, shopName, hasLiveSession: liveSession !== null, liveSession };
  }

  private async terminate(
    sessionId: string,
    target: SessionState,
    operation: OperationType,
    reason: string,
    patch: { lastActivity: number; timeoutAt?: number },
  ): Promise<boolean> {
    const outcome = await this.store.sessions.update(sessionId, { ...patch, state: target }, OCCUPYING_STATES);
    if (!outcome.ok) {
      if (outcome.reason === 'state_conflict') {
        this.log.debug({ sessionId, state: outcome.current.state, target }, 'Session already closed');
      }
      return false;
    }

    this.stateMachine.record(sessionId, outcome.before.state, target, reason);
    await this.appendOperation(sessionId, operation, 'system', 'system', { reason, from: outcome.before.state });
    return true;
  }

  private async appendOperation(
    sessionId: string,
    operationType: OperationType,
    operatorId: string,
    operatorType: OperatorType,
    payload: Record<string, unknown>,
  ): Promise<void> {
    await this.store.operations.append({
      sessionId,
      operationType,
      operatorId,
      operatorType,
      operationAt: this.clock(),
      payload,
    });
  }
}
