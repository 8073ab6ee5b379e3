import { AutomationPolicy, TaskType, isRobotTask } from '../config/types';
import { logger } from '../observability/logger';
import { admissionDecisions } from '../observability/metrics';
import { SessionRecord } from '../store/types';
import { PairLock } from './pair-lock';
import { SessionLifecycle } from './session-lifecycle';
import { AdmissionDecision } from './types';

const MINUTE_MS = 60 * 1000;

export type RobotSessionResult =
  | { success: true; session: SessionRecord }
  | { success: false; reason: string; conflictingSessionId?: string };

/**
 * Admission control for robot sessions: at most one automated conversation
 * per (account, shop), and never over a human-owned one.
 */
export class AvailabilityGate {
  private readonly log = logger.child({ component: 'availability-gate' });

  constructor(
    private readonly lifecycle: SessionLifecycle,
    private readonly pairLock: PairLock,
    private readonly policy: AutomationPolicy,
    private readonly clock: () => number = Date.now,
  ) {}

  async canCreateRobotSession(
    accountId: string,
    shopName: string,
    taskType: TaskType,
    maxInactiveMinutes = this.policy.defaultInactiveMinutes,
  ): Promise<AdmissionDecision> {
    const precheck = this.precheck(shopName, taskType);
    if (precheck) return precheck;
    return this.pairLock.run(accountId, shopName, () =>
      this.evaluate(accountId, shopName, maxInactiveMinutes),
    );
  }

  /** Re-run the gate and, when admitted, open a PENDING robot session in the same locked step */
  async createRobotSession(
    accountId: string,
    shopName: string,
    taskType: TaskType,
    options: { externalTaskId?: string; maxInactiveMinutes?: number } = {},
  ): Promise<RobotSessionResult> {
    const precheck = this.precheck(shopName, taskType);
    if (precheck) return { success: false, reason: precheck.reason };

    const maxInactive = options.maxInactiveMinutes ?? this.policy.defaultInactiveMinutes;
    return this.pairLock.run(accountId, shopName, async (): Promise<RobotSessionResult> => {
      const decision = await this.evaluate(accountId, shopName, maxInactive);
      if (!decision.available) {
        return { success: false, reason: decision.reason, conflictingSessionId: decision.conflictingSessionId };
      }

      const session = await this.lifecycle.create({
        accountId,
        shopName,
        taskType,
        initialState: 'PENDING',
        createdBy: 'robot',
        priority: this.policy.taskPriority[taskType],
        externalTaskId: options.externalTaskId,
        inactiveWindowMinutes: options.maxInactiveMinutes,
      });
      return { success: true, session };
    });
  }

  private precheck(shopName: string, taskType: TaskType): { available: false; reason: string } | null {
    if (!shopName) return this.deny('shop name is required');
    if (!isRobotTask(taskType)) return this.deny(`task type ${taskType} is not an automated task`);
    return null;
  }

  private async evaluate(accountId: string, shopName: string, maxInactiveMinutes: number): Promise<AdmissionDecision> {
    const occupying = await this.lifecycle.findOccupyingSession(accountId, shopName);
    if (!occupying) return this.admit();

    if (occupying.state === 'TRANSFERRED') {
      return this.deny('session is owned by a human operator', occupying.sessionId);
    }

    if (this.clock() - occupying.lastActivity > maxInactiveMinutes * MINUTE_MS) {
      await this.lifecycle.markTimedOut(occupying.sessionId, 'inactive_before_robot_session');
      return this.admit(occupying.sessionId);
    }

    if (occupying.createdBy === 'robot') {
      return this.deny('an automated session is already running', occupying.sessionId);
    }

    return this.deny(`session is ${occupying.state}`, occupying.sessionId);
  }

  private admit(timedOutSessionId?: string): AdmissionDecision {
    admissionDecisions.inc({ decision: 'available' });
    return timedOutSessionId ? { available: true, timedOutSessionId } : { available: true };
  }

  private deny(reason: string, conflictingSessionId?: string): { available: false; reason: string; conflictingSessionId?: string } {
    admissionDecisions.inc({ decision: 'unavailable' });
    this.log.info({ reason, conflictingSessionId }, 'Robot session refused');
    return { available: false, reason, conflictingSessionId };
  }
}
