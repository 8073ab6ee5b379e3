import { AutomationPolicy, QueueLevel, TaskStatus, isQueueLevel } from '../config/types';
import { Failure, StoreError, errorMessage, failure } from '../errors';
import { logger } from '../observability/logger';
import { tasksCompleted } from '../observability/metrics';
import { AvailabilityGate } from '../session/availability-gate';
import { SessionLifecycle } from '../session/session-lifecycle';
import { parseTaskType } from '../store/codec';
import { ConversationStore, SessionRecord, TaskRecord } from '../store/types';
import { TaskQueue } from './priority-queue';
import { SendTargetResolver } from './send-resolver';

export interface CreateSessionTaskRequest {
  accountId: string;
  shopName: string;
  shopId?: string;
  platform?: string;
  /** External task type string, e.g. `auto_bargain` */
  taskType: string;
  externalTaskId: string;
  sendContent: string;
  priorityLevel?: string;
  maxInactiveMinutes?: number;
}

export type CreateSessionTaskResult =
  | { success: true; sessionId: string; taskId: string; queueLevel: QueueLevel }
  | (Failure & { conflictingSessionId?: string; sessionId?: string; taskId?: string });

export type DispatchInfoResult =
  | { success: true; taskId: string; sendContent: string; sendUrl: string; shopName: string }
  | Failure;

export interface SessionTaskStatus {
  session: SessionRecord;
  task: TaskRecord;
}

export interface PendingTask {
  task: TaskRecord;
  session: SessionRecord;
}

/**
 * Binds send tasks to robot sessions, publishes them to the level queues
 * and serves the send workers on the other side.
 */
export class TaskDispatcher {
  private readonly log = logger.child({ component: 'task-dispatcher' });

  constructor(
    private readonly store: ConversationStore,
    private readonly gate: AvailabilityGate,
    private readonly lifecycle: SessionLifecycle,
    private readonly queue: TaskQueue,
    private readonly resolver: SendTargetResolver,
    private readonly policy: AutomationPolicy,
    private readonly clock: () => number = Date.now,
  ) {}

  async createSessionTask(req: CreateSessionTaskRequest): Promise<CreateSessionTaskResult> {
    if (!req.accountId) return failure('VALIDATION_ERROR', 'account_id is required');
    if (!req.shopName) return failure('VALIDATION_ERROR', 'shop_name is required');
    if (!req.externalTaskId) return failure('VALIDATION_ERROR', 'external_task_id is required');

    const taskType = parseTaskType(req.taskType);
    if (!taskType) return failure('UNKNOWN_TASK_TYPE', `Unknown task type "${req.taskType}"`);

    const level = req.priorityLevel ?? this.policy.defaultQueueLevel;
    if (!isQueueLevel(level)) return failure('VALIDATION_ERROR', `priority_level must be level1..level5, got "${level}"`);

    const log = this.log.child({ accountId: req.accountId, shopName: req.shopName, externalTaskId: req.externalTaskId });

    try {
      if (await this.store.tasks.findByExternalId(req.externalTaskId)) {
        return failure('DUPLICATE_TASK', `A task for external id ${req.externalTaskId} already exists`);
      }

      await this.store.accounts.ensure(req.accountId, req.accountId, req.platform ?? 'taotian');
      await this.store.shops.ensure(req.shopName, req.shopId);

      const admitted = await this.gate.createRobotSession(req.accountId, req.shopName, taskType, {
        externalTaskId: req.externalTaskId,
        maxInactiveMinutes: req.maxInactiveMinutes,
      });
      if (!admitted.success) {
        return { ...failure('UNAVAILABLE', admitted.reason), conflictingSessionId: admitted.conflictingSessionId };
      }
      const session = admitted.session;

      let task: TaskRecord;
      try {
        task = await this.store.tasks.create({
          sessionId: session.sessionId,
          externalTaskType: taskType,
          externalTaskId: req.externalTaskId,
          status: 'NOT_STARTED',
          sendContent: req.sendContent,
          queueLevel: level,
          createdAt: this.clock(),
        });
      } catch (err) {
        // Roll the freshly opened session back so it does not hold the pair
        await this.lifecycle.finish(session.sessionId, 'CANCELLED', 'task_create_failed');
        if (err instanceof StoreError && err.code === 'DUPLICATE_KEY') {
          return failure('DUPLICATE_TASK', err.message);
        }
        throw err;
      }

      try {
        await this.queue.enqueue(level, task.taskId);
      } catch (err) {
        log.error({ err, taskId: task.taskId, level }, 'Failed to publish task');
        return {
          ...failure('QUEUE_PUBLISH_FAILED', `Failed to publish task ${task.taskId} to ${level}`),
          sessionId: session.sessionId,
          taskId: task.taskId,
        };
      }

      log.info({ sessionId: session.sessionId, taskId: task.taskId, level }, 'Session task created');
      return { success: true, sessionId: session.sessionId, taskId: task.taskId, queueLevel: level };
    } catch (err) {
      log.error({ err }, 'Session task creation failed');
      return failure('CREATE_FAILED', `Failed to create session task: ${errorMessage(err)}`);
    }
  }

  /**
   * Resolve the session's task as done or skipped and move the session on:
   * ACTIVE on success, CANCELLED on failure. False when there is no open task.
   */
  async completeTask(sessionId: string, success: boolean, error?: string): Promise<boolean> {
    const task = await this.store.tasks.findBySession(sessionId);
    if (!task || task.status !== 'NOT_STARTED') {
      this.log.warn({ sessionId }, 'No open task to complete');
      return false;
    }

    const status: TaskStatus = success ? 'DONE' : 'SKIPPED';
    const finished = await this.store.tasks.update(
      task.taskId,
      { status, finishedAt: this.clock() },
      ['NOT_STARTED'],
    );
    if (!finished) {
      this.log.warn({ sessionId, taskId: task.taskId }, 'Task was completed concurrently');
      return false;
    }
    tasksCompleted.inc({ outcome: success ? 'done' : 'skipped' });

    const moved = success
      ? await this.lifecycle.markActive(sessionId, 'task_sent')
      : await this.lifecycle.finish(sessionId, 'CANCELLED', error ?? 'task_failed');

    this.log.info({ sessionId, taskId: task.taskId, success, error, sessionMoved: moved }, 'Session task completed');
    return true;
  }

  async dequeueNext(): Promise<string | null> {
    const next = await this.queue.dequeueNext();
    return next?.taskId ?? null;
  }

  /** What to send and where for a dequeued task. The task stays NOT_STARTED either way. */
  async resolveDispatchInfo(taskId: string): Promise<DispatchInfoResult> {
    const task = await this.store.tasks.get(taskId);
    if (!task) return failure('TASK_NOT_FOUND', `Task ${taskId} not found`);

    const session = await this.store.sessions.get(task.sessionId);
    if (!session) return failure('TASK_NOT_FOUND', `Session for task ${taskId} not found`);

    try {
      const target = await this.resolver.resolve(task);
      if (!target) {
        return failure('DISPATCH_UNAVAILABLE', `No send target for ${task.externalTaskType} task ${taskId}`);
      }
      return {
        success: true,
        taskId,
        sendContent: task.sendContent,
        sendUrl: target.sendUrl,
        shopName: target.shopName ?? session.shopName,
      };
    } catch (err) {
      this.log.warn({ err, taskId }, 'Send target lookup failed');
      return failure('DISPATCH_UNAVAILABLE', `Send target lookup failed: ${errorMessage(err)}`);
    }
  }

  async getSessionStatus(sessionId: string): Promise<SessionTaskStatus | null> {
    const [session, task] = await Promise.all([
      this.store.sessions.get(sessionId),
      this.store.tasks.findBySession(sessionId),
    ]);
    return session && task ? { session, task } : null;
  }

  async getPendingTasks(limit: number): Promise<PendingTask[]> {
    const tasks = await this.store.tasks.listPending(limit);
    const pending: PendingTask[] = [];
    for (const task of tasks) {
      const session = await this.store.sessions.get(task.sessionId);
      if (session) pending.push({ task, session });
    }
    return pending;
  }
}
