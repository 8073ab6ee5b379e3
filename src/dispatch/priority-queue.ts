/**
 * Five-level send queue shared with the external send workers.
 *
 * The list names are exactly `level1`..`level5` with no key prefix; the
 * workers read them by these names. Enqueue appends to the tail, dequeue
 * pops the head of the first non-empty level scanning level1 → level5.
 */

import Redis from 'ioredis';
import { QUEUE_LEVELS, QueueLevel, isQueueLevel } from '../config/types';
import { logger } from '../observability/logger';
import { tasksDequeued, tasksEnqueued } from '../observability/metrics';

export interface DequeuedTask {
  taskId: string;
  level: QueueLevel;
}

export interface TaskQueue {
  enqueue(level: QueueLevel, taskId: string): Promise<void>;
  dequeueNext(): Promise<DequeuedTask | null>;
  depth(): Promise<Record<QueueLevel, number>>;
}

// ───── Redis Implementation ─────────────────────────────────────

/** One script so concurrent workers never see a lower level while a higher one has work */
const DEQUEUE_SCRIPT = `
for _, key in ipairs(KEYS) do
  local id = redis.call('LPOP', key)
  if id then return { key, id } end
end
return false
`;

export class RedisTaskQueue implements TaskQueue {
  constructor(private readonly redis: Redis) {}

  async enqueue(level: QueueLevel, taskId: string): Promise<void> {
    await this.redis.rpush(level, taskId);
    tasksEnqueued.inc({ level });
  }

  async dequeueNext(): Promise<DequeuedTask | null> {
    const reply: unknown = await this.redis.eval(DEQUEUE_SCRIPT, QUEUE_LEVELS.length, ...QUEUE_LEVELS);
    if (!Array.isArray(reply)) return null;

    const [level, taskId] = reply;
    if (typeof level !== 'string' || typeof taskId !== 'string' || !isQueueLevel(level)) {
      logger.error({ reply }, 'Unexpected dequeue reply');
      return null;
    }
    tasksDequeued.inc({ level });
    return { taskId, level };
  }

  async depth(): Promise<Record<QueueLevel, number>> {
    const pipeline = this.redis.pipeline();
    for (const level of QUEUE_LEVELS) pipeline.llen(level);
    const replies = (await pipeline.exec()) ?? [];
    const counts = emptyDepth();
    QUEUE_LEVELS.forEach((level, i) => {
      const value = replies[i]?.[1];
      counts[level] = typeof value === 'number' ? value : 0;
    });
    return counts;
  }
}

// ───── In-Memory Implementation ─────────────────────────────────

export class InMemoryTaskQueue implements TaskQueue {
  private readonly lists = new Map<QueueLevel, string[]>(QUEUE_LEVELS.map((l): [QueueLevel, string[]] => [l, []]));

  async enqueue(level: QueueLevel, taskId: string): Promise<void> {
    this.list(level).push(taskId);
    tasksEnqueued.inc({ level });
  }

  async dequeueNext(): Promise<DequeuedTask | null> {
    for (const level of QUEUE_LEVELS) {
      const taskId = this.list(level).shift();
      if (taskId !== undefined) {
        tasksDequeued.inc({ level });
        return { taskId, level };
      }
    }
    return null;
  }

  async depth(): Promise<Record<QueueLevel, number>> {
    const counts = emptyDepth();
    for (const level of QUEUE_LEVELS) counts[level] = this.list(level).length;
    return counts;
  }

  private list(level: QueueLevel): string[] {
    let list = this.lists.get(level);
    if (!list) {
      list = [];
      this.lists.set(level, list);
    }
    return list;
  }
}

function emptyDepth(): Record<QueueLevel, number> {
  return { level1: 0, level2: 0, level3: 0, level4: 0, level5: 0 };
}

// ───── Factory ──────────────────────────────────────────────────

export function createTaskQueue(redis?: Redis): TaskQueue {
  if (redis) {
    logger.info('Task queue: Redis lists level1..level5');
    return new RedisTaskQueue(redis);
  }
  logger.info('Task queue: In-memory');
  return new InMemoryTaskQueue();
}
