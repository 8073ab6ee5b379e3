import { FastifyInstance } from 'fastify';
import { TaskDispatcher } from '../dispatch/task-dispatcher';
import { sendFailure, sendOk, verifyAdmin } from './envelope';
import { presentPendingTask } from './presenters';

interface TaskParams {
  taskId: string;
}

interface PendingQuery {
  limit?: string;
}

const DEFAULT_PENDING_LIMIT = 10;
const MAX_PENDING_LIMIT = 100;

/**
 * Endpoints polled by the send workers. `next_id` pops the queue; the
 * popped id is then resolved through `send_info`.
 */
export function registerTaskRoutes(
  app: FastifyInstance,
  deps: { dispatcher: TaskDispatcher; adminApiKey: string },
): void {
  const preHandler = verifyAdmin(deps.adminApiKey);

  app.get('/api/tasks/next_id', { preHandler }, async (_req, reply) => {
    const taskId = await deps.dispatcher.dequeueNext();
    if (taskId === null) {
      return sendFailure(reply, { errorCode: 'NO_TASK', errorMessage: 'No task is waiting' }, { task_id: null });
    }
    return sendOk(reply, 'Task dequeued', { task_id: taskId, timestamp: new Date().toISOString() });
  });

  app.get<{ Params: TaskParams }>('/api/tasks/:taskId/send_info', { preHandler }, async (req, reply) => {
    const info = await deps.dispatcher.resolveDispatchInfo(req.params.taskId);
    if (!info.success) return sendFailure(reply, info);
    return sendOk(reply, 'Send info resolved', {
      task_id: info.taskId,
      send_content: info.sendContent,
      send_url: info.sendUrl,
      shop_name: info.shopName,
    });
  });

  app.get<{ Querystring: PendingQuery }>('/api/tasks/pending', async (req, reply) => {
    const raw = req.query.limit;
    const limit = raw === undefined ? DEFAULT_PENDING_LIMIT : Number(raw);
    if (!Number.isInteger(limit) || limit < 1 || limit > MAX_PENDING_LIMIT) {
      return sendFailure(reply, {
        errorCode: 'VALIDATION_ERROR',
        errorMessage: `limit must be an integer between 1 and ${MAX_PENDING_LIMIT}`,
      });
    }
    const pending = await deps.dispatcher.getPendingTasks(limit);
    return sendOk(reply, 'Pending tasks', { tasks: pending.map(presentPendingTask), count: pending.length });
  });
}
