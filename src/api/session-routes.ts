import { FastifyInstance } from 'fastify';
import { ALL_URGENCY_LEVELS, Owner, UrgencyLevel } from '../config/types';
import { TaskDispatcher } from '../dispatch/task-dispatcher';
import { logger } from '../observability/logger';
import { SessionLifecycle } from '../session/session-lifecycle';
import { SESSION_STATE_CODES } from '../store/codec';
import { bodyValidator, sendFailure, sendOk, verifyAdmin } from './envelope';
import { presentPairStatus, presentSessionStatus } from './presenters';

/** POST /api/sessions/create */
interface CreateSessionBody {
  account_id: string;
  shop_name: string;
  shop_id?: string;
  platform?: string;
  task_type: string;
  external_task_id: string;
  send_content: string;
  priority_level?: string;
  max_inactive_minutes?: number;
}

/** POST /api/sessions/:sessionId/complete */
interface CompleteSessionBody {
  success: boolean;
  error_message?: string;
}

/** POST /api/sessions/:sessionId/control */
interface SwitchControlBody {
  owner: Owner;
  reason: string;
  operator_id?: string;
  urgency?: UrgencyLevel;
}

interface SessionParams {
  sessionId: string;
}

interface PairQuery {
  account_id?: string;
  shop_name?: string;
}

const validateCreate = bodyValidator<CreateSessionBody>({
  type: 'object',
  required: ['account_id', 'shop_name', 'task_type', 'external_task_id', 'send_content'],
  properties: {
    account_id: { type: 'string', minLength: 1 },
    shop_name: { type: 'string', minLength: 1 },
    shop_id: { type: 'string' },
    platform: { type: 'string' },
    task_type: { type: 'string', minLength: 1 },
    external_task_id: { type: 'string', minLength: 1 },
    send_content: { type: 'string' },
    priority_level: { type: 'string' },
    max_inactive_minutes: { type: 'integer', minimum: 1 },
  },
});

const validateComplete = bodyValidator<CompleteSessionBody>({
  type: 'object',
  required: ['success'],
  properties: {
    success: { type: 'boolean' },
    error_message: { type: 'string' },
  },
});

const validateControl = bodyValidator<SwitchControlBody>({
  type: 'object',
  required: ['owner', 'reason'],
  properties: {
    owner: { enum: ['robot', 'human'] },
    reason: { type: 'string', minLength: 1 },
    operator_id: { type: 'string' },
    urgency: { enum: [...ALL_URGENCY_LEVELS] },
  },
});

export function registerSessionRoutes(
  app: FastifyInstance,
  deps: { dispatcher: TaskDispatcher; lifecycle: SessionLifecycle; adminApiKey: string },
): void {
  const log = logger.child({ component: 'session-routes' });
  const preHandler = verifyAdmin(deps.adminApiKey);

  // ─────────────────────────────────────────────
  // POST /api/sessions/create: open a robot session and queue its task
  // ─────────────────────────────────────────────
  app.post('/api/sessions/create', { preHandler }, async (req, reply) => {
    const parsed = validateCreate(req.body);
    if ('error' in parsed) return sendFailure(reply, parsed.error);
    const body = parsed.value;

    const result = await deps.dispatcher.createSessionTask({
      accountId: body.account_id,
      shopName: body.shop_name,
      shopId: body.shop_id,
      platform: body.platform,
      taskType: body.task_type,
      externalTaskId: body.external_task_id,
      sendContent: body.send_content,
      priorityLevel: body.priority_level,
      maxInactiveMinutes: body.max_inactive_minutes,
    });

    if (!result.success) {
      log.info({ errorCode: result.errorCode, externalTaskId: body.external_task_id }, 'Session task refused');
      return sendFailure(reply, result, {
        conflicting_session_id: result.conflictingSessionId ?? null,
        session_id: result.sessionId ?? null,
        task_id: result.taskId ?? null,
      });
    }
    return sendOk(reply, 'Session task created', {
      session_id: result.sessionId,
      task_id: result.taskId,
      priority_level: result.queueLevel,
    });
  });

  // ─────────────────────────────────────────────
  // POST /api/sessions/:sessionId/complete: worker reports the send outcome
  // ─────────────────────────────────────────────
  app.post<{ Params: SessionParams }>('/api/sessions/:sessionId/complete', { preHandler }, async (req, reply) => {
    const parsed = validateComplete(req.body);
    if ('error' in parsed) return sendFailure(reply, parsed.error);

    const { sessionId } = req.params;
    const completed = await deps.dispatcher.completeTask(sessionId, parsed.value.success, parsed.value.error_message);
    if (!completed) {
      return sendFailure(reply, { errorCode: 'COMPLETE_FAILED', errorMessage: `No open task for session ${sessionId}` });
    }
    return sendOk(reply, 'Session task completed', { session_id: sessionId, success: parsed.value.success });
  });

  // ─────────────────────────────────────────────
  // GET /api/sessions/:sessionId/status
  // ─────────────────────────────────────────────
  app.get<{ Params: SessionParams }>('/api/sessions/:sessionId/status', async (req, reply) => {
    const status = await deps.dispatcher.getSessionStatus(req.params.sessionId);
    if (!status) {
      return sendFailure(reply, { errorCode: 'SESSION_NOT_FOUND', errorMessage: 'Session not found' });
    }
    return sendOk(reply, 'Session status', presentSessionStatus(status));
  });

  // ─────────────────────────────────────────────
  // GET /api/sessions/pair?account_id=&shop_name=: live session of a pair
  // ─────────────────────────────────────────────
  app.get<{ Querystring: PairQuery }>('/api/sessions/pair', async (req, reply) => {
    const { account_id: accountId, shop_name: shopName } = req.query;
    if (!accountId || !shopName) {
      return sendFailure(reply, {
        errorCode: 'VALIDATION_ERROR',
        errorMessage: 'account_id and shop_name are required',
      });
    }
    const status = await deps.lifecycle.getPairStatus(accountId, shopName);
    return sendOk(reply, 'Pair status', presentPairStatus(status));
  });

  // ─────────────────────────────────────────────
  // POST /api/sessions/:sessionId/control: hand the session to robot or human
  // ─────────────────────────────────────────────
  app.post<{ Params: SessionParams }>('/api/sessions/:sessionId/control', { preHandler }, async (req, reply) => {
    const parsed = validateControl(req.body);
    if ('error' in parsed) return sendFailure(reply, parsed.error);
    const body = parsed.value;

    const { sessionId } = req.params;
    const switched = await deps.lifecycle.switchControl(sessionId, body.owner, body.reason, {
      operatorId: body.operator_id,
      urgency: body.urgency,
    });
    if (!switched) {
      return sendFailure(reply, {
        errorCode: 'SESSION_NOT_FOUND',
        errorMessage: `Session ${sessionId} not found or already closed`,
      });
    }

    const session = await deps.lifecycle.get(sessionId);
    return sendOk(reply, 'Session control switched', {
      session_id: sessionId,
      owner: session?.createdBy ?? body.owner,
      state: session ? SESSION_STATE_CODES[session.state] : null,
    });
  });
}
