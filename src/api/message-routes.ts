import { FastifyInstance } from 'fastify';
import { AutomationPolicy } from '../config/types';
import { BatchProcessor } from '../messages/batch-processor';
import { normalizeBatch } from '../messages/normalizer';
import { RawChatMessage } from '../messages/types';
import { createTraceContext } from '../observability/trace';
import { childLogger } from '../observability/logger';
import { bodyValidator, sendFailure, sendOk, verifyAdmin } from './envelope';
import { presentBatchResult } from './presenters';

/** POST /api/messages/batch */
interface MessageBatchBody {
  shop_name: string;
  platform: string;
  account_id?: string;
  messages: RawChatMessage[];
  max_inactive_minutes?: number;
}

const validateBatch = bodyValidator<MessageBatchBody>({
  type: 'object',
  required: ['shop_name', 'platform', 'messages'],
  properties: {
    shop_name: { type: 'string', minLength: 1 },
    platform: { type: 'string', minLength: 1 },
    account_id: { type: 'string', minLength: 1 },
    max_inactive_minutes: { type: 'integer', minimum: 1 },
    messages: {
      type: 'array',
      minItems: 1,
      items: {
        type: 'object',
        required: ['id'],
        properties: {
          id: { type: 'string', minLength: 1 },
          nick: { type: 'string' },
          time: { type: ['string', 'number'] },
          content: { type: 'string' },
        },
      },
    },
  },
});

export function registerMessageRoutes(
  app: FastifyInstance,
  deps: {
    processor: BatchProcessor;
    policy: AutomationPolicy;
    timezone: string;
    adminApiKey: string;
    clock?: () => number;
  },
): void {
  const clock = deps.clock ?? Date.now;

  app.post('/api/messages/batch', { preHandler: verifyAdmin(deps.adminApiKey) }, async (req, reply) => {
    const parsed = validateBatch(req.body);
    if ('error' in parsed) return sendFailure(reply, parsed.error);
    const body = parsed.value;

    const normalized = normalizeBatch(body.platform, body.messages, deps.policy, deps.timezone, clock(), body.account_id);
    if (!normalized.success) return sendFailure(reply, normalized);

    const trace = createTraceContext({ accountId: normalized.accountId, shopName: body.shop_name });
    const log = childLogger(trace.requestId, { accountId: trace.accountId, shopName: trace.shopName });

    const result = await deps.processor.process({
      platform: body.platform,
      accountId: normalized.accountId,
      shopName: body.shop_name,
      messages: normalized.messages,
      maxInactiveMinutes: body.max_inactive_minutes ?? deps.policy.defaultInactiveMinutes,
    });

    log.info(
      {
        processed: result.processedMessages,
        skipped: result.skippedMessages,
        sessionId: result.activeSessionId,
        operations: result.sessionOperations,
        errors: result.errors.length,
      },
      'Message batch processed',
    );
    return sendOk(reply, 'Message batch processed', presentBatchResult(result));
  });
}
