import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import Redis from 'ioredis';
import { env } from './config/env';
import { loadPolicy } from './config/policy-loader';
import { AutomationPolicy } from './config/types';
import { logger } from './observability/logger';
import { httpRequestDuration } from './observability/metrics';
import { sendFailure } from './api/envelope';
import { registerSessionRoutes } from './api/session-routes';
import { registerTaskRoutes } from './api/task-routes';
import { registerMessageRoutes } from './api/message-routes';
import { registerTransferRoutes } from './api/transfer-routes';
import { registerHealthRoutes } from './health/health-routes';
import { createConversationStore } from './store/conversation-store';
import { ConversationStore } from './store/types';
import { createPairLock } from './session/pair-lock';
import { StateMachine } from './session/state-machine';
import { SessionLifecycle } from './session/session-lifecycle';
import { ContinuityDecider } from './session/continuity';
import { AvailabilityGate } from './session/availability-gate';
import { HumanAuthorshipPredicate, MarkerAllowListPredicate } from './session/intervention-detector';
import { TimeoutSweeper } from './session/timeout-sweeper';
import { Notifier, createNotifier } from './notify/notifier';
import { createTaskQueue } from './dispatch/priority-queue';
import { SendTargetResolver, createSendTargetResolver } from './dispatch/send-resolver';
import { TaskDispatcher } from './dispatch/task-dispatcher';
import { BatchProcessor } from './messages/batch-processor';

export interface AppOptions {
  /** An existing connection; `null` forces the in-memory backends */
  redis?: Redis | null;
  clock?: () => number;
  policy?: AutomationPolicy;
  notifier?: Notifier;
  resolver?: SendTargetResolver;
  predicate?: HumanAuthorshipPredicate;
  adminApiKey?: string;
  enableTimeoutSweep?: boolean;
}

export interface AppContext {
  app: FastifyInstance;
  redis?: Redis;
  sweeper?: TimeoutSweeper;
  store: ConversationStore;
  lifecycle: SessionLifecycle;
  dispatcher: TaskDispatcher;
}

async function connectRedis(): Promise<Redis | undefined> {
  if (!env.redis.enabled || env.nodeEnv === 'test') return undefined;
  try {
    const redisInstance = new Redis(env.redis.url, {
      maxRetriesPerRequest: 3,
      retryStrategy(times) {
        if (times > 5) return null; // stop retrying
        return Math.min(times * 200, 2000);
      },
      lazyConnect: true,
    });
    // Attach error handler BEFORE connect to prevent unhandled error events
    redisInstance.on('error', (err) => {
      logger.debug({ err: err.message }, 'Redis connection error (handled)');
    });
    await redisInstance.connect();
    logger.info('Redis connected');
    return redisInstance;
  } catch (err) {
    logger.warn({ err }, 'Redis not available; using in-memory fallback');
    return undefined;
  }
}

export async function buildApp(options: AppOptions = {}): Promise<AppContext> {
  const app = Fastify({
    logger: false, // We use our own Pino logger
    trustProxy: true,
    bodyLimit: 1_048_576, // 1 MB
  });

  await app.register(cors, {
    origin: true,
    methods: ['GET', 'POST'],
  });

  // Request timing middleware
  app.addHook('onResponse', (req, reply, done) => {
    const route = req.routeOptions?.url ?? req.url;
    httpRequestDuration.observe(
      { method: req.method, route, status_code: String(reply.statusCode) },
      reply.elapsedTime / 1000,
    );
    done();
  });

  app.setErrorHandler((err, req, reply) => {
    if (err.validation || (err.statusCode !== undefined && err.statusCode < 500)) {
      return sendFailure(reply, { errorCode: 'VALIDATION_ERROR', errorMessage: err.message });
    }
    logger.error({ err, method: req.method, url: req.url }, 'Unhandled request error');
    return sendFailure(reply, { errorCode: 'INTERNAL_ERROR', errorMessage: 'Internal server error' });
  });

  const redis = options.redis === null ? undefined : options.redis ?? (await connectRedis());
  const clock = options.clock ?? Date.now;
  const policy = options.policy ?? loadPolicy();
  const adminApiKey = options.adminApiKey ?? env.security.adminApiKey;

  // ───── Session core ─────
  const store = createConversationStore(redis, clock);
  const pairLock = createPairLock(redis);
  const stateMachine = new StateMachine(clock);
  const lifecycle = new SessionLifecycle(store, stateMachine, clock);
  const continuity = new ContinuityDecider(lifecycle, clock);
  const gate = new AvailabilityGate(lifecycle, pairLock, policy, clock);
  logger.info(
    {
      operatorNicknames: policy.operatorNicknames.length,
      defaultInactiveMinutes: policy.defaultInactiveMinutes,
      defaultQueueLevel: policy.defaultQueueLevel,
    },
    'Session core initialized',
  );

  // ───── Ingestion ─────
  const processor = new BatchProcessor({
    store,
    lifecycle,
    continuity,
    pairLock,
    predicate: options.predicate ?? new MarkerAllowListPredicate(policy),
    notifier: options.notifier ?? createNotifier(),
    policy,
  });

  // ───── Dispatch ─────
  const queue = createTaskQueue(redis);
  const resolver = options.resolver ?? createSendTargetResolver();
  const dispatcher = new TaskDispatcher(store, gate, lifecycle, queue, resolver, policy, clock);

  // ───── Timeout sweeper ─────
  let sweeper: TimeoutSweeper | undefined;
  if (options.enableTimeoutSweep ?? env.timeoutSweep.enabled) {
    sweeper = new TimeoutSweeper(
      () => store.sessions.listNonTerminal(),
      lifecycle,
      pairLock,
      policy.defaultInactiveMinutes,
      env.timeoutSweep.intervalMinutes * 60 * 1000,
      clock,
    );
    sweeper.start();
  }

  // ───── Register Routes ─────
  registerHealthRoutes(app, queue, redis);
  registerSessionRoutes(app, { dispatcher, lifecycle, adminApiKey });
  registerTaskRoutes(app, { dispatcher, adminApiKey });
  registerMessageRoutes(app, { processor, policy, timezone: env.session.timezone, adminApiKey, clock });
  registerTransferRoutes(app, { lifecycle, adminApiKey });

  return { app, redis, sweeper, store, lifecycle, dispatcher };
}
