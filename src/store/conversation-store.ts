import Redis from 'ioredis';
import { env } from '../config/env';
import { logger } from '../observability/logger';
import { InMemoryConversationStore } from './memory-store';
import { RedisConversationStore } from './redis-store';
import { ConversationStore } from './types';

// ───── Factory ──────────────────────────────────────────────────

export function createConversationStore(redis?: Redis, clock: () => number = Date.now): ConversationStore {
  if (redis) {
    logger.info({ keyPrefix: env.redis.keyPrefix }, 'Conversation store: Redis-backed');
    return new RedisConversationStore(redis, env.redis.keyPrefix, clock);
  }
  logger.info('Conversation store: In-memory');
  return new InMemoryConversationStore(clock);
}
