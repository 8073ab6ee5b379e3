import dotenv from 'dotenv';
import path from 'path';

// Resolve .env from project root (handles running from any CWD)
const projectRoot = path.resolve(__dirname, '..', '..');
dotenv.config({ path: path.join(projectRoot, '.env') });

function optional(key: string, fallback: string): string {
  return process.env[key] || fallback;
}

function optionalInt(key: string, fallback: number): number {
  const val = process.env[key];
  return val ? parseInt(val, 10) : fallback;
}

function optionalBool(key: string, fallback: boolean): boolean {
  const val = process.env[key];
  if (!val) return fallback;
  return val === 'true' || val === '1';
}

function optionalList(key: string): string[] {
  const val = process.env[key];
  if (!val) return [];
  return val.split(',').map((s) => s.trim()).filter((s) => s.length > 0);
}

export const env = {
  projectRoot,
  nodeEnv: optional('NODE_ENV', 'development'),
  port: optionalInt('PORT', 8000),
  host: optional('HOST', '0.0.0.0'),

  redis: {
    enabled: optionalBool('REDIS_ENABLED', true),
    url: optional('REDIS_URL', 'redis://localhost:6379'),
    keyPrefix: optional('REDIS_KEY_PREFIX', 'relay:'),
  },

  // ───── Session Policy ─────
  session: {
    policyFile: optional('POLICY_FILE', path.join('config', 'automation.json')),
    defaultInactiveMinutes: optionalInt('SESSION_DEFAULT_INACTIVE_MINUTES', 120),
    defaultQueueLevel: optional('SESSION_DEFAULT_QUEUE_LEVEL', 'level3'),
    timezone: optional('SESSION_TIMEZONE', 'Asia/Shanghai'),
    operatorNicknames: optionalList('OPERATOR_NICKNAMES'),
    automationMarker: optional('AUTOMATION_MARKER', ''),
    pairLockTtlMs: optionalInt('PAIR_LOCK_TTL_MS', 10_000),
  },

  timeoutSweep: {
    enabled: optionalBool('TIMEOUT_SWEEP_ENABLED', false),
    intervalMinutes: optionalInt('TIMEOUT_SWEEP_INTERVAL_MINUTES', 5),
  },

  // ───── Human Notification ─────
  notify: {
    webhookUrl: optional('NOTIFY_WEBHOOK_URL', ''),
    maxRetries: optionalInt('NOTIFY_MAX_RETRIES', 3),
    baseDelayMs: optionalInt('NOTIFY_BASE_DELAY_MS', 1000),
  },

  // ───── Marketplace Send-Target Resolver ─────
  resolver: {
    baseUrl: optional('RESOLVER_BASE_URL', ''),
    apiKey: optional('RESOLVER_API_KEY', ''),
    timeoutMs: optionalInt('RESOLVER_TIMEOUT_MS', 10_000),
  },

  security: {
    adminApiKey: optional('ADMIN_API_KEY', ''),
  },

  observability: {
    enableMetrics: optionalBool('METRICS_ENABLED', true),
  },

  get isDev(): boolean {
    return this.nodeEnv === 'development' || this.nodeEnv === 'test';
  },
} as const;
