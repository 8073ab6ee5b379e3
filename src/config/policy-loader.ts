import * as fs from 'fs';
import * as path from 'path';
import Ajv from 'ajv';
import { AutomationPolicy, TaskType, isQueueLevel } from './types';
import { env } from './env';
import { logger } from '../observability/logger';

interface PolicyFile {
  operatorNicknames?: string[];
  automationMarker?: string;
  taskPriority?: Partial<Record<TaskType, number>>;
  accountNickPrefix?: Record<string, string>;
}

const ajv = new Ajv({ allErrors: true });

const validatePolicyFile = ajv.compile<PolicyFile>({
  type: 'object',
  properties: {
    operatorNicknames: { type: 'array', items: { type: 'string', minLength: 1 } },
    automationMarker: { type: 'string', minLength: 1 },
    taskPriority: {
      type: 'object',
      propertyNames: {
        enum: ['MANUAL_CUSTOMER_SERVICE', 'MANUAL_COMPLAINT', 'MANUAL_URGENT', 'AUTO_BARGAIN', 'AUTO_FOLLOW_UP'],
      },
      additionalProperties: { type: 'integer', minimum: 1, maximum: 5 },
    },
    accountNickPrefix: {
      type: 'object',
      additionalProperties: { type: 'string', minLength: 1 },
    },
  },
  additionalProperties: false,
});

export const DEFAULT_POLICY: AutomationPolicy = Object.freeze({
  operatorNicknames: [],
  automationMarker: 'hi',
  taskPriority: Object.freeze({
    MANUAL_URGENT: 1,
    MANUAL_CUSTOMER_SERVICE: 2,
    MANUAL_COMPLAINT: 2,
    AUTO_BARGAIN: 3,
    AUTO_FOLLOW_UP: 4,
  }),
  accountNickPrefix: Object.freeze({ taotian: 't-' }),
  defaultInactiveMinutes: 120,
  defaultQueueLevel: 'level3',
});

/** Build a frozen policy from defaults plus the given overrides. */
export function buildPolicy(overrides: Partial<AutomationPolicy> = {}): AutomationPolicy {
  return Object.freeze({
    ...DEFAULT_POLICY,
    ...overrides,
    operatorNicknames: Object.freeze([...(overrides.operatorNicknames ?? DEFAULT_POLICY.operatorNicknames)]),
    taskPriority: Object.freeze({ ...DEFAULT_POLICY.taskPriority, ...overrides.taskPriority }),
    accountNickPrefix: Object.freeze({ ...DEFAULT_POLICY.accountNickPrefix, ...overrides.accountNickPrefix }),
  });
}

/**
 * Load the automation policy: JSON file first, then environment overrides.
 * A missing file falls back to the built-in defaults; an invalid one fails startup.
 */
export function loadPolicy(filePath: string = env.session.policyFile): AutomationPolicy {
  const resolved = path.isAbsolute(filePath) ? filePath : path.resolve(env.projectRoot, filePath);
  let fromFile: PolicyFile = {};

  if (fs.existsSync(resolved)) {
    const parsed: unknown = JSON.parse(fs.readFileSync(resolved, 'utf-8'));
    if (!validatePolicyFile(parsed)) {
      const errors = validatePolicyFile.errors?.map((e) => `${e.instancePath} ${e.message}`).join('; ');
      throw new Error(`Invalid automation policy ${resolved}: ${errors}`);
    }
    fromFile = parsed;
    logger.info({ file: resolved }, 'Loaded automation policy');
  } else {
    logger.warn({ file: resolved }, 'Automation policy file not found; using built-in defaults');
  }

  const queueLevel = env.session.defaultQueueLevel;
  if (!isQueueLevel(queueLevel)) {
    throw new Error(`SESSION_DEFAULT_QUEUE_LEVEL must be level1..level5, got "${queueLevel}"`);
  }

  const nicknames = env.session.operatorNicknames.length > 0
    ? env.session.operatorNicknames
    : fromFile.operatorNicknames;

  return buildPolicy({
    operatorNicknames: nicknames,
    automationMarker: env.session.automationMarker || fromFile.automationMarker || DEFAULT_POLICY.automationMarker,
    taskPriority: { ...DEFAULT_POLICY.taskPriority, ...fromFile.taskPriority },
    accountNickPrefix: { ...DEFAULT_POLICY.accountNickPrefix, ...fromFile.accountNickPrefix },
    defaultInactiveMinutes: env.session.defaultInactiveMinutes,
    defaultQueueLevel: queueLevel,
  });
}
