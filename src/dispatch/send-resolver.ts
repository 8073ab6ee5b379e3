import { TaskType } from '../config/types';
import { env } from '../config/env';
import { TASK_TYPE_CODES } from '../store/codec';
import { TaskRecord } from '../store/types';
import { logger } from '../observability/logger';

export interface SendTarget {
  sendUrl: string;
  /** Shop the marketplace reports for the order, when it reports one */
  shopName?: string;
}

/**
 * Looks up where a task's content must be sent. Marketplace failures are
 * thrown; an unsupported task type resolves to null.
 */
export interface SendTargetResolver {
  supports(taskType: TaskType): boolean;
  resolve(task: TaskRecord): Promise<SendTarget | null>;
}

/** Task types the marketplace can resolve a send URL for */
const RESOLVABLE: readonly TaskType[] = ['AUTO_BARGAIN'];

// ───── HTTP ─────────────────────────────────────────────────────

export class HttpSendTargetResolver implements SendTargetResolver {
  private readonly log = logger.child({ component: 'send-resolver' });

  constructor(
    private readonly baseUrl: string,
    private readonly apiKey: string,
    private readonly timeoutMs: number,
  ) {}

  supports(taskType: TaskType): boolean {
    return RESOLVABLE.includes(taskType);
  }

  async resolve(task: TaskRecord): Promise<SendTarget | null> {
    if (!this.supports(task.externalTaskType)) return null;

    const query = new URLSearchParams({
      task_type: TASK_TYPE_CODES[task.externalTaskType],
      external_task_id: task.externalTaskId,
    });
    const body = await this.apiCall(`/send-targets?${query.toString()}`);
    if (typeof body !== 'object' || body === null || !('send_url' in body)) {
      throw new Error('Send-target response has no send_url');
    }
    if (typeof body.send_url !== 'string' || !body.send_url) return null;

    const shopName = 'shop_name' in body && typeof body.shop_name === 'string' ? body.shop_name : undefined;
    return { sendUrl: body.send_url, shopName };
  }

  private async apiCall(path: string): Promise<unknown> {
    const url = `${this.baseUrl}${path}`;
    const log = this.log.child({ path });

    const res = await fetch(url, {
      method: 'GET',
      headers: {
        Authorization: `Bearer ${this.apiKey}`,
        Accept: 'application/json',
      },
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!res.ok) {
      const errBody = await res.text();
      log.error({ status: res.status, errBody }, 'Send-target API error');
      throw new Error(`Send-target API ${res.status}: ${errBody}`);
    }
    return res.json();
  }
}

// ───── Mock ─────────────────────────────────────────────────────

/**
 * Mock resolver for local development and testing. Builds a deterministic
 * URL from the external task id.
 */
export class MockSendTargetResolver implements SendTargetResolver {
  constructor(private readonly baseUrl = 'https://send.example.test') {}

  supports(taskType: TaskType): boolean {
    return RESOLVABLE.includes(taskType);
  }

  async resolve(task: TaskRecord): Promise<SendTarget | null> {
    if (!this.supports(task.externalTaskType)) return null;
    logger.info({ taskId: task.taskId }, '[MOCK] Send target resolved');
    return { sendUrl: `${this.baseUrl}/orders/${encodeURIComponent(task.externalTaskId)}` };
  }
}

// ───── Factory ──────────────────────────────────────────────────

export function createSendTargetResolver(): SendTargetResolver {
  if (env.resolver.baseUrl && !env.isDev) {
    logger.info('Using marketplace send-target resolver');
    return new HttpSendTargetResolver(env.resolver.baseUrl, env.resolver.apiKey, env.resolver.timeoutMs);
  }
  logger.info('Using mock send-target resolver (development mode)');
  return new MockSendTargetResolver();
}
