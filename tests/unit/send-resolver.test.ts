import { HttpSendTargetResolver, MockSendTargetResolver } from '../../src/dispatch/send-resolver';
import { TaskRecord } from '../../src/store/types';

const TASK: TaskRecord = {
  taskId: '7',
  sessionId: 'sess_0123456789ab',
  externalTaskType: 'AUTO_BARGAIN',
  externalTaskId: 'ord 1/2',
  status: 'NOT_STARTED',
  sendContent: 'would you take 90?',
  queueLevel: 'level3',
  createdAt: 0,
};

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

describe('MockSendTargetResolver', () => {
  const resolver = new MockSendTargetResolver('https://send.example.test');

  it('should build a deterministic URL from the external task id', async () => {
    expect(await resolver.resolve(TASK)).toEqual({ sendUrl: 'https://send.example.test/orders/ord%201%2F2' });
  });

  it('should only support bargaining tasks', async () => {
    expect(resolver.supports('AUTO_BARGAIN')).toBe(true);
    expect(resolver.supports('AUTO_FOLLOW_UP')).toBe(false);
    expect(await resolver.resolve({ ...TASK, externalTaskType: 'AUTO_FOLLOW_UP' })).toBeNull();
  });
});

describe('HttpSendTargetResolver', () => {
  const resolver = new HttpSendTargetResolver('https://resolver.example.test', 'test-secret', 1_000);

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should query the marketplace with the task type and id', async () => {
    const fetchSpy = jest.spyOn(global, 'fetch').mockResolvedValue(
      json({ send_url: 'https://market.example.test/chat/991', shop_name: 'market-shop' }),
    );

    expect(await resolver.resolve(TASK)).toEqual({
      sendUrl: 'https://market.example.test/chat/991',
      shopName: 'market-shop',
    });
    const [url, init] = fetchSpy.mock.calls[0];
    expect(url).toBe('https://resolver.example.test/send-targets?task_type=auto_bargain&external_task_id=ord+1%2F2');
    expect(init?.headers).toEqual({ Authorization: 'Bearer test-secret', Accept: 'application/json' });
  });

  it('should treat an empty send_url as no target', async () => {
    jest.spyOn(global, 'fetch').mockResolvedValue(json({ send_url: '' }));
    expect(await resolver.resolve(TASK)).toBeNull();
  });

  it('should throw on a malformed response', async () => {
    jest.spyOn(global, 'fetch').mockResolvedValue(json({ url: 'x' }));
    await expect(resolver.resolve(TASK)).rejects.toThrow('Send-target response has no send_url');
  });

  it('should throw on an HTTP error', async () => {
    jest.spyOn(global, 'fetch').mockResolvedValue(new Response('busy', { status: 503 }));
    await expect(resolver.resolve(TASK)).rejects.toThrow('Send-target API 503: busy');
  });

  it('should not call out for unsupported task types', async () => {
    const fetchSpy = jest.spyOn(global, 'fetch');
    expect(await resolver.resolve({ ...TASK, externalTaskType: 'AUTO_FOLLOW_UP' })).toBeNull();
    expect(fetchSpy).not.toHaveBeenCalled();
  });
});
