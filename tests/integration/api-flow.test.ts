import { buildApp, AppContext } from '../../src/app';
import { MockSendTargetResolver } from '../../src/dispatch/send-resolver';
import { ACCOUNT, CUSTOMER, FakeClock, RecordingNotifier, SHOP, testPolicy } from '../support/fixtures';

const ADMIN_KEY = 'test-secret';
const auth = { 'x-admin-api-key': ADMIN_KEY };

describe('API Integration Flow', () => {
  let ctx: AppContext;
  let clock: FakeClock;
  let notifier: RecordingNotifier;

  beforeAll(async () => {
    process.env.NODE_ENV = 'test';
    clock = new FakeClock();
    notifier = new RecordingNotifier();
    ctx = await buildApp({
      redis: null,
      clock: clock.fn,
      policy: testPolicy(),
      notifier,
      resolver: new MockSendTargetResolver(),
      adminApiKey: ADMIN_KEY,
      enableTimeoutSweep: false,
    });
    await ctx.app.ready();
  });

  afterAll(async () => {
    await ctx.app.close();
  });

  describe('probes', () => {
    it('GET /health should return ok', async () => {
      const res = await ctx.app.inject({ method: 'GET', url: '/health' });
      expect(res.statusCode).toBe(200);
      expect(res.json().status).toBe('ok');
    });

    it('GET /ready should report the in-memory backends', async () => {
      const res = await ctx.app.inject({ method: 'GET', url: '/ready' });
      expect(res.statusCode).toBe(200);
      const body = res.json();
      expect(body.status).toBe('ready');
      expect(body.checks).toEqual({ redis: { status: 'skipped' }, queue: { status: 'ok' } });
      expect(body.queueDepth).toEqual({ level1: 0, level2: 0, level3: 0, level4: 0, level5: 0 });
    });
  });

  describe('admin key', () => {
    it('should refuse mutating calls without the key', async () => {
      const res = await ctx.app.inject({ method: 'POST', url: '/api/sessions/create', payload: {} });
      expect(res.statusCode).toBe(403);
      expect(res.json()).toEqual({ success: false, message: 'Forbidden', error_code: 'FORBIDDEN' });
    });

    it('should leave read-only calls open', async () => {
      const res = await ctx.app.inject({ method: 'GET', url: '/api/tasks/pending' });
      expect(res.statusCode).toBe(200);
    });
  });

  describe('robot task round trip', () => {
    let sessionId: string;

    it('POST /api/sessions/create should open a session and queue its task', async () => {
      const res = await ctx.app.inject({
        method: 'POST',
        url: '/api/sessions/create',
        headers: auth,
        payload: {
          account_id: ACCOUNT,
          shop_name: SHOP,
          task_type: 'auto_bargain',
          external_task_id: 'ord-100',
          send_content: 'would you take 90 for it?',
          priority_level: 'level2',
        },
      });

      expect(res.statusCode).toBe(200);
      const body = res.json();
      expect(body.success).toBe(true);
      expect(body.data).toMatchObject({ task_id: '1', priority_level: 'level2' });
      sessionId = body.data.session_id;
      expect(sessionId).toMatch(/^sess_[0-9a-f]{12}$/);
    });

    it('should refuse a second robot task on the same pair', async () => {
      const res = await ctx.app.inject({
        method: 'POST',
        url: '/api/sessions/create',
        headers: auth,
        payload: {
          account_id: ACCOUNT,
          shop_name: SHOP,
          task_type: 'auto_bargain',
          external_task_id: 'ord-101',
          send_content: 'second try',
        },
      });

      expect(res.statusCode).toBe(409);
      expect(res.json()).toEqual({
        success: false,
        message: 'an automated session is already running',
        error_code: 'UNAVAILABLE',
        data: { conflicting_session_id: sessionId, session_id: null, task_id: null },
      });
    });

    it('GET /api/tasks/pending should list the task', async () => {
      const res = await ctx.app.inject({ method: 'GET', url: '/api/tasks/pending?limit=5' });
      const body = res.json();
      expect(body.data.count).toBe(1);
      expect(body.data.tasks[0]).toMatchObject({
        task_id: '1',
        session_id: sessionId,
        task_type: 'auto_bargain',
        task_status: 0,
        priority_level: 'level2',
        account_id: ACCOUNT,
        shop_name: SHOP,
      });
    });

    it('GET /api/tasks/next_id should pop the queue', async () => {
      const first = await ctx.app.inject({ method: 'GET', url: '/api/tasks/next_id', headers: auth });
      expect(first.json().data.task_id).toBe('1');

      const empty = await ctx.app.inject({ method: 'GET', url: '/api/tasks/next_id', headers: auth });
      expect(empty.statusCode).toBe(200);
      expect(empty.json()).toEqual({
        success: false,
        message: 'No task is waiting',
        error_code: 'NO_TASK',
        data: { task_id: null },
      });
    });

    it('GET /api/tasks/:taskId/send_info should resolve the destination', async () => {
      const res = await ctx.app.inject({ method: 'GET', url: '/api/tasks/1/send_info', headers: auth });
      expect(res.json().data).toEqual({
        task_id: '1',
        send_content: 'would you take 90 for it?',
        send_url: 'https://send.example.test/orders/ord-100',
        shop_name: SHOP,
      });
    });

    it('POST /api/sessions/:sessionId/complete should close the task', async () => {
      const res = await ctx.app.inject({
        method: 'POST',
        url: `/api/sessions/${sessionId}/complete`,
        headers: auth,
        payload: { success: true },
      });
      expect(res.statusCode).toBe(200);
      expect(res.json().data).toEqual({ session_id: sessionId, success: true });

      const again = await ctx.app.inject({
        method: 'POST',
        url: `/api/sessions/${sessionId}/complete`,
        headers: auth,
        payload: { success: true },
      });
      expect(again.statusCode).toBe(404);
      expect(again.json().error_code).toBe('COMPLETE_FAILED');
    });

    it('GET /api/sessions/:sessionId/status should show the outcome', async () => {
      const res = await ctx.app.inject({ method: 'GET', url: `/api/sessions/${sessionId}/status` });
      expect(res.json().data).toMatchObject({
        session_id: sessionId,
        task_id: '1',
        task_status: 1,
        session_state: 'active',
        shop_name: SHOP,
      });
    });

    it('POST /api/messages/batch should detect a human taking over', async () => {
      const res = await ctx.app.inject({
        method: 'POST',
        url: '/api/messages/batch',
        headers: auth,
        payload: {
          shop_name: SHOP,
          platform: 'taotian',
          messages: [
            { id: 'm-1', nick: CUSTOMER, time: '2024-05-01 12:00:00', content: 'this is broken' },
            { id: 'm-2', nick: ACCOUNT, time: '2024-05-01 12:00:30', content: 'sorry, I will sort it out myself' },
          ],
        },
      });

      expect(res.statusCode).toBe(200);
      expect(res.json().data).toEqual({
        processed_messages: 2,
        skipped_messages: 0,
        active_session_id: sessionId,
        session_operations: ['joined_session', 'human_intervention', 'notified_human'],
        errors: [],
      });
      expect(notifier.sent.map((n) => n.reason)).toEqual(['intervention']);
    });

    it('GET /api/sessions/pair should show the human-owned session', async () => {
      const res = await ctx.app.inject({
        method: 'GET',
        url: `/api/sessions/pair?account_id=${ACCOUNT}&shop_name=${SHOP}`,
      });
      expect(res.json().data).toMatchObject({
        account_id: ACCOUNT,
        shop_name: SHOP,
        has_live_session: true,
        live_session: { session_id: sessionId, state: 'transferred', created_by: 'human', message_count: 2 },
      });
    });

    it('POST /api/transfers/:transferId/accept should accept once', async () => {
      const [transfer] = await ctx.store.transfers.listBySession(sessionId);

      const res = await ctx.app.inject({
        method: 'POST',
        url: `/api/transfers/${transfer.transferId}/accept`,
        headers: auth,
        payload: { accepted_by: 'operator-7' },
      });
      expect(res.json().data).toMatchObject({
        transfer_id: transfer.transferId,
        from_type: 'robot',
        to_type: 'human',
        urgency: 'high',
        status: 'accepted',
        accepted_by: 'operator-7',
      });

      const again = await ctx.app.inject({
        method: 'POST',
        url: `/api/transfers/${transfer.transferId}/accept`,
        headers: auth,
        payload: { accepted_by: 'operator-8' },
      });
      expect(again.statusCode).toBe(404);
      expect(again.json().error_code).toBe('TRANSFER_NOT_FOUND');
    });

    it('POST /api/sessions/:sessionId/control should hand the session back', async () => {
      const res = await ctx.app.inject({
        method: 'POST',
        url: `/api/sessions/${sessionId}/control`,
        headers: auth,
        payload: { owner: 'robot', reason: 'operator_release', operator_id: 'operator-7' },
      });
      expect(res.json().data).toEqual({ session_id: sessionId, owner: 'robot', state: 'active' });
    });
  });

  describe('error responses', () => {
    it('should reject a create request missing required fields', async () => {
      const res = await ctx.app.inject({
        method: 'POST',
        url: '/api/sessions/create',
        headers: auth,
        payload: { account_id: ACCOUNT },
      });
      expect(res.statusCode).toBe(400);
      expect(res.json().error_code).toBe('VALIDATION_ERROR');
      expect(res.json().message).toMatch(/^Invalid input: /);
    });

    it('should reject an unknown task type', async () => {
      const res = await ctx.app.inject({
        method: 'POST',
        url: '/api/sessions/create',
        headers: auth,
        payload: {
          account_id: ACCOUNT,
          shop_name: 'other-shop',
          task_type: 'refund',
          external_task_id: 'ord-200',
          send_content: 'x',
        },
      });
      expect(res.statusCode).toBe(400);
      expect(res.json().error_code).toBe('UNKNOWN_TASK_TYPE');
    });

    it('should report an unknown session', async () => {
      const res = await ctx.app.inject({ method: 'GET', url: '/api/sessions/sess_000000000000/status' });
      expect(res.statusCode).toBe(404);
      expect(res.json().error_code).toBe('SESSION_NOT_FOUND');
    });

    it('should reject a batch without the operator account', async () => {
      const res = await ctx.app.inject({
        method: 'POST',
        url: '/api/messages/batch',
        headers: auth,
        payload: { shop_name: SHOP, platform: 'taotian', messages: [{ id: 'm-9', nick: CUSTOMER, content: 'hi' }] },
      });
      expect(res.statusCode).toBe(400);
      expect(res.json().message).toBe('No operator account found in messages for platform "taotian"');
    });

    it('should reject a malformed JSON body', async () => {
      const res = await ctx.app.inject({
        method: 'POST',
        url: '/api/messages/batch',
        headers: { ...auth, 'content-type': 'application/json' },
        payload: '{not json',
      });
      expect(res.statusCode).toBe(400);
      expect(res.json().error_code).toBe('VALIDATION_ERROR');
    });

    it('should reject an out-of-range pending limit', async () => {
      const res = await ctx.app.inject({ method: 'GET', url: '/api/tasks/pending?limit=0' });
      expect(res.statusCode).toBe(400);
    });
  });

  describe('customer-only batch', () => {
    const QUIET_SHOP = 'quiet-shop';

    it('should open a human session when the account is given explicitly', async () => {
      const res = await ctx.app.inject({
        method: 'POST',
        url: '/api/messages/batch',
        headers: auth,
        payload: {
          shop_name: QUIET_SHOP,
          platform: 'taotian',
          account_id: ACCOUNT,
          messages: [
            { id: 'c-1', nick: CUSTOMER, content: 'hello' },
            { id: 'c-2', nick: CUSTOMER, content: 'is this still available?' },
            { id: 'c-3', nick: CUSTOMER, content: 'can you ship today?' },
          ],
        },
      });

      expect(res.statusCode).toBe(200);
      const data = res.json().data;
      expect(data).toMatchObject({
        processed_messages: 3,
        skipped_messages: 0,
        session_operations: ['created_session', 'notified_human'],
        errors: [],
      });
      expect(notifier.sent[notifier.sent.length - 1]).toMatchObject({
        reason: 'new_conversation',
        sessionId: data.active_session_id,
        shopName: QUIET_SHOP,
      });

      const pair = await ctx.app.inject({
        method: 'GET',
        url: `/api/sessions/pair?account_id=${ACCOUNT}&shop_name=${QUIET_SHOP}`,
      });
      expect(pair.json().data.live_session).toMatchObject({
        session_id: data.active_session_id,
        state: 'transferred',
        created_by: 'human',
        message_count: 3,
      });
    });
  });
});
