import { InMemoryConversationStore } from '../../src/store/memory-store';
import { StoreError } from '../../src/errors';
import { MessageRecord, SessionRecord } from '../../src/store/types';

function session(overrides: Partial<SessionRecord> = {}): SessionRecord {
  return {
    sessionId: 'sess_a',
    accountId: 'acc',
    shopName: 'shop',
    taskType: 'AUTO_BARGAIN',
    state: 'ACTIVE',
    createdBy: 'robot',
    priority: 3,
    messageCount: 0,
    createdAt: 100,
    lastActivity: 100,
    ...overrides,
  };
}

function message(overrides: Partial<MessageRecord> = {}): MessageRecord {
  return {
    messageId: 'm-1',
    sessionId: 'sess_a',
    content: 'hello',
    source: 'shop',
    sender: 'customer',
    sentAt: 200,
    storedAt: 300,
    ...overrides,
  };
}

describe('InMemoryConversationStore', () => {
  let store: InMemoryConversationStore;

  beforeEach(() => {
    store = new InMemoryConversationStore(() => 50);
  });

  describe('sessions.insertSuperseding', () => {
    it('should complete every non-terminal session of the pair', async () => {
      await store.sessions.insertSuperseding(session({ sessionId: 'sess_a', state: 'ACTIVE' }), 100);
      await store.sessions.insertSuperseding(session({ sessionId: 'sess_other', shopName: 'other' }), 100);

      const superseded = await store.sessions.insertSuperseding(session({ sessionId: 'sess_b', state: 'PENDING' }), 500);

      expect(superseded).toEqual(['sess_a']);
      const old = await store.sessions.get('sess_a');
      expect(old?.state).toBe('COMPLETED');
      expect(old?.lastActivity).toBe(500);
      expect((await store.sessions.get('sess_other'))?.state).toBe('ACTIVE');
      expect((await store.sessions.get('sess_b'))?.state).toBe('PENDING');
    });

    it('should reject a duplicate session id', async () => {
      await store.sessions.insertSuperseding(session(), 100);
      await expect(store.sessions.insertSuperseding(session(), 100)).rejects.toBeInstanceOf(StoreError);
    });
  });

  describe('sessions.findByPair', () => {
    it('should return matching states, most recently active first', async () => {
      await store.sessions.insertSuperseding(session({ sessionId: 's1', state: 'TIMEOUT', lastActivity: 900 }), 0);
      await store.sessions.insertSuperseding(session({ sessionId: 's2', state: 'ACTIVE', lastActivity: 100 }), 0);
      await store.sessions.insertSuperseding(session({ sessionId: 's3', state: 'TRANSFERRED', lastActivity: 400 }), 0);
      // inserting s3 closed s2; reopen it directly
      await store.sessions.update('s2', { state: 'ACTIVE', lastActivity: 100 });

      const live = await store.sessions.findByPair('acc', 'shop', ['ACTIVE', 'TRANSFERRED']);
      expect(live.map((s) => s.sessionId)).toEqual(['s3', 's2']);
    });
  });

  describe('sessions.update', () => {
    it('should refuse a session outside allowedFrom', async () => {
      await store.sessions.insertSuperseding(session({ state: 'TIMEOUT' }), 0);
      const outcome = await store.sessions.update('sess_a', { state: 'ACTIVE' }, ['PENDING', 'ACTIVE']);
      expect(outcome).toMatchObject({ ok: false, reason: 'state_conflict' });
      expect((await store.sessions.get('sess_a'))?.state).toBe('TIMEOUT');
    });

    it('should report unknown sessions', async () => {
      expect(await store.sessions.update('missing', { state: 'ACTIVE' })).toEqual({ ok: false, reason: 'not_found' });
    });

    it('should return the record before and after the patch', async () => {
      await store.sessions.insertSuperseding(session({ state: 'PENDING' }), 0);
      const outcome = await store.sessions.update('sess_a', { state: 'ACTIVE', lastActivity: 700 });
      expect(outcome.ok).toBe(true);
      if (outcome.ok) {
        expect(outcome.before.state).toBe('PENDING');
        expect(outcome.after.state).toBe('ACTIVE');
        expect(outcome.after.lastActivity).toBe(700);
      }
    });

    it('should hand out copies', async () => {
      await store.sessions.insertSuperseding(session(), 0);
      const copy = await store.sessions.get('sess_a');
      if (copy) copy.state = 'CANCELLED';
      expect((await store.sessions.get('sess_a'))?.state).toBe('ACTIVE');
    });
  });

  describe('sessions.attachMessage', () => {
    it('should store the message, count it and promote PENDING to ACTIVE', async () => {
      await store.sessions.insertSuperseding(session({ state: 'PENDING', lastActivity: 100 }), 0);

      const outcome = await store.sessions.attachMessage(message({ sentAt: 250 }));

      expect(outcome.ok).toBe(true);
      const row = await store.sessions.get('sess_a');
      expect(row?.state).toBe('ACTIVE');
      expect(row?.messageCount).toBe(1);
      expect(row?.lastActivity).toBe(250);
      expect(await store.messages.exists('m-1')).toBe(true);
    });

    it('should never move last activity backwards', async () => {
      await store.sessions.insertSuperseding(session({ lastActivity: 1_000 }), 0);
      await store.sessions.attachMessage(message({ sentAt: 200 }));
      expect((await store.sessions.get('sess_a'))?.lastActivity).toBe(1_000);
    });

    it('should refuse an already stored message id', async () => {
      await store.sessions.insertSuperseding(session(), 0);
      await store.sessions.attachMessage(message());

      expect(await store.sessions.attachMessage(message())).toEqual({ ok: false, reason: 'duplicate' });
      expect((await store.sessions.get('sess_a'))?.messageCount).toBe(1);
      expect(await store.messages.listBySession('sess_a')).toHaveLength(1);
    });

    it('should refuse terminal sessions', async () => {
      await store.sessions.insertSuperseding(session({ state: 'COMPLETED' }), 0);
      const outcome = await store.sessions.attachMessage(message());
      expect(outcome).toMatchObject({ ok: false, reason: 'state_conflict' });
      expect(await store.messages.exists('m-1')).toBe(false);
    });
  });

  describe('tasks', () => {
    it('should assign ids and reject a duplicate external id', async () => {
      const base = {
        sessionId: 'sess_a',
        externalTaskType: 'AUTO_BARGAIN' as const,
        externalTaskId: 'ord-1',
        status: 'NOT_STARTED' as const,
        sendContent: 'hi there',
        queueLevel: 'level3' as const,
        createdAt: 10,
      };
      const created = await store.tasks.create(base);
      expect(created.taskId).toBe('1');

      await expect(store.tasks.create(base)).rejects.toMatchObject({ code: 'DUPLICATE_KEY' });
      expect((await store.tasks.findByExternalId('ord-1'))?.taskId).toBe('1');
    });

    it('should list NOT_STARTED tasks newest first', async () => {
      const make = (externalTaskId: string, createdAt: number) => store.tasks.create({
        sessionId: `sess_${externalTaskId}`,
        externalTaskType: 'AUTO_BARGAIN',
        externalTaskId,
        status: 'NOT_STARTED',
        sendContent: '',
        queueLevel: 'level3',
        createdAt,
      });
      await make('a', 10);
      const b = await make('b', 30);
      await make('c', 20);
      await store.tasks.update(b.taskId, { status: 'DONE', finishedAt: 40 });

      const pending = await store.tasks.listPending(10);
      expect(pending.map((t) => t.externalTaskId)).toEqual(['c', 'a']);
      expect(await store.tasks.listPending(1)).toHaveLength(1);
    });

    it('should refuse a task update from a status outside allowedFrom', async () => {
      const task = await store.tasks.create({
        sessionId: 'sess_a',
        externalTaskType: 'AUTO_BARGAIN',
        externalTaskId: 'once',
        status: 'NOT_STARTED',
        sendContent: '',
        queueLevel: 'level3',
        createdAt: 10,
      });

      expect(await store.tasks.update(task.taskId, { status: 'DONE', finishedAt: 20 }, ['NOT_STARTED']))
        .toMatchObject({ status: 'DONE', finishedAt: 20 });
      expect(await store.tasks.update(task.taskId, { status: 'SKIPPED', finishedAt: 30 }, ['NOT_STARTED'])).toBeNull();
      expect(await store.tasks.get(task.taskId)).toMatchObject({ status: 'DONE', finishedAt: 20 });
    });
  });

  describe('transfers.accept', () => {
    it('should accept a pending transfer once', async () => {
      await store.transfers.append({
        transferId: 'tr-1',
        sessionId: 'sess_a',
        fromType: 'robot',
        toType: 'human',
        reason: 'human_intervention',
        payload: {},
        transferredBy: 'system',
        transferredAt: 10,
        status: 'PENDING',
        urgency: 'HIGH',
      });

      const accepted = await store.transfers.accept('tr-1', 'operator-7', 20);
      expect(accepted).toMatchObject({ status: 'ACCEPTED', acceptedBy: 'operator-7', acceptedAt: 20 });
      expect(await store.transfers.accept('tr-1', 'operator-8', 30)).toBeNull();
      expect(await store.transfers.accept('tr-missing', 'operator-8', 30)).toBeNull();
    });
  });

  describe('shops.ensure', () => {
    it('should fill in a missing shop id and guard its uniqueness', async () => {
      await store.shops.ensure('shop');
      const filled = await store.shops.ensure('shop', 'sid-1');
      expect(filled).toEqual({ shopName: 'shop', shopId: 'sid-1', createdAt: 50 });

      await expect(store.shops.ensure('another', 'sid-1')).rejects.toMatchObject({ code: 'DUPLICATE_KEY' });
    });
  });

  describe('accounts.ensure', () => {
    it('should create once and keep the first record', async () => {
      await store.accounts.ensure('acc', 'acc', 'taotian');
      const again = await store.accounts.ensure('acc', 'renamed', 'other');
      expect(again).toEqual({ accountId: 'acc', displayName: 'acc', platform: 'taotian', isActive: true, createdAt: 50 });
    });
  });
});
