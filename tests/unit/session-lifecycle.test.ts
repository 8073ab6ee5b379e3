import { newSessionId } from '../../src/session/session-lifecycle';
import { NewSessionSpec } from '../../src/session/types';
import { ACCOUNT, FakeClock, MINUTE, SHOP, T0, buildSessionCore } from '../support/fixtures';

const ROBOT_SESSION: NewSessionSpec = {
  accountId: ACCOUNT,
  shopName: SHOP,
  taskType: 'AUTO_BARGAIN',
  initialState: 'PENDING',
  createdBy: 'robot',
  priority: 3,
  externalTaskId: 'ord-1',
};

describe('SessionLifecycle', () => {
  let clock: FakeClock;
  let core: ReturnType<typeof buildSessionCore>;

  beforeEach(() => {
    clock = new FakeClock();
    core = buildSessionCore(clock);
  });

  it('should generate prefixed session ids', () => {
    expect(newSessionId()).toMatch(/^sess_[0-9a-f]{12}$/);
  });

  describe('create', () => {
    it('should supersede the live session of the pair', async () => {
      const first = await core.lifecycle.create({ ...ROBOT_SESSION, initialState: 'ACTIVE' });
      clock.advance(MINUTE);
      const second = await core.lifecycle.create({ ...ROBOT_SESSION, externalTaskId: 'ord-2' });

      const old = await core.lifecycle.get(first.sessionId);
      expect(old?.state).toBe('COMPLETED');
      expect(old?.lastActivity).toBe(T0 + MINUTE);
      expect(second).toMatchObject({ state: 'PENDING', messageCount: 0, createdAt: T0 + MINUTE });

      const ops = await core.store.operations.listBySession(first.sessionId);
      expect(ops.map((o) => o.operationType)).toEqual(['create', 'supersede']);
      expect(ops[1].payload).toEqual({ supersededBy: second.sessionId });
    });

    it('should leave at most one live session per pair', async () => {
      await core.lifecycle.create({ ...ROBOT_SESSION, initialState: 'ACTIVE' });
      await core.lifecycle.create({ ...ROBOT_SESSION, initialState: 'TRANSFERRED', createdBy: 'human' });
      await core.lifecycle.create({ ...ROBOT_SESSION, initialState: 'ACTIVE' });

      const live = await core.store.sessions.findByPair(ACCOUNT, SHOP, ['ACTIVE', 'TRANSFERRED']);
      expect(live).toHaveLength(1);
    });
  });

  describe('attachMessage', () => {
    it('should promote PENDING to ACTIVE and follow the message timestamp', async () => {
      const session = await core.lifecycle.create(ROBOT_SESSION);
      const sentAt = T0 + 5 * MINUTE;

      const attached = await core.lifecycle.attachMessage(session.sessionId, {
        messageId: 'm-1',
        content: 'is the price negotiable?',
        source: 'shop',
        sender: 'customer-a',
        sentAt,
      });

      expect(attached).toBe(true);
      const after = await core.lifecycle.get(session.sessionId);
      expect(after).toMatchObject({ state: 'ACTIVE', messageCount: 1, lastActivity: sentAt });
    });

    it('should return false for an unknown session', async () => {
      const attached = await core.lifecycle.attachMessage('sess_missing', {
        messageId: 'm-1',
        content: 'x',
        source: 'shop',
        sentAt: T0,
      });
      expect(attached).toBe(false);
      expect(await core.store.messages.exists('m-1')).toBe(false);
    });

    it('should return false for a terminal session', async () => {
      const session = await core.lifecycle.create(ROBOT_SESSION);
      await core.lifecycle.finish(session.sessionId, 'CANCELLED', 'test');

      const attached = await core.lifecycle.attachMessage(session.sessionId, {
        messageId: 'm-1',
        content: 'x',
        source: 'shop',
        sentAt: T0,
      });
      expect(attached).toBe(false);
    });
  });

  describe('switchControl', () => {
    it('should round-trip robot -> human -> robot with two transfer records', async () => {
      const session = await core.lifecycle.create({ ...ROBOT_SESSION, initialState: 'ACTIVE' });

      clock.advance(MINUTE);
      expect(await core.lifecycle.switchControl(session.sessionId, 'human', 'customer_asked', {
        operatorId: 'operator-7',
        urgency: 'HIGH',
      })).toBe(true);
      const handedOver = await core.lifecycle.get(session.sessionId);
      expect(handedOver).toMatchObject({
        state: 'TRANSFERRED',
        createdBy: 'human',
        transferredAt: T0 + MINUTE,
        lastActivity: T0 + MINUTE,
        transferReason: 'customer_asked',
      });

      clock.advance(MINUTE);
      expect(await core.lifecycle.switchControl(session.sessionId, 'robot', 'operator_release')).toBe(true);
      const handedBack = await core.lifecycle.get(session.sessionId);
      expect(handedBack).toMatchObject({ state: 'ACTIVE', createdBy: 'robot', transferReason: 'operator_release' });

      const transfers = await core.store.transfers.listBySession(session.sessionId);
      expect(transfers.map((t) => [t.fromType, t.toType, t.urgency, t.transferredBy])).toEqual([
        ['robot', 'human', 'HIGH', 'operator-7'],
        ['human', 'robot', 'MEDIUM', 'system'],
      ]);
      expect(transfers.every((t) => t.status === 'PENDING')).toBe(true);
    });

    it('should take a PENDING session straight to TRANSFERRED', async () => {
      const session = await core.lifecycle.create(ROBOT_SESSION);
      expect(await core.lifecycle.switchControl(session.sessionId, 'human', 'takeover')).toBe(true);
      expect((await core.lifecycle.get(session.sessionId))?.state).toBe('TRANSFERRED');
    });

    it('should return false for unknown and terminal sessions', async () => {
      expect(await core.lifecycle.switchControl('sess_missing', 'human', 'x')).toBe(false);

      const session = await core.lifecycle.create(ROBOT_SESSION);
      await core.lifecycle.markTimedOut(session.sessionId);
      expect(await core.lifecycle.switchControl(session.sessionId, 'human', 'x')).toBe(false);
      expect(await core.store.transfers.listBySession(session.sessionId)).toEqual([]);
    });
  });

  describe('termination', () => {
    it('should never leave a terminal state', async () => {
      const session = await core.lifecycle.create({ ...ROBOT_SESSION, initialState: 'ACTIVE' });
      expect(await core.lifecycle.finish(session.sessionId, 'COMPLETED', 'done')).toBe(true);
      expect(await core.lifecycle.markTimedOut(session.sessionId)).toBe(false);
      expect(await core.lifecycle.finish(session.sessionId, 'CANCELLED', 'late')).toBe(false);
      expect((await core.lifecycle.get(session.sessionId))?.state).toBe('COMPLETED');
    });

    it('should stamp timeoutAt when timing out', async () => {
      const session = await core.lifecycle.create(ROBOT_SESSION);
      clock.advance(10 * MINUTE);
      await core.lifecycle.markTimedOut(session.sessionId);
      expect(await core.lifecycle.get(session.sessionId)).toMatchObject({ state: 'TIMEOUT', timeoutAt: T0 + 10 * MINUTE });
    });
  });

  describe('markActive', () => {
    it('should promote PENDING and leave a human-owned session alone', async () => {
      const robot = await core.lifecycle.create(ROBOT_SESSION);
      expect(await core.lifecycle.markActive(robot.sessionId, 'task_sent')).toBe(true);
      expect((await core.lifecycle.get(robot.sessionId))?.state).toBe('ACTIVE');

      await core.lifecycle.switchControl(robot.sessionId, 'human', 'takeover');
      expect(await core.lifecycle.markActive(robot.sessionId, 'task_sent')).toBe(false);
      expect((await core.lifecycle.get(robot.sessionId))?.state).toBe('TRANSFERRED');
    });
  });

  describe('acceptTransfer', () => {
    it('should accept a pending transfer once', async () => {
      const session = await core.lifecycle.create({ ...ROBOT_SESSION, initialState: 'ACTIVE' });
      await core.lifecycle.switchControl(session.sessionId, 'human', 'takeover');
      const [transfer] = await core.store.transfers.listBySession(session.sessionId);

      clock.advance(MINUTE);
      const accepted = await core.lifecycle.acceptTransfer(transfer.transferId, 'operator-7');
      expect(accepted).toMatchObject({ status: 'ACCEPTED', acceptedBy: 'operator-7', acceptedAt: T0 + MINUTE });
      expect(await core.lifecycle.acceptTransfer(transfer.transferId, 'operator-8')).toBeNull();
    });
  });

  describe('getPairStatus', () => {
    it('should report the live session of the pair', async () => {
      expect(await core.lifecycle.getPairStatus(ACCOUNT, SHOP)).toEqual({
        accountId: ACCOUNT,
        shopName: SHOP,
        hasLiveSession: false,
        liveSession: null,
      });

      const session = await core.lifecycle.create({ ...ROBOT_SESSION, initialState: 'ACTIVE' });
      const status = await core.lifecycle.getPairStatus(ACCOUNT, SHOP);
      expect(status.hasLiveSession).toBe(true);
      expect(status.liveSession?.sessionId).toBe(session.sessionId);
    });
  });
});
