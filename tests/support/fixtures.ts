import { buildPolicy } from '../../src/config/policy-loader';
import { AutomationPolicy } from '../../src/config/types';
import { HumanNotification, Notifier } from '../../src/notify/notifier';
import { InMemoryConversationStore } from '../../src/store/memory-store';
import { AvailabilityGate } from '../../src/session/availability-gate';
import { ContinuityDecider } from '../../src/session/continuity';
import { InMemoryPairLock } from '../../src/session/pair-lock';
import { SessionLifecycle } from '../../src/session/session-lifecycle';
import { StateMachine } from '../../src/session/state-machine';

export const ACCOUNT = 't-1000000000001-0';
export const OTHER_OPERATOR = 't-1000000000002-0';
export const SHOP = 'test-shop';
export const CUSTOMER = 'customer-a';

/** 2024-05-01T04:00:00.000Z */
export const T0 = Date.UTC(2024, 4, 1, 4, 0, 0);
export const MINUTE = 60 * 1000;

/** Manually advanced clock shared by every component under test */
export class FakeClock {
  constructor(public now: number = T0) {}

  readonly fn = (): number => this.now;

  advance(ms: number): void {
    this.now += ms;
  }
}

export function testPolicy(overrides: Partial<AutomationPolicy> = {}): AutomationPolicy {
  return buildPolicy({
    operatorNicknames: [ACCOUNT, OTHER_OPERATOR],
    automationMarker: 'hi',
    ...overrides,
  });
}

export class RecordingNotifier implements Notifier {
  readonly sent: HumanNotification[] = [];

  async notifyHuman(notification: HumanNotification): Promise<void> {
    this.sent.push(notification);
  }
}

export function buildSessionCore(clock: FakeClock, policy: AutomationPolicy = testPolicy()) {
  const store = new InMemoryConversationStore(clock.fn);
  const pairLock = new InMemoryPairLock();
  const lifecycle = new SessionLifecycle(store, new StateMachine(clock.fn), clock.fn);
  const continuity = new ContinuityDecider(lifecycle, clock.fn);
  const gate = new AvailabilityGate(lifecycle, pairLock, policy, clock.fn);
  return { store, pairLock, lifecycle, continuity, gate, policy };
}
