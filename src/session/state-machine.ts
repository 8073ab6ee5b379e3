import { SessionState } from '../config/types';
import { STATE_TRANSITIONS, StateTransitionEvent } from './types';
import { logger } from '../observability/logger';
import { stateTransitions } from '../observability/metrics';

export class StateMachine {
  constructor(private readonly clock: () => number = Date.now) {}

  canTransition(from: SessionState, to: SessionState): boolean {
    return STATE_TRANSITIONS[from].includes(to);
  }

  /** Count and log a transition that the store has already applied */
  record(sessionId: string, from: SessionState, to: SessionState, reason: string): StateTransitionEvent {
    const event: StateTransitionEvent = {
      sessionId,
      from,
      to,
      reason,
      timestamp: this.clock(),
    };

    stateTransitions.inc({ from, to });
    logger.info(event, 'State transition');
    return event;
  }
}
