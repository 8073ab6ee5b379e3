import { AutomationPolicy } from '../config/types';
import { ConversationMessage } from './types';

/** Decides whether one message was typed by a human on the operator side */
export interface HumanAuthorshipPredicate {
  isHumanAuthored(message: ConversationMessage, accountId: string): boolean;
}

/**
 * Prefix heuristic: an operator-side message whose text does not start with
 * the automation marker, sent from an allow-listed operator nickname.
 *
 * Known limits: a robot reply without the marker reads as human, and a
 * human reply that happens to start with the marker reads as robot.
 */
export class MarkerAllowListPredicate implements HumanAuthorshipPredicate {
  private readonly nicknames: ReadonlySet<string>;

  constructor(private readonly policy: AutomationPolicy) {
    this.nicknames = new Set(policy.operatorNicknames);
  }

  isHumanAuthored(message: ConversationMessage): boolean {
    return (
      message.source === 'account'
      && !message.content.startsWith(this.policy.automationMarker)
      && message.sender !== undefined
      && this.nicknames.has(message.sender)
    );
  }
}

/** First message in the batch that signals a human take-over, or null */
export function detectIntervention(
  messages: readonly ConversationMessage[],
  accountId: string,
  predicate: HumanAuthorshipPredicate,
): ConversationMessage | null {
  return messages.find((m) => predicate.isHumanAuthored(m, accountId)) ?? null;
}
