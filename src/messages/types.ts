import { ConversationMessage } from '../session/types';

/** One chat line as the marketplace scraper delivers it */
export interface RawChatMessage {
  id: string;
  nick?: string;
  /** `YYYY-MM-DD HH:mm:ss` in the marketplace time zone, ISO-8601, or epoch ms */
  time?: string | number;
  content?: string;
}

export interface NormalizedBatch {
  accountId: string;
  messages: ConversationMessage[];
}

export interface BatchInput {
  messages: ConversationMessage[];
  accountId: string;
  shopName: string;
  maxInactiveMinutes: number;
}

/** Labels for what a batch did to the pair's sessions */
export type BatchOperation =
  | 'timeout_previous_session'
  | 'created_session'
  | 'joined_session'
  | 'notified_human'
  | 'human_intervention';

export interface BatchResult {
  processedMessages: number;
  skippedMessages: number;
  activeSessionId: string | null;
  sessionOperations: BatchOperation[];
  errors: string[];
}
