import { SESSION_STATE_CODES, TASK_STATUS_CODES, TASK_TYPE_CODES, TRANSFER_STATUS_CODES, URGENCY_CODES } from '../store/codec';
import { SessionRecord, TaskRecord, TransferRecord } from '../store/types';
import { PendingTask, SessionTaskStatus } from '../dispatch/task-dispatcher';
import { PairStatus } from '../session/types';
import { BatchResult } from '../messages/types';

// Wire shapes for the HTTP API: snake_case keys, ISO timestamps, the same
// lower-case enumeration strings the store persists.

function iso(ms: number | undefined): string | null {
  return ms === undefined ? null : new Date(ms).toISOString();
}

export function presentSession(session: SessionRecord) {
  return {
    session_id: session.sessionId,
    account_id: session.accountId,
    shop_name: session.shopName,
    task_type: TASK_TYPE_CODES[session.taskType],
    state: SESSION_STATE_CODES[session.state],
    created_by: session.createdBy,
    priority: session.priority,
    external_task_id: session.externalTaskId ?? null,
    message_count: session.messageCount,
    created_at: iso(session.createdAt),
    last_activity: iso(session.lastActivity),
    timeout_at: iso(session.timeoutAt),
    transferred_at: iso(session.transferredAt),
    transfer_reason: session.transferReason ?? null,
    inactive_window_minutes: session.inactiveWindowMinutes ?? null,
  };
}

function presentTask(task: TaskRecord) {
  return {
    task_id: task.taskId,
    session_id: task.sessionId,
    external_task_id: task.externalTaskId,
    task_type: TASK_TYPE_CODES[task.externalTaskType],
    task_status: TASK_STATUS_CODES[task.status],
    send_content: task.sendContent,
    priority_level: task.queueLevel,
    created_at: iso(task.createdAt),
    finished_at: iso(task.finishedAt),
  };
}

export function presentSessionStatus({ session, task }: SessionTaskStatus) {
  return {
    ...presentTask(task),
    session_state: SESSION_STATE_CODES[session.state],
    account_id: session.accountId,
    shop_name: session.shopName,
    priority: session.priority,
    message_count: session.messageCount,
    last_activity: iso(session.lastActivity),
  };
}

export function presentPendingTask({ task, session }: PendingTask) {
  return {
    ...presentTask(task),
    account_id: session.accountId,
    shop_name: session.shopName,
  };
}

export function presentPairStatus(status: PairStatus) {
  return {
    account_id: status.accountId,
    shop_name: status.shopName,
    has_live_session: status.hasLiveSession,
    live_session: status.liveSession ? presentSession(status.liveSession) : null,
  };
}

export function presentTransfer(transfer: TransferRecord) {
  return {
    transfer_id: transfer.transferId,
    session_id: transfer.sessionId,
    from_type: transfer.fromType,
    to_type: transfer.toType,
    reason: transfer.reason,
    urgency: URGENCY_CODES[transfer.urgency],
    status: TRANSFER_STATUS_CODES[transfer.status],
    transferred_by: transfer.transferredBy,
    transferred_at: iso(transfer.transferredAt),
    accepted_by: transfer.acceptedBy ?? null,
    accepted_at: iso(transfer.acceptedAt),
  };
}

export function presentBatchResult(result: BatchResult) {
  return {
    processed_messages: result.processedMessages,
    skipped_messages: result.skippedMessages,
    active_session_id: result.activeSessionId,
    session_operations: result.sessionOperations,
    errors: result.errors,
  };
}
