import client from 'prom-client';

export const register = new client.Registry();

if (process.env.NODE_ENV !== 'test') {
  client.collectDefaultMetrics({ register, prefix: 'relay_' });
}

export const httpRequestDuration = new client.Histogram({
  name: 'relay_http_request_duration_seconds',
  help: 'HTTP request duration in seconds',
  labelNames: ['method', 'route', 'status_code'] as const,
  buckets: [0.005, 0.01, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5],
  registers: [register],
});

export const sessionsCreated = new client.Counter({
  name: 'relay_sessions_created_total',
  help: 'Sessions created, by owner',
  labelNames: ['created_by'] as const,
  registers: [register],
});

export const stateTransitions = new client.Counter({
  name: 'relay_session_state_transitions_total',
  help: 'Session state transitions',
  labelNames: ['from', 'to'] as const,
  registers: [register],
});

export const messagesIngested = new client.Counter({
  name: 'relay_messages_ingested_total',
  help: 'Inbound chat messages, by outcome',
  labelNames: ['result'] as const,
  registers: [register],
});

export const interventionsDetected = new client.Counter({
  name: 'relay_interventions_detected_total',
  help: 'Robot sessions taken over by a human operator',
  registers: [register],
});

export const admissionDecisions = new client.Counter({
  name: 'relay_robot_admission_total',
  help: 'Robot session admission decisions',
  labelNames: ['decision'] as const,
  registers: [register],
});

export const tasksEnqueued = new client.Counter({
  name: 'relay_tasks_enqueued_total',
  help: 'Send tasks pushed to a priority queue',
  labelNames: ['level'] as const,
  registers: [register],
});

export const tasksDequeued = new client.Counter({
  name: 'relay_tasks_dequeued_total',
  help: 'Send tasks popped from a priority queue',
  labelNames: ['level'] as const,
  registers: [register],
});

export const tasksCompleted = new client.Counter({
  name: 'relay_tasks_completed_total',
  help: 'Send tasks resolved by a worker',
  labelNames: ['outcome'] as const,
  registers: [register],
});

export const notifications = new client.Counter({
  name: 'relay_human_notifications_total',
  help: 'Human operator notifications, by status',
  labelNames: ['status'] as const,
  registers: [register],
});

export const timeoutSweeps = new client.Counter({
  name: 'relay_timeout_sweep_sessions_total',
  help: 'Sessions moved to TIMEOUT by the background sweeper',
  registers: [register],
});

export async function getMetrics(): Promise<string> {
  return register.metrics();
}

export function getContentType(): string {
  return register.contentType;
}
