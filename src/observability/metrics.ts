import { Registry, Counter, Histogram, Gauge, collectDefaultMetrics } from 'prom-client';

export const registry = new Registry();

if (process.env.NODE_ENV !== 'test') {
  collectDefaultMetrics({ register: registry });
}

// ───── Query lifecycle ─────

export const queryTransitions = new Counter({
  name: 'relay_query_transitions_total',
  help: 'Query state transitions',
  labelNames: ['from', 'to'] as const,
  registers: [registry],
});

export const duplicateSubmissions = new Counter({
  name: 'relay_duplicate_submissions_total',
  help: 'Submissions rejected because the conversation already had an open query',
  registers: [registry],
});

export const retrievalDuration = new Histogram({
  name: 'relay_retrieval_duration_seconds',
  help: 'Knowledge retrieval latency',
  labelNames: ['outcome'] as const,
  buckets: [0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10],
  registers: [registry],
});

// ───── Review / escalation ─────

export const pendingReviews = new Gauge({
  name: 'relay_pending_reviews',
  help: 'Review tasks currently awaiting an expert decision',
  registers: [registry],
});

export const reviewEscalations = new Counter({
  name: 'relay_review_escalations_total',
  help: 'Reviews promoted to a higher expert tier',
  labelNames: ['level'] as const,
  registers: [registry],
});

export const reviewExpirations = new Counter({
  name: 'relay_review_expirations_total',
  help: 'Reviews expired at the maximum escalation level',
  registers: [registry],
});

export const reviewReminders = new Counter({
  name: 'relay_review_reminders_total',
  help: 'Reminder notifications sent to experts',
  labelNames: ['tier'] as const,
  registers: [registry],
});

export const orphanReviewTasks = new Counter({
  name: 'relay_orphan_review_tasks_total',
  help: 'Review tasks dropped because their query never reached or already left review',
  registers: [registry],
});

export const userReminders = new Counter({
  name: 'relay_user_reminders_total',
  help: 'Idle reminders to users with no open question',
  labelNames: ['outcome'] as const,
  registers: [registry],
});

export const staleReviewActions = new Counter({
  name: 'relay_stale_review_actions_total',
  help: 'Review actions discarded because the query had already moved on',
  labelNames: ['action'] as const,
  registers: [registry],
});

export const schedulerTickDuration = new Histogram({
  name: 'relay_scheduler_tick_duration_seconds',
  help: 'Escalation scheduler tick duration',
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 5, 15],
  registers: [registry],
});

export const schedulerTaskFailures = new Counter({
  name: 'relay_scheduler_task_failures_total',
  help: 'Scheduler agenda items that failed and were skipped',
  labelNames: ['action'] as const,
  registers: [registry],
});

// ───── Delivery ─────

export const deliveries = new Counter({
  name: 'relay_deliveries_total',
  help: 'User-facing deliveries by representation and outcome',
  labelNames: ['kind', 'representation', 'outcome'] as const,
  registers: [registry],
});

export const templateFallbacks = new Counter({
  name: 'relay_template_fallbacks_total',
  help: 'Deliveries that fell back to the generic template',
  labelNames: ['category'] as const,
  registers: [registry],
});

export const deliveryDuration = new Histogram({
  name: 'relay_delivery_duration_seconds',
  help: 'Channel send latency including retries',
  buckets: [0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10],
  registers: [registry],
});

// ───── Feedback loop ─────

export const correctionsRecorded = new Counter({
  name: 'relay_corrections_recorded_total',
  help: 'Expert corrections appended to the ledger',
  labelNames: ['outcome'] as const,
  registers: [registry],
});

export const conversationsExpired = new Counter({
  name: 'relay_conversations_expired_total',
  help: 'Idle conversations marked expired',
  registers: [registry],
});

// ───── HTTP ─────

export const httpRequestDuration = new Histogram({
  name: 'relay_http_request_duration_seconds',
  help: 'HTTP request duration',
  labelNames: ['method', 'route', 'status_code'] as const,
  buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5],
  registers: [registry],
});

export async function getMetrics(): Promise<string> {
  return registry.metrics();
}

export function getContentType(): string {
  return registry.contentType;
}
