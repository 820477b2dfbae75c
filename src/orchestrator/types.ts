import { DeliveryKind, ExpertDecision, Query, QueryState, ReviewOutcome } from '../config/types';
import { StaleReviewActionError } from '../errors/errors';

/** Allowed query state transitions */
export const STATE_TRANSITIONS: Record<QueryState, readonly QueryState[]> = {
  RECEIVED: ['RETRIEVING'],
  RETRIEVING: ['PENDING_REVIEW', 'REJECTED'],
  PENDING_REVIEW: ['APPROVED', 'EDITED', 'REJECTED', 'EXPIRED'],
  APPROVED: ['DELIVERED'],
  EDITED: ['DELIVERED'],
  REJECTED: ['DELIVERED'],
  DELIVERED: [],
  EXPIRED: [],
};

export const DECISION_TARGETS: Record<ExpertDecision, { state: QueryState; outcome: ReviewOutcome; delivery: DeliveryKind }> = {
  approve: { state: 'APPROVED', outcome: 'approved', delivery: 'verified_answer' },
  edit: { state: 'EDITED', outcome: 'edited', delivery: 'corrected_answer' },
  reject: { state: 'REJECTED', outcome: 'rejected', delivery: 'rejected_answer' },
};

/**
 * A query is closed once delivered, expired, or rejected for lack of an
 * answer. An expert rejection still owes the user a delivery.
 */
export function isTerminal(query: Pick<Query, 'state' | 'rejectionReason'>): boolean {
  if (query.state === 'DELIVERED' || query.state === 'EXPIRED') return true;
  return query.state === 'REJECTED' && query.rejectionReason === 'NoAnswerAvailable';
}

export type DecisionResult =
  | { status: 'accepted'; queryId: string; state: QueryState; delivered: boolean }
  | { status: 'stale'; queryId: string; error: StaleReviewActionError };

/** Outcome of a scheduler-driven entry point */
export type SchedulerActionResult =
  | { applied: true }
  | { applied: false; reason: 'StaleReviewAction' | 'NotDue' | 'InFlight' };

/** A reminder tier due for one review, as collected by the scheduler */
export interface DueReminder {
  queryId: string;
  tierIndex: number;
}

export interface ExpertReminderResult {
  reminded: string[];
  skipped: number;
}
