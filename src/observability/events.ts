/**
 * Structured engine events.
 *
 * Every state change and every per-conversation failure is reported here
 * once: logged through pino, counted in metrics, and passed to listeners.
 */

import { DeliveryKind, DeliveryRepresentation, QueryState } from '../config/types';
import { ErrorCode } from '../errors/errors';
import { logger } from './logger';
import {
  queryTransitions,
  reviewEscalations,
  reviewExpirations,
  reviewReminders,
  orphanReviewTasks,
  staleReviewActions,
  deliveries,
  templateFallbacks,
  correctionsRecorded,
  conversationsExpired,
  schedulerTaskFailures,
  userReminders,
} from './metrics';

export type EngineEvent =
  | { type: 'query.transition'; queryId: string; conversationId: string; from: QueryState; to: QueryState; reason: string }
  | { type: 'review.escalated'; queryId: string; level: number; expertId: string; deadline: number }
  | { type: 'review.expired'; queryId: string; level: number }
  | { type: 'review.reminded'; queryId: string; tier: number; expertId: string }
  | { type: 'review.stale_action'; queryId: string; action: string; observedState: string }
  | { type: 'review.orphan_removed'; queryId: string; observedState: string }
  | { type: 'delivery.sent'; queryId?: string; conversationId: string; kind: DeliveryKind; representation: DeliveryRepresentation; receiptId: string }
  | { type: 'delivery.failed'; queryId?: string; conversationId: string; kind: DeliveryKind; code: ErrorCode; error: string; attempts: number }
  | { type: 'delivery.template_fallback'; conversationId: string; category: string; locale: string }
  | { type: 'correction.recorded'; queryId: string; expertId: string; outcome: 'edited' | 'rejected' }
  | { type: 'conversation.expired'; conversationId: string; idleSince: number }
  | { type: 'user.reminded'; conversationId: string; representation: DeliveryRepresentation; receiptId: string }
  | { type: 'user.reminder_failed'; conversationId: string; error: string }
  | { type: 'scheduler.task_failed'; queryId?: string; conversationId?: string; expertId?: string; action: string; error: string }
  | { type: 'engine.fatal'; error: string };

export type EngineEventListener = (event: EngineEvent) => void;

export class EventReporter {
  private readonly log = logger.child({ component: 'engine-events' });
  private readonly listeners: EngineEventListener[] = [];

  onEvent(listener: EngineEventListener): void {
    this.listeners.push(listener);
  }

  report(event: EngineEvent): void {
    this.record(event);

    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (err) {
        this.log.error({ err, eventType: event.type }, 'Engine event listener error');
      }
    }
  }

  private record(event: EngineEvent): void {
    switch (event.type) {
      case 'query.transition':
        queryTransitions.inc({ from: event.from, to: event.to });
        this.log.info(event, 'Query transition');
        break;
      case 'review.escalated':
        reviewEscalations.inc({ level: String(event.level) });
        this.log.info(event, 'Review escalated');
        break;
      case 'review.expired':
        reviewExpirations.inc();
        this.log.warn(event, 'Review expired without a decision');
        break;
      case 'review.reminded':
        reviewReminders.inc({ tier: String(event.tier) });
        this.log.info(event, 'Review reminder sent');
        break;
      case 'review.orphan_removed':
        orphanReviewTasks.inc();
        this.log.warn(event, 'Review task without a reviewable query dropped');
        break;
      case 'review.stale_action':
        staleReviewActions.inc({ action: event.action });
        this.log.info(event, 'Stale review action discarded');
        break;
      case 'delivery.sent':
        deliveries.inc({ kind: event.kind, representation: event.representation, outcome: 'sent' });
        this.log.info(event, 'Delivery sent');
        break;
      case 'delivery.failed':
        deliveries.inc({ kind: event.kind, representation: 'unknown', outcome: 'failed' });
        this.log.warn(event, 'Delivery failed; queued for retry');
        break;
      case 'delivery.template_fallback':
        templateFallbacks.inc({ category: event.category });
        this.log.warn(event, 'No template for category; generic template used');
        break;
      case 'correction.recorded':
        correctionsRecorded.inc({ outcome: event.outcome });
        this.log.info(event, 'Correction recorded');
        break;
      case 'conversation.expired':
        conversationsExpired.inc();
        this.log.info(event, 'Conversation expired');
        break;
      case 'user.reminded':
        userReminders.inc({ outcome: 'sent' });
        this.log.info(event, 'User reminded');
        break;
      case 'user.reminder_failed':
        userReminders.inc({ outcome: 'failed' });
        this.log.warn(event, 'User reminder failed');
        break;
      case 'scheduler.task_failed':
        schedulerTaskFailures.inc({ action: event.action });
        this.log.error(event, 'Scheduler task failed; skipped');
        break;
      case 'engine.fatal':
        this.log.fatal(event, 'Engine halted');
        break;
    }
  }
}
