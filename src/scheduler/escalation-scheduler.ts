import { ConversationStore } from '../conversation/types';
import { ReviewTaskIndex } from './review-task-index';
import { VerificationEngine } from '../orchestrator/verification-engine';
import { DueReminder, SchedulerActionResult } from '../orchestrator/types';
import { hoursToMs } from '../config/engine-config';
import { StoreUnavailableError, errorMessage } from '../errors/errors';
import { logger } from '../observability/logger';
import { pendingReviews, schedulerTickDuration } from '../observability/metrics';

export type SchedulerAction = 'escalate' | 'expire' | 'remind' | 'retryDelivery' | 'expireConversation' | 'remindUser';

type Subject = 'queryId' | 'conversationId' | 'expertId';

const SUBJECT: Record<SchedulerAction, Subject> = {
  escalate: 'queryId',
  expire: 'queryId',
  remind: 'expertId',
  retryDelivery: 'queryId',
  expireConversation: 'conversationId',
  remindUser: 'conversationId',
};

export interface TickReport {
  at: number;
  /** True when another tick was still running and this one did nothing */
  overlapped: boolean;
  escalated: string[];
  expired: string[];
  reminded: string[];
  redelivered: string[];
  conversationsExpired: string[];
  usersReminded: string[];
  /** Actions that turned out to be no-ops (lost a race, not yet due) */
  noops: number;
  failures: Array<{ action: SchedulerAction; id: string; error: string }>;
}

export interface EscalationSchedulerDeps {
  tasks: ReviewTaskIndex;
  store: ConversationStore;
  clock?: () => number;
}

function emptyReport(at: number, overlapped: boolean): TickReport {
  return {
    at,
    overlapped,
    escalated: [],
    expired: [],
    reminded: [],
    redelivered: [],
    conversationsExpired: [],
    usersReminded: [],
    noops: 0,
    failures: [],
  };
}

/**
 * EscalationScheduler: the single timer callback for every deadline-type
 * decision: escalation, expiry, expert reminders, outbox retries, idle
 * conversations and idle-user reminders. It never writes query or
 * conversation records itself; each action goes through the engine, which
 * re-checks state under the query lock. Channel sends started by a tick run
 * in the background, so a slow provider never holds the tick.
 *
 * Due expert reminders are grouped per assignee and sent as one message.
 * A failing action is reported and skipped. Only a store outage aborts the
 * tick.
 */
export class EscalationScheduler {
  private intervalHandle?: NodeJS.Timeout;
  private running = false;
  private readonly clock: () => number;
  private readonly log = logger.child({ component: 'escalation-scheduler' });

  constructor(private readonly engine: VerificationEngine, private readonly deps: EscalationSchedulerDeps) {
    this.clock = deps.clock ?? Date.now;
  }

  async tick(now: number = this.clock()): Promise<TickReport> {
    if (this.running) {
      this.log.warn('Scheduler tick already running, skipping');
      return emptyReport(now, true);
    }

    this.running = true;
    const endTimer = schedulerTickDuration.startTimer();
    const report = emptyReport(now, false);
    const { maxEscalationLevel, conversationIdleTtlHours, userReminderHours } = this.engine.config;

    try {
      // Snapshot first: deliveries failing during this tick wait for the next one
      const outbox = await this.deps.store.listPendingDeliveries();
      const tasks = await this.deps.tasks.listByDeadline();
      pendingReviews.set(tasks.length);

      const dueReminders = new Map<string, DueReminder[]>();
      for (const task of tasks) {
        const { queryId } = task;
        if (now >= task.deadline) {
          if (task.escalationLevel < maxEscalationLevel) {
            await this.run(report, 'escalate', queryId, report.escalated, () => this.engine.escalate(queryId, now));
          } else {
            await this.run(report, 'expire', queryId, report.expired, () => this.engine.expire(queryId, now));
          }
          continue;
        }

        const tierIndex = this.engine.dueReminderTier(task, now);
        if (tierIndex >= 0) {
          const due = dueReminders.get(task.assignedExpertId) ?? [];
          due.push({ queryId, tierIndex });
          dueReminders.set(task.assignedExpertId, due);
        }
      }

      for (const [expertId, due] of dueReminders) {
        try {
          const result = await this.engine.remindExpert(expertId, due, now);
          report.reminded.push(...result.reminded);
          report.noops += result.skipped;
        } catch (err) {
          this.fail(report, 'remind', expertId, err);
        }
      }

      for (const queryId of outbox) {
        await this.run(report, 'retryDelivery', queryId, report.redelivered, () => this.engine.retryDelivery(queryId));
      }

      const idle = await this.deps.store.listIdleConversations(now - hoursToMs(conversationIdleTtlHours));
      for (const conversationId of idle) {
        await this.run(report, 'expireConversation', conversationId, report.conversationsExpired, () =>
          this.engine.expireConversation(conversationId, now),
        );
      }

      if (userReminderHours > 0) {
        const quiet = await this.deps.store.listIdleConversations(now - hoursToMs(userReminderHours));
        for (const conversationId of quiet) {
          await this.run(report, 'remindUser', conversationId, report.usersReminded, () =>
            this.engine.remindUser(conversationId, now),
          );
        }
      }

      this.log.info({
        at: new Date(now).toISOString(),
        reviews: tasks.length,
        escalated: report.escalated.length,
        expired: report.expired.length,
        reminded: report.reminded.length,
        redelivered: report.redelivered.length,
        conversationsExpired: report.conversationsExpired.length,
        usersReminded: report.usersReminded.length,
        failures: report.failures.length,
      }, 'Scheduler tick completed');
      return report;
    } catch (err) {
      if (err instanceof StoreUnavailableError) {
        this.engine.handleFatal(err);
      }
      throw err;
    } finally {
      this.running = false;
      endTimer();
    }
  }

  /**
   * Run the tick on an interval, for deployments without an external timer.
   */
  start(intervalMs: number): void {
    if (this.intervalHandle) return;
    this.log.info({ intervalSeconds: intervalMs / 1000 }, 'Escalation scheduler started');
    this.intervalHandle = setInterval(() => {
      this.tick().catch((err) => this.log.error({ err }, 'Scheduler tick failed'));
    }, intervalMs);
  }

  stop(): void {
    if (this.intervalHandle) {
      clearInterval(this.intervalHandle);
      this.intervalHandle = undefined;
      this.log.info('Escalation scheduler stopped');
    }
  }

  isRunning(): boolean {
    return this.running;
  }

  private async run(
    report: TickReport,
    action: SchedulerAction,
    id: string,
    applied: string[],
    operation: () => Promise<SchedulerActionResult>,
  ): Promise<void> {
    try {
      const result = await operation();
      if (result.applied) {
        applied.push(id);
      } else {
        report.noops++;
      }
    } catch (err) {
      this.fail(report, action, id, err);
    }
  }

  /** Record a skipped action; a store outage is rethrown to abort the tick */
  private fail(report: TickReport, action: SchedulerAction, id: string, err: unknown): void {
    if (err instanceof StoreUnavailableError) throw err;
    const error = errorMessage(err);
    report.failures.push({ action, id, error });
    const subject = SUBJECT[action];
    this.engine.events.report(
      subject === 'queryId'
        ? { type: 'scheduler.task_failed', queryId: id, action, error }
        : subject === 'conversationId'
          ? { type: 'scheduler.task_failed', conversationId: id, action, error }
          : { type: 'scheduler.task_failed', expertId: id, action, error },
    );
  }
}
