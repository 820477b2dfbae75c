/**
 * Verification Engine
 *
 * Owns the query lifecycle. Every query transition runs under that query's
 * transition lock; conversation read-modify-writes run under the
 * conversation lock, always taken after the query lock. The scheduler and
 * the expert-facing API both come through the entry points below, so a
 * caller that loses a race observes the new state and becomes a no-op.
 */

import { v4 as uuidv4 } from 'uuid';
import {
  Conversation,
  ConversationRef,
  ConversationStatus,
  DeliveryKind,
  DeliveryRepresentation,
  ExpertDecision,
  KnowledgeCandidate,
  PendingDelivery,
  Query,
  QueryHandle,
  QueryState,
  ReviewTask,
  conversationIdFor,
} from '../config/types';
import { EngineConfig, hoursToMs } from '../config/engine-config';
import { ConversationStore } from '../conversation/types';
import { ReviewTaskIndex } from '../scheduler/review-task-index';
import { dueReminderTier, reminderDueAt, reviewWindowMs } from '../scheduler/deadlines';
import { KnowledgeRetriever } from '../knowledge/types';
import { ChannelAdapter, DeliveryReceipt, ReminderSink, ReviewNoticeKind, ReviewSummary } from '../channels/types';
import { CorrectionLedger, CorrectionRecord } from '../feedback/types';
import { AnswerComposer, Draft, normalizeText } from '../composer/answer-composer';
import { MessageTemplate } from '../delivery/types';
import { MessageCatalog } from '../delivery/message-catalog';
import { selectDelivery } from '../delivery/delivery-selector';
import {
  DECISION_TARGETS,
  DecisionResult,
  DueReminder,
  ExpertReminderResult,
  SchedulerActionResult,
  isTerminal,
} from './types';
import { stateMachine } from './state-machine';
import { KeyedLock } from './transition-lock';
import {
  ConversationNotFoundError,
  DeliveryFailedError,
  DuplicatePendingError,
  InvalidDecisionError,
  QueryNotFoundError,
  RetrievalTimeoutError,
  RetrievalUnavailableError,
  StaleReviewActionError,
  StoreUnavailableError,
  errorMessage,
} from '../errors/errors';
import { EventReporter } from '../observability/events';
import { conversationLogger, logger } from '../observability/logger';
import { deliveryDuration, duplicateSubmissions, pendingReviews, retrievalDuration } from '../observability/metrics';

export interface VerificationEngineDeps {
  store: ConversationStore;
  tasks: ReviewTaskIndex;
  retriever: KnowledgeRetriever;
  channel: ChannelAdapter;
  reminders: ReminderSink;
  ledger: CorrectionLedger;
  templates: readonly MessageTemplate[];
  messages: MessageCatalog;
  config: EngineConfig;
  events?: EventReporter;
  composer?: AnswerComposer;
  clock?: () => number;
  /** Called once per store outage error; the engine cannot continue safely */
  onFatal?: (err: StoreUnavailableError) => void;
}

type DispatchOutcome =
  | { ok: true; receipt: DeliveryReceipt; representation: DeliveryRepresentation }
  | { ok: false; error: DeliveryFailedError };

interface MarkedReminder {
  expertId: string;
  summary: ReviewSummary;
}

function toHandle(query: Query): QueryHandle {
  return { queryId: query.queryId, conversationId: query.conversationId, state: query.state };
}

export class VerificationEngine {
  private readonly log = logger.child({ component: 'verification-engine' });
  private readonly queryLocks = new KeyedLock();
  private readonly conversationLocks = new KeyedLock();
  private readonly composer: AnswerComposer;
  private readonly clock: () => number;
  private readonly fatalSeen = new WeakSet<Error>();
  private readonly assignmentCursor = new Map<number, number>();
  /** Outbox sends started by the scheduler, one per query */
  private readonly inFlight = new Map<string, Promise<boolean>>();
  private readonly userReminderSends = new Set<Promise<void>>();
  readonly events: EventReporter;

  constructor(private readonly deps: VerificationEngineDeps) {
    this.events = deps.events ?? new EventReporter();
    this.composer = deps.composer ?? new AnswerComposer();
    this.clock = deps.clock ?? Date.now;
  }

  get config(): EngineConfig {
    return this.deps.config;
  }

  // ───── User-facing ───────────────────────────────────────────

  /**
   * Open a query for the conversation, retrieve candidates and put a draft
   * up for review. Rejects with DuplicatePendingError while the conversation
   * has an open query.
   */
  async submit(ref: ConversationRef, text: string): Promise<QueryHandle> {
    return this.guarded(async () => {
      const conversationId = conversationIdFor(ref);
      const { query, locale } = await this.openQuery(ref, conversationId, text);

      let candidates: KnowledgeCandidate[] = [];
      let failure: RetrievalUnavailableError | undefined;
      try {
        candidates = await this.retrieve(query.normalizedText, locale);
      } catch (err) {
        failure = err instanceof RetrievalUnavailableError
          ? err
          : new RetrievalUnavailableError(undefined, { cause: err });
      }

      return this.queryLocks.run(query.queryId, async () => {
        const current = await this.requireQuery(query.queryId);
        if (current.state !== 'RETRIEVING') return toHandle(current);

        const now = this.clock();
        current.candidates = Object.freeze(candidates.map((c) => ({ ...c })));
        const draft = failure ? null : this.composer.draft(current.candidates);
        if (draft) {
          await this.openReview(current, draft, locale, now);
        } else {
          await this.rejectNoAnswer(current, failure, now);
        }
        return toHandle(current);
      });
    });
  }

  // ───── Expert-facing ─────────────────────────────────────────

  /**
   * Apply an expert's verdict. Only a query still in PENDING_REVIEW accepts
   * one; anything else is stale and comes back as a result, not an error.
   */
  async recordExpertDecision(
    queryId: string,
    expertId: string,
    decision: ExpertDecision,
    editedText?: string,
  ): Promise<DecisionResult> {
    const target = DECISION_TARGETS[decision];
    if (!target) {
      throw new InvalidDecisionError(`Unknown decision "${decision}"`);
    }
    const edited = editedText?.trim() ?? '';
    if (decision === 'edit' && !edited) {
      throw new InvalidDecisionError('An edit decision requires non-blank editedText');
    }

    return this.guarded(() =>
      this.queryLocks.run<DecisionResult>(queryId, async () => {
        const query = await this.requireQuery(queryId);
        if (query.state !== 'PENDING_REVIEW') {
          const error = new StaleReviewActionError(queryId, decision, query.state);
          this.events.report({ type: 'review.stale_action', queryId, action: decision, observedState: query.state });
          return { status: 'stale', queryId, error };
        }

        const now = this.clock();
        const task = await this.deps.tasks.get(queryId);
        if (task && task.assignedExpertId !== expertId) {
          this.log.info({ queryId, expertId, assignedExpertId: task.assignedExpertId }, 'Decision from an expert other than the assignee');
        }

        query.reviewOutcome = target.outcome;
        query.actedBy = expertId;
        query.actedAt = now;
        if (decision === 'approve') query.finalText = query.draftAnswer;
        if (decision === 'edit') query.finalText = edited;
        if (decision === 'reject') query.rejectionReason = 'ExpertRejected';
        this.transition(query, target.state, `expert_${decision}`, now);

        if (decision !== 'approve') {
          await this.recordCorrection(query, expertId, decision === 'edit' ? 'edited' : 'rejected', edited || null, now);
        }

        // The decision and its outbox entry land before the task goes away
        query.pendingDelivery = { kind: target.delivery, attempts: 0, queuedAt: now };
        await this.deps.store.saveQuery(query);
        await this.deps.tasks.remove(queryId);
        pendingReviews.dec();

        const delivered = await this.deliver(query, target.delivery, now);
        return { status: 'accepted', queryId, state: query.state, delivered };
      }),
    );
  }

  // ───── Scheduler entry points ────────────────────────────────

  /** Hand an overdue review to the next expert tier with a longer window */
  async escalate(queryId: string, now: number): Promise<SchedulerActionResult> {
    return this.guarded(() =>
      this.queryLocks.run<SchedulerActionResult>(queryId, async () => {
        const query = await this.deps.store.getQuery(queryId);
        const task = await this.deps.tasks.get(queryId);
        if (task && query?.state !== 'PENDING_REVIEW' && now >= task.deadline) {
          return this.dropOrphanTask(query, task, now);
        }
        if (!query || !task || query.state !== 'PENDING_REVIEW' || task.escalationLevel >= this.config.maxEscalationLevel) {
          return this.staleAction(queryId, 'escalate', query?.state);
        }
        if (now < task.deadline) return { applied: false, reason: 'NotDue' };

        const level = task.escalationLevel + 1;
        const expertId = this.pickExpert(level);
        const escalated: ReviewTask = {
          ...task,
          escalationLevel: level,
          assignedExpertId: expertId,
          windowStartedAt: now,
          deadline: now + reviewWindowMs(this.config, level),
          remindersSent: this.config.reminderTiers.map(() => false),
        };
        await this.deps.tasks.put(escalated);

        const conversation = await this.updateConversation(query.conversationId, now, (c) => {
          if (c.pendingQueryId !== queryId) return;
          c.assignedExpertId = expertId;
          c.escalationLevel = level;
        });

        this.events.report({ type: 'review.escalated', queryId, level, expertId, deadline: escalated.deadline });
        this.deps.reminders.notify(expertId, this.summary('review_escalation', query, escalated, conversation?.locale));
        return { applied: true };
      }),
    );
  }

  /**
   * Give up on an overdue review at the top tier and tell the user we are
   * still working on it. The expiry and its outbox entry are committed here;
   * the send runs in the background so the caller never waits on the channel.
   */
  async expire(queryId: string, now: number): Promise<SchedulerActionResult> {
    return this.guarded<SchedulerActionResult>(async () => {
      const result = await this.queryLocks.run<SchedulerActionResult>(queryId, async () => {
        const query = await this.deps.store.getQuery(queryId);
        const task = await this.deps.tasks.get(queryId);
        if (task && query?.state !== 'PENDING_REVIEW' && now >= task.deadline) {
          return this.dropOrphanTask(query, task, now);
        }
        if (!query || !task || query.state !== 'PENDING_REVIEW' || task.escalationLevel < this.config.maxEscalationLevel) {
          return this.staleAction(queryId, 'expire', query?.state);
        }
        if (now < task.deadline) return { applied: false, reason: 'NotDue' };

        this.transition(query, 'EXPIRED', 'review_sla_exhausted', now);
        query.closedAt = now;
        query.pendingDelivery = { kind: 'still_working', attempts: 0, queuedAt: now };
        await this.deps.store.saveQuery(query);
        await this.deps.tasks.remove(queryId);
        pendingReviews.dec();
        await this.updateConversation(query.conversationId, now, (c) => this.release(c, queryId));
        this.events.report({ type: 'review.expired', queryId, level: task.escalationLevel });
        return { applied: true };
      });

      if (result.applied) this.startDelivery(queryId, now);
      return result;
    });
  }

  /** Send the reminder for `tierIndex` once; lower tiers are marked with it */
  async remind(queryId: string, tierIndex: number, now: number): Promise<SchedulerActionResult> {
    return this.guarded<SchedulerActionResult>(async () => {
      const marked = await this.markReminder(queryId, tierIndex, now);
      if ('applied' in marked) return marked;
      this.deps.reminders.notify(marked.expertId, marked.summary);
      return { applied: true };
    });
  }

  /**
   * Mark every due reminder of one expert and send them a single message
   * covering the reviews that were still due: a plain reminder for one, a
   * digest for several.
   */
  async remindExpert(expertId: string, due: readonly DueReminder[], now: number): Promise<ExpertReminderResult> {
    return this.guarded<ExpertReminderResult>(async () => {
      const summaries: ReviewSummary[] = [];
      let skipped = 0;
      for (const { queryId, tierIndex } of due) {
        const marked = await this.markReminder(queryId, tierIndex, now);
        if ('applied' in marked) {
          skipped++;
        } else if (marked.expertId !== expertId) {
          // reassigned since the tick looked; the new assignee is told directly
          skipped++;
          this.deps.reminders.notify(marked.expertId, marked.summary);
        } else {
          summaries.push(marked.summary);
        }
      }
      if (summaries.length === 1) {
        this.deps.reminders.notify(expertId, summaries[0]);
      } else if (summaries.length > 1) {
        this.deps.reminders.notifyDigest(expertId, summaries);
      }
      return { reminded: summaries.map((s) => s.queryId), skipped };
    });
  }

  /**
   * Queue a re-attempt of a delivery left in the outbox by an earlier
   * failure. The send runs in the background; an attempt already running
   * for the query is never doubled.
   */
  async retryDelivery(queryId: string): Promise<SchedulerActionResult> {
    return this.guarded<SchedulerActionResult>(async () => {
      if (this.inFlight.has(queryId)) return { applied: false, reason: 'InFlight' };
      const query = await this.deps.store.getQuery(queryId);
      if (!query?.pendingDelivery) {
        this.log.debug({ queryId }, 'Outbox entry already settled');
        return { applied: false, reason: 'StaleReviewAction' };
      }
      return this.startDelivery(queryId) ? { applied: true } : { applied: false, reason: 'InFlight' };
    });
  }

  /**
   * Remind a user with no open question who has been quiet for
   * `userReminderHours`, at most once per such period. The send runs in the
   * background and goes through the delivery selector like any user message.
   */
  async remindUser(conversationId: string, now: number): Promise<SchedulerActionResult> {
    const intervalMs = hoursToMs(this.config.userReminderHours);
    if (intervalMs <= 0) return { applied: false, reason: 'NotDue' };

    return this.guarded<SchedulerActionResult>(async () => {
      const conversation = await this.conversationLocks.run<Conversation | null>(conversationId, async () => {
        const current = await this.deps.store.getConversation(conversationId);
        if (!current || current.state !== 'ACTIVE') return null;
        if (current.pendingQueryId) {
          const pending = await this.deps.store.getQuery(current.pendingQueryId);
          if (pending && !isTerminal(pending)) return null;
        }
        const quietSince = Math.max(current.lastInboundAt, current.lastUserReminderAt ?? 0);
        if (now - quietSince < intervalMs) return null;

        current.lastUserReminderAt = now;
        current.updatedAt = now;
        await this.deps.store.saveConversation(current);
        return current;
      });
      if (!conversation) return { applied: false, reason: 'NotDue' };

      const send: Promise<void> = this.sendUserReminder(conversation).finally(() => {
        this.userReminderSends.delete(send);
      });
      this.userReminderSends.add(send);
      return { applied: true };
    });
  }

  /** Resolves once every background send started so far has settled */
  async settleDeliveries(): Promise<void> {
    while (this.inFlight.size > 0 || this.userReminderSends.size > 0) {
      await Promise.allSettled([...this.inFlight.values(), ...this.userReminderSends]);
    }
  }

  /** Mark a conversation with no open query and no recent inbound message expired */
  async expireConversation(conversationId: string, now: number): Promise<SchedulerActionResult> {
    return this.guarded(() =>
      this.conversationLocks.run<SchedulerActionResult>(conversationId, async () => {
        const conversation = await this.deps.store.getConversation(conversationId);
        if (!conversation || conversation.state === 'EXPIRED') {
          return { applied: false, reason: 'StaleReviewAction' };
        }
        if (conversation.pendingQueryId) {
          const pending = await this.deps.store.getQuery(conversation.pendingQueryId);
          if (pending && !isTerminal(pending)) return { applied: false, reason: 'StaleReviewAction' };
        }
        if (now - conversation.lastInboundAt < hoursToMs(this.config.conversationIdleTtlHours)) {
          return { applied: false, reason: 'NotDue' };
        }

        conversation.state = 'EXPIRED';
        conversation.expiredAt = now;
        conversation.updatedAt = now;
        conversation.pendingQueryId = undefined;
        conversation.assignedExpertId = undefined;
        conversation.escalationLevel = 0;
        await this.deps.store.saveConversation(conversation);
        this.events.report({ type: 'conversation.expired', conversationId, idleSince: conversation.lastInboundAt });
        return { applied: true };
      }),
    );
  }

  /** Highest reminder tier due for a task, or -1 */
  dueReminderTier(task: ReviewTask, now: number): number {
    return dueReminderTier(task, this.config.reminderTiers, now);
  }

  // ───── Diagnostics ───────────────────────────────────────────

  async getConversationStatus(conversationId: string): Promise<ConversationStatus> {
    return this.guarded(async () => {
      const conversation = await this.deps.store.getConversation(conversationId);
      if (!conversation) throw new ConversationNotFoundError(conversationId);

      const status: ConversationStatus = {
        conversationId,
        channel: conversation.channel,
        userId: conversation.userId,
        state: conversation.state,
        locale: conversation.locale,
        lastInboundAt: conversation.lastInboundAt,
        lastOutboundAt: conversation.lastOutboundAt,
        escalationLevel: conversation.escalationLevel,
        assignedExpertId: conversation.assignedExpertId,
      };

      if (conversation.pendingQueryId) {
        const query = await this.deps.store.getQuery(conversation.pendingQueryId);
        if (query) {
          const task = await this.deps.tasks.get(query.queryId);
          status.pendingQuery = {
            queryId: query.queryId,
            state: query.state,
            receivedAt: query.receivedAt,
            reviewDeadline: task?.deadline,
            awaitingDelivery: Boolean(query.pendingDelivery),
          };
        }
      }
      return status;
    });
  }

  async getQuery(queryId: string): Promise<Query> {
    return this.guarded(() => this.requireQuery(queryId));
  }

  /** Report a store outage once and hand it to the fatal handler */
  handleFatal(err: StoreUnavailableError): void {
    if (this.fatalSeen.has(err)) return;
    this.fatalSeen.add(err);
    this.events.report({ type: 'engine.fatal', error: err.message });
    this.deps.onFatal?.(err);
  }

  // ───── Internals ─────────────────────────────────────────────

  private async guarded<T>(operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (err) {
      if (err instanceof StoreUnavailableError) this.handleFatal(err);
      throw err;
    }
  }

  /** Create the query under the conversation lock, enforcing one open query per conversation */
  private async openQuery(
    ref: ConversationRef,
    conversationId: string,
    text: string,
  ): Promise<{ query: Query; locale: string }> {
    return this.conversationLocks.run(conversationId, async () => {
      const { store } = this.deps;
      const now = this.clock();
      const conversation: Conversation = (await store.getConversation(conversationId)) ?? {
        conversationId,
        channel: ref.channel,
        userId: ref.userId,
        state: 'ACTIVE',
        locale: ref.locale ?? this.config.defaultLocale,
        lastInboundAt: now,
        escalationLevel: 0,
        createdAt: now,
        updatedAt: now,
      };

      if (conversation.pendingQueryId) {
        const pending = await store.getQuery(conversation.pendingQueryId);
        if (pending && !isTerminal(pending)) {
          duplicateSubmissions.inc();
          conversationLogger(conversationId, pending.queryId).info({ state: pending.state }, 'Submission rejected: query already open');
          throw new DuplicatePendingError(conversationId, pending.queryId);
        }
      }

      const query: Query = {
        queryId: uuidv4(),
        conversationId,
        rawText: text,
        normalizedText: normalizeText(text),
        receivedAt: now,
        state: 'RECEIVED',
        candidates: [],
        reviewOutcome: 'pending',
        history: [],
      };
      this.transition(query, 'RETRIEVING', 'retrieval_started', now);

      if (conversation.state === 'EXPIRED') {
        conversation.expiredAt = undefined;
      }
      conversation.state = 'AWAITING_ANSWER';
      conversation.lastInboundAt = now;
      conversation.updatedAt = now;
      conversation.pendingQueryId = query.queryId;
      conversation.assignedExpertId = undefined;
      conversation.escalationLevel = 0;
      if (ref.locale) conversation.locale = ref.locale;

      await store.saveQuery(query);
      await store.saveConversation(conversation);
      return { query, locale: conversation.locale };
    });
  }

  private async retrieve(text: string, locale: string): Promise<KnowledgeCandidate[]> {
    const { timeoutMs, topK } = this.config.retrieval;
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new RetrievalTimeoutError(timeoutMs));
      }, timeoutMs);
    });

    const endTimer = retrievalDuration.startTimer();
    try {
      const candidates = await Promise.race([
        this.deps.retriever.search(text, { topK, locale, signal: controller.signal }),
        timeout,
      ]);
      endTimer({ outcome: candidates.length > 0 ? 'hit' : 'empty' });
      return candidates;
    } catch (err) {
      endTimer({ outcome: err instanceof RetrievalTimeoutError ? 'timeout' : 'error' });
      throw err;
    } finally {
      clearTimeout(timer);
    }
  }

  private async openReview(query: Query, draft: Draft, locale: string, now: number): Promise<void> {
    query.chosenCandidate = draft.chosen;
    query.draftAnswer = draft.draftAnswer;
    this.transition(query, 'PENDING_REVIEW', 'draft_ready', now);

    const expertId = this.pickExpert(0);
    const task: ReviewTask = {
      queryId: query.queryId,
      conversationId: query.conversationId,
      assignedExpertId: expertId,
      escalationLevel: 0,
      createdAt: now,
      windowStartedAt: now,
      deadline: now + reviewWindowMs(this.config, 0),
      remindersSent: this.config.reminderTiers.map(() => false),
    };
    // Task first: a query in PENDING_REVIEW always has one
    await this.deps.tasks.put(task);
    await this.deps.store.saveQuery(query);
    pendingReviews.inc();

    await this.updateConversation(query.conversationId, now, (c) => {
      if (c.pendingQueryId !== query.queryId) return;
      c.assignedExpertId = expertId;
      c.escalationLevel = 0;
    });
    this.deps.reminders.notify(expertId, this.summary('review_request', query, task, locale));
  }

  private async rejectNoAnswer(query: Query, failure: RetrievalUnavailableError | undefined, now: number): Promise<void> {
    const reason = failure instanceof RetrievalTimeoutError
      ? 'retrieval_timeout'
      : failure ? 'retrieval_unavailable' : 'no_candidates';
    conversationLogger(query.conversationId, query.queryId).warn({ err: failure, reason }, 'No answer available');

    query.rejectionReason = 'NoAnswerAvailable';
    this.transition(query, 'REJECTED', reason, now);
    query.closedAt = now;
    await this.deps.store.saveQuery(query);
    await this.updateConversation(query.conversationId, now, (c) => this.release(c, query.queryId));

    await this.deliver(query, 'no_answer', now);
  }

  private async recordCorrection(
    query: Query,
    expertId: string,
    outcome: CorrectionRecord['outcome'],
    finalText: string | null,
    now: number,
  ): Promise<void> {
    const record: CorrectionRecord = {
      correctionId: query.queryId,
      queryId: query.queryId,
      conversationId: query.conversationId,
      originalQuery: query.rawText,
      originalCandidate: query.chosenCandidate
        ? { content: query.chosenCandidate.content, sourceId: query.chosenCandidate.sourceId }
        : null,
      finalText,
      outcome,
      expertId,
      recordedAt: now,
    };
    const appended = await this.deps.ledger.append(record);
    if (appended) {
      this.events.report({ type: 'correction.recorded', queryId: query.queryId, expertId, outcome });
    }
  }

  /**
   * Send `kind` for a query through the outbox. The entry is persisted
   * before the attempt; on success it is cleared and an open query moves to
   * DELIVERED, on failure it stays for the next scheduler tick. Must be
   * called under the query lock.
   */
  private async deliver(query: Query, kind: DeliveryKind, now: number): Promise<boolean> {
    const pending: PendingDelivery = query.pendingDelivery ?? { kind, attempts: 0, queuedAt: now };
    query.pendingDelivery = pending;
    await this.deps.store.saveQuery(query);

    const outcome = await this.dispatch(query, pending.kind);
    pending.attempts += 1;

    if (!outcome.ok) {
      pending.lastError = outcome.error.message;
      await this.deps.store.saveQuery(query);
      this.events.report({
        type: 'delivery.failed',
        queryId: query.queryId,
        conversationId: query.conversationId,
        kind: pending.kind,
        code: outcome.error.code,
        error: outcome.error.message,
        attempts: pending.attempts,
      });
      return false;
    }

    query.pendingDelivery = undefined;
    query.deliveredAt = now;
    query.receiptId = outcome.receipt.receiptId;
    query.deliveryRepresentation = outcome.representation;
    const closes = !isTerminal(query);
    if (closes) {
      this.transition(query, 'DELIVERED', `${pending.kind}_sent`, now);
      query.closedAt = now;
    }
    await this.deps.store.saveQuery(query);

    this.events.report({
      type: 'delivery.sent',
      queryId: query.queryId,
      conversationId: query.conversationId,
      kind: pending.kind,
      representation: outcome.representation,
      receiptId: outcome.receipt.receiptId,
    });
    await this.updateConversation(query.conversationId, now, (c) => {
      c.lastOutboundAt = now;
      if (closes) this.release(c, query.queryId);
    });
    return true;
  }

  /**
   * Start a background outbox attempt for a query. Returns false when one
   * is already running. The attempt takes the query lock itself.
   */
  private startDelivery(queryId: string, at?: number): boolean {
    if (this.inFlight.has(queryId)) return false;

    const attempt = this.guarded(() =>
      this.queryLocks.run(queryId, async () => {
        const query = await this.deps.store.getQuery(queryId);
        if (!query?.pendingDelivery) return false;
        return this.deliver(query, query.pendingDelivery.kind, at ?? this.clock());
      }),
    )
      .catch((err: unknown) => {
        this.events.report({ type: 'scheduler.task_failed', queryId, action: 'deliver', error: errorMessage(err) });
        return false;
      })
      .finally(() => {
        this.inFlight.delete(queryId);
      });
    this.inFlight.set(queryId, attempt);
    return true;
  }

  private async sendUserReminder(conversation: Conversation): Promise<void> {
    const { channel, messages, templates } = this.deps;
    const { conversationId, locale } = conversation;
    try {
      const content = messages.compose('user_reminder', locale);
      const windowOpen = await channel.isFreeFormWindowOpen(conversationId);
      const decision = selectDelivery({ content, windowOpen, templates, locale, defaultLocale: this.config.defaultLocale });
      const receipt = await channel.send(conversationId, decision.payload);
      this.events.report({ type: 'user.reminded', conversationId, representation: decision.representation, receiptId: receipt.receiptId });
    } catch (err) {
      this.events.report({ type: 'user.reminder_failed', conversationId, error: errorMessage(err) });
    }
  }

  /**
   * Drop a due task whose query is gone or already past review. A query
   * still in RETRIEVING lost its draft: close it and queue the apology for
   * the next outbox pass.
   */
  private async dropOrphanTask(query: Query | null, task: ReviewTask, now: number): Promise<SchedulerActionResult> {
    await this.deps.tasks.remove(task.queryId);
    this.events.report({ type: 'review.orphan_removed', queryId: task.queryId, observedState: query?.state ?? 'MISSING' });
    if (query?.state === 'RETRIEVING') {
      query.rejectionReason = 'NoAnswerAvailable';
      this.transition(query, 'REJECTED', 'review_never_opened', now);
      query.closedAt = now;
      query.pendingDelivery = { kind: 'no_answer', attempts: 0, queuedAt: now };
      await this.deps.store.saveQuery(query);
      await this.updateConversation(task.conversationId, now, (c) => this.release(c, task.queryId));
    }
    return { applied: false, reason: 'StaleReviewAction' };
  }

  /** Under the query lock: mark the reminder tier sent and describe it, or say why not */
  private async markReminder(
    queryId: string,
    tierIndex: number,
    now: number,
  ): Promise<SchedulerActionResult | MarkedReminder> {
    return this.queryLocks.run<SchedulerActionResult | MarkedReminder>(queryId, async () => {
      const tiers = this.config.reminderTiers;
      const query = await this.deps.store.getQuery(queryId);
      const task = await this.deps.tasks.get(queryId);
      if (
        !query || !task || query.state !== 'PENDING_REVIEW' ||
        tierIndex < 0 || tierIndex >= tiers.length ||
        task.remindersSent[tierIndex] || now >= task.deadline
      ) {
        return this.staleAction(queryId, 'remind', query?.state);
      }
      if (now < reminderDueAt(task, tiers[tierIndex])) return { applied: false, reason: 'NotDue' };

      const reminded: ReviewTask = {
        ...task,
        remindersSent: tiers.map((_, i) => i <= tierIndex || task.remindersSent[i] === true),
      };
      await this.deps.tasks.put(reminded);

      const conversation = await this.deps.store.getConversation(query.conversationId);
      this.events.report({ type: 'review.reminded', queryId, tier: tierIndex, expertId: task.assignedExpertId });
      return {
        expertId: task.assignedExpertId,
        summary: this.summary('review_reminder', query, reminded, conversation?.locale, tierIndex),
      };
    });
  }

  private async dispatch(query: Query, kind: DeliveryKind): Promise<DispatchOutcome> {
    const { channel, store, messages, templates } = this.deps;
    const conversation = await store.getConversation(query.conversationId);
    const locale = conversation?.locale ?? this.config.defaultLocale;
    const content = messages.compose(kind, locale, {
      question: query.rawText,
      answer: query.finalText ?? '',
    });

    const endTimer = deliveryDuration.startTimer();
    try {
      const windowOpen = await channel.isFreeFormWindowOpen(query.conversationId);
      const decision = selectDelivery({ content, windowOpen, templates, locale, defaultLocale: this.config.defaultLocale });
      if (decision.templateError) {
        this.events.report({
          type: 'delivery.template_fallback',
          conversationId: query.conversationId,
          category: decision.templateError.category,
          locale,
        });
      }
      const receipt = await channel.send(query.conversationId, decision.payload);
      return { ok: true, receipt, representation: decision.representation };
    } catch (err) {
      if (err instanceof StoreUnavailableError) throw err;
      const error = err instanceof DeliveryFailedError
        ? err
        : new DeliveryFailedError(errorMessage(err), query.conversationId, { cause: err });
      return { ok: false, error };
    } finally {
      endTimer();
    }
  }

  private async updateConversation(
    conversationId: string,
    now: number,
    mutate: (conversation: Conversation) => void,
  ): Promise<Conversation | null> {
    return this.conversationLocks.run(conversationId, async () => {
      const conversation = await this.deps.store.getConversation(conversationId);
      if (!conversation) return null;
      mutate(conversation);
      conversation.updatedAt = now;
      await this.deps.store.saveConversation(conversation);
      return conversation;
    });
  }

  /** Detach a closed query from its conversation */
  private release(conversation: Conversation, queryId: string): void {
    if (conversation.pendingQueryId !== queryId) return;
    conversation.pendingQueryId = undefined;
    conversation.assignedExpertId = undefined;
    conversation.escalationLevel = 0;
    if (conversation.state === 'AWAITING_ANSWER') conversation.state = 'ACTIVE';
  }

  private transition(query: Query, to: QueryState, reason: string, at: number): void {
    const from = query.state;
    if (!stateMachine.transition(query, to, reason, at)) {
      throw new Error(`Illegal query transition ${from} -> ${to} (${query.queryId})`);
    }
    this.events.report({ type: 'query.transition', queryId: query.queryId, conversationId: query.conversationId, from, to, reason });
  }

  /** Round-robin within the tier for `level` */
  private pickExpert(level: number): string {
    const tiers = this.config.expertTiers;
    const tier = tiers[Math.min(level, tiers.length - 1)];
    const cursor = this.assignmentCursor.get(level) ?? 0;
    this.assignmentCursor.set(level, cursor + 1);
    return tier[cursor % tier.length];
  }

  private staleAction(queryId: string, action: string, observedState: QueryState | undefined): SchedulerActionResult {
    this.events.report({ type: 'review.stale_action', queryId, action, observedState: observedState ?? 'MISSING' });
    return { applied: false, reason: 'StaleReviewAction' };
  }

  private summary(
    kind: ReviewNoticeKind,
    query: Query,
    task: ReviewTask,
    locale: string | undefined,
    tier?: number,
  ): ReviewSummary {
    return {
      kind,
      queryId: query.queryId,
      conversationId: query.conversationId,
      question: query.rawText,
      draftAnswer: query.draftAnswer ?? '',
      escalationLevel: task.escalationLevel,
      deadline: task.deadline,
      locale: locale ?? this.config.defaultLocale,
      tier,
    };
  }

  private async requireQuery(queryId: string): Promise<Query> {
    const query = await this.deps.store.getQuery(queryId);
    if (!query) throw new QueryNotFoundError(queryId);
    return query;
  }
}
