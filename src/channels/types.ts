import { RenderedPayload } from '../delivery/types';

export interface DeliveryReceipt {
  receiptId: string;
  sentAt: number;
}

export interface SendOptions {
  /** Aborted when the per-attempt timeout fires */
  signal?: AbortSignal;
}

/**
 * Provider capability interface. The engine never branches on the provider
 * behind it; window rules and transport live in the implementation.
 */
export interface ChannelAdapter {
  isFreeFormWindowOpen(conversationId: string): Promise<boolean>;
  /** Rejects with DeliveryFailedError */
  send(conversationId: string, payload: RenderedPayload, options?: SendOptions): Promise<DeliveryReceipt>;
}

export type ReviewNoticeKind = 'review_request' | 'review_reminder' | 'review_escalation';

/** What an expert is told about a pending review */
export interface ReviewSummary {
  kind: ReviewNoticeKind;
  queryId: string;
  conversationId: string;
  question: string;
  draftAnswer: string;
  escalationLevel: number;
  deadline: number;
  locale: string;
  /** Reminder tier index, for `review_reminder` */
  tier?: number;
}

/** Expert notifications. Fire-and-forget: never throws, never blocks a transition. */
export interface ReminderSink {
  notify(expertId: string, summary: ReviewSummary): void;
  /** One message covering every reminder due for the expert in a tick */
  notifyDigest(expertId: string, summaries: readonly ReviewSummary[]): void;
}

/** Source of truth for when a participant last wrote to us */
export interface WindowPolicy {
  isOpen(conversationId: string): Promise<boolean>;
}
