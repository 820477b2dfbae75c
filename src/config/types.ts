/** Channel identifier. Providers are opaque to the engine; the adapter behind the id owns the transport. */
export type Channel = string;

/** Query lifecycle states */
export type QueryState =
  | 'RECEIVED'
  | 'RETRIEVING'
  | 'PENDING_REVIEW'
  | 'APPROVED'
  | 'EDITED'
  | 'REJECTED'
  | 'DELIVERED'
  | 'EXPIRED';

/** Conversation-level state */
export type ConversationState = 'ACTIVE' | 'AWAITING_ANSWER' | 'EXPIRED';

/** Expert review outcome. Moves only from `pending` to one of the others. */
export type ReviewOutcome = 'pending' | 'approved' | 'edited' | 'rejected';

export type RejectionReason = 'NoAnswerAvailable' | 'ExpertRejected';

export type ExpertDecision = 'approve' | 'edit' | 'reject';

/** What a pending outbox delivery tells the user */
export type DeliveryKind =
  | 'verified_answer'
  | 'corrected_answer'
  | 'rejected_answer'
  | 'no_answer'
  | 'still_working';

export type DeliveryRepresentation = 'template' | 'free_form';

/** Identity of a conversation as seen by the front door */
export interface ConversationRef {
  channel: Channel;
  userId: string;
  locale?: string;
}

export interface Conversation {
  /** `${channel}:${userId}` */
  conversationId: string;
  channel: Channel;
  userId: string;
  state: ConversationState;
  locale: string;
  lastInboundAt: number;
  lastOutboundAt?: number;
  pendingQueryId?: string;
  assignedExpertId?: string;
  escalationLevel: number;
  createdAt: number;
  updatedAt: number;
  expiredAt?: number;
  /** Last idle reminder sent to the user */
  lastUserReminderAt?: number;
}

/** One ranked answer candidate returned by the knowledge retriever */
export interface KnowledgeCandidate {
  content: string;
  sourceId: string;
  score: number;
}

export interface QueryTransition {
  from: QueryState;
  to: QueryState;
  reason: string;
  at: number;
}

/** Outbox entry kept on the query until the channel confirms the send */
export interface PendingDelivery {
  kind: DeliveryKind;
  attempts: number;
  queuedAt: number;
  lastError?: string;
}

export interface Query {
  queryId: string;
  conversationId: string;
  rawText: string;
  normalizedText: string;
  receivedAt: number;
  state: QueryState;
  /** Ranked, frozen once retrieval completes */
  candidates: readonly KnowledgeCandidate[];
  chosenCandidate?: KnowledgeCandidate;
  draftAnswer?: string;
  reviewOutcome: ReviewOutcome;
  rejectionReason?: RejectionReason;
  actedBy?: string;
  actedAt?: number;
  /** Text the user ultimately receives as the answer */
  finalText?: string;
  deliveryRepresentation?: DeliveryRepresentation;
  pendingDelivery?: PendingDelivery;
  deliveredAt?: number;
  receiptId?: string;
  closedAt?: number;
  history: QueryTransition[];
}

export interface ReviewTask {
  queryId: string;
  conversationId: string;
  assignedExpertId: string;
  escalationLevel: number;
  createdAt: number;
  /** Start of the current assignment window (creation or last escalation) */
  windowStartedAt: number;
  deadline: number;
  /** One flag per configured reminder tier, reset on reassignment */
  remindersSent: boolean[];
}

export interface QueryHandle {
  queryId: string;
  conversationId: string;
  state: QueryState;
}

/** Read-only diagnostic projection of a conversation */
export interface ConversationStatus {
  conversationId: string;
  channel: Channel;
  userId: string;
  state: ConversationState;
  locale: string;
  lastInboundAt: number;
  lastOutboundAt?: number;
  escalationLevel: number;
  assignedExpertId?: string;
  pendingQuery?: {
    queryId: string;
    state: QueryState;
    receivedAt: number;
    reviewDeadline?: number;
    awaitingDelivery: boolean;
  };
}

export function conversationIdFor(ref: Pick<ConversationRef, 'channel' | 'userId'>): string {
  return `${ref.channel}:${ref.userId}`;
}
