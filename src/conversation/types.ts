import { Conversation, Query } from '../config/types';

/**
 * Durable conversation and query state. Only the verification engine writes
 * through this interface.
 */
export interface ConversationStore {
  getConversation(conversationId: string): Promise<Conversation | null>;
  saveConversation(conversation: Conversation): Promise<void>;
  getQuery(queryId: string): Promise<Query | null>;
  /** Also maintains the outbox index from `query.pendingDelivery` */
  saveQuery(query: Query): Promise<void>;
  /** Ids of queries whose delivery is queued for retry */
  listPendingDeliveries(): Promise<string[]>;
  /** Non-expired conversations with no inbound message since `before` */
  listIdleConversations(before: number): Promise<string[]>;
  /** Throws StoreUnavailableError when the backing store cannot be reached */
  ping(): Promise<void>;
}
