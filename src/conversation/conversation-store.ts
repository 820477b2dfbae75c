import Redis from 'ioredis';
import { Conversation, Query } from '../config/types';
import { ConversationStore } from './types';
import { StoreUnavailableError } from '../errors/errors';
import { env } from '../config/env';
import { logger } from '../observability/logger';

async function guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    throw new StoreUnavailableError(operation, { cause: err });
  }
}

/**
 * Redis-backed conversation store.
 * JSON documents per conversation and query, a set for the delivery outbox
 * and a sorted set of active conversations scored by last inbound time.
 */
export class RedisConversationStore implements ConversationStore {
  private readonly prefix: string;

  constructor(private readonly redis: Redis, prefix: string = env.redis.keyPrefix) {
    this.prefix = prefix;
  }

  private conversationKey(conversationId: string): string {
    return `${this.prefix}conv:${conversationId}`;
  }

  private queryKey(queryId: string): string {
    return `${this.prefix}query:${queryId}`;
  }

  private get outboxKey(): string {
    return `${this.prefix}outbox`;
  }

  private get activityKey(): string {
    return `${this.prefix}conv:activity`;
  }

  async getConversation(conversationId: string): Promise<Conversation | null> {
    const raw = await guard('getConversation', () => this.redis.get(this.conversationKey(conversationId)));
    return raw ? (JSON.parse(raw) as Conversation) : null;
  }

  async saveConversation(conversation: Conversation): Promise<void> {
    await guard('saveConversation', async () => {
      const pipe = this.redis.multi();
      pipe.set(this.conversationKey(conversation.conversationId), JSON.stringify(conversation));
      if (conversation.state === 'EXPIRED') {
        pipe.zrem(this.activityKey, conversation.conversationId);
      } else {
        pipe.zadd(this.activityKey, conversation.lastInboundAt, conversation.conversationId);
      }
      await pipe.exec();
    });
  }

  async getQuery(queryId: string): Promise<Query | null> {
    const raw = await guard('getQuery', () => this.redis.get(this.queryKey(queryId)));
    return raw ? (JSON.parse(raw) as Query) : null;
  }

  async saveQuery(query: Query): Promise<void> {
    await guard('saveQuery', async () => {
      const pipe = this.redis.multi();
      pipe.set(this.queryKey(query.queryId), JSON.stringify(query));
      if (query.pendingDelivery) {
        pipe.sadd(this.outboxKey, query.queryId);
      } else {
        pipe.srem(this.outboxKey, query.queryId);
      }
      await pipe.exec();
    });
  }

  async listPendingDeliveries(): Promise<string[]> {
    return guard('listPendingDeliveries', () => this.redis.smembers(this.outboxKey));
  }

  async listIdleConversations(before: number): Promise<string[]> {
    return guard('listIdleConversations', () => this.redis.zrangebyscore(this.activityKey, '-inf', `(${before}`));
  }

  async ping(): Promise<void> {
    await guard('ping', () => this.redis.ping());
  }
}

/**
 * In-memory conversation store (dev/test fallback).
 * Records are copied on the way in and out so callers never share state with the store.
 */
export class InMemoryConversationStore implements ConversationStore {
  private readonly conversations = new Map<string, Conversation>();
  private readonly queries = new Map<string, Query>();
  private readonly outbox = new Set<string>();

  async getConversation(conversationId: string): Promise<Conversation | null> {
    const found = this.conversations.get(conversationId);
    return found ? structuredClone(found) : null;
  }

  async saveConversation(conversation: Conversation): Promise<void> {
    this.conversations.set(conversation.conversationId, structuredClone(conversation));
  }

  async getQuery(queryId: string): Promise<Query | null> {
    const found = this.queries.get(queryId);
    return found ? structuredClone(found) : null;
  }

  async saveQuery(query: Query): Promise<void> {
    this.queries.set(query.queryId, structuredClone(query));
    if (query.pendingDelivery) {
      this.outbox.add(query.queryId);
    } else {
      this.outbox.delete(query.queryId);
    }
  }

  async listPendingDeliveries(): Promise<string[]> {
    return Array.from(this.outbox);
  }

  async listIdleConversations(before: number): Promise<string[]> {
    return Array.from(this.conversations.values())
      .filter((c) => c.state !== 'EXPIRED' && c.lastInboundAt < before)
      .sort((a, b) => a.lastInboundAt - b.lastInboundAt)
      .map((c) => c.conversationId);
  }

  async ping(): Promise<void> {
    // always reachable
  }

  /** All queries of one conversation, oldest first (test/diagnostic helper) */
  queriesFor(conversationId: string): Query[] {
    return Array.from(this.queries.values())
      .filter((q) => q.conversationId === conversationId)
      .sort((a, b) => a.receivedAt - b.receivedAt)
      .map((q) => structuredClone(q));
  }
}

/**
 * Create the appropriate store based on environment.
 */
export function createConversationStore(redis?: Redis): ConversationStore {
  if (redis) {
    logger.info('Conversation store: Redis-backed');
    return new RedisConversationStore(redis);
  }
  logger.warn('Using in-memory conversation store (no Redis)');
  return new InMemoryConversationStore();
}
