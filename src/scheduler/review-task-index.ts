/**
 * Review task index.
 *
 * Time-ordered index of pending reviews, owned by the escalation scheduler.
 * Redis + in-memory fallback.
 */

import Redis from 'ioredis';
import { ReviewTask } from '../config/types';
import { StoreUnavailableError } from '../errors/errors';
import { env } from '../config/env';
import { logger } from '../observability/logger';

export interface ReviewTaskIndex {
  get(queryId: string): Promise<ReviewTask | null>;
  /** Insert or replace, re-sorting by deadline */
  put(task: ReviewTask): Promise<void>;
  remove(queryId: string): Promise<void>;
  /** All tasks, earliest deadline first */
  listByDeadline(): Promise<ReviewTask[]>;
  count(): Promise<number>;
}

// ───── Redis Implementation ─────────────────────────────────────

export class RedisReviewTaskIndex implements ReviewTaskIndex {
  private readonly deadlinesKey: string;
  private readonly taskPrefix: string;

  constructor(private readonly redis: Redis, prefix: string = env.redis.keyPrefix) {
    this.deadlinesKey = `${prefix}review:deadlines`;
    this.taskPrefix = `${prefix}review:task:`;
  }

  async get(queryId: string): Promise<ReviewTask | null> {
    try {
      const raw = await this.redis.get(`${this.taskPrefix}${queryId}`);
      return raw ? (JSON.parse(raw) as ReviewTask) : null;
    } catch (err) {
      throw new StoreUnavailableError('reviewTask.get', { cause: err });
    }
  }

  async put(task: ReviewTask): Promise<void> {
    try {
      await this.redis
        .multi()
        .set(`${this.taskPrefix}${task.queryId}`, JSON.stringify(task))
        .zadd(this.deadlinesKey, task.deadline, task.queryId)
        .exec();
    } catch (err) {
      throw new StoreUnavailableError('reviewTask.put', { cause: err });
    }
  }

  async remove(queryId: string): Promise<void> {
    try {
      await this.redis
        .multi()
        .del(`${this.taskPrefix}${queryId}`)
        .zrem(this.deadlinesKey, queryId)
        .exec();
    } catch (err) {
      throw new StoreUnavailableError('reviewTask.remove', { cause: err });
    }
  }

  async listByDeadline(): Promise<ReviewTask[]> {
    try {
      const ids = await this.redis.zrange(this.deadlinesKey, 0, -1);
      if (ids.length === 0) return [];
      const raws = await this.redis.mget(...ids.map((id) => `${this.taskPrefix}${id}`));
      const tasks: ReviewTask[] = [];
      for (const raw of raws) {
        // removed between the two reads
        if (raw) tasks.push(JSON.parse(raw) as ReviewTask);
      }
      return tasks;
    } catch (err) {
      throw new StoreUnavailableError('reviewTask.list', { cause: err });
    }
  }

  async count(): Promise<number> {
    try {
      return await this.redis.zcard(this.deadlinesKey);
    } catch (err) {
      throw new StoreUnavailableError('reviewTask.count', { cause: err });
    }
  }
}

// ───── In-Memory Implementation ─────────────────────────────────

export class InMemoryReviewTaskIndex implements ReviewTaskIndex {
  private readonly tasks = new Map<string, ReviewTask>();

  async get(queryId: string): Promise<ReviewTask | null> {
    const task = this.tasks.get(queryId);
    return task ? structuredClone(task) : null;
  }

  async put(task: ReviewTask): Promise<void> {
    this.tasks.set(task.queryId, structuredClone(task));
  }

  async remove(queryId: string): Promise<void> {
    this.tasks.delete(queryId);
  }

  async listByDeadline(): Promise<ReviewTask[]> {
    return Array.from(this.tasks.values())
      .sort((a, b) => a.deadline - b.deadline)
      .map((t) => structuredClone(t));
  }

  async count(): Promise<number> {
    return this.tasks.size;
  }
}

// ───── Factory ──────────────────────────────────────────────────

export function createReviewTaskIndex(redis?: Redis): ReviewTaskIndex {
  if (redis) {
    logger.info('Review task index: Redis-backed');
    return new RedisReviewTaskIndex(redis);
  }
  logger.info('Review task index: In-memory');
  return new InMemoryReviewTaskIndex();
}
