/**
 * Pending-corrections ledger.
 *
 * Append-only. Records are frozen on append; external ingestion reads them
 * through `list` and never writes back.
 */

import Redis from 'ioredis';
import { CorrectionLedger, CorrectionRecord } from './types';
import { StoreUnavailableError } from '../errors/errors';
import { env } from '../config/env';
import { logger } from '../observability/logger';

function freeze(record: CorrectionRecord): CorrectionRecord {
  return Object.freeze({
    ...record,
    originalCandidate: record.originalCandidate ? Object.freeze({ ...record.originalCandidate }) : null,
  });
}

// ───── Redis Implementation ─────────────────────────────────────

export class RedisCorrectionLedger implements CorrectionLedger {
  private readonly recordsKey: string;
  private readonly orderKey: string;

  constructor(private readonly redis: Redis, prefix: string = env.redis.keyPrefix) {
    this.recordsKey = `${prefix}corrections`;
    this.orderKey = `${prefix}corrections:order`;
  }

  async append(record: CorrectionRecord): Promise<boolean> {
    try {
      const created = await this.redis.hsetnx(this.recordsKey, record.correctionId, JSON.stringify(record));
      if (created === 0) return false;
      await this.redis.rpush(this.orderKey, record.correctionId);
      return true;
    } catch (err) {
      throw new StoreUnavailableError('corrections.append', { cause: err });
    }
  }

  async list(since?: number): Promise<CorrectionRecord[]> {
    let raws: Array<string | null>;
    try {
      const ids = await this.redis.lrange(this.orderKey, 0, -1);
      if (ids.length === 0) return [];
      raws = await this.redis.hmget(this.recordsKey, ...ids);
    } catch (err) {
      throw new StoreUnavailableError('corrections.list', { cause: err });
    }
    const records: CorrectionRecord[] = [];
    for (const raw of raws) {
      if (!raw) continue;
      const record = JSON.parse(raw) as CorrectionRecord;
      if (since === undefined || record.recordedAt >= since) records.push(freeze(record));
    }
    return records;
  }
}

// ───── In-Memory Implementation ─────────────────────────────────

export class InMemoryCorrectionLedger implements CorrectionLedger {
  private readonly records: CorrectionRecord[] = [];
  private readonly ids = new Set<string>();

  async append(record: CorrectionRecord): Promise<boolean> {
    if (this.ids.has(record.correctionId)) return false;
    this.ids.add(record.correctionId);
    this.records.push(freeze(record));
    return true;
  }

  async list(since?: number): Promise<CorrectionRecord[]> {
    return this.records.filter((r) => since === undefined || r.recordedAt >= since);
  }
}

// ───── Factory ──────────────────────────────────────────────────

export function createCorrectionLedger(redis?: Redis): CorrectionLedger {
  if (redis) {
    logger.info('Correction ledger: Redis-backed');
    return new RedisCorrectionLedger(redis);
  }
  logger.info('Correction ledger: In-memory');
  return new InMemoryCorrectionLedger();
}
