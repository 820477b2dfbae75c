import * as fs from 'fs';
import Ajv from 'ajv';
import yaml from 'js-yaml';
import { ConfigError } from '../errors/errors';
import { logger } from '../observability/logger';

export interface EngineConfig {
  /** Time a level-0 expert has to act before escalation */
  reviewSlaMinutes: number;
  /** Each escalation level gets `reviewSla × backoffFactor^level` */
  backoffFactor: number;
  maxEscalationLevel: number;
  /** Fractions of the current review window at which the expert is reminded */
  reminderTiers: number[];
  /** Expert ids per escalation level; index 0 is the primary tier */
  expertTiers: string[][];
  retrieval: {
    timeoutMs: number;
    topK: number;
    minScore: number;
  };
  delivery: {
    timeoutMs: number;
    maxAttempts: number;
    retryDelayMs: number;
  };
  freeFormWindowHours: number;
  conversationIdleTtlHours: number;
  /** Idle time between reminders to a user with no open question; 0 turns them off */
  userReminderHours: number;
  defaultLocale: string;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  reviewSlaMinutes: 60,
  backoffFactor: 2,
  maxEscalationLevel: 2,
  reminderTiers: [0.5, 0.9],
  expertTiers: [['expert-primary'], ['expert-senior'], ['expert-lead']],
  retrieval: { timeoutMs: 10_000, topK: 3, minScore: 0.3 },
  delivery: { timeoutMs: 15_000, maxAttempts: 3, retryDelayMs: 1_000 },
  freeFormWindowHours: 24,
  conversationIdleTtlHours: 72,
  userReminderHours: 24,
  defaultLocale: 'en',
};

const positiveInt = { type: 'integer', minimum: 1 };

const schema = {
  type: 'object',
  additionalProperties: false,
  required: [
    'reviewSlaMinutes', 'backoffFactor', 'maxEscalationLevel', 'reminderTiers', 'expertTiers',
    'retrieval', 'delivery', 'freeFormWindowHours', 'conversationIdleTtlHours', 'userReminderHours', 'defaultLocale',
  ],
  properties: {
    reviewSlaMinutes: { type: 'number', exclusiveMinimum: 0 },
    backoffFactor: { type: 'number', minimum: 1 },
    maxEscalationLevel: { type: 'integer', minimum: 0 },
    reminderTiers: {
      type: 'array',
      items: { type: 'number', exclusiveMinimum: 0, exclusiveMaximum: 1 },
    },
    expertTiers: {
      type: 'array',
      minItems: 1,
      items: { type: 'array', minItems: 1, items: { type: 'string', minLength: 1 } },
    },
    retrieval: {
      type: 'object',
      additionalProperties: false,
      required: ['timeoutMs', 'topK', 'minScore'],
      properties: {
        timeoutMs: positiveInt,
        topK: positiveInt,
        minScore: { type: 'number', minimum: 0 },
      },
    },
    delivery: {
      type: 'object',
      additionalProperties: false,
      required: ['timeoutMs', 'maxAttempts', 'retryDelayMs'],
      properties: {
        timeoutMs: positiveInt,
        maxAttempts: positiveInt,
        retryDelayMs: { type: 'integer', minimum: 0 },
      },
    },
    freeFormWindowHours: { type: 'number', minimum: 0 },
    conversationIdleTtlHours: { type: 'number', exclusiveMinimum: 0 },
    userReminderHours: { type: 'number', minimum: 0 },
    defaultLocale: { type: 'string', minLength: 1 },
  },
};

const ajv = new Ajv({ allErrors: true });
const validate = ajv.compile<EngineConfig>(schema);

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Merge a partial config over the defaults and validate the result.
 * Nested `retrieval` / `delivery` blocks merge key by key.
 */
export function resolveEngineConfig(input: unknown): EngineConfig {
  if (input !== undefined && input !== null && !isRecord(input)) {
    throw new ConfigError('Engine config must be a mapping');
  }
  const overrides = input ?? {};
  const merged: Record<string, unknown> = { ...DEFAULT_ENGINE_CONFIG, ...overrides };
  for (const block of ['retrieval', 'delivery'] as const) {
    const override = overrides[block];
    if (isRecord(override)) {
      merged[block] = { ...DEFAULT_ENGINE_CONFIG[block], ...override };
    }
  }

  if (!validate(merged)) {
    const errors = validate.errors?.map((e) => `${e.instancePath || '/'} ${e.message}`).join('; ');
    throw new ConfigError(`Invalid engine config: ${errors}`);
  }

  if (merged.maxEscalationLevel > merged.expertTiers.length - 1) {
    throw new ConfigError(
      `maxEscalationLevel ${merged.maxEscalationLevel} needs ${merged.maxEscalationLevel + 1} expert tiers, got ${merged.expertTiers.length}`,
    );
  }

  const tiers = merged.reminderTiers;
  for (let i = 1; i < tiers.length; i++) {
    if (tiers[i] <= tiers[i - 1]) {
      throw new ConfigError('reminderTiers must be strictly ascending');
    }
  }

  return merged;
}

export function loadEngineConfig(filePath: string): EngineConfig {
  if (!fs.existsSync(filePath)) {
    logger.warn({ filePath }, 'Engine config not found; using built-in defaults');
    return resolveEngineConfig(undefined);
  }
  let parsed: unknown;
  try {
    parsed = yaml.load(fs.readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`Failed to parse engine config ${filePath}: ${err instanceof Error ? err.message : String(err)}`);
  }
  const config = resolveEngineConfig(parsed);
  logger.info({
    filePath,
    reviewSlaMinutes: config.reviewSlaMinutes,
    backoffFactor: config.backoffFactor,
    maxEscalationLevel: config.maxEscalationLevel,
  }, 'Engine config loaded');
  return config;
}

export function minutesToMs(minutes: number): number {
  return Math.round(minutes * 60_000);
}

export function hoursToMs(hours: number): number {
  return Math.round(hours * 3_600_000);
}
