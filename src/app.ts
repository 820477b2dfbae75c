import Fastify, { FastifyInstance } from 'fastify';
import Redis from 'ioredis';
import { env } from './config/env';
import { EngineConfig, hoursToMs, loadEngineConfig } from './config/engine-config';
import { logger } from './observability/logger';
import { httpRequestDuration } from './observability/metrics';
import { EventReporter } from './observability/events';
import { createConversationStore } from './conversation/conversation-store';
import { createReviewTaskIndex } from './scheduler/review-task-index';
import { EscalationScheduler } from './scheduler/escalation-scheduler';
import { createCorrectionLedger } from './feedback/correction-ledger';
import { loadTemplates } from './delivery/template-registry';
import { MessageCatalog } from './delivery/message-catalog';
import { FreeFormWindowPolicy } from './channels/free-form-window';
import { HttpRelayChannelAdapter } from './channels/http-relay-channel-adapter';
import { LoggingChannelAdapter } from './channels/logging-channel-adapter';
import { RetryingChannelAdapter } from './channels/retrying-channel-adapter';
import { ChannelReminderSink } from './channels/channel-reminder-sink';
import { ChannelAdapter, WindowPolicy } from './channels/types';
import { FanOutRetriever } from './knowledge/fan-out-retriever';
import { loadKnowledgeSources } from './knowledge/keyword-knowledge-source';
import { KnowledgeRetriever } from './knowledge/types';
import { VerificationEngine } from './orchestrator/verification-engine';
import { StoreUnavailableError } from './errors/errors';
import { errorHandler } from './api/error-handler';
import { registerEngineRoutes } from './api/routes';
import { registerHealthRoutes } from './health/health-routes';

export interface AppContext {
  app: FastifyInstance;
  engine: VerificationEngine;
  scheduler: EscalationScheduler;
  redis?: Redis;
}

/** Replaceable collaborators, for tests and embedding */
export interface AppOverrides {
  config?: EngineConfig;
  /** Build the transport from the window policy; defaults to relay or logging adapter */
  channel?: (window: WindowPolicy) => ChannelAdapter;
  retriever?: KnowledgeRetriever;
  clock?: () => number;
  /** Skip Redis even when REDIS_URL is set */
  inMemory?: boolean;
  onFatal?: (err: StoreUnavailableError) => void;
}

async function connectRedis(): Promise<Redis | undefined> {
  if (!env.redis.url) {
    logger.info('REDIS_URL not set; using in-memory stores');
    return undefined;
  }
  try {
    const redisInstance = new Redis(env.redis.url, {
      maxRetriesPerRequest: 3,
      retryStrategy(times) {
        if (times > 5) return null; // stop retrying
        return Math.min(times * 200, 2000);
      },
      lazyConnect: true,
    });
    // Attach error handler BEFORE connect to prevent unhandled error events
    redisInstance.on('error', (err) => {
      logger.debug({ err: err.message }, 'Redis connection error (handled)');
    });
    await redisInstance.connect();
    logger.info('Redis connected');
    return redisInstance;
  } catch (err) {
    logger.warn({ err }, 'Redis not available; using in-memory fallback');
    return undefined;
  }
}

export async function buildApp(overrides: AppOverrides = {}): Promise<AppContext> {
  const app = Fastify({
    logger: false, // We use our own Pino logger
    trustProxy: true,
    bodyLimit: 1_048_576, // 1 MB
  });

  // Request timing middleware
  app.addHook('onResponse', (req, reply, done) => {
    const route = req.routeOptions?.url ?? req.url;
    httpRequestDuration.observe(
      { method: req.method, route, status_code: String(reply.statusCode) },
      reply.elapsedTime / 1000,
    );
    done();
  });
  app.setErrorHandler(errorHandler);

  const redis = overrides.inMemory ? undefined : await connectRedis();
  const clock = overrides.clock ?? Date.now;

  // Configuration files
  const config = overrides.config ?? loadEngineConfig(env.engine.configPath);
  const templates = loadTemplates(env.engine.templatesPath);
  const messages = MessageCatalog.load(env.engine.messagesPath, config.defaultLocale);

  // Stores
  const store = createConversationStore(redis);
  const tasks = createReviewTaskIndex(redis);
  const ledger = createCorrectionLedger(redis);

  // Channel: window policy from the conversation record, bounded retries on top
  const window = new FreeFormWindowPolicy(store, hoursToMs(config.freeFormWindowHours), clock);
  const transport = overrides.channel
    ? overrides.channel(window)
    : env.channel.relayUrl
      ? new HttpRelayChannelAdapter({ relayUrl: env.channel.relayUrl, token: env.channel.relayToken, window })
      : new LoggingChannelAdapter(window);
  const channel = new RetryingChannelAdapter(transport, config.delivery);

  const retriever = overrides.retriever
    ?? new FanOutRetriever(loadKnowledgeSources(env.engine.knowledgeDir), { minScore: config.retrieval.minScore });

  const reminders = new ChannelReminderSink({ channel, messages, templates, defaultLocale: config.defaultLocale });

  const engine = new VerificationEngine({
    store,
    tasks,
    retriever,
    channel,
    reminders,
    ledger,
    templates,
    messages,
    config,
    events: new EventReporter(),
    clock,
    onFatal: overrides.onFatal,
  });
  const scheduler = new EscalationScheduler(engine, { tasks, store, clock });

  registerHealthRoutes(app, store);
  registerEngineRoutes(app, { engine, scheduler, ledger, messages });

  app.addHook('onClose', async () => {
    scheduler.stop();
    await engine.settleDeliveries();
  });

  logger.info({
    redis: Boolean(redis),
    transport: overrides.channel ? 'custom' : env.channel.relayUrl ? 'http-relay' : 'logging',
    reviewSlaMinutes: config.reviewSlaMinutes,
    maxEscalationLevel: config.maxEscalationLevel,
  }, 'Expert relay initialized');

  return { app, engine, scheduler, redis };
}
