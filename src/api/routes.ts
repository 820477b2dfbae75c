import { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { ExpertDecision } from '../config/types';
import { env } from '../config/env';
import { VerificationEngine } from '../orchestrator/verification-engine';
import { EscalationScheduler } from '../scheduler/escalation-scheduler';
import { CorrectionLedger } from '../feedback/types';
import { MessageCatalog } from '../delivery/message-catalog';
import { DuplicatePendingError } from '../errors/errors';

export interface RouteDeps {
  engine: VerificationEngine;
  scheduler: EscalationScheduler;
  ledger: CorrectionLedger;
  messages: MessageCatalog;
}

interface SubmitBody {
  channel: string;
  userId: string;
  text: string;
  locale?: string;
}

interface DecisionBody {
  expertId: string;
  decision: ExpertDecision;
  editedText?: string;
}

const submitSchema = {
  body: {
    type: 'object',
    required: ['channel', 'userId', 'text'],
    additionalProperties: false,
    properties: {
      channel: { type: 'string', minLength: 1, pattern: '^[^:]+$' },
      userId: { type: 'string', minLength: 1 },
      text: { type: 'string', minLength: 1, maxLength: 4096 },
      locale: { type: 'string', minLength: 2 },
    },
  },
};

const decisionSchema = {
  params: {
    type: 'object',
    required: ['queryId'],
    properties: { queryId: { type: 'string', minLength: 1 } },
  },
  body: {
    type: 'object',
    required: ['expertId', 'decision'],
    additionalProperties: false,
    properties: {
      expertId: { type: 'string', minLength: 1 },
      decision: { type: 'string', enum: ['approve', 'edit', 'reject'] },
      editedText: { type: 'string', maxLength: 4096 },
    },
  },
};

/** Admin routes are open when no ADMIN_API_KEY is configured */
function verifyAdminKey(req: FastifyRequest, reply: FastifyReply): boolean {
  if (!env.security.adminApiKey) return true;
  const key = req.headers['x-admin-api-key'];
  if (typeof key !== 'string' || key !== env.security.adminApiKey) {
    reply.status(403).send({ error: 'Forbidden' });
    return false;
  }
  return true;
}

export function registerEngineRoutes(app: FastifyInstance, deps: RouteDeps): void {
  const { engine, scheduler, ledger, messages } = deps;

  /** Inbound user question from the front door */
  app.post<{ Body: SubmitBody }>('/queries', { schema: submitSchema }, async (req, reply) => {
    try {
      const handle = await engine.submit(req.body, req.body.text);
      return reply.status(201).send(handle);
    } catch (err) {
      if (err instanceof DuplicatePendingError) {
        const locale = req.body.locale ?? engine.config.defaultLocale;
        return reply.status(409).send({
          error: err.code,
          pendingQueryId: err.pendingQueryId,
          message: messages.text('duplicate_pending', locale),
        });
      }
      throw err;
    }
  });

  /** Expert verdict. A stale verdict is answered 200 with status "stale", never as an error. */
  app.post<{ Params: { queryId: string }; Body: DecisionBody }>(
    '/queries/:queryId/decision',
    { schema: decisionSchema },
    async (req, reply) => {
      const { expertId, decision, editedText } = req.body;
      const result = await engine.recordExpertDecision(req.params.queryId, expertId, decision, editedText);
      if (result.status === 'stale') {
        return reply.send({ status: 'stale', queryId: result.queryId, observedState: result.error.observedState });
      }
      return reply.send(result);
    },
  );

  app.get<{ Params: { queryId: string } }>('/queries/:queryId', async (req, reply) => {
    if (!verifyAdminKey(req, reply)) return;
    const query = await engine.getQuery(req.params.queryId);
    return reply.send(query);
  });

  app.get<{ Params: { conversationId: string } }>('/conversations/:conversationId/status', async (req, reply) => {
    if (!verifyAdminKey(req, reply)) return;
    const status = await engine.getConversationStatus(req.params.conversationId);
    return reply.send(status);
  });

  /** One scheduler tick, for external timers */
  app.post('/schedule', async (req, reply) => {
    if (!verifyAdminKey(req, reply)) return;
    const report = await scheduler.tick();
    return reply.send(report);
  });

  /** Pending corrections for knowledge-base ingestion */
  app.get<{ Querystring: { since?: number } }>(
    '/corrections',
    { schema: { querystring: { type: 'object', properties: { since: { type: 'integer', minimum: 0 } } } } },
    async (req, reply) => {
      if (!verifyAdminKey(req, reply)) return;
      const corrections = await ledger.list(req.query.since);
      return reply.send({ count: corrections.length, corrections });
    },
  );
}
