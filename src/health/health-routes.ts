import { FastifyInstance } from 'fastify';
import { ConversationStore } from '../conversation/types';
import { getMetrics, getContentType } from '../observability/metrics';

export function registerHealthRoutes(app: FastifyInstance, store: ConversationStore): void {
  /** Liveness: 200 while the process runs */
  app.get('/health', async (_req, reply) => {
    return reply.send({ status: 'ok', timestamp: new Date().toISOString() });
  });

  /** Readiness: the conversation store must answer */
  app.get('/ready', async (_req, reply) => {
    const checks: Record<string, { status: string; latencyMs?: number }> = {};

    const start = Date.now();
    try {
      await store.ping();
      checks.store = { status: 'ok', latencyMs: Date.now() - start };
    } catch {
      checks.store = { status: 'error', latencyMs: Date.now() - start };
    }

    const allOk = Object.values(checks).every((c) => c.status === 'ok');
    return reply.status(allOk ? 200 : 503).send({
      status: allOk ? 'ready' : 'not_ready',
      checks,
      timestamp: new Date().toISOString(),
    });
  });

  /** Prometheus metrics endpoint */
  app.get('/metrics', async (_req, reply) => {
    const metrics = await getMetrics();
    reply.header('Content-Type', getContentType());
    return reply.send(metrics);
  });
}
