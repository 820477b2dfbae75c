import { FastifyInstance } from 'fastify';
import { buildApp } from '../../src/app';
import { VerificationEngine } from '../../src/orchestrator/verification-engine';
import { env } from '../../src/config/env';
import { RetrievalUnavailableError } from '../../src/errors/errors';
import { KnowledgeCandidate } from '../../src/config/types';
import { KnowledgeSearchOptions } from '../../src/knowledge/types';
import { CHEMO_CANDIDATES, CHEMO_QUESTION, FakeChannel, MINUTE, T0, testConfig } from '../helpers/engine-harness';

const ADMIN_KEY = 'test-admin-key';
const admin = { 'x-admin-api-key': ADMIN_KEY };
const CONVERSATION_PATH = `/conversations/${encodeURIComponent('whatsapp:conv1')}/status`;

describe('API Integration Flow', () => {
  let app: FastifyInstance;
  let engine: VerificationEngine;
  let channel: FakeChannel;
  let clock: { now: number };
  const retriever = {
    search: jest.fn(async (_text: string, _options: KnowledgeSearchOptions): Promise<KnowledgeCandidate[]> => CHEMO_CANDIDATES),
  };
  const previousAdminKey = env.security.adminApiKey;

  beforeAll(() => {
    env.security.adminApiKey = ADMIN_KEY;
  });

  afterAll(() => {
    env.security.adminApiKey = previousAdminKey;
  });

  beforeEach(async () => {
    channel = new FakeChannel();
    clock = { now: T0 };
    const result = await buildApp({
      inMemory: true,
      config: testConfig(),
      channel: () => channel,
      retriever,
      clock: () => clock.now,
    });
    app = result.app;
    engine = result.engine;
    await app.ready();
  });

  afterEach(async () => {
    await app.close();
  });

  function userMessages(): string[] {
    return channel.sent
      .filter((s) => s.conversationId === 'whatsapp:conv1')
      .map((s) => (s.payload.representation === 'free_form' ? s.payload.text : s.payload.preview));
  }

  async function ask(text = CHEMO_QUESTION) {
    return app.inject({
      method: 'POST',
      url: '/queries',
      payload: { channel: 'whatsapp', userId: 'conv1', text },
    });
  }

  describe('POST /queries', () => {
    it('should open a review and refuse a second question meanwhile', async () => {
      const first = await ask();
      expect(first.statusCode).toBe(201);
      const handle = first.json();
      expect(handle).toMatchObject({ conversationId: 'whatsapp:conv1', state: 'PENDING_REVIEW' });

      const second = await ask('Can I exercise?');
      expect(second.statusCode).toBe(409);
      expect(second.json()).toEqual({
        error: 'DuplicatePending',
        pendingQueryId: handle.queryId,
        message: 'Please wait for the answer to your previous question before asking a new one.',
      });
    });

    it('should apologise at once when retrieval is down', async () => {
      retriever.search.mockRejectedValueOnce(new RetrievalUnavailableError());

      const res = await ask();

      expect(res.statusCode).toBe(201);
      expect(res.json().state).toBe('REJECTED');
      expect(userMessages()).toEqual([
        `Sorry, we do not have an answer to "${CHEMO_QUESTION}" yet. Our team has been notified.`,
      ]);
    });

    it('should reject an invalid body', async () => {
      const res = await app.inject({ method: 'POST', url: '/queries', payload: { channel: 'whatsapp', userId: 'conv1' } });

      expect(res.statusCode).toBe(400);
      expect(res.json().error).toBe('ValidationError');
    });
  });

  describe('POST /queries/:queryId/decision', () => {
    it('should deliver an edit once and record the correction', async () => {
      const { queryId } = (await ask()).json();
      clock.now = T0 + 3 * MINUTE;

      const res = await app.inject({
        method: 'POST',
        url: `/queries/${queryId}/decision`,
        payload: { expertId: 'expertA', decision: 'edit', editedText: 'Most people feel tired and sick.' },
      });
      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({ status: 'accepted', queryId, state: 'DELIVERED', delivered: true });

      const stale = await app.inject({
        method: 'POST',
        url: `/queries/${queryId}/decision`,
        payload: { expertId: 'expertB', decision: 'approve' },
      });
      expect(stale.statusCode).toBe(200);
      expect(stale.json()).toEqual({ status: 'stale', queryId, observedState: 'DELIVERED' });

      expect(userMessages()).toEqual(['Most people feel tired and sick.\n\n(Answer prepared by our expert)']);

      const corrections = await app.inject({ method: 'GET', url: '/corrections', headers: admin });
      expect(corrections.json()).toMatchObject({
        count: 1,
        corrections: [{ queryId, outcome: 'edited', finalText: 'Most people feel tired and sick.', recordedAt: T0 + 3 * MINUTE }],
      });

      const later = await app.inject({ method: 'GET', url: `/corrections?since=${T0 + 4 * MINUTE}`, headers: admin });
      expect(later.json()).toEqual({ count: 0, corrections: [] });
    });

    it('should refuse an unknown decision', async () => {
      const { queryId } = (await ask()).json();

      const res = await app.inject({
        method: 'POST',
        url: `/queries/${queryId}/decision`,
        payload: { expertId: 'expertA', decision: 'maybe' },
      });

      expect(res.statusCode).toBe(400);
    });

    it('should refuse an edit without text', async () => {
      const { queryId } = (await ask()).json();

      const res = await app.inject({
        method: 'POST',
        url: `/queries/${queryId}/decision`,
        payload: { expertId: 'expertA', decision: 'edit', editedText: '  ' },
      });

      expect(res.statusCode).toBe(400);
      expect(res.json().error).toBe('InvalidDecision');
    });

    it('should answer 404 for an unknown query', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/queries/missing/decision',
        payload: { expertId: 'expertA', decision: 'approve' },
      });

      expect(res.statusCode).toBe(404);
      expect(res.json().error).toBe('QueryNotFound');
    });
  });

  describe('admin routes', () => {
    it('should require the admin key', async () => {
      const res = await app.inject({ method: 'POST', url: '/schedule' });

      expect(res.statusCode).toBe(403);
    });

    it('should report conversation status with the review deadline', async () => {
      const { queryId } = (await ask()).json();

      const res = await app.inject({ method: 'GET', url: CONVERSATION_PATH, headers: admin });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toMatchObject({
        conversationId: 'whatsapp:conv1',
        state: 'AWAITING_ANSWER',
        assignedExpertId: 'expertA',
        pendingQuery: { queryId, state: 'PENDING_REVIEW', reviewDeadline: T0 + 10 * MINUTE, awaitingDelivery: false },
      });
    });

    it('should escalate and expire through scheduler ticks', async () => {
      const { queryId } = (await ask()).json();

      clock.now = T0 + 10 * MINUTE;
      const first = await app.inject({ method: 'POST', url: '/schedule', headers: admin });
      expect(first.json()).toMatchObject({ escalated: [queryId], overlapped: false });

      clock.now = T0 + 30 * MINUTE;
      await app.inject({ method: 'POST', url: '/schedule', headers: admin });

      clock.now = T0 + 70 * MINUTE;
      const last = await app.inject({ method: 'POST', url: '/schedule', headers: admin });
      expect(last.json()).toMatchObject({ expired: [queryId] });
      await engine.settleDeliveries();

      const query = await app.inject({ method: 'GET', url: `/queries/${queryId}`, headers: admin });
      expect(query.json().state).toBe('EXPIRED');
      expect(userMessages()).toEqual([
        `We are still working on your question "${CHEMO_QUESTION}". We will get back to you soon.`,
      ]);
    });

    it('should answer 404 for an unknown conversation', async () => {
      const res = await app.inject({ method: 'GET', url: CONVERSATION_PATH, headers: admin });

      expect(res.statusCode).toBe(404);
      expect(res.json().error).toBe('ConversationNotFound');
    });
  });

  describe('health', () => {
    it('should report liveness and readiness', async () => {
      expect((await app.inject({ method: 'GET', url: '/health' })).json().status).toBe('ok');

      const ready = await app.inject({ method: 'GET', url: '/ready' });
      expect(ready.statusCode).toBe(200);
      expect(ready.json().status).toBe('ready');
    });

    it('should expose Prometheus metrics', async () => {
      const res = await app.inject({ method: 'GET', url: '/metrics' });

      expect(res.statusCode).toBe(200);
      expect(res.body).toContain('# TYPE');
    });
  });
});
