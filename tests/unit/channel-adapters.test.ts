import { RetryingChannelAdapter } from '../../src/channels/retrying-channel-adapter';
import { HttpRelayChannelAdapter } from '../../src/channels/http-relay-channel-adapter';
import { FreeFormWindowPolicy } from '../../src/channels/free-form-window';
import { ChannelReminderSink } from '../../src/channels/channel-reminder-sink';
import { ChannelAdapter, DeliveryReceipt, ReviewSummary, SendOptions } from '../../src/channels/types';
import { RenderedPayload } from '../../src/delivery/types';
import { Conversation } from '../../src/config/types';
import { DeliveryFailedError, DeliveryTimeoutError } from '../../src/errors/errors';
import { FakeChannel, HOUR, T0, TEST_MESSAGES, TEST_TEMPLATES } from '../helpers/engine-harness';

const payload: RenderedPayload = { representation: 'free_form', text: 'Hello' };

function innerAdapter() {
  return {
    isFreeFormWindowOpen: jest.fn(async (_id: string) => true),
    send: jest.fn(async (_id: string, _payload: RenderedPayload, _options?: SendOptions): Promise<DeliveryReceipt> => ({
      receiptId: 'r-1',
      sentAt: 0,
    })),
  } satisfies ChannelAdapter;
}

describe('RetryingChannelAdapter', () => {
  it('should retry failed attempts with a growing delay', async () => {
    const inner = innerAdapter();
    inner.send
      .mockRejectedValueOnce(new DeliveryFailedError('busy', 'c1'))
      .mockRejectedValueOnce(new Error('socket hang up'));
    const sleep = jest.fn(async (_ms: number) => undefined);
    const adapter = new RetryingChannelAdapter(inner, { timeoutMs: 1000, maxAttempts: 3, retryDelayMs: 100, sleep });

    await expect(adapter.send('c1', payload)).resolves.toEqual({ receiptId: 'r-1', sentAt: 0 });

    expect(inner.send).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[100], [200]]);
  });

  it('should rethrow the last failure once attempts run out', async () => {
    const inner = innerAdapter();
    inner.send.mockRejectedValue(new Error('socket hang up'));
    const adapter = new RetryingChannelAdapter(inner, { timeoutMs: 1000, maxAttempts: 2, retryDelayMs: 0, sleep: async () => undefined });

    const sent = adapter.send('c1', payload);

    await expect(sent).rejects.toBeInstanceOf(DeliveryFailedError);
    await expect(sent).rejects.toThrow('socket hang up');
    expect(inner.send).toHaveBeenCalledTimes(2);
  });

  it('should abort an attempt that outlives the timeout', async () => {
    const inner = innerAdapter();
    inner.send.mockImplementation(() => new Promise<DeliveryReceipt>(() => undefined));
    const adapter = new RetryingChannelAdapter(inner, { timeoutMs: 20, maxAttempts: 1, retryDelayMs: 0 });

    await expect(adapter.send('c1', payload)).rejects.toBeInstanceOf(DeliveryTimeoutError);

    const options = inner.send.mock.calls[0][2];
    expect(options?.signal?.aborted).toBe(true);
  });

  it('should delegate the window check', async () => {
    const inner = innerAdapter();
    const adapter = new RetryingChannelAdapter(inner, { timeoutMs: 20, maxAttempts: 1, retryDelayMs: 0 });

    await expect(adapter.isFreeFormWindowOpen('c1')).resolves.toBe(true);
    expect(inner.isFreeFormWindowOpen).toHaveBeenCalledWith('c1');
  });
});

describe('HttpRelayChannelAdapter', () => {
  const window = { isOpen: jest.fn(async () => true) };

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should post the payload with the bearer token and return the relay receipt', async () => {
    const fetchSpy = jest.spyOn(global, 'fetch').mockResolvedValue(
      new Response(JSON.stringify({ receiptId: 'relay-42' }), {
        status: 200,
        headers: { 'content-type': 'application/json' },
      }),
    );
    const adapter = new HttpRelayChannelAdapter({ relayUrl: 'http://relay.test/send', token: 'test-token', window });

    const receipt = await adapter.send('whatsapp:conv1', payload);

    expect(receipt.receiptId).toBe('relay-42');
    expect(fetchSpy).toHaveBeenCalledWith('http://relay.test/send', expect.objectContaining({
      method: 'POST',
      headers: { 'Content-Type': 'application/json', Authorization: 'Bearer test-token' },
      body: JSON.stringify({ conversationId: 'whatsapp:conv1', payload }),
    }));
  });

  it('should fail the delivery on a non-2xx answer', async () => {
    jest.spyOn(global, 'fetch').mockResolvedValue(new Response('down', { status: 500 }));
    const adapter = new HttpRelayChannelAdapter({ relayUrl: 'http://relay.test/send', window });

    await expect(adapter.send('whatsapp:conv1', payload)).rejects.toThrow('Relay responded 500');
  });

  it('should fail the delivery when the relay is unreachable', async () => {
    jest.spyOn(global, 'fetch').mockRejectedValue(new TypeError('fetch failed'));
    const adapter = new HttpRelayChannelAdapter({ relayUrl: 'http://relay.test/send', window });

    await expect(adapter.send('whatsapp:conv1', payload)).rejects.toBeInstanceOf(DeliveryFailedError);
  });
});

describe('FreeFormWindowPolicy', () => {
  const conversation: Conversation = {
    conversationId: 'whatsapp:conv1',
    channel: 'whatsapp',
    userId: 'conv1',
    state: 'ACTIVE',
    locale: 'en',
    lastInboundAt: T0,
    escalationLevel: 0,
    createdAt: T0,
    updatedAt: T0,
  };
  const store = { getConversation: jest.fn(async (id: string) => (id === conversation.conversationId ? conversation : null)) };

  it('should stay open until the window has elapsed since the last inbound message', async () => {
    let now = T0 + 24 * HOUR - 1;
    const policy = new FreeFormWindowPolicy(store, 24 * HOUR, () => now);

    expect(await policy.isOpen('whatsapp:conv1')).toBe(true);
    now = T0 + 24 * HOUR;
    expect(await policy.isOpen('whatsapp:conv1')).toBe(false);
  });

  it('should treat unknown participants as outside the window', async () => {
    const policy = new FreeFormWindowPolicy(store, 24 * HOUR, () => T0);

    expect(await policy.isOpen('expert:expertA')).toBe(false);
  });
});

describe('ChannelReminderSink', () => {
  const summary: ReviewSummary = {
    kind: 'review_request',
    queryId: 'q-1',
    conversationId: 'whatsapp:conv1',
    question: 'Can I swim?',
    draftAnswer: 'Ask your care team.',
    escalationLevel: 0,
    deadline: T0,
    locale: 'en',
  };

  it('should send the review packet to the expert address', async () => {
    const channel = new FakeChannel();
    const sink = new ChannelReminderSink({ channel, messages: TEST_MESSAGES, templates: TEST_TEMPLATES, defaultLocale: 'en' });

    await sink.deliver('expertA', summary);

    expect(channel.sent).toEqual([{
      conversationId: 'expert:expertA',
      payload: {
        representation: 'free_form',
        text: 'Review: Question: Can I swim?\nBot_Answer: Ask your care team.\nIs the answer correct?',
      },
    }]);
  });

  it('should fall back to a template outside the expert window', async () => {
    const channel = new FakeChannel();
    channel.windowOpen = false;
    const sink = new ChannelReminderSink({
      channel,
      messages: TEST_MESSAGES,
      templates: TEST_TEMPLATES,
      defaultLocale: 'en',
      addressFor: (id) => `whatsapp:${id}`,
    });

    await sink.deliver('expertA', summary);

    expect(channel.sent[0]).toMatchObject({
      conversationId: 'whatsapp:expertA',
      payload: { representation: 'template', templateName: 'generic_update_v1' },
    });
  });

  it('should send several due reviews to one expert as a numbered digest', async () => {
    const channel = new FakeChannel();
    const sink = new ChannelReminderSink({ channel, messages: TEST_MESSAGES, templates: TEST_TEMPLATES, defaultLocale: 'en' });
    const second: ReviewSummary = { ...summary, kind: 'review_reminder', queryId: 'q-2', question: 'Can I run?', draftAnswer: 'Yes, gently.' };

    await sink.deliverDigest('expertA', [{ ...summary, kind: 'review_reminder' }, second]);

    expect(channel.sent).toEqual([{
      conversationId: 'expert:expertA',
      payload: {
        representation: 'free_form',
        text: '2 reviews waiting:\n'
          + '1. Question: Can I swim?\nBot_Answer: Ask your care team.\nIs the answer correct?\n\n'
          + '2. Question: Can I run?\nBot_Answer: Yes, gently.\nIs the answer correct?',
      },
    }]);
  });

  it('should send a single due review as a plain reminder', async () => {
    const channel = new FakeChannel();
    const sink = new ChannelReminderSink({ channel, messages: TEST_MESSAGES, templates: TEST_TEMPLATES, defaultLocale: 'en' });

    await sink.deliverDigest('expertA', [{ ...summary, kind: 'review_reminder' }]);

    expect(channel.sent[0].payload).toEqual({
      representation: 'free_form',
      text: 'Reminder: Question: Can I swim?\nBot_Answer: Ask your care team.\nIs the answer correct?',
    });
  });

  it('should swallow notification failures into the log', async () => {
    const channel = new FakeChannel();
    channel.failuresRemaining = 1;
    const sink = new ChannelReminderSink({ channel, messages: TEST_MESSAGES, templates: TEST_TEMPLATES, defaultLocale: 'en' });

    expect(() => sink.notify('expertA', summary)).not.toThrow();
    await new Promise((resolve) => setImmediate(resolve));

    expect(channel.send).toHaveBeenCalledTimes(1);
    expect(channel.sent).toEqual([]);
  });
});
