import { v4 as uuidv4 } from 'uuid';
import { RenderedPayload } from '../delivery/types';
import { ChannelAdapter, DeliveryReceipt, SendOptions, WindowPolicy } from './types';
import { DeliveryFailedError } from '../errors/errors';
import { logger } from '../observability/logger';

export interface HttpRelayOptions {
  relayUrl: string;
  token?: string;
  window: WindowPolicy;
}

function receiptIdFrom(body: unknown): string | undefined {
  if (body && typeof body === 'object' && 'receiptId' in body) {
    const { receiptId } = body;
    if (typeof receiptId === 'string' && receiptId) return receiptId;
  }
  return undefined;
}

/**
 * Posts rendered payloads to the transport relay, which owns the
 * provider-specific request formats.
 */
export class HttpRelayChannelAdapter implements ChannelAdapter {
  private readonly log = logger.child({ adapter: 'http-relay' });

  constructor(private readonly options: HttpRelayOptions) {}

  isFreeFormWindowOpen(conversationId: string): Promise<boolean> {
    return this.options.window.isOpen(conversationId);
  }

  async send(conversationId: string, payload: RenderedPayload, sendOptions: SendOptions = {}): Promise<DeliveryReceipt> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.options.token) {
      headers.Authorization = `Bearer ${this.options.token}`;
    }

    let res: Response;
    try {
      res = await fetch(this.options.relayUrl, {
        method: 'POST',
        headers,
        body: JSON.stringify({ conversationId, payload }),
        signal: sendOptions.signal,
      });
    } catch (err) {
      this.log.error({ err, conversationId }, 'Relay request failed');
      throw new DeliveryFailedError('Relay request failed', conversationId, { cause: err });
    }

    if (!res.ok) {
      const errBody = await res.text();
      this.log.error({ status: res.status, errBody, conversationId }, 'Relay rejected delivery');
      throw new DeliveryFailedError(`Relay responded ${res.status}`, conversationId);
    }

    let body: unknown = null;
    if (res.headers.get('content-type')?.includes('application/json')) {
      body = await res.json();
    }
    return { receiptId: receiptIdFrom(body) ?? uuidv4(), sentAt: Date.now() };
  }
}
