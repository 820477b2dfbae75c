import { v4 as uuidv4 } from 'uuid';
import { RenderedPayload } from '../delivery/types';
import { ChannelAdapter, DeliveryReceipt, WindowPolicy } from './types';
import { logger } from '../observability/logger';

/** Development transport: logs each payload instead of sending it */
export class LoggingChannelAdapter implements ChannelAdapter {
  private readonly log = logger.child({ adapter: 'logging' });

  constructor(private readonly window: WindowPolicy) {}

  isFreeFormWindowOpen(conversationId: string): Promise<boolean> {
    return this.window.isOpen(conversationId);
  }

  async send(conversationId: string, payload: RenderedPayload): Promise<DeliveryReceipt> {
    const receiptId = uuidv4();
    this.log.info({ conversationId, receiptId, payload }, 'Outbound message');
    return { receiptId, sentAt: Date.now() };
  }
}
