import { ConversationStore } from '../conversation/types';
import { WindowPolicy } from './types';

/**
 * Provider messaging window measured from the participant's last inbound
 * message. Unknown ids (no conversation record) are outside the window.
 */
export class FreeFormWindowPolicy implements WindowPolicy {
  constructor(
    private readonly store: Pick<ConversationStore, 'getConversation'>,
    private readonly windowMs: number,
    private readonly clock: () => number = Date.now,
  ) {}

  async isOpen(conversationId: string): Promise<boolean> {
    const conversation = await this.store.getConversation(conversationId);
    if (!conversation) return false;
    return this.clock() - conversation.lastInboundAt < this.windowMs;
  }
}
