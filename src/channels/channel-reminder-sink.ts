import { ChannelAdapter, ReminderSink, ReviewSummary } from './types';
import { DeliveryContent, MessageTemplate } from '../delivery/types';
import { MessageCatalog } from '../delivery/message-catalog';
import { selectDelivery } from '../delivery/delivery-selector';
import { AnswerComposer } from '../composer/answer-composer';
import { logger } from '../observability/logger';

export interface ChannelReminderSinkOptions {
  channel: ChannelAdapter;
  messages: MessageCatalog;
  templates: readonly MessageTemplate[];
  defaultLocale: string;
  composer?: AnswerComposer;
  /** Channel address of an expert */
  addressFor?: (expertId: string) => string;
}

/**
 * Sends review requests, reminders and escalation notices to experts over
 * the same channel users are served on. Outside the expert's window only
 * the template goes out; the packet follows once they reply.
 */
export class ChannelReminderSink implements ReminderSink {
  private readonly log = logger.child({ component: 'reminder-sink' });
  private readonly addressFor: (expertId: string) => string;
  private readonly composer: AnswerComposer;

  constructor(private readonly options: ChannelReminderSinkOptions) {
    this.addressFor = options.addressFor ?? ((expertId) => `expert:${expertId}`);
    this.composer = options.composer ?? new AnswerComposer();
  }

  notify(expertId: string, summary: ReviewSummary): void {
    this.deliver(expertId, summary).catch((err) => {
      this.log.warn({ err, expertId, queryId: summary.queryId, kind: summary.kind }, 'Expert notification failed');
    });
  }

  notifyDigest(expertId: string, summaries: readonly ReviewSummary[]): void {
    this.deliverDigest(expertId, summaries).catch((err) => {
      this.log.warn({ err, expertId, queryIds: summaries.map((s) => s.queryId) }, 'Expert digest failed');
    });
  }

  /** Awaitable send, used by `notify` */
  async deliver(expertId: string, summary: ReviewSummary): Promise<void> {
    const content = this.options.messages.compose(summary.kind, summary.locale, {
      packet: this.composer.reviewPacket(summary.question, summary.draftAnswer),
      question: summary.question,
      level: String(summary.escalationLevel),
      deadline: new Date(summary.deadline).toISOString(),
    });
    await this.send(expertId, content, summary.locale, { queryId: summary.queryId, kind: summary.kind });
  }

  /** Awaitable send, used by `notifyDigest`. A single summary goes out as a plain notice. */
  async deliverDigest(expertId: string, summaries: readonly ReviewSummary[]): Promise<void> {
    if (summaries.length === 0) return;
    if (summaries.length === 1) {
      await this.deliver(expertId, summaries[0]);
      return;
    }
    const locale = summaries[0].locale;
    const content = this.options.messages.compose('review_digest', locale, {
      count: String(summaries.length),
      packets: summaries
        .map((s, i) => `${i + 1}. ${this.composer.reviewPacket(s.question, s.draftAnswer)}`)
        .join('\n\n'),
    });
    await this.send(expertId, content, locale, { queryIds: summaries.map((s) => s.queryId), kind: 'review_digest' });
  }

  private async send(expertId: string, content: DeliveryContent, locale: string, context: Record<string, unknown>): Promise<void> {
    const { channel, templates, defaultLocale } = this.options;
    const address = this.addressFor(expertId);
    const windowOpen = await channel.isFreeFormWindowOpen(address);
    const decision = selectDelivery({ content, windowOpen, templates, locale, defaultLocale });
    const receipt = await channel.send(address, decision.payload);
    this.log.info(
      { ...context, expertId, representation: decision.representation, receiptId: receipt.receiptId },
      'Expert notified',
    );
  }
}
