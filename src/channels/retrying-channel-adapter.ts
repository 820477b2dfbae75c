import { RenderedPayload } from '../delivery/types';
import { ChannelAdapter, DeliveryReceipt } from './types';
import { DeliveryFailedError, DeliveryTimeoutError, errorMessage } from '../errors/errors';
import { logger } from '../observability/logger';

export interface RetryOptions {
  /** Per-attempt timeout */
  timeoutMs: number;
  maxAttempts: number;
  retryDelayMs: number;
  sleep?: (ms: number) => Promise<void>;
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Adds a per-attempt timeout and bounded retries in front of another
 * adapter. Once attempts run out the last DeliveryFailedError is rethrown
 * and the caller decides what to queue.
 */
export class RetryingChannelAdapter implements ChannelAdapter {
  private readonly log = logger.child({ adapter: 'retrying' });
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly inner: ChannelAdapter, private readonly options: RetryOptions) {
    this.sleep = options.sleep ?? delay;
  }

  isFreeFormWindowOpen(conversationId: string): Promise<boolean> {
    return this.inner.isFreeFormWindowOpen(conversationId);
  }

  async send(conversationId: string, payload: RenderedPayload): Promise<DeliveryReceipt> {
    const { maxAttempts, retryDelayMs } = this.options;
    let lastError: DeliveryFailedError = new DeliveryFailedError('No delivery attempt made', conversationId);

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        return await this.attempt(conversationId, payload);
      } catch (err) {
        lastError = err instanceof DeliveryFailedError
          ? err
          : new DeliveryFailedError(errorMessage(err), conversationId, { cause: err });
        this.log.warn({ conversationId, attempt, maxAttempts, err: lastError }, 'Delivery attempt failed');
        if (attempt < maxAttempts) {
          await this.sleep(retryDelayMs * attempt);
        }
      }
    }
    throw lastError;
  }

  private async attempt(conversationId: string, payload: RenderedPayload): Promise<DeliveryReceipt> {
    const { timeoutMs } = this.options;
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new DeliveryTimeoutError(conversationId, timeoutMs));
      }, timeoutMs);
    });

    try {
      return await Promise.race([
        this.inner.send(conversationId, payload, { signal: controller.signal }),
        timeout,
      ]);
    } finally {
      clearTimeout(timer);
    }
  }
}
