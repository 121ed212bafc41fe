// In-memory event bus for single-process deployments and tests

import {
  FastAppError,
  ValidationError,
  type EventBus,
  type EventHandler,
  type Logger,
  type Unsubscribe,
} from '@fastapp/protocol';
import { channelMatches, createEnvelope, deliver } from '@fastapp/repositories';
import { silentLogger } from '../logging.js';

type Subscription = {
  pattern: string;
  handler: EventHandler;
};

/**
 * EventBus that delivers within the current process.
 *
 * `publish` resolves once every matching handler has settled, so tests can
 * assert on side effects straight after awaiting it.
 */
export class InMemoryEventBus implements EventBus {
  private readonly subscriptions = new Set<Subscription>();
  private readonly logger: Logger;
  private readonly now: () => Date;
  private closed = false;

  constructor(options: { logger?: Logger; now?: () => Date } = {}) {
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * @returns Number of handlers the event was delivered to
   */
  async publish(channel: string, data: unknown): Promise<number> {
    this.assertOpen();
    const event = createEnvelope(channel, data, this.now());

    const handlers = Array.from(this.subscriptions)
      .filter((subscription) => channelMatches(subscription.pattern, channel))
      .map((subscription) => subscription.handler);

    const { delivered } = await deliver(handlers, event, this.logger);
    return delivered;
  }

  async subscribe(pattern: string, handler: EventHandler): Promise<Unsubscribe> {
    this.assertOpen();
    if (pattern.length === 0) {
      throw new ValidationError('Subscription pattern must be a non-empty string', {
        field: 'pattern',
      });
    }

    const subscription: Subscription = { pattern, handler };
    this.subscriptions.add(subscription);

    return async () => {
      this.subscriptions.delete(subscription);
    };
  }

  /**
   * Number of live subscriptions, optionally only those for one pattern
   */
  subscriberCount(pattern?: string): number {
    if (pattern === undefined) {
      return this.subscriptions.size;
    }
    return Array.from(this.subscriptions).filter((s) => s.pattern === pattern).length;
  }

  /**
   * Drop every subscription. Idempotent.
   */
  async close(): Promise<void> {
    this.closed = true;
    this.subscriptions.clear();
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new FastAppError('EVENT_BUS_CLOSED', 'Event bus is closed');
    }
  }
}
