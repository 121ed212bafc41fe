import { Redis } from 'ioredis';
import {
  errorMessage,
  type BusEvent,
  type EventBus,
  type EventHandler,
  type Logger,
  type Unsubscribe,
} from '@fastapp/protocol';
import { deliver } from '../events/dispatch.js';
import { createEnvelope, decodeEnvelope, encodeEnvelope } from '../events/envelope.js';
import { translateRedisError } from './errors.js';

export type RedisEventBusOptions = {
  logger: Logger;
};

/**
 * The commands the bus issues; an ioredis `Redis` client satisfies it.
 */
export interface PubSubConnection {
  publish(channel: string, message: string): Promise<number>;
  psubscribe(pattern: string): Promise<unknown>;
  punsubscribe(pattern: string): Promise<unknown>;
  quit(): Promise<unknown>;
  on(
    event: 'pmessage',
    listener: (pattern: string, channel: string, message: string) => void
  ): unknown;
}

type Subscription = {
  handlers: Set<EventHandler>;
  /** Settles once PSUBSCRIBE is acknowledged; shared by concurrent subscribers */
  ready: Promise<void>;
};

/**
 * EventBus over Redis pub/sub, for deployments with more than one process.
 *
 * Publishing and subscribing need separate connections: a Redis connection in
 * subscriber mode cannot issue PUBLISH. The bus owns both and quits them on close.
 *
 * Usage:
 * ```ts
 * const bus = RedisEventBus.connect(process.env.REDIS_URL, { logger });
 * const unsubscribe = await bus.subscribe('order.*', (event) => { ... });
 * await bus.publish('order.created', { id: 'o-1' });
 * ```
 */
export class RedisEventBus implements EventBus {
  private readonly subscriptions = new Map<string, Subscription>();
  private readonly logger: Logger;
  private closed = false;

  constructor(
    private readonly publisher: PubSubConnection,
    private readonly subscriber: PubSubConnection,
    options: RedisEventBusOptions
  ) {
    this.logger = options.logger;
    this.subscriber.on('pmessage', (pattern: string, channel: string, message: string) => {
      this.dispatch(pattern, channel, message).catch((error: unknown) => {
        this.logger.error('Event dispatch failed', { channel, error: errorMessage(error) });
      });
    });
  }

  /**
   * Create a bus with its own pair of connections. Nothing connects until first use.
   */
  static connect(url: string, options: RedisEventBusOptions): RedisEventBus {
    const publisher = new Redis(url, { lazyConnect: true, maxRetriesPerRequest: 3 });
    const subscriber = publisher.duplicate();
    return new RedisEventBus(publisher, subscriber, options);
  }

  /**
   * @returns Number of Redis clients that received the message
   */
  async publish(channel: string, data: unknown): Promise<number> {
    this.assertOpen();
    try {
      return await this.publisher.publish(channel, encodeEnvelope(createEnvelope(channel, data)));
    } catch (error) {
      throw translateRedisError(error, `publish ${channel}`);
    }
  }

  /**
   * Subscribers to a pattern whose PSUBSCRIBE is still in flight wait for it,
   * and all of them fail if it fails.
   */
  async subscribe(pattern: string, handler: EventHandler): Promise<Unsubscribe> {
    this.assertOpen();

    let subscription = this.subscriptions.get(pattern);
    if (!subscription) {
      subscription = { handlers: new Set(), ready: this.psubscribe(pattern) };
      this.subscriptions.set(pattern, subscription);
    }
    subscription.handlers.add(handler);
    await subscription.ready;

    return async () => {
      const current = this.subscriptions.get(pattern);
      if (!current || !current.handlers.delete(handler) || current.handlers.size > 0) {
        return;
      }
      this.subscriptions.delete(pattern);
      if (!this.closed) {
        try {
          await this.subscriber.punsubscribe(pattern);
        } catch (error) {
          throw translateRedisError(error, `unsubscribe ${pattern}`);
        }
      }
    };
  }

  /**
   * Drop every subscription and quit both connections. Idempotent.
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.subscriptions.clear();

    const results = await Promise.allSettled([this.subscriber.quit(), this.publisher.quit()]);
    for (const result of results) {
      if (result.status === 'rejected') {
        this.logger.warn('Redis connection did not quit cleanly', {
          error: errorMessage(result.reason),
        });
      }
    }
    this.logger.info('Redis event bus closed');
  }

  private async psubscribe(pattern: string): Promise<void> {
    try {
      await this.subscriber.psubscribe(pattern);
    } catch (error) {
      this.subscriptions.delete(pattern);
      throw translateRedisError(error, `subscribe ${pattern}`);
    }
  }

  private async dispatch(pattern: string, channel: string, message: string): Promise<void> {
    const handlers = this.subscriptions.get(pattern)?.handlers;
    if (!handlers || handlers.size === 0) {
      return;
    }

    let event: BusEvent;
    try {
      event = decodeEnvelope(message);
    } catch (error) {
      this.logger.warn('Dropped malformed event message', { channel, error: errorMessage(error) });
      return;
    }

    await deliver(Array.from(handlers), event, this.logger);
  }

  private assertOpen(): void {
    if (this.closed) {
      throw translateRedisError(new Error('Event bus is closed'), 'use');
    }
  }
}
