// Event bus types - publish/subscribe between add-ons
//
// Channels are dot-separated names ("order.created"). Subscriptions take
// Redis-style glob patterns where "*" matches any run of characters and
// "?" matches exactly one.

import type { Timestamp } from './common.js';

/**
 * Envelope delivered to subscribers.
 */
export type BusEvent<T = unknown> = {
  channel: string;
  data: T;
  publishedAt: Timestamp;
};

/**
 * Subscriber callback. Failures are logged by the bus and never reach the publisher.
 */
export type EventHandler = (event: BusEvent) => void | Promise<void>;

/**
 * Removes a subscription.
 */
export type Unsubscribe = () => Promise<void>;

/**
 * Pub/sub collaborator. Explicitly constructed and passed to whoever needs it;
 * its lifetime is owned by the application's startup/shutdown sequence.
 */
export interface EventBus {
  /**
   * Publish data on a channel.
   * @returns Number of subscribers that received the event
   */
  publish(channel: string, data: unknown): Promise<number>;

  /**
   * Subscribe to every channel matching a glob pattern.
   */
  subscribe(pattern: string, handler: EventHandler): Promise<Unsubscribe>;

  /**
   * Drop all subscriptions and release connections.
   */
  close(): Promise<void>;
}
