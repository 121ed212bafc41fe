// Tests for channel matching and handler fan-out

import { describe, it, expect } from 'vitest';
import type { BusEvent, Logger } from '@fastapp/protocol';
import { channelMatches, deliver } from './dispatch.js';

// --- Test Fixtures ---

function createRecordingLogger() {
  const errors: { message: string; data?: Record<string, unknown> }[] = [];
  const logger: Logger = {
    debug() {},
    info() {},
    warn() {},
    error(message, data) {
      errors.push({ message, data });
    },
  };
  return { logger, errors };
}

const event: BusEvent = {
  channel: 'order.created',
  data: { id: 'o-1' },
  publishedAt: '2026-01-01T00:00:00.000Z',
};

// --- Tests ---

describe('channelMatches', () => {
  it('should match exact channels', () => {
    expect(channelMatches('order.created', 'order.created')).toBe(true);
    expect(channelMatches('order.created', 'order.paid')).toBe(false);
  });

  it('should treat * as any run of characters', () => {
    expect(channelMatches('order.*', 'order.created')).toBe(true);
    expect(channelMatches('order.*', 'order.')).toBe(true);
    expect(channelMatches('*', 'anything.at.all')).toBe(true);
    expect(channelMatches('order.*', 'orders.created')).toBe(false);
  });

  it('should treat ? as exactly one character', () => {
    expect(channelMatches('lms.v?', 'lms.v2')).toBe(true);
    expect(channelMatches('lms.v?', 'lms.v')).toBe(false);
    expect(channelMatches('lms.v?', 'lms.v10')).toBe(false);
  });

  it('should match other characters literally', () => {
    expect(channelMatches('a.b', 'axb')).toBe(false);
    expect(channelMatches('price(usd)+', 'price(usd)+')).toBe(true);
  });
});

describe('deliver', () => {
  it('should invoke every handler with the event', async () => {
    const { logger } = createRecordingLogger();
    const received: string[] = [];

    const result = await deliver(
      [(e) => void received.push(`sync:${e.channel}`), async (e) => void received.push(`async:${e.channel}`)],
      event,
      logger
    );

    expect(result).toEqual({ delivered: 2, failed: 0 });
    expect(received).toEqual(['sync:order.created', 'async:order.created']);
  });

  it('should keep delivering after a handler throws or rejects', async () => {
    const { logger, errors } = createRecordingLogger();
    const received: string[] = [];

    const result = await deliver(
      [
        () => {
          throw new Error('sync boom');
        },
        async () => {
          throw new Error('async boom');
        },
        () => void received.push('last'),
      ],
      event,
      logger
    );

    expect(result).toEqual({ delivered: 3, failed: 2 });
    expect(received).toEqual(['last']);
    expect(errors).toEqual([
      { message: 'Event handler failed', data: { channel: 'order.created', error: 'sync boom' } },
      { message: 'Event handler failed', data: { channel: 'order.created', error: 'async boom' } },
    ]);
  });
});
