// Channel matching and handler fan-out shared by every EventBus.

import { errorMessage, type BusEvent, type EventHandler, type Logger } from '@fastapp/protocol';

const patternCache = new Map<string, RegExp>();

function compile(pattern: string): RegExp {
  let source = '';
  for (const char of pattern) {
    if (char === '*') {
      source += '.*';
    } else if (char === '?') {
      source += '.';
    } else {
      source += char.replace(/[.+^${}()|[\]\\]/g, '\\$&');
    }
  }
  return new RegExp(`^${source}$`, 's');
}

/**
 * Redis-style glob match: `*` is any run of characters, `?` exactly one.
 * Everything else matches literally.
 */
export function channelMatches(pattern: string, channel: string): boolean {
  let regex = patternCache.get(pattern);
  if (!regex) {
    regex = compile(pattern);
    patternCache.set(pattern, regex);
  }
  return regex.test(channel);
}

/**
 * Invoke every handler with the event. A throwing or rejecting handler is
 * logged and does not stop delivery to the others.
 *
 * @returns How many handlers were invoked, and how many of those failed
 */
export async function deliver(
  handlers: Iterable<EventHandler>,
  event: BusEvent,
  logger: Logger
): Promise<{ delivered: number; failed: number }> {
  const pending: Promise<void>[] = [];
  let invoked = 0;
  let failed = 0;

  for (const handler of handlers) {
    invoked++;
    try {
      const result = handler(event);
      if (result instanceof Promise) {
        pending.push(result);
      }
    } catch (error) {
      failed++;
      logger.error('Event handler failed', { channel: event.channel, error: errorMessage(error) });
    }
  }

  const settled = await Promise.allSettled(pending);
  for (const outcome of settled) {
    if (outcome.status === 'rejected') {
      failed++;
      logger.error('Event handler failed', {
        channel: event.channel,
        error: errorMessage(outcome.reason),
      });
    }
  }

  return { delivered: invoked, failed };
}
