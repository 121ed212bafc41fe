import { z } from 'zod';
import { ValidationError, type BusEvent } from '@fastapp/protocol';

const envelopeSchema = z.object({
  channel: z.string().min(1),
  data: z.unknown(),
  publishedAt: z.string().datetime(),
});

/**
 * Wrap data for the wire.
 * @throws ValidationError for an empty channel
 */
export function createEnvelope(channel: string, data: unknown, now: Date = new Date()): BusEvent {
  if (channel.length === 0) {
    throw new ValidationError('Event channel must be a non-empty string', { field: 'channel' });
  }
  return { channel, data, publishedAt: now.toISOString() };
}

export function encodeEnvelope(event: BusEvent): string {
  return JSON.stringify(event);
}

/**
 * Parse a wire message back into an event.
 * @throws ValidationError if the message is not an envelope
 */
export function decodeEnvelope(message: string): BusEvent {
  let raw: unknown;
  try {
    raw = JSON.parse(message);
  } catch (error) {
    throw new ValidationError('Event message is not valid JSON', {
      details: { message, error: error instanceof Error ? error.message : String(error) },
    });
  }

  const result = envelopeSchema.safeParse(raw);
  if (!result.success) {
    throw new ValidationError('Event message is not an envelope', {
      details: { issues: result.error.issues },
    });
  }

  const { channel, data, publishedAt } = result.data;
  return { channel, data, publishedAt };
}
