import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { EVENT_TYPES, ProducerError } from '../domain/index.js';
import type { Event } from '../domain/index.js';
import { snapshotRecord } from './serializer.js';

const eventTypeSchema = z.enum(EVENT_TYPES);

/**
 * Zod schema for a producer-supplied event.
 *
 * - `id` and `timestamp` are optional; assigned by `createEvent` if absent.
 * - `payload` and `metadata` are open-ended records; `createEvent` encodes
 *   and freezes a snapshot of them, so the producer may reuse its objects.
 */
export const eventInputSchema = z.object({
  id: z.string().min(1).max(255).optional(),
  type: eventTypeSchema,
  name: z.string().min(1).max(255),
  payload: z.record(z.string(), z.unknown()).default({}),
  metadata: z.record(z.string(), z.unknown()).default({}),
  timestamp: z.string().datetime({ offset: true, message: 'Must be a valid ISO-8601 datetime' }).optional(),
});

/** Raw, not yet validated event input. */
export type EventInput = z.input<typeof eventInputSchema>;

/**
 * Wire-format event as the collector receives it. Stricter than the
 * input schema: every field is present.
 */
export const wireEventSchema = z.object({
  id: z.string().min(1).max(255),
  type: eventTypeSchema,
  name: z.string().min(1).max(255),
  payload: z.record(z.string(), z.unknown()),
  metadata: z.record(z.string(), z.unknown()),
  timestamp: z.string().datetime({ offset: true }),
});

/** An event as validated on the collector side. */
export type CollectedEvent = z.infer<typeof wireEventSchema>;

export const eventBatchSchema = z.object({
  events: z.array(wireEventSchema).min(1, 'Batch must contain at least one event'),
});

export const agentRegistrationSchema = z.object({
  name: z.string().min(1).max(255),
  framework: z.string().min(1).max(100),
  metadata: z.record(z.string(), z.unknown()).default({}),
});

// Records built here; lets `track()` skip re-validation.
const constructed = new WeakSet<object>();

/**
 * Builds an immutable Event record. Payload and metadata are copied into
 * their JSON-safe form here, not at send time.
 *
 * @throws ProducerError when the input fails validation.
 */
export function createEvent(input: EventInput): Event {
  return buildEvent(input);
}

/**
 * Rebuilds an Event from its dictionary form (the inverse of serialization
 * for JSON-native payloads). Unknown `type` values name the valid kinds.
 */
export function parseEvent(data: unknown): Event {
  if (typeof data === 'object' && data !== null && 'type' in data) {
    const { type } = data;
    if (typeof type !== 'string' || !EVENT_TYPES.some((t) => t === type)) {
      throw new ProducerError(
        `Invalid event type ${JSON.stringify(type)}. Must be one of: ${EVENT_TYPES.join(', ')}`,
      );
    }
  }
  return buildEvent(data);
}

function buildEvent(data: unknown): Event {
  const parsed = eventInputSchema.safeParse(data);
  if (!parsed.success) {
    throw new ProducerError(`Invalid event: ${formatIssues(parsed.error)}`);
  }

  const event: Event = Object.freeze({
    id: parsed.data.id ?? randomUUID(),
    type: parsed.data.type,
    name: parsed.data.name,
    payload: snapshotRecord(parsed.data.payload),
    metadata: snapshotRecord(parsed.data.metadata),
    timestamp: parsed.data.timestamp ?? new Date().toISOString(),
  });
  constructed.add(event);
  return event;
}

/** True when `value` came out of `createEvent`/`parseEvent`. O(1). */
export function isEvent(value: unknown): value is Event {
  return typeof value === 'object' && value !== null && constructed.has(value);
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
