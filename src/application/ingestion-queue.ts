import type { Logger } from 'pino';
import type { Event } from '../domain/index.js';

/** An event plus the position it was enqueued at. */
export interface QueuedEvent {
  readonly seq: number;
  readonly event: Event;
}

// Consumed slots are reclaimed once the dead prefix is this large and
// at least half the backing array.
const COMPACT_THRESHOLD = 1024;

/**
 * Unbounded FIFO holding events between `track()` and the flush engine.
 *
 * Node.js runs producers and the consumer on one thread, so `enqueue`
 * and `drain` are atomic with respect to each other. Only the flush
 * engine drains; it serializes its own drains.
 *
 * Every enqueued event receives a strictly increasing sequence number.
 * `flush()` uses it as a barrier: everything up to the `lastSeq` seen at
 * call time must reach a terminal state before the call returns.
 */
export class IngestionQueue {
  private items: QueuedEvent[] = [];
  private head = 0;
  private seq = 0;
  private readonly log: Logger;

  constructor(log: Logger) {
    this.log = log;
  }

  /** Appends an event. Never throws; returns false if the append failed. */
  enqueue(event: Event): boolean {
    try {
      this.items.push({ seq: this.seq + 1, event });
      this.seq += 1;
      return true;
    } catch (err: unknown) {
      this.log.error({ err, event_id: event.id }, 'Failed to enqueue event');
      return false;
    }
  }

  /** Removes and returns up to `max` events, oldest first. */
  drain(max: number): QueuedEvent[] {
    const end = Math.min(this.items.length, this.head + Math.max(0, max));
    const batch = this.items.slice(this.head, end);
    this.head = end;
    this.compact();
    return batch;
  }

  /** Drops everything still queued and returns the discarded events. */
  clear(): Event[] {
    const rest = this.items.slice(this.head).map((item) => item.event);
    this.items = [];
    this.head = 0;
    return rest;
  }

  get size(): number {
    return this.items.length - this.head;
  }

  /** Sequence number of the most recently enqueued event (0 if none yet). */
  get lastSeq(): number {
    return this.seq;
  }

  private compact(): void {
    if (this.head === this.items.length) {
      this.items = [];
      this.head = 0;
      return;
    }
    if (this.head >= COMPACT_THRESHOLD && this.head * 2 >= this.items.length) {
      this.items = this.items.slice(this.head);
      this.head = 0;
    }
  }
}
