import type { Logger } from 'pino';
import type { Event } from '../domain/index.js';
import { TransientDeliveryError } from '../domain/index.js';
import type { BackoffPolicy } from './backoff.js';
import { sleep } from './backoff.js';
import type { CollectorTransport, DeliveryOutcome, OutgoingBatch } from './delivery.js';
import { IngestionQueue } from './ingestion-queue.js';
import type { QueuedEvent } from './ingestion-queue.js';
import type { EventSerializer } from './serializer.js';

/** What caused a flush to start. Carried into log records. */
export type FlushTrigger = 'size' | 'interval' | 'manual' | 'shutdown';

/** Terminal state of one batch. */
export type CycleResult =
  | { readonly status: 'empty' }
  | { readonly status: 'skipped'; readonly pending: number }
  | { readonly status: 'delivered'; readonly count: number; readonly attempts: number }
  | {
      readonly status: 'dropped';
      readonly count: number;
      readonly attempts: number;
      readonly reason: 'fatal' | 'exhausted' | 'internal';
    };

export interface FlushSummary {
  /** Batches this call carried to a terminal state itself. */
  batches: number;
  delivered: number;
  dropped: number;
  attempts: number;
}

export interface FlushEngineOptions {
  transport: CollectorTransport;
  serializer: EventSerializer;
  log: Logger;
  batchSize: number;
  maxRetries: number;
  backoff: BackoffPolicy;
  /** Read at send time, so events tracked before registration still go out. */
  agentId: () => string | null;
}

/**
 * Drains the ingestion queue into batches and delivers them.
 *
 * Per batch: FORMING → SENDING → DELIVERED | RETRYING → SENDING | DROPPED.
 *
 * At most one cycle (drain → serialize → send → retry decision) is in
 * flight at any time. A trigger that arrives while a cycle runs awaits
 * that cycle instead of starting a second one; the check-and-set on
 * `inFlight` cannot interleave because it happens without an `await`.
 *
 * Retry state lives on the stack of one cycle and dies with it. A batch
 * that fails is retried as-is; its events never go back into the queue,
 * so newer events cannot overtake them.
 */
export class FlushEngine {
  private readonly queue: IngestionQueue;
  private readonly options: FlushEngineOptions;
  private readonly log: Logger;
  private readonly backoffAbort = new AbortController();
  private inFlight: Promise<CycleResult> | null = null;
  // Highest sequence number that has reached a terminal state.
  private settledSeq = 0;

  constructor(options: FlushEngineOptions) {
    this.options = options;
    this.log = options.log;
    this.queue = new IngestionQueue(options.log);
  }

  /** Hot path. Enqueues without I/O and never throws. */
  enqueue(event: Event): boolean {
    return this.queue.enqueue(event);
  }

  get pending(): number {
    return this.queue.size;
  }

  get flushing(): boolean {
    return this.inFlight !== null;
  }

  /**
   * Carries every event queued before this call to a terminal state
   * (delivered or dropped), one batch at a time.
   *
   * Events enqueued while the call runs may ride along in a batch but
   * are not waited for. If no agent id is known yet the call returns
   * with the events still queued.
   */
  async flush(trigger: FlushTrigger): Promise<FlushSummary> {
    const target = this.queue.lastSeq;
    const summary: FlushSummary = { batches: 0, delivered: 0, dropped: 0, attempts: 0 };

    while (this.settledSeq < target) {
      if (this.inFlight !== null) {
        const joined = await this.inFlight;
        if (joined.status === 'skipped') break;
        continue;
      }

      const result = await this.startCycle(trigger);
      if (result.status === 'empty' || result.status === 'skipped') break;

      summary.batches += 1;
      summary.attempts += result.attempts;
      if (result.status === 'delivered') {
        summary.delivered += result.count;
      } else {
        summary.dropped += result.count;
      }
    }

    return summary;
  }

  /**
   * Cuts short the current and every future backoff wait. Attempts that
   * remain in a batch's budget run back to back. A request already on
   * the wire is left to finish or time out.
   */
  interruptBackoff(): void {
    this.backoffAbort.abort();
  }

  /** Removes and returns whatever is still queued. */
  discardPending(): Event[] {
    return this.queue.clear();
  }

  private startCycle(trigger: FlushTrigger): Promise<CycleResult> {
    const cycle = this.runCycle(trigger).finally(() => {
      this.inFlight = null;
    });
    this.inFlight = cycle;
    return cycle;
  }

  private async runCycle(trigger: FlushTrigger): Promise<CycleResult> {
    const agentId = this.options.agentId();
    if (agentId === null) {
      const pending = this.queue.size;
      if (pending > 0) {
        this.log.warn({ pending, trigger }, 'No agent ID set, cannot flush events');
      }
      return { status: 'skipped', pending };
    }

    // FORMING: synchronous, before the first await.
    const batch = this.queue.drain(this.options.batchSize);
    const last = batch[batch.length - 1];
    if (last === undefined) {
      return { status: 'empty' };
    }

    try {
      return await this.deliver(agentId, batch, trigger);
    } catch (err: unknown) {
      this.log.error({ err, count: batch.length, trigger }, 'Flush cycle failed, batch dropped');
      return { status: 'dropped', count: batch.length, attempts: 0, reason: 'internal' };
    } finally {
      this.settledSeq = Math.max(this.settledSeq, last.seq);
    }
  }

  private async deliver(agentId: string, batch: readonly QueuedEvent[], trigger: FlushTrigger): Promise<CycleResult> {
    const count = batch.length;
    const events = this.options.serializer.serializeBatch(batch.map((item) => item.event));
    const { maxRetries } = this.options;

    for (let attempt = 1; ; attempt += 1) {
      // SENDING
      const outcome = await this.send({ agentId, events });

      if (outcome.status === 'delivered') {
        this.log.info({ count, attempt, trigger }, `Flushed ${count} events`);
        return { status: 'delivered', count, attempts: attempt };
      }

      if (outcome.status === 'fatal') {
        this.log.error(
          { count, attempt, status: outcome.error.status, err: outcome.error },
          `Dropping ${count} events: collector rejected the batch`,
        );
        return { status: 'dropped', count, attempts: attempt, reason: 'fatal' };
      }

      if (attempt >= maxRetries) {
        this.log.error(
          { count, attempts: attempt, cause: outcome.error.kind, status: outcome.error.status, err: outcome.error },
          `Dropping ${count} events after ${attempt} failed attempts`,
        );
        return { status: 'dropped', count, attempts: attempt, reason: 'exhausted' };
      }

      // RETRYING
      const delayMs = this.backoffAbort.signal.aborted ? 0 : this.options.backoff(attempt);
      this.log.warn(
        { count, attempt, maxRetries, delayMs, cause: outcome.error.kind, status: outcome.error.status },
        `Delivery failed, retrying batch (attempt ${attempt}/${maxRetries})`,
      );
      await sleep(delayMs, this.backoffAbort.signal);
    }
  }

  /** Shields the retry loop from transports that reject instead of reporting. */
  private async send(batch: OutgoingBatch): Promise<DeliveryOutcome> {
    try {
      return await this.options.transport.sendBatch(batch);
    } catch (err: unknown) {
      return {
        status: 'retryable',
        error: new TransientDeliveryError('network', err instanceof Error ? err.message : String(err), { cause: err }),
      };
    }
  }
}
