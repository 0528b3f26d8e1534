import type { Logger } from 'pino';
import type { AgentRegistration, Event } from '../../domain/index.js';
import { createEvent, isEvent } from '../../application/event-schema.js';
import type { EventInput } from '../../application/event-schema.js';
import { exponentialBackoff } from '../../application/backoff.js';
import type { CollectorTransport } from '../../application/delivery.js';
import { FlushEngine } from '../../application/flush-engine.js';
import type { FlushSummary, FlushTrigger } from '../../application/flush-engine.js';
import type { EventSink } from '../../application/instrument.js';
import { EventSerializer } from '../../application/serializer.js';
import { resolveConfig, warnOnKeyShape } from '../../infrastructure/config.js';
import type { ClientConfig, ClientOptions } from '../../infrastructure/config.js';
import { createLogger } from '../../infrastructure/logger.js';
import { HttpCollectorTransport } from '../../infrastructure/http/collector-transport.js';

export interface BeaconClientOptions extends ClientOptions {
  /** pino logger to write to. Defaults to a new `agent-beacon` logger. */
  logger?: Logger | undefined;
  /** Replaces the HTTP transport (tests, custom collectors). */
  transport?: CollectorTransport | undefined;
  /** `fetch` used by the default HTTP transport. */
  fetch?: typeof fetch | undefined;
  /** Environment consulted for fallbacks. Defaults to `process.env`. */
  env?: NodeJS.ProcessEnv | undefined;
}

/** open → closing → closed. Tracking is only accepted while `open`. */
export type ClientState = 'open' | 'closing' | 'closed';

const EMPTY_SUMMARY: FlushSummary = { batches: 0, delivered: 0, dropped: 0, attempts: 0 };

/**
 * Lifecycle shared by both client flavours.
 *
 * Subclasses decide how the time-based trigger runs (`startBackground`
 * / `stopBackground`). Registration, the hot path, manual flush and
 * shutdown live here.
 */
export abstract class BaseBeaconClient implements EventSink {
  readonly config: ClientConfig;
  protected readonly log: Logger;
  protected readonly engine: FlushEngine;
  private readonly transport: CollectorTransport;
  private currentAgentId: string | null = null;
  private lifecycle: ClientState = 'open';
  private closing: Promise<void> | null = null;
  private sizeFlushScheduled = false;

  /** @throws ConfigurationError when the credential or an option is invalid. */
  constructor(options: BeaconClientOptions = {}) {
    this.config = resolveConfig(options, options.env ?? process.env);
    this.log = options.logger ?? createLogger({ level: this.config.logLevel });
    warnOnKeyShape(this.config, this.log);

    this.transport = options.transport ?? new HttpCollectorTransport({
      apiKey: this.config.apiKey,
      baseUrl: this.config.baseUrl,
      timeoutMs: this.config.timeoutMs,
      fetch: options.fetch,
    });

    this.engine = new FlushEngine({
      transport: this.transport,
      serializer: new EventSerializer(this.config.maxEventBytes),
      log: this.log,
      batchSize: this.config.batchSize,
      maxRetries: this.config.maxRetries,
      backoff: exponentialBackoff({
        baseDelayMs: this.config.retryBaseDelayMs,
        maxDelayMs: this.config.retryMaxDelayMs,
        jitterMs: this.config.retryJitterMs,
      }),
      agentId: () => this.currentAgentId,
    });
  }

  get state(): ClientState {
    return this.lifecycle;
  }

  get agentId(): string | null {
    return this.currentAgentId;
  }

  /** Events waiting in the queue (not counting a batch being sent). */
  get pendingEvents(): number {
    return this.engine.pending;
  }

  setAgentId(agentId: string): void {
    this.currentAgentId = agentId;
    this.log.info({ agent_id: agentId }, 'Agent ID set');
  }

  /**
   * Registers this agent with the collector and caches the returned id
   * for the rest of the session.
   *
   * @throws RegistrationError when the collector is unreachable or refuses.
   */
  async registerAgent(registration: AgentRegistration): Promise<string> {
    try {
      const agentId = await this.transport.registerAgent(registration);
      this.setAgentId(agentId);
      this.log.info({ agent_id: agentId, name: registration.name, framework: registration.framework }, 'Agent registered');
      return agentId;
    } catch (err: unknown) {
      this.log.error({ err, name: registration.name }, 'Failed to register agent');
      throw err;
    }
  }

  /**
   * Queues an event for delivery. Never throws and never performs I/O;
   * malformed input and events tracked after `close()` are logged and
   * dropped.
   */
  track(event: Event | EventInput): void {
    if (this.lifecycle !== 'open') {
      this.log.warn({ state: this.lifecycle }, 'Client is closed, event will not be tracked');
      return;
    }

    let record: Event;
    try {
      record = isEvent(event) ? event : createEvent(event);
    } catch (err: unknown) {
      this.log.warn({ err }, 'Dropping malformed event');
      return;
    }

    if (!this.engine.enqueue(record)) return;
    this.log.debug({ event_id: record.id, type: record.type, name: record.name }, 'Queued event');

    if (this.engine.pending >= this.config.batchSize) {
      this.scheduleSizeFlush();
    }
  }

  /**
   * Sends everything queued before the call. Resolves once each of those
   * events has been delivered or dropped, so it can be used as a barrier.
   * Concurrent callers share the in-flight batch instead of racing it.
   */
  async flush(): Promise<FlushSummary> {
    if (this.lifecycle === 'closed') {
      return { ...EMPTY_SUMMARY };
    }
    return this.engine.flush('manual');
  }

  /**
   * Final flush, then stop. Idempotent: later calls return the first
   * call's promise. Never rejects.
   */
  close(): Promise<void> {
    if (this.closing === null) {
      this.closing = this.shutdown();
    }
    return this.closing;
  }

  /** Starts the time-based trigger. Called by subclass constructors. */
  protected abstract startBackground(): void;

  /** Stops the time-based trigger; resolves once it has wound down. */
  protected abstract stopBackground(): Promise<void>;

  /** Runs a flush on behalf of a trigger other than `flush()`. Never rejects. */
  protected async backgroundFlush(trigger: FlushTrigger): Promise<void> {
    try {
      const summary = await this.engine.flush(trigger);
      if (summary.batches > 0) {
        this.log.debug({ trigger, ...summary }, 'Background flush finished');
      }
    } catch (err: unknown) {
      this.log.error({ err, trigger }, 'Background flush failed');
    }
  }

  private scheduleSizeFlush(): void {
    if (this.sizeFlushScheduled) return;
    this.sizeFlushScheduled = true;

    setImmediate(() => {
      this.sizeFlushScheduled = false;
      void this.backgroundFlush('size');
    });
  }

  private async shutdown(): Promise<void> {
    this.lifecycle = 'closing';
    this.log.info({ pending: this.engine.pending }, 'Closing client...');

    try {
      this.engine.interruptBackoff();
      const final = Promise.all([this.stopBackground(), this.engine.flush('shutdown')]);

      const finished = await settlesWithin(final, this.config.closeTimeoutMs);
      if (finished) {
        const [, summary] = await final;
        this.log.info({ ...summary }, 'Final flush finished');
      } else {
        this.log.warn(
          { closeTimeoutMs: this.config.closeTimeoutMs, pending: this.engine.pending },
          'Final flush did not finish in time; the request in flight is left to complete',
        );
        void final.then(
          ([, summary]) => this.log.info({ ...summary }, 'Late final flush finished'),
          (err: unknown) => this.log.error({ err }, 'Late final flush failed'),
        );
      }

      const discarded = this.engine.discardPending();
      if (discarded.length > 0) {
        this.log.warn({ count: discarded.length, agent_id: this.currentAgentId }, `Discarding ${discarded.length} undelivered events on close`);
      }
    } catch (err: unknown) {
      this.log.error({ err }, 'Error while closing client');
    } finally {
      this.lifecycle = 'closed';
      this.log.info('Client closed');
    }
  }
}

/** True if `promise` settles within `ms`; false if the deadline hits first. */
async function settlesWithin(promise: Promise<unknown>, ms: number): Promise<boolean> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<false>((resolve) => {
    timer = setTimeout(() => resolve(false), ms);
  });

  try {
    return await Promise.race([
      promise.then(
        () => true,
        () => true,
      ),
      deadline,
    ]);
  } finally {
    if (timer !== undefined) {
      clearTimeout(timer);
    }
  }
}
