import { vi } from 'vitest';
import { FatalDeliveryError, TransientDeliveryError } from '../src/domain/index.js';
import type { AgentRegistration } from '../src/domain/index.js';
import type { CollectorTransport, DeliveryOutcome, OutgoingBatch } from '../src/application/delivery.js';

/** Minimal fake logger. */
export function fakeLogger() {
  return {
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
  } as unknown as import('pino').Logger;
}

export function serverError(status = 500): DeliveryOutcome {
  return {
    status: 'retryable',
    error: new TransientDeliveryError('server', `Collector returned HTTP ${status}`, { status }),
  };
}

export function rejected(status = 401): DeliveryOutcome {
  return { status: 'fatal', error: new FatalDeliveryError(status, `Collector rejected batch with HTTP ${status}`) };
}

/** A promise plus the function that resolves it. */
export function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

/**
 * In-process collector stand-in. Records every call; replies with the
 * scripted outcomes first, then with `fallback`.
 */
export class FakeTransport implements CollectorTransport {
  readonly batches: OutgoingBatch[] = [];
  readonly registrations: AgentRegistration[] = [];
  fallback: DeliveryOutcome = { status: 'delivered' };
  agentId = 'agent-1';
  /** While set, every send waits for it before answering. */
  gate: Promise<void> | null = null;
  private readonly script: DeliveryOutcome[] = [];

  respondWith(...outcomes: DeliveryOutcome[]): this {
    this.script.push(...outcomes);
    return this;
  }

  async registerAgent(registration: AgentRegistration): Promise<string> {
    this.registrations.push(registration);
    return this.agentId;
  }

  async sendBatch(batch: OutgoingBatch): Promise<DeliveryOutcome> {
    this.batches.push(batch);
    if (this.gate !== null) await this.gate;
    return this.script.shift() ?? this.fallback;
  }

  /** Event names in the order they were sent, across all attempts. */
  sentNames(): string[] {
    return this.batches.flatMap((batch) => batch.events.map((event) => event.name));
  }
}
