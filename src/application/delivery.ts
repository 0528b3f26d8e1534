import type { AgentRegistration, FatalDeliveryError, TransientDeliveryError, WireEvent } from '../domain/index.js';

/** One serialized batch addressed to a registered agent. */
export interface OutgoingBatch {
  readonly agentId: string;
  readonly events: readonly WireEvent[];
}

/**
 * Result of a single delivery attempt.
 *
 * `retryable` covers network errors, timeouts, 408/429 and 5xx;
 * `fatal` covers every other rejection (auth, validation).
 */
export type DeliveryOutcome =
  | { readonly status: 'delivered' }
  | { readonly status: 'retryable'; readonly error: TransientDeliveryError }
  | { readonly status: 'fatal'; readonly error: FatalDeliveryError };

/**
 * Port to the remote collector.
 *
 * `sendBatch` reports failures through its outcome and must not reject;
 * the flush engine still guards against implementations that do.
 */
export interface CollectorTransport {
  registerAgent(registration: AgentRegistration): Promise<string>;
  sendBatch(batch: OutgoingBatch): Promise<DeliveryOutcome>;
}
