import { z } from 'zod';
import type { AgentRegistration } from '../../domain/index.js';
import { FatalDeliveryError, RegistrationError, TransientDeliveryError } from '../../domain/index.js';
import type { CollectorTransport, DeliveryOutcome, OutgoingBatch } from '../../application/delivery.js';
import { SDK_VERSION } from '../../version.js';

export interface HttpCollectorTransportOptions {
  apiKey: string;
  baseUrl: string;
  timeoutMs: number;
  fetch?: typeof fetch | undefined;
}

/**
 * Registration response. Current collectors answer `{ agent_id }`;
 * older ones answered `{ id }`.
 */
const registrationResponseSchema = z.union([
  z.object({ agent_id: z.string().min(1) }).transform((body) => body.agent_id),
  z.object({ id: z.string().min(1) }).transform((body) => body.id),
]);

/**
 * Talks to the collector over HTTPS with `fetch`.
 *
 * POST /api/v1/agents                      — registration
 * POST /api/v1/agents/{agent_id}/events    — batch delivery
 *
 * Every request carries its own `AbortSignal.timeout`; a timed-out
 * delivery is reported as retryable, never thrown.
 */
export class HttpCollectorTransport implements CollectorTransport {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly headers: Record<string, string>;
  private readonly fetchImpl: typeof fetch;

  constructor(options: HttpCollectorTransportOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.headers = {
      Authorization: `Bearer ${options.apiKey}`,
      'Content-Type': 'application/json',
      'User-Agent': `agent-beacon-node/${SDK_VERSION}`,
    };
  }

  async registerAgent(registration: AgentRegistration): Promise<string> {
    let response: Response;
    try {
      response = await this.post('/api/v1/agents', {
        name: registration.name,
        framework: registration.framework,
        metadata: registration.metadata ?? {},
      });
    } catch (err: unknown) {
      throw new RegistrationError(`Agent registration failed: ${describe(err)}`, { cause: err });
    }

    if (!response.ok) {
      throw new RegistrationError(
        `Agent registration rejected with HTTP ${response.status}`,
        { status: response.status },
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (err: unknown) {
      throw new RegistrationError('Agent registration returned a non-JSON body', { cause: err });
    }

    const parsed = registrationResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new RegistrationError('Agent registration response carries no agent id');
    }
    return parsed.data;
  }

  async sendBatch(batch: OutgoingBatch): Promise<DeliveryOutcome> {
    const path = `/api/v1/agents/${encodeURIComponent(batch.agentId)}/events`;

    let response: Response;
    try {
      response = await this.post(path, { events: batch.events });
    } catch (err: unknown) {
      if (isTimeout(err)) {
        return {
          status: 'retryable',
          error: new TransientDeliveryError('timeout', `Delivery timed out after ${this.timeoutMs}ms`, { cause: err }),
        };
      }
      return {
        status: 'retryable',
        error: new TransientDeliveryError('network', `Delivery failed: ${describe(err)}`, { cause: err }),
      };
    }

    // Body is not needed; release the connection.
    await response.body?.cancel().catch(() => undefined);

    return classifyStatus(response.status);
  }

  private post(path: string, body: unknown): Promise<Response> {
    return this.fetchImpl(`${this.baseUrl}${path}`, {
      method: 'POST',
      headers: this.headers,
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(this.timeoutMs),
    });
  }
}

/** Maps an HTTP status to a delivery outcome. */
export function classifyStatus(status: number): DeliveryOutcome {
  if (status >= 200 && status < 300) {
    return { status: 'delivered' };
  }
  if (status === 429) {
    return {
      status: 'retryable',
      error: new TransientDeliveryError('rate_limit', `Collector returned HTTP ${status}`, { status }),
    };
  }
  if (status === 408) {
    return {
      status: 'retryable',
      error: new TransientDeliveryError('timeout', `Collector returned HTTP ${status}`, { status }),
    };
  }
  if (status >= 500) {
    return {
      status: 'retryable',
      error: new TransientDeliveryError('server', `Collector returned HTTP ${status}`, { status }),
    };
  }
  return { status: 'fatal', error: new FatalDeliveryError(status, `Collector rejected batch with HTTP ${status}`) };
}

function isTimeout(err: unknown): boolean {
  return err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError');
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
