import { randomUUID } from 'node:crypto';
import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { CollectedEvent } from '../../application/event-schema.js';

export interface StoredAgent {
  readonly id: string;
  readonly name: string;
  readonly framework: string;
  readonly metadata: Record<string, unknown>;
  readonly registeredAt: string;
}

export interface NewAgent {
  name: string;
  framework: string;
  metadata: Record<string, unknown>;
}

/**
 * Agents and the events they reported, kept in memory for the lifetime
 * of the collector process. Events are stored in arrival order.
 */
export class InMemoryAgentStore {
  private readonly agents = new Map<string, StoredAgent>();
  private readonly events = new Map<string, CollectedEvent[]>();

  register(input: NewAgent): StoredAgent {
    const agent: StoredAgent = {
      id: randomUUID(),
      name: input.name,
      framework: input.framework,
      metadata: input.metadata,
      registeredAt: new Date().toISOString(),
    };
    this.agents.set(agent.id, agent);
    this.events.set(agent.id, []);
    return agent;
  }

  get(agentId: string): StoredAgent | undefined {
    return this.agents.get(agentId);
  }

  /** Returns the number of events appended, or `null` for an unknown agent. */
  append(agentId: string, batch: readonly CollectedEvent[]): number | null {
    const stored = this.events.get(agentId);
    if (stored === undefined) return null;
    stored.push(...batch);
    return batch.length;
  }

  listEvents(agentId: string): readonly CollectedEvent[] | undefined {
    return this.events.get(agentId);
  }

  get agentCount(): number {
    return this.agents.size;
  }

  clear(): void {
    this.agents.clear();
    this.events.clear();
  }
}

/**
 * Decorates `fastify.agents` with an in-memory store and empties it
 * when the server closes.
 */
async function agentStorePlugin(fastify: FastifyInstance): Promise<void> {
  const store = new InMemoryAgentStore();
  fastify.decorate('agents', store);

  fastify.addHook('onClose', async () => {
    store.clear();
    fastify.log.info('Agent store cleared');
  });
}

export default fp(agentStorePlugin, {
  name: 'agent-store',
  fastify: '5.x',
});

declare module 'fastify' {
  interface FastifyInstance {
    agents: InMemoryAgentStore;
  }
}
