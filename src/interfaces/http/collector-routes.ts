import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { agentRegistrationSchema, eventBatchSchema } from '../../application/index.js';

export interface CollectorRouteOptions {
  /** Only this key is accepted when set; any bearer token otherwise. */
  apiKey?: string | undefined;
}

type AgentParams = { Params: { agentId: string } };

const BEARER = /^Bearer\s+(\S+)$/;

/**
 * Collector API the SDK talks to.
 *
 * POST /api/v1/agents                  — register an agent
 * POST /api/v1/agents/:agentId/events  — ingest a batch
 * GET  /api/v1/agents/:agentId/events  — list received events
 * GET  /health                         — liveness, no auth
 */
async function collectorRoutes(fastify: FastifyInstance, options: CollectorRouteOptions): Promise<void> {

  async function requireBearer(request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply | undefined> {
    const match = BEARER.exec(request.headers.authorization ?? '');
    const token = match?.[1];
    if (token === undefined || (options.apiKey !== undefined && token !== options.apiKey)) {
      return reply.status(401).send({ error: 'Unauthorized' });
    }
    return undefined;
  }

  fastify.post(
    '/api/v1/agents',
    { preHandler: requireBearer },
    async (request: FastifyRequest, reply: FastifyReply) => {
      const parsed = agentRegistrationSchema.safeParse(request.body);

      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      const agent = fastify.agents.register(parsed.data);
      request.log.info({ agent_id: agent.id, name: agent.name, framework: agent.framework }, 'Agent registered');

      return reply.status(201).send({ agent_id: agent.id });
    },
  );

  /**
   * Whole-batch validation: one invalid event rejects the batch.
   */
  fastify.post<AgentParams>(
    '/api/v1/agents/:agentId/events',
    { preHandler: requireBearer },
    async (request, reply) => {
      const { agentId } = request.params;
      if (fastify.agents.get(agentId) === undefined) {
        return reply.status(404).send({ error: 'Agent not found' });
      }

      const parsed = eventBatchSchema.safeParse(request.body);

      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      const accepted = fastify.agents.append(agentId, parsed.data.events) ?? 0;
      request.log.debug({ agent_id: agentId, accepted }, 'Events accepted');

      return reply.status(202).send({ accepted });
    },
  );

  fastify.get<AgentParams>(
    '/api/v1/agents/:agentId/events',
    { preHandler: requireBearer },
    async (request, reply) => {
      const { agentId } = request.params;
      const events = fastify.agents.listEvents(agentId);
      if (events === undefined) {
        return reply.status(404).send({ error: 'Agent not found' });
      }

      return reply.status(200).send({ agent_id: agentId, count: events.length, events });
    },
  );

  fastify.get('/health', async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.status(200).send({ status: 'ok', agents: fastify.agents.agentCount });
  });
}

export default fp(collectorRoutes, {
  name: 'collector-routes',
  dependencies: ['agent-store'],
  fastify: '5.x',
});
