import Fastify, { type FastifyInstance } from 'fastify';
import type { Agent } from '../agent/factory.js';
import { agentRoutes } from './routes.js';

/**
 * Build the HTTP server for an agent. Fastify's own logger stays off; request
 * handling logs through the pipeline's loggers.
 */
export async function createServer(agent: Agent): Promise<FastifyInstance> {
  const fastify = Fastify({ logger: false });

  await fastify.register(agentRoutes, {
    orchestrator: agent.orchestrator,
    cache: agent.cache,
  });

  fastify.addHook('onClose', async () => {
    agent.close();
  });

  return fastify;
}
