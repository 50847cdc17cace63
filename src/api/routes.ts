/* eslint-disable @typescript-eslint/require-await */
import type { FastifyPluginAsync, FastifyPluginOptions } from 'fastify';
import { z } from 'zod';
import type { AgentOrchestrator } from '../agent/orchestrator.js';
import type { ResponseCache } from '../cache/response-cache.js';

export interface AgentRouteOptions extends FastifyPluginOptions {
  orchestrator: AgentOrchestrator;
  cache?: ResponseCache;
}

export const AgentRequestSchema = z.object({
  prompt: z.string().trim().min(1, 'prompt must not be empty'),
});

/**
 * Prompt endpoint plus a liveness probe
 */
export const agentRoutes: FastifyPluginAsync<AgentRouteOptions> = async (
  fastify,
  options
): Promise<void> => {
  const { orchestrator, cache } = options;

  fastify.post<{ Body: unknown }>('/agent', async (request, reply) => {
    const parsed = AgentRequestSchema.safeParse(request.body);
    if (!parsed.success) {
      reply.code(400);
      return { error: 'Invalid request body', details: parsed.error.issues };
    }

    const result = await orchestrator.handlePrompt(parsed.data.prompt);

    switch (result.response.kind) {
      case 'unavailable':
        reply.code(503);
        break;
      case 'not_found':
        reply.code(404);
        break;
      default:
        reply.code(200);
    }

    return result;
  });

  fastify.get('/health', async () => ({
    status: 'ok',
    cacheEntries: cache?.size ?? 0,
    uptime: process.uptime(),
  }));
};
