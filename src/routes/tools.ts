// Tool routes
import type { FastifyInstance } from 'fastify';
import type { ToolRegistry } from '../services/tools/index.js';
import { requireAuthIfEnabled } from '../security/route-guards.js';

export type ToolRoutesOptions = {
  registry: ToolRegistry;
};

export async function toolRoutes(server: FastifyInstance, opts: ToolRoutesOptions) {
  // GET /v1/tools - Descriptors the model sees for every registered tool
  server.get('/tools', async (request, reply) => {
    if (!requireAuthIfEnabled(request, reply)) {
      return;
    }

    return reply.code(200).send({ tools: opts.registry.toOpenAIFunctions() });
  });
}
