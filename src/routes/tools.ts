import type { FastifyPluginAsync } from 'fastify';
import type { ToolRegistry } from '../services/tools/registry.js';

export interface ToolRouteOptions {
  registry: ToolRegistry;
}

export const toolRoutes: FastifyPluginAsync<ToolRouteOptions> = async (server, opts) => {
  // Public: the exact catalog attached to model calls
  server.get('/tools', async () => {
    return { tools: opts.registry.schema() };
  });
};
