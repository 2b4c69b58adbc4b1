import Fastify, { type FastifyInstance, type FastifyServerOptions } from 'fastify';
import cors from '@fastify/cors';
import { env, isModelConfigured } from './env.js';
import { getProvider } from './providers/index.js';
import type { Provider } from './providers/types.js';
import { chatRoutes } from './routes/chat.js';
import { toolRoutes } from './routes/tools.js';
import { initializeTools } from './services/tools/index.js';
import type { ToolRegistry } from './services/tools/registry.js';
import { AppError, ErrorCode, formatErrorResponse } from './utils/errors.js';

export interface BuildServerOptions {
  logger?: FastifyServerOptions['logger'];
  registry?: ToolRegistry;
  provider?: Provider;
}

export async function buildServer(options: BuildServerOptions = {}): Promise<FastifyInstance> {
  const server = Fastify({ logger: options.logger ?? false });

  const registry = options.registry ?? initializeTools();
  const injectedProvider = options.provider;
  const resolveProvider = () => injectedProvider ?? getProvider();

  server.log.info({ tools: registry.getAll().map(t => t.name) }, 'Tool registry initialized');

  await server.register(cors, { origin: true });

  server.setErrorHandler((error, request, reply) => {
    if (error instanceof AppError) {
      const level = error.statusCode >= 500 ? 'error' : 'warn';
      request.log[level]({ code: error.code, err: error.message }, 'Request failed');
      return reply
        .code(error.statusCode)
        .send(formatErrorResponse(error, env.NODE_ENV !== 'production'));
    }

    // Fastify's own 4xx errors (bad JSON, wrong content type) keep their status
    const statusCode = error.statusCode && error.statusCode < 500 ? error.statusCode : 500;
    if (statusCode >= 500) {
      request.log.error({ err: error }, 'Unhandled error');
    }
    return reply.code(statusCode).send({
      error: statusCode < 500 ? ErrorCode.BAD_REQUEST : ErrorCode.INTERNAL_ERROR,
      message: statusCode < 500 ? error.message : 'Internal server error',
      statusCode,
    });
  });

  server.setNotFoundHandler((request, reply) => {
    const error = AppError.notFound(`Route ${request.method} ${request.url} not found`);
    return reply.code(error.statusCode).send(formatErrorResponse(error));
  });

  server.get('/health', async () => {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      model_configured: !!injectedProvider || isModelConfigured(),
      tools: registry.getAll().map(t => t.name),
    };
  });

  await server.register(chatRoutes, { registry, resolveProvider });
  await server.register(toolRoutes, { registry });

  return server;
}
