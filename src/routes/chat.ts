/**
 * Chat Route
 * One user message in, one reply out; tools run inside the request
 */

import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { env } from '../env.js';
import type { Provider } from '../providers/types.js';
import { ChatOrchestrator } from '../services/orchestrator/index.js';
import type { ToolRegistry } from '../services/tools/registry.js';
import { AppError } from '../utils/errors.js';

const ChatRequestSchema = z.object({
  user_message: z.string().refine(value => value.trim().length > 0, {
    message: 'user_message must not be empty',
  }),
});

export interface ChatRouteOptions {
  registry: ToolRegistry;
  resolveProvider: () => Provider;
}

export const chatRoutes: FastifyPluginAsync<ChatRouteOptions> = async (server, opts) => {
  // POST /chat - run the tool loop for a single message
  server.post('/chat', async (request) => {
    const parsed = ChatRequestSchema.safeParse(request.body);
    if (!parsed.success) {
      throw AppError.validationError('user_message is required and must be a non-empty string', parsed.error.issues);
    }

    const provider = opts.resolveProvider();
    const orchestrator = new ChatOrchestrator(provider, opts.registry, {
      model: env.MODEL_NAME,
      maxToolRounds: env.MAX_TOOL_ROUNDS,
      systemPrompt: env.SYSTEM_PROMPT,
      logger: request.log,
    });

    const result = await orchestrator.run(parsed.data.user_message);

    request.log.info(
      {
        rounds: result.rounds,
        toolCalls: result.toolResults.length,
        failedToolCalls: result.toolResults.filter(r => !r.success).length,
        stopReason: result.stopReason,
      },
      'Chat completed',
    );

    return { reply: result.reply };
  });

  // GET /chat - usage hint for people poking the endpoint from a browser
  server.get('/chat', async () => {
    return {
      message: 'This endpoint only accepts POST requests',
      usage: {
        method: 'POST',
        url: '/chat',
        headers: { 'Content-Type': 'application/json' },
        body: { user_message: 'Your message' },
        example: {
          curl: `curl -X POST http://localhost:${env.PORT}/chat -H "Content-Type: application/json" -d '{"user_message": "Hello"}'`,
        },
      },
    };
  });
};
