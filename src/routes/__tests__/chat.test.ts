import { describe, it, expect, vi, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildServer } from '../../server.js';
import { env } from '../../env.js';
import { initializeTools } from '../../services/tools/index.js';
import type { SearchRecord } from '../../services/web-search.js';
import type {
  Provider,
  ProviderMessage,
  ProviderOptions,
  ProviderResponse,
  ToolCall,
} from '../../providers/types.js';
import { AppError } from '../../utils/errors.js';

const SEARCH_RECORD: SearchRecord = { title: 'T', url: 'https://x', snippet: 'S' };

function modelReply(content: string, toolCalls: ToolCall[] = []): ProviderResponse {
  return {
    content,
    toolCalls,
    usage: { promptTokens: 0, completionTokens: 0, totalTokens: 0 },
  };
}

function scriptedProvider(...responses: ProviderResponse[]) {
  const queue = [...responses];
  const sendChat = vi.fn(async (_messages: ProviderMessage[], _options: ProviderOptions) => {
    const next = queue.shift();
    if (!next) {
      throw new Error('No scripted response left');
    }
    return next;
  });
  const provider: Provider = { name: 'scripted', sendChat };
  return { provider, sendChat };
}

function failingProvider(error: Error): Provider {
  return {
    name: 'failing',
    sendChat: async () => {
      throw error;
    },
  };
}

describe('Chat Routes', () => {
  const apps: FastifyInstance[] = [];
  const search = vi.fn(async (_query: string, _count: number) => [SEARCH_RECORD]);

  async function buildApp(provider?: Provider): Promise<FastifyInstance> {
    const app = await buildServer({ provider, registry: initializeTools({ search }) });
    await app.ready();
    apps.push(app);
    return app;
  }

  afterEach(async () => {
    await Promise.all(apps.splice(0).map(app => app.close()));
    search.mockClear();
  });

  describe('POST /chat', () => {
    it('should answer a plain message without tools', async () => {
      const { provider, sendChat } = scriptedProvider(modelReply('Hello! How can I help?'));
      const app = await buildApp(provider);

      const response = await app.inject({
        method: 'POST',
        url: '/chat',
        payload: { user_message: 'hello' },
      });

      expect(response.statusCode).toBe(200);
      expect(JSON.parse(response.body)).toEqual({ reply: 'Hello! How can I help?' });
      expect(sendChat).toHaveBeenCalledTimes(1);
      expect(search).not.toHaveBeenCalled();
    });

    it('should run the search tool and feed its records back to the model', async () => {
      const { provider, sendChat } = scriptedProvider(
        modelReply('', [{ id: 'call_1', name: 'duckduckgo_search', arguments: '{"query":"latest news"}' }]),
        modelReply('Here is what I found: T (https://x).'),
      );
      const app = await buildApp(provider);

      const response = await app.inject({
        method: 'POST',
        url: '/chat',
        payload: { user_message: 'What is in the news?' },
      });

      expect(response.statusCode).toBe(200);
      expect(JSON.parse(response.body)).toEqual({ reply: 'Here is what I found: T (https://x).' });
      expect(search).toHaveBeenCalledWith('latest news', 5);

      const toolTurns = sendChat.mock.calls[1][0].filter(m => m.role === 'tool');
      expect(toolTurns).toEqual([
        {
          role: 'tool',
          tool_call_id: 'call_1',
          name: 'duckduckgo_search',
          content: JSON.stringify({ query: 'latest news', results: [SEARCH_RECORD] }),
        },
      ]);
    });

    it('should reject a blank message', async () => {
      const { provider, sendChat } = scriptedProvider();
      const app = await buildApp(provider);

      const response = await app.inject({
        method: 'POST',
        url: '/chat',
        payload: { user_message: '   ' },
      });

      expect(response.statusCode).toBe(400);
      expect(JSON.parse(response.body)).toMatchObject({
        error: 'validation_error',
        message: 'user_message is required and must be a non-empty string',
        statusCode: 400,
      });
      expect(sendChat).not.toHaveBeenCalled();
    });

    it('should reject a missing message', async () => {
      const { provider } = scriptedProvider();
      const app = await buildApp(provider);

      const response = await app.inject({
        method: 'POST',
        url: '/chat',
        payload: { message: 'wrong field' },
      });

      expect(response.statusCode).toBe(400);
      expect(JSON.parse(response.body).error).toBe('validation_error');
    });

    it('should reject a body that is not JSON', async () => {
      const { provider } = scriptedProvider();
      const app = await buildApp(provider);

      const response = await app.inject({
        method: 'POST',
        url: '/chat',
        headers: { 'content-type': 'application/json' },
        payload: '{"user_message":',
      });

      expect(response.statusCode).toBe(400);
      expect(JSON.parse(response.body).error).toBe('bad_request');
    });

    it('should fail when the model never stops asking for tools', async () => {
      const previousRounds = env.MAX_TOOL_ROUNDS;
      env.MAX_TOOL_ROUNDS = 1;
      try {
        const toolCall: ToolCall = { id: 'call_1', name: 'duckduckgo_search', arguments: '{"query":"again"}' };
        const sendChat = vi.fn(async () => modelReply('', [toolCall]));
        const app = await buildApp({ name: 'looping', sendChat });

        const response = await app.inject({
          method: 'POST',
          url: '/chat',
          payload: { user_message: 'keep searching' },
        });

        expect(response.statusCode).toBe(502);
        expect(JSON.parse(response.body)).toMatchObject({ error: 'tool_loop_exceeded', statusCode: 502 });
        expect(sendChat).toHaveBeenCalledTimes(2);
        expect(search).toHaveBeenCalledTimes(1);
      } finally {
        env.MAX_TOOL_ROUNDS = previousRounds;
      }
    });

    it('should return 503 when no model is configured', async () => {
      const previousKey = env.MODEL_API_KEY;
      env.MODEL_API_KEY = '';
      try {
        const app = await buildApp();

        const response = await app.inject({
          method: 'POST',
          url: '/chat',
          payload: { user_message: 'hello' },
        });

        expect(response.statusCode).toBe(503);
        expect(JSON.parse(response.body)).toMatchObject({
          error: 'model_unavailable',
          message: 'Model API is not configured; set MODEL_API_KEY',
        });
      } finally {
        env.MODEL_API_KEY = previousKey;
      }
    });

    it('should return 502 when the model call fails', async () => {
      const app = await buildApp(failingProvider(AppError.modelError('Model API error (status 500): upstream')));

      const response = await app.inject({
        method: 'POST',
        url: '/chat',
        payload: { user_message: 'hello' },
      });

      expect(response.statusCode).toBe(502);
      expect(JSON.parse(response.body)).toMatchObject({
        error: 'model_error',
        message: 'Model API error (status 500): upstream',
      });
    });

    it('should hide unexpected errors behind a generic 500', async () => {
      const app = await buildApp(failingProvider(new Error('socket hang up')));

      const response = await app.inject({
        method: 'POST',
        url: '/chat',
        payload: { user_message: 'hello' },
      });

      expect(response.statusCode).toBe(500);
      expect(JSON.parse(response.body)).toEqual({
        error: 'internal_error',
        message: 'Internal server error',
        statusCode: 500,
      });
    });
  });

  describe('GET /chat', () => {
    it('should describe how to use the endpoint', async () => {
      const app = await buildApp(scriptedProvider().provider);

      const response = await app.inject({ method: 'GET', url: '/chat' });

      expect(response.statusCode).toBe(200);
      const body = JSON.parse(response.body);
      expect(body.message).toBe('This endpoint only accepts POST requests');
      expect(body.usage).toMatchObject({ method: 'POST', url: '/chat', body: { user_message: 'Your message' } });
    });
  });

  describe('GET /health', () => {
    it('should report status and registered tools', async () => {
      const app = await buildApp(scriptedProvider().provider);

      const response = await app.inject({ method: 'GET', url: '/health' });

      expect(response.statusCode).toBe(200);
      const body = JSON.parse(response.body);
      expect(body.status).toBe('ok');
      expect(body.model_configured).toBe(true);
      expect(body.tools).toEqual(['duckduckgo_search', 'fetch_and_parse_url']);
    });
  });

  describe('unknown routes', () => {
    it('should answer 404 in the standard error shape', async () => {
      const app = await buildApp(scriptedProvider().provider);

      const response = await app.inject({ method: 'GET', url: '/nope' });

      expect(response.statusCode).toBe(404);
      expect(JSON.parse(response.body)).toEqual({
        error: 'not_found',
        message: 'Route GET /nope not found',
        statusCode: 404,
      });
    });
  });

  describe('GET /tools', () => {
    it('should list the tool catalog', async () => {
      const app = await buildApp(scriptedProvider().provider);

      const response = await app.inject({ method: 'GET', url: '/tools' });

      expect(response.statusCode).toBe(200);
      const body = JSON.parse(response.body);
      expect(body.tools.map((t: { function: { name: string } }) => t.function.name)).toEqual([
        'duckduckgo_search',
        'fetch_and_parse_url',
      ]);
    });
  });
});
