// OpenAI-compatible Provider
// Any chat-completions endpoint that supports function calling

import OpenAI from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import { AppError } from '../utils/errors.js';
import type { Provider, ProviderMessage, ProviderOptions, ProviderResponse, ToolCall } from './types.js';

export interface OpenAICompatibleConfig {
  apiKey: string;
  baseUrl: string;
  timeoutMs: number;
}

export function toChatMessage(message: ProviderMessage): ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
    case 'tool':
      return {
        role: 'tool',
        content: message.content,
        tool_call_id: message.tool_call_id ?? '',
      };
    case 'assistant':
      if (message.tool_calls && message.tool_calls.length > 0) {
        return {
          role: 'assistant',
          content: message.content || null,
          tool_calls: message.tool_calls.map(tc => ({
            id: tc.id,
            type: 'function' as const,
            function: { name: tc.name, arguments: tc.arguments },
          })),
        };
      }
      return { role: 'assistant', content: message.content };
  }
}

export class OpenAICompatibleProvider implements Provider {
  name = 'openai-compatible';
  private client: OpenAI;
  private baseUrl: string;

  constructor(config: OpenAICompatibleConfig) {
    if (!config.apiKey) {
      throw AppError.modelUnavailable('Model API key is not configured');
    }
    this.baseUrl = config.baseUrl;
    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseUrl,
      timeout: config.timeoutMs,
      maxRetries: 1,
    });
  }

  async sendChat(messages: ProviderMessage[], options: ProviderOptions): Promise<ProviderResponse> {
    let completion: OpenAI.Chat.Completions.ChatCompletion;
    try {
      completion = await this.client.chat.completions.create(
        {
          model: options.model,
          messages: messages.map(toChatMessage),
          max_tokens: options.maxTokens,
          temperature: options.temperature,
          tools: options.tools && options.tools.length > 0 ? options.tools : undefined,
          tool_choice: options.tools && options.tools.length > 0 ? options.tool_choice : undefined,
        },
        { signal: options.signal },
      );
    } catch (error) {
      throw this.translateError(error);
    }

    const choice = completion.choices[0];
    if (!choice) {
      throw AppError.malformedModelResponse('Model API returned no choices');
    }

    const toolCalls: ToolCall[] = (choice.message.tool_calls ?? []).map(tc => ({
      id: tc.id,
      name: tc.function.name,
      arguments: tc.function.arguments,
    }));

    return {
      content: choice.message.content ?? '',
      toolCalls,
      finishReason: choice.finish_reason,
      usage: {
        promptTokens: completion.usage?.prompt_tokens || 0,
        completionTokens: completion.usage?.completion_tokens || 0,
        totalTokens: completion.usage?.total_tokens || 0,
      },
    };
  }

  private translateError(error: unknown): AppError {
    // APIConnectionError is a subclass of APIError, check it first
    if (error instanceof OpenAI.APIConnectionError) {
      return AppError.modelUnavailable(
        `Unable to reach the model API at ${this.baseUrl}: ${error.message}`,
      );
    }
    if (error instanceof OpenAI.APIError) {
      const status = error.status ?? 'unknown';
      if (error.status === 401 || error.status === 403) {
        return AppError.modelError(
          `Model API rejected the credentials (status ${status}); check MODEL_API_KEY and MODEL_BASE_URL`,
        );
      }
      return AppError.modelError(`Model API error (status ${status}): ${error.message}`);
    }
    const message = error instanceof Error ? error.message : String(error);
    return AppError.modelError(`Model call failed: ${message}`);
  }
}
