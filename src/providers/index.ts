// Provider Registry
// One OpenAI-compatible model endpoint, created lazily from env

import type { Provider } from './types.js';
import { OpenAICompatibleProvider } from './openai-compatible.js';
import { env, isModelConfigured } from '../env.js';
import { AppError } from '../utils/errors.js';

let provider: Provider | null = null;

export function getProvider(): Provider {
  if (provider) {
    return provider;
  }

  if (!isModelConfigured()) {
    throw AppError.modelUnavailable('Model API is not configured; set MODEL_API_KEY');
  }

  provider = new OpenAICompatibleProvider({
    apiKey: env.MODEL_API_KEY,
    baseUrl: env.MODEL_BASE_URL,
    timeoutMs: env.MODEL_TIMEOUT_MS,
  });

  return provider;
}

// Re-export types
export type { Provider, ProviderMessage, ProviderOptions, ProviderResponse, ProviderTool, ToolCall } from './types.js';
