// Environment configuration for the research chat API
// Load model credentials and tool settings from environment variables

const strEnv = (value: string | undefined, fallback = '') => (value ?? fallback).trim();

function parsePort(value: string | undefined, defaultPort: number): number {
  if (!value) return defaultPort;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 1 || parsed > 65535) {
    console.error(`Invalid PORT "${value}", using default ${defaultPort}`);
    return defaultPort;
  }
  return parsed;
}

function parsePositiveInt(value: string | undefined, defaultValue: number, name: string): number {
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 0) {
    console.error(`Invalid ${name} "${value}", using default ${defaultValue}`);
    return defaultValue;
  }
  return parsed;
}

/**
 * OpenAI-compatible endpoints are addressed with a trailing `/v1`;
 * accept base URLs configured with or without it.
 */
export function normalizeModelBaseUrl(value: string): string {
  const trimmed = value.trim().replace(/\/+$/, '');
  if (!trimmed) return trimmed;
  return trimmed.endsWith('/v1') ? trimmed : `${trimmed}/v1`;
}

const DEFAULT_SYSTEM_PROMPT = [
  'You are a helpful research assistant.',
  'Use duckduckgo_search when the user needs current information, facts or news.',
  'Use fetch_and_parse_url when the user gives a link or asks you to read a page.',
  'When a tool returns an error, explain it or try again with different arguments.',
].join(' ');

export const env = {
  // Server
  PORT: parsePort(process.env.PORT, 8000),
  HOST: process.env.HOST || '0.0.0.0',
  NODE_ENV: process.env.NODE_ENV || 'development',

  // Model endpoint (OpenAI-compatible)
  MODEL_API_KEY: strEnv(process.env.MODEL_API_KEY),
  MODEL_BASE_URL: normalizeModelBaseUrl(strEnv(process.env.MODEL_BASE_URL, 'https://api.openai.com/v1')),
  MODEL_NAME: strEnv(process.env.MODEL_NAME, 'gpt-4o-mini'),
  MODEL_TIMEOUT_MS: parsePositiveInt(process.env.MODEL_TIMEOUT_MS, 60000, 'MODEL_TIMEOUT_MS'),
  SYSTEM_PROMPT: strEnv(process.env.SYSTEM_PROMPT, DEFAULT_SYSTEM_PROMPT),

  // Tool loop
  MAX_TOOL_ROUNDS: parsePositiveInt(process.env.MAX_TOOL_ROUNDS, 5, 'MAX_TOOL_ROUNDS'),

  // Tools
  SEARCH_ENDPOINT: strEnv(process.env.SEARCH_ENDPOINT, 'https://html.duckduckgo.com/html/'),
  SEARCH_TIMEOUT_MS: parsePositiveInt(process.env.SEARCH_TIMEOUT_MS, 10000, 'SEARCH_TIMEOUT_MS'),
  FETCH_TIMEOUT_MS: parsePositiveInt(process.env.FETCH_TIMEOUT_MS, 10000, 'FETCH_TIMEOUT_MS'),
  FETCH_USER_AGENT: strEnv(
    process.env.FETCH_USER_AGENT,
    'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36',
  ),

  // Logging
  LOG_LEVEL: process.env.LOG_LEVEL || 'info',
};

export function isModelConfigured(): boolean {
  return !!env.MODEL_API_KEY && !!env.MODEL_BASE_URL;
}

// Log configuration on startup (redact secrets)
export function logConfiguration() {
  console.log('Research Chat API Configuration:');
  console.log(`  Environment: ${env.NODE_ENV}`);
  console.log(`  Server: ${env.HOST}:${env.PORT}`);
  console.log(`  Model endpoint: ${env.MODEL_BASE_URL}`);
  console.log(`  Model: ${env.MODEL_NAME}`);
  console.log(`  Model API key: ${env.MODEL_API_KEY ? 'set' : 'MISSING'}`);
  console.log(`  Max tool rounds: ${env.MAX_TOOL_ROUNDS}`);
  console.log(`  Search endpoint: ${env.SEARCH_ENDPOINT}`);
  console.log(`  Fetch timeout ms: ${env.FETCH_TIMEOUT_MS}`);
  if (!env.MODEL_API_KEY) {
    console.log('  ⚠️  MODEL_API_KEY not set - /chat will answer 503');
  }
}
