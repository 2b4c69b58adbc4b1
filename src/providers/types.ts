// Provider Interface
// The model capability the orchestrator talks to: message history in,
// either final text or a list of tool calls out.

export interface ToolCall {
  id: string;
  name: string;
  arguments: string; // JSON string
}

export interface ParameterSchema {
  type: string;
  description: string;
  enum?: string[];
  default?: unknown;
  minimum?: number;
  maximum?: number;
}

export type ProviderToolParameters = {
  type: 'object';
  properties: Record<string, ParameterSchema>;
  required: string[];
};

export type ProviderTool = {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: ProviderToolParameters;
  };
};

export interface ProviderMessage {
  role: 'user' | 'assistant' | 'system' | 'tool';
  content: string;
  tool_calls?: ToolCall[]; // For assistant messages with tool calls
  tool_call_id?: string; // For tool result messages
  name?: string; // Tool name for tool messages
}

export interface ProviderOptions {
  model: string;
  maxTokens?: number;
  temperature?: number;
  signal?: AbortSignal;
  tools?: ProviderTool[];
  tool_choice?: 'auto' | 'none';
}

export interface ProviderUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface ProviderResponse {
  content: string;
  toolCalls: ToolCall[];
  finishReason?: string;
  usage: ProviderUsage;
}

export interface Provider {
  name: string;
  sendChat(messages: ProviderMessage[], options: ProviderOptions): Promise<ProviderResponse>;
}
