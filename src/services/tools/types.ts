// Tool system types and interfaces
// Defines the schema and interfaces for the tools offered to the model

import type { ToolErrorInfo } from './errors.js';

export type ToolParameterType = 'string' | 'number' | 'integer' | 'boolean' | 'array' | 'object';

export interface ToolParameter {
  name: string;
  type: ToolParameterType;
  description: string;
  required: boolean;
  enum?: string[]; // For enum types
  default?: unknown;
  minimum?: number;
  maximum?: number;
}

export type ToolArgs = Record<string, unknown>;

export interface ToolDefinition<TPayload = unknown> {
  name: string;
  description: string;
  parameters: ToolParameter[];
  // Receives arguments already validated against `parameters`; throws ToolError on failure
  execute: (args: ToolArgs) => Promise<TPayload>;
}

interface ToolResultBase {
  callId: string;
  tool: string;
  durationMs: number;
}

export interface ToolSuccess extends ToolResultBase {
  success: true;
  payload: unknown;
}

export interface ToolFailure extends ToolResultBase {
  success: false;
  error: ToolErrorInfo;
}

export type ToolResult = ToolSuccess | ToolFailure;

/** Content of the tool-role turn handed back to the model. */
export function serializeToolResult(result: ToolResult): string {
  if (result.success) {
    return JSON.stringify(result.payload);
  }
  return JSON.stringify({ error: result.error });
}
