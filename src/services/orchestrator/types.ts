// Orchestrator Types

import type { FastifyBaseLogger } from 'fastify';
import type { ToolResult } from '../tools/types.js';

export type LoopState = 'awaiting_model' | 'awaiting_tools' | 'done';

export type StopReason = 'final_answer' | 'max_rounds';

export interface OrchestratorOptions {
  model: string;
  maxToolRounds?: number;
  systemPrompt?: string;
  maxTokens?: number;
  temperature?: number;
  logger?: FastifyBaseLogger;
}

export interface OrchestratorResult {
  reply: string;
  rounds: number;
  toolResults: ToolResult[];
  stopReason: StopReason;
}
