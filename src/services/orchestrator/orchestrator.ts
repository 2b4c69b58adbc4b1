// Chat Orchestrator
// Drives model -> tools -> model rounds for one user message until the model answers

import type { FastifyBaseLogger } from 'fastify';
import type { Provider, ProviderMessage, ProviderResponse } from '../../providers/types.js';
import { AppError } from '../../utils/errors.js';
import type { ToolRegistry } from '../tools/registry.js';
import { serializeToolResult, type ToolResult } from '../tools/types.js';
import type { LoopState, OrchestratorOptions, OrchestratorResult } from './types.js';

export const DEFAULT_MAX_TOOL_ROUNDS = 5;

export class ChatOrchestrator {
  private provider: Provider;
  private registry: ToolRegistry;
  private model: string;
  private maxToolRounds: number;
  private systemPrompt: string;
  private maxTokens?: number;
  private temperature?: number;
  private logger?: FastifyBaseLogger;
  private state: LoopState = 'awaiting_model';

  constructor(provider: Provider, registry: ToolRegistry, options: OrchestratorOptions) {
    this.provider = provider;
    this.registry = registry;
    this.model = options.model;
    this.maxToolRounds = options.maxToolRounds ?? DEFAULT_MAX_TOOL_ROUNDS;
    this.systemPrompt = options.systemPrompt ?? '';
    this.maxTokens = options.maxTokens;
    this.temperature = options.temperature;
    this.logger = options.logger;
  }

  getState(): LoopState {
    return this.state;
  }

  /**
   * At most `maxToolRounds` rounds of tools are executed. If the model still
   * asks for tools after that, whatever text it produced alongside the
   * request is returned; with no text at all the run fails.
   */
  async run(userMessage: string): Promise<OrchestratorResult> {
    const history: ProviderMessage[] = [];
    if (this.systemPrompt) {
      history.push({ role: 'system', content: this.systemPrompt });
    }
    history.push({ role: 'user', content: userMessage });

    const toolResults: ToolResult[] = [];
    let rounds = 0;

    while (true) {
      this.transition('awaiting_model', rounds);
      const response = await this.callModel(history);
      const text = response.content.trim();

      if (response.toolCalls.length === 0) {
        this.transition('done', rounds);
        if (!text) {
          throw AppError.malformedModelResponse();
        }
        return { reply: text, rounds, toolResults, stopReason: 'final_answer' };
      }

      if (rounds >= this.maxToolRounds) {
        this.transition('done', rounds);
        this.logger?.warn(
          { rounds, pendingCalls: response.toolCalls.map(tc => tc.name) },
          'Tool round ceiling reached',
        );
        if (!text) {
          throw AppError.toolLoopExceeded(rounds);
        }
        return { reply: text, rounds, toolResults, stopReason: 'max_rounds' };
      }

      rounds++;
      this.transition('awaiting_tools', rounds);

      // Assistant turn with the calls must precede the tool turns that answer them
      history.push({
        role: 'assistant',
        content: response.content,
        tool_calls: response.toolCalls,
      });

      // Calls in one round are independent; results are appended in request order
      const results = await Promise.all(
        response.toolCalls.map(call => this.registry.dispatch(call)),
      );

      for (const result of results) {
        toolResults.push(result);
        history.push({
          role: 'tool',
          tool_call_id: result.callId,
          name: result.tool,
          content: serializeToolResult(result),
        });
        this.logToolResult(result);
      }
    }
  }

  private async callModel(history: ProviderMessage[]): Promise<ProviderResponse> {
    return this.provider.sendChat([...history], {
      model: this.model,
      maxTokens: this.maxTokens,
      temperature: this.temperature,
      tools: this.registry.schema(),
      tool_choice: 'auto',
    });
  }

  private transition(next: LoopState, rounds: number): void {
    this.logger?.debug({ from: this.state, to: next, rounds }, 'Tool loop state change');
    this.state = next;
  }

  private logToolResult(result: ToolResult): void {
    if (result.success) {
      this.logger?.info(
        { tool: result.tool, callId: result.callId, durationMs: result.durationMs },
        'Tool call succeeded',
      );
      return;
    }
    this.logger?.warn(
      {
        tool: result.tool,
        callId: result.callId,
        durationMs: result.durationMs,
        kind: result.error.kind,
        error: result.error.message,
      },
      'Tool call failed',
    );
  }
}
