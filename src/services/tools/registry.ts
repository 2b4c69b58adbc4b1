// Tool Registry - Fixed lookup table of the tools offered to the model
// Built once at startup and frozen; requests only read from it

import { z } from 'zod';
import type { ParameterSchema, ProviderTool, ToolCall } from '../../providers/types.js';
import { ToolError } from './errors.js';
import type { ToolArgs, ToolDefinition, ToolParameter, ToolResult } from './types.js';

function parameterValidator(param: ToolParameter): z.ZodTypeAny {
  switch (param.type) {
    case 'string':
      if (param.enum) {
        const allowed = param.enum;
        return z.string().refine(v => allowed.includes(v), {
          message: `must be one of: ${allowed.join(', ')}`,
        });
      }
      return z.string();
    case 'number':
      return z.number();
    case 'integer':
      return z.number().int();
    case 'boolean':
      return z.boolean();
    case 'array':
      return z.array(z.unknown());
    case 'object':
      return z.record(z.unknown());
  }
}

function buildArgumentSchema(params: ToolParameter[]) {
  const shape: Record<string, z.ZodTypeAny> = {};
  for (const param of params) {
    const validator = parameterValidator(param);
    // Models sometimes send null for optional parameters they mean to omit
    shape[param.name] = param.required ? validator : validator.nullish();
  }
  return z.object(shape);
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.join('.') || 'arguments'}: ${issue.message}`)
    .join('; ');
}

export class ToolRegistry {
  private tools: Map<string, ToolDefinition> = new Map();
  private validators: Map<string, z.ZodTypeAny> = new Map();
  private frozen = false;

  register(tool: ToolDefinition): void {
    if (this.frozen) {
      throw new Error(`Tool registry is frozen; cannot register "${tool.name}"`);
    }
    if (this.tools.has(tool.name)) {
      throw new Error(`Tool "${tool.name}" is already registered`);
    }
    this.tools.set(tool.name, tool);
    this.validators.set(tool.name, buildArgumentSchema(tool.parameters));
  }

  freeze(): this {
    this.frozen = true;
    return this;
  }

  isFrozen(): boolean {
    return this.frozen;
  }

  get(name: string): ToolDefinition | undefined {
    return this.tools.get(name);
  }

  getAll(): ToolDefinition[] {
    return Array.from(this.tools.values());
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  /** The catalog attached to every model call. */
  schema(): ProviderTool[] {
    return Array.from(this.tools.values()).map(tool => ({
      type: 'function' as const,
      function: {
        name: tool.name,
        description: tool.description,
        parameters: {
          type: 'object' as const,
          properties: this.parametersToSchema(tool.parameters),
          required: tool.parameters.filter(p => p.required).map(p => p.name),
        },
      },
    }));
  }

  /**
   * Runs one tool. Never throws: unknown tools, schema mismatches and
   * failures inside the tool all come back as a failed ToolResult.
   */
  async invoke(name: string, args: unknown, callId: string): Promise<ToolResult> {
    const startTime = Date.now();
    const tool = this.tools.get(name);
    const validator = this.validators.get(name);

    if (!tool || !validator) {
      return this.failure(callId, name, startTime, ToolError.unknownTool(name));
    }

    const parsed = validator.safeParse(args ?? {});
    if (!parsed.success) {
      return this.failure(
        callId,
        name,
        startTime,
        ToolError.invalidArguments(`Invalid arguments for ${name}: ${formatIssues(parsed.error)}`),
      );
    }

    try {
      const payload = await tool.execute(this.applyDefaults(tool.parameters, parsed.data));
      return {
        callId,
        tool: name,
        success: true,
        payload,
        durationMs: Date.now() - startTime,
      };
    } catch (error) {
      const toolError = error instanceof ToolError
        ? error
        : ToolError.execution(`${name} failed: ${error instanceof Error ? error.message : String(error)}`);
      return this.failure(callId, name, startTime, toolError);
    }
  }

  /** Invokes a model-issued call whose arguments arrive as JSON text. */
  async dispatch(call: ToolCall): Promise<ToolResult> {
    // Some compatible endpoints send null or an object here despite the declared type
    const value: unknown = call.arguments;
    if (typeof value !== 'string') {
      const error = this.tools.has(call.name)
        ? ToolError.invalidArguments(`Arguments for ${call.name} must be a JSON string`)
        : ToolError.unknownTool(call.name);
      return this.failure(call.id, call.name, Date.now(), error);
    }

    const raw = value.trim();
    if (!raw) {
      return this.invoke(call.name, {}, call.id);
    }

    let args: unknown;
    try {
      args = JSON.parse(raw);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      if (!this.tools.has(call.name)) {
        return this.failure(call.id, call.name, Date.now(), ToolError.unknownTool(call.name));
      }
      return this.failure(
        call.id,
        call.name,
        Date.now(),
        ToolError.invalidArguments(`Arguments for ${call.name} are not valid JSON: ${reason}`),
      );
    }

    return this.invoke(call.name, args, call.id);
  }

  private applyDefaults(params: ToolParameter[], values: Record<string, unknown>): ToolArgs {
    const args: ToolArgs = {};
    for (const param of params) {
      const value = values[param.name];
      if (value !== undefined && value !== null) {
        args[param.name] = value;
      } else if (param.default !== undefined) {
        args[param.name] = param.default;
      }
    }
    return args;
  }

  private failure(callId: string, tool: string, startTime: number, error: ToolError): ToolResult {
    return {
      callId,
      tool,
      success: false,
      error: error.toInfo(),
      durationMs: Date.now() - startTime,
    };
  }

  private parametersToSchema(params: ToolParameter[]): Record<string, ParameterSchema> {
    const schema: Record<string, ParameterSchema> = {};

    for (const param of params) {
      const paramSchema: ParameterSchema = {
        type: param.type,
        description: param.description,
      };

      if (param.enum) {
        paramSchema.enum = param.enum;
      }

      if (param.default !== undefined) {
        paramSchema.default = param.default;
      }

      if (param.minimum !== undefined) {
        paramSchema.minimum = param.minimum;
      }

      if (param.maximum !== undefined) {
        paramSchema.maximum = param.maximum;
      }

      schema[param.name] = paramSchema;
    }

    return schema;
  }
}
