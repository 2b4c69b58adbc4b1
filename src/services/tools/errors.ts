// Tool failure kinds
// Everything a tool can report back to the model as data instead of throwing past the loop

export type ToolErrorKind =
  | 'InvalidArgument' // out-of-policy input caught by the tool before any I/O
  | 'InvalidArguments' // arguments do not match the declared parameter schema
  | 'InvalidUrl'
  | 'Timeout'
  | 'ConnectionFailed'
  | 'UnknownTool'
  | 'ToolExecutionError';

export interface ToolErrorInfo {
  kind: ToolErrorKind;
  message: string;
}

export class ToolError extends Error {
  constructor(
    public kind: ToolErrorKind,
    message: string
  ) {
    super(message);
    this.name = 'ToolError';
  }

  static invalidArgument(message: string): ToolError {
    return new ToolError('InvalidArgument', message);
  }

  static invalidArguments(message: string): ToolError {
    return new ToolError('InvalidArguments', message);
  }

  static invalidUrl(url: string): ToolError {
    return new ToolError('InvalidUrl', `Invalid URL (expected http:// or https:// with a host): ${url}`);
  }

  static timeout(url: string): ToolError {
    return new ToolError('Timeout', `Request timed out: ${url}`);
  }

  static connectionFailed(url: string, reason: string): ToolError {
    return new ToolError('ConnectionFailed', `Request failed: ${url} (${reason})`);
  }

  static unknownTool(name: string): ToolError {
    return new ToolError('UnknownTool', `Unknown tool: ${name}`);
  }

  static execution(message: string): ToolError {
    return new ToolError('ToolExecutionError', message);
  }

  toInfo(): ToolErrorInfo {
    return { kind: this.kind, message: this.message };
  }
}

function errorName(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'name' in error && typeof error.name === 'string') {
    return error.name;
  }
  return '';
}

function errorCauseMessage(error: unknown): string {
  if (!(error instanceof Error)) return String(error);
  const cause: unknown = error.cause;
  if (cause instanceof Error && cause.message) {
    return `${error.message}: ${cause.message}`;
  }
  return error.message;
}

/**
 * Maps a rejected `fetch` to a tool failure. `AbortSignal.timeout` rejects
 * with a `TimeoutError`; undici reports socket and DNS failures as a
 * `TypeError` whose cause carries the detail.
 */
export function classifyFetchError(error: unknown, url: string): ToolError {
  if (error instanceof ToolError) return error;
  const name = errorName(error);
  if (name === 'TimeoutError' || name === 'AbortError') {
    return ToolError.timeout(url);
  }
  return ToolError.connectionFailed(url, errorCauseMessage(error));
}
