// Standardized error handling utilities
// Errors that escape the tool loop and reach the HTTP caller

export enum ErrorCode {
  NOT_FOUND = 'not_found',
  BAD_REQUEST = 'bad_request',
  VALIDATION_ERROR = 'validation_error',
  INTERNAL_ERROR = 'internal_error',
  MODEL_UNAVAILABLE = 'model_unavailable',
  MODEL_ERROR = 'model_error',
  MALFORMED_MODEL_RESPONSE = 'malformed_model_response',
  TOOL_LOOP_EXCEEDED = 'tool_loop_exceeded',
}

export class AppError extends Error {
  constructor(
    public code: ErrorCode,
    message: string,
    public statusCode: number = 500,
    public details?: unknown
  ) {
    super(message);
    this.name = 'AppError';
  }

  static notFound(message: string = 'Resource not found', details?: unknown): AppError {
    return new AppError(ErrorCode.NOT_FOUND, message, 404, details);
  }

  static validationError(message: string, details?: unknown): AppError {
    return new AppError(ErrorCode.VALIDATION_ERROR, message, 400, details);
  }

  // Model not configured or unreachable
  static modelUnavailable(message: string, details?: unknown): AppError {
    return new AppError(ErrorCode.MODEL_UNAVAILABLE, message, 503, details);
  }

  static modelError(message: string, details?: unknown): AppError {
    return new AppError(ErrorCode.MODEL_ERROR, message, 502, details);
  }

  static malformedModelResponse(message: string = 'Model returned neither text nor tool calls'): AppError {
    return new AppError(ErrorCode.MALFORMED_MODEL_RESPONSE, message, 502);
  }

  static toolLoopExceeded(rounds: number): AppError {
    return new AppError(
      ErrorCode.TOOL_LOOP_EXCEEDED,
      `The assistant kept requesting tools after ${rounds} rounds without producing an answer. Please rephrase or narrow the question.`,
      502,
      { rounds }
    );
  }
}

export interface ErrorResponse {
  error: ErrorCode;
  message: string;
  statusCode: number;
  details?: unknown;
}

export function formatErrorResponse(error: AppError, includeDetails: boolean = false): ErrorResponse {
  const response: ErrorResponse = {
    error: error.code,
    message: error.message,
    statusCode: error.statusCode,
  };

  if (includeDetails && error.details) {
    response.details = error.details;
  }

  return response;
}
