// Standardized error handling utilities
// AppError covers HTTP responses; AgentError covers the reasoning loop and its collaborators

export enum ErrorCode {
  NOT_FOUND = 'not_found',
  UNAUTHORIZED = 'unauthorized',
  BAD_REQUEST = 'bad_request',
  CONFLICT = 'conflict',
  INTERNAL_ERROR = 'internal_error',
  VALIDATION_ERROR = 'validation_error',
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

  static unauthorized(message: string = 'Unauthorized', details?: unknown): AppError {
    return new AppError(ErrorCode.UNAUTHORIZED, message, 401, details);
  }

  static badRequest(message: string = 'Bad request', details?: unknown): AppError {
    return new AppError(ErrorCode.BAD_REQUEST, message, 400, details);
  }

  static conflict(message: string = 'Conflict', details?: unknown): AppError {
    return new AppError(ErrorCode.CONFLICT, message, 409, details);
  }

  static validationError(message: string, details?: unknown): AppError {
    return new AppError(ErrorCode.VALIDATION_ERROR, message, 400, details);
  }

  static internal(message: string = 'Internal server error', details?: unknown): AppError {
    return new AppError(ErrorCode.INTERNAL_ERROR, message, 500, details);
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

// ---------------------------------------------------------------------------
// Agent errors

export type AgentErrorCode =
  | 'upstream_unavailable'
  | 'upstream_rate_limited'
  | 'malformed_reply'
  | 'duplicate_tool'
  | 'registry_sealed'
  | 'unknown_tool'
  | 'invalid_arguments'
  | 'tool_execution_failed'
  | 'tool_timeout'
  | 'conversation_invariant';

export abstract class AgentError extends Error {
  abstract readonly code: AgentErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

  toJSON(): { type: string; code: AgentErrorCode; message: string } {
    return { type: this.name, code: this.code, message: this.message };
  }
}

/**
 * Network failure, timeout or non-OK status from the model endpoint.
 * Client errors (4xx other than 429) are not retryable.
 */
export class UpstreamUnavailableError extends AgentError {
  readonly code = 'upstream_unavailable';
  readonly retryable: boolean;

  constructor(message: string, public readonly status?: number, options?: { cause?: unknown }) {
    super(message, options);
    this.retryable = status === undefined || status >= 500;
  }
}

/** The model endpoint answered 429. The caller should back off before asking again. */
export class UpstreamRateLimitedError extends AgentError {
  readonly code = 'upstream_rate_limited';

  constructor(message: string, public readonly retryAfterMs?: number) {
    super(message);
  }
}

export class MalformedReplyError extends AgentError {
  readonly code = 'malformed_reply';
}

export class DuplicateToolError extends AgentError {
  readonly code = 'duplicate_tool';

  constructor(public readonly toolName: string) {
    super(`Tool "${toolName}" is already registered`);
  }
}

export class RegistrySealedError extends AgentError {
  readonly code = 'registry_sealed';

  constructor(public readonly toolName: string) {
    super(`Cannot register "${toolName}": the tool registry is sealed`);
  }
}

export class UnknownToolError extends AgentError {
  readonly code = 'unknown_tool';

  constructor(public readonly toolName: string) {
    super(`Tool "${toolName}" not found`);
  }
}

export interface ArgumentProblems {
  missing: string[];
  extra: string[];
  mistyped: string[];
}

export class InvalidArgumentsError extends AgentError {
  readonly code = 'invalid_arguments';

  constructor(public readonly toolName: string, public readonly problems: ArgumentProblems) {
    super(`Invalid arguments for "${toolName}": ${describeProblems(problems)}`);
  }
}

export class ToolExecutionError extends AgentError {
  readonly code = 'tool_execution_failed';

  constructor(public readonly toolName: string, message: string, options?: { cause?: unknown }) {
    super(`Tool "${toolName}" failed: ${message}`, options);
  }
}

export class ToolTimeoutError extends AgentError {
  readonly code = 'tool_timeout';

  constructor(public readonly toolName: string, public readonly timeoutMs: number) {
    super(`Tool "${toolName}" timed out after ${timeoutMs}ms`);
  }
}

/** A message was appended out of the order the conversation allows. */
export class ConversationInvariantError extends AgentError {
  readonly code = 'conversation_invariant';
}

function describeProblems(problems: ArgumentProblems): string {
  const parts: string[] = [];
  if (problems.missing.length > 0) parts.push(`missing ${problems.missing.join(', ')}`);
  if (problems.extra.length > 0) parts.push(`unexpected ${problems.extra.join(', ')}`);
  if (problems.mistyped.length > 0) parts.push(`wrong type for ${problems.mistyped.join(', ')}`);
  return parts.join('; ') || 'validation failed';
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
