/**
 * FAQ RAG - Errors
 * ================
 * Typed errors with standardized codes, one family per pipeline stage.
 * Nothing here retries: errors propagate to the caller as-is.
 */

export enum ErrorCode {
  // Loader
  NOT_FOUND = 'NOT_FOUND',
  MALFORMED_INPUT = 'MALFORMED_INPUT',

  // Indexer
  SCHEMA_ERROR = 'SCHEMA_ERROR',

  // Retriever
  VALIDATION_ERROR = 'VALIDATION_ERROR',

  // Prompt builder
  MISSING_FIELD = 'MISSING_FIELD',

  // LLM gateway
  GATEWAY_ERROR = 'GATEWAY_ERROR',
  GATEWAY_AUTH = 'GATEWAY_AUTH',
  GATEWAY_RATE_LIMIT = 'GATEWAY_RATE_LIMIT',
  GATEWAY_TIMEOUT = 'GATEWAY_TIMEOUT',

  // System
  CONFIG_ERROR = 'CONFIG_ERROR',
}

export interface ErrorDetails {
  code: ErrorCode;
  message: string;
  retryable?: boolean;
  context?: Record<string, unknown>;
  cause?: unknown;
}

export class RagError extends Error {
  public readonly code: ErrorCode;
  public readonly retryable: boolean;
  public readonly context?: Record<string, unknown>;

  constructor(details: ErrorDetails) {
    super(details.message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = 'RagError';
    this.code = details.code;
    this.retryable = details.retryable ?? false;
    this.context = details.context;
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      context: this.context,
    };
  }
}

// ============================================
// LOADER
// ============================================

export class NotFoundError extends RagError {
  constructor(public readonly location: string, cause?: unknown) {
    super({
      code: ErrorCode.NOT_FOUND,
      message: `Knowledge base not found: ${location}`,
      context: { location },
      cause,
    });
    this.name = 'NotFoundError';
  }
}

export class MalformedInputError extends RagError {
  constructor(message: string, public readonly issues: string[] = [], cause?: unknown) {
    super({
      code: ErrorCode.MALFORMED_INPUT,
      message,
      context: issues.length > 0 ? { issues } : undefined,
      cause,
    });
    this.name = 'MalformedInputError';
  }
}

// ============================================
// INDEXER / RETRIEVER / PROMPT
// ============================================

export class SchemaError extends RagError {
  constructor(public readonly overlapping: string[]) {
    super({
      code: ErrorCode.SCHEMA_ERROR,
      message: `Fields declared both as text and keyword: ${overlapping.join(', ')}`,
      context: { overlapping },
    });
    this.name = 'SchemaError';
  }
}

export class ValidationError extends RagError {
  constructor(message: string, public readonly issues: string[] = []) {
    super({
      code: ErrorCode.VALIDATION_ERROR,
      message,
      context: issues.length > 0 ? { issues } : undefined,
    });
    this.name = 'ValidationError';
  }
}

export class MissingFieldError extends RagError {
  /** `position` is 1-based */
  constructor(public readonly field: string, public readonly position: number) {
    super({
      code: ErrorCode.MISSING_FIELD,
      message: `Search result #${position} has no "${field}" field`,
      context: { field, position },
    });
    this.name = 'MissingFieldError';
  }
}

// ============================================
// LLM GATEWAY
// ============================================

export class GatewayError extends RagError {
  constructor(
    message: string,
    public readonly provider: string,
    public readonly statusCode?: number,
    retryable = false,
    code: ErrorCode = ErrorCode.GATEWAY_ERROR,
    cause?: unknown
  ) {
    super({ code, message, retryable, context: { provider, statusCode }, cause });
    this.name = 'GatewayError';
  }
}

export class GatewayAuthError extends GatewayError {
  constructor(provider: string) {
    super('Authentication failed', provider, 401, false, ErrorCode.GATEWAY_AUTH);
    this.name = 'GatewayAuthError';
  }
}

export class GatewayRateLimitError extends GatewayError {
  constructor(provider: string, public readonly retryAfterMs?: number) {
    super('Rate limit exceeded', provider, 429, true, ErrorCode.GATEWAY_RATE_LIMIT);
    this.name = 'GatewayRateLimitError';
  }
}

export class GatewayTimeoutError extends GatewayError {
  constructor(provider: string, timeoutMs: number) {
    super(`Request timed out after ${timeoutMs}ms`, provider, 408, true, ErrorCode.GATEWAY_TIMEOUT);
    this.name = 'GatewayTimeoutError';
  }
}

// ============================================
// SYSTEM
// ============================================

export class ConfigError extends RagError {
  constructor(public readonly issues: string[]) {
    super({
      code: ErrorCode.CONFIG_ERROR,
      message: `Invalid configuration:\n${issues.map((i) => `  - ${i}`).join('\n')}`,
      context: { issues },
    });
    this.name = 'ConfigError';
  }
}

/**
 * Format zod-style issues as "path: message" lines
 */
export function formatIssues(
  issues: ReadonlyArray<{ path: ReadonlyArray<string | number>; message: string }>
): string[] {
  return issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
}
