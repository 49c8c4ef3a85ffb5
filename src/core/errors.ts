/**
 * Error Classes for authgraph
 * Structured error handling with error codes
 */

/**
 * Error codes for categorizing errors
 */
export enum ErrorCode {
  // Usage errors (1xxx)
  USAGE_INVALID = "E1000",
  USAGE_CONFLICTING_OPTIONS = "E1001",
  USAGE_MISSING_NAMES = "E1002",

  // Input errors (2xxx)
  INPUT_MALFORMED = "E2000",
  INPUT_NAME_NOT_FOUND = "E2001",
  INPUT_SCHEMA_INVALID = "E2002",
  INPUT_REFERENCE_CYCLE = "E2003",

  // Trust anchor errors (3xxx)
  KEY_PARSE_FAILED = "E3000",

  // Graph errors (4xxx)
  GRAPH_NODE_NOT_FOUND = "E4000",
  GRAPH_NOT_FINALIZED = "E4001",

  // Render errors (5xxx)
  RENDER_UNSUPPORTED_FORMAT = "E5000",
  RENDER_LAYOUT_FAILED = "E5001",
  RENDER_TEMPLATE_MISSING = "E5002",

  // General errors (9xxx)
  UNKNOWN_ERROR = "E9000",
  FILE_SYSTEM_ERROR = "E9002",
  CONFIGURATION_ERROR = "E9003",
}

/**
 * Base error class for all authgraph errors
 */
export class AuthGraphError extends Error {
  public readonly code: ErrorCode;
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = "AuthGraphError";
    this.code = code;
    this.timestamp = new Date();
    this.context = context;

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      stack: this.stack,
    };
  }

  toString(): string {
    return `[${this.code}] ${this.name}: ${this.message}`;
  }
}

/**
 * Bad command line combination
 */
export class UsageError extends AuthGraphError {
  constructor(message: string, code: ErrorCode = ErrorCode.USAGE_INVALID, context?: Record<string, unknown>) {
    super(message, code, context);
    this.name = "UsageError";
  }
}

/**
 * Input document is unreadable or lacks a requested name
 */
export class MalformedInputError extends AuthGraphError {
  public readonly domainName?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.INPUT_MALFORMED,
    context?: Record<string, unknown> & { domainName?: string }
  ) {
    super(message, code, context);
    this.name = "MalformedInputError";
    this.domainName = context?.domainName;
  }
}

/**
 * Input document has fields that are missing or of the wrong shape
 */
export class SchemaError extends AuthGraphError {
  public readonly path?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.INPUT_SCHEMA_INVALID,
    context?: Record<string, unknown> & { path?: string }
  ) {
    super(message, code, context);
    this.name = "SchemaError";
    this.path = context?.path;
  }

  toString(): string {
    const location = this.path ? ` at ${this.path}` : "";
    return `[${this.code}] ${this.name}: ${this.message}${location}`;
  }
}

/**
 * Trust anchor text could not be parsed
 */
export class KeyParseError extends AuthGraphError {
  public readonly line?: number;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.KEY_PARSE_FAILED,
    context?: Record<string, unknown> & { line?: number }
  ) {
    super(message, code, context);
    this.name = "KeyParseError";
    this.line = context?.line;
  }

  toString(): string {
    const location = this.line !== undefined ? ` (line ${this.line})` : "";
    return `[${this.code}] ${this.name}: ${this.message}${location}`;
  }
}

/**
 * Output format outside the supported set
 */
export class UnsupportedFormatError extends AuthGraphError {
  public readonly format: string;

  constructor(format: string, context?: Record<string, unknown>) {
    super(`Unsupported output format: ${format}`, ErrorCode.RENDER_UNSUPPORTED_FORMAT, context);
    this.name = "UnsupportedFormatError";
    this.format = format;
  }
}

/**
 * Graph construction or reduction misuse
 */
export class GraphError extends AuthGraphError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.GRAPH_NODE_NOT_FOUND,
    context?: Record<string, unknown>
  ) {
    super(message, code, context);
    this.name = "GraphError";
  }
}

/**
 * Layout or rasterization backend failure
 */
export class RenderError extends AuthGraphError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.RENDER_LAYOUT_FAILED,
    context?: Record<string, unknown>
  ) {
    super(message, code, context);
    this.name = "RenderError";
  }
}

/**
 * Invalid configuration file or environment
 */
export class ConfigError extends AuthGraphError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.CONFIGURATION_ERROR, context);
    this.name = "ConfigError";
  }
}

/**
 * Check if an error is an AuthGraphError
 */
export function isAuthGraphError(error: unknown): error is AuthGraphError {
  return error instanceof AuthGraphError;
}

/**
 * Wrap an unknown error in an AuthGraphError
 */
export function wrapError(
  error: unknown,
  defaultMessage: string = "An unexpected error occurred",
  code: ErrorCode = ErrorCode.UNKNOWN_ERROR
): AuthGraphError {
  if (isAuthGraphError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new AuthGraphError(error.message || defaultMessage, code, {
      originalError: error.name,
      originalStack: error.stack,
    });
  }

  return new AuthGraphError(typeof error === "string" ? error : defaultMessage, code);
}
