/**
 * Error Classes for wit-docs
 * Structured error handling with error codes
 */

/**
 * Error codes for categorizing errors
 */
export enum ErrorCode {
  // I/O errors (1xxx)
  IO_READ_FAILED = "E1000",
  IO_WRITE_FAILED = "E1001",
  IO_NOT_FOUND = "E1002",

  // Parsing errors (2xxx)
  PARSE_FAILED = "E2000",
  PARSE_MODULE_INVALID = "E2001",
  PARSE_PAYLOAD_INVALID = "E2002",
  PARSE_PAYLOAD_EMPTY = "E2003",
  PARSE_WIT_INVALID = "E2004",

  // Subprocess errors (3xxx)
  SUBPROCESS_NOT_FOUND = "E3000",
  SUBPROCESS_FAILED = "E3001",
  SUBPROCESS_OUTPUT_INVALID = "E3002",

  // Encoding errors (4xxx)
  ENCODING_FAILED = "E4000",

  // View errors (5xxx)
  DOCS_NOT_FOUND = "E5000",

  // General errors (9xxx)
  UNKNOWN_ERROR = "E9000",
  CONFIGURATION_ERROR = "E9003",
}

/**
 * Base error class for all wit-docs errors
 */
export class WitDocsError extends Error {
  public readonly code: ErrorCode;
  public readonly timestamp: Date;
  public context?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = "WitDocsError";
    this.code = code;
    this.timestamp = new Date();
    this.context = context;

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Prefix the message with the step that failed and record it in the context
   */
  addContext(step: string, details: Record<string, unknown> = {}): this {
    this.message = `${step}: ${this.message}`;
    this.context = { ...this.context, ...details, step };
    return this;
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

  /**
   * Create a formatted error message
   */
  toString(): string {
    return `[${this.code}] ${this.name}: ${this.message}`;
  }
}

/**
 * File read/write failures
 */
export class IOError extends WitDocsError {
  public readonly filePath?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.IO_READ_FAILED,
    context?: Record<string, unknown> & { filePath?: string }
  ) {
    super(message, code, context);
    this.name = "IOError";
    this.filePath = context?.filePath;
  }

  toString(): string {
    const location = this.filePath ? ` (${this.filePath})` : "";
    return `[${this.code}] ${this.name}: ${this.message}${location}`;
  }
}

/**
 * Structurally unparseable input: module binaries, section payloads, WIT sources
 */
export class ParseError extends WitDocsError {
  public readonly offset?: number;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.PARSE_FAILED,
    context?: Record<string, unknown> & { offset?: number }
  ) {
    super(message, code, context);
    this.name = "ParseError";
    this.offset = context?.offset;
  }

  toString(): string {
    const location = this.offset !== undefined ? ` at byte ${this.offset}` : "";
    return `[${this.code}] ${this.name}: ${this.message}${location}`;
  }
}

/**
 * A package-docs payload that is too short, not UTF-8, not JSON, or not a doc tree
 */
export class DecodingError extends ParseError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.PARSE_PAYLOAD_INVALID,
    context?: Record<string, unknown> & { offset?: number }
  ) {
    super(message, code, context);
    this.name = "DecodingError";
  }
}

/**
 * A module binary that cannot be re-emitted section by section
 */
export class RewriteError extends ParseError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.PARSE_MODULE_INVALID,
    context?: Record<string, unknown> & { offset?: number }
  ) {
    super(message, code, context);
    this.name = "RewriteError";
  }
}

/**
 * External rendering tool missing, failing, or emitting non-text output
 */
export class SubprocessError extends WitDocsError {
  public readonly command?: string;
  public readonly exitCode?: number;
  public readonly stderr?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.SUBPROCESS_FAILED,
    context?: Record<string, unknown> & { command?: string; exitCode?: number; stderr?: string }
  ) {
    super(message, code, context);
    this.name = "SubprocessError";
    this.command = context?.command;
    this.exitCode = context?.exitCode;
    this.stderr = context?.stderr;
  }
}

/**
 * A doc tree that cannot be serialized
 */
export class EncodingError extends WitDocsError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.ENCODING_FAILED,
    context?: Record<string, unknown>
  ) {
    super(message, code, context);
    this.name = "EncodingError";
  }
}

/**
 * The component carries no package-docs section. Reported on its own exit status.
 */
export class MissingDocsError extends WitDocsError {
  public readonly componentPath: string;

  constructor(componentPath: string) {
    super("No package-docs found in component", ErrorCode.DOCS_NOT_FOUND, {
      filePath: componentPath,
    });
    this.name = "MissingDocsError";
    this.componentPath = componentPath;
  }
}

/**
 * Check if an error is a WitDocsError
 */
export function isWitDocsError(error: unknown): error is WitDocsError {
  return error instanceof WitDocsError;
}

/**
 * Wrap an unknown error in a WitDocsError
 */
export function wrapError(
  error: unknown,
  defaultMessage: string = "An unexpected error occurred",
  code: ErrorCode = ErrorCode.UNKNOWN_ERROR
): WitDocsError {
  if (isWitDocsError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new WitDocsError(error.message || defaultMessage, code, {
      originalError: error.name,
      originalStack: error.stack,
    });
  }

  return new WitDocsError(
    typeof error === "string" ? error : defaultMessage,
    code
  );
}

/**
 * Run `task`, attaching `step` and `details` to whatever it throws
 */
export async function withContext<T>(
  step: string,
  details: Record<string, unknown>,
  task: () => T | Promise<T>
): Promise<T> {
  try {
    return await task();
  } catch (error) {
    throw wrapError(error, step).addContext(step, details);
  }
}
