/**
 * Error Classes for Strata
 * Structured error handling with error codes
 */

/**
 * Error codes for categorizing errors
 */
export enum ErrorCode {
  // Document errors (2xxx)
  SYNTAX = "E2000",
  STRUCTURAL = "E2001",
  TYPE = "E2002",
  TEMPORAL = "E2003",
  REFERENCE = "E2004",
  VALIDATION = "E2005",

  // Schema and adapter errors (3xxx)
  SCHEMA_INVALID = "E3000",
  SCHEMA_ALREADY_INITIALIZED = "E3001",
  SCHEMA_NOT_INITIALIZED = "E3002",
  CONTRACT_VIOLATION = "E3100",

  // Data source errors (4xxx)
  DOCUMENT_SERVICE_FAILED = "E4000",
  DOCUMENT_NOT_FOUND = "E4001",

  // General errors (9xxx)
  UNKNOWN_ERROR = "E9000",
  INVALID_ARGUMENT = "E9001",
  FILE_SYSTEM_ERROR = "E9002",
  CONFIGURATION_ERROR = "E9003",
}

/**
 * Base error class for all Strata errors
 */
export class StrataError extends Error {
  public readonly code: ErrorCode;
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = "StrataError";
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

  override toString(): string {
    return `[${this.code}] ${this.name}: ${this.message}`;
  }
}

// =============================================================================
// Diagnostics
// =============================================================================

/**
 * Location of a token inside a source text. Lines and columns are 1-based.
 */
export interface SourceSpan {
  offset: number;
  length: number;
  line: number;
  column: number;
}

/**
 * A named document, attached to diagnostics so they can be rendered
 */
export interface NamedSource {
  name: string;
  text: string;
}

export interface DiagnosticOptions {
  span?: SourceSpan | null;
  /** Short text shown under the highlighted span */
  label?: string;
  help?: string;
  source?: NamedSource;
}

/**
 * Error raised while reading definition, record or configuration documents.
 * Always points at the offending token.
 */
export class DiagnosticError extends StrataError {
  public readonly span: SourceSpan | null;
  public readonly label?: string;
  public readonly help?: string;
  public readonly source?: NamedSource;

  constructor(message: string, code: ErrorCode, options: DiagnosticOptions = {}) {
    super(message, code, {
      span: options.span ?? null,
      file: options.source?.name,
    });
    this.name = "DiagnosticError";
    this.span = options.span ?? null;
    this.label = options.label;
    this.help = options.help;
    this.source = options.source;
  }

  /**
   * Returns a copy of this error with the document it was raised for attached
   */
  withSource(source: NamedSource): DiagnosticError {
    return new DiagnosticError(this.message, this.code, {
      span: this.span,
      label: this.label,
      help: this.help,
      source,
    });
  }

  override toString(): string {
    let location = "";
    if (this.source) {
      location = ` at ${this.source.name}`;
      if (this.span) {
        location += `:${this.span.line}:${this.span.column}`;
      }
    }
    return `[${this.code}] ${this.name}: ${this.message}${location}`;
  }
}

// =============================================================================
// Runtime Errors
// =============================================================================

/**
 * The query engine asked for a type, property, edge or entry point that the
 * synthesized schema does not back with a resolver. Never recoverable.
 */
export class ContractViolationError extends StrataError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.CONTRACT_VIOLATION, context);
    this.name = "ContractViolationError";
  }
}

/**
 * Paperless request errors
 */
export class DocumentServiceError extends StrataError {
  public readonly documentId?: number;
  public readonly status?: number;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.DOCUMENT_SERVICE_FAILED,
    context?: Record<string, unknown> & { documentId?: number; status?: number }
  ) {
    super(message, code, context);
    this.name = "DocumentServiceError";
    this.documentId = context?.documentId;
    this.status = context?.status;
  }
}

/**
 * Configuration loading errors
 */
export class ConfigurationError extends StrataError {
  public readonly configPath?: string;

  constructor(message: string, context?: Record<string, unknown> & { configPath?: string }) {
    super(message, ErrorCode.CONFIGURATION_ERROR, context);
    this.name = "ConfigurationError";
    this.configPath = context?.configPath;
  }
}

/**
 * Check if an error is a StrataError
 */
export function isStrataError(error: unknown): error is StrataError {
  return error instanceof StrataError;
}

export function isDiagnosticError(error: unknown): error is DiagnosticError {
  return error instanceof DiagnosticError;
}

/**
 * Wrap an unknown error in a StrataError
 */
export function wrapError(
  error: unknown,
  defaultMessage: string = "An unexpected error occurred",
  code: ErrorCode = ErrorCode.UNKNOWN_ERROR
): StrataError {
  if (isStrataError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new StrataError(error.message || defaultMessage, code, {
      originalError: error.name,
      originalStack: error.stack,
    });
  }

  return new StrataError(typeof error === "string" ? error : defaultMessage, code);
}
