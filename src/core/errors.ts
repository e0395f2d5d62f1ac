/**
 * Error Classes for domain-model-nq
 * Structured error handling with error codes
 */

/**
 * Error codes for categorizing errors
 */
export enum ErrorCode {
  // Configuration errors (1xxx)
  CONFIG_TABLE_NOT_FOUND = "E1001",
  CONFIG_MISSING_COLUMN = "E1002",
  CONFIG_BAD_TABLE = "E1003",

  // Identifier grammar errors (2xxx)
  IDENTIFIER_UNKNOWN_ROLE = "E2000",
  IDENTIFIER_UNKNOWN_ASSET = "E2001",
  IDENTIFIER_UNKNOWN_RELATIONSHIP = "E2002",
  IDENTIFIER_UNKNOWN_ENTITY = "E2003",
  IDENTIFIER_BAD_PREFIX = "E2004",
  IDENTIFIER_MALFORMED = "E2005",
  IDENTIFIER_MISSING_IMPACT = "E2006",

  // Value encoding errors (3xxx)
  VALUE_NOT_BOOLEAN = "E3000",
  VALUE_NOT_INTEGER = "E3001",
  VALUE_BAD_DISAMBIGUATOR = "E3002",
  VALUE_EMPTY = "E3003",
  VALUE_BAD_FLAG = "E3004",

  // Sequencing errors (4xxx)
  SEQUENCE_CYCLE = "E4000",

  // General errors (9xxx)
  UNKNOWN_ERROR = "E9000",
  FILE_SYSTEM_ERROR = "E9002",
}

/**
 * Base error class for all conversion errors
 */
export class DomainModelError extends Error {
  public readonly code: ErrorCode;
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = "DomainModelError";
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
 * Malformed or incomplete input: a missing table, a missing column, bad options.
 */
export class ConfigurationError extends DomainModelError {
  public readonly table?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.CONFIG_BAD_TABLE,
    context?: Record<string, unknown> & { table?: string }
  ) {
    super(message, code, context);
    this.name = "ConfigurationError";
    this.table = context?.table;
  }

  toString(): string {
    const location = this.table ? ` in ${this.table}` : "";
    return `[${this.code}] ${this.name}: ${this.message}${location}`;
  }
}

/**
 * A composite or structured identifier that does not fit its grammar
 */
export class IdentifierError extends DomainModelError {
  public readonly identifier: string;

  constructor(
    message: string,
    identifier: string,
    code: ErrorCode = ErrorCode.IDENTIFIER_MALFORMED,
    context?: Record<string, unknown>
  ) {
    super(message, code, { ...context, identifier });
    this.name = "IdentifierError";
    this.identifier = identifier;
  }
}

/**
 * A field value that cannot be encoded or expanded
 */
export class ValueError extends DomainModelError {
  public readonly value: string;

  constructor(
    message: string,
    value: string,
    code: ErrorCode = ErrorCode.VALUE_EMPTY,
    context?: Record<string, unknown>
  ) {
    super(message, code, { ...context, value });
    this.name = "ValueError";
    this.value = value;
  }
}

/**
 * Construction patterns that can never be ranked
 */
export class SequencingError extends DomainModelError {
  public readonly cycles: string[][];

  constructor(message: string, cycles: string[][]) {
    super(message, ErrorCode.SEQUENCE_CYCLE, { cycles });
    this.name = "SequencingError";
    this.cycles = cycles;
  }
}

/**
 * Check if an error is a DomainModelError
 */
export function isDomainModelError(error: unknown): error is DomainModelError {
  return error instanceof DomainModelError;
}
