/**
 * Error types and codes for ufw-rule-parser.
 * Every error the library or CLI throws extends RuleParserError.
 */

/**
 * Base error class for all ufw-rule-parser errors.
 */
export class RuleParserError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'RuleParserError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Configuration-related errors (loading, parsing, validation).
 */
export class ConfigError extends RuleParserError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * System errors (file not found, unreadable input, YAML parse errors).
 * Error codes: S001-S004
 */
export class SystemError extends RuleParserError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

export const ErrorCodes = {
  // Rule syntax (P001)
  SYNTAX_ERROR: 'P001',

  // Rule validation (V001-V005)
  PORT_OUT_OF_RANGE: 'V001',
  INVALID_IP_OCTET: 'V002',
  INVALID_CIDR_PREFIX: 'V003',
  INVALID_IP_ADDRESS: 'V004',
  DUPLICATE_CLAUSE: 'V005',

  // System errors (S001-S004)
  FILE_NOT_FOUND: 'S001',
  PARSE_ERROR: 'S002',
  NO_INPUT_FILES: 'S003',
  INVALID_OPTION: 'S004',

  // Broken invariant inside the parser (X001)
  INTERNAL_ERROR: 'X001',

  // Config errors
  CONFIG_LOAD_ERROR: 'CONFIG_LOAD_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
