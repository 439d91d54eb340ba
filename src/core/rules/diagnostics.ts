/**
 * Positioned parse diagnostics.
 *
 * Syntax diagnostics come from the grammar engine (input does not match the
 * grammar); validation diagnostics come from the builder (input matches but a
 * literal is out of range). Both carry a 1-based line and column into the
 * source text.
 */
import chalk from 'chalk';
import { RuleParserError, ErrorCodes, type ErrorCode } from '../../utils/errors.js';
import type { MatchFailure } from '../grammar/types.js';

export type ValidationErrorKind =
  | 'PortOutOfRange'
  | 'InvalidIpOctet'
  | 'InvalidCidrPrefix'
  | 'InvalidIpAddress'
  | 'DuplicateClause';

export interface SourcePosition {
  /** 1-based line number */
  line: number;
  /** 1-based column number */
  column: number;
  /** 0-based offset into the source text */
  offset: number;
}

export interface SyntaxDiagnostic extends SourcePosition {
  type: 'syntax';
  /** Constructs the grammar would have accepted at this position */
  expected: string[];
  /** The text found instead, or null at the end of a line */
  found: string | null;
  message: string;
}

export interface ValidationDiagnostic extends SourcePosition {
  type: 'validation';
  kind: ValidationErrorKind;
  /** The offending literal exactly as written */
  literal: string;
  message: string;
}

export type ParseDiagnostic = SyntaxDiagnostic | ValidationDiagnostic;

/**
 * A value or the validation diagnostic explaining why there is none.
 */
export type Checked<T> = { ok: true; value: T } | { ok: false; error: ValidationDiagnostic };

const VALIDATION_CODES: Record<ValidationErrorKind, ErrorCode> = {
  PortOutOfRange: ErrorCodes.PORT_OUT_OF_RANGE,
  InvalidIpOctet: ErrorCodes.INVALID_IP_OCTET,
  InvalidCidrPrefix: ErrorCodes.INVALID_CIDR_PREFIX,
  InvalidIpAddress: ErrorCodes.INVALID_IP_ADDRESS,
  DuplicateClause: ErrorCodes.DUPLICATE_CLAUSE,
};

/**
 * Error code for a diagnostic: P001 for syntax, V001-V005 for validation.
 */
export function diagnosticCode(diagnostic: ParseDiagnostic): ErrorCode {
  return diagnostic.type === 'syntax' ? ErrorCodes.SYNTAX_ERROR : VALIDATION_CODES[diagnostic.kind];
}

/**
 * Convert an offset into a 1-based line and column.
 */
export function locate(source: string, offset: number): SourcePosition {
  let line = 1;
  for (let i = 0; i < offset; i++) {
    if (source[i] === '\n') line++;
  }
  const lineStart = offset === 0 ? 0 : source.lastIndexOf('\n', offset - 1) + 1;
  return { line, column: offset - lineStart + 1, offset };
}

const FOUND_WORD = /[^\s#]+/y;

/** Lines end in `\n` or `\r\n`; any other `\r` is an unexpected character. */
function foundAt(source: string, offset: number): string | null {
  if (offset >= source.length || source[offset] === '\n' || source.startsWith('\r\n', offset)) {
    return null;
  }
  FOUND_WORD.lastIndex = offset;
  const match = FOUND_WORD.exec(source);
  return match ? match[0] : source[offset];
}

/**
 * Join expected constructs as `a, b or c`.
 */
export function describeExpected(expected: readonly string[]): string {
  if (expected.length === 0) return 'nothing';
  if (expected.length === 1) return expected[0];
  return `${expected.slice(0, -1).join(', ')} or ${expected[expected.length - 1]}`;
}

export function syntaxDiagnostic(source: string, failure: MatchFailure): SyntaxDiagnostic {
  const found = foundAt(source, failure.offset);
  const foundText = found === null ? 'end of line' : found === '\r' ? 'carriage return' : JSON.stringify(found);
  const message = failure.expected.length > 0
    ? `expected ${describeExpected(failure.expected)}, found ${foundText}`
    : `unexpected ${foundText}`;

  return {
    type: 'syntax',
    ...locate(source, failure.offset),
    expected: failure.expected,
    found,
    message,
  };
}

export function validationDiagnostic(
  source: string,
  offset: number,
  kind: ValidationErrorKind,
  literal: string,
  message: string
): ValidationDiagnostic {
  return { type: 'validation', ...locate(source, offset), kind, literal, message };
}

const plain = (text: string): string => text;
const PLAIN = { cyan: plain, red: plain, gray: plain };

export interface FormatDiagnosticOptions {
  /** File name shown in the location prefix */
  file?: string;
  colors?: boolean;
}

/**
 * Render a diagnostic with the offending source line and a caret:
 *
 *   rules.txt:1:6 - error P001: expected identifier, ... found end of line
 *
 *     1 | allow
 *       |      ^
 */
export function formatDiagnostic(
  diagnostic: ParseDiagnostic,
  source: string,
  options: FormatDiagnosticOptions = {}
): string {
  const paint = options.colors === false ? PLAIN : chalk;
  const location = `${options.file ? `${options.file}:` : ''}${diagnostic.line}:${diagnostic.column}`;
  const lineText = source.split(/\r?\n/)[diagnostic.line - 1] ?? '';
  const gutter = String(diagnostic.line);
  const pad = ' '.repeat(gutter.length);
  // Keep tabs so the caret lines up with the source line
  const indent = lineText.slice(0, diagnostic.column - 1).replace(/[^\t]/g, ' ');

  return [
    `${paint.cyan(location)} - ${paint.red('error')} ${paint.gray(diagnosticCode(diagnostic))}: ${diagnostic.message}`,
    '',
    `  ${paint.gray(gutter)} | ${lineText}`,
    `  ${pad} | ${indent}${paint.red('^')}`,
  ].join('\n');
}

/**
 * Thrown by parseRulesOrThrow; carries the diagnostic it was built from.
 */
export class RuleParseError extends RuleParserError {
  constructor(public readonly diagnostic: ParseDiagnostic) {
    super(diagnosticCode(diagnostic), `${diagnostic.line}:${diagnostic.column}: ${diagnostic.message}`, {
      type: diagnostic.type,
      line: diagnostic.line,
      column: diagnostic.column,
      offset: diagnostic.offset,
    });
    this.name = 'RuleParseError';
  }
}
