/**
 * Structured Error System for proplogic
 *
 * Provides machine-readable errors with codes, spans, and suggestions.
 */

import type { Token, TokenType } from './parser.js';

/**
 * Error codes, one per pipeline stage
 */
export type LogicErrorCode =
  | 'LEX_ERROR'             // Character matches no token rule
  | 'PARSE_ERROR'           // Token stream does not fit the grammar
  | 'EVAL_ERROR';           // Expression cannot be reduced to a value

/**
 * Precise reason within a stage
 */
export type LogicErrorKind =
  | 'UNEXPECTED_CHARACTER'  // LEX_ERROR
  | 'UNEXPECTED_TOKEN'      // PARSE_ERROR
  | 'EMPTY_PROGRAM'         // PARSE_ERROR
  | 'DUPLICATE_ASSIGNMENT'  // PARSE_ERROR
  | 'UNBOUND_VARIABLE';     // EVAL_ERROR

/**
 * Source location span for error reporting
 */
export interface ErrorSpan {
  start: number;
  end: number;
  line?: number;
  col?: number;
}

/**
 * Structured error with code, message, span, and suggestions
 */
export interface LogicError {
  code: LogicErrorCode;
  kind: LogicErrorKind;
  message: string;
  span?: ErrorSpan;
  suggestion?: string;
  context?: string;          // The statement being processed
  details?: Record<string, unknown>;
}

/**
 * Exception class wrapping LogicError for throw/catch patterns
 */
export class LogicException extends Error {
  public readonly error: LogicError;

  constructor(error: LogicError) {
    super(error.message);
    this.name = 'LogicException';
    this.error = error;

    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, LogicException);
    }
  }

  get code(): LogicErrorCode {
    return this.error.code;
  }

  get kind(): LogicErrorKind {
    return this.error.kind;
  }

  toJSON(): LogicError {
    return this.error;
  }
}

/**
 * Common syntax error patterns and their suggestions
 */
const SYNTAX_SUGGESTIONS: Array<{
  pattern: RegExp;
  suggestion: string;
}> = [
    {
      pattern: /\([^)]*$/,
      suggestion: "Unbalanced parentheses - missing closing ')'"
    },
    {
      pattern: /^[^(]*\)/,
      suggestion: "Unbalanced parentheses - missing opening '('"
    },
    {
      pattern: /<=>\s*$/,
      suggestion: "Incomplete biconditional - missing right side after '<=>'"
    },
    {
      pattern: /=>\s*$/,
      suggestion: "Incomplete implication - missing consequent after '=>'"
    },
    {
      pattern: /\^\s*$/,
      suggestion: "Incomplete conjunction - missing right operand after '^'"
    },
    {
      pattern: /\bv\s*$/,
      suggestion: "Incomplete disjunction - missing right operand after 'v'"
    },
    {
      pattern: /~\s*$/,
      suggestion: "Incomplete negation - missing operand after '~'"
    },
    {
      pattern: /:=\s*$/m,
      suggestion: "Incomplete assignment - expected 0 or 1 after ':='"
    },
    {
      pattern: /(^|[^:<])=(?!>)/,
      suggestion: "Use ':=' to assign a variable"
    },
    {
      pattern: /<?->/,
      suggestion: "Use '=>' for implication and '<=>' for equivalence"
    },
    {
      pattern: /[&|]/,
      suggestion: "Use '^' for conjunction and 'v' for disjunction"
    },
    {
      pattern: /[!-]/,
      suggestion: "Use '~' for negation"
    },
    {
      pattern: /\bV\b/,
      suggestion: "Use lowercase 'v' for disjunction"
    },
    {
      pattern: /\b(true|false)\b/,
      suggestion: "Use 1 and 0 for boolean literals"
    },
  ];

/**
 * Get a suggestion for a syntax error based on the input
 */
export function getSuggestion(input: string): string | undefined {
  for (const { pattern, suggestion } of SYNTAX_SUGGESTIONS) {
    if (pattern.test(input)) {
      return suggestion;
    }
  }
  return undefined;
}

function createSourceError(
  code: LogicErrorCode,
  kind: LogicErrorKind,
  message: string,
  input: string,
  position: number,
  length: number,
  details: Record<string, unknown>
): LogicException {
  return new LogicException({
    code,
    kind,
    message,
    span: {
      start: position,
      end: position + Math.max(length, 1),
      line: getLineNumber(input, position),
      col: getColumnNumber(input, position),
    },
    suggestion: getSuggestion(input),
    context: input,
    details,
  });
}

/**
 * Create a lexical error for a character that starts no token
 */
export function createLexError(
  char: string,
  input: string,
  position: number
): LogicException {
  return createSourceError(
    'LEX_ERROR',
    'UNEXPECTED_CHARACTER',
    `Unexpected character '${char}'`,
    input,
    position,
    1,
    { char, position }
  );
}

/**
 * Create a parse error for a token the grammar does not allow here
 */
export function createUnexpectedTokenError(
  expected: TokenType[],
  found: Token,
  input: string
): LogicException {
  return createSourceError(
    'PARSE_ERROR',
    'UNEXPECTED_TOKEN',
    `Expected ${expected.join(' or ')} but got ${found.type}`,
    input,
    found.position,
    found.value.length,
    { expected, found: found.type, position: found.position }
  );
}

/**
 * Create a parse error for a statement with no expression
 */
export function createEmptyProgramError(
  input: string,
  position: number
): LogicException {
  return createSourceError(
    'PARSE_ERROR',
    'EMPTY_PROGRAM',
    'Empty program - no expression follows the assignments',
    input,
    position,
    0,
    { position }
  );
}

/**
 * Create a parse error for a second assignment to the same name
 */
export function createDuplicateAssignmentError(
  name: string,
  input: string,
  position: number
): LogicException {
  return createSourceError(
    'PARSE_ERROR',
    'DUPLICATE_ASSIGNMENT',
    `Variable '${name}' is already assigned`,
    input,
    position,
    name.length,
    { name, position }
  );
}

/**
 * Create an evaluation error for a variable with no binding
 */
export function createUnboundVariableError(name: string): LogicException {
  return new LogicException({
    code: 'EVAL_ERROR',
    kind: 'UNBOUND_VARIABLE',
    message: `Unbound variable '${name}'`,
    suggestion: `Assign it before the expression, e.g. '${name} := 1'`,
    details: { name },
  });
}

/**
 * Get line number from position in string
 */
function getLineNumber(input: string, position: number): number {
  const lines = input.substring(0, position).split('\n');
  return lines.length;
}

/**
 * Get column number from position in string
 */
function getColumnNumber(input: string, position: number): number {
  const lineStart = position > 0 ? input.lastIndexOf('\n', position - 1) + 1 : 0;
  return position - lineStart + 1;
}

/**
 * Serialize a LogicError for JSON output
 */
export function serializeLogicError(error: LogicError): object {
  return {
    code: error.code,
    kind: error.kind,
    message: error.message,
    ...(error.span && { span: error.span }),
    ...(error.suggestion && { suggestion: error.suggestion }),
    ...(error.details && { details: error.details }),
  };
}
