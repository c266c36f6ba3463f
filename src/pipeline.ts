/**
 * Statement pipeline: tokenize, parse, evaluate.
 */

import type { EvaluationFailure, EvaluationResult, LogicErrorCode, Stage } from './types/index.js';
import { LogicException } from './types/index.js';
import { parseProgram } from './parser/index.js';
import type { ParsedProgram } from './parser/index.js';
import { evaluate } from './utils/evaluation.js';

const STAGE_BY_CODE: Readonly<Record<LogicErrorCode, Stage>> = {
    LEX_ERROR: 'lex',
    PARSE_ERROR: 'parse',
    EVAL_ERROR: 'eval',
};

/**
 * Evaluate a statement, returning either its value or the error of the
 * stage that stopped it. Language errors never throw. An eval failure
 * still carries the parsed AST.
 *
 * Parsing and evaluation recurse once per nesting level, so input nested
 * deeper than the call stack allows throws a RangeError.
 */
export function evaluateStatement(source: string): EvaluationResult {
    let program: ParsedProgram;
    try {
        program = parseProgram(source);
    } catch (e) {
        return failure(e);
    }

    const { expression, environment } = program;
    try {
        const value = evaluate(expression, environment);
        return {
            success: true,
            value,
            ast: expression,
            bindings: environment.toObject(),
        };
    } catch (e) {
        return { ...failure(e), ast: expression };
    }
}

function failure(e: unknown): EvaluationFailure {
    if (e instanceof LogicException) {
        return { success: false, stage: STAGE_BY_CODE[e.code], error: e.error };
    }
    throw e;
}

/**
 * Evaluate a statement to its truth value, throwing a LogicException on
 * the first error
 */
export function evaluateSource(source: string): boolean {
    const { expression, environment } = parseProgram(source);
    return evaluate(expression, environment);
}
