/**
 * Result types for a full statement run
 */

import type { ASTNode } from './ast.js';
import type { LogicError } from './errors.js';

/**
 * Pipeline stage that produced a failure
 */
export type Stage = 'lex' | 'parse' | 'eval';

export interface EvaluationSuccess {
    success: true;
    value: boolean;
    ast: ASTNode;
    bindings: Record<string, boolean>;
}

export interface EvaluationFailure {
    success: false;
    stage: Stage;
    error: LogicError;
    /** Parsed expression, present when only evaluation failed */
    ast?: ASTNode;
}

export type EvaluationResult = EvaluationSuccess | EvaluationFailure;

export interface ValidationResult {
    valid: boolean;
    errors: string[];
    warnings: string[];
}
