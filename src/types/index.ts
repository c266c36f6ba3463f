/**
 * Shared type definitions for proplogic
 */

// Re-export error types
export {
    LogicException,
    getSuggestion,
    createLexError,
    createUnexpectedTokenError,
    createEmptyProgramError,
    createDuplicateAssignmentError,
    createUnboundVariableError,
    serializeLogicError,
} from './errors.js';

export type {
    LogicErrorCode,
    LogicErrorKind,
    ErrorSpan,
    LogicError,
} from './errors.js';

// Re-export AST types
export type {
    ASTNodeType,
    ASTNode,
    BinaryOperator,
    LiteralNode,
    VariableNode,
    NotNode,
    BinaryNode,
    Assignment,
} from './ast.js';

// Re-export parser types
export type {
    TokenType,
    Token,
} from './parser.js';

// Re-export result types
export type {
    Stage,
    EvaluationSuccess,
    EvaluationFailure,
    EvaluationResult,
    ValidationResult,
} from './responses.js';

// Re-export options
export {
    DEFAULTS
} from './options.js';

export type {
    OutputFormat,
    ExportOptions,
} from './options.js';
