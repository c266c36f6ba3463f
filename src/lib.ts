/**
 * proplogic - Library Entry Point
 *
 * Exports the core functionality of the library for use in other projects.
 * This file should NOT import the CLI or chalk.
 */

// Pipeline
export { evaluateStatement, evaluateSource } from './pipeline.js';

// Parser
export { parse, parseProgram, Tokenizer, tokenize, Parser } from './parser/index.js';
export type { ParsedProgram } from './parser/index.js';

// Environment and evaluation
export { Environment } from './environment.js';
export { evaluate } from './utils/evaluation.js';

// AST helpers
export { astToString, nodeLabel } from './utils/ast/printer.js';
export { children, countNodes, countEdges, astDepth, collectVariables } from './astUtils.js';

// Graph export
export { exportDot, writeDotFile } from './export/graphviz.js';

// Validation
export { SyntaxValidator, validateStatement } from './syntaxValidator.js';

// Types and Interfaces
export * from './types/index.js';
