import type { ASTNode } from '../types/index.js';
import { Environment } from '../environment.js';
import { tokenize } from './tokenizer.js';
import { Parser } from './parser.js';
import type { ParsedProgram } from './parser.js';

export { Tokenizer, tokenize } from './tokenizer.js';
export { Parser } from './parser.js';
export type { ParsedProgram } from './parser.js';

/**
 * Parse a statement into the AST of its expression, recording its
 * assignments in `environment`
 */
export function parse(input: string, environment: Environment = new Environment()): ASTNode {
    return new Parser(tokenize(input), input, environment).parse();
}

/**
 * Parse a statement, returning the expression together with the
 * assignments that preceded it
 */
export function parseProgram(input: string, environment: Environment = new Environment()): ParsedProgram {
    return new Parser(tokenize(input), input, environment).parseProgram();
}
