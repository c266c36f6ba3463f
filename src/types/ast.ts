/**
 * Abstract Syntax Tree (AST) Types for propositional statements
 */

export type BinaryOperator = 'and' | 'or' | 'implies' | 'iff';

export type ASTNodeType = 'literal' | 'variable' | 'not' | BinaryOperator;

export interface LiteralNode {
    readonly type: 'literal';
    readonly value: boolean;
}

export interface VariableNode {
    readonly type: 'variable';
    readonly name: string;
}

export interface NotNode {
    readonly type: 'not';
    readonly operand: ASTNode;
}

export interface BinaryNode {
    readonly type: BinaryOperator;
    readonly left: ASTNode;
    readonly right: ASTNode;
}

export type ASTNode = LiteralNode | VariableNode | NotNode | BinaryNode;

/**
 * A single `name := 0|1` line, kept in source order
 */
export interface Assignment {
    readonly name: string;
    readonly value: boolean;
    readonly position: number;
}
