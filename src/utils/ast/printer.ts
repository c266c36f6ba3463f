import type { ASTNode, BinaryOperator } from '../../types/index.js';

export const OPERATOR_SYMBOLS: Readonly<Record<BinaryOperator | 'not', string>> = {
    not: '~',
    and: '^',
    or: 'v',
    implies: '=>',
    iff: '<=>',
};

/**
 * Pretty-print an AST back to statement syntax.
 *
 * Every binary operation is parenthesized, so the output re-parses to
 * the same tree regardless of precedence or associativity.
 */
export function astToString(node: ASTNode): string {
    switch (node.type) {
        case 'literal':
            return node.value ? '1' : '0';
        case 'variable':
            return node.name;
        case 'not':
            return `${OPERATOR_SYMBOLS.not}${astToString(node.operand)}`;
        case 'and':
        case 'or':
        case 'implies':
        case 'iff':
            return `(${astToString(node.left)} ${OPERATOR_SYMBOLS[node.type]} ${astToString(node.right)})`;
    }
}

/**
 * Label of a single node: its literal value, variable name or operator symbol
 */
export function nodeLabel(node: ASTNode): string {
    switch (node.type) {
        case 'literal':
            return node.value ? '1' : '0';
        case 'variable':
            return node.name;
        default:
            return OPERATOR_SYMBOLS[node.type];
    }
}
