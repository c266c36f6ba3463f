/**
 * AST Utilities
 *
 * Shared utilities for working with statement ASTs.
 * Used by the graph exporter, the validator and the CLI.
 */

import type { ASTNode } from './types/index.js';

/**
 * Direct children of a node, left before right
 */
export function children(node: ASTNode): ASTNode[] {
    switch (node.type) {
        case 'literal':
        case 'variable':
            return [];
        case 'not':
            return [node.operand];
        default:
            return [node.left, node.right];
    }
}

/**
 * Count nodes in an AST
 */
export function countNodes(ast: ASTNode): number {
    let count = 1;
    for (const child of children(ast)) {
        count += countNodes(child);
    }
    return count;
}

/**
 * Count parent/child edges; always one less than the node count
 */
export function countEdges(ast: ASTNode): number {
    return countNodes(ast) - 1;
}

/**
 * Longest root-to-leaf path, counting nodes
 */
export function astDepth(ast: ASTNode): number {
    return 1 + Math.max(0, ...children(ast).map(astDepth));
}

/**
 * Distinct variable names in the order the evaluator reaches them
 */
export function collectVariables(ast: ASTNode): string[] {
    const seen = new Set<string>();

    function visit(node: ASTNode): void {
        if (node.type === 'variable') {
            seen.add(node.name);
            return;
        }
        children(node).forEach(visit);
    }

    visit(ast);
    return Array.from(seen);
}
