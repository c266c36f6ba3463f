/**
 * Statement Evaluation
 *
 * Reduces an AST to a boolean under the bindings of an Environment.
 */

import type { ASTNode } from '../types/index.js';
import type { Environment } from '../environment.js';

/**
 * Evaluate an expression, left operand before right.
 *
 * Both operands of a binary node are always evaluated, so an unbound
 * variable on either side is reported even when the other side would
 * decide the result.
 */
export function evaluate(node: ASTNode, environment: Environment): boolean {
    switch (node.type) {
        case 'literal':
            return node.value;

        case 'variable':
            return environment.lookup(node.name);

        case 'not':
            return !evaluate(node.operand, environment);

        case 'and': {
            const left = evaluate(node.left, environment);
            const right = evaluate(node.right, environment);
            return left && right;
        }

        case 'or': {
            const left = evaluate(node.left, environment);
            const right = evaluate(node.right, environment);
            return left || right;
        }

        case 'implies': {
            const left = evaluate(node.left, environment);
            const right = evaluate(node.right, environment);
            return !left || right;
        }

        case 'iff':
            return evaluate(node.left, environment) === evaluate(node.right, environment);
    }
}
