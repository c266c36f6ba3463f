/**
 * Graphviz Export
 *
 * Serializes an AST as a DOT digraph for external rendering, e.g.
 * `dot -Tpng ast.dot -o ast.png`. Nodes are numbered breadth-first
 * from the root; each parent/child pair becomes one edge.
 */

import fs from 'fs/promises';
import type { ASTNode, ExportOptions } from '../types/index.js';
import { DEFAULTS } from '../types/index.js';
import { children } from '../astUtils.js';
import { nodeLabel } from '../utils/ast/printer.js';

const PLAIN_ID = /^[A-Za-z_][A-Za-z0-9_]*$/;

function quote(text: string): string {
    return `"${text.replace(/["\\]/g, '\\$&')}"`;
}

function declareNode(id: number, node: ASTNode): string {
    const shape = node.type === 'literal' || node.type === 'variable' ? '' : ' shape="box"';
    return `    ${id} [label=${quote(nodeLabel(node))}${shape}]`;
}

/**
 * Render an AST as DOT text
 */
export function exportDot(ast: ASTNode, options: ExportOptions = {}): string {
    const graphName = options.graphName ?? DEFAULTS.graphName;
    const declarations: string[] = [];
    const edges: string[] = [];

    const queue: Array<{ id: number; node: ASTNode }> = [{ id: 0, node: ast }];
    let nextId = 1;

    for (let head = 0; head < queue.length; head++) {
        const { id, node } = queue[head];
        declarations.push(declareNode(id, node));

        for (const child of children(node)) {
            const childId = nextId++;
            edges.push(`    ${id} -> ${childId}`);
            queue.push({ id: childId, node: child });
        }
    }

    const name = PLAIN_ID.test(graphName) ? graphName : quote(graphName);
    return [`digraph ${name} {`, ...declarations, ...edges, '}'].join('\n') + '\n';
}

/**
 * Write the DOT description of an AST to a file
 */
export async function writeDotFile(ast: ASTNode, filePath: string, options: ExportOptions = {}): Promise<void> {
    await fs.writeFile(filePath, exportDot(ast, options), 'utf-8');
}
