import { parse } from '../src/parser/index.js';
import { astToString, nodeLabel } from '../src/utils/ast/printer.js';
import { astDepth, children, collectVariables, countEdges, countNodes } from '../src/astUtils.js';

describe('astToString', () => {
    test.each([
        ['1 v 0 ^ 0', '(1 v (0 ^ 0))'],
        ['~p => q <=> r', '((~p => q) <=> r)'],
        ['~(a ^ b)', '~(a ^ b)'],
        ['a => b => c', '((a => b) => c)'],
        ['~~1', '~~1'],
        ['p := 1\n(p)', 'p'],
    ])('prints %j as %j', (source, expected) => {
        expect(astToString(parse(source))).toBe(expected);
    });

    test.each([
        'a v b v c',
        'a <=> b <=> c',
        '~(p ^ q) v r => s',
        '((1 => 0) ^ 1)',
    ])('output of %j re-parses to the same tree', source => {
        const ast = parse(source);
        expect(parse(astToString(ast))).toEqual(ast);
    });
});

describe('nodeLabel', () => {
    test('labels leaves by value or name and operators by symbol', () => {
        expect(nodeLabel(parse('1'))).toBe('1');
        expect(nodeLabel(parse('0'))).toBe('0');
        expect(nodeLabel(parse('rain'))).toBe('rain');
        expect(nodeLabel(parse('~1'))).toBe('~');
        expect(nodeLabel(parse('1 ^ 1'))).toBe('^');
        expect(nodeLabel(parse('1 v 1'))).toBe('v');
        expect(nodeLabel(parse('1 => 1'))).toBe('=>');
        expect(nodeLabel(parse('1 <=> 1'))).toBe('<=>');
    });
});

describe('AST metrics', () => {
    const ast = parse('~p v (q ^ 1)');

    test('lists children left to right', () => {
        expect(children(ast).map(nodeLabel)).toEqual(['~', '^']);
        expect(children(parse('p'))).toEqual([]);
    });

    test('counts nodes and edges', () => {
        expect(countNodes(ast)).toBe(6);
        expect(countEdges(ast)).toBe(5);
        expect(countNodes(parse('1'))).toBe(1);
        expect(countEdges(parse('1'))).toBe(0);
    });

    test('measures depth', () => {
        expect(astDepth(ast)).toBe(3);
        expect(astDepth(parse('0'))).toBe(1);
        expect(astDepth(parse('~~~0'))).toBe(4);
    });

    test('collects distinct variables in evaluation order', () => {
        expect(collectVariables(parse('q v p ^ q v r'))).toEqual(['q', 'p', 'r']);
        expect(collectVariables(parse('1 ^ 0'))).toEqual([]);
    });
});
