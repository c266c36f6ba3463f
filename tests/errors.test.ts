/**
 * Tests for structured error system
 */

import {
    LogicError,
    LogicException,
    getSuggestion,
    createLexError,
    createUnexpectedTokenError,
    createEmptyProgramError,
    createDuplicateAssignmentError,
    createUnboundVariableError,
    serializeLogicError,
} from '../src/types/errors.js';

describe('LogicException', () => {
    test('creates exception with error object', () => {
        const error: LogicError = {
            code: 'PARSE_ERROR',
            kind: 'UNEXPECTED_TOKEN',
            message: 'Expected RPAREN but got EOF',
            span: { start: 6, end: 7, line: 1, col: 7 },
            context: '(1 v 0'
        };

        const exception = new LogicException(error);

        expect(exception).toBeInstanceOf(Error);
        expect(exception.name).toBe('LogicException');
        expect(exception.message).toBe('Expected RPAREN but got EOF');
        expect(exception.code).toBe('PARSE_ERROR');
        expect(exception.kind).toBe('UNEXPECTED_TOKEN');
        expect(exception.error).toEqual(error);
    });

    test('toJSON returns error object', () => {
        const error: LogicError = {
            code: 'EVAL_ERROR',
            kind: 'UNBOUND_VARIABLE',
            message: "Unbound variable 'p'",
        };

        expect(new LogicException(error).toJSON()).toEqual(error);
    });
});

describe('getSuggestion', () => {
    test.each([
        ['(1 v 0', "Unbalanced parentheses - missing closing ')'"],
        ['1 v 0)', "Unbalanced parentheses - missing opening '('"],
        ['1 <=>', "Incomplete biconditional - missing right side after '<=>'"],
        ['1 =>', "Incomplete implication - missing consequent after '=>'"],
        ['1 ^ ', "Incomplete conjunction - missing right operand after '^'"],
        ['p v', "Incomplete disjunction - missing right operand after 'v'"],
        ['~', "Incomplete negation - missing operand after '~'"],
        ['p :=\np', "Incomplete assignment - expected 0 or 1 after ':='"],
        ['p = 1\np', "Use ':=' to assign a variable"],
        ['p -> q', "Use '=>' for implication and '<=>' for equivalence"],
        ['p & q', "Use '^' for conjunction and 'v' for disjunction"],
        ['!p', "Use '~' for negation"],
        ['p V q', "Use lowercase 'v' for disjunction"],
        ['true ^ p', 'Use 1 and 0 for boolean literals'],
    ])('suggests a fix for %j', (input, suggestion) => {
        expect(getSuggestion(input)).toBe(suggestion);
    });

    test('returns undefined for valid syntax', () => {
        expect(getSuggestion('1 v 0')).toBeUndefined();
        expect(getSuggestion('p := 1\nq := 0\n~p v ~q <=> (p => q)')).toBeUndefined();
    });
});

describe('Error factories', () => {
    test('createLexError carries span, suggestion and context', () => {
        const error = createLexError('&', 'p & q', 2).error;

        expect(error).toEqual({
            code: 'LEX_ERROR',
            kind: 'UNEXPECTED_CHARACTER',
            message: "Unexpected character '&'",
            span: { start: 2, end: 3, line: 1, col: 3 },
            suggestion: "Use '^' for conjunction and 'v' for disjunction",
            context: 'p & q',
            details: { char: '&', position: 2 },
        });
    });

    test('createUnexpectedTokenError spans the found token', () => {
        const error = createUnexpectedTokenError(
            ['EOF'],
            { type: 'IFF', value: '<=>', position: 2 },
            '1 <=> 0 0'
        ).error;

        expect(error.message).toBe('Expected EOF but got IFF');
        expect(error.span).toEqual({ start: 2, end: 5, line: 1, col: 3 });
        expect(error.details).toEqual({ expected: ['EOF'], found: 'IFF', position: 2 });
    });

    test('createUnexpectedTokenError lists every expected token', () => {
        const error = createUnexpectedTokenError(
            ['LITERAL_0', 'LITERAL_1'],
            { type: 'IDENT', value: 'x', position: 5 },
            'p := x'
        );

        expect(error.message).toBe('Expected LITERAL_0 or LITERAL_1 but got IDENT');
    });

    test('createEmptyProgramError points at the end of input', () => {
        const error = createEmptyProgramError('p := 1\n', 7).error;

        expect(error.kind).toBe('EMPTY_PROGRAM');
        expect(error.span).toEqual({ start: 7, end: 8, line: 2, col: 1 });
    });

    test('createDuplicateAssignmentError names the variable', () => {
        const error = createDuplicateAssignmentError('rain', 'rain := 1\nrain := 0\nrain', 10).error;

        expect(error.message).toBe("Variable 'rain' is already assigned");
        expect(error.span).toEqual({ start: 10, end: 14, line: 2, col: 1 });
        expect(error.details).toEqual({ name: 'rain', position: 10 });
    });

    test('createUnboundVariableError has no span', () => {
        const error = createUnboundVariableError('p').error;

        expect(error.code).toBe('EVAL_ERROR');
        expect(error.span).toBeUndefined();
        expect(error.suggestion).toBe("Assign it before the expression, e.g. 'p := 1'");
    });
});

describe('serializeLogicError', () => {
    test('keeps only the fields that are set', () => {
        expect(serializeLogicError(createUnboundVariableError('p').error)).toEqual({
            code: 'EVAL_ERROR',
            kind: 'UNBOUND_VARIABLE',
            message: "Unbound variable 'p'",
            suggestion: "Assign it before the expression, e.g. 'p := 1'",
            details: { name: 'p' },
        });
    });

    test('omits the source context', () => {
        const serialized = serializeLogicError(createLexError('#', '1 # 0', 2).error);

        expect(serialized).not.toHaveProperty('context');
        expect(serialized).toHaveProperty('span', { start: 2, end: 3, line: 1, col: 3 });
    });
});
