import type { ASTNode, Assignment, BinaryOperator } from '../types/ast.js';
import type { Token, TokenType } from '../types/parser.js';
import {
    createDuplicateAssignmentError,
    createEmptyProgramError,
    createUnexpectedTokenError,
} from '../types/errors.js';
import { Environment } from '../environment.js';

export interface ParsedProgram {
    expression: ASTNode;
    assignments: Assignment[];
    environment: Environment;
}

const ATOM_START: TokenType[] = ['LITERAL_0', 'LITERAL_1', 'IDENT', 'LPAREN', 'NOT'];

/**
 * Parser for propositional statements
 *
 * Grammar (EBNF-ish):
 *   program       = NEWLINE* (assignment NEWLINE*)* expression NEWLINE* EOF
 *   assignment    = IDENT ':=' ('0' | '1') (NEWLINE | EOF)
 *   expression    = biconditional
 *   biconditional = implication ('<=>' implication)*
 *   implication   = disjunction ('=>' disjunction)*
 *   disjunction   = conjunction ('v' conjunction)*
 *   conjunction   = unary ('^' unary)*
 *   unary         = '~' unary | atom
 *   atom          = '0' | '1' | IDENT | '(' expression ')'
 *
 * Assignments are recorded in the environment as they are read. The
 * first line that is not an assignment is the expression; nothing but
 * blank lines may follow it.
 */
export class Parser {
    private readonly tokens: Iterator<Token>;
    private readonly lookahead: Token[] = [];
    private readonly originalInput: string;
    private readonly environment: Environment;
    private readonly assignments: Assignment[] = [];

    constructor(tokens: Iterable<Token>, originalInput: string, environment: Environment = new Environment()) {
        this.tokens = tokens[Symbol.iterator]();
        this.originalInput = originalInput;
        this.environment = environment;
    }

    parse(): ASTNode {
        return this.parseProgram().expression;
    }

    parseProgram(): ParsedProgram {
        this.skipNewlines();
        while (this.isAssignmentStart()) {
            this.parseAssignment();
            this.skipNewlines();
        }

        if (this.current().type === 'EOF') {
            throw createEmptyProgramError(this.originalInput, this.current().position);
        }

        const expression = this.parseExpression();

        this.skipNewlines();
        if (this.current().type !== 'EOF') {
            throw createUnexpectedTokenError(['EOF'], this.current(), this.originalInput);
        }

        return {
            expression,
            assignments: [...this.assignments],
            environment: this.environment,
        };
    }

    private current(): Token {
        return this.peek(0);
    }

    private peek(offset: number): Token {
        while (this.lookahead.length <= offset) {
            const next = this.tokens.next();
            if (next.done) {
                return { type: 'EOF', value: '', position: this.originalInput.length };
            }
            this.lookahead.push(next.value);
        }
        return this.lookahead[offset];
    }

    private advance(): Token {
        const token = this.current();
        this.lookahead.shift();
        return token;
    }

    private expect(...types: TokenType[]): Token {
        if (!types.includes(this.current().type)) {
            throw createUnexpectedTokenError(types, this.current(), this.originalInput);
        }
        return this.advance();
    }

    private skipNewlines(): void {
        while (this.current().type === 'NEWLINE') {
            this.advance();
        }
    }

    private isAssignmentStart(): boolean {
        return this.current().type === 'IDENT' && this.peek(1).type === 'ASSIGN';
    }

    private parseAssignment(): void {
        const nameToken = this.expect('IDENT');
        this.expect('ASSIGN');
        const valueToken = this.expect('LITERAL_0', 'LITERAL_1');

        const name = nameToken.value;
        const value = valueToken.type === 'LITERAL_1';
        if (!this.environment.define(name, value)) {
            throw createDuplicateAssignmentError(name, this.originalInput, nameToken.position);
        }
        this.assignments.push({ name, value, position: nameToken.position });

        if (this.current().type !== 'EOF') {
            this.expect('NEWLINE');
        }
    }

    private parseExpression(): ASTNode {
        return this.parseIff();
    }

    private parseIff(): ASTNode {
        let left = this.parseImplies();

        while (this.current().type === 'IFF') {
            this.advance();
            const right = this.parseImplies();
            left = binary('iff', left, right);
        }

        return left;
    }

    private parseImplies(): ASTNode {
        let left = this.parseDisjunction();

        while (this.current().type === 'IMPLIES') {
            this.advance();
            const right = this.parseDisjunction();
            left = binary('implies', left, right);
        }

        return left;
    }

    private parseDisjunction(): ASTNode {
        let left = this.parseConjunction();

        while (this.current().type === 'OR') {
            this.advance();
            const right = this.parseConjunction();
            left = binary('or', left, right);
        }

        return left;
    }

    private parseConjunction(): ASTNode {
        let left = this.parseUnary();

        while (this.current().type === 'AND') {
            this.advance();
            const right = this.parseUnary();
            left = binary('and', left, right);
        }

        return left;
    }

    private parseUnary(): ASTNode {
        if (this.current().type === 'NOT') {
            this.advance();
            const operand = this.parseUnary();
            return { type: 'not', operand };
        }

        return this.parseAtom();
    }

    private parseAtom(): ASTNode {
        const token = this.current();

        switch (token.type) {
            case 'LITERAL_0':
            case 'LITERAL_1':
                this.advance();
                return { type: 'literal', value: token.type === 'LITERAL_1' };

            case 'IDENT':
                this.advance();
                return { type: 'variable', name: token.value };

            case 'LPAREN': {
                this.advance();
                const expression = this.parseExpression();
                this.expect('RPAREN');
                return expression;
            }

            default:
                throw createUnexpectedTokenError(ATOM_START, token, this.originalInput);
        }
    }
}

function binary(type: BinaryOperator, left: ASTNode, right: ASTNode): ASTNode {
    return { type, left, right };
}
