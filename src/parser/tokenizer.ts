import type { Token, TokenType } from '../types/parser.js';
import { createLexError } from '../types/errors.js';

// Longest first, so '<=>' is not read as '<' followed by '=>'
const OPERATORS: ReadonlyArray<readonly [string, TokenType]> = [
    ['<=>', 'IFF'],
    ['=>', 'IMPLIES'],
    [':=', 'ASSIGN'],
];

const SINGLE_CHAR_TOKENS: ReadonlyMap<string, TokenType> = new Map<string, TokenType>([
    ['(', 'LPAREN'],
    [')', 'RPAREN'],
    ['~', 'NOT'],
    ['^', 'AND'],
    ['0', 'LITERAL_0'],
    ['1', 'LITERAL_1'],
    ['\n', 'NEWLINE'],
]);

const LETTER = /[A-Za-z]/;

// Any whitespace except the newline, which separates statements
const BLANK = /[^\S\n]/;

/**
 * Tokenizer for propositional statements
 *
 * Tokens are produced lazily; a lexical error surfaces when the
 * offending character is reached, not before.
 */
export class Tokenizer {
    private readonly input: string;
    private pos: number = 0;

    constructor(input: string) {
        this.input = input;
    }

    /**
     * Fresh token sequence over the whole input, ending with EOF
     */
    tokens(): Generator<Token> {
        return new Tokenizer(this.input).scan();
    }

    tokenize(): Token[] {
        return Array.from(this.tokens());
    }

    private *scan(): Generator<Token> {
        while (this.pos < this.input.length) {
            this.skipBlanks();
            if (this.pos >= this.input.length) break;

            const start = this.pos;
            const char = this.input[start];

            const operator = OPERATORS.find(([symbol]) => this.match(symbol));
            if (operator) {
                yield { type: operator[1], value: operator[0], position: start };
                continue;
            }

            const single = SINGLE_CHAR_TOKENS.get(char);
            if (single) {
                this.pos++;
                yield { type: single, value: char, position: start };
                continue;
            }

            if (LETTER.test(char)) {
                while (this.pos < this.input.length && LETTER.test(this.input[this.pos])) {
                    this.pos++;
                }
                const value = this.input.slice(start, this.pos);
                yield { type: value === 'v' ? 'OR' : 'IDENT', value, position: start };
                continue;
            }

            throw createLexError(char, this.input, start);
        }

        yield { type: 'EOF', value: '', position: this.pos };
    }

    private skipBlanks(): void {
        while (this.pos < this.input.length && BLANK.test(this.input[this.pos])) {
            this.pos++;
        }
    }

    private match(str: string): boolean {
        if (this.input.startsWith(str, this.pos)) {
            this.pos += str.length;
            return true;
        }
        return false;
    }
}

/**
 * Lazily tokenize a statement
 */
export function tokenize(input: string): Generator<Token> {
    return new Tokenizer(input).tokens();
}
