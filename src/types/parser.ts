/**
 * Parser Types
 */

export type TokenType =
    | 'LITERAL_0'     // 0
    | 'LITERAL_1'     // 1
    | 'IDENT'         // p, q, rain
    | 'NOT'           // ~
    | 'AND'           // ^
    | 'OR'            // v
    | 'IMPLIES'       // =>
    | 'IFF'           // <=>
    | 'ASSIGN'        // :=
    | 'LPAREN'        // (
    | 'RPAREN'        // )
    | 'NEWLINE'       // \n
    | 'EOF';

export interface Token {
    readonly type: TokenType;
    readonly value: string;
    readonly position: number;
}
