/**
 * Formatting utilities
 */
import type { LogicError, OutputFormat, Token } from '../types/index.js';

/**
 * Render a truth value for display
 */
export function formatValue(value: boolean, format: OutputFormat): string {
    if (format === 'word') {
        return value ? 'true' : 'false';
    }
    return value ? '1' : '0';
}

/**
 * Format an error as a compiler-style diagnostic, pointing at the
 * offending column when the error carries a span
 */
export function formatDiagnostic(error: LogicError, source?: string): string {
    const lines = [`error[${error.code}]: ${error.message}`];

    const { span } = error;
    if (span?.line !== undefined && span.col !== undefined) {
        lines.push(`  --> line ${span.line}, col ${span.col}`);
        if (source !== undefined) {
            const sourceLine = (source.split('\n')[span.line - 1] ?? '').replace(/\r$/, '');
            lines.push(`   | ${sourceLine}`);
            lines.push(`   | ${' '.repeat(span.col - 1)}^`);
        }
    }

    if (error.suggestion) {
        lines.push(`   = hint: ${error.suggestion}`);
    }

    return lines.join('\n');
}

/**
 * One line per token: type, lexeme and offset
 */
export function formatTokens(tokens: Token[]): string {
    return tokens
        .map(t => `${t.type.padEnd(9)} ${JSON.stringify(t.value)} @${t.position}`)
        .join('\n');
}
