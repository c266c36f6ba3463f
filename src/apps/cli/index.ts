import chalk from 'chalk';
import { evaluateStatement } from '../../pipeline.js';
import { validateStatement } from '../../syntaxValidator.js';
import { Tokenizer } from '../../parser/index.js';
import { astToString } from '../../utils/ast/printer.js';
import { formatDiagnostic, formatTokens, formatValue } from '../../utils/formatting.js';
import { writeDotFile } from '../../export/graphviz.js';
import { serializeLogicError } from '../../types/index.js';
import { parseCliArgs, UsageError } from './options.js';
import type { CliOptions } from './options.js';

export const VERSION = '1.0.0';

export const HELP = `
proplogic v${VERSION} - propositional statement evaluator

Usage:
  proplogic [options] <file>
  proplogic [options] --expr "<statement>"

A statement is zero or more assignment lines followed by one expression:
  p := 1
  q := 0
  ~p v ~q

Operators (tightest first): ~ (not), ^ (and), v (or), => (implies), <=> (iff)

Options:
  -e, --expr <text>      Evaluate <text>; a literal \\n separates lines
  --graph <path>         Write the AST as a Graphviz DOT file
  --format <digit|word>  Print the result as 1/0 (default) or true/false
  --print                Also print the fully parenthesized expression
  --check                Validate the statement instead of evaluating it
  --json                 Print machine-readable JSON
  --verbose              Dump tokens and the parsed expression to stderr
  --no-color             Disable colored output
  --help, -h             Show this help
  --version, -v          Show version

Examples:
  proplogic statement.txt
  proplogic --graph ast.dot -e "p := 1\\np ^ ~0"
`;

/**
 * Process boundary for the CLI, so it can run against in-memory streams
 */
export interface CliIO {
    stdout(text: string): void;
    stderr(text: string): void;
    readFile(path: string): Promise<string>;
    colorSupported: boolean;
}

/**
 * Run the CLI and return its exit code: 0 on success, 1 when the
 * statement fails, 2 on a usage error or when a file cannot be read or written
 */
export async function runCli(args: string[], io: CliIO): Promise<number> {
    let options: CliOptions;
    try {
        options = parseCliArgs(args);
    } catch (e) {
        if (e instanceof UsageError) {
            io.stderr(`Error: ${e.message}`);
            io.stderr('Run with --help for usage.');
            return 2;
        }
        throw e;
    }

    if (options.help) {
        io.stdout(HELP);
        return 0;
    }
    if (options.version) {
        io.stdout(VERSION);
        return 0;
    }

    const paint = new chalk.Instance({ level: options.color && io.colorSupported ? 1 : 0 });

    let source: string;
    try {
        source = await loadSource(options, io);
    } catch (e) {
        const reason = e instanceof Error ? e.message : String(e);
        io.stderr(paint.red(`Error: cannot read '${options.file}': ${reason}`));
        return 2;
    }

    if (options.check) {
        return check(source, options, io, paint);
    }

    const result = evaluateStatement(source);

    if (result.success && options.verbose) {
        io.stderr(paint.dim(formatTokens(new Tokenizer(source).tokenize())));
        io.stderr(paint.dim(`expression: ${astToString(result.ast)}`));
    }

    // Written whenever parsing succeeded, whatever the evaluation result
    if (options.graph !== undefined && result.ast !== undefined) {
        try {
            await writeDotFile(result.ast, options.graph);
        } catch (e) {
            const reason = e instanceof Error ? e.message : String(e);
            io.stderr(paint.red(`Error: cannot write '${options.graph}': ${reason}`));
            return 2;
        }
        if (options.verbose) {
            io.stderr(paint.dim(`graph written to ${options.graph}`));
        }
    }

    if (!result.success) {
        if (options.json) {
            io.stdout(JSON.stringify({
                success: false,
                stage: result.stage,
                error: serializeLogicError(result.error),
            }, null, 2));
        } else {
            io.stderr(paint.red(formatDiagnostic(result.error, source)));
        }
        return 1;
    }

    if (options.json) {
        io.stdout(JSON.stringify({
            success: true,
            value: result.value,
            expression: astToString(result.ast),
            bindings: result.bindings,
            ast: result.ast,
        }, null, 2));
        return 0;
    }

    if (options.print) {
        io.stdout(astToString(result.ast));
    }
    const rendered = formatValue(result.value, options.format);
    io.stdout(result.value ? paint.green(rendered) : paint.yellow(rendered));
    return 0;
}

async function loadSource(options: CliOptions, io: CliIO): Promise<string> {
    if (options.expr !== undefined) {
        return options.expr.replace(/\\n/g, '\n');
    }
    if (options.file !== undefined) {
        return io.readFile(options.file);
    }
    throw new UsageError('Missing input');
}

function check(source: string, options: CliOptions, io: CliIO, paint: chalk.Chalk): number {
    const report = validateStatement(source);

    if (options.json) {
        io.stdout(JSON.stringify(report, null, 2));
        return report.valid ? 0 : 1;
    }

    for (const error of report.errors) {
        io.stderr(paint.red(`error: ${error}`));
    }
    for (const warning of report.warnings) {
        io.stderr(paint.yellow(`warning: ${warning}`));
    }
    if (report.valid) {
        io.stdout(paint.green('OK'));
    }
    return report.valid ? 0 : 1;
}
