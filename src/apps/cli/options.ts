import { z } from 'zod';
import { DEFAULTS } from '../../types/index.js';

export class UsageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'UsageError';
    }
}

const CliOptionsSchema = z.object({
    file: z.string().min(1).optional(),
    expr: z.string().optional(),
    graph: z.string().min(1, 'graph path must not be empty').optional(),
    format: z.enum(['digit', 'word']).default(DEFAULTS.outputFormat),
    json: z.boolean().default(false),
    check: z.boolean().default(false),
    print: z.boolean().default(false),
    verbose: z.boolean().default(false),
    color: z.boolean().default(true),
    help: z.boolean().default(false),
    version: z.boolean().default(false),
});

export type CliOptions = z.infer<typeof CliOptionsSchema>;

const FLAGS: Readonly<Record<string, 'json' | 'check' | 'print' | 'verbose' | 'help' | 'version'>> = {
    '--json': 'json',
    '--check': 'check',
    '--print': 'print',
    '--verbose': 'verbose',
    '--help': 'help',
    '-h': 'help',
    '--version': 'version',
    '-v': 'version',
};

const VALUE_OPTIONS: Readonly<Record<string, 'expr' | 'graph' | 'format'>> = {
    '--expr': 'expr',
    '-e': 'expr',
    '--graph': 'graph',
    '--format': 'format',
};

/**
 * Parse argv (without the node and script entries) into validated options
 */
export function parseCliArgs(args: string[]): CliOptions {
    const raw: Record<string, string | boolean> = {};

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        const [name, inlineValue] = arg.startsWith('--') && arg.includes('=')
            ? [arg.slice(0, arg.indexOf('=')), arg.slice(arg.indexOf('=') + 1)]
            : [arg, undefined];

        if (name in FLAGS && inlineValue === undefined) {
            raw[FLAGS[name]] = true;
        } else if (name === '--no-color') {
            raw.color = false;
        } else if (name in VALUE_OPTIONS) {
            const value = inlineValue ?? args[++i];
            if (value === undefined) {
                throw new UsageError(`Option ${name} requires a value`);
            }
            raw[VALUE_OPTIONS[name]] = value;
        } else if (arg.startsWith('-')) {
            throw new UsageError(`Unknown option '${arg}'`);
        } else if (raw.file !== undefined) {
            throw new UsageError(`Unexpected argument '${arg}'`);
        } else {
            raw.file = arg;
        }
    }

    const parsed = CliOptionsSchema.safeParse(raw);
    if (!parsed.success) {
        const message = parsed.error.issues
            .map(issue => issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message)
            .join('; ');
        throw new UsageError(message);
    }

    const options = parsed.data;
    if (!options.help && !options.version) {
        if (options.file === undefined && options.expr === undefined) {
            throw new UsageError('Missing input: pass a statement file or --expr <statement>');
        }
        if (options.file !== undefined && options.expr !== undefined) {
            throw new UsageError('Pass either a statement file or --expr, not both');
        }
    }
    return options;
}
