export type OutputFormat = 'digit' | 'word';

export interface ExportOptions {
    /** Identifier written after `digraph` */
    graphName?: string;
}

export const DEFAULTS = {
    graphName: 'AST',
    outputFormat: 'digit',
} as const;
