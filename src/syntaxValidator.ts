/**
 * Syntax Validator for propositional statements
 *
 * Validates statements using the parser and adds lint warnings.
 */

import type { ValidationResult } from './types/index.js';
import { LogicException } from './types/index.js';
import { parseProgram } from './parser/index.js';
import type { ParsedProgram } from './parser/index.js';
import { collectVariables } from './astUtils.js';

const LOOKALIKES: ReadonlyMap<string, string> = new Map([
    ['V', "looks like the disjunction operator; use lowercase 'v'"],
    ['true', 'is a variable, not a literal; use 1'],
    ['false', 'is a variable, not a literal; use 0'],
]);

export class SyntaxValidator {
    private errors: string[] = [];
    private warnings: string[] = [];

    /**
     * Validate a single statement
     */
    validate(source: string): ValidationResult {
        this.errors = [];
        this.warnings = [];

        let program: ParsedProgram;
        try {
            program = parseProgram(source);
        } catch (e) {
            if (!(e instanceof LogicException)) {
                throw e;
            }
            this.errors.push(e.message);
            if (e.error.suggestion) {
                this.warnings.push(e.error.suggestion);
            }
            return this.result();
        }

        const used = collectVariables(program.expression);
        this.checkBindings(used, program.assignments.map(a => a.name));
        this.checkLookalikes(used);

        return this.result();
    }

    private checkBindings(used: string[], assigned: string[]): void {
        for (const name of used) {
            if (!assigned.includes(name)) {
                this.errors.push(`Variable '${name}' is used but never assigned`);
            }
        }
        for (const name of assigned) {
            if (!used.includes(name)) {
                this.warnings.push(`Variable '${name}' is assigned but never used`);
            }
        }
    }

    private checkLookalikes(used: string[]): void {
        for (const name of used) {
            const hint = LOOKALIKES.get(name);
            if (hint) {
                this.warnings.push(`Identifier '${name}' ${hint}`);
            }
        }
    }

    private result(): ValidationResult {
        return {
            valid: this.errors.length === 0,
            errors: [...this.errors],
            warnings: [...this.warnings]
        };
    }
}

/**
 * Validate a statement with a fresh validator
 */
export function validateStatement(source: string): ValidationResult {
    return new SyntaxValidator().validate(source);
}
