/**
 * Variable bindings for a single statement run.
 *
 * The parser records each assignment here in source order and the
 * evaluator reads from it. Names are case-sensitive and bound at most
 * once; there is no scoping and no parent chain.
 */

import { createUnboundVariableError } from './types/errors.js';

export class Environment {
    private readonly bindings: Map<string, boolean>;

    constructor(initial: Iterable<readonly [string, boolean]> = []) {
        this.bindings = new Map(initial);
    }

    /**
     * Bind a name. Returns false, leaving the existing value in place,
     * when the name is already bound.
     */
    define(name: string, value: boolean): boolean {
        if (this.bindings.has(name)) {
            return false;
        }
        this.bindings.set(name, value);
        return true;
    }

    has(name: string): boolean {
        return this.bindings.has(name);
    }

    get(name: string): boolean | undefined {
        return this.bindings.get(name);
    }

    /**
     * Value of a bound name; throws an UNBOUND_VARIABLE error otherwise.
     */
    lookup(name: string): boolean {
        const value = this.bindings.get(name);
        if (value === undefined) {
            throw createUnboundVariableError(name);
        }
        return value;
    }

    get size(): number {
        return this.bindings.size;
    }

    names(): string[] {
        return Array.from(this.bindings.keys());
    }

    toObject(): Record<string, boolean> {
        return Object.fromEntries(this.bindings);
    }
}
