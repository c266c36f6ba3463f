/**
 * Shared test fixtures for consistent, DRY testing.
 */
import { LogicException } from '../src/types/index.js';

// === Statements with known values ===
export const STATEMENTS: Array<{ source: string; expected: boolean }> = [
    { source: '1 ^ 0', expected: false },
    { source: '1 v 0', expected: true },
    { source: '~1', expected: false },
    { source: '0 <=> 0', expected: true },
    { source: '1 v 0 ^ 0', expected: true },
    { source: '~0 ^ 0', expected: false },
    { source: '~1 v ~0 <=> ~(1 ^ 0)', expected: true },
    { source: '(1 => 0) ^ 1', expected: false },
    { source: '((1 v 0) => 0) ^ 1', expected: false },
    { source: 'p := 1\nq := 0\n~p v ~q', expected: true },
    { source: 'p := 1\nq := 0\nr := 1\np ^ q ^ r', expected: false },
];

/**
 * Run `fn` and return the LogicException it throws
 */
export function catchLogicError(fn: () => unknown): LogicException {
    try {
        fn();
    } catch (e) {
        if (e instanceof LogicException) {
            return e;
        }
        throw e;
    }
    throw new Error('Expected a LogicException to be thrown');
}
