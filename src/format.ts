/**
 * @module format
 * Rendering and ordering helpers for values of any kind.
 */

import { inspect } from 'node:util';

const MAX_DESCRIPTION = 40;

/**
 * Renders a value for messages and `toString()`, abbreviated to a single line.
 * Strings are quoted so that `'1'` and `1` read differently.
 */
export function abbreviate(value: unknown, maxLength = MAX_DESCRIPTION): string {
    const text = inspect(value, {breakLength: Infinity, depth: 2, compact: true});
    return text.length > maxLength ? `${text.slice(0, maxLength - 3)}...` : text;
}

/** Ordering of kinds when two values of different kinds are compared. */
function kindScore(value: unknown): number {
    if (value === null || value === undefined) return 0;
    switch (typeof value) {
        case 'boolean': return 1;
        case 'number':
        case 'bigint': return 2;
        case 'string': return 3;
        default: return Array.isArray(value) ? 4 : 5;
    }
}

/**
 * Polymorphic comparator establishing a total order over mixed values.
 *
 * Order of kinds: null < booleans < numbers < strings < arrays < everything else.
 * Within a kind: natural order; arrays element-wise then by length; Dates by
 * time. Other objects compare as equal, which keeps a stable sort stable.
 */
export function compareValues(a: unknown, b: unknown): number {
    if (a === b) return 0;

    // Type Segregation
    const scoreA = kindScore(a);
    const scoreB = kindScore(b);
    if (scoreA !== scoreB) return scoreA - scoreB;

    if (typeof a === 'boolean' && typeof b === 'boolean') return Number(a) - Number(b);
    if ((typeof a === 'number' || typeof a === 'bigint') && (typeof b === 'number' || typeof b === 'bigint')) {
        return a < b ? -1 : a > b ? 1 : 0;
    }
    if (typeof a === 'string' && typeof b === 'string') return a < b ? -1 : 1;
    if (Array.isArray(a) && Array.isArray(b)) return compareSequences(a, b);
    if (a instanceof Date && b instanceof Date) return a.getTime() - b.getTime();
    return 0;
}

function compareSequences(a: readonly unknown[], b: readonly unknown[]): number {
    const len = Math.min(a.length, b.length);
    for (let i = 0; i < len; i++) {
        const diff = compareValues(a[i], b[i]);
        if (diff !== 0) return diff;
    }
    return a.length - b.length;
}
