/**
 * @module key-codec
 * Canonical string indexes for values of any kind.
 *
 * Contract:
 * - `encode(a) === encode(b)` iff `a === b`, except that arrays compare
 *   structurally (element by element, order-sensitive).
 * - Every kind has its own prefix, so `1`, `'1'`, `1n` and `true` never meet.
 * - Objects, functions and symbols encode to a token from the IdentityRegistry:
 *   the same instance always gets the same index, look-alikes never do.
 */

import { IdentityRegistry } from './identity-registry';
import { InvalidKeyError } from './errors';

const NULL_INDEX = 'N';
const UNDEFINED_INDEX = 'U';
const CYCLIC_ARRAY = 'a cyclic array cannot be used as a key';

/** Escapes the separator and the escape character inside a nested encoding. */
function escapeElement(encoded: string): string {
    return encoded.replace(/[\\|]/g, '\\$&');
}

export class KeyCodec {
    constructor(readonly identities: IdentityRegistry) {}

    /**
     * Encodes a value as its canonical index.
     * @throws InvalidKeyError for NaN, which is not equal to itself, and for
     * an array that contains itself.
     */
    encode(value: unknown): string {
        return this.#encode(value, new Set());
    }

    /**
     * Like `encode`, but returns undefined for values that cannot be keys.
     * Never mints a token: an instance the registry has not seen yet cannot
     * be stored anywhere, so it has no index.
     */
    tryEncode(value: unknown): string | undefined {
        return this.#isKnown(value, new Set()) ? this.encode(value) : undefined;
    }

    #encode(value: unknown, path: Set<readonly unknown[]>): string {
        switch (typeof value) {
            case 'undefined': return UNDEFINED_INDEX;
            case 'boolean': return value ? 'b:1' : 'b:0';
            case 'number': return this.#encodeNumber(value);
            case 'bigint': return `n:${value.toString()}`;
            case 'string': return `s:${value}`;
            case 'symbol': return `h:${this.identities.tokenFor(value)}`;
            case 'function': return `c:${this.identities.tokenFor(value)}`;
            default:
                if (typeof value !== 'object' || value === null) return NULL_INDEX;
                if (Array.isArray(value)) return this.#encodeArray(value, path);
                return `o:${this.identities.tokenFor(value)}`;
        }
    }

    #encodeNumber(value: number): string {
        if (Number.isNaN(value)) throw new InvalidKeyError(value, 'NaN cannot be used as a key');
        // String(-0) is '0', which matches -0 === 0.
        return Number.isInteger(value) ? `i:${String(value)}` : `d:${String(value)}`;
    }

    #encodeArray(values: readonly unknown[], path: Set<readonly unknown[]>): string {
        if (path.has(values)) throw new InvalidKeyError(values, CYCLIC_ARRAY);
        path.add(values);
        const parts: string[] = [];
        // Indexed loop so holes encode as undefined.
        for (let i = 0; i < values.length; i++) {
            parts.push(escapeElement(this.#encode(values[i], path)));
        }
        path.delete(values);
        return `a[${parts.join('|')}]`;
    }

    /** True if `value` encodes without throwing and without minting a token. */
    #isKnown(value: unknown, path: Set<readonly unknown[]>): boolean {
        switch (typeof value) {
            case 'number': return !Number.isNaN(value);
            case 'symbol':
            case 'function':
                return this.identities.peek(value) !== undefined;
            case 'object':
                if (value === null) return true;
                if (!Array.isArray(value)) return this.identities.peek(value) !== undefined;
                if (path.has(value)) return false;
                path.add(value);
                for (let i = 0; i < value.length; i++) {
                    if (!this.#isKnown(value[i], path)) return false;
                }
                path.delete(value);
                return true;
            default:
                return true;
        }
    }
}

/**
 * Returns a deep-frozen copy of an array key so that its encoding cannot
 * drift after insertion. Other values are returned as they are.
 * @throws InvalidKeyError for an array that contains itself.
 */
export function snapshot<T>(value: T): T;
export function snapshot(value: unknown): unknown {
    return freezeCopy(value, new Set());
}

function freezeCopy(value: unknown, path: Set<readonly unknown[]>): unknown {
    if (!Array.isArray(value)) return value;
    if (path.has(value)) throw new InvalidKeyError(value, CYCLIC_ARRAY);
    path.add(value);
    const copy: unknown[] = [];
    for (let i = 0; i < value.length; i++) copy.push(freezeCopy(value[i], path));
    path.delete(value);
    return Object.freeze(copy);
}
