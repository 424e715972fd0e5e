/**
 * @module identity-registry
 * Stable tokens for identity-bearing values.
 *
 * Objects and functions are tracked weakly, so a token lives exactly as long
 * as its instance. Symbols cannot be held weakly on every runtime we support
 * and are kept in an append-only table instead; that table grows with every
 * distinct symbol ever used as a key.
 */

import { Logger } from './logger';

export type IdentityBearing = object | symbol;

export class IdentityRegistry {
    readonly #objects = new WeakMap<object, string>();
    readonly #symbols = new Map<symbol, string>();
    #next = 1;
    readonly #logger?: Logger;

    constructor(logger?: Logger) {
        this.#logger = logger;
    }

    /** Number of tokens minted so far. Tokens are never reused. */
    get minted(): number { return this.#next - 1; }

    /**
     * Returns the token of an instance, minting one on first sight.
     * This is the only mutating operation of the registry.
     */
    tokenFor(value: IdentityBearing): string {
        const existing = this.peek(value);
        if (existing !== undefined) return existing;

        const token = (this.#next++).toString(36);
        if (typeof value === 'symbol') this.#symbols.set(value, token);
        else this.#objects.set(value, token);
        this.#logger?.debug('Minted identity token', {token, kind: typeof value});
        return token;
    }

    /** Returns the token of an instance without minting one. */
    peek(value: IdentityBearing): string | undefined {
        return typeof value === 'symbol' ? this.#symbols.get(value) : this.#objects.get(value);
    }
}
