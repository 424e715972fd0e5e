import { abbreviate } from './format';

/**
 * Immutable key-value pair.
 * A Dictionary stores one Pair per entry, keeping the key in its original form
 * next to the value.
 *
 * @template K - Key type.
 * @template V - Value type.
 */
export class Pair<K = unknown, V = unknown> {
    constructor(readonly key: K, readonly value: V) {
        Object.freeze(this);
    }

    /** A distinct Pair holding the same key and value. */
    clone(): Pair<K, V> { return new Pair(this.key, this.value); }

    toString(): string { return `${abbreviate(this.key)} => ${abbreviate(this.value)}`; }
    [Symbol.for('nodejs.util.inspect.custom')]() { return `Pair(${this.toString()})`; }
}
