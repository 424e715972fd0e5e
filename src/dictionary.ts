/**
 * @module dictionary
 * Insertion-ordered map accepting keys of any kind.
 *
 * Architecture:
 * - Each key is turned into a canonical index by the context's KeyCodec.
 * - Entries live in a `Map<index, Pair>`; the Pair keeps the original key,
 *   so the index is never visible to callers.
 * - Invariant: `codec.encode(pair.key) === index` for every entry. Array keys
 *   are stored as frozen snapshots to keep it true.
 *
 * @example
 * const stock = new Dictionary<string, number>('string', 'int');
 * const sales = new Dictionary<Date, number>('Date', 'float');
 * const grid = new Dictionary<[number, number], string>('array', '?string');
 */

import { Collection, CollectionOptions, TypeConstraint } from './collection';
import { Pair } from './pair';
import { Sequence } from './sequence';
import { TypeSet } from './type-set';
import { snapshot } from './key-codec';
import { abbreviate, compareValues } from './format';
import { basicTagOf } from './type-tag';
import { DuplicateKeyError, InvalidArgumentError, UnknownKeyError } from './errors';

/** Initial contents: `[key, value]` tuples or Pairs, e.g. a Map or another Dictionary. */
export type DictionarySource<K, V> = Iterable<readonly [K, V] | Pair<K, V>>;

function toPair<K, V>(entry: readonly [K, V] | Pair<K, V>): Pair<K, V> {
    return entry instanceof Pair ? entry : new Pair(entry[0], entry[1]);
}

/**
 * @template K - Key type.
 * @template V - Value type.
 */
export class Dictionary<K = unknown, V = unknown> extends Collection<V, [K, V]> {
    /** Allowed key types. */
    readonly keyTypes: TypeSet;
    #items = new Map<string, Pair<K, V>>();

    /**
     * @param keyTypes - Key constraint, or `true` to infer it from `source`.
     * @param valueTypes - Value constraint, or `true` to infer it from `source`.
     * @param source - Initial entries.
     * @throws InvalidTypeNameError if a type name is malformed.
     * @throws TypeMismatchError if an initial key or value is not allowed.
     */
    constructor(
        keyTypes: TypeConstraint = true,
        valueTypes: TypeConstraint = true,
        source: DictionarySource<K, V> = [],
        options: CollectionOptions = {}
    ) {
        super(valueTypes, options);
        const inferKeys = keyTypes === true;
        this.keyTypes = this.typeSet(keyTypes === true ? null : keyTypes);

        for (const entry of source) {
            const {key, value} = toPair(entry);
            if (inferKeys) this.keyTypes.infer(key);
            if (this.inferValues) this.valueTypes.infer(value);
            this.set(key, value);
        }
    }

    /**
     * Builds a Dictionary from parallel iterables of keys and values.
     * @param inferTypes - Infer both constraints from the data; otherwise allow any types.
     * @throws InvalidArgumentError if the counts differ.
     * @throws DuplicateKeyError if a key repeats.
     */
    static combine<K, V>(
        keys: Iterable<K>,
        values: Iterable<V>,
        inferTypes = true,
        options: CollectionOptions = {}
    ): Dictionary<K, V> {
        const keyList = [...keys];
        const valueList = [...values];
        if (keyList.length !== valueList.length) {
            throw new InvalidArgumentError(
                `Cannot combine: keys count (${keyList.length}) does not match values count (${valueList.length}).`
            );
        }

        const dict = new Dictionary<K, V>(null, null, [], options);
        for (let i = 0; i < keyList.length; i++) {
            const key = keyList[i];
            const value = valueList[i];
            if (dict.has(key)) throw new DuplicateKeyError('Cannot combine: keys are not unique.');
            if (inferTypes) {
                dict.keyTypes.infer(key);
                dict.valueTypes.infer(value);
            }
            dict.set(key, value);
        }
        return dict;
    }

    get size(): number { return this.#items.size; }

    /** All keys, in order. */
    get keys(): K[] {
        return Array.from(this.#items.values(), (pair) => pair.key);
    }

    /** All values, in key order. */
    get values(): V[] {
        return Array.from(this.#items.values(), (pair) => pair.value);
    }

    // ============================================================================
    // KEY ACCESS
    // ============================================================================

    /**
     * Validates a key and returns the index of its existing entry.
     * @throws TypeMismatchError if the key type is not allowed.
     * @throws UnknownKeyError if there is no entry for the key.
     */
    #indexOf(key: K): string {
        this.keyTypes.check(key, 'key');
        const index = this.context.codec.encode(key);
        if (!this.#items.has(index)) throw new UnknownKeyError(key, abbreviate(key));
        return index;
    }

    /**
     * Inserts or replaces an entry. A replaced entry keeps its position.
     * @throws TypeMismatchError if the key or value type is not allowed.
     */
    set(key: K, value: V): this {
        this.keyTypes.check(key, 'key');
        this.valueTypes.check(value, 'value');
        const index = this.context.codec.encode(key);
        this.#items.set(index, new Pair(snapshot(key), value));
        return this;
    }

    /** Adds an entry given as a key and a value, or as a Pair. */
    add(pair: Pair<K, V>): this;
    add(key: K, value: V): this;
    add(...args: [Pair<K, V>] | [K, V]): this {
        const pair = args.length === 1 ? args[0] : new Pair(args[0], args[1]);
        return this.set(pair.key, pair.value);
    }

    /**
     * @throws TypeMismatchError if the key type is not allowed.
     * @throws UnknownKeyError if there is no entry for the key.
     */
    get(key: K): V {
        const pair = this.#items.get(this.#indexOf(key));
        if (pair === undefined) throw new UnknownKeyError(key, abbreviate(key));
        return pair.value;
    }

    /**
     * Existence check. Never throws: keys of a disallowed type, or keys that
     * cannot be encoded, are simply absent.
     */
    has(key: unknown): boolean {
        if (!this.keyTypes.match(key)) return false;
        const index = this.context.codec.tryEncode(key);
        return index !== undefined && this.#items.has(index);
    }

    /** Alias of `has`. */
    keyExists(key: unknown): boolean {
        return this.has(key);
    }

    /**
     * Removes an entry and returns its value.
     * @throws TypeMismatchError if the key type is not allowed.
     * @throws UnknownKeyError if there is no entry for the key.
     */
    removeByKey(key: K): V {
        const value = this.get(key);
        this.#items.delete(this.context.codec.encode(key));
        return value;
    }

    /**
     * Removes every entry holding the value.
     * @returns The number of entries removed.
     * @throws TypeMismatchError if the value type is not allowed.
     */
    removeByValue(value: V): number {
        this.valueTypes.check(value, 'value');
        let removed = 0;
        for (const [index, pair] of this.#items) {
            if (pair.value === value) {
                this.#items.delete(index);
                removed++;
            }
        }
        return removed;
    }

    /** Adds entries from an iterable, replacing existing keys. */
    import(source: DictionarySource<K, V>): this {
        for (const entry of source) {
            const {key, value} = toPair(entry);
            this.set(key, value);
        }
        return this;
    }

    clear(): this {
        this.#items.clear();
        return this;
    }

    // ============================================================================
    // INSPECTION
    // ============================================================================

    /** True if some entry holds the value (strict equality). */
    contains(value: V): boolean {
        for (const pair of this.#items.values()) {
            if (pair.value === value) return true;
        }
        return false;
    }

    /**
     * Equal means: both Dictionaries, same keys in the same order, strictly
     * equal values. Type constraints are not compared.
     */
    equals(other: unknown): boolean {
        if (this === other) return true;
        if (!(other instanceof Dictionary) || this.size !== other.size) return false;

        const theirs = other.#items.entries();
        for (const [index, pair] of this.#items) {
            const next = theirs.next();
            if (next.done) return false;
            const [otherIndex, otherPair] = next.value;
            if (index !== otherIndex || pair.value !== otherPair.value) return false;
        }
        return true;
    }

    // ============================================================================
    // ORDERING
    // ============================================================================

    /** Reorders entries in place with a comparator over Pairs. */
    sort(compareFn: (a: Pair<K, V>, b: Pair<K, V>) => number): this {
        const sorted = [...this.#items].sort(([, a], [, b]) => compareFn(a, b));
        this.#items = new Map(sorted);
        return this;
    }

    sortByKey(): this {
        return this.sort((a, b) => compareValues(a.key, b.key));
    }

    sortByValue(): this {
        return this.sort((a, b) => compareValues(a.value, b.value));
    }

    // ============================================================================
    // TRANSFORMATION
    // ============================================================================

    /**
     * Keeps the entries the predicate accepts, with the same constraints.
     * @throws TypeError if the predicate returns anything but a boolean.
     */
    filter(predicate: (key: K, value: V) => boolean): Dictionary<K, V> {
        const result = new Dictionary<K, V>(this.keyTypes, this.valueTypes, [], {context: this.context});
        for (const pair of this.#items.values()) {
            const keep: unknown = predicate(pair.key, pair.value);
            if (typeof keep !== 'boolean') {
                throw new TypeError(`The filter callback must return a bool, got ${basicTagOf(keep)}.`);
            }
            if (keep) result.set(pair.key, pair.value);
        }
        return result;
    }

    /**
     * Swaps keys and values, and the two constraints.
     * @throws DuplicateKeyError if two entries hold the same value.
     */
    flip(): Dictionary<V, K> {
        const result = new Dictionary<V, K>(this.valueTypes, this.keyTypes, [], {context: this.context});
        for (const pair of this.#items.values()) {
            if (result.has(pair.value)) throw new DuplicateKeyError('Cannot flip Dictionary: values are not unique.');
            result.set(pair.value, pair.key);
        }
        return result;
    }

    /**
     * Transforms every entry. The result's constraints are inferred from the
     * Pairs the callback returns.
     * @throws TypeError if the callback returns anything but a Pair.
     * @throws DuplicateKeyError if two results share a key.
     */
    map<K2, V2>(fn: (pair: Pair<K, V>) => Pair<K2, V2>): Dictionary<K2, V2> {
        const result = new Dictionary<K2, V2>(null, null, [], {context: this.context});
        for (const pair of this.#items.values()) {
            const mapped = fn(pair);
            const returned: unknown = mapped;
            if (!(returned instanceof Pair)) {
                throw new TypeError(`Map callback must return a Pair, got ${basicTagOf(returned)}.`);
            }
            if (result.has(mapped.key)) {
                throw new DuplicateKeyError(`Map callback produced a duplicate key: ${abbreviate(mapped.key)}.`);
            }
            result.keyTypes.infer(mapped.key);
            result.valueTypes.infer(mapped.value);
            result.add(mapped);
        }
        return result;
    }

    /**
     * Combines two Dictionaries into a new one allowing the types of both.
     * Where both hold a key, the other's value wins and the position of the
     * first occurrence is kept.
     */
    merge<K2, V2>(other: Dictionary<K2, V2>): Dictionary<K | K2, V | V2> {
        const keyTypes = this.keyTypes.clone().add(other.keyTypes);
        const valueTypes = this.valueTypes.clone().add(other.valueTypes);
        const result = new Dictionary<K | K2, V | V2>(keyTypes, valueTypes, [], {context: this.context});
        const codec = this.context.codec;
        for (const pair of this.#items.values()) result.#items.set(codec.encode(pair.key), pair.clone());
        // Re-encoded: the other Dictionary may mint identity tokens in another context.
        for (const pair of other.#items.values()) result.#items.set(codec.encode(pair.key), pair.clone());
        this.logger.debug('Merged dictionaries', {size: result.size, keyTypes: keyTypes.toString()});
        return result;
    }

    // ============================================================================
    // CONVERSION & ITERATION
    // ============================================================================

    /** The entries as a Sequence of Pairs. */
    toSequence(): Sequence<Pair<K, V>> {
        return new Sequence<Pair<K, V>>('Pair', this.#items.values(), {context: this.context});
    }

    /** The entries as Pairs, in order. */
    pairs(): IterableIterator<Pair<K, V>> {
        return this.#items.values();
    }

    *entries(): IterableIterator<[K, V]> {
        for (const pair of this.#items.values()) yield [pair.key, pair.value];
    }

    [Symbol.iterator](): Iterator<[K, V]> {
        return this.entries();
    }

    toString(): string {
        const entries = Array.from(this.#items.values(), (pair) => pair.toString());
        return `Dictionary{${entries.join(', ')}}`;
    }
}
