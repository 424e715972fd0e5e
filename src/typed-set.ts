/**
 * @module typed-set
 * Typed set of unique values.
 *
 * Membership is decided by the KeyCodec index, so arrays are compared
 * structurally and objects by identity. Iteration follows insertion order.
 */

import { Collection, CollectionOptions, TypeConstraint } from './collection';
import { snapshot } from './key-codec';
import { abbreviate } from './format';

/**
 * @template T - Element type.
 */
export class TypedSet<T = unknown> extends Collection<T> {
    #items = new Map<string, T>();

    /**
     * @param valueTypes - Element constraint, or `true` to infer it from `source`.
     * @throws TypeMismatchError if an initial element is not allowed.
     */
    constructor(valueTypes: TypeConstraint = true, source: Iterable<T> = [], options: CollectionOptions = {}) {
        super(valueTypes, options);
        for (const item of source) {
            if (this.inferValues) this.valueTypes.infer(item);
            this.add(item);
        }
    }

    get size(): number { return this.#items.size; }

    #index(value: unknown): string | undefined {
        return this.context.codec.tryEncode(value);
    }

    /**
     * Adds values not already present.
     * @throws TypeMismatchError if a value type is not allowed.
     * @throws InvalidKeyError for NaN or an array that contains itself.
     */
    add(...values: T[]): this {
        for (const value of values) {
            this.valueTypes.check(value);
            const index = this.context.codec.encode(value);
            if (!this.#items.has(index)) this.#items.set(index, snapshot(value));
        }
        return this;
    }

    /** Removes values; values not present are ignored. */
    remove(...values: T[]): this {
        for (const value of values) {
            const index = this.#index(value);
            if (index !== undefined) this.#items.delete(index);
        }
        return this;
    }

    /** Membership test. Never throws. */
    has(value: unknown): boolean {
        if (!this.valueTypes.match(value)) return false;
        const index = this.#index(value);
        return index !== undefined && this.#items.has(index);
    }

    contains(value: T): boolean {
        return this.has(value);
    }

    clear(): this {
        this.#items.clear();
        return this;
    }

    // ============================================================================
    // SET ALGEBRA
    // ============================================================================

    /** Copy with the same constraint and no elements. */
    #empty(): TypedSet<T> {
        return new TypedSet<T>(this.valueTypes, [], {context: this.context});
    }

    /** A ∪ B. The result allows the types of both. */
    union<U>(other: TypedSet<U>): TypedSet<T | U> {
        const types = this.valueTypes.clone().add(other.valueTypes);
        const result = new TypedSet<T | U>(types, this, {context: this.context});
        return result.add(...other);
    }

    /** A ∩ B. */
    intersection(other: TypedSet<T>): TypedSet<T> {
        const result = this.#empty();
        for (const value of this) {
            if (other.has(value)) result.add(value);
        }
        return result;
    }

    /** A \ B. */
    difference(other: TypedSet<T>): TypedSet<T> {
        const result = this.#empty();
        for (const value of this) {
            if (!other.has(value)) result.add(value);
        }
        return result;
    }

    /** A Δ B. The result allows the types of both. */
    symmetricDifference(other: TypedSet<T>): TypedSet<T> {
        const types = this.valueTypes.clone().add(other.valueTypes);
        const result = new TypedSet<T>(types, [], {context: this.context});
        for (const value of this) {
            if (!other.has(value)) result.add(value);
        }
        for (const value of other) {
            if (!this.has(value)) result.add(value);
        }
        return result;
    }

    isSubset(other: TypedSet<T>): boolean {
        if (this.size > other.size) return false;
        for (const value of this) {
            if (!other.has(value)) return false;
        }
        return true;
    }

    isSuperset(other: TypedSet<T>): boolean { return other.isSubset(this); }

    /** Same class and same elements, in any order. Constraints are not compared. */
    equals(other: unknown): boolean {
        if (this === other) return true;
        if (!(other instanceof TypedSet) || this.size !== other.size) return false;
        for (const index of this.#items.keys()) {
            if (!other.#items.has(index)) return false;
        }
        return true;
    }

    // ============================================================================
    // TRANSFORMATION & ITERATION
    // ============================================================================

    filter(predicate: (value: T) => boolean): TypedSet<T> {
        const result = this.#empty();
        for (const value of this) {
            if (predicate(value)) result.add(value);
        }
        return result;
    }

    /** Results that collide collapse into one element. The constraint is inferred. */
    map<U>(fn: (value: T) => U): TypedSet<U> {
        return new TypedSet<U>(true, Array.from(this, fn), {context: this.context});
    }

    [Symbol.iterator](): Iterator<T> {
        return this.#items.values();
    }

    toString(): string {
        return `{${Array.from(this, (value) => abbreviate(value)).join(', ')}}`;
    }
}
