/**
 * @module sequence
 * Typed, zero-indexed list.
 *
 * Writing past the end grows the list; the gap is filled with the zero value
 * of the constraint (`valueTypes.defaultValue()`), so a Sequence never has holes.
 */

import { Collection, CollectionOptions, TypeConstraint } from './collection';
import { abbreviate, compareValues } from './format';
import { IndexOutOfRangeError, InvalidArgumentError, TypeMismatchError } from './errors';

/** Guards against float drift when counting the steps of a range. */
const RANGE_EPSILON = 1e-9;

/**
 * @template T - Element type.
 */
export class Sequence<T = unknown> extends Collection<T> {
    #items: T[] = [];

    /**
     * @param valueTypes - Element constraint, or `true` to infer it from `source`.
     * @throws TypeMismatchError if an initial element is not allowed.
     */
    constructor(valueTypes: TypeConstraint = true, source: Iterable<T> = [], options: CollectionOptions = {}) {
        super(valueTypes, options);
        for (const item of source) {
            if (this.inferValues) this.valueTypes.infer(item);
            this.append(item);
        }
    }

    /**
     * Numbers from `start` to `end` inclusive.
     * @throws InvalidArgumentError if the step is zero or points away from `end`.
     */
    static range(start: number, end: number, step = 1, options: CollectionOptions = {}): Sequence<number> {
        if (step === 0) throw new InvalidArgumentError('The step size cannot be zero.');
        if (start > end && step > 0) {
            throw new InvalidArgumentError('The step size must be negative for a decreasing range.');
        }
        if (start < end && step < 0) {
            throw new InvalidArgumentError('The step size must be positive for an increasing range.');
        }

        const count = Math.floor((end - start) / step + RANGE_EPSILON) + 1;
        const values: number[] = [];
        for (let i = 0; i < count; i++) values.push(start + i * step);
        return new Sequence<number>(true, values, options);
    }

    get size(): number { return this.#items.length; }

    // ============================================================================
    // INDEXED ACCESS
    // ============================================================================

    #checkIndex(index: number, limit: number): void {
        if (!Number.isInteger(index) || index < 0 || index >= limit) {
            throw new IndexOutOfRangeError(index, this.#items.length);
        }
    }

    /** @throws IndexOutOfRangeError if there is no element at `index`. */
    get(index: number): T {
        this.#checkIndex(index, this.#items.length);
        return this.#items[index];
    }

    /**
     * Replaces the element at `index`, or appends past the end after filling
     * the gap with default values.
     * @throws IndexOutOfRangeError if the index is negative or fractional.
     * @throws NoDefaultAvailableError if a gap needs filling and the constraint has no zero value.
     */
    set(index: number, value: T): this {
        this.#checkIndex(index, Number.POSITIVE_INFINITY);
        this.valueTypes.check(value);
        if (index > this.#items.length) this.#fill(index);
        this.#items[index] = value;
        return this;
    }

    /** Pads the list with default values up to (excluding) `end`. */
    #fill(end: number): void {
        const gap = end - this.#items.length;
        this.logger.debug('Filling gap with default values', {from: this.#items.length, count: gap});
        while (this.#items.length < end) {
            const filler = this.valueTypes.defaultValue();
            if (!this.accepts(filler)) {
                throw new TypeMismatchError('default', [...this.valueTypes], this.valueTypes.tagOf(filler));
            }
            this.#items.push(filler);
        }
    }

    append(...values: T[]): this {
        for (const value of values) this.valueTypes.check(value);
        this.#items.push(...values);
        return this;
    }

    prepend(...values: T[]): this {
        for (const value of values) this.valueTypes.check(value);
        this.#items.unshift(...values);
        return this;
    }

    /**
     * Inserts before `index`; `index === size` appends.
     * @throws IndexOutOfRangeError if the index is past the end.
     */
    insert(index: number, value: T): this {
        this.#checkIndex(index, this.#items.length + 1);
        this.valueTypes.check(value);
        this.#items.splice(index, 0, value);
        return this;
    }

    /**
     * Removes the element at `index`; later elements shift down.
     * @returns The removed element.
     */
    removeAt(index: number): T {
        this.#checkIndex(index, this.#items.length);
        const [removed] = this.#items.splice(index, 1);
        return removed;
    }

    /**
     * Removes every element strictly equal to `value`.
     * @returns The number removed.
     */
    removeByValue(value: T): number {
        const before = this.#items.length;
        this.#items = this.#items.filter((item) => item !== value);
        return before - this.#items.length;
    }

    /** Index of the first element strictly equal to `value`, or -1. */
    indexOf(value: T): number {
        return this.#items.indexOf(value);
    }

    contains(value: T): boolean {
        return this.#items.includes(value);
    }

    /** @throws IndexOutOfRangeError if empty. */
    first(): T {
        return this.get(0);
    }

    /** @throws IndexOutOfRangeError if empty. */
    last(): T {
        return this.get(this.#items.length - 1);
    }

    clear(): this {
        this.#items = [];
        return this;
    }

    // ============================================================================
    // TRANSFORMATION
    // ============================================================================

    filter(predicate: (value: T, index: number) => boolean): Sequence<T> {
        const kept = this.#items.filter((value, index) => predicate(value, index));
        return new Sequence<T>(this.valueTypes, kept, {context: this.context});
    }

    /** The result's constraint is inferred from the mapped values. */
    map<U>(fn: (value: T, index: number) => U): Sequence<U> {
        const mapped = this.#items.map((value, index) => fn(value, index));
        return new Sequence<U>(true, mapped, {context: this.context});
    }

    /** Sorts in place, by default with the polymorphic comparator. */
    sort(compareFn: (a: T, b: T) => number = compareValues): this {
        this.#items.sort(compareFn);
        return this;
    }

    /** Same class, same length, strictly equal elements in the same order. */
    equals(other: unknown): boolean {
        if (this === other) return true;
        if (!(other instanceof Sequence) || this.size !== other.size) return false;
        const theirs = other.#items;
        return this.#items.every((item, i) => item === theirs[i]);
    }

    // ============================================================================
    // CONVERSION & ITERATION
    // ============================================================================

    toArray(): T[] { return [...this.#items]; }

    [Symbol.iterator](): Iterator<T> {
        return this.#items[Symbol.iterator]();
    }

    toString(): string {
        return `[${this.#items.map((item) => abbreviate(item)).join(', ')}]`;
    }
}
