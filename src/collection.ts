/**
 * @module collection
 * Common ground of Dictionary, Sequence and TypedSet.
 */

import { CollectionContext, defaultContext } from './context';
import { TypeSet, TypeSpec } from './type-set';
import { Logger } from './logger';

/**
 * A constraint as given to a container constructor: a TypeSet specification,
 * or `true` to infer the constraint from the source values.
 */
export type TypeConstraint = TypeSpec | true;

export interface CollectionOptions {
    /** Runtime context; containers that share object keys must share it. */
    context?: CollectionContext;
}

/**
 * @template V - Type of the values the container constrains.
 * @template Item - Type yielded by iteration.
 */
export abstract class Collection<V, Item = V> implements Iterable<Item> {
    /** Allowed value types. Grows when types are inferred, never shrinks. */
    readonly valueTypes: TypeSet;
    protected readonly context: CollectionContext;
    protected readonly logger: Logger;
    /** True when the value constraint is inferred from the source. */
    protected readonly inferValues: boolean;

    protected constructor(valueTypes: TypeConstraint, options: CollectionOptions) {
        this.context = options.context ?? defaultContext;
        this.logger = this.context.logger;
        this.inferValues = valueTypes === true;
        this.valueTypes = new TypeSet(valueTypes === true ? null : valueTypes, this.context);
    }

    abstract get size(): number;
    abstract clear(): this;
    abstract contains(value: V): boolean;
    abstract equals(other: unknown): boolean;
    abstract [Symbol.iterator](): Iterator<Item>;

    isEmpty(): boolean { return this.size === 0; }

    toArray(): Item[] { return [...this]; }

    /** True if the value constraint accepts the value, which makes it a `V`. */
    protected accepts(value: unknown): value is V {
        return this.valueTypes.match(value);
    }

    /** A fresh TypeSet bound to this container's context. */
    protected typeSet(spec?: TypeSpec): TypeSet {
        return new TypeSet(spec, this.context);
    }

    abstract toString(): string;
    [Symbol.for('nodejs.util.inspect.custom')]() { return this.toString(); }
}
