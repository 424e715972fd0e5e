/**
 * @module capabilities
 * Capability sets for named (user-defined) types.
 *
 * A value's capability set is the union, over its prototype chain, of each
 * constructor's own name plus the name and traits declared for it. Matching a
 * named tag is then a membership test on that set.
 */

import { Logger } from './logger';
import { canonicalTag, isBuiltinTag } from './type-tag';
import { InvalidTypeNameError } from './errors';

export type Constructor<T extends object = object> = abstract new (...args: never[]) => T;

export interface TypeDeclaration<T extends object = object> {
    /** Name the type is known by in constraints, e.g. `geometry.Point`. Defaults to the constructor name. */
    name?: string;
    /** Extra capabilities satisfied by instances (interfaces, mixins). */
    traits?: readonly string[];
    /** Zero-argument factory used by `TypeSet.defaultValue()`. */
    create?: () => T;
}

interface Declared {
    readonly name: string;
    readonly traits: readonly string[];
    readonly create?: () => object;
}

const EMPTY: ReadonlySet<string> = new Set();

function ownConstructor(proto: object): Function | undefined {
    const descriptor = Object.getOwnPropertyDescriptor(proto, 'constructor');
    const ctor: unknown = descriptor?.value;
    return typeof ctor === 'function' ? ctor : undefined;
}

export class CapabilityRegistry {
    readonly #declarations = new WeakMap<Function, Declared>();
    readonly #byName = new Map<string, Declared>();
    #cache = new WeakMap<object, ReadonlySet<string>>();
    readonly #logger?: Logger;

    constructor(logger?: Logger) {
        this.#logger = logger;
    }

    /**
     * Declares the name, traits and factory of a type. Re-declaring a type
     * replaces its previous declaration.
     */
    declare<T extends object>(type: Constructor<T>, declaration: TypeDeclaration<T> = {}): this {
        const name = this.#identifier(declaration.name ?? type.name);
        const traits = (declaration.traits ?? []).map((trait) => this.#identifier(trait));
        const declared: Declared = {name, traits, create: declaration.create};

        this.#declarations.set(type, declared);
        this.#byName.set(name, declared);
        // Declarations change the sets of every subclass, so drop them all.
        this.#cache = new WeakMap();
        this.#logger?.verbose('Declared type', {name, traits: [...traits]});
        return this;
    }

    isDeclared(name: string): boolean {
        return this.#byName.has(name);
    }

    /** The capability set of a value; empty for anything that is not an object or function. */
    capabilitiesOf(value: unknown): ReadonlySet<string> {
        if (value === null || (typeof value !== 'object' && typeof value !== 'function')) return EMPTY;
        const proto: object | null = Object.getPrototypeOf(value);
        return proto === null ? EMPTY : this.#capabilitiesOfPrototype(proto);
    }

    /**
     * The name of the user type a value is an instance of, or undefined for
     * plain objects, arrays, primitives and functions.
     */
    typeNameOf(value: unknown): string | undefined {
        if (typeof value !== 'object' || value === null || Array.isArray(value)) return undefined;
        const proto: object | null = Object.getPrototypeOf(value);
        if (proto === null || proto === Object.prototype) return undefined;

        const ctor = ownConstructor(proto);
        if (ctor === undefined) return undefined;
        const declared = this.#declarations.get(ctor);
        if (declared) return declared.name;
        return ctor.name !== '' && !isBuiltinTag(ctor.name) ? ctor.name : undefined;
    }

    /** The declared zero-argument factory of a named type, if any. */
    factoryFor(name: string): (() => object) | undefined {
        return this.#byName.get(name)?.create;
    }

    #capabilitiesOfPrototype(proto: object): ReadonlySet<string> {
        const cached = this.#cache.get(proto);
        if (cached) return cached;

        const parent: object | null = Object.getPrototypeOf(proto);
        const capabilities = new Set(parent === null ? EMPTY : this.#capabilitiesOfPrototype(parent));
        const ctor = ownConstructor(proto);
        if (ctor !== undefined) {
            if (ctor.name !== '') capabilities.add(ctor.name);
            const declared = this.#declarations.get(ctor);
            if (declared) {
                capabilities.add(declared.name);
                for (const trait of declared.traits) capabilities.add(trait);
            }
        }

        this.#cache.set(proto, capabilities);
        return capabilities;
    }

    #identifier(name: string): string {
        const tag = canonicalTag(name);
        if (isBuiltinTag(tag)) throw new InvalidTypeNameError(name, 'Reserved type name');
        return tag;
    }
}
