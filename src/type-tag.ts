/**
 * @module type-tag
 * Closed vocabulary of builtin type tags, plus the grammar for named types.
 *
 * Concrete tags describe a single runtime kind. Pseudo-tags (`scalar`,
 * `number`, `iterable`, `mixed`) name a category of concrete tags and only
 * ever appear in constraints, never as the tag of a value.
 */

import { InvalidTypeNameError } from './errors';

export const TypeTag = {
    Null: 'null',
    Bool: 'bool',
    Int: 'int',
    Float: 'float',
    Text: 'string',
    Composite: 'array',
    AnyObject: 'object',
    Handle: 'symbol',
    Callable: 'callable',
    AnyScalar: 'scalar',
    AnyNumber: 'number',
    AnyIterable: 'iterable',
    Anything: 'mixed',
} as const;

export type BuiltinTag = typeof TypeTag[keyof typeof TypeTag];

/** A builtin tag or the identifier of a named (user) type. */
export type TagName = BuiltinTag | (string & {});

export type ConcreteTag = Exclude<BuiltinTag, 'scalar' | 'number' | 'iterable' | 'mixed'>;

const BUILTIN_TAGS: ReadonlySet<string> = new Set<string>(Object.values(TypeTag));

const PSEUDO_TAGS: ReadonlySet<string> = new Set<string>([
    TypeTag.AnyScalar,
    TypeTag.AnyNumber,
    TypeTag.AnyIterable,
    TypeTag.Anything,
]);

const ALIASES: Readonly<Record<string, BuiltinTag>> = {
    boolean: TypeTag.Bool,
    integer: TypeTag.Int,
    bigint: TypeTag.Int,
    double: TypeTag.Float,
    text: TypeTag.Text,
    list: TypeTag.Composite,
    function: TypeTag.Callable,
    resource: TypeTag.Handle,
    handle: TypeTag.Handle,
    any: TypeTag.Anything,
    unknown: TypeTag.Anything,
    undefined: TypeTag.Null,
};

/** Dot-separated identifier segments, e.g. `Point` or `geometry.Point`. */
const IDENTIFIER = /^[A-Za-z_$][\w$]*(?:\.[A-Za-z_$][\w$]*)*$/;

export function isBuiltinTag(name: string): name is BuiltinTag {
    return BUILTIN_TAGS.has(name);
}

export function isPseudoTag(name: string): boolean {
    return PSEUDO_TAGS.has(name);
}

/**
 * Normalises a single type name: trims it, resolves aliases and strips a
 * leading namespace separator from named types.
 * @throws InvalidTypeNameError if the name is neither builtin nor a legal identifier.
 */
export function canonicalTag(raw: string): TagName {
    const name = raw.trim();
    if (isBuiltinTag(name)) return name;
    if (Object.hasOwn(ALIASES, name)) return ALIASES[name];

    const bare = name.startsWith('\\') ? name.slice(1) : name;
    if (!IDENTIFIER.test(bare)) throw new InvalidTypeNameError(raw);
    return bare;
}

/**
 * The concrete builtin tag of a value. Instances of user types report
 * `object` here; see `CapabilityRegistry.typeNameOf` for their names.
 */
export function basicTagOf(value: unknown): ConcreteTag {
    switch (typeof value) {
        case 'undefined': return TypeTag.Null;
        case 'boolean': return TypeTag.Bool;
        case 'bigint': return TypeTag.Int;
        case 'number': return Number.isInteger(value) ? TypeTag.Int : TypeTag.Float;
        case 'string': return TypeTag.Text;
        case 'symbol': return TypeTag.Handle;
        case 'function': return TypeTag.Callable;
        default:
            if (value === null) return TypeTag.Null;
            return Array.isArray(value) ? TypeTag.Composite : TypeTag.AnyObject;
    }
}

export function isIterable(value: unknown): boolean {
    if (Array.isArray(value)) return true;
    if (value === null || (typeof value !== 'object' && typeof value !== 'function')) return false;
    return typeof Reflect.get(value, Symbol.iterator) === 'function';
}

/**
 * Tests a value against a single builtin tag, expanding pseudo-tags.
 */
export function matchesBuiltin(tag: BuiltinTag, value: unknown): boolean {
    switch (tag) {
        case TypeTag.Null: return value === null || value === undefined;
        case TypeTag.Bool: return typeof value === 'boolean';
        case TypeTag.Int: return typeof value === 'bigint' || Number.isInteger(value);
        case TypeTag.Float: return typeof value === 'number';
        case TypeTag.Text: return typeof value === 'string';
        case TypeTag.Composite: return Array.isArray(value);
        case TypeTag.AnyObject: return typeof value === 'object' && value !== null && !Array.isArray(value);
        case TypeTag.Handle: return typeof value === 'symbol';
        case TypeTag.Callable: return typeof value === 'function';
        case TypeTag.AnyScalar:
            return typeof value === 'boolean' || typeof value === 'string'
                || typeof value === 'number' || typeof value === 'bigint';
        case TypeTag.AnyNumber: return typeof value === 'number' || typeof value === 'bigint';
        case TypeTag.AnyIterable: return isIterable(value);
        case TypeTag.Anything: return true;
    }
}
