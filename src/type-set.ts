/**
 * @module type-set
 * Runtime type constraints.
 *
 * A TypeSet is a set of tag names forming a union type. It is built from a
 * compact specification (`'int'`, `'int|string'`, `'?Point'`), grows through
 * `add` and `infer`, and never shrinks.
 *
 * Semantics:
 * - An empty set, or one containing `mixed`, accepts every value including null.
 * - Pseudo-tags expand when matching: `scalar` is bool|int|float|string,
 *   `number` is int|float, `iterable` is arrays and iterable objects.
 * - Named tags match objects whose capability set contains the name.
 */

import { canonicalTag, isBuiltinTag, matchesBuiltin, basicTagOf, TagName, TypeTag } from './type-tag';
import { CollectionContext, defaultContext } from './context';
import { InvalidTypeNameError, NoDefaultAvailableError, TypeMismatchError } from './errors';
import { Logger } from './logger';

/**
 * Anything a TypeSet can be built from: a specification string, several of
 * them, another TypeSet, or nothing at all.
 */
export type TypeSpec = string | Iterable<string> | TypeSet | null | undefined;

const NULLABLE = '?';
const UNION = '|';

/**
 * Splits a specification string into canonical tag names.
 * Grammar: `spec := '?'? tag ('|' tag)*`.
 */
function parseSpec(spec: string): TagName[] {
    let body = spec.trim();
    const tags: TagName[] = [];
    if (body.startsWith(NULLABLE)) {
        tags.push(TypeTag.Null);
        body = body.slice(1);
    }
    for (const part of body.split(UNION)) {
        if (part.trim() === '') throw new InvalidTypeNameError(spec, 'Empty type name in specification');
        tags.push(canonicalTag(part));
    }
    return tags;
}

export class TypeSet implements Iterable<TagName> {
    readonly #tags = new Set<TagName>();
    readonly #context: CollectionContext;
    readonly #logger: Logger;

    /**
     * @param spec - Initial constraint; omitted or null means "any value".
     * @param context - Supplies the capability registry for named types.
     * @throws InvalidTypeNameError if a name is malformed.
     */
    constructor(spec?: TypeSpec, context: CollectionContext = defaultContext) {
        this.#context = context;
        this.#logger = context.logger;
        this.add(spec);
    }

    static fromSpec(spec?: TypeSpec, context?: CollectionContext): TypeSet {
        return new TypeSet(spec, context);
    }

    get size(): number { return this.#tags.size; }

    /**
     * Grows the set.
     * @throws InvalidTypeNameError if a name is malformed.
     */
    add(spec: TypeSpec): this {
        if (spec === null || spec === undefined) return this;
        if (typeof spec === 'string') {
            for (const tag of parseSpec(spec)) this.#tags.add(tag);
            return this;
        }
        if (spec instanceof TypeSet) {
            for (const tag of spec) this.#tags.add(tag);
            return this;
        }
        for (const item of spec) {
            if (typeof item !== 'string') {
                throw new InvalidTypeNameError(String(item), 'Type names must be strings');
            }
            this.add(item);
        }
        return this;
    }

    /**
     * Adds the concrete tag of a value, so that the value (and others like it)
     * match from now on.
     */
    infer(value: unknown): this {
        const tag = this.tagOf(value);
        if (!this.#tags.has(tag)) {
            this.#tags.add(tag);
            this.#logger.debug('Inferred type', {tag, types: this.toString()});
        }
        return this;
    }

    /** Alias of `infer`. */
    addValueType(value: unknown): this {
        return this.infer(value);
    }

    /** The concrete tag of a value: its user type name if it has one, else its builtin tag. */
    tagOf(value: unknown): TagName {
        return this.#context.capabilities.typeNameOf(value) ?? basicTagOf(value);
    }

    match(value: unknown): boolean {
        if (this.anyOk()) return true;

        let capabilities: ReadonlySet<string> | undefined;
        for (const tag of this.#tags) {
            if (isBuiltinTag(tag)) {
                if (matchesBuiltin(tag, value)) return true;
                continue;
            }
            capabilities ??= this.#context.capabilities.capabilitiesOf(value);
            if (capabilities.has(tag)) return true;
        }
        return false;
    }

    /**
     * @param label - Role of the value, used in the error message.
     * @throws TypeMismatchError if the value does not match.
     */
    check(value: unknown, label = 'value'): void {
        if (!this.match(value)) throw new TypeMismatchError(label, [...this.#tags], this.tagOf(value));
    }

    contains(name: string): boolean {
        return this.#tags.has(canonicalTag(name));
    }

    containsAll(...names: string[]): boolean {
        return names.every((name) => this.contains(name));
    }

    containsAny(...names: string[]): boolean {
        return names.some((name) => this.contains(name));
    }

    /** True if the set holds exactly the given names, in any order. */
    containsOnly(...names: string[]): boolean {
        const wanted = new Set(names.map((name) => canonicalTag(name)));
        return wanted.size === this.#tags.size && this.containsAll(...wanted);
    }

    isEmpty(): boolean { return this.#tags.size === 0; }

    /** True if every value is accepted. */
    anyOk(): boolean {
        return this.#tags.size === 0 || this.#tags.has(TypeTag.Anything);
    }

    /** True if null is accepted. */
    nullOk(): boolean {
        return this.anyOk() || this.#tags.has(TypeTag.Null);
    }

    /**
     * Derives the zero value of the constraint. Priority: null, false, 0
     * (int, number, scalar), 0 (float), '', [] (array, iterable), {} (object),
     * then the declared factory of a named member.
     * @throws NoDefaultAvailableError if none applies.
     */
    defaultValue(): unknown {
        const has = (...tags: TagName[]) => tags.some((tag) => this.#tags.has(tag));
        if (this.nullOk()) return null;
        if (has(TypeTag.Bool)) return false;
        if (has(TypeTag.Int, TypeTag.AnyNumber, TypeTag.AnyScalar)) return 0;
        if (has(TypeTag.Float)) return 0;
        if (has(TypeTag.Text)) return '';
        if (has(TypeTag.Composite, TypeTag.AnyIterable)) return [];
        if (has(TypeTag.AnyObject)) return {};

        for (const tag of this.#tags) {
            if (isBuiltinTag(tag)) continue;
            const create = this.#context.capabilities.factoryFor(tag);
            if (create) return create();
        }
        throw new NoDefaultAvailableError([...this.#tags]);
    }

    clone(): TypeSet {
        return new TypeSet(this, this.#context);
    }

    [Symbol.iterator](): Iterator<TagName> { return this.#tags.values(); }

    toString(): string { return `{${[...this.#tags].join(', ')}}`; }
    [Symbol.for('nodejs.util.inspect.custom')]() { return `TypeSet ${this.toString()}`; }
}
