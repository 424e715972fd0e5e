/**
 * @module errors
 * Error taxonomy shared by the type engine and the containers.
 *
 * Every error is synchronous and terminates the current operation; nothing in
 * the library retries or recovers.
 */

/** Base class for every error raised by this library. */
export class CollectionError extends Error {
    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

/** A type specification is lexically malformed. */
export class InvalidTypeNameError extends CollectionError {
    constructor(readonly typeName: string, reason = 'Invalid type name') {
        super(`${reason}: '${typeName}'.`);
    }
}

/** A value does not satisfy a TypeSet. */
export class TypeMismatchError extends CollectionError {
    constructor(
        /** Role of the rejected value, e.g. 'key' or 'value'. */
        readonly label: string,
        readonly expected: readonly string[],
        readonly actual: string
    ) {
        super(`Disallowed ${label} type: expected {${expected.join(', ')}}, got ${actual}.`);
    }
}

/** A TypeSet has no derivable zero value. */
export class NoDefaultAvailableError extends CollectionError {
    constructor(readonly types: readonly string[]) {
        super('No default value could be determined for this TypeSet.');
    }
}

/** A lookup or removal targets a key with no entry. */
export class UnknownKeyError extends CollectionError {
    constructor(readonly key: unknown, description: string) {
        super(`Unknown key: ${description}.`);
    }
}

/** A value cannot be encoded as a key (NaN). */
export class InvalidKeyError extends CollectionError {
    constructor(readonly key: unknown, reason: string) {
        super(`Invalid key: ${reason}.`);
    }
}

/** An operation would have produced two entries for the same key. */
export class DuplicateKeyError extends CollectionError {}

/** A Sequence index is negative, fractional, or past the end. */
export class IndexOutOfRangeError extends CollectionError {
    constructor(readonly index: number, size: number) {
        super(`Index ${index} is out of range for a Sequence of size ${size}.`);
    }
}

/** An argument has an acceptable type but an unusable value. */
export class InvalidArgumentError extends CollectionError {}
