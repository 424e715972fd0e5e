/**
 * @module typed-collections
 * Typed containers with arbitrary keys: Dictionary, Sequence and TypedSet,
 * built on a runtime type-constraint engine (TypeSet) and a canonical key
 * encoder (KeyCodec).
 */

export { TypeTag, canonicalTag, basicTagOf, isBuiltinTag, isPseudoTag } from './type-tag';
export type { BuiltinTag, TagName, ConcreteTag } from './type-tag';
export { TypeSet } from './type-set';
export type { TypeSpec } from './type-set';
export { IdentityRegistry } from './identity-registry';
export type { IdentityBearing } from './identity-registry';
export { KeyCodec } from './key-codec';
export { CapabilityRegistry } from './capabilities';
export type { Constructor, TypeDeclaration } from './capabilities';
export { CollectionContext, createContext, defaultContext, encodeKey } from './context';
export type { ContextOptions } from './context';
export { Pair } from './pair';
export { Collection } from './collection';
export type { CollectionOptions, TypeConstraint } from './collection';
export { Dictionary } from './dictionary';
export type { DictionarySource } from './dictionary';
export { Sequence } from './sequence';
export { TypedSet } from './typed-set';
export { abbreviate, compareValues } from './format';
export {
    CollectionError,
    DuplicateKeyError,
    IndexOutOfRangeError,
    InvalidArgumentError,
    InvalidKeyError,
    InvalidTypeNameError,
    NoDefaultAvailableError,
    TypeMismatchError,
    UnknownKeyError,
} from './errors';
export { createLogger, LogLevel, WinstonLogger } from './logger';
export type { Logger, LoggerOptions, LogContext } from './logger';
export { getEnvLogLevel } from './env';
