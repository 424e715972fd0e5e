/**
 * @module context
 * The runtime context shared by containers: identity tokens, named-type
 * capabilities, the key codec and a logger.
 *
 * Containers that must agree on the identity of object keys need the same
 * context. Callers that pass none share `defaultContext`.
 */

import { CapabilityRegistry } from './capabilities';
import { IdentityRegistry } from './identity-registry';
import { KeyCodec } from './key-codec';
import { createLogger, Logger, LogLevel } from './logger';
import { getEnvLogLevel } from './env';

export interface ContextOptions {
    logger?: Logger;
    /** Log level for a new logger; ignored when `logger` is given. Defaults to the environment. */
    level?: LogLevel | null;
}

export class CollectionContext {
    readonly logger: Logger;
    readonly identities: IdentityRegistry;
    readonly capabilities: CapabilityRegistry;
    readonly codec: KeyCodec;

    constructor(options: ContextOptions = {}) {
        this.logger = options.logger ?? createLogger({
            level: options.level === undefined ? getEnvLogLevel() : options.level,
            module: 'collections',
        });
        this.identities = new IdentityRegistry(this.logger.child('identity'));
        this.capabilities = new CapabilityRegistry(this.logger.child('capabilities'));
        this.codec = new KeyCodec(this.identities);
    }
}

export function createContext(options: ContextOptions = {}): CollectionContext {
    return new CollectionContext(options);
}

export const defaultContext: CollectionContext = createContext();

/** Encodes a key with the default context's identity registry. */
export function encodeKey(value: unknown): string {
    return defaultContext.codec.encode(value);
}
