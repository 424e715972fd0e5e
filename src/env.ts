import { isLogLevel, LogLevel } from './logger';

/**
 * Resolves the log level from the environment.
 * `COLLECTIONS_LOG_LEVEL` wins over `LOG_LEVEL`; `DEBUG` and `VERBOSE` are shorthands.
 * Returns null (silent) when nothing usable is set.
 */
export function getEnvLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel | null {
    const explicit = env['COLLECTIONS_LOG_LEVEL'] ?? env['LOG_LEVEL'];
    if (explicit && isLogLevel(explicit)) return explicit;
    if (env['DEBUG']) return LogLevel.debug;
    if (env['VERBOSE']) return LogLevel.verbose;
    return null;
}
