// =============================================================================
// lib/logger.ts — pino root logger.
//
// One root logger per process, created from AppConfig in the container.
// Modules take a child logger ({ module: 'tokens' }, { module: 'http' }, …)
// instead of importing a global, so tests can hand in a silent instance.
//
// Redaction: refresh tokens, verification tokens, passwords and the raw
// cookie / authorization headers never reach the log stream.
// =============================================================================

import pino, { type Logger } from 'pino';
import type { LogLevel } from '../config';

export type { Logger };

const REDACTED_PATHS = [
    'refreshToken',
    'token',
    'password',
    'passwordHash',
    'req.headers.cookie',
    'req.headers.authorization',
];

export function createLogger(level: LogLevel, destination?: pino.DestinationStream): Logger {
    return pino(
        {
            level,
            base: { service: 'talent-hub-api' },
            redact: { paths: REDACTED_PATHS, censor: '[redacted]' },
        },
        destination,
    );
}

/** Logger that discards everything — for tests and scripts. */
export function silentLogger(): Logger {
    return pino({ level: 'silent' });
}
