// =============================================================================
// Composition root — builds every long-lived object from an AppConfig.
//
// index.ts calls createContainer(loadConfig()); tests pass overrides (an
// in-memory database, a pinned clock, a recording mailer) instead of touching
// module state.
// =============================================================================

import type Redis from 'ioredis';
import type { AppConfig } from './config';
import { type Clock, systemClock } from './lib/clock';
import type { Database } from './lib/database';
import { createLogger, type Logger } from './lib/logger';
import { MemoryDatabase } from './lib/memoryDatabase';
import { createPostgresDatabase } from './lib/postgres';
import { createRedis, disconnectRedis } from './lib/redis';
import { AuditService } from './services/audit.service';
import { AuthService } from './services/auth.service';
import { ConsoleMailer, type Mailer } from './services/email.service';
import { TokenService } from './services/token.service';

export interface Container {
    config: AppConfig;
    logger: Logger;
    db: Database;
    /** null when REDIS_URL is unset; rate limits are then per process. */
    redis: Redis | null;
    tokens: TokenService;
    audit: AuditService;
    auth: AuthService;
    close(): Promise<void>;
}

export interface ContainerOverrides {
    logger?: Logger;
    db?: Database;
    mailer?: Mailer;
    clock?: Clock;
    redis?: Redis | null;
}

function createDatabase(config: AppConfig, logger: Logger): Database {
    return config.storage.driver === 'memory'
        ? new MemoryDatabase()
        : createPostgresDatabase(config.storage, logger.child({ module: 'postgres' }));
}

export function createContainer(config: AppConfig, overrides: ContainerOverrides = {}): Container {
    const logger = overrides.logger ?? createLogger(config.logLevel);
    const clock = overrides.clock ?? systemClock;
    const db = overrides.db ?? createDatabase(config, logger);
    const redis = overrides.redis !== undefined
        ? overrides.redis
        : config.rateLimit.redisUrl ? createRedis(config.rateLimit.redisUrl, logger) : null;

    const tokens = new TokenService(db, config.tokens, logger, clock);
    const audit = new AuditService(db, logger, clock);
    const auth = new AuthService(
        db,
        tokens,
        audit,
        overrides.mailer ?? new ConsoleMailer(logger),
        { emailVerificationTtlHours: config.emailVerificationTtlHours, baseUrl: config.http.baseUrl },
        logger,
        clock,
    );

    return {
        config,
        logger,
        db,
        redis,
        tokens,
        audit,
        auth,
        async close() {
            await Promise.all([
                db.close(),
                redis ? disconnectRedis(redis, logger) : Promise.resolve(),
            ]);
        },
    };
}
