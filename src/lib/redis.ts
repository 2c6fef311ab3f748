// =============================================================================
// lib/redis.ts — ioredis client for the rate-limit store.
//
// Redis is OPTIONAL.  Without REDIS_URL the container never calls
// createRedis() and the limiters fall back to express-rate-limit's in-process
// MemoryStore (limits then reset on restart and are per instance).
//
// ioredis connects lazily and reconnects with backoff; the 'error' listener
// keeps a Redis outage from crashing the process.
// =============================================================================

import Redis from 'ioredis';
import type { Logger } from './logger';

const MAX_RECONNECT_DELAY_MS = 5_000;

export function createRedis(url: string, logger: Logger): Redis {
    const log = logger.child({ module: 'redis' });

    const client = new Redis(url, {
        connectTimeout:       5_000,
        commandTimeout:       3_000,
        maxRetriesPerRequest: 1,     // fail fast per command
        enableReadyCheck:     true,
        lazyConnect:          true,
        retryStrategy(times: number) {
            const delay = Math.min(times * 200, MAX_RECONNECT_DELAY_MS);
            log.warn({ attempt: times, delay }, 'reconnecting');
            return delay;
        },
    });

    client.on('ready', () => log.info('ready'));
    client.on('error', (err: Error) => log.error({ err }, 'redis error'));
    client.on('close', () => log.debug('connection closed'));

    return client;
}

/** QUIT, falling back to a hard disconnect when the server is unreachable. */
export async function disconnectRedis(client: Redis, logger: Logger): Promise<void> {
    try {
        await client.quit();
    } catch (err) {
        logger.warn({ err }, '[redis] QUIT failed, disconnecting');
        client.disconnect();
    }
}
