// =============================================================================
// middleware/rateLimiter.ts — per-route Express rate limiters.
//
// Applied to POST /auth/login (RATE_LIMIT_LOGIN) and
// POST /auth/verify/request (RATE_LIMIT_VERIFY_REQUEST).  Limits are written
// as "<count>/<unit>", e.g. "5/minute" or "10/hour".
//
// Store strategy
// ──────────────
//   Redis client given → rate-limit-redis (RedisStore), keys rl:<prefix>:<IP>
//                        shared by every instance, survives restarts.
//   no Redis           → express-rate-limit MemoryStore, per process.
//
// Each limiter gets its own store: express-rate-limit refuses to share one
// store between limiters, and the prefixes keep their counters apart.
//
// 429 responses use the standard error envelope.
// =============================================================================

import rateLimit, { MemoryStore, type RateLimitRequestHandler, type Store } from 'express-rate-limit';
import type Redis from 'ioredis';
import RedisStore from 'rate-limit-redis';
import { sendError } from '../utils/response';

// ─── Rate strings ─────────────────────────────────────────────────────────────

export interface Rate {
    limit: number;
    windowMs: number;
}

const UNIT_MS: Record<string, number> = {
    second: 1_000,
    minute: 60_000,
    hour:   3_600_000,
    day:    86_400_000,
};

/** "5/minute" → { limit: 5, windowMs: 60000 }.  Plural units are accepted. */
export function parseRate(rate: string): Rate {
    const match = /^\s*(\d+)\s*\/\s*([a-z]+?)s?\s*$/i.exec(rate);
    const unitMs = match ? UNIT_MS[match[2].toLowerCase()] : undefined;
    const limit = match ? Number(match[1]) : 0;

    if (!match || unitMs === undefined || limit <= 0) {
        throw new Error(`[rateLimiter] Invalid rate "${rate}". Expected "<count>/<second|minute|hour|day>".`);
    }
    return { limit, windowMs: unitMs };
}

// ─── Store ────────────────────────────────────────────────────────────────────

// The options are a union of single-node and cluster shapes; take the
// single-node one.
type SingleNodeOptions = Extract<ConstructorParameters<typeof RedisStore>[0], { sendCommand: unknown }>;
type RedisReply = Awaited<ReturnType<SingleNodeOptions['sendCommand']>>;

function buildStore(prefix: string, redis: Redis | null): Store {
    if (!redis) return new MemoryStore();

    return new RedisStore({
        prefix: `rl:${prefix}:`,
        // ioredis returns untyped replies; rate-limit-redis only issues
        // SCRIPT LOAD / EVALSHA, whose replies fit RedisReply.
        sendCommand: (command: string, ...args: string[]) =>
            redis.call(command, ...args) as Promise<RedisReply>,
    });
}

// ─── Factory ──────────────────────────────────────────────────────────────────

/**
 * Usage (in route files, not app-wide):
 *   router.post('/login', createRateLimiter('5/minute', 'login', redis), handler);
 */
export function createRateLimiter(rate: string, prefix: string, redis: Redis | null): RateLimitRequestHandler {
    const { limit, windowMs } = parseRate(rate);

    return rateLimit({
        windowMs,
        limit,
        standardHeaders: 'draft-7',
        legacyHeaders:   false,
        store:           buildStore(prefix, redis),
        handler: (_req, res) => {
            const retryAfterSecs = Math.ceil(windowMs / 1000);
            sendError(res, 429, 'RATE_LIMIT_EXCEEDED',
                `Too many requests. You may retry after ${retryAfterSecs} seconds.`);
        },
    });
}
