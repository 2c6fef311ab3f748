// =============================================================================
// config/index.ts — typed runtime configuration.
//
// Every tunable the server reads lives here.  loadConfig() validates the
// environment once at startup and returns a plain object that is passed to
// the container; no service reads process.env on its own.
//
// A misconfiguration fails fast with every offending variable listed, e.g.
//   [config] Invalid environment:
//     JWT_SECRET: String must contain at least 16 character(s)
// =============================================================================

import { z } from 'zod';

// ─── Helpers ──────────────────────────────────────────────────────────────────

const positiveInt = (fallback: number) =>
    z.coerce.number().int().positive().default(fallback);

// ─── Schema ───────────────────────────────────────────────────────────────────

const EnvSchema = z
    .object({
        NODE_ENV:     z.enum(['development', 'test', 'production']).default('development'),
        PORT:         positiveInt(3000),
        LOG_LEVEL:    z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

        // ── Storage ──────────────────────────────────────────────────────────
        STORAGE_DRIVER:          z.enum(['postgres', 'memory']).default('postgres'),
        DATABASE_URL:            z.string().url().optional(),
        DB_STATEMENT_TIMEOUT_MS: positiveInt(5_000),

        // ── Tokens ───────────────────────────────────────────────────────────
        JWT_SECRET:                  z.string().min(16),
        JWT_ISSUER:                  z.string().min(1).default('talent-hub'),
        ACCESS_TOKEN_EXPIRE_MINUTES: positiveInt(15),
        REFRESH_TOKEN_EXPIRE_DAYS:   positiveInt(7),
        REFRESH_REUSE_POLICY:        z.enum(['reject', 'revoke_all']).default('reject'),

        EMAIL_VERIFICATION_EXPIRE_HOURS: positiveInt(24),

        // ── HTTP ─────────────────────────────────────────────────────────────
        ALLOWED_ORIGINS:           z.string().default('http://localhost:3000'),
        REDIS_URL:                 z.string().url().optional(),
        RATE_LIMIT_LOGIN:          z.string().default('5/minute'),
        RATE_LIMIT_VERIFY_REQUEST: z.string().default('10/hour'),
        BASE_URL:                  z.string().url().default('http://localhost:3000'),
    })
    .superRefine((env, ctx) => {
        if (env.STORAGE_DRIVER === 'postgres' && !env.DATABASE_URL) {
            ctx.addIssue({
                code:    z.ZodIssueCode.custom,
                path:    ['DATABASE_URL'],
                message: 'Required when STORAGE_DRIVER=postgres',
            });
        }
    });

type Env = z.infer<typeof EnvSchema>;

// ─── Public shape ─────────────────────────────────────────────────────────────

export type ReusePolicy = Env['REFRESH_REUSE_POLICY'];
export type StorageDriver = Env['STORAGE_DRIVER'];
export type LogLevel = Env['LOG_LEVEL'];

export interface AppConfig {
    env: Env['NODE_ENV'];
    port: number;
    logLevel: LogLevel;
    storage: {
        driver: StorageDriver;
        databaseUrl?: string;
        statementTimeoutMs: number;
    };
    tokens: {
        secret: string;
        issuer: string;
        accessTtlMinutes: number;
        refreshTtlDays: number;
        reusePolicy: ReusePolicy;
    };
    emailVerificationTtlHours: number;
    http: {
        allowedOrigins: string[];
        baseUrl: string;
        secureCookies: boolean;
    };
    rateLimit: {
        redisUrl?: string;
        login: string;
        verifyRequest: string;
    };
}

// ─── Loader ───────────────────────────────────────────────────────────────────

/**
 * Validate an environment map and build the AppConfig.
 * Throws with a readable, multi-line message when anything is invalid.
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = EnvSchema.safeParse(source);

    if (!parsed.success) {
        const lines = parsed.error.errors.map((e) => `  ${e.path.join('.')}: ${e.message}`);
        throw new Error(`[config] Invalid environment:\n${lines.join('\n')}`);
    }

    const env = parsed.data;

    const allowedOrigins = env.ALLOWED_ORIGINS
        .split(',')
        .map((o) => o.trim())
        .filter((o) => o.length > 0);

    // A localhost origin in production is always a deployment mistake.
    if (env.NODE_ENV === 'production') {
        const hasLocalhost = allowedOrigins.some(
            (o) => o.includes('localhost') || o.includes('127.0.0.1'),
        );
        if (hasLocalhost) {
            throw new Error('[config] ALLOWED_ORIGINS contains localhost in production.');
        }
    }

    return {
        env:      env.NODE_ENV,
        port:     env.PORT,
        logLevel: env.LOG_LEVEL,
        storage: {
            driver:             env.STORAGE_DRIVER,
            databaseUrl:        env.DATABASE_URL,
            statementTimeoutMs: env.DB_STATEMENT_TIMEOUT_MS,
        },
        tokens: {
            secret:           env.JWT_SECRET,
            issuer:           env.JWT_ISSUER,
            accessTtlMinutes: env.ACCESS_TOKEN_EXPIRE_MINUTES,
            refreshTtlDays:   env.REFRESH_TOKEN_EXPIRE_DAYS,
            reusePolicy:      env.REFRESH_REUSE_POLICY,
        },
        emailVerificationTtlHours: env.EMAIL_VERIFICATION_EXPIRE_HOURS,
        http: {
            allowedOrigins,
            baseUrl:       env.BASE_URL,
            secureCookies: env.NODE_ENV === 'production',
        },
        rateLimit: {
            redisUrl:      env.REDIS_URL,
            login:         env.RATE_LIMIT_LOGIN,
            verifyRequest: env.RATE_LIMIT_VERIFY_REQUEST,
        },
    };
}
