// =============================================================================
// lib/postgres.ts — pg-backed Database.
//
// Connection model
// ────────────────
// One Pool per process.  Each transaction() checks out a dedicated client,
// runs BEGIN … COMMIT on it and releases it in `finally`, so a connection is
// held only for the duration of one unit of work.
//
// Locking
// ───────
// findForUpdate() issues SELECT … FOR UPDATE.  Under READ COMMITTED a
// concurrent transaction blocked on the same row re-reads it once the holder
// commits, so the loser of two simultaneous rotations sees is_revoked = TRUE.
//
// Failure model
// ─────────────
// Every driver error is translated at the query boundary:
//   23505 unique_violation → UniqueViolationError
//   anything else          → StorageError (HTTP 500)
// The transaction is then rolled back.  statement_timeout (config
// DB_STATEMENT_TIMEOUT_MS) bounds a stuck statement; Postgres aborts it and
// the same rollback path runs.
// =============================================================================

import { Pool, type PoolClient, type QueryResult, type QueryResultRow } from 'pg';
import type { AppConfig } from '../config';
import type { Logger } from './logger';
import {
    type AuditLogRecord,
    type Database,
    type RefreshTokenRecord,
    type UnitOfWork,
    type UserRecord,
    type UserRole,
    type VerificationTokenRecord,
    StorageError,
    UniqueViolationError,
} from './database';

// ─── Raw row shapes ───────────────────────────────────────────────────────────

interface UserRow {
    id: string;
    email: string;
    password_hash: string;
    full_name: string;
    role: UserRole;
    is_active: boolean;
    is_verified: boolean;
    created_at: Date;
    updated_at: Date;
    last_login_at: Date | null;
}

interface RefreshTokenRow {
    token: string;
    user_id: string;
    expires_at: Date;
    is_revoked: boolean;
    created_at: Date;
}

interface VerificationTokenRow {
    token: string;
    user_id: string;
    expires_at: Date;
    consumed: boolean;
    created_at: Date;
}

interface AuditLogRow {
    id: string;
    timestamp: Date;
    user_id: string | null;
    action: string;
    target_type: string | null;
    target_id: string | null;
    details: Record<string, unknown> | null;
}

const USER_COLUMNS =
    'id, email, password_hash, full_name, role, is_active, is_verified, created_at, updated_at, last_login_at';
const REFRESH_COLUMNS = 'token, user_id, expires_at, is_revoked, created_at';
const VERIFICATION_COLUMNS = 'token, user_id, expires_at, consumed, created_at';

const toUser = (row: UserRow): UserRecord => ({
    id:           row.id,
    email:        row.email,
    passwordHash: row.password_hash,
    fullName:     row.full_name,
    role:         row.role,
    isActive:     row.is_active,
    isVerified:   row.is_verified,
    createdAt:    row.created_at,
    updatedAt:    row.updated_at,
    lastLoginAt:  row.last_login_at,
});

const toRefreshToken = (row: RefreshTokenRow): RefreshTokenRecord => ({
    token:     row.token,
    userId:    row.user_id,
    expiresAt: row.expires_at,
    isRevoked: row.is_revoked,
    createdAt: row.created_at,
});

const toVerificationToken = (row: VerificationTokenRow): VerificationTokenRecord => ({
    token:     row.token,
    userId:    row.user_id,
    expiresAt: row.expires_at,
    consumed:  row.consumed,
    createdAt: row.created_at,
});

const toAuditLog = (row: AuditLogRow): AuditLogRecord => ({
    id:         row.id,
    timestamp:  row.timestamp,
    userId:     row.user_id,
    action:     row.action,
    targetType: row.target_type,
    targetId:   row.target_id,
    details:    row.details ?? {},
});

// ─── Query boundary ───────────────────────────────────────────────────────────

/** Subset of PoolClient the repositories use; tests pass a fake. */
export type Queryable = Pick<PoolClient, 'query'>;

export interface SqlClient extends Queryable {
    release(err?: Error | boolean): void;
}

/** The slice of pg.Pool PostgresDatabase needs. */
export interface SqlPool extends Queryable {
    connect(): Promise<SqlClient>;
    end(): Promise<void>;
}

function uniqueConstraint(err: unknown): string | null {
    if (typeof err === 'object' && err !== null && 'code' in err && err.code === '23505') {
        return 'constraint' in err && typeof err.constraint === 'string' ? err.constraint : 'unknown';
    }
    return null;
}

async function exec<R extends QueryResultRow>(
    client: Queryable,
    operation: string,
    text: string,
    params: unknown[] = [],
): Promise<QueryResult<R>> {
    try {
        return await client.query<R>(text, params);
    } catch (err) {
        const constraint = uniqueConstraint(err);
        if (constraint) throw new UniqueViolationError(constraint);
        throw new StorageError(operation, err);
    }
}

const affected = (result: QueryResult): number => result.rowCount ?? 0;

// ─── Repositories over one client ─────────────────────────────────────────────

export function bindUnitOfWork(client: Queryable): UnitOfWork {
    return {
        users: {
            async findById(id) {
                const { rows } = await exec<UserRow>(client, 'users.findById',
                    `SELECT ${USER_COLUMNS} FROM users WHERE id = $1`, [id]);
                return rows[0] ? toUser(rows[0]) : null;
            },

            async findByEmail(email) {
                const { rows } = await exec<UserRow>(client, 'users.findByEmail',
                    `SELECT ${USER_COLUMNS} FROM users WHERE email = $1`, [email]);
                return rows[0] ? toUser(rows[0]) : null;
            },

            async create(input, now) {
                const { rows } = await exec<UserRow>(client, 'users.create',
                    `INSERT INTO users (email, password_hash, full_name, role, created_at, updated_at)
                     VALUES ($1, $2, $3, $4, $5, $5)
                     RETURNING ${USER_COLUMNS}`,
                    [input.email, input.passwordHash, input.fullName, input.role, now]);
                const row = rows[0];
                if (!row) throw new StorageError('users.create');
                return toUser(row);
            },

            async update(id, changes, now) {
                const { rows } = await exec<UserRow>(client, 'users.update',
                    `UPDATE users
                        SET full_name     = COALESCE($2, full_name),
                            password_hash = COALESCE($3, password_hash),
                            updated_at    = $4
                      WHERE id = $1
                  RETURNING ${USER_COLUMNS}`,
                    [id, changes.fullName ?? null, changes.passwordHash ?? null, now]);
                return rows[0] ? toUser(rows[0]) : null;
            },

            async recordLogin(id, at) {
                await exec(client, 'users.recordLogin',
                    'UPDATE users SET last_login_at = $2 WHERE id = $1', [id, at]);
            },

            async markVerified(id, now) {
                await exec(client, 'users.markVerified',
                    'UPDATE users SET is_verified = TRUE, updated_at = $2 WHERE id = $1', [id, now]);
            },
        },

        refreshTokens: {
            async findForUpdate(token) {
                const { rows } = await exec<RefreshTokenRow>(client, 'refreshTokens.findForUpdate',
                    `SELECT ${REFRESH_COLUMNS} FROM refresh_tokens WHERE token = $1 FOR UPDATE`, [token]);
                return rows[0] ? toRefreshToken(rows[0]) : null;
            },

            async insert(record) {
                await exec(client, 'refreshTokens.insert',
                    `INSERT INTO refresh_tokens (token, user_id, expires_at, is_revoked, created_at)
                     VALUES ($1, $2, $3, $4, $5)`,
                    [record.token, record.userId, record.expiresAt, record.isRevoked, record.createdAt]);
            },

            async markRevoked(token) {
                const result = await exec(client, 'refreshTokens.markRevoked',
                    'UPDATE refresh_tokens SET is_revoked = TRUE WHERE token = $1 AND is_revoked = FALSE',
                    [token]);
                return affected(result) > 0;
            },

            async revokeActiveForUser(userId, now) {
                const result = await exec(client, 'refreshTokens.revokeActiveForUser',
                    `UPDATE refresh_tokens SET is_revoked = TRUE
                      WHERE user_id = $1 AND is_revoked = FALSE AND expires_at > $2`,
                    [userId, now]);
                return affected(result);
            },
        },

        verificationTokens: {
            async findForUpdate(token) {
                const { rows } = await exec<VerificationTokenRow>(client, 'verificationTokens.findForUpdate',
                    `SELECT ${VERIFICATION_COLUMNS} FROM email_verification_tokens WHERE token = $1 FOR UPDATE`,
                    [token]);
                return rows[0] ? toVerificationToken(rows[0]) : null;
            },

            async insert(record) {
                await exec(client, 'verificationTokens.insert',
                    `INSERT INTO email_verification_tokens (token, user_id, expires_at, consumed, created_at)
                     VALUES ($1, $2, $3, $4, $5)`,
                    [record.token, record.userId, record.expiresAt, record.consumed, record.createdAt]);
            },

            async markConsumed(token) {
                await exec(client, 'verificationTokens.markConsumed',
                    'UPDATE email_verification_tokens SET consumed = TRUE WHERE token = $1', [token]);
            },

            async deleteUnconsumedForUser(userId) {
                const result = await exec(client, 'verificationTokens.deleteUnconsumedForUser',
                    'DELETE FROM email_verification_tokens WHERE user_id = $1 AND consumed = FALSE', [userId]);
                return affected(result);
            },
        },

        auditLogs: {
            async append(entry, at) {
                const { rows } = await exec<AuditLogRow>(client, 'auditLogs.append',
                    `INSERT INTO audit_logs (timestamp, user_id, action, target_type, target_id, details)
                     VALUES ($1, $2, $3, $4, $5, $6::jsonb)
                     RETURNING id, timestamp, user_id, action, target_type, target_id, details`,
                    [at, entry.userId, entry.action, entry.targetType, entry.targetId, JSON.stringify(entry.details)]);
                const row = rows[0];
                if (!row) throw new StorageError('auditLogs.append');
                return toAuditLog(row);
            },
        },
    };
}

// ─── Database ─────────────────────────────────────────────────────────────────

export class PostgresDatabase implements Database {
    constructor(
        private readonly pool: SqlPool,
        private readonly logger: Logger,
    ) {}

    async transaction<T>(work: (uow: UnitOfWork) => Promise<T>): Promise<T> {
        let client: SqlClient;
        try {
            client = await this.pool.connect();
        } catch (err) {
            throw new StorageError('connect', err);
        }

        // Set when ROLLBACK itself fails; the connection is then destroyed
        // instead of being returned to the pool in an unknown state.
        let broken: Error | undefined;

        try {
            await exec(client, 'begin', 'BEGIN');
            const result = await work(bindUnitOfWork(client));
            await exec(client, 'commit', 'COMMIT');
            return result;
        } catch (err) {
            try {
                await client.query('ROLLBACK');
            } catch (rollbackErr) {
                broken = rollbackErr instanceof Error ? rollbackErr : new Error(String(rollbackErr));
                this.logger.error({ err: rollbackErr }, 'rollback failed — discarding connection');
            }
            throw err;
        } finally {
            client.release(broken);
        }
    }

    async ping(): Promise<void> {
        await exec(this.pool, 'ping', 'SELECT 1');
    }

    async close(): Promise<void> {
        await this.pool.end();
    }
}

/** Build the pool and wrap it.  The pool connects lazily on first query. */
export function createPostgresDatabase(storage: AppConfig['storage'], logger: Logger): PostgresDatabase {
    if (!storage.databaseUrl) {
        throw new Error('[postgres] DATABASE_URL is required when STORAGE_DRIVER=postgres');
    }

    const pool = new Pool({
        connectionString:  storage.databaseUrl,
        statement_timeout: storage.statementTimeoutMs,
    });

    // An idle client losing its connection emits on the pool; without a
    // listener that would crash the process.
    pool.on('error', (err) => {
        logger.error({ err }, 'idle postgres client error');
    });

    return new PostgresDatabase(pool, logger);
}
