// =============================================================================
// lib/memoryDatabase.ts — in-process Database for tests and local development.
//
// Selected with STORAGE_DRIVER=memory.  Data lives for the life of the process.
//
// Transaction semantics mirror what the Postgres driver gives us:
//   - Transactions run one at a time (a promise queue), which is the
//     in-process equivalent of every transaction holding its row locks until
//     commit.  A second rotate() of the same token therefore always observes
//     the first one's committed revocation.
//   - Work runs against a copy of the tables; the copy replaces the live
//     tables only when the callback resolves.  A throw discards it (rollback).
//
// Records are stored as frozen-by-convention objects and replaced, never
// mutated, so a shallow copy of each Map is enough to isolate a transaction.
// =============================================================================

import { randomUUID } from 'node:crypto';
import {
    type AuditLogRecord,
    type Database,
    type RefreshTokenRecord,
    type UnitOfWork,
    type UserRecord,
    type VerificationTokenRecord,
    UniqueViolationError,
} from './database';

interface Tables {
    users: Map<string, UserRecord>;
    refreshTokens: Map<string, RefreshTokenRecord>;
    verificationTokens: Map<string, VerificationTokenRecord>;
    auditLogs: AuditLogRecord[];
}

function emptyTables(): Tables {
    return {
        users:              new Map(),
        refreshTokens:      new Map(),
        verificationTokens: new Map(),
        auditLogs:          [],
    };
}

function copyTables(t: Tables): Tables {
    return {
        users:              new Map(t.users),
        refreshTokens:      new Map(t.refreshTokens),
        verificationTokens: new Map(t.verificationTokens),
        auditLogs:          [...t.auditLogs],
    };
}

// ─── Repositories over one transaction's tables ───────────────────────────────

function bindUnitOfWork(t: Tables): UnitOfWork {
    return {
        users: {
            async findById(id) {
                const row = t.users.get(id);
                return row ? { ...row } : null;
            },

            async findByEmail(email) {
                for (const row of t.users.values()) {
                    if (row.email === email) return { ...row };
                }
                return null;
            },

            async create(input, now) {
                for (const row of t.users.values()) {
                    if (row.email === input.email) {
                        throw new UniqueViolationError('users_email_key');
                    }
                }
                const row: UserRecord = {
                    id:          randomUUID(),
                    ...input,
                    isActive:    true,
                    isVerified:  false,
                    createdAt:   now,
                    updatedAt:   now,
                    lastLoginAt: null,
                };
                t.users.set(row.id, row);
                return { ...row };
            },

            async update(id, changes, now) {
                const row = t.users.get(id);
                if (!row) return null;
                // Absent fields keep their value, as COALESCE does in SQL.
                const next: UserRecord = {
                    ...row,
                    fullName:     changes.fullName ?? row.fullName,
                    passwordHash: changes.passwordHash ?? row.passwordHash,
                    updatedAt:    now,
                };
                t.users.set(id, next);
                return { ...next };
            },

            async recordLogin(id, at) {
                const row = t.users.get(id);
                if (row) t.users.set(id, { ...row, lastLoginAt: at });
            },

            async markVerified(id, now) {
                const row = t.users.get(id);
                if (row) t.users.set(id, { ...row, isVerified: true, updatedAt: now });
            },
        },

        refreshTokens: {
            async findForUpdate(token) {
                const row = t.refreshTokens.get(token);
                return row ? { ...row } : null;
            },

            async insert(record) {
                if (t.refreshTokens.has(record.token)) {
                    throw new UniqueViolationError('refresh_tokens_token_key');
                }
                t.refreshTokens.set(record.token, { ...record });
            },

            async markRevoked(token) {
                const row = t.refreshTokens.get(token);
                if (!row || row.isRevoked) return false;
                t.refreshTokens.set(token, { ...row, isRevoked: true });
                return true;
            },

            async revokeActiveForUser(userId, now) {
                let count = 0;
                for (const row of t.refreshTokens.values()) {
                    if (row.userId === userId && !row.isRevoked && row.expiresAt > now) {
                        t.refreshTokens.set(row.token, { ...row, isRevoked: true });
                        count++;
                    }
                }
                return count;
            },
        },

        verificationTokens: {
            async findForUpdate(token) {
                const row = t.verificationTokens.get(token);
                return row ? { ...row } : null;
            },

            async insert(record) {
                if (t.verificationTokens.has(record.token)) {
                    throw new UniqueViolationError('email_verification_tokens_token_key');
                }
                t.verificationTokens.set(record.token, { ...record });
            },

            async markConsumed(token) {
                const row = t.verificationTokens.get(token);
                if (row) t.verificationTokens.set(token, { ...row, consumed: true });
            },

            async deleteUnconsumedForUser(userId) {
                let count = 0;
                for (const row of [...t.verificationTokens.values()]) {
                    if (row.userId === userId && !row.consumed) {
                        t.verificationTokens.delete(row.token);
                        count++;
                    }
                }
                return count;
            },
        },

        auditLogs: {
            async append(entry, at) {
                const row: AuditLogRecord = { id: randomUUID(), timestamp: at, ...entry };
                t.auditLogs.push(row);
                return { ...row };
            },
        },
    };
}

// ─── Database ─────────────────────────────────────────────────────────────────

export class MemoryDatabase implements Database {
    private tables: Tables = emptyTables();
    private queue: Promise<unknown> = Promise.resolve();

    transaction<T>(work: (uow: UnitOfWork) => Promise<T>): Promise<T> {
        const run = this.queue.then(async () => {
            const draft = copyTables(this.tables);
            const result = await work(bindUnitOfWork(draft));
            this.tables = draft;                       // commit
            return result;
        });
        // The caller receives `run` and its rejection; the queue only needs
        // to know the slot is free again.
        this.queue = run.then(
            () => undefined,
            () => undefined,
        );
        return run;
    }

    /** Committed audit entries, oldest first. */
    auditTrail(): AuditLogRecord[] {
        return this.tables.auditLogs.map((row) => ({ ...row }));
    }

    async ping(): Promise<void> {
        // always reachable
    }

    async close(): Promise<void> {
        this.tables = emptyTables();
    }
}
