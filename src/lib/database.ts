// =============================================================================
// lib/database.ts — persistence port shared by every service.
//
// Services never hold a connection.  They ask the Database for a unit of work:
//
//   await db.transaction(async (uow) => {
//       const row = await uow.refreshTokens.findForUpdate(token);
//       ...
//   });
//
// The callback runs inside ONE transaction.  When it resolves the work is
// committed; when it throws, everything it wrote is rolled back and the error
// propagates unchanged.  Rows read through a *ForUpdate method stay locked
// until the transaction ends, so a second transaction touching the same row
// waits and then sees the committed state.
//
// Two implementations:
//   lib/postgres.ts        — pg Pool, SELECT … FOR UPDATE
//   lib/memoryDatabase.ts  — in-process, serialised copy-on-write
// =============================================================================

import { AppError } from '../middleware/errorHandler';

// ─── Records ──────────────────────────────────────────────────────────────────

export type UserRole = 'admin' | 'manager' | 'employee';

export const USER_ROLES: readonly UserRole[] = ['admin', 'manager', 'employee'];

export interface UserRecord {
    id: string;
    email: string;
    passwordHash: string;
    fullName: string;
    role: UserRole;
    isActive: boolean;
    isVerified: boolean;
    createdAt: Date;
    updatedAt: Date;
    lastLoginAt: Date | null;
}

export interface NewUser {
    email: string;
    passwordHash: string;
    fullName: string;
    role: UserRole;
}

export interface UserChanges {
    fullName?: string;
    passwordHash?: string;
}

/**
 * Server-side refresh-token session.
 * Immutable except for isRevoked, which only ever goes false → true.
 */
export interface RefreshTokenRecord {
    token: string;
    userId: string;
    expiresAt: Date;
    isRevoked: boolean;
    createdAt: Date;
}

export interface VerificationTokenRecord {
    token: string;
    userId: string;
    expiresAt: Date;
    consumed: boolean;
    createdAt: Date;
}

export interface AuditLogRecord {
    id: string;
    timestamp: Date;
    userId: string | null;
    action: string;
    targetType: string | null;
    targetId: string | null;
    details: Record<string, unknown>;
}

export type NewAuditLog = Omit<AuditLogRecord, 'id' | 'timestamp'>;

// ─── Repositories (transaction-scoped) ────────────────────────────────────────

export interface RefreshTokenRepository {
    /** Read one row and lock it until the transaction ends. */
    findForUpdate(token: string): Promise<RefreshTokenRecord | null>;
    insert(record: RefreshTokenRecord): Promise<void>;
    /** Flip isRevoked; resolves false when the row is absent or already revoked. */
    markRevoked(token: string): Promise<boolean>;
    /** Revoke every non-revoked row of the user whose expiry is after `now`. */
    revokeActiveForUser(userId: string, now: Date): Promise<number>;
}

export interface UserRepository {
    findById(id: string): Promise<UserRecord | null>;
    findByEmail(email: string): Promise<UserRecord | null>;
    /** Throws UniqueViolationError when the email is taken. */
    create(input: NewUser, now: Date): Promise<UserRecord>;
    update(id: string, changes: UserChanges, now: Date): Promise<UserRecord | null>;
    recordLogin(id: string, at: Date): Promise<void>;
    markVerified(id: string, now: Date): Promise<void>;
}

export interface VerificationTokenRepository {
    findForUpdate(token: string): Promise<VerificationTokenRecord | null>;
    insert(record: VerificationTokenRecord): Promise<void>;
    markConsumed(token: string): Promise<void>;
    deleteUnconsumedForUser(userId: string): Promise<number>;
}

export interface AuditLogRepository {
    append(entry: NewAuditLog, at: Date): Promise<AuditLogRecord>;
}

export interface UnitOfWork {
    users: UserRepository;
    refreshTokens: RefreshTokenRepository;
    verificationTokens: VerificationTokenRepository;
    auditLogs: AuditLogRepository;
}

export interface Database {
    transaction<T>(work: (uow: UnitOfWork) => Promise<T>): Promise<T>;
    /** Cheap connectivity check for /health and startup. */
    ping(): Promise<void>;
    close(): Promise<void>;
}

// ─── Errors ───────────────────────────────────────────────────────────────────

/**
 * Persistence failed (connection lost, statement timeout, serialisation
 * failure, …).  The surrounding transaction has been rolled back.
 */
export class StorageError extends AppError {
    constructor(public readonly operation: string, cause?: unknown) {
        super(500, 'STORAGE_ERROR', 'A storage error occurred. Please try again.');
        this.name = 'StorageError';
        this.cause = cause;
    }
}

/** A unique index rejected a write. */
export class UniqueViolationError extends Error {
    constructor(public readonly constraint: string) {
        super(`Unique constraint violated: ${constraint}`);
        this.name = 'UniqueViolationError';
    }
}
