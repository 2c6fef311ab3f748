// =============================================================================
// Auth service — account use-cases built on top of the token service.
//
//   register            → user row (role employee), audit user.create
//   login               → credentials check, TokenService.issue()
//   refresh             → TokenService.rotate()
//   logout / logoutAll  → TokenService.revoke() / revokeAllForUser()
//   getProfile / updateProfile
//   requestEmailVerification / verifyEmail
//
// Every use-case acting for a signed-in caller re-reads the user and refuses
// a deactivated account with 403 USER_INACTIVE.
//
// Emails are stored and compared lower-cased.
//
// Login failure responses are identical for "no such email" and "wrong
// password", and both paths pay for one bcrypt comparison.
// =============================================================================

import { randomBytes } from 'node:crypto';
import { AppError } from '../middleware/errorHandler';
import { type Clock, systemClock } from '../lib/clock';
import { type Database, type UserRecord, UniqueViolationError } from '../lib/database';
import type { Logger } from '../lib/logger';
import type { UserProfile } from '../types';
import { DUMMY_PASSWORD_HASH, hashPassword, verifyPassword } from '../utils/hash';
import { AuditAction, type AuditService, type ClientContext } from './audit.service';
import { type Mailer, verificationLink } from './email.service';
import { RefreshTokenError } from './token.errors';
import type { RevokeResult, RotationResult, TokenPair, TokenService } from './token.service';

// ─── Types ────────────────────────────────────────────────────────────────────

export interface AuthServiceOptions {
    emailVerificationTtlHours: number;
    baseUrl: string;
}

export interface RegisterInput {
    email: string;
    password: string;
    fullName: string;
}

export interface ProfileChanges {
    fullName?: string;
    password?: string;
}

export interface LoginResult extends TokenPair {
    user: UserProfile;
}

export interface ProfileUpdateResult {
    user: UserProfile;
    /** Sessions ended because the password changed; 0 otherwise. */
    revokedSessions: number;
}

const VERIFICATION_TOKEN_BYTES = 32;
const MS_PER_HOUR = 60 * 60 * 1000;

// ─── Helpers ──────────────────────────────────────────────────────────────────

export function normalizeEmail(email: string): string {
    return email.trim().toLowerCase();
}

export function toProfile(user: UserRecord): UserProfile {
    return {
        id:          user.id,
        email:       user.email,
        fullName:    user.fullName,
        role:        user.role,
        isActive:    user.isActive,
        isVerified:  user.isVerified,
        createdAt:   user.createdAt,
        lastLoginAt: user.lastLoginAt,
    };
}

const invalidCredentials = () =>
    new AppError(401, 'INVALID_CREDENTIALS', 'Incorrect email or password.');

const userInactive = () =>
    new AppError(403, 'USER_INACTIVE', 'This account has been deactivated.');

const userNotFound = () =>
    new AppError(404, 'USER_NOT_FOUND', 'User not found.');

/** 404 for a vanished user, 403 for a deactivated one. */
function assertActive(user: UserRecord | null): UserRecord {
    if (!user) throw userNotFound();
    if (!user.isActive) throw userInactive();
    return user;
}

// ─── Service ──────────────────────────────────────────────────────────────────

export class AuthService {
    private readonly log: Logger;

    constructor(
        private readonly db: Database,
        private readonly tokens: TokenService,
        private readonly audit: AuditService,
        private readonly mailer: Mailer,
        private readonly options: AuthServiceOptions,
        logger: Logger,
        private readonly clock: Clock = systemClock,
    ) {
        this.log = logger.child({ module: 'auth' });
    }

    // ── Registration ─────────────────────────────────────────────────────────

    /** Self-registration always creates an employee; roles are granted elsewhere. */
    async register(input: RegisterInput, client: ClientContext): Promise<UserProfile> {
        const email = normalizeEmail(input.email);
        const passwordHash = await hashPassword(input.password);
        const now = this.clock();

        let user: UserRecord;
        try {
            user = await this.db.transaction((uow) =>
                uow.users.create({ email, passwordHash, fullName: input.fullName, role: 'employee' }, now),
            );
        } catch (err) {
            if (err instanceof UniqueViolationError) {
                throw new AppError(409, 'EMAIL_TAKEN', 'Email already registered.');
            }
            throw err;
        }

        await this.audit.record(AuditAction.USER_CREATE, {
            userId:     user.id,
            targetType: 'User',
            targetId:   user.id,
            client,
            details:    { email },
        });

        return toProfile(user);
    }

    // ── Sessions ─────────────────────────────────────────────────────────────

    async login(emailInput: string, password: string, client: ClientContext): Promise<LoginResult> {
        const email = normalizeEmail(emailInput);
        const user = await this.db.transaction((uow) => uow.users.findByEmail(email));

        const passwordOk = await verifyPassword(password, user?.passwordHash ?? DUMMY_PASSWORD_HASH);

        if (!user || !passwordOk) {
            await this.audit.record(AuditAction.LOGIN_FAILURE, {
                userId:  user?.id ?? null,
                client,
                details: { email, reason: user ? 'bad_password' : 'unknown_email' },
            });
            throw invalidCredentials();
        }

        if (!user.isActive) {
            await this.audit.record(AuditAction.LOGIN_FAILURE, {
                userId:  user.id,
                client,
                details: { email, reason: 'inactive' },
            });
            throw userInactive();
        }

        const pair = await this.tokens.issue(user);
        const loginAt = this.clock();
        await this.db.transaction((uow) => uow.users.recordLogin(user.id, loginAt));

        await this.audit.record(AuditAction.LOGIN_SUCCESS, { userId: user.id, client });
        this.log.info({ userId: user.id }, 'login');

        return { ...pair, user: toProfile({ ...user, lastLoginAt: loginAt }) };
    }

    async refresh(presented: string | undefined, client: ClientContext): Promise<RotationResult> {
        if (!presented) throw new RefreshTokenError('MISSING');

        const result = await this.tokens.rotate(presented);
        await this.audit.record(AuditAction.TOKEN_REFRESH, { userId: result.userId, client });
        return result;
    }

    /** Idempotent: a missing, unknown or already-revoked token is a no-op. */
    async logout(presented: string | undefined, client: ClientContext): Promise<RevokeResult> {
        const result = await this.tokens.revoke(presented ?? '');
        if (result.status === 'revoked') {
            await this.audit.record(AuditAction.LOGOUT, { userId: result.userId, client });
        }
        return result;
    }

    async logoutAll(userId: string, client: ClientContext): Promise<number> {
        await this.requireActiveUser(userId);
        const revokedSessions = await this.tokens.revokeAllForUser(userId);
        await this.audit.record(AuditAction.LOGOUT_ALL, {
            userId,
            client,
            details: { revokedSessions },
        });
        return revokedSessions;
    }

    // ── Profile ──────────────────────────────────────────────────────────────

    async getProfile(userId: string): Promise<UserProfile> {
        return toProfile(await this.requireActiveUser(userId));
    }

    /**
     * A password change ends every refresh session of the user.  The new hash
     * and the revocations commit together or not at all.
     */
    async updateProfile(userId: string, changes: ProfileChanges, client: ClientContext): Promise<ProfileUpdateResult> {
        const passwordHash = changes.password !== undefined
            ? await hashPassword(changes.password)
            : undefined;
        const now = this.clock();

        const { updated, revokedSessions } = await this.db.transaction(async (uow) => {
            assertActive(await uow.users.findById(userId));
            const row = await uow.users.update(userId, { fullName: changes.fullName, passwordHash }, now);
            if (!row) throw userNotFound();
            const revoked = passwordHash !== undefined
                ? await uow.refreshTokens.revokeActiveForUser(userId, now)
                : 0;
            return { updated: row, revokedSessions: revoked };
        });

        if (passwordHash !== undefined) {
            this.log.info({ userId, revokedSessions }, 'password changed, refresh sessions revoked');
            await this.audit.record(AuditAction.PASSWORD_CHANGE, {
                userId,
                targetType: 'User',
                targetId:   userId,
                client,
                details:    { revokedSessions },
            });
        }

        return { user: toProfile(updated), revokedSessions };
    }

    // ── Email verification ───────────────────────────────────────────────────

    /**
     * Issue a fresh verification token and hand the link to the mailer.
     * Earlier unconsumed tokens of the user are dropped.
     */
    async requestEmailVerification(userId: string, client: ClientContext): Promise<{ expiresAt: Date }> {
        const user = await this.requireActiveUser(userId);
        if (user.isVerified) {
            throw new AppError(400, 'ALREADY_VERIFIED', 'Email already verified.');
        }

        const now = this.clock();
        const token = randomBytes(VERIFICATION_TOKEN_BYTES).toString('base64url');
        const expiresAt = new Date(now.getTime() + this.options.emailVerificationTtlHours * MS_PER_HOUR);

        await this.db.transaction(async (uow) => {
            await uow.verificationTokens.deleteUnconsumedForUser(user.id);
            await uow.verificationTokens.insert({ token, userId: user.id, expiresAt, consumed: false, createdAt: now });
        });

        await this.mailer.sendVerificationEmail(user.email, verificationLink(this.options.baseUrl, token));
        await this.audit.record(AuditAction.EMAIL_VERIFY_REQUEST, { userId: user.id, client });

        return { expiresAt };
    }

    async verifyEmail(token: string, client: ClientContext): Promise<UserProfile> {
        const now = this.clock();

        const user = await this.db.transaction(async (uow) => {
            const row = await uow.verificationTokens.findForUpdate(token);
            if (!row) throw new AppError(404, 'INVALID_TOKEN', 'Invalid verification token.');
            if (row.consumed) throw new AppError(400, 'TOKEN_USED', 'Verification token already used.');
            if (now.getTime() >= row.expiresAt.getTime()) {
                throw new AppError(400, 'TOKEN_EXPIRED', 'Verification token expired.');
            }

            const owner = await uow.users.findById(row.userId);
            if (!owner) throw userNotFound();

            await uow.verificationTokens.markConsumed(token);
            await uow.users.markVerified(owner.id, now);
            return { ...owner, isVerified: true, updatedAt: now };
        });

        await this.audit.record(AuditAction.EMAIL_VERIFY_SUCCESS, { userId: user.id, client });
        return toProfile(user);
    }

    // ── Internals ────────────────────────────────────────────────────────────

    private async requireActiveUser(userId: string): Promise<UserRecord> {
        return assertActive(await this.db.transaction((uow) => uow.users.findById(userId)));
    }
}
