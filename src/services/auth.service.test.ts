// =============================================================================
// Unit tests — AuthService (services/auth.service.ts)
//
// Real TokenService, AuditService and MemoryDatabase; only the mailer and the
// clock are test doubles.  Passwords are hashed once per suite where the test
// does not exercise hashing itself.
// =============================================================================

import { describe, it, expect, beforeAll, beforeEach } from 'vitest';
import { StorageError, type Database } from '../lib/database';
import { silentLogger } from '../lib/logger';
import { MemoryDatabase } from '../lib/memoryDatabase';
import { AppError } from '../middleware/errorHandler';
import {
    MINUTE_MS,
    T0,
    TEST_TOKEN_OPTIONS,
    RecordingMailer,
    manualClock,
    patchedDatabase,
    rejectionOf,
    seedUser,
    type ManualClock,
} from '../test/helpers';
import { hashPassword, verifyPassword } from '../utils/hash';
import { AuditAction, AuditService, type ClientContext } from './audit.service';
import { AuthService } from './auth.service';
import { RefreshTokenError } from './token.errors';
import { TokenService } from './token.service';

const CLIENT: ClientContext = { ip: '203.0.113.7', userAgent: 'vitest' };
const PASSWORD = 'Test-passw0rd!';

let passwordHash: string;
let db: MemoryDatabase;
let time: ManualClock;
let mailer: RecordingMailer;

beforeAll(async () => {
    passwordHash = await hashPassword(PASSWORD);
});

beforeEach(() => {
    db = new MemoryDatabase();
    time = manualClock();
    mailer = new RecordingMailer();
});

function build(database: Database = db) {
    const logger = silentLogger();
    const tokens = new TokenService(database, TEST_TOKEN_OPTIONS, logger, time.clock);
    const audit = new AuditService(database, logger, time.clock);
    const auth = new AuthService(
        database,
        tokens,
        audit,
        mailer,
        { emailVerificationTtlHours: 24, baseUrl: 'http://localhost:3000/' },
        logger,
        time.clock,
    );
    return { auth, tokens };
}

function actions(): string[] {
    return db.auditTrail().map((entry) => entry.action);
}

async function codeOf(promise: Promise<unknown>): Promise<string | undefined> {
    const err = await rejectionOf(promise);
    return err instanceof AppError ? err.code : undefined;
}

// ─── register ─────────────────────────────────────────────────────────────────

describe('register', () => {
    it('creates an unverified employee with a lower-cased email and bcrypt hash', async () => {
        const { auth } = build();

        const profile = await auth.register(
            { email: '  New.Hire@Example.TEST ', password: PASSWORD, fullName: 'New Hire' },
            CLIENT,
        );

        expect(profile).toMatchObject({
            email:       'new.hire@example.test',
            fullName:    'New Hire',
            role:        'employee',
            isActive:    true,
            isVerified:  false,
            createdAt:   T0,
            lastLoginAt: null,
        });
        expect(profile).not.toHaveProperty('passwordHash');

        const stored = await db.transaction((uow) => uow.users.findById(profile.id));
        expect(stored && await verifyPassword(PASSWORD, stored.passwordHash)).toBe(true);

        expect(db.auditTrail()).toEqual([
            expect.objectContaining({
                action:     AuditAction.USER_CREATE,
                userId:     profile.id,
                targetType: 'User',
                targetId:   profile.id,
                details:    { email: 'new.hire@example.test', ip: '203.0.113.7', userAgent: 'vitest' },
            }),
        ]);
    });

    it('refuses an email that is already registered, ignoring case', async () => {
        await seedUser(db, { email: 'taken@example.test', passwordHash });
        const { auth } = build();

        const err = await rejectionOf(
            auth.register({ email: 'TAKEN@example.test', password: PASSWORD, fullName: 'Again' }, CLIENT),
        );

        expect(err).toBeInstanceOf(AppError);
        expect(err).toMatchObject({ statusCode: 409, code: 'EMAIL_TAKEN' });
    });
});

// ─── login ────────────────────────────────────────────────────────────────────

describe('login', () => {
    it('issues a session and records the login time', async () => {
        const user = await seedUser(db, { email: 'staff@example.test', passwordHash });
        const { auth, tokens } = build();
        time.advance(MINUTE_MS);

        const result = await auth.login('Staff@example.test', PASSWORD, CLIENT);

        const loginAt = new Date(T0.getTime() + MINUTE_MS);
        expect(result.user).toMatchObject({ id: user.id, lastLoginAt: loginAt });
        expect(tokens.verifyAccessToken(result.accessToken).sub).toBe(user.id);
        expect((await db.transaction((uow) => uow.refreshTokens.findForUpdate(result.refreshToken)))?.userId)
            .toBe(user.id);
        expect((await db.transaction((uow) => uow.users.findById(user.id)))?.lastLoginAt).toEqual(loginAt);
        expect(actions()).toEqual([AuditAction.LOGIN_SUCCESS]);
    });

    it('gives the same answer for a wrong password and an unknown email', async () => {
        const user = await seedUser(db, { email: 'staff@example.test', passwordHash });
        const { auth } = build();

        const wrongPassword = await rejectionOf(auth.login('staff@example.test', 'Wrong-passw0rd!', CLIENT));
        const unknownEmail = await rejectionOf(auth.login('ghost@example.test', PASSWORD, CLIENT));

        for (const err of [wrongPassword, unknownEmail]) {
            expect(err).toBeInstanceOf(AppError);
            expect(err).toMatchObject({
                statusCode: 401,
                code:       'INVALID_CREDENTIALS',
                message:    'Incorrect email or password.',
            });
        }

        const trail = db.auditTrail();
        expect(trail.map((e) => [e.action, e.userId, e.details.reason])).toEqual([
            [AuditAction.LOGIN_FAILURE, user.id, 'bad_password'],
            [AuditAction.LOGIN_FAILURE, null, 'unknown_email'],
        ]);
    });

    it('refuses a deactivated account with 403 and issues nothing', async () => {
        await seedUser(db, { email: 'gone@example.test', passwordHash });
        const inactive = patchedDatabase(db, (uow) => ({
            ...uow,
            users: {
                ...uow.users,
                findByEmail: async (email) => {
                    const found = await uow.users.findByEmail(email);
                    return found ? { ...found, isActive: false } : null;
                },
            },
        }));

        const err = await rejectionOf(build(inactive).auth.login('gone@example.test', PASSWORD, CLIENT));

        expect(err).toMatchObject({ statusCode: 403, code: 'USER_INACTIVE' });
        expect(db.auditTrail().map((e) => e.details.reason)).toEqual(['inactive']);
    });
});

// ─── refresh / logout ─────────────────────────────────────────────────────────

describe('refresh and logout', () => {
    it('treats a missing cookie as an invalid session', async () => {
        const err = await rejectionOf(build().auth.refresh(undefined, CLIENT));

        expect(err).toBeInstanceOf(RefreshTokenError);
        expect(err).toMatchObject({ reason: 'MISSING', code: 'SESSION_INVALID' });
    });

    it('rotates the session and audits the refresh', async () => {
        const user = await seedUser(db, { passwordHash });
        const { auth, tokens } = build();
        const { refreshToken } = await tokens.issue(user);

        const rotated = await auth.refresh(refreshToken, CLIENT);

        expect(rotated.userId).toBe(user.id);
        expect(actions()).toEqual([AuditAction.TOKEN_REFRESH]);
    });

    it('logs out once and audits only the real revocation', async () => {
        const user = await seedUser(db, { passwordHash });
        const { auth, tokens } = build();
        const { refreshToken } = await tokens.issue(user);

        expect(await auth.logout(refreshToken, CLIENT)).toEqual({ status: 'revoked', userId: user.id });
        expect(await auth.logout(refreshToken, CLIENT)).toEqual({ status: 'noop', userId: user.id });
        expect(await auth.logout(undefined, CLIENT)).toEqual({ status: 'noop', userId: null });

        expect(actions()).toEqual([AuditAction.LOGOUT]);
    });

    it('logs out everywhere and reports the number of sessions', async () => {
        const user = await seedUser(db, { passwordHash });
        const { auth, tokens } = build();
        await tokens.issue(user);
        await tokens.issue(user);

        expect(await auth.logoutAll(user.id, CLIENT)).toBe(2);
        expect(db.auditTrail()[0]).toMatchObject({
            action:  AuditAction.LOGOUT_ALL,
            details: { revokedSessions: 2, ip: '203.0.113.7', userAgent: 'vitest' },
        });
    });
});

// ─── profile ──────────────────────────────────────────────────────────────────

describe('profile', () => {
    it('returns 404 for a user that no longer exists', async () => {
        expect(await codeOf(build().auth.getProfile('missing-id'))).toBe('USER_NOT_FOUND');
    });

    it('renames without touching sessions', async () => {
        const user = await seedUser(db, { passwordHash });
        const { auth, tokens } = build();
        const { refreshToken } = await tokens.issue(user);

        const result = await auth.updateProfile(user.id, { fullName: 'Renamed' }, CLIENT);

        expect(result.revokedSessions).toBe(0);
        expect(result.user.fullName).toBe('Renamed');
        await expect(tokens.rotate(refreshToken)).resolves.toMatchObject({ userId: user.id });
        expect(actions()).toEqual([]);
    });

    it('ends every session when the password changes', async () => {
        const user = await seedUser(db, { email: 'staff@example.test', passwordHash });
        const { auth, tokens } = build();
        const first = await tokens.issue(user);
        const second = await tokens.issue(user);

        const result = await auth.updateProfile(user.id, { password: 'N3w-password!' }, CLIENT);

        expect(result.revokedSessions).toBe(2);
        expect(actions()).toEqual([AuditAction.PASSWORD_CHANGE]);
        for (const { refreshToken } of [first, second]) {
            expect(await rejectionOf(tokens.rotate(refreshToken))).toMatchObject({ reason: 'REVOKED' });
        }

        await expect(auth.login('staff@example.test', 'N3w-password!', CLIENT)).resolves.toBeDefined();
        expect(await codeOf(auth.login('staff@example.test', PASSWORD, CLIENT))).toBe('INVALID_CREDENTIALS');
    });

    it('keeps the old password and every session when revocation fails', async () => {
        const user = await seedUser(db, { email: 'staff@example.test', passwordHash });
        const failing = patchedDatabase(db, (uow) => ({
            ...uow,
            refreshTokens: {
                ...uow.refreshTokens,
                revokeActiveForUser: async () => { throw new StorageError('refreshTokens.revokeActiveForUser'); },
            },
        }));
        const { auth, tokens } = build(failing);
        const { refreshToken } = await tokens.issue(user);

        const err = await rejectionOf(auth.updateProfile(user.id, { password: 'N3w-password!' }, CLIENT));

        expect(err).toBeInstanceOf(StorageError);
        const stored = await db.transaction((uow) => uow.users.findById(user.id));
        expect(stored?.passwordHash).toBe(passwordHash);
        await expect(tokens.rotate(refreshToken)).resolves.toMatchObject({ userId: user.id });
        expect(actions()).toEqual([]);
    });
});

// ─── deactivated accounts ─────────────────────────────────────────────────────

describe('deactivated accounts', () => {
    function deactivated(database: Database): Database {
        return patchedDatabase(database, (uow) => ({
            ...uow,
            users: {
                ...uow.users,
                findById: async (id) => {
                    const found = await uow.users.findById(id);
                    return found ? { ...found, isActive: false } : null;
                },
            },
        }));
    }

    it('are refused by every signed-in use-case with 403', async () => {
        const user = await seedUser(db, { passwordHash });
        const { auth } = build(deactivated(db));

        expect(await codeOf(auth.getProfile(user.id))).toBe('USER_INACTIVE');
        expect(await codeOf(auth.requestEmailVerification(user.id, CLIENT))).toBe('USER_INACTIVE');
        expect(await codeOf(auth.logoutAll(user.id, CLIENT))).toBe('USER_INACTIVE');
        expect(await codeOf(auth.updateProfile(user.id, { fullName: 'Renamed' }, CLIENT))).toBe('USER_INACTIVE');

        expect(mailer.sent).toEqual([]);
        expect(actions()).toEqual([]);
    });

    it('cannot change the password', async () => {
        const user = await seedUser(db, { passwordHash });
        const { auth } = build(deactivated(db));

        const err = await rejectionOf(auth.updateProfile(user.id, { password: 'N3w-password!' }, CLIENT));

        expect(err).toMatchObject({ statusCode: 403, code: 'USER_INACTIVE' });
        const stored = await db.transaction((uow) => uow.users.findById(user.id));
        expect(stored?.passwordHash).toBe(passwordHash);
    });
});

// ─── email verification ───────────────────────────────────────────────────────

describe('email verification', () => {
    it('mails a link under BASE_URL and verifies the account once', async () => {
        const user = await seedUser(db, { email: 'staff@example.test', passwordHash });
        const { auth } = build();

        const { expiresAt } = await auth.requestEmailVerification(user.id, CLIENT);

        expect(expiresAt).toEqual(new Date(T0.getTime() + 24 * 60 * MINUTE_MS));
        expect(mailer.sent).toHaveLength(1);
        expect(mailer.sent[0]?.to).toBe('staff@example.test');
        expect(mailer.sent[0]?.link).toMatch(
            /^http:\/\/localhost:3000\/api\/v1\/auth\/verify\?token=[A-Za-z0-9_-]{43}$/,
        );

        const verified = await auth.verifyEmail(mailer.lastToken(), CLIENT);
        expect(verified.isVerified).toBe(true);
        expect((await db.transaction((uow) => uow.users.findById(user.id)))?.isVerified).toBe(true);

        expect(await codeOf(auth.verifyEmail(mailer.lastToken(), CLIENT))).toBe('TOKEN_USED');
        expect(await codeOf(auth.requestEmailVerification(user.id, CLIENT))).toBe('ALREADY_VERIFIED');
        expect(actions()).toEqual([AuditAction.EMAIL_VERIFY_REQUEST, AuditAction.EMAIL_VERIFY_SUCCESS]);
    });

    it('invalidates the previous link when a new one is requested', async () => {
        const user = await seedUser(db, { passwordHash });
        const { auth } = build();

        await auth.requestEmailVerification(user.id, CLIENT);
        const firstToken = mailer.lastToken();
        await auth.requestEmailVerification(user.id, CLIENT);

        expect(mailer.lastToken()).not.toBe(firstToken);
        expect(await codeOf(auth.verifyEmail(firstToken, CLIENT))).toBe('INVALID_TOKEN');
        await expect(auth.verifyEmail(mailer.lastToken(), CLIENT)).resolves.toMatchObject({ isVerified: true });
    });

    it('rejects a link used at or after its expiry', async () => {
        const user = await seedUser(db, { passwordHash });
        const { auth } = build();
        await auth.requestEmailVerification(user.id, CLIENT);
        time.advance(24 * 60 * MINUTE_MS);

        const err = await rejectionOf(auth.verifyEmail(mailer.lastToken(), CLIENT));

        expect(err).toMatchObject({ statusCode: 400, code: 'TOKEN_EXPIRED' });
        expect((await db.transaction((uow) => uow.users.findById(user.id)))?.isVerified).toBe(false);
    });

    it('rejects an unknown token with 404', async () => {
        const err = await rejectionOf(build().auth.verifyEmail('not-a-token', CLIENT));
        expect(err).toMatchObject({ statusCode: 404, code: 'INVALID_TOKEN' });
    });
});
