// =============================================================================
// Token service — access-token signing and the refresh-session lifecycle.
//
// ┌─────────────────────────────────────────────────────────────────────────┐
// │  SINGLE TOKEN AUTHORITY                                                 │
// │                                                                         │
// │  This file is the ONLY place that signs or verifies JWTs and the ONLY   │
// │  place that writes refresh_tokens rows.                                 │
// │                                                                         │
// │    issue(user)             → { accessToken, refreshToken }              │
// │    rotate(refreshToken)    → new pair, old row revoked                  │
// │    revoke(refreshToken)    → RevokeResult (never throws for no-ops)     │
// │    revokeAllForUser(id)    → number of sessions ended                   │
// │    verifyAccessToken(jwt)  → AccessTokenClaims                          │
// └─────────────────────────────────────────────────────────────────────────┘
//
// Access token  — HS256 JWT, ACCESS_TOKEN_EXPIRE_MINUTES (default 15),
//                 claims { sub, email, role, type: 'access', jti }.
//                 Stateless: signature + issuer + expiry are the only checks.
// Refresh token — 256 random bits, base64url, stored server-side with
//                 expires_at = now + REFRESH_TOKEN_EXPIRE_DAYS (default 7).
//
// Refresh-row state machine:
//
//        issue()               rotate() / revoke()
//   [absent] ──────▶ [active] ─────────────────────▶ [revoked]  (terminal)
//                        │        expires_at passes
//                        └─────────────────────────▶ [expired]  (terminal)
//
// rotate() runs lookup → checks → revoke → insert as ONE unit of work with
// the presented row locked, so of N concurrent rotations of one token exactly
// one succeeds and the rest observe it revoked.
//
// Reuse detection:
//   Presenting a revoked token means it leaked or is being replayed.  It is
//   always logged and audited.  With REFRESH_REUSE_POLICY=revoke_all every
//   other live session of that user is ended in the same transaction; the
//   audit entry is written after that commit, so a failed audit write cannot
//   undo the revocation.
// =============================================================================

import { randomBytes, randomUUID } from 'node:crypto';
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import type { ReusePolicy } from '../config';
import { AppError } from '../middleware/errorHandler';
import type { Database, RefreshTokenRecord, UnitOfWork, UserRecord, UserRole } from '../lib/database';
import { type Clock, systemClock } from '../lib/clock';
import type { Logger } from '../lib/logger';
import { AuditAction, AuditService } from './audit.service';
import { RefreshTokenError } from './token.errors';

// ─── Types ────────────────────────────────────────────────────────────────────

export interface TokenServiceOptions {
    secret: string;
    issuer: string;
    accessTtlMinutes: number;
    refreshTtlDays: number;
    reusePolicy: ReusePolicy;
}

/** The slice of a user that goes into an access token. */
export interface TokenSubject {
    id: string;
    email: string;
    role: UserRole;
}

export interface TokenPair {
    accessToken: string;
    refreshToken: string;
    refreshExpiresAt: Date;
}

export interface RotationResult extends TokenPair {
    userId: string;
}

export type RevokeResult =
    | { status: 'revoked'; userId: string }
    | { status: 'noop'; userId: string | null };

const AccessClaimsSchema = z.object({
    sub:   z.string().min(1),
    email: z.string(),
    role:  z.enum(['admin', 'manager', 'employee']),
    type:  z.literal('access'),
    jti:   z.string(),
    iat:   z.number(),
    exp:   z.number(),
});

export type AccessTokenClaims = z.infer<typeof AccessClaimsSchema>;

/** Outcome of the rotation transaction that must still be committed. */
type RotationOutcome =
    | { kind: 'rotated'; user: UserRecord; successor: RefreshTokenRecord }
    | { kind: 'reused'; userId: string; revokedSessions: number };

const REFRESH_TOKEN_BYTES = 32;
const MS_PER_DAY = 24 * 60 * 60 * 1000;

// ─── Helpers ──────────────────────────────────────────────────────────────────

/** Maps a jsonwebtoken error to the appropriate AppError. */
function mapJwtError(err: unknown): AppError {
    if (err instanceof jwt.TokenExpiredError) {
        return new AppError(401, 'TOKEN_EXPIRED', 'Access token has expired.');
    }
    if (err instanceof jwt.NotBeforeError) {
        return new AppError(401, 'TOKEN_NOT_ACTIVE', 'Access token is not yet active.');
    }
    return new AppError(401, 'INVALID_TOKEN', 'Access token is invalid.');
}

export function generateOpaqueToken(): string {
    return randomBytes(REFRESH_TOKEN_BYTES).toString('base64url');
}

// ─── Service ──────────────────────────────────────────────────────────────────

export class TokenService {
    private readonly log: Logger;
    private readonly audit: AuditService;

    constructor(
        private readonly db: Database,
        private readonly options: TokenServiceOptions,
        logger: Logger,
        private readonly clock: Clock = systemClock,
    ) {
        this.log = logger.child({ module: 'tokens' });
        this.audit = new AuditService(db, logger, clock);
    }

    /** Refresh lifetime in seconds — the cookie Max-Age. */
    get refreshTtlSeconds(): number {
        return this.options.refreshTtlDays * 24 * 60 * 60;
    }

    // ── Issuer ───────────────────────────────────────────────────────────────

    /**
     * Start a new session.  The refresh row is committed before anything is
     * signed, so a storage failure never leaves an access token without a
     * matching session.
     *
     * @throws StorageError when the row cannot be written.
     */
    async issue(user: TokenSubject): Promise<TokenPair> {
        const now = this.clock();
        const record = await this.db.transaction((uow) => this.persistRefreshToken(uow, user.id, now));

        this.log.debug({ userId: user.id, expiresAt: record.expiresAt }, 'refresh session issued');

        return {
            accessToken:      this.signAccessToken(user, now),
            refreshToken:     record.token,
            refreshExpiresAt: record.expiresAt,
        };
    }

    // ── Validator / rotator ──────────────────────────────────────────────────

    /**
     * Exchange a refresh token for a new pair.  Single use: the presented row
     * is revoked and its successor inserted in the same transaction.
     *
     * @throws RefreshTokenError NOT_FOUND | REVOKED | EXPIRED | USER_INACTIVE
     * @throws StorageError      on persistence failure (nothing is changed)
     */
    async rotate(presented: string): Promise<RotationResult> {
        const now = this.clock();

        const outcome = await this.db.transaction(async (uow): Promise<RotationOutcome> => {
            const record = await uow.refreshTokens.findForUpdate(presented);
            if (!record) throw new RefreshTokenError('NOT_FOUND');

            if (record.isRevoked) {
                // Committed, not thrown: a revoke_all response must persist.
                const revokedSessions = this.options.reusePolicy === 'revoke_all'
                    ? await uow.refreshTokens.revokeActiveForUser(record.userId, now)
                    : 0;
                return { kind: 'reused', userId: record.userId, revokedSessions };
            }

            // Boundary instant counts as expired.
            if (now.getTime() >= record.expiresAt.getTime()) {
                throw new RefreshTokenError('EXPIRED');
            }

            const user = await uow.users.findById(record.userId);
            if (!user) throw new RefreshTokenError('NOT_FOUND');
            if (!user.isActive) throw new RefreshTokenError('USER_INACTIVE');

            await uow.refreshTokens.markRevoked(record.token);
            const successor = await this.persistRefreshToken(uow, user.id, now);

            return { kind: 'rotated', user, successor };
        });

        if (outcome.kind === 'reused') {
            this.log.warn(
                {
                    userId:          outcome.userId,
                    policy:          this.options.reusePolicy,
                    revokedSessions: outcome.revokedSessions,
                },
                'revoked refresh token presented again, possible token theft',
            );
            await this.audit.record(AuditAction.TOKEN_REUSE_DETECTED, {
                userId:     outcome.userId,
                targetType: 'RefreshToken',
                details:    { policy: this.options.reusePolicy, revokedSessions: outcome.revokedSessions },
            });
            throw new RefreshTokenError('REVOKED');
        }

        const { user, successor } = outcome;
        return {
            userId:           user.id,
            accessToken:      this.signAccessToken(user, now),
            refreshToken:     successor.token,
            refreshExpiresAt: successor.expiresAt,
        };
    }

    // ── Revocation ───────────────────────────────────────────────────────────

    /**
     * End one session.  Unknown and already-revoked tokens are a no-op so
     * logout can be called any number of times.
     */
    async revoke(token: string): Promise<RevokeResult> {
        if (!token) return { status: 'noop', userId: null };

        return this.db.transaction(async (uow): Promise<RevokeResult> => {
            const record = await uow.refreshTokens.findForUpdate(token);
            if (!record) return { status: 'noop', userId: null };

            const flipped = await uow.refreshTokens.markRevoked(token);
            return flipped
                ? { status: 'revoked', userId: record.userId }
                : { status: 'noop', userId: record.userId };
        });
    }

    /** End every live session of a user ("log out everywhere"). */
    async revokeAllForUser(userId: string): Promise<number> {
        const now = this.clock();
        const count = await this.db.transaction((uow) => uow.refreshTokens.revokeActiveForUser(userId, now));
        this.log.info({ userId, count }, 'all refresh sessions revoked');
        return count;
    }

    // ── Access tokens ────────────────────────────────────────────────────────

    signAccessToken(user: TokenSubject, now: Date = this.clock()): string {
        return jwt.sign(
            {
                email: user.email,
                role:  user.role,
                type:  'access',
                iat:   Math.floor(now.getTime() / 1000),
            },
            this.options.secret,
            {
                subject:   user.id,
                jwtid:     randomUUID(),     // two tokens minted in the same second still differ
                expiresIn: this.options.accessTtlMinutes * 60,
                issuer:    this.options.issuer,
                algorithm: 'HS256',
            },
        );
    }

    /**
     * Verify signature, issuer and expiry, then the claim shape.
     * @throws AppError 401 TOKEN_EXPIRED | TOKEN_NOT_ACTIVE | INVALID_TOKEN
     */
    verifyAccessToken(token: string): AccessTokenClaims {
        const decoded = this.decode(token);
        const parsed = AccessClaimsSchema.safeParse(decoded);
        if (!parsed.success) {
            throw new AppError(401, 'INVALID_TOKEN', 'Access token payload is malformed.');
        }
        return parsed.data;
    }

    // ── Internals ────────────────────────────────────────────────────────────

    private decode(token: string): string | jwt.JwtPayload {
        try {
            return jwt.verify(token, this.options.secret, {
                issuer:         this.options.issuer,
                algorithms:     ['HS256'],
                clockTimestamp: Math.floor(this.clock().getTime() / 1000),
            });
        } catch (err) {
            throw mapJwtError(err);
        }
    }

    private async persistRefreshToken(uow: UnitOfWork, userId: string, now: Date): Promise<RefreshTokenRecord> {
        const record: RefreshTokenRecord = {
            token:     generateOpaqueToken(),
            userId,
            expiresAt: new Date(now.getTime() + this.options.refreshTtlDays * MS_PER_DAY),
            isRevoked: false,
            createdAt: now,
        };
        await uow.refreshTokens.insert(record);
        return record;
    }
}
