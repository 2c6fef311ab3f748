// =============================================================================
// Auth controller — HTTP layer for /api/v1/auth/* routes.
//
//   POST /register        create an employee account
//   POST /login           verify credentials, start a session
//   POST /refresh         rotate the refresh cookie
//   POST /logout          end this session (no access token needed)
//   POST /logout-all      end every session of the caller
//   GET  /me, PUT /me     profile; a password change ends every session
//   POST /verify/request  mail a verification link
//   GET  /verify?token=   consume a verification token
//
// Cookie contract:
//   Name:     refresh_token
//   httpOnly: true
//   secure:   true in production (HTTPS only)
//   sameSite: 'lax'
//   path:     /api/v1/auth (the cookie is never sent anywhere else)
//   maxAge:   refresh TTL
//
// The refresh token is ONLY read from that cookie, never from a body or
// query string, and never written into a response body.
// =============================================================================

import type { CookieOptions, NextFunction, Request, RequestHandler, Response } from 'express';
import { z } from 'zod';
import type { AuthService } from '../services/auth.service';
import type { ClientContext } from '../services/audit.service';
import { requireUser } from '../middleware/auth';
import type { AuthRequest } from '../types';
import { sendSuccess } from '../utils/response';

// ─── Cookie ───────────────────────────────────────────────────────────────────

export const REFRESH_COOKIE_NAME = 'refresh_token';
export const REFRESH_COOKIE_PATH = '/api/v1/auth';

export interface AuthControllerOptions {
    secureCookies: boolean;
    refreshTtlSeconds: number;
}

// ─── Zod schemas ──────────────────────────────────────────────────────────────

const PASSWORD_SPECIALS = /[!@#$%^&*(),.?":{}|<>]/;

const PasswordSchema = z.string()
    .min(8,  'Password must be at least 8 characters')
    .max(72, 'Password must be at most 72 characters')   // bcrypt hard limit
    .regex(/[A-Z]/, 'Password must contain at least one uppercase letter')
    .regex(/[a-z]/, 'Password must contain at least one lowercase letter')
    .regex(/\d/,    'Password must contain at least one digit')
    .regex(PASSWORD_SPECIALS, 'Password must contain at least one special character');

// role is absent: self-registration always yields an employee.
const RegisterSchema = z.object({
    email:    z.string().email('Invalid email address').max(255),
    password: PasswordSchema,
    fullName: z.string().trim().min(2, 'Full name must be at least 2 characters').max(255),
});

const LoginSchema = z.object({
    email:    z.string().email('Invalid email address'),
    password: z.string().min(1, 'Password is required').max(72),
});

const UpdateProfileSchema = z
    .object({
        fullName: z.string().trim().min(2).max(255).optional(),
        password: PasswordSchema.optional(),
    })
    .refine((b) => b.fullName !== undefined || b.password !== undefined, {
        message: 'Provide fullName and/or password',
    });

const VerifyQuerySchema = z.object({
    token: z.string().min(1, 'token is required'),
});

// ─── Request helpers ──────────────────────────────────────────────────────────

function readRefreshCookie(req: Request): string | undefined {
    const cookies: Record<string, unknown> = req.cookies ?? {};
    const value = cookies[REFRESH_COOKIE_NAME];
    return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function clientOf(req: Request): ClientContext {
    return { ip: req.ip ?? null, userAgent: req.get('user-agent') ?? null };
}

// ─── Controller ───────────────────────────────────────────────────────────────

export interface AuthController {
    register: RequestHandler;
    login: RequestHandler;
    refresh: RequestHandler;
    logout: RequestHandler;
    logoutAll: RequestHandler;
    me: RequestHandler;
    updateMe: RequestHandler;
    requestVerification: RequestHandler;
    verifyEmail: RequestHandler;
}

export function createAuthController(auth: AuthService, options: AuthControllerOptions): AuthController {
    const baseCookie: CookieOptions = {
        httpOnly: true,
        secure:   options.secureCookies,
        sameSite: 'lax',
        path:     REFRESH_COOKIE_PATH,
    };

    const setRefreshCookie = (res: Response, token: string): void => {
        res.cookie(REFRESH_COOKIE_NAME, token, { ...baseCookie, maxAge: options.refreshTtlSeconds * 1000 });
    };

    // Overwrite with an empty value and Max-Age=0 so every browser drops it.
    const clearRefreshCookie = (res: Response): void => {
        res.cookie(REFRESH_COOKIE_NAME, '', { ...baseCookie, maxAge: 0 });
    };

    return {
        // ── POST /register ───────────────────────────────────────────────────
        async register(req: Request, res: Response, next: NextFunction): Promise<void> {
            try {
                const body = RegisterSchema.parse(req.body);
                const user = await auth.register(body, clientOf(req));
                sendSuccess(res, { user }, 201);
            } catch (err) {
                next(err);
            }
        },

        // ── POST /login ──────────────────────────────────────────────────────
        async login(req: Request, res: Response, next: NextFunction): Promise<void> {
            try {
                const { email, password } = LoginSchema.parse(req.body);
                const result = await auth.login(email, password, clientOf(req));

                setRefreshCookie(res, result.refreshToken);
                sendSuccess(res, {
                    accessToken: result.accessToken,
                    tokenType:   'bearer',
                    user:        result.user,
                });
            } catch (err) {
                next(err);
            }
        },

        // ── POST /refresh ────────────────────────────────────────────────────
        async refresh(req: Request, res: Response, next: NextFunction): Promise<void> {
            try {
                const result = await auth.refresh(readRefreshCookie(req), clientOf(req));

                setRefreshCookie(res, result.refreshToken);
                sendSuccess(res, { accessToken: result.accessToken, tokenType: 'bearer' });
            } catch (err) {
                // A cookie that failed once will fail again; drop it.
                clearRefreshCookie(res);
                next(err);
            }
        },

        // ── POST /logout ─────────────────────────────────────────────────────
        async logout(req: Request, res: Response, next: NextFunction): Promise<void> {
            try {
                await auth.logout(readRefreshCookie(req), clientOf(req));
                clearRefreshCookie(res);
                sendSuccess(res, { message: 'Logged out successfully.' });
            } catch (err) {
                // Storage failure: still clear the cookie so the client is not
                // stuck looking logged in, then report the error.
                clearRefreshCookie(res);
                next(err);
            }
        },

        // ── POST /logout-all ─────────────────────────────────────────────────
        async logoutAll(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
            try {
                const { id } = requireUser(req);
                const revokedSessions = await auth.logoutAll(id, clientOf(req));
                clearRefreshCookie(res);
                sendSuccess(res, { revokedSessions });
            } catch (err) {
                next(err);
            }
        },

        // ── GET /me ──────────────────────────────────────────────────────────
        async me(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
            try {
                const { id } = requireUser(req);
                sendSuccess(res, { user: await auth.getProfile(id) });
            } catch (err) {
                next(err);
            }
        },

        // ── PUT /me ──────────────────────────────────────────────────────────
        async updateMe(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
            try {
                const { id } = requireUser(req);
                const changes = UpdateProfileSchema.parse(req.body);
                const result = await auth.updateProfile(id, changes, clientOf(req));

                // This browser's session went with the others.
                if (result.revokedSessions > 0) clearRefreshCookie(res);

                sendSuccess(res, result);
            } catch (err) {
                next(err);
            }
        },

        // ── POST /verify/request ─────────────────────────────────────────────
        async requestVerification(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
            try {
                const { id } = requireUser(req);
                const { expiresAt } = await auth.requestEmailVerification(id, clientOf(req));
                sendSuccess(res, { message: 'Verification email sent.', expiresAt });
            } catch (err) {
                next(err);
            }
        },

        // ── GET /verify?token= ───────────────────────────────────────────────
        async verifyEmail(req: Request, res: Response, next: NextFunction): Promise<void> {
            try {
                const { token } = VerifyQuerySchema.parse(req.query);
                const user = await auth.verifyEmail(token, clientOf(req));
                sendSuccess(res, { message: 'Email verified successfully.', user });
            } catch (err) {
                next(err);
            }
        },
    };
}
