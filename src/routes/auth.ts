// =============================================================================
// Auth routes — /api/v1/auth/*
//
//   POST /register         public
//   POST /login            public, rate-limited (RATE_LIMIT_LOGIN)
//   POST /refresh          refresh cookie
//   POST /logout           refresh cookie; no access token required so a
//                          user whose access token expired can still log out
//   POST /logout-all       bearer
//   GET  /me, PUT /me      bearer
//   POST /verify/request   bearer, rate-limited (RATE_LIMIT_VERIFY_REQUEST)
//   GET  /verify?token=    public (the link in the email)
//
// /refresh and /logout are never throttled: the opaque cookie is not
// brute-forceable and logout must always work.
// =============================================================================

import { Router } from 'express';
import type { Container } from '../container';
import { createAuthController } from '../controllers/auth.controller';
import { createAuthMiddleware } from '../middleware/auth';
import { createRateLimiter } from '../middleware/rateLimiter';

export function createAuthRouter(container: Container): Router {
    const { config, auth, tokens, redis } = container;

    const controller = createAuthController(auth, {
        secureCookies:     config.http.secureCookies,
        refreshTtlSeconds: tokens.refreshTtlSeconds,
    });
    const authenticate = createAuthMiddleware(tokens);
    const loginLimit = createRateLimiter(config.rateLimit.login, 'login', redis);
    const verifyLimit = createRateLimiter(config.rateLimit.verifyRequest, 'verify', redis);

    const router = Router();

    // ── Public ────────────────────────────────────────────────────────────────
    router.post('/register', controller.register);
    router.post('/login', loginLimit, controller.login);
    router.get('/verify', controller.verifyEmail);

    // ── Refresh cookie ────────────────────────────────────────────────────────
    router.post('/refresh', controller.refresh);
    router.post('/logout', controller.logout);

    // ── Bearer ────────────────────────────────────────────────────────────────
    router.post('/logout-all', authenticate, controller.logoutAll);
    router.get('/me', authenticate, controller.me);
    router.put('/me', authenticate, controller.updateMe);
    router.post('/verify/request', authenticate, verifyLimit, controller.requestVerification);

    return router;
}
