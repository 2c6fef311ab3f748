// =============================================================================
// Auth middleware — validates the bearer access token and populates req.user.
//
//   - Reads Authorization: Bearer <token> only.
//   - Verifies locally through TokenService.verifyAccessToken (signature,
//     issuer, expiry); no database round-trip.
//   - req.user comes exclusively from the verified claims.
//   - TOKEN_EXPIRED is distinguished from TOKEN_INVALID so clients know to
//     attempt a silent refresh instead of prompting for a login.
//
// Trust model: an access token is trusted for its whole (short) lifetime.
// Revocation takes effect at the next refresh.
// =============================================================================

import type { NextFunction, RequestHandler, Response } from 'express';
import type { AuthRequest } from '../types';
import { sendError } from '../utils/response';
import type { TokenService } from '../services/token.service';
import { AppError } from './errorHandler';

const BEARER_PREFIX = 'Bearer ';

export function createAuthMiddleware(tokens: Pick<TokenService, 'verifyAccessToken'>): RequestHandler {
    return (req: AuthRequest, res: Response, next: NextFunction): void => {
        const authHeader = req.headers.authorization;

        if (!authHeader || !authHeader.startsWith(BEARER_PREFIX)) {
            sendError(res, 401, 'UNAUTHORIZED', 'Missing or malformed Authorization header.');
            return;
        }

        const token = authHeader.slice(BEARER_PREFIX.length).trim();
        if (!token) {
            sendError(res, 401, 'UNAUTHORIZED', 'Authorization header contains no token.');
            return;
        }

        try {
            const claims = tokens.verifyAccessToken(token);
            req.user = { id: claims.sub, email: claims.email, role: claims.role };
        } catch (err) {
            if (err instanceof AppError && err.code === 'TOKEN_EXPIRED') {
                sendError(res, 401, 'TOKEN_EXPIRED', 'Access token has expired.');
                return;
            }
            sendError(res, 401, 'TOKEN_INVALID', 'Access token is invalid.');
            return;
        }

        next();
    };
}

/**
 * The authenticated caller.  Only valid behind the auth middleware; a route
 * that forgets it fails loudly instead of acting anonymously.
 */
export function requireUser(req: AuthRequest): NonNullable<AuthRequest['user']> {
    if (!req.user) {
        throw new AppError(401, 'UNAUTHORIZED', 'Authentication required.');
    }
    return req.user;
}
