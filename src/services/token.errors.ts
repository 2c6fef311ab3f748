// =============================================================================
// Refresh-session errors.
//
// Every reason maps to the SAME client response (401 SESSION_INVALID with one
// fixed message).  The reason is kept on the error for logs and security
// monitoring only; exposing it would let a caller probe token state.
// =============================================================================

import { AppError } from '../middleware/errorHandler';

export type RefreshFailureReason =
    | 'MISSING'        // no cookie on the request
    | 'NOT_FOUND'      // never issued, or removed by cleanup
    | 'REVOKED'        // rotated, logged out, or revoked in bulk — reuse signal
    | 'EXPIRED'        // now >= expires_at
    | 'USER_INACTIVE'; // owning account deactivated

export const SESSION_INVALID_MESSAGE = 'Session is invalid. Please log in again.';

export class RefreshTokenError extends AppError {
    constructor(public readonly reason: RefreshFailureReason) {
        super(401, 'SESSION_INVALID', SESSION_INVALID_MESSAGE);
        this.name = 'RefreshTokenError';
    }
}
