// =============================================================================
// Shared TypeScript types — used across routes, controllers, middleware.
// =============================================================================

import { Request } from 'express';
import type { UserRole } from '../lib/database';

// ─── Authenticated Request ────────────────────────────────────────────────────
// After authMiddleware runs, every request carries the caller on req.user.
// The identity comes from the access token, never from the request body.
export interface AuthenticatedUser {
    id: string;    // UUID
    email: string;
    role: UserRole;
}

export interface AuthRequest extends Request {
    user?: AuthenticatedUser;
}

// ─── Standard API Response ───────────────────────────────────────────────────
export interface ApiSuccess<T = unknown> {
    success: true;
    data: T;
}

export interface ApiError {
    success: false;
    error: string;       // machine-readable error code e.g. "VALIDATION_ERROR"
    message: string;     // human-readable explanation
    statusCode: number;
}

export type ApiResponse<T = unknown> = ApiSuccess<T> | ApiError;

// ─── Public user shape ───────────────────────────────────────────────────────
// What /auth/me and /auth/login return.  passwordHash never leaves the server.
export interface UserProfile {
    id: string;
    email: string;
    fullName: string;
    role: UserRole;
    isActive: boolean;
    isVerified: boolean;
    createdAt: Date;
    lastLoginAt: Date | null;
}
