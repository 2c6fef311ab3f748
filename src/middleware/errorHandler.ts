// =============================================================================
// Error handler middleware — must be registered LAST in Express.
//
// Catches anything passed via next(err).
// All errors return { success, error, message, statusCode }.
//
// Logging levels:
//   4xx AppError  → debug (client mistakes are not server incidents)
//   401 session   → warn, with the internal reason (never sent to the client)
//   5xx / unknown → error, with the full error object
// =============================================================================

import { Request, Response, NextFunction, ErrorRequestHandler } from 'express';
import { ZodError } from 'zod';
import type { Logger } from '../lib/logger';
import { sendError } from '../utils/response';

// A typed application error you can throw from anywhere in the codebase.
export class AppError extends Error {
    constructor(
        public readonly statusCode: number,
        public readonly code: string,
        message: string
    ) {
        super(message);
        this.name = 'AppError';
    }
}

/**
 * Extra structured fields an AppError subclass wants in the log line but not
 * in the response (e.g. why a refresh token was rejected).
 */
function logContext(err: AppError): Record<string, unknown> {
    const context: Record<string, unknown> = { code: err.code };
    if ('reason' in err && typeof err.reason === 'string') {
        context.reason = err.reason;
    }
    return context;
}

// ─── Global error handler ────────────────────────────────────────────────────
export function createErrorHandler(logger: Logger): ErrorRequestHandler {
    return (
        err: unknown,
        req: Request,
        res: Response,
        // next MUST be declared even if unused; Express uses arity to identify error handlers
        _next: NextFunction
    ): void => {
        const route = { method: req.method, path: req.path };

        // 1. Zod validation errors: map to field-level messages
        if (err instanceof ZodError) {
            const message = err.errors
                .map((e) => `${e.path.join('.')}: ${e.message}`)
                .join('; ');
            logger.debug({ ...route, message }, 'validation failed');
            sendError(res, 400, 'VALIDATION_ERROR', message);
            return;
        }

        // 2. Known application errors thrown with AppError
        if (err instanceof AppError) {
            if (err.statusCode >= 500) {
                logger.error({ ...route, err }, err.message);
            } else if (err.statusCode === 401) {
                logger.warn({ ...route, ...logContext(err) }, err.message);
            } else {
                logger.debug({ ...route, ...logContext(err) }, err.message);
            }
            sendError(res, err.statusCode, err.code, err.message);
            return;
        }

        // 3. Unexpected errors: never leak internals to caller
        logger.error({ ...route, err }, 'unhandled error');
        sendError(
            res,
            500,
            'INTERNAL_SERVER_ERROR',
            'An unexpected error occurred. Please try again.'
        );
    };
}

// ─── 404 handler — catches any route not matched by the router ───────────────
export function notFoundHandler(req: Request, res: Response): void {
    sendError(res, 404, 'NOT_FOUND', `Route ${req.method} ${req.path} not found`);
}
