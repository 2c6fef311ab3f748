import { describe, it, expect } from 'vitest';
import express from 'express';
import { once } from 'node:events';
import { z } from 'zod';
import { StorageError } from '../lib/database';
import { createLogger } from '../lib/logger';
import { RefreshTokenError } from '../services/token.errors';
import { AppError, createErrorHandler, notFoundHandler } from './errorHandler';

/** Collects pino's JSON lines. */
function captureLogs() {
    const lines: Array<Record<string, unknown>> = [];
    const logger = createLogger('debug', {
        write: (msg: string) => { lines.push(JSON.parse(msg)); },
    });
    return { lines, logger };
}

async function respond(err: unknown) {
    const { lines, logger } = captureLogs();
    const app = express();
    app.get('/boom', (_req, _res, next) => next(err));
    app.use(notFoundHandler);
    app.use(createErrorHandler(logger));

    const server = app.listen(0, '127.0.0.1');
    await once(server, 'listening');
    try {
        const address = server.address();
        if (address === null || typeof address === 'string') throw new Error('server is not on a TCP port');
        const res = await fetch(`http://127.0.0.1:${address.port}/boom`);
        const body: unknown = await res.json();
        return { status: res.status, body, lines };
    } finally {
        await new Promise<void>((resolve) => server.close(() => resolve()));
    }
}

describe('createErrorHandler', () => {
    it('maps a ZodError to 400 with the field paths', async () => {
        const result = z.object({ email: z.string().email() }).safeParse({ email: 'nope' });
        const err = result.success ? null : result.error;

        const { status, body } = await respond(err);

        expect(status).toBe(400);
        expect(body).toEqual({
            success:    false,
            error:      'VALIDATION_ERROR',
            message:    'email: Invalid email',
            statusCode: 400,
        });
    });

    it('passes an AppError through', async () => {
        const { status, body } = await respond(new AppError(409, 'EMAIL_TAKEN', 'Email already registered.'));

        expect(status).toBe(409);
        expect(body).toEqual({ success: false, error: 'EMAIL_TAKEN', message: 'Email already registered.', statusCode: 409 });
    });

    it('logs the reason of a rejected session but never returns it', async () => {
        const { status, body, lines } = await respond(new RefreshTokenError('REVOKED'));

        expect(status).toBe(401);
        expect(JSON.stringify(body)).not.toContain('REVOKED');
        const entry = lines.find((l) => l.code === 'SESSION_INVALID');
        expect(entry).toMatchObject({ level: 40, reason: 'REVOKED', path: '/boom' });
    });

    it('reports storage failures as 500 with a generic message', async () => {
        const { status, body, lines } = await respond(new StorageError('refreshTokens.insert', new Error('connection reset')));

        expect(status).toBe(500);
        expect(body).toEqual({
            success:    false,
            error:      'STORAGE_ERROR',
            message:    'A storage error occurred. Please try again.',
            statusCode: 500,
        });
        expect(lines.some((l) => l.level === 50)).toBe(true);
    });

    it('hides unexpected errors behind INTERNAL_SERVER_ERROR', async () => {
        const { status, body } = await respond(new Error('secret internals'));

        expect(status).toBe(500);
        expect(body).toEqual({
            success:    false,
            error:      'INTERNAL_SERVER_ERROR',
            message:    'An unexpected error occurred. Please try again.',
            statusCode: 500,
        });
    });
});
