// =============================================================================
// Application factory — creates and configures the Express app.
//
// Separated from index.ts (the entry point) so tests can build the app around
// an in-memory container without starting the HTTP listener.
// =============================================================================

import express, { Express } from 'express';
import cors from 'cors';
import cookieParser from 'cookie-parser';
import type { Container } from './container';
import { registerRoutes } from './routes';
import { AppError, createErrorHandler, notFoundHandler } from './middleware/errorHandler';

export function createApp(container: Container): Express {
    const { config, logger } = container;
    const app = express();

    // ── Proxy trust ───────────────────────────────────────────────────────────
    // MUST be set before anything that reads req.ip (rate limiter, audit).
    // One hop of X-Forwarded-For: the load balancer in front of the app.
    app.set('trust proxy', 1);
    app.disable('x-powered-by');

    // ── CORS ──────────────────────────────────────────────────────────────────
    // Origins come from ALLOWED_ORIGINS; loadConfig() already refused
    // localhost in production.
    const allowedOrigins = config.http.allowedOrigins;
    app.use(
        cors({
            origin: (origin, callback) => {
                // No origin: curl, server-to-server.
                if (!origin || allowedOrigins.includes(origin)) {
                    callback(null, true);
                } else {
                    callback(new AppError(403, 'CORS_FORBIDDEN', `Origin '${origin}' is not allowed.`));
                }
            },
            credentials: true,          // required for the refresh cookie
            methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
            allowedHeaders: ['Content-Type', 'Authorization'],
        })
    );

    // ── Cookie parser ─────────────────────────────────────────────────────────
    // Populates req.cookies for /auth/refresh and /auth/logout.
    app.use(cookieParser());

    // ── Body parsing ──────────────────────────────────────────────────────────
    app.use(express.json({ limit: '100kb' }));

    // ── Routes ────────────────────────────────────────────────────────────────
    registerRoutes(app, container);

    // ── 404 — must come after all routes ─────────────────────────────────────
    app.use(notFoundHandler);

    // ── Global error handler — must be LAST and have 4 params ────────────────
    app.use(createErrorHandler(logger.child({ module: 'http' })));

    return app;
}
