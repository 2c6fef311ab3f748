// =============================================================================
// Health check route
//
// GET /api/v1/health — public.  Reports 503 when the database does not answer
// so load balancers take the instance out of rotation.
// =============================================================================

import { Router, Request, Response } from 'express';
import type { Container } from '../container';
import { sendSuccess } from '../utils/response';

export function createHealthRouter({ db, config, logger }: Container): Router {
    const router = Router();

    router.get('/', async (_req: Request, res: Response) => {
        let database: 'ok' | 'unavailable' = 'ok';
        try {
            await db.ping();
        } catch (err) {
            logger.warn({ err }, 'health check: database ping failed');
            database = 'unavailable';
        }

        sendSuccess(res, {
            status:      database === 'ok' ? 'ok' : 'degraded',
            environment: config.env,
            timestamp:   new Date().toISOString(),
            database,
        }, database === 'ok' ? 200 : 503);
    });

    return router;
}
