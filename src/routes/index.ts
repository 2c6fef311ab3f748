// =============================================================================
// Route index — registers all route groups on the Express app.
//
//   /api/v1/health  public
//   /api/v1/auth    mixed; bearer auth is applied per route in routes/auth.ts
// =============================================================================

import type { Express } from 'express';
import type { Container } from '../container';
import { createAuthRouter } from './auth';
import { createHealthRouter } from './health';

export const API_PREFIX = '/api/v1';

export function registerRoutes(app: Express, container: Container): void {
    app.use(`${API_PREFIX}/health`, createHealthRouter(container));
    app.use(`${API_PREFIX}/auth`, createAuthRouter(container));
}
