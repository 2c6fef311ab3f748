// =============================================================================
// Entry point — loads env, boots the HTTP server, handles shutdown.
//
// Boot sequence:
//   1. dotenv/config      populate process.env (MUST be first import)
//   2. loadConfig()       validate the environment, fail fast
//   3. createContainer()  logger, database, redis, services
//   4. warm-up ping       one retry; a cold database is not fatal
//   5. app.listen()
//   6. SIGTERM/SIGINT     stop accepting, then close database and redis
// =============================================================================

import 'dotenv/config'; // side-effect import, populates process.env from .env

import { createApp } from './app';
import { loadConfig } from './config';
import { createContainer, type Container } from './container';

const WARMUP_RETRY_DELAY_MS = 4_000;

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/** A cold-started database often refuses the first connection; try twice. */
async function warmUp({ db, logger }: Container): Promise<void> {
    try {
        await db.ping();
    } catch (firstErr) {
        logger.warn({ err: firstErr }, `database not reachable, retrying in ${WARMUP_RETRY_DELAY_MS}ms`);
        await sleep(WARMUP_RETRY_DELAY_MS);
        await db.ping();
    }
    logger.info('database connection established');
}

async function main(): Promise<void> {
    const config = loadConfig();
    const container = createContainer(config);
    const { logger } = container;

    try {
        await warmUp(container);
    } catch (dbErr) {
        // Non-fatal: requests surface STORAGE_ERROR until the database is back.
        logger.warn({ err: dbErr }, 'database warm-up failed (will retry on first request)');
    }

    const app = createApp(container);

    const server = app.listen(config.port, () => {
        logger.info({ port: config.port, env: config.env, storage: config.storage.driver }, 'server listening');
    });

    // Order: stop accepting connections, then close the pool and redis.
    let shuttingDown = false;
    function shutdown(signal: string): void {
        if (shuttingDown) return;
        shuttingDown = true;
        logger.info({ signal }, 'shutting down');

        server.close(() => {
            container.close().then(
                () => {
                    logger.info('all connections closed');
                    process.exit(0);
                },
                (err: unknown) => {
                    logger.error({ err }, 'error while closing connections');
                    process.exit(1);
                },
            );
        });
    }

    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((err: unknown) => {
    // The logger may not exist yet (invalid config), so write to stderr.
    console.error('[server] Fatal startup error:', err);
    process.exit(1);
});
