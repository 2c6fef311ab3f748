/**
 * Apply pending SQL migrations from db/migrations.
 *   npm run db:migrate
 */

import 'dotenv/config';

import { Pool } from 'pg';
import { loadConfig } from '../src/config';
import { createLogger } from '../src/lib/logger';
import { runMigrations } from '../src/lib/migrate';

async function main(): Promise<void> {
    const config = loadConfig();
    const logger = createLogger(config.logLevel).child({ module: 'migrate' });

    if (!config.storage.databaseUrl) {
        throw new Error('[migrate] DATABASE_URL is not set.');
    }

    const pool = new Pool({ connectionString: config.storage.databaseUrl });
    try {
        const applied = await runMigrations(pool, logger);
        logger.info({ count: applied.length }, applied.length ? 'migrations applied' : 'schema up to date');
    } finally {
        await pool.end();
    }
}

main().catch((err: unknown) => {
    console.error('[migrate] failed:', err);
    process.exit(1);
});
