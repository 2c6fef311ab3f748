// =============================================================================
// lib/migrate.ts — apply db/migrations/*.sql in filename order.
//
// Each file runs in its own transaction and is recorded in schema_migrations,
// so re-running only applies what is new.  A failing file rolls back alone
// and stops the run; earlier files stay applied.
// =============================================================================

import { readdir, readFile } from 'node:fs/promises';
import path from 'node:path';
import type { Logger } from './logger';
import type { SqlPool } from './postgres';

export const DEFAULT_MIGRATIONS_DIR = path.resolve(process.cwd(), 'db', 'migrations');

export async function pendingMigrations(dir: string, applied: ReadonlySet<string>): Promise<string[]> {
    const files = await readdir(dir);
    return files
        .filter((f) => f.endsWith('.sql') && !applied.has(f))
        .sort();
}

export async function runMigrations(pool: SqlPool, logger: Logger, dir = DEFAULT_MIGRATIONS_DIR): Promise<string[]> {
    const client = await pool.connect();
    const appliedNow: string[] = [];

    try {
        await client.query(`
            CREATE TABLE IF NOT EXISTS schema_migrations (
                name        TEXT PRIMARY KEY,
                applied_at  TIMESTAMPTZ NOT NULL DEFAULT now()
            )`);

        const { rows } = await client.query<{ name: string }>('SELECT name FROM schema_migrations');
        const applied = new Set(rows.map((r) => r.name));

        for (const file of await pendingMigrations(dir, applied)) {
            const sql = await readFile(path.join(dir, file), 'utf8');
            try {
                await client.query('BEGIN');
                await client.query(sql);
                await client.query('INSERT INTO schema_migrations (name) VALUES ($1)', [file]);
                await client.query('COMMIT');
            } catch (err) {
                await client.query('ROLLBACK');
                throw err;
            }
            logger.info({ file }, 'migration applied');
            appliedNow.push(file);
        }
    } finally {
        client.release();
    }

    return appliedNow;
}
