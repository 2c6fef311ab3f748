/**
 * Seed script — creates one account per role for local development.
 *   npm run db:seed
 *
 * Safe to re-run: accounts whose email already exists are skipped.
 * Passwords come from SEED_PASSWORD (placeholder default below); change them
 * before pointing this at anything shared.
 */

import 'dotenv/config';

import { loadConfig } from '../src/config';
import { UniqueViolationError, type UserRole } from '../src/lib/database';
import { createLogger } from '../src/lib/logger';
import { createPostgresDatabase } from '../src/lib/postgres';
import { hashPassword } from '../src/utils/hash';

const SEED_USERS: ReadonlyArray<{ email: string; fullName: string; role: UserRole }> = [
    { email: 'admin@talenthub.local',    fullName: 'Admin User',    role: 'admin' },
    { email: 'manager@talenthub.local',  fullName: 'Manager User',  role: 'manager' },
    { email: 'employee@talenthub.local', fullName: 'Employee User', role: 'employee' },
];

async function main(): Promise<void> {
    const config = loadConfig();
    const logger = createLogger(config.logLevel);
    const db = createPostgresDatabase(config.storage, logger);
    const passwordHash = await hashPassword(process.env.SEED_PASSWORD ?? 'Change-me-123!');

    try {
        for (const seed of SEED_USERS) {
            try {
                const user = await db.transaction(async (uow) => {
                    const created = await uow.users.create({ ...seed, passwordHash }, new Date());
                    await uow.users.markVerified(created.id, new Date());
                    return created;
                });
                logger.info({ email: user.email, role: user.role }, 'seeded user');
            } catch (err) {
                if (!(err instanceof UniqueViolationError)) throw err;
                logger.info({ email: seed.email }, 'already present, skipped');
            }
        }
    } finally {
        await db.close();
    }
}

main().catch((err: unknown) => {
    console.error('[seed] failed:', err);
    process.exit(1);
});
