// =============================================================================
// Shared fixtures for the Vitest suites.  Not loaded by the server.
// =============================================================================

import type { Clock } from '../lib/clock';
import type { Database, UnitOfWork, UserRecord, UserRole } from '../lib/database';
import type { TokenServiceOptions } from '../services/token.service';

export const T0 = new Date('2026-03-02T09:00:00.000Z');

export const MINUTE_MS = 60_000;
export const DAY_MS = 24 * 60 * MINUTE_MS;

export const TEST_TOKEN_OPTIONS: TokenServiceOptions = {
    secret:           'test-secret',
    issuer:           'talent-hub-test',
    accessTtlMinutes: 15,
    refreshTtlDays:   7,
    reusePolicy:      'reject',
};

/** A clock tests can move by hand. */
export interface ManualClock {
    clock: Clock;
    advance(ms: number): void;
    set(at: Date): void;
}

export function manualClock(start: Date = T0): ManualClock {
    let now = start.getTime();
    return {
        clock:   () => new Date(now),
        advance: (ms) => { now += ms; },
        set:     (at) => { now = at.getTime(); },
    };
}

export async function seedUser(
    db: Database,
    overrides: { email?: string; fullName?: string; role?: UserRole; passwordHash?: string } = {},
): Promise<UserRecord> {
    return db.transaction((uow) =>
        uow.users.create(
            {
                email:        overrides.email ?? 'employee@example.test',
                fullName:     overrides.fullName ?? 'Test Employee',
                role:         overrides.role ?? 'employee',
                passwordHash: overrides.passwordHash ?? 'not-a-real-hash',
            },
            T0,
        ),
    );
}

/**
 * Wrap a Database so every unit of work sees `patch(uow)` instead of the
 * real repositories.  Used to inject failures and odd states.
 */
export function patchedDatabase(db: Database, patch: (uow: UnitOfWork) => UnitOfWork): Database {
    return {
        transaction: (work) => db.transaction((uow) => work(patch(uow))),
        ping:        () => db.ping(),
        close:       () => db.close(),
    };
}

/** Mailer that keeps what it was asked to send. */
export class RecordingMailer {
    readonly sent: Array<{ to: string; link: string }> = [];

    async sendVerificationEmail(to: string, link: string): Promise<void> {
        this.sent.push({ to, link });
    }

    /** Token from the most recent link. */
    lastToken(): string {
        const last = this.sent.at(-1);
        const token = last ? new URL(last.link).searchParams.get('token') : null;
        if (!token) throw new Error('no verification mail sent');
        return token;
    }
}

/** Settle a promise that is expected to reject and hand back the reason. */
export async function rejectionOf(promise: Promise<unknown>): Promise<unknown> {
    return promise.then(
        () => { throw new Error('expected the promise to reject'); },
        (err: unknown) => err,
    );
}
