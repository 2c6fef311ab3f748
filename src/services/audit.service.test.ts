import { describe, it, expect } from 'vitest';
import { createLogger, silentLogger } from '../lib/logger';
import { MemoryDatabase } from '../lib/memoryDatabase';
import { T0, manualClock, patchedDatabase } from '../test/helpers';
import { AuditAction, AuditService } from './audit.service';

describe('AuditService.record', () => {
    it('appends the event with the client folded into details', async () => {
        const db = new MemoryDatabase();
        const audit = new AuditService(db, silentLogger(), manualClock().clock);

        await audit.record(AuditAction.LOGIN_FAILURE, {
            userId:  null,
            client:  { ip: '10.0.0.7', userAgent: 'vitest' },
            details: { reason: 'unknown_email' },
        });

        const [entry] = db.auditTrail();
        expect(entry).toMatchObject({
            timestamp:  T0,
            userId:     null,
            action:     'auth.login.failure',
            targetType: null,
            targetId:   null,
            details:    { reason: 'unknown_email', ip: '10.0.0.7', userAgent: 'vitest' },
        });
    });

    it('logs a failed write instead of throwing it', async () => {
        const lines: Array<Record<string, unknown>> = [];
        const logger = createLogger('error', {
            write: (msg: string) => { lines.push(JSON.parse(msg)); },
        });
        const failing = patchedDatabase(new MemoryDatabase(), (uow) => ({
            ...uow,
            auditLogs: { append: async () => { throw new Error('disk full'); } },
        }));
        const audit = new AuditService(failing, logger);

        await expect(audit.record(AuditAction.LOGOUT, { userId: 'user-1' })).resolves.toBeUndefined();
        expect(lines).toHaveLength(1);
        expect(lines[0]).toMatchObject({
            level:  50,
            module: 'audit',
            action: 'auth.logout',
            userId: 'user-1',
            msg:    'audit write failed',
        });
    });
});
