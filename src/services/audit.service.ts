// =============================================================================
// Audit service — append-only security trail in audit_logs.
//
// Action names are "<resource>.<action>".  Details carry the client ip and
// user agent plus whatever the event needs (reason, counts).
//
// An audit write never decides the outcome of a request: a failed append is
// logged at error level and the request carries on.
// =============================================================================

import type { Database } from '../lib/database';
import { type Clock, systemClock } from '../lib/clock';
import type { Logger } from '../lib/logger';

export const AuditAction = {
    LOGIN_SUCCESS:        'auth.login.success',
    LOGIN_FAILURE:        'auth.login.failure',
    LOGOUT:               'auth.logout',
    LOGOUT_ALL:           'auth.logout_all',
    TOKEN_REFRESH:        'auth.token.refresh',
    TOKEN_REUSE_DETECTED: 'auth.token.reuse_detected',
    PASSWORD_CHANGE:      'auth.password.change',
    EMAIL_VERIFY_REQUEST: 'auth.email.verify_request',
    EMAIL_VERIFY_SUCCESS: 'auth.email.verify_success',
    USER_CREATE:          'user.create',
} as const;

export type AuditActionName = (typeof AuditAction)[keyof typeof AuditAction];

/** Who is calling — taken from the request by the controller. */
export interface ClientContext {
    ip: string | null;
    userAgent: string | null;
}

export interface AuditEvent {
    userId: string | null;
    targetType?: string;
    targetId?: string;
    client?: ClientContext;
    details?: Record<string, unknown>;
}

export class AuditService {
    private readonly log: Logger;

    constructor(
        private readonly db: Database,
        logger: Logger,
        private readonly clock: Clock = systemClock,
    ) {
        this.log = logger.child({ module: 'audit' });
    }

    async record(action: AuditActionName, event: AuditEvent): Promise<void> {
        const details: Record<string, unknown> = { ...event.details };
        if (event.client) {
            details.ip = event.client.ip;
            details.userAgent = event.client.userAgent;
        }

        try {
            await this.db.transaction((uow) =>
                uow.auditLogs.append(
                    {
                        userId:     event.userId,
                        action,
                        targetType: event.targetType ?? null,
                        targetId:   event.targetId ?? null,
                        details,
                    },
                    this.clock(),
                ),
            );
        } catch (err) {
            this.log.error({ err, action, userId: event.userId }, 'audit write failed');
        }
    }
}
