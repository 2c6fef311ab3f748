// =============================================================================
// Email service — verification mail.
//
// Delivery is out of scope: ConsoleMailer writes the link to the log so a
// developer can click it.  Anything that implements Mailer (SMTP, an HTTP
// mail API) can be passed to the container instead.
// =============================================================================

import type { Logger } from '../lib/logger';

export interface Mailer {
    sendVerificationEmail(to: string, link: string): Promise<void>;
}

export function verificationLink(baseUrl: string, token: string): string {
    const base = baseUrl.replace(/\/+$/, '');
    return `${base}/api/v1/auth/verify?token=${encodeURIComponent(token)}`;
}

export class ConsoleMailer implements Mailer {
    private readonly log: Logger;

    constructor(logger: Logger) {
        this.log = logger.child({ module: 'mailer' });
    }

    async sendVerificationEmail(to: string, link: string): Promise<void> {
        this.log.info({ to, link }, 'verification email (console delivery)');
    }
}
