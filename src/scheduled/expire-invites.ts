import type { InviteService } from '../services/invite';
import { logger } from '../utils/logger';

// Every 15 minutes
export const EXPIRE_INVITES_INTERVAL_MS = 15 * 60 * 1000;

export interface ExpireInvitesResult {
    timestamp: string;
    expired: number;
    duration: number;
}

/**
 * Persist the expired state of invites past their expiry.
 * Validation already treats them as expired; this keeps listings and the
 * stored state in step.
 */
export async function expireInvites(invites: InviteService): Promise<ExpireInvitesResult> {
    const startTime = Date.now();
    const result = await invites.expireStale();
    const duration = Date.now() - startTime;

    if (!result.success) {
        logger.error('Invite expiry sweep failed', undefined, { code: result.code, error: result.error });
        return { timestamp: new Date().toISOString(), expired: 0, duration };
    }

    logger.info('Invite expiry sweep completed', { expired: result.data, duration });
    return { timestamp: new Date().toISOString(), expired: result.data, duration };
}

/**
 * Runs the sweep on an interval. Returns a function that stops it.
 */
export function scheduleInviteExpiry(
    invites: InviteService,
    intervalMs: number = EXPIRE_INVITES_INTERVAL_MS
): () => void {
    const timer = setInterval(() => {
        expireInvites(invites).catch((error: unknown) => {
            logger.error('Invite expiry sweep threw', error);
        });
    }, intervalMs);
    timer.unref();

    return () => clearInterval(timer);
}
