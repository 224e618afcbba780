import type { ICacheService, ILogger } from '@event-suite/types';

export function dashboardCacheKey(eventId: string): string {
    return `dashboard:event:${eventId}`;
}

export function dashboardCacheTag(eventId: string): string {
    return `dashboard:${eventId}`;
}

/**
 * Drop the cached dashboard of an event after a write that changes it.
 *
 * A failed invalidation is logged and does not fail the write; the entry
 * then expires with its TTL.
 */
export async function invalidateDashboard(
    cache: ICacheService | null,
    eventId: string,
    logger: ILogger
): Promise<void> {
    if (!cache) {
        return;
    }
    try {
        await cache.invalidate(dashboardCacheTag(eventId));
    } catch (error) {
        logger.error({ error, eventId }, 'Failed to invalidate dashboard cache');
    }
}
