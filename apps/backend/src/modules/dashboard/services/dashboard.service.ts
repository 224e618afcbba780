import type {
    ICacheService,
    IDailyPreference,
    IDatabaseService,
    IEvent,
    IEventDashboard,
    IEventDay,
    IHost,
    IHostAssignment,
    ILogger,
    IRegistration,
    IRegistrationMember
} from '@event-suite/types';
import { COLLECTIONS } from '../../../database/collections.js';
import { NotFoundError } from '../../../lib/errors.js';
import { dashboardCacheKey, dashboardCacheTag } from '../../../lib/dashboard-cache.js';
import { buildEventDashboard, type IEventSnapshot } from './dashboard-aggregation.js';

/**
 * Serves event dashboards, cached in Redis when a cache is configured.
 *
 * Cached entries are tagged per event; every write touching the event's
 * registrations, members or host assignments invalidates the tag, and the
 * TTL bounds staleness otherwise. A cache read or write failure falls back
 * to computing the dashboard.
 */
export class DashboardService {
    constructor(
        private readonly database: IDatabaseService,
        private readonly cacheService: ICacheService | null,
        private readonly logger: ILogger,
        private readonly cacheTtlSeconds: number
    ) {}

    /**
     * @throws NotFoundError if the event does not exist
     */
    async getEventDashboard(eventId: string): Promise<IEventDashboard> {
        const cacheKey = dashboardCacheKey(eventId);

        if (this.cacheService) {
            try {
                const cached = await this.cacheService.get<IEventDashboard>(cacheKey);
                if (cached) {
                    this.logger.debug({ eventId }, 'Dashboard served from cache');
                    return cached;
                }
            } catch (error) {
                this.logger.warn({ error, eventId }, 'Dashboard cache read failed');
            }
        }

        const snapshot = await this.loadSnapshot(eventId);
        const dashboard = buildEventDashboard(snapshot);

        if (this.cacheService) {
            try {
                await this.cacheService.set(cacheKey, dashboard, this.cacheTtlSeconds, [dashboardCacheTag(eventId)]);
            } catch (error) {
                this.logger.warn({ error, eventId }, 'Dashboard cache write failed');
            }
        }

        this.logger.info(
            { eventId, days: dashboard.dailySchedule.length, participants: dashboard.totalParticipants },
            'Dashboard computed'
        );
        return dashboard;
    }

    private async loadSnapshot(eventId: string): Promise<IEventSnapshot> {
        const event = await this.database.findOne<IEvent>(COLLECTIONS.events, { id: eventId });
        if (!event) {
            throw new NotFoundError('Event not found');
        }

        const eventDays = await this.database.find<IEventDay>(COLLECTIONS.eventDays, { eventId });
        const registrations = await this.database.find<IRegistration>(
            COLLECTIONS.registrations,
            { eventId },
            { sort: { createdAt: 1 } }
        );
        const registrationIds = registrations.map(registration => registration.id);

        const members = await this.database.find<IRegistrationMember>(
            COLLECTIONS.members,
            { registrationId: { $in: registrationIds } },
            { sort: { createdAt: 1 } }
        );
        const dailyPreferences = await this.database.find<IDailyPreference>(COLLECTIONS.dailyPreferences, {
            registrationId: { $in: registrationIds }
        });
        const assignments = await this.database.find<IHostAssignment>(COLLECTIONS.hostAssignments, {
            eventDayId: { $in: eventDays.map(day => day.id) }
        });
        const hosts = await this.database.find<IHost>(COLLECTIONS.hosts, {
            id: { $in: [...new Set(assignments.map(assignment => assignment.hostId))] }
        });

        return { event, eventDays, registrations, members, dailyPreferences, assignments, hosts };
    }
}
