export type {
    IToiletPreferenceCounts,
    IDashboardParticipant,
    IDashboardDay,
    IAgeGroups,
    IDashboardSummary,
    IEventDashboard
} from './IEventDashboard.js';
