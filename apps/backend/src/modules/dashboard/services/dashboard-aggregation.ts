import {
    ATTENDING_STATUSES,
    type IAgeGroups,
    type IDailyPreference,
    type IDashboardDay,
    type IDashboardParticipant,
    type IDashboardSummary,
    type IEvent,
    type IEventDashboard,
    type IEventDay,
    type IHost,
    type IHostAssignment,
    type IRegistration,
    type IRegistrationMember,
    type IToiletPreferenceCounts
} from '@event-suite/types';

/**
 * Everything stored about one event, as loaded for its dashboard.
 */
export interface IEventSnapshot {
    event: IEvent;
    eventDays: IEventDay[];
    registrations: IRegistration[];
    members: IRegistrationMember[];
    dailyPreferences: IDailyPreference[];
    assignments: IHostAssignment[];
    hosts: IHost[];
}

/**
 * Build the dashboard of an event from its stored records.
 *
 * Every member of every registration appears on every event day. A
 * registration's preference for the day applies to all of its members; a
 * registration without one gets the preference defaults. Statistics other
 * than the head counts and `totalGroups` only count "fully attending"
 * groups, whose members are all registered or confirmed.
 */
export function buildEventDashboard(snapshot: IEventSnapshot): IEventDashboard {
    const { event, registrations, members } = snapshot;

    const membersByRegistration = groupBy(members, member => member.registrationId);
    const hostById = new Map(snapshot.hosts.map(host => [host.id, host]));
    const hostByMemberDay = new Map<string, IHost>();
    for (const assignment of snapshot.assignments) {
        const host = hostById.get(assignment.hostId);
        if (host) {
            hostByMemberDay.set(memberDayKey(assignment.registrationMemberId, assignment.eventDayId), host);
        }
    }

    const preferenceByRegistrationDay = new Map<string, IDailyPreference>();
    const orderedPreferences = [...snapshot.dailyPreferences].sort(
        (a, b) => a.createdAt.getTime() - b.createdAt.getTime()
    );
    for (const preference of orderedPreferences) {
        const key = memberDayKey(preference.registrationId, preference.eventDayId);
        if (!preferenceByRegistrationDay.has(key)) {
            preferenceByRegistrationDay.set(key, preference);
        }
    }

    const days = [...snapshot.eventDays].sort((a, b) => a.eventDate.localeCompare(b.eventDate));
    const dailySchedule: IDashboardDay[] = days.map(day => {
        const participants: IDashboardParticipant[] = [];
        for (const registration of registrations) {
            const preference = preferenceByRegistrationDay.get(memberDayKey(registration.id, day.id)) ?? null;
            for (const member of membersByRegistration.get(registration.id) ?? []) {
                const host = hostByMemberDay.get(memberDayKey(member.id, day.id)) ?? null;
                participants.push(toParticipant(member, registration, preference, host));
            }
        }
        return {
            eventDayId: day.id,
            eventDate: day.eventDate,
            locationName: day.locationName,
            breakfastProvided: day.breakfastProvided,
            lunchProvided: day.lunchProvided,
            dinnerProvided: day.dinnerProvided,
            dailyNotes: day.dailyNotes,
            participants,
            toiletPreferences: countToiletPreferences(onlyFullyAttending(participants))
        };
    });

    return {
        eventId: event.id,
        eventName: event.eventName,
        eventStartDate: event.startDate,
        eventEndDate: event.endDate,
        totalRegistrations: registrations.length,
        totalParticipants: members.length,
        confirmedParticipants: members.filter(member => member.status === 'confirmed').length,
        waitingParticipants: members.filter(member => member.status === 'waiting').length,
        dailySchedule,
        summary: summarize(dailySchedule)
    };
}

function summarize(dailySchedule: IDashboardDay[]): IDashboardSummary {
    // First appearance wins, so the earliest day's preference is used
    const unique = new Map<string, IDashboardParticipant>();
    for (const day of dailySchedule) {
        for (const participant of day.participants) {
            if (!unique.has(participant.id)) {
                unique.set(participant.id, participant);
            }
        }
    }
    const participants = [...unique.values()];
    const attending = onlyFullyAttending(participants);

    const genderDistribution = { M: 0, F: 0 };
    const ageGroups: IAgeGroups = { '0-18': 0, '19-30': 0, '31-50': 0, '51+': 0 };
    const cityDistribution: Record<string, number> = {};

    for (const participant of attending) {
        genderDistribution[participant.gender] += 1;

        const age = participant.age;
        if (age !== null && age > 0) {
            ageGroups[ageGroupOf(age)] += 1;
        }
        if (participant.city) {
            cityDistribution[participant.city] = (cityDistribution[participant.city] ?? 0) + 1;
        }
    }

    let groupsWithEmptySeats = 0;
    let totalEmptySeats = 0;
    for (const group of groupBy(attending, participant => participant.groupId).values()) {
        const [first] = group;
        if (first && first.hasEmptySeats) {
            groupsWithEmptySeats += 1;
            totalEmptySeats += first.availableSeatsCount;
        }
    }

    const dailyToiletPreferences: Record<string, IToiletPreferenceCounts> = {};
    for (const day of dailySchedule) {
        dailyToiletPreferences[day.eventDate] = day.toiletPreferences;
    }

    return {
        totalGroups: new Set(participants.map(participant => participant.groupId)).size,
        individualRegistrations: attending.filter(p => p.registrationType === 'individual').length,
        groupRegistrations: attending.filter(p => p.registrationType === 'group').length,
        publicTransport: attending.filter(p => p.transportationMode === 'public').length,
        privateTransport: attending.filter(p => p.transportationMode === 'private').length,
        groupsWithEmptySeats,
        totalEmptySeats,
        genderDistribution,
        ageGroups,
        cityDistribution,
        toiletPreferences: countToiletPreferences(attending),
        dailyToiletPreferences
    };
}

function toParticipant(
    member: IRegistrationMember,
    registration: IRegistration,
    preference: IDailyPreference | null,
    host: IHost | null
): IDashboardParticipant {
    return {
        id: member.id,
        name: member.name,
        phoneNumber: member.phoneNumber,
        email: member.email,
        city: member.city,
        age: member.age,
        gender: member.gender,
        language: member.language,
        floorPreference: member.floorPreference,
        specialRequirements: member.specialRequirements,
        status: member.status,
        createdAt: member.createdAt,
        updatedAt: member.updatedAt,

        stayingWithYatra: preference?.stayingWithYatra ?? true,
        dinnerAtHost: preference?.dinnerAtHost ?? true,
        breakfastAtHost: preference?.breakfastAtHost ?? true,
        lunchWithYatra: preference?.lunchWithYatra ?? true,
        physicalLimitations: preference?.physicalLimitations ?? null,
        toiletPreference: preference?.toiletPreference ?? 'indian',

        groupId: registration.id,
        registrationType: registration.registrationType,
        transportationMode: registration.transportationMode,
        hasEmptySeats: registration.hasEmptySeats,
        availableSeatsCount: registration.availableSeatsCount,
        notes: registration.notes,

        hostId: host?.id ?? null,
        hostName: host?.name ?? null,
        hostPlaceName: host?.placeName ?? null,
        hostPhoneNo: host?.phoneNo ?? null
    };
}

/**
 * Participants whose whole group is registered or confirmed.
 */
function onlyFullyAttending(participants: IDashboardParticipant[]): IDashboardParticipant[] {
    const result: IDashboardParticipant[] = [];
    for (const group of groupBy(participants, participant => participant.groupId).values()) {
        if (group.every(participant => ATTENDING_STATUSES.includes(participant.status))) {
            result.push(...group);
        }
    }
    return result;
}

function countToiletPreferences(participants: IDashboardParticipant[]): IToiletPreferenceCounts {
    const counts: IToiletPreferenceCounts = { indian: 0, western: 0 };
    for (const participant of participants) {
        counts[participant.toiletPreference] += 1;
    }
    return counts;
}

function ageGroupOf(age: number): keyof IAgeGroups {
    if (age <= 18) {
        return '0-18';
    }
    if (age <= 30) {
        return '19-30';
    }
    if (age <= 50) {
        return '31-50';
    }
    return '51+';
}

function memberDayKey(ownerId: string, eventDayId: string): string {
    return `${ownerId}:${eventDayId}`;
}

function groupBy<T>(items: T[], keyOf: (item: T) => string): Map<string, T[]> {
    const groups = new Map<string, T[]>();
    for (const item of items) {
        const key = keyOf(item);
        const group = groups.get(key);
        if (group) {
            group.push(item);
        } else {
            groups.set(key, [item]);
        }
    }
    return groups;
}
