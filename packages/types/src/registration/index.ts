export type { IRegistration, IRegistrationWithDetails } from './IRegistration.js';
export type { IRegistrationMember } from './IRegistrationMember.js';
export type { IDailyPreference } from './IDailyPreference.js';
export type {
    IParticipantHostAssignment,
    IParticipantMember,
    IParticipantScheduleItem,
    IParticipantSearchResult
} from './IParticipantSearch.js';
