export type {
    IHost,
    IHostWithDate,
    IAssignedParticipant,
    IHostWithParticipants,
    IHostsForEventDay,
    IHostsByEvent
} from './IHost.js';
export type { IHostAssignment, IBulkAssignmentResult } from './IHostAssignment.js';
