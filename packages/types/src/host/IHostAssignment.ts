/**
 * Lodging of one member with one host for one event day.
 *
 * A member has at most one assignment per event day.
 */
export interface IHostAssignment {
    id: string;
    hostId: string;
    registrationMemberId: string;
    eventDayId: string;
    assignmentNotes: string | null;
    /** Free-text operator reference supplied with the request */
    assignedBy: string | null;
    createdAt: Date;
    updatedAt: Date;
}

/**
 * Outcome of assigning several members to one host in a single request.
 */
export interface IBulkAssignmentResult {
    successfulAssignments: number;
    failedAssignments: number;
    errors: string[];
    assignments: IHostAssignment[];
}
