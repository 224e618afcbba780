/**
 * Carpool pairing between a member who drives and a member who rides along.
 */
export interface IVehicleSharing {
    id: string;
    vehicleOwnerMemberId: string;
    coTravelerMemberId: string;
    sharingNotes: string | null;
    createdAt: Date;
    updatedAt: Date;
}
