export type { IVehicleSharing } from './IVehicleSharing.js';
