/**
 * MongoDB collection names. Several modules read the same collections (the
 * dashboard reads all of them), so the names live in one place.
 */
export const COLLECTIONS = {
  events: 'events',
  eventDays: 'event_days',
  registrations: 'registrations',
  members: 'registration_members',
  dailyPreferences: 'daily_preferences',
  hosts: 'hosts',
  hostAssignments: 'host_assignments',
  vehicleSharing: 'vehicle_sharing'
} as const;
