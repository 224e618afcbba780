/**
 * Enumerations shared by the backend and any client of the API.
 *
 * Each `as const` tuple (`REGISTRATION_TYPES`, `GENDERS`, ...) feeds both the
 * zod enum schemas and the union type derived from it.
 */

export const REGISTRATION_TYPES = ['individual', 'group'] as const;
export type RegistrationType = (typeof REGISTRATION_TYPES)[number];

export const TRANSPORTATION_MODES = ['public', 'private'] as const;
export type TransportationMode = (typeof TRANSPORTATION_MODES)[number];

export const GENDERS = ['M', 'F'] as const;
export type Gender = (typeof GENDERS)[number];

/**
 * Lifecycle of a registration member.
 *
 * `registered` and `confirmed` members count against an event's
 * `allowedRegistration` limit; `waiting` and `cancelled` do not.
 */
export const REGISTRATION_STATUSES = ['registered', 'waiting', 'confirmed', 'cancelled'] as const;
export type RegistrationStatus = (typeof REGISTRATION_STATUSES)[number];

/** Statuses that hold a seat at the event. */
export const ATTENDING_STATUSES: readonly RegistrationStatus[] = ['registered', 'confirmed'];

export const TOILET_PREFERENCES = ['indian', 'western'] as const;
export type ToiletPreference = (typeof TOILET_PREFERENCES)[number];

export const TOILET_FACILITIES = ['indian', 'western', 'both'] as const;
export type ToiletFacilities = (typeof TOILET_FACILITIES)[number];

export const GENDER_PREFERENCES = ['male', 'female', 'both'] as const;
export type GenderPreference = (typeof GENDER_PREFERENCES)[number];
