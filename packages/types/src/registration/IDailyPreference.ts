import type { ToiletPreference } from '../enums/index.js';

/**
 * Meal and lodging preference of a registration for one event day.
 */
export interface IDailyPreference {
    id: string;
    registrationId: string;
    eventDayId: string;
    stayingWithYatra: boolean;
    dinnerAtHost: boolean;
    breakfastAtHost: boolean;
    lunchWithYatra: boolean;
    physicalLimitations: string | null;
    toiletPreference: ToiletPreference;
    createdAt: Date;
    updatedAt: Date;
}
