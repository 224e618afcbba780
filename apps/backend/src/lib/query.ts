/**
 * Helpers for building MongoDB filters and updates from request input.
 */

/**
 * Escape a user-supplied string for use inside a `$regex` filter, so a name
 * search for "A.B" matches the literal dot.
 */
export function escapeRegex(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Case-insensitive substring filter.
 */
export function containsIgnoreCase(value: string): { $regex: string; $options: string } {
    return { $regex: escapeRegex(value), $options: 'i' };
}

/**
 * Copy of `patch` without its undefined entries, for use in `$set`.
 *
 * The driver would otherwise store `undefined` as null.
 */
export function definedFields(patch: object): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(patch)) {
        if (value !== undefined) {
            result[key] = value;
        }
    }
    return result;
}

/**
 * Filter matching documents whose optional text field is set (`true`) or
 * empty (`false`). Empty text is stored as null.
 */
export function presenceFilter(hasValue: boolean): null | { $ne: null } {
    return hasValue ? { $ne: null } : null;
}
