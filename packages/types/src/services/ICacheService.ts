/**
 * Key-value cache with expiry and tag-based invalidation.
 *
 * Values must be JSON-serialisable. Reading a cached value back yields the
 * JSON form, so `Date` fields come back as ISO strings.
 */
export interface ICacheService {
    /**
     * Read a cached value.
     *
     * @returns The parsed value, or null on a miss
     */
    get<T>(key: string): Promise<T | null>;

    /**
     * Store a value.
     *
     * @param ttlSeconds - Expiry; omitted means no expiry
     * @param tags - Tags that `invalidate()` can later clear together
     */
    set<T>(key: string, value: T, ttlSeconds?: number, tags?: string[]): Promise<void>;

    /**
     * Remove every entry stored under `tag`.
     */
    invalidate(tag: string): Promise<void>;

    /**
     * Remove one entry.
     *
     * @returns Number of keys removed (0 or 1)
     */
    del(key: string): Promise<number>;
}
