// --- CacheClient types and interface ---
export interface CachedPayload {
    id: string;
    data: string;
}

export interface CacheEntry {
    value: CachedPayload;
    /** Epoch milliseconds at which the simulated fetch completed */
    fetchedAt: number;
}

export interface CacheMetrics {
    /** Simulated network requests issued so far */
    requestCount: number;
    cacheHitCount: number;
    cachedKeyCount: number;
}

export interface LatencyOptions {
    fetchLatencyMs: number;
    batchLatencyMs: number;
}

export default interface CacheClient {
    /**
    * Resolves the value for `key`, simulating a network round-trip when needed.
    * Rejects with InvalidArgumentError for an empty or blank key.
    */
    fetch(key: string): Promise<CachedPayload>;

    /**
    * Resolves every distinct key in `keys`. Result order follows the first
    * occurrence of each key.
    */
    batchFetch(keys: Iterable<string>): Promise<Map<string, CachedPayload>>;

    getMetrics(): CacheMetrics;

    /** Clears cached entries and counters */
    reset(): void;
}
