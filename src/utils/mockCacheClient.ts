import CacheClient, { CachedPayload, CacheEntry, CacheMetrics, LatencyOptions } from '../interfaces/cacheClient';
import Logger from '../interfaces/logger';
import { defaultSettings } from '../types';
import PrefixLogger from './prefixLogger';
import { assertValidKey, distinctKeys, simulatedPayload, sleep } from './simulation';

/**
 * Read-through in-memory cache in front of a simulated backend, with a batch path
 * that turns every uncached key of a request into a single round-trip.
 *
 * Concurrent misses on the same key are not de-duplicated: each one issues its own
 * request and the last to finish wins the entry. A fetch still in flight when
 * `reset()` runs returns its value but leaves the cleared cache empty.
 */
export default class MockCacheClient implements CacheClient {
    private cache = new Map<string, CacheEntry>();
    private requestCount = 0;
    private cacheHitCount = 0;
    private generation = 0;
    private logger: Logger;
    private latency: LatencyOptions;

    constructor(logger: Logger, latency: Partial<LatencyOptions> = {}) {
        this.logger = new PrefixLogger('MockCacheClient', logger);
        this.latency = {
            fetchLatencyMs: latency.fetchLatencyMs ?? defaultSettings.fetchLatencyMs,
            batchLatencyMs: latency.batchLatencyMs ?? defaultSettings.batchLatencyMs,
        };
    }

    async fetch(key: string): Promise<CachedPayload> {
        assertValidKey(key);

        const entry = this.cache.get(key);
        if (entry) {
            this.cacheHitCount++;
            this.logger.info(`Cache hit for "${key}", no request needed`);
            return entry.value;
        }

        const generation = this.generation;
        this.requestCount++;
        this.logger.debug(`Cache miss for "${key}", requesting...`);
        await sleep(this.latency.fetchLatencyMs);

        const value = simulatedPayload(key);
        if (generation !== this.generation) {
            this.logger.debug(`Cache was reset while fetching "${key}", not storing it`);
            return value;
        }
        this.cache.set(key, { value, fetchedAt: Date.now() });
        this.logger.info(`Fetched and cached "${key}" (total requests: ${this.requestCount})`);
        return value;
    }

    async batchFetch(keys: Iterable<string>): Promise<Map<string, CachedPayload>> {
        const requested = distinctKeys(keys);
        const found = new Map<string, CachedPayload>();
        const uncached: string[] = [];

        for (const key of requested) {
            const entry = this.cache.get(key);
            if (entry) {
                found.set(key, entry.value);
            } else {
                uncached.push(key);
            }
        }

        if (found.size > 0) {
            this.cacheHitCount += found.size;
            this.logger.info(`Found ${found.size} item(s) in cache: ${[...found.keys()].join(', ')}`);
        }

        if (uncached.length > 0) {
            const generation = this.generation;
            this.requestCount++;
            this.logger.info(`Batch request for ${uncached.length} uncached item(s): ${uncached.join(', ')}`);
            await sleep(this.latency.batchLatencyMs);

            const fetchedAt = Date.now();
            const stale = generation !== this.generation;
            for (const key of uncached) {
                const value = simulatedPayload(key);
                if (!stale) this.cache.set(key, { value, fetchedAt });
                found.set(key, value);
            }
            this.logger.info(`Batch cached ${uncached.length} item(s) with 1 request (total requests: ${this.requestCount})`);
        } else {
            this.logger.info(`All ${requested.length} item(s) served from cache`);
        }

        const result = new Map<string, CachedPayload>();
        for (const key of requested) {
            const value = found.get(key);
            if (value) result.set(key, value);
        }
        return result;
    }

    /** Reads an entry without counting a cache hit */
    peek(key: string): CacheEntry | undefined {
        return this.cache.get(key);
    }

    getMetrics(): CacheMetrics {
        return {
            requestCount: this.requestCount,
            cacheHitCount: this.cacheHitCount,
            cachedKeyCount: this.cache.size,
        };
    }

    reset(): void {
        this.cache.clear();
        this.requestCount = 0;
        this.cacheHitCount = 0;
        this.generation++;
        this.logger.info('Cleared cache and counters');
    }
}
