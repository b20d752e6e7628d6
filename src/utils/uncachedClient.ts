import CacheClient, { CachedPayload, CacheMetrics } from '../interfaces/cacheClient';
import Logger from '../interfaces/logger';
import { defaultSettings } from '../types';
import PrefixLogger from './prefixLogger';
import { assertValidKey, distinctKeys, simulatedPayload, sleep } from './simulation';

// Non-optimized counterpart of MockCacheClient: nothing is cached and a "batch"
// is just one request per key, issued one after another.
export default class UncachedClient implements CacheClient {
    private requestCount = 0;
    private logger: Logger;

    constructor(logger: Logger, private fetchLatencyMs: number = defaultSettings.fetchLatencyMs) {
        this.logger = new PrefixLogger('UncachedClient', logger);
    }

    async fetch(key: string): Promise<CachedPayload> {
        assertValidKey(key);
        return this.request(key);
    }

    async batchFetch(keys: Iterable<string>): Promise<Map<string, CachedPayload>> {
        const requested = distinctKeys(keys);
        this.logger.warn(`Fetching ${requested.length} item(s) with individual requests`);

        const result = new Map<string, CachedPayload>();
        for (const key of requested) {
            result.set(key, await this.request(key));
        }
        this.logger.warn(`Completed ${requested.length} individual request(s) (total requests: ${this.requestCount})`);
        return result;
    }

    getMetrics(): CacheMetrics {
        return { requestCount: this.requestCount, cacheHitCount: 0, cachedKeyCount: 0 };
    }

    reset(): void {
        this.requestCount = 0;
    }

    private async request(key: string): Promise<CachedPayload> {
        this.requestCount++;
        this.logger.warn(`Request #${this.requestCount} for "${key}"`);
        await sleep(this.fetchLatencyMs);
        return simulatedPayload(key);
    }
}
