import { describe, expect, it, beforeEach, afterEach, jest } from '@jest/globals';
import UncachedClient from '../uncachedClient';
import { InvalidArgumentError } from '../../errors';
import { createMockLogger } from '../../__tests__/helpers';

describe('UncachedClient', () => {
    let client: UncachedClient;

    beforeEach(() => {
        jest.useFakeTimers();
        client = new UncachedClient(createMockLogger(), 300);
    });

    afterEach(() => {
        jest.useRealTimers();
    });

    it('should issue a request on every fetch of the same key', async () => {
        const first = client.fetch('a');
        await jest.advanceTimersByTimeAsync(300);
        const second = client.fetch('a');
        await jest.advanceTimersByTimeAsync(300);

        expect(await first).toEqual({ id: 'a', data: 'Data for a' });
        expect(await second).toEqual({ id: 'a', data: 'Data for a' });
        expect(client.getMetrics()).toEqual({ requestCount: 2, cacheHitCount: 0, cachedKeyCount: 0 });
    });

    it('should send one sequential request per distinct key in a batch', async () => {
        let settled = false;
        const pending = client.batchFetch(['x', 'y', 'z', 'x']).then(result => {
            settled = true;
            return result;
        });

        await jest.advanceTimersByTimeAsync(600);
        expect(settled).toBe(false);
        expect(client.getMetrics().requestCount).toBe(3);

        await jest.advanceTimersByTimeAsync(300);
        const result = await pending;

        expect(settled).toBe(true);
        expect([...result.keys()]).toEqual(['x', 'y', 'z']);
        expect(client.getMetrics().requestCount).toBe(3);
    });

    it('should reject blank keys', async () => {
        await expect(client.fetch(' ')).rejects.toThrow(InvalidArgumentError);
        expect(client.getMetrics().requestCount).toBe(0);
    });

    it('should zero the request counter on reset', async () => {
        const pending = client.fetch('a');
        await jest.advanceTimersByTimeAsync(300);
        await pending;

        client.reset();
        expect(client.getMetrics().requestCount).toBe(0);
    });
});
