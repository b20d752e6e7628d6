import { InvalidArgumentError } from '../errors';
import { CachedPayload } from '../interfaces/cacheClient';

export function sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}

export function assertValidKey(key: string): void {
    if (key.trim() === '') {
        throw new InvalidArgumentError('Cache key must not be empty', {
            suggestion: 'Pass a non-blank identifier such as "item1"',
        });
    }
}

/** Validates every key up front and drops duplicates, keeping first-seen order */
export function distinctKeys(keys: Iterable<string>): string[] {
    const unique = new Set<string>();
    for (const key of keys) {
        assertValidKey(key);
        unique.add(key);
    }
    return [...unique];
}

/** Payload the simulated backend returns for `id` */
export function simulatedPayload(id: string): CachedPayload {
    return { id, data: `Data for ${id}` };
}
