import { InvalidArgumentError } from '../errors';

// Runs at most one callback per interval; calls inside the interval are dropped, not deferred.
export default class Throttler {
    private lastRun: number | undefined;

    constructor(readonly intervalMs: number) {
        if (!Number.isFinite(intervalMs) || intervalMs < 0) {
            throw new InvalidArgumentError(`Throttle interval must be a finite, non-negative number (got ${intervalMs})`);
        }
    }

    run(callback: () => void): boolean {
        const now = Date.now();
        if (this.lastRun !== undefined && now - this.lastRun < this.intervalMs) {
            return false;
        }
        this.lastRun = now;
        callback();
        return true;
    }

    reset(): void {
        this.lastRun = undefined;
    }
}
