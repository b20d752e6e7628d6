import { DisposedError, InvalidArgumentError } from '../errors';
import Logger from '../interfaces/logger';

/**
 * Coalesces a burst of triggers into one callback execution that runs once the
 * input has been quiet for `delayMs`. Each trigger replaces the pending callback
 * and restarts the delay.
 */
export default class Debouncer {
    private timeout: NodeJS.Timeout | undefined;
    private pending: (() => void) | undefined;
    private disposed = false;

    constructor(readonly delayMs: number, private logger?: Logger) {
        if (!Number.isFinite(delayMs) || delayMs < 0) {
            throw new InvalidArgumentError(`Debounce delay must be a finite, non-negative number (got ${delayMs})`);
        }
    }

    get isPending(): boolean {
        return this.timeout !== undefined;
    }

    trigger(callback: () => void): void {
        if (this.disposed) {
            throw new DisposedError('Debouncer');
        }
        if (this.timeout !== undefined) {
            clearTimeout(this.timeout);
            this.logger?.debug(`Restarting ${this.delayMs}ms delay`);
        }
        this.pending = callback;
        this.timeout = setTimeout(() => this.fire(), this.delayMs);
    }

    /** Drops the pending execution; the debouncer stays usable */
    cancel(): void {
        if (this.timeout !== undefined) {
            clearTimeout(this.timeout);
            this.timeout = undefined;
        }
        this.pending = undefined;
    }

    /** Runs the pending callback right away, if there is one */
    flush(): void {
        if (this.timeout === undefined) return;
        clearTimeout(this.timeout);
        this.fire();
    }

    dispose(): void {
        this.cancel();
        this.disposed = true;
    }

    private fire(): void {
        const callback = this.pending;
        this.timeout = undefined;
        this.pending = undefined;
        callback?.();
    }
}
