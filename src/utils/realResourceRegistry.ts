import { InvalidArgumentError, ReleaseFailure, ResourceReleaseError } from '../errors';
import Logger from '../interfaces/logger';
import ResourceRegistry, { ResourceKind, ResourceStats } from '../interfaces/resourceRegistry';
import PrefixLogger from './prefixLogger';

interface TrackedResource {
    owner: string;
    kind: ResourceKind;
    label: string;
    release: () => void;
}

export default class RealResourceRegistry implements ResourceRegistry {
    private resources: TrackedResource[] = [];
    private data = new Map<string, { owner: string; value: string }>();
    private logger: Logger;

    constructor(logger: Logger) {
        this.logger = new PrefixLogger('ResourceRegistry', logger);
    }

    register(owner: string, kind: ResourceKind, label: string, release: () => void): void {
        this.resources.push({ owner, kind, label, release });
        this.logger.debug(`Registered ${kind} "${label}" for ${owner} (total ${this.count(kind)})`);
    }

    startTimer(owner: string, intervalMs: number, onTick: () => void): void {
        if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
            throw new InvalidArgumentError(`Timer interval must be a positive number (got ${intervalMs})`);
        }
        const handle = setInterval(onTick, intervalMs);
        this.register(owner, 'timer', `every ${intervalMs}ms`, () => clearInterval(handle));
    }

    storeData(owner: string, key: string, value: string): void {
        this.data.set(key, { owner, value });
        this.logger.debug(`Stored "${key}" for ${owner} (total entries: ${this.data.size})`);
    }

    releaseOwner(owner: string): number {
        let dropped = 0;
        for (const [key, entry] of this.data) {
            if (entry.owner === owner) {
                this.data.delete(key);
                dropped++;
            }
        }
        const released = this.releaseWhere(r => r.owner === owner);
        this.logger.info(`Released ${released} resource(s) and ${dropped} data entr${dropped === 1 ? 'y' : 'ies'} of ${owner}`);
        return released;
    }

    cleanup(kind: ResourceKind): number {
        const released = this.releaseWhere(r => r.kind === kind);
        this.logger.info(`Cleaned ${released} ${kind}(s)`);
        return released;
    }

    clearData(): number {
        const count = this.data.size;
        this.data.clear();
        this.logger.info(`Cleaned ${count} data entr${count === 1 ? 'y' : 'ies'}`);
        return count;
    }

    getStats(): ResourceStats {
        const storedData: Record<string, string> = {};
        for (const [key, entry] of this.data) {
            storedData[key] = entry.value;
        }
        return {
            timers: this.count('timer'),
            subscriptions: this.count('subscription'),
            dataEntries: this.data.size,
            storedData,
        };
    }

    dispose(): void {
        this.data.clear();
        this.releaseWhere(() => true);
    }

    private count(kind: ResourceKind): number {
        return this.resources.filter(r => r.kind === kind).length;
    }

    // Every matching resource is removed even if its release throws
    private releaseWhere(predicate: (resource: TrackedResource) => boolean): number {
        const matching = this.resources.filter(predicate);
        this.resources = this.resources.filter(r => !predicate(r));

        const failures: ReleaseFailure[] = [];
        for (const resource of matching) {
            try {
                resource.release();
            } catch (error) {
                this.logger.error(`Failed to release ${resource.kind} "${resource.label}" of ${resource.owner}`, error);
                failures.push({ owner: resource.owner, label: resource.label, error });
            }
        }
        if (failures.length > 0) {
            throw new ResourceReleaseError(failures);
        }
        return matching.length;
    }
}
