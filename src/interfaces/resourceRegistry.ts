export type ResourceKind = 'timer' | 'subscription';

export interface ResourceStats {
    timers: number;
    subscriptions: number;
    dataEntries: number;
    /** Copy of every stored data entry, keyed by data key */
    storedData: Record<string, string>;
}

// Tracks long-lived resources per owner so they can be released together
export default interface ResourceRegistry {
    register(owner: string, kind: ResourceKind, label: string, release: () => void): void;
    startTimer(owner: string, intervalMs: number, onTick: () => void): void;
    storeData(owner: string, key: string, value: string): void;

    /** Releases every resource and data entry of `owner`; returns the number of resources released */
    releaseOwner(owner: string): number;
    /** Releases every resource of `kind`, whoever owns it */
    cleanup(kind: ResourceKind): number;
    clearData(): number;

    getStats(): ResourceStats;
    dispose(): void;
}
