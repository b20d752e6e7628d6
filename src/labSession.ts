import CacheClient, { CachedPayload, CacheMetrics } from './interfaces/cacheClient';
import ExampleCatalog, { OptimizationExample } from './interfaces/exampleCatalog';
import Logger from './interfaces/logger';
import ResourceRegistry, { ResourceStats } from './interfaces/resourceRegistry';
import TaskRunner from './interfaces/taskRunner';
import { defaultSettings, LabSettings } from './types';
import ConsoleLogger from './utils/consoleLogger';
import Debouncer from './utils/debouncer';
import { computeHeavyTask } from './utils/heavyComputation';
import { loadExampleCatalog } from './utils/jsonExampleCatalog';
import MockCacheClient from './utils/mockCacheClient';
import PrefixLogger from './utils/prefixLogger';
import realFileSystem from './utils/realFileSystem';
import RealResourceRegistry from './utils/realResourceRegistry';
import WorkerTaskRunner from './utils/workerTaskRunner';

// Structure to hold the injected dependencies
export interface LabDependencies {
    catalog: ExampleCatalog;
    cacheClient: CacheClient;
    taskRunner: TaskRunner;
    registry: ResourceRegistry;
    logger: Logger;
}

const RESOURCE_TICK_MS = 1000;

/**
 * Wires the lab components together the way a comparison screen uses them:
 * debounced search over the catalog, cached network lookups, worker offload and
 * owned resources that are released when the session ends.
 */
export default class LabSession {
    private debounce: Debouncer;
    private logger: PrefixLogger;
    private ticks = new Map<string, number>();
    private disposed = false;

    constructor(private deps: LabDependencies, settings: LabSettings = defaultSettings) {
        this.logger = new PrefixLogger('LabSession', deps.logger);
        this.debounce = new Debouncer(settings.debounceMs, this.logger.child('search'));
    }

    /** Runs the search once typing has paused; only the latest query is searched */
    search(query: string, onResults: (results: OptimizationExample[]) => void): void {
        this.debounce.trigger(() => {
            const results = this.deps.catalog.search(query);
            this.logger.info(`Search "${query}" matched ${results.length} example(s)`);
            onResults(results);
        });
    }

    fetchItem(id: string): Promise<CachedPayload> {
        return this.deps.cacheClient.fetch(id);
    }

    batchFetch(ids: Iterable<string>): Promise<Map<string, CachedPayload>> {
        return this.deps.cacheClient.batchFetch(ids);
    }

    async runHeavyTask(iterations: number): Promise<number[]> {
        this.logger.info(`Offloading heavy task (${iterations} iterations)`);
        const started = Date.now();
        const results = await this.deps.taskRunner.run(computeHeavyTask, iterations);
        this.logger.info(`Heavy task finished in ${Date.now() - started}ms without blocking the caller`);
        return results;
    }

    /** Starts a ticking timer and a data entry owned by `owner` */
    openResourceDemo(owner: string): void {
        this.ticks.set(owner, 0);
        this.deps.registry.startTimer(owner, RESOURCE_TICK_MS, () => {
            this.ticks.set(owner, (this.ticks.get(owner) ?? 0) + 1);
        });
        this.deps.registry.storeData(owner, `${owner}:input`, `Input owned by ${owner}`);
    }

    closeResourceDemo(owner: string): number {
        this.ticks.delete(owner);
        return this.deps.registry.releaseOwner(owner);
    }

    getTicks(owner: string): number {
        return this.ticks.get(owner) ?? 0;
    }

    getNetworkMetrics(): CacheMetrics {
        return this.deps.cacheClient.getMetrics();
    }

    getResourceStats(): ResourceStats {
        return this.deps.registry.getStats();
    }

    async dispose(): Promise<void> {
        if (this.disposed) return;
        this.disposed = true;
        this.debounce.dispose();
        this.ticks.clear();
        try {
            this.deps.registry.dispose();
        } finally {
            await this.deps.taskRunner.dispose();
        }
        this.logger.info('All resources disposed');
    }
}

/** Builds a session on the real components, reading the catalog from data/examples.json */
export async function createLabSession(
    settings: LabSettings = defaultSettings,
    logger: Logger = new ConsoleLogger(settings.logLevel)
): Promise<LabSession> {
    const catalog = await loadExampleCatalog(realFileSystem, logger);
    return new LabSession({
        catalog,
        cacheClient: new MockCacheClient(logger, settings),
        taskRunner: new WorkerTaskRunner(logger, settings.workerPoolSize),
        registry: new RealResourceRegistry(logger),
        logger,
    }, settings);
}
