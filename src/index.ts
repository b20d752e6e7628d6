export * from './errors';
export * from './types';
export { loadSettings } from './config';

export type { default as Logger, LogLevel } from './interfaces/logger';
export type { default as CacheClient, CachedPayload, CacheEntry, CacheMetrics, LatencyOptions } from './interfaces/cacheClient';
export type { default as TaskRunner, PureTask } from './interfaces/taskRunner';
export type { default as ResourceRegistry, ResourceKind, ResourceStats } from './interfaces/resourceRegistry';
export type { default as ExampleCatalog, OptimizationExample, OptimizationType, PerformanceMetrics } from './interfaces/exampleCatalog';
export type { default as FileSystem } from './interfaces/fileSystem';

export { default as ConsoleLogger } from './utils/consoleLogger';
export { default as PrefixLogger } from './utils/prefixLogger';
export { default as Debouncer } from './utils/debouncer';
export { default as Throttler } from './utils/throttler';
export { default as MockCacheClient } from './utils/mockCacheClient';
export { default as UncachedClient } from './utils/uncachedClient';
export { default as WorkerTaskRunner } from './utils/workerTaskRunner';
export { default as RealResourceRegistry } from './utils/realResourceRegistry';
export { default as realFileSystem } from './utils/realFileSystem';
export { JsonExampleCatalog, loadExampleCatalog, DEFAULT_CATALOG_PATH } from './utils/jsonExampleCatalog';
export { computeHeavyTask } from './utils/heavyComputation';
export { formatBytes, estimateMemoryUsage } from './utils/format';
export { default as LabSession, createLabSession } from './labSession';
export type { LabDependencies } from './labSession';
