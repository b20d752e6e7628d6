import { LogLevel } from './interfaces/logger';

// --- Settings ---
export interface LabSettings {
    /** Quiet period before a debounced search runs */
    debounceMs: number;
    /** Simulated latency of a single uncached fetch */
    fetchLatencyMs: number;
    /** Simulated latency of one batched request, whatever its size */
    batchLatencyMs: number;
    workerPoolSize: number;
    logLevel: LogLevel;
}

export const defaultSettings: LabSettings = {
    debounceMs: 500,
    fetchLatencyMs: 300,
    batchLatencyMs: 500,
    workerPoolSize: 2,
    logLevel: 'info'
};
