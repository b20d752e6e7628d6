import { z, ZodError } from 'zod';
import { ConfigurationError } from './errors';
import { defaultSettings, LabSettings } from './types';

type RawEnv = Record<string, string | undefined>;

const logLevelSchema = z.enum(['error', 'warn', 'info', 'debug', 'silent']);

const durationSchema = (name: string) => z.coerce
    .number({ invalid_type_error: `${name} must be a number` })
    .int(`${name} must be an integer`)
    .min(0, `${name} must not be negative`);

const envSchema = z.object({
    LAB_DEBOUNCE_MS: durationSchema('LAB_DEBOUNCE_MS').optional(),
    LAB_FETCH_LATENCY_MS: durationSchema('LAB_FETCH_LATENCY_MS').optional(),
    LAB_BATCH_LATENCY_MS: durationSchema('LAB_BATCH_LATENCY_MS').optional(),
    LAB_WORKER_POOL_SIZE: z.coerce
        .number({ invalid_type_error: 'LAB_WORKER_POOL_SIZE must be a number' })
        .int('LAB_WORKER_POOL_SIZE must be an integer')
        .min(1, 'LAB_WORKER_POOL_SIZE must be at least 1')
        .optional(),
    LAB_LOG_LEVEL: logLevelSchema.optional(),
});

/**
 * Reads `LAB_*` variables and merges them over {@link defaultSettings}.
 * Blank variables count as unset.
 */
export function loadSettings(env: RawEnv = process.env): LabSettings {
    const present: RawEnv = {};
    for (const [name, value] of Object.entries(env)) {
        if (name.startsWith('LAB_') && value !== undefined && value.trim() !== '') {
            present[name] = value.trim();
        }
    }

    try {
        const parsed = envSchema.parse(present);
        return {
            debounceMs: parsed.LAB_DEBOUNCE_MS ?? defaultSettings.debounceMs,
            fetchLatencyMs: parsed.LAB_FETCH_LATENCY_MS ?? defaultSettings.fetchLatencyMs,
            batchLatencyMs: parsed.LAB_BATCH_LATENCY_MS ?? defaultSettings.batchLatencyMs,
            workerPoolSize: parsed.LAB_WORKER_POOL_SIZE ?? defaultSettings.workerPoolSize,
            logLevel: parsed.LAB_LOG_LEVEL ?? defaultSettings.logLevel,
        };
    } catch (error) {
        if (error instanceof ZodError) {
            const formatted = error.errors
                .map(issue => {
                    const [pathSegment] = issue.path;
                    const identifier = typeof pathSegment === 'string' ? pathSegment : 'unknown';
                    return `${identifier}: ${issue.message}`;
                })
                .join('; ');
            throw new ConfigurationError(`Invalid configuration: ${formatted}`, { cause: error });
        }
        throw error;
    }
}
