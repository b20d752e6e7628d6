import { describe, expect, it } from '@jest/globals';
import { loadSettings } from '../config';
import { ConfigurationError } from '../errors';
import { defaultSettings } from '../types';

describe('loadSettings', () => {
    it('should return the defaults when no LAB_ variables are set', () => {
        expect(loadSettings({ PATH: '/usr/bin' })).toEqual(defaultSettings);
    });

    it('should merge valid variables over the defaults', () => {
        const settings = loadSettings({
            LAB_DEBOUNCE_MS: '250',
            LAB_WORKER_POOL_SIZE: '4',
            LAB_LOG_LEVEL: 'debug',
        });
        expect(settings).toEqual({
            debounceMs: 250,
            fetchLatencyMs: 300,
            batchLatencyMs: 500,
            workerPoolSize: 4,
            logLevel: 'debug',
        });
    });

    it('should treat blank variables as unset', () => {
        expect(loadSettings({ LAB_FETCH_LATENCY_MS: '  ' }).fetchLatencyMs).toBe(300);
    });

    it('should accept a zero latency', () => {
        expect(loadSettings({ LAB_BATCH_LATENCY_MS: '0' }).batchLatencyMs).toBe(0);
    });

    it('should list every invalid variable', () => {
        expect(() => loadSettings({ LAB_DEBOUNCE_MS: 'soon', LAB_WORKER_POOL_SIZE: '0' })).toThrow(
            'Invalid configuration: LAB_DEBOUNCE_MS: LAB_DEBOUNCE_MS must be a number; LAB_WORKER_POOL_SIZE: LAB_WORKER_POOL_SIZE must be at least 1'
        );
    });

    it('should reject negative and fractional durations', () => {
        expect(() => loadSettings({ LAB_FETCH_LATENCY_MS: '-5' })).toThrow('LAB_FETCH_LATENCY_MS must not be negative');
        expect(() => loadSettings({ LAB_FETCH_LATENCY_MS: '1.5' })).toThrow('LAB_FETCH_LATENCY_MS must be an integer');
    });

    it('should raise a ConfigurationError for an unknown log level', () => {
        expect(() => loadSettings({ LAB_LOG_LEVEL: 'verbose' })).toThrow(ConfigurationError);
    });
});
