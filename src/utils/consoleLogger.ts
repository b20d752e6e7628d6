import Logger, { LogLevel } from "../interfaces/logger";

const LEVEL_RANK: Record<LogLevel, number> = {
    silent: -1,
    error: 0,
    warn: 1,
    info: 2,
    debug: 3,
};

/** True when a message at `level` passes a `threshold` */
export function isLevelEnabled(level: LogLevel, threshold: LogLevel): boolean {
    return level !== 'silent' && LEVEL_RANK[level] <= LEVEL_RANK[threshold];
}

export default class ConsoleLogger implements Logger {
    private static LOG_PREFIX = '[OptimizationLab]';

    constructor(private level: LogLevel = 'info') {}

    info(message: string, ...meta: unknown[]): void {
        if (this.enabled('info')) console.log(this.format(message), ...meta);
    }
    warn(message: string, ...meta: unknown[]): void {
        if (this.enabled('warn')) console.warn(this.format(message), ...meta);
    }
    error(message: string, ...meta: unknown[]): void {
        if (this.enabled('error')) console.error(this.format(message), ...meta);
    }
    debug(message: string, ...meta: unknown[]): void {
        if (this.enabled('debug')) console.debug(this.format(message), ...meta);
    }

    private enabled(level: LogLevel): boolean {
        return isLevelEnabled(level, this.level);
    }

    private format(message: string): string {
        return `${ConsoleLogger.LOG_PREFIX} ${message}`;
    }
}
