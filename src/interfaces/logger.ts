// Minimal logging contract shared by every component
export default interface Logger {
    error(message: string, ...meta: unknown[]): void;
    warn(message: string, ...meta: unknown[]): void;
    info(message: string, ...meta: unknown[]): void;
    debug(message: string, ...meta: unknown[]): void;
}

export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'silent';
