import Logger, { LogLevel } from "../interfaces/logger";
import { isLevelEnabled } from "./consoleLogger";

/**
 * Tags a component's messages with its name. A component can be quietened on its
 * own by giving it a stricter level than the logger it writes to.
 */
export default class PrefixLogger implements Logger {
    constructor(private prefix: string, private logger: Logger, private level: LogLevel = 'debug') {}

    error(message: string, ...meta: unknown[]): void {
        if (isLevelEnabled('error', this.level)) this.logger.error(this.format(message), ...meta);
    }
    warn(message: string, ...meta: unknown[]): void {
        if (isLevelEnabled('warn', this.level)) this.logger.warn(this.format(message), ...meta);
    }
    info(message: string, ...meta: unknown[]): void {
        if (isLevelEnabled('info', this.level)) this.logger.info(this.format(message), ...meta);
    }
    debug(message: string, ...meta: unknown[]): void {
        if (isLevelEnabled('debug', this.level)) this.logger.debug(this.format(message), ...meta);
    }

    /** Nested scope, e.g. `LabSession/search` */
    child(scope: string, level: LogLevel = this.level): PrefixLogger {
        return new PrefixLogger(`${this.prefix}/${scope}`, this.logger, level);
    }

    private format(message: string): string {
        return `${this.prefix}: ${message}`;
    }
}
