export interface LabErrorOptions {
    /** Hint shown to the developer on how to fix the call */
    suggestion?: string;
    cause?: unknown;
}

/** Base class for every error raised by the lab components */
export class LabError extends Error {
    readonly code: string;
    readonly suggestion?: string;

    constructor(message: string, code: string, options?: LabErrorOptions) {
        super(message, { cause: options?.cause });
        this.name = 'LabError';
        this.code = code;
        this.suggestion = options?.suggestion;

        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, this.constructor);
        }
    }

    format(): string {
        let result = `${this.name}: ${this.message}`;
        if (this.suggestion) {
            result += `\n  Suggestion: ${this.suggestion}`;
        }
        return result;
    }
}

export class InvalidArgumentError extends LabError {
    constructor(message: string, options?: LabErrorOptions) {
        super(message, 'INVALID_ARGUMENT', options);
        this.name = 'InvalidArgumentError';
    }
}

/** Raised when a component is used after `dispose()` */
export class DisposedError extends LabError {
    constructor(component: string) {
        super(`${component} has been disposed`, 'DISPOSED', {
            suggestion: `Create a new ${component} instead of reusing a disposed one`,
        });
        this.name = 'DisposedError';
    }
}

export class TaskError extends LabError {
    constructor(message: string, options?: LabErrorOptions) {
        super(message, 'TASK_FAILED', options);
        this.name = 'TaskError';
    }
}

export interface ReleaseFailure {
    owner: string;
    label: string;
    error: unknown;
}

/** One or more resource release callbacks threw; every other resource was still released */
export class ResourceReleaseError extends LabError {
    readonly failures: ReleaseFailure[];

    constructor(failures: ReleaseFailure[]) {
        const labels = failures.map(f => `${f.owner}/${f.label}`).join(', ');
        super(`Failed to release ${failures.length} resource(s): ${labels}`, 'RELEASE_FAILED', {
            cause: failures[0]?.error,
        });
        this.name = 'ResourceReleaseError';
        this.failures = failures;
    }
}

export class ConfigurationError extends LabError {
    constructor(message: string, options?: LabErrorOptions) {
        super(message, 'CONFIG_ERROR', options);
        this.name = 'ConfigurationError';
    }
}

export class CatalogError extends LabError {
    /** Path of the catalog file that failed to load */
    readonly filePath?: string;

    constructor(message: string, options?: { filePath?: string; cause?: unknown }) {
        super(message, 'CATALOG_ERROR', {
            suggestion: options?.filePath ? `Check the catalog file at: ${options.filePath}` : undefined,
            cause: options?.cause,
        });
        this.name = 'CatalogError';
        this.filePath = options?.filePath;
    }
}

export function isLabError(error: unknown): error is LabError {
    return error instanceof LabError;
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
