/**
 * Error taxonomy for a single ingestion run. Each class maps to its own
 * process exit code so scripts wrapping the CLI can tell failures apart.
 */
export interface HttpFailureDetails {
    status?: number;
    body?: string;
    cause?: unknown;
}

export abstract class IngestorError extends Error {
    abstract readonly exitCode: number;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

export class ConfigurationError extends IngestorError {
    readonly exitCode = 2;
}

export class AuthenticationError extends IngestorError {
    readonly exitCode = 3;
    readonly status?: number;
    readonly body?: string;

    constructor(message: string, details: HttpFailureDetails = {}) {
        super(message, {cause: details.cause});
        this.status = details.status;
        this.body = details.body;
    }
}

export class MetadataError extends IngestorError {
    readonly exitCode = 4;
}

/**
 * Thrown when the document or an attachment cannot be read, or when the
 * ingestion API rejects the upload.
 */
export class UploadError extends IngestorError {
    readonly exitCode = 5;
    readonly status?: number;
    readonly body?: string;

    constructor(message: string, details: HttpFailureDetails = {}) {
        super(message, {cause: details.cause});
        this.status = details.status;
        this.body = details.body;
    }
}

// Errors raised by Node internals may come from another realm, so no instanceof here
export function describeError(error: unknown): string {
    if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
        return error.message;
    }
    return String(error);
}

export function errorCode(error: unknown): string | undefined {
    if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
        return error.code;
    }
    return undefined;
}
