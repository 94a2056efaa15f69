/**
 * Acquisition error taxonomy
 *
 * Every failure of a single station fetch is one of these classes. The fallback
 * selector catches them and records the station offline; only NotReadyError
 * (first refresh with no working station) reaches the caller.
 */

export class AcquisitionError extends Error {
    readonly sourceId?: string;

    constructor(message: string, sourceId?: string) {
        super(message);
        this.name = 'AcquisitionError';
        this.sourceId = sourceId;
    }
}

export class HttpError extends AcquisitionError {
    readonly status: number;

    constructor(status: number, body: string, sourceId?: string) {
        super(`HTTP ${status}${body ? `: ${body.slice(0, 200)}` : ''}`, sourceId);
        this.name = 'HttpError';
        this.status = status;
    }
}

export class MalformedResponseError extends AcquisitionError {
    constructor(message: string, sourceId?: string) {
        super(message, sourceId);
        this.name = 'MalformedResponseError';
    }
}

export class NoObservationsError extends AcquisitionError {
    constructor(sourceId?: string) {
        super('No observations in response - station may be offline', sourceId);
        this.name = 'NoObservationsError';
    }
}

export class ApiError extends AcquisitionError {
    readonly messages: string[];

    constructor(url: string, messages: string[], sourceId?: string) {
        super(`Error from ${url}: ${messages.join('; ')}`, sourceId);
        this.name = 'ApiError';
        this.messages = messages;
    }
}

export class TimeoutError extends AcquisitionError {
    readonly timeoutMs: number;

    constructor(timeoutMs: number, sourceId?: string) {
        super(`Request timed out after ${timeoutMs}ms`, sourceId);
        this.name = 'TimeoutError';
        this.timeoutMs = timeoutMs;
    }
}

/** Transport failure with no HTTP status (DNS, connection reset, TLS). */
export class NetworkError extends AcquisitionError {
    readonly code?: string;

    constructor(message: string, code?: string, sourceId?: string) {
        super(message, sourceId);
        this.name = 'NetworkError';
        this.code = code;
    }
}

export class NotReadyError extends AcquisitionError {
    readonly failures: ReadonlyMap<string, AcquisitionError>;

    constructor(failures: ReadonlyMap<string, AcquisitionError>) {
        const detail = Array.from(failures.entries())
            .map(([id, err]) => `${id}: ${err.message}`)
            .join('; ');
        super(`No station delivered data on the first refresh${detail ? ` (${detail})` : ''}`);
        this.name = 'NotReadyError';
        this.failures = failures;
    }
}

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

/**
 * Wrap anything thrown inside a fetch into the taxonomy so callers only ever
 * see AcquisitionError.
 */
export function toAcquisitionError(error: unknown, sourceId: string): AcquisitionError {
    if (error instanceof AcquisitionError) return error;
    const message = error instanceof Error ? error.message : String(error);
    return new NetworkError(message, undefined, sourceId);
}
