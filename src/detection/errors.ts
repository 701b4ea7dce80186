/**
 * Error taxonomy for the detection engine.
 * Only ConfigurationError and CancellationError abort a scan; upstream
 * failures are confined to the market they occurred on. Missing data is not
 * an error: samplers report it as an `unavailable` outcome.
 */

export class TransientUpstreamError extends Error {
    status?: number;

    constructor(message: string, status?: number) {
        super(message);
        this.name = 'TransientUpstreamError';
        this.status = status;
    }
}

export class ConfigurationError extends Error {
    problems: string[];

    constructor(message: string, problems: string[] = []) {
        super(problems.length > 0 ? `${message}: ${problems.join('; ')}` : message);
        this.name = 'ConfigurationError';
        this.problems = problems;
    }
}

export class CancellationError extends Error {
    constructor(message: string = 'Scan cancelled') {
        super(message);
        this.name = 'CancellationError';
    }
}

export function isTransientUpstreamError(error: unknown): error is TransientUpstreamError {
    return error instanceof TransientUpstreamError;
}

export function describeError(error: unknown): string {
    if (error instanceof Error) return `${error.name}: ${error.message}`;
    return String(error);
}

export function throwIfAborted(signal?: AbortSignal): void {
    if (signal?.aborted) {
        throw new CancellationError();
    }
}
