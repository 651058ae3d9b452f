/**
 * Error taxonomy for one sync run. The entry point maps each class to a log
 * line and exit code 1; only ApiError raised for a single fuel type is
 * recovered, by the pipeline.
 */

export class FuelFinderError extends Error {
    constructor(message: string, public readonly code: string, public readonly context?: Record<string, unknown>) {
        super(message);
        this.name = this.constructor.name;
        Error.captureStackTrace(this, this.constructor);
    }
}

export class ConfigurationError extends FuelFinderError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'CONFIG_ERROR', context);
    }
}

export class AuthenticationError extends FuelFinderError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'AUTH_ERROR', context);
    }
}

export class ApiError extends FuelFinderError {
    constructor(message: string, public readonly status?: number, context?: Record<string, unknown>) {
        super(message, 'API_ERROR', { ...context, status });
    }
}

export class NetworkError extends FuelFinderError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'NETWORK_ERROR', context);
    }
}

export class PipelineEmptyError extends FuelFinderError {
    constructor(message: string) {
        super(message, 'PIPELINE_EMPTY');
    }
}

export class OutputWriteError extends FuelFinderError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'OUTPUT_WRITE_ERROR', context);
    }
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
