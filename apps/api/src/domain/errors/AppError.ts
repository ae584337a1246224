export class AppError extends Error {
    constructor(
        message: string,
        public readonly statusCode: number = 500
    ) {
        super(message);
        this.name = new.target.name;
    }
}

/**
 * Invalid or contradictory engine configuration. Fatal: raised at
 * construction or on the first offending call, never corrected silently.
 */
export class ConfigurationError extends AppError {
    constructor(message: string) {
        super(message, 500);
    }
}

/**
 * The embedding (or generation) provider failed or timed out.
 * Index state is untouched when this is raised.
 */
export class ProviderError extends AppError {
    constructor(
        message: string,
        public readonly timedOut: boolean = false,
        public readonly reason?: unknown
    ) {
        super(message, timedOut ? 504 : 502);
    }
}

export class NotFoundError extends AppError {
    constructor(message: string) {
        super(message, 404);
    }
}

/**
 * An internal invariant was violated, e.g. a chunk present in one index
 * but not in the other.
 */
export class ConsistencyError extends AppError {
    constructor(
        message: string,
        public readonly documentIds: string[] = []
    ) {
        super(message, 500);
    }
}

export class ValidationError extends AppError {
    constructor(message: string) {
        super(message, 400);
    }
}

export class CancelledError extends AppError {
    constructor(message = 'Operation cancelled') {
        super(message, 499);
    }
}
