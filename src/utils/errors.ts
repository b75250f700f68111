/**
 * Application error taxonomy.
 *
 * Every error raised on purpose by the service extends AppError so the HTTP
 * layer, the queue worker and the agent pipeline can tell failures apart by
 * class and attach context through `details`.
 */

export type ErrorDetails = Record<string, unknown>;

export interface AppErrorOptions {
    code?: string;
    details?: ErrorDetails;
    cause?: unknown;
}

export class AppError extends Error {
    readonly code: string;
    details: ErrorDetails;

    constructor(message: string, options: AppErrorOptions = {}) {
        super(message, options.cause === undefined ? undefined : { cause: options.cause });
        this.name = new.target.name;
        this.code = options.code ?? new.target.name;
        this.details = { ...(options.details ?? {}) };
    }

    /**
     * Merge extra context (stage name, ids) into the error details.
     * Existing keys win so the innermost context is never overwritten.
     */
    withContext(context: ErrorDetails): this {
        this.details = { ...context, ...this.details };
        return this;
    }

    toJSON(): { error: string; message: string; details: ErrorDetails; type: string } {
        return {
            error: this.code,
            message: this.message,
            details: this.details,
            type: this.name
        };
    }
}

export class ValidationError extends AppError {
    constructor(
        message: string,
        options: AppErrorOptions & { fields?: string[]; issues?: Array<{ path: string; message: string }> } = {}
    ) {
        const details: ErrorDetails = { ...(options.details ?? {}) };
        if (options.fields && options.fields.length > 0) {
            details.fields = options.fields;
        }
        if (options.issues && options.issues.length > 0) {
            details.issues = options.issues;
        }
        super(message, { ...options, details });
    }
}

export class NotFoundError extends AppError {
    constructor(
        message: string,
        options: AppErrorOptions & { resourceType?: string; resourceId?: string } = {}
    ) {
        const details: ErrorDetails = { ...(options.details ?? {}) };
        if (options.resourceType) {
            details.resource_type = options.resourceType;
        }
        if (options.resourceId) {
            details.resource_id = options.resourceId;
        }
        super(message, { ...options, details });
    }
}

export class ExternalServiceError extends AppError {
    constructor(
        message: string,
        options: AppErrorOptions & { service?: string; statusCode?: number } = {}
    ) {
        const details: ErrorDetails = { ...(options.details ?? {}) };
        if (options.service) {
            details.service = options.service;
        }
        if (options.statusCode !== undefined) {
            details.status_code = options.statusCode;
        }
        super(message, { ...options, details });
    }
}

export class DatabaseError extends AppError {
    constructor(
        message: string,
        options: AppErrorOptions & { operation?: string; table?: string } = {}
    ) {
        const details: ErrorDetails = { ...(options.details ?? {}) };
        if (options.operation) {
            details.operation = options.operation;
        }
        if (options.table) {
            details.table = options.table;
        }
        super(message, { ...options, details });
    }
}

export class ConfigurationError extends AppError {
    constructor(message: string, options: AppErrorOptions & { configKey?: string } = {}) {
        const details: ErrorDetails = { ...(options.details ?? {}) };
        if (options.configKey) {
            details.config_key = options.configKey;
        }
        super(message, { ...options, details });
    }
}

const STATUS_BY_ERROR: Array<[new (...args: never[]) => AppError, number]> = [
    [ValidationError, 400],
    [NotFoundError, 404],
    [ExternalServiceError, 502],
    [DatabaseError, 500],
    [ConfigurationError, 500]
];

export function getHttpStatus(error: AppError): number {
    const match = STATUS_BY_ERROR.find(([type]) => error instanceof type);
    return match ? match[1] : 500;
}

export function errorMessage(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return typeof error === 'string' ? error : 'Unknown error';
}

/**
 * Flatten an error and its `cause` chain for structured logs.
 */
export function describeErrorChain(error: unknown): Array<{ type: string; message: string; code?: string }> {
    const chain: Array<{ type: string; message: string; code?: string }> = [];
    const seen = new Set<unknown>();
    let current: unknown = error;

    while (current !== undefined && current !== null && !seen.has(current)) {
        seen.add(current);
        if (current instanceof AppError) {
            chain.push({ type: current.name, message: current.message, code: current.code });
        } else if (current instanceof Error) {
            chain.push({ type: current.name, message: current.message });
        } else {
            chain.push({ type: typeof current, message: String(current) });
            break;
        }
        current = current.cause;
    }

    return chain;
}
