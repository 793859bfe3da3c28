/**
 * Error taxonomy
 *
 * Every error raised by the core or a connector is (or is wrapped into) a
 * KnowledgeError. The `kind` tells the caller how to react:
 * - action: voluntary abort (cancellation), never retried or alerted
 * - normal: expected condition (not found, bad input), caller fixes the input
 * - retryable: transient upstream condition, caller may retry with backoff
 * - runtime: unexpected fault, surfaced with diagnostic detail
 */

import { randomUUID } from 'crypto';

export type ErrorKind = 'action' | 'normal' | 'retryable' | 'runtime';

export const ERROR_KINDS: readonly ErrorKind[] = ['action', 'normal', 'retryable', 'runtime'];

/**
 * Serializable error, embedded in query responses
 */
export interface ErrorInfo {
    readonly code: number;
    readonly message: string;
    readonly data: {
        readonly errorId: string;
        readonly kind: ErrorKind;
        readonly extra: Readonly<Record<string, unknown>>;
        readonly stacktrace: string;
    };
}

export interface KnowledgeErrorOptions {
    code?: number;
    kind?: ErrorKind;
    errorId?: string;
    extra?: Record<string, unknown>;
    includeDetail?: boolean;
    cause?: unknown;
}

export class KnowledgeError extends Error {
    readonly code: number;
    readonly kind: ErrorKind;
    /** Stable identifier for cross-log correlation */
    readonly errorId: string;
    readonly extra: Record<string, unknown>;
    /** Whether `toInfo()` exposes extra data and the stacktrace */
    readonly includeDetail: boolean;

    constructor(message: string, options: KnowledgeErrorOptions = {}) {
        super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
        this.name = new.target.name;
        this.code = options.code ?? 500;
        this.kind = options.kind ?? 'runtime';
        this.errorId = options.errorId ?? randomUUID();
        this.extra = options.extra ?? {};
        this.includeDetail = options.includeDetail ?? (this.kind === 'runtime' || this.kind === 'retryable');
    }

    /**
     * Wrap anything thrown into the taxonomy.
     * KnowledgeErrors are returned as-is, so their id survives re-throws.
     */
    static from(error: unknown): KnowledgeError {
        if (error instanceof KnowledgeError) {
            return error;
        }
        if (error instanceof Error) {
            return new KnowledgeError(`Internal Server Error: ${error.message}`, { cause: error });
        }
        return new KnowledgeError(`Internal Server Error: ${String(error)}`);
    }

    toInfo(): ErrorInfo {
        return {
            code: this.code,
            message: this.message,
            data: {
                errorId: this.errorId,
                kind: this.kind,
                extra: this.includeDetail ? { ...this.extra } : {},
                stacktrace: this.includeDetail ? this.buildStacktrace() : '',
            },
        };
    }

    private buildStacktrace(): string {
        const own = this.stack ?? '';
        if (this.cause instanceof Error && this.cause.stack) {
            return `${own}\n\n---\n\n${this.cause.stack}`;
        }
        return own;
    }
}

/**
 * Raised when a resource cannot be loaded, either missing or forbidden.
 * The message never says which, to avoid leaking what exists.
 */
export class UnavailableError extends KnowledgeError {
    constructor(options: KnowledgeErrorOptions = {}) {
        super('Not Found: unavailable', { code: 404, kind: 'normal', includeDetail: false, ...options });
    }
}

export class BadRequestError extends KnowledgeError {
    constructor(reason: string, options: KnowledgeErrorOptions = {}) {
        super(`Bad Request: ${reason}`, { code: 400, kind: 'normal', includeDetail: false, ...options });
    }

    static capability(suffix: string): BadRequestError {
        return new BadRequestError(`unsupported capability: ${suffix}`);
    }
}

export class UriFormatError extends KnowledgeError {
    readonly value: string;

    constructor(value: string, reason: string) {
        super(`Bad Request: invalid URI '${value}': ${reason}`, { code: 400, kind: 'normal', includeDetail: false });
        this.value = value;
    }
}

export class IntegrationError extends KnowledgeError {
    constructor(message: string, options: KnowledgeErrorOptions = {}) {
        super(`Internal Server Error: ${message}`, { code: 500, kind: 'runtime', ...options });
    }

    static badConnector(realm: string, message: string): IntegrationError {
        return new IntegrationError(`bad connector '${realm}': ${message}`, { extra: { realm } });
    }

    static duplicate(realm: string): IntegrationError {
        return new IntegrationError(`duplicate connector '${realm}'`, { extra: { realm } });
    }
}

/**
 * Storage failure. Transient backend conditions (timeouts, 429, 5xx) are
 * retryable, anything else is a runtime fault.
 */
export class StorageError extends KnowledgeError {
    constructor(message: string, transient: boolean, options: KnowledgeErrorOptions = {}) {
        super(`Storage Error: ${message}`, {
            code: transient ? 503 : 500,
            kind: transient ? 'retryable' : 'runtime',
            ...options,
        });
    }
}

export type StopReason = 'stopped' | 'timeout';

export class StoppedError extends KnowledgeError {
    readonly reason: StopReason;

    constructor(reason: StopReason = 'stopped') {
        super(reason.toUpperCase(), { code: 418, kind: 'action', includeDetail: false });
        this.reason = reason;
    }
}

export class IngestionError extends KnowledgeError {
    constructor(message: string, options: KnowledgeErrorOptions = {}) {
        super(`Ingestion Error: ${message}`, { code: 500, kind: 'runtime', ...options });
    }
}

export class ConfigError extends KnowledgeError {
    constructor(message: string, issues: Record<string, string>) {
        super(`Invalid configuration: ${message}`, { code: 500, kind: 'runtime', extra: { issues } });
    }
}

/**
 * Throw a StoppedError when the request was cancelled
 */
export function throwIfAborted(signal: AbortSignal | undefined): void {
    if (signal?.aborted) {
        const reason: StopReason = signal.reason instanceof StoppedError ? signal.reason.reason : 'stopped';
        throw new StoppedError(reason);
    }
}
