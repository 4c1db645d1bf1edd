/**
 * Error taxonomy for the storage layer.
 *
 * "Not found" is deliberately absent: it is the `not-found` variant of {@link StorageResult}.
 */

export type BackupStorageErrorKind =
    | 'unauthorized'
    | 'connectivity'
    | 'protocol'
    | 'transfer'
    | 'metadata'
    | 'agent'
    | 'configuration';

/**
 * Get error message safely from unknown error type
 */
export function describeError(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    if (typeof error === 'string') {
        return error;
    }
    return String(error);
}

export abstract class BackupStorageError extends Error {
    abstract readonly kind: BackupStorageErrorKind;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** 401/403 from the server; never retried or hidden behind fallbacks */
export class UnauthorizedError extends BackupStorageError {
    readonly kind = 'unauthorized';

    constructor(message: string, public readonly status: number) {
        super(message);
    }
}

/** No usable DAV root, or the request never completed */
export class ConnectivityError extends BackupStorageError {
    readonly kind = 'connectivity';
}

/** The server answered with something unexpected */
export class ProtocolError extends BackupStorageError {
    readonly kind = 'protocol';

    constructor(
        message: string,
        public readonly status?: number,
        public readonly body?: string,
        options?: { cause?: unknown }
    ) {
        super(message, options);
    }
}

/** Upload or download could not complete */
export class TransferError extends BackupStorageError {
    readonly kind = 'transfer';
}

/** Sidecar content could not be decoded or validated */
export class MetadataCorruptionError extends BackupStorageError {
    readonly kind = 'metadata';

    constructor(message: string, public readonly objectName: string, options?: { cause?: unknown }) {
        super(message, options);
    }
}

export type AgentOperation = 'list' | 'get' | 'delete';

/** A list/get/delete failure, carrying the operation it happened in */
export class BackupAgentError extends BackupStorageError {
    readonly kind = 'agent';

    constructor(public readonly operation: AgentOperation, message: string, options?: { cause?: unknown }) {
        super(message, options);
    }
}

export class ConfigurationError extends BackupStorageError {
    readonly kind = 'configuration';

    constructor(message: string, public readonly problems: string[] = []) {
        super(message);
    }
}

export function isAuthFailureStatus(status: number): boolean {
    return status === 401 || status === 403;
}
