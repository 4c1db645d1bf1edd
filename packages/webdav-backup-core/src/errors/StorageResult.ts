import type {BackupStorageError} from './BackupStorageError.js';

export interface Ok<T> {
    status: 'ok';
    value: T;
}

export interface NotFound {
    status: 'not-found';
    /** Object name or backup id that was missing */
    name: string;
}

export interface Failed {
    status: 'failed';
    error: BackupStorageError;
}

/** Outcome of a storage operation: success, a distinct "doesn't exist", or a fatal error */
export type StorageResult<T> = Ok<T> | NotFound | Failed;

/** Outcome of an operation for which "doesn't exist" is not a meaningful answer */
export type WriteResult<T = void> = Ok<T> | Failed;

export function ok<T>(value: T): Ok<T> {
    return {status: 'ok', value};
}

export function done(): Ok<void> {
    return {status: 'ok', value: undefined};
}

export function notFound(name: string): NotFound {
    return {status: 'not-found', name};
}

export function failed(error: BackupStorageError): Failed {
    return {status: 'failed', error};
}

/**
 * Return the value or throw the carried error.
 * A not-found result is turned into an error by `onNotFound`.
 */
export function unwrapOrThrow<T>(result: StorageResult<T>, onNotFound: (name: string) => BackupStorageError): T {
    switch (result.status) {
        case 'ok':
            return result.value;
        case 'not-found':
            throw onNotFound(result.name);
        case 'failed':
            throw result.error;
    }
}
