/**
 * A stored backup as the host describes it.
 *
 * Only the named fields are read by the storage layer. Anything else the host puts
 * on the descriptor travels through the metadata sidecar untouched.
 */
export interface BackupRecord {
    /** Opaque identifier supplied by the caller, unique within a storage folder */
    backup_id: string;

    /** Human-readable label */
    name: string;

    /** ISO-8601 timestamp, used for sort ordering */
    date: string;

    /** Archive length in bytes */
    size: number;

    /** Passphrase flag, carried through and never interpreted */
    protected: boolean;

    [extra: string]: unknown;
}

export type BackupRecordDict = Record<string, unknown>;
