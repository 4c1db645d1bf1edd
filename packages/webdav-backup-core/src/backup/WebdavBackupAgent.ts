/**
 * Backup agent storing archives on a WebDAV server.
 *
 * Each backup is two objects in the backup folder: the archive and a JSON sidecar holding the
 * full descriptor. Listing is driven by sidecars; archives without one are reported with a
 * descriptor synthesized from the archive's properties.
 */

import PQueue from 'p-queue';
import type {BackupDescriptorCodec, BackupRecord} from '@webdav-backup/backup-interface';
import {backupRecordCodec} from '@webdav-backup/backup-interface';
import {
    BackupAgentError,
    BackupStorageError,
    describeError,
    MetadataCorruptionError,
    ProtocolError,
    TransferError,
} from '../errors/BackupStorageError.js';
import {done, failed, type Failed, notFound, ok, type StorageResult, unwrapOrThrow, type WriteResult} from '../errors/StorageResult.js';
import type {DavStorage, FileStat} from '../webdav/WebdavClient.js';
import type {ByteStream} from '../webdav/ResponseByteStream.js';
import {type SpooledFile, TransferSpooler} from '../transfer/TransferSpooler.js';
import {archiveName, idFromArchiveName, idFromSidecarName, sidecarName, synthesizedBackupName} from './BackupNames.js';

export const AGENT_DOMAIN = 'webdav_backup';
export const AGENT_NAME = 'WebDAV';
export const LIST_CONCURRENCY = 5;

/** Opens the byte stream of the backup being uploaded */
export type BackupStreamSource = () => Promise<AsyncIterable<Uint8Array>>;

export interface WebdavBackupAgentOptions<T extends BackupRecord> {
    storage: DavStorage;

    /** Conversion between the host's descriptor and the sidecar mapping */
    codec: BackupDescriptorCodec<T>;

    spooler?: TransferSpooler;

    /** Distinguishes agents of several configured entries */
    entryId?: string;

    /** Simultaneous sidecar fetches while listing (default 5) */
    listConcurrency?: number;
}

const utf8 = new TextDecoder('utf-8', {fatal: true});

function isDefined<T>(value: T | undefined | void): value is T {
    return value !== undefined;
}

function newestFirst(a: BackupRecord, b: BackupRecord): number {
    if (a.date === b.date) {
        return 0;
    }
    return a.date < b.date ? 1 : -1;
}

export class WebdavBackupAgent<T extends BackupRecord = BackupRecord> {
    readonly domain = AGENT_DOMAIN;
    readonly name = AGENT_NAME;
    readonly uniqueId: string;

    private readonly storage: DavStorage;
    private readonly codec: BackupDescriptorCodec<T>;
    private readonly spooler: TransferSpooler;
    private readonly listConcurrency: number;

    constructor(options: WebdavBackupAgentOptions<T>) {
        this.storage = options.storage;
        this.codec = options.codec;
        this.spooler = options.spooler ?? new TransferSpooler();
        this.listConcurrency = options.listConcurrency ?? LIST_CONCURRENCY;
        this.uniqueId = options.entryId ? `${AGENT_DOMAIN}_${options.entryId}` : AGENT_DOMAIN;
    }

    /**
     * Spool the backup stream, store the archive with an exact length, then store the sidecar.
     * The archive is always complete before the sidecar is written.
     */
    async uploadBackup(backup: T, openStream: BackupStreamSource): Promise<WriteResult> {
        const backupId = backup.backup_id;
        let staged: SpooledFile | null = null;
        try {
            staged = await this.spooler.spool(await openStream());
            const archive = archiveName(backupId);
            this.throwIfFailed(await this.storage.putFile(archive, staged.path, staged.size));

            const sidecar = Buffer.from(JSON.stringify(this.codec.toDict(backup)), 'utf-8');
            this.throwIfFailed(await this.storage.putBytes(sidecarName(backupId), sidecar));

            console.log(`[backup-agent] Uploaded backup ${backupId} (${staged.size} bytes)`);
            return done();
        } catch (error) {
            const message = `Upload of backup ${backupId} failed: ${describeError(error)}`;
            console.error(`[backup-agent] ${message}`);
            return failed(new TransferError(message, {cause: error}));
        } finally {
            if (staged) {
                await staged.dispose();
            }
        }
    }

    /**
     * All backups in the folder, newest first.
     *
     * Unreadable sidecars are skipped with a warning. Sidecars whose archive is not in the
     * folder are skipped too, so every listed backup can be downloaded.
     */
    async listBackups(): Promise<WriteResult<T[]>> {
        try {
            const names = unwrapOrThrow(
                await this.storage.listFolder(),
                name => new ProtocolError(`Backup folder ${name} does not exist`, 404)
            );

            const archiveIds = new Set(names.map(idFromArchiveName).filter(isDefined));
            const sidecarIds: string[] = [];
            for (const id of names.map(idFromSidecarName).filter(isDefined)) {
                if (archiveIds.has(id)) {
                    sidecarIds.push(id);
                } else {
                    console.warn(`[backup-agent] Skipping metadata ${sidecarName(id)}: archive ${archiveName(id)} is missing`);
                }
            }

            const queue = new PQueue({concurrency: this.listConcurrency});
            const described = (await Promise.all(sidecarIds.map(id => queue.add(() => this.readListedSidecar(id)))))
                .filter(isDefined);

            const knownIds = new Set(described.map(backup => backup.backup_id));
            const unknownIds = [...archiveIds].filter(id => !knownIds.has(id));
            const synthesized = (await Promise.all(unknownIds.map(id => queue.add(() => this.synthesizeListed(id)))))
                .filter(isDefined);

            return ok([...described, ...synthesized].sort(newestFirst));
        } catch (error) {
            return failed(new BackupAgentError('list', `Listing backups failed: ${describeError(error)}`, {cause: error}));
        }
    }

    /**
     * One backup's descriptor: from its sidecar, or synthesized from the archive when the sidecar is missing.
     * A sidecar without its archive is not found, as in {@link listBackups}.
     */
    async getBackup(backupId: string): Promise<StorageResult<T>> {
        const sidecar = sidecarName(backupId);
        const metadata = await this.storage.getBytes(sidecar);
        if (metadata.status === 'failed') {
            return this.agentFailure('get', `Get backup metadata failed: ${metadata.error.message}`, metadata.error);
        }
        let described: T | null = null;
        if (metadata.status === 'ok') {
            try {
                described = this.decodeSidecar(sidecar, metadata.value);
            } catch (error) {
                return this.agentFailure('get', `Get backup metadata failed: ${describeError(error)}`, error);
            }
        }

        const info = await this.storage.stat(archiveName(backupId));
        switch (info.status) {
            case 'not-found':
                if (described) {
                    console.warn(`[backup-agent] Ignoring metadata ${sidecar}: archive ${archiveName(backupId)} is missing`);
                }
                return notFound(backupId);
            case 'failed':
                return this.agentFailure('get', `Get backup failed: ${info.error.message}`, info.error);
            case 'ok':
                if (described) {
                    return ok(described);
                }
                try {
                    return ok(this.synthesize(backupId, info.value));
                } catch (error) {
                    return this.agentFailure('get', `Get backup failed: ${describeError(error)}`, error);
                }
        }
    }

    /**
     * The archive as a lazy chunk sequence. Read errors surface as {@link TransferError};
     * abandoning the sequence or calling `close()` releases the connection.
     */
    async downloadBackup(backupId: string): Promise<StorageResult<ByteStream>> {
        const result = await this.storage.getStream(archiveName(backupId));
        switch (result.status) {
            case 'not-found':
                return notFound(backupId);
            case 'failed':
                return failed(new TransferError(`Download of backup ${backupId} failed: ${result.error.message}`, {cause: result.error}));
            case 'ok':
                return ok(remapStreamErrors(result.value, error => new TransferError(
                    `Download of backup ${backupId} failed: ${describeError(error)}`,
                    {cause: error}
                )));
        }
    }

    /**
     * Remove archive and sidecar. Not found only when neither existed.
     */
    async deleteBackup(backupId: string): Promise<StorageResult<void>> {
        const archive = await this.storage.delete(archiveName(backupId));
        const sidecar = await this.storage.delete(sidecarName(backupId));

        for (const result of [archive, sidecar]) {
            if (result.status === 'failed') {
                return this.agentFailure('delete', `Delete of backup ${backupId} failed: ${result.error.message}`, result.error);
            }
        }
        if (archive.status === 'not-found' && sidecar.status === 'not-found') {
            return notFound(backupId);
        }
        console.log(`[backup-agent] Deleted backup ${backupId}`);
        return done();
    }

    private throwIfFailed(result: WriteResult): void {
        if (result.status === 'failed') {
            throw result.error;
        }
    }

    private agentFailure(operation: 'get' | 'delete', message: string, cause: unknown): Failed {
        return failed(new BackupAgentError(operation, message, {cause}));
    }

    /**
     * @throws MetadataCorruptionError
     */
    private decodeSidecar(name: string, bytes: Uint8Array): T {
        try {
            return this.codec.fromDict(JSON.parse(utf8.decode(bytes)));
        } catch (error) {
            throw new MetadataCorruptionError(`Invalid metadata ${name}: ${describeError(error)}`, name, {cause: error});
        }
    }

    private synthesize(backupId: string, info: FileStat): T {
        return this.codec.fromDict({
            backup_id: backupId,
            name: synthesizedBackupName(backupId),
            date: info.modifiedIso,
            size: info.size,
            protected: false,
        });
    }

    private async readListedSidecar(backupId: string): Promise<T | undefined> {
        const name = sidecarName(backupId);
        const result = await this.storage.getBytes(name);
        if (result.status !== 'ok') {
            const reason = result.status === 'failed' ? result.error.message : 'no longer exists';
            console.warn(`[backup-agent] Skipping metadata ${name}: ${reason}`);
            return undefined;
        }
        try {
            return this.decodeSidecar(name, result.value);
        } catch (error) {
            console.warn(`[backup-agent] Skipping invalid metadata ${name}: ${describeError(error)}`);
            return undefined;
        }
    }

    /**
     * An archive deleted since the folder was listed is left out; any other failure fails the listing.
     */
    private async synthesizeListed(backupId: string): Promise<T | undefined> {
        const info = await this.storage.stat(archiveName(backupId));
        if (info.status === 'not-found') {
            return undefined;
        }
        if (info.status === 'failed') {
            throw info.error;
        }
        return this.synthesize(backupId, info.value);
    }
}

function remapStreamErrors(stream: ByteStream, remap: (error: unknown) => BackupStorageError): ByteStream {
    return {
        async* [Symbol.asyncIterator](): AsyncGenerator<Uint8Array, void, undefined> {
            try {
                yield* stream;
            } catch (error) {
                throw remap(error);
            }
        },
        close: () => stream.close(),
    };
}

export function createWebdavBackupAgent(storage: DavStorage, entryId?: string, spooler?: TransferSpooler): WebdavBackupAgent {
    return new WebdavBackupAgent<BackupRecord>({storage, codec: backupRecordCodec, entryId, spooler});
}
