/**
 * Host-facing lifecycle of one configured storage location.
 */

import {ListenerCleaner} from '@webdav-backup/async-utils';
import type {BackupDescriptorCodec, BackupRecord} from '@webdav-backup/backup-interface';
import type {EnvConfig, WebdavConnectionConfig} from '../config/EnvConfig.js';
import {type BackupStorageError, ProtocolError, UnauthorizedError} from '../errors/BackupStorageError.js';
import {WebdavClient} from '../webdav/WebdavClient.js';
import type {DavFetch} from '../webdav/DavTransport.js';
import {TransferSpooler} from '../transfer/TransferSpooler.js';
import {WebdavBackupAgent} from '../backup/WebdavBackupAgent.js';
import type {BackupAgentRegistry} from '../backup/BackupAgentRegistry.js';

export type EntryConfig = WebdavConnectionConfig & Partial<Pick<EnvConfig, 'connectTimeoutMs' | 'probeTimeoutMs' | 'tempDir'>>;

export interface IntegrationOptions<T extends BackupRecord> {
    codec: BackupDescriptorCodec<T>;

    /** Replaces the network; used by tests */
    fetch?: DavFetch;
}

export interface EntryHandle<T extends BackupRecord> {
    entryId: string;
    client: WebdavClient;
    agent: WebdavBackupAgent<T>;

    /** Register a callback to run when the entry is unloaded */
    onUnload(callback: () => void | Promise<void>): void;

    unload(): Promise<void>;
}

function createClient(config: EntryConfig, fetch?: DavFetch): WebdavClient {
    return new WebdavClient({...config, fetch});
}

/**
 * Set up one entry: make sure the folder exists, register the agent and notify listeners.
 *
 * A failing folder check does not stop setup; the entry still loads and the
 * individual backup operations report the problem.
 */
export async function setupEntry<T extends BackupRecord>(
    registry: BackupAgentRegistry<T>,
    entryId: string,
    config: EntryConfig,
    options: IntegrationOptions<T>
): Promise<EntryHandle<T>> {
    const client = createClient(config, options.fetch);

    const folder = await client.ensureFolder();
    if (folder.status === 'failed') {
        console.warn(`[integration] Could not ensure backup folder exists: ${folder.error.message}`);
    }

    const agent = new WebdavBackupAgent<T>({
        storage: client,
        codec: options.codec,
        entryId,
        spooler: new TransferSpooler({tempDir: config.tempDir}),
    });

    const cleaner = new ListenerCleaner();
    cleaner.add(() => client.close());
    cleaner.add(() => {
        registry.removeEntry(entryId);
    });

    registry.addEntry(entryId, agent);
    console.log(`[integration] Registered backup agent ${agent.uniqueId} for ${client.user} at ${client.folderPath}`);

    let unloaded = false;
    return {
        entryId,
        client,
        agent,
        onUnload(callback: () => void | Promise<void>): void {
            cleaner.add(callback);
        },
        async unload(): Promise<void> {
            if (unloaded) {
                return;
            }
            unloaded = true;
            await cleaner.cleanUp();
        },
    };
}

export type ConnectionErrorCode = 'invalid_auth' | 'cannot_connect';

export type ConnectionCheck =
    | { status: 'ok' }
    | { status: 'failed'; code: ConnectionErrorCode; error: BackupStorageError };

/**
 * Check credentials and folder access before the host stores an entry.
 */
export async function validateConnection(config: EntryConfig, fetch?: DavFetch): Promise<ConnectionCheck> {
    const client = createClient(config, fetch);
    try {
        const folder = await client.ensureFolder();
        const listing = folder.status === 'failed' ? folder : await client.listFolder();
        if (listing.status === 'ok') {
            return {status: 'ok'};
        }

        const error = listing.status === 'failed'
            ? listing.error
            : new ProtocolError(`Backup folder ${listing.name} is still missing after creation`, 404);
        const code: ConnectionErrorCode = error instanceof UnauthorizedError ? 'invalid_auth' : 'cannot_connect';
        console.error(`[integration] Validation failed (${code}): ${error.message}`);
        return {status: 'failed', code, error};
    } finally {
        await client.close();
    }
}
