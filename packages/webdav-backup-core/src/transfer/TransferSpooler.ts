/**
 * Transfer Spooler
 *
 * Turns a byte stream of unknown length into a local staging file with an exact size,
 * so the upload can be sent with a Content-Length instead of chunked encoding.
 */

import {randomUUID} from 'crypto';
import {open, rm} from 'fs/promises';
import type {FileHandle} from 'fs/promises';
import {tmpdir} from 'os';
import {join} from 'path';
import {describeError} from '../errors/BackupStorageError.js';

export const SPOOL_FLUSH_BYTES = 1024 * 1024;

export interface SpooledFile {
    path: string;

    /** Exact number of bytes received; the authoritative transfer length */
    size: number;

    /** Number of writes to the staging file */
    flushes: number;

    /** Remove the staging file. Safe to call more than once. */
    dispose(): Promise<void>;
}

export interface TransferSpoolerOptions {
    /** Directory for staging files (default: OS temp dir) */
    tempDir?: string;

    /** Buffered bytes that trigger a write (default 1 MiB) */
    flushThreshold?: number;

    /** File name prefix (default 'webdav_backup_') */
    prefix?: string;
}

async function removeFile(path: string): Promise<void> {
    try {
        await rm(path, {force: true});
    } catch (error) {
        console.warn(`[spooler] Failed to remove staging file ${path}: ${describeError(error)}`);
    }
}

export class TransferSpooler {
    private readonly tempDir: string;
    private readonly flushThreshold: number;
    private readonly prefix: string;

    constructor(options: TransferSpoolerOptions = {}) {
        this.tempDir = options.tempDir ?? tmpdir();
        this.flushThreshold = options.flushThreshold ?? SPOOL_FLUSH_BYTES;
        this.prefix = options.prefix ?? 'webdav_backup_';
        if (this.flushThreshold < 1) {
            throw new Error('flushThreshold must be >=1');
        }
    }

    /**
     * Consume the stream into a new staging file.
     * On failure the partial file is removed before the error propagates.
     */
    async spool(stream: AsyncIterable<Uint8Array>): Promise<SpooledFile> {
        const path = join(this.tempDir, `${this.prefix}${randomUUID()}.tar`);
        let handle: FileHandle | null = await open(path, 'wx');

        let size = 0;
        let flushes = 0;
        let buffered: Uint8Array[] = [];
        let bufferedBytes = 0;

        const flush = async (target: FileHandle): Promise<void> => {
            const data = Buffer.concat(buffered, bufferedBytes);
            buffered = [];
            bufferedBytes = 0;
            await target.appendFile(data);
            flushes++;
        };

        try {
            for await (const chunk of stream) {
                if (chunk.byteLength === 0) {
                    continue;
                }
                buffered.push(chunk);
                bufferedBytes += chunk.byteLength;
                size += chunk.byteLength;
                if (bufferedBytes >= this.flushThreshold) {
                    await flush(handle);
                }
            }
            if (bufferedBytes > 0) {
                await flush(handle);
            }
            const closing = handle;
            handle = null;
            await closing.close();
        } catch (error) {
            if (handle) {
                await handle.close().catch((closeError: unknown) => {
                    console.warn(`[spooler] Failed to close staging file ${path}: ${describeError(closeError)}`);
                });
            }
            await removeFile(path);
            throw error;
        }

        let disposed = false;
        return {
            path,
            size,
            flushes,
            async dispose(): Promise<void> {
                if (disposed) {
                    return;
                }
                disposed = true;
                await removeFile(path);
            },
        };
    }
}
