import type {ReadableStream, ReadableStreamDefaultReader, ReadableStreamReadResult} from 'node:stream/web';
import {ConnectivityError, describeError} from '../errors/BackupStorageError.js';

/**
 * A forward-only sequence of byte chunks that owns a resource.
 *
 * Breaking out of a `for await` loop, an error while reading, or reaching the end all
 * release the resource. A consumer that never iterates must call `close()`.
 */
export interface ByteStream extends AsyncIterable<Uint8Array> {
    close(): Promise<void>;
}

type StreamState = 'idle' | 'reading' | 'released';

/**
 * Byte stream backed by a live HTTP response body.
 */
export class ResponseByteStream implements ByteStream {
    private state: StreamState = 'idle';
    private reader: ReadableStreamDefaultReader<Uint8Array> | null = null;

    constructor(
        private readonly body: ReadableStream<Uint8Array> | null,
        private readonly label: string
    ) {
    }

    async* [Symbol.asyncIterator](): AsyncGenerator<Uint8Array, void, undefined> {
        if (this.state !== 'idle') {
            throw new Error(`Stream for ${this.label} was already consumed or closed`);
        }
        if (!this.body) {
            this.state = 'released';
            return;
        }

        this.state = 'reading';
        const reader = this.body.getReader();
        this.reader = reader;
        let finished = false;
        try {
            while (true) {
                let next: ReadableStreamReadResult<Uint8Array>;
                try {
                    next = await reader.read();
                } catch (error) {
                    throw new ConnectivityError(`Connection lost while reading ${this.label}: ${describeError(error)}`, {cause: error});
                }
                if (next.done) {
                    finished = true;
                    return;
                }
                yield next.value;
            }
        } finally {
            this.state = 'released';
            this.reader = null;
            if (!finished) {
                await this.cancel(() => reader.cancel());
            }
            reader.releaseLock();
        }
    }

    async close(): Promise<void> {
        if (this.state === 'released') {
            return;
        }
        if (this.state === 'reading' && this.reader) {
            // the active iterator observes the cancellation as end of stream and releases the lock
            const reader = this.reader;
            await this.cancel(() => reader.cancel());
            return;
        }
        this.state = 'released';
        const body = this.body;
        if (body && !body.locked) {
            await this.cancel(() => body.cancel());
        }
    }

    private async cancel(action: () => Promise<void>): Promise<void> {
        try {
            await action();
        } catch (error) {
            console.warn(`[webdav-client] Failed to release response for ${this.label}:`, describeError(error));
        }
    }
}
