/**
 * WebDAV Client
 *
 * Name-based file operations inside one backup folder on a WebDAV server whose DAV root
 * is not known in advance. Knows nothing about backups.
 *
 * Every public operation returns a tagged result; fatal failures never escape as exceptions.
 */

import {once} from 'events';
import {createReadStream, type ReadStream} from 'fs';
import {stat as statFile} from 'fs/promises';
import type {Agent, RequestInit, Response} from 'undici';
import {
    BackupStorageError,
    ConnectivityError,
    describeError,
    isAuthFailureStatus,
    ProtocolError,
    UnauthorizedError,
} from '../errors/BackupStorageError.js';
import {done, failed, type Failed, notFound, ok, type StorageResult, type WriteResult} from '../errors/StorageResult.js';
import {DEFAULT_CONNECT_TIMEOUT_MS, DEFAULT_PROBE_TIMEOUT_MS, normalizeBackupPath, type WebdavConnectionConfig} from '../config/EnvConfig.js';
import {basicAuthHeader, createDavAgent, type DavFetch, defaultDavFetch} from './DavTransport.js';
import {hrefLeafName, hrefPath, parseMultiStatus} from './MultiStatus.js';
import {type ByteStream, ResponseByteStream} from './ResponseByteStream.js';

const XML_CONTENT_TYPE = 'application/xml; charset=utf-8';

const RESOURCETYPE_QUERY = '<?xml version="1.0"?>'
    + '<d:propfind xmlns:d="DAV:"><d:prop><d:resourcetype/></d:prop></d:propfind>';

const DISPLAYNAME_QUERY = '<?xml version="1.0"?>'
    + '<d:propfind xmlns:d="DAV:"><d:prop><d:displayname/></d:prop></d:propfind>';

const STAT_QUERY = '<?xml version="1.0"?>'
    + '<d:propfind xmlns:d="DAV:"><d:prop><d:getcontentlength/><d:getlastmodified/></d:prop></d:propfind>';

const DELETE_SUCCESS = new Set([200, 202, 204]);

// RFC 1123 / RFC 2822 dates as servers send them in getlastmodified
const HTTP_DATE = /^(?:[A-Za-z]{3},\s*)?\d{1,2}\s+[A-Za-z]{3}\s+\d{4}\s+\d{2}:\d{2}(?::\d{2})?\s+(?:GMT|UTC|UT|[+-]\d{4})$/;

export interface WebdavClientOptions extends WebdavConnectionConfig {
    /** Bound on connection setup (default 60000) */
    connectTimeoutMs?: number;

    /** Timeout of each DAV root probe (default 30000) */
    probeTimeoutMs?: number;

    /** Replaces the network; used by tests */
    fetch?: DavFetch;
}

export interface FileStat {
    size: number;

    /** getlastmodified exactly as the server sent it ('' when absent) */
    modifiedRaw: string;

    /** UTC ISO-8601 form, the raw value when it cannot be parsed, or now when absent */
    modifiedIso: string;
}

/**
 * Operations the backup agent needs from a storage backend.
 */
export interface DavStorage {
    ensureFolder(): Promise<WriteResult>;
    listFolder(): Promise<StorageResult<string[]>>;
    putBytes(name: string, data: Uint8Array): Promise<WriteResult>;
    putFile(name: string, path: string, size: number): Promise<WriteResult>;
    putStream(name: string, stream: AsyncIterable<Uint8Array>): Promise<WriteResult>;
    getBytes(name: string): Promise<StorageResult<Buffer>>;
    getStream(name: string): Promise<StorageResult<ByteStream>>;
    stat(name: string): Promise<StorageResult<FileStat>>;
    delete(name: string): Promise<StorageResult<void>>;
}

/**
 * Normalize a getlastmodified value to UTC ISO-8601.
 */
export function normalizeLastModified(raw: string, now: () => Date = () => new Date()): string {
    if (!raw) {
        return now().toISOString();
    }
    if (HTTP_DATE.test(raw)) {
        const parsed = new Date(raw);
        if (!Number.isNaN(parsed.getTime())) {
            return parsed.toISOString();
        }
    }
    return raw;
}

function asStorageError(error: unknown, context: string): BackupStorageError {
    if (error instanceof BackupStorageError) {
        return error;
    }
    return new ConnectivityError(`${context}: ${describeError(error)}`, {cause: error});
}

async function readBodyText(response: Response): Promise<string> {
    try {
        return await response.text();
    } catch (error) {
        return `<unreadable body: ${describeError(error)}>`;
    }
}

async function releaseBody(response: Response): Promise<void> {
    if (response.body && !response.bodyUsed) {
        try {
            await response.body.cancel();
        } catch (error) {
            console.warn(`[webdav-client] Failed to release response body: ${describeError(error)}`);
        }
    }
}

async function closeFileStream(stream: ReadStream): Promise<void> {
    if (stream.closed) {
        return;
    }
    const closed = once(stream, 'close');
    stream.destroy();
    await closed;
}

export class WebdavClient implements DavStorage {
    private readonly baseUrl: string;
    private readonly username: string;
    private readonly authorization: string;
    private readonly folderSegments: string[];
    private readonly rootCandidates: string[];
    private readonly probeTimeoutMs: number;
    private readonly sendRequest: DavFetch;
    private readonly agent: Agent;

    // first successful probe wins; cleared again if the probe fails so later calls retry
    private rootResolution: Promise<string> | null = null;

    constructor(options: WebdavClientOptions) {
        this.baseUrl = options.baseUrl.replace(/\/+$/, '') + '/';
        this.username = options.username;
        this.authorization = basicAuthHeader(options.username, options.password);
        this.folderSegments = normalizeBackupPath(options.backupPath).split('/').filter(segment => segment.length > 0);
        this.rootCandidates = [
            `remote.php/dav/files/${encodeURIComponent(options.username)}/`,
            'remote.php/webdav/',
        ];
        this.probeTimeoutMs = options.probeTimeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS;
        this.sendRequest = options.fetch ?? defaultDavFetch;
        this.agent = createDavAgent({
            verifySsl: options.verifySsl,
            connectTimeoutMs: options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS,
        });
    }

    get user(): string {
        return this.username;
    }

    /** Backup folder path below the DAV root, e.g. '/HomeAssistant/Backups' */
    get folderPath(): string {
        return '/' + this.folderSegments.join('/');
    }

    /**
     * Find the first DAV root that answers a depth-0 PROPFIND. Resolved once per client.
     */
    async resolveRoot(): Promise<WriteResult<string>> {
        try {
            return ok(await this.discoverRoot());
        } catch (error) {
            return failed(asStorageError(error, 'DAV root discovery failed'));
        }
    }

    /**
     * Forget the resolved DAV root; the next operation probes again.
     */
    invalidateRoot(): void {
        this.rootResolution = null;
    }

    /**
     * Make sure the backup folder exists, creating each missing segment with MKCOL.
     */
    async ensureFolder(): Promise<WriteResult> {
        return this.guard('Ensuring backup folder', async () => {
            const root = await this.discoverRoot();
            const folderUrl = this.folderUrl(root);

            try {
                const response = await this.send(folderUrl, {
                    method: 'PROPFIND',
                    headers: this.headers({Depth: '0'}),
                });
                await this.assertAuthorized(response, 'PROPFIND', folderUrl);
                await releaseBody(response);
                if (response.ok) {
                    return done();
                }
            } catch (error) {
                if (error instanceof UnauthorizedError) {
                    throw error;
                }
                console.warn(`[webdav-client] Folder check failed, creating ${this.folderPath}: ${describeError(error)}`);
            }

            let current = this.rootUrl(root);
            for (const segment of this.folderSegments) {
                current += encodeURIComponent(segment) + '/';
                await this.makeCollection(current);
            }
            console.log(`[webdav-client] Backup folder ready: ${this.folderPath}`);
            return done();
        });
    }

    /**
     * Names of the entries directly inside the backup folder, deduplicated and sorted.
     */
    async listFolder(): Promise<StorageResult<string[]>> {
        return this.guard('Listing backup folder', async () => {
            const folderUrl = this.folderUrl(await this.discoverRoot());
            const response = await this.send(folderUrl, {
                method: 'PROPFIND',
                headers: this.headers({Depth: '1', 'Content-Type': XML_CONTENT_TYPE}),
                body: DISPLAYNAME_QUERY,
            });
            if (response.status === 404) {
                await releaseBody(response);
                return notFound(this.folderPath);
            }
            const body = await this.expectMultiStatus(response, 'PROPFIND', folderUrl);

            const folderPath = hrefPath(folderUrl, folderUrl);
            const names = new Set<string>();
            for (const entry of await parseMultiStatus(body)) {
                if (hrefPath(entry.href, folderUrl) === folderPath) {
                    continue;
                }
                const leaf = hrefLeafName(entry.href, folderUrl);
                if (leaf) {
                    names.add(leaf);
                }
            }
            return ok([...names].sort());
        });
    }

    /**
     * Store an in-memory buffer with an explicit Content-Length.
     */
    async putBytes(name: string, data: Uint8Array): Promise<WriteResult> {
        return this.guard(`Uploading ${name}`, async () => {
            const url = await this.fileUrl(name);
            const response = await this.send(url, {
                method: 'PUT',
                headers: this.headers({
                    'Content-Type': 'application/octet-stream',
                    'Content-Length': String(data.byteLength),
                }),
                body: data,
            });
            await this.expectSuccess(response, 'PUT', url);
            return done();
        });
    }

    /**
     * Stream a local file with an explicit Content-Length, so no chunked encoding is used.
     * A non-positive size is replaced by the file's real size; if that is unknown too,
     * the request goes out without a length.
     */
    async putFile(name: string, path: string, size: number): Promise<WriteResult> {
        return this.guard(`Uploading ${name}`, async () => {
            let length = size;
            if (length <= 0) {
                try {
                    length = (await statFile(path)).size;
                } catch (error) {
                    console.warn(`[webdav-client] Cannot determine size of ${path}, sending without Content-Length: ${describeError(error)}`);
                    length = 0;
                }
            }

            const url = await this.fileUrl(name);
            const extra: Record<string, string> = {'Content-Type': 'application/octet-stream'};
            if (length > 0) {
                extra['Content-Length'] = String(length);
            }
            const body = createReadStream(path);
            try {
                const response = await this.send(url, {
                    method: 'PUT',
                    headers: this.headers(extra),
                    body,
                    duplex: 'half',
                });
                await this.expectSuccess(response, 'PUT', url);
                return done();
            } finally {
                // a server may answer before reading the whole body
                await closeFileStream(body);
            }
        });
    }

    /**
     * Chunked upload of a stream of unknown length.
     * Kept for compatibility; proxies often reject chunked PUTs, so uploads prefer {@link putFile}.
     */
    async putStream(name: string, stream: AsyncIterable<Uint8Array>): Promise<WriteResult> {
        return this.guard(`Uploading ${name}`, async () => {
            const url = await this.fileUrl(name);
            const response = await this.send(url, {
                method: 'PUT',
                headers: this.headers({'Content-Type': 'application/octet-stream'}),
                body: stream,
                duplex: 'half',
            });
            await this.expectSuccess(response, 'PUT', url);
            return done();
        });
    }

    async getBytes(name: string): Promise<StorageResult<Buffer>> {
        return this.guard(`Fetching ${name}`, async () => {
            const url = await this.fileUrl(name);
            const response = await this.send(url, {method: 'GET', headers: this.headers()});
            if (response.status === 404) {
                await releaseBody(response);
                return notFound(name);
            }
            await this.expectSuccess(response, 'GET', url, false);
            return ok(Buffer.from(await response.arrayBuffer()));
        });
    }

    /**
     * Open the file as a lazy chunk sequence backed by the live response.
     * The connection is released when the sequence ends, fails, is abandoned or closed.
     */
    async getStream(name: string): Promise<StorageResult<ByteStream>> {
        return this.guard(`Fetching ${name}`, async () => {
            const url = await this.fileUrl(name);
            const response = await this.send(url, {method: 'GET', headers: this.headers()});
            if (response.status === 404) {
                await releaseBody(response);
                return notFound(name);
            }
            await this.expectSuccess(response, 'GET', url, false);
            return ok(new ResponseByteStream(response.body, name));
        });
    }

    /**
     * Size and last-modified time via a depth-0 PROPFIND.
     */
    async stat(name: string): Promise<StorageResult<FileStat>> {
        return this.guard(`Reading properties of ${name}`, async () => {
            const url = await this.fileUrl(name);
            const response = await this.send(url, {
                method: 'PROPFIND',
                headers: this.headers({Depth: '0', 'Content-Type': XML_CONTENT_TYPE}),
                body: STAT_QUERY,
            });
            if (response.status === 404) {
                await releaseBody(response);
                return notFound(name);
            }
            const body = await this.expectMultiStatus(response, 'PROPFIND', url);
            const [entry] = await parseMultiStatus(body);
            if (!entry) {
                throw new ProtocolError(`Invalid PROPFIND stat response for ${name}: no response element`, response.status, body);
            }

            const sizeText = entry.props.getcontentlength;
            const size = sizeText ? Number.parseInt(sizeText, 10) : 0;
            const modifiedRaw = entry.props.getlastmodified ?? '';
            return ok({
                size: Number.isNaN(size) ? 0 : size,
                modifiedRaw,
                modifiedIso: normalizeLastModified(modifiedRaw),
            });
        });
    }

    async delete(name: string): Promise<StorageResult<void>> {
        return this.guard(`Deleting ${name}`, async () => {
            const url = await this.fileUrl(name);
            const response = await this.send(url, {method: 'DELETE', headers: this.headers()});
            if (response.status === 404) {
                await releaseBody(response);
                return notFound(name);
            }
            await this.assertAuthorized(response, 'DELETE', url);
            if (DELETE_SUCCESS.has(response.status)) {
                await releaseBody(response);
                return done();
            }
            const text = await readBodyText(response);
            throw new ProtocolError(`DELETE failed (${response.status}): ${text}`, response.status, text);
        });
    }

    /**
     * Close pooled connections. The client must not be used afterwards.
     */
    async close(): Promise<void> {
        await this.agent.close();
    }

    private discoverRoot(): Promise<string> {
        if (!this.rootResolution) {
            const pending = this.probeRoots();
            this.rootResolution = pending;
            void pending.catch(() => {
                if (this.rootResolution === pending) {
                    this.rootResolution = null;
                }
            });
        }
        return this.rootResolution;
    }

    private async probeRoots(): Promise<string> {
        let lastError: unknown = null;
        for (const root of this.rootCandidates) {
            const url = this.rootUrl(root);
            let response: Response;
            try {
                response = await this.send(url, {
                    method: 'PROPFIND',
                    headers: this.headers({Depth: '0', 'Content-Type': XML_CONTENT_TYPE}),
                    body: RESOURCETYPE_QUERY,
                    signal: AbortSignal.timeout(this.probeTimeoutMs),
                });
            } catch (error) {
                lastError = error;
                continue;
            }
            await this.assertAuthorized(response, 'PROPFIND', url);
            await releaseBody(response);
            if (response.ok) {
                console.log(`[webdav-client] Using DAV root ${url}`);
                return root;
            }
            lastError = new ProtocolError(`PROPFIND ${url} returned ${response.status}`, response.status);
        }
        throw new ConnectivityError(
            `No working WebDAV root found at ${this.baseUrl}: ${describeError(lastError)}`,
            {cause: lastError}
        );
    }

    private rootUrl(root: string): string {
        return new URL(root, this.baseUrl).toString();
    }

    private folderUrl(root: string): string {
        const relative = this.folderSegments.map(segment => encodeURIComponent(segment) + '/').join('');
        return this.rootUrl(root) + relative;
    }

    private async fileUrl(name: string): Promise<string> {
        return this.folderUrl(await this.discoverRoot()) + encodeURIComponent(name);
    }

    private headers(extra: Record<string, string> = {}): Record<string, string> {
        return {Authorization: this.authorization, ...extra};
    }

    private async send(url: string, init: RequestInit): Promise<Response> {
        try {
            return await this.sendRequest(url, {...init, dispatcher: this.agent});
        } catch (error) {
            throw new ConnectivityError(`${init.method ?? 'GET'} ${url} failed: ${describeError(error)}`, {cause: error});
        }
    }

    private async makeCollection(url: string): Promise<void> {
        const response = await this.send(url, {method: 'MKCOL', headers: this.headers()});
        await this.assertAuthorized(response, 'MKCOL', url);
        // 405: already exists
        if (response.status === 201 || response.status === 405) {
            await releaseBody(response);
            return;
        }
        const text = await readBodyText(response);
        throw new ProtocolError(`MKCOL failed (${response.status}): ${text}`, response.status, text);
    }

    private async assertAuthorized(response: Response, method: string, url: string): Promise<void> {
        if (isAuthFailureStatus(response.status)) {
            await releaseBody(response);
            throw new UnauthorizedError(`${method} ${url} was rejected (${response.status}): check username and password`, response.status);
        }
    }

    /**
     * Throw on anything but 2xx. The body is released unless the caller still needs it.
     */
    private async expectSuccess(response: Response, method: string, url: string, release: boolean = true): Promise<void> {
        await this.assertAuthorized(response, method, url);
        if (!response.ok) {
            const text = await readBodyText(response);
            throw new ProtocolError(`${method} ${url} failed (${response.status}): ${text}`, response.status, text);
        }
        if (release) {
            await releaseBody(response);
        }
    }

    private async expectMultiStatus(response: Response, method: string, url: string): Promise<string> {
        await this.expectSuccess(response, method, url, false);
        return response.text();
    }

    private async guard<T extends StorageResult<unknown>>(context: string, action: () => Promise<T>): Promise<T | Failed> {
        try {
            return await action();
        } catch (error) {
            return failed(asStorageError(error, `${context} failed`));
        }
    }
}
