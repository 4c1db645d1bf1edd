import {afterEach, beforeEach, describe, expect, it, vi} from 'vitest';
import {mkdtemp, readdir, readlink, realpath, rm, writeFile} from 'fs/promises';
import {createServer, type IncomingHttpHeaders} from 'http';
import {tmpdir} from 'os';
import {join} from 'path';
import {ConnectivityError, ProtocolError, UnauthorizedError} from '../errors/BackupStorageError.js';
import {InMemoryDavServer} from '../testing/InMemoryDavServer.js';
import {normalizeLastModified, WebdavClient, type WebdavClientOptions} from './WebdavClient.js';

const BASE_URL = 'https://cloud.example.test/owncloud';
const USER_ROOT = '/owncloud/remote.php/dav/files/alice/';
const FOLDER = 'HomeAssistant/Backups';
const FIXED_NOW = new Date('2024-03-05T10:20:30Z');

function connection(overrides: Partial<WebdavClientOptions> = {}): WebdavClientOptions {
    return {
        baseUrl: BASE_URL,
        username: 'alice',
        password: 'test-secret',
        backupPath: '/HomeAssistant/Backups',
        verifySsl: true,
        ...overrides,
    };
}

async function collect(stream: AsyncIterable<Uint8Array>): Promise<Buffer> {
    const parts: Buffer[] = [];
    for await (const chunk of stream) {
        parts.push(Buffer.from(chunk));
    }
    return Buffer.concat(parts);
}

describe('WebdavClient', () => {
    let server: InMemoryDavServer;
    let client: WebdavClient;

    beforeEach(() => {
        vi.spyOn(console, 'log').mockImplementation(() => undefined);
        vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        server = new InMemoryDavServer({baseUrl: BASE_URL, username: 'alice', password: 'test-secret', now: () => FIXED_NOW});
        client = new WebdavClient(connection({fetch: server.fetch}));
    });

    afterEach(async () => {
        await client.close();
        vi.restoreAllMocks();
    });

    describe('root discovery', () => {
        it('uses the per-user files root when it answers and probes it only once', async () => {
            const first = await client.resolveRoot();
            const second = await client.resolveRoot();

            expect(first).toEqual({status: 'ok', value: 'remote.php/dav/files/alice/'});
            expect(second).toEqual(first);
            expect(server.requestsFor('PROPFIND').map(request => request.pathname)).toEqual([USER_ROOT]);
        });

        it('falls back to the legacy root', async () => {
            server = new InMemoryDavServer({baseUrl: BASE_URL, username: 'alice', password: 'test-secret', davRoot: 'remote.php/webdav/'});
            client = new WebdavClient(connection({fetch: server.fetch}));

            expect(await client.resolveRoot()).toEqual({status: 'ok', value: 'remote.php/webdav/'});
            expect(server.requestsFor('PROPFIND').map(request => request.pathname)).toEqual([
                USER_ROOT,
                '/owncloud/remote.php/webdav/',
            ]);
        });

        it('shares one probe between concurrent first callers', async () => {
            const results = await Promise.all([client.resolveRoot(), client.resolveRoot(), client.listFolder()]);

            expect(results[0].status).toBe('ok');
            expect(server.requestsFor('PROPFIND').filter(request => request.pathname === USER_ROOT)).toHaveLength(1);
        });

        it('reports a connectivity failure when no candidate answers', async () => {
            server = new InMemoryDavServer({baseUrl: BASE_URL, username: 'alice', password: 'test-secret', davRoot: 'dav/'});
            client = new WebdavClient(connection({fetch: server.fetch}));

            const ensured = await client.ensureFolder();
            expect(ensured.status).toBe('failed');
            if (ensured.status === 'failed') {
                expect(ensured.error).toBeInstanceOf(ConnectivityError);
                expect(ensured.error.message).toContain('No working WebDAV root found at https://cloud.example.test/owncloud/');
            }

            const listing = await client.listFolder();
            expect(listing.status).toBe('failed');
            if (listing.status === 'failed') {
                expect(listing.error).toBeInstanceOf(ConnectivityError);
            }
            // a failed discovery is not cached
            expect(server.requestsFor('PROPFIND')).toHaveLength(4);
        });

        it('stops at the first authentication failure', async () => {
            client = new WebdavClient(connection({fetch: server.fetch, password: 'wrong-secret'}));

            const result = await client.resolveRoot();

            expect(result.status).toBe('failed');
            if (result.status === 'failed') {
                expect(result.error).toBeInstanceOf(UnauthorizedError);
                expect(result.error.message).toBe(
                    `PROPFIND https://cloud.example.test${USER_ROOT} was rejected (401): check username and password`
                );
            }
            expect(server.requests).toHaveLength(1);
        });

        it('probes again after invalidateRoot', async () => {
            await client.resolveRoot();
            client.invalidateRoot();
            await client.resolveRoot();

            expect(server.requestsFor('PROPFIND')).toHaveLength(2);
        });

        it('turns transport errors into connectivity failures', async () => {
            server.setOffline(true);

            const result = await client.listFolder();

            expect(result.status).toBe('failed');
            if (result.status === 'failed') {
                expect(result.error).toBeInstanceOf(ConnectivityError);
                expect(result.error.message).toContain('fetch failed');
            }
        });
    });

    describe('ensureFolder', () => {
        it('creates every missing segment', async () => {
            expect(await client.ensureFolder()).toEqual({status: 'ok', value: undefined});

            expect(server.hasCollection('HomeAssistant')).toBe(true);
            expect(server.hasCollection(FOLDER)).toBe(true);
            expect(server.requestsFor('MKCOL').map(request => request.pathname)).toEqual([
                `${USER_ROOT}HomeAssistant/`,
                `${USER_ROOT}HomeAssistant/Backups/`,
            ]);
        });

        it('treats existing segments as success', async () => {
            server.mkdirp('HomeAssistant');

            expect((await client.ensureFolder()).status).toBe('ok');
            expect(server.hasCollection(FOLDER)).toBe(true);
        });

        it('does nothing when the folder already exists', async () => {
            server.mkdirp(FOLDER);

            expect((await client.ensureFolder()).status).toBe('ok');
            expect(server.requestsFor('MKCOL')).toHaveLength(0);
        });

        it('does not mask a rejected folder check', async () => {
            server.override({method: 'PROPFIND', pathSuffix: 'Backups/', status: 403});

            const result = await client.ensureFolder();

            expect(result.status).toBe('failed');
            if (result.status === 'failed') {
                expect(result.error).toBeInstanceOf(UnauthorizedError);
            }
            expect(server.requestsFor('MKCOL')).toHaveLength(0);
        });

        it('reports an unexpected MKCOL status with the response body', async () => {
            server.override({method: 'MKCOL', status: 507, body: 'Insufficient Storage'});

            const result = await client.ensureFolder();

            expect(result.status).toBe('failed');
            if (result.status === 'failed') {
                expect(result.error).toBeInstanceOf(ProtocolError);
                expect(result.error.message).toBe('MKCOL failed (507): Insufficient Storage');
            }
        });
    });

    describe('listFolder', () => {
        it('returns sorted names without the folder itself', async () => {
            server.putRaw(`${FOLDER}/ha_backup_b.json`, '{}');
            server.putRaw(`${FOLDER}/ha_backup_a.tar`, 'archive');
            server.mkdirp(`${FOLDER}/nested`);

            expect(await client.listFolder()).toEqual({
                status: 'ok',
                value: ['ha_backup_a.tar', 'ha_backup_b.json', 'nested'],
            });
        });

        it('decodes percent-encoded names', async () => {
            server.putRaw(`${FOLDER}/with space.tar`, 'x');

            expect(await client.listFolder()).toEqual({status: 'ok', value: ['with space.tar']});
        });

        it('reports a missing folder as not found', async () => {
            expect(await client.listFolder()).toEqual({status: 'not-found', name: '/HomeAssistant/Backups'});
        });

        it('rejects a malformed multistatus body', async () => {
            server.override({method: 'PROPFIND', pathSuffix: 'Backups/', status: 207, body: '<d:multistatus'});

            const result = await client.listFolder();

            expect(result.status).toBe('failed');
            if (result.status === 'failed') {
                expect(result.error).toBeInstanceOf(ProtocolError);
            }
        });
    });

    describe('uploads', () => {
        let tempDir: string;

        beforeEach(async () => {
            tempDir = await mkdtemp(join(tmpdir(), 'webdav-client-test-'));
            server.mkdirp(FOLDER);
        });

        afterEach(async () => {
            await rm(tempDir, {recursive: true, force: true});
        });

        it('sends bytes with an explicit length', async () => {
            expect((await client.putBytes('meta.json', Buffer.from('{"a":1}'))).status).toBe('ok');

            const [put] = server.requestsFor('PUT');
            expect(put?.headers['content-length']).toBe('7');
            expect(server.read(`${FOLDER}/meta.json`)?.toString()).toBe('{"a":1}');
        });

        it('streams a file with the given length', async () => {
            const path = join(tempDir, 'archive.tar');
            const content = Buffer.alloc(200_000, 7);
            await writeFile(path, content);

            expect((await client.putFile('ha_backup_x.tar', path, content.length)).status).toBe('ok');

            const [put] = server.requestsFor('PUT');
            expect(put?.headers['content-length']).toBe('200000');
            expect(server.read(`${FOLDER}/ha_backup_x.tar`)?.equals(content)).toBe(true);
        });

        it('looks up the file size when none is given', async () => {
            const path = join(tempDir, 'archive.tar');
            await writeFile(path, 'twelve bytes');

            expect((await client.putFile('ha_backup_x.tar', path, 0)).status).toBe('ok');
            expect(server.requestsFor('PUT')[0]?.headers['content-length']).toBe('12');
        });

        it('sends a stream without a length', async () => {
            async function* parts(): AsyncGenerator<Uint8Array> {
                yield Buffer.from('abc');
                yield Buffer.from('def');
            }

            expect((await client.putStream('stream.bin', parts())).status).toBe('ok');

            expect(server.requestsFor('PUT')[0]?.headers['content-length']).toBeUndefined();
            expect(server.read(`${FOLDER}/stream.bin`)?.toString()).toBe('abcdef');
        });

        it('reports a rejected upload with status and body', async () => {
            server.override({method: 'PUT', status: 507, body: 'quota exceeded'});

            const result = await client.putBytes('meta.json', Buffer.from('{}'));

            expect(result.status).toBe('failed');
            if (result.status === 'failed' && result.error instanceof ProtocolError) {
                expect(result.error.status).toBe(507);
                expect(result.error.body).toBe('quota exceeded');
            } else {
                throw new Error('expected a protocol error');
            }
        });
    });

    describe('reads', () => {
        beforeEach(() => {
            server.putRaw(`${FOLDER}/ha_backup_x.tar`, 'archive-content', FIXED_NOW);
        });

        it('fetches a whole object', async () => {
            const result = await client.getBytes('ha_backup_x.tar');

            expect(result.status).toBe('ok');
            if (result.status === 'ok') {
                expect(result.value.toString()).toBe('archive-content');
            }
        });

        it('reports missing objects as not found', async () => {
            expect(await client.getBytes('missing.json')).toEqual({status: 'not-found', name: 'missing.json'});
            expect(await client.getStream('missing.tar')).toEqual({status: 'not-found', name: 'missing.tar'});
            expect(await client.stat('missing.tar')).toEqual({status: 'not-found', name: 'missing.tar'});
        });

        it('streams an object in chunks', async () => {
            const content = Buffer.alloc(300_000, 3);
            server.putRaw(`${FOLDER}/big.tar`, content);

            const result = await client.getStream('big.tar');

            expect(result.status).toBe('ok');
            if (result.status === 'ok') {
                expect((await collect(result.value)).equals(content)).toBe(true);
            }
            expect(server.releasedDownloads).toBe(1);
        });

        it('releases the response when the consumer stops early', async () => {
            server = new InMemoryDavServer({baseUrl: BASE_URL, username: 'alice', password: 'test-secret', chunkSize: 4});
            server.putRaw(`${FOLDER}/big.tar`, 'aaaabbbbccccdddd');
            client = new WebdavClient(connection({fetch: server.fetch}));

            const result = await client.getStream('big.tar');
            if (result.status !== 'ok') {
                throw new Error('expected a stream');
            }
            for await (const chunk of result.value) {
                expect(Buffer.from(chunk).toString()).toBe('aaaa');
                break;
            }

            expect(server.releasedDownloads).toBe(1);
        });

        it('refuses to iterate a closed stream', async () => {
            const result = await client.getStream('ha_backup_x.tar');
            if (result.status !== 'ok') {
                throw new Error('expected a stream');
            }
            await result.value.close();

            await expect(collect(result.value)).rejects.toThrow('Stream for ha_backup_x.tar was already consumed or closed');
        });

        it('reads size and modification time', async () => {
            expect(await client.stat('ha_backup_x.tar')).toEqual({
                status: 'ok',
                value: {
                    size: 15,
                    modifiedRaw: 'Tue, 05 Mar 2024 10:20:30 GMT',
                    modifiedIso: '2024-03-05T10:20:30.000Z',
                },
            });
        });

        it('uses the current time when the server omits getlastmodified', async () => {
            server.override({
                method: 'PROPFIND',
                pathSuffix: 'ha_backup_x.tar',
                status: 207,
                body: '<d:multistatus xmlns:d="DAV:"><d:response><d:href>/x</d:href><d:propstat><d:prop>'
                    + '<d:getcontentlength>12</d:getcontentlength></d:prop>'
                    + '<d:status>HTTP/1.1 200 OK</d:status></d:propstat></d:response></d:multistatus>',
            });
            const before = Date.now();

            const result = await client.stat('ha_backup_x.tar');

            expect(result.status).toBe('ok');
            if (result.status === 'ok') {
                expect(result.value.size).toBe(12);
                expect(result.value.modifiedRaw).toBe('');
                expect(Date.parse(result.value.modifiedIso)).toBeGreaterThanOrEqual(before - 1000);
            }
        });
    });

    describe('delete', () => {
        beforeEach(() => {
            server.putRaw(`${FOLDER}/ha_backup_x.tar`, 'archive');
        });

        it('removes an object, then reports it as not found', async () => {
            expect(await client.delete('ha_backup_x.tar')).toEqual({status: 'ok', value: undefined});
            expect(await client.delete('ha_backup_x.tar')).toEqual({status: 'not-found', name: 'ha_backup_x.tar'});
            expect(server.fileNames(FOLDER)).toEqual([]);
        });

        it('reports other statuses with the response body', async () => {
            server.override({method: 'DELETE', status: 423, body: 'Locked'});

            const result = await client.delete('ha_backup_x.tar');

            expect(result.status).toBe('failed');
            if (result.status === 'failed') {
                expect(result.error).toBeInstanceOf(ProtocolError);
                expect(result.error.message).toBe('DELETE failed (423): Locked');
            }
        });
    });
});

interface ReceivedUpload {
    headers: IncomingHttpHeaders;
    bytes: number;
}

interface LocalHttpServer {
    url: string;
    uploads: ReceivedUpload[];
    close(): Promise<void>;
}

const ROOT_MULTISTATUS = '<d:multistatus xmlns:d="DAV:"><d:response><d:href>/</d:href><d:propstat><d:prop>'
    + '<d:resourcetype><d:collection/></d:resourcetype></d:prop>'
    + '<d:status>HTTP/1.1 200 OK</d:status></d:propstat></d:response></d:multistatus>';

/**
 * Plain HTTP server on a loopback port. PROPFIND always succeeds; a PUT is either read completely
 * and answered with 201, or answered with `rejectUploadsWith` before its body is read.
 */
async function startHttpServer(rejectUploadsWith?: number): Promise<LocalHttpServer> {
    const uploads: ReceivedUpload[] = [];
    const server = createServer((req, res) => {
        if (req.method === 'PROPFIND') {
            req.resume();
            res.writeHead(207, {'Content-Type': 'application/xml; charset=utf-8'});
            res.end(ROOT_MULTISTATUS);
            return;
        }
        if (rejectUploadsWith !== undefined) {
            res.writeHead(rejectUploadsWith, {Connection: 'close'});
            res.end('quota exceeded');
            return;
        }
        let bytes = 0;
        req.on('data', (chunk: Buffer) => {
            bytes += chunk.length;
        });
        req.on('end', () => {
            uploads.push({headers: req.headers, bytes});
            res.writeHead(201);
            res.end();
        });
    });
    await new Promise<void>(resolve => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    if (address === null || typeof address === 'string') {
        throw new Error('server has no port');
    }
    return {
        url: `http://127.0.0.1:${address.port}`,
        uploads,
        close: () => new Promise<void>((resolve, reject) => {
            server.closeAllConnections();
            server.close(error => (error ? reject(error) : resolve()));
        }),
    };
}

async function openFilesUnder(dir: string): Promise<string[]> {
    const targets = await Promise.all((await readdir('/proc/self/fd')).map(async fd => {
        try {
            return await readlink(`/proc/self/fd/${fd}`);
        } catch {
            // the descriptor used to list the directory is gone by now
            return '';
        }
    }));
    return targets.filter(target => target.startsWith(dir));
}

describe('WebdavClient over HTTP', () => {
    let tempDir: string;
    let http: LocalHttpServer | null = null;
    let client: WebdavClient | null = null;

    beforeEach(async () => {
        vi.spyOn(console, 'log').mockImplementation(() => undefined);
        tempDir = await realpath(await mkdtemp(join(tmpdir(), 'webdav-http-test-')));
    });

    afterEach(async () => {
        await client?.close();
        await http?.close();
        client = null;
        http = null;
        await rm(tempDir, {recursive: true, force: true});
        vi.restoreAllMocks();
    });

    async function connect(rejectUploadsWith?: number): Promise<WebdavClient> {
        http = await startHttpServer(rejectUploadsWith);
        client = new WebdavClient(connection({baseUrl: http.url}));
        return client;
    }

    it('uploads a file with Content-Length framing, never chunked', async () => {
        const path = join(tempDir, 'archive.tar');
        await writeFile(path, Buffer.alloc(3_000_000, 5));
        const webdav = await connect();

        expect((await webdav.putFile('ha_backup_x.tar', path, 3_000_000)).status).toBe('ok');

        expect(http?.uploads).toHaveLength(1);
        expect(http?.uploads[0]?.headers['content-length']).toBe('3000000');
        expect(http?.uploads[0]?.headers['transfer-encoding']).toBeUndefined();
        expect(http?.uploads[0]?.bytes).toBe(3_000_000);
    });

    it.skipIf(process.platform !== 'linux')('closes the local file when the server rejects the upload early', async () => {
        const path = join(tempDir, 'archive.tar');
        await writeFile(path, Buffer.alloc(3_000_000, 5));
        const webdav = await connect(507);

        for (let attempt = 0; attempt < 3; attempt++) {
            expect((await webdav.putFile('ha_backup_x.tar', path, 3_000_000)).status).toBe('failed');
        }
        await rm(path);

        expect(await openFilesUnder(tempDir)).toEqual([]);
    });
});

describe('normalizeLastModified', () => {
    const now = () => new Date('2025-01-01T00:00:00Z');

    it('converts HTTP dates to UTC ISO-8601', () => {
        expect(normalizeLastModified('Tue, 05 Mar 2024 10:20:30 GMT', now)).toBe('2024-03-05T10:20:30.000Z');
        expect(normalizeLastModified('05 Mar 2024 12:20:30 +0200', now)).toBe('2024-03-05T10:20:30.000Z');
    });

    it('keeps unparseable values as they are', () => {
        expect(normalizeLastModified('yesterday-ish', now)).toBe('yesterday-ish');
    });

    it('falls back to now when the value is missing', () => {
        expect(normalizeLastModified('', now)).toBe('2025-01-01T00:00:00.000Z');
    });
});
