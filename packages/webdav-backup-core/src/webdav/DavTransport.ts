import {Agent, fetch as undiciFetch} from 'undici';
import type {RequestInit, Response} from 'undici';

/**
 * Shape of the fetch function the client sends requests through.
 * Injectable so tests can answer requests in-process.
 */
export type DavFetch = (url: string, init: RequestInit) => Promise<Response>;

export const defaultDavFetch: DavFetch = (url, init) => undiciFetch(url, init);

export interface DavTransportOptions {
    verifySsl: boolean;
    connectTimeoutMs: number;
}

/**
 * Connection setup is bounded; headers and body are not, since archive transfers can be large and slow.
 */
export function createDavAgent(options: DavTransportOptions): Agent {
    return new Agent({
        connect: {
            timeout: options.connectTimeoutMs,
            rejectUnauthorized: options.verifySsl,
        },
        headersTimeout: 0,
        bodyTimeout: 0,
    });
}

export function basicAuthHeader(username: string, password: string): string {
    return 'Basic ' + Buffer.from(`${username}:${password}`, 'utf-8').toString('base64');
}
