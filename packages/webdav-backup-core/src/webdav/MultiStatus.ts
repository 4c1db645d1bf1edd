/**
 * WebDAV multi-status (207) parsing.
 *
 * Namespace prefixes are stripped so `d:`, `D:` and default-namespace documents read the same.
 */

import {Parser, processors} from 'xml2js';
import {describeError, ProtocolError} from '../errors/BackupStorageError.js';

export interface MultiStatusEntry {
    href: string;
    /** Text value of every property reported with a 2xx propstat (or without a status) */
    props: Record<string, string>;
}

type XmlNode = Record<string, unknown>;

function isXmlNode(value: unknown): value is XmlNode {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function children(node: XmlNode, key: string): unknown[] {
    const value = node[key];
    return Array.isArray(value) ? value : [];
}

function textOf(value: unknown): string | undefined {
    if (typeof value === 'string') {
        return value;
    }
    if (isXmlNode(value) && typeof value._ === 'string') {
        return value._;
    }
    return undefined;
}

function firstText(node: XmlNode, key: string): string | undefined {
    return textOf(children(node, key)[0]);
}

function isSuccessStatus(statusLine: string | undefined): boolean {
    if (!statusLine) {
        return true;
    }
    const match = /^HTTP\/[\d.]+\s+(\d{3})/i.exec(statusLine.trim());
    return match !== null && match[1].startsWith('2');
}

const parserOptions = {
    explicitArray: true,
    ignoreAttrs: true,
    tagNameProcessors: [processors.stripPrefix],
};

export async function parseMultiStatus(xml: string): Promise<MultiStatusEntry[]> {
    let document: unknown;
    try {
        document = await new Parser(parserOptions).parseStringPromise(xml);
    } catch (error) {
        throw new ProtocolError(`Invalid PROPFIND response XML: ${describeError(error)}`, undefined, xml, {cause: error});
    }

    const root = isXmlNode(document) ? document.multistatus : undefined;
    if (!isXmlNode(root)) {
        throw new ProtocolError('Invalid PROPFIND response: missing multistatus element', undefined, xml);
    }

    const entries: MultiStatusEntry[] = [];
    for (const response of children(root, 'response')) {
        if (!isXmlNode(response)) {
            continue;
        }
        const href = firstText(response, 'href')?.trim();
        if (!href) {
            continue;
        }

        const props: Record<string, string> = {};
        for (const propstat of children(response, 'propstat')) {
            if (!isXmlNode(propstat) || !isSuccessStatus(firstText(propstat, 'status'))) {
                continue;
            }
            for (const prop of children(propstat, 'prop')) {
                if (!isXmlNode(prop)) {
                    continue;
                }
                for (const key of Object.keys(prop)) {
                    props[key] = (firstText(prop, key) ?? '').trim();
                }
            }
        }
        entries.push({href, props});
    }
    return entries;
}

function safeDecode(segment: string): string {
    try {
        return decodeURIComponent(segment);
    } catch {
        return segment;
    }
}

/**
 * Decoded path of an href, without trailing '/'. Works for absolute URLs and bare paths.
 */
export function hrefPath(href: string, base: string): string {
    let pathname: string;
    try {
        pathname = new URL(href, base).pathname;
    } catch {
        pathname = href;
    }
    return pathname.split('/').map(safeDecode).join('/').replace(/\/+$/, '');
}

/**
 * Last non-empty, decoded path segment of an href.
 */
export function hrefLeafName(href: string, base: string): string {
    const segments = hrefPath(href, base).split('/');
    return segments[segments.length - 1] ?? '';
}
