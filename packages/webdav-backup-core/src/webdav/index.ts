/**
 * WebDAV module
 *
 * Protocol layer: DAV root discovery, folder creation and file operations.
 */

export * from './DavTransport.js';
export * from './MultiStatus.js';
export * from './ResponseByteStream.js';
export * from './WebdavClient.js';
