export * from './config/EnvConfig.js';
export * from './errors/index.js';
export * from './webdav/index.js';
export * from './transfer/TransferSpooler.js';
export * from './backup/index.js';
export * from './integration/index.js';
