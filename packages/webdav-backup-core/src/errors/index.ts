export * from './BackupStorageError.js';
export * from './StorageResult.js';
