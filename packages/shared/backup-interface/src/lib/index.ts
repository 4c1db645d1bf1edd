export * from './BackupRecord.js';
export * from './BackupDescriptorCodec.js';
