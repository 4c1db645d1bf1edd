export * from './BackupIntegration.js';
