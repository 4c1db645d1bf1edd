export * from './BackupNames.js';
export * from './WebdavBackupAgent.js';
export * from './BackupAgentRegistry.js';
