export { deploy, capture, backup, clearBackups } from './engine.js';
export type { SyncContext, DeployOptions, CaptureOptions, BackupOptions } from './engine.js';
export { listTrackedFiles, normalizeRelativePath } from './tracked.js';
export { createBackupDir, backupDirPath, backupFile, formatTimestamp, STANDALONE_DIR } from './backup.js';
export type { BackupDirOptions } from './backup.js';
