import { copyFileSync, mkdirSync, statSync, utimesSync, chmodSync } from 'node:fs';
import { dirname, join } from 'node:path';

export const STANDALONE_DIR = '_standalones';

export interface BackupDirOptions {
  standalone?: boolean;
  now?: () => Date;
}

/**
 * YYYYMMDD_HHMMSS in local time
 */
export function formatTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export function backupDirPath(backupsDir: string, options: BackupDirOptions = {}): string {
  const stamp = formatTimestamp((options.now ?? (() => new Date()))());
  return options.standalone
    ? join(backupsDir, STANDALONE_DIR, stamp)
    : join(backupsDir, stamp);
}

export function createBackupDir(backupsDir: string, options: BackupDirOptions = {}): string {
  const dir = backupDirPath(backupsDir, options);
  mkdirSync(dir, { recursive: true });
  return dir;
}

/**
 * Byte copy that keeps the source's mode and access/modification times.
 */
export function backupFile(src: string, dest: string): void {
  mkdirSync(dirname(dest), { recursive: true });
  copyFileSync(src, dest);

  const stats = statSync(src);
  chmodSync(dest, stats.mode & 0o7777);
  utimesSync(dest, stats.atime, stats.mtime);
}
