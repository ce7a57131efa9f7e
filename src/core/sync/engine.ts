import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { describeError } from '../errors.js';
import { normalizePayload } from '../sections/codec.js';
import type { SectionCodec } from '../sections/codec.js';
import { backupFile, createBackupDir } from './backup.js';
import { listTrackedFiles, normalizeRelativePath } from './tracked.js';
import type {
  ClearResult,
  FailureReason,
  FileResult,
  SyncReporter,
  SyncSummary,
} from '../types.js';

export interface SyncContext {
  dotfilesDir: string;
  homeDir: string;
  backupsDir: string;
  codec: SectionCodec;
  reporter?: SyncReporter;
  now?: () => Date;
}

export interface DeployOptions {
  /** Reuse the run's backup directory instead of creating a new one */
  backupDir?: string;
}

export interface CaptureOptions {
  paths?: string[];
}

export interface BackupOptions {
  standalone?: boolean;
  backupDir?: string;
}

const silent: SyncReporter = { emit: () => {} };

/**
 * Repository -> home. Each existing target is copied to the backup directory,
 * stripped of its old custom sections and given one fresh section holding the
 * repository content.
 */
export function deploy(ctx: SyncContext, options: DeployOptions = {}): SyncSummary {
  const reporter = ctx.reporter ?? silent;
  const files = listTrackedFiles(ctx.dotfilesDir);
  const backupDir = options.backupDir ?? createBackupDir(ctx.backupsDir, { now: ctx.now });

  reporter.emit({ type: 'start', operation: 'deploy', total: files.length, backupDir });

  const results = files.map(relativePath => {
    const result = deployFile(ctx, relativePath, backupDir);
    reporter.emit({ type: 'file', result });
    return result;
  });

  return finish(reporter, { operation: 'deploy', ...tally(results), results, backupDir });
}

function deployFile(ctx: SyncContext, relativePath: string, backupDir: string): FileResult {
  const target = join(ctx.homeDir, relativePath);

  try {
    const payload = deployPayload(ctx.codec, readFileSync(join(ctx.dotfilesDir, relativePath), 'utf-8'));

    if (!existsSync(target)) {
      mkdirSync(dirname(target), { recursive: true });
      writeFileSync(target, ctx.codec.inject('', payload), 'utf-8');
      return { relativePath, outcome: 'created' };
    }

    backupFile(target, join(backupDir, relativePath));

    const existing = readFileSync(target, 'utf-8');
    const merged = ctx.codec.merge(existing, payload);
    if (merged === existing) {
      return { relativePath, outcome: 'unchanged', backedUp: true };
    }

    writeFileSync(target, merged, 'utf-8');
    return { relativePath, outcome: 'updated', backedUp: true };
  } catch (err) {
    return failure(relativePath, 'io_error', describeError(err));
  }
}

/**
 * A repository file that already carries sections contributes only their
 * payloads; otherwise the whole file is the payload.
 */
function deployPayload(codec: SectionCodec, content: string): string {
  const sections = codec.extract(content, { withTags: false });
  if (sections.length === 0) return content;
  return sections
    .filter(section => !codec.isEmpty(section))
    .map(normalizePayload)
    .join('\n\n');
}

/**
 * Home -> repository. The repository copy holds the custom-section payloads
 * only (no marker lines), separated by a blank line.
 */
export function capture(ctx: SyncContext, options: CaptureOptions = {}): SyncSummary {
  const reporter = ctx.reporter ?? silent;
  const requested = options.paths && options.paths.length > 0
    ? options.paths
    : listTrackedFiles(ctx.dotfilesDir);

  reporter.emit({ type: 'start', operation: 'capture', total: requested.length });
  if (!options.paths || options.paths.length === 0) {
    reporter.emit({ type: 'notice', message: 'No specific dotfiles provided. Capturing all tracked dotfiles.' });
  }

  const seen = new Set<string>();
  const results: FileResult[] = [];

  for (const path of requested) {
    const relativePath = normalizeRelativePath(path);
    if (relativePath !== null && seen.has(relativePath)) continue;
    if (relativePath !== null) seen.add(relativePath);

    const result = relativePath === null
      ? failure(path, 'invalid_path', 'path must be relative to the dotfiles root')
      : captureFile(ctx, relativePath);

    reporter.emit({ type: 'file', result });
    results.push(result);
  }

  return finish(reporter, { operation: 'capture', ...tally(results), results });
}

function captureFile(ctx: SyncContext, relativePath: string): FileResult {
  const source = join(ctx.homeDir, relativePath);
  if (!existsSync(source)) {
    return failure(relativePath, 'missing_source', 'not found in home directory');
  }

  try {
    const sections = ctx.codec
      .extract(readFileSync(source, 'utf-8'), { withTags: false })
      .filter(section => !ctx.codec.isEmpty(section))
      .map(normalizePayload);

    if (sections.length === 0) {
      return failure(relativePath, 'no_custom_content', 'no custom sections found');
    }

    const dest = join(ctx.dotfilesDir, relativePath);
    mkdirSync(dirname(dest), { recursive: true });
    writeFileSync(dest, sections.join('\n\n') + '\n', 'utf-8');
    return { relativePath, outcome: 'captured' };
  } catch (err) {
    return failure(relativePath, 'io_error', describeError(err));
  }
}

/**
 * Home -> timestamped backup directory. The repository is never touched.
 */
export function backup(ctx: SyncContext, options: BackupOptions = {}): SyncSummary {
  const reporter = ctx.reporter ?? silent;
  const files = listTrackedFiles(ctx.dotfilesDir);
  const backupDir = options.backupDir
    ?? createBackupDir(ctx.backupsDir, { standalone: options.standalone, now: ctx.now });

  reporter.emit({ type: 'start', operation: 'backup', total: files.length, backupDir });

  const results = files.map(relativePath => {
    const result = backupOne(ctx, relativePath, backupDir);
    reporter.emit({ type: 'file', result });
    return result;
  });

  return finish(reporter, { operation: 'backup', ...tally(results), results, backupDir });
}

function backupOne(ctx: SyncContext, relativePath: string, backupDir: string): FileResult {
  const source = join(ctx.homeDir, relativePath);
  if (!existsSync(source)) {
    return failure(relativePath, 'missing_source', 'source file not found');
  }

  try {
    backupFile(source, join(backupDir, relativePath));
    return { relativePath, outcome: 'backed_up' };
  } catch (err) {
    return failure(relativePath, 'io_error', describeError(err));
  }
}

/**
 * Deletes the whole backup root. A missing root is not an error.
 */
export function clearBackups(ctx: Pick<SyncContext, 'backupsDir' | 'reporter'>): ClearResult {
  const reporter = ctx.reporter ?? silent;
  reporter.emit({ type: 'start', operation: 'clear', total: 0 });

  if (!existsSync(ctx.backupsDir)) {
    reporter.emit({ type: 'notice', message: 'No backups directory found' });
    return { cleared: false, path: ctx.backupsDir };
  }

  try {
    rmSync(ctx.backupsDir, { recursive: true, force: true });
    return { cleared: true, path: ctx.backupsDir };
  } catch (err) {
    return { cleared: false, path: ctx.backupsDir, error: describeError(err) };
  }
}

function failure(relativePath: string, reason: FailureReason, message: string): FileResult {
  return { relativePath, outcome: 'failed', reason, message };
}

function tally(results: FileResult[]): { succeeded: number; failed: number } {
  const failed = results.filter(r => r.outcome === 'failed').length;
  return { succeeded: results.length - failed, failed };
}

function finish(reporter: SyncReporter, summary: SyncSummary): SyncSummary {
  reporter.emit({ type: 'summary', summary });
  return summary;
}
