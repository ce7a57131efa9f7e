import { describeError } from './errors.js';
import { backup, clearBackups, deploy } from './sync/engine.js';
import type { SyncContext } from './sync/engine.js';
import { createBackupDir } from './sync/backup.js';
import type { Installer, VerifyResult } from './installer/installer.js';
import type { PackageManager } from './installer/homebrew.js';
import type { Registry } from './installer/registry.js';
import type {
  ClearResult,
  CommandRunner,
  Confirm,
  InstallReporter,
  InstallSummary,
  SyncSummary,
} from './types.js';

export interface PipelineDeps {
  sync: SyncContext;
  installer: Installer;
  registry: Registry;
  packageManager: PackageManager;
  run: CommandRunner;
  confirm: Confirm;
  reporter?: InstallReporter;
  /** Called with the finished run, before the backup-cleanup question */
  onComplete?: (result: PipelineResult) => void;
}

export interface PipelineResult {
  backupDir: string;
  backup: SyncSummary;
  install: InstallSummary;
  deploy: SyncSummary;
  verify: VerifyResult[];
  clear?: ClearResult;
}

export const DEFAULT_SHELL_APP = 'zsh';

/**
 * backup -> install -> deploy -> finalize -> optional backup cleanup.
 * The install phase can abort without affecting the dotfile phase.
 */
export async function runFullPipeline(deps: PipelineDeps): Promise<PipelineResult> {
  const reporter = deps.reporter ?? { emit: () => {} };
  const backupDir = createBackupDir(deps.sync.backupsDir, { now: deps.sync.now });

  const backupSummary = backup(deps.sync, { backupDir });

  let install: InstallSummary;
  try {
    install = await deps.installer.installAll();
  } catch (err) {
    reporter.emit({ type: 'fail', message: `Software installation stopped: ${describeError(err)}` });
    install = { aborted: true, succeeded: 0, failed: 0, results: [] };
  }

  const deploySummary = deploy(deps.sync, { backupDir });
  const verify = await finalize(deps, reporter, install.aborted);

  const result: PipelineResult = {
    backupDir,
    backup: backupSummary,
    install,
    deploy: deploySummary,
    verify,
  };

  deps.onComplete?.(result);
  if (await deps.confirm('Do you want to clear all backups?')) {
    result.clear = clearBackups(deps.sync);
  }
  return result;
}

async function finalize(
  deps: PipelineDeps,
  reporter: InstallReporter,
  installAborted: boolean,
): Promise<VerifyResult[]> {
  reporter.emit({ type: 'phase', title: 'Cleanup and Finalization' });

  await setDefaultShell(deps, reporter);

  if (!installAborted) {
    reporter.emit({ type: 'step', message: `Cleaning up ${deps.packageManager.name}...` });
    try {
      await deps.packageManager.cleanup();
      reporter.emit({ type: 'ok', message: `${deps.packageManager.name} cleanup completed` });
    } catch (err) {
      reporter.emit({ type: 'fail', message: `${deps.packageManager.name} cleanup failed: ${describeError(err)}` });
    }
  }

  reporter.emit({ type: 'step', message: 'Verifying installations...' });
  const verify = await deps.installer.verify();
  for (const entry of verify) {
    reporter.emit(entry.present
      ? { type: 'ok', message: `${entry.name} is installed${entry.location ? ` (found at ${entry.location})` : ''}` }
      : { type: 'fail', message: `${entry.name} not found` });
  }
  return verify;
}

async function setDefaultShell(deps: PipelineDeps, reporter: InstallReporter): Promise<void> {
  reporter.emit({ type: 'step', message: 'Setting ZSH as the default shell...' });

  const app = deps.registry.find(entry => entry.id === DEFAULT_SHELL_APP);
  if (!app?.locations?.length) {
    reporter.emit({ type: 'warn', message: 'No ZSH locations configured' });
    return;
  }

  const shell = deps.installer.findLocation(app);
  if (!shell) {
    reporter.emit({ type: 'fail', message: 'ZSH not found in any of the expected locations' });
    return;
  }

  const result = await deps.run('chsh', ['-s', shell]);
  reporter.emit(result.code === 0
    ? { type: 'ok', message: 'ZSH set as default shell' }
    : { type: 'fail', message: `Failed to set ZSH as default: ${result.stderr.trim() || `exit code ${result.code}`}` });
}
