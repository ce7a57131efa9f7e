import chalk from 'chalk';
import type {
  ClearResult,
  FileResult,
  InstallReporter,
  SyncOperation,
  SyncReporter,
  SyncSummary,
} from '../core/types.js';

export const CHECK = '✓';
export const CROSS = '✗';
export const ARROW = '→';

const TITLES: Record<SyncOperation, string> = {
  deploy: 'Dotfiles Deployment',
  capture: 'Capturing Dotfiles',
  backup: 'Backing up Dotfiles',
  clear: 'Clearing Backups',
};

const OUTCOME_LABELS: Record<FileResult['outcome'], string> = {
  created: 'created',
  updated: 'added/updated content',
  unchanged: 'already up to date',
  backed_up: 'backed up',
  captured: 'captured custom sections',
  failed: 'failed',
};

export function banner(title: string): void {
  const rule = '='.repeat(50);
  console.log(chalk.magenta.bold(`\n${rule}\n${title}\n${rule}\n`));
}

export function formatFileResult(result: FileResult): string {
  if (result.outcome === 'failed') {
    return `${chalk.red(CROSS)} ${result.relativePath}: ${result.message ?? 'failed'}`;
  }
  const extra = result.backedUp ? chalk.dim(' (previous version backed up)') : '';
  return `${chalk.green(CHECK)} ${result.relativePath}: ${OUTCOME_LABELS[result.outcome]}${extra}`;
}

export function printSummary(summary: SyncSummary): void {
  console.log(chalk.bold('\nSummary:'));
  console.log(`  ${chalk.green(CHECK)} Succeeded: ${chalk.green(String(summary.succeeded))}`);
  if (summary.failed > 0) {
    console.log(`  ${chalk.red(CROSS)} Failed: ${chalk.red(String(summary.failed))}`);
  }
  if (summary.backupDir) {
    console.log(chalk.yellow(`  Backup directory: ${summary.backupDir}`));
  }
}

export function printClearResult(result: ClearResult): void {
  if (result.cleared) {
    console.log(`${chalk.green(CHECK)} Backups directory cleared successfully`);
  } else if (result.error) {
    console.log(`${chalk.red(CROSS)} Failed to clear backups: ${result.error}`);
  }
}

/**
 * Prints each file as soon as the engine reports it.
 */
export function consoleSyncReporter(): SyncReporter {
  return {
    emit(event) {
      switch (event.type) {
        case 'start':
          banner(TITLES[event.operation]);
          break;
        case 'notice':
          console.log(chalk.yellow(event.message));
          break;
        case 'file':
          console.log(formatFileResult(event.result));
          break;
        case 'summary':
          printSummary(event.summary);
          break;
      }
    },
  };
}

export function consoleInstallReporter(): InstallReporter {
  return {
    emit(event) {
      switch (event.type) {
        case 'phase':
          console.log(chalk.magenta.bold(`\n${ARROW} ${event.title}`));
          break;
        case 'step':
          console.log(chalk.blue(`${ARROW} ${event.message}`));
          break;
        case 'ok':
          console.log(`  ${chalk.green(CHECK)} ${event.message}`);
          break;
        case 'fail':
          console.log(`  ${chalk.red(CROSS)} ${event.message}`);
          break;
        case 'warn':
          console.log(chalk.yellow(`  ${event.message}`));
          break;
      }
    },
  };
}
