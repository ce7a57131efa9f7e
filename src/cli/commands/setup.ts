import { Command } from 'commander';
import chalk from 'chalk';
import { runFullPipeline } from '../../core/pipeline.js';
import { runCommand } from '../../core/installer/process.js';
import { openInstallSession } from '../session.js';
import type { GlobalOptions } from '../session.js';
import { banner, CHECK, CROSS, consoleInstallReporter, printClearResult } from '../reporter.js';
import { confirmPrompt } from '../prompts.js';
import { exitOnFailures, guarded } from '../run.js';

export async function runSetup(options: GlobalOptions): Promise<void> {
  const session = openInstallSession(options);

  console.log(chalk.magenta.bold.underline('Starting Dotfiles and Software Installation'));

  const result = await runFullPipeline({
    sync: session.sync,
    installer: session.installer,
    registry: session.registry,
    packageManager: session.packageManager,
    run: runCommand,
    reporter: consoleInstallReporter(),
    onComplete: run => printFinalSummary(run.deploy.succeeded, run.deploy.failed, run.backupDir),
    confirm: confirmPrompt,
  });

  if (result.clear) {
    printClearResult(result.clear);
  } else {
    console.log(chalk.yellow('You can clear the backups later by running:'));
    console.log(chalk.blue('  dotweave clear'));
  }

  exitOnFailures(result.backup.failed + result.deploy.failed + result.install.failed);
}

function printFinalSummary(succeeded: number, failed: number, backupDir: string): void {
  banner('Installation Summary');
  console.log(chalk.green.bold(`${CHECK} Successful dotfile operations: ${succeeded}`));
  if (failed > 0) {
    console.log(chalk.red.bold(`${CROSS} Failed dotfile operations: ${failed}`));
  }
  console.log(chalk.yellow(`Backup directory: ${backupDir}`));
  console.log(chalk.magenta.bold('\nInstallation process completed!'));
  console.log(chalk.yellow('Please review any error messages above and take necessary actions.'));
  console.log(chalk.yellow("It's recommended to restart your system to ensure all changes take effect."));
}

export function setupCommand(): Command {
  return new Command('setup')
    .description('Full run: backup, install software, deploy dotfiles, finalize')
    .action(guarded(async (_options: unknown, command: Command) => {
      await runSetup(command.optsWithGlobals<GlobalOptions>());
    }));
}
