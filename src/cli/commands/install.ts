import { Command } from 'commander';
import chalk from 'chalk';
import { openInstallSession } from '../session.js';
import type { GlobalOptions } from '../session.js';
import { exitOnFailures, guarded } from '../run.js';

export async function runInstall(options: GlobalOptions): Promise<void> {
  const { installer } = openInstallSession(options);
  const summary = await installer.installAll();

  console.log(chalk.bold('\nInstall Summary:'));
  console.log(`  Succeeded: ${chalk.green(String(summary.succeeded))}`);
  console.log(`  Failed:    ${chalk.red(String(summary.failed))}`);
  exitOnFailures(summary.aborted ? 1 : summary.failed);
}

export function installCommand(): Command {
  return new Command('install')
    .description('Install or upgrade the configured applications')
    .action(guarded(async (_options: unknown, command: Command) => {
      await runInstall(command.optsWithGlobals<GlobalOptions>());
    }));
}
