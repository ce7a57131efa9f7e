import { Command } from 'commander';
import chalk from 'chalk';
import { deployCommand } from './commands/deploy.js';
import { backupCommand } from './commands/backup.js';
import { captureCommand } from './commands/capture.js';
import { clearCommand } from './commands/clear.js';
import { installCommand } from './commands/install.js';
import { setupCommand } from './commands/setup.js';
import { runMenu } from './menu.js';
import { guarded } from './run.js';
import type { GlobalOptions } from './session.js';

const program = new Command();

program
  .name('dotweave')
  .description('Install workstation software and sync dotfiles without losing local customizations')
  .version('0.1.0')
  .option('-r, --repo <dir>', 'Repository root holding dotfiles/ and backups/')
  .option('--home <dir>', 'Home directory to sync against')
  .option('--owner <name>', "Name used in the customization markers (\"# >>> <name>'s customizations\")")
  .action(guarded(async (options: GlobalOptions) => {
    console.log(chalk.cyan.bold('dotweave'));
    await runMenu(options);
  }));

program.addCommand(deployCommand());
program.addCommand(backupCommand());
program.addCommand(captureCommand());
program.addCommand(clearCommand());
program.addCommand(installCommand());
program.addCommand(setupCommand());

await program.parseAsync();
