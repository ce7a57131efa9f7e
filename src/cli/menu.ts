import chalk from 'chalk';
import type { GlobalOptions } from './session.js';
import { promptMenu } from './prompts.js';
import { runDeploy } from './commands/deploy.js';
import { runBackup } from './commands/backup.js';
import { runCapture } from './commands/capture.js';
import { runSetup } from './commands/setup.js';
import { runClear } from './commands/clear.js';

export async function runMenu(options: GlobalOptions): Promise<void> {
  const choice = await promptMenu();

  switch (choice) {
    case 'deploy':
      return runDeploy(options);
    case 'backup':
      return runBackup(options);
    case 'capture':
      return runCapture(options);
    case 'setup':
      return runSetup(options);
    case 'clear':
      return runClear(options);
    case 'exit':
      console.log(chalk.blue('Exiting...'));
      return;
  }
}
