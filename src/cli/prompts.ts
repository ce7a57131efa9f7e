import inquirer from 'inquirer';
import type { Confirm } from '../core/types.js';

export type MenuChoice = 'deploy' | 'backup' | 'capture' | 'setup' | 'clear' | 'exit';

export async function promptMenu(): Promise<MenuChoice> {
  const answers = await inquirer.prompt<{ choice: MenuChoice }>([
    {
      type: 'list',
      name: 'choice',
      message: 'Please select an option:',
      choices: [
        { name: 'Update OS dotfiles from repository TO the OS (recommended)', value: 'deploy' },
        { name: 'Backup existing OS dotfiles', value: 'backup' },
        { name: 'Update repository dotfiles FROM the OS', value: 'capture' },
        { name: 'Run FULL installation (software + dotfiles)', value: 'setup' },
        { name: 'Clear all backups', value: 'clear' },
        { name: 'Exit', value: 'exit' },
      ],
    },
  ]);
  return answers.choice;
}

export const confirmPrompt: Confirm = async question => {
  const answers = await inquirer.prompt<{ confirmed: boolean }>([
    { type: 'confirm', name: 'confirmed', message: question, default: false },
  ]);
  return answers.confirmed;
};
