import { Command } from 'commander';
import { backup } from '../../core/sync/engine.js';
import { openSession } from '../session.js';
import type { GlobalOptions } from '../session.js';
import { exitOnFailures, guarded } from '../run.js';

export async function runBackup(options: GlobalOptions): Promise<void> {
  const { sync } = openSession(options);
  exitOnFailures(backup(sync, { standalone: true }).failed);
}

export function backupCommand(): Command {
  return new Command('backup')
    .description('Take a standalone backup of the home-directory dotfiles')
    .action(guarded(async (_options: unknown, command: Command) => {
      await runBackup(command.optsWithGlobals<GlobalOptions>());
    }));
}
