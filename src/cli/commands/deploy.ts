import { Command } from 'commander';
import { deploy } from '../../core/sync/engine.js';
import { openSession } from '../session.js';
import type { GlobalOptions } from '../session.js';
import { exitOnFailures, guarded } from '../run.js';

export async function runDeploy(options: GlobalOptions): Promise<void> {
  const { sync } = openSession(options);
  exitOnFailures(deploy(sync).failed);
}

export function deployCommand(): Command {
  return new Command('deploy')
    .description('Update home-directory dotfiles from the repository (existing files are backed up first)')
    .action(guarded(async (_options: unknown, command: Command) => {
      await runDeploy(command.optsWithGlobals<GlobalOptions>());
    }));
}
