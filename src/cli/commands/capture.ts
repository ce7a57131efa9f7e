import { Command } from 'commander';
import { capture } from '../../core/sync/engine.js';
import { openSession } from '../session.js';
import type { GlobalOptions } from '../session.js';
import { exitOnFailures, guarded } from '../run.js';

export async function runCapture(options: GlobalOptions, paths: string[] = []): Promise<void> {
  const { sync } = openSession(options);
  exitOnFailures(capture(sync, { paths }).failed);
}

export function captureCommand(): Command {
  return new Command('capture')
    .description('Copy custom sections from home-directory dotfiles back into the repository')
    .argument('[paths...]', 'Dotfile paths relative to the dotfiles root (default: all tracked files)')
    .action(guarded(async (paths: string[], _options: unknown, command: Command) => {
      await runCapture(command.optsWithGlobals<GlobalOptions>(), paths);
    }));
}
