import { Command } from 'commander';
import { clearBackups } from '../../core/sync/engine.js';
import { openSession } from '../session.js';
import type { GlobalOptions } from '../session.js';
import { printClearResult } from '../reporter.js';
import { exitOnFailures, guarded } from '../run.js';

export async function runClear(options: GlobalOptions): Promise<void> {
  const { sync } = openSession(options);
  const result = clearBackups(sync);
  printClearResult(result);
  exitOnFailures(result.error ? 1 : 0);
}

export function clearCommand(): Command {
  return new Command('clear')
    .description('Delete every backup')
    .action(guarded(async (_options: unknown, command: Command) => {
      await runClear(command.optsWithGlobals<GlobalOptions>());
    }));
}
