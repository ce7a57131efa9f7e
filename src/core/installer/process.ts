import { spawn } from 'node:child_process';
import type { CommandResult, CommandRunner } from '../types.js';

/**
 * Runs a command to completion and collects its output. There is no timeout:
 * a hung command blocks the caller.
 */
export const runCommand: CommandRunner = (command, args) =>
  new Promise<CommandResult>(resolve => {
    const child = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });
    let stdout = '';
    let stderr = '';

    child.stdout.setEncoding('utf-8').on('data', (chunk: string) => { stdout += chunk; });
    child.stderr.setEncoding('utf-8').on('data', (chunk: string) => { stderr += chunk; });

    // Spawn failures (ENOENT and friends) surface as exit code 127, like a shell would
    child.on('error', err => {
      resolve({ code: 127, stdout, stderr: stderr || err.message });
    });
    child.on('close', code => {
      resolve({ code: code ?? 1, stdout, stderr });
    });
  });
