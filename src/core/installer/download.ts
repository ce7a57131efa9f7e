import { mkdirSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { CommandError, DotweaveError } from '../errors.js';
import type { CommandRunner } from '../types.js';

export async function downloadFile(url: string, destination: string): Promise<void> {
  const response = await fetch(url);
  if (!response.ok) {
    throw new DotweaveError(`Download failed (${response.status} ${response.statusText}): ${url}`);
  }

  mkdirSync(dirname(destination), { recursive: true });
  writeFileSync(destination, Buffer.from(await response.arrayBuffer()));
}

export async function extractArchive(
  run: CommandRunner,
  archivePath: string,
  destinationDir: string,
): Promise<void> {
  mkdirSync(destinationDir, { recursive: true });
  const result = await run('unzip', ['-o', '-q', archivePath, '-d', destinationDir]);
  if (result.code !== 0) {
    throw new CommandError('unzip', result.code, result.stderr);
  }
}
