import { existsSync, readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { homedir, userInfo } from 'node:os';
import { z } from 'zod';
import { ConfigError, describeError } from './errors.js';
import type { DotweaveConfig } from './types.js';

export const CONFIG_FILE = 'dotweave.config.json';

const fileConfigSchema = z
  .object({
    owner: z.string().trim().min(1).optional(),
    dotfilesDir: z.string().min(1).optional(),
    backupsDir: z.string().min(1).optional(),
    downloadsDir: z.string().min(1).optional(),
    homeDir: z.string().min(1).optional(),
    packageManager: z.literal('homebrew').optional(),
  })
  .strict();

export type FileConfig = z.infer<typeof fileConfigSchema>;

export interface ConfigOverrides {
  repoRoot?: string;
  homeDir?: string;
  owner?: string;
}

export function resolveConfig(
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
): DotweaveConfig {
  const repoRoot = resolve(overrides.repoRoot ?? process.cwd());
  const saved = loadFileConfig(repoRoot);

  const fromRoot = (path: string | undefined, fallback: string) =>
    path ? resolve(repoRoot, path) : join(repoRoot, fallback);

  return {
    repoRoot,
    dotfilesDir: fromRoot(saved.dotfilesDir, 'dotfiles'),
    backupsDir: fromRoot(saved.backupsDir, 'backups'),
    downloadsDir: fromRoot(saved.downloadsDir, 'downloads'),
    homeDir: resolve(overrides.homeDir ?? env.DOTWEAVE_HOME ?? saved.homeDir ?? homedir()),
    owner: overrides.owner ?? env.DOTWEAVE_OWNER ?? saved.owner ?? defaultOwner(),
    packageManager: saved.packageManager ?? 'homebrew',
  };
}

export function loadFileConfig(repoRoot: string): FileConfig {
  const configPath = join(repoRoot, CONFIG_FILE);
  if (!existsSync(configPath)) return {};

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`Cannot read ${configPath}: ${describeError(err)}`);
  }

  const parsed = fileConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid ${CONFIG_FILE}: ${issues}`);
  }
  return parsed.data;
}

function defaultOwner(): string {
  try {
    return userInfo().username;
  } catch {
    // No passwd entry for the current uid (common in containers)
    return 'user';
  }
}
