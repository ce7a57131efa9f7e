import { copyFileSync, existsSync, mkdirSync, readdirSync } from 'node:fs';
import { join } from 'node:path';
import { DotweaveError } from '../errors.js';
import type { CommandRunner, InstallReporter } from '../types.js';

export const FIRA_CODE_URL = 'https://github.com/tonsky/FiraCode/releases/download/6.2/Fira_Code_v6.2.zip';
export const KITTY_ICON_REPO_URL = 'https://github.com/k0nserv/kitty-icon/archive/refs/heads/master.zip';
export const KITTY_ICON_NAME = 'neue_outrun.icns';

export interface HookContext {
  run: CommandRunner;
  homeDir: string;
  downloadsDir: string;
  reporter: InstallReporter;
  download(url: string, destination: string): Promise<void>;
  extract(archivePath: string, destinationDir: string): Promise<void>;
}

export type InstallHook = (ctx: HookContext) => Promise<void>;

export async function installFiraCodeFont(ctx: HookContext): Promise<void> {
  const archive = join(ctx.downloadsDir, 'other', 'FiraCode.zip');
  const fontDir = join(ctx.homeDir, 'Library', 'Fonts');

  ctx.reporter.emit({ type: 'step', message: 'Downloading Fira Code font...' });
  await ctx.download(FIRA_CODE_URL, archive);
  await ctx.extract(archive, fontDir);
  ctx.reporter.emit({ type: 'ok', message: 'Fira Code font installed' });
}

export async function installKittyIcon(ctx: HookContext): Promise<void> {
  const reposDir = join(ctx.downloadsDir, 'repos');
  const archive = join(reposDir, 'kitty-icon.zip');

  ctx.reporter.emit({ type: 'step', message: 'Installing custom Kitty icon...' });
  await ctx.download(KITTY_ICON_REPO_URL, archive);
  await ctx.extract(archive, reposDir);

  const extracted = readdirSync(reposDir, { withFileTypes: true })
    .find(entry => entry.isDirectory() && entry.name.startsWith('kitty-icon-'));
  const iconPath = extracted ? join(reposDir, extracted.name, 'build', KITTY_ICON_NAME) : undefined;
  if (!iconPath || !existsSync(iconPath)) {
    throw new DotweaveError(`${KITTY_ICON_NAME} not found in the downloaded repository`);
  }

  const kittyConfigDir = join(ctx.homeDir, '.config', 'kitty');
  mkdirSync(kittyConfigDir, { recursive: true });
  copyFileSync(iconPath, join(kittyConfigDir, 'kitty.app.icns'));

  // Dock caches app icons; restarting it picks up the new one
  const restart = await ctx.run('killall', ['Dock']);
  if (restart.code !== 0) {
    ctx.reporter.emit({ type: 'warn', message: 'Could not restart the Dock; restart Kitty to see the new icon' });
  }
  ctx.reporter.emit({ type: 'ok', message: 'Custom Kitty icon installed' });
}

export const BUILTIN_HOOKS: Readonly<Record<string, InstallHook>> = Object.freeze({
  'fira-code-font': installFiraCodeFont,
  'kitty-icon': installKittyIcon,
});
