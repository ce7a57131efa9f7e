import { CommandError } from '../errors.js';
import type { CommandRunner, InstallOutcome } from '../types.js';

export interface PackageOptions {
  cask?: boolean;
}

export interface BootstrapOutcome {
  ok: boolean;
  action: 'updated' | 'installed';
  message: string;
}

export interface PackageManager {
  readonly name: string;
  isAvailable(): Promise<boolean>;
  bootstrap(): Promise<BootstrapOutcome>;
  isInstalled(pkg: string, options?: PackageOptions): Promise<boolean>;
  installOrUpgrade(pkg: string, options?: PackageOptions): Promise<InstallOutcome>;
  cleanup(): Promise<void>;
}

// runCommand spawns without a shell, so the spawned bash performs the
// substitution and hands the downloaded script to the inner bash
const HOMEBREW_INSTALL_SCRIPT =
  '/bin/bash -c "$(curl -fsSL https://raw.githubusercontent.com/Homebrew/install/HEAD/install.sh)"';

export class HomebrewPackageManager implements PackageManager {
  readonly name = 'Homebrew';

  constructor(private readonly run: CommandRunner) {}

  async isAvailable(): Promise<boolean> {
    const result = await this.run('which', ['brew']);
    return result.code === 0;
  }

  async bootstrap(): Promise<BootstrapOutcome> {
    const present = await this.isAvailable();
    const result = present
      ? await this.run('brew', ['update'])
      : await this.run('/bin/bash', ['-c', HOMEBREW_INSTALL_SCRIPT]);
    const action = present ? 'updated' : 'installed';

    if (result.code === 0) {
      return { ok: true, action, message: `Homebrew ${action} successfully` };
    }
    return {
      ok: false,
      action,
      message: `Homebrew ${present ? 'update' : 'installation'} failed: ${firstLine(result.stderr)}`,
    };
  }

  async isInstalled(pkg: string, options: PackageOptions = {}): Promise<boolean> {
    const result = await this.run('brew', ['list', ...caskFlag(options), pkg]);
    return result.code === 0;
  }

  async installOrUpgrade(pkg: string, options: PackageOptions = {}): Promise<InstallOutcome> {
    const installed = await this.isInstalled(pkg, options);
    const action = installed ? 'upgraded' : 'installed';
    const result = await this.run('brew', [installed ? 'upgrade' : 'install', ...caskFlag(options), pkg]);

    if (result.code === 0) {
      return { ok: true, action, message: `${pkg} ${action} successfully` };
    }
    return { ok: false, action, message: firstLine(result.stderr) || `brew exited with code ${result.code}` };
  }

  async cleanup(): Promise<void> {
    const result = await this.run('brew', ['cleanup']);
    if (result.code !== 0) {
      throw new CommandError('brew cleanup', result.code, result.stderr);
    }
  }
}

function caskFlag(options: PackageOptions): string[] {
  return options.cask ? ['--cask'] : [];
}

function firstLine(text: string): string {
  return text.trim().split('\n')[0] ?? '';
}
