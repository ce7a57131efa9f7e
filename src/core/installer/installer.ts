import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { describeError } from '../errors.js';
import { downloadFile, extractArchive } from './download.js';
import type { HookContext, InstallHook } from './hooks.js';
import type { PackageManager } from './homebrew.js';
import type { RegisteredApplication, Registry } from './registry.js';
import type {
  AppInstallResult,
  CommandRunner,
  InstallReporter,
  InstallSummary,
} from '../types.js';

export interface InstallerDeps {
  registry: Registry;
  packageManager: PackageManager;
  run: CommandRunner;
  homeDir: string;
  downloadsDir: string;
  reporter?: InstallReporter;
  download?: (url: string, destination: string) => Promise<void>;
  extract?: (archivePath: string, destinationDir: string) => Promise<void>;
  pathExists?: (path: string) => boolean;
}

export interface VerifyResult {
  id: string;
  name: string;
  present: boolean;
  location?: string;
}

export class Installer {
  private readonly reporter: InstallReporter;
  private readonly pathExists: (path: string) => boolean;
  private readonly hookContext: HookContext;

  constructor(private readonly deps: InstallerDeps) {
    this.reporter = deps.reporter ?? { emit: () => {} };
    this.pathExists = deps.pathExists ?? existsSync;
    this.hookContext = {
      run: deps.run,
      homeDir: deps.homeDir,
      downloadsDir: deps.downloadsDir,
      reporter: this.reporter,
      download: deps.download ?? downloadFile,
      extract: deps.extract ?? ((archive, dest) => extractArchive(deps.run, archive, dest)),
    };
  }

  /**
   * First configured location that exists on disk, with ~ expanded.
   */
  findLocation(app: RegisteredApplication): string | undefined {
    return (app.locations ?? [])
      .map(location => this.expandHome(location))
      .find(location => this.pathExists(location));
  }

  async isInstalled(app: RegisteredApplication): Promise<boolean> {
    if (this.findLocation(app)) return true;
    if (app.method === 'homebrew') {
      return this.deps.packageManager.isInstalled(app.packageName, { cask: app.cask });
    }
    return false;
  }

  /**
   * Installs or upgrades every registered application in order. The package
   * manager itself gates the whole phase; a single application failing does not.
   */
  async installAll(): Promise<InstallSummary> {
    const { packageManager } = this.deps;
    this.reporter.emit({ type: 'phase', title: `Checking ${packageManager.name} installation...` });

    const bootstrap = await packageManager.bootstrap();
    if (!bootstrap.ok) {
      this.reporter.emit({ type: 'fail', message: bootstrap.message });
      this.reporter.emit({ type: 'fail', message: `${packageManager.name} unavailable. Skipping package installations.` });
      return { aborted: true, succeeded: 0, failed: 0, results: [] };
    }
    this.reporter.emit({ type: 'ok', message: bootstrap.message });

    this.reporter.emit({ type: 'phase', title: 'Installing applications' });
    const results: AppInstallResult[] = [];
    for (const app of this.deps.registry) {
      const result = await this.installOne(app);
      this.reporter.emit(result.ok
        ? { type: 'ok', message: `${app.name}: ${result.message ?? result.action}` }
        : { type: 'fail', message: `${app.name} installation failed: ${result.message ?? 'unknown error'}` });
      results.push(result);
    }

    const failed = results.filter(r => !r.ok).length;
    return { aborted: false, succeeded: results.length - failed, failed, results };
  }

  private async installOne(app: RegisteredApplication): Promise<AppInstallResult> {
    const base = { id: app.id, name: app.name };
    const location = this.findLocation(app);

    if (app.method === 'custom') {
      if (location) {
        return { ...base, ok: true, action: 'skipped', message: `already present at ${location}` };
      }
      this.reporter.emit({ type: 'step', message: `Installing ${app.name}...` });
      const hookError = await this.runHooks(app.installer ? [app.installer] : []);
      return hookError
        ? { ...base, ok: false, action: 'hook', message: hookError }
        : { ...base, ok: true, action: 'installed', message: 'installed successfully' };
    }

    const options = { cask: app.cask };
    if (location && !(await this.deps.packageManager.isInstalled(app.packageName, options))) {
      return { ...base, ok: true, action: 'skipped', message: `already present at ${location}` };
    }

    this.reporter.emit({ type: 'step', message: `Installing or upgrading ${app.name}...` });
    const outcome = await this.deps.packageManager.installOrUpgrade(app.packageName, options);
    if (!outcome.ok) {
      return { ...base, ok: false, action: outcome.action, message: outcome.message };
    }

    if (outcome.action === 'installed') {
      const hookError = await this.runHooks(app.postInstallHooks);
      if (hookError) {
        return { ...base, ok: false, action: 'hook', message: `post-install step failed: ${hookError}` };
      }
    }
    return { ...base, ok: true, action: outcome.action, message: outcome.message };
  }

  private async runHooks(hooks: readonly InstallHook[]): Promise<string | undefined> {
    for (const hook of hooks) {
      try {
        await hook(this.hookContext);
      } catch (err) {
        return describeError(err);
      }
    }
    return undefined;
  }

  async verify(): Promise<VerifyResult[]> {
    const results: VerifyResult[] = [];
    for (const app of this.deps.registry) {
      const location = this.findLocation(app);
      const present = location !== undefined
        || (app.method === 'homebrew'
          && await this.deps.packageManager.isInstalled(app.packageName, { cask: app.cask }));
      results.push({ id: app.id, name: app.name, present, location });
    }
    return results;
  }

  private expandHome(location: string): string {
    if (location === '~') return this.deps.homeDir;
    return location.startsWith('~/') ? join(this.deps.homeDir, location.slice(2)) : location;
  }
}
