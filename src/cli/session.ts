import { resolveConfig } from '../core/config.js';
import { createSectionCodec, markersFor } from '../core/sections/codec.js';
import { HomebrewPackageManager } from '../core/installer/homebrew.js';
import { Installer } from '../core/installer/installer.js';
import { BUILTIN_HOOKS } from '../core/installer/hooks.js';
import { createRegistry, DEFAULT_APPLICATIONS } from '../core/installer/registry.js';
import { runCommand } from '../core/installer/process.js';
import type { SyncContext } from '../core/sync/engine.js';
import type { Registry } from '../core/installer/registry.js';
import type { PackageManager } from '../core/installer/homebrew.js';
import type { DotweaveConfig } from '../core/types.js';
import { consoleInstallReporter, consoleSyncReporter } from './reporter.js';

export interface GlobalOptions {
  repo?: string;
  home?: string;
  owner?: string;
}

export interface Session {
  config: DotweaveConfig;
  sync: SyncContext;
}

export interface InstallSession extends Session {
  registry: Registry;
  packageManager: PackageManager;
  installer: Installer;
}

export function openSession(options: GlobalOptions): Session {
  const config = resolveConfig({ repoRoot: options.repo, homeDir: options.home, owner: options.owner });
  return {
    config,
    sync: {
      dotfilesDir: config.dotfilesDir,
      homeDir: config.homeDir,
      backupsDir: config.backupsDir,
      codec: createSectionCodec(markersFor(config.owner)),
      reporter: consoleSyncReporter(),
    },
  };
}

export function openInstallSession(options: GlobalOptions): InstallSession {
  const session = openSession(options);
  // Built before anything runs so a bad hook id stops the program immediately
  const registry = createRegistry(DEFAULT_APPLICATIONS, BUILTIN_HOOKS);
  const packageManager = new HomebrewPackageManager(runCommand);

  return {
    ...session,
    registry,
    packageManager,
    installer: new Installer({
      registry,
      packageManager,
      run: runCommand,
      homeDir: session.config.homeDir,
      downloadsDir: session.config.downloadsDir,
      reporter: consoleInstallReporter(),
    }),
  };
}
