export { Installer } from './installer.js';
export type { InstallerDeps, VerifyResult } from './installer.js';
export { HomebrewPackageManager } from './homebrew.js';
export type { PackageManager, PackageOptions, BootstrapOutcome } from './homebrew.js';
export { createRegistry, DEFAULT_APPLICATIONS } from './registry.js';
export type { Registry, RegisteredApplication } from './registry.js';
export { BUILTIN_HOOKS, installFiraCodeFont, installKittyIcon } from './hooks.js';
export type { HookContext, InstallHook } from './hooks.js';
export { runCommand } from './process.js';
export { downloadFile, extractArchive } from './download.js';
