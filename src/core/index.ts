// Core types
export * from './types.js';

// Errors
export { DotweaveError, ConfigError, RegistryError, CommandError, describeError } from './errors.js';

// Sections
export { createSectionCodec, markersFor, normalizePayload } from './sections/index.js';
export type { SectionCodec } from './sections/index.js';

// Sync
export {
  deploy, capture, backup, clearBackups,
  listTrackedFiles, normalizeRelativePath,
  createBackupDir, backupDirPath, backupFile, formatTimestamp, STANDALONE_DIR,
} from './sync/index.js';
export type { SyncContext, DeployOptions, CaptureOptions, BackupOptions, BackupDirOptions } from './sync/index.js';

// Installer
export {
  Installer, HomebrewPackageManager,
  createRegistry, DEFAULT_APPLICATIONS,
  BUILTIN_HOOKS, installFiraCodeFont, installKittyIcon,
  runCommand, downloadFile, extractArchive,
} from './installer/index.js';
export type {
  InstallerDeps, VerifyResult, PackageManager, PackageOptions, BootstrapOutcome,
  Registry, RegisteredApplication, HookContext, InstallHook,
} from './installer/index.js';

// Pipeline
export { runFullPipeline, DEFAULT_SHELL_APP } from './pipeline.js';
export type { PipelineDeps, PipelineResult } from './pipeline.js';

// Config
export { resolveConfig, loadFileConfig, CONFIG_FILE } from './config.js';
export type { ConfigOverrides, FileConfig } from './config.js';
