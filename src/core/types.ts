export interface MarkerPair {
  start: string;
  end: string;
}

export interface ExtractOptions {
  withTags: boolean;
}

export type SyncOperation = 'deploy' | 'capture' | 'backup' | 'clear';

export type FileOutcome = 'updated' | 'created' | 'unchanged' | 'backed_up' | 'captured' | 'failed';

export type FailureReason = 'missing_source' | 'no_custom_content' | 'invalid_path' | 'io_error';

export interface FileResult {
  relativePath: string;
  outcome: FileOutcome;
  reason?: FailureReason;
  message?: string;
  backedUp?: boolean;
}

export interface SyncSummary {
  operation: Exclude<SyncOperation, 'clear'>;
  succeeded: number;
  failed: number;
  results: FileResult[];
  backupDir?: string;
}

export interface ClearResult {
  cleared: boolean;
  path: string;
  error?: string;
}

export type SyncEvent =
  | { type: 'start'; operation: SyncOperation; total: number; backupDir?: string }
  | { type: 'notice'; message: string }
  | { type: 'file'; result: FileResult }
  | { type: 'summary'; summary: SyncSummary };

export interface SyncReporter {
  emit(event: SyncEvent): void;
}

export type InstallMethod = 'homebrew' | 'custom';

export interface ApplicationDescriptor {
  id: string;
  name: string;
  method: InstallMethod;
  package?: string;
  cask?: boolean;
  locations?: readonly string[];
  postInstall?: readonly string[];
  installHook?: string;
}

export interface InstallOutcome {
  ok: boolean;
  action: 'installed' | 'upgraded';
  message: string;
}

export interface AppInstallResult {
  id: string;
  name: string;
  ok: boolean;
  action: 'installed' | 'upgraded' | 'hook' | 'skipped';
  message?: string;
}

export interface InstallSummary {
  aborted: boolean;
  succeeded: number;
  failed: number;
  results: AppInstallResult[];
}

export type InstallEvent =
  | { type: 'phase'; title: string }
  | { type: 'step'; message: string }
  | { type: 'ok'; message: string }
  | { type: 'fail'; message: string }
  | { type: 'warn'; message: string };

export interface InstallReporter {
  emit(event: InstallEvent): void;
}

export interface CommandResult {
  code: number;
  stdout: string;
  stderr: string;
}

export type CommandRunner = (command: string, args: string[]) => Promise<CommandResult>;

export type Confirm = (question: string) => Promise<boolean>;

export type PackageManagerKind = 'homebrew';

export interface DotweaveConfig {
  repoRoot: string;
  dotfilesDir: string;
  backupsDir: string;
  downloadsDir: string;
  homeDir: string;
  owner: string;
  packageManager: PackageManagerKind;
}
