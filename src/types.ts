export type PackageManager = 'npm' | 'pnpm' | 'yarn' | 'pip';

export type UpgradeMode = 'sequential' | 'concurrent';

export type UpdateType = 'major' | 'minor' | 'patch' | 'prerelease' | 'unknown';

export interface OutdatedPackage {
  readonly name: string;
  readonly currentVersion: string;
  readonly latestVersion: string;
  readonly latestFiletype?: string;
}

export interface UpgradeResult {
  name: string;
  success: boolean;
  currentVersion: string;
  latestVersion: string;
  updateType: UpdateType;
  error?: string;
  durationMs: number;
}

export interface UpgradeSummary {
  succeeded: UpgradeResult[];
  failed: UpgradeResult[];
}

export interface UpsweepConfig {
  packageManager?: PackageManager;
  concurrency?: number;
  timeout?: number;
  python?: string;
  global?: boolean;
  async?: boolean;
  exclude?: string[];
}

export interface RunOptions {
  packageManager?: PackageManager;
  mode: UpgradeMode;
  concurrency: number;
  timeoutMs: number;
  python: string;
  global: boolean;
  exclude: string[];
  listOnly: boolean;
  yes: boolean;
}

export interface CommandResult {
  code: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

export interface CommandOptions {
  timeoutMs?: number;
  env?: NodeJS.ProcessEnv;
}

export type CommandRunner = (
  command: string,
  args: readonly string[],
  options?: CommandOptions
) => Promise<CommandResult>;

export interface CommandLine {
  command: string;
  args: string[];
}
