import { ConfigError } from './errors.js';
import { parseNodeOutdated, parsePipOutdated, parseYarnOutdated } from './parsers.js';
import { runCommand } from './process.js';
import type { CommandLine, CommandRunner, OutdatedPackage, PackageManager } from './types.js';

export const PACKAGE_MANAGERS: readonly PackageManager[] = ['npm', 'pnpm', 'yarn', 'pip'];

export interface AdapterOptions {
  global: boolean;
  python: string;
}

export interface PackageManagerAdapter {
  readonly name: PackageManager;
  /** Exit codes that still mean the listing ran; npm, pnpm and yarn exit 1 when something is outdated. */
  readonly listExitCodes: readonly number[];
  binary(options: AdapterOptions): string;
  listCommand(options: AdapterOptions): CommandLine;
  parseOutdated(output: string): OutdatedPackage[];
  upgradeCommand(pkg: OutdatedPackage, options: AdapterOptions): CommandLine;
}

const globalFlag = (global: boolean): string[] => (global ? ['-g'] : []);

const npm: PackageManagerAdapter = {
  name: 'npm',
  listExitCodes: [0, 1],
  binary: () => 'npm',
  listCommand: ({ global }) => ({ command: 'npm', args: ['outdated', '--json', ...globalFlag(global)] }),
  parseOutdated: parseNodeOutdated,
  upgradeCommand: (pkg, { global }) => ({
    command: 'npm',
    args: ['install', ...globalFlag(global), `${pkg.name}@${pkg.latestVersion}`]
  })
};

const pnpm: PackageManagerAdapter = {
  name: 'pnpm',
  listExitCodes: [0, 1],
  binary: () => 'pnpm',
  listCommand: ({ global }) => ({
    command: 'pnpm',
    args: ['outdated', '--format', 'json', ...globalFlag(global)]
  }),
  parseOutdated: parseNodeOutdated,
  upgradeCommand: (pkg, { global }) => ({
    command: 'pnpm',
    args: ['add', ...globalFlag(global), `${pkg.name}@${pkg.latestVersion}`]
  })
};

const yarn: PackageManagerAdapter = {
  name: 'yarn',
  listExitCodes: [0, 1],
  binary: () => 'yarn',
  listCommand: ({ global }) => {
    if (global) {
      throw new ConfigError(['yarn cannot list outdated global packages; drop --global or use npm/pnpm']);
    }
    return { command: 'yarn', args: ['outdated', '--json'] };
  },
  parseOutdated: parseYarnOutdated,
  upgradeCommand: (pkg, { global }) => ({
    command: 'yarn',
    args: global
      ? ['global', 'add', `${pkg.name}@${pkg.latestVersion}`]
      : ['upgrade', `${pkg.name}@${pkg.latestVersion}`]
  })
};

const pip: PackageManagerAdapter = {
  name: 'pip',
  listExitCodes: [0],
  binary: ({ python }) => python,
  listCommand: ({ python }) => ({
    command: python,
    args: ['-m', 'pip', 'list', '--outdated', '--format=json']
  }),
  parseOutdated: parsePipOutdated,
  upgradeCommand: (pkg, { python }) => ({
    command: python,
    args: ['-m', 'pip', 'install', '--upgrade', `${pkg.name}==${pkg.latestVersion}`]
  })
};

const ADAPTERS: Record<PackageManager, PackageManagerAdapter> = { npm, pnpm, yarn, pip };

export function getAdapter(pm: PackageManager): PackageManagerAdapter {
  return ADAPTERS[pm];
}

export function isPackageManager(value: unknown): value is PackageManager {
  return typeof value === 'string' && PACKAGE_MANAGERS.some(pm => pm === value);
}

export async function isAvailable(command: string, runner: CommandRunner = runCommand): Promise<boolean> {
  const lookup = process.platform === 'win32' ? 'where' : 'which';
  try {
    const result = await runner(lookup, [command]);
    return result.code === 0;
  } catch {
    return false;
  }
}

export async function detectPackageManager(
  options: AdapterOptions,
  runner: CommandRunner = runCommand
): Promise<PackageManager> {
  for (const pm of PACKAGE_MANAGERS) {
    if (await isAvailable(getAdapter(pm).binary(options), runner)) {
      return pm;
    }
  }

  // npm ships with Node.js
  return 'npm';
}

export async function getPackageManagerVersion(
  pm: PackageManager,
  options: AdapterOptions,
  runner: CommandRunner = runCommand
): Promise<string | null> {
  const adapter = getAdapter(pm);
  const args = pm === 'pip' ? ['-m', 'pip', '--version'] : ['--version'];
  try {
    const { code, stdout } = await runner(adapter.binary(options), args, { timeoutMs: 10_000 });
    return code === 0 ? stdout.trim() : null;
  } catch {
    return null;
  }
}

export async function checkAllPackageManagers(
  options: AdapterOptions,
  runner: CommandRunner = runCommand
): Promise<Record<PackageManager, boolean>> {
  const results: Record<PackageManager, boolean> = { npm: false, pnpm: false, yarn: false, pip: false };

  for (const pm of PACKAGE_MANAGERS) {
    results[pm] = await isAvailable(getAdapter(pm).binary(options), runner);
  }

  return results;
}
