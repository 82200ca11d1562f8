import { errorMessage, firstLine, ListFailureError } from './errors.js';
import { logger } from './logger.js';
import { getAdapter, type AdapterOptions } from './packageManager.js';
import { runCommand } from './process.js';
import type { CommandRunner, OutdatedPackage, PackageManager } from './types.js';

export interface ListOptions extends AdapterOptions {
  timeoutMs?: number;
  exclude?: readonly string[];
}

/**
 * Ask the package manager which packages are outdated.
 * Returns an empty list when everything is current; throws ToolNotFoundError
 * or ListFailureError when the listing itself cannot be obtained.
 */
export async function listOutdated(
  pm: PackageManager,
  options: ListOptions,
  runner: CommandRunner = runCommand
): Promise<OutdatedPackage[]> {
  const adapter = getAdapter(pm);
  const { command, args } = adapter.listCommand(options);

  const result = await runner(command, args, { timeoutMs: options.timeoutMs });

  if (result.timedOut) {
    throw new ListFailureError(pm, result.code, `timed out after ${Math.round((options.timeoutMs ?? 0) / 1000)}s`);
  }
  if (result.code === null || !adapter.listExitCodes.includes(result.code)) {
    throw new ListFailureError(pm, result.code, firstLine(result.stderr));
  }
  // A non-zero "outdated" exit with nothing on stdout is a real failure
  if (result.code !== 0 && !result.stdout.trim() && result.stderr.trim()) {
    throw new ListFailureError(pm, result.code, firstLine(result.stderr));
  }

  let packages: OutdatedPackage[];
  try {
    packages = adapter.parseOutdated(result.stdout);
  } catch (error) {
    throw new ListFailureError(pm, result.code, errorMessage(error));
  }

  const excluded = new Set(options.exclude ?? []);
  const kept = packages.filter(pkg => !excluded.has(pkg.name));
  if (kept.length < packages.length) {
    logger.debug(`Skipping excluded package(s): ${packages.filter(pkg => excluded.has(pkg.name)).map(pkg => pkg.name).join(', ')}`);
  }

  return kept;
}
