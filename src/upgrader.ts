import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import { errorMessage, firstLine } from './errors.js';
import { isSilent, logger } from './logger.js';
import { getAdapter, type AdapterOptions, type PackageManagerAdapter } from './packageManager.js';
import { runPool } from './pool.js';
import { runCommand } from './process.js';
import type {
  CommandRunner,
  OutdatedPackage,
  PackageManager,
  UpgradeMode,
  UpgradeResult,
  UpgradeSummary
} from './types.js';
import { determineUpdateType } from './version.js';

export interface UpgradeOptions extends AdapterOptions {
  mode: UpgradeMode;
  concurrency: number;
  timeoutMs: number;
}

const describe = (pkg: OutdatedPackage): string =>
  `${chalk.bold(pkg.name)} ${chalk.cyan(pkg.currentVersion)} → ${chalk.cyan(pkg.latestVersion)}`;

/**
 * Run one upgrade and turn its outcome into a result. Never rejects: a
 * non-zero exit, a timeout or a missing binary all become `success: false`.
 */
export async function upgradePackage(
  pkg: OutdatedPackage,
  adapter: PackageManagerAdapter,
  options: UpgradeOptions,
  runner: CommandRunner = runCommand
): Promise<UpgradeResult> {
  const started = Date.now();
  const base = {
    name: pkg.name,
    currentVersion: pkg.currentVersion,
    latestVersion: pkg.latestVersion,
    updateType: determineUpdateType(pkg.currentVersion, pkg.latestVersion)
  };

  let error: string | undefined;
  try {
    const { command, args } = adapter.upgradeCommand(pkg, options);
    const result = await runner(command, args, { timeoutMs: options.timeoutMs });

    if (result.timedOut) {
      error = `timed out after ${Math.round(options.timeoutMs / 1000)}s`;
    } else if (result.code !== 0) {
      const status = result.code === null ? `killed by ${result.signal ?? 'signal'}` : `exit code ${result.code}`;
      error = firstLine(result.stderr) || firstLine(result.stdout) || `Command failed with ${status}`;
    }
  } catch (caught) {
    error = firstLine(errorMessage(caught));
  }

  return {
    ...base,
    success: error === undefined,
    ...(error === undefined ? {} : { error }),
    durationMs: Date.now() - started
  };
}

async function upgradeSequentially(
  packages: readonly OutdatedPackage[],
  adapter: PackageManagerAdapter,
  options: UpgradeOptions,
  runner: CommandRunner
): Promise<UpgradeResult[]> {
  const results: UpgradeResult[] = [];

  for (const pkg of packages) {
    const spinner = ora({ text: `Upgrading ${describe(pkg)}...`, isSilent: isSilent() }).start();
    const result = await upgradePackage(pkg, adapter, options, runner);
    reportResult(spinner, pkg, result, true);
    results.push(result);
  }

  return results;
}

async function upgradeConcurrently(
  packages: readonly OutdatedPackage[],
  adapter: PackageManagerAdapter,
  options: UpgradeOptions,
  runner: CommandRunner
): Promise<UpgradeResult[]> {
  const total = packages.length;
  const slots = options.concurrency <= 0 ? total : Math.min(options.concurrency, total);
  let done = 0;

  const progress = () => `Upgrading ${total} package(s), ${slots} at a time (${done}/${total})...`;
  const spinner = ora({ text: progress(), isSilent: isSilent() }).start();

  const results = await runPool(packages, options.concurrency, async pkg => {
    const result = await upgradePackage(pkg, adapter, options, runner);
    done++;
    reportResult(spinner, pkg, result, false);
    spinner.text = progress();
    return result;
  });

  spinner.stop();
  return results;
}

function reportResult(spinner: Ora, pkg: OutdatedPackage, result: UpgradeResult, finish: boolean): void {
  const line = result.success
    ? chalk.green(`Upgraded ${describe(pkg)}`)
    : chalk.red(`Failed to upgrade ${describe(pkg)}: ${result.error ?? 'unknown error'}`);

  if (finish) {
    if (result.success) spinner.succeed(line);
    else spinner.fail(line);
    return;
  }

  // Shared spinner: persist a line for this package and keep spinning
  const text = spinner.text;
  spinner.stopAndPersist({ symbol: result.success ? chalk.green('✔') : chalk.red('✖'), text: line });
  spinner.start(text);
}

/**
 * Upgrade every package once, one at a time or through a bounded pool.
 * Both modes return results in the order of `packages`.
 */
export async function upgradePackages(
  packages: readonly OutdatedPackage[],
  pm: PackageManager,
  options: UpgradeOptions,
  runner: CommandRunner = runCommand
): Promise<UpgradeResult[]> {
  if (packages.length === 0) return [];

  const adapter = getAdapter(pm);
  logger.info(chalk.bold.cyan(`\n🚀 Upgrading with ${pm} (${options.mode})...\n`));

  return options.mode === 'concurrent'
    ? upgradeConcurrently(packages, adapter, options, runner)
    : upgradeSequentially(packages, adapter, options, runner);
}

export function summarize(results: readonly UpgradeResult[]): UpgradeSummary {
  return {
    succeeded: results.filter(r => r.success),
    failed: results.filter(r => !r.success)
  };
}

export function printSummary(summary: UpgradeSummary): void {
  const { succeeded, failed } = summary;

  logger.info(chalk.gray('─'.repeat(60)));
  logger.info(chalk.bold.cyan('📊 Upgrade Summary\n'));

  logger.success(`✅ Upgraded ${succeeded.length} package(s)${succeeded.length > 0 ? ':' : ''}`);
  succeeded.forEach(r => {
    const label = r.updateType !== 'unknown' ? chalk.gray(` (${r.updateType})`) : '';
    logger.success(`   • ${r.name}: ${chalk.cyan(r.currentVersion)} → ${chalk.cyan(r.latestVersion)}${label}`);
  });

  if (failed.length > 0) {
    logger.error(`\n❌ Failed to upgrade ${failed.length} package(s):`);
    failed.forEach(r => {
      logger.error(`   • ${r.name}: ${r.error ?? 'Upgrade failed'}`);
    });
  } else {
    logger.info(chalk.gray('   No failures.'));
  }

  logger.info('');
}
