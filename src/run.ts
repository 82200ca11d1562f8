import chalk from 'chalk';
import inquirer from 'inquirer';
import ora from 'ora';
import { ConfigError, ListFailureError, ToolNotFoundError } from './errors.js';
import { listOutdated } from './lister.js';
import { isSilent, logger } from './logger.js';
import { detectPackageManager } from './packageManager.js';
import { runCommand } from './process.js';
import { renderOutdatedTable } from './table.js';
import type { CommandRunner, RunOptions, UpgradeSummary } from './types.js';
import { printSummary, summarize, upgradePackages } from './upgrader.js';

export const NOTHING_TO_UPGRADE = 'All packages are up to date. No packages need to be upgraded.';

export interface RunDependencies {
  runner?: CommandRunner;
  confirm?: (message: string) => Promise<boolean>;
}

export interface RunOutcome {
  exitCode: number;
  /** Absent when nothing was upgraded (empty listing, --list, declined, fatal error). */
  summary?: UpgradeSummary;
}

async function confirmWithPrompt(message: string): Promise<boolean> {
  const { proceed } = await inquirer.prompt<{ proceed: boolean }>([
    { type: 'confirm', name: 'proceed', message, default: true }
  ]);
  return proceed;
}

/**
 * List outdated packages, then upgrade them all.
 * Listing problems are fatal (exit 1); upgrade failures are collected and
 * also end in exit 1 once every package has been attempted.
 */
export async function run(options: RunOptions, deps: RunDependencies = {}): Promise<RunOutcome> {
  const runner = deps.runner ?? runCommand;
  const confirm = deps.confirm ?? confirmWithPrompt;
  const started = Date.now();
  const adapterOptions = { global: options.global, python: options.python };

  const spinner = ora({ text: 'Checking for outdated packages...', color: 'cyan', isSilent: isSilent() });

  try {
    const pm = options.packageManager ?? (await detectPackageManager(adapterOptions, runner));
    logger.debug(`Using package manager: ${pm}`);

    spinner.start(`Checking for outdated ${pm} packages...`);
    const packages = await listOutdated(
      pm,
      { ...adapterOptions, timeoutMs: options.timeoutMs, exclude: options.exclude },
      runner
    );
    spinner.stop();

    if (packages.length === 0) {
      logger.success(`✔ ${NOTHING_TO_UPGRADE}`);
      printElapsed(started);
      return { exitCode: 0 };
    }

    logger.info(renderOutdatedTable(packages));

    if (options.listOnly) {
      printElapsed(started);
      return { exitCode: 0 };
    }

    if (!options.yes && !(await confirm(`Upgrade ${packages.length} package(s)?`))) {
      logger.warn('Upgrade cancelled.');
      return { exitCode: 0 };
    }

    const results = await upgradePackages(
      packages,
      pm,
      {
        ...adapterOptions,
        mode: options.mode,
        concurrency: options.concurrency,
        timeoutMs: options.timeoutMs
      },
      runner
    );

    const summary = summarize(results);
    printSummary(summary);
    printElapsed(started);

    return { exitCode: summary.failed.length > 0 ? 1 : 0, summary };
  } catch (error) {
    spinner.stop();
    if (error instanceof ToolNotFoundError || error instanceof ListFailureError || error instanceof ConfigError) {
      logger.error(`❌ ${error.message}`);
      return { exitCode: 1 };
    }
    throw error;
  }
}

function printElapsed(started: number): void {
  const seconds = ((Date.now() - started) / 1000).toFixed(2);
  logger.info(chalk.magenta(`Total time elapsed: ${chalk.cyan(`${seconds}s`)}`));
}
