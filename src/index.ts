#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { getConfigPath, loadConfig, resolveOptions, type CliFlags } from './config.js';
import { ConfigError } from './errors.js';
import { setLogLevel } from './logger.js';
import {
  checkAllPackageManagers,
  detectPackageManager,
  getPackageManagerVersion,
  PACKAGE_MANAGERS
} from './packageManager.js';
import { run } from './run.js';

const VERSION = '0.1.0';

const program = new Command();

program
  .name('upsweep')
  .description('upsweep: list outdated packages and upgrade them, one by one or in parallel')
  .version(VERSION)
  .option('-a, --async', 'upgrade packages concurrently')
  .option('-c, --concurrency <n>', 'maximum concurrent upgrades with --async (0 = no limit)')
  .option('-t, --timeout <seconds>', 'time limit for each package manager call')
  .option('-m, --manager <manager>', `package manager to use (${PACKAGE_MANAGERS.join(', ')})`)
  .option('-g, --global', 'operate on globally installed packages')
  .option('-p, --python <path>', 'python interpreter used for pip')
  .option('-e, --exclude <names>', 'comma-separated package names to leave alone')
  .option('-l, --list', 'only list outdated packages')
  .option('-y, --yes', 'upgrade without asking for confirmation')
  .option('--verbose', 'print every command that is run')
  .action(async (flags: CliFlags & { verbose?: boolean }) => {
    if (flags.verbose) setLogLevel('verbose');

    try {
      console.log(chalk.bold.blue('🧹 upsweep\n'));
      const options = resolveOptions(flags, await loadConfig());
      const { exitCode } = await run(options);
      process.exit(exitCode);
    } catch (error) {
      if (error instanceof ConfigError) {
        console.error(chalk.red(`❌ ${error.message}`));
      } else {
        console.error(chalk.red('❌ Unexpected error:'), error);
      }
      process.exit(1);
    }
  });

program
  .command('doctor')
  .description('Check system for available package managers and configuration')
  .option('-p, --python <path>', 'python interpreter used for pip', 'python3')
  .action(async (flags: { python: string }) => {
    try {
      console.log(chalk.bold.cyan('\n🔍 System Check\n'));
      const adapterOptions = { global: false, python: flags.python };

      console.log(chalk.bold('Node.js:'));
      const nodeVersion = parseInt(process.version.slice(1).split('.')[0], 10);
      if (nodeVersion >= 20) {
        console.log(chalk.green(`  ✅ ${process.version} (compatible)`));
      } else {
        console.log(chalk.red(`  ❌ ${process.version} (requires 20+)`));
      }

      console.log(chalk.bold('\nPackage Managers:'));
      const managers = await checkAllPackageManagers(adapterOptions);
      for (const pm of PACKAGE_MANAGERS) {
        if (managers[pm]) {
          const version = await getPackageManagerVersion(pm, adapterOptions);
          console.log(chalk.green(`  ✅ ${pm} ${version ? `(${version})` : ''}`));
        } else {
          console.log(chalk.gray(`  ○ ${pm} (not installed)`));
        }
      }

      const defaultPM = await detectPackageManager(adapterOptions);
      console.log(chalk.bold(`\nDefault package manager: ${chalk.cyan(defaultPM)}`));

      console.log(chalk.bold('\nConfiguration:'));
      try {
        const config = await loadConfig();
        if (config) {
          console.log(chalk.green(`  ✅ Config file found (${getConfigPath()})`));
        } else {
          console.log(chalk.gray(`  ○ No config file (optional): ${getConfigPath()}`));
        }
      } catch (error) {
        if (!(error instanceof ConfigError)) throw error;
        console.log(chalk.yellow('  ⚠️  Configuration has errors:'));
        error.problems.forEach(problem => {
          console.log(chalk.yellow(`     • ${problem}`));
        });
      }

      console.log();
    } catch (error) {
      console.error(chalk.red('❌ Error during system check:'), error);
      process.exit(1);
    }
  });

process.on('uncaughtException', (error) => {
  console.error(chalk.red('Uncaught Exception:'), error.message);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  console.error(chalk.red('Unhandled Rejection:'), reason);
  process.exit(1);
});

process.on('SIGINT', () => {
  console.log(chalk.yellow('\n\nOperation cancelled by user.'));
  process.exit(130);
});

process.on('SIGTERM', () => {
  console.log(chalk.yellow('\n\nOperation cancelled.'));
  process.exit(143);
});

await program.parseAsync();
