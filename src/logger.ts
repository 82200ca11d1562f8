import chalk from 'chalk';

export type LogLevel = 'silent' | 'normal' | 'verbose';

let level: LogLevel = 'normal';

export function setLogLevel(next: LogLevel): void {
  level = next;
}

export function isSilent(): boolean {
  return level === 'silent';
}

export const logger = {
  info(message: string): void {
    if (level !== 'silent') console.log(message);
  },
  success(message: string): void {
    if (level !== 'silent') console.log(chalk.green(message));
  },
  warn(message: string): void {
    if (level !== 'silent') console.warn(chalk.yellow(message));
  },
  error(message: string): void {
    if (level !== 'silent') console.error(chalk.red(message));
  },
  // Only with --verbose
  debug(message: string): void {
    if (level === 'verbose') console.log(chalk.gray(message));
  }
};
