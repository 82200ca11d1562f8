import chalk from 'chalk';
import type { OutdatedPackage } from './types.js';
import { determineUpdateType } from './version.js';

const TYPE_COLORS = {
  major: chalk.red,
  minor: chalk.yellow,
  patch: chalk.green,
  prerelease: chalk.magenta,
  unknown: chalk.gray
} as const;

/**
 * Render the outdated listing as a bordered table.
 * The Filetype column only appears when the manager reports one (pip).
 */
export function renderOutdatedTable(packages: readonly OutdatedPackage[]): string {
  const withFiletype = packages.some(pkg => pkg.latestFiletype);
  const head = ['Name', 'Current', 'Latest', 'Type', ...(withFiletype ? ['Filetype'] : [])];

  const rows = packages.map(pkg => {
    const type = determineUpdateType(pkg.currentVersion, pkg.latestVersion);
    return {
      cells: [pkg.name, pkg.currentVersion, pkg.latestVersion, type, ...(withFiletype ? [pkg.latestFiletype ?? '-'] : [])],
      type
    };
  });

  const widths = head.map((title, i) => Math.max(title.length, ...rows.map(row => row.cells[i].length)));
  const border = (left: string, mid: string, right: string) =>
    chalk.gray(left + widths.map(w => '─'.repeat(w + 2)).join(mid) + right);
  const line = (cells: string[], paint: (cell: string, i: number) => string) =>
    chalk.gray('│') +
    cells.map((cell, i) => ` ${paint(cell.padEnd(widths[i]), i)} `).join(chalk.gray('│')) +
    chalk.gray('│');

  return [
    border('┌', '┬', '┐'),
    line(head, cell => chalk.bold(cell)),
    border('├', '┼', '┤'),
    ...rows.map(row =>
      line(row.cells, (cell, i) => {
        if (i === 0) return chalk.cyan(cell);
        if (i === 2 || i === 3) return TYPE_COLORS[row.type](cell);
        return cell;
      })
    ),
    border('└', '┴', '┘')
  ].join('\n');
}
