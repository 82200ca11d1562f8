import type { PackageManager } from './types.js';

export class ToolNotFoundError extends Error {
  readonly tool: string;

  constructor(tool: string) {
    super(`${tool} was not found on PATH. Install it or pick another manager with --manager.`);
    this.name = 'ToolNotFoundError';
    this.tool = tool;
  }
}

export class ListFailureError extends Error {
  readonly manager: PackageManager;
  readonly exitCode: number | null;

  constructor(manager: PackageManager, exitCode: number | null, detail: string) {
    const status = exitCode === null ? 'was terminated' : `exited with code ${exitCode}`;
    super(`Listing outdated packages with ${manager} ${status}${detail ? `: ${detail}` : ''}`);
    this.name = 'ListFailureError';
    this.manager = manager;
    this.exitCode = exitCode;
  }
}

export class ConfigError extends Error {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid configuration:\n${problems.map(p => `  • ${p}`).join('\n')}`);
    this.name = 'ConfigError';
    this.problems = problems;
  }
}

/**
 * First non-empty line of a message, for one-line summaries.
 */
export function firstLine(text: string): string {
  return text.split('\n').map(line => line.trim()).find(line => line.length > 0) ?? '';
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
