import type { CommandResult, CommandRunner } from '../types.js';

export interface RecordedCall {
  command: string;
  args: string[];
  timeoutMs?: number;
}

type Reply = Partial<CommandResult> | Error;

export function result(partial: Partial<CommandResult> = {}): CommandResult {
  return { code: 0, signal: null, stdout: '', stderr: '', timedOut: false, ...partial };
}

/**
 * In-process stand-in for spawning the package manager.
 * `respond` sees each call and returns (or resolves to) a partial result, or an Error to reject with.
 */
export function fakeRunner(respond: (call: RecordedCall) => Reply | Promise<Reply>) {
  const calls: RecordedCall[] = [];

  const runner: CommandRunner = async (command, args, options) => {
    const call: RecordedCall = { command, args: [...args], timeoutMs: options?.timeoutMs };
    calls.push(call);
    const reply = await respond(call);
    if (reply instanceof Error) throw reply;
    return result(reply);
  };

  return { runner, calls };
}

export const delay = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));
