import test from 'node:test';
import assert from 'node:assert/strict';
import { ToolNotFoundError } from '../errors.js';
import { setLogLevel } from '../logger.js';
import { NOTHING_TO_UPGRADE, run } from '../run.js';
import type { RunOptions } from '../types.js';
import { fakeRunner, type RecordedCall } from './helpers.js';

setLogLevel('silent');

const baseOptions: RunOptions = {
  packageManager: 'pip',
  mode: 'sequential',
  concurrency: 4,
  timeoutMs: 60_000,
  python: 'python3',
  global: false,
  exclude: [],
  listOnly: false,
  yes: true
};

const pipListing = JSON.stringify([
  { name: 'requests', version: '2.0.0', latest_version: '2.31.0', latest_filetype: 'wheel' },
  { name: 'flask', version: '1.0', latest_version: '2.3', latest_filetype: 'wheel' }
]);

const isList = (call: RecordedCall) => call.args.includes('list');
const upgrades = (calls: RecordedCall[]) => calls.filter(call => call.args.includes('install'));

test('nothing outdated: no upgrades and exit code 0', async () => {
  const { runner, calls } = fakeRunner(() => ({ stdout: '[]' }));

  const outcome = await run(baseOptions, { runner });

  assert.equal(outcome.exitCode, 0);
  assert.equal(outcome.summary, undefined);
  assert.equal(calls.length, 1);
  assert.equal(upgrades(calls).length, 0);
  assert.equal(NOTHING_TO_UPGRADE, 'All packages are up to date. No packages need to be upgraded.');
});

for (const mode of ['sequential', 'concurrent'] as const) {
  test(`${mode}: two successful upgrades`, async () => {
    const { runner, calls } = fakeRunner(call => (isList(call) ? { stdout: pipListing } : { code: 0 }));

    const outcome = await run({ ...baseOptions, mode }, { runner });

    assert.equal(outcome.exitCode, 0);
    assert.equal(upgrades(calls).length, 2);
    assert.deepEqual(outcome.summary?.succeeded.map(r => r.name), ['requests', 'flask']);
    assert.deepEqual(outcome.summary?.failed, []);
  });

  test(`${mode}: one failure gives exit code 1 and names the package`, async () => {
    const { runner } = fakeRunner(call => {
      if (isList(call)) return { stdout: pipListing };
      return call.args.includes('requests==2.31.0') ? { code: 1, stderr: 'ERROR: network unreachable' } : { code: 0 };
    });

    const outcome = await run({ ...baseOptions, mode }, { runner });

    assert.equal(outcome.exitCode, 1);
    assert.deepEqual(outcome.summary?.succeeded.map(r => r.name), ['flask']);
    assert.deepEqual(outcome.summary?.failed.map(r => [r.name, r.error]), [['requests', 'ERROR: network unreachable']]);
  });
}

test('a failed listing is fatal and upgrades nothing', async () => {
  const { runner, calls } = fakeRunner(() => ({ code: 2, stderr: 'No module named pip' }));

  const outcome = await run(baseOptions, { runner });

  assert.equal(outcome.exitCode, 1);
  assert.equal(calls.length, 1);
});

test('a missing package manager is fatal', async () => {
  const { runner } = fakeRunner(() => new ToolNotFoundError('python3'));

  const outcome = await run(baseOptions, { runner });

  assert.equal(outcome.exitCode, 1);
});

test('unexpected errors are not swallowed', async () => {
  const { runner } = fakeRunner(() => new RangeError('out of file descriptors'));

  await assert.rejects(run(baseOptions, { runner }), RangeError);
});

test('declining the prompt upgrades nothing', async () => {
  const { runner, calls } = fakeRunner(() => ({ stdout: pipListing }));
  const prompts: string[] = [];

  const outcome = await run({ ...baseOptions, yes: false }, {
    runner,
    confirm: async message => {
      prompts.push(message);
      return false;
    }
  });

  assert.equal(outcome.exitCode, 0);
  assert.deepEqual(prompts, ['Upgrade 2 package(s)?']);
  assert.equal(upgrades(calls).length, 0);
});

test('--list stops after the table', async () => {
  const { runner, calls } = fakeRunner(() => ({ stdout: pipListing }));

  const outcome = await run({ ...baseOptions, yes: false, listOnly: true }, {
    runner,
    confirm: async () => assert.fail('should not prompt')
  });

  assert.equal(outcome.exitCode, 0);
  assert.equal(calls.length, 1);
});

test('detects the package manager when none is configured', async () => {
  const { runner, calls } = fakeRunner(call => {
    if (call.command === 'which' || call.command === 'where') {
      return { code: call.args[0] === 'pnpm' ? 0 : 1 };
    }
    return { code: 0, stdout: '{}' };
  });

  const outcome = await run({ ...baseOptions, packageManager: undefined }, { runner });

  assert.equal(outcome.exitCode, 0);
  assert.deepEqual(calls[calls.length - 1], {
    command: 'pnpm',
    args: ['outdated', '--format', 'json'],
    timeoutMs: 60_000
  });
});

test('excluded packages are neither listed nor upgraded', async () => {
  const { runner, calls } = fakeRunner(call => (isList(call) ? { stdout: pipListing } : { code: 0 }));

  const outcome = await run({ ...baseOptions, exclude: ['flask'] }, { runner });

  assert.deepEqual(outcome.summary?.succeeded.map(r => r.name), ['requests']);
  assert.deepEqual(upgrades(calls).map(c => c.args[4]), ['requests==2.31.0']);
});
