import test from 'node:test';
import assert from 'node:assert/strict';
import { ToolNotFoundError } from '../errors.js';
import { KILL_GRACE_MS, runCommand } from '../process.js';

const node = process.execPath;

test('collects output and the exit code', async () => {
  const result = await runCommand(node, [
    '-e',
    'process.stdout.write("listed"); process.stderr.write("warned"); process.exitCode = 3'
  ]);

  assert.deepEqual(result, { code: 3, signal: null, stdout: 'listed', stderr: 'warned', timedOut: false });
});

test('a missing binary rejects with ToolNotFoundError', async () => {
  await assert.rejects(runCommand('upsweep-test-no-such-binary', ['--version']), (error: unknown) => {
    assert.ok(error instanceof ToolNotFoundError);
    assert.equal(error.tool, 'upsweep-test-no-such-binary');
    return true;
  });
});

test('kills a child that outlives its timeout', async () => {
  const started = Date.now();
  const result = await runCommand(node, ['-e', 'setTimeout(() => {}, 10000)'], { timeoutMs: 200 });

  assert.equal(result.timedOut, true);
  assert.equal(result.code, null);
  assert.equal(result.signal, 'SIGTERM');
  assert.ok(Date.now() - started < 2000);
});

test('returns at the timeout even when a grandchild keeps the output pipes open', async () => {
  const script = [
    "const { spawn } = require('child_process');",
    `spawn(${JSON.stringify(node)}, ['-e', 'setTimeout(() => {}, 4000)'], { stdio: 'inherit' });`,
    'setTimeout(() => {}, 10000);'
  ].join(' ');

  const started = Date.now();
  const result = await runCommand(node, ['-e', script], { timeoutMs: 300 });

  assert.equal(result.timedOut, true);
  assert.ok(Date.now() - started < 2000);
});

test('returns at the timeout when the child exited but a grandchild holds the pipes', async () => {
  const script = [
    "const { spawn } = require('child_process');",
    `spawn(${JSON.stringify(node)}, ['-e', 'setTimeout(() => {}, 4000)'], { stdio: 'inherit' }).unref();`
  ].join(' ');

  const started = Date.now();
  const result = await runCommand(node, ['-e', script], { timeoutMs: 500 });

  assert.equal(result.timedOut, true);
  assert.equal(result.code, 0);
  assert.ok(Date.now() - started < 2000);
});

test('escalates to SIGKILL when the child ignores SIGTERM', async () => {
  const script = "process.on('SIGTERM', () => {}); setTimeout(() => {}, 10000);";

  const started = Date.now();
  const result = await runCommand(node, ['-e', script], { timeoutMs: 500 });

  assert.equal(result.timedOut, true);
  assert.equal(result.signal, 'SIGKILL');
  assert.ok(Date.now() - started < 500 + KILL_GRACE_MS + 1500);
});

test('a timeout larger than the timer range does not fire early', async () => {
  const result = await runCommand(node, ['-e', 'setTimeout(() => {}, 300)'], { timeoutMs: 3_000_000_000 });

  assert.equal(result.timedOut, false);
  assert.equal(result.code, 0);
});
