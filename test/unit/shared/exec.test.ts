import os from 'os';
import path from 'path';
import fs from 'fs/promises';
import {
  ExecaRunner,
  MAX_TIMEOUT_MS,
  describeSpawnError,
  signalExitCode,
} from '../../../src/shared/exec.js';
import type { InvocationTarget } from '../../../src/dispatch/types.js';

// The running Node binary stands in for an external operation.
function nodeScript(source: string): InvocationTarget {
  return { operation: 'fetch', executable: process.execPath, args: ['-e', source] };
}

describe('ExecaRunner', () => {
  const runner = new ExecaRunner();

  it('captures stdout and stderr of a successful run', async () => {
    const outcome = await runner.run(nodeScript("process.stdout.write('OK'); process.stderr.write('warn')"));
    expect(outcome).toEqual({ status: 'succeeded', stdout: 'OK', stderr: 'warn' });
  });

  it('keeps trailing newlines verbatim', async () => {
    const outcome = await runner.run(nodeScript("console.log('line')"));
    expect(outcome).toEqual({ status: 'succeeded', stdout: 'line\n', stderr: '' });
  });

  it('reports a non-zero exit with both streams', async () => {
    const outcome = await runner.run(
      nodeScript("process.stdout.write('partial'); process.stderr.write('boom'); process.exitCode = 3")
    );
    expect(outcome).toEqual({
      status: 'failed-nonzero',
      exitCode: 3,
      signal: undefined,
      stdout: 'partial',
      stderr: 'boom',
    });
  });

  it('gives the child an empty stdin', async () => {
    const outcome = await runner.run(
      nodeScript("process.stdin.resume(); process.stdin.on('end', () => process.stdout.write('eof'))")
    );
    expect(outcome).toEqual({ status: 'succeeded', stdout: 'eof', stderr: '' });
  });

  it('runs in the target working directory', async () => {
    const dir = await fs.realpath(os.tmpdir());
    const outcome = await runner.run({ ...nodeScript('process.stdout.write(process.cwd())'), cwd: dir });
    expect(outcome).toEqual({ status: 'succeeded', stdout: dir, stderr: '' });
  });

  it('reports a missing executable as a launch failure', async () => {
    const outcome = await runner.run({
      operation: 'coaching',
      executable: '/nonexistent/garmin-coach-operation',
      args: [],
    });
    expect(outcome.status).toBe('failed-to-start');
    if (outcome.status !== 'failed-to-start') return;
    expect(outcome.errorCode).toBe('ENOENT');
    expect(outcome.cause).toBe('not found (spawn /nonexistent/garmin-coach-operation ENOENT)');
    expect(outcome.stdout).toBe('');
    expect(outcome.stderr).toBe('');
  });

  describe('with a file that is not executable', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await fs.mkdtemp(path.join(os.tmpdir(), 'coach-exec-'));
    });

    afterEach(async () => {
      await fs.rm(dir, { recursive: true, force: true });
    });

    it('reports permission denied', async () => {
      const script = path.join(dir, 'operation.sh');
      await fs.writeFile(script, '#!/bin/sh\necho hello\n', { encoding: 'utf-8', mode: 0o644 });
      const outcome = await runner.run({ operation: 'fetch', executable: script, args: [] });
      expect(outcome.status).toBe('failed-to-start');
      if (outcome.status !== 'failed-to-start') return;
      expect(outcome.errorCode).toBe('EACCES');
      expect(outcome.cause).toMatch(/^permission denied \(/);
    });
  });

  it('cancels an operation that outlives the timeout', async () => {
    const slow = new ExecaRunner({ timeoutMs: 200 });
    const outcome = await slow.run(nodeScript('setTimeout(() => {}, 10000)'));
    expect(outcome.status).toBe('cancelled');
    if (outcome.status !== 'cancelled') return;
    expect(outcome.reason).toBe('timed out after 200 ms');
  });

  it('force-kills an operation that ignores SIGTERM and waits for it to exit', async () => {
    const slow = new ExecaRunner({ timeoutMs: 1000 });
    const started = Date.now();
    const outcome = await slow.run(
      nodeScript("process.on('SIGTERM', () => {}); process.stdout.write('ready'); setInterval(() => {}, 1000)")
    );
    expect(Date.now() - started).toBeGreaterThanOrEqual(2900);
    expect(outcome).toEqual({ status: 'cancelled', reason: 'timed out after 1000 ms', stdout: 'ready', stderr: '' });
  }, 15_000);

  it('lets an operation finish well inside the largest timeout', async () => {
    const patient = new ExecaRunner({ timeoutMs: MAX_TIMEOUT_MS });
    const outcome = await patient.run(nodeScript("setTimeout(() => process.stdout.write('done'), 300)"));
    expect(outcome).toEqual({ status: 'succeeded', stdout: 'done', stderr: '' });
  });

  it('refuses a timeout setTimeout cannot honour', () => {
    expect(() => new ExecaRunner({ timeoutMs: 3_000_000_000 })).toThrow(RangeError);
  });

  it('reports a child killed by a signal as a non-zero exit', async () => {
    const outcome = await runner.run(nodeScript("process.kill(process.pid, 'SIGKILL')"));
    expect(outcome).toEqual({ status: 'failed-nonzero', exitCode: 137, signal: 'SIGKILL', stdout: '', stderr: '' });
  });
});

describe('signalExitCode', () => {
  it('adds the signal number to 128', () => {
    expect(signalExitCode('SIGKILL')).toBe(137);
    expect(signalExitCode('SIGTERM')).toBe(143);
  });

  it('falls back to 128 for an unknown or missing signal', () => {
    expect(signalExitCode('SIGBOGUS')).toBe(128);
    expect(signalExitCode(undefined)).toBe(128);
  });
});

describe('describeSpawnError', () => {
  it('prefixes known system codes with a readable description', () => {
    expect(describeSpawnError('EACCES', 'spawn x EACCES')).toBe('permission denied (spawn x EACCES)');
  });

  it('falls back to the raw message', () => {
    expect(describeSpawnError('EMFILE', 'too many open files')).toBe('too many open files');
    expect(describeSpawnError(undefined, 'something odd')).toBe('something odd');
  });
});
