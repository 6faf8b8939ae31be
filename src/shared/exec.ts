import { constants } from 'os';
import execa, { type ExecaChildProcess, type ExecaReturnValue } from 'execa';
import { logger } from './logger.js';
import type { InvocationOutcome, InvocationTarget, ProcessRunner } from '../dispatch/types.js';

// Largest delay setTimeout honours; anything above it fires after 1 ms.
export const MAX_TIMEOUT_MS = 2_147_483_647;

// Grace period between SIGTERM and SIGKILL once a timeout fires.
const FORCE_KILL_AFTER_MS = 2_000;

const SPAWN_ERROR_DESCRIPTIONS: Readonly<Record<string, string>> = {
  ENOENT: 'not found',
  EACCES: 'permission denied',
  EPERM: 'operation not permitted',
  ENOTDIR: 'not a directory',
};

const SIGNAL_NUMBERS = new Map<string, number>(Object.entries(constants.signals));

export interface ExecaRunnerOptions {
  timeoutMs?: number;
}

export function describeSpawnError(errorCode: string | undefined, message: string): string {
  const description = errorCode !== undefined ? SPAWN_ERROR_DESCRIPTIONS[errorCode] : undefined;
  return description !== undefined ? `${description} (${message})` : message;
}

/** Exit status a shell would report for a child killed by `signal`: 128 + signal number. */
export function signalExitCode(signal: string | undefined): number {
  const number = signal !== undefined ? SIGNAL_NUMBERS.get(signal) : undefined;
  return 128 + (number ?? 0);
}

function launchFailure(cause: string, errorCode?: string): InvocationOutcome {
  return { status: 'failed-to-start', cause, errorCode, stdout: '', stderr: '' };
}

export class ExecaRunner implements ProcessRunner {
  private readonly timeoutMs?: number;

  constructor(options: ExecaRunnerOptions = {}) {
    if (options.timeoutMs !== undefined && (options.timeoutMs <= 0 || options.timeoutMs > MAX_TIMEOUT_MS)) {
      throw new RangeError(`timeoutMs must be between 1 and ${MAX_TIMEOUT_MS}, got ${options.timeoutMs}`);
    }
    this.timeoutMs = options.timeoutMs;
  }

  async run(target: InvocationTarget): Promise<InvocationOutcome> {
    let subprocess: ExecaChildProcess;
    try {
      subprocess = execa(target.executable, [...target.args], {
        cwd: target.cwd,
        stdin: 'ignore',
        stripFinalNewline: false,
        reject: false,
      });
    } catch (err) {
      // execa resolves spawn errors when reject is false; this covers anything it still throws.
      const message = err instanceof Error ? err.message : String(err);
      logger.debug({ executable: target.executable, err }, 'execa threw before the process started');
      return launchFailure(message);
    }

    // The timer is ours rather than execa's `timeout` so the SIGKILL grace period applies
    // and the promise below only settles once the child has actually exited.
    const deadline = { expired: false };
    const timer =
      this.timeoutMs !== undefined
        ? setTimeout(() => {
            deadline.expired = true;
            logger.debug({ executable: target.executable, timeoutMs: this.timeoutMs }, 'Timeout reached, terminating');
            subprocess.kill('SIGTERM', { forceKillAfterTimeout: FORCE_KILL_AFTER_MS });
          }, this.timeoutMs)
        : undefined;

    let result: ExecaReturnValue;
    try {
      result = await subprocess;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      return launchFailure(message);
    } finally {
      clearTimeout(timer);
    }

    const errorCode = 'code' in result && typeof result.code === 'string' ? result.code : undefined;
    if (errorCode !== undefined) {
      const original =
        'originalMessage' in result && typeof result.originalMessage === 'string'
          ? result.originalMessage
          : `spawn ${target.executable} ${errorCode}`;
      return launchFailure(describeSpawnError(errorCode, original), errorCode);
    }

    const stdout = result.stdout ?? '';
    const stderr = result.stderr ?? '';

    if (deadline.expired) {
      return { status: 'cancelled', reason: `timed out after ${this.timeoutMs ?? 0} ms`, stdout, stderr };
    }
    if (!result.failed) {
      return { status: 'succeeded', stdout, stderr };
    }
    const signal = result.signal ?? undefined;
    return {
      status: 'failed-nonzero',
      exitCode: result.exitCode ?? signalExitCode(signal),
      signal,
      stdout,
      stderr,
    };
  }
}
