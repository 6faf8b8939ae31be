import type { Command } from '../command/types.js';
import { logger } from '../shared/logger.js';
import { resolveTarget } from './resolve.js';
import type { Resolution, ResolveOptions } from './resolve.js';
import type { InvocationOutcome, InvocationTarget, OperationTable, ProcessRunner, UserFacingResult } from './types.js';

export interface DispatcherOptions extends ResolveOptions {
  operations: OperationTable;
  runner: ProcessRunner;
}

export function normalizeOutcome(target: InvocationTarget, outcome: InvocationOutcome): UserFacingResult {
  const { operation } = target;
  switch (outcome.status) {
    case 'succeeded':
      return { type: 'success', operation, stdout: outcome.stdout };
    case 'failed-nonzero':
      return {
        type: 'operation-failure',
        operation,
        stderr: outcome.stderr,
        exitCode: outcome.exitCode,
        ...(outcome.signal !== undefined ? { signal: outcome.signal } : {}),
      };
    case 'failed-to-start':
      return {
        type: 'launch-failure',
        operation,
        cause: outcome.cause,
        ...(outcome.errorCode !== undefined ? { errorCode: outcome.errorCode } : {}),
      };
    case 'cancelled':
      return { type: 'cancelled', operation, reason: outcome.reason };
  }
}

/**
 * Routes one command to its external operation and reports the outcome.
 * Holds no per-dispatch state, so repeated dispatches are independent.
 */
export class Dispatcher {
  private readonly operations: OperationTable;
  private readonly runner: ProcessRunner;
  private readonly resolveOptions: ResolveOptions;

  constructor(options: DispatcherOptions) {
    this.operations = options.operations;
    this.runner = options.runner;
    this.resolveOptions = { passKind: options.passKind, cwd: options.cwd };
  }

  resolve(command: Command): Resolution {
    return resolveTarget(command, this.operations, this.resolveOptions);
  }

  async dispatch(command: Command): Promise<UserFacingResult> {
    const resolution = this.resolve(command);
    if (resolution.type === 'unsupported') {
      logger.debug({ command }, 'No operation for command');
      return { type: 'unsupported-input', message: resolution.message, value: resolution.value };
    }

    const { target } = resolution;
    logger.debug({ command, target }, 'Resolved');
    logger.debug({ executable: target.executable, args: target.args }, 'Launching');
    const outcome = await this.runner.run(target);
    logger.debug({ operation: target.operation, status: outcome.status }, 'Operation finished');
    return normalizeOutcome(target, outcome);
  }
}
