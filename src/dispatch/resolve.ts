import { isExampleKind } from '../command/types.js';
import type { Command, ExampleKind } from '../command/types.js';
import type { InvocationTarget, OperationName, OperationTable } from './types.js';

export interface ResolveOptions {
  passKind?: boolean;
  cwd?: string;
}

export type Resolution =
  | { readonly type: 'target'; readonly target: InvocationTarget }
  | { readonly type: 'unsupported'; readonly message: string; readonly value: string };

const EXAMPLE_OPERATIONS: Readonly<Record<ExampleKind, OperationName>> = {
  data: 'fetch',
  ai: 'coaching',
};

function targetFor(
  operation: OperationName,
  operations: OperationTable,
  cwd: string | undefined,
  extraArgs: readonly string[] = []
): InvocationTarget {
  const spec = operations[operation];
  return {
    operation,
    executable: spec.command,
    args: [...spec.args, ...extraArgs],
    ...(cwd !== undefined ? { cwd } : {}),
  };
}

/**
 * Map a command to the external operation that serves it.
 * `example` picks its operation from the kind; an unknown kind yields no target.
 * For fetch-data and coaching the kind only reaches the operation when passKind is set.
 */
export function resolveTarget(command: Command, operations: OperationTable, options: ResolveOptions = {}): Resolution {
  switch (command.type) {
    case 'fetch-data':
      return {
        type: 'target',
        target: targetFor('fetch', operations, options.cwd, options.passKind ? [command.kind] : []),
      };
    case 'coaching':
      return {
        type: 'target',
        target: targetFor('coaching', operations, options.cwd, options.passKind ? [command.kind] : []),
      };
    case 'example':
      if (!isExampleKind(command.kind)) {
        return {
          type: 'unsupported',
          message: `Unknown example type "${command.kind}". Use 'data' or 'ai'`,
          value: command.kind,
        };
      }
      return { type: 'target', target: targetFor(EXAMPLE_OPERATIONS[command.kind], operations, options.cwd) };
  }
}
