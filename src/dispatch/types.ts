export type OperationName = 'fetch' | 'coaching';

/** How to start one external operation: executable plus its fixed arguments. */
export interface OperationSpec {
  readonly command: string;
  readonly args: readonly string[];
}

export type OperationTable = Readonly<Record<OperationName, OperationSpec>>;

export interface InvocationTarget {
  readonly operation: OperationName;
  readonly executable: string;
  readonly args: readonly string[];
  readonly cwd?: string;
}

export type InvocationOutcome =
  | { readonly status: 'succeeded'; readonly stdout: string; readonly stderr: string }
  | {
      readonly status: 'failed-nonzero';
      readonly exitCode: number;
      readonly signal?: string;
      readonly stdout: string;
      readonly stderr: string;
    }
  | {
      readonly status: 'failed-to-start';
      readonly cause: string;
      readonly errorCode?: string;
      readonly stdout: '';
      readonly stderr: '';
    }
  | { readonly status: 'cancelled'; readonly reason: string; readonly stdout: string; readonly stderr: string };

/**
 * Boundary to the outside world. The dispatcher only ever sees outcomes,
 * so tests can swap in a fake that never spawns anything.
 */
export interface ProcessRunner {
  run(target: InvocationTarget): Promise<InvocationOutcome>;
}

export type UserFacingResult =
  | { readonly type: 'success'; readonly operation: OperationName; readonly stdout: string }
  | { readonly type: 'unsupported-input'; readonly message: string; readonly value: string }
  | {
      readonly type: 'launch-failure';
      readonly operation: OperationName;
      readonly cause: string;
      readonly errorCode?: string;
    }
  | {
      readonly type: 'operation-failure';
      readonly operation: OperationName;
      readonly stderr: string;
      readonly exitCode: number;
      readonly signal?: string;
    }
  | { readonly type: 'cancelled'; readonly operation: OperationName; readonly reason: string };
