export enum CoachErrorCode {
  PARSE_ERROR = 'PARSE_ERROR',
  UNSUPPORTED_INPUT = 'UNSUPPORTED_INPUT',
  LAUNCH_FAILURE = 'LAUNCH_FAILURE',
  OPERATION_FAILURE = 'OPERATION_FAILURE',
  CANCELLED = 'CANCELLED',
  CONFIG_INVALID = 'CONFIG_INVALID',
}

// Process exit status for each error code. 0 is reserved for success.
export const EXIT_CODES: Readonly<Record<CoachErrorCode, number>> = {
  [CoachErrorCode.OPERATION_FAILURE]: 1,
  [CoachErrorCode.PARSE_ERROR]: 2,
  [CoachErrorCode.UNSUPPORTED_INPUT]: 3,
  [CoachErrorCode.LAUNCH_FAILURE]: 4,
  [CoachErrorCode.CANCELLED]: 5,
  [CoachErrorCode.CONFIG_INVALID]: 6,
};

export class CoachError extends Error {
  readonly code: CoachErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: CoachErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'CoachError';
    this.code = code;
    this.context = context;
  }

  get exitCode(): number {
    return EXIT_CODES[this.code];
  }
}

export function isCoachError(err: unknown): err is CoachError {
  return err instanceof CoachError;
}
