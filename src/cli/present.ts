import { isExampleKind } from '../command/types.js';
import type { Command } from '../command/types.js';
import type { OperationName, UserFacingResult } from '../dispatch/types.js';
import { CoachErrorCode, EXIT_CODES } from '../shared/errors.js';

export interface Presentation {
  stdout: string[];
  stderr: string[];
  exitCode: number;
}

interface Messages {
  successBanner?: string;
  failureHeading: string;
}

const MESSAGES: Readonly<Record<Command['type'], Messages>> = {
  'fetch-data': { successBanner: '✅ Data fetched successfully!', failureHeading: '❌ Error fetching data:' },
  coaching: { successBanner: '✅ Coaching feedback received!', failureHeading: '❌ Error getting coaching:' },
  example: { failureHeading: '❌ Error running example:' },
};

const OPERATION_LABELS: Readonly<Record<OperationName, string>> = {
  fetch: 'data fetch',
  coaching: 'coaching',
};

/** Line printed before the operation starts. */
export function announce(command: Command): string {
  switch (command.type) {
    case 'fetch-data':
      return `Fetching ${command.kind} data from Garmin Connect...`;
    case 'coaching':
      return `Getting ${command.kind} coaching feedback...`;
    case 'example':
      return `Running ${command.kind} example...`;
  }
}

/**
 * Lines printed once an operation has been picked, just before it runs,
 * set off by blank lines. None for an example type that has no operation.
 */
export function launchNotice(command: Command): string[] {
  switch (command.type) {
    case 'fetch-data':
      return ['', '📊 Fetching Garmin data using Python client...', ''];
    case 'coaching':
      return ['', '🤖 Getting AI coaching feedback...', ''];
    case 'example':
      return isExampleKind(command.kind) ? ['', `🚀 Running ${command.kind} example...`, ''] : [];
  }
}

/**
 * Turn a dispatch result into terminal output. Operation output is passed
 * through untouched; stdout only appears on success.
 */
export function present(command: Command, result: UserFacingResult): Presentation {
  const messages = MESSAGES[command.type];
  switch (result.type) {
    case 'success':
      return {
        stdout: messages.successBanner !== undefined ? [result.stdout, messages.successBanner] : [result.stdout],
        stderr: [],
        exitCode: 0,
      };
    case 'operation-failure':
      return {
        stdout: [],
        stderr: [messages.failureHeading, result.stderr],
        exitCode: EXIT_CODES[CoachErrorCode.OPERATION_FAILURE],
      };
    case 'launch-failure':
      return {
        stdout: [],
        stderr: [`❌ Failed to start ${OPERATION_LABELS[result.operation]} operation: ${result.cause}`],
        exitCode: EXIT_CODES[CoachErrorCode.LAUNCH_FAILURE],
      };
    case 'cancelled':
      return {
        stdout: [],
        stderr: [`❌ ${OPERATION_LABELS[result.operation]} operation cancelled: ${result.reason}`],
        exitCode: EXIT_CODES[CoachErrorCode.CANCELLED],
      };
    case 'unsupported-input':
      return {
        stdout: [],
        stderr: [result.message],
        exitCode: EXIT_CODES[CoachErrorCode.UNSUPPORTED_INPUT],
      };
  }
}
