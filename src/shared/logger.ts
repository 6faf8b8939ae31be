import pino from 'pino';

// Logs go to stderr (fd 2) so they never interleave with an operation's stdout.
export const logger = pino(
  {
    name: 'garmin-coach',
    level: process.env['LOG_LEVEL'] ?? 'warn',
  },
  pino.destination(2)
);

export function enableVerbose(): void {
  logger.level = 'debug';
}
