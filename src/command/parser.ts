import { Command as Program, CommanderError, InvalidArgumentError } from 'commander';
import { CoachError, CoachErrorCode } from '../shared/errors.js';
import { MAX_TIMEOUT_MS } from '../shared/exec.js';
import { DEFAULT_KINDS, makeCommand } from './types.js';
import type { Command, CommandType, GlobalFlags, ParseResult } from './types.js';

export const VERSION = '0.1.0';

function nonEmptyKind(value: string): string {
  if (value.trim() === '') {
    throw new InvalidArgumentError('Value must not be empty.');
  }
  return value;
}

function positiveInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive whole number of milliseconds.');
  }
  if (parsed > MAX_TIMEOUT_MS) {
    throw new InvalidArgumentError(`Timeout must not exceed ${MAX_TIMEOUT_MS} ms.`);
  }
  return parsed;
}

interface CapturedOutput {
  out: string[];
  err: string[];
}

type ProgramOptions = {
  config?: string;
  passKind?: boolean;
  timeout?: number;
  verbose?: boolean;
};

function buildProgram(
  onCommand: (command: Command) => void,
  output: CapturedOutput
): Program {
  const program = new Program();
  program
    .name('garmin-coach')
    .description('A personal coach for Garmin devices')
    .version(VERSION)
    .option('--config <path>', 'path to the configuration file')
    .option('--pass-kind', 'pass the selected data/coaching type to the operation as an argument')
    .option('--timeout <ms>', 'terminate the operation after this many milliseconds', positiveInteger)
    .option('--verbose', 'log dispatch steps to stderr')
    .exitOverride()
    .allowExcessArguments(false)
    .configureOutput({
      writeOut: (text) => output.out.push(text),
      writeErr: (text) => output.err.push(text),
    });

  const subcommand = (type: CommandType, description: string, flags: string, flagDescription: string, key: string): void => {
    program
      .command(type)
      .description(description)
      .option(flags, `${flagDescription} (default: "${DEFAULT_KINDS[type]}")`, nonEmptyKind)
      .action((opts: Record<string, string | undefined>) => {
        onCommand(makeCommand(type, opts[key]));
      });
  };

  subcommand(
    'fetch-data',
    'Retrieve data from Garmin Connect',
    '-d, --data-type <type>',
    'type of data to fetch (activities, health, stats)',
    'dataType'
  );
  subcommand(
    'coaching',
    'Get AI coaching feedback',
    '-c, --coaching-type <type>',
    'type of coaching (activity, health, plan)',
    'coachingType'
  );
  subcommand(
    'example',
    'Run example scripts',
    '-e, --example-type <type>',
    'which example to run (data, ai)',
    'exampleType'
  );

  return program;
}

function stripErrorPrefix(message: string): string {
  return message.replace(/^error:\s*/, '');
}

/**
 * Parse CLI tokens (without the node binary and script path) into a Command.
 * Never writes to the terminal and never exits; malformed input throws
 * a CoachError with code PARSE_ERROR.
 */
export function parseArgs(rawArgs: readonly string[]): ParseResult {
  const output: CapturedOutput = { out: [], err: [] };
  const selected: { command?: Command } = {};
  const program = buildProgram((parsed) => {
    selected.command = parsed;
  }, output);

  try {
    program.parse([...rawArgs], { from: 'user' });
  } catch (err) {
    if (!(err instanceof CommanderError)) throw err;
    // --help, --version and `help`: output the user asked for.
    if (err.exitCode === 0) {
      return { type: 'info', text: output.out.join('') };
    }
    // Bare invocation: commander prints help to stderr and bails with this code.
    if (err.code === 'commander.help') {
      throw new CoachError(
        CoachErrorCode.PARSE_ERROR,
        'No subcommand given. Use one of: fetch-data, coaching, example',
        { help: output.err.join('') }
      );
    }
    throw new CoachError(CoachErrorCode.PARSE_ERROR, stripErrorPrefix(err.message), {
      commanderCode: err.code,
    });
  }

  const { command } = selected;
  if (command === undefined) {
    throw new CoachError(
      CoachErrorCode.PARSE_ERROR,
      'No subcommand given. Use one of: fetch-data, coaching, example'
    );
  }

  const opts = program.opts<ProgramOptions>();
  const flags: GlobalFlags = {
    configPath: opts.config,
    passKind: opts.passKind,
    timeoutMs: opts.timeout,
    verbose: opts.verbose,
  };
  return { type: 'command', command, flags };
}
